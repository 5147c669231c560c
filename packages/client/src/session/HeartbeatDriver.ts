import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import { toError } from '../utils/errorUtils';

export interface HeartbeatDriverOptions {
  intervalMs: number;
  /** Sends one keepalive frame. */
  ping: () => Promise<void>;
  /** Called once when a keepalive send fails; the driver is stopped by then. */
  onFailure: (error: Error) => void;
  logger?: ClientLogger;
}

/**
 * Sends a keepalive every `intervalMs` until stopped. The next wait only
 * starts after the previous ping settled, so pings never overlap.
 */
export class HeartbeatDriver {
  private readonly logger: ClientLogger;
  private timer: NodeJS.Timeout | null = null;
  private generation = 0;

  constructor(private readonly options: HeartbeatDriverOptions) {
    this.logger = (options.logger ?? clientLogger).child({ component: 'heartbeat' });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.stop();
    this.schedule(this.generation);
  }

  stop(): void {
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(generation: number): void {
    this.timer = setTimeout(() => {
      void this.beat(generation);
    }, this.options.intervalMs);
  }

  private async beat(generation: number): Promise<void> {
    try {
      await this.options.ping();
    } catch (error) {
      if (generation !== this.generation) {
        return;
      }
      this.logger.warn({ err: normalizeError(error) }, 'heartbeat send failed');
      this.stop();
      this.options.onFailure(toError(error));
      return;
    }

    if (generation !== this.generation) {
      return;
    }
    this.logger.trace('heartbeat sent');
    this.schedule(generation);
  }
}
