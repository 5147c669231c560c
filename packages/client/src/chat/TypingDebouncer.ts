import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';

export const DEFAULT_TYPING_QUIET_PERIOD_MS = 2_000;

export interface TypingDebouncerOptions {
  /** Delivers one typing intent. Failures are logged and dropped. */
  emit: (isTyping: boolean) => Promise<void>;
  quietPeriodMs?: number;
  logger?: ClientLogger;
}

/**
 * Turns draft edits into typing start/stop intents: `true` once per burst,
 * `false` after a quiet period or as soon as the draft is cleared.
 */
export class TypingDebouncer {
  private readonly quietPeriodMs: number;
  private readonly logger: ClientLogger;
  private timer: NodeJS.Timeout | null = null;
  private typing = false;

  constructor(private readonly options: TypingDebouncerOptions) {
    this.quietPeriodMs = options.quietPeriodMs ?? DEFAULT_TYPING_QUIET_PERIOD_MS;
    this.logger = (options.logger ?? clientLogger).child({ component: 'typing' });
  }

  get isTyping(): boolean {
    return this.typing;
  }

  handleInput(draft: string): void {
    this.cancelTimer();

    if (draft.length === 0) {
      this.stopTyping();
      return;
    }

    if (!this.typing) {
      this.typing = true;
      this.deliver(true);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.stopTyping();
    }, this.quietPeriodMs);
  }

  dispose(): void {
    this.cancelTimer();
    this.typing = false;
  }

  private stopTyping(): void {
    if (!this.typing) {
      return;
    }
    this.typing = false;
    this.deliver(false);
  }

  private cancelTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private deliver(isTyping: boolean): void {
    this.options.emit(isTyping).catch((error: unknown) => {
      this.logger.debug({ err: normalizeError(error), isTyping }, 'typing intent not delivered');
    });
  }
}
