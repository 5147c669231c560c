import { readFileSync } from 'node:fs';

export type EnvSource = Record<string, string | undefined>;

function readFileValue(path: string): string | undefined {
  try {
    const content = readFileSync(path, 'utf-8').trim();
    return content.length > 0 ? content : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Reads `name` from the environment, preferring the contents of the file
 * named by `<name>_FILE` when that variable is set and the file is readable.
 */
export function resolveEnv(name: string, env: EnvSource = process.env): string | undefined {
  const filePath = env[`${name}_FILE`];
  if (filePath) {
    const fromFile = readFileValue(filePath);
    if (fromFile !== undefined) {
      return fromFile;
    }
  }
  const direct = env[name];
  if (direct !== undefined && direct.trim() !== '') {
    return direct.trim();
  }
  return undefined;
}
