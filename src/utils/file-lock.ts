import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  /** Attempts after the first before giving up on a held lock. */
  retries?: number;
  minTimeoutMs?: number;
}

/**
 * Runs `fn` while holding a `<file>.lock` directory next to `filePath`. The
 * file itself need not exist yet.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options.retries ?? 5, minTimeout: options.minTimeoutMs ?? 20, maxTimeout: 500 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
