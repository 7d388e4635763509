import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";

export function getStateDir(): string {
  return process.env["TICKETDESK_STATE_DIR"] ?? join(homedir(), ".ticketdesk");
}

export function getConfigPath(): string {
  return process.env["TICKETDESK_CONFIG_PATH"] ?? "ticketdesk.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}

/** Relative paths in config are anchored at the state directory. */
export function resolveStatePath(stateDir: string, path: string): string {
  return isAbsolute(path) ? path : join(stateDir, path);
}
