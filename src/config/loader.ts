import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import { ConfigurationError } from "../errors.js";
import type { TicketDeskConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigurationError(
        `Missing environment variable: ${varName} (referenced as ${match})`,
      );
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function parseConfigText(content: string): TicketDeskConfig {
  const substituted = substituteEnv(content);
  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    throw new ConfigurationError(
      `Config is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new ConfigurationError(`Invalid config: ${detail}`, { cause: err });
    }
    throw err;
  }
}

export function loadConfig(path?: string): TicketDeskConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return parseConfig({});
    }
    throw err;
  }

  return parseConfigText(content);
}
