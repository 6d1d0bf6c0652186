import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";

export const CONFIG_FILE_NAME = ".porscheconnect.cfg";
export const DEFAULT_SESSION_FILE = ".session";

const configFileSchema = z.object({
  email: z.string().optional(),
  password: z.string().optional(),
  session_file: z.string().optional(),
});

export interface CliConfig {
  email?: string;
  password?: string;
  sessionFile: string;
}

export interface LoadCliConfigOptions {
  // Read in order, later files override earlier ones
  paths?: string[];
  env?: NodeJS.ProcessEnv;
}

// The home directory file has the last word
export function defaultConfigPaths(): string[] {
  return [
    path.resolve(CONFIG_FILE_NAME),
    path.join(os.homedir(), CONFIG_FILE_NAME),
  ];
}

/**
 * Parses `key = value` (or `key: value`) lines. Section headers and lines
 * starting with `#` or `;` are skipped. A `#` inside a value is kept.
 */
export function parseConfigFile(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#") || line.startsWith(";")) continue;
    if (line.startsWith("[") && line.endsWith("]")) continue;

    const separator = line.search(/[=:]/);
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim().toLowerCase();
    values[key] = line.slice(separator + 1).trim();
  }
  return values;
}

/**
 * Reads the config files, later ones overriding earlier ones.
 * `PORSCHE_*` environment variables win over files.
 */
export function loadCliConfig(options: LoadCliConfigOptions = {}): CliConfig {
  const paths = options.paths ?? defaultConfigPaths();
  const env = options.env ?? process.env;

  let fileValues: z.infer<typeof configFileSchema> = {};
  for (const file of paths) {
    if (!fs.existsSync(file)) continue;

    const parsed = parseConfigFile(fs.readFileSync(file, "utf-8"));
    fileValues = { ...fileValues, ...configFileSchema.parse(parsed) };
  }

  return {
    email: env.PORSCHE_EMAIL || fileValues.email || undefined,
    password: env.PORSCHE_PASSWORD || fileValues.password || undefined,
    sessionFile:
      env.PORSCHE_SESSION_FILE ||
      fileValues.session_file ||
      DEFAULT_SESSION_FILE,
  };
}
