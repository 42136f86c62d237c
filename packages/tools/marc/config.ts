// Configuration - resolved once per invocation and passed down explicitly

import { dirname, join, resolve } from "node:path";
import { z } from "zod/mini";
import { MarcError } from "./domain/entities/errors.js";
import type { FileSystem } from "./domain/ports/filesystem.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const MARC_DIR = ".marc";
export const STORE_FILE = `${MARC_DIR}/todos.json`;

export interface MarcConfig {
  readonly storePath: string;
  readonly logLevel: LogLevel;
  readonly color: boolean;
}

export interface ConfigSources {
  /** --file flag */
  readonly file?: string;
  /** false when --no-color was given */
  readonly color?: boolean;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly cwd: string;
  readonly home: string;
  readonly isTTY: boolean;
}

const EnvSchema = z.object({
  MARC_FILE: z.optional(z.string()),
  MARC_LOG_LEVEL: z.optional(z.enum(LOG_LEVELS)),
  NO_COLOR: z.optional(z.string()),
});

export function parseEnv(
  env: Readonly<Record<string, string | undefined>>,
): z.infer<typeof EnvSchema> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MarcError(
      "invalid_args",
      `Invalid environment variable ${issue.path.join(".")}: ${issue.message}`,
    );
  }
  return result.data;
}

/**
 * Resolve the store path, first match wins:
 * --file, MARC_FILE, nearest .marc/todos.json above cwd, ~/.marc/todos.json
 */
export async function resolveStorePath(
  sources: ConfigSources,
  fs: FileSystem,
): Promise<string> {
  if (sources.file) {
    return resolve(sources.cwd, sources.file);
  }

  const env = parseEnv(sources.env);
  if (env.MARC_FILE) {
    return resolve(sources.cwd, env.MARC_FILE);
  }

  const nearest = await findNearestStore(sources.cwd, fs);
  return nearest ?? join(sources.home, STORE_FILE);
}

async function findNearestStore(
  cwd: string,
  fs: FileSystem,
): Promise<string | null> {
  let dir = resolve(cwd);
  while (true) {
    const candidate = join(dir, STORE_FILE);
    if (await fs.exists(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export async function resolveConfig(
  sources: ConfigSources,
  fs: FileSystem,
): Promise<MarcConfig> {
  const env = parseEnv(sources.env);

  return {
    storePath: await resolveStorePath(sources, fs),
    logLevel: env.MARC_LOG_LEVEL ?? "warn",
    color: sources.color !== false && !env.NO_COLOR && sources.isTTY,
  };
}
