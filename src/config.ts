import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';

export const configSchema = z
  .object({
    dir: z.string().min(1).optional(),
    poll_interval: z.number().positive().optional(),
    hook_exit2: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configSchema>;

export interface Config {
  /** Queue directory; the state directory is used when unset. */
  dir?: string;
  /** Seconds between polls for `get --block`. */
  poll_interval: number;
  /** Hooks report blocks on stderr with exit code 2 instead of JSON. */
  hook_exit2: boolean;
}

export const defaultConfig: Config = {
  poll_interval: 0.2,
  hook_exit2: false,
};

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

export function configPath(env: Env, home: string): string {
  const base = env['XDG_CONFIG_HOME'] || path.join(home, '.config');
  return path.join(base, 'q', 'config.yml');
}

/** Expand a leading `~` the way a shell would. */
export function expandHome(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path.join('.');
      return key ? `${key}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export async function readConfig(file: string): Promise<Config> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { ...defaultConfig };
    }
    throw err;
  }

  let doc: unknown;
  try {
    doc = yaml.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid config file ${file}`, { cause: err });
  }
  if (doc === null || doc === undefined) return { ...defaultConfig };

  const parsed = configSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(
      `invalid config file ${file}: ${formatIssues(parsed.error)}`,
    );
  }
  return { ...defaultConfig, ...parsed.data };
}

export async function writeConfig(file: string, config: Config): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, yaml.stringify(config));
}

export interface BaseDirSources {
  /** `--dir` from the command line. */
  override?: string;
  env: Env;
  config: Pick<Config, 'dir'>;
  home: string;
}

/**
 * Pick the queue directory. First match wins: explicit override, `Q_DIR`,
 * the config file's `dir`, `$XDG_STATE_HOME/q`, `~/.local/state/q`.
 */
export function resolveBaseDir({
  override,
  env,
  config,
  home,
}: BaseDirSources): string {
  const explicit = override || env['Q_DIR'] || config.dir;
  if (explicit) return path.resolve(expandHome(explicit, home));

  const stateHome = env['XDG_STATE_HOME'];
  if (stateHome) return path.join(expandHome(stateHome, home), 'q');

  return path.join(home, '.local', 'state', 'q');
}
