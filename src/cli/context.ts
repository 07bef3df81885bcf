import os from 'node:os';
import { InvalidArgumentError } from 'commander';
import {
  configPath,
  readConfig,
  resolveBaseDir,
  type Config,
} from '../config.js';
import { QueueStore } from '../queue/store.js';

export interface GlobalOpts {
  dir?: string;
  json?: boolean;
}

export interface CliContext {
  config: Config;
  configFile: string;
  store: QueueStore;
}

/** Load configuration and open the store once per invocation. */
export async function loadContext(opts: GlobalOpts): Promise<CliContext> {
  const home = os.homedir();
  const configFile = configPath(process.env, home);
  const config = await readConfig(configFile);
  const baseDir = resolveBaseDir({
    override: opts.dir,
    env: process.env,
    config,
    home,
  });
  return { config, configFile, store: new QueueStore(baseDir) };
}

/** Option parser for `--poll`. */
export function parsePollSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Use a positive number of seconds.');
  }
  return seconds;
}
