import { readConfig, writeConfig, type Config } from '../../config.js';

export const CONFIG_KEYS = ['dir', 'poll_interval', 'hook_exit2'] as const;

type ConfigKey = (typeof CONFIG_KEYS)[number];

function isValidKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

function requireKey(key: string): ConfigKey {
  if (!isValidKey(key)) {
    throw new Error(
      `Unknown config key "${key}". Valid keys: ${CONFIG_KEYS.join(', ')}`,
    );
  }
  return key;
}

function parseBoolean(value: string): boolean {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new Error(`Invalid boolean "${value}". Use true or false`);
}

export async function runConfigGet(
  file: string,
  key: string,
): Promise<Config[ConfigKey]> {
  const config = await readConfig(file);
  return config[requireKey(key)];
}

export async function runConfigSet(
  file: string,
  key: string,
  value: string,
): Promise<void> {
  const k = requireKey(key);
  const config = await readConfig(file);

  if (k === 'dir') {
    if (!value.trim()) throw new Error('dir must not be empty');
    config.dir = value;
  } else if (k === 'poll_interval') {
    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new Error(`Invalid poll_interval "${value}". Use a positive number`);
    }
    config.poll_interval = seconds;
  } else {
    config.hook_exit2 = parseBoolean(value);
  }

  await writeConfig(file, config);
}
