import * as path from 'path';
import { parseLightbarConfig } from './encoding';
import { DEFAULT_TICK_INTERVAL_MS } from './engine';
import { LightbarConfig } from './types';

export const ANIMATIONS_FILE_NAME = 'lightbar_animations.json';
export const IPC_FILE_NAME = 'lightbar_state.json';

export interface Settings {
  dataDir: string;
  animationsFile: string;
  ipcPath: string;
  tickIntervalMs: number;
  initialConfig?: LightbarConfig;
  mqtt?: {
    brokerUrl: string;
    username?: string;
    password?: string;
    baseTopic: string;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Reads settings from the environment (after dotenv has filled it in).
 * Throws when a variable is present but unusable.
 */
export function loadSettings(env: Env = process.env): Settings {
  const dataDir = path.resolve(env.LIGHTBAR_DATA_DIR || './data');

  const tickRaw = env.LIGHTBAR_TICK_MS;
  const tickIntervalMs = tickRaw ? Number(tickRaw) : DEFAULT_TICK_INTERVAL_MS;
  if (!Number.isInteger(tickIntervalMs) || tickIntervalMs <= 0) {
    throw new Error(`Invalid LIGHTBAR_TICK_MS: ${tickRaw}. Must be a positive integer.`);
  }

  let initialConfig: LightbarConfig | undefined;
  if (env.LIGHTBAR_INITIAL_CONFIG) {
    try {
      initialConfig = parseLightbarConfig(JSON.parse(env.LIGHTBAR_INITIAL_CONFIG));
    } catch (error) {
      console.error('[Config] Failed to parse LIGHTBAR_INITIAL_CONFIG:', error);
      throw new Error('Invalid LIGHTBAR_INITIAL_CONFIG. Must be a valid lightbar config JSON object.');
    }
  }

  const settings: Settings = {
    dataDir,
    animationsFile: path.join(dataDir, ANIMATIONS_FILE_NAME),
    ipcPath: env.LIGHTBAR_IPC_PATH ? path.resolve(env.LIGHTBAR_IPC_PATH) : path.join(dataDir, IPC_FILE_NAME),
    tickIntervalMs,
    initialConfig,
  };

  if (env.MQTT_BROKER_URL) {
    settings.mqtt = {
      brokerUrl: env.MQTT_BROKER_URL,
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      baseTopic: env.MQTT_BASE_TOPIC || 'lightbar',
    };
  }

  return settings;
}
