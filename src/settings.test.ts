import * as path from 'path';
import { vi } from 'vitest';
import { loadSettings } from './settings';

describe('loadSettings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use defaults for an empty environment', () => {
    const settings = loadSettings({});
    const dataDir = path.resolve('./data');

    expect(settings).toEqual({
      dataDir,
      animationsFile: path.join(dataDir, 'lightbar_animations.json'),
      ipcPath: path.join(dataDir, 'lightbar_state.json'),
      tickIntervalMs: 16,
      initialConfig: undefined,
    });
  });

  it('should read paths and tick interval', () => {
    const settings = loadSettings({
      LIGHTBAR_DATA_DIR: '/var/lib/lightbar',
      LIGHTBAR_IPC_PATH: '/run/lightbar/state.json',
      LIGHTBAR_TICK_MS: '33',
    });

    expect(settings.animationsFile).toBe(path.resolve('/var/lib/lightbar/lightbar_animations.json'));
    expect(settings.ipcPath).toBe(path.resolve('/run/lightbar/state.json'));
    expect(settings.tickIntervalMs).toBe(33);
  });

  it('should reject a bad tick interval', () => {
    expect(() => loadSettings({ LIGHTBAR_TICK_MS: 'fast' })).toThrow('Invalid LIGHTBAR_TICK_MS');
    expect(() => loadSettings({ LIGHTBAR_TICK_MS: '0' })).toThrow('Invalid LIGHTBAR_TICK_MS');
  });

  it('should parse the initial config', () => {
    const settings = loadSettings({ LIGHTBAR_INITIAL_CONFIG: '{"mode":"rainbow","brightness":0.4}' });

    expect(settings.initialConfig?.mode).toBe('rainbow');
    expect(settings.initialConfig?.brightness).toBe(0.4);
  });

  it('should reject an invalid initial config', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => loadSettings({ LIGHTBAR_INITIAL_CONFIG: '{not json' })).toThrow('Invalid LIGHTBAR_INITIAL_CONFIG');
    expect(() => loadSettings({ LIGHTBAR_INITIAL_CONFIG: '{"mode":"disco"}' })).toThrow(
      'Invalid LIGHTBAR_INITIAL_CONFIG'
    );
  });

  it('should configure MQTT only when a broker is set', () => {
    expect(loadSettings({ MQTT_USERNAME: 'user' }).mqtt).toBeUndefined();

    expect(loadSettings({ MQTT_BROKER_URL: 'mqtt://broker:1883', MQTT_PASSWORD: 'test-secret' }).mqtt).toEqual({
      brokerUrl: 'mqtt://broker:1883',
      username: undefined,
      password: 'test-secret',
      baseTopic: 'lightbar',
    });
  });
});
