import { Color, PRESET_COLORS, clamp01 } from './color';
import { ValidationError } from './errors';
import {
  BatteryParams,
  BreathingParams,
  CustomParams,
  LightbarConfig,
  LightbarMode,
  PlayerLedState,
  RainbowParams,
  WaveParams,
} from './types';

export const PLAYER_LED_MASK = 0x1f;

export const DEFAULT_WAVE_COLORS: readonly Color[] = [
  PRESET_COLORS.red,
  PRESET_COLORS.orange,
  PRESET_COLORS.yellow,
  PRESET_COLORS.green,
  PRESET_COLORS.cyan,
  PRESET_COLORS.blue,
  PRESET_COLORS.purple,
];

export const DEFAULT_LIGHTBAR_CONFIG: LightbarConfig = {
  mode: 'static',
  color: new Color(0, 0, 255),
  brightness: 1,
  breathing: { speedMs: 2000, minBrightness: 0.1, color2: null },
  rainbow: { speedMs: 3000, saturation: 1 },
  wave: { speedMs: 2000, colors: DEFAULT_WAVE_COLORS },
  battery: {
    highColor: PRESET_COLORS.green,
    midColor: PRESET_COLORS.yellow,
    lowColor: PRESET_COLORS.red,
    highThreshold: 70,
    lowThreshold: 20,
    pulseWhenLow: true,
  },
  custom: { animationId: null },
  playerLeds: { mask: 0, brightness: 1 },
};

export interface LightbarConfigInit {
  mode?: LightbarMode;
  color?: Color;
  brightness?: number;
  breathing?: Partial<BreathingParams>;
  rainbow?: Partial<RainbowParams>;
  wave?: Partial<WaveParams>;
  battery?: Partial<BatteryParams>;
  custom?: Partial<CustomParams>;
  playerLeds?: Partial<PlayerLedState>;
}

function positiveSpeed(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be greater than 0`);
  }
  return value;
}

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, Math.trunc(value)));
}

/**
 * Builds a complete configuration on top of `base`, replacing only the groups and fields given.
 * Brightness values, thresholds and the player-LED mask are clamped here so renderers can trust them;
 * a cycle speed that is not a positive number throws `ValidationError`.
 */
export function createLightbarConfig(
  init: LightbarConfigInit = {},
  base: LightbarConfig = DEFAULT_LIGHTBAR_CONFIG
): LightbarConfig {
  const { breathing = {}, rainbow = {}, wave = {}, battery = {}, custom = {}, playerLeds = {} } = init;

  return {
    mode: init.mode ?? base.mode,
    color: init.color ?? base.color,
    brightness: clamp01(init.brightness ?? base.brightness),
    breathing: {
      speedMs: positiveSpeed(breathing.speedMs ?? base.breathing.speedMs, 'breathing_speed_ms'),
      minBrightness: clamp01(breathing.minBrightness ?? base.breathing.minBrightness),
      color2: breathing.color2 !== undefined ? breathing.color2 : base.breathing.color2,
    },
    rainbow: {
      speedMs: positiveSpeed(rainbow.speedMs ?? base.rainbow.speedMs, 'rainbow_speed_ms'),
      saturation: clamp01(rainbow.saturation ?? base.rainbow.saturation),
    },
    wave: {
      speedMs: positiveSpeed(wave.speedMs ?? base.wave.speedMs, 'wave_speed_ms'),
      colors: [...(wave.colors ?? base.wave.colors)],
    },
    battery: {
      highColor: battery.highColor ?? base.battery.highColor,
      midColor: battery.midColor ?? base.battery.midColor,
      lowColor: battery.lowColor ?? base.battery.lowColor,
      highThreshold: clampPercent(battery.highThreshold ?? base.battery.highThreshold),
      lowThreshold: clampPercent(battery.lowThreshold ?? base.battery.lowThreshold),
      pulseWhenLow: battery.pulseWhenLow ?? base.battery.pulseWhenLow,
    },
    custom: {
      animationId: custom.animationId !== undefined ? custom.animationId : base.custom.animationId,
    },
    playerLeds: {
      mask: Math.trunc(playerLeds.mask ?? base.playerLeds.mask) & PLAYER_LED_MASK,
      brightness: clamp01(playerLeds.brightness ?? base.playerLeds.brightness),
    },
  };
}

export function isAnimatedMode(mode: LightbarMode): boolean {
  return mode !== 'off' && mode !== 'static';
}
