/**
 * Wire encoding/decoding for the lightbar subsystem.
 * Configurations and animations travel as snake_case JSON; frames go to the adapter as `FrameJSON`.
 */

import { Color, clamp01 } from './color';
import { DEFAULT_LIGHTBAR_CONFIG, LightbarConfigInit, createLightbarConfig } from './config';
import { isEasingName } from './easing';
import { ValidationError } from './errors';
import {
  AnimationJSON,
  AnimationKeyframe,
  FrameJSON,
  KeyframeJSON,
  LIGHTBAR_MODES,
  LightbarAnimation,
  LightbarConfig,
  LightbarConfigJSON,
  LightbarFrame,
  LightbarMode,
} from './types';

type JSONObject = Record<string, unknown>;

function isObject(value: unknown): value is JSONObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLightbarMode(value: unknown): value is LightbarMode {
  return LIGHTBAR_MODES.some((mode) => mode === value);
}

function optionalNumber(data: JSONObject, key: string): number | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number`);
  }
  return value;
}

function optionalPositive(data: JSONObject, key: string): number | undefined {
  const value = optionalNumber(data, key);
  if (value !== undefined && value <= 0) {
    throw new ValidationError(`${key} must be greater than 0`);
  }
  return value;
}

function optionalBoolean(data: JSONObject, key: string): boolean | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${key} must be a boolean`);
  }
  return value;
}

/**
 * Accepts `{r, g, b}` (missing channels are 0) or a hex string. Invalid hex yields black.
 */
export function parseColor(value: unknown, field: string = 'color'): Color {
  if (typeof value === 'string') {
    return Color.fromHex(value);
  }
  if (!isObject(value)) {
    throw new ValidationError(`${field} must be an {r, g, b} object or a hex string`);
  }
  const data = value;
  const channel = (key: 'r' | 'g' | 'b'): number => {
    const n = data[key];
    if (n === undefined) {
      return 0;
    }
    if (typeof n !== 'number') {
      throw new ValidationError(`${field}.${key} must be a number`);
    }
    return n;
  };
  return new Color(channel('r'), channel('g'), channel('b'));
}

function optionalColor(data: JSONObject, key: string): Color | undefined {
  const value = data[key];
  return value === undefined || value === null ? undefined : parseColor(value, key);
}

/**
 * Builds a configuration from its flat wire form. Absent fields take the defaults.
 */
export function parseLightbarConfig(input: unknown): LightbarConfig {
  if (!isObject(input)) {
    throw new ValidationError('Lightbar config must be a JSON object');
  }

  const mode = input.mode ?? DEFAULT_LIGHTBAR_CONFIG.mode;
  if (!isLightbarMode(mode)) {
    throw new ValidationError(`Unknown lightbar mode: ${String(mode)}`);
  }

  let waveColors: Color[] | undefined;
  if (input.wave_colors !== undefined && input.wave_colors !== null) {
    if (!Array.isArray(input.wave_colors)) {
      throw new ValidationError('wave_colors must be an array');
    }
    waveColors = input.wave_colors.map((c, i) => parseColor(c, `wave_colors[${i}]`));
    if (waveColors.length === 0) {
      if (mode === 'wave') {
        throw new ValidationError('Wave mode requires at least one color');
      }
      waveColors = undefined;
    }
  }

  let customId: string | null = null;
  if (typeof input.custom_animation_id === 'string') {
    customId = input.custom_animation_id;
  } else if (input.custom_animation_id !== undefined && input.custom_animation_id !== null) {
    throw new ValidationError('custom_animation_id must be a string');
  }
  if (mode === 'custom' && !customId) {
    throw new ValidationError('Custom mode requires custom_animation_id');
  }

  const init: LightbarConfigInit = {
    mode,
    color: optionalColor(input, 'color'),
    brightness: optionalNumber(input, 'brightness'),
    breathing: {
      speedMs: optionalPositive(input, 'breathing_speed_ms'),
      minBrightness: optionalNumber(input, 'breathing_min_brightness'),
      color2: optionalColor(input, 'breathing_color2') ?? null,
    },
    rainbow: {
      speedMs: optionalPositive(input, 'rainbow_speed_ms'),
      saturation: optionalNumber(input, 'rainbow_saturation'),
    },
    wave: {
      speedMs: optionalPositive(input, 'wave_speed_ms'),
      colors: waveColors,
    },
    battery: {
      highColor: optionalColor(input, 'battery_high_color'),
      midColor: optionalColor(input, 'battery_mid_color'),
      lowColor: optionalColor(input, 'battery_low_color'),
      highThreshold: optionalNumber(input, 'battery_high_threshold'),
      lowThreshold: optionalNumber(input, 'battery_low_threshold'),
      pulseWhenLow: optionalBoolean(input, 'battery_pulse_when_low'),
    },
    custom: { animationId: customId },
    playerLeds: {
      mask: optionalNumber(input, 'player_leds'),
      brightness: optionalNumber(input, 'player_led_brightness'),
    },
  };

  const config = createLightbarConfig(init);
  if (config.battery.lowThreshold > config.battery.highThreshold) {
    throw new ValidationError('battery_low_threshold must not exceed battery_high_threshold');
  }
  return config;
}

export function lightbarConfigToJSON(config: LightbarConfig): LightbarConfigJSON {
  return {
    mode: config.mode,
    color: config.color.toJSON(),
    brightness: config.brightness,
    breathing_speed_ms: config.breathing.speedMs,
    breathing_min_brightness: config.breathing.minBrightness,
    breathing_color2: config.breathing.color2 ? config.breathing.color2.toJSON() : null,
    rainbow_speed_ms: config.rainbow.speedMs,
    rainbow_saturation: config.rainbow.saturation,
    wave_speed_ms: config.wave.speedMs,
    wave_colors: config.wave.colors.map((c) => c.toJSON()),
    battery_high_color: config.battery.highColor.toJSON(),
    battery_mid_color: config.battery.midColor.toJSON(),
    battery_low_color: config.battery.lowColor.toJSON(),
    battery_high_threshold: config.battery.highThreshold,
    battery_low_threshold: config.battery.lowThreshold,
    battery_pulse_when_low: config.battery.pulseWhenLow,
    custom_animation_id: config.custom.animationId,
    player_leds: config.playerLeds.mask,
    player_led_brightness: config.playerLeds.brightness,
  };
}

/**
 * Brings a keyframe into range: `timeMs` must be a finite, non-negative number and is truncated;
 * brightness is clamped to [0, 1].
 */
export function normalizeKeyframe(keyframe: AnimationKeyframe, index: number = 0): AnimationKeyframe {
  if (!Number.isFinite(keyframe.timeMs) || keyframe.timeMs < 0) {
    throw new ValidationError(`keyframes[${index}].time_ms must not be negative`);
  }
  return {
    timeMs: Math.trunc(keyframe.timeMs),
    color: keyframe.color,
    brightness: clamp01(keyframe.brightness),
    easing: keyframe.easing,
  };
}

/** Whole milliseconds, at least 1. */
export function normalizeDuration(durationMs: number): number {
  const value = Number.isFinite(durationMs) ? Math.trunc(durationMs) : 0;
  if (value < 1) {
    throw new ValidationError('duration_ms must be at least 1');
  }
  return value;
}

export function parseKeyframe(value: unknown, index: number = 0): AnimationKeyframe {
  if (!isObject(value)) {
    throw new ValidationError(`keyframes[${index}] must be an object`);
  }
  const easing = value.easing ?? 'linear';
  if (!isEasingName(easing)) {
    throw new ValidationError(`keyframes[${index}].easing is not a known easing: ${String(easing)}`);
  }
  return normalizeKeyframe(
    {
      timeMs: optionalNumber(value, 'time_ms') ?? 0,
      color: value.color === undefined ? Color.BLACK : parseColor(value.color, `keyframes[${index}].color`),
      brightness: optionalNumber(value, 'brightness') ?? 1,
      easing,
    },
    index
  );
}

export function parseKeyframes(value: unknown): AnimationKeyframe[] {
  if (!Array.isArray(value)) {
    throw new ValidationError('keyframes must be an array');
  }
  if (value.length === 0) {
    throw new ValidationError('An animation needs at least one keyframe');
  }
  return value.map((k, i) => parseKeyframe(k, i));
}

export function keyframeToJSON(keyframe: AnimationKeyframe): KeyframeJSON {
  return {
    time_ms: keyframe.timeMs,
    color: keyframe.color.toJSON(),
    brightness: keyframe.brightness,
    easing: keyframe.easing,
  };
}

export function animationToJSON(animation: LightbarAnimation): AnimationJSON {
  return {
    id: animation.id,
    name: animation.name,
    keyframes: animation.keyframes.map(keyframeToJSON),
    duration_ms: animation.durationMs,
    loop: animation.loop,
  };
}

export function animationFromJSON(value: unknown): LightbarAnimation {
  if (!isObject(value)) {
    throw new ValidationError('Animation must be an object');
  }
  if (typeof value.id !== 'string' || value.id === '') {
    throw new ValidationError('Animation id must be a non-empty string');
  }
  const name = value.name ?? '';
  if (typeof name !== 'string') {
    throw new ValidationError('Animation name must be a string');
  }
  return {
    id: value.id,
    name,
    keyframes: parseKeyframes(value.keyframes),
    durationMs: normalizeDuration(optionalNumber(value, 'duration_ms') ?? 1000),
    loop: optionalBoolean(value, 'loop') ?? true,
  };
}

export function encodeFrame(frame: LightbarFrame): FrameJSON {
  return {
    r: frame.r,
    g: frame.g,
    b: frame.b,
    player_leds: frame.playerLeds,
    player_led_brightness: frame.playerLedBrightness,
  };
}
