import { Color } from './color';

export const LIGHTBAR_MODES = ['off', 'static', 'breathing', 'rainbow', 'wave', 'battery', 'custom'] as const;
export type LightbarMode = (typeof LIGHTBAR_MODES)[number];

export const EASING_NAMES = ['linear', 'ease_in', 'ease_out', 'ease_in_out', 'sine'] as const;
export type EasingName = (typeof EASING_NAMES)[number];

export interface AnimationKeyframe {
  readonly timeMs: number;
  readonly color: Color;
  readonly brightness: number; // 0-1
  readonly easing: EasingName;
}

export interface LightbarAnimation {
  readonly id: string;
  readonly name: string;
  readonly keyframes: readonly AnimationKeyframe[];
  readonly durationMs: number;
  readonly loop: boolean;
}

/** Fields of a user animation that may be replaced; absent fields are left alone. */
export interface AnimationPatch {
  name?: string;
  keyframes?: readonly AnimationKeyframe[];
  durationMs?: number;
  loop?: boolean;
}

export type MutationResult = 'ok' | 'not_found' | 'not_permitted';

export interface BreathingParams {
  readonly speedMs: number;
  readonly minBrightness: number; // 0-1
  readonly color2: Color | null;
}

export interface RainbowParams {
  readonly speedMs: number;
  readonly saturation: number; // 0-1
}

export interface WaveParams {
  readonly speedMs: number;
  readonly colors: readonly Color[];
}

export interface BatteryParams {
  readonly highColor: Color;
  readonly midColor: Color;
  readonly lowColor: Color;
  readonly highThreshold: number; // 0-100
  readonly lowThreshold: number; // 0-100
  readonly pulseWhenLow: boolean;
}

export interface CustomParams {
  readonly animationId: string | null;
}

export interface PlayerLedState {
  readonly mask: number; // bit i = LED i
  readonly brightness: number; // 0-1
}

export interface LightbarConfig {
  readonly mode: LightbarMode;
  readonly color: Color;
  readonly brightness: number; // master, 0-1
  readonly breathing: BreathingParams;
  readonly rainbow: RainbowParams;
  readonly wave: WaveParams;
  readonly battery: BatteryParams;
  readonly custom: CustomParams;
  readonly playerLeds: PlayerLedState;
}

/** One rendered output, always complete so the adapter never sees a partial update. */
export interface LightbarFrame {
  r: number;
  g: number;
  b: number;
  playerLeds: number;
  playerLedBrightness: number;
}

export interface LightbarState {
  config: LightbarConfig;
  battery: number; // 0-100
  running: boolean;
}

// Wire formats (snake_case, shared with the adapter and the web layer)

export interface ColorJSON {
  r: number;
  g: number;
  b: number;
}

export interface KeyframeJSON {
  time_ms: number;
  color: ColorJSON;
  brightness: number;
  easing: EasingName;
}

export interface AnimationJSON {
  id: string;
  name: string;
  keyframes: KeyframeJSON[];
  duration_ms: number;
  loop: boolean;
}

export interface AnimationFileJSON {
  custom_animations: AnimationJSON[];
}

export interface FrameJSON {
  r: number;
  g: number;
  b: number;
  player_leds: number;
  player_led_brightness: number;
}

export interface LightbarConfigJSON {
  mode: LightbarMode;
  color: ColorJSON;
  brightness: number;
  breathing_speed_ms: number;
  breathing_min_brightness: number;
  breathing_color2: ColorJSON | null;
  rainbow_speed_ms: number;
  rainbow_saturation: number;
  wave_speed_ms: number;
  wave_colors: ColorJSON[];
  battery_high_color: ColorJSON;
  battery_mid_color: ColorJSON;
  battery_low_color: ColorJSON;
  battery_high_threshold: number;
  battery_low_threshold: number;
  battery_pulse_when_low: boolean;
  custom_animation_id: string | null;
  player_leds: number;
  player_led_brightness: number;
}
