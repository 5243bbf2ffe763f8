import { Color, clamp01 } from './color';
import { applyEasing } from './easing';
import { AnimationKeyframe, LightbarAnimation, LightbarConfig, LightbarFrame, LightbarMode } from './types';

export interface RenderContext {
  elapsedMs: number;
  battery: number; // 0-100
  resolveAnimation: (id: string) => LightbarAnimation | undefined;
}

/** Color and the brightness it should be scaled by, before channels are truncated. */
interface ModeOutput {
  color: Color;
  brightness: number;
  /** Applied after `brightness` when a mode scales by master brightness separately. */
  master?: number;
}

type ModeRenderer = (config: LightbarConfig, ctx: RenderContext) => ModeOutput;

const DARK: ModeOutput = { color: Color.BLACK, brightness: 0 };

function cyclePosition(elapsedMs: number, periodMs: number): number {
  return (elapsedMs % periodMs) / periodMs;
}

function renderBreathing(config: LightbarConfig, ctx: RenderContext): ModeOutput {
  const { speedMs, minBrightness, color2 } = config.breathing;
  const phase = cyclePosition(ctx.elapsedMs, speedMs);
  // 0 at phase 0, 1 at phase 0.5, back to 0 at the end of the cycle
  const breath = (Math.sin(phase * Math.PI * 2 - Math.PI / 2) + 1) / 2;
  const breathBrightness = minBrightness + (1 - minBrightness) * breath;

  return {
    color: color2 ? Color.lerp(config.color, color2, breath) : config.color,
    brightness: breathBrightness,
    master: config.brightness,
  };
}

function renderRainbow(config: LightbarConfig, ctx: RenderContext): ModeOutput {
  const hue = cyclePosition(ctx.elapsedMs, config.rainbow.speedMs);
  // Master brightness is the HSV value, so the color already carries it.
  return { color: Color.fromHsv(hue, config.rainbow.saturation, config.brightness), brightness: 1 };
}

function renderWave(config: LightbarConfig, ctx: RenderContext): ModeOutput {
  const { colors, speedMs } = config.wave;
  const count = colors.length;
  if (count === 0) {
    return DARK;
  }

  const pos = cyclePosition(ctx.elapsedMs, speedMs) * count;
  const index = Math.floor(pos) % count;
  const next = (index + 1) % count;
  const t = pos - Math.floor(pos);

  return { color: Color.lerp(colors[index], colors[next], t), brightness: config.brightness };
}

/**
 * Gradient low → mid below the low threshold, mid → high between the thresholds, solid high above.
 */
export function batteryColor(config: LightbarConfig, level: number): Color {
  const { highColor, midColor, lowColor, highThreshold: hi, lowThreshold: lo } = config.battery;

  if (level >= hi) {
    return highColor;
  }
  if (level >= lo) {
    return Color.lerp(midColor, highColor, (level - lo) / (hi - lo));
  }
  const t = lo === 0 ? 1 : level / lo;
  return Color.lerp(lowColor, midColor, t);
}

function renderBattery(config: LightbarConfig, ctx: RenderContext): ModeOutput {
  const level = ctx.battery;
  let brightness = config.brightness;

  if (level < config.battery.lowThreshold && config.battery.pulseWhenLow) {
    const pulse = (Math.sin(ctx.elapsedMs / 200) + 1) / 2;
    brightness *= 0.3 + 0.7 * pulse;
  }

  return { color: batteryColor(config, level), brightness };
}

export interface KeyframeSegment {
  prev: AnimationKeyframe;
  next: AnimationKeyframe;
  /** Time since `prev` divided by the segment length, before easing. */
  progress: number;
  /** Length of the segment; wraps through the end of the loop when `next` comes first. */
  segmentMs: number;
}

/**
 * Finds the keyframes surrounding `animTime`. Keyframes are taken in playback (insertion) order.
 */
export function findKeyframeSegment(animation: LightbarAnimation, animTime: number): KeyframeSegment | undefined {
  const { keyframes, loop, durationMs } = animation;
  if (keyframes.length === 0) {
    return undefined;
  }

  let prev = keyframes[0];
  let next = keyframes[keyframes.length - 1];
  keyframes.forEach((kf, i) => {
    if (kf.timeMs <= animTime) {
      prev = kf;
      if (i + 1 < keyframes.length) {
        next = keyframes[i + 1];
      } else {
        next = loop ? keyframes[0] : kf;
      }
    }
  });

  if (prev.timeMs === next.timeMs) {
    return { prev, next, progress: 0, segmentMs: 0 };
  }

  let segmentMs = next.timeMs - prev.timeMs;
  if (segmentMs < 0) {
    segmentMs += durationMs;
  }
  const progress = segmentMs > 0 ? (animTime - prev.timeMs) / segmentMs : 0;
  return { prev, next, progress, segmentMs };
}

export function animationTime(animation: LightbarAnimation, elapsedMs: number): number {
  return animation.loop ? elapsedMs % animation.durationMs : Math.min(elapsedMs, animation.durationMs);
}

function renderCustom(config: LightbarConfig, ctx: RenderContext): ModeOutput {
  const id = config.custom.animationId;
  const animation = id ? ctx.resolveAnimation(id) : undefined;
  if (!animation) {
    return DARK;
  }

  const segment = findKeyframeSegment(animation, animationTime(animation, ctx.elapsedMs));
  if (!segment) {
    return DARK;
  }

  const { prev, next } = segment;
  const t = segment.segmentMs > 0 ? applyEasing(prev.easing, segment.progress) : 0;
  const brightness = prev.brightness + (next.brightness - prev.brightness) * t;

  return { color: Color.lerp(prev.color, next.color, t), brightness: brightness * config.brightness };
}

const MODE_RENDERERS: Record<LightbarMode, ModeRenderer> = {
  off: () => DARK,
  static: (config) => ({ color: config.color, brightness: config.brightness }),
  breathing: renderBreathing,
  rainbow: renderRainbow,
  wave: renderWave,
  battery: renderBattery,
  custom: renderCustom,
};

function toChannel(value: number, brightness: number, master: number): number {
  const scaled = Math.trunc(value * brightness * master);
  return Number.isFinite(scaled) ? Math.max(0, Math.min(255, scaled)) : 0;
}

/**
 * Computes the frame for `config` at `ctx.elapsedMs`. Pure; the same inputs always give the same frame.
 */
export function renderFrame(config: LightbarConfig, ctx: RenderContext): LightbarFrame {
  const { color, brightness, master = 1 } = MODE_RENDERERS[config.mode](config, ctx);
  const level = clamp01(brightness);
  const scale = clamp01(master);

  return {
    r: toChannel(color.r, level, scale),
    g: toChannel(color.g, level, scale),
    b: toChannel(color.b, level, scale),
    playerLeds: config.mode === 'off' ? 0 : config.playerLeds.mask,
    playerLedBrightness: config.playerLeds.brightness,
  };
}
