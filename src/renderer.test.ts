import { BUILTIN_ANIMATIONS } from './animations';
import { Color } from './color';
import { LightbarConfigInit, createLightbarConfig } from './config';
import { animationTime, batteryColor, findKeyframeSegment, renderFrame } from './renderer';
import { AnimationKeyframe, EasingName, LightbarAnimation } from './types';

const RED = new Color(255, 0, 0);
const BLUE = new Color(0, 0, 255);
const WHITE = new Color(255, 255, 255);

function kf(timeMs: number, color: Color, brightness: number = 1, easing: EasingName = 'linear'): AnimationKeyframe {
  return { timeMs, color, brightness, easing };
}

function rgb(init: LightbarConfigInit, elapsedMs: number, battery: number = 100, animations: LightbarAnimation[] = []) {
  const byId = new Map([...BUILTIN_ANIMATIONS.values(), ...animations].map((a) => [a.id, a]));
  const frame = renderFrame(createLightbarConfig(init), {
    elapsedMs,
    battery,
    resolveAnimation: (id) => byId.get(id),
  });
  return { r: frame.r, g: frame.g, b: frame.b };
}

describe('renderFrame', () => {
  describe('off', () => {
    it('should output black with player LEDs off', () => {
      const frame = renderFrame(createLightbarConfig({ mode: 'off', playerLeds: { mask: 0b101 } }), {
        elapsedMs: 0,
        battery: 100,
        resolveAnimation: () => undefined,
      });
      expect(frame).toEqual({ r: 0, g: 0, b: 0, playerLeds: 0, playerLedBrightness: 1 });
    });
  });

  describe('static', () => {
    it('should scale the base color by master brightness with truncation', () => {
      expect(rgb({ mode: 'static', color: RED, brightness: 0.5 }, 0)).toEqual({ r: 127, g: 0, b: 0 });
    });

    it('should carry player LED state in every frame', () => {
      const frame = renderFrame(
        createLightbarConfig({ mode: 'static', playerLeds: { mask: 0b10101, brightness: 0.5 } }),
        { elapsedMs: 0, battery: 100, resolveAnimation: () => undefined }
      );
      expect(frame.playerLeds).toBe(0b10101);
      expect(frame.playerLedBrightness).toBe(0.5);
    });
  });

  describe('breathing', () => {
    const base: LightbarConfigInit = {
      mode: 'breathing',
      color: new Color(200, 100, 0),
      breathing: { speedMs: 2000, minBrightness: 0.2 },
    };

    it('should sit at minimum brightness at the start of the cycle', () => {
      expect(rgb(base, 0)).toEqual({ r: 40, g: 20, b: 0 });
    });

    it('should peak at half the cycle', () => {
      expect(rgb(base, 1000)).toEqual({ r: 200, g: 100, b: 0 });
    });

    it('should return to minimum after a full cycle', () => {
      expect(rgb(base, 2000)).toEqual(rgb(base, 0));
    });

    it('should apply master brightness', () => {
      expect(rgb({ ...base, brightness: 0.5 }, 1000)).toEqual({ r: 100, g: 50, b: 0 });
    });

    it('should crossfade to the second color', () => {
      const withSecond = { ...base, breathing: { ...base.breathing, color2: new Color(0, 0, 200) } };
      expect(rgb(withSecond, 1000)).toEqual({ r: 0, g: 0, b: 200 });
      expect(rgb(withSecond, 0)).toEqual({ r: 40, g: 20, b: 0 });
    });
  });

  describe('rainbow', () => {
    const base: LightbarConfigInit = { mode: 'rainbow', rainbow: { speedMs: 3000, saturation: 1 } };

    it('should start at red', () => {
      expect(rgb(base, 0)).toEqual({ r: 255, g: 0, b: 0 });
    });

    it('should be continuous across the cycle boundary', () => {
      expect(rgb(base, 3000)).toEqual(rgb(base, 0));
      expect(rgb(base, 6000)).toEqual(rgb(base, 0));
    });

    it('should reach cyan at half the cycle', () => {
      expect(rgb(base, 1500)).toEqual({ r: 0, g: 255, b: 255 });
    });

    it('should use master brightness as the HSV value', () => {
      expect(rgb({ ...base, brightness: 0.5, rainbow: { saturation: 0 } }, 0)).toEqual({ r: 127, g: 127, b: 127 });
    });
  });

  describe('wave', () => {
    const base: LightbarConfigInit = { mode: 'wave', wave: { speedMs: 1000, colors: [RED, BLUE] } };

    it('should hold each color at its segment start', () => {
      expect(rgb(base, 0)).toEqual({ r: 255, g: 0, b: 0 });
      expect(rgb(base, 500)).toEqual({ r: 0, g: 0, b: 255 });
    });

    it('should interpolate within a segment', () => {
      // pos = 0.25 * 2 = 0.5 -> halfway red to blue
      expect(rgb(base, 250)).toEqual({ r: 127, g: 0, b: 127 });
    });

    it('should wrap from the last color back to the first', () => {
      // pos = 1.5 -> halfway blue to red
      expect(rgb(base, 750)).toEqual({ r: 127, g: 0, b: 127 });
    });

    it('should output black for an empty color list', () => {
      expect(rgb({ mode: 'wave', wave: { colors: [] } }, 123)).toEqual({ r: 0, g: 0, b: 0 });
    });
  });

  describe('battery', () => {
    const base: LightbarConfigInit = { mode: 'battery', battery: { pulseWhenLow: false } };

    it('should use the high color at or above the high threshold', () => {
      expect(rgb(base, 0, 80)).toEqual({ r: 0, g: 255, b: 0 });
      expect(rgb(base, 0, 70)).toEqual({ r: 0, g: 255, b: 0 });
    });

    it('should blend mid to high between thresholds', () => {
      // t = (45 - 20) / (70 - 20) = 0.5, yellow -> green
      expect(rgb(base, 0, 45)).toEqual({ r: 127, g: 255, b: 0 });
    });

    it('should blend low to mid below the low threshold', () => {
      // t = 10 / 20 = 0.5, red -> yellow
      expect(rgb(base, 0, 10)).toEqual({ r: 255, g: 127, b: 0 });
    });

    it('should pulse when low', () => {
      // sin(0) = 0 -> pulse 0.5 -> brightness 0.65
      expect(rgb({ mode: 'battery' }, 0, 10)).toEqual({ r: 165, g: 82, b: 0 });
    });

    it('should be continuous at the thresholds', () => {
      const config = createLightbarConfig(base);
      expect(batteryColor(config, 20).equals(config.battery.midColor)).toBe(true);
      expect(batteryColor(config, 70).equals(config.battery.highColor)).toBe(true);

      const belowHigh = batteryColor(config, 69);
      expect(Math.abs(belowHigh.r - 0)).toBeLessThanOrEqual(6);
      expect(belowHigh.g).toBe(255);

      const belowLow = batteryColor(config, 19);
      expect(belowLow.toJSON()).toEqual({ r: 255, g: 242, b: 0 });
    });

    it('should not divide by zero with a low threshold of 0', () => {
      const config = createLightbarConfig({ mode: 'battery', battery: { lowThreshold: 0, highThreshold: 50 } });
      expect(batteryColor(config, 0).equals(config.battery.midColor)).toBe(true);
    });
  });

  describe('custom', () => {
    it('should interpolate between keyframes', () => {
      const animation: LightbarAnimation = {
        id: 'test',
        name: 'test',
        keyframes: [kf(0, Color.BLACK), kf(100, WHITE)],
        durationMs: 100,
        loop: false,
      };
      expect(rgb({ mode: 'custom', custom: { animationId: 'test' } }, 50, 100, [animation])).toEqual({
        r: 127,
        g: 127,
        b: 127,
      });
    });

    it('should apply the easing of the earlier keyframe', () => {
      const animation: LightbarAnimation = {
        id: 'eased',
        name: 'eased',
        keyframes: [kf(0, Color.BLACK, 1, 'ease_in'), kf(100, WHITE)],
        durationMs: 100,
        loop: false,
      };
      // ease_in(0.5) = 0.25 -> 63.75
      expect(rgb({ mode: 'custom', custom: { animationId: 'eased' } }, 50, 100, [animation]).r).toBe(63);
    });

    it('should blend keyframe brightness', () => {
      // police: red at 1.0 -> red at 0.0 over 100ms
      expect(rgb({ mode: 'custom', custom: { animationId: 'police' } }, 50)).toEqual({ r: 127, g: 0, b: 0 });
    });

    it('should wrap from the last keyframe to the first when looping', () => {
      const animation: LightbarAnimation = {
        id: 'wrap',
        name: 'wrap',
        keyframes: [kf(0, RED), kf(400, BLUE)],
        durationMs: 500,
        loop: true,
      };
      const segment = findKeyframeSegment(animation, 450);
      expect(segment?.segmentMs).toBe(100);
      expect(segment?.progress).toBe(0.5);
      expect(segment?.prev.timeMs).toBe(400);
      expect(segment?.next.timeMs).toBe(0);

      const init: LightbarConfigInit = { mode: 'custom', custom: { animationId: 'wrap' } };
      expect(rgb(init, 450, 100, [animation])).toEqual({ r: 127, g: 0, b: 127 });
      expect(rgb(init, 950, 100, [animation])).toEqual({ r: 127, g: 0, b: 127 });
    });

    it('should hold the last keyframe after a non-looping animation ends', () => {
      const animation: LightbarAnimation = {
        id: 'once',
        name: 'once',
        keyframes: [kf(0, Color.BLACK), kf(100, WHITE)],
        durationMs: 100,
        loop: false,
      };
      expect(animationTime(animation, 1000)).toBe(100);
      expect(rgb({ mode: 'custom', custom: { animationId: 'once' } }, 1000, 100, [animation])).toEqual({
        r: 255,
        g: 255,
        b: 255,
      });
    });

    it('should show a single keyframe without interpolating', () => {
      const animation: LightbarAnimation = {
        id: 'solid',
        name: 'solid',
        keyframes: [kf(0, new Color(10, 20, 30))],
        durationMs: 100,
        loop: true,
      };
      expect(rgb({ mode: 'custom', custom: { animationId: 'solid' } }, 42, 100, [animation])).toEqual({
        r: 10,
        g: 20,
        b: 30,
      });
    });

    it('should output black for an unknown animation', () => {
      expect(rgb({ mode: 'custom', custom: { animationId: 'missing' } }, 10)).toEqual({ r: 0, g: 0, b: 0 });
      expect(rgb({ mode: 'custom', custom: { animationId: null } }, 10)).toEqual({ r: 0, g: 0, b: 0 });
    });
  });
});
