import { ColorJSON } from './types';

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(255, Math.trunc(value)));
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Immutable 8-bit RGB value. Channels are truncated and clamped to 0-255 on construction.
 */
export class Color {
  static readonly BLACK = new Color(0, 0, 0);

  readonly r: number;
  readonly g: number;
  readonly b: number;

  constructor(r: number = 0, g: number = 0, b: number = 0) {
    this.r = clampChannel(r);
    this.g = clampChannel(g);
    this.b = clampChannel(b);
    Object.freeze(this);
  }

  /**
   * Parses `rrggbb` with or without a leading `#`. Anything else yields black.
   */
  static fromHex(hex: string | null | undefined): Color {
    const digits = (hex ?? '').trim().replace(/^#/, '');
    if (!/^[0-9a-fA-F]{6}$/.test(digits)) {
      return Color.BLACK;
    }
    return new Color(
      parseInt(digits.substring(0, 2), 16),
      parseInt(digits.substring(2, 4), 16),
      parseInt(digits.substring(4, 6), 16)
    );
  }

  /**
   * Channel-wise `c1 + (c2 - c1) * t`, truncated toward zero. `t` is clamped to [0, 1].
   */
  static lerp(c1: Color, c2: Color, t: number): Color {
    const k = clamp01(t);
    return new Color(
      c1.r + (c2.r - c1.r) * k,
      c1.g + (c2.g - c1.g) * k,
      c1.b + (c2.b - c1.b) * k
    );
  }

  /**
   * HSV to RGB with h, s and v in [0, 1]. Each channel is the unit result scaled by 255 and truncated.
   */
  static fromHsv(h: number, s: number, v: number): Color {
    const sat = clamp01(s);
    const val = clamp01(v);
    if (sat === 0) {
      return new Color(val * 255, val * 255, val * 255);
    }

    const hue = h - Math.floor(h);
    const i = Math.floor(hue * 6);
    const f = hue * 6 - i;
    const p = val * (1 - sat);
    const q = val * (1 - sat * f);
    const t = val * (1 - sat * (1 - f));

    let rgb: [number, number, number];
    switch (i % 6) {
      case 0: rgb = [val, t, p]; break;
      case 1: rgb = [q, val, p]; break;
      case 2: rgb = [p, val, t]; break;
      case 3: rgb = [p, q, val]; break;
      case 4: rgb = [t, p, val]; break;
      default: rgb = [val, p, q]; break;
    }

    return new Color(rgb[0] * 255, rgb[1] * 255, rgb[2] * 255);
  }

  toHex(): string {
    const hex = (n: number) => n.toString(16).padStart(2, '0');
    return `#${hex(this.r)}${hex(this.g)}${hex(this.b)}`;
  }

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  toJSON(): ColorJSON {
    return { r: this.r, g: this.g, b: this.b };
  }
}

export const PRESET_COLORS = {
  red: new Color(255, 0, 0),
  green: new Color(0, 255, 0),
  blue: new Color(0, 0, 255),
  cyan: new Color(0, 255, 255),
  magenta: new Color(255, 0, 255),
  yellow: new Color(255, 255, 0),
  orange: new Color(255, 128, 0),
  purple: new Color(128, 0, 255),
  pink: new Color(255, 105, 180),
  white: new Color(255, 255, 255),
  ps_blue: new Color(0, 48, 135),
  ps_light: new Color(0, 195, 227),
} as const;

export type PresetColorName = keyof typeof PRESET_COLORS;

export function isPresetColorName(name: string): name is PresetColorName {
  return Object.prototype.hasOwnProperty.call(PRESET_COLORS, name);
}
