import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Color } from './color';
import { animationFromJSON, animationToJSON, normalizeDuration, normalizeKeyframe } from './encoding';
import { ValidationError, describeError } from './errors';
import {
  AnimationFileJSON,
  AnimationKeyframe,
  AnimationPatch,
  EasingName,
  LightbarAnimation,
  MutationResult,
} from './types';

function keyframe(timeMs: number, color: Color, brightness: number, easing: EasingName = 'linear'): AnimationKeyframe {
  return Object.freeze({ timeMs, color, brightness, easing });
}

function builtin(animation: LightbarAnimation): LightbarAnimation {
  return Object.freeze({ ...animation, keyframes: Object.freeze([...animation.keyframes]) });
}

const WHITE = new Color(255, 255, 255);
const RED = new Color(255, 0, 0);
const BLUE = new Color(0, 0, 255);

/**
 * Read-only animations shipped with the engine. Looked up before user animations.
 */
export const BUILTIN_ANIMATIONS: ReadonlyMap<string, LightbarAnimation> = new Map(
  [
    builtin({
      id: 'pulse_slow',
      name: 'Slow Pulse',
      keyframes: [
        keyframe(0, WHITE, 1.0, 'ease_in_out'),
        keyframe(1500, WHITE, 0.2, 'ease_in_out'),
        keyframe(3000, WHITE, 1.0, 'ease_in_out'),
      ],
      durationMs: 3000,
      loop: true,
    }),
    builtin({
      id: 'pulse_fast',
      name: 'Fast Pulse',
      keyframes: [
        keyframe(0, WHITE, 1.0),
        keyframe(250, WHITE, 0.2),
        keyframe(500, WHITE, 1.0),
      ],
      durationMs: 500,
      loop: true,
    }),
    builtin({
      id: 'police',
      name: 'Police Lights',
      keyframes: [
        keyframe(0, RED, 1.0),
        keyframe(100, RED, 0.0),
        keyframe(200, BLUE, 1.0),
        keyframe(300, BLUE, 0.0),
        keyframe(400, RED, 1.0),
      ],
      durationMs: 400,
      loop: true,
    }),
    builtin({
      id: 'fire',
      name: 'Fire Flicker',
      keyframes: [
        keyframe(0, new Color(255, 50, 0), 1.0, 'ease_out'),
        keyframe(100, new Color(255, 100, 0), 0.8, 'ease_in'),
        keyframe(200, new Color(255, 30, 0), 0.9, 'ease_out'),
        keyframe(350, new Color(255, 80, 0), 0.7, 'ease_in'),
        keyframe(500, new Color(255, 50, 0), 1.0),
      ],
      durationMs: 500,
      loop: true,
    }),
  ].map((animation): [string, LightbarAnimation] => [animation.id, animation])
);

export function isBuiltinAnimation(id: string): boolean {
  return BUILTIN_ANIMATIONS.has(id);
}

function generateAnimationId(): string {
  return randomBytes(4).toString('hex');
}

function normalizeKeyframes(keyframes: readonly AnimationKeyframe[]): AnimationKeyframe[] {
  if (keyframes.length === 0) {
    throw new ValidationError('An animation needs at least one keyframe');
  }
  return keyframes.map((kf, i) => normalizeKeyframe(kf, i));
}

export interface AnimationRegistryOptions {
  generateId?: () => string;
}

/**
 * Built-in plus user-defined keyframe animations. User animations are persisted as a whole
 * file after every mutation; a file that cannot be read leaves the registry empty.
 */
export class AnimationRegistry {
  private userAnimations = new Map<string, LightbarAnimation>();
  private saveQueue: Promise<void> = Promise.resolve();
  private readonly generateId: () => string;

  constructor(
    private filePath: string,
    options: AnimationRegistryOptions = {}
  ) {
    this.generateId = options.generateId ?? generateAnimationId;
  }

  static async open(filePath: string, options?: AnimationRegistryOptions): Promise<AnimationRegistry> {
    const registry = new AnimationRegistry(filePath, options);
    await registry.load();
    return registry;
  }

  async load(): Promise<void> {
    this.userAnimations.clear();

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      console.warn(`[Registry] Could not read ${this.filePath}: ${describeError(error)}`);
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      console.warn(`[Registry] Could not parse ${this.filePath}: ${describeError(error)}`);
      return;
    }

    const entries = typeof data === 'object' && data !== null && 'custom_animations' in data
      ? data.custom_animations
      : undefined;
    if (!Array.isArray(entries)) {
      console.warn(`[Registry] ${this.filePath} has no custom_animations list; starting empty`);
      return;
    }

    for (const entry of entries) {
      try {
        const animation = animationFromJSON(entry);
        if (isBuiltinAnimation(animation.id)) {
          console.warn(`[Registry] Ignoring user animation with reserved id ${animation.id}`);
          continue;
        }
        this.userAnimations.set(animation.id, animation);
      } catch (error) {
        console.warn(`[Registry] Skipping malformed animation: ${describeError(error)}`);
      }
    }

    console.log(`[Registry] Loaded ${this.userAnimations.size} custom animation(s)`);
  }

  list(): LightbarAnimation[] {
    return [...BUILTIN_ANIMATIONS.values(), ...this.userAnimations.values()];
  }

  get(id: string): LightbarAnimation | undefined {
    return BUILTIN_ANIMATIONS.get(id) ?? this.userAnimations.get(id);
  }

  async create(
    name: string,
    keyframes: readonly AnimationKeyframe[],
    durationMs: number,
    loop: boolean = true
  ): Promise<LightbarAnimation> {
    const normalizedKeyframes = normalizeKeyframes(keyframes);
    const normalizedDuration = normalizeDuration(durationMs);

    let id = this.generateId();
    while (this.get(id) !== undefined) {
      id = this.generateId();
    }

    const animation: LightbarAnimation = {
      id,
      name,
      keyframes: normalizedKeyframes,
      durationMs: normalizedDuration,
      loop,
    };
    this.userAnimations.set(id, animation);
    await this.save();
    return animation;
  }

  async update(id: string, patch: AnimationPatch): Promise<MutationResult> {
    if (isBuiltinAnimation(id)) {
      return 'not_permitted';
    }
    const current = this.userAnimations.get(id);
    if (!current) {
      return 'not_found';
    }
    const keyframes = patch.keyframes ? normalizeKeyframes(patch.keyframes) : current.keyframes;
    const durationMs = patch.durationMs !== undefined ? normalizeDuration(patch.durationMs) : current.durationMs;

    this.userAnimations.set(id, {
      id,
      name: patch.name ?? current.name,
      keyframes,
      durationMs,
      loop: patch.loop ?? current.loop,
    });
    await this.save();
    return 'ok';
  }

  async delete(id: string): Promise<MutationResult> {
    if (isBuiltinAnimation(id)) {
      return 'not_permitted';
    }
    if (!this.userAnimations.delete(id)) {
      return 'not_found';
    }
    await this.save();
    return 'ok';
  }

  /**
   * Overwrites the file with the current user set. Writes are serialized so the file always
   * ends up holding the latest state; failures are logged, never thrown.
   */
  save(): Promise<void> {
    const data: AnimationFileJSON = {
      custom_animations: [...this.userAnimations.values()].map(animationToJSON),
    };
    const contents = JSON.stringify(data, null, 2);

    this.saveQueue = this.saveQueue.then(async () => {
      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, contents, 'utf8');
      } catch (error) {
        console.warn(`[Registry] Could not save ${this.filePath}: ${describeError(error)}`);
      }
    });
    return this.saveQueue;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
