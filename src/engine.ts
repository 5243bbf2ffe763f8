import { performance } from 'perf_hooks';
import { AnimationRegistry } from './animations';
import { Color, PRESET_COLORS, isPresetColorName } from './color';
import { DEFAULT_LIGHTBAR_CONFIG, createLightbarConfig, isAnimatedMode } from './config';
import { parseLightbarConfig } from './encoding';
import { FrameSink } from './sink';
import { renderFrame } from './renderer';
import {
  AnimationKeyframe,
  AnimationPatch,
  LightbarAnimation,
  LightbarConfig,
  LightbarFrame,
  LightbarState,
  MutationResult,
} from './types';

export const DEFAULT_TICK_INTERVAL_MS = 16;

export interface EngineOptions {
  tickIntervalMs?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  initialConfig?: LightbarConfig;
}

interface RenderTask {
  controller: AbortController;
  done: Promise<void>;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Owns the live lightbar configuration and the single render task driving it.
 *
 * Every state change (apply, stop) goes through one queue and first cancels the running task
 * and waits for it to finish, so no two tasks ever write frames at the same time.
 */
export class LightbarEngine {
  private config: LightbarConfig;
  private battery = 100;
  private task: RenderTask | null = null;
  private queue: Promise<void> = Promise.resolve();
  private liveTasks = 0;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private registry: AnimationRegistry,
    private sink: FrameSink,
    options: EngineOptions = {}
  ) {
    this.config = options.initialConfig ?? DEFAULT_LIGHTBAR_CONFIG;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.now = options.now ?? (() => performance.now());
  }

  /** Number of render loops currently alive. Never more than one. */
  get activeRenderTasks(): number {
    return this.liveTasks;
  }

  applyConfig(config: LightbarConfig): Promise<void> {
    return this.enqueue(async () => {
      await this.cancelTask();
      this.config = config;

      if (isAnimatedMode(config.mode)) {
        this.startTask();
      } else {
        await this.sink.write(this.render(0));
      }
    });
  }

  /** Validates wire-format input before applying it; throws `ValidationError`. */
  async applyConfigJSON(input: unknown): Promise<void> {
    await this.applyConfig(parseLightbarConfig(input));
  }

  stop(): Promise<void> {
    return this.enqueue(async () => {
      await this.cancelTask();
      const off: LightbarFrame = {
        r: 0,
        g: 0,
        b: 0,
        playerLeds: 0,
        playerLedBrightness: this.config.playerLeds.brightness,
      };
      await this.sink.write(off);
      console.log('[Engine] Stopped');
    });
  }

  /** Takes effect on the next tick; the render task is not restarted. */
  setBatteryLevel(level: number): void {
    const value = Number.isFinite(level) ? Math.trunc(level) : 0;
    this.battery = Math.max(0, Math.min(100, value));
  }

  getCurrentState(): LightbarState {
    return {
      config: this.config,
      battery: this.battery,
      running: this.task !== null,
    };
  }

  setColor(color: Color, brightness?: number): Promise<void> {
    return this.applyConfig(createLightbarConfig({ color, brightness }, this.config));
  }

  setPlayerLeds(mask: number, brightness?: number): Promise<void> {
    return this.applyConfig(createLightbarConfig({ playerLeds: { mask, brightness } }, this.config));
  }

  async applyColorPreset(name: string): Promise<MutationResult> {
    if (!isPresetColorName(name)) {
      return 'not_found';
    }
    await this.applyConfig(createLightbarConfig({ mode: 'static', color: PRESET_COLORS[name] }, this.config));
    return 'ok';
  }

  async previewAnimation(id: string): Promise<MutationResult> {
    if (!this.registry.get(id)) {
      return 'not_found';
    }
    await this.applyConfig(createLightbarConfig({ mode: 'custom', custom: { animationId: id } }, this.config));
    return 'ok';
  }

  listAnimations(): LightbarAnimation[] {
    return this.registry.list();
  }

  getAnimation(id: string): LightbarAnimation | undefined {
    return this.registry.get(id);
  }

  createAnimation(
    name: string,
    keyframes: readonly AnimationKeyframe[],
    durationMs: number,
    loop: boolean = true
  ): Promise<LightbarAnimation> {
    return this.registry.create(name, keyframes, durationMs, loop);
  }

  updateAnimation(id: string, patch: AnimationPatch): Promise<MutationResult> {
    return this.registry.update(id, patch);
  }

  deleteAnimation(id: string): Promise<MutationResult> {
    return this.registry.delete(id);
  }

  private enqueue(step: () => Promise<void>): Promise<void> {
    const run = this.queue.then(step);
    // The failure belongs to the caller of `step`; the queue only has to keep moving.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private render(elapsedMs: number): LightbarFrame {
    return renderFrame(this.config, {
      elapsedMs,
      battery: this.battery,
      resolveAnimation: (id) => this.registry.get(id),
    });
  }

  private startTask(): void {
    const controller = new AbortController();
    this.liveTasks++;
    const done = this.runRenderLoop(controller.signal).finally(() => {
      this.liveTasks--;
    });
    this.task = { controller, done };
  }

  private async cancelTask(): Promise<void> {
    const task = this.task;
    if (!task) {
      return;
    }
    task.controller.abort();
    await task.done;
    this.task = null;
  }

  private async runRenderLoop(signal: AbortSignal): Promise<void> {
    const startedAt = this.now();

    while (!signal.aborted) {
      try {
        const elapsedMs = Math.floor(this.now() - startedAt);
        await this.sink.write(this.render(elapsedMs));
      } catch (error) {
        console.error('[Engine] Render tick failed:', error);
      }
      await sleep(this.tickIntervalMs, signal);
    }
  }
}
