import { promises as fs } from 'fs';
import * as path from 'path';
import { encodeFrame } from './encoding';
import { LightbarFrame } from './types';

/**
 * Where rendered frames leave the engine. Delivery is best-effort: implementations
 * must resolve even when the write fails.
 */
export interface FrameSink {
  write(frame: LightbarFrame): Promise<void>;
  close(): Promise<void>;
}

/**
 * Overwrites a JSON file with the latest frame; the hardware adapter polls it.
 */
export class FileFrameSink implements FrameSink {
  failedWrites = 0;
  private dirReady = false;

  constructor(private filePath: string) {}

  async write(frame: LightbarFrame): Promise<void> {
    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await fs.writeFile(this.filePath, JSON.stringify(encodeFrame(frame)));
    } catch {
      // Cosmetic output: drop the frame, the next tick writes a fresh one.
      this.failedWrites++;
    }
  }

  async close(): Promise<void> {}
}

export class MultiFrameSink implements FrameSink {
  constructor(private sinks: FrameSink[]) {}

  async write(frame: LightbarFrame): Promise<void> {
    await Promise.allSettled(this.sinks.map((sink) => sink.write(frame)));
  }

  async close(): Promise<void> {
    await Promise.allSettled(this.sinks.map((sink) => sink.close()));
  }
}
