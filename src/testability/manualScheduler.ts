import type { FrameScheduler } from '../animation/frameScheduler.js';

// Frame scheduler driven by hand: time moves only when a frame is stepped.
export class ManualFrameScheduler implements FrameScheduler {
    private time: number;
    private nextHandle: number = 1;
    private pending = new Map<number, () => void>();

    constructor(startTime: number = 0) {
        this.time = startTime;
    }

    now(): number {
        return this.time;
    }

    request(callback: () => void): number {
        const handle = this.nextHandle++;
        this.pending.set(handle, callback);
        return handle;
    }

    cancel(handle: number): void {
        this.pending.delete(handle);
    }

    pendingCount(): number {
        return this.pending.size;
    }

    // Advances the clock, then runs every callback that was queued before the step.
    step(elapsed: number): void {
        this.time += elapsed;
        const due = [...this.pending.values()];
        this.pending.clear();
        for (const callback of due) {
            callback();
        }
    }

    runUntilIdle(frameInterval: number = 16, maxFrames: number = 10_000): number {
        let frames = 0;
        while (this.pending.size > 0) {
            if (frames >= maxFrames) {
                throw new Error(`Scheduler still busy after ${maxFrames} frames`);
            }
            this.step(frameInterval);
            frames++;
        }
        return frames;
    }
}
