import { AnimationLoop } from './animationLoop.js';
import { Easing, linear } from './easing.js';
import { defaultFrameScheduler, FrameScheduler } from './frameScheduler.js';

export type AnimationCallback = (value: number) => void;

interface RunningAnimation {
    loop: AnimationLoop;
    callback: AnimationCallback;
    from: number;
    to: number;
    duration: number;
    easing: Easing;
    startTime: number;
}

// One-shot tween from `from` to `to`; the last tick always delivers exactly `to`.
export class SimpleAnimation {
    private scheduler: FrameScheduler;
    private running: RunningAnimation | null = null;
    private current: number = 0;

    constructor(scheduler: FrameScheduler = defaultFrameScheduler()) {
        this.scheduler = scheduler;
    }

    start(callback: AnimationCallback, from: number, to: number, duration: number, easing: Easing = linear): void {
        this.stop();
        this.current = from;
        if (duration <= 0) {
            this.current = to;
            callback(to);
            return;
        }
        const loop = new AnimationLoop(() => this.step(), this.scheduler);
        this.running = { loop, callback, from, to, duration, easing, startTime: this.scheduler.now() };
        loop.start();
    }

    animating(): boolean {
        return this.running !== null;
    }

    value(whenIdle: number): number {
        return this.running ? this.current : whenIdle;
    }

    stop(): void {
        if (!this.running) return;
        this.running.loop.stop();
        this.running = null;
    }

    private step(): void {
        const anim = this.running;
        if (!anim) return;

        const elapsed = this.scheduler.now() - anim.startTime;
        const progress = Math.min(1, elapsed / anim.duration);
        const finished = progress >= 1;
        this.current = finished ? anim.to : anim.from + (anim.to - anim.from) * anim.easing(progress);

        if (finished) {
            this.stop();
        }
        anim.callback(this.current);
    }
}
