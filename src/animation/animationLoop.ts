import { defaultFrameScheduler, FrameScheduler } from './frameScheduler.js';

const MAX_DELTA_SECONDS = 0.1;

export class AnimationLoop {
    private running: boolean = false;
    private frameHandle: number | null = null;
    private lastFrameTime: number = 0;
    private onFrame: (deltaTime: number) => void;
    private scheduler: FrameScheduler;

    constructor(onFrame: (deltaTime: number) => void, scheduler: FrameScheduler = defaultFrameScheduler()) {
        this.onFrame = onFrame;
        this.scheduler = scheduler;
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.lastFrameTime = this.scheduler.now();
        this.tick();
    }

    stop(): void {
        this.running = false;
        if (this.frameHandle !== null) {
            this.scheduler.cancel(this.frameHandle);
            this.frameHandle = null;
        }
    }

    isRunning(): boolean {
        return this.running;
    }

    private tick(): void {
        this.frameHandle = null;
        if (!this.running) return;

        const currentTime = this.scheduler.now();
        const deltaTime = Math.min((currentTime - this.lastFrameTime) / 1000, MAX_DELTA_SECONDS);
        this.lastFrameTime = currentTime;

        this.onFrame(deltaTime);

        // onFrame may have stopped the loop
        if (this.running && this.frameHandle === null) {
            this.frameHandle = this.scheduler.request(() => this.tick());
        }
    }
}
