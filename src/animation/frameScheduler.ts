export interface FrameScheduler {
    now(): number;
    request(callback: () => void): number;
    cancel(handle: number): void;
}

const FALLBACK_FRAME_INTERVAL = 16;

export function createAnimationFrameScheduler(): FrameScheduler {
    return {
        now: () => performance.now(),
        request: callback => requestAnimationFrame(() => callback()),
        cancel: handle => cancelAnimationFrame(handle),
    };
}

export function createTimerScheduler(interval: number = FALLBACK_FRAME_INTERVAL): FrameScheduler {
    const timers = new Map<number, ReturnType<typeof setTimeout>>();
    let nextHandle = 1;
    return {
        now: () => performance.now(),
        request(callback: () => void): number {
            const handle = nextHandle++;
            timers.set(handle, setTimeout(() => {
                timers.delete(handle);
                callback();
            }, interval));
            return handle;
        },
        cancel(handle: number): void {
            const timer = timers.get(handle);
            if (timer !== undefined) {
                clearTimeout(timer);
                timers.delete(handle);
            }
        },
    };
}

export function defaultFrameScheduler(): FrameScheduler {
    return typeof requestAnimationFrame === 'function'
        ? createAnimationFrameScheduler()
        : createTimerScheduler();
}
