export type Easing = (t: number) => number;

export function linear(t: number): number {
    return t;
}

export function easeOutQuad(t: number): number {
    return 1 - Math.pow(1 - t, 2);
}

export function easeOutCirc(t: number): number {
    return Math.sqrt(1 - Math.pow(t - 1, 2));
}
