import { clamp, HorizontalPadding } from '../geometry.js';

export const STEP_BEFORE_DEFLECTION = 0.75;
export const STEP_AFTER_DEFLECTION = STEP_BEFORE_DEFLECTION + (1 - STEP_BEFORE_DEFLECTION) / 2;

export const DEFLECTION = 30;
export const DEFLECTION_SMALL = 20;

// ============== Track Geometry ==============

// The horizontal track the bubble slides along; `width` includes the padding.
export interface BubbleTrack {
    width: number;
    padding: HorizontalPadding;
}

export function computeBubbleLeft(track: BubbleTrack, maxBubbleWidth: number, pointRatio: number, progress: number): number {
    const usable = track.width - track.padding.left - track.padding.right;
    return usable * pointRatio * progress - maxBubbleWidth / 2 + track.padding.left;
}

// Rightmost left edge at which the widest bubble still fits.
export function computeEdgeBoundary(track: BubbleTrack, maxBubbleWidth: number): number {
    return track.width - track.padding.right - maxBubbleWidth;
}

// How far, in half bubble widths, the final position overshoots the boundary; 0 when it fits.
export function computeEdgeFactor(track: BubbleTrack, maxBubbleWidth: number, endPoint: number): number {
    const finish = computeBubbleLeft(track, maxBubbleWidth, endPoint, 1);
    const edge = computeEdgeBoundary(track, maxBubbleWidth);
    return finish >= edge ? (finish - edge) / (maxBubbleWidth / 2) : 0;
}

export function selectDeflection(bubbleWidth: number, widthLimit: number): number {
    return bubbleWidth > widthLimit ? DEFLECTION_SMALL : DEFLECTION;
}

// ============== Timeline ==============

export interface TimelineParams {
    currentValue: number;
    maxValue: number;
    maxBubbleWidth: number;
    track: BubbleTrack;
}

// Frozen at animation start.
export interface TimelineState {
    readonly currentValue: number;
    readonly endPoint: number;
    readonly maxBubbleWidth: number;
    readonly track: BubbleTrack;
    readonly edgeFactor: number;
    readonly ignoreDeflection: boolean;
    readonly stepBeforeDeflection: number;
    readonly stepAfterDeflection: number;
}

export interface TimelineFrame {
    value: number;
    moveProgress: number;
    counterProgress: number;
    counter: number;
    left: number;
    edgeProgress: number;
    tailEdge: number;
    scale: number;
    rotation: number;
}

export function createTimeline(params: TimelineParams): TimelineState {
    const { currentValue, maxValue, maxBubbleWidth, track } = params;
    const endPoint = currentValue / maxValue;
    const edgeFactor = computeEdgeFactor(track, maxBubbleWidth, endPoint);
    const ignoreDeflection = edgeFactor > 0;
    return {
        currentValue,
        endPoint,
        maxBubbleWidth,
        track: { width: track.width, padding: { ...track.padding } },
        edgeFactor,
        ignoreDeflection,
        stepBeforeDeflection: ignoreDeflection ? 1 : STEP_BEFORE_DEFLECTION,
        stepAfterDeflection: ignoreDeflection ? 1 : STEP_AFTER_DEFLECTION,
    };
}

// Without the deflection phase the slide only needs its own share of the time.
export function timelineDuration(state: TimelineState, slideDuration: number): number {
    return slideDuration * (state.ignoreDeflection ? STEP_BEFORE_DEFLECTION : 1);
}

// Tilts after the slide, peaking at half of `deflection` degrees, and settles back to zero by the end.
export function computeRotation(state: TimelineState, value: number, deflection: number): number {
    if (state.ignoreDeflection) return 0;
    const { stepBeforeDeflection, stepAfterDeflection } = state;
    const rising = clamp((value - stepBeforeDeflection) / (1 - stepBeforeDeflection), 0, 1);
    const returning = clamp((value - stepAfterDeflection) / (1 - stepAfterDeflection), 0, 1);
    return deflection * (rising - returning);
}

export function computeFrame(state: TimelineState, value: number, deflection: number = DEFLECTION): TimelineFrame {
    const moveProgress = clamp(value / state.stepBeforeDeflection, 0, 1);
    const counterProgress = clamp(value / state.stepAfterDeflection, 0, 1);
    const edgeProgress = value * state.edgeFactor;
    const left = computeBubbleLeft(state.track, state.maxBubbleWidth, state.endPoint, moveProgress)
        - (state.maxBubbleWidth / 2) * state.edgeFactor;

    return {
        value,
        moveProgress,
        counterProgress,
        counter: Math.floor(counterProgress * state.currentValue),
        left,
        edgeProgress,
        tailEdge: clamp(edgeProgress, 0, 1),
        scale: moveProgress,
        rotation: computeRotation(state, value, deflection),
    };
}
