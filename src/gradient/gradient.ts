import { Color, mixColor, parseColor } from '../colorUtils.js';

export interface GradientStop {
    readonly position: number;
    readonly color: Color;
}

export interface StopInput {
    position: number;
    color: Color | string;
}

// Ordered stops over a notional axis; positions are strictly increasing within [0, 1].
export interface GradientDefinition {
    readonly stops: readonly GradientStop[];
}

export type GradientAxis = 'horizontal' | 'vertical';

// Two-stop gradient spanning [0, length] along its own axis.
export interface GradientSlice {
    readonly axis: GradientAxis;
    readonly length: number;
    readonly start: Color;
    readonly end: Color;
}

export interface CenteredSliceParams {
    parentWidth: number;
    contentWidth: number;
    left: number;
    width: number;
}

export function createGradient(stops: readonly StopInput[]): GradientDefinition {
    if (stops.length === 0) {
        throw new Error('Gradient needs at least one stop');
    }
    const resolved: GradientStop[] = [];
    for (const stop of stops) {
        if (!(stop.position >= 0 && stop.position <= 1)) {
            throw new Error(`Gradient stop position ${stop.position} is outside [0, 1]`);
        }
        const previous = resolved[resolved.length - 1];
        if (previous && stop.position <= previous.position) {
            throw new Error(`Gradient stops must be strictly increasing (${previous.position} then ${stop.position})`);
        }
        const color = typeof stop.color === 'string' ? parseColor(stop.color) : { ...stop.color };
        resolved.push(Object.freeze({ position: stop.position, color: Object.freeze(color) }));
    }
    return Object.freeze({ stops: Object.freeze(resolved) });
}

export function colorAt(gradient: GradientDefinition, ratio: number): Color {
    const { stops } = gradient;
    const first = stops[0];
    const last = stops[stops.length - 1];
    const position = Number.isNaN(ratio) ? 0 : ratio;

    if (position <= first.position) return first.color;
    if (position >= last.position) return last.color;

    for (let i = 0; i < stops.length - 1; i++) {
        const from = stops[i];
        const to = stops[i + 1];
        if (position >= from.position && position < to.position) {
            const t = (position - from.position) / (to.position - from.position);
            return mixColor(from.color, to.color, t);
        }
    }
    return last.color;
}

export function sliceGradient(
    reference: GradientDefinition,
    offset: number,
    sliceWidth: number,
    referenceWidth: number,
    axis: GradientAxis = 'horizontal'
): GradientSlice {
    return {
        axis,
        length: sliceWidth,
        start: colorAt(reference, offset / referenceWidth),
        end: colorAt(reference, (offset + sliceWidth) / referenceWidth),
    };
}

// The content is centered inside its parent, and the parent's full width is the gradient axis.
export function computeCenteredSlice(reference: GradientDefinition, params: CenteredSliceParams): GradientSlice {
    const { parentWidth, contentWidth, left, width } = params;
    const shiftedLeft = left + (parentWidth - contentWidth) / 2;
    return sliceGradient(reference, shiftedLeft, width, parentWidth);
}

export function sliceToGradient(slice: GradientSlice): GradientDefinition {
    return createGradient([
        { position: 0, color: slice.start },
        { position: 1, color: slice.end },
    ]);
}

export function reverseGradient(gradient: GradientDefinition): GradientDefinition {
    const flipped = gradient.stops
        .map(stop => ({ position: Math.abs(stop.position - 1), color: stop.color }))
        .sort((a, b) => a.position - b.position);
    return createGradient(flipped);
}

export type Fill =
    | { type: 'gradient'; slice: GradientSlice }
    | { type: 'solid'; color: Color };
