import { Color, formatColor } from '../colorUtils.js';
import { Fill, GradientSlice } from '../gradient/gradient.js';
import { createSvgElement } from './svgHelpers.js';

let gradientCounter = 0;

export function nextGradientId(prefix: string): string {
    gradientCounter++;
    return `${prefix}-${gradientCounter}`;
}

function appendStop(doc: Document, gradient: SVGLinearGradientElement, offset: number, color: Color): void {
    const stop = createSvgElement(doc, 'stop', { offset, 'stop-color': formatColor({ ...color, a: 1 }) });
    if (color.a < 1) {
        stop.setAttribute('stop-opacity', String(color.a));
    }
    gradient.appendChild(stop);
}

// The slice runs from (originX, originY) along its axis in user space.
export function createSliceGradient(
    doc: Document,
    id: string,
    slice: GradientSlice,
    originX: number = 0,
    originY: number = 0
): SVGLinearGradientElement {
    const horizontal = slice.axis === 'horizontal';
    const gradient = createSvgElement(doc, 'linearGradient', {
        id,
        gradientUnits: 'userSpaceOnUse',
        x1: originX,
        y1: originY,
        x2: horizontal ? originX + slice.length : originX,
        y2: horizontal ? originY : originY + slice.length,
    });
    appendStop(doc, gradient, 0, slice.start);
    appendStop(doc, gradient, 1, slice.end);
    return gradient;
}

export interface PaintedFill {
    paint: string;
    definition: SVGLinearGradientElement | null;
}

export function paintFill(doc: Document, fill: Fill, idPrefix: string, originX: number = 0, originY: number = 0): PaintedFill {
    if (fill.type === 'solid') {
        return { paint: formatColor(fill.color), definition: null };
    }
    const id = nextGradientId(idPrefix);
    return { paint: `url(#${id})`, definition: createSliceGradient(doc, id, fill.slice, originX, originY) };
}
