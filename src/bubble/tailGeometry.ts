import { clamp, Rect, rectBottom, rectRight, Size } from '../geometry.js';
import { PathCommand, roundedRectPath, uniformRadii } from '../path.js';

// Tail anchored on the bubble's bottom edge (`top`), pointing down to `apexY`.
export interface TailGeometry {
    top: number;
    apexY: number;
    leftFull: number;
    left: number;
    center: number;
    right: number;
    radius: number;
}

// tailEdge 0 keeps the tail centered; 1 slides it to the trailing edge, where it flattens against the corner.
export function computeTailGeometry(rect: Rect, tailEdge: number, tailSize: Size, radius: number): TailGeometry {
    const progress = clamp(tailEdge, 0, 1);
    const halfWidth = tailSize.width / 2;
    const top = rectBottom(rect);
    const leftFull = rect.x + rect.width * 0.5 - halfWidth;
    const left = rect.x + rect.width * 0.5 * (progress + 1) - halfWidth;
    const center = left + halfWidth;

    const bottomMax = rectRight(rect) - radius;
    const naturalRight = left + tailSize.width;
    const right = naturalRight > bottomMax ? Math.max(center, bottomMax) : naturalRight;

    return { top, apexY: top + tailSize.height, leftFull, left, center, right, radius };
}

export function tailPath(tail: TailGeometry): PathCommand[] {
    return [
        { type: 'M', x: tail.leftFull, y: tail.top },
        { type: 'L', x: tail.left, y: tail.top },
        { type: 'L', x: tail.center, y: tail.apexY },
        { type: 'L', x: tail.right, y: tail.top },
        { type: 'L', x: tail.right, y: tail.top - tail.radius },
        { type: 'Z' },
    ];
}

// Rounded body plus the tail as a second subpath; filled nonzero, the two read as one shape.
export function bubblePath(rect: Rect, radius: number, tail: TailGeometry | null): PathCommand[] {
    const body = roundedRectPath(rect, uniformRadii(radius));
    return tail ? [...tailPath(tail), ...body] : body;
}
