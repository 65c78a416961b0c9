export interface Size {
    width: number;
    height: number;
}

export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface Margins {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

export interface HorizontalPadding {
    left: number;
    right: number;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export function insetRect(rect: Rect, margins: Margins): Rect {
    return {
        x: rect.x + margins.left,
        y: rect.y + margins.top,
        width: rect.width - margins.left - margins.right,
        height: rect.height - margins.top - margins.bottom,
    };
}

export function rectRight(rect: Rect): number {
    return rect.x + rect.width;
}

export function rectBottom(rect: Rect): number {
    return rect.y + rect.height;
}
