import { Margins, Size } from '../geometry.js';

export interface BubbleIcon {
    id: string;
    width: number;
    height: number;
}

export interface BubbleStyle {
    fontSize: number;
    lineHeight: number;
    charWidthFactor: number;
    padding: Margins;
    textSkip: number;
    tailSize: Size;
    bubbleHeight: number;
    penWidth: number;
    // Wider bubbles swing with the smaller deflection.
    widthLimit: number;
    // Room kept around the bubble so the deflection swing is not clipped.
    skip: number;
    slideDuration: number;
}

export const PREMIUM_BUBBLE_STYLE: BubbleStyle = {
    fontSize: 16,
    lineHeight: 20,
    charWidthFactor: 0.6,
    padding: { left: 10, top: 0, right: 16, bottom: 0 },
    textSkip: 4,
    tailSize: { width: 14, height: 8 },
    bubbleHeight: 32,
    penWidth: 2,
    widthLimit: 80,
    skip: 12,
    slideDuration: 800,
};

export const LOCK_ICON: BubbleIcon = { id: 'premium-lock', width: 20, height: 20 };

export function resolveBubbleStyle(overrides: Partial<BubbleStyle> = {}): BubbleStyle {
    return { ...PREMIUM_BUBBLE_STYLE, ...overrides };
}
