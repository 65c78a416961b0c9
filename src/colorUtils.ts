export interface Color {
    r: number;
    g: number;
    b: number;
    a: number;
}

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

export function rgba(r: number, g: number, b: number, a: number = 1): Color {
    return { r, g, b, a };
}

export function parseColor(hex: string): Color {
    const match = HEX_PATTERN.exec(hex.trim());
    if (!match) {
        throw new Error(`Invalid color "${hex}": expected #rgb, #rrggbb or #rrggbbaa`);
    }
    let digits = match[1];
    if (digits.length === 3) {
        digits = digits.split('').map(d => d + d).join('');
    }
    const r = parseInt(digits.slice(0, 2), 16);
    const g = parseInt(digits.slice(2, 4), 16);
    const b = parseInt(digits.slice(4, 6), 16);
    const a = digits.length === 8 ? parseInt(digits.slice(6, 8), 16) / 255 : 1;
    return { r, g, b, a };
}

function channelHex(value: number): string {
    const clamped = Math.max(0, Math.min(255, Math.round(value)));
    return clamped.toString(16).padStart(2, '0');
}

// Opaque colors format as #rrggbb, translucent ones as #rrggbbaa.
export function formatColor(color: Color): string {
    const base = `#${channelHex(color.r)}${channelHex(color.g)}${channelHex(color.b)}`;
    return color.a >= 1 ? base : base + channelHex(color.a * 255);
}

export function mixColor(from: Color, to: Color, t: number): Color {
    return {
        r: from.r + (to.r - from.r) * t,
        g: from.g + (to.g - from.g) * t,
        b: from.b + (to.b - from.b) * t,
        a: from.a + (to.a - from.a) * t,
    };
}

export function colorsClose(c1: Color, c2: Color, tolerance: number = 1e-6): boolean {
    return Math.abs(c1.r - c2.r) <= tolerance &&
        Math.abs(c1.g - c2.g) <= tolerance &&
        Math.abs(c1.b - c2.b) <= tolerance &&
        Math.abs(c1.a - c2.a) <= tolerance;
}
