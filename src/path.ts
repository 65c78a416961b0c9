import { Rect, rectBottom, rectRight } from './geometry.js';

export type PathCommand =
    | { type: 'M'; x: number; y: number }
    | { type: 'L'; x: number; y: number }
    | { type: 'A'; radius: number; x: number; y: number }
    | { type: 'Z' };

export interface CornerRadii {
    topLeft: number;
    topRight: number;
    bottomRight: number;
    bottomLeft: number;
}

export function uniformRadii(radius: number): CornerRadii {
    return { topLeft: radius, topRight: radius, bottomRight: radius, bottomLeft: radius };
}

// Clockwise in screen coordinates, so unions under the nonzero fill rule.
export function roundedRectPath(rect: Rect, radii: CornerRadii): PathCommand[] {
    const left = rect.x;
    const top = rect.y;
    const right = rectRight(rect);
    const bottom = rectBottom(rect);
    const limit = Math.min(rect.width, rect.height) / 2;
    const tl = Math.min(radii.topLeft, limit);
    const tr = Math.min(radii.topRight, limit);
    const br = Math.min(radii.bottomRight, limit);
    const bl = Math.min(radii.bottomLeft, limit);

    const commands: PathCommand[] = [{ type: 'M', x: left + tl, y: top }];
    commands.push({ type: 'L', x: right - tr, y: top });
    if (tr > 0) commands.push({ type: 'A', radius: tr, x: right, y: top + tr });
    commands.push({ type: 'L', x: right, y: bottom - br });
    if (br > 0) commands.push({ type: 'A', radius: br, x: right - br, y: bottom });
    commands.push({ type: 'L', x: left + bl, y: bottom });
    if (bl > 0) commands.push({ type: 'A', radius: bl, x: left, y: bottom - bl });
    commands.push({ type: 'L', x: left, y: top + tl });
    if (tl > 0) commands.push({ type: 'A', radius: tl, x: left + tl, y: top });
    commands.push({ type: 'Z' });
    return commands;
}

function formatNumber(value: number): string {
    const rounded = Math.round(value * 1000) / 1000;
    return String(Object.is(rounded, -0) ? 0 : rounded);
}

export function toSvgPathData(commands: readonly PathCommand[]): string {
    return commands.map(cmd => {
        switch (cmd.type) {
            case 'M':
            case 'L':
                return `${cmd.type} ${formatNumber(cmd.x)} ${formatNumber(cmd.y)}`;
            case 'A':
                return `A ${formatNumber(cmd.radius)} ${formatNumber(cmd.radius)} 0 0 1 ${formatNumber(cmd.x)} ${formatNumber(cmd.y)}`;
            case 'Z':
                return 'Z';
        }
    }).join(' ');
}
