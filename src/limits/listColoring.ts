import { createGradient, GradientSlice, reverseGradient, sliceGradient, StopInput } from '../gradient/gradient.js';
import { fullHeightGradientStops } from '../gradient/palettes.js';

export interface RowSpan {
    top: number;
    height: number;
}

export const MIN_COLORED_ROWS = 3;

// Vertical slices that make a stack of separately painted rows read as one sweep.
export function colorListRows(rows: readonly RowSpan[], stops: readonly StopInput[] = fullHeightGradientStops()): GradientSlice[] {
    if (rows.length < MIN_COLORED_ROWS) {
        throw new Error(`[LimitList] Coloring needs at least ${MIN_COLORED_ROWS} rows, got ${rows.length}`);
    }
    const from = rows[0].top;
    const last = rows[rows.length - 1];
    const span = last.top + last.height - from;
    const gradient = reverseGradient(createGradient(stops));

    return rows.map(row => sliceGradient(gradient, row.top - from, row.height, span, 'vertical'));
}
