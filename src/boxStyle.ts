import { HorizontalPadding } from './geometry.js';

export interface BoxStyle {
    rowPadding: HorizontalPadding;
    wideWidth: number;
}

export const BOX_STYLE: BoxStyle = {
    rowPadding: { left: 22, right: 22 },
    wideWidth: 364,
};
