import { Color, parseColor } from '../colorUtils.js';
import { EventSource, EventStream } from '../events.js';
import { Margins, Rect, Size } from '../geometry.js';
import { computeCenteredSlice, createGradient, GradientDefinition, GradientSlice } from '../gradient/gradient.js';
import { buttonGradientStops } from '../gradient/palettes.js';
import { createApproximateMeasurer, elideText, FontMetrics, TextMeasurer, wrapText } from '../text.js';
import { PremiumTheme, resolveTheme } from '../theme.js';

export interface AccountsRowStyle {
    height: number;
    imageRadius: number;
    selectWidth: number;
    labelSize: Size;
    labelPadding: Margins;
    labelRadius: number;
    badgeText: string;
    nameTop: number;
    nameMaxLines: number;
    nameFont: FontMetrics;
}

export const ACCOUNTS_ROW_STYLE: AccountsRowStyle = {
    height: 110,
    imageRadius: 30,
    selectWidth: 3,
    labelSize: { width: 22, height: 16 },
    labelPadding: { left: 2, top: 2, right: 2, bottom: 2 },
    labelRadius: 8,
    badgeText: '+1',
    nameTop: 6,
    nameMaxLines: 2,
    nameFont: { fontSize: 12, charWidthFactor: 0.55, lineHeight: 15 },
};

export interface AccountBadge {
    outer: Rect;
    inner: Rect;
    radius: number;
    innerRadius: number;
    outerColor: Color;
    innerFill: GradientSlice;
    text: string;
}

// Positions are relative to the column's own left edge.
export interface AccountColumn {
    index: number;
    left: number;
    width: number;
    photo: { x: number; y: number; radius: number; ringWidth: number };
    ring: GradientSlice;
    badge: AccountBadge;
    nameLines: string[];
    nameY: number;
    checked: boolean;
}

export interface AccountsRowOptions {
    names: readonly string[];
    selected: number;
    style?: AccountsRowStyle;
    theme?: Partial<PremiumTheme>;
    measurer?: TextMeasurer;
}

function limitLines(lines: string[], maxLines: number, width: number, measurer: TextMeasurer): string[] {
    if (lines.length <= maxLines) return lines;
    const kept = lines.slice(0, maxLines);
    const rest = lines.slice(maxLines - 1).join(' ');
    kept[maxLines - 1] = elideText(rest, width, measurer);
    return kept;
}

// Equal columns of account avatars; each badge and selection ring is a slice of one gradient across the row.
export class AccountsRow {
    private style: AccountsRowStyle;
    private measurer: TextMeasurer;
    private gradient: GradientDefinition;
    private badgeColor: Color;
    private names: readonly string[];
    private selectedIndex: number;
    private rowWidth: number = 0;
    private parentWidth: number = 0;
    private cached: AccountColumn[] = [];
    private changeStream = new EventStream<number>();

    constructor(options: AccountsRowOptions) {
        this.style = options.style ?? ACCOUNTS_ROW_STYLE;
        this.measurer = options.measurer ?? createApproximateMeasurer(this.style.nameFont);
        const theme = resolveTheme(options.theme);
        this.gradient = createGradient(buttonGradientStops(theme));
        this.badgeColor = parseColor(theme.premiumButtonFg);
        this.names = [...options.names];
        this.selectedIndex = options.selected;
    }

    height(): number {
        return this.style.height;
    }

    selected(): number {
        return this.selectedIndex;
    }

    changes(): EventSource<number> {
        return this.changeStream;
    }

    columns(): readonly AccountColumn[] {
        return this.cached;
    }

    select(index: number): void {
        if (index < 0 || index >= this.names.length) {
            console.error(`[AccountsRow] No account at index ${index}`);
            return;
        }
        if (index === this.selectedIndex) return;
        this.selectedIndex = index;
        this.cached = this.cached.map(column => ({ ...column, checked: column.index === index }));
        this.changeStream.fire(index);
    }

    resize(width: number, parentWidth: number = width): void {
        this.rowWidth = width;
        this.parentWidth = parentWidth;
        this.cached = this.layoutColumns();
    }

    private slice(left: number, width: number): GradientSlice {
        return computeCenteredSlice(this.gradient, {
            parentWidth: this.parentWidth,
            contentWidth: this.rowWidth,
            left,
            width,
        });
    }

    private layoutColumns(): AccountColumn[] {
        const count = this.names.length;
        if (count === 0 || this.rowWidth <= 0) return [];

        const { imageRadius, selectWidth, labelSize, labelPadding, labelRadius } = this.style;
        const columnWidth = Math.floor(this.rowWidth / count);
        const photoWidth = (imageRadius + selectWidth) * 2;
        const outerSize = {
            width: labelSize.width + labelPadding.left + labelPadding.right,
            height: labelSize.height + labelPadding.top + labelPadding.bottom,
        };

        return this.names.map((name, i) => {
            const left = columnWidth * i;
            const center = left + columnWidth / 2;
            const photoTop = selectWidth;

            const outer = {
                x: (columnWidth - outerSize.width) / 2,
                y: photoTop + imageRadius * 2 - outerSize.height / 2,
                width: outerSize.width,
                height: outerSize.height,
            };
            const inner = {
                x: outer.x + labelPadding.left,
                y: outer.y + labelPadding.top,
                width: labelSize.width,
                height: labelSize.height,
            };

            const lines = wrapText(name, columnWidth, this.measurer);
            return {
                index: i,
                left,
                width: columnWidth,
                photo: { x: (columnWidth - imageRadius * 2) / 2, y: photoTop, radius: imageRadius, ringWidth: selectWidth },
                ring: this.slice(left + (columnWidth - photoWidth) / 2, photoWidth),
                badge: {
                    outer,
                    inner,
                    radius: labelRadius,
                    innerRadius: labelRadius / 2,
                    outerColor: this.badgeColor,
                    innerFill: this.slice(center - inner.width / 2, inner.width),
                    text: this.style.badgeText,
                },
                nameLines: limitLines(lines, this.style.nameMaxLines, columnWidth, this.measurer),
                nameY: photoTop + imageRadius * 2 + this.style.nameTop,
                checked: i === this.selectedIndex,
            };
        });
    }
}
