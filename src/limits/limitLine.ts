import { TextFactory } from '../bubble/textFactory.js';
import { Color, parseColor } from '../colorUtils.js';
import { EventSource, EventStream } from '../events.js';
import { Rect } from '../geometry.js';
import { computeCenteredSlice, createGradient, Fill, GradientDefinition } from '../gradient/gradient.js';
import { buttonGradientStops } from '../gradient/palettes.js';
import { PathCommand, roundedRectPath } from '../path.js';
import { createApproximateMeasurer, elideText, TextMeasurer } from '../text.js';
import { PremiumTheme, resolveTheme } from '../theme.js';

export interface LimitLineStyle {
    height: number;
    radius: number;
    textSkip: number;
    fontSize: number;
    lineHeight: number;
    charWidthFactor: number;
    freeText: string;
    premiumText: string;
}

export const LIMIT_LINE_STYLE: LimitLineStyle = {
    height: 30,
    radius: 6,
    textSkip: 10,
    fontSize: 13,
    lineHeight: 16,
    charWidthFactor: 0.6,
    freeText: 'Free',
    premiumText: 'Premium',
};

export interface LimitLineOptions {
    max: string;
    min: string;
    style?: LimitLineStyle;
    theme?: Partial<PremiumTheme>;
    measurer?: TextMeasurer;
}

export interface LineHalf {
    rect: Rect;
    path: PathCommand[];
    fill: Fill;
}

export interface LineLabel {
    text: string;
    x: number;
    y: number;
    anchor: 'start' | 'end';
    color: Color;
}

export interface LimitLineLayout {
    width: number;
    height: number;
    left: LineHalf;
    right: LineHalf;
    labels: LineLabel[];
}

// Free value on a neutral left half, premium value on a gradient right half.
export class LimitLine {
    private style: LimitLineStyle;
    private measurer: TextMeasurer;
    private gradient: GradientDefinition;
    private neutral: Color;
    private leftColor: Color;
    private rightColor: Color;
    private maxLabel: string;
    private minLabel: string;
    private overrideFill: Fill | null = null;
    private lineWidth: number = 0;
    private parentWidth: number = 0;
    private cached: LimitLineLayout | null = null;
    private repaintStream = new EventStream<void>();

    constructor(options: LimitLineOptions) {
        this.style = options.style ?? LIMIT_LINE_STYLE;
        this.measurer = options.measurer ?? createApproximateMeasurer(this.style);
        const theme = resolveTheme(options.theme);
        this.gradient = createGradient(buttonGradientStops(theme));
        this.neutral = parseColor(theme.windowShadowFg);
        this.leftColor = parseColor(theme.windowFg);
        this.rightColor = parseColor(theme.activeButtonFg);
        this.maxLabel = options.max;
        this.minLabel = options.min;
    }

    width(): number {
        return this.lineWidth;
    }

    height(): number {
        return this.style.height;
    }

    repaints(): EventSource<void> {
        return this.repaintStream;
    }

    // `parentWidth` spans the gradient; the line is centered inside it.
    resize(width: number, parentWidth: number = width): void {
        if (width <= 0) return;
        this.lineWidth = width;
        this.parentWidth = parentWidth;
        this.recache();
    }

    setColorOverride(fill: Fill | null): void {
        this.overrideFill = fill;
        if (this.lineWidth > 0) {
            this.recache();
        }
    }

    colorOverride(): Fill | null {
        return this.overrideFill;
    }

    layout(): LimitLineLayout | null {
        return this.cached;
    }

    private recache(): void {
        const { height, radius, textSkip } = this.style;
        const width = this.lineWidth;
        const leftWidth = Math.floor(width / 2);
        const rightWidth = width - leftWidth;

        const leftRect = { x: 0, y: 0, width: leftWidth, height };
        const rightRect = { x: leftWidth, y: 0, width: rightWidth, height };

        const rightFill: Fill = this.overrideFill ?? {
            type: 'gradient',
            slice: computeCenteredSlice(this.gradient, {
                parentWidth: this.parentWidth,
                contentWidth: width,
                left: leftWidth,
                width: rightWidth,
            }),
        };

        const textTop = Math.floor((height - this.measurer.fontHeight) / 2);
        const maxLabelWidth = this.measurer.width(this.maxLabel);
        const premiumRoom = rightWidth - maxLabelWidth - textSkip * 2;

        this.cached = {
            width,
            height,
            left: {
                rect: leftRect,
                path: roundedRectPath(leftRect, { topLeft: radius, topRight: 0, bottomRight: 0, bottomLeft: radius }),
                fill: { type: 'solid', color: this.neutral },
            },
            right: {
                rect: rightRect,
                path: roundedRectPath(rightRect, { topLeft: 0, topRight: radius, bottomRight: radius, bottomLeft: 0 }),
                fill: rightFill,
            },
            labels: [
                { text: this.style.freeText, x: textSkip, y: textTop, anchor: 'start', color: this.leftColor },
                { text: this.minLabel, x: leftWidth - textSkip, y: textTop, anchor: 'end', color: this.leftColor },
                {
                    text: elideText(this.style.premiumText, premiumRoom, this.measurer),
                    x: leftWidth + textSkip,
                    y: textTop,
                    anchor: 'start',
                    color: this.rightColor,
                },
                { text: this.maxLabel, x: width - textSkip, y: textTop, anchor: 'end', color: this.rightColor },
            ],
        };
        this.repaintStream.fire();
    }
}

export function limitLineFromNumbers(
    max: number,
    textFactory: TextFactory,
    min: number,
    options: Omit<LimitLineOptions, 'max' | 'min'> = {}
): LimitLine {
    return new LimitLine({
        ...options,
        max: max ? textFactory(max) : '',
        min: min ? textFactory(min) : '',
    });
}
