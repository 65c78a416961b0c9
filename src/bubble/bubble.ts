import { EventSource, EventStream } from '../events.js';
import { clamp, insetRect, Rect } from '../geometry.js';
import { PathCommand } from '../path.js';
import { createApproximateMeasurer, TextMeasurer } from '../text.js';
import { BubbleIcon, BubbleStyle, PREMIUM_BUBBLE_STYLE } from './bubbleStyle.js';
import { DigitReveal, RollingDigit } from './digitReveal.js';
import { bubblePath, computeTailGeometry, TailGeometry } from './tailGeometry.js';
import { TextFactory } from './textFactory.js';

const BUBBLE_RADIUS_SUBTRACTOR = 2;

export interface BubbleOptions {
    textFactory: TextFactory;
    icon: BubbleIcon | null;
    premiumPossible: boolean;
    style?: BubbleStyle;
    measurer?: TextMeasurer;
}

export interface PlacedIcon {
    id: string;
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface BubbleText {
    value: string;
    x: number;
    y: number;
    fontSize: number;
    // Per-position digit pairs for a host that draws the roll itself; `value` is the settled text.
    digits: RollingDigit[];
}

export interface BubbleShape {
    rect: Rect;
    radius: number;
    penWidth: number;
    tail: TailGeometry | null;
    path: PathCommand[];
    icon: PlacedIcon | null;
    text: BubbleText;
}

export function createBubbleMeasurer(style: BubbleStyle): TextMeasurer {
    return createApproximateMeasurer({
        fontSize: style.fontSize,
        charWidthFactor: style.charWidthFactor,
        lineHeight: style.lineHeight,
    });
}

export class Bubble {
    private textFactory: TextFactory;
    private icon: BubbleIcon | null;
    private premiumPossible: boolean;
    private style: BubbleStyle;
    private measurer: TextMeasurer;
    private numbers: DigitReveal;
    private widthChangeStream = new EventStream<void>();
    private bubbleHeight: number;
    private textTop: number;

    private counterValue: number = -1;
    private tailEdgeValue: number = 0;

    constructor(options: BubbleOptions) {
        this.textFactory = options.textFactory;
        this.icon = options.icon;
        this.premiumPossible = options.premiumPossible;
        this.style = options.style ?? PREMIUM_BUBBLE_STYLE;
        this.measurer = options.measurer ?? createBubbleMeasurer(this.style);
        this.bubbleHeight = this.style.bubbleHeight + this.style.tailSize.height;
        this.textTop = Math.floor((this.bubbleHeight - this.style.tailSize.height - this.measurer.fontHeight) / 2);

        this.numbers = new DigitReveal(this.measurer, () => this.widthChangeStream.fire());
        this.numbers.setText(this.textFactory(0), 0);
        this.numbers.finishAnimating();
    }

    counter(): number {
        return this.counterValue;
    }

    tailEdge(): number {
        return this.tailEdgeValue;
    }

    text(): string {
        return this.numbers.text();
    }

    height(): number {
        return this.bubbleHeight;
    }

    width(): number {
        return this.filledWidth() + this.numbers.countWidth();
    }

    bubbleRadius(): number {
        return (this.bubbleHeight - this.style.tailSize.height) / 2 - BUBBLE_RADIUS_SUBTRACTOR;
    }

    // Room to reserve before any counter is shown.
    countMaxWidth(maxCounter: number): number {
        const numbers = new DigitReveal(this.measurer);
        numbers.setText(this.textFactory(0), 0);
        numbers.setText(this.textFactory(maxCounter), maxCounter);
        numbers.finishAnimating();
        return this.filledWidth() + numbers.maxWidth();
    }

    setCounter(value: number): void {
        if (this.counterValue !== value) {
            this.counterValue = value;
            this.numbers.setText(this.textFactory(value), value);
        }
    }

    setTailEdge(edge: number): void {
        this.tailEdgeValue = clamp(edge, 0, 1);
    }

    widthChanges(): EventSource<void> {
        return this.widthChangeStream;
    }

    // Nothing is drawn before the first counter arrives.
    layout(r: Rect): BubbleShape | null {
        if (this.counterValue < 0) {
            return null;
        }

        const { penWidth, tailSize, padding } = this.style;
        const penHalf = penWidth / 2;
        const rect = insetRect(r, { left: penHalf, top: penHalf, right: penHalf, bottom: tailSize.height + penHalf });
        const radius = this.bubbleRadius();
        const tail = this.premiumPossible ? computeTailGeometry(rect, this.tailEdgeValue, tailSize, radius) : null;

        const iconLeft = r.x + padding.left;
        const iconWidth = this.icon?.width ?? 0;
        const icon = this.icon
            ? {
                id: this.icon.id,
                x: iconLeft,
                y: rect.y + Math.floor((rect.height - this.icon.height) / 2),
                width: this.icon.width,
                height: this.icon.height,
            }
            : null;

        return {
            rect,
            radius,
            penWidth,
            tail,
            path: bubblePath(rect, radius, tail),
            icon,
            text: {
                value: this.numbers.text(),
                x: iconLeft + iconWidth + this.style.textSkip,
                y: r.y + this.textTop,
                fontSize: this.style.fontSize,
                digits: this.numbers.rollingDigits(),
            },
        };
    }

    private filledWidth(): number {
        const { padding, textSkip } = this.style;
        return padding.left + (this.icon?.width ?? 0) + textSkip + padding.right;
    }
}
