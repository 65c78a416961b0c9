import { FrameScheduler } from '../animation/frameScheduler.js';
import { BOX_STYLE, BoxStyle } from '../boxStyle.js';
import { EventSource, Lifetime } from '../events.js';
import { TextMeasurer } from '../text.js';
import { PremiumTheme } from '../theme.js';
import { BubbleIcon, BubbleStyle } from './bubbleStyle.js';
import { BubbleWidget } from './bubbleWidget.js';
import { PluralPhrase, processTextFactory } from './textFactory.js';

export interface BubbleRowOptions {
    width: number;
    current: number;
    max: number;
    premiumPossible: boolean;
    phrase?: PluralPhrase | null;
    locale?: string;
    icon: BubbleIcon | null;
    showFinishes: EventSource<void>;
    scheduler?: FrameScheduler;
    style?: BubbleStyle;
    boxStyle?: BoxStyle;
    theme?: Partial<PremiumTheme>;
    measurer?: TextMeasurer;
}

// Full-width row whose height follows the bubble; the bubble slides across the padded row.
export class BubbleRow {
    readonly widget: BubbleWidget;
    private rowWidth: number;
    private rowHeight: number;
    private lifetime = new Lifetime();

    constructor(options: BubbleRowOptions) {
        const boxStyle = options.boxStyle ?? BOX_STYLE;
        this.rowWidth = options.width;
        this.widget = new BubbleWidget({
            host: {
                track: () => ({ width: this.rowWidth, padding: boxStyle.rowPadding }),
                gradientWidth: () => this.rowWidth,
            },
            textFactory: processTextFactory(options.phrase, options.locale),
            current: options.current,
            max: options.max,
            premiumPossible: options.premiumPossible,
            icon: options.icon,
            showFinishes: options.showFinishes,
            scheduler: options.scheduler,
            style: options.style,
            theme: options.theme,
            measurer: options.measurer,
        });
        this.rowHeight = this.widget.height();
        this.lifetime.add(this.widget.sizeChanges().subscribe(size => {
            this.rowHeight = size.height;
        }));
        this.lifetime.add(() => this.widget.destroy());
    }

    width(): number {
        return this.rowWidth;
    }

    height(): number {
        return this.rowHeight;
    }

    resize(width: number): void {
        if (width <= 0 || width === this.rowWidth) return;
        this.rowWidth = width;
        this.widget.hostResized();
    }

    destroy(): void {
        this.lifetime.destroy();
    }
}

export function addBubbleRow(options: BubbleRowOptions): BubbleRow {
    return new BubbleRow(options);
}
