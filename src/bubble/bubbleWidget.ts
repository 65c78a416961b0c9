import { easeOutCirc } from '../animation/easing.js';
import { defaultFrameScheduler, FrameScheduler } from '../animation/frameScheduler.js';
import { SimpleAnimation } from '../animation/simpleAnimation.js';
import { Color, parseColor } from '../colorUtils.js';
import { EventSource, EventStream, Lifetime, once } from '../events.js';
import { Rect, Size } from '../geometry.js';
import { computeCenteredSlice, createGradient, Fill, GradientDefinition, GradientSlice } from '../gradient/gradient.js';
import { buttonGradientStops } from '../gradient/palettes.js';
import { TextMeasurer } from '../text.js';
import { resolveTheme, PremiumTheme } from '../theme.js';
import { Bubble, BubbleShape } from './bubble.js';
import { BubbleIcon, BubbleStyle, PREMIUM_BUBBLE_STYLE } from './bubbleStyle.js';
import {
    BubbleTrack,
    computeFrame,
    createTimeline,
    DEFLECTION,
    selectDeflection,
    TimelineFrame,
    TimelineState,
    timelineDuration,
} from './bubbleTimeline.js';
import { TextFactory } from './textFactory.js';

// Where the bubble lives: the track it slides along, centered in a wider region whose width spans the gradient.
export interface BubbleHost {
    track(): BubbleTrack;
    gradientWidth(): number;
}

export interface BubbleWidgetOptions {
    host: BubbleHost;
    textFactory: TextFactory;
    current: number;
    max: number;
    premiumPossible: boolean;
    icon: BubbleIcon | null;
    showFinishes: EventSource<void>;
    scheduler?: FrameScheduler;
    style?: BubbleStyle;
    theme?: Partial<PremiumTheme>;
    measurer?: TextMeasurer;
}

// Scale and rotation (degrees) about the pivot, applied before the shape is drawn.
export interface BubbleTransform {
    pivotX: number;
    pivotY: number;
    scale: number;
    rotation: number;
}

export interface BubblePaint {
    left: number;
    size: Size;
    shape: BubbleShape;
    fill: Fill;
    textColor: Color;
    transform: BubbleTransform | null;
}

export class BubbleWidget {
    private host: BubbleHost;
    private currentCounter: number;
    private maxCounter: number;
    private bubble: Bubble;
    private maxBubbleWidthValue: number;
    private premiumPossible: boolean;
    private style: BubbleStyle;
    private gradient: GradientDefinition;
    private flatColor: Color;
    private textColor: Color;

    private appearance: SimpleAnimation;
    private lifetime = new Lifetime();
    private sizeChangeStream = new EventStream<Size>();
    private repaintStream = new EventStream<void>();

    private size: Size = { width: 0, height: 0 };
    private spaceForDeflection: Size = { width: 0, height: 0 };
    private deflection: number = DEFLECTION;
    private leftPosition: number = 0;
    private timeline: TimelineState | null = null;
    private lastFrame: TimelineFrame | null = null;
    private cachedGradient: GradientSlice | null = null;

    constructor(options: BubbleWidgetOptions) {
        this.host = options.host;
        this.currentCounter = options.current;
        this.maxCounter = options.max;
        this.premiumPossible = options.premiumPossible;
        this.style = options.style ?? PREMIUM_BUBBLE_STYLE;
        const theme = resolveTheme(options.theme);
        this.gradient = createGradient(buttonGradientStops(theme));
        this.flatColor = parseColor(theme.windowBgActive);
        this.textColor = parseColor(theme.activeButtonFg);
        this.appearance = new SimpleAnimation(options.scheduler ?? defaultFrameScheduler());

        this.bubble = new Bubble({
            textFactory: options.textFactory,
            icon: options.icon,
            premiumPossible: options.premiumPossible,
            style: this.style,
            measurer: options.measurer,
        });
        this.maxBubbleWidthValue = this.bubble.countMaxWidth(this.maxCounter);

        this.resizeTo(this.bubble.width(), this.bubble.height());
        this.lifetime.add(this.bubble.widthChanges().subscribe(() => {
            this.resizeTo(this.bubble.width(), this.bubble.height());
        }));
        this.lifetime.add(once(options.showFinishes, () => this.startAppearance()));
        this.lifetime.add(() => this.appearance.stop());
    }

    width(): number {
        return this.size.width;
    }

    height(): number {
        return this.size.height;
    }

    left(): number {
        return this.leftPosition;
    }

    maxBubbleWidth(): number {
        return this.maxBubbleWidthValue;
    }

    counter(): number {
        return this.bubble.counter();
    }

    tailEdge(): number {
        return this.bubble.tailEdge();
    }

    currentDeflection(): number {
        return this.deflection;
    }

    isAnimating(): boolean {
        return this.appearance.animating();
    }

    timelineState(): TimelineState | null {
        return this.timeline;
    }

    lastTimelineFrame(): TimelineFrame | null {
        return this.lastFrame;
    }

    sizeChanges(): EventSource<Size> {
        return this.sizeChangeStream;
    }

    repaints(): EventSource<void> {
        return this.repaintStream;
    }

    // The host's track or gradient width changed; the next paint slices afresh.
    hostResized(): void {
        if (this.lifetime.isDestroyed()) return;
        this.cachedGradient = null;
        this.repaintStream.fire();
    }

    // Ends subscriptions and any running animation; no further ticks fire.
    destroy(): void {
        this.lifetime.destroy();
    }

    paint(): BubblePaint | null {
        if (this.bubble.counter() <= 0) {
            return null;
        }

        const bubbleRect: Rect = {
            x: 0,
            y: this.spaceForDeflection.height,
            width: this.size.width - this.spaceForDeflection.width,
            height: this.size.height - this.spaceForDeflection.height,
        };

        const animating = this.appearance.animating();
        const gradient = animating || !this.cachedGradient
            ? this.computeGradient(bubbleRect.width)
            : this.cachedGradient;
        this.cachedGradient = gradient;

        let transform: BubbleTransform | null = null;
        if (animating && this.lastFrame) {
            transform = {
                pivotX: bubbleRect.x + bubbleRect.width / 2,
                pivotY: bubbleRect.y + bubbleRect.height,
                scale: this.lastFrame.scale,
                rotation: this.lastFrame.rotation,
            };
        }

        const shape = this.bubble.layout(bubbleRect);
        if (!shape) return null;

        const fill: Fill = this.premiumPossible
            ? { type: 'gradient', slice: gradient }
            : { type: 'solid', color: this.flatColor };

        return { left: this.leftPosition, size: { ...this.size }, shape, fill, textColor: this.textColor, transform };
    }

    private resizeTo(width: number, height: number): void {
        this.deflection = selectDeflection(width, this.style.widthLimit);
        this.spaceForDeflection = { width: this.style.skip, height: this.style.skip };
        const next = { width: width + this.spaceForDeflection.width, height: height + this.spaceForDeflection.height };
        if (next.width === this.size.width && next.height === this.size.height) return;
        this.size = next;
        this.sizeChangeStream.fire({ ...next });
    }

    private startAppearance(): void {
        const track = this.host.track();
        const timeline = createTimeline({
            currentValue: this.currentCounter,
            maxValue: this.maxCounter,
            maxBubbleWidth: this.maxBubbleWidthValue,
            track,
        });
        this.timeline = timeline;
        if (timeline.ignoreDeflection) {
            console.log(`[Bubble] Final position overflows the track by ${timeline.edgeFactor.toFixed(3)}, skipping deflection`);
        }
        this.appearance.start(
            value => this.onTick(timeline, value),
            0,
            1,
            timelineDuration(timeline, this.style.slideDuration),
            easeOutCirc
        );
    }

    private onTick(timeline: TimelineState, value: number): void {
        const frame = computeFrame(timeline, value, this.deflection);
        this.lastFrame = frame;
        this.leftPosition = frame.left;
        this.bubble.setCounter(frame.counter);
        this.bubble.setTailEdge(frame.edgeProgress);
        this.repaintStream.fire();
    }

    private computeGradient(width: number): GradientSlice {
        const track = this.host.track();
        return computeCenteredSlice(this.gradient, {
            parentWidth: this.host.gradientWidth(),
            contentWidth: track.width,
            left: this.leftPosition,
            width,
        });
    }
}
