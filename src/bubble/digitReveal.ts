import { TextMeasurer } from '../text.js';

export interface RollingDigit {
    from: string;
    to: string;
}

// Text bookkeeping for the rolling-digit counter; glyph animation is the painter's concern.
export class DigitReveal {
    private measurer: TextMeasurer;
    private onWidthChanged: (() => void) | null;
    private fromText: string = '';
    private toText: string = '';
    private fromWidth: number = 0;
    private toWidth: number = 0;
    private currentValue: number = 0;
    private rolling: boolean = false;

    constructor(measurer: TextMeasurer, onWidthChanged: (() => void) | null = null) {
        this.measurer = measurer;
        this.onWidthChanged = onWidthChanged;
    }

    setText(text: string, value: number): void {
        if (text === this.toText && value === this.currentValue) return;
        const previousWidth = this.countWidth();
        this.fromText = this.toText;
        this.fromWidth = this.toWidth;
        this.toText = text;
        this.toWidth = this.measurer.width(text);
        this.currentValue = value;
        this.rolling = this.fromText !== '' && this.fromText !== text;
        if (this.countWidth() !== previousWidth) {
            this.onWidthChanged?.();
        }
    }

    finishAnimating(): void {
        this.rolling = false;
    }

    isRolling(): boolean {
        return this.rolling;
    }

    text(): string {
        return this.toText;
    }

    value(): number {
        return this.currentValue;
    }

    countWidth(): number {
        return this.toWidth;
    }

    // Widest of the two texts taking part in the current transition.
    maxWidth(): number {
        return Math.max(this.fromWidth, this.toWidth);
    }

    // Digits aligned from the right; a missing position rolls from or to an empty slot.
    rollingDigits(): RollingDigit[] {
        const from = [...this.fromText];
        const to = [...this.toText];
        const count = Math.max(from.length, to.length);
        const digits: RollingDigit[] = [];
        for (let i = 0; i < count; i++) {
            const fromIndex = from.length - count + i;
            const toIndex = to.length - count + i;
            digits.push({
                from: this.rolling && fromIndex >= 0 ? from[fromIndex] : '',
                to: toIndex >= 0 ? to[toIndex] : '',
            });
        }
        return digits;
    }
}
