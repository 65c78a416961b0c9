export interface TextMeasurer {
    readonly fontHeight: number;
    width(text: string): number;
}

export interface FontMetrics {
    fontSize: number;
    charWidthFactor: number;
    lineHeight: number;
}

// Width estimate from character count; real text shaping belongs to the host.
export function createApproximateMeasurer(metrics: FontMetrics): TextMeasurer {
    return {
        fontHeight: metrics.lineHeight,
        width: text => Math.ceil([...text].length * metrics.fontSize * metrics.charWidthFactor),
    };
}

export function wrapText(text: string, maxWidth: number, measurer: TextMeasurer): string[] {
    const words = text.split(' ');
    const lines: string[] = [];
    let currentLine = '';
    for (const word of words) {
        const testLine = currentLine ? `${currentLine} ${word}` : word;
        if (measurer.width(testLine) > maxWidth && currentLine) {
            lines.push(currentLine);
            currentLine = word;
        } else {
            currentLine = testLine;
        }
    }
    if (currentLine) lines.push(currentLine);
    return lines;
}

const ELLIPSIS = '…';

export function elideText(text: string, maxWidth: number, measurer: TextMeasurer): string {
    if (measurer.width(text) <= maxWidth) return text;
    const chars = [...text];
    while (chars.length > 0) {
        chars.pop();
        const candidate = chars.join('').trimEnd() + ELLIPSIS;
        if (measurer.width(candidate) <= maxWidth) return candidate;
    }
    return '';
}
