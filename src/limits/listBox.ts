import { plainTextFactory, withCustomText } from '../bubble/textFactory.js';
import { BOX_STYLE } from '../boxStyle.js';
import { FontMetrics, TextMeasurer, createApproximateMeasurer, wrapText } from '../text.js';
import { Margins, Rect } from '../geometry.js';
import { PremiumTheme } from '../theme.js';
import { LIMIT_LINE_STYLE, LimitLine, LimitLineStyle, limitLineFromNumbers } from './limitLine.js';
import { colorListRows } from './listColoring.js';

export interface ListEntry {
    subtitle: string;
    description: string;
    leftNumber: number;
    rightNumber: number;
    customRightText?: string;
}

export interface ListBoxStyle {
    width: number;
    title: string;
    titlePadding: Margins;
    descriptionPadding: Margins;
    linePadding: Margins;
    titleFont: FontMetrics;
    descriptionFont: FontMetrics;
    line: LimitLineStyle;
}

export const LIST_BOX_STYLE: ListBoxStyle = {
    width: BOX_STYLE.wideWidth,
    title: 'Doubled Limits',
    titlePadding: { left: 22, top: 14, right: 22, bottom: 2 },
    descriptionPadding: { left: 22, top: 0, right: 22, bottom: 6 },
    linePadding: { left: 22, top: 4, right: 22, bottom: 8 },
    titleFont: { fontSize: 14, charWidthFactor: 0.6, lineHeight: 18 },
    descriptionFont: { fontSize: 13, charWidthFactor: 0.55, lineHeight: 16 },
    line: LIMIT_LINE_STYLE,
};

export interface TextBlock {
    x: number;
    y: number;
    lines: string[];
    lineHeight: number;
}

export interface ListBoxItem {
    subtitle: TextBlock;
    description: TextBlock;
    line: LimitLine;
    lineRect: Rect;
}

export interface ListBoxLayout {
    title: string;
    width: number;
    height: number;
    items: ListBoxItem[];
}

export interface ShowListOptions {
    style?: ListBoxStyle;
    theme?: Partial<PremiumTheme>;
}

function layoutText(text: string, top: number, width: number, padding: Margins, measurer: TextMeasurer): TextBlock {
    const lines = wrapText(text, width - padding.left - padding.right, measurer);
    return { x: padding.left, y: top + padding.top, lines, lineHeight: measurer.fontHeight };
}

function blockBottom(block: TextBlock, padding: Margins): number {
    return block.y + block.lines.length * block.lineHeight + padding.bottom;
}

// Lays out subtitle, description and limit line per entry, then colors the lines as one vertical sweep.
export function showList(entries: readonly ListEntry[], options: ShowListOptions = {}): ListBoxLayout {
    const style = options.style ?? LIST_BOX_STYLE;
    const { width, titlePadding, descriptionPadding, linePadding } = style;
    const titleMeasurer = createApproximateMeasurer(style.titleFont);
    const descriptionMeasurer = createApproximateMeasurer(style.descriptionFont);

    const items: ListBoxItem[] = [];
    let y = 0;
    for (const entry of entries) {
        const subtitle = layoutText(entry.subtitle, y, width, titlePadding, titleMeasurer);
        y = blockBottom(subtitle, titlePadding);
        const description = layoutText(entry.description, y, width, descriptionPadding, descriptionMeasurer);
        y = blockBottom(description, descriptionPadding);

        const factory = withCustomText(plainTextFactory(), entry.rightNumber, entry.customRightText);
        const line = limitLineFromNumbers(entry.rightNumber, factory, entry.leftNumber, {
            style: style.line,
            theme: options.theme,
        });
        const lineRect = {
            x: linePadding.left,
            y: y + linePadding.top,
            width: width - linePadding.left - linePadding.right,
            height: line.height(),
        };
        line.resize(lineRect.width, width);
        y = lineRect.y + lineRect.height + linePadding.bottom;

        items.push({ subtitle, description, line, lineRect });
    }

    const slices = colorListRows(items.map(item => ({ top: item.lineRect.y, height: item.lineRect.height })));
    items.forEach((item, i) => {
        item.line.setColorOverride({ type: 'gradient', slice: slices[i] });
    });

    return { title: style.title, width, height: y + linePadding.bottom, items };
}
