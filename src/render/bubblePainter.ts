import { BubblePaint, BubbleTransform } from '../bubble/bubbleWidget.js';
import { formatColor } from '../colorUtils.js';
import { toSvgPathData } from '../path.js';
import { paintFill } from './gradientPainter.js';
import { createGroup, createPath, createSvgElement, createText, createUse } from './svgHelpers.js';

function formatTransform(t: BubbleTransform): string {
    return `translate(${t.pivotX} ${t.pivotY}) scale(${t.scale}) rotate(${t.rotation}) translate(${-t.pivotX} ${-t.pivotY})`;
}

// Mirrors BubbleWidget.paint(): nothing to draw yields null.
export function paintBubble(doc: Document, paint: BubblePaint | null): SVGGElement | null {
    if (!paint) return null;

    const { shape } = paint;
    const root = createGroup(doc, { class: 'counter-bubble', transform: `translate(${paint.left} 0)` });
    const body = createGroup(doc, paint.transform ? { transform: formatTransform(paint.transform) } : {});
    root.appendChild(body);

    const fill = paintFill(doc, paint.fill, 'bubble-gradient');
    if (fill.definition) {
        const defs = createSvgElement(doc, 'defs');
        defs.appendChild(fill.definition);
        root.insertBefore(defs, body);
    }

    body.appendChild(createPath(doc, toSvgPathData(shape.path), {
        fill: fill.paint,
        'fill-rule': 'nonzero',
        stroke: fill.paint,
        'stroke-width': shape.penWidth,
        'stroke-linecap': 'round',
        'stroke-linejoin': 'round',
    }));

    if (shape.icon) {
        const { id, x, y, width, height } = shape.icon;
        body.appendChild(createUse(doc, id, x, y, width, height));
    }

    body.appendChild(createText(doc, shape.text.x, shape.text.y, shape.text.value, {
        fill: formatColor(paint.textColor),
        'font-size': shape.text.fontSize,
        'dominant-baseline': 'hanging',
    }));

    return root;
}
