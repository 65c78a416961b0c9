import { formatColor } from '../colorUtils.js';
import { AccountColumn } from '../limits/accountsRow.js';
import { LimitLineLayout, LineHalf } from '../limits/limitLine.js';
import { ListBoxLayout } from '../limits/listBox.js';
import { toSvgPathData } from '../path.js';
import { paintFill } from './gradientPainter.js';
import { createGroup, createPath, createRect, createSvgElement, createText, createUse } from './svgHelpers.js';

function paintHalf(doc: Document, defs: SVGDefsElement, half: LineHalf, idPrefix: string): SVGPathElement {
    const fill = paintFill(doc, half.fill, idPrefix, half.rect.x, half.rect.y);
    if (fill.definition) {
        defs.appendChild(fill.definition);
    }
    return createPath(doc, toSvgPathData(half.path), { fill: fill.paint });
}

export function paintLimitLine(doc: Document, layout: LimitLineLayout | null, fontSize: number = 13): SVGGElement | null {
    if (!layout) return null;

    const root = createGroup(doc, { class: 'limit-line' });
    const defs = createSvgElement(doc, 'defs');
    root.appendChild(defs);
    root.appendChild(paintHalf(doc, defs, layout.left, 'limit-free'));
    root.appendChild(paintHalf(doc, defs, layout.right, 'limit-premium'));

    for (const label of layout.labels) {
        if (!label.text) continue;
        root.appendChild(createText(doc, label.x, label.y, label.text, {
            fill: formatColor(label.color),
            'font-size': fontSize,
            'font-weight': 600,
            'text-anchor': label.anchor,
            'dominant-baseline': 'hanging',
        }));
    }
    return root;
}

export function paintListBox(doc: Document, layout: ListBoxLayout): SVGSVGElement {
    const svg = createSvgElement(doc, 'svg', {
        width: layout.width,
        height: layout.height,
        viewBox: `0 0 ${layout.width} ${layout.height}`,
    });
    for (const item of layout.items) {
        svg.appendChild(createText(doc, item.subtitle.x, item.subtitle.y,
            item.subtitle.lines.map(text => ({ text })), { 'font-weight': 700, 'dominant-baseline': 'hanging' },
            item.subtitle.lineHeight));
        svg.appendChild(createText(doc, item.description.x, item.description.y,
            item.description.lines.map(text => ({ text })), { 'dominant-baseline': 'hanging' },
            item.description.lineHeight));
        const line = paintLimitLine(doc, item.line.layout());
        if (line) {
            line.setAttribute('transform', `translate(${item.lineRect.x} ${item.lineRect.y})`);
            svg.appendChild(line);
        }
    }
    return svg;
}

export function paintAccountColumn(doc: Document, column: AccountColumn, avatarHref: string): SVGGElement {
    const root = createGroup(doc, { class: 'account-column', transform: `translate(${column.left} 0)` });
    const defs = createSvgElement(doc, 'defs');
    root.appendChild(defs);

    const { photo, badge } = column;
    const size = photo.radius * 2;
    root.appendChild(createUse(doc, avatarHref, photo.x, photo.y, size, size));
    if (column.checked) {
        const ringOriginX = photo.x + photo.radius - column.ring.length / 2;
        const ring = paintFill(doc, { type: 'gradient', slice: column.ring }, 'account-ring', ringOriginX, 0);
        if (ring.definition) defs.appendChild(ring.definition);
        root.appendChild(createSvgElement(doc, 'circle', {
            cx: photo.x + photo.radius,
            cy: photo.y + photo.radius,
            r: photo.radius,
            fill: 'none',
            stroke: ring.paint,
            'stroke-width': photo.ringWidth,
        }));
    }

    root.appendChild(createRect(doc, badge.outer.x, badge.outer.y, badge.outer.width, badge.outer.height, {
        rx: badge.radius,
        fill: formatColor(badge.outerColor),
    }));
    const inner = paintFill(doc, { type: 'gradient', slice: badge.innerFill }, 'account-badge', badge.inner.x, badge.inner.y);
    if (inner.definition) defs.appendChild(inner.definition);
    root.appendChild(createRect(doc, badge.inner.x, badge.inner.y, badge.inner.width, badge.inner.height, {
        rx: badge.innerRadius,
        fill: inner.paint,
    }));
    root.appendChild(createText(doc, badge.inner.x + badge.inner.width / 2, badge.inner.y, badge.text, {
        fill: formatColor(badge.outerColor),
        'text-anchor': 'middle',
        'dominant-baseline': 'hanging',
    }));

    root.appendChild(createText(doc, column.width / 2, column.nameY,
        column.nameLines.map(text => ({ text })), { 'text-anchor': 'middle', 'dominant-baseline': 'hanging' }));
    return root;
}
