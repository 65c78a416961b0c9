const SVG_NS = 'http://www.w3.org/2000/svg';

export type SvgAttrs = Record<string, string | number>;

export function createSvgElement<K extends keyof SVGElementTagNameMap>(
    doc: Document,
    tag: K,
    attrs: SvgAttrs = {}
): SVGElementTagNameMap[K] {
    const el = doc.createElementNS(SVG_NS, tag);
    for (const [key, value] of Object.entries(attrs)) {
        el.setAttribute(key, String(value));
    }
    return el;
}

export function createGroup(doc: Document, attrs: SvgAttrs = {}): SVGGElement {
    return createSvgElement(doc, 'g', attrs);
}

export function createPath(doc: Document, d: string, attrs: SvgAttrs = {}): SVGPathElement {
    return createSvgElement(doc, 'path', { d, ...attrs });
}

export function createRect(doc: Document, x: number, y: number, width: number, height: number, attrs: SvgAttrs = {}): SVGRectElement {
    return createSvgElement(doc, 'rect', { x, y, width, height, ...attrs });
}

export interface TextLine {
    text: string;
    fontSize?: number;
    fontStyle?: string;
}

export function createText(
    doc: Document,
    x: number,
    y: number,
    content: string | TextLine[],
    attrs: SvgAttrs = {},
    lineHeight: number = 20
): SVGTextElement {
    const text = createSvgElement(doc, 'text', { x, y, ...attrs });

    if (typeof content === 'string') {
        text.textContent = content;
    } else {
        content.forEach((line, i) => {
            const tspan = createSvgElement(doc, 'tspan', {
                x,
                y: y + i * lineHeight,
                ...(line.fontSize ? { 'font-size': line.fontSize } : {}),
                ...(line.fontStyle ? { 'font-style': line.fontStyle } : {}),
            });
            tspan.textContent = line.text;
            text.appendChild(tspan);
        });
    }

    return text;
}

export function createUse(doc: Document, href: string, x: number, y: number, width: number, height: number): SVGUseElement {
    return createSvgElement(doc, 'use', { href: `#${href}`, x, y, width, height });
}
