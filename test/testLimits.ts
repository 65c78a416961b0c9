import { plainTextFactory } from '../src/bubble/textFactory.js';
import { colorsClose, parseColor, rgba } from '../src/colorUtils.js';
import { colorAt } from '../src/gradient/gradient.js';
import { paletteGradient } from '../src/gradient/palettes.js';
import { AccountsRow } from '../src/limits/accountsRow.js';
import { LimitLine, limitLineFromNumbers } from '../src/limits/limitLine.js';
import { ListEntry, showList } from '../src/limits/listBox.js';
import { colorListRows } from '../src/limits/listColoring.js';
import { toSvgPathData } from '../src/path.js';
import { PREMIUM_THEME } from '../src/theme.js';

interface TestResult {
    name: string;
    passed: boolean;
    details: string;
}

let results: TestResult[] = [];

function test(name: string, passed: boolean, details: string = '') {
    results.push({ name, passed, details });
}

function throws(fn: () => unknown): boolean {
    try {
        fn();
        return false;
    } catch {
        return true;
    }
}

const ENTRIES: ListEntry[] = [
    { subtitle: 'Groups', description: 'Join more groups', leftNumber: 500, rightNumber: 1000 },
    { subtitle: 'Pins', description: 'Pin more chats', leftNumber: 5, rightNumber: 10 },
    { subtitle: 'Folders', description: 'Make more folders', leftNumber: 5, rightNumber: 10, customRightText: 'Unlimited' },
];

function runAllLimitsTests(): void {
    results = [];
    const button = paletteGradient('button');

    // Limit line halves
    {
        const line = new LimitLine({ max: '500', min: '250' });
        let repaints = 0;
        line.repaints().subscribe(() => repaints++);
        test('Line - no layout before sizing', line.layout() === null);
        line.resize(300);
        const layout = line.layout();
        test('Line - repainted on resize', repaints === 1);
        test('Line - laid out', layout !== null);
        if (layout) {
            test('Line - left half', layout.left.rect.x === 0 && layout.left.rect.width === 150);
            test('Line - right half', layout.right.rect.x === 150 && layout.right.rect.width === 150);
            test('Line - left is neutral',
                 layout.left.fill.type === 'solid' && colorsClose(layout.left.fill.color, parseColor(PREMIUM_THEME.windowShadowFg)));
            const right = layout.right.fill;
            test('Line - right is a gradient slice', right.type === 'gradient');
            if (right.type === 'gradient') {
                test('Line - slice starts mid-gradient', colorsClose(right.slice.start, colorAt(button, 0.5)));
                test('Line - slice ends on the last stop', colorsClose(right.slice.end, parseColor(PREMIUM_THEME.premiumButtonBg3)));
            }
            const d = toSvgPathData(layout.right.path);
            test('Line - right half rounds its outer corners',
                 d === 'M 150 0 L 294 0 A 6 6 0 0 1 300 6 L 300 24 A 6 6 0 0 1 294 30 L 150 30 L 150 0 Z', d);

            const labels = layout.labels.map(l => `${l.text}@${l.x},${l.y}:${l.anchor}`).join(' ');
            test('Line - labels', labels === 'Free@10,7:start 250@140,7:end Premium@160,7:start 500@290,7:end', labels);
            test('Line - right labels use the active color',
                 colorsClose(layout.labels[3].color, parseColor(PREMIUM_THEME.activeButtonFg)));
        }

        line.resize(0);
        test('Line - zero width ignored', line.width() === 300 && repaints === 1);
    }

    // Narrow line elides the premium label
    {
        const line = new LimitLine({ max: '500', min: '250' });
        line.resize(160);
        const premium = line.layout()?.labels[2];
        test('Elide - shortened', premium !== undefined && premium.text === 'Pre…' && premium.x === 90,
             premium ? `${premium.text}@${premium.x}` : 'missing');
    }

    // Odd widths give the extra pixel to the right half
    {
        const line = new LimitLine({ max: '1', min: '0' });
        line.resize(301);
        const layout = line.layout();
        test('Odd width - split', layout !== null && layout.left.rect.width === 150 && layout.right.rect.width === 151);
    }

    // Line centered in a wider parent
    {
        const line = new LimitLine({ max: '500', min: '250' });
        line.resize(300, 400);
        const right = line.layout()?.right.fill;
        test('Parent - slice shifted by the margin',
             right !== undefined && right.type === 'gradient' &&
             colorsClose(right.slice.start, colorAt(button, 0.5)) && colorsClose(right.slice.end, colorAt(button, 0.875)));
    }

    // Override
    {
        const line = new LimitLine({ max: '500', min: '250' });
        let repaints = 0;
        line.repaints().subscribe(() => repaints++);
        line.setColorOverride({ type: 'solid', color: rgba(1, 2, 3) });
        test('Override - unsized line stays quiet', repaints === 0);
        line.resize(200);
        const right = line.layout()?.right.fill;
        test('Override - replaces the gradient',
             right !== undefined && right.type === 'solid' && colorsClose(right.color, rgba(1, 2, 3)));
        line.setColorOverride(null);
        test('Override - cleared', line.colorOverride() === null && line.layout()?.right.fill.type === 'gradient' && repaints === 2);
    }

    // Numbers to labels
    {
        const empty = limitLineFromNumbers(0, plainTextFactory(), 0);
        empty.resize(200);
        const texts = empty.layout()?.labels.map(l => l.text).join('|');
        test('Numbers - zero means no label', texts === 'Free||Premium|', texts ?? 'missing');
        const full = limitLineFromNumbers(1000, plainTextFactory(), 500);
        full.resize(200);
        test('Numbers - formatted', full.layout()?.labels[3].text === '1000' && full.layout()?.labels[1].text === '500');
    }

    // Row coloring
    {
        const rows = [{ top: 10, height: 30 }, { top: 50, height: 30 }, { top: 90, height: 30 }];
        const slices = colorListRows(rows);
        test('Rows - one slice per row', slices.length === 3);
        test('Rows - vertical', slices.every(s => s.axis === 'vertical' && s.length === 30));
        test('Rows - top starts on the reversed first color',
             colorsClose(slices[0].start, parseColor(PREMIUM_THEME.premiumButtonBg1)));
        test('Rows - bottom ends on the first full-height color',
             colorsClose(slices[2].end, parseColor(PREMIUM_THEME.premiumIconBg1)));
        test('Rows - too few rows rejected', throws(() => colorListRows(rows.slice(0, 2))));

        const custom = colorListRows(rows, [{ position: 0, color: '#ff0000' }, { position: 1, color: '#0000ff' }]);
        test('Rows - custom stops reversed', colorsClose(custom[0].start, rgba(0, 0, 255)) && colorsClose(custom[2].end, rgba(255, 0, 0)));
    }

    // List box
    {
        const list = showList(ENTRIES);
        test('List - items', list.items.length === 3);
        test('List - title', list.title === 'Doubled Limits');
        test('List - lines span the padded width', list.items.every(item => item.lineRect.width === 320 && item.line.width() === 320));
        const tops = list.items.map(item => item.lineRect.y).join(',');
        test('List - line positions', tops === '60,158,256', tops);
        test('List - height', list.height === 302, `got ${list.height}`);
        test('List - subtitle block', list.items[0].subtitle.y === 14 && list.items[0].subtitle.lines.join('|') === 'Groups');

        const first = list.items[0].line.colorOverride();
        const last = list.items[2].line.colorOverride();
        test('List - lines colored top to bottom',
             first !== null && first.type === 'gradient' && colorsClose(first.slice.start, parseColor(PREMIUM_THEME.premiumButtonBg1)));
        test('List - sweep ends on the icon color',
             last !== null && last.type === 'gradient' && colorsClose(last.slice.end, parseColor(PREMIUM_THEME.premiumIconBg1)));

        const customLabels = list.items[2].line.layout()?.labels.map(l => l.text).join('|');
        test('List - custom right text', customLabels === 'Free|5|Premium|Unlimited', customLabels ?? 'missing');
        test('List - needs three entries', throws(() => showList(ENTRIES.slice(0, 2))));
    }

    // Accounts row
    {
        const row = new AccountsRow({ names: ['Alice', 'Bob', 'Carol'], selected: 0 });
        const changes: number[] = [];
        row.changes().subscribe(i => changes.push(i));
        test('Accounts - no columns before sizing', row.columns().length === 0);
        row.resize(300);
        const columns = row.columns();
        test('Accounts - equal columns', columns.length === 3 && columns[1].left === 100 && columns[2].width === 100);
        test('Accounts - ring slice under the photo',
             columns[0].ring.length === 66 && colorsClose(columns[0].ring.start, colorAt(button, 17 / 300)));
        test('Accounts - second ring continues the sweep', colorsClose(columns[1].ring.start, colorAt(button, 117 / 300)));
        test('Accounts - badge slice', colorsClose(columns[0].badge.innerFill.start, colorAt(button, 39 / 300)) &&
             columns[0].badge.innerFill.length === 22);
        test('Accounts - badge placement',
             columns[0].badge.outer.x === 37 && columns[0].badge.outer.y === 53 && columns[0].badge.inner.y === 55,
             JSON.stringify(columns[0].badge.outer));
        test('Accounts - name under the photo', columns[0].nameY === 69 && columns[0].nameLines.join('|') === 'Alice');
        test('Accounts - first checked', columns[0].checked && !columns[2].checked);

        row.select(2);
        test('Accounts - selection fires', changes.join(',') === '2' && row.selected() === 2);
        test('Accounts - checks move', !row.columns()[0].checked && row.columns()[2].checked);
        row.select(2);
        row.select(5);
        test('Accounts - unchanged or invalid selection is quiet', changes.length === 1 && row.selected() === 2);
    }

    // Long account names
    {
        const row = new AccountsRow({ names: ['Alexandria Maximiliana Bartholomew Smith', 'Bo'], selected: 1 });
        row.resize(200);
        const lines = row.columns()[0].nameLines;
        test('Accounts - name capped at two lines', lines.length === 2 && lines[0] === 'Alexandria', lines.join('|'));
        test('Accounts - overflow elided', lines[1] === 'Maximiliana Ba…', lines[1]);
    }
}

export function runLimitsTests(): { passed: number; failed: number; failures: string[] } {
    runAllLimitsTests();
    const passed = results.filter(r => r.passed).length;
    const failed = results.filter(r => !r.passed).length;
    const failures = results.filter(r => !r.passed).map(r => r.details ? `${r.name}: ${r.details}` : r.name);
    return { passed, failed, failures };
}

if (import.meta.url === `file://${process.argv[1]}`) {
    const { passed, failed, failures } = runLimitsTests();
    console.log(`Limits: ${passed} passed, ${failed} failed`);
    if (failures.length > 0) {
        for (const f of failures) console.log(`  ${f}`);
    }
    process.exit(failed > 0 ? 1 : 0);
}
