import { colorsClose, formatColor, parseColor, rgba } from '../src/colorUtils.js';
import {
    colorAt,
    computeCenteredSlice,
    createGradient,
    reverseGradient,
    sliceGradient,
    sliceToGradient,
} from '../src/gradient/gradient.js';
import { fullHeightGradientStops, paletteGradient, slicePalette } from '../src/gradient/palettes.js';
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

const RED = rgba(255, 0, 0);
const BLUE = rgba(0, 0, 255);
const redToBlue = () => createGradient([
    { position: 0, color: '#ff0000' },
    { position: 1, color: '#0000ff' },
]);

function runAllGradientSliceTests(): void {
    results = [];

    // Color parsing
    {
        test('parseColor - short form', colorsClose(parseColor('#f00'), RED));
        test('parseColor - alpha channel', parseColor('#00000080').a === 128 / 255);
        test('parseColor - rejects names', throws(() => parseColor('red')));
        test('formatColor - opaque', formatColor(rgba(85, 165, 255)) === '#55a5ff', formatColor(rgba(85, 165, 255)));
        test('formatColor - translucent', formatColor(rgba(0, 0, 0, 0)) === '#00000000');
    }

    // Definition validation
    {
        test('createGradient - empty rejected', throws(() => createGradient([])));
        test('createGradient - out of range rejected', throws(() => createGradient([{ position: 1.5, color: '#000' }])));
        test('createGradient - duplicate position rejected', throws(() => createGradient([
            { position: 0.5, color: '#000' },
            { position: 0.5, color: '#fff' },
        ])));
        test('createGradient - decreasing rejected', throws(() => createGradient([
            { position: 0.6, color: '#000' },
            { position: 0.2, color: '#fff' },
        ])));
        test('createGradient - single stop accepted', !throws(() => createGradient([{ position: 0.3, color: '#000' }])));
    }

    // Sampling
    {
        const g = redToBlue();
        test('colorAt - clamps below', colorsClose(colorAt(g, -2), RED));
        test('colorAt - clamps above', colorsClose(colorAt(g, 3), BLUE));
        test('colorAt - NaN reads as 0', colorsClose(colorAt(g, NaN), RED));
        test('colorAt - midpoint', colorsClose(colorAt(g, 0.5), rgba(127.5, 0, 127.5)));

        const held = createGradient([
            { position: 0.2, color: '#ff0000' },
            { position: 0.8, color: '#0000ff' },
        ]);
        test('colorAt - held before first stop', colorsClose(colorAt(held, 0.1), RED));
        test('colorAt - held after last stop', colorsClose(colorAt(held, 0.9), BLUE));
    }

    // Slicing a 200px red-to-blue reference at [50, 100]
    {
        const slice = sliceGradient(redToBlue(), 50, 50, 200);
        test('Slice - start is a quarter of the way', colorsClose(slice.start, rgba(191.25, 0, 63.75)),
             JSON.stringify(slice.start));
        test('Slice - end is halfway', colorsClose(slice.end, rgba(127.5, 0, 127.5)), JSON.stringify(slice.end));
        test('Slice - length is the slice width', slice.length === 50);
        test('Slice - horizontal by default', slice.axis === 'horizontal');
    }

    // Full-width slice reproduces the endpoints
    {
        const g = paletteGradient('button');
        const slice = sliceGradient(g, 0, 300, 300);
        test('Full slice - start', colorsClose(slice.start, parseColor(PREMIUM_THEME.premiumButtonBg1)));
        test('Full slice - end', colorsClose(slice.end, parseColor(PREMIUM_THEME.premiumButtonBg3)));

        const asGradient = sliceToGradient(slice);
        test('sliceToGradient - two stops', asGradient.stops.length === 2);
        test('sliceToGradient - same endpoints', colorsClose(colorAt(asGradient, 1), slice.end));
    }

    // Adjacent slices meet without a seam
    {
        const g = paletteGradient('button');
        const cuts = [0, 37, 110, 181.5, 240];
        for (let i = 0; i < cuts.length - 1; i++) {
            const a = sliceGradient(g, cuts[i], cuts[i + 1] - cuts[i], 240);
            const next = i + 2 < cuts.length ? sliceGradient(g, cuts[i + 1], cuts[i + 2] - cuts[i + 1], 240) : null;
            if (next) {
                test(`Seam at ${cuts[i + 1]}`, colorsClose(a.end, next.start),
                     `${formatColor(a.end)} vs ${formatColor(next.start)}`);
            }
        }
    }

    // Out-of-range slice still yields endpoint colors
    {
        const original = console.warn;
        let warnings = 0;
        console.warn = () => {
            warnings++;
        };
        const slice = sliceGradient(redToBlue(), -20, 260, 200);
        console.warn = original;
        test('Overflowing slice - sampled without warnings', warnings === 0);
        test('Overflowing slice - start clamped', colorsClose(slice.start, RED));
        test('Overflowing slice - end clamped', colorsClose(slice.end, BLUE));
    }

    // Content of 300 centered in a 400 parent, 100 wide at left 10
    {
        const slice = computeCenteredSlice(redToBlue(), { parentWidth: 400, contentWidth: 300, left: 10, width: 100 });
        test('Centered slice - start shifted by half the margin', colorsClose(slice.start, rgba(216.75, 0, 38.25)),
             JSON.stringify(slice.start));
        test('Centered slice - end', colorsClose(slice.end, rgba(153, 0, 102)), JSON.stringify(slice.end));
        test('Centered slice - equal widths mean no shift',
             colorsClose(computeCenteredSlice(redToBlue(), { parentWidth: 200, contentWidth: 200, left: 50, width: 50 }).start,
                         rgba(191.25, 0, 63.75)));
    }

    // Reversal mirrors positions
    {
        const reversed = reverseGradient(createGradient(fullHeightGradientStops()));
        const positions = reversed.stops.map(s => s.position);
        test('Reverse - four stops', positions.length === 4);
        test('Reverse - starts at 0', positions[0] === 0);
        test('Reverse - ends at 1', positions[3] === 1);
        test('Reverse - mirrored middle stops',
             Math.abs(positions[1] - 0.45) < 1e-9 && Math.abs(positions[2] - 0.72) < 1e-9, positions.join(', '));
        test('Reverse - first color was last',
             colorsClose(reversed.stops[0].color, parseColor(PREMIUM_THEME.premiumButtonBg1)));
        test('Reverse - last color was first',
             colorsClose(reversed.stops[3].color, parseColor(PREMIUM_THEME.premiumIconBg1)));
    }

    // Named palettes
    {
        const slice = slicePalette('limit', 0, 50, 200);
        test('Limit palette - holds the first color over the first quarter',
             colorsClose(slice.start, slice.end), `${formatColor(slice.start)} vs ${formatColor(slice.end)}`);
        const themed = paletteGradient('button', { ...PREMIUM_THEME, premiumButtonBg1: '#000000' });
        test('Palette - theme override', colorsClose(themed.stops[0].color, rgba(0, 0, 0)));
    }
}

export function runGradientSliceTests(): { passed: number; failed: number; failures: string[] } {
    runAllGradientSliceTests();
    const passed = results.filter(r => r.passed).length;
    const failed = results.filter(r => !r.passed).length;
    const failures = results.filter(r => !r.passed).map(r => r.details ? `${r.name}: ${r.details}` : r.name);
    return { passed, failed, failures };
}

if (import.meta.url === `file://${process.argv[1]}`) {
    const { passed, failed, failures } = runGradientSliceTests();
    console.log(`Gradient Slice: ${passed} passed, ${failed} failed`);
    if (failures.length > 0) {
        for (const f of failures) console.log(`  ${f}`);
    }
    process.exit(failed > 0 ? 1 : 0);
}
