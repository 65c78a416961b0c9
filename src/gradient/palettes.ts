import { PREMIUM_THEME, PremiumTheme } from '../theme.js';
import { createGradient, GradientDefinition, GradientSlice, sliceGradient, StopInput } from './gradient.js';

export function buttonGradientStops(theme: PremiumTheme = PREMIUM_THEME): StopInput[] {
    return [
        { position: 0, color: theme.premiumButtonBg1 },
        { position: 0.6, color: theme.premiumButtonBg2 },
        { position: 1, color: theme.premiumButtonBg3 },
    ];
}

export function lockGradientStops(theme: PremiumTheme = PREMIUM_THEME): StopInput[] {
    return buttonGradientStops(theme);
}

// Holds the first color over the leading quarter.
export function limitGradientStops(theme: PremiumTheme = PREMIUM_THEME): StopInput[] {
    return [
        { position: 0, color: theme.premiumButtonBg1 },
        { position: 0.25, color: theme.premiumButtonBg1 },
        { position: 0.85, color: theme.premiumButtonBg2 },
        { position: 1, color: theme.premiumButtonBg3 },
    ];
}

export function fullHeightGradientStops(theme: PremiumTheme = PREMIUM_THEME): StopInput[] {
    return [
        { position: 0, color: theme.premiumIconBg1 },
        { position: 0.28, color: theme.premiumIconBg2 },
        { position: 0.55, color: theme.premiumButtonBg2 },
        { position: 1, color: theme.premiumButtonBg1 },
    ];
}

export type PaletteName = 'button' | 'lock' | 'limit' | 'fullHeight';

const PALETTES: Record<PaletteName, (theme: PremiumTheme) => StopInput[]> = {
    button: buttonGradientStops,
    lock: lockGradientStops,
    limit: limitGradientStops,
    fullHeight: fullHeightGradientStops,
};

export function paletteGradient(name: PaletteName, theme: PremiumTheme = PREMIUM_THEME): GradientDefinition {
    return createGradient(PALETTES[name](theme));
}

export function slicePalette(
    name: PaletteName,
    offset: number,
    sliceWidth: number,
    referenceWidth: number,
    theme: PremiumTheme = PREMIUM_THEME
): GradientSlice {
    return sliceGradient(paletteGradient(name, theme), offset, sliceWidth, referenceWidth);
}
