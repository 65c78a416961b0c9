export interface PremiumTheme {
    premiumButtonBg1: string;
    premiumButtonBg2: string;
    premiumButtonBg3: string;
    premiumIconBg1: string;
    premiumIconBg2: string;
    premiumButtonFg: string;
    activeButtonFg: string;
    windowBgActive: string;
    windowFg: string;
    windowShadowFg: string;
}

export const PREMIUM_THEME: PremiumTheme = {
    premiumButtonBg1: '#55a5ff',
    premiumButtonBg2: '#a767ff',
    premiumButtonBg3: '#db5c9d',
    premiumIconBg1: '#fea63a',
    premiumIconBg2: '#f4564e',
    premiumButtonFg: '#ffffff',
    activeButtonFg: '#ffffff',
    windowBgActive: '#40a7e3',
    windowFg: '#000000',
    windowShadowFg: '#e6e6e6',
};

export function resolveTheme(overrides: Partial<PremiumTheme> = {}): PremiumTheme {
    return { ...PREMIUM_THEME, ...overrides };
}
