export type TextFactory = (count: number) => string;

// Plural forms keyed by Intl plural category; `{count}` is replaced by the number.
export interface PluralPhrase {
    zero?: string;
    one?: string;
    two?: string;
    few?: string;
    many?: string;
    other: string;
}

export function plainTextFactory(): TextFactory {
    return count => String(count);
}

export function phraseTextFactory(phrase: PluralPhrase, locale: string = 'en'): TextFactory {
    const rules = new Intl.PluralRules(locale);
    return count => {
        const category = rules.select(count);
        const template = phrase[category] ?? phrase.other;
        return template.replace(/\{count\}/g, String(count));
    };
}

export function processTextFactory(phrase?: PluralPhrase | null, locale?: string): TextFactory {
    return phrase ? phraseTextFactory(phrase, locale) : plainTextFactory();
}

// Shows `customText` in place of the number when the count hits `target`.
export function withCustomText(base: TextFactory, target: number, customText?: string): TextFactory {
    if (customText === undefined) return base;
    return count => count === target ? customText : base(count);
}
