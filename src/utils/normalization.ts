import { parse, format, isValid } from 'date-fns';

const ISO_DATE = 'yyyy-MM-dd';
const TOKEN_CHARS = 'A-Z0-9_';

/**
 * Parses an ISO calendar date (YYYY-MM-DD). Returns null for anything else,
 * including impossible dates such as 2024-02-30.
 */
export function parseTransactionDate(dateStr: string | null | undefined): Date | null {
    if (!dateStr || typeof dateStr !== 'string') return null;
    const trimmed = dateStr.trim().slice(0, 10);
    const parsed = parse(trimmed, ISO_DATE, new Date(2000, 0, 1));
    if (!isValid(parsed)) return null;
    return format(parsed, ISO_DATE) === trimmed ? parsed : null;
}

export function monthKey(date: Date): string {
    return format(date, 'yyyy-MM');
}

/**
 * Uppercases, trims and collapses internal whitespace. Total: null/undefined yield ''.
 */
export function normalizeText(raw: string | null | undefined): string {
    if (!raw || typeof raw !== 'string') return '';
    return raw.toUpperCase().replace(/\s+/g, ' ').trim();
}

function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rewrites known high-cost lender spellings to one canonical token
 * ("LENDINGSTREAM", "LENDING STREAM" -> "LENDING_STREAM").
 */
export class TextNormalizer {
    private readonly variants: { pattern: RegExp; canonical: string }[];
    private readonly canonicalIds: Set<string>;

    constructor(lenderVariants: Readonly<Record<string, string>>) {
        // Longest variant first so "MR LENDER" wins over any shorter overlapping spelling
        this.variants = Object.entries(lenderVariants)
            .map(([variant, canonical]) => ({ variant: normalizeText(variant), canonical }))
            .sort((a, b) => b.variant.length - a.variant.length || a.variant.localeCompare(b.variant))
            .map(({ variant, canonical }) => ({
                pattern: new RegExp(`(?<![${TOKEN_CHARS}])${escapeRegex(variant)}(?![${TOKEN_CHARS}])`, 'g'),
                canonical
            }));
        this.canonicalIds = new Set(Object.values(lenderVariants));
    }

    normalize(raw: string | null | undefined): string {
        return this.canonicalizeLenders(normalizeText(raw));
    }

    /** Description plus merchant name, when the merchant adds something the description lacks. */
    normalizeTransaction(transaction: { description?: string | null; merchantName?: string | null }): string {
        const description = this.normalize(transaction.description);
        const merchant = this.normalize(transaction.merchantName);
        if (!merchant || description.includes(merchant)) return description;
        return description ? `${description} ${merchant}` : merchant;
    }

    canonicalizeLenders(text: string): string {
        let result = text;
        for (const { pattern, canonical } of this.variants) {
            result = result.replace(pattern, canonical);
        }
        return result;
    }

    /** Canonical lender id present in already-normalized text, if any. */
    findLender(normalized: string): string | null {
        for (const token of normalized.split(' ')) {
            if (this.canonicalIds.has(token)) return token;
        }
        return null;
    }
}

/**
 * Stable key for "who is this payee", used to count distinct collectors and providers.
 * Drops reference numbers and keeps the first three remaining words.
 */
export function payeeKey(normalized: string): string {
    const words = normalized
        .replace(/\bREF\b[\s:.]*[A-Z0-9]+\b/g, ' ')
        .split(' ')
        .filter(word => word.length > 0 && !/\d/.test(word));
    return words.slice(0, 3).join(' ');
}

/** Words that plausibly identify a payer: longer than three characters, not generic, not numeric. */
export function specificWords(normalized: string, genericWords: readonly string[]): string[] {
    return normalized
        .split(' ')
        .filter(word => word.length > 3 && !genericWords.includes(word) && !/^[\d\W_]+$/.test(word));
}

export function roundTo(value: number, decimals: number = 2): number {
    const factor = 10 ** decimals;
    return Math.round((value + Number.EPSILON) * factor) / factor;
}
