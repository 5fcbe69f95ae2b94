import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Category } from '../types';
import { ConfigurationError } from '../utils/errors';
import { deepFreeze, DeepReadonly } from '../utils/deep_freeze';
import { normalizeText } from '../utils/normalization';

export const DEFAULT_PATTERN_LIBRARY_PATH = path.join(__dirname, '../../config/patterns.json');

/** Pattern tables are consulted in this order; the order is not configurable. */
export const PATTERN_CATEGORY_ORDER = ['risk', 'debt', 'essential', 'income', 'positive', 'transfer'] as const;
export type PatternCategory = typeof PATTERN_CATEGORY_ORDER[number];

export type Direction = 'credit' | 'debit' | 'any';

// Targets the classifier and aggregator resolve to without a pattern entry
const REQUIRED_SUBCATEGORIES: readonly [Category, string][] = [
    ['income', 'salary'],
    ['income', 'benefits'],
    ['income', 'pension'],
    ['income', 'gig_economy'],
    ['income', 'other'],
    ['income', 'loans'],
    ['transfer', 'in'],
    ['other', 'malformed'],
];

const directionSchema = z.enum(['credit', 'debit', 'any']);
const categorySchema = z.enum(['income', 'debt', 'essential', 'risk', 'transfer', 'positive', 'other']);
const riskLevelSchema = z.enum(['none', 'low', 'medium', 'high', 'very-high', 'critical']);
const keywordList = z.array(z.string().min(1));

const profileSchema = z.object({
    label: z.string().min(1),
    weight: z.number().min(0).max(1).default(1),
    isStable: z.boolean().default(false),
    riskLevel: riskLevelSchema.default('none'),
    isHousing: z.boolean().default(false),
});

const profileTable = z.record(z.string(), profileSchema);

const entrySchema = z.object({
    subcategory: z.string().min(1),
    keywords: keywordList,
    regex: z.array(z.string().min(1)).default([]),
    keywordConfidence: z.number().min(0).max(1).optional(),
    regexConfidence: z.number().min(0).max(1).optional(),
});

const tableSchema = z.object({
    appliesTo: directionSchema,
    minConfidence: z.number().min(0).max(1),
    entries: z.array(entrySchema).min(1),
});

const targetSchema = z.object({
    appliesTo: directionSchema,
    category: categorySchema,
    subcategory: z.string().min(1),
});

export const patternLibrarySchema = z.object({
    version: z.string().min(1),
    matcher: z.object({
        keywordConfidence: z.number().min(0).max(1),
        regexConfidence: z.number().min(0).max(1),
        fuzzyConfidence: z.number().min(0).max(1),
        fuzzyThreshold: z.number().min(0).max(1),
        fuzzyMinKeywordLength: z.number().int().min(1),
    }),
    lenders: z.record(z.string().min(1), z.string().regex(/^[A-Z0-9_]+$/)),
    subcategories: z.object({
        income: profileTable,
        debt: profileTable,
        essential: profileTable,
        risk: profileTable,
        transfer: profileTable,
        positive: profileTable,
        other: profileTable,
    }),
    categories: z.object({
        risk: tableSchema,
        debt: tableSchema,
        essential: tableSchema,
        income: tableSchema,
        positive: tableSchema,
        transfer: tableSchema,
    }),
    strictTaxonomy: z.array(targetSchema.extend({
        detailed: z.string().min(1),
        confidence: z.number().min(0).max(1),
    })),
    taxonomyFallback: z.object({
        detailed: z.record(z.string(), targetSchema),
        primary: z.record(z.string(), targetSchema),
        confidence: z.number().min(0).max(1),
    }),
    fallback: z.object({
        confidence: z.number().min(0).max(1),
        credit: z.object({ category: categorySchema, subcategory: z.string(), weight: z.number().min(0).max(1) }),
        debit: z.object({ category: categorySchema, subcategory: z.string(), weight: z.number().min(0).max(1) }),
    }),
    whitelist: z.array(z.object({
        name: z.string().min(1),
        kind: z.enum(['processor', 'bnpl', 'lender']),
    })),
    payoutKeywords: keywordList,
    incomeSignals: z.object({
        payrollKeywords: keywordList,
        benefitKeywords: keywordList,
        pensionKeywords: keywordList,
        exclusionKeywords: keywordList,
        nonIncomeKeywords: keywordList,
        companySuffixPattern: z.string().min(1),
        genericWords: keywordList,
        wageTaxonomy: keywordList,
        retirementTaxonomy: keywordList,
        transferInTaxonomy: keywordList,
    }),
});

export type PatternLibraryData = z.infer<typeof patternLibrarySchema>;
export type SubcategoryProfile = z.infer<typeof profileSchema>;
export type TaxonomyTarget = z.infer<typeof targetSchema>;

/**
 * Whole-word keyword matcher. A boundary is only asserted on sides where the keyword
 * starts or ends with a letter or digit, so "FP-" still matches "FP-ACME".
 */
export function compileKeyword(keyword: string): RegExp {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const left = /^[A-Z0-9_]/.test(keyword) ? '(?<![A-Z0-9_])' : '';
    const right = /[A-Z0-9_]$/.test(keyword) ? '(?![A-Z0-9_])' : '';
    return new RegExp(`${left}${escaped}${right}`);
}

export interface CompiledKeyword {
    text: string;
    pattern: RegExp;
}

export interface CompiledEntry {
    category: PatternCategory;
    subcategory: string;
    keywords: CompiledKeyword[];
    regexes: RegExp[];
    keywordConfidence: number;
    regexConfidence: number;
}

export interface CompiledTable {
    category: PatternCategory;
    appliesTo: Direction;
    minConfidence: number;
    entries: CompiledEntry[];
}

export interface WhitelistEntry {
    name: string;
    kind: 'processor' | 'bnpl' | 'lender';
    pattern: RegExp;
}

export interface KeywordSet {
    words: string[];
    patterns: RegExp[];
}

export interface PatternLibrary {
    version: string;
    source: string;
    data: DeepReadonly<PatternLibraryData>;
    tables: DeepReadonly<CompiledTable[]>;
    whitelist: DeepReadonly<WhitelistEntry[]>;
    payoutKeywords: DeepReadonly<KeywordSet>;
    signals: DeepReadonly<{
        payroll: KeywordSet;
        benefits: KeywordSet;
        pension: KeywordSet;
        exclusion: KeywordSet;
        nonIncome: KeywordSet;
        companySuffix: RegExp;
    }>;
}

function keywordSet(words: readonly string[]): KeywordSet {
    const upper = words.map(word => normalizeText(word));
    return { words: upper, patterns: upper.map(compileKeyword) };
}

export function matchesAny(set: DeepReadonly<KeywordSet>, text: string): boolean {
    return set.patterns.some(pattern => pattern.test(text));
}

export function profileFor(
    library: PatternLibrary,
    category: Category,
    subcategory: string
): DeepReadonly<SubcategoryProfile> | null {
    const table = library.data.subcategories[category];
    return Object.prototype.hasOwnProperty.call(table, subcategory) ? table[subcategory] : null;
}

function compileRegex(source: string, key: string, problems: string[]): RegExp | null {
    try {
        return new RegExp(source, 'i');
    } catch (err: unknown) {
        problems.push(`${key}: ${err instanceof Error ? err.message : String(err)}`);
        return null;
    }
}

function checkTarget(
    data: PatternLibraryData,
    category: Category,
    subcategory: string,
    key: string,
    problems: string[]
): void {
    if (!Object.prototype.hasOwnProperty.call(data.subcategories[category], subcategory)) {
        problems.push(`${key}: unknown subcategory ${category}/${subcategory}`);
    }
}

/**
 * Validates raw library data and compiles every keyword and regex once.
 * Throws ConfigurationError listing each offending key.
 */
export function buildPatternLibrary(raw: unknown, source: string = 'pattern library'): PatternLibrary {
    const parsed = patternLibrarySchema.safeParse(raw);
    if (!parsed.success) {
        throw ConfigurationError.fromZod(source, parsed.error);
    }
    const data = parsed.data;
    const problems: string[] = [];
    const { matcher } = data;

    const tables: CompiledTable[] = PATTERN_CATEGORY_ORDER.map(category => {
        const table = data.categories[category];
        const entries = table.entries.map((entry, i): CompiledEntry => {
            const key = `categories.${category}.entries.${i}`;
            checkTarget(data, category, entry.subcategory, `${key}.subcategory`, problems);
            const regexes: RegExp[] = [];
            entry.regex.forEach((src, j) => {
                const compiled = compileRegex(src, `${key}.regex.${j}`, problems);
                if (compiled) regexes.push(compiled);
            });
            return {
                category,
                subcategory: entry.subcategory,
                keywords: entry.keywords.map(word => {
                    const text = normalizeText(word);
                    return { text, pattern: compileKeyword(text) };
                }),
                regexes,
                keywordConfidence: entry.keywordConfidence ?? matcher.keywordConfidence,
                regexConfidence: entry.regexConfidence ?? matcher.regexConfidence,
            };
        });
        return { category, appliesTo: table.appliesTo, minConfidence: table.minConfidence, entries };
    });

    data.strictTaxonomy.forEach((rule, i) =>
        checkTarget(data, rule.category, rule.subcategory, `strictTaxonomy.${i}`, problems));
    for (const level of ['detailed', 'primary'] as const) {
        for (const [code, target] of Object.entries(data.taxonomyFallback[level])) {
            checkTarget(data, target.category, target.subcategory, `taxonomyFallback.${level}.${code}`, problems);
        }
    }
    checkTarget(data, data.fallback.credit.category, data.fallback.credit.subcategory, 'fallback.credit', problems);
    checkTarget(data, data.fallback.debit.category, data.fallback.debit.subcategory, 'fallback.debit', problems);
    for (const [category, subcategory] of REQUIRED_SUBCATEGORIES) {
        checkTarget(data, category, subcategory, `subcategories.${category}.${subcategory}`, problems);
    }

    const companySuffix = compileRegex(data.incomeSignals.companySuffixPattern, 'incomeSignals.companySuffixPattern', problems);

    if (problems.length > 0 || !companySuffix) {
        throw new ConfigurationError(source, problems);
    }

    const { incomeSignals } = data;
    return deepFreeze({
        version: data.version,
        source,
        data,
        tables,
        whitelist: data.whitelist.map(item => {
            const name = normalizeText(item.name);
            return { name, kind: item.kind, pattern: compileKeyword(name) };
        }),
        payoutKeywords: keywordSet(data.payoutKeywords),
        signals: {
            payroll: keywordSet(incomeSignals.payrollKeywords),
            benefits: keywordSet(incomeSignals.benefitKeywords),
            pension: keywordSet(incomeSignals.pensionKeywords),
            exclusion: keywordSet(incomeSignals.exclusionKeywords),
            nonIncome: keywordSet(incomeSignals.nonIncomeKeywords),
            companySuffix,
        },
    });
}

export function loadPatternLibrary(filePath: string = DEFAULT_PATTERN_LIBRARY_PATH): PatternLibrary {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(filePath, ['(file)'], `Cannot read pattern library ${filePath}: ${reason}`);
    }
    const library = buildPatternLibrary(raw, filePath);
    console.log(`[Config] Pattern library ${library.version} loaded (${library.tables.length} tables)`);
    return library;
}
