import { Category, ClassificationResult, MatchMethod, MatcherStep, Transaction } from '../types';
import { Direction, matchesAny, PatternLibrary, profileFor } from './pattern_library';
import { PatternMatcher } from './pattern_matcher';
import { IncomeDetector, RecurrenceCache } from './income_detector';

export interface MatchContext {
    index: number;
    transaction: Transaction;
    text: string;
    isCredit: boolean;
    lender: string | null;
    cache: RecurrenceCache | null;
}

/** One step of the classification chain: a terminal result, or null to pass on. */
export interface TransactionMatcher {
    readonly step: MatcherStep;
    evaluate(context: MatchContext): ClassificationResult | null;
}

interface ResultFields {
    category: Category;
    subcategory: string;
    confidence: number;
    method: MatchMethod;
    step: MatcherStep;
    reason: string;
    lender: string | null;
    weight?: number;
}

export function buildResult(library: PatternLibrary, fields: ResultFields): ClassificationResult {
    const profile = profileFor(library, fields.category, fields.subcategory);
    return Object.freeze({
        category: fields.category,
        subcategory: fields.subcategory,
        label: profile ? profile.label : fields.subcategory,
        confidence: Math.min(Math.max(fields.confidence, 0), 1),
        method: fields.method,
        step: fields.step,
        reason: fields.reason,
        weight: fields.weight ?? (profile ? profile.weight : 1),
        isStable: profile ? profile.isStable : false,
        riskLevel: profile ? profile.riskLevel : 'none',
        isHousing: profile ? profile.isHousing : false,
        lender: fields.lender,
    });
}

type FallbackTable = PatternLibrary['data']['taxonomyFallback']['primary'];

function applies(direction: Direction, isCredit: boolean): boolean {
    return direction === 'any' || (direction === 'credit') === isCredit;
}

export class StrictTaxonomyMatcher implements TransactionMatcher {
    readonly step = 'strict-taxonomy' as const;

    constructor(private readonly library: PatternLibrary) {}

    evaluate(context: MatchContext): ClassificationResult | null {
        const detailed = context.transaction.taxonomyDetailed;
        if (!detailed) return null;
        const rule = this.library.data.strictTaxonomy.find(r =>
            r.detailed === detailed.toUpperCase() && applies(r.appliesTo, context.isCredit));
        if (!rule) return null;
        return buildResult(this.library, {
            category: rule.category,
            subcategory: rule.subcategory,
            confidence: rule.confidence,
            method: 'taxonomy-strict',
            step: this.step,
            reason: `taxonomy ${rule.detailed}`,
            lender: context.lender,
        });
    }
}

/** Credits naming a payment processor, BNPL provider or lender are never income. */
export class WhitelistMatcher implements TransactionMatcher {
    readonly step = 'whitelist' as const;

    constructor(private readonly library: PatternLibrary) {}

    evaluate(context: MatchContext): ClassificationResult | null {
        if (!context.isCredit) return null;
        const hit = this.library.whitelist.find(entry => entry.pattern.test(context.text));
        if (!hit) return null;
        // Marketplace payouts through a processor can be genuine earnings
        if (hit.kind !== 'lender' && matchesAny(this.library.payoutKeywords, context.text)) return null;

        const isLender = hit.kind === 'lender';
        return buildResult(this.library, {
            category: isLender ? 'income' : 'transfer',
            subcategory: isLender ? 'loans' : 'in',
            confidence: isLender ? 0.9 : 0.85,
            method: 'keyword',
            step: this.step,
            reason: `known ${hit.kind} ${hit.name}`,
            lender: context.lender,
            weight: 0,
        });
    }
}

export class BehavioralMatcher implements TransactionMatcher {
    readonly step = 'behavioral' as const;

    constructor(
        private readonly library: PatternLibrary,
        private readonly detector: IncomeDetector,
        private readonly acceptanceThreshold: number
    ) {}

    evaluate(context: MatchContext): ClassificationResult | null {
        if (!context.isCredit) return null;
        const verdict = this.detector.assess(context.transaction, context.index, context.text, context.cache);
        if (!verdict.isIncome || verdict.confidence < this.acceptanceThreshold) return null;
        return buildResult(this.library, {
            category: 'income',
            subcategory: verdict.sourceType ?? 'other',
            confidence: verdict.confidence,
            method: 'behavioral',
            step: this.step,
            reason: verdict.reason,
            lender: context.lender,
        });
    }
}

export class PatternTableMatcher implements TransactionMatcher {
    readonly step = 'pattern-table' as const;

    constructor(private readonly library: PatternLibrary, private readonly matcher: PatternMatcher) {}

    evaluate(context: MatchContext): ClassificationResult | null {
        for (const table of this.library.tables) {
            if (!applies(table.appliesTo, context.isCredit)) continue;
            const best = this.matcher.bestMatch(context.text, table);
            if (!best) continue;
            return buildResult(this.library, {
                category: table.category,
                subcategory: best.entry.subcategory,
                confidence: best.outcome.confidence,
                method: best.outcome.method,
                step: this.step,
                reason: `${best.outcome.method} "${best.outcome.evidence}"`,
                lender: context.lender,
            });
        }
        return null;
    }
}

/** Terminal step: coarse taxonomy mapping, else a generic low-confidence bucket. Always decides. */
export class FallbackMatcher implements TransactionMatcher {
    readonly step = 'fallback' as const;

    constructor(private readonly library: PatternLibrary) {}

    evaluate(context: MatchContext): ClassificationResult {
        const { taxonomyFallback, fallback } = this.library.data;
        const { taxonomyDetailed, taxonomyPrimary } = context.transaction;

        const lookups: [string | null | undefined, FallbackTable][] = [
            [taxonomyDetailed, taxonomyFallback.detailed],
            [taxonomyPrimary, taxonomyFallback.primary],
        ];
        for (const [code, table] of lookups) {
            if (!code) continue;
            const key = code.toUpperCase();
            if (!Object.prototype.hasOwnProperty.call(table, key)) continue;
            const target = table[key];
            if (!applies(target.appliesTo, context.isCredit)) continue;
            return buildResult(this.library, {
                category: target.category,
                subcategory: target.subcategory,
                confidence: taxonomyFallback.confidence,
                method: 'taxonomy-fallback',
                step: this.step,
                reason: `taxonomy ${key}`,
                lender: context.lender,
            });
        }

        const generic = context.isCredit ? fallback.credit : fallback.debit;
        return buildResult(this.library, {
            category: generic.category,
            subcategory: generic.subcategory,
            confidence: fallback.confidence,
            method: 'default',
            step: this.step,
            reason: context.isCredit ? 'unrecognised credit' : 'unrecognised debit',
            lender: context.lender,
            weight: generic.weight,
        });
    }
}
