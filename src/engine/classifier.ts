import { ScoringConfig } from '../config/scoring_config';
import { CategorySummary, ClassificationResult, ClassifiedTransaction, Transaction } from '../types';
import { roundTo, TextNormalizer } from '../utils/normalization';
import { IncomeDetector, RecurrenceCache } from './income_detector';
import {
    BehavioralMatcher,
    buildResult,
    FallbackMatcher,
    MatchContext,
    PatternTableMatcher,
    StrictTaxonomyMatcher,
    TransactionMatcher,
    WhitelistMatcher,
} from './matchers';
import { PatternLibrary } from './pattern_library';
import { PatternMatcher } from './pattern_matcher';

/**
 * Runs every transaction through a fixed chain:
 * strict taxonomy → whitelist → behavioral income → pattern tables → fallback.
 * The first step that decides wins; the fallback always decides.
 */
export class TransactionClassifier {
    readonly normalizer: TextNormalizer;
    readonly detector: IncomeDetector;
    readonly steps: readonly TransactionMatcher[];
    private readonly fallback: FallbackMatcher;

    constructor(private readonly library: PatternLibrary, config: ScoringConfig) {
        this.normalizer = new TextNormalizer(library.data.lenders);
        this.detector = new IncomeDetector(library, config, this.normalizer);
        this.fallback = new FallbackMatcher(library);
        this.steps = Object.freeze([
            new StrictTaxonomyMatcher(library),
            new WhitelistMatcher(library),
            new BehavioralMatcher(library, this.detector, config.detector.acceptanceThreshold),
            new PatternTableMatcher(library, new PatternMatcher(library.data.matcher)),
            this.fallback,
        ]);
    }

    /**
     * Classifies one transaction. Pass the applicant's RecurrenceCache to let recurring
     * credits count as income; without it only text and taxonomy signals apply.
     */
    classify(transaction: Transaction, index: number = 0, cache: RecurrenceCache | null = null): ClassificationResult {
        const text = this.normalizer.normalizeTransaction(transaction);
        const lender = this.normalizer.findLender(text);

        if (!Number.isFinite(transaction.amount) || !text) {
            return buildResult(this.library, {
                category: 'other',
                subcategory: 'malformed',
                confidence: 0,
                method: 'default',
                step: 'fallback',
                reason: Number.isFinite(transaction.amount) ? 'empty description' : 'non-numeric amount',
                lender,
                weight: 0,
            });
        }

        const context: MatchContext = {
            index,
            transaction,
            text,
            isCredit: transaction.amount < 0,
            lender,
            cache,
        };

        for (const step of this.steps) {
            const result = step.evaluate(context);
            if (result) return result;
        }
        return this.fallback.evaluate(context);
    }

    /** Classifies a whole applicant window with its own recurrence cache. */
    classifyAll(transactions: readonly Transaction[]): ClassifiedTransaction[] {
        const cache = this.detector.buildCache(transactions);
        try {
            return transactions.map((transaction, index) => ({
                index,
                transaction,
                classification: this.classify(transaction, index, cache),
            }));
        } finally {
            cache.clear();
        }
    }

    static summarize(classified: readonly ClassifiedTransaction[]): CategorySummary {
        const summary: CategorySummary = {};
        for (const { transaction, classification } of classified) {
            const byCategory = summary[classification.category] ?? (summary[classification.category] = {});
            const entry = byCategory[classification.subcategory] ?? (byCategory[classification.subcategory] = { count: 0, total: 0 });
            entry.count += 1;
            if (Number.isFinite(transaction.amount)) {
                entry.total = roundTo(entry.total + Math.abs(transaction.amount), 2);
            }
        }
        return summary;
    }
}
