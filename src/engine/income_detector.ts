import { differenceInCalendarDays, getDate } from 'date-fns';
import { ScoringConfig } from '../config/scoring_config';
import { FrequencyBand, IncomeVerdict, RecurringIncomeSource, Transaction } from '../types';
import { parseTransactionDate, payeeKey, roundTo, specificWords, TextNormalizer } from '../utils/normalization';
import { matchesAny, PatternLibrary } from './pattern_library';

const FREQUENCY_BANDS: readonly FrequencyBand[] = ['weekly', 'fortnightly', 'monthly', 'quarterly'];

interface Candidate {
    index: number;
    amount: number;
    date: Date;
    payee: string;
}

/**
 * Recurring-credit lookup for ONE applicant. Built once from the whole window, then
 * consulted per transaction. Never share an instance between applicants.
 */
export class RecurrenceCache {
    private readonly byIndex = new Map<number, RecurringIncomeSource>();
    private sources: readonly RecurringIncomeSource[];

    constructor(sources: readonly RecurringIncomeSource[]) {
        this.sources = sources;
        for (const source of sources) {
            for (const index of source.transactionIndices) {
                this.byIndex.set(index, source);
            }
        }
    }

    lookup(index: number): RecurringIncomeSource | null {
        return this.byIndex.get(index) ?? null;
    }

    get size(): number {
        return this.sources.length;
    }

    clear(): void {
        this.byIndex.clear();
        this.sources = [];
    }
}

export class IncomeDetector {
    private readonly normalizer: TextNormalizer;

    constructor(
        private readonly library: PatternLibrary,
        private readonly config: ScoringConfig,
        normalizer?: TextNormalizer
    ) {
        this.normalizer = normalizer ?? new TextNormalizer(library.data.lenders);
    }

    /**
     * Groups credits by payer, then by amount (greedy, chronological, seeded by the earliest
     * unassigned credit), and keeps clusters whose spacing falls in one frequency band.
     */
    findRecurringSources(transactions: readonly Transaction[]): RecurringIncomeSource[] {
        const { detector } = this.config;
        const candidates: Candidate[] = [];

        transactions.forEach((txn, index) => {
            if (!Number.isFinite(txn.amount) || txn.amount >= 0) return;
            const amount = Math.abs(txn.amount);
            if (amount < detector.minAmount) return;
            const date = parseTransactionDate(txn.date);
            if (!date) return;
            const text = this.normalizer.normalizeTransaction(txn);
            if (matchesAny(this.library.signals.exclusion, text) || matchesAny(this.library.signals.nonIncome, text)) return;
            candidates.push({ index, amount, date, payee: payeeKey(text) });
        });

        candidates.sort((a, b) => a.date.getTime() - b.date.getTime() || a.index - b.index);

        const assigned = new Set<number>();
        const sources: RecurringIncomeSource[] = [];

        for (const seed of candidates) {
            if (assigned.has(seed.index)) continue;
            const cluster = candidates.filter(c =>
                !assigned.has(c.index)
                && c.payee === seed.payee
                && Math.abs(c.amount - seed.amount) / seed.amount <= detector.amountTolerance);
            cluster.forEach(c => assigned.add(c.index));

            if (cluster.length < detector.minOccurrences) continue;
            const source = this.describeCluster(cluster, sources.length + 1);
            if (source) sources.push(source);
        }

        return sources;
    }

    buildCache(transactions: readonly Transaction[]): RecurrenceCache {
        return new RecurrenceCache(this.findRecurringSources(transactions));
    }

    /**
     * Priority-ordered income verdict for one transaction. `text` is the normalized
     * description; without a cache the recurrence signal is skipped.
     */
    assess(transaction: Transaction, index: number, text: string, cache: RecurrenceCache | null): IncomeVerdict {
        const { signals } = this.library;
        const tuning = this.config.detector.signals;

        if (!Number.isFinite(transaction.amount) || transaction.amount >= 0) {
            return verdict(false, 0, 'not_credit', null);
        }
        const amount = Math.abs(transaction.amount);

        if (matchesAny(signals.exclusion, text)) {
            return verdict(false, 0.95, 'internal_transfer_vocabulary', null);
        }
        if (matchesAny(signals.nonIncome, text)) {
            return verdict(false, 0.9, 'loan_or_expense_service', null);
        }

        const detailed = transaction.taxonomyDetailed ?? '';
        const incomeSignals = this.library.data.incomeSignals;
        if (incomeSignals.wageTaxonomy.includes(detailed)) {
            return verdict(true, tuning.taxonomyWageConfidence, 'taxonomy_wages', 'salary');
        }
        if (incomeSignals.retirementTaxonomy.includes(detailed)) {
            return verdict(true, tuning.taxonomyRetirementConfidence, 'taxonomy_retirement', 'pension');
        }

        if (matchesAny(signals.payroll, text)) {
            return verdict(true, tuning.payrollConfidence, 'payroll_keyword', 'salary');
        }
        if (matchesAny(signals.benefits, text)) {
            return verdict(true, tuning.benefitsConfidence, 'benefits_keyword', 'benefits');
        }
        if (matchesAny(signals.pension, text)) {
            return verdict(true, tuning.pensionConfidence, 'pension_keyword', 'pension');
        }

        const named = specificWords(text, incomeSignals.genericWords);
        if (signals.companySuffix.test(text)
            && named.length >= tuning.employerMinSpecificWords
            && amount >= tuning.employerMinAmount) {
            return verdict(true, tuning.employerConfidence, 'employer_name', 'salary');
        }

        const recurring = cache ? cache.lookup(index) : null;
        if (recurring) {
            return verdict(true, recurring.confidence, `recurring_${recurring.frequency}`, recurring.sourceType);
        }

        if (amount >= tuning.largeCreditMinAmount && named.length >= tuning.largeCreditMinSpecificWords) {
            return verdict(true, tuning.largeCreditConfidence, 'large_named_credit', 'other');
        }

        const primary = transaction.taxonomyPrimary ?? '';
        if (incomeSignals.transferInTaxonomy.includes(primary) || incomeSignals.transferInTaxonomy.includes(detailed)) {
            return verdict(false, 0.6, 'taxonomy_transfer_in', null);
        }

        return verdict(false, 0, 'no_income_signal', null);
    }

    /** Single-transaction variant: runs the recurrence search over `transactions` on every call. */
    detect(transactions: readonly Transaction[], index: number): IncomeVerdict {
        const transaction = transactions[index];
        if (!transaction) {
            return verdict(false, 0, 'not_credit', null);
        }
        const text = this.normalizer.normalizeTransaction(transaction);
        return this.assess(transaction, index, text, this.buildCache(transactions));
    }

    private describeCluster(cluster: Candidate[], ordinal: number): RecurringIncomeSource | null {
        const { detector } = this.config;
        const intervals: number[] = [];
        for (let i = 1; i < cluster.length; i++) {
            intervals.push(differenceInCalendarDays(cluster[i].date, cluster[i - 1].date));
        }

        const bandOf = (days: number): FrequencyBand | null =>
            FREQUENCY_BANDS.find(band => {
                const range = detector.intervalBands[band];
                return days >= range.min && days <= range.max;
            }) ?? null;

        const counts = new Map<FrequencyBand, number>();
        for (const days of intervals) {
            const band = bandOf(days);
            if (band) counts.set(band, (counts.get(band) ?? 0) + 1);
        }

        let modal: FrequencyBand | null = null;
        let modalCount = 0;
        for (const band of FREQUENCY_BANDS) {
            const count = counts.get(band) ?? 0;
            if (count > modalCount) {
                modal = band;
                modalCount = count;
            }
        }
        if (!modal || modalCount / intervals.length < detector.modalShare) return null;
        const frequency = modal;

        const amounts = cluster.map(c => c.amount);
        const average = amounts.reduce((sum, a) => sum + a, 0) / amounts.length;
        const maxDeviation = Math.max(...amounts.map(a => Math.abs(a - average) / average));
        const inBand = intervals.filter(days => bandOf(days) === frequency);
        const intervalDays = inBand.reduce((sum, d) => sum + d, 0) / inBand.length;

        const days = cluster.map(c => getDate(c.date)).sort((a, b) => a - b);
        const medianDay = days[Math.floor(days.length / 2)];
        const dayOfMonthConsistent = frequency === 'monthly'
            && cluster.length >= detector.confidence.dayOfMonthMinOccurrences
            && days.every(day => Math.abs(day - medianDay) <= detector.confidence.dayOfMonthTolerance);

        const tuning = detector.confidence;
        const raw = tuning.base
            + tuning.perOccurrence * Math.min(cluster.length, tuning.occurrenceCap)
            + tuning.bandBonus[frequency]
            + (dayOfMonthConsistent ? tuning.dayOfMonthBonus : 0);
        const confidence = roundTo(Math.min(Math.max(raw * (1 - maxDeviation), 0), tuning.max), 2);

        const salaryBand = frequency !== 'quarterly';
        return {
            id: `recurring-${ordinal}`,
            amountAvg: roundTo(average, 2),
            maxDeviation: roundTo(maxDeviation, 4),
            frequency,
            intervalDays: roundTo(intervalDays, 1),
            occurrenceCount: cluster.length,
            transactionIndices: cluster.map(c => c.index),
            dayOfMonthConsistent,
            sourceType: salaryBand && average >= detector.salaryMinAmount ? 'salary' : 'other',
            confidence,
        };
    }
}

function verdict(
    isIncome: boolean,
    confidence: number,
    reason: string,
    sourceType: IncomeVerdict['sourceType']
): IncomeVerdict {
    return { isIncome, confidence, reason, sourceType };
}
