import {
    addDays,
    addMonths,
    differenceInCalendarDays,
    differenceInCalendarMonths,
    endOfMonth,
    format,
    getDate,
    startOfMonth,
    subMonths,
} from 'date-fns';
import { ScoringConfig } from '../config/scoring_config';
import {
    AffordabilityMetrics,
    BalanceMetrics,
    ClassifiedTransaction,
    DebtMetrics,
    ExpenseMetrics,
    IncomeMetrics,
    LoanRequest,
    MetricsBundle,
    RiskMetrics,
} from '../types';
import { monthKey, normalizeText, parseTransactionDate, payeeKey, roundTo } from '../utils/normalization';
import { maxAffordablePrincipal, priceLoan, productTerm } from './loan_pricing';

export interface AggregateOptions {
    loanRequest?: LoanRequest;
    currentBalance?: number | null;
}

interface DatedTransaction {
    item: ClassifiedTransaction;
    date: Date;
    amount: number;
}

const STABLE_SOURCES = ['salary', 'benefits', 'pension'];

function sampleStdDev(values: number[]): number {
    if (values.length < 2) return 0;
    const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
    const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
    return Math.sqrt(variance);
}

function sumBy<T>(items: T[], pick: (item: T) => number): number {
    return items.reduce((sum, item) => sum + pick(item), 0);
}

/** Distinct calendar months spanned by the dates, first to last inclusive (minimum 1). */
export function countMonthsOfData(dates: Date[]): number {
    if (dates.length === 0) return 1;
    const times = dates.map(d => d.getTime());
    const first = new Date(Math.min(...times));
    const last = new Date(Math.max(...times));
    return Math.max(1, differenceInCalendarMonths(last, first) + 1);
}

/**
 * Turns classified transactions into the metrics bundle. Sums use the trailing window of
 * whole calendar months; lender, collector and conduct counts use the full history.
 */
export class MetricsAggregator {
    constructor(private readonly config: ScoringConfig) {}

    aggregate(classified: readonly ClassifiedTransaction[], options: AggregateOptions = {}): MetricsBundle {
        const loan = options.loanRequest ?? this.config.product.defaultLoan;

        const dated: DatedTransaction[] = [];
        for (const item of classified) {
            const date = parseTransactionDate(item.transaction.date);
            const amount = item.transaction.amount;
            if (date && Number.isFinite(amount) && item.classification.subcategory !== 'malformed') {
                dated.push({ item, date, amount });
            }
        }

        const latest = dated.length > 0 ? new Date(Math.max(...dated.map(d => d.date.getTime()))) : null;
        const windowEnd = latest ? endOfMonth(latest) : null;
        const windowStart = latest ? startOfMonth(subMonths(latest, this.config.affordability.lookbackMonths - 1)) : null;
        const inWindow = windowStart && windowEnd
            ? dated.filter(d => d.date >= windowStart && d.date <= windowEnd)
            : [];
        const monthsOfData = countMonthsOfData(inWindow.map(d => d.date));

        const income = this.incomeMetrics(inWindow, monthsOfData);
        const expense = this.expenseMetrics(inWindow, monthsOfData);
        const debt = this.debtMetrics(inWindow, dated, classified, monthsOfData, latest);
        const risk = this.riskMetrics(inWindow, dated, monthsOfData, income.effectiveMonthlyIncome, latest);
        const affordability = this.affordabilityMetrics(income, expense, debt, loan);
        const balance = this.balanceMetrics(inWindow, options.currentBalance ?? null);

        return {
            monthsOfData,
            windowStart: windowStart ? format(windowStart, 'yyyy-MM-dd') : null,
            windowEnd: windowEnd ? format(windowEnd, 'yyyy-MM-dd') : null,
            income,
            expense,
            debt,
            affordability,
            balance,
            risk,
        };
    }

    private incomeMetrics(inWindow: DatedTransaction[], months: number): IncomeMetrics {
        const credits = inWindow.filter(d => d.amount < 0 && d.item.classification.category === 'income');
        const counted = credits.filter(d => d.item.classification.weight > 0);
        const weighted = (d: DatedTransaction) => Math.abs(d.amount) * d.item.classification.weight;

        const gross = sumBy(counted, d => Math.abs(d.amount));
        const totalWeighted = sumBy(counted, weighted);
        const stable = sumBy(counted.filter(d => STABLE_SOURCES.includes(d.item.classification.subcategory)), weighted);
        const gig = sumBy(counted.filter(d => d.item.classification.subcategory === 'gig_economy'), weighted);

        // Per-month weighted income across every month the window's data spans, empty months included
        const monthlyBreakdown: Record<string, number> = {};
        if (inWindow.length > 0) {
            const first = startOfMonth(new Date(Math.min(...inWindow.map(d => d.date.getTime()))));
            for (let m = 0; m < months; m++) {
                monthlyBreakdown[monthKey(addMonths(first, m))] = 0;
            }
        }
        for (const d of counted) {
            const key = monthKey(d.date);
            monthlyBreakdown[key] = roundTo((monthlyBreakdown[key] ?? 0) + weighted(d), 2);
        }

        const perMonth = Object.values(monthlyBreakdown);
        const mean = perMonth.length > 0 ? perMonth.reduce((s, v) => s + v, 0) / perMonth.length : 0;
        let stability = 0;
        if (perMonth.length >= 2 && mean > 0) {
            const cv = (sampleStdDev(perMonth) / mean) * 100;
            stability = roundTo(Math.min(100, Math.max(0, 100 - cv)), 1);
        }

        const payDays = counted
            .filter(d => Math.abs(d.amount) >= this.config.metrics.regularityMinAmount)
            .map(d => getDate(d.date));
        let regularity = 0;
        if (payDays.length >= 2) {
            const spread = sampleStdDev(payDays);
            const band = this.config.metrics.regularityBands.find(b => spread <= b.maxStdDev);
            regularity = band ? band.score : this.config.metrics.regularityOtherwise;
        }

        const sources = Array.from(new Set(counted.map(d => d.item.classification.subcategory))).sort();

        return {
            totalIncome: roundTo(totalWeighted, 2),
            monthlyIncome: roundTo(gross / months, 2),
            monthlyStableIncome: roundTo(stable / months, 2),
            monthlyGigIncome: roundTo(gig / months, 2),
            effectiveMonthlyIncome: roundTo(totalWeighted / months, 2),
            incomeStabilityScore: stability,
            incomeRegularityScore: regularity,
            hasVerifiableIncome: sources.some(s => STABLE_SOURCES.includes(s)),
            incomeSources: sources,
            monthlyBreakdown,
        };
    }

    private expenseMetrics(inWindow: DatedTransaction[], months: number): ExpenseMetrics {
        const debits = inWindow.filter(d => d.amount > 0);
        const totals: Record<string, number> = {};
        for (const d of debits.filter(x => x.item.classification.category === 'essential')) {
            const sub = d.item.classification.subcategory;
            totals[sub] = (totals[sub] ?? 0) + d.amount;
        }

        // Rent and mortgage are alternatives; only the larger one counts
        const housing = Math.max(totals.rent ?? 0, totals.mortgage ?? 0);
        let essential = housing;
        const essentialBreakdown: Record<string, number> = {};
        for (const [sub, total] of Object.entries(totals)) {
            essentialBreakdown[sub] = roundTo(total / months, 2);
            if (sub !== 'rent' && sub !== 'mortgage') essential += total;
        }

        const discretionary = sumBy(debits.filter(d => d.item.classification.category === 'other'), d => d.amount);

        return {
            monthlyHousing: roundTo(housing / months, 2),
            monthlyEssentialTotal: roundTo(essential / months, 2),
            monthlyDiscretionaryTotal: roundTo(discretionary / months, 2),
            essentialBreakdown,
        };
    }

    private debtMetrics(
        inWindow: DatedTransaction[],
        dated: DatedTransaction[],
        all: readonly ClassifiedTransaction[],
        months: number,
        latest: Date | null
    ): DebtMetrics {
        const payments = inWindow.filter(d => d.amount > 0 && d.item.classification.category === 'debt');
        const breakdown: Record<string, number> = {};
        for (const d of payments) {
            const sub = d.item.classification.subcategory;
            breakdown[sub] = (breakdown[sub] ?? 0) + d.amount;
        }
        const debtBreakdown: Record<string, number> = {};
        for (const [sub, total] of Object.entries(breakdown)) {
            debtBreakdown[sub] = roundTo(total / months, 2);
        }

        const isHcstcActivity = (item: ClassifiedTransaction) => {
            const c = item.classification;
            return (c.category === 'debt' && c.subcategory === 'hcstc')
                || (c.category === 'income' && c.subcategory === 'loans' && c.lender !== null);
        };
        const recent = (d: DatedTransaction, days: number) => latest !== null && withinDays(d.date, latest, days);

        const hcstcAll = distinct(all.filter(isHcstcActivity).map(providerKey));
        const hcstc90 = distinct(dated.filter(d => isHcstcActivity(d.item) && recent(d, 90)).map(d => providerKey(d.item)));
        const collectors = distinct(all
            .filter(item => item.classification.category === 'risk' && item.classification.subcategory === 'debt_collection')
            .map(providerKey));
        const newCredit = distinct(dated
            .filter(d => d.amount < 0 && d.item.classification.subcategory === 'loans' && recent(d, 90))
            .map(d => providerKey(d.item)));

        return {
            monthlyDebtPayments: roundTo(sumBy(payments, d => d.amount) / months, 2),
            monthlyHcstcPayments: roundTo((breakdown.hcstc ?? 0) / months, 2),
            activeHcstcCount: hcstcAll,
            activeHcstcCount90d: hcstc90,
            distinctDebtCollectors: collectors,
            newCreditProviders90d: newCredit,
            debtBreakdown,
        };
    }

    private riskMetrics(
        inWindow: DatedTransaction[],
        dated: DatedTransaction[],
        months: number,
        effectiveMonthlyIncome: number,
        latest: Date | null
    ): RiskMetrics {
        const isRisk = (d: DatedTransaction, sub: string) =>
            d.item.classification.category === 'risk' && d.item.classification.subcategory === sub;
        const recent = (d: DatedTransaction, days: number) => latest !== null && withinDays(d.date, latest, days);

        const gamblingTotal = sumBy(inWindow.filter(d => d.amount > 0 && isRisk(d, 'gambling')), d => d.amount);
        const monthlyGambling = gamblingTotal / months;
        let gamblingPercentage = 0;
        if (effectiveMonthlyIncome > 0) {
            gamblingPercentage = roundTo((monthlyGambling / effectiveMonthlyIncome) * 100, 2);
        } else if (gamblingTotal > 0) {
            gamblingPercentage = 100;
        }

        const failed = dated.filter(d => isRisk(d, 'failed_payments'));
        const charges = dated.filter(d => d.amount > 0 && isRisk(d, 'bank_charges'));

        return {
            gamblingTotal: roundTo(gamblingTotal, 2),
            gamblingPercentage,
            failedPaymentsCount: failed.length,
            failedPaymentsCount45d: failed.filter(d => recent(d, 45)).length,
            bankChargesCount: charges.length,
            bankChargesCount90d: charges.filter(d => recent(d, 90)).length,
        };
    }

    private affordabilityMetrics(
        income: IncomeMetrics,
        expense: ExpenseMetrics,
        debt: DebtMetrics,
        loan: LoanRequest
    ): AffordabilityMetrics {
        const { product, affordability } = this.config;
        const incomeBase = income.effectiveMonthlyIncome;
        const essential = expense.monthlyEssentialTotal;
        const debtPayments = debt.monthlyDebtPayments;

        const disposable = roundTo(incomeBase - essential - debtPayments, 2);
        const stressed = roundTo(incomeBase - essential * affordability.expenseBuffer - debtPayments, 2);
        // Priced on a term the product offers, never on a longer requested one
        const termMonths = productTerm(loan.termMonths, product);
        const { monthlyRepayment } = priceLoan(loan.principal, termMonths, product);

        // Zero income: ratios resolve to 0 rather than dividing by zero
        const dti = incomeBase > 0 ? roundTo((debtPayments / incomeBase) * 100, 1) : 0;
        const projected = incomeBase > 0 ? roundTo(((debtPayments + monthlyRepayment) / incomeBase) * 100, 1) : 0;

        return {
            monthlyDisposable: disposable,
            stressedMonthlyDisposable: stressed,
            proposedRepayment: monthlyRepayment,
            postLoanDisposable: roundTo(stressed - monthlyRepayment, 2),
            debtToIncomeRatio: dti,
            projectedDebtToIncomeRatio: projected,
            maxAffordablePrincipal: maxAffordablePrincipal(
                stressed, affordability.minDisposableBuffer, termMonths, product),
        };
    }

    /**
     * Walks end-of-day balances backwards from the current balance, which is taken as the
     * balance at the close of the latest transaction date.
     */
    private balanceMetrics(inWindow: DatedTransaction[], currentBalance: number | null): BalanceMetrics {
        if (currentBalance === null || !Number.isFinite(currentBalance) || inWindow.length === 0) {
            return { averageBalance: null, minimumBalance: null, daysInOverdraft: null };
        }

        const netByDay = new Map<string, number>();
        for (const d of inWindow) {
            const key = format(d.date, 'yyyy-MM-dd');
            netByDay.set(key, (netByDay.get(key) ?? 0) + d.amount);
        }

        const times = inWindow.map(d => d.date.getTime());
        const first = new Date(Math.min(...times));
        const last = new Date(Math.max(...times));
        const days = differenceInCalendarDays(last, first) + 1;

        const balances: number[] = [];
        let balance = currentBalance;
        for (let offset = days - 1; offset >= 0; offset--) {
            balances.push(balance);
            const day = format(addDays(first, offset), 'yyyy-MM-dd');
            // Outflows are positive, so undoing the day adds its net amount back
            balance += netByDay.get(day) ?? 0;
        }

        return {
            averageBalance: roundTo(sumBy(balances, b => b) / balances.length, 2),
            minimumBalance: roundTo(Math.min(...balances), 2),
            daysInOverdraft: balances.filter(b => b < 0).length,
        };
    }
}

function withinDays(date: Date, latest: Date, days: number): boolean {
    const age = differenceInCalendarDays(latest, date);
    return age >= 0 && age <= days;
}

function providerKey(item: ClassifiedTransaction): string {
    return item.classification.lender ?? payeeKey(normalizeText(item.transaction.description));
}

function distinct(keys: string[]): number {
    return new Set(keys.filter(key => key.length > 0)).size;
}
