import { loadScoringConfig, ScoringConfig } from '../../config/scoring_config';
import { MetricsBundle, Transaction } from '../../types';
import { loadPatternLibrary, PatternLibrary } from '../pattern_library';

let cached: { library: PatternLibrary; config: ScoringConfig } | null = null;

/** Shipped library and policy, loaded once per test process. */
export function shippedConfig(): { library: PatternLibrary; config: ScoringConfig } {
    if (!cached) {
        cached = { library: loadPatternLibrary(), config: loadScoringConfig() };
    }
    return cached;
}

export function txn(date: string, amount: number, description: string, extra: Partial<Transaction> = {}): Transaction {
    return { date, amount, description, ...extra };
}

/** Three months of payroll and rent, plus one payday-lender repayment. */
export function salariedHistory(): Transaction[] {
    return [
        txn('2026-07-01', 800, 'RENT PAYMENT LANDLORD'),
        txn('2026-07-25', -2500, 'BGC ACME WIDGETS LTD'),
        txn('2026-08-01', 800, 'RENT PAYMENT LANDLORD'),
        txn('2026-08-25', -2500, 'BGC ACME WIDGETS LTD'),
        txn('2026-09-01', 800, 'RENT PAYMENT LANDLORD'),
        txn('2026-09-10', 150, 'LENDING STREAM PAYMENT'),
        txn('2026-09-25', -2500, 'BGC ACME WIDGETS LTD'),
    ];
}

/** A bundle that earns full marks and trips no rule; override fields per test. */
export function strongMetrics(): MetricsBundle {
    return {
        monthsOfData: 3,
        windowStart: '2026-07-01',
        windowEnd: '2026-09-30',
        income: {
            totalIncome: 7500,
            monthlyIncome: 2500,
            monthlyStableIncome: 2500,
            monthlyGigIncome: 0,
            effectiveMonthlyIncome: 2500,
            incomeStabilityScore: 100,
            incomeRegularityScore: 100,
            hasVerifiableIncome: true,
            incomeSources: ['salary'],
            monthlyBreakdown: { '2026-07': 2500, '2026-08': 2500, '2026-09': 2500 },
        },
        expense: {
            monthlyHousing: 800,
            monthlyEssentialTotal: 800,
            monthlyDiscretionaryTotal: 0,
            essentialBreakdown: { rent: 800 },
        },
        debt: {
            monthlyDebtPayments: 50,
            monthlyHcstcPayments: 0,
            activeHcstcCount: 0,
            activeHcstcCount90d: 0,
            distinctDebtCollectors: 0,
            newCreditProviders90d: 0,
            debtBreakdown: {},
        },
        affordability: {
            monthlyDisposable: 1650,
            stressedMonthlyDisposable: 1570,
            proposedRepayment: 246.6,
            postLoanDisposable: 1323.4,
            debtToIncomeRatio: 2,
            projectedDebtToIncomeRatio: 11.9,
            maxAffordablePrincipal: 1500,
        },
        balance: { averageBalance: 1000, minimumBalance: 250, daysInOverdraft: 0 },
        risk: {
            gamblingTotal: 0,
            gamblingPercentage: 0,
            failedPaymentsCount: 0,
            failedPaymentsCount45d: 0,
            bankChargesCount: 0,
            bankChargesCount90d: 0,
        },
    };
}
