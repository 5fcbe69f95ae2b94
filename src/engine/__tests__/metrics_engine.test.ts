import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TransactionClassifier } from '../classifier';
import { AggregateOptions, countMonthsOfData, MetricsAggregator } from '../metrics_engine';
import { maxAffordablePrincipal, priceLoan, productTerm } from '../loan_pricing';
import { parseTransactionDate } from '../../utils/normalization';
import { Transaction } from '../../types';
import { salariedHistory, shippedConfig, txn } from './fixtures';

const { library, config } = shippedConfig();
const classifier = new TransactionClassifier(library, config);
const aggregator = new MetricsAggregator(config);

function metricsFor(transactions: Transaction[], options: AggregateOptions = {}) {
    return aggregator.aggregate(classifier.classifyAll(transactions), options);
}

function date(value: string): Date {
    const parsed = parseTransactionDate(value);
    assert.ok(parsed);
    return parsed;
}

function tightBudgetHistory(): Transaction[] {
    return ['07', '08', '09'].flatMap(month => [
        txn(`2026-${month}-01`, 1000, 'RENT PAYMENT LANDLORD'),
        txn(`2026-${month}-25`, -1500, 'BGC ACME WIDGETS LTD'),
    ]);
}

describe('countMonthsOfData', () => {
    it('counts calendar months spanned, inclusive', () => {
        assert.equal(countMonthsOfData([date('2026-07-31'), date('2026-09-01')]), 3);
        assert.equal(countMonthsOfData([date('2026-09-01'), date('2026-09-30')]), 1);
        assert.equal(countMonthsOfData([]), 1);
    });
});

describe('loan pricing', () => {
    const { product } = config;

    it('charges daily interest over the term', () => {
        assert.deepEqual(priceLoan(500, 4, product), { monthlyRepayment: 246.6, totalRepayable: 986.4 });
    });

    it('caps total interest at the principal', () => {
        assert.deepEqual(priceLoan(1500, 6, product), { monthlyRepayment: 500, totalRepayable: 3000 });
    });

    it('prices nothing for an empty offer', () => {
        assert.deepEqual(priceLoan(0, 4, product), { monthlyRepayment: 0, totalRepayable: 0 });
    });

    it('derives the largest affordable principal from the monthly surplus', () => {
        assert.equal(maxAffordablePrincipal(1570, 50, 4, product), 1500);
        assert.equal(maxAffordablePrincipal(150, 50, 3, product), 173.45);
        assert.equal(maxAffordablePrincipal(40, 50, 3, product), 0);
    });

    it('picks the longest product term within the request', () => {
        assert.equal(productTerm(12, product), 6);
        assert.equal(productTerm(5, product), 5);
        assert.equal(productTerm(2, product), 3);
    });
});

describe('MetricsAggregator.aggregate', () => {
    it('builds the salaried applicant bundle', () => {
        const metrics = metricsFor(salariedHistory(), { currentBalance: 6000 });

        assert.equal(metrics.monthsOfData, 3);
        assert.equal(metrics.windowStart, '2026-07-01');
        assert.equal(metrics.windowEnd, '2026-09-30');

        assert.equal(metrics.income.monthlyIncome, 2500);
        assert.equal(metrics.income.effectiveMonthlyIncome, 2500);
        assert.equal(metrics.income.monthlyStableIncome, 2500);
        assert.equal(metrics.income.incomeStabilityScore, 100);
        assert.equal(metrics.income.incomeRegularityScore, 100);
        assert.equal(metrics.income.hasVerifiableIncome, true);
        assert.deepEqual(metrics.income.incomeSources, ['salary']);
        assert.deepEqual(metrics.income.monthlyBreakdown, { '2026-07': 2500, '2026-08': 2500, '2026-09': 2500 });

        assert.deepEqual(metrics.expense, {
            monthlyHousing: 800,
            monthlyEssentialTotal: 800,
            monthlyDiscretionaryTotal: 0,
            essentialBreakdown: { rent: 800 },
        });

        assert.deepEqual(metrics.debt, {
            monthlyDebtPayments: 50,
            monthlyHcstcPayments: 50,
            activeHcstcCount: 1,
            activeHcstcCount90d: 1,
            distinctDebtCollectors: 0,
            newCreditProviders90d: 0,
            debtBreakdown: { hcstc: 50 },
        });

        assert.deepEqual(metrics.affordability, {
            monthlyDisposable: 1650,
            stressedMonthlyDisposable: 1570,
            proposedRepayment: 246.6,
            postLoanDisposable: 1323.4,
            debtToIncomeRatio: 2,
            projectedDebtToIncomeRatio: 11.9,
            maxAffordablePrincipal: 1500,
        });

        assert.deepEqual(metrics.balance, { averageBalance: 2236.21, minimumBalance: 250, daysInOverdraft: 0 });
    });

    it('prices a request longer than any product term on the longest term', () => {
        const metrics = metricsFor(tightBudgetHistory(), { loanRequest: { principal: 1500, termMonths: 12 } });
        assert.deepEqual(metrics.affordability, {
            monthlyDisposable: 500,
            stressedMonthlyDisposable: 400,
            proposedRepayment: 500,
            postLoanDisposable: -100,
            debtToIncomeRatio: 0,
            projectedDebtToIncomeRatio: 33.3,
            maxAffordablePrincipal: 1050,
        });
    });

    it('keeps income outside the trailing window out of the sums', () => {
        const metrics = metricsFor([txn('2026-04-25', -2500, 'BGC ACME WIDGETS LTD'), ...salariedHistory()]);
        assert.equal(metrics.income.effectiveMonthlyIncome, 2500);
        assert.equal(metrics.monthsOfData, 3);
    });

    it('counts lenders across all history but only recent ones for 90 days', () => {
        const metrics = metricsFor([txn('2026-04-01', 90, 'DRAFTY REPAYMENT'), ...salariedHistory()]);
        assert.equal(metrics.debt.activeHcstcCount, 2);
        assert.equal(metrics.debt.activeHcstcCount90d, 1);
    });

    it('counts lender disbursements as new credit providers', () => {
        const metrics = metricsFor([
            ...salariedHistory(),
            txn('2026-09-20', -300, 'LENDING STREAM'),
            txn('2026-09-21', -200, 'DRAFTY'),
        ]);
        assert.equal(metrics.debt.newCreditProviders90d, 2);
        assert.equal(metrics.debt.activeHcstcCount90d, 2);
        // Disbursements carry no weight
        assert.equal(metrics.income.effectiveMonthlyIncome, 2500);
    });

    it('counts distinct debt collectors by payee', () => {
        const metrics = metricsFor([
            txn('2026-09-01', 25, 'LOWELL FINANCIAL 123'),
            txn('2026-09-08', 25, 'LOWELL FINANCIAL 456'),
            txn('2026-09-15', 30, 'CABOT FINANCIAL'),
        ]);
        assert.equal(metrics.debt.distinctDebtCollectors, 2);
    });

    it('expresses gambling as a share of income', () => {
        const metrics = metricsFor([
            ...salariedHistory(),
            txn('2026-07-05', 75, 'BET365'),
            txn('2026-08-05', 75, 'BET365'),
            txn('2026-09-05', 75, 'BET365'),
        ]);
        assert.equal(metrics.risk.gamblingTotal, 225);
        assert.equal(metrics.risk.gamblingPercentage, 3);
    });

    it('treats any gambling without income as 100 percent', () => {
        const metrics = metricsFor([txn('2026-09-05', 50, 'BET365')]);
        assert.equal(metrics.risk.gamblingPercentage, 100);
    });

    it('resolves ratios to zero when there is no income', () => {
        const metrics = metricsFor([
            txn('2026-09-01', 800, 'RENT PAYMENT LANDLORD'),
            txn('2026-09-05', 100, 'LENDING STREAM PAYMENT'),
        ]);
        assert.equal(metrics.income.effectiveMonthlyIncome, 0);
        assert.equal(metrics.affordability.debtToIncomeRatio, 0);
        assert.equal(metrics.affordability.projectedDebtToIncomeRatio, 0);
        assert.equal(metrics.income.incomeStabilityScore, 0);
    });

    it('counts failed payments in the last 45 days', () => {
        const metrics = metricsFor([
            txn('2026-06-20', 25, 'UNPAID DIRECT DEBIT'),
            txn('2026-09-01', 25, 'UNPAID DIRECT DEBIT'),
            txn('2026-09-25', 10, 'TESCO STORES'),
        ]);
        assert.equal(metrics.risk.failedPaymentsCount, 2);
        assert.equal(metrics.risk.failedPaymentsCount45d, 1);
    });

    it('walks balances backwards from the current balance', () => {
        const metrics = metricsFor([
            txn('2026-09-01', 100, 'TESCO STORES'),
            txn('2026-09-03', -50, 'FROM J'),
        ], { currentBalance: 20 });
        assert.deepEqual(metrics.balance, { averageBalance: -13.33, minimumBalance: -30, daysInOverdraft: 2 });
    });

    it('reports balance metrics as unknown without a current balance', () => {
        const metrics = metricsFor(salariedHistory());
        assert.deepEqual(metrics.balance, { averageBalance: null, minimumBalance: null, daysInOverdraft: null });
    });

    it('skips malformed rows', () => {
        const metrics = metricsFor([...salariedHistory(), txn('2026-09-12', Number.NaN, 'BGC ACME WIDGETS LTD')]);
        assert.equal(metrics.income.effectiveMonthlyIncome, 2500);
    });
});
