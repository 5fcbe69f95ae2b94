import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TransactionClassifier } from '../classifier';
import { shippedConfig, txn } from './fixtures';

const { library, config } = shippedConfig();
const classifier = new TransactionClassifier(library, config);

describe('TransactionClassifier.classify', () => {
    it('classifies a giro salary credit as weighted salary income', () => {
        const result = classifier.classify(txn('2026-09-25', -2500, 'BGC ACME WIDGETS LTD'));
        assert.equal(result.category, 'income');
        assert.equal(result.subcategory, 'salary');
        assert.equal(result.weight, 1);
        assert.equal(result.isStable, true);
        assert.equal(result.step, 'behavioral');
        assert.equal(result.reason, 'payroll_keyword');
        assert.equal(result.confidence, 0.95);
    });

    it('resolves payroll before a transfer taxonomy label', () => {
        const result = classifier.classify(
            txn('2026-09-25', -2500, 'BGC ACME WIDGETS LTD', { taxonomyPrimary: 'TRANSFER_IN' }));
        assert.equal(result.category, 'income');
        assert.equal(result.subcategory, 'salary');
    });

    it('routes a payday lender repayment to debt', () => {
        const result = classifier.classify(txn('2026-09-10', 150, 'LENDING STREAM PAYMENT'));
        assert.equal(result.category, 'debt');
        assert.equal(result.subcategory, 'hcstc');
        assert.equal(result.lender, 'LENDING_STREAM');
        assert.equal(result.step, 'pattern-table');
        assert.equal(result.method, 'keyword');
        assert.equal(result.riskLevel, 'very-high');
    });

    it('keeps a lender repayment in debt despite a loan-payment taxonomy code', () => {
        const result = classifier.classify(txn('2026-09-10', 150, 'LENDING STREAM PAYMENT', {
            taxonomyDetailed: 'LOAN_PAYMENTS_PERSONAL_LOAN_PAYMENT',
        }));
        assert.equal(result.category, 'debt');
        assert.equal(result.subcategory, 'hcstc');
    });

    it('reads spelt-out giro credits as salary', () => {
        const result = classifier.classify(txn('2026-09-25', -2500, 'BANK GIRO CREDIT ACME CORP'));
        assert.deepEqual([result.category, result.subcategory, result.weight], ['income', 'salary', 1]);
    });

    it('treats a lender credit as a zero-weight disbursement', () => {
        const result = classifier.classify(txn('2026-09-02', -300, 'Lending Stream'));
        assert.equal(result.category, 'income');
        assert.equal(result.subcategory, 'loans');
        assert.equal(result.weight, 0);
        assert.equal(result.step, 'whitelist');
        assert.equal(result.confidence, 0.9);
    });

    it('treats a payment processor credit as a transfer', () => {
        const result = classifier.classify(txn('2026-09-02', -80, 'PAYPAL TRANSFER'));
        assert.equal(result.category, 'transfer');
        assert.equal(result.subcategory, 'in');
        assert.equal(result.weight, 0);
        assert.equal(result.confidence, 0.85);
    });

    it('lets strict taxonomy override text signals', () => {
        const result = classifier.classify(txn('2026-09-02', -500, 'BGC ACME WIDGETS LTD', {
            taxonomyDetailed: 'TRANSFER_IN_CASH_ADVANCES_AND_LOANS',
        }));
        assert.equal(result.category, 'income');
        assert.equal(result.subcategory, 'loans');
        assert.equal(result.step, 'strict-taxonomy');
        assert.equal(result.method, 'taxonomy-strict');
        assert.equal(result.confidence, 0.98);
        assert.equal(result.weight, 0);
    });

    it('matches a misspelt grocer by fuzzy similarity', () => {
        const result = classifier.classify(txn('2026-09-03', 23.5, 'TESKO'));
        assert.equal(result.category, 'essential');
        assert.equal(result.subcategory, 'groceries');
        assert.equal(result.method, 'fuzzy');
        assert.equal(result.confidence, 0.68);
    });

    it('files unpaid item fees as bank charges', () => {
        const result = classifier.classify(txn('2026-09-03', 15, 'UNPAID DD CHARGE'));
        assert.equal(result.category, 'risk');
        assert.equal(result.subcategory, 'bank_charges');
    });

    it('uses the coarse taxonomy when nothing else matches', () => {
        const result = classifier.classify(txn('2026-09-03', 42, 'ZZZZ SHOP', { taxonomyPrimary: 'GENERAL_MERCHANDISE' }));
        assert.equal(result.category, 'other');
        assert.equal(result.subcategory, 'discretionary');
        assert.equal(result.method, 'taxonomy-fallback');
        assert.equal(result.confidence, 0.6);
    });

    it('falls back by direction for unknown text', () => {
        const debit = classifier.classify(txn('2026-09-03', 42, 'XQZ'));
        assert.deepEqual(
            [debit.category, debit.subcategory, debit.weight, debit.confidence, debit.reason],
            ['other', 'discretionary', 1, 0.3, 'unrecognised debit']
        );
        const credit = classifier.classify(txn('2026-09-03', -20, 'XQZ'));
        assert.deepEqual(
            [credit.category, credit.subcategory, credit.weight, credit.confidence, credit.reason],
            ['income', 'other', 0.5, 0.3, 'unrecognised credit']
        );
    });

    it('records malformed rows without throwing', () => {
        const noAmount = classifier.classify(txn('2026-09-03', Number.NaN, 'TESCO'));
        assert.equal(noAmount.subcategory, 'malformed');
        assert.equal(noAmount.reason, 'non-numeric amount');
        assert.equal(noAmount.weight, 0);
        assert.equal(noAmount.confidence, 0);

        const blank = classifier.classify(txn('2026-09-03', 10, '   '));
        assert.equal(blank.subcategory, 'malformed');
        assert.equal(blank.reason, 'empty description');
    });

    it('returns frozen results', () => {
        assert.ok(Object.isFrozen(classifier.classify(txn('2026-09-03', 10, 'TESCO'))));
    });
});

describe('TransactionClassifier.classifyAll', () => {
    const history = [
        txn('2026-07-15', -1500, 'FASTER PAYMENT NORTHWIND'),
        txn('2026-08-15', -1500, 'FASTER PAYMENT NORTHWIND'),
        txn('2026-09-15', -1500, 'FASTER PAYMENT NORTHWIND'),
        txn('2026-09-16', 40, 'TESCO STORES'),
    ];

    it('accepts recurring credits as income only with the applicant cache', () => {
        const all = classifier.classifyAll(history);
        assert.equal(all[2].classification.category, 'income');
        assert.equal(all[2].classification.reason, 'recurring_monthly');
        assert.equal(all[2].classification.confidence, 0.8);
        assert.equal(all[3].index, 3);

        const alone = classifier.classify(history[2], 2);
        assert.equal(alone.step, 'fallback');
    });

    it('does not pull a one-off credit from another payer into a salary stream', () => {
        const all = classifier.classifyAll([
            txn('2026-07-25', -1500, 'FASTER PAYMENT NORTHWIND'),
            txn('2026-08-10', -1400, 'FASTER PAYMENT J SMITH'),
            txn('2026-08-25', -1500, 'FASTER PAYMENT NORTHWIND'),
            txn('2026-09-25', -1500, 'FASTER PAYMENT NORTHWIND'),
        ]);
        assert.equal(all[0].classification.reason, 'recurring_monthly');
        assert.equal(all[3].classification.reason, 'recurring_monthly');
        assert.notEqual(all[1].classification.step, 'behavioral');
    });

    it('is deterministic', () => {
        assert.deepEqual(classifier.classifyAll(history), classifier.classifyAll(history));
    });

    it('summarizes counts and absolute totals', () => {
        assert.deepEqual(TransactionClassifier.summarize(classifier.classifyAll(history)), {
            income: { salary: { count: 3, total: 4500 } },
            essential: { groceries: { count: 1, total: 40 } },
        });
    });
});
