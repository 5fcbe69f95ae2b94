import { ScoringConfig } from '../config/scoring_config';
import { roundTo } from '../utils/normalization';

type Product = ScoringConfig['product'];

export interface LoanPrice {
    monthlyRepayment: number;
    totalRepayable: number;
}

/**
 * Simple daily interest over the term, capped at `totalCostCap` × principal,
 * spread evenly across the months.
 */
export function priceLoan(principal: number, termMonths: number, product: Product): LoanPrice {
    if (principal <= 0 || termMonths <= 0) {
        return { monthlyRepayment: 0, totalRepayable: 0 };
    }
    const monthlyRate = product.dailyInterestRate * product.daysPerMonth;
    const interest = Math.min(principal * monthlyRate * termMonths, principal * product.totalCostCap);
    const total = principal + interest;
    return {
        monthlyRepayment: roundTo(total / termMonths, 2),
        totalRepayable: roundTo(total, 2),
    };
}

/** Largest available product term not above `requested`; the shortest term when none is. */
export function productTerm(requested: number, product: Product): number {
    const terms = product.availableTerms.filter(term => term <= requested);
    return terms.length > 0 ? Math.max(...terms) : Math.min(...product.availableTerms);
}

/** Largest principal whose repayment leaves `buffer` of the monthly disposable untouched. */
export function maxAffordablePrincipal(
    monthlyDisposable: number,
    buffer: number,
    termMonths: number,
    product: Product
): number {
    const payment = monthlyDisposable - buffer;
    if (payment <= 0 || termMonths <= 0) return 0;
    const monthlyRate = product.dailyInterestRate * product.daysPerMonth;
    const factor = Math.min(1 + monthlyRate * termMonths, 1 + product.totalCostCap);
    return roundTo(Math.min((payment * termMonths) / factor, product.maxPrincipal), 2);
}
