import { bandPoints, PenaltyMetric, RuleId, ScoringConfig } from '../config/scoring_config';
import {
    ApplicantRiskLevel,
    ComponentScore,
    Decision,
    LoanOffer,
    LoanRequest,
    MetricsBundle,
    RuleOutcome,
    ScoreBreakdown,
    ScoringResult,
} from '../types';
import { roundTo } from '../utils/normalization';
import { maxAffordablePrincipal, priceLoan } from './loan_pricing';

type MetricAccessor = (metrics: MetricsBundle) => number;

// Rule thresholds live in the policy; only the metric each rule reads is defined here
const RULE_METRICS: Record<RuleId, MetricAccessor> = {
    min_monthly_income: m => m.income.effectiveMonthlyIncome,
    no_verifiable_income: m => (m.income.hasVerifiableIncome ? 1 : 0),
    max_active_hcstc_lenders: m => m.debt.activeHcstcCount90d,
    max_gambling_percentage: m => m.risk.gamblingPercentage,
    min_post_loan_disposable: m => m.affordability.postLoanDisposable,
    max_failed_payments_45d: m => m.risk.failedPaymentsCount45d,
    max_dca_count: m => m.debt.distinctDebtCollectors,
    max_dti_with_new_loan: m => m.affordability.projectedDebtToIncomeRatio,
    max_bank_charges_90d: m => m.risk.bankChargesCount90d,
    max_new_credit_providers_90d: m => m.debt.newCreditProviders90d,
};

const PENALTY_METRICS: Record<PenaltyMetric, MetricAccessor> = {
    gamblingPercentage: m => m.risk.gamblingPercentage,
    activeHcstcCount: m => m.debt.activeHcstcCount,
    activeHcstcCount90d: m => m.debt.activeHcstcCount90d,
    failedPaymentsCount45d: m => m.risk.failedPaymentsCount45d,
    debtToIncomeRatio: m => m.affordability.debtToIncomeRatio,
};

export interface DecisionOptions {
    applicationRef: string;
    loanRequest?: LoanRequest;
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

// A metric that is not a number fails its rule
function breaches(operator: 'gt' | 'lt', value: number, threshold: number): boolean {
    if (!Number.isFinite(value)) return true;
    return operator === 'gt' ? value > threshold : value < threshold;
}

export class DecisionEngine {
    constructor(private readonly config: ScoringConfig) {}

    evaluate(metrics: MetricsBundle, options: DecisionOptions): ScoringResult {
        const { scoreRange } = this.config;
        const firedRules: RuleOutcome[] = [];

        // 1. Rule evaluation: the first DECLINE ends it
        for (const rule of this.config.rules) {
            if (!rule.enabled) continue;
            const value = RULE_METRICS[rule.id](metrics);
            if (!breaches(rule.operator, value, rule.threshold)) continue;

            const comparator = rule.operator === 'gt' ? '>' : '<';
            firedRules.push({
                ruleId: rule.id,
                action: rule.action,
                reason: `${rule.description} (${value} ${comparator} ${rule.threshold})`,
            });

            if (rule.action === 'DECLINE') {
                console.log(`[DecisionEngine] ${options.applicationRef}: hard decline on ${rule.id}`);
                return {
                    applicationRef: options.applicationRef,
                    decision: 'DECLINE',
                    score: scoreRange.floor,
                    riskLevel: this.riskLevelFor(scoreRange.floor),
                    breakdown: null,
                    firedRules,
                    reasons: firedRules.map(r => r.reason),
                    riskFlags: this.riskFlags(metrics),
                    loanOffer: null,
                };
            }
        }

        // 2. Score computation
        const breakdown = this.score(metrics);
        const total = breakdown.total;

        // 3. Score decision; REFER rules can only make it more conservative
        const reasons = firedRules.map(r => r.reason);
        let decision = this.decisionFor(total);
        if (decision !== 'APPROVE') {
            reasons.push(`Score ${total} is below the approval band`);
        } else if (firedRules.length > 0) {
            decision = 'REFER';
        }

        // 4. Offer construction
        let loanOffer: LoanOffer | null = null;
        if (decision === 'APPROVE') {
            loanOffer = this.buildOffer(total, metrics, options.loanRequest ?? this.config.product.defaultLoan);
            if (loanOffer.principal === 0) {
                reasons.push('Affordable amount is below the minimum loan size');
            }
        }

        return {
            applicationRef: options.applicationRef,
            decision,
            score: total,
            riskLevel: this.riskLevelFor(total),
            breakdown,
            firedRules,
            reasons,
            riskFlags: this.riskFlags(metrics),
            loanOffer,
        };
    }

    score(metrics: MetricsBundle): ScoreBreakdown {
        const { components, scoreRange } = this.config;
        const { income, affordability, balance, risk, debt } = metrics;

        const affordabilityScore = this.component(components.affordability, metrics, {
            // No income means no meaningful ratio: nothing awarded
            debtToIncome: income.effectiveMonthlyIncome > 0
                ? bandPoints(components.affordability.subScores.debtToIncome, affordability.debtToIncomeRatio)
                : 0,
            disposableIncome: bandPoints(components.affordability.subScores.disposableIncome, affordability.monthlyDisposable),
            postLoanDisposable: bandPoints(components.affordability.subScores.postLoanDisposable, affordability.postLoanDisposable),
        });

        const incomeQuality = this.component(components.incomeQuality, metrics, {
            incomeStability: bandPoints(components.incomeQuality.subScores.incomeStability, income.incomeStabilityScore),
            incomeRegularity: bandPoints(components.incomeQuality.subScores.incomeRegularity, income.incomeRegularityScore),
            incomeVerification: bandPoints(
                components.incomeQuality.subScores.incomeVerification, income.hasVerifiableIncome ? 1 : 0),
        });

        const accountConduct = this.component(components.accountConduct, metrics, {
            failedPayments: bandPoints(components.accountConduct.subScores.failedPayments, risk.failedPaymentsCount),
            overdraftDays: bandPoints(components.accountConduct.subScores.overdraftDays, balance.daysInOverdraft),
            averageBalance: bandPoints(components.accountConduct.subScores.averageBalance, balance.averageBalance),
        });

        const riskIndicators = this.component(components.riskIndicators, metrics, {
            gamblingPercentage: bandPoints(components.riskIndicators.subScores.gamblingPercentage, risk.gamblingPercentage),
            hcstcCount: bandPoints(components.riskIndicators.subScores.hcstcCount, debt.activeHcstcCount),
        });

        const sum = affordabilityScore.score + incomeQuality.score + accountConduct.score + riskIndicators.score;
        return {
            affordability: affordabilityScore,
            incomeQuality,
            accountConduct,
            riskIndicators,
            total: roundTo(clamp(sum, scoreRange.floor, scoreRange.ceiling), 1),
        };
    }

    private component(
        settings: ScoringConfig['components'][keyof ScoringConfig['components']],
        metrics: MetricsBundle,
        subScores: Record<string, number>
    ): ComponentScore {
        const penalties: string[] = [];
        let penaltyPoints = 0;
        for (const penalty of settings.penalties) {
            const value = PENALTY_METRICS[penalty.metric](metrics);
            if (breaches(penalty.operator, value, penalty.threshold)) {
                penalties.push(penalty.id);
                penaltyPoints += penalty.points;
            }
        }
        const raw = Object.values(subScores).reduce((sum, points) => sum + points, 0) + penaltyPoints;
        return {
            score: clamp(raw, settings.min, settings.max),
            max: settings.max,
            subScores,
            penalties,
        };
    }

    private decisionFor(total: number): Decision {
        const band = [...this.config.decisionBands].sort((a, b) => b.min - a.min).find(b => total >= b.min);
        return band ? band.decision : 'DECLINE';
    }

    private riskLevelFor(total: number): ApplicantRiskLevel {
        const band = [...this.config.riskLevels].sort((a, b) => b.min - a.min).find(b => total >= b.min);
        return band ? band.level : 'VERY_HIGH';
    }

    private buildOffer(total: number, metrics: MetricsBundle, requested: LoanRequest): LoanOffer {
        const { product } = this.config;
        const limit = [...this.config.scoreLimits].sort((a, b) => b.minScore - a.minScore).find(l => total >= l.minScore);
        const maxTerm = Math.min(requested.termMonths, limit ? limit.maxTermMonths : 0);
        const terms = product.availableTerms.filter(term => term <= maxTerm);
        const termMonths = terms.length > 0 ? Math.max(...terms) : 0;

        // Sized on the offered term, which the band may shorten
        const affordable = maxAffordablePrincipal(
            metrics.affordability.stressedMonthlyDisposable,
            this.config.affordability.minDisposableBuffer,
            termMonths,
            product
        );
        let principal = Math.floor(Math.min(
            requested.principal,
            product.maxPrincipal,
            limit ? limit.maxPrincipal : 0,
            affordable
        ));
        if (principal < product.minPrincipal || termMonths === 0) {
            principal = 0;
        }

        const price = priceLoan(principal, termMonths, product);
        return { principal, termMonths, monthlyRepayment: price.monthlyRepayment, totalRepayable: price.totalRepayable };
    }

    private riskFlags(metrics: MetricsBundle): string[] {
        const flags: string[] = [];
        if (metrics.debt.activeHcstcCount90d > 0) flags.push(`ACTIVE_HCSTC_LENDERS_90D:${metrics.debt.activeHcstcCount90d}`);
        if (metrics.debt.newCreditProviders90d > 0) flags.push(`NEW_CREDIT_PROVIDERS_90D:${metrics.debt.newCreditProviders90d}`);
        if (metrics.debt.distinctDebtCollectors > 0) flags.push(`DEBT_COLLECTORS:${metrics.debt.distinctDebtCollectors}`);
        if (metrics.risk.gamblingTotal > 0) flags.push(`GAMBLING_PERCENT:${metrics.risk.gamblingPercentage}`);
        if (metrics.risk.failedPaymentsCount > 0) flags.push(`FAILED_PAYMENTS:${metrics.risk.failedPaymentsCount}`);
        if (metrics.risk.bankChargesCount > 0) flags.push(`BANK_CHARGES:${metrics.risk.bankChargesCount}`);
        if ((metrics.balance.daysInOverdraft ?? 0) > 0) flags.push(`OVERDRAFT_DAYS:${metrics.balance.daysInOverdraft}`);
        if (!metrics.income.hasVerifiableIncome) flags.push('UNVERIFIED_INCOME');
        return flags;
    }
}
