// Sign convention: negative amount = money in (credit), positive = money out (debit).
export interface Transaction {
    date: string;
    amount: number;
    description: string;
    merchantName?: string | null;
    taxonomyPrimary?: string | null;
    taxonomyDetailed?: string | null;
}

export type Category = 'income' | 'debt' | 'essential' | 'risk' | 'transfer' | 'positive' | 'other';

export type MatchMethod =
    | 'keyword'
    | 'regex'
    | 'fuzzy'
    | 'taxonomy-strict'
    | 'taxonomy-fallback'
    | 'behavioral'
    | 'default';

export type MatcherStep = 'strict-taxonomy' | 'whitelist' | 'behavioral' | 'pattern-table' | 'fallback';

export type RiskLevel = 'none' | 'low' | 'medium' | 'high' | 'very-high' | 'critical';

export interface ClassificationResult {
    category: Category;
    subcategory: string;
    label: string;
    confidence: number;
    method: MatchMethod;
    step: MatcherStep;
    reason: string;
    weight: number;
    isStable: boolean;
    riskLevel: RiskLevel;
    isHousing: boolean;
    lender: string | null;
}

export interface ClassifiedTransaction {
    index: number;
    transaction: Transaction;
    classification: ClassificationResult;
}

export type IncomeSourceType = 'salary' | 'benefits' | 'pension' | 'other';

export type FrequencyBand = 'weekly' | 'fortnightly' | 'monthly' | 'quarterly';

export interface RecurringIncomeSource {
    id: string;
    amountAvg: number;
    maxDeviation: number;
    frequency: FrequencyBand;
    intervalDays: number;
    occurrenceCount: number;
    transactionIndices: number[];
    dayOfMonthConsistent: boolean;
    sourceType: IncomeSourceType;
    confidence: number;
}

export interface IncomeVerdict {
    isIncome: boolean;
    confidence: number;
    reason: string;
    sourceType: IncomeSourceType | 'gig_economy' | null;
}

export interface LoanRequest {
    principal: number;
    termMonths: number;
}

export interface IncomeMetrics {
    totalIncome: number;
    monthlyIncome: number;
    monthlyStableIncome: number;
    monthlyGigIncome: number;
    effectiveMonthlyIncome: number;
    incomeStabilityScore: number;
    incomeRegularityScore: number;
    hasVerifiableIncome: boolean;
    incomeSources: string[];
    monthlyBreakdown: Record<string, number>;
}

export interface ExpenseMetrics {
    monthlyHousing: number;
    monthlyEssentialTotal: number;
    monthlyDiscretionaryTotal: number;
    essentialBreakdown: Record<string, number>;
}

export interface DebtMetrics {
    monthlyDebtPayments: number;
    monthlyHcstcPayments: number;
    activeHcstcCount: number;
    activeHcstcCount90d: number;
    distinctDebtCollectors: number;
    newCreditProviders90d: number;
    debtBreakdown: Record<string, number>;
}

export interface AffordabilityMetrics {
    monthlyDisposable: number;
    stressedMonthlyDisposable: number;
    proposedRepayment: number;
    postLoanDisposable: number;
    debtToIncomeRatio: number;
    projectedDebtToIncomeRatio: number;
    maxAffordablePrincipal: number;
}

export interface BalanceMetrics {
    averageBalance: number | null;
    minimumBalance: number | null;
    daysInOverdraft: number | null;
}

export interface RiskMetrics {
    gamblingTotal: number;
    gamblingPercentage: number;
    failedPaymentsCount: number;
    failedPaymentsCount45d: number;
    bankChargesCount: number;
    bankChargesCount90d: number;
}

export interface MetricsBundle {
    monthsOfData: number;
    windowStart: string | null;
    windowEnd: string | null;
    income: IncomeMetrics;
    expense: ExpenseMetrics;
    debt: DebtMetrics;
    affordability: AffordabilityMetrics;
    balance: BalanceMetrics;
    risk: RiskMetrics;
}

export type Decision = 'APPROVE' | 'REFER' | 'DECLINE';

export type ApplicantRiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

export interface ComponentScore {
    score: number;
    max: number;
    subScores: Record<string, number>;
    penalties: string[];
}

export interface ScoreBreakdown {
    affordability: ComponentScore;
    incomeQuality: ComponentScore;
    accountConduct: ComponentScore;
    riskIndicators: ComponentScore;
    total: number;
}

export interface LoanOffer {
    principal: number;
    termMonths: number;
    monthlyRepayment: number;
    totalRepayable: number;
}

export interface RuleOutcome {
    ruleId: string;
    action: 'DECLINE' | 'REFER';
    reason: string;
}

export interface ScoringResult {
    applicationRef: string;
    decision: Decision;
    score: number;
    riskLevel: ApplicantRiskLevel;
    breakdown: ScoreBreakdown | null;
    firedRules: RuleOutcome[];
    reasons: string[];
    riskFlags: string[];
    loanOffer: LoanOffer | null;
}

export interface CategorySummaryEntry {
    count: number;
    total: number;
}

export type CategorySummary = Record<string, Record<string, CategorySummaryEntry>>;

export interface AssessmentReport {
    scoring: ScoringResult;
    metrics: MetricsBundle;
    classifications: ClassifiedTransaction[];
    summary: CategorySummary;
}

export interface Application {
    applicationRef: string;
    transactions: Transaction[];
    loanRequest?: LoanRequest;
    currentBalance?: number | null;
}
