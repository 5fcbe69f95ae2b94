import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { deepFreeze, DeepReadonly } from '../utils/deep_freeze';

export const DEFAULT_SCORING_CONFIG_PATH = path.join(__dirname, '../../config/scoring.json');

export const RULE_IDS = [
    'min_monthly_income',
    'no_verifiable_income',
    'max_active_hcstc_lenders',
    'max_gambling_percentage',
    'min_post_loan_disposable',
    'max_failed_payments_45d',
    'max_dca_count',
    'max_dti_with_new_loan',
    'max_bank_charges_90d',
    'max_new_credit_providers_90d',
] as const;
export type RuleId = typeof RULE_IDS[number];

export const PENALTY_METRICS = [
    'gamblingPercentage',
    'activeHcstcCount',
    'activeHcstcCount90d',
    'failedPaymentsCount45d',
    'debtToIncomeRatio',
] as const;
export type PenaltyMetric = typeof PENALTY_METRICS[number];

const operatorSchema = z.enum(['gt', 'lt']);

// Lower-is-better tables list ascending upper bounds, higher-is-better tables descending lower bounds.
const bandTableSchema = z.discriminatedUnion('direction', [
    z.object({
        direction: z.literal('lower'),
        bands: z.array(z.object({ max: z.number(), points: z.number() })).min(1),
        otherwise: z.number(),
    }),
    z.object({
        direction: z.literal('higher'),
        bands: z.array(z.object({ min: z.number(), points: z.number() })).min(1),
        otherwise: z.number(),
    }),
]);

const penaltySchema = z.object({
    id: z.string().min(1),
    metric: z.enum(PENALTY_METRICS),
    operator: operatorSchema,
    threshold: z.number(),
    points: z.number().max(0),
});

function componentSchema<T extends z.ZodRawShape>(subScores: T) {
    return z.object({
        max: z.number(),
        min: z.number(),
        subScores: z.object(subScores),
        penalties: z.array(penaltySchema).default([]),
    });
}

const intervalSchema = z.object({ min: z.number().positive(), max: z.number().positive() });
const bonusSchema = z.object({
    weekly: z.number(),
    fortnightly: z.number(),
    monthly: z.number(),
    quarterly: z.number(),
});

export const scoringConfigSchema = z.object({
    version: z.string().min(1),
    scoreRange: z.object({ floor: z.number(), ceiling: z.number() }),
    components: z.object({
        affordability: componentSchema({
            debtToIncome: bandTableSchema,
            disposableIncome: bandTableSchema,
            postLoanDisposable: bandTableSchema,
        }),
        incomeQuality: componentSchema({
            incomeStability: bandTableSchema,
            incomeRegularity: bandTableSchema,
            incomeVerification: bandTableSchema,
        }),
        accountConduct: componentSchema({
            failedPayments: bandTableSchema,
            overdraftDays: bandTableSchema,
            averageBalance: bandTableSchema,
        }),
        riskIndicators: componentSchema({
            gamblingPercentage: bandTableSchema,
            hcstcCount: bandTableSchema,
        }),
    }),
    decisionBands: z.array(z.object({
        decision: z.enum(['APPROVE', 'REFER', 'DECLINE']),
        min: z.number(),
    })).min(1),
    riskLevels: z.array(z.object({
        level: z.enum(['LOW', 'MEDIUM', 'HIGH', 'VERY_HIGH']),
        min: z.number(),
    })).min(1),
    scoreLimits: z.array(z.object({
        minScore: z.number(),
        maxPrincipal: z.number().min(0),
        maxTermMonths: z.number().int().min(0),
    })).min(1),
    rules: z.array(z.object({
        id: z.enum(RULE_IDS),
        operator: operatorSchema,
        threshold: z.number(),
        action: z.enum(['DECLINE', 'REFER']),
        enabled: z.boolean().default(true),
        description: z.string().min(1),
    })),
    product: z.object({
        minPrincipal: z.number().positive(),
        maxPrincipal: z.number().positive(),
        availableTerms: z.array(z.number().int().positive()).min(1),
        dailyInterestRate: z.number().min(0),
        daysPerMonth: z.number().positive(),
        totalCostCap: z.number().min(0),
        defaultLoan: z.object({
            principal: z.number().positive(),
            termMonths: z.number().int().positive(),
        }),
    }),
    affordability: z.object({
        expenseBuffer: z.number().min(1),
        minDisposableBuffer: z.number().min(0),
        lookbackMonths: z.number().int().min(1),
    }),
    detector: z.object({
        acceptanceThreshold: z.number().min(0).max(1),
        minAmount: z.number().min(0),
        salaryMinAmount: z.number().min(0),
        amountTolerance: z.number().min(0).max(1),
        minOccurrences: z.number().int().min(2),
        modalShare: z.number().min(0).max(1),
        intervalBands: z.object({
            weekly: intervalSchema,
            fortnightly: intervalSchema,
            monthly: intervalSchema,
            quarterly: intervalSchema,
        }),
        confidence: z.object({
            base: z.number(),
            perOccurrence: z.number(),
            occurrenceCap: z.number().int().positive(),
            bandBonus: bonusSchema,
            dayOfMonthBonus: z.number(),
            dayOfMonthTolerance: z.number().min(0),
            dayOfMonthMinOccurrences: z.number().int().min(2),
            max: z.number().min(0).max(1),
        }),
        signals: z.object({
            taxonomyWageConfidence: z.number().min(0).max(1),
            taxonomyRetirementConfidence: z.number().min(0).max(1),
            payrollConfidence: z.number().min(0).max(1),
            benefitsConfidence: z.number().min(0).max(1),
            pensionConfidence: z.number().min(0).max(1),
            employerConfidence: z.number().min(0).max(1),
            employerMinAmount: z.number().min(0),
            employerMinSpecificWords: z.number().int().min(1),
            largeCreditConfidence: z.number().min(0).max(1),
            largeCreditMinAmount: z.number().min(0),
            largeCreditMinSpecificWords: z.number().int().min(1),
        }),
    }),
    metrics: z.object({
        regularityMinAmount: z.number().min(0),
        regularityBands: z.array(z.object({ maxStdDev: z.number().min(0), score: z.number().min(0).max(100) })).min(1),
        regularityOtherwise: z.number().min(0).max(100),
    }),
});

export type ScoringConfigData = z.infer<typeof scoringConfigSchema>;
export type ScoringConfig = DeepReadonly<ScoringConfigData>;
export type BandTable = z.infer<typeof bandTableSchema>;

function checkBandTable(table: BandTable, key: string, problems: string[]): void {
    let lastPoints = Number.POSITIVE_INFINITY;
    if (table.direction === 'lower') {
        let lastBound = Number.NEGATIVE_INFINITY;
        table.bands.forEach((band, i) => {
            if (band.max <= lastBound) problems.push(`${key}.bands.${i}.max: must be strictly ascending`);
            if (band.points > lastPoints) problems.push(`${key}.bands.${i}.points: not monotonic`);
            lastBound = band.max;
            lastPoints = band.points;
        });
    } else {
        let lastBound = Number.POSITIVE_INFINITY;
        table.bands.forEach((band, i) => {
            if (band.min >= lastBound) problems.push(`${key}.bands.${i}.min: must be strictly descending`);
            if (band.points > lastPoints) problems.push(`${key}.bands.${i}.points: not monotonic`);
            lastBound = band.min;
            lastPoints = band.points;
        });
    }
    if (table.otherwise > lastPoints) problems.push(`${key}.otherwise: not monotonic`);
}

function checkLowerBounds(values: number[], floor: number, key: string, problems: string[]): void {
    if (new Set(values).size !== values.length) problems.push(`${key}: lower bounds must be distinct`);
    if (!values.includes(floor)) problems.push(`${key}: one band must start at the score floor (${floor})`);
}

/** Semantic checks zod cannot express. Returns the list of offending key paths. */
export function validateScoringConfig(config: ScoringConfigData): string[] {
    const problems: string[] = [];
    const { floor, ceiling } = config.scoreRange;
    if (floor >= ceiling) problems.push('scoreRange: floor must be below ceiling');

    for (const [componentName, component] of Object.entries(config.components)) {
        if (component.min > component.max) problems.push(`components.${componentName}: min above max`);
        for (const [subName, table] of Object.entries(component.subScores)) {
            checkBandTable(table, `components.${componentName}.subScores.${subName}`, problems);
        }
    }

    checkLowerBounds(config.decisionBands.map(band => band.min), floor, 'decisionBands', problems);
    checkLowerBounds(config.riskLevels.map(band => band.min), floor, 'riskLevels', problems);
    checkLowerBounds(config.scoreLimits.map(limit => limit.minScore), floor, 'scoreLimits', problems);

    for (const id of RULE_IDS) {
        const count = config.rules.filter(rule => rule.id === id).length;
        if (count === 0) problems.push(`rules.${id}: missing`);
        if (count > 1) problems.push(`rules.${id}: defined ${count} times`);
    }

    const { product } = config;
    if (product.minPrincipal > product.maxPrincipal) problems.push('product.minPrincipal: above maxPrincipal');

    for (const [band, range] of Object.entries(config.detector.intervalBands)) {
        if (range.min > range.max) problems.push(`detector.intervalBands.${band}: min above max`);
    }

    return problems;
}

export function buildScoringConfig(raw: unknown, source: string = 'scoring policy'): ScoringConfig {
    const parsed = scoringConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw ConfigurationError.fromZod(source, parsed.error);
    }
    const problems = validateScoringConfig(parsed.data);
    if (problems.length > 0) {
        throw new ConfigurationError(source, problems);
    }
    return deepFreeze(parsed.data);
}

export function loadScoringConfig(filePath: string = DEFAULT_SCORING_CONFIG_PATH): ScoringConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(filePath, ['(file)'], `Cannot read scoring policy ${filePath}: ${reason}`);
    }
    const config = buildScoringConfig(raw, filePath);
    console.log(`[Config] Scoring policy ${config.version} loaded (${config.rules.length} rules)`);
    return config;
}

/** Points awarded by a band table. A null metric is unknown and scores nothing. */
export function bandPoints(table: DeepReadonly<BandTable>, value: number | null): number {
    if (value === null || !Number.isFinite(value)) return 0;
    if (table.direction === 'lower') {
        for (const band of table.bands) {
            if (value <= band.max) return band.points;
        }
    } else {
        for (const band of table.bands) {
            if (value >= band.min) return band.points;
        }
    }
    return table.otherwise;
}
