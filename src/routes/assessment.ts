import express from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AssessmentEngine } from '../engine/assessment_engine';
import { Application } from '../types';
import { InputValidationError } from '../utils/errors';

// Amounts arrive from aggregators as numbers or numeric strings; anything else
// reaches the classifier as NaN and is recorded as malformed there.
const amountSchema = z
    .union([z.number(), z.string(), z.null()])
    .transform(value => (value === null ? Number.NaN : Number(value)));

const transactionSchema = z.object({
    date: z.string(),
    amount: amountSchema,
    description: z.string().nullable().default(''),
    merchantName: z.string().nullish(),
    taxonomyPrimary: z.string().nullish(),
    taxonomyDetailed: z.string().nullish(),
}).transform(t => ({ ...t, description: t.description ?? '' }));

const loanRequestSchema = z.object({
    principal: z.number().positive(),
    termMonths: z.number().int().positive(),
});

const applicationSchema = z.object({
    applicationRef: z.string().min(1).optional(),
    transactions: z.array(transactionSchema),
    loanRequest: loanRequestSchema.optional(),
    currentBalance: z.number().finite().optional(),
});

const classifySchema = z.object({ transactions: z.array(transactionSchema) });

const batchSchema = z.object({ applications: z.array(applicationSchema).min(1) });

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) throw InputValidationError.fromZod(parsed.error);
    return parsed.data;
}

function toApplication(input: z.output<typeof applicationSchema>): Application {
    return {
        applicationRef: input.applicationRef ?? uuidv4(),
        transactions: input.transactions,
        loanRequest: input.loanRequest,
        currentBalance: input.currentBalance,
    };
}

export function createAssessmentRouter(engine: AssessmentEngine): express.Router {
    const router = express.Router();

    router.post('/classify', (req, res, next) => {
        try {
            const { transactions } = parseBody(classifySchema, req.body);
            res.json(engine.classify(transactions));
        } catch (error) {
            next(error);
        }
    });

    router.post('/score', (req, res, next) => {
        try {
            const application = toApplication(parseBody(applicationSchema, req.body));
            res.json(engine.assess(application));
        } catch (error) {
            next(error);
        }
    });

    router.post('/batch', (req, res, next) => {
        try {
            const { applications } = parseBody(batchSchema, req.body);
            const reports = engine.assessBatch(applications.map(toApplication));
            res.json({ count: reports.length, reports });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
