import { DataGenerator, Persona } from './data_generator';
import { AssessmentEngine } from '../engine/assessment_engine';
import { AssessmentReport, Decision } from '../types';
import * as fs from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';

export interface AuditReport {
    timestamp: string;
    seed: number;
    applicants: number;
    deterministic: boolean;
    mismatches: string[];
    decisions: Record<Decision, number>;
    unexpectedOutcomes: { applicationRef: string; persona: Persona; decision: Decision }[];
    performance: {
        totalProcessingTimeMs: number;
        avgLatencyMs: number;
        p95LatencyMs: number;
    };
}

function percentile(sorted: number[], p: number): number {
    if (sorted.length === 0) return 0;
    const rank = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
    return sorted[Math.max(0, rank)];
}

export function runValidationAudit(engine: AssessmentEngine, count = 120, seed = 20261018): AuditReport {
    const batch = new DataGenerator(seed).generateBatch(count);
    const latencies: number[] = [];

    const started = performance.now();
    const first: AssessmentReport[] = batch.map(({ application }) => {
        const loopStart = performance.now();
        const report = engine.assess(application);
        latencies.push(performance.now() - loopStart);
        return report;
    });
    const totalTime = performance.now() - started;

    // Second pass over the same inputs must reproduce every output exactly
    const second = engine.assessBatch(batch.map(b => b.application));
    const mismatches = first
        .filter((report, i) => JSON.stringify(report) !== JSON.stringify(second[i]))
        .map(report => report.scoring.applicationRef);

    const decisions: Record<Decision, number> = { APPROVE: 0, REFER: 0, DECLINE: 0 };
    const unexpectedOutcomes: AuditReport['unexpectedOutcomes'] = [];
    first.forEach((report, i) => {
        const { decision, applicationRef } = report.scoring;
        decisions[decision]++;
        if (!batch[i].expectedDecisions.includes(decision)) {
            unexpectedOutcomes.push({ applicationRef, persona: batch[i].persona, decision });
        }
    });

    const sorted = [...latencies].sort((a, b) => a - b);
    const avg = latencies.reduce((acc, l) => acc + l, 0) / Math.max(1, latencies.length);

    return {
        timestamp: new Date().toISOString(),
        seed,
        applicants: count,
        deterministic: mismatches.length === 0,
        mismatches,
        decisions,
        unexpectedOutcomes,
        performance: {
            totalProcessingTimeMs: Math.round(totalTime * 100) / 100,
            avgLatencyMs: Math.round(avg * 100) / 100,
            p95LatencyMs: Math.round(percentile(sorted, 95) * 100) / 100,
        },
    };
}

if (require.main === module) {
    console.log('[Audit] Synthetic population validation');
    const report = runValidationAudit(AssessmentEngine.fromFiles());

    console.log(`[Audit] Decisions: ${JSON.stringify(report.decisions)}`);
    console.log(`[Audit] Deterministic: ${report.deterministic} (${report.mismatches.length} mismatches)`);
    console.log(`[Audit] Unexpected outcomes: ${report.unexpectedOutcomes.length}`);
    console.log(`[Audit] Latency: avg ${report.performance.avgLatencyMs}ms, p95 ${report.performance.p95LatencyMs}ms`);

    const outFile = path.join(__dirname, 'validation_report.json');
    fs.writeFileSync(outFile, JSON.stringify(report, null, 2));
    console.log(`[Audit] Report saved to: ${outFile}`);

    if (!report.deterministic) process.exitCode = 1;
}
