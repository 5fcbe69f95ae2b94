import { loadScoringConfig, ScoringConfig } from '../config/scoring_config';
import { Application, AssessmentReport, CategorySummary, ClassifiedTransaction, Transaction } from '../types';
import { TransactionClassifier } from './classifier';
import { DecisionEngine } from './decision_engine';
import { MetricsAggregator } from './metrics_engine';
import { loadPatternLibrary, PatternLibrary } from './pattern_library';

export interface ClassificationReport {
    classifications: ClassifiedTransaction[];
    summary: CategorySummary;
}

export interface EnginePaths {
    scoringConfigPath?: string;
    patternLibraryPath?: string;
}

/**
 * Classifier → metrics → decision for one applicant at a time. Holds only the
 * immutable library and policy, so one instance serves any number of applicants.
 */
export class AssessmentEngine {
    readonly classifier: TransactionClassifier;
    readonly aggregator: MetricsAggregator;
    readonly decisions: DecisionEngine;

    constructor(readonly library: PatternLibrary, readonly config: ScoringConfig) {
        this.classifier = new TransactionClassifier(library, config);
        this.aggregator = new MetricsAggregator(config);
        this.decisions = new DecisionEngine(config);
    }

    /** Throws ConfigurationError when either file is missing or invalid. */
    static fromFiles(paths: EnginePaths = {}): AssessmentEngine {
        const library = loadPatternLibrary(paths.patternLibraryPath);
        const config = loadScoringConfig(paths.scoringConfigPath);
        return new AssessmentEngine(library, config);
    }

    classify(transactions: readonly Transaction[]): ClassificationReport {
        const classifications = this.classifier.classifyAll(transactions);
        return { classifications, summary: TransactionClassifier.summarize(classifications) };
    }

    assess(application: Application): AssessmentReport {
        const started = Date.now();
        const { classifications, summary } = this.classify(application.transactions);
        const metrics = this.aggregator.aggregate(classifications, {
            loanRequest: application.loanRequest,
            currentBalance: application.currentBalance,
        });
        const scoring = this.decisions.evaluate(metrics, {
            applicationRef: application.applicationRef,
            loanRequest: application.loanRequest,
        });

        console.log(
            `[Assessment] ${application.applicationRef}: ${scoring.decision} score=${scoring.score} ` +
            `transactions=${application.transactions.length} (${Date.now() - started}ms)`
        );
        return { scoring, metrics, classifications, summary };
    }

    /** Applicants are independent; each gets its own recurrence cache inside classify(). */
    assessBatch(applications: readonly Application[]): AssessmentReport[] {
        return applications.map(application => this.assess(application));
    }
}
