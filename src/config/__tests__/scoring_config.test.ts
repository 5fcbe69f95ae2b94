import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import {
    bandPoints,
    buildScoringConfig,
    DEFAULT_SCORING_CONFIG_PATH,
    loadScoringConfig,
    scoringConfigSchema,
    ScoringConfigData,
    validateScoringConfig,
} from '../scoring_config';
import { ConfigurationError } from '../../utils/errors';

function rawPolicy(): ScoringConfigData {
    return scoringConfigSchema.parse(JSON.parse(fs.readFileSync(DEFAULT_SCORING_CONFIG_PATH, 'utf-8')));
}

describe('loadScoringConfig', () => {
    it('loads and freezes the shipped policy', () => {
        const config = loadScoringConfig();
        assert.equal(config.version, '2026.10-1');
        assert.equal(config.rules.length, 10);
        assert.ok(Object.isFrozen(config.rules));
        assert.ok(Object.isFrozen(config.components.affordability.subScores.debtToIncome.bands));
    });

    it('reports an unreadable file as a configuration error', () => {
        assert.throws(
            () => loadScoringConfig('/nonexistent/scoring.json'),
            (err: unknown) => err instanceof ConfigurationError && err.keys.length === 1 && err.keys[0] === '(file)'
        );
    });
});

describe('buildScoringConfig', () => {
    it('lists a missing section by key path', () => {
        const { product: _product, ...rest } = rawPolicy();
        assert.throws(
            () => buildScoringConfig(rest),
            (err: unknown) => err instanceof ConfigurationError && err.keys.includes('product: Required')
        );
    });

    it('requires every rule exactly once', () => {
        const policy = rawPolicy();
        const rules = policy.rules.filter(rule => rule.id !== 'max_dca_count');
        assert.throws(
            () => buildScoringConfig({ ...policy, rules }),
            (err: unknown) => err instanceof ConfigurationError && err.keys.includes('rules.max_dca_count: missing')
        );
    });
});

describe('validateScoringConfig', () => {
    it('accepts the shipped policy', () => {
        assert.deepEqual(validateScoringConfig(rawPolicy()), []);
    });

    it('rejects a band table that rewards a worse value', () => {
        const policy = rawPolicy();
        const affordability = policy.components.affordability;
        const broken: ScoringConfigData = {
            ...policy,
            components: {
                ...policy.components,
                affordability: {
                    ...affordability,
                    subScores: {
                        ...affordability.subScores,
                        debtToIncome: {
                            direction: 'lower',
                            bands: [{ max: 30, points: 10 }, { max: 40, points: 15 }],
                            otherwise: 0,
                        },
                    },
                },
            },
        };
        assert.deepEqual(validateScoringConfig(broken), [
            'components.affordability.subScores.debtToIncome.bands.1.points: not monotonic',
        ]);
    });

    it('rejects duplicate decision band bounds', () => {
        const policy = rawPolicy();
        const broken: ScoringConfigData = {
            ...policy,
            decisionBands: [
                { decision: 'APPROVE', min: 70 },
                { decision: 'REFER', min: 70 },
                { decision: 'DECLINE', min: 0 },
            ],
        };
        assert.deepEqual(validateScoringConfig(broken), ['decisionBands: lower bounds must be distinct']);
    });
});

describe('bandPoints', () => {
    const { components } = loadScoringConfig();
    const dti = components.affordability.subScores.debtToIncome;
    const disposable = components.affordability.subScores.disposableIncome;

    it('applies inclusive upper bounds for lower-is-better tables', () => {
        assert.equal(bandPoints(dti, 30), 18);
        assert.equal(bandPoints(dti, 30.1), 15);
        assert.equal(bandPoints(dti, 100), 0);
        assert.equal(bandPoints(dti, 150), 0);
    });

    it('applies inclusive lower bounds for higher-is-better tables', () => {
        assert.equal(bandPoints(disposable, 200), 15);
        assert.equal(bandPoints(disposable, 199.99), 13);
        assert.equal(bandPoints(disposable, -1), 0);
    });

    it('scores unknown metrics as zero', () => {
        assert.equal(bandPoints(disposable, null), 0);
        assert.equal(bandPoints(disposable, Number.NaN), 0);
    });

    it('never rewards a worse value in any shipped table', () => {
        for (const component of Object.values(components)) {
            for (const table of Object.values(component.subScores)) {
                const probes = table.direction === 'lower'
                    ? [-1, ...table.bands.map(b => b.max), ...table.bands.map(b => b.max + 0.5)].sort((a, b) => a - b)
                    : [...table.bands.map(b => b.min), ...table.bands.map(b => b.min - 0.5), -1].sort((a, b) => b - a);
                let previous = Number.POSITIVE_INFINITY;
                for (const value of probes) {
                    const points = bandPoints(table, value);
                    assert.ok(points <= previous, `${value} scored ${points} after ${previous}`);
                    previous = points;
                }
            }
        }
    });
});
