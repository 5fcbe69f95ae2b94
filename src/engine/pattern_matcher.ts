import { distance } from 'fastest-levenshtein';
import { DeepReadonly } from '../utils/deep_freeze';
import { roundTo } from '../utils/normalization';
import { CompiledEntry, CompiledTable, PatternLibraryData } from './pattern_library';

export type MatchMethodKind = 'keyword' | 'regex' | 'fuzzy';

export type MatchOutcome =
    | { method: 'none' }
    | { method: MatchMethodKind; confidence: number; evidence: string };

export interface TableMatch {
    entry: DeepReadonly<CompiledEntry>;
    outcome: { method: MatchMethodKind; confidence: number; evidence: string };
}

export const NO_MATCH: MatchOutcome = Object.freeze({ method: 'none' });

// Higher wins when several entries of one table match
const METHOD_RANK: Record<MatchMethodKind, number> = { regex: 3, keyword: 2, fuzzy: 1 };

export type MatcherSettings = DeepReadonly<PatternLibraryData['matcher']>;

export function similarity(a: string, b: string): number {
    const longest = Math.max(a.length, b.length);
    if (longest === 0) return 1;
    return 1 - distance(a, b) / longest;
}

export class PatternMatcher {
    constructor(private readonly settings: MatcherSettings) {}

    /** keyword containment, then regex, then fuzzy similarity against the entry's keywords. */
    match(text: string, entry: DeepReadonly<CompiledEntry>): MatchOutcome {
        if (!text) return NO_MATCH;

        for (const keyword of entry.keywords) {
            if (keyword.pattern.test(text)) {
                return { method: 'keyword', confidence: entry.keywordConfidence, evidence: keyword.text };
            }
        }

        for (const regex of entry.regexes) {
            const found = regex.exec(text);
            if (found) {
                return { method: 'regex', confidence: entry.regexConfidence, evidence: found[0] };
            }
        }

        return this.fuzzy(text, entry);
    }

    /**
     * Best match within one category table that clears its minimum confidence.
     * Ties: regex over keyword over fuzzy, then confidence, then the longer evidence
     * ("UNPAID DD CHARGE" over "UNPAID DD"), then declaration order.
     */
    bestMatch(text: string, table: DeepReadonly<CompiledTable>): TableMatch | null {
        let best: TableMatch | null = null;
        for (const entry of table.entries) {
            const outcome = this.match(text, entry);
            if (outcome.method === 'none' || outcome.confidence < table.minConfidence) continue;
            if (!best || this.outranks(outcome, best.outcome)) {
                best = { entry, outcome };
            }
        }
        return best;
    }

    private outranks(candidate: TableMatch['outcome'], current: TableMatch['outcome']): boolean {
        const rankDiff = METHOD_RANK[candidate.method] - METHOD_RANK[current.method];
        if (rankDiff !== 0) return rankDiff > 0;
        if (candidate.confidence !== current.confidence) return candidate.confidence > current.confidence;
        return candidate.evidence.length > current.evidence.length;
    }

    private fuzzy(text: string, entry: DeepReadonly<CompiledEntry>): MatchOutcome {
        const tokens = text.split(' ');
        let bestScore = 0;
        let bestKeyword = '';

        for (const keyword of entry.keywords) {
            if (keyword.text.length < this.settings.fuzzyMinKeywordLength) continue;
            const width = keyword.text.split(' ').length;
            for (let start = 0; start + width <= tokens.length; start++) {
                const window = tokens.slice(start, start + width).join(' ');
                const score = similarity(window, keyword.text);
                if (score > bestScore) {
                    bestScore = score;
                    bestKeyword = keyword.text;
                }
            }
        }

        if (bestScore < this.settings.fuzzyThreshold) return NO_MATCH;
        return {
            method: 'fuzzy',
            confidence: roundTo(this.settings.fuzzyConfidence * bestScore, 4),
            evidence: bestKeyword,
        };
    }
}
