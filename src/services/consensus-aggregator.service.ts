import {
    ConsensusReport,
    DiscordanceNote,
    EffectiveWeight,
    ExcludedJudge,
    JudgeResult,
    JudgeSpec,
    Recommendation,
    RecommendationThresholds,
    UniqueFinding
} from '../types/evaluation';
import { AggregationError } from '../utils/errors';
import { deepFreeze } from '../utils/freeze.util';

export const DEFAULT_DISCORDANCE_THRESHOLD = 25;

export const DEFAULT_RECOMMENDATION_THRESHOLDS: RecommendationThresholds = {
    consider: 50,
    recommend: 70,
    strongRecommend: 85
};

export interface IConsensusAggregator {
    aggregate(
        results: readonly JudgeResult[],
        specs: readonly JudgeSpec[],
        discordanceThreshold?: number,
        excludedJudges?: readonly ExcludedJudge[]
    ): ConsensusReport;
}

/**
 * Consensus Aggregator
 *
 * Reduces the results of the judges that survived orchestration into one
 * report. Deterministic: the same inputs always give an identical report.
 */
export class ConsensusAggregator implements IConsensusAggregator {
    constructor(
        private thresholds: RecommendationThresholds = DEFAULT_RECOMMENDATION_THRESHOLDS
    ) { }

    aggregate(
        results: readonly JudgeResult[],
        specs: readonly JudgeSpec[],
        discordanceThreshold: number = DEFAULT_DISCORDANCE_THRESHOLD,
        excludedJudges: readonly ExcludedJudge[] = []
    ): ConsensusReport {
        if (results.length === 0) {
            throw new AggregationError('Cannot aggregate zero judge results');
        }

        const effectiveWeights = normalizeWeights(results, specs);
        const weightedScore = calculateWeightedScore(results, effectiveWeights);
        const discordanceNotes = findDiscordantPairs(results, discordanceThreshold);

        return deepFreeze({
            weightedScore,
            recommendation: recommendationFor(weightedScore, this.thresholds),
            consensusHighlights: findMajorityItems(results.map(result => result.matchedRequirements)),
            consensusRedFlags: findMajorityItems(results.map(result => result.redFlags)),
            uniqueFindings: findUniqueFindings(results),
            effectiveWeights,
            discordant: isDiscordant(results, discordanceThreshold),
            discordanceNotes,
            perJudge: results.map(copyResult),
            excludedJudges: excludedJudges.map(judge => ({ ...judge }))
        });
    }
}

// Copies so freezing the report never freezes the caller's arrays
function copyResult(result: JudgeResult): JudgeResult {
    return {
        ...result,
        matchedRequirements: [...result.matchedRequirements],
        gaps: [...result.gaps],
        redFlags: [...result.redFlags],
        strengths: [...result.strengths]
    };
}

/**
 * Renormalize configured weights over the judges that produced a result.
 * Surviving judges whose weights are all zero share equally.
 */
export function normalizeWeights(results: readonly JudgeResult[], specs: readonly JudgeSpec[]): EffectiveWeight[] {
    const specById = new Map(specs.map(spec => [spec.id, spec]));
    const seen = new Set<string>();

    const rawWeights = results.map(result => {
        if (seen.has(result.judgeId)) {
            throw new AggregationError(`Duplicate result for judge "${result.judgeId}"`);
        }
        seen.add(result.judgeId);

        const spec = specById.get(result.judgeId);
        if (!spec) {
            throw new AggregationError(`No judge spec for result from "${result.judgeId}"`);
        }
        return { judgeId: result.judgeId, weight: spec.weight };
    });

    const total = rawWeights.reduce((sum, entry) => sum + entry.weight, 0);
    if (total <= 0) {
        return rawWeights.map(entry => ({ judgeId: entry.judgeId, weight: 1 / rawWeights.length }));
    }

    return rawWeights.map(entry => ({ judgeId: entry.judgeId, weight: entry.weight / total }));
}

export function calculateWeightedScore(results: readonly JudgeResult[], weights: readonly EffectiveWeight[]): number {
    const weightById = new Map(weights.map(entry => [entry.judgeId, entry.weight]));
    const score = results.reduce((sum, result) => sum + result.score * (weightById.get(result.judgeId) ?? 0), 0);
    return roundToOneDecimal(score);
}

function roundToOneDecimal(value: number): number {
    return Math.round(value * 10) / 10;
}

export function normalizeRequirement(value: string): string {
    return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Items named by at least half of the judges (exactly half counts).
 * Each judge's list is deduplicated first; the first spelling seen is kept
 * and items come out in order of first appearance.
 */
export function findMajorityItems(lists: ReadonlyArray<readonly string[]>): string[] {
    const counts = countAcrossJudges(lists);
    const highlights: string[] = [];

    for (const entry of counts.values()) {
        if (entry.count * 2 >= lists.length) {
            highlights.push(entry.display);
        }
    }

    return highlights;
}

function countAcrossJudges(lists: ReadonlyArray<readonly string[]>): Map<string, { display: string; count: number; judges: number[] }> {
    const counts = new Map<string, { display: string; count: number; judges: number[] }>();

    lists.forEach((list, judgeIndex) => {
        const unique = new Set<string>();
        for (const item of list) {
            const key = normalizeRequirement(item);
            if (!key || unique.has(key)) {
                continue;
            }
            unique.add(key);

            const entry = counts.get(key);
            if (entry) {
                entry.count += 1;
                entry.judges.push(judgeIndex);
            } else {
                counts.set(key, { display: item.trim().replace(/\s+/g, ' '), count: 1, judges: [judgeIndex] });
            }
        }
    });

    return counts;
}

/**
 * Requirements only one judge recognised. Needs at least two judges to mean anything.
 */
export function findUniqueFindings(results: readonly JudgeResult[]): UniqueFinding[] {
    if (results.length < 2) {
        return [];
    }

    const counts = countAcrossJudges(results.map(result => result.matchedRequirements));
    const byJudge = results.map((): string[] => []);

    for (const entry of counts.values()) {
        if (entry.count === 1) {
            byJudge[entry.judges[0]].push(entry.display);
        }
    }

    return results
        .map((result, index) => ({ judgeId: result.judgeId, requirements: byJudge[index] }))
        .filter(finding => finding.requirements.length > 0);
}

export function isDiscordant(results: readonly JudgeResult[], threshold: number): boolean {
    if (results.length < 2) {
        return false;
    }

    const scores = results.map(result => result.score);
    return Math.max(...scores) - Math.min(...scores) > threshold;
}

/**
 * Every pair of judges, in input order, whose score gap exceeds the threshold
 */
export function findDiscordantPairs(results: readonly JudgeResult[], threshold: number): DiscordanceNote[] {
    const notes: DiscordanceNote[] = [];

    for (let i = 0; i < results.length; i++) {
        for (let j = i + 1; j < results.length; j++) {
            const gap = Math.abs(results[i].score - results[j].score);
            if (gap > threshold) {
                notes.push({
                    judgeA: results[i].judgeId,
                    scoreA: results[i].score,
                    judgeB: results[j].judgeId,
                    scoreB: results[j].score,
                    gap
                });
            }
        }
    }

    return notes;
}

/**
 * Bands are closed below and open above, except the top band which includes 100
 */
export function recommendationFor(score: number, thresholds: RecommendationThresholds = DEFAULT_RECOMMENDATION_THRESHOLDS): Recommendation {
    if (score >= thresholds.strongRecommend) {
        return 'Strong Recommend';
    }
    if (score >= thresholds.recommend) {
        return 'Recommend';
    }
    if (score >= thresholds.consider) {
        return 'Consider';
    }
    return 'Not Recommended';
}
