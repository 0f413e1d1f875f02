/**
 * Data model for ensemble evaluations
 *
 * A request goes out to every configured judge; each judge that produces
 * a valid payload contributes one JudgeResult, and the aggregator reduces
 * those results into a single ConsensusReport.
 */

// Input shared read-only by every judge
export interface EvaluationRequest {
    readonly cvText: string;
    readonly jdText: string;
    readonly guidance?: string;
}

// Scheduling and weighting for one judge
export interface JudgeSpec {
    readonly id: string;
    readonly weight: number;        // relative influence, >= 0
    readonly maxAttempts: number;   // >= 1
    readonly timeoutMs: number;     // per call
    readonly baseBackoffMs: number; // first retry delay, doubled each retry
}

// Provider-facing settings for the OpenRouter adapter
export interface JudgeDefinition extends JudgeSpec {
    readonly model: string;
    readonly name: string;
    readonly role?: string;
}

export interface JudgeResult {
    readonly judgeId: string;
    readonly score: number; // integer, 0-100
    readonly matchedRequirements: readonly string[];
    readonly gaps: readonly string[];
    readonly redFlags: readonly string[];
    readonly strengths: readonly string[];
    readonly rationale: string;
    readonly rawAttempts: number;
}

export interface ExcludedJudge {
    readonly judgeId: string;
    readonly reason: string;
    readonly attempts: number;
}

export interface DiscordanceNote {
    readonly judgeA: string;
    readonly scoreA: number;
    readonly judgeB: string;
    readonly scoreB: number;
    readonly gap: number;
}

export interface EffectiveWeight {
    readonly judgeId: string;
    readonly weight: number;
}

// Requirements only one judge picked up
export interface UniqueFinding {
    readonly judgeId: string;
    readonly requirements: readonly string[];
}

export const RECOMMENDATIONS = [
    'Not Recommended',
    'Consider',
    'Recommend',
    'Strong Recommend'
] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];

// Lower bound of each band above "Not Recommended"
export interface RecommendationThresholds {
    readonly consider: number;
    readonly recommend: number;
    readonly strongRecommend: number;
}

export interface ConsensusReport {
    readonly weightedScore: number;
    readonly recommendation: Recommendation;
    readonly consensusHighlights: readonly string[];
    readonly consensusRedFlags: readonly string[];
    readonly uniqueFindings: readonly UniqueFinding[];
    readonly effectiveWeights: readonly EffectiveWeight[];
    readonly discordant: boolean;
    readonly discordanceNotes: readonly DiscordanceNote[];
    readonly perJudge: readonly JudgeResult[];
    readonly excludedJudges: readonly ExcludedJudge[];
}

// What the orchestrator hands to the aggregator
export interface OrchestrationOutcome {
    readonly perJudge: readonly JudgeResult[];
    readonly excluded: readonly ExcludedJudge[];
}
