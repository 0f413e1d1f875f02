import { z } from 'zod';
import { JudgeResult } from '../types/evaluation';
import { RawJudgePayload } from './judge-client';

const stringList = z.array(z.string()).default([]);

// Shape the judge prompt asks for
export const judgePayloadSchema = z.object({
    score: z.number({ required_error: 'score is required' })
        .int('score must be an integer')
        .min(0, 'score must be between 0 and 100')
        .max(100, 'score must be between 0 and 100'),
    matching_skills: stringList,
    missing_requirements: stringList,
    red_flags: stringList,
    strengths: stringList,
    rationale: z.string({ required_error: 'rationale is required' })
});

export type JudgePayload = z.infer<typeof judgePayloadSchema>;

export type PayloadValidation =
    | { valid: true; payload: JudgePayload }
    | { valid: false; problem: string };

/**
 * Validate a raw payload, describing the first few issues when it fails
 */
export function validateJudgePayload(raw: RawJudgePayload): PayloadValidation {
    const parsed = judgePayloadSchema.safeParse(raw);
    if (parsed.success) {
        return { valid: true, payload: parsed.data };
    }

    const problem = parsed.error.issues
        .slice(0, 3)
        .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
        .join('; ');

    return { valid: false, problem };
}

export function toJudgeResult(judgeId: string, payload: JudgePayload, rawAttempts: number): JudgeResult {
    return {
        judgeId,
        score: payload.score,
        matchedRequirements: payload.matching_skills,
        gaps: payload.missing_requirements,
        redFlags: payload.red_flags,
        strengths: payload.strengths,
        rationale: payload.rationale,
        rawAttempts
    };
}
