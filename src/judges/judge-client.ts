/**
 * Judge Client Contract
 *
 * Every evaluation provider adapter implements this. The orchestrator only
 * ever talks to judges through it, so adding a provider never touches
 * orchestration or aggregation.
 */

// Unvalidated structure; the orchestrator checks it against the payload schema
export type RawJudgePayload = unknown;

export interface JudgeCallOptions {
    signal?: AbortSignal;
    // Corrective instruction sent when the previous payload failed validation
    repairInstruction?: string;
}

export interface IJudgeClient {
    /**
     * Resolve with the provider's parsed payload, or reject with a
     * ProviderError describing whether the failure is worth retrying.
     */
    call(
        cvText: string,
        jdText: string,
        guidance: string | undefined,
        timeoutMs: number,
        options?: JudgeCallOptions
    ): Promise<RawJudgePayload>;
}
