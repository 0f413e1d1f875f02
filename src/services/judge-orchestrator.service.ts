import { ILogger } from '../config/logger';
import { IJudgeClient, RawJudgePayload } from '../judges/judge-client';
import { buildRepairInstruction } from '../judges/judge-prompt';
import { toJudgeResult, validateJudgePayload } from '../judges/judge-payload.schema';
import {
    EvaluationRequest,
    ExcludedJudge,
    JudgeResult,
    JudgeSpec,
    OrchestrationOutcome
} from '../types/evaluation';
import {
    JudgeConfigurationError,
    OrchestrationFailedError,
    ProviderError,
    errorMessage
} from '../utils/errors';
import { RetryUtil, SleepFn } from '../utils/retry.util';
import {
    AttemptOutcome,
    CANCELLED_REASON,
    JudgeTaskState,
    SettledJudgeTask,
    transition
} from './judge-task.state';

export interface IJudgeOrchestrator {
    evaluate(
        request: EvaluationRequest,
        judges: readonly JudgeSpec[],
        options?: { signal?: AbortSignal }
    ): Promise<OrchestrationOutcome>;
}

class CallCancelledError extends Error {
    constructor() {
        super(CANCELLED_REASON);
        this.name = 'CallCancelledError';
    }
}

/**
 * Judge Orchestrator
 *
 * Sends the same evaluation to every configured judge at once and waits for
 * all of them. Each judge runs its own attempt loop (timeout, one repair call
 * for malformed payloads, exponential backoff between retries); one judge's
 * failure or slowness never touches another's schedule.
 */
export class JudgeOrchestrator implements IJudgeOrchestrator {
    constructor(
        private clients: ReadonlyMap<string, IJudgeClient>,
        private logger: ILogger,
        private sleep: SleepFn = RetryUtil.sleep
    ) { }

    async evaluate(
        request: EvaluationRequest,
        judges: readonly JudgeSpec[],
        options: { signal?: AbortSignal } = {}
    ): Promise<OrchestrationOutcome> {
        validateJudgeSpecs(judges);

        const signal = options.signal ?? new AbortController().signal;

        this.logger.info({
            judges: judges.map(judge => judge.id),
            cvLength: request.cvText.length,
            jdLength: request.jdText.length,
            hasGuidance: Boolean(request.guidance)
        }, 'Dispatching evaluation to judges');

        const settled = await Promise.all(judges.map(spec => this.runJudge(spec, request, signal)));

        const perJudge: JudgeResult[] = [];
        const excluded: ExcludedJudge[] = [];

        settled.forEach((state, index) => {
            if (state.phase === 'succeeded') {
                perJudge.push(state.result);
            } else {
                excluded.push({ judgeId: judges[index].id, reason: state.reason, attempts: state.attempt });
            }
        });

        if (perJudge.length === 0) {
            this.logger.error({ excluded }, 'Every judge failed; no consensus possible');
            throw new OrchestrationFailedError(excluded);
        }

        this.logger.info({
            succeeded: perJudge.map(result => result.judgeId),
            excluded: excluded.map(judge => judge.judgeId)
        }, 'Judge fan-out completed');

        return { perJudge, excluded };
    }

    /**
     * Drive one judge's state machine until it settles. Never rejects.
     */
    private async runJudge(spec: JudgeSpec, request: EvaluationRequest, signal: AbortSignal): Promise<SettledJudgeTask> {
        const client = this.clients.get(spec.id);
        if (!client) {
            const reason = `No client registered for judge "${spec.id}"`;
            this.logger.warn({ judgeId: spec.id, attempts: 0, reason }, 'Judge excluded from consensus');
            return { phase: 'failed', attempt: 0, reason };
        }

        let state: JudgeTaskState = { phase: 'pending' };

        for (;;) {
            if (signal.aborted) {
                state = transition(state, spec, { type: 'cancelled' });
            }

            switch (state.phase) {
                case 'succeeded':
                    return state;

                case 'failed':
                    this.logger.warn({
                        judgeId: spec.id,
                        attempts: state.attempt,
                        reason: state.reason
                    }, 'Judge excluded from consensus');
                    return state;

                case 'pending':
                    state = transition(state, spec, { type: 'dispatch' });
                    break;

                case 'in_flight': {
                    const outcome = await this.performAttempt(spec, client, request, state.attempt, signal);
                    state = transition(state, spec, { type: 'attempt_finished', outcome });
                    break;
                }

                case 'retry_wait':
                    this.logger.info({
                        judgeId: spec.id,
                        attempt: state.attempt,
                        delay: state.delayMs,
                        reason: state.reason
                    }, `Retrying judge ${spec.id} in ${state.delayMs}ms`);
                    await this.sleep(state.delayMs, signal);
                    // sleep returns early on abort; no further attempt was made
                    state = transition(state, spec, signal.aborted ? { type: 'cancelled' } : { type: 'backoff_elapsed' });
                    break;
            }
        }
    }

    /**
     * One attempt: a call, plus a single repair call if the payload is malformed
     */
    private async performAttempt(
        spec: JudgeSpec,
        client: IJudgeClient,
        request: EvaluationRequest,
        attempt: number,
        signal: AbortSignal
    ): Promise<AttemptOutcome> {
        let repairInstruction: string | undefined;
        let problem = '';

        for (let pass = 1; pass <= 2; pass++) {
            let raw: RawJudgePayload;
            try {
                raw = await this.callWithTimeout(spec, client, request, signal, repairInstruction);
            } catch (error) {
                const outcome = classifyCallFailure(error);
                if (outcome) {
                    this.logger.warn({
                        judgeId: spec.id,
                        attempt,
                        maxAttempts: spec.maxAttempts,
                        outcome: outcome.kind,
                        reason: outcome.reason
                    }, `Judge ${spec.id} failed on attempt ${attempt}`);
                    return outcome;
                }
                problem = errorMessage(error);
                repairInstruction = buildRepairInstruction(problem);
                continue;
            }

            const validation = validateJudgePayload(raw);
            if (validation.valid) {
                if (attempt > 1 || pass > 1) {
                    this.logger.info({ judgeId: spec.id, attempt, repaired: pass > 1 }, `Judge ${spec.id} succeeded on attempt ${attempt}`);
                }
                return { kind: 'success', result: toJudgeResult(spec.id, validation.payload, attempt) };
            }

            this.logger.warn({
                judgeId: spec.id,
                attempt,
                pass,
                problem: validation.problem
            }, `Judge ${spec.id} returned a malformed payload`);
            problem = validation.problem;
            repairInstruction = buildRepairInstruction(problem);
        }

        return { kind: 'retryable_failure', reason: `malformed payload after repair attempt: ${problem}` };
    }

    /**
     * Race the client call against the judge timeout and caller cancellation.
     * The client gets a signal that aborts on either.
     */
    private async callWithTimeout(
        spec: JudgeSpec,
        client: IJudgeClient,
        request: EvaluationRequest,
        signal: AbortSignal,
        repairInstruction?: string
    ): Promise<RawJudgePayload> {
        if (signal.aborted) {
            throw new CallCancelledError();
        }

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        let onCancel: (() => void) | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new ProviderError('transient', `Timed out after ${spec.timeoutMs}ms`);
                reject(error);
                controller.abort(error);
            }, spec.timeoutMs);
        });

        const cancellation = new Promise<never>((_, reject) => {
            onCancel = () => {
                const error = new CallCancelledError();
                reject(error);
                controller.abort(error);
            };
            signal.addEventListener('abort', onCancel, { once: true });
        });

        try {
            return await Promise.race([
                client.call(request.cvText, request.jdText, request.guidance, spec.timeoutMs, {
                    signal: controller.signal,
                    repairInstruction
                }),
                timeout,
                cancellation
            ]);
        } finally {
            clearTimeout(timer);
            if (onCancel) {
                signal.removeEventListener('abort', onCancel);
            }
        }
    }
}

/**
 * Map a failed call onto an attempt outcome. Returns undefined for
 * malformed payloads, which earn a repair call instead.
 */
function classifyCallFailure(error: unknown): Exclude<AttemptOutcome, { kind: 'success' }> | undefined {
    if (error instanceof CallCancelledError) {
        return { kind: 'terminal_failure', reason: CANCELLED_REASON };
    }

    if (error instanceof ProviderError) {
        switch (error.kind) {
            case 'malformed':
                return undefined;
            case 'transient':
                return { kind: 'retryable_failure', reason: error.message };
            case 'fatal':
                return { kind: 'terminal_failure', reason: error.message };
        }
    }

    return RetryUtil.isRetryableError(error)
        ? { kind: 'retryable_failure', reason: errorMessage(error) }
        : { kind: 'terminal_failure', reason: errorMessage(error) };
}

/**
 * Reject judge rosters the aggregator could never turn into a report
 */
export function validateJudgeSpecs(judges: readonly JudgeSpec[]): void {
    if (judges.length === 0) {
        throw new JudgeConfigurationError('At least one judge must be configured');
    }

    const seen = new Set<string>();
    for (const judge of judges) {
        if (seen.has(judge.id)) {
            throw new JudgeConfigurationError(`Duplicate judge id "${judge.id}"`);
        }
        seen.add(judge.id);

        if (!Number.isFinite(judge.weight) || judge.weight < 0) {
            throw new JudgeConfigurationError(`Judge "${judge.id}" has invalid weight ${judge.weight}`);
        }
        if (!Number.isInteger(judge.maxAttempts) || judge.maxAttempts < 1) {
            throw new JudgeConfigurationError(`Judge "${judge.id}" must allow at least one attempt`);
        }
        if (!(judge.timeoutMs > 0)) {
            throw new JudgeConfigurationError(`Judge "${judge.id}" must have a positive timeout`);
        }
        if (!(judge.baseBackoffMs >= 0)) {
            throw new JudgeConfigurationError(`Judge "${judge.id}" must have a non-negative backoff`);
        }
    }

    if (!judges.some(judge => judge.weight > 0)) {
        throw new JudgeConfigurationError('At least one judge must have a weight greater than 0');
    }
}
