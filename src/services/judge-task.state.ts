import { JudgeResult, JudgeSpec } from '../types/evaluation';
import { RetryUtil } from '../utils/retry.util';

/**
 * Per-judge attempt lifecycle
 *
 *   pending -> in_flight -> succeeded
 *                        -> retry_wait -> in_flight
 *                        -> failed
 *
 * Any non-terminal state moves to failed("cancelled") when the run is cancelled.
 */

export type AttemptOutcome =
    | { kind: 'success'; result: JudgeResult }
    | { kind: 'retryable_failure'; reason: string }
    | { kind: 'terminal_failure'; reason: string };

export type JudgeTaskState =
    | { phase: 'pending' }
    | { phase: 'in_flight'; attempt: number }
    | { phase: 'retry_wait'; attempt: number; delayMs: number; reason: string }
    | { phase: 'succeeded'; attempt: number; result: JudgeResult }
    | { phase: 'failed'; attempt: number; reason: string };

export type SettledJudgeTask = Extract<JudgeTaskState, { phase: 'succeeded' | 'failed' }>;

export type JudgeTaskEvent =
    | { type: 'dispatch' }
    | { type: 'attempt_finished'; outcome: AttemptOutcome }
    | { type: 'backoff_elapsed' }
    | { type: 'cancelled' };

export const CANCELLED_REASON = 'cancelled';

// Upper bound for a single backoff wait
export const MAX_BACKOFF_MS = 60000;

export function isSettled(state: JudgeTaskState): state is SettledJudgeTask {
    return state.phase === 'succeeded' || state.phase === 'failed';
}

/**
 * Pure transition function. Events that do not apply to the current
 * phase leave the state unchanged.
 */
export function transition(state: JudgeTaskState, spec: JudgeSpec, event: JudgeTaskEvent): JudgeTaskState {
    if (isSettled(state)) {
        return state;
    }

    if (event.type === 'cancelled') {
        const attempt = state.phase === 'pending' ? 0 : state.attempt;
        return { phase: 'failed', attempt, reason: CANCELLED_REASON };
    }

    switch (state.phase) {
        case 'pending':
            return event.type === 'dispatch' ? { phase: 'in_flight', attempt: 1 } : state;

        case 'retry_wait':
            return event.type === 'backoff_elapsed' ? { phase: 'in_flight', attempt: state.attempt + 1 } : state;

        case 'in_flight': {
            if (event.type !== 'attempt_finished') {
                return state;
            }

            const { outcome } = event;
            if (outcome.kind === 'success') {
                return { phase: 'succeeded', attempt: state.attempt, result: outcome.result };
            }
            if (outcome.kind === 'terminal_failure') {
                return { phase: 'failed', attempt: state.attempt, reason: outcome.reason };
            }
            if (state.attempt >= spec.maxAttempts) {
                return {
                    phase: 'failed',
                    attempt: state.attempt,
                    reason: `exhausted ${state.attempt} attempt(s): ${outcome.reason}`
                };
            }
            return {
                phase: 'retry_wait',
                attempt: state.attempt,
                delayMs: RetryUtil.backoffDelay(spec.baseBackoffMs, state.attempt, { maxDelay: MAX_BACKOFF_MS }),
                reason: outcome.reason
            };
        }
    }
}
