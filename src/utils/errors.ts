import { ExcludedJudge } from '../types/evaluation';

/**
 * Error taxonomy
 *
 * Provider errors describe a single call attempt and never leave the
 * orchestrator. Only OrchestrationFailedError (every judge failed) and the
 * configuration errors reach callers.
 */

export type ProviderErrorKind = 'transient' | 'malformed' | 'fatal';

export class ProviderError extends Error {
    constructor(
        public readonly kind: ProviderErrorKind,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ProviderError';
    }
}

export class JudgeConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'JudgeConfigurationError';
    }
}

export class OrchestrationFailedError extends Error {
    constructor(
        public readonly excludedJudges: readonly ExcludedJudge[],
        message: string = `All ${excludedJudges.length} judge(s) failed to produce an evaluation`
    ) {
        super(message);
        this.name = 'OrchestrationFailedError';
    }
}

export class AggregationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AggregationError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
