import { logger, ILogger } from '../config/logger';
import { EvaluationConfig, loadEvaluationConfig } from '../config/evaluation.config';
import { IJudgeClient } from '../judges/judge-client';
import { OpenRouterJudgeClient } from '../judges/openrouter-judge.client';
import {
    ConsensusReport,
    EvaluationRequest,
    JudgeDefinition,
    JudgeSpec
} from '../types/evaluation';
import { ConfigurationError } from '../utils/errors';
import { deepFreeze } from '../utils/freeze.util';
import { ConsensusAggregator, IConsensusAggregator } from './consensus-aggregator.service';
import { IJudgeOrchestrator, JudgeOrchestrator } from './judge-orchestrator.service';

export interface EvaluateOptions {
    signal?: AbortSignal;
    // Caller-level deadline; overrides the configured evaluation timeout
    timeoutMs?: number;
}

export interface IEvaluationService {
    evaluate(request: EvaluationRequest, judges?: readonly JudgeSpec[], options?: EvaluateOptions): Promise<ConsensusReport>;
    listJudges(): readonly JudgeDefinition[];
}

/**
 * Build an immutable evaluation request. Blank guidance is dropped.
 */
export function createEvaluationRequest(cvText: string, jdText: string, guidance?: string): EvaluationRequest {
    const trimmedGuidance = guidance?.trim();
    return deepFreeze(trimmedGuidance ? { cvText, jdText, guidance: trimmedGuidance } : { cvText, jdText });
}

/**
 * Evaluation Service with Dependency Injection
 *
 * Entry point for callers: fans the request out through the orchestrator
 * and hands the surviving results to the aggregator.
 */
export class EvaluationService implements IEvaluationService {
    constructor(
        private orchestrator: IJudgeOrchestrator,
        private aggregator: IConsensusAggregator,
        private config: Pick<EvaluationConfig, 'judges' | 'discordanceThreshold' | 'evaluationTimeoutMs'>,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: EvaluationConfig = loadEvaluationConfig()): EvaluationService {
        const { apiKey, baseUrl, temperature } = config.openRouter;
        if (!apiKey) {
            throw new ConfigurationError('OpenRouter API key required. Set the OPENROUTER_API_KEY environment variable.');
        }

        const clients = new Map<string, IJudgeClient>(
            config.judges.map(judge => [
                judge.id,
                OpenRouterJudgeClient.create(judge.model, { apiKey, baseUrl, temperature, appName: 'Ensemble CV Judge' })
            ])
        );

        return new EvaluationService(
            new JudgeOrchestrator(clients, logger),
            new ConsensusAggregator(config.recommendationThresholds),
            config,
            logger
        );
    }

    listJudges(): readonly JudgeDefinition[] {
        return this.config.judges;
    }

    async evaluate(
        request: EvaluationRequest,
        judges: readonly JudgeSpec[] = this.config.judges,
        options: EvaluateOptions = {}
    ): Promise<ConsensusReport> {
        const controller = new AbortController();
        const timeoutMs = options.timeoutMs ?? this.config.evaluationTimeoutMs;
        const cancel = () => controller.abort();

        if (options.signal?.aborted) {
            controller.abort();
        }
        options.signal?.addEventListener('abort', cancel, { once: true });
        const timer = timeoutMs !== undefined ? setTimeout(cancel, timeoutMs) : undefined;

        try {
            const { perJudge, excluded } = await this.orchestrator.evaluate(request, judges, { signal: controller.signal });
            const report = this.aggregator.aggregate(perJudge, judges, this.config.discordanceThreshold, excluded);

            this.logger.info({
                weightedScore: report.weightedScore,
                recommendation: report.recommendation,
                discordant: report.discordant,
                judges: report.perJudge.length,
                excluded: report.excludedJudges.length
            }, 'Consensus report generated');

            return report;
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', cancel);
        }
    }
}

// Singleton instance
let evaluationService: EvaluationService | null = null;

export function getEvaluationService(): EvaluationService {
    if (!evaluationService) {
        evaluationService = EvaluationService.create();
    }
    return evaluationService;
}
