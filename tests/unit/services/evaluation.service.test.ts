import { describe, it, expect, beforeEach, vi, Mock } from 'vitest';
import { IJudgeClient } from '../../../src/judges/judge-client';
import { ConsensusAggregator } from '../../../src/services/consensus-aggregator.service';
import { EvaluationService, createEvaluationRequest } from '../../../src/services/evaluation.service';
import { JudgeOrchestrator } from '../../../src/services/judge-orchestrator.service';
import { JudgeDefinition } from '../../../src/types/evaluation';
import { ConfigurationError, OrchestrationFailedError, ProviderError } from '../../../src/utils/errors';
import { loadEvaluationConfig } from '../../../src/config/evaluation.config';

const { generateMockJudgePayload: payload } = globalThis.testUtils;

function judge(id: string, weight: number): JudgeDefinition {
    return {
        ...globalThis.testUtils.generateJudgeSpec(id, { weight }),
        model: `vendor/${id}`,
        name: id.toUpperCase()
    };
}

describe('createEvaluationRequest', () => {
    it('should freeze the request', () => {
        const request = createEvaluationRequest('cv', 'jd', 'Focus on leadership');

        expect(request).toEqual({ cvText: 'cv', jdText: 'jd', guidance: 'Focus on leadership' });
        expect(Object.isFrozen(request)).toBe(true);
    });

    it('should drop blank guidance', () => {
        expect(createEvaluationRequest('cv', 'jd', '   ')).toEqual({ cvText: 'cv', jdText: 'jd' });
    });
});

describe('EvaluationService', () => {
    const judges = [judge('judge-a', 0.4), judge('judge-b', 0.3), judge('judge-c', 0.3)];
    const request = createEvaluationRequest(
        globalThis.testUtils.generateMockCV(),
        globalThis.testUtils.generateMockJobDescription()
    );
    let mockLogger = globalThis.testUtils.createMockLogger();
    let calls = new Map<string, Mock<IJudgeClient['call']>>();

    function createService(evaluationTimeoutMs?: number): EvaluationService {
        const clients = new Map<string, IJudgeClient>();
        for (const [id, call] of calls) {
            clients.set(id, { call });
        }
        return new EvaluationService(
            new JudgeOrchestrator(clients, mockLogger, () => Promise.resolve()),
            new ConsensusAggregator(),
            { judges, discordanceThreshold: 25, evaluationTimeoutMs },
            mockLogger
        );
    }

    beforeEach(() => {
        mockLogger = globalThis.testUtils.createMockLogger();
        calls = new Map(judges.map(({ id }) => [id, vi.fn<IJudgeClient['call']>()] as const));
    });

    it('should produce a consensus report from every judge', async () => {
        calls.get('judge-a')?.mockResolvedValue(payload(88));
        calls.get('judge-b')?.mockResolvedValue(payload(85));
        calls.get('judge-c')?.mockResolvedValue(payload(89));

        const report = await createService().evaluate(request);

        expect(report.weightedScore).toBe(87.4);
        expect(report.recommendation).toBe('Strong Recommend');
        expect(report.consensusHighlights).toEqual(['Python', 'Kubernetes']);
        expect(report.perJudge.map(result => result.judgeId)).toEqual(['judge-a', 'judge-b', 'judge-c']);
        expect(report.excludedJudges).toEqual([]);
        expect(Object.isFrozen(report)).toBe(true);
        expect(mockLogger.info).toHaveBeenCalledWith(
            expect.objectContaining({ weightedScore: 87.4, judges: 3, excluded: 0 }),
            'Consensus report generated'
        );
    });

    it('should renormalize weights over the judges that answered', async () => {
        calls.get('judge-a')?.mockRejectedValue(new ProviderError('fatal', 'Authentication failed'));
        calls.get('judge-b')?.mockResolvedValue(payload(80));
        calls.get('judge-c')?.mockResolvedValue(payload(60));

        const report = await createService().evaluate(request);

        expect(report.effectiveWeights).toEqual([
            { judgeId: 'judge-b', weight: 0.5 },
            { judgeId: 'judge-c', weight: 0.5 }
        ]);
        expect(report.weightedScore).toBe(70);
        expect(report.excludedJudges).toEqual([
            { judgeId: 'judge-a', reason: 'Authentication failed', attempts: 1 }
        ]);
    });

    it('should evaluate with a caller-selected subset of judges', async () => {
        calls.get('judge-b')?.mockResolvedValue(payload(64));

        const report = await createService().evaluate(request, [judges[1]]);

        expect(report.weightedScore).toBe(64);
        expect(calls.get('judge-a')).not.toHaveBeenCalled();
    });

    it('should propagate total failure', async () => {
        for (const call of calls.values()) {
            call.mockRejectedValue(new ProviderError('fatal', 'Unknown model'));
        }

        await expect(createService().evaluate(request)).rejects.toThrow(OrchestrationFailedError);
    });

    it('should cancel judges still running when the evaluation deadline passes', async () => {
        calls.get('judge-a')?.mockResolvedValue(payload(72));
        calls.get('judge-b')?.mockResolvedValue(payload(76));
        calls.get('judge-c')?.mockImplementation(() => new Promise(() => undefined));

        const report = await createService().evaluate(request, judges, { timeoutMs: 30 });

        expect(report.perJudge.map(result => result.judgeId)).toEqual(['judge-a', 'judge-b']);
        expect(report.excludedJudges).toEqual([{ judgeId: 'judge-c', reason: 'cancelled', attempts: 1 }]);
    });

    it('should honour the configured evaluation timeout', async () => {
        calls.get('judge-a')?.mockResolvedValue(payload(72));
        calls.get('judge-b')?.mockImplementation(() => new Promise(() => undefined));
        calls.get('judge-c')?.mockImplementation(() => new Promise(() => undefined));

        const report = await createService(30).evaluate(request);

        expect(report.weightedScore).toBe(72);
        expect(report.excludedJudges.map(excluded => excluded.reason)).toEqual(['cancelled', 'cancelled']);
    });

    it('should list the configured judges', () => {
        expect(createService().listJudges().map(definition => definition.name)).toEqual(['JUDGE-A', 'JUDGE-B', 'JUDGE-C']);
    });

    describe('create', () => {
        it('should require an OpenRouter API key', () => {
            const config = loadEvaluationConfig({});

            expect(() => EvaluationService.create(config)).toThrow(ConfigurationError);
        });

        it('should build a service for the configured roster', () => {
            const service = EvaluationService.create(loadEvaluationConfig({ OPENROUTER_API_KEY: 'test-key' }));

            expect(service.listJudges().map(definition => definition.id)).toEqual(['gemini', 'kimi', 'glm']);
        });
    });
});
