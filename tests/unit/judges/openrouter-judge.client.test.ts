import { describe, it, expect, beforeEach, vi } from 'vitest';
import OpenAI from 'openai';
import {
    IChatClient,
    OpenRouterJudgeClient,
    extractJsonText,
    toProviderError
} from '../../../src/judges/openrouter-judge.client';
import { ProviderError } from '../../../src/utils/errors';

function completion(content: string | null) {
    return {
        choices: [{ message: { content } }],
        usage: { total_tokens: 321 }
    };
}

describe('OpenRouter Judge Client - Dependency Injection Tests', () => {
    const create = vi.fn();
    const mockClient: IChatClient = { chat: { completions: { create } } };
    const mockLogger = globalThis.testUtils.createMockLogger();
    let client: OpenRouterJudgeClient;

    beforeEach(() => {
        vi.clearAllMocks();
        client = new OpenRouterJudgeClient(mockClient, 'test/judge-model', mockLogger, 0.2);
    });

    describe('Constructor and Factory', () => {
        it('should create client with factory method', () => {
            const prodClient = OpenRouterJudgeClient.create('test/judge-model', {
                apiKey: 'test-key',
                baseUrl: 'https://openrouter.ai/api/v1',
                temperature: 0.3
            });
            expect(prodClient).toBeInstanceOf(OpenRouterJudgeClient);
        });
    });

    describe('call', () => {
        it('should request a JSON completion and return the parsed payload', async () => {
            const payload = globalThis.testUtils.generateMockJudgePayload(81);
            create.mockResolvedValue(completion(JSON.stringify(payload)));
            const controller = new AbortController();

            const result = await client.call('cv text', 'jd text', 'Focus on leadership', 5000, {
                signal: controller.signal
            });

            expect(result).toEqual(payload);
            expect(create).toHaveBeenCalledTimes(1);
            const [params, options] = create.mock.calls[0];
            expect(params).toMatchObject({
                model: 'test/judge-model',
                temperature: 0.2,
                response_format: { type: 'json_object' }
            });
            expect(params.messages).toHaveLength(2);
            expect(params.messages[0].content).toContain('**Special Guidance:** Focus on leadership');
            expect(params.messages[1].content).toContain('cv text');
            expect(options).toEqual({ signal: controller.signal, timeout: 5000 });
        });

        it('should append the repair instruction as a final message', async () => {
            create.mockResolvedValue(completion('{"score": 50, "rationale": "ok"}'));

            await client.call('cv', 'jd', undefined, 1000, { repairInstruction: 'Fix the score field' });

            const [params] = create.mock.calls[0];
            expect(params.messages).toHaveLength(3);
            expect(params.messages[2]).toEqual({ role: 'user', content: 'Fix the score field' });
            expect(params.messages[0].content).not.toContain('Special Guidance');
        });

        it('should unwrap fenced JSON', async () => {
            create.mockResolvedValue(completion('```json\n{"score": 64, "rationale": "fine"}\n```'));

            await expect(client.call('cv', 'jd', undefined, 1000)).resolves.toEqual({ score: 64, rationale: 'fine' });
        });

        it('should report empty content as malformed', async () => {
            create.mockResolvedValue(completion(null));

            const error = await client.call('cv', 'jd', undefined, 1000).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toMatchObject({ kind: 'malformed', message: 'No content returned from test/judge-model' });
        });

        it('should report invalid JSON as malformed', async () => {
            create.mockResolvedValue(completion('I think the candidate scores 80'));

            await expect(client.call('cv', 'jd', undefined, 1000)).rejects.toMatchObject({ kind: 'malformed' });
        });

        it('should map SDK errors onto provider errors', async () => {
            create.mockRejectedValue(new OpenAI.APIError(401, undefined, 'Invalid API key', undefined));

            await expect(client.call('cv', 'jd', undefined, 1000)).rejects.toMatchObject({ kind: 'fatal' });
        });
    });

    describe('toProviderError', () => {
        it('should treat rate limits and server errors as transient', () => {
            expect(toProviderError(new OpenAI.APIError(429, undefined, 'Too many requests', undefined)).kind).toBe('transient');
            expect(toProviderError(new OpenAI.APIError(503, undefined, 'Unavailable', undefined)).kind).toBe('transient');
        });

        it('should treat authentication and bad requests as fatal', () => {
            expect(toProviderError(new OpenAI.APIError(403, undefined, 'Forbidden', undefined)).kind).toBe('fatal');
            expect(toProviderError(new OpenAI.APIError(400, undefined, 'Unknown model', undefined)).kind).toBe('fatal');
        });

        it('should treat connection failures as transient', () => {
            expect(toProviderError(new OpenAI.APIConnectionTimeoutError()).kind).toBe('transient');
            expect(toProviderError(new OpenAI.APIConnectionError({ message: 'socket hang up' })).kind).toBe('transient');
        });

        it('should classify unknown errors by their shape', () => {
            expect(toProviderError({ code: 'ECONNRESET' }).kind).toBe('transient');
            expect(toProviderError(new Error('boom')).kind).toBe('fatal');
        });

        it('should pass provider errors through unchanged', () => {
            const error = new ProviderError('malformed', 'bad json');

            expect(toProviderError(error)).toBe(error);
        });
    });

    describe('extractJsonText', () => {
        it('should leave bare JSON alone', () => {
            expect(extractJsonText('  {"score": 1}  ')).toBe('{"score": 1}');
        });

        it('should strip an unlabelled fence', () => {
            expect(extractJsonText('```\n{"score": 1}\n```')).toBe('{"score": 1}');
        });
    });
});
