import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { logger, ILogger } from '../config/logger';
import { ProviderError, errorMessage } from '../utils/errors';
import { RetryUtil } from '../utils/retry.util';
import { IJudgeClient, JudgeCallOptions, RawJudgePayload } from './judge-client';
import { buildJudgeMessages } from './judge-prompt';

// Interface for better testability
export interface IChatClient {
    chat: {
        completions: {
            create(
                params: ChatCompletionCreateParamsNonStreaming,
                options?: { signal?: AbortSignal; timeout?: number }
            ): Promise<ChatCompletion>;
        };
    };
}

export interface OpenRouterSettings {
    apiKey: string;
    baseUrl: string;
    temperature: number;
    appName?: string;
}

/**
 * OpenRouter Judge Client
 *
 * Judge adapter for any chat model served through OpenRouter's
 * OpenAI-compatible endpoint. SDK retries are disabled: the orchestrator
 * owns retry and backoff.
 */
export class OpenRouterJudgeClient implements IJudgeClient {
    constructor(
        private client: IChatClient,
        private model: string,
        private logger: ILogger,
        private temperature: number = 0.3
    ) { }

    /**
     * Factory method for production use
     */
    static create(model: string, settings: OpenRouterSettings): OpenRouterJudgeClient {
        const client = new OpenAI({
            apiKey: settings.apiKey,
            baseURL: settings.baseUrl,
            maxRetries: 0,
            defaultHeaders: settings.appName ? { 'X-Title': settings.appName } : undefined
        });

        return new OpenRouterJudgeClient(client, model, logger, settings.temperature);
    }

    async call(
        cvText: string,
        jdText: string,
        guidance: string | undefined,
        timeoutMs: number,
        options: JudgeCallOptions = {}
    ): Promise<RawJudgePayload> {
        const messages = buildJudgeMessages(cvText, jdText, guidance, options.repairInstruction);

        this.logger.debug({
            model: this.model,
            messagesCount: messages.length,
            repair: Boolean(options.repairInstruction)
        }, 'Requesting judge completion');

        let response: ChatCompletion;
        try {
            response = await this.client.chat.completions.create({
                model: this.model,
                messages,
                temperature: this.temperature,
                response_format: { type: 'json_object' }
            }, {
                signal: options.signal,
                timeout: timeoutMs
            });
        } catch (error) {
            throw toProviderError(error);
        }

        const content = response.choices[0]?.message?.content;
        if (!content) {
            throw new ProviderError('malformed', `No content returned from ${this.model}`);
        }

        this.logger.debug({
            model: this.model,
            tokensUsed: response.usage?.total_tokens || 0,
            contentLength: content.length
        }, 'Judge completion received');

        try {
            const payload: unknown = JSON.parse(extractJsonText(content));
            return payload;
        } catch (error) {
            throw new ProviderError('malformed', `Response from ${this.model} is not valid JSON: ${errorMessage(error)}`, { cause: error });
        }
    }
}

/**
 * Strip a Markdown code fence some models wrap around JSON output
 */
export function extractJsonText(content: string): string {
    const trimmed = content.trim();
    const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
    return fenced ? fenced[1] : trimmed;
}

/**
 * Map SDK and transport failures onto the provider error taxonomy
 */
export function toProviderError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
        return error;
    }

    if (error instanceof OpenAI.APIUserAbortError) {
        return new ProviderError('transient', 'Request aborted', { cause: error });
    }

    if (error instanceof OpenAI.APIConnectionError) {
        return new ProviderError('transient', error.message, { cause: error });
    }

    if (error instanceof OpenAI.APIError) {
        const status = error.status;
        if (status === 401 || status === 403) {
            return new ProviderError('fatal', `Authentication failed: ${error.message}`, { cause: error });
        }
        const kind = RetryUtil.isRetryableError(error) ? 'transient' : 'fatal';
        return new ProviderError(kind, error.message, { cause: error });
    }

    return new ProviderError(
        RetryUtil.isRetryableError(error) ? 'transient' : 'fatal',
        errorMessage(error),
        { cause: error }
    );
}
