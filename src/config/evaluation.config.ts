import { z } from 'zod';
import { JudgeDefinition, RecommendationThresholds } from '../types/evaluation';
import { ConfigurationError } from '../utils/errors';

/**
 * Default judge roster
 *
 * Three models with different strengths; weights are relative and get
 * renormalized over whichever judges actually answer.
 */
export const DEFAULT_JUDGES: ReadonlyArray<Pick<JudgeDefinition, 'id' | 'model' | 'name' | 'role' | 'weight'>> = [
    { id: 'gemini', model: 'google/gemini-3-flash-preview', name: 'Gemini 3 Flash Preview', role: 'Reasoning Lead', weight: 0.35 },
    { id: 'kimi', model: 'moonshotai/kimi-k2-0905', name: 'Kimi K2', role: 'Analytical', weight: 0.35 },
    { id: 'glm', model: 'z-ai/glm-4.7', name: 'GLM-4.7', role: 'Validation', weight: 0.30 }
];

const judgeOverrideSchema = z.object({
    id: z.string().min(1),
    model: z.string().min(1),
    name: z.string().min(1).optional(),
    role: z.string().optional(),
    weight: z.number().min(0),
    maxAttempts: z.number().int().min(1).optional(),
    timeoutMs: z.number().positive().optional(),
    baseBackoffMs: z.number().min(0).optional()
});

const envSchema = z.object({
    OPENROUTER_API_KEY: z.string().min(1).optional(),
    OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
    JUDGE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    JUDGE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    JUDGE_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    JUDGES: z.string().optional(),
    DISCORDANCE_THRESHOLD: z.coerce.number().min(0).default(25),
    BAND_CONSIDER_MIN: z.coerce.number().default(50),
    BAND_RECOMMEND_MIN: z.coerce.number().default(70),
    BAND_STRONG_RECOMMEND_MIN: z.coerce.number().default(85),
    EVALUATION_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

export interface EvaluationConfig {
    openRouter: {
        apiKey?: string;
        baseUrl: string;
        temperature: number;
    };
    judges: JudgeDefinition[];
    discordanceThreshold: number;
    recommendationThresholds: RecommendationThresholds;
    evaluationTimeoutMs?: number;
}

/**
 * Load and validate evaluation settings from the environment
 */
export function loadEvaluationConfig(env: NodeJS.ProcessEnv = process.env): EvaluationConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    const settings = parsed.data;

    const defaults = {
        maxAttempts: settings.JUDGE_MAX_ATTEMPTS,
        timeoutMs: settings.JUDGE_TIMEOUT_MS,
        baseBackoffMs: settings.JUDGE_BACKOFF_MS
    };

    const judges: JudgeDefinition[] = settings.JUDGES
        ? parseJudgeOverrides(settings.JUDGES).map(judge => ({
            id: judge.id,
            model: judge.model,
            name: judge.name ?? judge.id,
            role: judge.role,
            weight: judge.weight,
            maxAttempts: judge.maxAttempts ?? defaults.maxAttempts,
            timeoutMs: judge.timeoutMs ?? defaults.timeoutMs,
            baseBackoffMs: judge.baseBackoffMs ?? defaults.baseBackoffMs
        }))
        : DEFAULT_JUDGES.map(judge => ({ ...defaults, ...judge }));

    const ids = new Set(judges.map(judge => judge.id));
    if (ids.size !== judges.length) {
        throw new ConfigurationError('Invalid configuration: JUDGES contains duplicate ids');
    }
    if (!judges.some(judge => judge.weight > 0)) {
        throw new ConfigurationError('Invalid configuration: at least one judge needs a weight greater than 0');
    }

    const recommendationThresholds: RecommendationThresholds = {
        consider: settings.BAND_CONSIDER_MIN,
        recommend: settings.BAND_RECOMMEND_MIN,
        strongRecommend: settings.BAND_STRONG_RECOMMEND_MIN
    };
    const { consider, recommend, strongRecommend } = recommendationThresholds;
    if (!(consider > 0 && consider < recommend && recommend < strongRecommend && strongRecommend <= 100)) {
        throw new ConfigurationError('Invalid configuration: recommendation bands must be strictly ascending within (0, 100]');
    }

    return {
        openRouter: {
            apiKey: settings.OPENROUTER_API_KEY,
            baseUrl: settings.OPENROUTER_BASE_URL,
            temperature: settings.JUDGE_TEMPERATURE
        },
        judges,
        discordanceThreshold: settings.DISCORDANCE_THRESHOLD,
        recommendationThresholds,
        evaluationTimeoutMs: settings.EVALUATION_TIMEOUT_MS
    };
}

function parseJudgeOverrides(raw: string): z.infer<typeof judgeOverrideSchema>[] {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Invalid configuration: JUDGES is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
    }

    const parsed = z.array(judgeOverrideSchema).min(1).safeParse(json);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration: JUDGES ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
        .join('; ');
}
