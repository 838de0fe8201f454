import OpenAI from 'openai';
import { z } from 'zod';
import { ClassificationDecision, Classifier } from '../../types';
import { logger } from '../observability';

export type InclusionMode = 'balanced' | 'strict';

export const UNKNOWN_INDUSTRY = 'Unknown';

const FAILED_DECISION: ClassificationDecision = { include: false, industryTag: UNKNOWN_INDUSTRY, degraded: true };

export const DECISION_JSON_SCHEMA = {
    type: 'object',
    properties: {
        include: { type: 'boolean' },
        industry_short: { type: 'string' },
    },
    required: ['include', 'industry_short'],
    additionalProperties: false,
};

// Deliberately loose: wrong field types are repaired, not rejected
const DecisionPayload = z.object({
    include: z.unknown(),
    industry_short: z.unknown(),
});

/** One system + user prompt in, the raw assistant content out. */
export interface CompletionClient {
    complete(systemPrompt: string, userPrompt: string): Promise<string | null>;
}

export class OpenAICompletionClient implements CompletionClient {
    private client: OpenAI;

    constructor(apiKey: string, private readonly model: string, timeoutMs: number) {
        this.client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 1 });
    }

    async complete(systemPrompt: string, userPrompt: string): Promise<string | null> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            temperature: 0,
            response_format: {
                type: 'json_schema',
                json_schema: { name: 'Decision', schema: DECISION_JSON_SCHEMA, strict: true },
            },
            messages: [
                { role: 'system', content: systemPrompt },
                { role: 'user', content: userPrompt },
            ],
        });
        return response.choices[0]?.message?.content ?? null;
    }
}

export function buildSystemPrompt(mode: InclusionMode): string {
    const core = [
        'You are an associate at a search fund.',
        'Return STRICT JSON ONLY per schema. Decide if the company should be INCLUDED in the pipeline and give a 3-5 word industry tag.',
    ].join('\n');
    const rules = [
        'INCLUSION RULES:',
        '- Include when it aligns with positive_signals.',
        '- For unclear cases: include ONLY if it appears to be a bona fide commercial company (own website, products/services pages).',
        '- Exclude: associations, events/conferences, government programs, and non-profits unless there is a clear fee-for-service business line likely within SMB scale.',
        '- Exclude: obvious consumer-only trends without defensibility, crypto, adult, gambling.',
        "INDUSTRY TAG: concise (e.g., 'HVAC services', 'Compliance testing').",
    ].join('\n');
    const strictness = `STRICTNESS MODE: ${mode.toUpperCase()} (balanced favors precision over recall; strict is most conservative).`;
    return `${core}\n\n${rules}\n${strictness}\n`;
}

export function buildUserPrompt(thesis: Record<string, unknown>, name: string, url: string): string {
    return [
        'THESIS:',
        JSON.stringify(thesis, null, 2),
        '',
        'TASK:',
        'Respond EXACTLY as JSON: {"include": <bool>, "industry_short": <str>}.',
        'COMPANY:',
        `Name: ${name.trim()}`,
        `Website: ${url.trim()}`,
        'NOTES:',
        '- Favor inclusion only for true commercial entities; exclude associations/events unless substantial fee-for-service is evident.',
    ].join('\n');
}

/**
 * Include/exclude decision plus a short industry tag from an LLM.
 * Never rejects: any failure becomes an exclusion tagged "Unknown".
 */
export class LlmClassifier implements Classifier {

    constructor(
        private readonly client: CompletionClient,
        private readonly thesis: Record<string, unknown>,
        private readonly mode: InclusionMode = 'balanced',
    ) { }

    async classify(name: string, url: string): Promise<ClassificationDecision> {
        try {
            const content = await this.client.complete(buildSystemPrompt(this.mode), buildUserPrompt(this.thesis, name, url));
            if (!content) {
                logger.warn(`[Classifier] Empty response for ${name}`);
                return FAILED_DECISION;
            }

            const parsed = DecisionPayload.safeParse(JSON.parse(content));
            if (!parsed.success) {
                logger.warn(`[Classifier] Malformed response for ${name}`, { content });
                return FAILED_DECISION;
            }

            const { include, industry_short } = parsed.data;
            return {
                include: typeof include === 'boolean' ? include : false,
                industryTag: typeof industry_short === 'string' && industry_short.trim()
                    ? industry_short.trim()
                    : UNKNOWN_INDUSTRY,
                degraded: false,
            };
        } catch (e) {
            logger.logError(`[Classifier] Classification failed for ${name}`, e);
            return FAILED_DECISION;
        }
    }
}

/** Used when the LLM is disabled: everything passes, tagged for later review. */
export class PassThroughClassifier implements Classifier {
    async classify(): Promise<ClassificationDecision> {
        return { include: true, industryTag: 'TBD', degraded: false };
    }
}
