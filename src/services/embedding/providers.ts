import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import type { EmbeddingProvider } from './types.js';

const vectorSchema = z.array(z.number());

const openAIResponseSchema = z.object({
    data: z.array(z.object({ embedding: vectorSchema, index: z.number().optional() }))
});

// Different TEI deployments answer with different shapes.
const teiResponseSchema = z.union([
    z.object({ data: z.array(z.object({ embedding: vectorSchema })) }).transform((r) => r.data.map((d) => d.embedding)),
    z.object({ embeddings: z.array(vectorSchema) }).transform((r) => r.embeddings),
    z.array(vectorSchema)
]);

const errorBodySchema = z.object({
    error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
    message: z.string().optional()
});

function describeErrorBody(body: unknown, status: number): string {
    const parsed = errorBodySchema.safeParse(body);
    if (!parsed.success) return `HTTP ${status}`;
    const { error, message } = parsed.data;
    if (typeof error === 'string') return error;
    return error?.message ?? message ?? `HTTP ${status}`;
}

async function postJson(provider: string, url: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
    const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body)
    });

    const data: unknown = await res.json().catch((err: unknown) => {
        logger.error(`[EmbeddingService] Failed to parse ${provider} response as JSON`, err);
        throw new Error(`${provider} embeddings returned non-JSON response (HTTP ${res.status})`);
    });

    if (!res.ok) {
        const detail = describeErrorBody(data, res.status);
        if (res.status === 401) throw new Error(`${provider} authentication failed (401): ${detail}`);
        if (res.status === 429) throw new Error(`${provider} rate limit (429): ${detail}`);
        throw new Error(`${provider} embeddings error (HTTP ${res.status}): ${detail}`);
    }
    return data;
}

export interface OpenAIProviderOptions {
    endpoint: string;
    apiKey: string;
    model: string;
    dimension: number;
}

export function createOpenAIProvider(options: OpenAIProviderOptions): EmbeddingProvider {
    return {
        name: 'openai',
        model: options.model,
        async embed(inputs: string[]): Promise<number[][]> {
            const data = await postJson(
                'openai',
                options.endpoint,
                { Authorization: `Bearer ${options.apiKey}` },
                // text-embedding-3 models can shorten their output to the configured dimension
                { model: options.model, input: inputs, dimensions: options.dimension }
            );
            const parsed = openAIResponseSchema.safeParse(data);
            if (!parsed.success) throw new Error('Unexpected OpenAI embeddings response shape');
            const ordered = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
            return ordered.map((d) => d.embedding);
        }
    };
}

export interface TeiProviderOptions {
    endpoint: string;
    apiKey: string;
    model: string;
}

export function createTeiProvider(options: TeiProviderOptions): EmbeddingProvider {
    return {
        name: 'tei',
        model: options.model,
        async embed(inputs: string[]): Promise<number[][]> {
            const headers: Record<string, string> = {};
            if (options.apiKey) headers['x-api-key'] = options.apiKey;
            const data = await postJson('tei', options.endpoint, headers, { model: options.model, input: inputs });
            const parsed = teiResponseSchema.safeParse(data);
            if (!parsed.success) throw new Error('TEI returned unexpected embedding shape');
            return parsed.data;
        }
    };
}
