import {
    EMBEDDING_PROVIDER,
    EMBEDDING_MODEL,
    OPENAI_API_KEY,
    OPENAI_EMBEDDING_MODEL,
    TEI_API_KEY,
    TEI_BASE_URL,
    getEmbeddingDimension
} from '../../config.js';
import { logger } from '../../utils/logger.js';
import { createOpenAIProvider, createTeiProvider } from './providers.js';
import type { EmbeddingProvider, EmbeddingServiceOptions, ProviderPreference } from './types.js';

export const OPENAI_ENDPOINT = 'https://api.openai.com/v1/embeddings';

export function teiEmbeddingEndpoint(baseUrl: string): string {
    return (baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl) + '/v1/embeddings';
}

function parsePreference(raw: string): ProviderPreference {
    switch (raw) {
        case 'tei':
        case 'openai':
        case 'fallback':
        case 'auto':
            return raw;
        default:
            logger.warn(`[EmbeddingService] Unknown EMBEDDING_PROVIDER "${raw}", using auto`);
            return 'auto';
    }
}

/**
 * Builds the service options from the environment. `auto` offers OpenAI
 * first and TEI second, each only when its settings are present.
 */
export function embeddingOptionsFromEnv(): EmbeddingServiceOptions {
    const preference = parsePreference(EMBEDDING_PROVIDER);
    const dimension = getEmbeddingDimension();
    const openai = OPENAI_API_KEY
        ? createOpenAIProvider({ endpoint: OPENAI_ENDPOINT, apiKey: OPENAI_API_KEY, model: OPENAI_EMBEDDING_MODEL, dimension })
        : null;
    const tei = TEI_BASE_URL
        ? createTeiProvider({ endpoint: teiEmbeddingEndpoint(TEI_BASE_URL), apiKey: TEI_API_KEY, model: EMBEDDING_MODEL })
        : null;

    let providers: EmbeddingProvider[] = [];
    if (preference === 'openai') {
        if (!openai) logger.warn('[EmbeddingService] EMBEDDING_PROVIDER=openai but OPENAI_API_KEY is not set');
        providers = openai ? [openai] : [];
    } else if (preference === 'tei') {
        if (!tei) logger.warn('[EmbeddingService] EMBEDDING_PROVIDER=tei but TEI_BASE_URL is not set');
        providers = tei ? [tei] : [];
    } else if (preference === 'auto') {
        providers = [openai, tei].filter((p): p is EmbeddingProvider => p !== null);
    }

    return { providers, model: EMBEDDING_MODEL, dimension };
}
