export type ProviderPreference = 'auto' | 'tei' | 'openai' | 'fallback';
export type ProviderName = 'tei' | 'openai' | 'fallback';

/**
 * A remote embedding model. Returns one raw vector per input, in input order.
 */
export interface EmbeddingProvider {
    readonly name: Exclude<ProviderName, 'fallback'>;
    readonly model: string;
    embed(inputs: string[]): Promise<number[][]>;
}

export interface EmbeddingServiceOptions {
    /** Candidate providers, tried in order when the service initializes. */
    providers: EmbeddingProvider[];
    /** Model name reported when no provider is active. */
    model: string;
    dimension: number;
}

export interface EmbeddingConfig {
    provider: ProviderName;
    model: string;
    dimension: number;
    initialized: boolean;
}

export interface EmbeddingHealth {
    healthy: boolean;
    message: string;
}
