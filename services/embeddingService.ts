import OpenAI from 'openai';
import type { EmbeddingFunction } from 'chromadb';
import { settingsService } from './settingsService.ts';
import { loggerService } from './loggerService.ts';

let embeddingClient: OpenAI | null = null;
let cachedEndpoint: string | null = null;

function getEmbeddingClient(): OpenAI {
    const { endpoint, apiKey } = settingsService.getInferenceSettings();
    if (!embeddingClient || cachedEndpoint !== endpoint) {
        embeddingClient = new OpenAI({ baseURL: endpoint, apiKey: apiKey || 'lm-studio' });
        cachedEndpoint = endpoint;
    }
    return embeddingClient;
}

export async function embedTexts(texts: string[], model?: string): Promise<number[][]> {
    if (texts.length === 0) return [];

    const embeddingModel = model || settingsService.getVectorSettings().embeddingModel;
    try {
        const response = await getEmbeddingClient().embeddings.create({
            model: embeddingModel,
            input: texts,
        });
        // The API may return entries out of order; index carries the input position
        return [...response.data]
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    } catch (error) {
        loggerService.error('[EmbeddingService] Embedding generation failed', { model: embeddingModel, error });
        throw error;
    }
}

export async function embedText(text: string, model?: string): Promise<number[]> {
    const [embedding] = await embedTexts([text], model);
    return embedding ?? [];
}

/** Embedding function handed to Chroma collections; the embedding model is opaque to the rest of the core. */
export function createEmbeddingFunction(model?: string): EmbeddingFunction {
    return {
        async generate(texts: string[]): Promise<number[][]> {
            return embedTexts(texts, model);
        }
    };
}

export function resetEmbeddingCache() {
    embeddingClient = null;
    cachedEndpoint = null;
}
