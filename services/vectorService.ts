import { ChromaClient, type Collection, type EmbeddingFunction } from 'chromadb';
import { createEmbeddingFunction, resetEmbeddingCache } from './embeddingService.ts';
import { settingsService } from './settingsService.ts';
import { loggerService } from './loggerService.ts';
import type {
    IndexMatch,
    IndexMetadata,
    IndexRecord,
    SimilarityIndex,
    SimilarityIndexFactory,
} from '../types.ts';

let chromaClient: ChromaClient | null = null;
let cachedClientPath: string | null = null;
let cachedEmbeddingFn: EmbeddingFunction | null = null;
const cachedCollections = new Map<string, Collection>();

function resetCache() {
    chromaClient = null;
    cachedClientPath = null;
    cachedEmbeddingFn = null;
    cachedCollections.clear();
    resetEmbeddingCache();
}

function getClient(): ChromaClient {
    const { chromaUrl } = settingsService.getVectorSettings();
    if (!chromaClient || cachedClientPath !== chromaUrl) {
        chromaClient = new ChromaClient({ path: chromaUrl });
        cachedClientPath = chromaUrl;
        cachedCollections.clear();
    }
    return chromaClient;
}

function getEmbeddingFunction(): EmbeddingFunction {
    if (!cachedEmbeddingFn) {
        cachedEmbeddingFn = createEmbeddingFunction(settingsService.getVectorSettings().embeddingModel);
    }
    return cachedEmbeddingFn;
}

async function getCollectionInstance(name: string): Promise<Collection> {
    const client = getClient();
    const cached = cachedCollections.get(name);
    if (cached) return cached;

    try {
        const collection = await client.getOrCreateCollection({
            name,
            embeddingFunction: getEmbeddingFunction(),
            metadata: { 'hnsw:space': 'cosine' },
        });
        cachedCollections.set(name, collection);
        loggerService.info(`[VectorService] Connected to collection '${name}' (${collection.id})`);
        return collection;
    } catch (error) {
        loggerService.error(`[VectorService] Connection failed for collection ${name}`, { error });
        throw error;
    }
}

// Chroma metadata may carry values this core never writes; keep only scalars
function toIndexMetadata(raw: Record<string, unknown> | null | undefined): IndexMetadata {
    const metadata: IndexMetadata = {};
    if (!raw) return metadata;
    for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            metadata[key] = value;
        }
    }
    return metadata;
}

const isMissingCollection = (error: unknown): boolean =>
    error instanceof Error && error.name === 'ChromaNotFoundError';

/**
 * One Chroma collection in cosine space. Documents are embedded by the
 * collection's embedding function; distances come back as cosine distance.
 */
export class ChromaCollectionIndex implements SimilarityIndex {
    constructor(private readonly collectionName: string) {}

    get name(): string {
        return this.collectionName;
    }

    async upsert(records: IndexRecord[]): Promise<void> {
        if (records.length === 0) return;
        const collection = await getCollectionInstance(this.collectionName);
        await collection.upsert({
            ids: records.map((r) => r.id),
            documents: records.map((r) => r.document),
            metadatas: records.map((r) => r.metadata),
        });
    }

    async get(options: { ids?: string[]; limit?: number } = {}): Promise<IndexRecord[]> {
        const collection = await getCollectionInstance(this.collectionName);
        const data = await collection.get({ ids: options.ids, limit: options.limit });
        const ids = data.ids ?? [];
        const documents = data.documents ?? [];
        const metadatas = data.metadatas ?? [];

        return ids.map((id: string, idx: number) => ({
            id,
            document: documents[idx] ?? '',
            metadata: toIndexMetadata(metadatas[idx]),
        }));
    }

    async query(text: string, nResults: number): Promise<IndexMatch[]> {
        const collection = await getCollectionInstance(this.collectionName);
        const data = await collection.query({
            queryTexts: [text],
            nResults,
        });

        const ids = data.ids?.[0] ?? [];
        const documents = data.documents?.[0] ?? [];
        const metadatas = data.metadatas?.[0] ?? [];
        const distances = data.distances?.[0] ?? [];

        return ids.map((id: string, idx: number) => ({
            id,
            document: documents[idx] ?? '',
            metadata: toIndexMetadata(metadatas[idx]),
            distance: distances[idx] ?? 2,
        }));
    }

    async delete(ids: string[]): Promise<void> {
        if (ids.length === 0) return;
        const collection = await getCollectionInstance(this.collectionName);
        await collection.delete({ ids });
    }

    async count(): Promise<number> {
        const collection = await getCollectionInstance(this.collectionName);
        return collection.count();
    }

    async deleteCollection(): Promise<void> {
        cachedCollections.delete(this.collectionName);
        try {
            await getClient().deleteCollection({ name: this.collectionName });
        } catch (error) {
            if (!isMissingCollection(error)) throw error;
            loggerService.debug(`[VectorService] Collection '${this.collectionName}' already absent`);
            return;
        }
        loggerService.info(`[VectorService] Deleted collection '${this.collectionName}'`);
    }
}

export const createChromaIndex = ((collectionName: string): ChromaCollectionIndex =>
    new ChromaCollectionIndex(collectionName)) satisfies SimilarityIndexFactory;

export const vectorService = {
    async healthCheck(): Promise<boolean> {
        try {
            const heartbeat = await getClient().heartbeat();
            return typeof heartbeat === 'number' || typeof heartbeat === 'string';
        } catch (error) {
            loggerService.warn('[VectorService] Heartbeat failed', { error });
            return false;
        }
    },
};

export const __vectorTestUtils = {
    resetCache
};
