import type {
    IndexMatch,
    IndexRecord,
    JsonObject,
    LanguageModelCaller,
    ModelCallOptions,
    SimilarityIndex,
    SimilarityIndexFactory,
} from '../types.ts';
import { parseJsonResponse } from '../services/inferenceService.ts';

export type DistanceFn = (query: string, document: string) => number;

// Identical text is a perfect match, anything else is orthogonal
export const exactMatchDistance: DistanceFn = (query, document) => (query === document ? 0 : 1);

/**
 * In-process stand-in for a Chroma collection. Distances come from the
 * supplied function; ties keep insertion order.
 */
export class FakeSimilarityIndex implements SimilarityIndex {
    readonly records = new Map<string, IndexRecord>();
    readonly queries: Array<{ text: string; nResults: number }> = [];
    dropped = false;

    constructor(readonly name: string, private readonly distance: DistanceFn = exactMatchDistance) {}

    async upsert(records: IndexRecord[]): Promise<void> {
        for (const record of records) {
            this.records.set(record.id, { ...record, metadata: { ...record.metadata } });
        }
    }

    async get(options: { ids?: string[]; limit?: number } = {}): Promise<IndexRecord[]> {
        let found = [...this.records.values()];
        if (options.ids) {
            const wanted = new Set(options.ids);
            found = found.filter((r) => wanted.has(r.id));
        }
        return options.limit === undefined ? found : found.slice(0, options.limit);
    }

    async query(text: string, nResults: number): Promise<IndexMatch[]> {
        this.queries.push({ text, nResults });
        return [...this.records.values()]
            .map((record) => ({ ...record, distance: this.distance(text, record.document) }))
            .sort((a, b) => a.distance - b.distance)
            .slice(0, nResults);
    }

    async delete(ids: string[]): Promise<void> {
        ids.forEach((id) => this.records.delete(id));
    }

    async count(): Promise<number> {
        return this.records.size;
    }

    async deleteCollection(): Promise<void> {
        this.records.clear();
        this.dropped = true;
    }
}

export const createFakeIndexFactory = (distance?: DistanceFn) => {
    const indexes = new Map<string, FakeSimilarityIndex>();
    const factory: SimilarityIndexFactory = (collectionName) => {
        let index = indexes.get(collectionName);
        if (!index) {
            index = new FakeSimilarityIndex(collectionName, distance);
            indexes.set(collectionName, index);
        }
        return index;
    };
    return { factory, indexes };
};

export type FakeReply = string | Error | ((options: ModelCallOptions) => string);

export interface RecordedCall extends ModelCallOptions {
    kind: 'call' | 'json';
}

/**
 * Scripted language model. Replies are consumed in order; `callJson`
 * decodes its reply the same way the real client does.
 */
export class FakeLlm implements LanguageModelCaller {
    readonly calls: RecordedCall[] = [];
    private readonly replies: FakeReply[];

    constructor(...replies: FakeReply[]) {
        this.replies = replies;
    }

    enqueue(...replies: FakeReply[]): void {
        this.replies.push(...replies);
    }

    async call(options: ModelCallOptions): Promise<string> {
        this.calls.push({ ...options, kind: 'call' });
        return this.next(options);
    }

    async callJson(options: ModelCallOptions): Promise<JsonObject> {
        this.calls.push({ ...options, kind: 'json' });
        return parseJsonResponse(this.next(options));
    }

    private next(options: ModelCallOptions): string {
        const reply = this.replies.shift();
        if (reply === undefined) throw new Error('FakeLlm: no reply queued');
        if (reply instanceof Error) throw reply;
        return typeof reply === 'function' ? reply(options) : reply;
    }
}

export const testMemoryConfig = {
    retrievalK: 5,
    similarityThreshold: 0.9,
    extractionModel: 'test-extraction-model',
    judgmentModel: 'test-judgment-model',
    embeddingModel: 'test-embedding-model',
} as const;
