import type {
    Example,
    IndexMetadata,
    IndexRecord,
    MemoryConfig,
    MemoryStats,
    Principle,
    SimilarPrinciple,
    SimilarityIndex,
    SimilarityIndexFactory,
} from '../types.ts';
import { loggerService } from './loggerService.ts';

const SIMILAR_PRINCIPLE_NEIGHBOURS = 5;
const STATS_EXAMPLE_LIMIT = 10000;

export const semanticCollectionName = (judgeName: string) => `${judgeName}_semantic`;
export const episodicCollectionName = (judgeName: string) => `${judgeName}_episodic`;

const preview = (text: string) => text.slice(0, 80);

const readString = (metadata: IndexMetadata, key: string): string | undefined => {
    const value = metadata[key];
    return typeof value === 'string' ? value : undefined;
};

const readInt = (metadata: IndexMetadata, key: string): number | undefined => {
    const value = metadata[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
};

// --- Record encoding ---

const principleToRecord = (principle: Principle): IndexRecord => ({
    id: principle.id,
    document: principle.text,
    metadata: {
        source_example_ids: principle.source_example_ids.join(','),
        created_at: principle.created_at,
    },
});

const recordToPrinciple = (record: IndexRecord): Principle => ({
    id: record.id,
    text: record.document,
    source_example_ids: (readString(record.metadata, 'source_example_ids') ?? '')
        .split(',')
        .filter(Boolean),
    created_at: readString(record.metadata, 'created_at') ?? '',
});

/** Retrieval matches on both the situation and the feedback given about it. */
export const exampleDocument = (example: Pick<Example, 'input_text' | 'expert_feedback'>) =>
    `${example.input_text}\n${example.expert_feedback}`;

const exampleToRecord = (example: Example): IndexRecord => {
    const metadata: IndexMetadata = {
        input_text: example.input_text,
        expert_feedback: example.expert_feedback,
        created_at: example.created_at,
    };
    if (example.expert_score !== undefined) metadata.expert_score = example.expert_score;
    if (example.judge_output !== undefined) metadata.judge_output = example.judge_output;
    if (example.judge_score !== undefined) metadata.judge_score = example.judge_score;

    return { id: example.id, document: exampleDocument(example), metadata };
};

const recordToExample = (record: IndexRecord): Example => {
    const { metadata } = record;
    const example: Example = {
        id: record.id,
        input_text: readString(metadata, 'input_text') ?? '',
        expert_feedback: readString(metadata, 'expert_feedback') ?? '',
        created_at: readString(metadata, 'created_at') ?? '',
    };
    const expertScore = readInt(metadata, 'expert_score');
    const judgeOutput = readString(metadata, 'judge_output');
    const judgeScore = readInt(metadata, 'judge_score');
    if (expertScore !== undefined) example.expert_score = expertScore;
    if (judgeOutput !== undefined) example.judge_output = judgeOutput;
    if (judgeScore !== undefined) example.judge_score = judgeScore;
    return example;
};

// ISO-8601 UTC timestamps order lexically
const timestampBounds = (timestamps: string[]): [string | null, string | null] => {
    const present = timestamps.filter(Boolean).sort();
    if (present.length === 0) return [null, null];
    return [present[0], present[present.length - 1]];
};

/**
 * Dual memory for a single judge: semantic memory (principles, all loaded
 * per judgment) and episodic memory (examples, top-k retrieved).
 */
export class MemoryStore {
    constructor(
        readonly judgeName: string,
        private readonly semantic: SimilarityIndex,
        private readonly episodic: SimilarityIndex,
        private readonly config: Pick<MemoryConfig, 'retrievalK'>
    ) {}

    // === Semantic Memory (Principles) ===

    async addPrinciple(principle: Principle): Promise<void> {
        await this.semantic.upsert([principleToRecord(principle)]);
        loggerService.info(`Added principle ${principle.id}`, { judge: this.judgeName, text: preview(principle.text) });
    }

    async getAllPrinciples(): Promise<Principle[]> {
        const records = await this.semantic.get();
        return records.map(recordToPrinciple);
    }

    async findSimilarPrinciples(text: string, threshold: number): Promise<SimilarPrinciple[]> {
        const count = await this.semantic.count();
        if (count === 0) return [];

        const matches = await this.semantic.query(text, Math.min(count, SIMILAR_PRINCIPLE_NEIGHBOURS));
        const similar: SimilarPrinciple[] = [];
        for (const match of matches) {
            const similarity = 1 - match.distance;
            if (similarity >= threshold) {
                similar.push({ principle: recordToPrinciple(match), similarity });
            }
        }
        return similar;
    }

    async deletePrinciple(principleId: string): Promise<boolean> {
        const existing = await this.semantic.get({ ids: [principleId] });
        if (existing.length === 0) return false;
        await this.semantic.delete([principleId]);
        loggerService.info(`Deleted principle ${principleId}`, { judge: this.judgeName });
        return true;
    }

    /** Replaces the text only; id, provenance and creation time are kept. */
    async updatePrinciple(principleId: string, newText: string): Promise<Principle | null> {
        const [existing] = await this.semantic.get({ ids: [principleId] });
        if (!existing) return null;

        const updated: Principle = { ...recordToPrinciple(existing), text: newText };
        await this.semantic.upsert([principleToRecord(updated)]);
        loggerService.info(`Updated principle ${principleId}`, { judge: this.judgeName, text: preview(newText) });
        return updated;
    }

    // === Episodic Memory (Examples) ===

    async addExample(example: Example): Promise<void> {
        await this.episodic.upsert([exampleToRecord(example)]);
        loggerService.info(`Added example ${example.id}`, { judge: this.judgeName });
    }

    async retrieveExamples(query: string, k?: number): Promise<Example[]> {
        const width = k && k > 0 ? k : this.config.retrievalK;
        const count = await this.episodic.count();
        if (count === 0) return [];

        const matches = await this.episodic.query(query, Math.min(count, width));
        return matches.map(recordToExample);
    }

    async getAllExamples(limit: number = 100): Promise<Example[]> {
        const count = await this.episodic.count();
        if (count === 0) return [];

        const records = await this.episodic.get({ limit: Math.min(count, limit) });
        return records.map(recordToExample);
    }

    async deleteExample(exampleId: string): Promise<boolean> {
        const existing = await this.episodic.get({ ids: [exampleId] });
        if (existing.length === 0) return false;
        await this.episodic.delete([exampleId]);
        loggerService.info(`Deleted example ${exampleId}`, { judge: this.judgeName });
        return true;
    }

    // === Stats ===

    async getStats(): Promise<MemoryStats> {
        const principles = await this.getAllPrinciples();
        const examples = await this.getAllExamples(STATS_EXAMPLE_LIMIT);

        const [oldestPrinciple, newestPrinciple] = timestampBounds(principles.map((p) => p.created_at));
        const [oldestExample, newestExample] = timestampBounds(examples.map((e) => e.created_at));

        return {
            judge_name: this.judgeName,
            total_principles: principles.length,
            total_examples: examples.length,
            oldest_principle: oldestPrinciple,
            newest_principle: newestPrinciple,
            oldest_example: oldestExample,
            newest_example: newestExample,
        };
    }

    /** Drops both collections; the first failure is rethrown after both drops were attempted. */
    async deleteAll(): Promise<void> {
        const outcomes = await Promise.allSettled([
            this.semantic.deleteCollection(),
            this.episodic.deleteCollection(),
        ]);
        const failure = outcomes.find((o): o is PromiseRejectedResult => o.status === 'rejected');
        if (failure) throw failure.reason;
        loggerService.info(`Deleted all memory for judge ${this.judgeName}`);
    }
}

/**
 * One MemoryStore per judge name, built on first use and reused afterwards.
 */
export class MemoryStorePool {
    private readonly stores = new Map<string, MemoryStore>();

    constructor(
        private readonly indexFactory: SimilarityIndexFactory,
        private readonly config: Pick<MemoryConfig, 'retrievalK'>
    ) {}

    get(judgeName: string): MemoryStore {
        let store = this.stores.get(judgeName);
        if (!store) {
            store = new MemoryStore(
                judgeName,
                this.indexFactory(semanticCollectionName(judgeName)),
                this.indexFactory(episodicCollectionName(judgeName)),
                this.config
            );
            this.stores.set(judgeName, store);
        }
        return store;
    }

    evict(judgeName: string): void {
        this.stores.delete(judgeName);
    }

    size(): number {
        return this.stores.size;
    }
}
