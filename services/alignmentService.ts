import type {
    AlignmentResult,
    FeedbackInput,
    LanguageModelCaller,
    MemoryConfig,
    Principle,
} from '../types.ts';
import type { MemoryStore } from './memoryStore.ts';
import { createExample, createPrinciple } from './recordFactory.ts';
import { loggerService } from './loggerService.ts';
import { DuplicateCheckFailure, ResponseParseError, describeError } from './errors.ts';
import {
    PRINCIPLE_EXTRACTION_PROMPT,
    buildExtractionUserPrompt,
} from '../judge_system/extraction_prompt.ts';
import {
    DEDUPLICATION_PROMPT,
    DUPLICATE_VERDICT,
    buildDeduplicationUserPrompt,
} from '../judge_system/deduplication_prompt.ts';

type AlignmentConfig = Pick<MemoryConfig, 'extractionModel' | 'similarityThreshold'>;

const preview = (text: string) => text.slice(0, 60);

const readCandidateTexts = (response: Record<string, unknown>): string[] => {
    const raw = response.principles;
    if (!Array.isArray(raw)) return [];

    const texts: string[] = [];
    for (const entry of raw) {
        if (typeof entry !== 'object' || entry === null || !('text' in entry)) continue;
        const { text } = entry;
        if (typeof text === 'string' && text.trim().length > 0) {
            texts.push(text.trim());
        }
    }
    return texts;
};

/**
 * Turns expert feedback into episodic and semantic memory:
 * store the example, extract candidate principles, drop duplicates,
 * store what remains.
 *
 * There is no lock around the duplicate check and the insert; concurrent
 * calls for the same judge can both admit near-identical principles.
 */
export class AlignmentEngine {
    constructor(
        private readonly config: AlignmentConfig,
        private readonly memory: MemoryStore,
        private readonly llm: LanguageModelCaller
    ) {}

    async align(criterion: string, feedback: FeedbackInput): Promise<AlignmentResult> {
        // Episodic memory records every feedback event, whatever extraction yields
        const example = createExample(feedback);
        await this.memory.addExample(example);
        loggerService.info(`Stored example ${example.id} in episodic memory`, { judge: this.memory.judgeName });

        const existingTexts = (await this.memory.getAllPrinciples()).map((p) => p.text);

        const candidates = await this.extractPrinciples(criterion, existingTexts, feedback, example.id);
        loggerService.info(`Extracted ${candidates.length} candidate principles`, { judge: this.memory.judgeName });

        const admitted: string[] = [];
        let deduplicated = 0;

        for (const candidate of candidates) {
            if (await this.isDuplicate(candidate, existingTexts)) {
                deduplicated++;
                loggerService.debug('Filtered duplicate principle', { text: preview(candidate.text) });
                continue;
            }
            await this.memory.addPrinciple(candidate);
            admitted.push(candidate.text);
            existingTexts.push(candidate.text);
        }

        const stats = await this.memory.getStats();
        return {
            judge_name: stats.judge_name,
            example_id: example.id,
            principles_extracted: admitted,
            principles_deduplicated: deduplicated,
            total_principles: stats.total_principles,
            total_examples: stats.total_examples,
        };
    }

    private async extractPrinciples(
        criterion: string,
        existingPrinciples: string[],
        feedback: FeedbackInput,
        exampleId: string
    ): Promise<Principle[]> {
        const user = buildExtractionUserPrompt({ ...feedback, criterion, existingPrinciples });

        let response: Record<string, unknown>;
        try {
            response = await this.llm.callJson({
                system: PRINCIPLE_EXTRACTION_PROMPT,
                user,
                model: this.config.extractionModel,
            });
        } catch (error) {
            // An undecodable reply means nothing was learned; transport failures still surface
            if (error instanceof ResponseParseError) {
                loggerService.warn('Failed to parse principle extraction response', { error: error.message });
                return [];
            }
            throw error;
        }

        return readCandidateTexts(response).map((text) => createPrinciple(text, [exampleId]));
    }

    /**
     * Embedding similarity narrows the field; the model makes the call.
     * Any failure of the model check counts as unique.
     */
    private async isDuplicate(candidate: Principle, existingTexts: string[]): Promise<boolean> {
        if (existingTexts.length === 0) return false;

        const similar = await this.memory.findSimilarPrinciples(candidate.text, this.config.similarityThreshold);
        if (similar.length === 0) return false;

        try {
            const verdict = await this.llm.call({
                system: DEDUPLICATION_PROMPT,
                user: buildDeduplicationUserPrompt(candidate.text, similar.map((s) => s.principle.text)),
                model: this.config.extractionModel,
            });
            return verdict.trim().toLowerCase() === DUPLICATE_VERDICT;
        } catch (error) {
            const failure = new DuplicateCheckFailure(`Deduplication check failed: ${describeError(error)}`, error);
            loggerService.warn(`${failure.message}. Treating as unique.`, { text: preview(candidate.text) });
            return false;
        }
    }
}
