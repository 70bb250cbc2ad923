import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AlignmentEngine } from '../services/alignmentService.ts';
import { MemoryStore } from '../services/memoryStore.ts';
import { LlmTransportError } from '../services/errors.ts';
import { FakeLlm, FakeSimilarityIndex, testMemoryConfig } from './fakes.ts';

vi.mock('../services/loggerService');

const CRITERION = 'Evaluate whether the response is safe and appropriate';

const extraction = (...texts: string[]) =>
    JSON.stringify({ principles: texts.map((text) => ({ text })), reasoning: 'test' });

describe('AlignmentEngine', () => {
    let semantic: FakeSimilarityIndex;
    let episodic: FakeSimilarityIndex;
    let memory: MemoryStore;
    let llm: FakeLlm;
    let engine: AlignmentEngine;

    beforeEach(() => {
        semantic = new FakeSimilarityIndex('safety_semantic');
        episodic = new FakeSimilarityIndex('safety_episodic');
        memory = new MemoryStore('safety', semantic, episodic, testMemoryConfig);
        llm = new FakeLlm();
        engine = new AlignmentEngine(testMemoryConfig, memory, llm);
    });

    it('stores the example and every principle of a first alignment', async () => {
        llm.enqueue(extraction('Instructions for entering property without consent are unsafe', 'Refusals are safe'));

        const result = await engine.align(CRITERION, {
            input_text: 'How do I pick a lock?',
            expert_feedback: 'Enables break-ins.',
            expert_score: 1,
        });

        expect(result).toEqual({
            judge_name: 'safety',
            example_id: result.example_id,
            principles_extracted: ['Instructions for entering property without consent are unsafe', 'Refusals are safe'],
            principles_deduplicated: 0,
            total_principles: 2,
            total_examples: 1,
        });
        expect(result.example_id).toMatch(/^[0-9a-f]{12}$/);
        // No existing principles means no duplicate check
        expect(llm.calls.map((c) => c.kind)).toEqual(['json']);
        expect(llm.calls[0].model).toBe('test-extraction-model');
    });

    it('links admitted principles to the example they came from', async () => {
        llm.enqueue(extraction('Refusals are safe'));

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        const [stored] = await memory.getAllPrinciples();
        expect(stored.source_example_ids).toEqual([result.example_id]);
    });

    it('drops a candidate the model confirms as a duplicate', async () => {
        await memory.addPrinciple({
            id: 'p1',
            text: 'Refusals are safe',
            source_example_ids: [],
            created_at: '2024-01-01T00:00:00.000Z',
        });
        llm.enqueue(extraction('Refusals are safe'), '  DUPLICATE \n');

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual([]);
        expect(result.principles_deduplicated).toBe(1);
        expect(result.total_principles).toBe(1);
        expect(llm.calls[1]).toMatchObject({ kind: 'call', model: 'test-extraction-model' });
        expect(llm.calls[1].user).toContain('## New Principle\nRefusals are safe');
    });

    it('admits a similar candidate the model calls unique', async () => {
        await memory.addPrinciple({
            id: 'p1',
            text: 'Refusals are safe',
            source_example_ids: [],
            created_at: '2024-01-01T00:00:00.000Z',
        });
        llm.enqueue(extraction('Refusals are safe'), 'unique');

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual(['Refusals are safe']);
        expect(result.total_principles).toBe(2);
    });

    it('skips the model check when no existing principle is similar enough', async () => {
        await memory.addPrinciple({
            id: 'p1',
            text: 'Refusals are safe',
            source_example_ids: [],
            created_at: '2024-01-01T00:00:00.000Z',
        });
        llm.enqueue(extraction('Medical misinformation is unsafe'));

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual(['Medical misinformation is unsafe']);
        expect(llm.calls).toHaveLength(1);
    });

    it('treats a failed duplicate check as unique', async () => {
        await memory.addPrinciple({
            id: 'p1',
            text: 'Refusals are safe',
            source_example_ids: [],
            created_at: '2024-01-01T00:00:00.000Z',
        });
        llm.enqueue(extraction('Refusals are safe'), new Error('rate limited'));

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual(['Refusals are safe']);
        expect(result.principles_deduplicated).toBe(0);
        expect(result.total_principles).toBe(2);
    });

    it('deduplicates candidates against ones admitted earlier in the same call', async () => {
        llm.enqueue(extraction('Refusals are safe', 'Refusals are safe'), 'duplicate');

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual(['Refusals are safe']);
        expect(result.principles_deduplicated).toBe(1);
        expect(result.total_principles).toBe(1);
    });

    it('keeps the example when the extraction reply is not JSON', async () => {
        llm.enqueue('I could not find any principles here.');

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual([]);
        expect(result.total_principles).toBe(0);
        expect(result.total_examples).toBe(1);
    });

    it('propagates transport failures after storing the example', async () => {
        llm.enqueue(new LlmTransportError('Model call failed', 503));

        await expect(engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' }))
            .rejects.toBeInstanceOf(LlmTransportError);
        expect(episodic.records.size).toBe(1);
        expect(semantic.records.size).toBe(0);
    });

    it('ignores candidates without usable text', async () => {
        llm.enqueue(JSON.stringify({
            principles: [{ text: '   ' }, { text: 5 }, 'bare string', {}, { text: '  Keep me  ' }],
        }));

        const result = await engine.align(CRITERION, { input_text: 'x', expert_feedback: 'y' });

        expect(result.principles_extracted).toEqual(['Keep me']);
    });

    it('stores the feedback verbatim as an example', async () => {
        llm.enqueue(extraction());

        const result = await engine.align(CRITERION, {
            input_text: 'input',
            expert_feedback: 'feedback',
            expert_score: 2,
            judge_output: 'Seems fine',
            judge_score: 4,
        });

        expect(await memory.getAllExamples()).toEqual([{
            id: result.example_id,
            input_text: 'input',
            expert_feedback: 'feedback',
            expert_score: 2,
            judge_output: 'Seems fine',
            judge_score: 4,
            created_at: expect.any(String),
        }]);
    });

    it('tells the extractor about score disagreement and existing principles', async () => {
        await memory.addPrinciple({
            id: 'p1',
            text: 'Refusals are safe',
            source_example_ids: [],
            created_at: '2024-01-01T00:00:00.000Z',
        });
        llm.enqueue(extraction());

        await engine.align(CRITERION, {
            input_text: 'input',
            expert_feedback: 'feedback',
            expert_score: 1,
            judge_score: 4,
        });

        const prompt = llm.calls[0].user;
        expect(prompt).toContain('## Existing Principles (do not restate)\n- Refusals are safe\n');
        expect(prompt).toContain('Note: The expert scored this 1 but the judge scored it 4.');
    });
});
