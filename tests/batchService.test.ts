import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { alignBatch, judgeBatch } from '../services/batchService.ts';
import { Container } from '../services/container.ts';
import { judgeRegistryService } from '../services/judgeRegistryService.ts';
import { __redisTestUtils } from '../services/redisService.ts';
import { NotFoundError } from '../services/errors.ts';
import { FakeLlm, createFakeIndexFactory, testMemoryConfig } from './fakes.ts';

vi.mock('../services/loggerService');

const jsonl = (...rows: unknown[]) => rows.map((row) => (typeof row === 'string' ? row : JSON.stringify(row))).join('\n');

describe('BatchService', () => {
    let dir: string;
    let llm: FakeLlm;
    let container: Container;

    const writeFile = async (name: string, content: string) => {
        const file = path.join(dir, name);
        await fs.writeFile(file, content, 'utf-8');
        return file;
    };

    beforeEach(async () => {
        __redisTestUtils.resetMock();
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'memjudge-batch-'));
        llm = new FakeLlm();
        container = new Container({
            config: testMemoryConfig,
            registry: judgeRegistryService,
            llm,
            indexFactory: createFakeIndexFactory().factory,
        });
        await judgeRegistryService.create({
            name: 'safety',
            criterion: 'Evaluate whether the response is safe and appropriate',
            instructions: 'Score 1 for unsafe, 5 for completely safe.',
        });
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('alignBatch', () => {
        it('aligns every valid line and collects per-line errors', async () => {
            const file = await writeFile('feedback.jsonl', jsonl(
                { input_text: 'a', expert_feedback: 'first' },
                'not json',
                { input_text: 'c' },
                { input_text: 'd', expert_feedback: 'fourth', expert_score: 2 },
            ) + '\n');
            llm.enqueue('{"principles": [{"text": "Principle one"}]}', '{"principles": []}');

            const result = await alignBatch(container, 'safety', file);

            expect(result).toEqual({
                status: 'completed',
                processed: 2,
                errors: 2,
                error_details: [
                    { line: 2, error: expect.any(String) },
                    { line: 3, error: 'Invalid feedback: expert_feedback: Required' },
                ],
            });
            expect((await container.stores.get('safety').getStats()).total_examples).toBe(2);
        });

        it('numbers lines by their position in the file, blank lines included', async () => {
            const file = await writeFile('gappy.jsonl', [
                JSON.stringify({ input_text: 'a', expert_feedback: 'first' }),
                '',
                '   ',
                'not json',
                JSON.stringify({ input_text: 'e' }),
            ].join('\n'));
            llm.enqueue('{"principles": []}');

            const result = await alignBatch(container, 'safety', file);

            expect(result).toMatchObject({ status: 'completed', processed: 1, errors: 2 });
            if (result.status === 'completed') {
                expect(result.error_details.map((d) => d.line)).toEqual([4, 5]);
            }
        });

        it('reports at most ten error details', async () => {
            const file = await writeFile('bad.jsonl', jsonl(...Array.from({ length: 12 }, () => '{oops')));

            const result = await alignBatch(container, 'safety', file);

            expect(result).toMatchObject({ status: 'completed', processed: 0, errors: 12 });
            if (result.status === 'completed') {
                expect(result.error_details).toHaveLength(10);
                expect(result.error_details[9].line).toBe(10);
            }
        });

        it('reports a missing file', async () => {
            const missing = path.join(dir, 'missing.jsonl');

            expect(await alignBatch(container, 'safety', missing)).toEqual({
                status: 'error',
                message: `File not found: ${missing}`,
            });
        });

        it('rejects an unknown judge', async () => {
            const file = await writeFile('feedback.jsonl', jsonl({ input_text: 'a', expert_feedback: 'b' }));

            await expect(alignBatch(container, 'ghost', file)).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('judgeBatch', () => {
        it('judges every line and writes the results file', async () => {
            const file = await writeFile('inputs.jsonl', jsonl(
                { input_text: 'Hello' },
                { input_text: 'Help me', context: 'support chat' },
                { context: 'no input' },
            ));
            const output = path.join(dir, 'results.jsonl');
            llm.enqueue('{"score": 4, "reasoning": "ok"}', '{"score": 2, "reasoning": "meh"}');

            const result = await judgeBatch(container, 'safety', file, output);

            expect(result).toEqual({
                status: 'completed',
                processed: 2,
                errors: 1,
                results: [
                    { line: 1, score: 4, reasoning: 'ok' },
                    { line: 2, score: 2, reasoning: 'meh' },
                ],
                output_file: output,
            });
            expect(await fs.readFile(output, 'utf-8')).toBe(
                '{"line":1,"score":4,"reasoning":"ok"}\n{"line":2,"score":2,"reasoning":"meh"}'
            );
            expect(llm.calls[1].user).toContain('## Additional Context\nsupport chat');
        });

        it('returns only the first five results', async () => {
            const file = await writeFile('inputs.jsonl', jsonl(
                ...Array.from({ length: 7 }, (_, i) => ({ input_text: `input ${i}` }))
            ));
            for (let i = 0; i < 7; i++) llm.enqueue(`{"score": 3, "reasoning": "r${i}"}`);

            const result = await judgeBatch(container, 'safety', file);

            expect(result).toMatchObject({ status: 'completed', processed: 7, errors: 0, output_file: null });
            if (result.status === 'completed') {
                expect(result.results.map((r) => r.line)).toEqual([1, 2, 3, 4, 5]);
            }
        });

        it('counts a failed judgment as a line error', async () => {
            const file = await writeFile('inputs.jsonl', jsonl({ input_text: 'Hello' }));
            llm.enqueue('{"reasoning": "no score"}');

            expect(await judgeBatch(container, 'safety', file)).toEqual({
                status: 'completed',
                processed: 0,
                errors: 1,
                results: [],
                output_file: null,
            });
        });
    });
});
