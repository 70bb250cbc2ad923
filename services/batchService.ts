import fs from 'fs/promises';
import type { Container } from './container.ts';
import { loggerService } from './loggerService.ts';
import { describeError } from './errors.ts';
import { feedbackSchema, judgeRequestSchema, parseInput } from './validationService.ts';

const MAX_ERROR_DETAILS = 10;
const MAX_RESULT_PREVIEW = 5;

export interface BatchLineError {
    line: number;
    error: string;
}

export interface AlignBatchResult {
    status: 'completed';
    processed: number;
    errors: number;
    error_details: BatchLineError[];
}

export interface JudgeBatchLine {
    line: number;
    score: number;
    reasoning: string;
}

export interface JudgeBatchResult {
    status: 'completed';
    processed: number;
    errors: number;
    results: JudgeBatchLine[];
    output_file: string | null;
}

export interface BatchFileMissing {
    status: 'error';
    message: string;
}

interface NumberedLine {
    line: number;
    text: string;
}

// Line numbers refer to the raw file, blank lines included
const readJsonLines = async (filePath: string): Promise<NumberedLine[] | null> => {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        loggerService.warn(`BatchService: cannot read ${filePath}`, { error });
        return null;
    }
    return content
        .split(/\r?\n/)
        .map((text, i) => ({ line: i + 1, text }))
        .filter(({ text }) => text.trim().length > 0);
};

const parseLine = (line: string): unknown => JSON.parse(line);

/**
 * Aligns a judge from a JSONL file, one feedback object per line.
 * Lines are processed in order; a failing line does not stop the batch.
 */
export async function alignBatch(
    container: Container,
    judgeName: string,
    filePath: string
): Promise<AlignBatchResult | BatchFileMissing> {
    const judge = await container.registry.get(judgeName);
    const engine = container.alignmentEngine(judgeName);

    const lines = await readJsonLines(filePath);
    if (!lines) return { status: 'error', message: `File not found: ${filePath}` };

    let processed = 0;
    const errors: BatchLineError[] = [];

    for (const { line, text } of lines) {
        try {
            const feedback = parseInput(feedbackSchema, parseLine(text), 'feedback');
            await engine.align(judge.criterion, feedback);
            processed++;
        } catch (error) {
            errors.push({ line, error: describeError(error) });
        }
    }

    loggerService.info(`Batch alignment for '${judgeName}' finished`, { processed, errors: errors.length });
    return {
        status: 'completed',
        processed,
        errors: errors.length,
        error_details: errors.slice(0, MAX_ERROR_DETAILS),
    };
}

/**
 * Judges every `{input_text, context?}` line of a JSONL file, optionally
 * writing the successful results as JSONL to `outputPath`.
 */
export async function judgeBatch(
    container: Container,
    judgeName: string,
    filePath: string,
    outputPath?: string
): Promise<JudgeBatchResult | BatchFileMissing> {
    const judge = await container.registry.get(judgeName);
    const engine = container.judgmentEngine(judgeName);

    const lines = await readJsonLines(filePath);
    if (!lines) return { status: 'error', message: `File not found: ${filePath}` };

    const results: JudgeBatchLine[] = [];
    const errors: BatchLineError[] = [];

    for (const { line, text } of lines) {
        try {
            const request = parseInput(judgeRequestSchema, parseLine(text), 'judge request');
            const result = await engine.judge(judge, request.input_text, request.context);
            results.push({ line, score: result.score, reasoning: result.reasoning });
        } catch (error) {
            errors.push({ line, error: describeError(error) });
        }
    }

    if (outputPath) {
        const serialized = results.map((r) => JSON.stringify(r)).join('\n');
        await fs.writeFile(outputPath, serialized, 'utf-8');
    }

    return {
        status: 'completed',
        processed: results.length,
        errors: errors.length,
        results: results.slice(0, MAX_RESULT_PREVIEW),
        output_file: outputPath ?? null,
    };
}
