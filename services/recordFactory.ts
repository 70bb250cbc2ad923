import { randomUUID } from 'crypto';
import type { Example, FeedbackInput, Principle } from '../types.ts';

export const generateId = (): string => randomUUID().replace(/-/g, '').slice(0, 12);

export const nowIso = (): string => new Date().toISOString();

export const createPrinciple = (text: string, sourceExampleIds: string[] = []): Principle => ({
    id: generateId(),
    text,
    source_example_ids: [...sourceExampleIds],
    created_at: nowIso(),
});

/** Copies the feedback payload verbatim; absent optional fields stay absent. */
export const createExample = (feedback: FeedbackInput): Example => {
    const example: Example = {
        id: generateId(),
        input_text: feedback.input_text,
        expert_feedback: feedback.expert_feedback,
        created_at: nowIso(),
    };
    if (feedback.expert_score !== undefined) example.expert_score = feedback.expert_score;
    if (feedback.judge_output !== undefined) example.judge_output = feedback.judge_output;
    if (feedback.judge_score !== undefined) example.judge_score = feedback.judge_score;
    return example;
};
