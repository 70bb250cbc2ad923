import { z } from 'zod';
import type { Example, JsonObject, ToolArgs, ToolDeclaration } from '../types.ts';
import type { Container } from './container.ts';
import { loggerService } from './loggerService.ts';
import { describeError } from './errors.ts';
import { alignBatch, judgeBatch } from './batchService.ts';
import {
    createJudgeSchema,
    feedbackSchema,
    judgeNameSchema,
    parseInput,
    principleTextSchema,
} from './validationService.ts';

const TEXT_PREVIEW_LENGTH = 200;
const DEFAULT_EXAMPLE_LIMIT = 10;

const JUDGE_NAME_PROPERTY = {
    type: 'string',
    description: 'Name of the judge (lowercase alphanumeric with hyphens).',
} as const;

const FEEDBACK_PROPERTIES = {
    judge_name: JUDGE_NAME_PROPERTY,
    input_text: { type: 'string', description: 'The input that was evaluated.' },
    expert_feedback: { type: 'string', description: "The expert's explanation of the correct evaluation." },
    expert_score: { type: 'integer', description: 'Score the expert would give.' },
    judge_output: { type: 'string', description: "The judge's original reasoning, if any." },
    judge_score: { type: 'integer', description: "The judge's original score, if any." },
} as const;

// 1. Declarations
export const toolDeclarations: ToolDeclaration[] = [
    // --- Judge Registry ---
    {
        name: 'create_judge',
        description: 'Create a new judge with an evaluation criterion, instructions and an integer score range.',
        inputSchema: {
            type: 'object',
            properties: {
                name: JUDGE_NAME_PROPERTY,
                criterion: { type: 'string', description: 'What the judge evaluates.' },
                instructions: { type: 'string', description: 'How the judge should evaluate.' },
                min_score: { type: 'integer', description: 'Lowest score (default 1).' },
                max_score: { type: 'integer', description: 'Highest score (default 5).' },
            },
            required: ['name', 'criterion', 'instructions'],
        },
    },
    {
        name: 'list_judges',
        description: 'List every judge with its principle and example counts.',
        inputSchema: { type: 'object', properties: {} },
    },
    {
        name: 'delete_judge',
        description: 'Delete a judge and all of its memory.',
        inputSchema: {
            type: 'object',
            properties: { judge_name: JUDGE_NAME_PROPERTY },
            required: ['judge_name'],
        },
    },

    // --- Alignment ---
    {
        name: 'align',
        description: 'Teach a judge from one piece of expert feedback. Stores the example and extracts new principles.',
        inputSchema: {
            type: 'object',
            properties: FEEDBACK_PROPERTIES,
            required: ['judge_name', 'input_text', 'expert_feedback'],
        },
    },
    {
        name: 'align_batch',
        description: 'Align a judge from a JSONL file with one feedback object per line.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                file_path: { type: 'string', description: 'Path to the JSONL feedback file.' },
            },
            required: ['judge_name', 'file_path'],
        },
    },
    {
        name: 'align_interactive',
        description: 'Judge an input first so an expert can review the evaluation before calling align.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                input_text: { type: 'string', description: 'The input to evaluate.' },
            },
            required: ['judge_name', 'input_text'],
        },
    },

    // --- Judgment ---
    {
        name: 'judge',
        description: 'Evaluate one input with a judge using its principles and the most similar examples.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                input_text: { type: 'string', description: 'The input to evaluate.' },
                context: { type: 'string', description: 'Optional additional context.' },
            },
            required: ['judge_name', 'input_text'],
        },
    },
    {
        name: 'judge_batch',
        description: 'Evaluate every {input_text, context?} line of a JSONL file.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                file_path: { type: 'string', description: 'Path to the JSONL input file.' },
                output_path: { type: 'string', description: 'Optional path for JSONL results.' },
            },
            required: ['judge_name', 'file_path'],
        },
    },

    // --- Memory Management ---
    {
        name: 'list_principles',
        description: "List every principle in a judge's semantic memory.",
        inputSchema: {
            type: 'object',
            properties: { judge_name: JUDGE_NAME_PROPERTY },
            required: ['judge_name'],
        },
    },
    {
        name: 'list_examples',
        description: "List or search examples in a judge's episodic memory.",
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                query: { type: 'string', description: 'Optional similarity search query.' },
                limit: { type: 'integer', description: 'Maximum examples to return (default 10).' },
            },
            required: ['judge_name'],
        },
    },
    {
        name: 'delete_principle',
        description: 'Delete one principle by id.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                principle_id: { type: 'string', description: 'Id of the principle.' },
            },
            required: ['judge_name', 'principle_id'],
        },
    },
    {
        name: 'delete_example',
        description: 'Delete one example by id.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                example_id: { type: 'string', description: 'Id of the example.' },
            },
            required: ['judge_name', 'example_id'],
        },
    },
    {
        name: 'update_principle',
        description: 'Replace the text of an existing principle, keeping its id and provenance.',
        inputSchema: {
            type: 'object',
            properties: {
                judge_name: JUDGE_NAME_PROPERTY,
                principle_id: { type: 'string', description: 'Id of the principle.' },
                new_text: { type: 'string', description: 'Replacement text.' },
            },
            required: ['judge_name', 'principle_id', 'new_text'],
        },
    },
    {
        name: 'memory_stats',
        description: "Counts and oldest/newest timestamps for a judge's memory.",
        inputSchema: {
            type: 'object',
            properties: { judge_name: JUDGE_NAME_PROPERTY },
            required: ['judge_name'],
        },
    },
];

// Argument schemas
const judgeRef = z.object({ judge_name: judgeNameSchema });
const alignArgs = feedbackSchema.extend({ judge_name: judgeNameSchema });
const fileArgs = judgeRef.extend({ file_path: z.string().min(1), output_path: z.string().optional() });
const judgeArgs = judgeRef.extend({ input_text: z.string(), context: z.string().optional() });
const listExamplesArgs = judgeRef.extend({
    query: z.string().optional(),
    limit: z.number().int().positive().default(DEFAULT_EXAMPLE_LIMIT),
});
const principleRef = judgeRef.extend({ principle_id: z.string().min(1) });
const exampleRef = judgeRef.extend({ example_id: z.string().min(1) });
const updatePrincipleArgs = principleRef.extend({ new_text: principleTextSchema });

const truncate = (text: string) =>
    text.length > TEXT_PREVIEW_LENGTH ? `${text.slice(0, TEXT_PREVIEW_LENGTH)}...` : text;

const summarizeExample = (example: Example): JsonObject => {
    const summary: JsonObject = {
        id: example.id,
        input_text: truncate(example.input_text),
        expert_feedback: truncate(example.expert_feedback),
        created_at: example.created_at,
    };
    if (example.expert_score !== undefined) summary.expert_score = example.expert_score;
    return summary;
};

// 2. Execution
export const createToolExecutor = (container: Container) => {
    const { registry, stores } = container;

    // Memory tools resolve the judge first so an unknown name is a NotFoundError
    const storeFor = async (judgeName: string) => {
        await registry.get(judgeName);
        return stores.get(judgeName);
    };

    return async (name: string, args: ToolArgs = {}): Promise<JsonObject> => {
        loggerService.info(`ToolExecutor: executing ${name}`, { args });

        switch (name) {
            case 'create_judge': {
                const input = parseInput(createJudgeSchema, args, 'judge configuration');
                const judge = await registry.create(input);
                return { status: 'created', judge };
            }

            case 'list_judges': {
                const judges = await registry.list();
                const listed: JsonObject[] = [];
                for (const judge of judges) {
                    let principles: number | 'unknown' = 'unknown';
                    let examples: number | 'unknown' = 'unknown';
                    try {
                        const stats = await stores.get(judge.name).getStats();
                        principles = stats.total_principles;
                        examples = stats.total_examples;
                    } catch (error) {
                        loggerService.warn(`ToolExecutor: could not read memory for '${judge.name}'`, { error });
                    }
                    listed.push({
                        name: judge.name,
                        criterion: judge.criterion,
                        score_range: judge.score_range,
                        created_at: judge.created_at,
                        principles,
                        examples,
                    });
                }
                return { judges: listed };
            }

            case 'delete_judge': {
                const { judge_name } = parseInput(judgeRef, args, 'arguments');
                try {
                    await stores.get(judge_name).deleteAll();
                } catch (error) {
                    // Registry entry is kept while any memory survives
                    loggerService.error(`ToolExecutor: failed to delete memory for '${judge_name}'`, {
                        error: describeError(error),
                    });
                    throw error;
                } finally {
                    stores.evict(judge_name);
                }
                const deleted = await registry.delete(judge_name);
                return { status: deleted ? 'deleted' : 'not_found', judge_name };
            }

            case 'align': {
                const { judge_name, ...feedback } = parseInput(alignArgs, args, 'feedback');
                const judge = await registry.get(judge_name);
                const result = await container.alignmentEngine(judge_name).align(judge.criterion, feedback);
                return { ...result };
            }

            case 'align_batch': {
                const { judge_name, file_path } = parseInput(fileArgs, args, 'arguments');
                return { ...(await alignBatch(container, judge_name, file_path)) };
            }

            case 'align_interactive': {
                const { judge_name, input_text } = parseInput(judgeArgs, args, 'arguments');
                const judge = await registry.get(judge_name);
                const evaluation = await container.judgmentEngine(judge_name).judge(judge, input_text);
                return {
                    judge_name,
                    input_text,
                    evaluation,
                    next_step:
                        "Review the evaluation. If it is wrong, call 'align' with this input_text, " +
                        `your expert_feedback, and judge_score=${evaluation.score}.`,
                };
            }

            case 'judge': {
                const { judge_name, input_text, context } = parseInput(judgeArgs, args, 'arguments');
                const judge = await registry.get(judge_name);
                const result = await container.judgmentEngine(judge_name).judge(judge, input_text, context);
                return { ...result };
            }

            case 'judge_batch': {
                const { judge_name, file_path, output_path } = parseInput(fileArgs, args, 'arguments');
                return { ...(await judgeBatch(container, judge_name, file_path, output_path)) };
            }

            case 'list_principles': {
                const { judge_name } = parseInput(judgeRef, args, 'arguments');
                const principles = await (await storeFor(judge_name)).getAllPrinciples();
                return { judge_name, count: principles.length, principles };
            }

            case 'list_examples': {
                const { judge_name, query, limit } = parseInput(listExamplesArgs, args, 'arguments');
                const store = await storeFor(judge_name);
                const examples = query
                    ? await store.retrieveExamples(query, limit)
                    : await store.getAllExamples(limit);
                return { judge_name, count: examples.length, examples: examples.map(summarizeExample) };
            }

            case 'delete_principle': {
                const { judge_name, principle_id } = parseInput(principleRef, args, 'arguments');
                const deleted = await (await storeFor(judge_name)).deletePrinciple(principle_id);
                return { status: deleted ? 'deleted' : 'not_found', principle_id };
            }

            case 'delete_example': {
                const { judge_name, example_id } = parseInput(exampleRef, args, 'arguments');
                const deleted = await (await storeFor(judge_name)).deleteExample(example_id);
                return { status: deleted ? 'deleted' : 'not_found', example_id };
            }

            case 'update_principle': {
                const { judge_name, principle_id, new_text } = parseInput(updatePrincipleArgs, args, 'arguments');
                const principle = await (await storeFor(judge_name)).updatePrinciple(principle_id, new_text);
                return principle ? { status: 'updated', principle } : { status: 'not_found', principle_id };
            }

            case 'memory_stats': {
                const { judge_name } = parseInput(judgeRef, args, 'arguments');
                const stats = await (await storeFor(judge_name)).getStats();
                return { ...stats };
            }

            default:
                return { error: `Function ${name} not found.` };
        }
    };
};
