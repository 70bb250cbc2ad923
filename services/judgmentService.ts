import type {
    JudgeConfiguration,
    JudgmentResult,
    LanguageModelCaller,
    MemoryConfig,
} from '../types.ts';
import type { MemoryStore } from './memoryStore.ts';
import { loggerService } from './loggerService.ts';
import { MissingScoreError, ResponseParseError } from './errors.ts';
import { buildJudgmentSystemPrompt, buildJudgmentUserPrompt } from '../judge_system/judgment_prompt.ts';

type JudgmentConfig = Pick<MemoryConfig, 'judgmentModel' | 'retrievalK'>;

const INTEGER_TEXT = /^[+-]?\d+$/;

/** Integer conversion of a model-reported score; fractional numbers truncate toward zero. */
export const toIntegerScore = (raw: unknown): number => {
    if (typeof raw === 'number' && Number.isFinite(raw)) {
        return Math.trunc(raw);
    }
    if (typeof raw === 'string' && INTEGER_TEXT.test(raw.trim())) {
        return Number.parseInt(raw.trim(), 10);
    }
    const shown = JSON.stringify(raw) ?? String(raw);
    throw new ResponseParseError(`Score is not an integer: ${shown}`, shown.slice(0, 500));
};

export const clampScore = (score: number, min: number, max: number): number =>
    Math.max(min, Math.min(max, score));

/**
 * Scores one input with working memory assembled from every principle and
 * the top-k most similar examples.
 */
export class JudgmentEngine {
    constructor(
        private readonly config: JudgmentConfig,
        private readonly memory: MemoryStore,
        private readonly llm: LanguageModelCaller
    ) {}

    async judge(judge: JudgeConfiguration, inputText: string, context?: string): Promise<JudgmentResult> {
        const principles = (await this.memory.getAllPrinciples()).map((p) => p.text);
        loggerService.info(`Loaded ${principles.length} principles from semantic memory`, { judge: judge.name });

        const examples = await this.memory.retrieveExamples(inputText, this.config.retrievalK);
        loggerService.info(`Retrieved ${examples.length} examples from episodic memory`, { judge: judge.name });

        const response = await this.llm.callJson({
            system: buildJudgmentSystemPrompt(judge, principles, examples),
            user: buildJudgmentUserPrompt(inputText, context),
            model: this.config.judgmentModel,
        });

        const rawScore = response.score;
        if (rawScore === undefined || rawScore === null) {
            throw new MissingScoreError(judge.name);
        }

        const reported = toIntegerScore(rawScore);
        const { min_score, max_score } = judge.score_range;
        const score = clampScore(reported, min_score, max_score);

        const result: JudgmentResult = {
            score,
            reasoning: typeof response.reasoning === 'string' ? response.reasoning : '',
            judge_name: judge.name,
            principles_used: principles.length,
            examples_retrieved: examples.length,
        };

        if (score !== reported) {
            loggerService.warn(`Score ${reported} outside range [${min_score}, ${max_score}], clamping to ${score}`, {
                judge: judge.name,
            });
            result.clamped_from = reported;
        }

        return result;
    }
}
