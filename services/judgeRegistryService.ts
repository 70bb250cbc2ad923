import type { CreateJudgeRequest, JudgeConfiguration } from '../types.ts';
import { redisService } from './redisService.ts';
import { loggerService } from './loggerService.ts';
import { NotFoundError, ValidationError } from './errors.ts';
import { createJudgeSchema, parseInput } from './validationService.ts';
import { nowIso } from './recordFactory.ts';

// Redis Keys Configuration
export const KEYS = {
  JUDGES_SET: 'mj:judges',
  JUDGE_PREFIX: 'mj:judge:', // e.g., mj:judge:safety
};

const judgeKey = (name: string) => `${KEYS.JUDGE_PREFIX}${name}`;

const isScoreRange = (value: unknown): value is JudgeConfiguration['score_range'] =>
  typeof value === 'object' &&
  value !== null &&
  'min_score' in value &&
  'max_score' in value &&
  typeof value.min_score === 'number' &&
  typeof value.max_score === 'number';

const isJudgeConfiguration = (value: unknown): value is JudgeConfiguration =>
  typeof value === 'object' &&
  value !== null &&
  'name' in value &&
  'criterion' in value &&
  'instructions' in value &&
  'score_range' in value &&
  'created_at' in value &&
  typeof value.name === 'string' &&
  typeof value.criterion === 'string' &&
  typeof value.instructions === 'string' &&
  typeof value.created_at === 'string' &&
  isScoreRange(value.score_range);

const decodeJudge = (raw: unknown): JudgeConfiguration | null => {
  if (typeof raw !== 'string') return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJudgeConfiguration(parsed) ? parsed : null;
  } catch (error) {
    loggerService.warn('JudgeRegistry: stored configuration is not valid JSON', { error });
    return null;
  }
};

/**
 * Durable named judge configurations. Memory content lives elsewhere;
 * deleting a judge here does not touch its collections.
 */
export const judgeRegistryService = {
  create: async (request: CreateJudgeRequest): Promise<JudgeConfiguration> => {
    const input = parseInput(createJudgeSchema, request, 'judge configuration');

    const judge: JudgeConfiguration = {
      name: input.name,
      criterion: input.criterion,
      instructions: input.instructions,
      score_range: { min_score: input.min_score, max_score: input.max_score },
      created_at: nowIso(),
    };

    // NX keeps two concurrent creates from both succeeding
    const stored = await redisService.request(['SET', judgeKey(judge.name), JSON.stringify(judge), 'NX']);
    if (stored === null) {
      throw new ValidationError(`Judge '${judge.name}' already exists`);
    }
    await redisService.request(['SADD', KEYS.JUDGES_SET, judge.name]);

    loggerService.info(`Created judge '${judge.name}'`);
    return judge;
  },

  exists: async (name: string): Promise<boolean> => {
    const result = await redisService.request(['EXISTS', judgeKey(name)]);
    return Number(result) > 0;
  },

  get: async (name: string): Promise<JudgeConfiguration> => {
    const raw = await redisService.request(['GET', judgeKey(name)]);
    if (raw === null || raw === undefined) {
      throw new NotFoundError(`Judge '${name}' does not exist`);
    }
    const judge = decodeJudge(raw);
    if (!judge) {
      throw new NotFoundError(`Judge '${name}' has an unreadable configuration`);
    }
    return judge;
  },

  list: async (): Promise<JudgeConfiguration[]> => {
    const members = await redisService.request(['SMEMBERS', KEYS.JUDGES_SET]);
    const names = Array.isArray(members)
      ? members.filter((m): m is string => typeof m === 'string').sort()
      : [];

    const judges: JudgeConfiguration[] = [];
    for (const name of names) {
      const judge = decodeJudge(await redisService.request(['GET', judgeKey(name)]));
      if (judge) {
        judges.push(judge);
      } else {
        loggerService.warn(`JudgeRegistry: skipping invalid judge config for '${name}'`);
      }
    }
    return judges;
  },

  delete: async (name: string): Promise<boolean> => {
    const removed = await redisService.request(['DEL', judgeKey(name)]);
    await redisService.request(['SREM', KEYS.JUDGES_SET, name]);
    const deleted = Number(removed) > 0;
    if (deleted) {
      loggerService.info(`Deleted judge '${name}'`);
    }
    return deleted;
  },
};

export type JudgeRegistry = typeof judgeRegistryService;
