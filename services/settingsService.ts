import dotenv from 'dotenv';
import { z } from 'zod';
import type { MemoryConfig } from '../types.ts';
import { ValidationError } from './errors.ts';

dotenv.config();

export const DEFAULTS = {
  RETRIEVAL_K: 5,
  SIMILARITY_THRESHOLD: 0.9,
  EXTRACTION_MODEL: 'gpt-4o-mini',
  JUDGMENT_MODEL: 'gpt-4o',
  EMBEDDING_MODEL: 'text-embedding-3-small',
  INFERENCE_ENDPOINT: 'https://api.openai.com/v1',
  CHROMA_URL: 'http://localhost:8000',
  REDIS_URL: 'redis://localhost:6379',
  PORT: 3001,
} as const;

export interface InferenceSettings {
  endpoint: string;
  apiKey: string;
  extractionModel: string;
  judgmentModel: string;
}

export interface VectorSettings {
  chromaUrl: string;
  embeddingModel: string;
}

export interface RedisSettings {
  redisUrl: string;
}

const memoryConfigSchema = z.object({
  retrievalK: z.coerce.number().int().positive(),
  similarityThreshold: z.coerce.number().min(0).max(1),
  extractionModel: z.string().min(1),
  judgmentModel: z.string().min(1),
  embeddingModel: z.string().min(1),
});

const envOr = (key: string, fallback: string): string => {
  const value = process.env[key]?.trim();
  return value ? value : fallback;
};

export const settingsService = {
  // --- Core Identity ---
  getApiKey: (): string => process.env.API_KEY || '',

  setApiKey: (key: string) => {
    process.env.API_KEY = key;
  },

  // --- Inference ---
  getInferenceSettings: (): InferenceSettings => ({
    endpoint: envOr('INFERENCE_ENDPOINT', DEFAULTS.INFERENCE_ENDPOINT),
    apiKey: settingsService.getApiKey(),
    extractionModel: envOr('EXTRACTION_MODEL', DEFAULTS.EXTRACTION_MODEL),
    judgmentModel: envOr('JUDGMENT_MODEL', DEFAULTS.JUDGMENT_MODEL),
  }),

  // --- Vector Database ---
  getVectorSettings: (): VectorSettings => ({
    chromaUrl: envOr('CHROMA_URL', DEFAULTS.CHROMA_URL),
    embeddingModel: envOr('EMBEDDING_MODEL', DEFAULTS.EMBEDDING_MODEL),
  }),

  // --- Redis Settings ---
  getRedisSettings: (): RedisSettings => ({
    redisUrl: envOr('REDIS_URL', DEFAULTS.REDIS_URL),
  }),

  getPort: (): number => {
    const port = Number.parseInt(process.env.PORT || '', 10);
    return Number.isFinite(port) && port > 0 ? port : DEFAULTS.PORT;
  },
};

/**
 * Reads the options the alignment and judgment pipelines consume.
 * Invalid numeric values fail here rather than deep inside a pipeline.
 */
export function loadMemoryConfig(): Readonly<MemoryConfig> {
  const inference = settingsService.getInferenceSettings();
  const parsed = memoryConfigSchema.safeParse({
    retrievalK: envOr('RETRIEVAL_K', String(DEFAULTS.RETRIEVAL_K)),
    similarityThreshold: envOr('SIMILARITY_THRESHOLD', String(DEFAULTS.SIMILARITY_THRESHOLD)),
    extractionModel: inference.extractionModel,
    judgmentModel: inference.judgmentModel,
    embeddingModel: settingsService.getVectorSettings().embeddingModel,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid memory configuration: ${issues.join('; ')}`, issues);
  }

  return Object.freeze(parsed.data);
}
