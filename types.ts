
// Shared Judge Definitions

export interface ScoreRange {
  min_score: number;
  max_score: number;
}

export interface JudgeConfiguration {
  name: string;
  criterion: string;
  instructions: string;
  score_range: ScoreRange;
  created_at: string;
}

export interface CreateJudgeRequest {
  name: string;
  criterion: string;
  instructions: string;
  min_score?: number;
  max_score?: number;
}

// --- Memory Records ---

/** Semantic memory entry: a generalizable evaluation principle. */
export interface Principle {
  id: string;
  text: string;
  source_example_ids: string[];
  created_at: string;
}

/** Episodic memory entry: one expert feedback event, stored verbatim. */
export interface Example {
  id: string;
  input_text: string;
  expert_feedback: string;
  expert_score?: number;
  judge_output?: string;
  judge_score?: number;
  created_at: string;
}

export interface FeedbackInput {
  input_text: string;
  expert_feedback: string;
  expert_score?: number;
  judge_output?: string;
  judge_score?: number;
}

export interface SimilarPrinciple {
  principle: Principle;
  similarity: number;
}

export interface MemoryStats {
  judge_name: string;
  total_principles: number;
  total_examples: number;
  oldest_principle: string | null;
  newest_principle: string | null;
  oldest_example: string | null;
  newest_example: string | null;
}

// --- Pipeline Results ---

export interface AlignmentResult {
  judge_name: string;
  example_id: string;
  principles_extracted: string[];
  principles_deduplicated: number;
  total_principles: number;
  total_examples: number;
}

export interface JudgmentResult {
  score: number;
  reasoning: string;
  judge_name: string;
  principles_used: number;
  examples_retrieved: number;
  /** Raw model score, present only when it fell outside the judge's range. */
  clamped_from?: number;
}

// --- Collaborator Contracts ---

export type IndexMetadataValue = string | number | boolean;
export type IndexMetadata = Record<string, IndexMetadataValue>;

export interface IndexRecord {
  id: string;
  document: string;
  metadata: IndexMetadata;
}

export interface IndexMatch extends IndexRecord {
  /** Cosine distance in [0, 2]. */
  distance: number;
}

/**
 * One collection of a nearest-neighbour store keyed by text.
 * Results of `query` are ordered nearest first.
 */
export interface SimilarityIndex {
  upsert(records: IndexRecord[]): Promise<void>;
  get(options?: { ids?: string[]; limit?: number }): Promise<IndexRecord[]>;
  query(text: string, nResults: number): Promise<IndexMatch[]>;
  delete(ids: string[]): Promise<void>;
  count(): Promise<number>;
  deleteCollection(): Promise<void>;
}

export type SimilarityIndexFactory = (collectionName: string) => SimilarityIndex;

export interface ModelCallOptions {
  system: string;
  user: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export type JsonObject = Record<string, unknown>;

export interface LanguageModelCaller {
  call(options: ModelCallOptions): Promise<string>;
  callJson(options: ModelCallOptions): Promise<JsonObject>;
}

export interface MemoryConfig {
  retrievalK: number;
  similarityThreshold: number;
  extractionModel: string;
  judgmentModel: string;
  embeddingModel: string;
}

// --- Tool Surface ---

export interface ToolParameterSchema {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';
  description?: string;
}

export interface ToolDeclaration {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, ToolParameterSchema>;
    required?: string[];
  };
}

export type ToolArgs = Record<string, unknown>;
export type ToolExecutor = (name: string, args: ToolArgs) => Promise<JsonObject>;
