import type { LanguageModelCaller, MemoryConfig, SimilarityIndexFactory } from '../types.ts';
import { loadMemoryConfig } from './settingsService.ts';
import { createInferenceClient } from './inferenceService.ts';
import { createChromaIndex } from './vectorService.ts';
import { judgeRegistryService, type JudgeRegistry } from './judgeRegistryService.ts';
import { MemoryStorePool } from './memoryStore.ts';
import { AlignmentEngine } from './alignmentService.ts';
import { JudgmentEngine } from './judgmentService.ts';

export interface ContainerDeps {
  config: Readonly<MemoryConfig>;
  registry: JudgeRegistry;
  llm: LanguageModelCaller;
  indexFactory: SimilarityIndexFactory;
}

/** Long-lived collaborators, built once at process start and passed explicitly. */
export class Container {
  readonly config: Readonly<MemoryConfig>;
  readonly registry: JudgeRegistry;
  readonly llm: LanguageModelCaller;
  readonly stores: MemoryStorePool;

  constructor(deps: ContainerDeps) {
    this.config = deps.config;
    this.registry = deps.registry;
    this.llm = deps.llm;
    this.stores = new MemoryStorePool(deps.indexFactory, deps.config);
  }

  alignmentEngine(judgeName: string): AlignmentEngine {
    return new AlignmentEngine(this.config, this.stores.get(judgeName), this.llm);
  }

  judgmentEngine(judgeName: string): JudgmentEngine {
    return new JudgmentEngine(this.config, this.stores.get(judgeName), this.llm);
  }
}

export function createContainer(overrides: Partial<ContainerDeps> = {}): Container {
  return new Container({
    config: overrides.config ?? loadMemoryConfig(),
    registry: overrides.registry ?? judgeRegistryService,
    llm: overrides.llm ?? createInferenceClient(),
    indexFactory: overrides.indexFactory ?? createChromaIndex,
  });
}
