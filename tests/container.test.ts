import { describe, it, expect, vi } from 'vitest';
import { createContainer } from '../services/container.ts';
import { judgeRegistryService } from '../services/judgeRegistryService.ts';
import { AlignmentEngine } from '../services/alignmentService.ts';
import { JudgmentEngine } from '../services/judgmentService.ts';
import { FakeLlm, createFakeIndexFactory, testMemoryConfig } from './fakes.ts';

vi.mock('../services/loggerService');

describe('Container', () => {
    it('uses the registry and loaded config by default', () => {
        const container = createContainer({ llm: new FakeLlm(), indexFactory: createFakeIndexFactory().factory });

        expect(container.registry).toBe(judgeRegistryService);
        expect(container.config.retrievalK).toBeGreaterThan(0);
    });

    it('builds engines over the pooled store of each judge', () => {
        const { factory, indexes } = createFakeIndexFactory();
        const container = createContainer({ config: testMemoryConfig, llm: new FakeLlm(), indexFactory: factory });

        expect(container.alignmentEngine('safety')).toBeInstanceOf(AlignmentEngine);
        expect(container.judgmentEngine('safety')).toBeInstanceOf(JudgmentEngine);
        expect(container.stores.size()).toBe(1);
        expect([...indexes.keys()]).toEqual(['safety_semantic', 'safety_episodic']);
    });
});
