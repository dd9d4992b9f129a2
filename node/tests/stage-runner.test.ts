import { describe, it, expect } from 'vitest';
import { runStage, type Stage, type StageDeps } from '@/pipeline/stage-runner';
import { FilterSelectionError } from '@/services/errors';
import { FakeDataClient, FakeLlm, makeState, testPipelineConfig, testTemplates } from './helpers/fakes';

const deps: StageDeps = { templates: testTemplates, config: testPipelineConfig, adminLevels: {} };

describe('runStage', () => {
  it('merges the delta and records tokens for a successful stage', async () => {
    const stage: Stage = {
      name: 'interpretation',
      fatal: true,
      async execute({ llm }) {
        const { content } = await llm.invoke('p');
        return { finalResponse: content };
      },
    };
    const state = makeState(new FakeLlm(['done']), new FakeDataClient());

    await runStage(stage, state, deps);

    expect(state.finalResponse).toBe('done');
    expect(state.executionMetadata.completedStages).toEqual(['interpretation']);
    expect(state.executionMetadata.stageTokenUsage.interpretation).toEqual({
      promptTokens: 10,
      completionTokens: 5,
      totalTokens: 15,
    });
    expect(state.executionMetadata.tokenUsage.totalTokens).toBe(15);
  });

  it('records the error and continues for a non-fatal stage', async () => {
    const stage: Stage = {
      name: 'execution',
      fatal: false,
      async execute() {
        throw new Error('planet unreachable');
      },
    };
    const state = makeState(new FakeLlm(), new FakeDataClient());

    await expect(runStage(stage, state, deps)).resolves.toBe(state);

    expect(state.errors).toEqual(['execution stage error: planet unreachable']);
    expect(state.executionMetadata.failedStages).toEqual({ execution: 'planet unreachable' });
    expect(state.executionMetadata.completedStages).toEqual([]);
    expect(state.executionMetadata.currentStage).toBe('execution');
  });

  it('re-throws from a fatal stage after recording it', async () => {
    const stage: Stage = {
      name: 'filterDecision',
      fatal: true,
      async execute() {
        throw new FilterSelectionError();
      },
    };
    const state = makeState(new FakeLlm(), new FakeDataClient());

    await expect(runStage(stage, state, deps)).rejects.toBeInstanceOf(FilterSelectionError);
    expect(state.errors).toEqual(['filterDecision stage error: AI cannot select accurate filter value']);
  });
});
