// node/src/pipeline/stages/interpretation.ts — one LLM call turns the retrieved chart data into the answer
import { LlmOutputError } from '@/services/errors';
import { logger } from '@/services/logger';
import type { Stage } from '../stage-runner';

export const interpretationStage: Stage = {
  name: 'interpretation',
  fatal: true,

  async execute({ state, llm, templates, progress }) {
    const results = state.searchResults.length > 0 ? state.searchResults : state.chartSpecs;
    progress('Interpreting the retrieved data.', { results: results.length });

    const prompt = templates.interpretation({
      question: state.question,
      results,
      instructions: state.interpretationPrompt,
    });
    const { content } = await llm.invoke(prompt);
    const finalResponse = content.trim();
    if (!finalResponse) {
      throw new LlmOutputError('interpretation: empty answer');
    }

    logger.info('interpretation:done', { chars: finalResponse.length });
    return { finalResponse };
  },
};
