// node/src/pipeline/stage-names.ts — the fixed, total stage order
export const STAGE_ORDER = ['search', 'planning', 'filterDecision', 'execution', 'interpretation'] as const;

export type StageName = (typeof STAGE_ORDER)[number];
