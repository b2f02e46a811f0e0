export type OracleTask =
  | 'entity-extraction'
  | 'idea-generation'
  | 'idea-revision'
  | 'novelty-review'
  | 'feasibility-review';

const ORACLE_TASKS: readonly OracleTask[] = [
  'entity-extraction',
  'idea-generation',
  'idea-revision',
  'novelty-review',
  'feasibility-review',
];

/** Tags a system prompt so stubs and logs can tell request types apart. */
export function taskMarker(task: OracleTask): string {
  return `[TASK:${task}]`;
}

export function readTaskMarker(prompt: string): OracleTask | undefined {
  const match = /\[TASK:([a-z-]+)\]/.exec(prompt);
  return ORACLE_TASKS.find((task) => task === match?.[1]);
}
