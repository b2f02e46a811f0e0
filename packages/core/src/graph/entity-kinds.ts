import type { NodeKind } from '@ideaweaver/shared/src/types/ideation.types.js';

const KIND_CUES: ReadonlyArray<readonly [NodeKind, RegExp]> = [
  ['finding', /\b(improves?|outperforms?|reduces?|increases?|leads? to|results? in|demonstrates?|degrades?|fails? to)\b/i],
  ['dataset', /\b(datasets?|data ?sets?|corpus|corpora|benchmarks?|suite)\b/i],
  [
    'task',
    /\b(classification|detection|segmentation|translation|recognition|prediction|generation|retrieval|summari[sz]ation|answering|forecasting|parsing|tracking|planning|reasoning)\b/i,
  ],
  [
    'method',
    /\b(networks?|models?|algorithms?|methods?|transformers?|attention|learning|regression|optimi[sz]ation|encoders?|decoders?|architectures?|frameworks?|distillation|fine-?tuning|embeddings?)\b/i,
  ],
];

export function classifyKind(label: string, fallback: NodeKind = 'concept'): NodeKind {
  for (const [kind, cue] of KIND_CUES) {
    if (cue.test(label)) {
      return kind;
    }
  }
  return fallback;
}

/** Precedence used to break ties when mentions disagree on a node's kind. */
export const KIND_ORDER: readonly NodeKind[] = ['method', 'task', 'dataset', 'finding', 'concept'];
