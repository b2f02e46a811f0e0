import type { NodeKind, RelationType } from '@ideaweaver/shared/src/types/ideation.types.js';

/** Cue words in precedence order; the first relation whose cue matches wins. */
const RELATION_CUES: ReadonlyArray<readonly [RelationType, RegExp]> = [
  ['contradicts', /\b(however|contrary|contradicts?|contradicting|in contrast|unlike|inconsistent)\b/i],
  ['compares', /\b(outperforms?|compared?|comparison|versus|vs|baselines?)\b/i],
  ['extends', /\b(extends?|extending|builds? (?:up)?on|generali[sz]es?|variants? of)\b/i],
  ['uses', /\b(uses?|using|applie[sd]|apply|employs?|leverag(?:es?|ing)|trained on|evaluated on)\b/i],
];

function isUsesPair(a: NodeKind, b: NodeKind): boolean {
  const kinds = new Set([a, b]);
  return kinds.has('method') && (kinds.has('dataset') || kinds.has('task'));
}

/** Types the relation between two co-occurring entities from the text that spans them. */
export function inferRelation(text: string, kindA: NodeKind, kindB: NodeKind): RelationType {
  for (const [relation, cue] of RELATION_CUES) {
    if (cue.test(text)) {
      return relation;
    }
  }
  return isUsesPair(kindA, kindB) ? 'uses' : 'supports';
}

/** Breaks ties when co-occurrences of one pair disagree on the relation. */
export const RELATION_ORDER: readonly RelationType[] = [
  'contradicts',
  'compares',
  'extends',
  'uses',
  'supports',
];
