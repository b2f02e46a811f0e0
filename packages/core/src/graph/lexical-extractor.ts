import type { NodeKind } from '@ideaweaver/shared/src/types/ideation.types.js';
import type { EntityExtractor, EntityMention, ExtractionInput } from './entity-extractor.js';
import { classifyKind } from './entity-kinds.js';
import { normalizeLabel } from './labels.js';

export const SECTION_KEY_POINT_CONFIDENCE = 0.9;
export const OUTLINE_TERM_CONFIDENCE = 0.75;
export const ACRONYM_CONFIDENCE = 0.6;

// Scripts written without spaces between words; word boundaries do not apply.
const UNSPACED_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}]/u;

const ACRONYM = /\b[A-Z][A-Za-z]*[A-Z][A-Za-z0-9]*(?:-[A-Za-z0-9]+)*\b/g;

interface LexiconTerm {
  readonly label: string;
  readonly pattern: RegExp;
  readonly kind: NodeKind;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function toTerm(label: string): LexiconTerm | undefined {
  const trimmed = label.trim();
  if (trimmed.length < 2 || normalizeLabel(trimmed) === '') {
    return undefined;
  }
  const escaped = escapeRegExp(trimmed);
  return {
    label: trimmed,
    pattern: UNSPACED_SCRIPT.test(trimmed)
      ? new RegExp(escaped, 'iu')
      : new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?:e?s)?(?![\\p{L}\\p{N}])`, 'iu'),
    kind: classifyKind(trimmed),
  };
}

/**
 * Deterministic extractor: outline key points and document keywords form the
 * lexicon, acronym-like tokens are picked up as methods.
 */
export function createLexicalEntityExtractor(): EntityExtractor {
  return {
    extract({ document, section, outlineEntry }: ExtractionInput): Promise<readonly EntityMention[]> {
      const sectionKeyPoints = new Set((outlineEntry?.keyPoints ?? []).map(normalizeLabel));
      const vocabulary = [
        ...document.outline.flatMap((entry) => entry.keyPoints),
        ...(document.keywords ?? []),
      ];

      const terms = new Map<string, LexiconTerm>();
      for (const label of vocabulary) {
        const term = toTerm(label);
        const key = normalizeLabel(label);
        if (term && !terms.has(key)) {
          terms.set(key, term);
        }
      }

      const mentions: EntityMention[] = [];

      section.sentences.forEach((sentence, sentenceIndex) => {
        const seen = new Map<string, EntityMention>();
        const record = (mention: EntityMention): void => {
          const key = normalizeLabel(mention.label);
          const existing = seen.get(key);
          if (!existing || existing.confidence < mention.confidence) {
            seen.set(key, mention);
          }
        };

        for (const [key, term] of terms) {
          if (term.pattern.test(sentence)) {
            record({
              label: term.label,
              kind: term.kind,
              confidence: sectionKeyPoints.has(key) ? SECTION_KEY_POINT_CONFIDENCE : OUTLINE_TERM_CONFIDENCE,
              sentenceIndex,
            });
          }
        }

        for (const match of sentence.matchAll(ACRONYM)) {
          record({
            label: match[0],
            kind: classifyKind(match[0], 'method'),
            confidence: ACRONYM_CONFIDENCE,
            sentenceIndex,
          });
        }

        mentions.push(...seen.values());
      });

      return Promise.resolve(mentions);
    },
  };
}
