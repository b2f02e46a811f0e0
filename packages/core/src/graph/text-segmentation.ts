import type { DocumentSection } from '@ideaweaver/shared/src/types/ingestion.types.js';

const HEADING = /^\s{0,3}#{1,6}\s+(.*?)\s*#*\s*$/;
const SENTENCE_BREAK = /(?<=[.!?。！？])\s+|\n+/;
const LIST_MARKER = /^\s*(?:[-*+]|\d+[.)])\s+/;

/** Splits markdown into heading-delimited sections of sentences. Text before the first heading becomes an untitled section. */
export function splitSections(text: string): DocumentSection[] {
  const chunks: Array<{ heading: string; lines: string[] }> = [{ heading: '', lines: [] }];

  for (const line of text.split(/\r?\n/)) {
    const heading = HEADING.exec(line);
    if (heading) {
      chunks.push({ heading: heading[1].trim(), lines: [] });
    } else {
      chunks[chunks.length - 1].lines.push(line);
    }
  }

  return chunks
    .filter((chunk, i) => i > 0 || chunk.lines.some((line) => line.trim() !== ''))
    .map((chunk, index) => ({
      index,
      heading: chunk.heading,
      sentences: splitSentences(chunk.lines.join('\n')),
    }));
}

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BREAK)
    .map((sentence) => sentence.replace(LIST_MARKER, '').trim())
    .filter((sentence) => sentence.length > 0);
}

export function spanId(documentId: string, sectionIndex: number, sentenceIndex: number): string {
  return `${documentId}#${String(sectionIndex)}.${String(sentenceIndex)}`;
}
