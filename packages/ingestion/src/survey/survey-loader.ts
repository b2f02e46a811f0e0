import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { IngestedDocument, OutlineEntry } from '@ideaweaver/shared/src/types/ingestion.types.js';
import type { EnrichedOutline, OutlineSection } from '@ideaweaver/schemas/src/outline.schema.js';
import { validateEnrichedOutline } from '@ideaweaver/schemas/src/validators.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { IngestionError, toError } from '@ideaweaver/shared/src/utils/errors.js';

const log = createChildLogger('ingestion:survey');

const TITLE = /^#\s+(.+?)\s*$/;
const ABSTRACT_HEADING = /^#{1,2}\s*(?:abstract|摘要)\s*$/i;
const ANY_HEADING = /^#{1,6}\s/;
const KEYWORDS_LINE = /^\**\s*(?:keywords|关键词)\s*\**\s*[:：]\s*\**\s*(.*)$/i;

export interface SurveyMetadata {
  readonly title: string;
  readonly abstract: string;
  readonly keywords: readonly string[];
}

export interface LoadSurveyOptions {
  readonly surveyPath: string;
  readonly outlinePath?: string;
  /** Defaults to the survey file name without its extension. */
  readonly documentId?: string;
}

/** Reads the title, abstract and keyword line of a survey written in markdown. */
export function parseSurveyMarkdown(content: string): SurveyMetadata {
  const lines = content.split(/\r?\n/).map((line) => line.trim());

  let title = '';
  for (const line of lines) {
    const match = TITLE.exec(line);
    if (match) {
      title = match[1];
      break;
    }
  }

  const abstractLines: string[] = [];
  let keywords: string[] = [];
  const start = lines.findIndex((line) => ABSTRACT_HEADING.test(line));
  if (start >= 0) {
    for (const line of lines.slice(start + 1)) {
      if (ANY_HEADING.test(line)) break;
      if (line === '') continue;
      const keywordMatch = KEYWORDS_LINE.exec(line);
      if (keywordMatch) {
        keywords = keywordMatch[1]
          .split(/[,，;；]/)
          .map((k) => k.replace(/\*/g, '').trim())
          .filter((k) => k.length > 0);
        break;
      }
      abstractLines.push(line);
    }
  }

  return { title, abstract: abstractLines.join('\n'), keywords };
}

function toList(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : value;
}

function entryFor(section: OutlineSection): OutlineEntry {
  const keyPoints = [
    ...(section.key_points ?? []),
    ...toList(section.research_focus),
    ...(section.keywords ?? []),
  ]
    .map((point) => point.trim())
    .filter((point) => point.length > 0);
  return { section: section.title, keyPoints: [...new Set(keyPoints)] };
}

/** Flattens chapters and their subsections into outline entries, in outline order. */
export function outlineEntriesFrom(outline: EnrichedOutline): OutlineEntry[] {
  const chapters = Array.isArray(outline.chapters) ? outline.chapters : Object.values(outline.chapters);
  return chapters.flatMap((chapter) => {
    const subsections = chapter.subsections
      ? Array.isArray(chapter.subsections)
        ? chapter.subsections
        : Object.values(chapter.subsections)
      : [];
    return [entryFor(chapter), ...subsections.map(entryFor)];
  });
}

/** Single-section outline used when no enriched outline is supplied. */
export function fallbackOutline(metadata: SurveyMetadata): OutlineEntry[] {
  return [{ section: metadata.title, keyPoints: metadata.keywords }];
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    const cause = toError(error);
    throw new IngestionError(`Failed to read ${path}: ${cause.message}`, cause);
  }
}

async function readOutline(path: string): Promise<EnrichedOutline> {
  const content = await readText(path);
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const cause = toError(error);
    throw new IngestionError(`Invalid JSON in ${path}: ${cause.message}`, cause);
  }
  return validateEnrichedOutline(data);
}

export async function loadSurveyDocument(options: LoadSurveyOptions): Promise<IngestedDocument> {
  const { surveyPath, outlinePath } = options;
  const id = options.documentId ?? basename(surveyPath, extname(surveyPath));

  const text = await readText(surveyPath);
  const metadata = parseSurveyMarkdown(text);
  const title = metadata.title || id;

  let outline: OutlineEntry[];
  if (outlinePath) {
    outline = outlineEntriesFrom(await readOutline(outlinePath));
  } else {
    log.warn({ surveyPath }, 'No enriched outline given, deriving one from the title and keywords');
    outline = fallbackOutline({ ...metadata, title });
  }

  log.info(
    { documentId: id, title, keywords: metadata.keywords.length, outlineEntries: outline.length },
    'Survey loaded',
  );

  return {
    id,
    title,
    text,
    outline,
    ...(metadata.abstract ? { abstract: metadata.abstract } : {}),
    keywords: metadata.keywords,
  };
}
