import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IngestionError, SchemaValidationError } from '@ideaweaver/shared/src/utils/errors.js';
import { loadSurveyDocument, outlineEntriesFrom, parseSurveyMarkdown } from './survey-loader.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const SURVEY = `# Graph Learning Survey

## Abstract
Graph methods are growing.

They scale poorly.

**Keywords**: graph neural network, message passing， scalability

## Introduction
Message passing dominates the field.
`;

async function mockFiles(files: Record<string, string>): Promise<void> {
  const { readFile } = await import('node:fs/promises');
  vi.mocked(readFile).mockImplementation((path: unknown) => {
    const content = files[String(path)];
    return content === undefined
      ? Promise.reject(new Error(`ENOENT: no such file or directory, open '${String(path)}'`))
      : Promise.resolve(content);
  });
}

describe('parseSurveyMarkdown', () => {
  it('should read title, abstract and keywords', () => {
    expect(parseSurveyMarkdown(SURVEY)).toEqual({
      title: 'Graph Learning Survey',
      abstract: 'Graph methods are growing.\nThey scale poorly.',
      keywords: ['graph neural network', 'message passing', 'scalability'],
    });
  });

  it('should read a Chinese abstract and keyword line', () => {
    const metadata = parseSurveyMarkdown('# 图学习综述\n\n## 摘要\n图方法发展迅速。\n**关键词**：图神经网络，消息传递\n');

    expect(metadata).toEqual({
      title: '图学习综述',
      abstract: '图方法发展迅速。',
      keywords: ['图神经网络', '消息传递'],
    });
  });

  it('should stop the abstract at the next heading', () => {
    const metadata = parseSurveyMarkdown('# T\n## Abstract\nShort.\n## Methods\nKeywords: not, these\n');

    expect(metadata.abstract).toBe('Short.');
    expect(metadata.keywords).toEqual([]);
  });
});

describe('outlineEntriesFrom', () => {
  it('should flatten chapters and subsections with merged key points', () => {
    const entries = outlineEntriesFrom({
      topic: 'Graph learning',
      chapters: {
        '1': {
          title: 'Introduction',
          key_points: ['message passing'],
          research_focus: 'scalability',
          keywords: ['message passing', 'graphs'],
          subsections: { '1.1': { title: 'Background', keywords: ['spectral methods'] } },
        },
        '2': { title: 'Methods' },
      },
    });

    expect(entries).toEqual([
      { section: 'Introduction', keyPoints: ['message passing', 'scalability', 'graphs'] },
      { section: 'Background', keyPoints: ['spectral methods'] },
      { section: 'Methods', keyPoints: [] },
    ]);
  });
});

describe('loadSurveyDocument', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should build a document with the enriched outline', async () => {
    await mockFiles({
      '/data/gl-survey.md': SURVEY,
      '/data/outline.json': JSON.stringify({
        topic: 'Graph learning',
        chapters: [{ title: 'Introduction', key_points: ['message passing'] }],
      }),
    });

    const document = await loadSurveyDocument({
      surveyPath: '/data/gl-survey.md',
      outlinePath: '/data/outline.json',
    });

    expect(document).toEqual({
      id: 'gl-survey',
      title: 'Graph Learning Survey',
      text: SURVEY,
      outline: [{ section: 'Introduction', keyPoints: ['message passing'] }],
      abstract: 'Graph methods are growing.\nThey scale poorly.',
      keywords: ['graph neural network', 'message passing', 'scalability'],
    });
  });

  it('should derive a single-section outline without an outline file', async () => {
    await mockFiles({ '/data/gl-survey.md': SURVEY });

    const document = await loadSurveyDocument({ surveyPath: '/data/gl-survey.md', documentId: 'survey' });

    expect(document.id).toBe('survey');
    expect(document.outline).toEqual([
      {
        section: 'Graph Learning Survey',
        keyPoints: ['graph neural network', 'message passing', 'scalability'],
      },
    ]);
  });

  it('should fall back to the document id as title', async () => {
    await mockFiles({ '/data/notes.md': 'Plain text without headings.' });

    const document = await loadSurveyDocument({ surveyPath: '/data/notes.md' });

    expect(document.title).toBe('notes');
    expect(document.abstract).toBeUndefined();
    expect(document.outline).toEqual([{ section: 'notes', keyPoints: [] }]);
  });

  it('should raise an IngestionError for a missing survey', async () => {
    await mockFiles({});

    await expect(loadSurveyDocument({ surveyPath: '/data/missing.md' })).rejects.toThrow(IngestionError);
  });

  it('should raise an IngestionError for an unparseable outline', async () => {
    await mockFiles({ '/data/s.md': SURVEY, '/data/outline.json': '{not json' });

    await expect(
      loadSurveyDocument({ surveyPath: '/data/s.md', outlinePath: '/data/outline.json' }),
    ).rejects.toThrow(IngestionError);
  });

  it('should reject an outline that does not match the schema', async () => {
    await mockFiles({ '/data/s.md': SURVEY, '/data/outline.json': JSON.stringify({ chapters: [] }) });

    await expect(
      loadSurveyDocument({ surveyPath: '/data/s.md', outlinePath: '/data/outline.json' }),
    ).rejects.toThrow(SchemaValidationError);
  });
});
