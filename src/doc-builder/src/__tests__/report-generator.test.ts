/**
 * Tests for ReportGenerator and formatEdits.
 */

import { ReportGenerator, formatEdits, isReportFormat } from '../report/ReportGenerator';
import { summarize } from '../refinement/DocPipeline';
import { BatchResult, DocstringResult, FileResult } from '../types';

function result(
  qualifiedName: string,
  confidenceScore: number,
  iterationsUsed: number,
  warnings: string[] = []
): DocstringResult {
  return {
    elementName: qualifiedName,
    qualifiedName,
    spanKey: '0:1',
    text: '"""Doc."""',
    confidenceScore,
    style: 'google',
    iterationsUsed,
    outcome: warnings.length > 0 ? 'exhausted' : 'accepted',
    warnings,
    history: [],
  };
}

const FILES: FileResult[] = [
  {
    path: '/proj/a.py',
    status: 'processed',
    output: 'changed',
    results: [
      result('add', 0.9, 1),
      result('check', 0.6, 3, ['Confidence threshold 0.8 not reached after 3 iterations (best 0.60)']),
    ],
    skipped: [{ qualifiedName: 'Store', reason: 'existing-doc' }],
    edits: [],
    fingerprint: 'aaa',
    durationMs: 12,
  },
  {
    path: '/proj/b.py',
    status: 'failed',
    results: [],
    skipped: [],
    edits: [],
    fingerprint: 'bbb',
    error: { name: 'ParseError', message: "expected ':' (line 2, column 9)", line: 2, column: 9 },
    durationMs: 3,
  },
  {
    path: '/proj/c.py',
    status: 'unchanged',
    output: 'same',
    results: [],
    skipped: [],
    edits: [],
    fingerprint: 'ccc',
    durationMs: 1,
  },
];

const BATCH: BatchResult = {
  runId: 'run-1',
  startedAt: '2026-01-01T00:00:00.000Z',
  style: 'google',
  files: FILES,
  statistics: summarize(FILES, 1234),
};

describe('summarize', () => {
  it('counts files and elements', () => {
    expect(BATCH.statistics).toEqual({
      files_total: 3,
      files_processed: 1,
      files_unchanged: 1,
      files_cached: 0,
      files_failed: 1,
      elements_documented: 2,
      elements_skipped: 1,
      elements_exhausted: 1,
      average_confidence: 0.75,
      duration_ms: 1234,
    });
  });

  it('reports zero confidence for an empty run', () => {
    expect(summarize([], 0).average_confidence).toBe(0);
  });
});

describe('ReportGenerator', () => {
  describe('generateMarkdown', () => {
    it('renders the summary and one section per file', () => {
      const markdown = new ReportGenerator(BATCH, { relativeTo: '/proj' }).generateMarkdown();

      expect(markdown.split('\n')).toEqual([
        '# Docstring Report',
        '',
        '> Run run-1 started 2026-01-01T00:00:00.000Z (style: google)',
        '',
        '## Summary',
        '',
        '| Metric | Value |',
        '|--------|-------|',
        '| Files | 3 |',
        '| Rewritten | 1 |',
        '| Unchanged | 1 |',
        '| From Cache | 0 |',
        '| Failed | 1 |',
        '| Elements Documented | 2 |',
        '| Elements Skipped | 1 |',
        '| Below Threshold | 1 |',
        '| Average Confidence | 0.75 |',
        '| Duration | 1234ms |',
        '',
        '## Files',
        '',
        '### a.py (processed)',
        '',
        '| Element | Confidence | Iterations | Outcome |',
        '|---------|------------|------------|---------|',
        '| add | 0.90 | 1 | accepted |',
        '| check | 0.60 | 3 | exhausted |',
        '',
        'Skipped (existing docstring): `Store`',
        '',
        'Warnings:',
        '',
        '- `check`: Confidence threshold 0.8 not reached after 3 iterations (best 0.60)',
        '',
        '### b.py (failed)',
        '',
        "**ParseError** at line 2: expected ':' (line 2, column 9)",
        '',
        '### c.py (unchanged)',
        '',
      ]);
    });

    it('can leave out unchanged files and warnings', () => {
      const markdown = new ReportGenerator(BATCH, {
        relativeTo: '/proj',
        onlyChanged: true,
        includeWarnings: false,
        title: 'Nightly',
      }).generateMarkdown();

      expect(markdown.startsWith('# Nightly\n')).toBe(true);
      expect(markdown).not.toContain('### c.py');
      expect(markdown).not.toContain('Warnings:');
    });

    it('escapes table cells', () => {
      const batch: BatchResult = {
        ...BATCH,
        files: [
          {
            path: '/proj/c.py',
            status: 'processed',
            output: 'changed',
            results: [result('a|b', 1, 1)],
            skipped: [],
            edits: [],
            fingerprint: 'ccc',
            durationMs: 1,
          },
        ],
      };
      const markdown = new ReportGenerator(batch, { relativeTo: '/proj' }).generateMarkdown();
      expect(markdown).toContain('| a\\|b | 1.00 | 1 | accepted |');
    });
  });

  describe('generateJSON', () => {
    it('lists files and elements without history', () => {
      const data: unknown = JSON.parse(new ReportGenerator(BATCH, { relativeTo: '/proj' }).generate('json'));

      expect(data).toEqual({
        runId: 'run-1',
        startedAt: '2026-01-01T00:00:00.000Z',
        style: 'google',
        statistics: BATCH.statistics,
        files: [
          {
            path: 'a.py',
            status: 'processed',
            fingerprint: 'aaa',
            durationMs: 12,
            skipped: [{ qualifiedName: 'Store', reason: 'existing-doc' }],
            elements: [
              { name: 'add', confidence: 0.9, iterations: 1, outcome: 'accepted', warnings: [] },
              {
                name: 'check',
                confidence: 0.6,
                iterations: 3,
                outcome: 'exhausted',
                warnings: ['Confidence threshold 0.8 not reached after 3 iterations (best 0.60)'],
              },
            ],
          },
          {
            path: 'b.py',
            status: 'failed',
            fingerprint: 'bbb',
            durationMs: 3,
            error: { name: 'ParseError', message: "expected ':' (line 2, column 9)", line: 2, column: 9 },
            skipped: [],
            elements: [],
          },
          {
            path: 'c.py',
            status: 'unchanged',
            fingerprint: 'ccc',
            durationMs: 1,
            skipped: [],
            elements: [],
          },
        ],
      });
    });
  });
});

describe('formatEdits', () => {
  it('lists edits top-down with added lines', () => {
    const text = formatEdits('a.py', [
      { qualifiedName: 'check', action: 'replaced', line: 7, text: '"""Check."""' },
      { qualifiedName: 'add', action: 'inserted', line: 2, text: '"""Add a and b.\n\nReturns the sum.\n"""' },
    ]);

    expect(text).toBe(
      [
        '--- a.py',
        '+++ a.py',
        '@@ line 2: inserted docstring for add @@',
        '+"""Add a and b.',
        '+',
        '+Returns the sum.',
        '+"""',
        '@@ line 7: replaced docstring for check @@',
        '+"""Check."""',
      ].join('\n')
    );
  });
});

describe('isReportFormat', () => {
  it('accepts md and json only', () => {
    expect(isReportFormat('md')).toBe(true);
    expect(isReportFormat('json')).toBe(true);
    expect(isReportFormat('html')).toBe(false);
  });
});
