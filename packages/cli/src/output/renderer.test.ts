import pc from 'picocolors';
import { ConfigSchema, createOutcome, emptyCounts, type FileOutcome } from '@copyhead/shared';
import type { FileListing, RunResult } from '@copyhead/core';
import { OutputRenderer, toReport } from './renderer';

const colors = pc.createColors(false);

function result(outcomes: FileOutcome[], mode: 'check' | 'modify' = 'check'): RunResult {
  const counts = emptyCounts();
  for (const outcome of outcomes) {
    counts[outcome.tag] += 1;
  }
  const failed = counts.Failed > 0 || (mode === 'check' && counts.HeaderMissing > 0);
  return {
    runId: '1700000000000',
    workspaceRoot: '/repo',
    config: ConfigSchema.parse({ mode }),
    year: 2025,
    summary: { mode, total: outcomes.length, counts, failed, durationMs: 5 },
    outcomes,
    warnings: [],
  };
}

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  const lines = () => logSpy.mock.calls.map((c) => String(c[0]));

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', () => {
    const run = result([
      createOutcome('HeaderMissing', '/repo/b.rs'),
      createOutcome('AlreadyCompliant', '/repo/a.rs'),
    ]);

    new OutputRenderer({ json: true, colors }).render(run);

    expect(logSpy).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(parsed).toEqual({
      runId: '1700000000000',
      workspaceRoot: '/repo',
      mode: 'check',
      year: 2025,
      summary: run.summary,
      outcomes: [
        { tag: 'AlreadyCompliant', path: '/repo/a.rs' },
        { tag: 'HeaderMissing', path: '/repo/b.rs' },
      ],
      warnings: [],
    });
  });

  it('lists files needing attention and the summary', () => {
    new OutputRenderer({ json: false, colors }).render(
      result([
        createOutcome('HeaderMissing', '/repo/src/b.rs'),
        createOutcome('AlreadyCompliant', '/repo/a.rs'),
        createOutcome('Skipped', '/repo/c.rs', { reason: 'empty file' }),
      ]),
    );

    expect(lines()).toEqual([
      '  skipped  c.rs (empty file)',
      '  missing  src/b.rs',
      '\nChecked 3 file(s): 1 ok, 1 missing, 1 skipped',
      '❌ Check failed.',
      '  - To add missing headers, run with --modify.',
    ]);
  });

  it('lists compliant files when verbose', () => {
    new OutputRenderer({ json: false, verbose: true, colors }).render(
      result([createOutcome('AlreadyCompliant', '/repo/a.rs')]),
    );

    expect(lines()).toEqual(['  ok       a.rs', '\nChecked 1 file(s): 1 ok', '✅ Check passed.']);
  });

  it('prints only the summary when quiet', () => {
    new OutputRenderer({ json: false, quiet: true, colors }).render(
      result([createOutcome('HeaderAdded', '/repo/a.rs')], 'modify'),
    );

    expect(lines()).toEqual(['\nChecked 1 file(s): 1 added', '✅ Check passed.']);
  });

  it('prints the before and after text of each change with --diff', () => {
    new OutputRenderer({ json: false, diff: true, colors }).render(
      result([
        createOutcome('YearOutdated', '/repo/d.rs', {
          span: { before: 'Copyright (c) 2019', after: 'Copyright (c) 2025' },
        }),
        createOutcome('HeaderMissing', '/repo/e.rs', {
          span: { before: '', after: '// Copyright 2025 Acme\n\n' },
        }),
      ]),
    );

    expect(lines()).toEqual([
      '  outdated d.rs',
      '      - Copyright (c) 2019',
      '      + Copyright (c) 2025',
      '  missing  e.rs',
      '      + // Copyright 2025 Acme',
      '\nChecked 2 file(s): 1 outdated, 1 missing',
      '❌ Check failed.',
      '  - To add missing headers, run with --modify.',
    ]);
  });

  it('fails a modify run only on failures', () => {
    new OutputRenderer({ json: false, colors }).render(
      result([createOutcome('Failed', '/repo/a.rs', { reason: 'Invalid UTF-8 in /repo/a.rs' })], 'modify'),
    );

    expect(lines()).toEqual([
      '  failed   a.rs (Invalid UTF-8 in /repo/a.rs)',
      '\nChecked 1 file(s): 1 failed',
      '❌ Check failed.',
    ]);
  });

  describe('renderTree', () => {
    const listing = (): FileListing => ({
      workspaceRoot: '/repo',
      patterns: ['.'],
      config: ConfigSchema.parse({}),
      expanded: 3,
      selected: [
        {
          path: '/repo/src/a.rs',
          relativePath: 'src/a.rs',
          basename: 'a.rs',
          extensions: ['rs'],
          size: 10,
          mode: 0o644,
          style: { middle: '// ' },
        },
      ],
      rejected: [
        { path: '/repo/b.rs', relativePath: 'b.rs', reason: 'matches an ignore pattern' },
        { path: '/repo/notes.txt', relativePath: 'notes.txt', reason: 'no comment style' },
      ],
      filters: ['ignore'],
      warnings: [],
    });

    it('prints selected paths and a count', () => {
      new OutputRenderer({ json: false, colors }).renderTree(listing());

      expect(lines()).toEqual(['src/a.rs', '\nFound 1 file(s)']);
    });

    it('says why files were skipped when verbose', () => {
      new OutputRenderer({ json: false, verbose: true, quiet: true, colors }).renderTree(listing());

      expect(lines()).toEqual([
        'src/a.rs',
        'Skipping: b.rs (matches an ignore pattern)',
        'Skipping: notes.txt (no comment style)',
      ]);
    });

    it('renders the listing as JSON', () => {
      new OutputRenderer({ json: true, colors }).renderTree(listing());

      expect(JSON.parse(lines()[0] ?? '')).toEqual({
        workspaceRoot: '/repo',
        files: ['src/a.rs'],
        skipped: [
          { path: 'b.rs', reason: 'matches an ignore pattern' },
          { path: 'notes.txt', reason: 'no comment style' },
        ],
        warnings: [],
      });
    });
  });
});

describe('toReport', () => {
  it('sorts outcomes by path', () => {
    const report = toReport(
      result([createOutcome('HeaderMissing', '/repo/z.rs'), createOutcome('HeaderMissing', '/repo/m.rs')]),
    );
    expect(report.outcomes.map((o) => o.path)).toEqual(['/repo/m.rs', '/repo/z.rs']);
  });
});
