import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { extensionsOf } from '@copyhead/repo';
import { ConsoleLogger, normalizePath, type CommentStyle, type RunMode } from '@copyhead/shared';
import { ContentDetector, HeuristicDetector } from '../detect';
import { LicenseTemplate } from '../template';
import { FileProcessor, type PathCandidate, type ProcessorOptions } from './index';

const slashes: CommentStyle = { middle: '// ' };
const hashes: CommentStyle = { middle: '# ' };

describe('FileProcessor', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = normalizePath(await fs.mkdtemp(path.join(os.tmpdir(), 'copyhead-processor-')));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function file(
    name: string,
    content: string | Buffer,
    style: CommentStyle = slashes,
  ): Promise<PathCandidate> {
    const abs = `${tmpDir}/${name}`;
    await fs.writeFile(abs, content);
    const stats = await fs.stat(abs);
    return {
      path: abs,
      relativePath: name,
      basename: name,
      extensions: extensionsOf(name),
      size: stats.size,
      mode: stats.mode & 0o7777,
      style,
    };
  }

  function processor(mode: RunMode, overrides: Partial<ProcessorOptions> = {}): FileProcessor {
    return new FileProcessor({
      mode,
      year: 2025,
      preserveYears: false,
      detector: new HeuristicDetector(),
      template: new LicenseTemplate('Copyright {{year}} Acme'),
      ...overrides,
    });
  }

  const read = (candidate: PathCandidate) => fs.readFile(candidate.path, 'utf8');

  it('inserts a missing header', async () => {
    const b = await file('b.rs', 'fn main() {}\n');

    const outcome = await processor('modify').process(b);

    expect(outcome).toEqual({ tag: 'HeaderAdded', path: b.path });
    expect(await read(b)).toBe('// Copyright 2025 Acme\n\nfn main() {}\n');
  });

  it('logs each change under the file it touched', async () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const b = await file('b.rs', 'fn main() {}\n');
    const c = await file('c.rs', '// Copyright (c) 2019 Acme\n');

    const logger = new ConsoleLogger({ verbose: true });
    await processor('modify', { logger }).process(b);
    await processor('modify', { logger }).process(c);

    expect(debugSpy.mock.calls).toEqual([['[file=b.rs] Added header'], ['[file=c.rs] Updated year']]);
    debugSpy.mockRestore();
  });

  it('reports a missing header in check mode without writing', async () => {
    const b = await file('b.rs', 'fn main() {}\n');

    const outcome = await processor('check', { spans: true }).process(b);

    expect(outcome).toEqual({
      tag: 'HeaderMissing',
      path: b.path,
      span: { before: '', after: '// Copyright 2025 Acme\n\n' },
    });
    expect(await read(b)).toBe('fn main() {}\n');
  });

  it('updates only the year token', async () => {
    const a = await file('a.rs', '// Copyright (c) 2024 Acme\nfn main() {}\n');

    const outcome = await processor('modify').process(a);

    expect(outcome.tag).toBe('YearUpdated');
    expect(await read(a)).toBe('// Copyright (c) 2025 Acme\nfn main() {}\n');
  });

  it('reports an outdated year in check mode', async () => {
    const a = await file('a.rs', '// Copyright © 2019 Acme\n');

    const outcome = await processor('check', { spans: true }).process(a);

    expect(outcome).toEqual({
      tag: 'YearOutdated',
      path: a.path,
      span: { before: 'Copyright © 2019', after: 'Copyright © 2025' },
    });
    expect(await read(a)).toBe('// Copyright © 2019 Acme\n');
  });

  it('never updates a bare year', async () => {
    const a = await file('a.rs', '// Copyright 2020 Acme\n');

    expect((await processor('modify').process(a)).tag).toBe('AlreadyCompliant');
    expect(await read(a)).toBe('// Copyright 2020 Acme\n');
  });

  it('keeps years when asked to', async () => {
    const a = await file('a.rs', '// Copyright (c) 2020 Acme\n');

    const outcome = await processor('modify', { preserveYears: true }).process(a);

    expect(outcome.tag).toBe('AlreadyCompliant');
  });

  it('is idempotent', async () => {
    const b = await file('b.rs', 'fn main() {}\n');
    const modify = processor('modify');

    await modify.process(b);
    const after = await read(b);
    const second = await modify.process(b);

    expect(second.tag).toBe('AlreadyCompliant');
    expect(await read(b)).toBe(after);
  });

  describe('detection window', () => {
    it('ignores a marker starting at exactly the window size', async () => {
      const filler = `${'x'.repeat(999)}\n`;
      const c = await file('c.rs', `${filler}// Copyright 2025 Acme\n`);

      expect((await processor('check').process(c)).tag).toBe('HeaderMissing');

      await processor('modify').process(c);
      expect(await read(c)).toBe(`// Copyright 2025 Acme\n\n${filler}// Copyright 2025 Acme\n`);
    });

    it('finds a marker ending at exactly the window size', async () => {
      const c = await file('c.rs', `${'x'.repeat(991)}copyright and more\n`);
      expect((await processor('check').process(c)).tag).toBe('AlreadyCompliant');
    });

    it('honors a configured window', async () => {
      const c = await file('c.rs', `${'x'.repeat(20)}\n// Copyright 2025 Acme\n`);
      expect((await processor('check', { prefixBytes: 10 }).process(c)).tag).toBe('HeaderMissing');
    });

    it('widens the window to what the detector needs of the header', () => {
      const content = processor('check', {
        detector: new ContentDetector('Copyright {{year}} Acme'),
        prefixBytes: 4,
      });
      expect(content.windowFor('// Copyright 2025 Acme\n\n')).toBe(24);
      expect(processor('check', { prefixBytes: 4 }).windowFor('// Copyright 2025 Acme\n\n')).toBe(12);
      expect(processor('check', { prefixBytes: 40 }).windowFor('// Copyright 2025 Acme\n\n')).toBe(40);
    });

    it('recognizes its own header when the notice sits past the window', async () => {
      const prose = 'Licensed under the terms below.\n'.repeat(40);
      const template = new LicenseTemplate(`${prose}Copyright (c) {{year}} Acme`);
      const c = await file('c.rs', 'fn main() {}\n');
      const modify = processor('modify', { template });

      expect((await modify.process(c)).tag).toBe('HeaderAdded');
      expect((await modify.process(c)).tag).toBe('AlreadyCompliant');
      expect((await read(c)).match(/Copyright \(c\) 2025 Acme/g)).toHaveLength(1);
    });

    it('reads past a preamble line to find the header behind it', async () => {
      const script = await file('run.sh', '#!/bin/sh\necho hi\n', hashes);
      const modify = processor('modify', { prefixBytes: 16 });

      expect((await modify.process(script)).tag).toBe('HeaderAdded');
      expect(await read(script)).toBe('#!/bin/sh\n\n# Copyright 2025 Acme\n\necho hi\n');
      expect((await modify.process(script)).tag).toBe('AlreadyCompliant');
    });

    it('holds back a character split by the window', async () => {
      const bytes = Buffer.concat([Buffer.from('a'.repeat(19)), Buffer.from('€\nfn main() {}\n')]);
      const c = await file('c.rs', bytes);

      const outcome = await processor('modify', { prefixBytes: 20 }).process(c);

      expect(outcome.tag).toBe('HeaderAdded');
      expect(await read(c)).toBe(`// Copyright 2025 Acme\n\n${'a'.repeat(19)}€\nfn main() {}\n`);
    });
  });

  it('keeps a shebang above the header', async () => {
    const script = await file('run.sh', '#!/bin/sh\necho hi\n', hashes);

    await processor('modify').process(script);

    expect(await read(script)).toBe('#!/bin/sh\n\n# Copyright 2025 Acme\n\necho hi\n');
  });

  it('preserves the file mode', async () => {
    const script = await file('run.sh', 'echo hi\n', hashes);
    await fs.chmod(script.path, 0o755);

    await processor('modify').process(script);

    expect((await fs.stat(script.path)).mode & 0o777).toBe(0o755);
  });

  it('skips empty files', async () => {
    const empty = await file('empty.rs', '');
    expect(await processor('modify').process(empty)).toEqual({
      tag: 'Skipped',
      path: empty.path,
      reason: 'empty file',
    });
  });

  it('skips files with a NUL byte', async () => {
    const blob = await file('blob.rs', Buffer.from([0x61, 0x00, 0x62]));
    expect((await processor('modify').process(blob)).reason).toBe('binary file');
  });

  it('fails files that are not UTF-8', async () => {
    const bad = await file('bad.rs', Buffer.from([0x61, 0xff, 0xfe, 0x62]));

    const outcome = await processor('modify').process(bad);

    expect(outcome).toEqual({ tag: 'Failed', path: bad.path, reason: `Invalid UTF-8 in ${bad.path}` });
  });

  it('fails a file that disappeared', async () => {
    const gone = await file('gone.rs', 'fn main() {}\n');
    await fs.rm(gone.path);

    const outcome = await processor('modify').process(gone);

    expect(outcome.tag).toBe('Failed');
    expect(outcome.reason).toMatch(/^Failed to read .*gone\.rs: ENOENT/);
  });
});
