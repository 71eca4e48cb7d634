import {
  FileIOError,
  SilentLogger,
  atomicWrite,
  createOutcome,
  describeError,
  type CommentStyle,
  type FileOutcome,
  type Logger,
  type RunMode,
  type TextSpan,
} from '@copyhead/shared';
import type { FileCandidate } from '@copyhead/repo';
import type { LicenseDetector } from '../detect';
import { replaceYears } from '../detect';
import { findPreamble, insertHeader } from '../header';
import type { LicenseTemplate } from '../template';
import { decodeUtf8, readFrom, readPrefix, type PrefixRead } from './io';

export * from './io';

/** A candidate that survived filtering, with its comment style resolved. */
export interface PathCandidate extends FileCandidate {
  readonly style: CommentStyle;
}

export interface ProcessorOptions {
  mode: RunMode;
  year: number;
  preserveYears: boolean;
  detector: LicenseDetector;
  template: LicenseTemplate;
  /** Detection window in bytes; the detector's default when unset */
  prefixBytes?: number;
  /** Attach before/after spans to outcomes */
  spans?: boolean;
  logger?: Logger;
}

type Action = 'insert' | 'update-year' | 'none';

/**
 * Drives one file from prefix read to outcome. Never throws: I/O and
 * decoding problems become Failed outcomes.
 */
export class FileProcessor {
  private readonly options: ProcessorOptions;
  private readonly logger: Logger;

  constructor(options: ProcessorOptions) {
    this.options = options;
    this.logger = options.logger ?? new SilentLogger();
  }

  async process(candidate: PathCandidate): Promise<FileOutcome> {
    const log = this.logger.child({ file: candidate.relativePath });
    try {
      return await this.run(candidate, log);
    } catch (error) {
      const reason = describeError(error);
      await log.debug(`Failed: ${reason}`);
      return createOutcome('Failed', candidate.path, { reason });
    }
  }

  /**
   * Window for a file whose expected header is `header`: never smaller than
   * what the detector needs to recognize that header once written.
   */
  windowFor(header: string): number {
    const { detector, prefixBytes } = this.options;
    return Math.max(prefixBytes ?? detector.window, detector.requiredBytes(header));
  }

  /** Reads the prefix, widening it past a preamble line the header will follow. */
  private async readHead(path: string, header: string): Promise<PrefixRead> {
    const prefix = await readPrefix(path, this.windowFor(header));
    if (prefix.complete || prefix.bytes.includes(0)) {
      return prefix;
    }
    const preamble = findPreamble(prefix.bytes.toString('utf8'), false);
    if (!preamble) {
      return prefix;
    }
    // A preamble line is followed by one blank line before the header.
    const gap = preamble.line === undefined ? 0 : 1;
    const needed = preamble.byteLength + gap + this.options.detector.requiredBytes(header);
    return needed > prefix.bytes.length ? readPrefix(path, needed) : prefix;
  }

  private async run(candidate: PathCandidate, log: Logger): Promise<FileOutcome> {
    const { mode, year, preserveYears, detector, template } = this.options;
    const { path } = candidate;
    const header = template.render(candidate.style, year);

    const prefix = await this.readHead(path, header);
    if (prefix.size === 0) {
      return createOutcome('Skipped', path, { reason: 'empty file' });
    }
    if (prefix.bytes.includes(0)) {
      return createOutcome('Skipped', path, { reason: 'binary file' });
    }
    const text = decodeUtf8(path, prefix.bytes);

    let action: Action = 'none';
    if (!detector.hasLicense(text, header)) {
      action = 'insert';
    } else if (!preserveYears) {
      const found = detector.extractYear(text);
      if (found !== undefined && found !== year) {
        action = 'update-year';
      }
    }

    if (action === 'none') {
      return createOutcome('AlreadyCompliant', path);
    }

    if (action === 'insert') {
      const span = this.span({ before: '', after: header });
      if (mode === 'check') {
        return createOutcome('HeaderMissing', path, { span });
      }
      const preamble = findPreamble(text, prefix.complete);
      const rest = await readFrom(path, preamble?.byteLength ?? 0);
      await this.write(path, insertHeader(header, preamble, rest), prefix.mode);
      await log.debug('Added header');
      return createOutcome('HeaderAdded', path, { span });
    }

    const updated = replaceYears(text, year);
    const span = this.span({ before: updated.before ?? '', after: updated.after ?? '' });
    if (mode === 'check') {
      return createOutcome('YearOutdated', path, { span });
    }
    const rest = await readFrom(path, prefix.bytes.length);
    await this.write(path, Buffer.concat([Buffer.from(updated.text, 'utf8'), rest]), prefix.mode);
    await log.debug('Updated year');
    return createOutcome('YearUpdated', path, { span });
  }

  private span(span: TextSpan): TextSpan | undefined {
    return this.options.spans ? span : undefined;
  }

  private async write(path: string, content: Buffer, mode: number): Promise<void> {
    try {
      await atomicWrite(path, content, { mode });
    } catch (error) {
      throw new FileIOError(path, `Failed to write ${path}: ${describeError(error)}`, { cause: error });
    }
  }
}
