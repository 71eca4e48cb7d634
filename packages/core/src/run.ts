import {
  ConfigError,
  SilentLogger,
  eventMeta,
  type Config,
  type ConfigInput,
  type FileOutcome,
  type Logger,
  type RunSummary,
} from '@copyhead/shared';
import {
  GitService,
  IgnoreEngine,
  PathExpander,
  createFilterChain,
  resolveWorkspaceRoot,
  type VcsProvider,
} from '@copyhead/repo';
import { createRunCaches, type RunCaches } from './caches';
import { ConfigLoader } from './config/loader';
import { ContentDetector, HeuristicDetector, type LicenseDetector } from './detect';
import { Orchestrator } from './orchestrator';
import { FileProcessor, type PathCandidate } from './processor';
import { CommentStyleResolver } from './styles';
import { LicenseTemplate } from './template';

export interface SelectionOptions {
  /** Files, directories or globs; the working directory when empty */
  patterns?: string[];
  cwd?: string;
  configPath?: string;
  flags?: ConfigInput;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  caches?: RunCaches;
  /** Opens version control at the workspace root; git by default */
  openVcs?: (root: string) => Promise<VcsProvider>;
}

export interface RunOptions extends SelectionOptions {
  /** Clock for the default target year */
  now?: () => Date;
  onOutcome?: (outcome: FileOutcome) => void;
}

export interface RunContext {
  workspaceRoot: string;
  patterns: string[];
  config: Config;
}

/** A file expansion found that the run will not process. */
export interface Rejection {
  path: string;
  relativePath: string;
  reason: string;
}

export interface Selection {
  /** Files found by expansion */
  expanded: number;
  /** Survivors of the filter chain with a comment style, in path order */
  selected: PathCandidate[];
  rejected: Rejection[];
  /** Names of the filters in the chain, in order */
  filters: string[];
  /** Expansion warnings: symlinks, special files, unmatched patterns */
  warnings: string[];
}

export interface FileListing extends RunContext, Selection {}

export interface RunResult {
  runId: string;
  workspaceRoot: string;
  config: Config;
  year: number;
  summary: RunSummary;
  /** Outcomes in completion order */
  outcomes: FileOutcome[];
  warnings: string[];
}

const REJECTION_REASONS: Record<string, string> = {
  ignore: 'matches an ignore pattern',
  extension: 'excluded by extension rules',
  tracked: 'not tracked by git',
  changed: 'unchanged since the ratchet reference',
};

export function createDetector(config: Config, template: LicenseTemplate): LicenseDetector {
  if (config.detection === 'content') {
    return new ContentDetector(template.text);
  }
  if (!/copyright/i.test(template.text)) {
    throw new ConfigError(
      'Heuristic detection needs a license template containing "copyright"; use content detection instead',
    );
  }
  return new HeuristicDetector();
}

/** Finds the workspace root and loads the configuration that applies there. */
export async function resolveRunContext(options: SelectionOptions = {}): Promise<RunContext> {
  const cwd = options.cwd ?? process.cwd();
  const patterns = options.patterns && options.patterns.length > 0 ? options.patterns : ['.'];
  const workspaceRoot = await resolveWorkspaceRoot({ patterns, cwd });
  const config = ConfigLoader.load({
    configPath: options.configPath,
    flags: options.flags,
    cwd: workspaceRoot,
    env: options.env,
  });
  return { workspaceRoot, patterns, config };
}

/**
 * Expands the patterns and runs the filter chain. Files the chain accepts but
 * no comment style covers are rejected too.
 */
export async function selectFiles(
  context: RunContext,
  options: SelectionOptions = {},
): Promise<Selection> {
  const { workspaceRoot, patterns, config } = context;
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? new SilentLogger();
  const caches = options.caches ?? createRunCaches();

  let tracked: Set<string> | undefined;
  let changed: Set<string> | undefined;
  if (config.gitOnly || config.ratchet) {
    const openVcs = options.openVcs ?? ((root: string) => GitService.open(root));
    const vcs = await openVcs(workspaceRoot);
    if (config.gitOnly) {
      tracked = await vcs.trackedFiles();
    }
    if (config.ratchet) {
      changed = await vcs.changedSince(config.ratchet, {
        committedOnly: config.ratchetCommittedOnly,
      });
    }
  }

  const ignore = await IgnoreEngine.create({
    root: workspaceRoot,
    patterns: config.ignore,
    ignoreFileName: config.ignoreFileName,
    globalIgnoreFile: config.globalIgnoreFile,
    cache: caches.ignoreRules,
  });

  const expansion = await new PathExpander({ root: workspaceRoot, cwd, ignore, logger }).expand(
    patterns,
  );
  for (const warning of expansion.warnings) {
    await logger.warn(warning);
  }

  const chain = createFilterChain({ ignore, extensions: config.extensions, tracked, changed });
  const { accepted, rejected } = await chain.partition(expansion.files);

  const rejections: Rejection[] = rejected.map(({ candidate, filter }) => ({
    path: candidate.path,
    relativePath: candidate.relativePath,
    reason: REJECTION_REASONS[filter] ?? `rejected by ${filter}`,
  }));

  const styles = new CommentStyleResolver({
    commentStyles: config.commentStyles,
    filenames: config.filenames,
  });
  const selected: PathCandidate[] = [];
  for (const file of accepted) {
    const style = styles.resolve(file);
    if (style) {
      selected.push({ ...file, style });
    } else {
      await logger.debug(`No comment style for ${file.relativePath}`);
      rejections.push({ path: file.path, relativePath: file.relativePath, reason: 'no comment style' });
    }
  }
  rejections.sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  return {
    expanded: expansion.files.length,
    selected,
    rejected: rejections,
    filters: chain.names,
    warnings: expansion.warnings,
  };
}

/** The files a run with these options would process, and why the others are left out. */
export async function listFiles(options: SelectionOptions = {}): Promise<FileListing> {
  const context = await resolveRunContext(options);
  return { ...context, ...(await selectFiles(context, options)) };
}

/**
 * One complete pass: resolve the workspace and configuration, select files,
 * process them, and aggregate the outcomes. Configuration and version-control
 * problems throw before any file is touched; per-file problems become Failed
 * outcomes.
 */
export async function runCopyhead(options: RunOptions = {}): Promise<RunResult> {
  const runId = Date.now().toString();
  const logger = options.logger ?? new SilentLogger();
  const caches = options.caches ?? createRunCaches();

  const context = await resolveRunContext(options);
  const { workspaceRoot, patterns, config } = context;
  const year = config.year ?? (options.now ?? (() => new Date()))().getFullYear();

  const template = await LicenseTemplate.load(config.template, {
    baseDir: workspaceRoot,
    cache: caches.renders,
  });
  const detector = createDetector(config, template);

  await logger.log({
    ...eventMeta(runId),
    type: 'RunStarted',
    payload: { mode: config.mode, workspaceRoot, patterns, year, detection: config.detection },
  });

  const selection = await selectFiles(context, { ...options, logger, caches });

  await logger.log({
    ...eventMeta(runId),
    type: 'FilesSelected',
    payload: {
      expanded: selection.expanded,
      selected: selection.selected.length,
      filters: selection.filters,
    },
  });

  const processor = new FileProcessor({
    mode: config.mode,
    year,
    preserveYears: config.preserveYears,
    detector,
    template,
    prefixBytes: config.prefixBytes,
    spans: config.spans,
    logger,
  });
  const orchestrator = new Orchestrator({
    mode: config.mode,
    handler: processor,
    concurrency: config.concurrency,
    logger,
  });

  const logged: Promise<void>[] = [];
  const { summary, outcomes } = await orchestrator.run(selection.selected, (outcome) => {
    logged.push(
      Promise.resolve(
        logger.log({
          ...eventMeta(runId),
          type: 'FileProcessed',
          payload: { path: outcome.path, tag: outcome.tag, reason: outcome.reason },
        }),
      ),
    );
    options.onOutcome?.(outcome);
  });
  await Promise.all(logged);

  await logger.log({
    ...eventMeta(runId),
    type: 'RunFinished',
    payload: {
      total: summary.total,
      counts: { ...summary.counts },
      failed: summary.failed,
      durationMs: summary.durationMs,
    },
  });

  return {
    runId,
    workspaceRoot,
    config,
    year,
    summary,
    outcomes,
    warnings: selection.warnings,
  };
}
