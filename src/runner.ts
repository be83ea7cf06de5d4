import type { CheckTarget, ImageResult, Report, ReportSummary, TagFetcher, UpdateLevel } from './types/index.js';
import { errorMessage } from './errors.js';
import { classifyUpdates, compilePattern, extractCurrent } from './pattern/index.js';
import { parallelLimit } from './pool.js';
import { getVersion } from './version.js';
import { MAX_TIMEOUT_MS } from './options.js';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_TIMEOUT_MS = 30_000;

export const EXIT_CODES: Record<UpdateLevel, number> = {
  none: 0,
  compatible: 1,
  breaking: 2,
  failure: 10,
};

const LEVEL_ORDER: Record<UpdateLevel, number> = { none: 0, compatible: 1, breaking: 2, failure: 3 };

export interface RunOptions {
  fetcher: TagFetcher;
  concurrency?: number;
  timeoutMs?: number;
  onImageStart?: (target: CheckTarget) => void;
  onImageComplete?: (result: ImageResult, target: CheckTarget) => void;
}

/** An abort signal for `ms`, held within the range Node timers accept. */
export function timeoutSignal(ms: number): AbortSignal {
  return AbortSignal.timeout(Math.min(Math.max(ms, 1), MAX_TIMEOUT_MS));
}

type ImageTarget = Extract<CheckTarget, { kind: 'image' }>;
type CheckedResult = Extract<ImageResult, { status: 'checked' }>;

export async function checkImage(target: ImageTarget, fetcher: TagFetcher, timeoutMs: number): Promise<ImageResult> {
  const base = { service: target.service, image: target.image, location: target.location, line: target.line };
  const currentTag = target.reference.tag;

  try {
    const pattern = compilePattern(target.pattern);
    // Fail before any network call when the reference point is unknown
    extractCurrent(pattern, currentTag);

    const tags = await fetcher.fetchTags(target.reference.name, { signal: timeoutSignal(timeoutMs) });
    const updates = classifyUpdates(pattern, currentTag, tags);
    const level = updates.breaking.length > 0 ? 'breaking' : updates.compatible.length > 0 ? 'compatible' : 'none';

    return { ...base, status: 'checked', currentTag, pattern: target.pattern, updates, level };
  } catch (err) {
    return { ...base, status: 'failed', error: errorMessage(err) };
  }
}

function toResult(target: Exclude<CheckTarget, ImageTarget>): ImageResult {
  const base = { service: target.service, image: target.image, location: target.location, line: target.line };
  return target.kind === 'skipped'
    ? { ...base, status: 'skipped', reason: target.reason }
    : { ...base, status: 'failed', error: target.error };
}

function levelOf(result: ImageResult): UpdateLevel {
  if (result.status === 'failed') return 'failure';
  if (result.status === 'skipped') return 'none';
  return result.level;
}

/** The worst outcome across all results: failure > breaking > compatible > none. */
export function updateLevel(results: ImageResult[]): UpdateLevel {
  return results.map(levelOf).reduce<UpdateLevel>(
    (worst, level) => (LEVEL_ORDER[level] > LEVEL_ORDER[worst] ? level : worst),
    'none',
  );
}

export function exitCodeFor(level: UpdateLevel): number {
  return EXIT_CODES[level];
}

export function summarize(results: ImageResult[]): ReportSummary {
  const checked = results.filter((r): r is CheckedResult => r.status === 'checked');
  return {
    checked: checked.length,
    breaking: checked.filter((r) => r.level === 'breaking').length,
    compatible: checked.filter((r) => r.level === 'compatible').length,
    upToDate: checked.filter((r) => r.level === 'none').length,
    failed: results.filter((r) => r.status === 'failed').length,
    skipped: results.filter((r) => r.status === 'skipped').length,
  };
}

/**
 * Check every target, at most `concurrency` images at a time.
 * A failing image is recorded on its own result and never stops the others.
 */
export async function runChecks(path: string, targets: CheckTarget[], opts: RunOptions): Promise<Report> {
  const concurrency = opts.concurrency ?? DEFAULT_CONCURRENCY;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const results = await parallelLimit(targets, concurrency, async (target) => {
    opts.onImageStart?.(target);
    const result = target.kind === 'image'
      ? await checkImage(target, opts.fetcher, timeoutMs)
      : toResult(target);
    opts.onImageComplete?.(result, target);
    return result;
  });

  return {
    path,
    timestamp: new Date().toISOString(),
    version: getVersion(),
    results,
    summary: summarize(results),
    level: updateLevel(results),
  };
}
