import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { spinner } from '@clack/prompts';
import type { CheckTarget, CliOptions, TagFetcher } from '../types/index.js';
import { ManifestError } from '../errors.js';
import { buildComposeTargets, buildDockerfileTargets } from '../context.js';
import { findComposeFile, findDockerfile } from '../discovery.js';
import { DockerHubTagFetcher } from '../registry/dockerhub.js';
import { EXIT_CODES, exitCodeFor, runChecks } from '../runner.js';
import { getVersion } from '../version.js';
import { showBanner, showContext, showOutro } from '../ui/banner.js';
import { printReport } from '../ui/reporter.js';

export type ManifestKind = 'dockerfile' | 'compose';

const KIND_LABELS: Record<ManifestKind, string> = {
  dockerfile: 'Dockerfile',
  compose: 'Docker Compose file',
};

export function resolveManifest(kind: ManifestKind, file: string | undefined, cwd: string): string {
  if (file) {
    const path = resolve(cwd, file);
    if (!existsSync(path)) {
      throw new ManifestError(`${KIND_LABELS[kind]} not found: ${file}`);
    }
    return path;
  }

  const found = kind === 'compose' ? findComposeFile(cwd) : findDockerfile(cwd);
  if (!found) {
    throw new ManifestError(`No ${KIND_LABELS[kind]} found in ${cwd}`);
  }
  return found;
}

export function createFetcher(opts: CliOptions): TagFetcher {
  return new DockerHubTagFetcher(opts.registry);
}

export async function runManifestCheck(
  kind: ManifestKind,
  file: string | undefined,
  opts: CliOptions,
  fetcher: TagFetcher = createFetcher(opts),
): Promise<number> {
  const isInteractive = !opts.json && Boolean(process.stdout.isTTY);

  let manifestPath: string;
  let targets: CheckTarget[];
  try {
    manifestPath = resolveManifest(kind, file, process.cwd());
    const targetOpts = { defaultPattern: opts.pattern };
    targets = kind === 'compose'
      ? buildComposeTargets(manifestPath, targetOpts)
      : buildDockerfileTargets(manifestPath, targetOpts);
  } catch (err) {
    if (err instanceof ManifestError) {
      console.error(`Error: ${err.message}`);
      return EXIT_CODES.failure;
    }
    throw err;
  }

  if (isInteractive) {
    showBanner(getVersion());
    showContext({ manifestPath, kind, images: targets.length });
  }

  const imageCount = targets.filter((t) => t.kind === 'image').length;
  let s: ReturnType<typeof spinner> | undefined;
  if (isInteractive) {
    s = spinner();
    s.start(`Checking ${imageCount} image${imageCount !== 1 ? 's' : ''}...`);
  }

  let done = 0;
  const report = await runChecks(manifestPath, targets, {
    fetcher,
    concurrency: opts.concurrency,
    timeoutMs: opts.timeout,
    onImageComplete: (_result, target) => {
      if (target.kind !== 'image') return;
      done++;
      s?.message(`Checked ${done}/${imageCount}`);
    },
  });

  if (isInteractive && s) {
    s.stop(`Checked ${imageCount} image${imageCount !== 1 ? 's' : ''}`);
  }

  if (opts.json) {
    console.log(JSON.stringify(report, null, 2));
    return exitCodeFor(report.level);
  }

  printReport(report, `Report for ${KIND_LABELS[kind]} at \`${manifestPath}\`:`);

  if (isInteractive) {
    showOutro(report.level === 'none' ? 'Done' : `Done (exit ${exitCodeFor(report.level)})`);
  }

  return exitCodeFor(report.level);
}

export async function checkCommand(file: string | undefined, opts: CliOptions): Promise<number> {
  return runManifestCheck('dockerfile', file, opts);
}
