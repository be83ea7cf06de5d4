import chalk from 'chalk';
import type { ImageResult, Report } from '../types/index.js';

/** Update tags listed per image before the rest is summarised. */
export const MAX_LISTED_TAGS = 10;

type Checked = Extract<ImageResult, { status: 'checked' }>;
type Failed = Extract<ImageResult, { status: 'failed' }>;
type Skipped = Extract<ImageResult, { status: 'skipped' }>;

export function formatLabel(result: ImageResult): string {
  const image = result.image || chalk.dim('(no image)');
  return result.service ? `${result.service} › ${image}` : image;
}

function formatLocation(result: ImageResult): string {
  return result.line ? `${result.location}:${result.line}` : result.location;
}

export function formatTagList(tags: string[], max = MAX_LISTED_TAGS): string {
  if (tags.length <= max) return tags.join(', ');
  return `${tags.slice(0, max).join(', ')} ${chalk.dim(`(+${tags.length - max} more)`)}`;
}

function section(label: string, count: number, lines: string[]): string[] {
  if (count === 0) return [];
  return ['', chalk.bold(`  ${label} (${count})`), '', ...lines];
}

export function formatFailures(results: ImageResult[]): string {
  const failed = results.filter((r): r is Failed => r.status === 'failed');
  const lines = failed.flatMap((r) => [
    `  ${chalk.red('x')} ${formatLabel(r)} ${chalk.dim(formatLocation(r))}`,
    `    ${r.error}`,
  ]);
  return section('Failures', failed.length, lines).join('\n');
}

export function formatUpdates(results: ImageResult[]): string {
  const checked = results.filter((r): r is Checked => r.status === 'checked');
  const breaking = checked.filter((r) => r.level === 'breaking');
  const compatible = checked.filter((r) => r.level === 'compatible');
  const upToDate = checked.filter((r) => r.level === 'none');
  const skipped = results.filter((r): r is Skipped => r.status === 'skipped');

  const lines: string[] = [
    ...section('Breaking updates', breaking.length, breaking.flatMap((r) => [
      `  ${chalk.red('!')} ${formatLabel(r)} ${chalk.dim(`[${r.pattern}]`)}`,
      `    breaking: ${chalk.red(formatTagList(r.updates.breaking))}`,
      ...(r.updates.compatible.length > 0
        ? [`    compatible: ${chalk.yellow(formatTagList(r.updates.compatible))}`]
        : []),
    ])),
    ...section('Compatible updates', compatible.length, compatible.flatMap((r) => [
      `  ${chalk.yellow('+')} ${formatLabel(r)} ${chalk.dim(`[${r.pattern}]`)}`,
      `    compatible: ${chalk.yellow(formatTagList(r.updates.compatible))}`,
    ])),
    ...section('Up to date', upToDate.length, upToDate.map(
      (r) => `  ${chalk.green('=')} ${formatLabel(r)} ${chalk.dim(`[${r.pattern}]`)}`,
    )),
    ...section('Skipped', skipped.length, skipped.map(
      (r) => `  ${chalk.dim('-')} ${formatLabel(r)} ${chalk.dim(r.reason)}`,
    )),
  ];

  return lines.join('\n');
}

export function formatSummary(report: Report): string {
  const { summary } = report;
  const images = `image${summary.checked !== 1 ? 's' : ''}`;
  const skipped = summary.skipped > 0 ? chalk.dim(`${summary.skipped} skipped`) : undefined;

  if (summary.breaking + summary.compatible + summary.failed === 0) {
    const clear = chalk.green(`All clear — ${summary.checked} ${images} up to date`);
    return skipped ? `  ${clear}, ${skipped}` : `  ${clear}`;
  }

  const parts: string[] = [];
  if (summary.breaking > 0) parts.push(chalk.red(`${summary.breaking} breaking`));
  if (summary.compatible > 0) parts.push(chalk.yellow(`${summary.compatible} compatible`));
  if (summary.failed > 0) parts.push(chalk.red(`${summary.failed} failed`));
  if (skipped) parts.push(skipped);

  return `  Checked ${chalk.bold(String(summary.checked))} ${images}: ${parts.join(', ')}`;
}

/** The whole text report as one block, failures included. */
export function formatReport(report: Report, heading: string): string {
  const sections = [formatFailures(report.results), formatUpdates(report.results)].filter(Boolean);
  return [heading, ...sections, '', formatSummary(report)].join('\n');
}

/** Failures go to stderr, everything else to stdout. */
export function printReport(report: Report, heading: string): void {
  console.log(heading);

  const failures = formatFailures(report.results);
  if (failures) console.error(failures);

  const updates = formatUpdates(report.results);
  if (updates) console.log(updates);

  console.log();
  console.log(formatSummary(report));
}
