import chalk from 'chalk';
import { intro, outro } from '@clack/prompts';

export function showBanner(version: string): void {
  intro(chalk.bgCyan.black(` tagwatch v${version} `));
}

export function showContext(ctx: { manifestPath: string; kind: 'dockerfile' | 'compose'; images: number }): void {
  const label = ctx.kind === 'compose' ? 'Compose' : 'Dockerfile';
  const lines = [
    `${chalk.green('+')} ${label}: ${ctx.manifestPath}`,
    `${chalk.green('+')} Image references: ${ctx.images}`,
  ];
  console.log(lines.map((l) => `  ${l}`).join('\n'));
  console.log();
}

export function showOutro(message: string): void {
  outro(chalk.green(message));
}
