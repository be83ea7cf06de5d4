#!/usr/bin/env node
import { Command, Option } from 'commander';
import type { CliOptions } from '../types/index.js';
import { getVersion } from '../version.js';
import { EXIT_CODES } from '../runner.js';
import { positiveInt, timeoutMs } from '../options.js';

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  process.exit(EXIT_CODES.failure);
});

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  process.exit(EXIT_CODES.failure);
});

const program = new Command();

function parseOptions(cmd: Command): CliOptions {
  const opts = cmd.optsWithGlobals();
  return {
    json: opts.json === true,
    pattern: typeof opts.pattern === 'string' ? opts.pattern : undefined,
    concurrency: typeof opts.concurrency === 'number' ? opts.concurrency : undefined,
    timeout: typeof opts.timeout === 'number' ? opts.timeout : undefined,
    registry: typeof opts.registry === 'string' ? opts.registry : undefined,
  };
}

program
  .name('tagwatch')
  .description('Check image tags in Dockerfiles and compose files for breaking and compatible updates')
  .version(getVersion())
  .option('--json', 'Output results as JSON')
  .option('-p, --pattern <pattern>', 'Pattern for image references without a directive, e.g. "<!>.<>.<>"')
  .addOption(new Option('--concurrency <n>', 'Images checked in parallel').argParser(positiveInt).default(4))
  .addOption(new Option('--timeout <ms>', 'Registry timeout per image').argParser(timeoutMs).default(30_000))
  .addOption(new Option('--registry <url>', 'Docker Hub API base URL').env('TAGWATCH_REGISTRY_URL'))
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? 0 : EXIT_CODES.failure);
  })
  .showSuggestionAfterError(true);

program
  .command('check [file]')
  .description('Check the base images of a Dockerfile (default: ./Dockerfile)')
  .action(async (file: string | undefined, _opts: unknown, cmd: Command) => {
    const { checkCommand } = await import('../commands/check.js');
    const code = await checkCommand(file, parseOptions(cmd));
    process.exit(code);
  });

program
  .command('compose [file]')
  .description('Check every service of a compose file (default: discovered in the current directory)')
  .action(async (file: string | undefined, _opts: unknown, cmd: Command) => {
    const { composeCommand } = await import('../commands/compose.js');
    const code = await composeCommand(file, parseOptions(cmd));
    process.exit(code);
  });

program
  .command('fetch <image>')
  .description('List the published tags of an image, filtered by --pattern when given')
  .addOption(new Option('-n, --amount <n>', 'Number of tags to fetch').argParser(positiveInt).default(25))
  .action(async (image: string, opts: { amount: number }, cmd: Command) => {
    const { fetchCommand } = await import('../commands/fetch.js');
    const code = await fetchCommand(image, { ...parseOptions(cmd), amount: opts.amount });
    process.exit(code);
  });

await program.parseAsync();
