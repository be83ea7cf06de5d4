import type { CliOptions, Pattern, TagFetcher } from '../types/index.js';
import { TagwatchError } from '../errors.js';
import { parseImageReference, formatImageName } from '../parsers/image.js';
import { compilePattern, filterTags } from '../pattern/index.js';
import { DEFAULT_TIMEOUT_MS, EXIT_CODES, timeoutSignal } from '../runner.js';
import { createFetcher } from './check.js';

export const DEFAULT_AMOUNT = 25;

export interface FetchOptions extends CliOptions {
  amount?: number;
}

/** List the most recent tags of an image, optionally only those matching a pattern. */
export async function fetchCommand(
  image: string,
  opts: FetchOptions,
  fetcher: TagFetcher = createFetcher(opts),
): Promise<number> {
  const reference = parseImageReference(image);
  if (!reference) {
    console.error(`Error: The image reference \`${image}\` is invalid`);
    return EXIT_CODES.failure;
  }

  let tags: string[];
  let pattern: Pattern | undefined;
  try {
    pattern = opts.pattern !== undefined ? compilePattern(opts.pattern) : undefined;
    tags = await fetcher.fetchTags(reference.name, {
      limit: opts.amount ?? DEFAULT_AMOUNT,
      signal: timeoutSignal(opts.timeout ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err) {
    if (err instanceof TagwatchError) {
      console.error(`Error: ${err.message}`);
      return EXIT_CODES.failure;
    }
    throw err;
  }

  const matching = pattern ? filterTags(pattern, tags) : tags;

  if (opts.json) {
    console.log(JSON.stringify({
      image: formatImageName(reference.name),
      fetched: tags.length,
      pattern: pattern?.source,
      tags: matching,
    }, null, 2));
    return EXIT_CODES.none;
  }

  if (pattern) {
    console.log(`Fetched ${tags.length} tags. Found ${matching.length} matching \`${pattern.source}\`:`);
  } else {
    console.log(`Fetched ${tags.length} tags:`);
  }
  if (matching.length > 0) console.log(matching.join('\n'));

  return EXIT_CODES.none;
}
