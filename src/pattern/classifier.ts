import { CurrentTagMismatchError } from '../errors.js';
import type { ExtractedVersion, Pattern, Tag, UpdateSet } from '../types/index.js';
import { compareExtracted, compareVersions } from './comparator.js';
import { matchTag } from './matcher.js';

interface Candidate {
  tag: Tag;
  version: ExtractedVersion;
}

/** Extract the version of the tag currently in use, which must match its pattern. */
export function extractCurrent(pattern: Pattern, currentTag: Tag): ExtractedVersion {
  const result = matchTag(pattern, currentTag);
  if (!result.matched) {
    throw new CurrentTagMismatchError(currentTag, pattern.source);
  }
  return result.version;
}

function sortedDescending(bucket: Map<string, Candidate>): Tag[] {
  return [...bucket.values()]
    .sort((a, b) => compareExtracted(b.version, a.version))
    .map((c) => c.tag);
}

/**
 * Split the candidate tags into breaking and compatible updates of
 * `currentTag`.
 *
 * Candidates that do not match the pattern are only counted. Tags with the
 * same extracted version collapse onto the first one seen, and each list is
 * ordered newest first.
 */
export function classifyUpdates(pattern: Pattern, currentTag: Tag, candidates: Iterable<Tag>): UpdateSet {
  const current = extractCurrent(pattern, currentTag);

  const breaking = new Map<string, Candidate>();
  const compatible = new Map<string, Candidate>();
  let unmatched = 0;

  for (const tag of candidates) {
    const match = matchTag(pattern, tag);
    if (!match.matched) {
      unmatched++;
      continue;
    }

    const classification = compareVersions(pattern, current, match.version);
    if (classification === 'no-change') continue;

    const bucket = classification === 'breaking' ? breaking : compatible;
    const key = match.version.join('.');
    if (!bucket.has(key)) bucket.set(key, { tag, version: match.version });
  }

  return {
    breaking: sortedDescending(breaking),
    compatible: sortedDescending(compatible),
    unmatched,
  };
}
