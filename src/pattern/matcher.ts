import type { MatchResult, Pattern, Tag } from '../types/index.js';

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

/**
 * Apply a compiled pattern to a tag.
 *
 * Literals must match exactly at the cursor; a slot takes the longest run of
 * ASCII digits there. The whole tag must be consumed. Adjacent slots are not
 * backtracked: the first slot keeps every digit and the second one fails.
 */
export function matchTag(pattern: Pattern, tag: Tag): MatchResult {
  const version: number[] = [];
  let cursor = 0;

  for (const segment of pattern.segments) {
    if (segment.kind === 'literal') {
      if (!tag.startsWith(segment.text, cursor)) {
        return { matched: false, reason: 'literal-mismatch', offset: cursor };
      }
      cursor += segment.text.length;
      continue;
    }

    let end = cursor;
    while (end < tag.length && isDigit(tag.charCodeAt(end))) end++;
    if (end === cursor) {
      return { matched: false, reason: 'missing-digits', offset: cursor };
    }

    const value = Number(tag.slice(cursor, end));
    if (!Number.isSafeInteger(value)) {
      return { matched: false, reason: 'number-overflow', offset: cursor };
    }
    version.push(value);
    cursor = end;
  }

  if (cursor !== tag.length) {
    return { matched: false, reason: 'trailing-input', offset: cursor };
  }

  return { matched: true, version };
}

/** Tags matching the pattern, in input order. */
export function filterTags(pattern: Pattern, tags: Iterable<Tag>): Tag[] {
  const result: Tag[] = [];
  for (const tag of tags) {
    if (matchTag(pattern, tag).matched) result.push(tag);
  }
  return result;
}
