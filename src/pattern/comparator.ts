import type { Classification, ExtractedVersion, Pattern } from '../types/index.js';
import { slotFlags } from './compiler.js';

/**
 * Leftmost slot index where the versions differ, or -1 when they are equal.
 */
export function firstDifference(a: ExtractedVersion, b: ExtractedVersion): number {
  if (a.length !== b.length) {
    throw new Error(`Cannot compare versions of different length (${a.length} and ${b.length})`);
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return i;
  }
  return -1;
}

/** Orders versions by slot, most significant first. Negative when `a` is older. */
export function compareExtracted(a: ExtractedVersion, b: ExtractedVersion): number {
  const index = firstDifference(a, b);
  return index === -1 ? 0 : a[index] - b[index];
}

/**
 * Classify `candidate` relative to `reference`.
 *
 * Only the most significant differing slot counts: its breaking flag decides
 * the outcome, whatever the flags of later slots. Lower candidates are not
 * updates.
 */
export function compareVersions(
  pattern: Pattern,
  reference: ExtractedVersion,
  candidate: ExtractedVersion,
): Classification {
  if (reference.length !== pattern.slotCount) {
    throw new Error(
      `Version has ${reference.length} parts but \`${pattern.source}\` has ${pattern.slotCount} slots`,
    );
  }

  const index = firstDifference(reference, candidate);
  if (index === -1 || candidate[index] < reference[index]) return 'no-change';

  return slotFlags(pattern)[index] ? 'breaking' : 'compatible';
}
