import { PatternSyntaxError } from '../errors.js';
import type { Pattern, Segment } from '../types/index.js';

const NON_BREAKING_MARKER = '<>';
const BREAKING_MARKER = '<!>';

/**
 * Compile a pattern such as `<!>.<>.<>-alpine` into its segments.
 *
 * `<>` is a non-breaking numeric slot, `<!>` a breaking one. Everything else
 * is matched literally, so `<` is reserved and a lone `>` is plain text.
 */
export function compilePattern(source: string): Pattern {
  const segments: Segment[] = [];
  let literal = '';
  let slotCount = 0;
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (ch !== '<') {
      literal += ch;
      i++;
      continue;
    }

    let breaking: boolean;
    if (source.startsWith(BREAKING_MARKER, i)) {
      breaking = true;
      i += BREAKING_MARKER.length;
    } else if (source.startsWith(NON_BREAKING_MARKER, i)) {
      breaking = false;
      i += NON_BREAKING_MARKER.length;
    } else {
      const detail =
        source.indexOf('>', i) === -1
          ? 'unterminated `<`'
          : 'expected `<>` or `<!>`';
      throw new PatternSyntaxError(source, i, detail);
    }

    if (literal) {
      segments.push({ kind: 'literal', text: literal });
      literal = '';
    }
    segments.push({ kind: 'slot', breaking });
    slotCount++;
  }

  if (literal) segments.push({ kind: 'literal', text: literal });

  if (slotCount === 0) {
    throw new PatternSyntaxError(source, 0, 'the pattern contains no `<>` or `<!>` slot');
  }

  return Object.freeze({ source, segments: Object.freeze(segments), slotCount });
}

/** Breaking flags of the pattern's slots, in slot order. */
export function slotFlags(pattern: Pattern): boolean[] {
  return pattern.segments.flatMap((s) => (s.kind === 'slot' ? [s.breaking] : []));
}
