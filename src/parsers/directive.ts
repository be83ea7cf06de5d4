import type { Directive } from '../types/index.js';

export const DIRECTIVE_MARKER = 'tagwatch';

const DIRECTIVE_RE = new RegExp(`^\\s*#?\\s*${DIRECTIVE_MARKER}(?:\\s+(.*))?$`);
const PATTERN_OPTION_RE = /--pattern(?:=|\s+)(?:"([^"]*)"|'([^']*)'|(.*\S))/;

/**
 * Read a `# tagwatch --pattern "<!>.<>"` comment.
 *
 * Returns undefined for any other comment, and a directive carrying an
 * `error` when the marker is present but the pattern is not.
 */
export function parseDirective(comment: string): Directive | undefined {
  const match = DIRECTIVE_RE.exec(comment.trim());
  if (!match) return undefined;

  const rest = match[1] ?? '';
  const option = PATTERN_OPTION_RE.exec(rest);
  const pattern = option ? (option[1] ?? option[2] ?? option[3]) : undefined;

  if (!pattern) {
    return { error: `Directive \`${comment.trim()}\` is missing a --pattern value` };
  }
  return { pattern };
}
