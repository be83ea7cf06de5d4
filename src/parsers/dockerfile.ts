import dockerFileParser from 'docker-file-parser';
import type { ParsedDockerfile, DockerfileStage } from '../types/index.js';
import { parseDirective } from './directive.js';

interface Instruction {
  name: string;
  args: string;
  lineno: number;
  raw: string;
}

function isComment(instr: Instruction): boolean {
  return instr.name === 'COMMENT' || instr.raw.trimStart().startsWith('#');
}

export function parseDockerfile(raw: string, path: string): ParsedDockerfile {
  const parsed = dockerFileParser.parse(raw, { includeComments: true });

  const entries: Instruction[] = parsed.map((entry) => ({
    name: entry.name?.toUpperCase() ?? '',
    args: typeof entry.args === 'string' ? entry.args : JSON.stringify(entry.args),
    lineno: entry.lineno ?? 0,
    raw: entry.raw ?? '',
  }));

  const stages: DockerfileStage[] = [];
  let previous: Instruction | undefined;

  for (const instr of entries) {
    if (isComment(instr)) {
      previous = instr;
      continue;
    }

    if (instr.name === 'FROM') {
      const fromArgs = instr.args.trim();
      // "image AS name", optionally preceded by --platform=...
      const withoutFlags = fromArgs.replace(/^(--\S+\s+)+/, '');
      const asMatch = withoutFlags.match(/^(.+?)\s+[Aa][Ss]\s+(\S+)$/);
      // The directive must be the comment right above FROM; the parser drops blank lines
      const directive = previous && isComment(previous)
        ? parseDirective(previous.raw || previous.args)
        : undefined;

      stages.push({
        baseImage: asMatch ? asMatch[1].trim() : withoutFlags,
        name: asMatch ? asMatch[2].trim() : undefined,
        startLine: instr.lineno,
        directive,
      });
    }
    previous = instr;
  }

  return { path, stages };
}
