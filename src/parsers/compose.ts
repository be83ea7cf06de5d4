import { parseDocument, isMap, isScalar } from 'yaml';
import { z } from 'zod';
import { ManifestError } from '../errors.js';
import type { ParsedCompose, ComposeService, ComposeBuild, Directive } from '../types/index.js';
import { parseDirective } from './directive.js';

const BuildSchema = z.union([
  z.string(),
  z.object({
    context: z.string().default('.'),
    dockerfile: z.string().optional(),
  }),
]);

function lineOfOffset(raw: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < raw.length; i++) {
    if (raw[i] === '\n') line++;
  }
  return line;
}

/** The directive on the closest non-blank line above `line` (1-based), if that line is a comment. */
function directiveAbove(lines: string[], line: number): Directive | undefined {
  for (let i = line - 2; i >= 0; i--) {
    const text = lines[i].trim();
    if (!text) continue;
    return text.startsWith('#') ? parseDirective(text) : undefined;
  }
  return undefined;
}

function readBuild(value: unknown, service: string): ComposeBuild {
  const parsed = BuildSchema.safeParse(isMap(value) ? value.toJSON() : value);
  if (!parsed.success) {
    throw new ManifestError(`The build definition of service \`${service}\` is not supported`);
  }
  return typeof parsed.data === 'string' ? { context: parsed.data } : parsed.data;
}

function readService(name: string, node: unknown, lines: string[], raw: string): ComposeService {
  if (!isMap(node)) {
    throw new ManifestError(`Service \`${name}\` must be a mapping`);
  }

  const service: ComposeService = { name };

  const build = node.get('build', true);
  if (build !== undefined && !(isScalar(build) && build.value === null)) {
    service.build = readBuild(isScalar(build) ? build.value : build, name);
  }

  // The `image:` key anchors the directive, wherever its value sits
  const pair = node.items.find((item) => isScalar(item.key) && item.key.value === 'image');
  if (pair) {
    const image = pair.value;
    if (!isScalar(image) || typeof image.value !== 'string') {
      throw new ManifestError(`The image of service \`${name}\` must be a string`);
    }
    service.image = image.value;
    if (isScalar(pair.key) && pair.key.range) {
      service.imageLine = lineOfOffset(raw, pair.key.range[0]);
      service.directive = directiveAbove(lines, service.imageLine);
    }
  }

  return service;
}

export function parseCompose(raw: string, path: string): ParsedCompose {
  const doc = parseDocument(raw);
  if (doc.errors.length > 0) {
    throw new ManifestError(`Failed to parse ${path}: ${doc.errors[0].message}`);
  }

  const root = doc.contents;
  if (!isMap(root)) {
    throw new ManifestError(`${path} does not contain a compose mapping`);
  }

  const services = root.get('services', true);
  if (services === undefined) {
    throw new ManifestError(`${path} has no \`services\` section`);
  }
  if (!isMap(services)) {
    throw new ManifestError(`The \`services\` section of ${path} must be a mapping`);
  }

  const lines = raw.split('\n');

  return {
    path,
    services: services.items.map((pair) => {
      const name = isScalar(pair.key) ? String(pair.key.value) : String(pair.key);
      return readService(name, pair.value, lines, raw);
    }),
  };
}
