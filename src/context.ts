import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { CheckTarget, Directive, ParsedCompose, ParsedDockerfile } from './types/index.js';
import { ManifestError, errorMessage } from './errors.js';
import { parseDockerfile } from './parsers/dockerfile.js';
import { parseCompose } from './parsers/compose.js';
import { hasBuildArgs, parseImageReference } from './parsers/image.js';

export interface TargetOptions {
  /** Pattern for references that carry no directive. */
  defaultPattern?: string;
}

interface Origin {
  service?: string;
  location: string;
  line?: number;
}

export function readManifest(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ManifestError(`Failed to read file \`${path}\`: ${errorMessage(err)}`, { cause: err });
  }
}

function imageTarget(
  origin: Origin,
  image: string,
  directive: Directive | undefined,
  opts: TargetOptions,
): CheckTarget {
  const base = { ...origin, image };

  if (hasBuildArgs(image)) {
    return { ...base, kind: 'skipped', reason: 'uses a build argument' };
  }
  if (directive?.error) {
    return { ...base, kind: 'invalid', error: directive.error };
  }

  const pattern = directive?.pattern ?? opts.defaultPattern;
  if (!pattern) {
    return { ...base, kind: 'skipped', reason: 'no pattern directive' };
  }

  const reference = parseImageReference(image);
  if (!reference) {
    return { ...base, kind: 'invalid', error: `The image reference \`${image}\` is invalid` };
  }

  return { ...base, kind: 'image', reference, pattern };
}

export function dockerfileTargets(
  dockerfile: ParsedDockerfile,
  opts: TargetOptions = {},
  service?: string,
): CheckTarget[] {
  const targets: CheckTarget[] = [];
  const stageNames = new Set<string>();

  for (const stage of dockerfile.stages) {
    const origin: Origin = { service, location: dockerfile.path, line: stage.startLine };
    const image = stage.baseImage;

    if (!image) {
      targets.push({ ...origin, image, kind: 'invalid', error: 'FROM without an image' });
    } else if (image.toLowerCase() === 'scratch') {
      targets.push({ ...origin, image, kind: 'skipped', reason: '`scratch` has no tags' });
    } else if (stageNames.has(image.toLowerCase())) {
      targets.push({ ...origin, image, kind: 'skipped', reason: 'refers to an earlier build stage' });
    } else {
      targets.push(imageTarget(origin, image, stage.directive, opts));
    }

    if (stage.name) stageNames.add(stage.name.toLowerCase());
  }

  return targets;
}

export function composeTargets(compose: ParsedCompose, opts: TargetOptions = {}): CheckTarget[] {
  const composeDir = dirname(compose.path);

  return compose.services.flatMap((service): CheckTarget[] => {
    if (service.build) {
      const dockerfilePath = resolve(composeDir, service.build.context, service.build.dockerfile ?? 'Dockerfile');
      try {
        const dockerfile = parseDockerfile(readManifest(dockerfilePath), dockerfilePath);
        return dockerfileTargets(dockerfile, opts, service.name);
      } catch (err) {
        return [{
          service: service.name,
          image: service.image ?? '',
          location: dockerfilePath,
          kind: 'invalid',
          error: errorMessage(err),
        }];
      }
    }

    const origin: Origin = { service: service.name, location: compose.path, line: service.imageLine };
    if (service.image !== undefined) {
      return [imageTarget(origin, service.image, service.directive, opts)];
    }

    return [{
      ...origin,
      image: '',
      kind: 'invalid',
      error: `No build context or image found for service \`${service.name}\``,
    }];
  });
}

export function buildDockerfileTargets(path: string, opts?: TargetOptions): CheckTarget[] {
  return dockerfileTargets(parseDockerfile(readManifest(path), path), opts);
}

export function buildComposeTargets(path: string, opts?: TargetOptions): CheckTarget[] {
  return composeTargets(parseCompose(readManifest(path), path), opts);
}
