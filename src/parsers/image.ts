import type { ImageName, ImageReference } from '../types/index.js';

const COMPONENT_RE = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_RE = /^[\w][\w.-]{0,127}$/;
const DOCKER_HUB_HOSTS = new Set(['docker.io', 'index.docker.io', 'registry-1.docker.io']);

function isRegistryHost(component: string): boolean {
  return component.includes('.') || component.includes(':') || component === 'localhost';
}

/**
 * Parse `[host/][namespace/]repository[:tag][@digest]`.
 * Returns undefined when the reference is not a valid image name.
 */
export function parseImageReference(raw: string): ImageReference | undefined {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;

  let rest = trimmed;
  let digest: string | undefined;
  const at = rest.indexOf('@');
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
    if (!digest) return undefined;
  }

  let tag = 'latest';
  const colon = rest.lastIndexOf(':');
  if (colon > rest.lastIndexOf('/')) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (!TAG_RE.test(tag)) return undefined;
  }

  const components = rest.split('/');
  let registry: string | undefined;
  if (components.length > 1 && isRegistryHost(components[0])) {
    registry = components.shift();
  }
  if (!components.every((c) => COMPONENT_RE.test(c))) return undefined;

  const repository = components.pop();
  if (!repository) return undefined;
  const namespace = components.length > 0 ? components.join('/') : undefined;

  return { raw: trimmed, name: { registry, namespace, repository }, tag, digest };
}

export function isDockerHub(name: ImageName): boolean {
  return name.registry === undefined || DOCKER_HUB_HOSTS.has(name.registry);
}

/** `namespace/repository` as Docker Hub addresses it, with `library/` for official images. */
export function dockerHubPath(name: ImageName): string {
  return `${name.namespace ?? 'library'}/${name.repository}`;
}

export function formatImageName(name: ImageName): string {
  return [name.registry, name.namespace, name.repository].filter(Boolean).join('/');
}

/** Build arguments such as `${BASE}` cannot be resolved without a build. */
export function hasBuildArgs(raw: string): boolean {
  return /\$\{?[A-Za-z_][A-Za-z0-9_]*\}?/.test(raw);
}
