import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export const DOCKERFILE_NAMES = ['Dockerfile', 'dockerfile'];

export const COMPOSE_NAMES = ['compose.yaml', 'compose.yml', 'docker-compose.yaml', 'docker-compose.yml'];

/** Override files such as `docker-compose.prod.yml` or `compose.dev.yaml`. */
const COMPOSE_VARIANT_RE = /^(?:docker-)?compose\.[\w-]+\.ya?ml$/;
const DOCKERFILE_VARIANT_RE = /^(?:Dockerfile\.[\w-]+|[\w-]+\.Dockerfile)$/;

export function findFile(dir: string, names: string[]): string | undefined {
  return names.map((name) => join(dir, name)).find((path) => existsSync(path));
}

function listMatching(dir: string, re: RegExp): string[] {
  try {
    return readdirSync(dir).filter((name) => re.test(name)).sort();
  } catch {
    return [];
  }
}

/** True when the file has a top-level `services:` key. */
export function hasServices(path: string): boolean {
  try {
    return /^services\s*:/m.test(readFileSync(path, 'utf-8'));
  } catch {
    return false;
  }
}

/** `Dockerfile`, else the first `Dockerfile.<x>` or `<x>.Dockerfile` by name. */
export function findDockerfile(dir: string): string | undefined {
  return findFile(dir, DOCKERFILE_NAMES) ?? listMatching(dir, DOCKERFILE_VARIANT_RE).map((n) => join(dir, n))[0];
}

/** A standard compose file, else the first compose variant that declares services. */
export function findComposeFile(dir: string): string | undefined {
  return findFile(dir, COMPOSE_NAMES)
    ?? listMatching(dir, COMPOSE_VARIANT_RE).map((name) => join(dir, name)).find(hasServices);
}
