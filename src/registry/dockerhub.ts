import { z } from 'zod';
import { RegistryError, errorMessage } from '../errors.js';
import type { ImageName, Tag, TagFetcher } from '../types/index.js';
import { dockerHubPath, formatImageName, isDockerHub } from '../parsers/image.js';

export const DEFAULT_REGISTRY_URL = 'https://hub.docker.com';
const PAGE_SIZE = 100;

const TagPageSchema = z.object({
  count: z.number().optional(),
  next: z.string().nullish(),
  results: z.array(z.object({ name: z.string() })),
});

export type TagPage = z.infer<typeof TagPageSchema>;

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Lists the tags of a Docker Hub repository, following the API's `next`
 * links page by page.
 */
export class DockerHubTagFetcher implements TagFetcher {
  private readonly baseUrl: string;

  constructor(baseUrl: string = DEFAULT_REGISTRY_URL) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  firstPageUrl(image: ImageName, limit?: number): string {
    const size = limit !== undefined ? Math.min(PAGE_SIZE, limit) : PAGE_SIZE;
    return `${this.baseUrl}/v2/repositories/${dockerHubPath(image)}/tags?page_size=${size}`;
  }

  async fetchPage(url: string, image: ImageName, signal?: AbortSignal): Promise<TagPage> {
    const display = formatImageName(image);

    let res: Response;
    try {
      res = await fetch(url, { headers: { Accept: 'application/json' }, signal });
    } catch (err) {
      if (isAbort(err)) {
        throw new RegistryError(`Timed out fetching tags for \`${display}\``, undefined, { cause: err });
      }
      throw new RegistryError(`Failed to fetch tags for \`${display}\`: ${errorMessage(err)}`, undefined, { cause: err });
    }

    if (res.status === 404) {
      throw new RegistryError(`Image \`${display}\` was not found on Docker Hub`, 404);
    }
    if (!res.ok) {
      throw new RegistryError(
        `Docker Hub answered ${res.status} ${res.statusText} for \`${display}\``,
        res.status,
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      if (isAbort(err)) {
        throw new RegistryError(`Timed out fetching tags for \`${display}\``, undefined, { cause: err });
      }
      throw new RegistryError(`Docker Hub sent an unreadable response for \`${display}\``, res.status, { cause: err });
    }

    const page = TagPageSchema.safeParse(body);
    if (!page.success) {
      throw new RegistryError(`Docker Hub sent an unexpected response for \`${display}\``, res.status, {
        cause: page.error,
      });
    }
    return page.data;
  }

  async fetchTags(image: ImageName, opts?: { limit?: number; signal?: AbortSignal }): Promise<Tag[]> {
    if (!isDockerHub(image)) {
      throw new RegistryError(
        `Unsupported registry \`${image.registry}\` for \`${formatImageName(image)}\`; only Docker Hub is supported`,
      );
    }

    const limit = opts?.limit;
    const tags: Tag[] = [];
    let url: string | null | undefined = this.firstPageUrl(image, limit);

    while (url && (limit === undefined || tags.length < limit)) {
      const page: TagPage = await this.fetchPage(url, image, opts?.signal);
      tags.push(...page.results.map((r) => r.name));
      url = page.next;
    }

    return limit === undefined ? tags : tags.slice(0, limit);
  }
}
