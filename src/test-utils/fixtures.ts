import type { Release, ReleaseAsset, RepositoryId } from '../types';
import type { ReleaseSource } from '../core/releases/github-client';

export function asset(name: string, size?: number): ReleaseAsset {
  return { name, downloadUrl: `https://github.com/example/cpu_governor/releases/download/v1/${name}`, size };
}

export function release(tagName: string, overrides: Partial<Release> = {}): Release {
  return {
    tagName,
    prerelease: false,
    draft: false,
    publishedAt: '2026-01-01T00:00:00Z',
    assets: [],
    ...overrides,
  };
}

/**
 * ReleaseSource over an in-memory map; a repository mapped to an Error throws it.
 */
export class StaticReleaseSource implements ReleaseSource {
  readonly listCalls: RepositoryId[] = [];
  readonly tagCalls: Array<{ repository: RepositoryId; tag: string }> = [];

  constructor(private readonly data: Record<RepositoryId, Release[] | Error>) {}

  async listReleases(repository: RepositoryId): Promise<Release[]> {
    this.listCalls.push(repository);
    return this.lookup(repository);
  }

  async getReleaseByTag(repository: RepositoryId, tag: string): Promise<Release | null> {
    this.tagCalls.push({ repository, tag });
    return this.lookup(repository).find((item) => item.tagName === tag) ?? null;
  }

  private lookup(repository: RepositoryId): Release[] {
    const entry = this.data[repository];
    if (entry instanceof Error) {
      throw entry;
    }
    return entry ?? [];
  }
}
