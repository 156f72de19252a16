/**
 * GitHub Releases API client
 */

import axios, { AxiosInstance } from 'axios';
import logger from '../../utils/logger';
import type { Release, RepositoryId } from '../../types';
import { ReleaseApiError } from '../errors';
import { parseRelease, parseReleaseList } from './schema';

const DEFAULT_API_BASE_URL = 'https://api.github.com';
const DEFAULT_USER_AGENT = 'cpugovernor-installer/1.0';

/** Read access to the releases of a repository */
export interface ReleaseSource {
  listReleases(repository: RepositoryId, perPage: number): Promise<Release[]>;
  /** `null` when the repository has no release with that tag */
  getReleaseByTag(repository: RepositoryId, tag: string): Promise<Release | null>;
}

export interface GitHubReleaseClientOptions {
  apiBaseUrl?: string;
  /** Bearer token; raises the rate limit and opens private repositories */
  token?: string;
  userAgent?: string;
  timeout?: number;
}

export class GitHubReleaseClient implements ReleaseSource {
  private readonly client: AxiosInstance;

  constructor(options: GitHubReleaseClientOptions = {}) {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
    };
    if (options.token) {
      headers.Authorization = `Bearer ${options.token}`;
    }

    this.client = axios.create({
      baseURL: (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
      timeout: options.timeout ?? 30000,
      headers,
    });
  }

  async listReleases(repository: RepositoryId, perPage: number): Promise<Release[]> {
    const url = `${repositoryPath(repository)}/releases`;
    const data = await this.getJson(url, { per_page: perPage });
    const parsed = parseReleaseList(data);
    if (!parsed.ok) {
      throw new ReleaseApiError(`Unexpected release list for ${repository}: ${parsed.error}`, null);
    }

    logger.debug('release list fetched', { repository, count: parsed.value.length });
    return parsed.value;
  }

  async getReleaseByTag(repository: RepositoryId, tag: string): Promise<Release | null> {
    const url = `${repositoryPath(repository)}/releases/tags/${encodeURIComponent(tag)}`;

    let data: unknown;
    try {
      data = await this.getJson(url);
    } catch (error) {
      if (error instanceof ReleaseApiError && error.status === 404) {
        logger.debug('tagged release not found', { repository, tag });
        return null;
      }
      throw error;
    }

    const parsed = parseRelease(data);
    if (!parsed.ok) {
      throw new ReleaseApiError(`Unexpected release for ${repository}@${tag}: ${parsed.error}`, null);
    }
    return parsed.value;
  }

  private async getJson(url: string, params?: Record<string, string | number>): Promise<unknown> {
    logger.debug('release API request', { url, params });
    try {
      const response = await this.client.get<unknown>(url, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status ?? null;
        const detail = status === null ? error.message : `HTTP ${status}`;
        throw new ReleaseApiError(`Release API request failed (${detail}) for ${url}`, status);
      }
      throw error;
    }
  }
}

function repositoryPath(repository: RepositoryId): string {
  const [owner, name] = repository.split('/');
  return `/repos/${encodeURIComponent(owner ?? '')}/${encodeURIComponent(name ?? '')}`;
}
