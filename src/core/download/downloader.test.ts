import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import axios, { AxiosHeaders, type AxiosResponse } from 'axios';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { downloadAsset } from './downloader';
import { DownloadError } from '../errors';
import type { DownloadProgress } from '../../types';

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, get: vi.fn() } };
});
const mockedAxios = vi.mocked(axios, true);

const ASSET_URL = 'https://github.com/acme/cpu_governor/releases/download/v0.1.2/cpuGovernor_0.1.2_amd64.deb';

function streamResponse(chunks: string[], contentLength?: number): AxiosResponse<Readable> {
  return {
    status: 200,
    statusText: 'OK',
    data: Readable.from(chunks.map((chunk) => Buffer.from(chunk))),
    headers: contentLength === undefined ? {} : { 'content-length': String(contentLength) },
    config: { headers: new AxiosHeaders() },
  };
}

describe('downloadAsset', () => {
  let tempDir: string;
  let destPath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cpugovernor-download-test-'));
    destPath = path.join(tempDir, 'cpuGovernor_0.1.2.deb');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('streams the body to disk and reports progress', async () => {
    mockedAxios.get.mockResolvedValueOnce(streamResponse(['abc', 'def'], 6));
    const progress: DownloadProgress[] = [];

    const result = await downloadAsset(ASSET_URL, destPath, { onProgress: (update) => progress.push(update) });

    expect(result).toEqual({ filePath: destPath, bytes: 6, attempts: 1 });
    expect(await fs.readFile(destPath, 'utf-8')).toBe('abcdef');
    expect(progress).toEqual([
      { bytesDownloaded: 3, totalBytes: 6 },
      { bytesDownloaded: 6, totalBytes: 6 },
    ]);
  });

  it('retries after a failed attempt', async () => {
    mockedAxios.get
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(streamResponse(['payload']));

    const result = await downloadAsset(ASSET_URL, destPath, { retries: 2, retryDelayMs: 0 });

    expect(result.attempts).toBe(2);
    expect(result.bytes).toBe(7);
    expect(mockedAxios.get).toHaveBeenCalledTimes(2);
  });

  it('fails after the retry budget and removes the partial file', async () => {
    mockedAxios.get
      .mockResolvedValueOnce(streamResponse(['abcdef'], 10))
      .mockResolvedValueOnce(streamResponse(['abcdef'], 10));

    const error = await downloadAsset(ASSET_URL, destPath, { retries: 1, retryDelayMs: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({
      message: 'Download failed after 2 attempts: Incomplete download: 6 of 10 bytes',
      hints: [`URL: ${ASSET_URL}`],
    });
    expect(mockedAxios.get).toHaveBeenCalledTimes(2);
    expect(await fs.pathExists(destPath)).toBe(false);
  });

  it('sends the token to github.com only', async () => {
    mockedAxios.get
      .mockResolvedValueOnce(streamResponse(['a']))
      .mockResolvedValueOnce(streamResponse(['b']));

    await downloadAsset(ASSET_URL, destPath, { token: 'test-secret' });
    await downloadAsset('https://objects.githubusercontent.com/asset/1', destPath, { token: 'test-secret' });

    const [githubCall, cdnCall] = mockedAxios.get.mock.calls;
    expect(githubCall?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(cdnCall?.[1]?.headers).not.toHaveProperty('Authorization');
  });

  it('streams as a response stream with redirects allowed', async () => {
    mockedAxios.get.mockResolvedValueOnce(streamResponse(['a']));

    await downloadAsset(ASSET_URL, destPath, { timeout: 5000 });

    expect(mockedAxios.get).toHaveBeenCalledWith(ASSET_URL, {
      responseType: 'stream',
      maxRedirects: 10,
      timeout: 5000,
      headers: { Accept: 'application/octet-stream', 'User-Agent': 'cpugovernor-installer/1.0' },
    });
  });
});
