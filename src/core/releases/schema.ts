import { z } from 'zod';
import type { Release } from '../../types';

const assetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string().url(),
  size: z.number().int().nonnegative().optional(),
});

const releaseSchema = z.object({
  tag_name: z.string().min(1),
  prerelease: z.boolean(),
  draft: z.boolean(),
  published_at: z.string().nullable().optional(),
  assets: z.array(assetSchema).default([]),
});

export type GitHubReleasePayload = z.infer<typeof releaseSchema>;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function parseRelease(input: unknown): ParseResult<Release> {
  const parsed = releaseSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }
  return { ok: true, value: toRelease(parsed.data) };
}

export function parseReleaseList(input: unknown): ParseResult<Release[]> {
  const parsed = z.array(releaseSchema).safeParse(input);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data.map(toRelease) };
}

function toRelease(payload: GitHubReleasePayload): Release {
  return {
    tagName: payload.tag_name,
    prerelease: payload.prerelease,
    draft: payload.draft,
    publishedAt: payload.published_at ?? null,
    assets: payload.assets.map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url,
      size: asset.size,
    })),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
