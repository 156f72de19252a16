export { GitHubReleaseClient } from './github-client';
export type { ReleaseSource, GitHubReleaseClientOptions } from './github-client';
export { resolveRelease, selectRelease } from './resolver';
export type { ResolveReleaseOptions, CandidateFailure } from './resolver';
export { selectAsset, compileAssetPattern } from './asset-selector';
export { parseRelease, parseReleaseList } from './schema';
