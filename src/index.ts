export { getEnv, getGitHubEnv, getGSuiteEnv, normalizePrivateKey } from './env.ts';
export type { Env, GitHubEnv, GSuiteEnv, GitHubCredentials } from './env.ts';

export { trimBytes, bytesEqual, decodeBase64Lines } from './lib/bytes.ts';
export { createUnifiedPatch, isSpuriousDiff, pdfTimestampPolicy, DEFAULT_DIFF_POLICIES } from './lib/diff-policy.ts';
export type { DiffPolicy } from './lib/diff-policy.ts';
export { writeFile } from './lib/files.ts';
export { logError } from './lib/logging.ts';
export { defaultDate, parseDate } from './lib/util.ts';

export { RateLimitError, FaultError } from './sync/gateway.ts';
export type { RepoGateway, RemoteFile, DirectoryItem, RemoteBlob } from './sync/gateway.ts';
export { reconcileFile, createOrUpdateFile, commitMessage } from './sync/reconcile.ts';
export type { ReconcileOutcome, ReconcileOptions } from './sync/reconcile.ts';
export { refreshRepoMirror } from './sync/repo-mirror.ts';
export type { RepoDescriptor, RepoMirror, RepoSource, MirrorRefreshSummary } from './sync/repo-mirror.ts';
export { createRepoStore } from './storage/repo-store.ts';
export type { RepoStoreInstance, RepoStoreOptions } from './storage/repo-store.ts';

export { createContentGateway, classifyRequestError } from './github/content-gateway.ts';
export type { RepoRef } from './github/content-gateway.ts';
export { createCachingFetch } from './github/http-cache.ts';
export { listAllGitHubRepos, refreshDbGitHubRepos } from './github/repos.ts';
export { githubIssueExists, getGitHubUserPublicSshKeys, PublicFetchError } from './github/public.ts';

export { authenticateGitHub, authenticateGitHubApp, authenticateGitHubFromEnv, USER_AGENT } from './auth/github.ts';
export type { Octokit } from './auth/github.ts';
export { getGSuiteToken, GSUITE_SCOPES } from './auth/gsuite.ts';
export type { GSuiteToken } from './auth/gsuite.ts';
