// RepoGateway backed by GitHub's contents and git data REST endpoints.
import type { Octokit } from '@octokit/core';
import { RequestError } from '@octokit/request-error';
import { decodeBase64Lines } from '../lib/bytes.ts';
import { asRecord, normalizePath } from '../lib/util.ts';
import { FaultError, RateLimitError, type DirectoryItem, type RepoGateway } from '../sync/gateway.ts';

export type { RepoRef };
export { createContentGateway, classifyRequestError };

type RepoRef = { owner: string; repo: string };

type ResponseHeaders = Record<string, string | number | undefined>;

function createContentGateway(octokit: Octokit, ref: RepoRef): RepoGateway {
  let { owner, repo } = ref;

  return { getFile, updateFile, createFile, listDirectory, fetchBlob };

  async function getFile(path: string, branch: string) {
    let { data } = await send(() =>
      octokit.request('GET /repos/{owner}/{repo}/contents/{path}', {
        owner,
        repo,
        path: normalizePath(path),
        ref: branch,
      })
    );
    if (Array.isArray(data) || data.type !== 'file') {
      throw new FaultError(422, `${path} is not a file`);
    }
    // Files between 1MB and 100MB come back without their content.
    if (data.encoding === 'none') {
      throw new FaultError(403, `content of ${path} omitted by the contents API (too_large)`, 'too_large');
    }
    return { path: data.path, sha: data.sha, content: decodeBase64Lines(data.content) };
  }

  async function updateFile(path: string, content: Uint8Array, message: string, sha: string, branch: string) {
    await send(() =>
      octokit.request('PUT /repos/{owner}/{repo}/contents/{path}', {
        owner,
        repo,
        path: normalizePath(path),
        message,
        content: Buffer.from(content).toString('base64'),
        sha,
        branch,
      })
    );
  }

  async function createFile(path: string, content: Uint8Array, message: string, branch: string) {
    await send(() =>
      octokit.request('PUT /repos/{owner}/{repo}/contents/{path}', {
        owner,
        repo,
        path: normalizePath(path),
        message,
        content: Buffer.from(content).toString('base64'),
        branch,
      })
    );
  }

  async function listDirectory(path: string, branch: string): Promise<DirectoryItem[]> {
    let { data } = await send(() =>
      octokit.request('GET /repos/{owner}/{repo}/contents/{path}', {
        owner,
        repo,
        path: normalizePath(path),
        ref: branch,
      })
    );
    if (!Array.isArray(data)) return [];
    return data.map((item) => ({ path: item.path, sha: item.sha }));
  }

  async function fetchBlob(sha: string) {
    let { data } = await send(() =>
      octokit.request('GET /repos/{owner}/{repo}/git/blobs/{file_sha}', { owner, repo, file_sha: sha })
    );
    return { content: data.content };
  }
}

async function send<T>(task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    throw classifyRequestError(error);
  }
}

/**
 * Map an Octokit failure onto the reconciler's error kinds. Errors that did not
 * come from an HTTP response are returned unchanged.
 */
function classifyRequestError(error: unknown, now: number = Date.now()): unknown {
  if (!isRequestError(error)) return error;
  let headers: ResponseHeaders = error.response?.headers ?? {};
  if (isRateLimited(error.status, headers)) {
    return new RateLimitError(resetSeconds(headers, now));
  }
  let body = asRecord(error.response?.data);
  let message = typeof body.message === 'string' && body.message.length > 0 ? body.message : error.message;
  let codes = Array.isArray(body.errors)
    ? body.errors.map((entry) => asRecord(entry).code).filter((code): code is string => typeof code === 'string')
    : [];
  if (codes.length > 0) message = `${message} (${codes.join(', ')})`;
  return new FaultError(error.status, message, codes[0]);
}

// A second copy of @octokit/request-error in the tree defeats instanceof.
function isRequestError(error: unknown): error is RequestError {
  if (error instanceof RequestError) return true;
  return error instanceof Error && error.name === 'HttpError' && 'status' in error && typeof error.status === 'number';
}

function isRateLimited(status: number, headers: ResponseHeaders): boolean {
  if (status !== 403 && status !== 429) return false;
  return String(headers['x-ratelimit-remaining']) === '0' || headers['retry-after'] !== undefined;
}

function resetSeconds(headers: ResponseHeaders, now: number): number {
  let retryAfter = Number(headers['retry-after']);
  if (headers['retry-after'] !== undefined && Number.isFinite(retryAfter)) {
    return Math.max(0, Math.ceil(retryAfter));
  }
  let resetAt = Number(headers['x-ratelimit-reset']);
  if (!Number.isFinite(resetAt)) return 0;
  return Math.max(0, Math.ceil(resetAt - now / 1000));
}
