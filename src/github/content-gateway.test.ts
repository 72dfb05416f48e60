import { Octokit } from '@octokit/core';
import { RequestError } from '@octokit/request-error';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { reconcileFile } from '../sync/reconcile';
import { FaultError, RateLimitError } from '../sync/gateway';
import { MockGitHubApi } from '../test/mock-github';
import { classifyRequestError, createContentGateway } from './content-gateway';

const encode = (text: string) => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

let mock: MockGitHubApi;
let octokit: Octokit;

beforeEach(() => {
  mock = new MockGitHubApi('acme', 'handbook');
  octokit = new Octokit({ request: { fetch: mock.fetch } });
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

function gateway() {
  return createContentGateway(octokit, { owner: 'acme', repo: 'handbook' });
}

describe('content gateway', () => {
  test('getFile decodes the file and returns its blob sha', async () => {
    mock.setFile('docs/guide.md', `# Guide\n${'long line '.repeat(20)}\n`);

    let file = await gateway().getFile('/docs/guide.md', 'main');

    expect(file.path).toBe('docs/guide.md');
    expect(file.sha).toBe(mock.getFile('docs/guide.md')?.sha);
    expect(decode(file.content)).toBe(`# Guide\n${'long line '.repeat(20)}\n`);
    expect(mock.requests[0]?.url.searchParams.get('ref')).toBe('main');
  });

  test('getFile reports a missing file as a fault', async () => {
    let error = await gateway()
      .getFile('/missing.md', 'main')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FaultError);
    expect(error).toMatchObject({ status: 404, message: 'Not Found' });
  });

  test('getFile flags files over the contents limit as too_large', async () => {
    mock.setFile('big.pdf', 'pretend this is huge', { tooLarge: true });

    let error = await gateway()
      .getFile('/big.pdf', 'main')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FaultError);
    expect(error).toMatchObject({ status: 403, code: 'too_large' });
    expect(error instanceof FaultError && error.message.endsWith('(too_large)')).toBe(true);
  });

  test('getFile turns a rate-limit response into a RateLimitError', async () => {
    mock.rateLimitNext({ 'retry-after': '7' });

    let error = await gateway()
      .getFile('/README.md', 'main')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ resetSeconds: 7 });
  });

  test('listDirectory returns paths and shas', async () => {
    mock.setFile('README.md', 'hello\n');
    mock.setFile('LICENSE', 'MIT\n');
    mock.setFile('docs/guide.md', 'guide\n');

    let root = await gateway().listDirectory('/', 'main');
    let docs = await gateway().listDirectory('docs', 'main');

    expect(root.map((item) => item.path).sort()).toEqual(['LICENSE', 'README.md']);
    expect(docs).toEqual([{ path: 'docs/guide.md', sha: mock.getFile('docs/guide.md')?.sha }]);
  });

  test('listDirectory of a file yields no entries', async () => {
    mock.setFile('README.md', 'hello\n');

    expect(await gateway().listDirectory('README.md', 'main')).toEqual([]);
  });

  test('fetchBlob returns base64 content wrapped in lines', async () => {
    mock.setFile('notes.txt', 'n'.repeat(100));
    let sha = mock.getFile('notes.txt')?.sha ?? '';

    let blob = await gateway().fetchBlob(sha);

    expect(blob.content).toContain('\n');
    expect(Buffer.from(blob.content.replace(/\n/g, ''), 'base64').toString()).toBe('n'.repeat(100));
  });

  test('updateFile sends base64 content with the prior sha and branch', async () => {
    mock.setFile('README.md', 'old\n');
    let sha = mock.getFile('README.md')?.sha ?? '';

    await gateway().updateFile('/README.md', encode('new\n'), 'Update readme', sha, 'main');

    let put = mock.requests.find((request) => request.method === 'PUT');
    expect(put?.body).toEqual({ message: 'Update readme', content: 'bmV3Cg==', sha, branch: 'main' });
    expect(mock.getFile('README.md')?.content.toString()).toBe('new\n');
  });

  test('updateFile with a stale sha fails with a conflict', async () => {
    mock.setFile('README.md', 'old\n');

    let error = await gateway()
      .updateFile('/README.md', encode('new\n'), 'Update readme', 'stale', 'main')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FaultError);
    expect(error).toMatchObject({ status: 409 });
  });

  test('createFile omits the sha', async () => {
    await gateway().createFile('/docs/new.md', encode('fresh\n'), 'Create doc', 'main');

    let put = mock.requests.find((request) => request.method === 'PUT');
    expect(put?.body).toEqual({ message: 'Create doc', content: 'ZnJlc2gK', branch: 'main' });
    expect(mock.getFile('docs/new.md')?.content.toString()).toBe('fresh\n');
  });
});

describe('reconcileFile against the REST API', () => {
  test('creates, then leaves alone, then updates', async () => {
    let repo = gateway();

    expect((await reconcileFile(repo, 'main', '/README.md', encode('hello\n'))).kind).toBe('created');
    expect((await reconcileFile(repo, 'main', '/README.md', encode('hello\n'))).kind).toBe('unchanged');
    expect(await reconcileFile(repo, 'main', '/README.md', encode('hello again\n'))).toEqual({
      kind: 'updated',
      via: 'contents',
      error: undefined,
    });

    expect(mock.getFile('README.md')?.content.toString()).toBe('hello again\n');
    expect(mock.requests.filter((request) => request.method === 'PUT')).toHaveLength(2);
  });

  test('falls back to the git blob for large files', async () => {
    mock.setFile('big.pdf', 'stale\n', { tooLarge: true });
    let sha = mock.getFile('big.pdf')?.sha;

    let outcome = await reconcileFile(gateway(), 'main', '/big.pdf', encode('fresh\n'));

    expect(outcome).toEqual({ kind: 'updated', via: 'blob', error: undefined });
    let put = mock.requests.find((request) => request.method === 'PUT');
    expect(put?.body).toMatchObject({ sha, branch: 'main', content: 'ZnJlc2gK' });
  });

  test('leaves a large file alone when its blob matches', async () => {
    mock.setFile('big.pdf', 'same\n', { tooLarge: true });

    let outcome = await reconcileFile(gateway(), 'main', 'big.pdf', encode('same\n'));

    expect(outcome).toEqual({ kind: 'unchanged', reason: 'equal' });
    expect(mock.requests.map((request) => request.method)).toEqual(['GET', 'GET', 'GET']);
  });
});

describe('classifyRequestError', () => {
  function requestError(status: number, headers: Record<string, string>, data: unknown) {
    return new RequestError('request failed', status, {
      request: { method: 'GET', url: 'https://api.github.com/repos/acme/handbook/contents/README.md', headers: {} },
      response: { status, url: 'https://api.github.com/repos/acme/handbook/contents/README.md', headers, data },
    });
  }

  test('uses the reset timestamp when there is no retry-after', () => {
    let error = requestError(403, { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1700000030' }, {});

    let classified = classifyRequestError(error, 1_700_000_000_500);
    expect(classified).toBeInstanceOf(RateLimitError);
    expect(classified).toMatchObject({ resetSeconds: 30 });
  });

  test('never reports a negative wait', () => {
    let error = requestError(429, { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1600000000' }, {});

    let classified = classifyRequestError(error, 1_700_000_000_000);
    expect(classified).toBeInstanceOf(RateLimitError);
    expect(classified).toMatchObject({ resetSeconds: 0 });
  });

  test('a plain 403 is a fault', () => {
    let error = requestError(403, { 'x-ratelimit-remaining': '4999' }, { message: 'Resource not accessible by integration' });

    let classified = classifyRequestError(error);
    expect(classified).toBeInstanceOf(FaultError);
    expect(classified).toMatchObject({ status: 403, message: 'Resource not accessible by integration', code: undefined });
  });

  test('appends validation codes to the message', () => {
    let error = requestError(422, {}, { message: 'Validation Failed', errors: [{ code: 'invalid' }, { code: 'missing' }] });

    expect(classifyRequestError(error)).toMatchObject({ message: 'Validation Failed (invalid, missing)', code: 'invalid' });
  });

  test('passes through errors without a response', () => {
    let error = new TypeError('fetch failed');

    expect(classifyRequestError(error)).toBe(error);
  });
});
