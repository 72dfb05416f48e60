// GitHub clients authenticated with a personal token or as an app installation.
import { readFileSync } from 'node:fs';
import { App } from '@octokit/app';
import { Octokit } from '@octokit/core';
import type { GitHubEnv } from '../env.ts';
import { createCachingFetch } from '../github/http-cache.ts';

export type { Octokit };
export { authenticateGitHub, authenticateGitHubApp, authenticateGitHubFromEnv, USER_AGENT };

const GITHUB_API_BASE = 'https://api.github.com';
const USER_AGENT = readUserAgent();

function readUserAgent(): string {
  let raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
  let pkg = JSON.parse(raw) as { name?: string; version?: string };
  return `${pkg.name ?? 'repo-steward'}/${pkg.version ?? '0.0.0'}`;
}

function clientDefaults(env: GitHubEnv, upstream?: typeof fetch) {
  return {
    baseUrl: GITHUB_API_BASE,
    userAgent: USER_AGENT,
    request: { fetch: createCachingFetch(env.GITHUB_CACHE_DIR, upstream) },
  };
}

function authenticateGitHub(env: GitHubEnv, upstream?: typeof fetch): Octokit {
  let credentials = env.github;
  if (credentials.mode !== 'token') throw new Error('token authentication requires GITHUB_TOKEN');
  return new Octokit({ ...clientDefaults(env, upstream), auth: credentials.token });
}

// The returned client refreshes its installation token by itself.
async function authenticateGitHubApp(env: GitHubEnv, upstream?: typeof fetch): Promise<Octokit> {
  let credentials = env.github;
  if (credentials.mode !== 'app') throw new Error('app authentication requires GH_APP_ID');
  let app = new App({
    appId: credentials.appId,
    privateKey: credentials.privateKey,
    Octokit: Octokit.defaults(clientDefaults(env, upstream)),
  });
  return await app.getInstallationOctokit(credentials.installationId);
}

async function authenticateGitHubFromEnv(env: GitHubEnv, upstream?: typeof fetch): Promise<Octokit> {
  if (env.github.mode === 'app') return await authenticateGitHubApp(env, upstream);
  return authenticateGitHub(env, upstream);
}
