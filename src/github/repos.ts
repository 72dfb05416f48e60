import type { Octokit } from '@octokit/core';
import { composePaginateRest } from '@octokit/plugin-paginate-rest';
import { refreshRepoMirror, type MirrorRefreshSummary, type RepoDescriptor, type RepoMirror } from '../sync/repo-mirror.ts';

export { listAllGitHubRepos, refreshDbGitHubRepos, toRepoDescriptor };

const PAGE_SIZE = 100;

// The subset of GitHub's minimal-repository payload the mirror keeps.
type OrgRepoPayload = {
  name: string;
  full_name: string;
  description: string | null;
  private: boolean;
  visibility?: string;
  fork: boolean;
  archived?: boolean;
  html_url: string;
  default_branch?: string;
  language?: string | null;
  topics?: string[];
  created_at?: string | null;
  updated_at?: string | null;
  pushed_at?: string | null;
};

// Every repository of the organization, public, private and internal alike.
async function listAllGitHubRepos(octokit: Octokit, org: string): Promise<RepoDescriptor[]> {
  let repos = await composePaginateRest(octokit, 'GET /orgs/{org}/repos', {
    org,
    type: 'all',
    per_page: PAGE_SIZE,
  });
  return repos.map(toRepoDescriptor);
}

async function refreshDbGitHubRepos(octokit: Octokit, org: string, mirror: RepoMirror): Promise<MirrorRefreshSummary> {
  return await refreshRepoMirror(() => listAllGitHubRepos(octokit, org), mirror);
}

function toRepoDescriptor(repo: OrgRepoPayload): RepoDescriptor {
  return {
    name: repo.name,
    fullName: repo.full_name,
    description: repo.description,
    visibility: repo.visibility ?? (repo.private ? 'private' : 'public'),
    private: repo.private,
    fork: repo.fork,
    archived: repo.archived ?? false,
    htmlUrl: repo.html_url,
    defaultBranch: repo.default_branch ?? 'main',
    language: repo.language ?? null,
    topics: repo.topics ?? [],
    createdAt: repo.created_at ?? null,
    updatedAt: repo.updated_at ?? null,
    pushedAt: repo.pushed_at ?? null,
  };
}
