// Helpers around public GitHub data that need no API credentials.

export type { IssueLike };
export { githubIssueExists, getGitHubUserPublicSshKeys };

type IssueLike = { title: string };

function githubIssueExists(issues: readonly IssueLike[], search: string): boolean {
  return issues.some((issue) => issue.title.includes(search));
}

export class PublicFetchError extends Error {
  status: number;
  constructor(resource: string, status: number) {
    super(`${resource} fetch failed (${status})`);
    this.status = status;
  }
}

async function getGitHubUserPublicSshKeys(handle: string): Promise<string[]> {
  const res = await fetch(`https://github.com/${encodeURIComponent(handle)}.keys`);
  if (!res.ok) {
    throw new PublicFetchError('ssh keys', res.status);
  }
  const body = await res.text();
  return body
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
