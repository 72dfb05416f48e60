// Keep a local mirror of an organization's repositories in line with GitHub.

export type { RepoDescriptor, RepoMirror, RepoSource, MirrorRefreshSummary };
export { refreshRepoMirror };

type RepoDescriptor = {
  // unique key
  name: string;
  fullName: string;
  description: string | null;
  visibility: string;
  private: boolean;
  fork: boolean;
  archived: boolean;
  htmlUrl: string;
  defaultBranch: string;
  language: string | null;
  topics: string[];
  createdAt: string | null;
  updatedAt: string | null;
  pushedAt: string | null;
};

type RepoMirror = {
  list(): Promise<RepoDescriptor[]>;
  upsert(repo: RepoDescriptor): Promise<void>;
  deleteByName(name: string): Promise<boolean>;
};

type RepoSource = () => Promise<RepoDescriptor[]>;

type MirrorRefreshSummary = { upserted: string[]; deleted: string[] };

/**
 * Upsert every remote repository and delete mirrored ones that no longer
 * exist remotely. The remote list is fetched before the mirror is touched, so a
 * failed fetch leaves the mirror as it was.
 */
async function refreshRepoMirror(source: RepoSource, mirror: RepoMirror): Promise<MirrorRefreshSummary> {
  let remote = await source();

  let stale = new Map<string, RepoDescriptor>();
  for (let repo of await mirror.list()) {
    stale.set(repo.name, repo);
  }

  let upserted: string[] = [];
  for (let repo of remote) {
    await mirror.upsert(repo);
    stale.delete(repo.name);
    upserted.push(repo.name);
  }

  let deleted: string[] = [];
  for (let name of stale.keys()) {
    await mirror.deleteByName(name);
    deleted.push(name);
  }

  console.log(`[repo mirror] upserted ${upserted.length} repos, deleted ${deleted.length}`);
  return { upserted, deleted };
}
