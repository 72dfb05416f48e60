// File-backed RepoMirror: one JSON document holding every mirrored repository.
import fs from 'node:fs/promises';
import path from 'node:path';
import { asRecord } from '../lib/util.ts';
import type { RepoDescriptor, RepoMirror } from '../sync/repo-mirror.ts';

export type { RepoStoreOptions, RepoStoreInstance };
export { createRepoStore };

type RepoStoreOptions = {
  filePath: string;
};

type RepoStoreInstance = RepoMirror & {
  init(): Promise<void>;
  get(name: string): RepoDescriptor | undefined;
};

type RepoStoreFile = {
  repos: RepoDescriptor[];
};

const FILE_MODE = 0o600;

function createRepoStore(options: RepoStoreOptions): RepoStoreInstance {
  return new RepoStore(options);
}

/**
 * Descriptors are copied on the way in and out, so the map only changes
 * through `upsert` and `deleteByName`, and every change is written out.
 * Writes are serialised; a failed write rejects its own caller only, and the
 * next write persists the whole map again.
 */
class RepoStore implements RepoStoreInstance {
  #filePath: string;
  #repos = new Map<string, RepoDescriptor>();
  #writes: Promise<void> = Promise.resolve();

  constructor(options: RepoStoreOptions) {
    if (options.filePath.trim().length === 0) {
      throw new Error('repo store requires file path');
    }
    this.#filePath = path.resolve(options.filePath);
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.#filePath), { recursive: true });
    let raw: string;
    try {
      raw = await fs.readFile(this.#filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
      await this.#persist();
      return;
    }
    this.#repos.clear();
    for (let repo of readRepos(JSON.parse(raw))) {
      this.#repos.set(repo.name, repo);
    }
  }

  async list(): Promise<RepoDescriptor[]> {
    return Array.from(this.#repos.values(), copyRepo);
  }

  get(name: string): RepoDescriptor | undefined {
    let repo = this.#repos.get(name);
    return repo && copyRepo(repo);
  }

  async upsert(repo: RepoDescriptor): Promise<void> {
    this.#repos.set(repo.name, copyRepo(repo));
    await this.#persist();
  }

  async deleteByName(name: string): Promise<boolean> {
    if (!this.#repos.delete(name)) return false;
    await this.#persist();
    return true;
  }

  async #persist(): Promise<void> {
    let document: RepoStoreFile = { repos: [...this.#repos.values()] };
    let contents = JSON.stringify(document, null, 2);
    let write = this.#writes.then(() => this.#write(contents));
    // the failure reaches this caller through `await write`; the queue moves on
    this.#writes = write.catch(() => undefined);
    await write;
  }

  async #write(contents: string): Promise<void> {
    let tmpPath = `${this.#filePath}.tmp`;
    await fs.writeFile(tmpPath, contents, { mode: FILE_MODE });
    await fs.rename(tmpPath, this.#filePath);
  }
}

// Accepts `{ repos: [...] }` and a bare array; entries without a name are dropped.
function readRepos(parsed: unknown): RepoDescriptor[] {
  let entries: unknown = Array.isArray(parsed) ? parsed : asRecord(parsed).repos;
  if (!Array.isArray(entries)) return [];
  return entries.filter(isRepoDescriptor);
}

function isRepoDescriptor(value: unknown): value is RepoDescriptor {
  return typeof asRecord(value).name === 'string';
}

function copyRepo(repo: RepoDescriptor): RepoDescriptor {
  return { ...repo, topics: [...repo.topics] };
}
