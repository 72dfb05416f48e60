// Content operations the reconciler needs from a remote repository.
// Production code wires this to GitHub (see ../github/content-gateway.ts);
// tests substitute an in-memory implementation.

export type { RepoGateway, RemoteFile, DirectoryItem, RemoteBlob };
export { RateLimitError, FaultError };

type RemoteFile = {
  path: string;
  content: Uint8Array;
  // blob sha, required as the optimistic-concurrency token for updates
  sha: string;
};

type DirectoryItem = { path: string; sha: string };

// base-64, possibly wrapped with newlines
type RemoteBlob = { content: string };

type RepoGateway = {
  getFile(path: string, branch: string): Promise<RemoteFile>;
  updateFile(path: string, content: Uint8Array, message: string, sha: string, branch: string): Promise<void>;
  createFile(path: string, content: Uint8Array, message: string, branch: string): Promise<void>;
  listDirectory(path: string, branch: string): Promise<DirectoryItem[]>;
  fetchBlob(sha: string): Promise<RemoteBlob>;
};

class RateLimitError extends Error {
  resetSeconds: number;
  constructor(resetSeconds: number) {
    super(`rate limited, resets in ${resetSeconds}s`);
    this.name = 'RateLimitError';
    this.resetSeconds = resetSeconds;
  }
}

class FaultError extends Error {
  status: number;
  code: string | undefined;
  constructor(status: number, message: string, code?: string) {
    super(message);
    this.name = 'FaultError';
    this.status = status;
    this.code = code;
  }
}
