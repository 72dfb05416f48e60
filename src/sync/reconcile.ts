// Idempotent create-or-update of a single file in a remote repository.
//
// The remote file is compared with the desired bytes (both trimmed of
// surrounding tabs/spaces) and written only when they really differ. Files too
// large for the contents endpoint are compared through their git blob instead.
// Writes are best effort: a failed write is reported in the outcome and left
// for the next periodic run to correct.
import { bytesEqual, decodeBase64Lines, trimBytes } from '../lib/bytes.ts';
import { DEFAULT_DIFF_POLICIES, isSpuriousDiff, type DiffPolicy } from '../lib/diff-policy.ts';
import { getErrorMessage, logError } from '../lib/logging.ts';
import { parentPath, sleep, stripLeadingSlash } from '../lib/util.ts';
import { FaultError, RateLimitError, type RemoteFile, type RepoGateway } from './gateway.ts';

export type { ReconcileOutcome, ReconcileOptions, CommitVerb };
export { reconcileFile, createOrUpdateFile, commitMessage };

type ReconcileOutcome =
  | { kind: 'unchanged'; reason: 'equal' | 'spurious' }
  | { kind: 'updated'; via: 'contents' | 'blob'; error?: unknown }
  | { kind: 'created'; error?: unknown }
  | { kind: 'rate-limited'; waitedMs: number }
  // too large for the contents API and absent from its directory listing
  | { kind: 'skipped' };

type ReconcileOptions = {
  policies?: readonly DiffPolicy[];
};

type CommitVerb = 'Updating' | 'Creating';

const RATE_LIMIT_GRACE_SECONDS = 5;
const LOG_PREFIX = '[github content]';

function commitMessage(verb: CommitVerb, path: string): string {
  return `${verb} file content ${path} programatically\n\nThis is done from the cio repo utils::create_or_update_file function.`;
}

async function reconcileFile(
  gateway: RepoGateway,
  branch: string,
  path: string,
  desired: Uint8Array,
  options: ReconcileOptions = {}
): Promise<ReconcileOutcome> {
  let policies = options.policies ?? DEFAULT_DIFF_POLICIES;
  let content = trimBytes(desired);

  let current: RemoteFile;
  try {
    current = await gateway.getFile(path, branch);
  } catch (error) {
    if (error instanceof RateLimitError) {
      return await waitOutRateLimit(error);
    }
    if (error instanceof FaultError && error.message.includes('too_large')) {
      return await reconcileViaBlob(gateway, branch, path, content);
    }
    // Anything else is treated as "missing", including transient server errors.
    console.log(`${LOG_PREFIX} Getting the file at ${path} failed: ${getErrorMessage(error)}`);
    let writeError = await attempt(() => gateway.createFile(path, content, commitMessage('Creating', path), branch));
    console.log(`${LOG_PREFIX} Created file at ${path}`);
    return { kind: 'created', error: writeError };
  }

  let remote = trimBytes(current.content);
  if (bytesEqual(content, remote)) {
    logUnchanged(path);
    return { kind: 'unchanged', reason: 'equal' };
  }
  if (isSpuriousDiff(remote, content, policies)) {
    logUnchanged(path);
    return { kind: 'unchanged', reason: 'spurious' };
  }

  let sha = current.sha;
  let writeError = await attempt(() => gateway.updateFile(path, content, commitMessage('Updating', path), sha, branch));
  console.log(`${LOG_PREFIX} Updated file at ${path}`);
  return { kind: 'updated', via: 'contents', error: writeError };
}

/**
 * Same as `reconcileFile`, but never throws and drops write errors. Meant for
 * jobs that run periodically and converge on a later run.
 */
async function createOrUpdateFile(
  gateway: RepoGateway,
  branch: string,
  path: string,
  desired: Uint8Array,
  options?: ReconcileOptions
): Promise<void> {
  try {
    await reconcileFile(gateway, branch, path, desired, options);
  } catch (error) {
    logError(`${LOG_PREFIX} Reconciling the file at ${path} failed:`, error);
  }
}

async function waitOutRateLimit(error: RateLimitError): Promise<ReconcileOutcome> {
  console.log(`got rate limited, sleeping for ${error.resetSeconds}s`);
  let waitedMs = (error.resetSeconds + RATE_LIMIT_GRACE_SECONDS) * 1000;
  await sleep(waitedMs);
  return { kind: 'rate-limited', waitedMs };
}

// The contents API refuses files over 1MB but the git data API serves their
// blob, so look the sha up in the parent directory listing.
async function reconcileViaBlob(
  gateway: RepoGateway,
  branch: string,
  path: string,
  content: Uint8Array
): Promise<ReconcileOutcome> {
  let target = stripLeadingSlash(path);
  let items = await gateway.listDirectory(parentPath(path), branch);
  for (let item of items) {
    if (item.path !== target) continue;

    let blob = await gateway.fetchBlob(item.sha);
    let remote = trimBytes(decodeBase64Lines(blob.content));
    if (bytesEqual(content, remote)) {
      logUnchanged(path);
      return { kind: 'unchanged', reason: 'equal' };
    }

    let writeError = await attempt(() =>
      gateway.updateFile(path, content, commitMessage('Updating', path), item.sha, branch)
    );
    console.log(`${LOG_PREFIX} Updated file at ${path}`);
    return { kind: 'updated', via: 'blob', error: writeError };
  }
  return { kind: 'skipped' };
}

function logUnchanged(path: string): void {
  console.log(`${LOG_PREFIX} File contents at ${path} are the same, no update needed`);
}

async function attempt(write: () => Promise<void>): Promise<unknown> {
  try {
    await write();
    return undefined;
  } catch (error) {
    return error;
  }
}
