// On-disk ETag cache for GitHub API requests.
//
// GET responses carrying an ETag are stored as JSON files under the cache
// directory. Later requests for the same URL send If-None-Match; GitHub answers
// 304 (which does not count against the rate limit) and the stored body is
// replayed as a 200. Meant for a single writer per directory.
import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { logError } from '../lib/logging.ts';

export { createCachingFetch };

type CachedResponse = {
  url: string;
  etag: string;
  headers: Record<string, string>;
  // base64 so binary payloads survive the round trip
  body: string;
};

const FILE_MODE = 0o600;
const DROPPED_HEADERS = new Set(['content-encoding', 'content-length', 'transfer-encoding']);

function createCachingFetch(cacheDir: string, upstream?: typeof fetch): typeof fetch {
  let dirPath = path.resolve(cacheDir);

  return async function cachingFetch(input: Parameters<typeof fetch>[0], init?: RequestInit): Promise<Response> {
    let send = upstream ?? fetch;
    let method = init?.method ?? (input instanceof Request ? input.method : 'GET');
    if (method.toUpperCase() !== 'GET') {
      return await send(input, init);
    }
    let request = new Request(input, init);

    let filePath = path.join(dirPath, `${cacheKey(request)}.json`);
    let cached = await readEntry(filePath).catch((error: unknown) => {
      logError(`[http cache] cannot read ${filePath}, fetching without it`, error);
      return null;
    });
    if (cached) {
      request.headers.set('If-None-Match', cached.etag);
    }

    let response = await send(request);
    if (response.status === 304 && cached) {
      return new Response(new Uint8Array(Buffer.from(cached.body, 'base64')), { status: 200, headers: cached.headers });
    }

    let etag = response.headers.get('etag');
    if (response.status === 200 && etag) {
      let body = Buffer.from(await response.clone().arrayBuffer()).toString('base64');
      let headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        if (!DROPPED_HEADERS.has(key.toLowerCase())) headers[key] = value;
      });
      try {
        await writeEntry(dirPath, filePath, { url: request.url, etag, headers, body });
      } catch (error) {
        // the response is still good; only the next revalidation is lost
        logError(`[http cache] cannot store ${filePath}`, error);
      }
    }
    return response;
  };
}

function cacheKey(request: Request): string {
  let accept = request.headers.get('accept') ?? '';
  return crypto.createHash('sha256').update(`GET ${request.url}\n${accept}`).digest('hex');
}

async function readEntry(filePath: string): Promise<CachedResponse | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw error;
  }
  try {
    let parsed = JSON.parse(raw) as Partial<CachedResponse>;
    if (typeof parsed.etag !== 'string' || typeof parsed.body !== 'string') return null;
    return {
      url: String(parsed.url ?? ''),
      etag: parsed.etag,
      headers: parsed.headers ?? {},
      body: parsed.body,
    };
  } catch (error) {
    // a torn write only costs a refetch
    logError(`[http cache] ignoring unreadable entry ${filePath}`, error);
    return null;
  }
}

async function writeEntry(dirPath: string, filePath: string, entry: CachedResponse): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
  let tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(entry), { mode: FILE_MODE });
  await fs.rename(tmpPath, filePath);
}
