// Google Workspace access tokens for a service account impersonating an admin.
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SignJWT, importPKCS8 } from 'jose';
import type { GSuiteEnv } from '../env.ts';
import { getErrorMessage } from '../lib/logging.ts';
import { asRecord } from '../lib/util.ts';

export type { GSuiteToken, ServiceAccountKey };
export { getGSuiteToken, readServiceAccountKey, GSUITE_SCOPES, GSUITE_KEY_FILE_NAME };

type GSuiteToken = {
  accessToken: string;
  expiresAt: number;
};

type ServiceAccountKey = {
  clientEmail: string;
  privateKey: string;
  privateKeyId: string | undefined;
  tokenUri: string;
};

const GSUITE_SCOPES = [
  'https://www.googleapis.com/auth/admin.directory.group',
  'https://www.googleapis.com/auth/admin.directory.resource.calendar',
  'https://www.googleapis.com/auth/admin.directory.user',
  'https://www.googleapis.com/auth/apps.groups.settings',
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
] as const;

const GSUITE_KEY_FILE_NAME = 'gsuite_key.json';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
const ASSERTION_TTL_SECONDS = 60 * 60;
const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';

/**
 * Exchange a signed service-account assertion for an access token. Any
 * failure, including an empty token, is thrown: without a token nothing
 * downstream can run.
 */
async function getGSuiteToken(env: GSuiteEnv): Promise<GSuiteToken> {
  let credentialFile = env.credentialFile;
  if (credentialFile === '') {
    credentialFile = await materializeEncodedKey(env.keyEncoded);
  }
  let key = await readServiceAccountKey(credentialFile);

  let now = Math.floor(Date.now() / 1000);
  let signingKey = await importPKCS8(key.privateKey, 'RS256');
  let assertion = await new SignJWT({ scope: GSUITE_SCOPES.join(' ') })
    .setProtectedHeader(key.privateKeyId ? { alg: 'RS256', typ: 'JWT', kid: key.privateKeyId } : { alg: 'RS256', typ: 'JWT' })
    .setIssuer(key.clientEmail)
    .setSubject(env.subject)
    .setAudience(key.tokenUri)
    .setIssuedAt(now)
    .setExpirationTime(now + ASSERTION_TTL_SECONDS)
    .sign(signingKey);

  let res = await fetch(key.tokenUri, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({ grant_type: JWT_BEARER_GRANT, assertion }).toString(),
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`failed to get gsuite token (${res.status}): ${text}`);
  }
  const json = asRecord(await res.json());
  let accessToken = typeof json.access_token === 'string' ? json.access_token : '';
  if (accessToken === '') {
    throw new Error('empty token is not valid');
  }
  let expiresIn = typeof json.expires_in === 'number' ? json.expires_in : ASSERTION_TTL_SECONDS;
  return { accessToken, expiresAt: (now + expiresIn) * 1000 };
}

// The file is left behind in the temp directory; the next run overwrites it.
async function materializeEncodedKey(keyEncoded: string): Promise<string> {
  let decoded = Buffer.from(keyEncoded, 'base64');
  if (decoded.length === 0) throw new Error('GSUITE_KEY_ENCODED must be base64-encoded JSON');
  let filePath = path.join(os.tmpdir(), GSUITE_KEY_FILE_NAME);
  await fs.writeFile(filePath, decoded, { mode: 0o600 });
  return filePath;
}

async function readServiceAccountKey(filePath: string): Promise<ServiceAccountKey> {
  let raw = await fs.readFile(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`failed to read gsuite credential file ${filePath}: ${getErrorMessage(error)}`);
  }
  let record = asRecord(parsed);
  let clientEmail = record.client_email;
  let privateKey = record.private_key;
  if (typeof clientEmail !== 'string' || typeof privateKey !== 'string') {
    throw new Error(`gsuite credential file ${filePath} is missing client_email or private_key`);
  }
  return {
    clientEmail,
    privateKey,
    privateKeyId: typeof record.private_key_id === 'string' ? record.private_key_id : undefined,
    tokenUri: typeof record.token_uri === 'string' ? record.token_uri : DEFAULT_TOKEN_URI,
  };
}
