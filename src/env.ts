// Environment loader. Build the record once at startup and pass it down.
// Load .env from project root when running locally
import 'dotenv/config';
import crypto from 'node:crypto';
import path from 'node:path';
import { getErrorMessage } from './lib/logging.ts';

type GitHubCredentials =
  | { mode: 'token'; token: string }
  | { mode: 'app'; appId: number; installationId: number; privateKey: string };

type GSuiteEnv = {
  subject: string;
  // either may be empty, not both
  credentialFile: string;
  keyEncoded: string;
};

type GitHubEnv = {
  HOME: string;
  GITHUB_ORG: string;
  GITHUB_CACHE_DIR: string;
  github: GitHubCredentials;
};

type Env = GitHubEnv & {
  gsuite: GSuiteEnv | undefined;
};

export function getEnv(): Env {
  let env: Env = {
    ...getGitHubEnv(),
    gsuite: process.env.GADMIN_SUBJECT ? getGSuiteEnv() : undefined,
  };
  return env;
}

export function getGitHubEnv(): GitHubEnv {
  const HOME = must('HOME');
  return {
    HOME,
    GITHUB_ORG: must('GITHUB_ORG'),
    GITHUB_CACHE_DIR: path.join(HOME, '.cache', 'github'),
    github: process.env.GH_APP_ID ? getAppCredentials() : { mode: 'token', token: must('GITHUB_TOKEN') },
  };
}

export function getGSuiteEnv(): GSuiteEnv {
  const subject = must('GADMIN_SUBJECT');
  const credentialFile = process.env.GADMIN_CREDENTIAL_FILE ?? '';
  const keyEncoded = process.env.GSUITE_KEY_ENCODED ?? '';
  if (credentialFile === '' && keyEncoded === '') {
    throw new Error('Missing required env GADMIN_CREDENTIAL_FILE or GSUITE_KEY_ENCODED');
  }
  return { subject, credentialFile, keyEncoded };
}

function getAppCredentials(): GitHubCredentials {
  const appId = mustInteger('GH_APP_ID');
  const installationId = mustInteger('GH_INSTALLATION_ID');
  const privateKey = normalizePrivateKey(must('GH_PRIVATE_KEY'));
  return { mode: 'app', appId, installationId, privateKey };
}

function must(name: string): string {
  const v = process.env[name];
  if (!v) throw new Error(`Missing required env ${name}`);
  return v;
}

function mustInteger(name: string): number {
  const raw = must(name).trim();
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
    throw new Error(`${name} must be an integer`);
  }
  return value;
}

// GH_PRIVATE_KEY carries the app's PEM base64-encoded so it fits on one line.
// A raw PEM is taken as is; PKCS#1 RSA keys are rewritten as PKCS#8 for jose.
export function normalizePrivateKey(raw: string): string {
  let value = raw.trim();
  if (value === '') throw new Error('GH_PRIVATE_KEY must not be empty');

  let pem = value.includes('-----BEGIN') ? value : Buffer.from(value, 'base64').toString('utf8').trim();
  let label = /-----BEGIN ([A-Z ]+)-----/.exec(pem)?.[1];
  if (label === undefined) {
    throw new Error('GH_PRIVATE_KEY must hold a base64-encoded PEM private key');
  }
  if (label === 'PRIVATE KEY') return `${pem}\n`;
  if (label !== 'RSA PRIVATE KEY') {
    throw new Error(`GH_PRIVATE_KEY holds a ${label}, expected an RSA or PKCS#8 private key`);
  }
  return rsaToPkcs8(pem);
}

function rsaToPkcs8(pem: string): string {
  let exported: string | Buffer;
  try {
    exported = crypto.createPrivateKey({ key: pem, format: 'pem' }).export({ format: 'pem', type: 'pkcs8' });
  } catch (error) {
    throw new Error(`GH_PRIVATE_KEY is not a readable RSA key: ${getErrorMessage(error)}`);
  }
  let text = typeof exported === 'string' ? exported : exported.toString('utf8');
  return `${text.trim()}\n`;
}

export type { Env, GitHubEnv, GSuiteEnv, GitHubCredentials };
