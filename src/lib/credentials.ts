import { chmod, mkdir, readFile, stat, writeFile } from 'fs/promises';
import path from 'path';
import { AuthenticationError } from './errors';
import { isLocaleCode } from './locales';
import type { Credential, WebsiteCookie } from './types';

export const CREDENTIAL_FILE_MODE = 0o600;

/** Windows ignores POSIX mode bits beyond the read-only flag. */
export function supportsPosixPermissions(platform: NodeJS.Platform = process.platform): boolean {
  return platform !== 'win32';
}

export async function credentialFileExists(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function saveCredential(
  filePath: string,
  credential: Credential,
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(credential, null, 2), { encoding: 'utf8', mode: CREDENTIAL_FILE_MODE });

  // writeFile only applies the mode to new files.
  if (supportsPosixPermissions(platform)) {
    await chmod(filePath, CREDENTIAL_FILE_MODE);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWebsiteCookie(value: unknown): value is WebsiteCookie {
  return isRecord(value) && typeof value.name === 'string' && typeof value.value === 'string';
}

function requireString(record: Record<string, unknown>, key: keyof Credential): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new AuthenticationError(`Credential file is missing "${key}"`);
  }
  return value;
}

export function parseCredential(contents: string): Credential {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new AuthenticationError('Credential file is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new AuthenticationError('Credential file does not contain an object');
  }

  const localeCode = requireString(parsed, 'localeCode');
  if (!isLocaleCode(localeCode)) {
    throw new AuthenticationError(`Credential file has an unknown locale: ${localeCode}`);
  }

  const expiresAt = parsed.expiresAt;
  if (typeof expiresAt !== 'number' || !Number.isFinite(expiresAt)) {
    throw new AuthenticationError('Credential file is missing "expiresAt"');
  }

  const cookies = Array.isArray(parsed.websiteCookies) ? parsed.websiteCookies.filter(isWebsiteCookie) : [];

  return {
    localeCode,
    accessToken: requireString(parsed, 'accessToken'),
    refreshToken: requireString(parsed, 'refreshToken'),
    expiresAt,
    adpToken: requireString(parsed, 'adpToken'),
    devicePrivateKey: requireString(parsed, 'devicePrivateKey'),
    deviceSerial: requireString(parsed, 'deviceSerial'),
    customerName: typeof parsed.customerName === 'string' ? parsed.customerName : undefined,
    websiteCookies: cookies
  };
}

export async function loadCredential(filePath: string): Promise<Credential> {
  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new AuthenticationError(`Unable to read credential file ${filePath}`, { cause: error });
  }
  return parseCredential(contents);
}
