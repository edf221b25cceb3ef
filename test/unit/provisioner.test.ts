import { mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthenticationError,
  credentialFileExists,
  loadCredential,
  provisionCredential,
  StorageError,
  ValidationError,
  type Credential,
  type Prompt
} from '@shared';

const CREDENTIAL: Credential = {
  localeCode: 'us',
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: 1_760_000_000_000,
  adpToken: 'test-adp',
  devicePrivateKey: 'test-key',
  deviceSerial: 'SERIAL',
  websiteCookies: []
};

function createPrompt(username: string, password: string): Prompt {
  return {
    ask: vi.fn(async () => username),
    askHidden: vi.fn(async () => password),
    close: vi.fn()
  };
}

describe('provisionCredential', () => {
  let workDir: string;
  let authFile: string;
  const output = { log: vi.fn() };
  const login = vi.fn<(username: string, password: string, locale: string) => Promise<Credential>>();

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'provision-'));
    authFile = path.join(workDir, 'auth', 'audible_auth.txt');
    output.log.mockReset();
    login.mockReset();
    login.mockResolvedValue(CREDENTIAL);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it.each([
    ['   ', 'test-password'],
    ['listener@example.com', '  '],
    ['', '']
  ])('rejects blank input (%j, %j) without logging in', async (username, password) => {
    await expect(
      provisionCredential({ prompt: createPrompt(username, password), authenticator: { login }, authFile, locale: 'us', output })
    ).rejects.toBeInstanceOf(ValidationError);

    expect(login).not.toHaveBeenCalled();
    expect(output.log).toHaveBeenCalledWith('Username and password cannot be empty.');
    expect(await credentialFileExists(authFile)).toBe(false);
  });

  it('reports input that ends before the password without logging in', async () => {
    const prompt: Prompt = {
      ask: vi.fn(async () => 'listener@example.com'),
      askHidden: vi.fn(async () => {
        throw new ValidationError('Input ended before an answer was given');
      }),
      close: vi.fn()
    };

    await expect(
      provisionCredential({ prompt, authenticator: { login }, authFile, locale: 'us', output })
    ).rejects.toBeInstanceOf(ValidationError);

    expect(output.log).toHaveBeenCalledWith('Input ended before an answer was given');
    expect(login).not.toHaveBeenCalled();
    expect(await credentialFileExists(authFile)).toBe(false);
  });

  it('logs in with trimmed input and saves the credential', async () => {
    const prompt = createPrompt(' listener@example.com ', ' test-password\n');

    await provisionCredential({ prompt, authenticator: { login }, authFile, locale: 'uk', output });

    expect(prompt.ask).toHaveBeenCalledWith('User: ');
    expect(prompt.askHidden).toHaveBeenCalledWith('Password: ');
    expect(login).toHaveBeenCalledWith('listener@example.com', 'test-password', 'uk');
    expect(await loadCredential(authFile)).toEqual(CREDENTIAL);
    expect(output.log).toHaveBeenCalledWith(`Authentication details saved to ${authFile}`);

    if (process.platform !== 'win32') {
      expect((await stat(authFile)).mode & 0o777).toBe(0o600);
    }
  });

  it('reports authentication failures and writes nothing', async () => {
    login.mockRejectedValueOnce(new AuthenticationError('Amazon rejected the username or password'));

    await expect(
      provisionCredential({ prompt: createPrompt('user', 'test-password'), authenticator: { login }, authFile, locale: 'us', output })
    ).rejects.toBeInstanceOf(AuthenticationError);

    expect(output.log).toHaveBeenCalledWith('Authentication failed: Amazon rejected the username or password');
    expect(await credentialFileExists(authFile)).toBe(false);
  });

  it('reports write failures as storage errors', async () => {
    // A directory where the file should go makes the write fail.
    const blocked = path.join(workDir, 'blocked');
    await provisionCredential({ prompt: createPrompt('user', 'test-password'), authenticator: { login }, authFile: path.join(blocked, 'x'), locale: 'us', output });

    await expect(
      provisionCredential({ prompt: createPrompt('user', 'test-password'), authenticator: { login }, authFile: blocked, locale: 'us', output })
    ).rejects.toBeInstanceOf(StorageError);
    expect(output.log).toHaveBeenLastCalledWith(expect.stringMatching(/^Failed to write authentication file: /));
  });
});
