import type { Authenticator } from './audibleAuth';
import { saveCredential } from './credentials';
import { AuthenticationError, StorageError, ValidationError, describeError } from './errors';
import type { Prompt } from './prompt';
import type { Credential } from './types';

export interface ProvisionOptions {
  prompt: Prompt;
  authenticator: Authenticator;
  authFile: string;
  locale: string;
  platform?: NodeJS.Platform;
  output?: Pick<Console, 'log'>;
}

export async function provisionCredential(options: ProvisionOptions): Promise<void> {
  const output = options.output ?? console;

  let username: string;
  let password: string;
  try {
    username = (await options.prompt.ask('User: ')).trim();
    password = (await options.prompt.askHidden('Password: ')).trim();
  } catch (error) {
    output.log(describeError(error));
    throw error instanceof ValidationError ? error : new ValidationError(describeError(error), { cause: error });
  }

  if (!username || !password) {
    output.log('Username and password cannot be empty.');
    throw new ValidationError('Username and password cannot be empty.');
  }

  let credential: Credential;
  try {
    credential = await options.authenticator.login(username, password, options.locale);
  } catch (error) {
    output.log(`Authentication failed: ${describeError(error)}`);
    throw error instanceof AuthenticationError
      ? error
      : new AuthenticationError(describeError(error), { cause: error });
  }

  try {
    await saveCredential(options.authFile, credential, options.platform);
  } catch (error) {
    output.log(`Failed to write authentication file: ${describeError(error)}`);
    throw new StorageError(describeError(error), { cause: error });
  }

  output.log(`Authentication details saved to ${options.authFile}`);
}
