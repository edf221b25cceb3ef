import {
  AppError,
  AudibleAuthenticator,
  createPrompt,
  describeError,
  loadConfig,
  provisionCredential,
  resolveLocale,
  type AudibleLocale
} from '@shared';

async function main() {
  const config = loadConfig();

  let locale: AudibleLocale;
  try {
    locale = resolveLocale(config.locale);
  } catch (error) {
    console.log(describeError(error));
    throw error;
  }

  const prompt = createPrompt();
  try {
    await provisionCredential({
      prompt,
      authenticator: new AudibleAuthenticator(),
      authFile: config.authFile,
      locale: locale.code
    });
  } finally {
    prompt.close();
  }
}

main().catch((error) => {
  // Flow errors were already reported to the user.
  if (!(error instanceof AppError)) {
    console.error(error);
  }
  process.exitCode = 1;
});
