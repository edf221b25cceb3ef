import { AppError, AudibleApiClient, createLogger, exportLibrary, loadConfig } from '@shared';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ filePath: config.logFile });

  try {
    await exportLibrary({
      authFile: config.authFile,
      outputFile: config.outputFile,
      logger,
      createClient: (credential) => new AudibleApiClient(credential)
    });
  } catch (error) {
    if (!(error instanceof AppError)) {
      logger.error('Unexpected failure during export', { error });
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
