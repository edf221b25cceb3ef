import type { LibraryClient } from './audibleApi';
import { LIBRARY_NUM_RESULTS, LIBRARY_RESPONSE_GROUPS, LIBRARY_SORT_BY } from './constants';
import { credentialFileExists, loadCredential } from './credentials';
import { ApiError, AuthenticationError, StorageError, describeError } from './errors';
import { toExportRecords } from './library';
import { writeLibraryCsv } from './libraryCsv';
import type { Logger } from './logger';
import type { AudibleLibraryResponse, Credential } from './types';

export interface ExportOptions {
  authFile: string;
  outputFile: string;
  logger: Logger;
  createClient: (credential: Credential) => LibraryClient;
}

export async function exportLibrary(options: ExportOptions): Promise<number> {
  const { authFile, outputFile, logger } = options;
  logger.info('Starting Audible library retrieval.');

  if (!(await credentialFileExists(authFile))) {
    logger.error(`Authentication file not found at ${authFile}`);
    throw new AuthenticationError(`Authentication file not found at ${authFile}`);
  }

  let credential: Credential;
  try {
    credential = await loadCredential(authFile);
  } catch (error) {
    logger.error(`Failed to authenticate: ${describeError(error)}`);
    throw error instanceof AuthenticationError ? error : new AuthenticationError(describeError(error), { cause: error });
  }

  let library: AudibleLibraryResponse;
  try {
    const client = options.createClient(credential);
    library = await client.getLibrary({
      numResults: LIBRARY_NUM_RESULTS,
      responseGroups: LIBRARY_RESPONSE_GROUPS,
      sortBy: LIBRARY_SORT_BY
    });
  } catch (error) {
    logger.error(`API request failed: ${describeError(error)}`);
    throw error instanceof ApiError || error instanceof AuthenticationError
      ? error
      : new ApiError(describeError(error), undefined, { cause: error });
  }

  const records = toExportRecords(library, logger);

  try {
    await writeLibraryCsv(outputFile, records);
  } catch (error) {
    logger.error(`Failed to write CSV file: ${describeError(error)}`);
    throw new StorageError(describeError(error), { cause: error });
  }
  logger.info(`Library data written to ${outputFile}`, { records: records.length });

  logger.info('Audible library retrieval completed successfully.');
  return records.length;
}
