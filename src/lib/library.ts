import { CONTRIBUTOR_SEPARATOR, CONTRIBUTORS_FALLBACK, ITEM_DEFAULTS } from './constants';
import type { Logger } from './logger';
import type { AudibleLibraryItem, AudibleLibraryResponse, ExportRecord, Fallible, RuntimeValue } from './types';

const RUNTIME_FALLBACK: RuntimeValue = { minutes: 0, formatted: '0:00' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits a runtime in whole minutes into `H:MM`. Anything that is not a
 * non-negative integer falls back to zero.
 */
export function convertRuntime(minutes: unknown): Fallible<RuntimeValue> {
  if (typeof minutes !== 'number' || !Number.isInteger(minutes) || minutes < 0) {
    return { ok: false, value: RUNTIME_FALLBACK, error: `Invalid runtime value: ${String(minutes)}` };
  }

  const hours = Math.floor(minutes / 60);
  const remainder = String(minutes % 60).padStart(2, '0');
  return { ok: true, value: { minutes, formatted: `${hours}:${remainder}` } };
}

/**
 * Joins contributor names with `;` in input order. A single malformed entry
 * discards the whole list.
 */
export function joinContributorNames(contributors: unknown): Fallible<string> {
  if (!Array.isArray(contributors)) {
    return { ok: false, value: CONTRIBUTORS_FALLBACK, error: `Contributors are not a list: ${String(contributors)}` };
  }

  const names: string[] = [];
  for (const [index, contributor] of contributors.entries()) {
    if (!isRecord(contributor) || typeof contributor.name !== 'string') {
      return { ok: false, value: CONTRIBUTORS_FALLBACK, error: `Contributor at index ${index} has no name` };
    }
    names.push(contributor.name);
  }

  return { ok: true, value: names.join(CONTRIBUTOR_SEPARATOR) };
}

// Only absent keys take the default; an explicit null is kept.
function orDefault(value: unknown, fallback: unknown): unknown {
  return value === undefined ? fallback : value;
}

function textOrDefault(value: unknown, fallback: string): string {
  if (value === undefined) return fallback;
  if (value === null) return '';
  return typeof value === 'string' ? value : String(value);
}

function unwrap<T>(result: Fallible<T>, logger: Logger, message: string, fields: Record<string, unknown>): T {
  if (!result.ok) {
    logger.error(`${message}: ${result.error}`, fields);
  }
  return result.value;
}

export function toExportRecord(item: AudibleLibraryItem, logger: Logger): ExportRecord {
  const context = { asin: item.asin };
  const authors = unwrap(joinContributorNames(orDefault(item.authors, [])), logger, 'Error retrieving contributors', context);
  const narrators = unwrap(joinContributorNames(orDefault(item.narrators, [])), logger, 'Error retrieving contributors', context);
  const runtime = unwrap(convertRuntime(orDefault(item.runtime_length_min, 0)), logger, 'Error converting runtime', context);

  return {
    authors,
    title: textOrDefault(item.title, ITEM_DEFAULTS.TITLE),
    narrators,
    runtimeMinutes: runtime.minutes,
    runtimeFormatted: runtime.formatted,
    released: textOrDefault(item.release_date, ITEM_DEFAULTS.RELEASE_DATE),
    purchased: textOrDefault(item.purchase_date, ITEM_DEFAULTS.PURCHASE_DATE)
  };
}

export function toExportRecords(response: AudibleLibraryResponse, logger: Logger): ExportRecord[] {
  const items: unknown[] = Array.isArray(response.items) ? response.items : [];
  return items.map((item, index) => {
    if (isRecord(item)) return toExportRecord(item, logger);
    // Keep one row per item so the CSV still lines up with the API order.
    logger.error(`Library item at index ${index} is not an object: ${String(item)}`, { index });
    return toExportRecord({}, logger);
  });
}
