export type LocaleCode = 'us' | 'ca' | 'uk' | 'au' | 'in' | 'de' | 'fr' | 'it' | 'es' | 'jp' | 'br';

export interface AudibleLocale {
  code: LocaleCode;
  domain: string;
  marketplaceId: string;
  countryCode: string;
}

export interface WebsiteCookie {
  name: string;
  value: string;
}

export interface Credential {
  localeCode: LocaleCode;
  accessToken: string;
  refreshToken: string;
  /** Epoch milliseconds after which the access token must be refreshed. */
  expiresAt: number;
  adpToken: string;
  devicePrivateKey: string;
  deviceSerial: string;
  customerName?: string;
  websiteCookies: WebsiteCookie[];
}

export interface AudibleContributor {
  name?: unknown;
  asin?: string;
}

// Fields come straight from the API and are not trusted.
export interface AudibleLibraryItem {
  asin?: unknown;
  title?: unknown;
  authors?: unknown;
  narrators?: unknown;
  runtime_length_min?: unknown;
  release_date?: unknown;
  purchase_date?: unknown;
  [key: string]: unknown;
}

export interface AudibleLibraryResponse {
  items?: unknown[];
  response_groups?: string[];
}

export interface LibraryQuery {
  numResults: number;
  responseGroups: readonly string[];
  sortBy: string;
}

export interface RuntimeValue {
  minutes: number;
  formatted: string;
}

export interface ExportRecord {
  authors: string;
  title: string;
  narrators: string;
  runtimeMinutes: number;
  runtimeFormatted: string;
  released: string;
  purchased: string;
}

export type Fallible<T> = { ok: true; value: T } | { ok: false; value: T; error: string };
