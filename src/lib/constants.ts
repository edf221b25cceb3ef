export const ENV_VARS = {
  AUTH_FILE: 'AUDIBLE_AUTH_FILE',
  OUTPUT_FILE: 'AUDIBLE_OUTPUT_FILE',
  LOG_FILE: 'AUDIBLE_LOG_FILE',
  LOCALE: 'AUDIBLE_LOCALE'
} as const;

export const DEFAULT_AUTH_FILE = 'auth/audible_auth.txt';
export const DEFAULT_OUTPUT_FILE = 'data/library.csv';
export const DEFAULT_LOG_FILE = 'audibleLibrary.log';
export const DEFAULT_LOCALE = 'us';

export const LIBRARY_NUM_RESULTS = 1000;
export const LIBRARY_RESPONSE_GROUPS = ['product_desc', 'product_attrs', 'contributors'] as const;
export const LIBRARY_SORT_BY = 'Author';

export const ITEM_DEFAULTS = {
  TITLE: 'Unknown Title',
  PURCHASE_DATE: 'Unknown Purchase Date',
  RELEASE_DATE: 'Unknown Release Date'
} as const;

export const CONTRIBUTORS_FALLBACK = 'N/A';
export const CONTRIBUTOR_SEPARATOR = ';';

export const AUDIBLE_APP = {
  NAME: 'Audible',
  VERSION: '3.56.2',
  SOFTWARE_VERSION: '35602678',
  DEVICE_TYPE: 'A2CZJZGLK2JJVM',
  DEVICE_MODEL: 'iPhone',
  OS_VERSION: '15.0.0',
  USER_AGENT:
    'Mozilla/5.0 (iPhone; CPU iPhone OS 15_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Mobile/15E148'
} as const;
