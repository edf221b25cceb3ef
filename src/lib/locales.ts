import { ValidationError } from './errors';
import type { AudibleLocale, LocaleCode } from './types';

const LOCALES: Record<LocaleCode, AudibleLocale> = {
  us: { code: 'us', domain: 'com', marketplaceId: 'AF2M0KC94RCEA', countryCode: 'us' },
  ca: { code: 'ca', domain: 'ca', marketplaceId: 'A2CQZ5RBY40XE', countryCode: 'ca' },
  uk: { code: 'uk', domain: 'co.uk', marketplaceId: 'A2I9A3Q2GNFNGQ', countryCode: 'uk' },
  au: { code: 'au', domain: 'com.au', marketplaceId: 'AN7EY7DTAW63G', countryCode: 'au' },
  in: { code: 'in', domain: 'in', marketplaceId: 'AJO3FBRUE6J4S', countryCode: 'in' },
  de: { code: 'de', domain: 'de', marketplaceId: 'AN7V1F1VY261K', countryCode: 'de' },
  fr: { code: 'fr', domain: 'fr', marketplaceId: 'A2728XDNODOQ8T', countryCode: 'fr' },
  it: { code: 'it', domain: 'it', marketplaceId: 'A2N7FU2W2BU2ZC', countryCode: 'it' },
  es: { code: 'es', domain: 'es', marketplaceId: 'ALMIKO4SZCSAR', countryCode: 'es' },
  jp: { code: 'jp', domain: 'co.jp', marketplaceId: 'A1QAP3MOU4173J', countryCode: 'jp' },
  br: { code: 'br', domain: 'com.br', marketplaceId: 'A10J1VAYUDTYRN', countryCode: 'br' }
};

export function isLocaleCode(value: string): value is LocaleCode {
  return Object.prototype.hasOwnProperty.call(LOCALES, value);
}

export function resolveLocale(code: string): AudibleLocale {
  const normalized = code.trim().toLowerCase();
  if (!isLocaleCode(normalized)) {
    throw new ValidationError(`Unsupported Audible locale: ${code}`);
  }
  return LOCALES[normalized];
}
