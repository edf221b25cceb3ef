import { createHash, randomBytes, randomUUID } from 'crypto';
import { CookieJar } from 'tough-cookie';
import { fetch } from 'undici';
import { AUDIBLE_APP } from './constants';
import { AuthenticationError, describeError } from './errors';
import { resolveLocale } from './locales';
import type { AudibleLocale, Credential, WebsiteCookie } from './types';

export interface Authenticator {
  login(username: string, password: string, localeCode: string): Promise<Credential>;
}

export interface SignInForm {
  action: string;
  fields: Record<string, string>;
}

interface PageResult {
  url: string;
  status: number;
  body: string;
  authorizationCode?: string;
}

interface RegisterResponse {
  response?: {
    success?: {
      tokens?: {
        bearer?: { access_token?: string; refresh_token?: string; expires_in?: string | number };
        mac_dms?: { adp_token?: string; device_private_key?: string };
        website_cookies?: Array<{ Name?: string; Value?: string }>;
      };
      extensions?: {
        customer_info?: { name?: string; given_name?: string };
      };
    };
    error?: { code?: string; message?: string };
  };
}

const MAX_REDIRECTS = 10;
const AUTHORIZATION_CODE_PARAM = 'openid.oa2.authorization_code';

const CHALLENGE_MARKERS: Array<[marker: string, description: string]> = [
  ['auth-captcha-image', 'a captcha'],
  ['auth-mfa-otpcode', 'a one-time password'],
  ['resend-approval-alert', 'an approval from another device'],
  ['cvf-widget-form', 'an account verification']
];

function decodeEntities(value: string): string {
  return value
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

function readAttribute(tag: string, name: string): string | undefined {
  const match = tag.match(new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i'));
  if (!match) return undefined;
  return decodeEntities(match[1] ?? match[2] ?? '');
}

export function parseSignInForm(html: string, pageUrl: string): SignInForm | undefined {
  const forms = html.match(/<form\b[^>]*>[\s\S]*?<\/form>/gi) ?? [];
  const form = forms.find((candidate) => {
    const openTag = candidate.match(/<form\b[^>]*>/i)?.[0] ?? '';
    return readAttribute(openTag, 'name') === 'signIn';
  });
  if (!form) return undefined;

  const openTag = form.match(/<form\b[^>]*>/i)?.[0] ?? '';
  const action = readAttribute(openTag, 'action') || pageUrl;

  const fields: Record<string, string> = {};
  for (const input of form.match(/<input\b[^>]*>/gi) ?? []) {
    const name = readAttribute(input, 'name');
    if (!name) continue;
    fields[name] = readAttribute(input, 'value') ?? '';
  }

  return { action: new URL(action, pageUrl).toString(), fields };
}

export function extractAuthorizationCode(url: string): string | undefined {
  try {
    return new URL(url).searchParams.get(AUTHORIZATION_CODE_PARAM) ?? undefined;
  } catch {
    return undefined;
  }
}

export function detectChallenge(html: string): string | undefined {
  const hit = CHALLENGE_MARKERS.find(([marker]) => html.includes(marker));
  return hit?.[1];
}

export function buildDeviceClientId(serial: string): string {
  return Buffer.from(`${serial}#${AUDIBLE_APP.DEVICE_TYPE}`, 'utf8').toString('hex');
}

export function buildOAuthUrl(locale: AudibleLocale, clientId: string, codeChallenge: string): string {
  const base = `https://www.amazon.${locale.domain}`;
  const params = new URLSearchParams({
    'openid.oa2.response_type': 'code',
    'openid.oa2.code_challenge_method': 'S256',
    'openid.oa2.code_challenge': codeChallenge,
    'openid.return_to': `${base}/ap/maplanding`,
    'openid.assoc_handle': `amzn_audible_ios_${locale.countryCode}`,
    'openid.identity': 'http://specs.openid.net/auth/2.0/identifier_select',
    pageId: 'amzn_audible_ios',
    accountStatusPolicy: 'P1',
    'openid.claimed_id': 'http://specs.openid.net/auth/2.0/identifier_select',
    'openid.mode': 'checkid_setup',
    'openid.ns.oa2': 'http://www.amazon.com/ap/ext/oauth/2',
    'openid.oa2.client_id': `device:${clientId}`,
    'openid.ns.pape': 'http://specs.openid.net/extensions/pape/1.0',
    marketPlaceId: locale.marketplaceId,
    'openid.oa2.scope': 'device_auth_access',
    forceMobileLayout: 'true',
    'openid.ns': 'http://specs.openid.net/auth/2.0',
    'openid.pape.max_auth_age': '0'
  });
  return `${base}/ap/signin?${params.toString()}`;
}

/**
 * Signs in through Amazon's OAuth page the way the Audible iOS app does and
 * registers a device, which yields the bearer and signing tokens.
 */
export class AudibleAuthenticator implements Authenticator {
  constructor(private readonly now: () => number = Date.now) {}

  private async browse(jar: CookieJar, url: string, init: { method: 'GET' | 'POST'; body?: string }): Promise<PageResult> {
    let currentUrl = url;
    let method = init.method;
    let body = init.body;

    for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
      const headers: Record<string, string> = {
        'User-Agent': AUDIBLE_APP.USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US'
      };
      const cookie = await jar.getCookieString(currentUrl);
      if (cookie) headers.Cookie = cookie;
      if (body !== undefined) headers['Content-Type'] = 'application/x-www-form-urlencoded';

      const response = await fetch(currentUrl, { method, headers, body, redirect: 'manual' });
      for (const setCookie of response.headers.getSetCookie()) {
        await jar.setCookie(setCookie, currentUrl, { ignoreError: true });
      }

      const location = response.headers.get('location');
      if (response.status >= 300 && response.status < 400 && location) {
        const nextUrl = new URL(location, currentUrl).toString();
        const authorizationCode = extractAuthorizationCode(nextUrl);
        if (authorizationCode) {
          return { url: nextUrl, status: response.status, body: '', authorizationCode };
        }
        currentUrl = nextUrl;
        method = 'GET';
        body = undefined;
        continue;
      }

      return { url: currentUrl, status: response.status, body: await response.text() };
    }

    throw new AuthenticationError(`Sign-in exceeded ${MAX_REDIRECTS} redirects`);
  }

  private async signIn(
    locale: AudibleLocale,
    username: string,
    password: string,
    clientId: string,
    codeChallenge: string
  ): Promise<string> {
    const jar = new CookieJar();
    const landing = await this.browse(jar, buildOAuthUrl(locale, clientId, codeChallenge), { method: 'GET' });
    if (landing.authorizationCode) return landing.authorizationCode;

    const form = parseSignInForm(landing.body, landing.url);
    if (!form) {
      throw new AuthenticationError(`Sign-in page did not contain a login form (status ${landing.status})`);
    }

    const payload = new URLSearchParams({ ...form.fields, email: username, password });
    const result = await this.browse(jar, form.action, { method: 'POST', body: payload.toString() });
    if (result.authorizationCode) return result.authorizationCode;

    const challenge = detectChallenge(result.body);
    if (challenge) {
      throw new AuthenticationError(`Sign-in requires ${challenge}, which is not supported`);
    }
    throw new AuthenticationError('Amazon rejected the username or password');
  }

  private async register(
    locale: AudibleLocale,
    authorizationCode: string,
    codeVerifier: string,
    serial: string,
    clientId: string
  ): Promise<RegisterResponse> {
    const body = {
      requested_token_type: ['bearer', 'mac_dms', 'website_cookies', 'store_authentication_cookie'],
      cookies: { website_cookies: [], domain: `.amazon.${locale.domain}` },
      registration_data: {
        domain: 'Device',
        app_version: AUDIBLE_APP.VERSION,
        device_serial: serial,
        device_type: AUDIBLE_APP.DEVICE_TYPE,
        device_name: '%FIRST_NAME%%FIRST_NAME_POSSESSIVE_STRING%%DUPE_STRATEGY_1ST%Audible for iPhone',
        os_version: AUDIBLE_APP.OS_VERSION,
        software_version: AUDIBLE_APP.SOFTWARE_VERSION,
        device_model: AUDIBLE_APP.DEVICE_MODEL,
        app_name: AUDIBLE_APP.NAME
      },
      auth_data: {
        client_id: clientId,
        authorization_code: authorizationCode,
        code_verifier: codeVerifier,
        code_algorithm: 'SHA-256',
        client_domain: 'DeviceLegacy'
      },
      requested_extensions: ['device_info', 'customer_info']
    };

    const response = await fetch(`https://api.amazon.${locale.domain}/auth/register`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body)
    });

    const payload = (await response.json()) as RegisterResponse;
    if (!response.ok) {
      const message = payload.response?.error?.message ?? `status ${response.status}`;
      throw new AuthenticationError(`Device registration failed: ${message}`);
    }
    return payload;
  }

  private toCredential(locale: AudibleLocale, serial: string, payload: RegisterResponse): Credential {
    const success = payload.response?.success;
    const bearer = success?.tokens?.bearer;
    const macDms = success?.tokens?.mac_dms;
    if (!bearer?.access_token || !bearer.refresh_token || !macDms?.adp_token || !macDms.device_private_key) {
      throw new AuthenticationError('Device registration response is missing tokens');
    }

    const expiresIn = Number(bearer.expires_in ?? 3600);
    const websiteCookies: WebsiteCookie[] = (success?.tokens?.website_cookies ?? [])
      .filter((cookie) => cookie.Name && cookie.Value !== undefined)
      .map((cookie) => ({ name: cookie.Name ?? '', value: (cookie.Value ?? '').replace(/"/g, '') }));

    return {
      localeCode: locale.code,
      accessToken: bearer.access_token,
      refreshToken: bearer.refresh_token,
      expiresAt: this.now() + (Number.isFinite(expiresIn) ? expiresIn : 3600) * 1000,
      adpToken: macDms.adp_token,
      devicePrivateKey: macDms.device_private_key,
      deviceSerial: serial,
      customerName: success?.extensions?.customer_info?.name,
      websiteCookies
    };
  }

  async login(username: string, password: string, localeCode: string): Promise<Credential> {
    const locale = resolveLocale(localeCode);
    const serial = randomUUID().replace(/-/g, '').toUpperCase();
    const clientId = buildDeviceClientId(serial);
    const codeVerifier = randomBytes(32).toString('base64url');
    const codeChallenge = createHash('sha256').update(codeVerifier).digest('base64url');

    try {
      const authorizationCode = await this.signIn(locale, username, password, clientId, codeChallenge);
      const registration = await this.register(locale, authorizationCode, codeVerifier, serial, clientId);
      return this.toCredential(locale, serial, registration);
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      throw new AuthenticationError(describeError(error), { cause: error });
    }
  }
}
