import type { AxiosInstance, AxiosResponse } from 'axios';
import { createChildLogger } from '../utils/logger.js';
import { AuthError, ErrorCode, TransportError } from '../utils/errors.js';
import { bodyText, modemUrl, readSetCookie, redact, toTransportError } from './modem-http.js';
import type { Credentials, Session } from '../types/modem.js';
import type { ModemModelProfile } from '../types/modem-models.js';

const logger = createChildLogger('session-authenticator');

export function encodeLoginToken(credentials: Credentials): string {
  return Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');
}

/**
 * Logs into the modem's web UI. The device has no real auth scheme: the
 * base64 `user:pass` pair rides in the query string, the response body is the
 * csrf token and the session lives in a cookie.
 */
export class SessionAuthenticator {
  constructor(
    private readonly http: AxiosInstance,
    private readonly auth: ModemModelProfile['auth']
  ) {}

  async login(host: string, credentials: Credentials): Promise<Session> {
    await this.logout(host);

    const url = modemUrl(host, this.auth.loginPath, `login_${encodeLoginToken(credentials)}`);
    let response: AxiosResponse;
    try {
      response = await this.http.get(url);
    } catch (err) {
      throw toTransportError(err, url);
    }

    if (response.status === 200) {
      const value = readSetCookie(response, this.auth.sessionCookieName);
      // An empty cookie value is how the device ends or refuses a session
      if (!value) {
        throw new AuthError(ErrorCode.MISSING_SESSION, 'missing session', {
          context: { host, cookie: this.auth.sessionCookieName },
        });
      }

      logger.debug({ host }, 'Session established');
      return {
        sessionCookie: { name: this.auth.sessionCookieName, value },
        csrfToken: bodyText(response),
      };
    }

    if (response.status === 401) {
      throw new AuthError(ErrorCode.INVALID_CREDENTIALS, 'invalid credentials', {
        context: { host, username: credentials.username },
      });
    }

    throw new TransportError(ErrorCode.UNEXPECTED_STATUS, 'unknown response', {
      context: { host, url: redact(url), status: response.status },
    });
  }

  /** Best effort: clears any session the device still holds for us. */
  private async logout(host: string): Promise<void> {
    const url = modemUrl(host, this.auth.logoutPath);
    try {
      const response = await this.http.get(url);
      logger.debug({ host, status: response.status }, 'Logout sent');
    } catch (err) {
      logger.debug({ host, err }, 'Logout failed, continuing with login');
    }
  }
}
