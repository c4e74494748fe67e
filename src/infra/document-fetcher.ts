import type { AxiosInstance, AxiosResponse } from 'axios';
import { JSDOM } from 'jsdom';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, TransportError } from '../utils/errors.js';
import { bodyText, formatCookie, redact, toTransportError } from './modem-http.js';
import type { Session } from '../types/modem.js';

const logger = createChildLogger('document-fetcher');

/**
 * Parse markup into a DOM. The HTML parser recovers from broken markup, so
 * this never throws; an empty body gives an empty document.
 */
export function parseDocument(html: string): Document {
  return new JSDOM(html).window.document;
}

/** Closes the window behind a parsed page once its values have been read. */
export function releaseDocument(document: Document): void {
  document.defaultView?.close();
}

export class DocumentFetcher {
  constructor(private readonly http: AxiosInstance) {}

  async fetch(url: string, session: Session): Promise<Document> {
    let response: AxiosResponse;
    try {
      response = await this.http.get(url, {
        headers: { Cookie: formatCookie(session.sessionCookie) },
      });
    } catch (err) {
      throw toTransportError(err, url);
    }

    if (response.status !== 200) {
      throw new TransportError(ErrorCode.UNEXPECTED_STATUS, `Unexpected status ${response.status} from ${redact(url)}`, {
        context: { url: redact(url), status: response.status },
      });
    }

    const html = bodyText(response);
    logger.debug({ url: redact(url), bytes: html.length }, 'Fetched page');
    return parseDocument(html);
  }
}
