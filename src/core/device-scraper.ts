import { createChildLogger } from '../utils/logger.js';
import { selectText, tableRows } from '../utils/html.js';
import { modemUrl } from '../infra/modem-http.js';
import { parseDownstreamTable, parseUpstreamTable } from './channel-table.js';
import { parseUptime } from './uptime.js';
import type { SessionAuthenticator } from '../infra/session-authenticator.js';
import { releaseDocument, type DocumentFetcher } from '../infra/document-fetcher.js';
import type {
  ChannelDirection,
  Credentials,
  DeviceState,
  DownstreamChannel,
  Session,
  UpstreamChannel,
} from '../types/modem.js';
import type { ModemModelProfile } from '../types/modem-models.js';

const logger = createChildLogger('device-scraper');

interface TableLocator {
  anchorText: string;
  fallbackIndex: number;
}

/**
 * Find a channel table by the title in its first row, falling back to its
 * position among all tables on the page. The positional guess is brittle and
 * only used when the title is missing.
 */
export function locateTable(
  document: Document,
  locator: TableLocator,
  direction: ChannelDirection
): Element | undefined {
  const tables = Array.from(document.querySelectorAll('table'));

  const anchored = tables.find((table) => {
    const firstRow = table.querySelector('tr');
    return (firstRow?.textContent ?? '').trim() === locator.anchorText;
  });
  if (anchored) return anchored;

  const positional = tables[locator.fallbackIndex];
  if (positional) {
    logger.debug({ direction, index: locator.fallbackIndex }, 'Table title not found, using position');
  } else {
    logger.warn({ direction, tables: tables.length }, 'Channel table not found');
  }
  return positional;
}

export class DeviceScraper {
  constructor(
    private readonly authenticator: SessionAuthenticator,
    private readonly fetcher: DocumentFetcher,
    private readonly profile: ModemModelProfile
  ) {}

  /**
   * One full cycle: login, status page, info page. Any login or fetch error
   * and any unparsable uptime aborts without a partial state.
   */
  async scrape(host: string, credentials: Credentials): Promise<DeviceState> {
    let session: Session;
    try {
      session = await this.authenticator.login(host, credentials);
    } catch (err) {
      logger.error({ host, err }, 'Failed to fetch login tokens');
      throw err;
    }

    const { statusPage, infoPage } = this.profile;

    const statusDoc = await this.fetchPage(host, statusPage.path, session, 'connection status');
    let connected: boolean;
    let downstreamChannels: DownstreamChannel[];
    let upstreamChannels: UpstreamChannel[];
    try {
      connected = selectText(statusDoc, statusPage.connectivitySelector) === statusPage.connectedText;

      const downstreamTable = locateTable(statusDoc, statusPage.downstream, 'downstream');
      const upstreamTable = locateTable(statusDoc, statusPage.upstream, 'upstream');
      downstreamChannels = downstreamTable
        ? parseDownstreamTable(tableRows(downstreamTable), statusPage.downstream)
        : [];
      upstreamChannels = upstreamTable
        ? parseUpstreamTable(tableRows(upstreamTable), statusPage.upstream)
        : [];
    } finally {
      releaseDocument(statusDoc);
    }

    const infoDoc = await this.fetchPage(host, infoPage.path, session, 'product information');
    let state: DeviceState;
    try {
      state = {
        host,
        connected,
        uptimeSeconds: parseUptime(selectText(infoDoc, infoPage.uptimeSelector)),
        hardwareVersion: selectText(infoDoc, infoPage.hardwareVersionSelector),
        softwareVersion: selectText(infoDoc, infoPage.softwareVersionSelector),
        macAddress: selectText(infoDoc, infoPage.macAddressSelector),
        serialNumber: selectText(infoDoc, infoPage.serialNumberSelector),
        downstreamChannels: Object.freeze(downstreamChannels),
        upstreamChannels: Object.freeze(upstreamChannels),
      };
    } finally {
      releaseDocument(infoDoc);
    }

    logger.debug(
      { host, connected, downstream: downstreamChannels.length, upstream: upstreamChannels.length },
      'Scrape complete'
    );
    return Object.freeze(state);
  }

  private async fetchPage(host: string, path: string, session: Session, label: string): Promise<Document> {
    const url = modemUrl(host, path, `ct_${session.csrfToken}`);
    try {
      return await this.fetcher.fetch(url, session);
    } catch (err) {
      logger.error({ host, page: label, err }, `Failed to fetch ${label} page`);
      throw err;
    }
  }
}
