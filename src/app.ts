import type { AxiosAdapter } from 'axios';
import { resolveModelProfile, type Config } from './config/index.js';
import { DeviceScraper } from './core/device-scraper.js';
import { ModemCollector } from './core/modem-collector.js';
import { createModemHttpClient } from './infra/modem-http.js';
import { DocumentFetcher } from './infra/document-fetcher.js';
import { SessionAuthenticator } from './infra/session-authenticator.js';
import { ExporterServer } from './infra/exporter-server.js';
import { MetricRegistry } from './utils/metrics.js';
import type { ModemModelProfile } from './types/modem-models.js';

export interface ScraperOptions {
  profile: ModemModelProfile;
  requestTimeoutMs?: number;
  verifyTls?: boolean;
  adapter?: AxiosAdapter;
}

export function createDeviceScraper(options: ScraperOptions): DeviceScraper {
  const http = createModemHttpClient({
    timeoutMs: options.requestTimeoutMs,
    verifyTls: options.verifyTls,
    adapter: options.adapter,
  });
  return new DeviceScraper(
    new SessionAuthenticator(http, options.profile.auth),
    new DocumentFetcher(http),
    options.profile
  );
}

export function createScraperFromConfig(config: Config, adapter?: AxiosAdapter): DeviceScraper {
  return createDeviceScraper({
    profile: resolveModelProfile(config.modem),
    requestTimeoutMs: config.modem.requestTimeoutMs,
    verifyTls: config.modem.verifyTls,
    adapter,
  });
}

export function createCollector(config: Config, scraper: DeviceScraper): ModemCollector {
  return new ModemCollector(
    scraper,
    {
      host: config.modem.host,
      credentials: { username: config.modem.username, password: config.modem.password },
    },
    new MetricRegistry(),
    config.metrics.namespace
  );
}

export function createExporterServer(config: Config, adapter?: AxiosAdapter): ExporterServer {
  const collector = createCollector(config, createScraperFromConfig(config, adapter));
  return new ExporterServer(collector, config.web.telemetryPath);
}
