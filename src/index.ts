export * from './types/modem.js';
export * from './types/modem-models.js';
export * from './config/index.js';
export * from './utils/errors.js';
export * from './utils/metrics.js';
export { createChildLogger, logger, setLogLevel } from './utils/logger.js';
export { parseUnitValue } from './core/unit-value.js';
export { classifyRow, type RowKind } from './core/row-classifier.js';
export { parseUptime } from './core/uptime.js';
export * from './core/channel-table.js';
export { DeviceScraper, locateTable } from './core/device-scraper.js';
export * from './core/modem-collector.js';
export { SessionAuthenticator, encodeLoginToken } from './infra/session-authenticator.js';
export { DocumentFetcher, parseDocument } from './infra/document-fetcher.js';
export { createModemHttpClient, type ModemHttpOptions } from './infra/modem-http.js';
export * from './infra/exporter-server.js';
export * from './app.js';
