#!/usr/bin/env node
import { loadConfigFromEnv, parseListenAddress, type Config } from './config/index.js';
import { parseArgs, type CliArgs } from './config/cli-args.js';
import { createExporterServer, createScraperFromConfig } from './app.js';
import { logger, setLogLevel } from './utils/logger.js';
import { errorReport } from './utils/errors.js';

function printUsage(): void {
  console.log(`
Usage: cable-modem-exporter [serve|scrape] [flags]

Commands:
  serve (default)                 Serve Prometheus metrics over HTTP
  scrape                          Scrape the modem once and print its state as JSON

Flags:
  --web.listen-address=ADDR       Address to listen on for telemetry (default :9143)
  --web.telemetry-path=PATH       Path under which to expose metrics (default /metrics)
  -h, --help                      Show this help

Environment:
  MODEM_HOST                      Modem address (default 192.168.100.1)
  MODEM_USER                      Web UI user (default admin)
  MODEM_PASSWORD                  Web UI password (required)
  MODEM_MODEL                     Built-in page profile (default sb8200)
  MODEM_PROFILE_PATH              JSON page profile overriding the built-in one
  MODEM_VERIFY_TLS                Verify the modem's certificate (default false)
  MODEM_REQUEST_TIMEOUT_MS        Per-request timeout (default 10000)
  METRICS_NAMESPACE               Metric name prefix (default sb8200)
  LOG_LEVEL                       trace|debug|info|warn|error|fatal|silent
`);
}

function applyArgs(config: Config, args: CliArgs): Config {
  return {
    ...config,
    web: {
      listenAddress: args.listenAddress ?? config.web.listenAddress,
      telemetryPath: args.telemetryPath ?? config.web.telemetryPath,
    },
  };
}

async function scrapeOnce(config: Config): Promise<void> {
  const scraper = createScraperFromConfig(config);
  const state = await scraper.scrape(config.modem.host, {
    username: config.modem.username,
    password: config.modem.password,
  });
  console.log(JSON.stringify(state, null, 2));
}

async function serve(config: Config): Promise<void> {
  const server = createExporterServer(config);
  await server.listen(parseListenAddress(config.web.listenAddress));

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.command === 'help') {
    printUsage();
    return;
  }

  const config = applyArgs(loadConfigFromEnv(), args);
  setLogLevel(config.logging.level);

  if (args.command === 'scrape') {
    await scrapeOnce(config);
  } else {
    await serve(config);
  }
}

main().catch((err: unknown) => {
  console.error(JSON.stringify(errorReport(err), null, 2));
  process.exit(1);
});
