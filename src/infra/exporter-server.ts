import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { createChildLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import type { ListenAddress } from '../config/index.js';

const logger = createChildLogger('exporter-server');

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export interface MetricsSource {
  collect(): Promise<string>;
}

export interface RouteResult {
  status: number;
  contentType: string;
  body: string;
}

export function landingPage(telemetryPath: string): string {
  return `<html>
<head><title>Cable Modem Exporter</title></head>
<body>
<h1>Cable Modem Exporter</h1>
<p><a href='${telemetryPath}'>Metrics</a></p>
</body>
</html>
`;
}

export async function routeRequest(
  method: string,
  url: string,
  telemetryPath: string,
  source: MetricsSource
): Promise<RouteResult> {
  const path = new URL(url, 'http://localhost').pathname;

  if (method !== 'GET' && method !== 'HEAD') {
    return { status: 405, contentType: 'text/plain; charset=utf-8', body: 'Method Not Allowed\n' };
  }
  if (path === telemetryPath) {
    return { status: 200, contentType: EXPOSITION_CONTENT_TYPE, body: await source.collect() };
  }
  if (path === '/') {
    return { status: 200, contentType: 'text/html; charset=utf-8', body: landingPage(telemetryPath) };
  }
  return { status: 404, contentType: 'text/plain; charset=utf-8', body: 'Not Found\n' };
}

export class ExporterServer {
  private readonly server: Server;

  constructor(
    private readonly source: MetricsSource,
    private readonly telemetryPath: string
  ) {
    this.server = createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        logger.error({ err }, 'Request handler failed');
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const start = Date.now();
    const method = req.method ?? 'GET';
    const result = await routeRequest(method, req.url ?? '/', this.telemetryPath, this.source);

    res.writeHead(result.status, { 'Content-Type': result.contentType });
    res.end(method === 'HEAD' ? undefined : result.body);

    logger.info(
      { method, url: req.url, status: result.status, remote: req.socket.remoteAddress, durationMs: Date.now() - start },
      'Request served'
    );
  }

  /** Port actually bound, which differs from the requested one for port 0. */
  get port(): number | undefined {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : undefined;
  }

  listen(address: ListenAddress): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.server.once('error', onError);
      this.server.listen(address.port, address.host, () => {
        this.server.off('error', onError);
        logger.info({ ...address, telemetryPath: this.telemetryPath }, 'Exporter listening');
        resolve();
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(toError(err)) : resolve()));
    });
  }
}
