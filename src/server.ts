import * as http from 'http';
import type { GatewayConfig } from './gateway-config';
import { ConnectionPool } from './connection-pool';
import type { STTProvider } from './providers/stt/base';
import { RecognitionSession } from './session';
import { SessionRegistry } from './session-registry';
import { NoopTranscriptSink, type TranscriptSink } from './transcript-sink';
import { TransportGateway } from './transport-gateway';
import { createLogger, type Logger } from './utils/logger';

export const SERVICE_NAME = 'asr-gateway';

export interface GatewayServerDeps {
  config: GatewayConfig;
  provider: STTProvider;
  transcriptSink?: TranscriptSink;
  logger?: Logger;
}

export interface GatewayServer {
  httpServer: http.Server;
  registry: SessionRegistry;
  pool: ConnectionPool;
  gateway: TransportGateway;
  /** Starts listening; resolves with the bound port (useful with port 0). */
  listen(port?: number): Promise<number>;
  /** Stops accepting, drains every session and closes the server. */
  close(): Promise<void>;
}

export function createGatewayServer(deps: GatewayServerDeps): GatewayServer {
  const { config, provider } = deps;
  const log = deps.logger ?? createLogger('server');
  const transcriptSink = deps.transcriptSink ?? new NoopTranscriptSink();

  const registry = new SessionRegistry({
    idleTimeoutMs: config.session.idleTimeoutMs,
    sweepIntervalMs: config.session.sweepIntervalMs,
    logger: deps.logger,
    createSession: (id) =>
      new RecognitionSession({
        id,
        provider,
        connectTimeoutMs: config.upstream.connectTimeoutMs,
        finalResultTimeoutMs: config.upstream.finalResultTimeoutMs,
        transcriptSink,
        logger: deps.logger,
      }),
  });

  const pool = new ConnectionPool(
    { maxConnections: config.limits.maxConnections, heartbeatInterval: config.limits.heartbeatIntervalMs },
    deps.logger,
  );

  const gateway = new TransportGateway({
    registry,
    pool,
    wsPath: config.server.wsPath,
    authToken: config.server.authToken,
    allowedOrigins: config.server.allowedOrigins,
    limits: config.limits,
    logger: deps.logger,
  });

  const httpServer = http.createServer((req, res) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (req.method === 'GET' && (path === '/' || path === '/healthz')) {
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({
        status: 'ok',
        service: SERVICE_NAME,
        provider: provider.type,
        timestamp: new Date().toISOString(),
      }));
      return;
    }

    if (req.method === 'GET' && path === '/stats') {
      const sessions = registry.list();
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({
        sessions: sessions.length,
        recording: sessions.filter((s) => s.hasUpstream).length,
        droppedFrames: sessions.reduce((sum, s) => sum + s.droppedFrames, 0),
        outOfOrderFrames: sessions.reduce((sum, s) => sum + s.outOfOrderFrames, 0),
        pool: pool.getStats(),
      }));
      return;
    }

    res.statusCode = 404;
    res.end('Not Found');
  });

  gateway.attach(httpServer);

  let closing: Promise<void> | null = null;

  return {
    httpServer,
    registry,
    pool,
    gateway,

    listen(port = config.server.port) {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, () => {
          httpServer.off('error', reject);
          registry.startSweep();
          pool.startHeartbeat();
          const address = httpServer.address();
          const bound = typeof address === 'object' && address !== null ? address.port : port;
          log.info(`Server started on port ${bound}`);
          log.info(`WebSocket endpoint: ws://localhost:${bound}${config.server.wsPath}`);
          log.info(`Health check: http://localhost:${bound}/healthz`);
          resolve(bound);
        });
      });
    },

    close() {
      closing ??= (async () => {
        log.info('Shutting down');
        const stopped = gateway.close();
        await registry.drain();
        pool.shutdown();
        await stopped;
        if (httpServer.listening) {
          await new Promise<void>((resolve, reject) => {
            httpServer.close((err) => (err ? reject(err) : resolve()));
          });
        }
        log.info('Shutdown complete');
      })();
      return closing;
    },
  };
}
