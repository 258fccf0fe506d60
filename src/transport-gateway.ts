import { WebSocket, WebSocketServer, type RawData } from 'ws';
import type * as http from 'http';
import {
  AudioChunkHeaderSchema,
  ClientMessageSchema,
  RecognitionError,
  decodeAudio,
  decodeBase64Audio,
  decodeBinaryFrame,
  encodeEvent,
  errorEvent,
  type PcmFrame,
  type RecognitionEvent,
} from '@asr-gateway/types';
import type { LimitsConfig } from './gateway-config';
import type { ConnectionPool } from './connection-pool';
import type { RecognitionSession } from './session';
import type { SessionRegistry } from './session-registry';
import { PartialThrottle } from './utils/partial-throttle';
import { FrameRateLimiter } from './utils/rate-limiter';
import { createLogger, errorMessage, type Logger } from './utils/logger';
import { isRecord, rawToBuffer } from './utils/ws-data';

export type GatewayLimits = Pick<
  LimitsConfig,
  'maxFrameBytes' | 'maxJsonBytes' | 'maxAudioFramesPerSec' | 'partialThrottleMs'
>;

export interface TransportGatewayOptions {
  registry: SessionRegistry;
  pool: ConnectionPool;
  wsPath: string;
  authToken: string | null;
  allowedOrigins: string[];
  limits: GatewayLimits;
  logger?: Logger;
}

interface ClientConnection {
  id: string;
  ws: WebSocket;
  outbox: PartialThrottle;
  limiter: FrameRateLimiter;
  chatSessionId: string | undefined;
  rateLimited: number;
}

/**
 * WebSocket front door. Parses client messages, routes them to the client's
 * session and writes the session's events back in the order they were produced.
 */
export class TransportGateway {
  private wss: WebSocketServer | null = null;
  private readonly log: Logger;

  constructor(private readonly opts: TransportGatewayOptions) {
    this.log = opts.logger ?? createLogger('gateway');
  }

  attach(server: http.Server): void {
    const { maxFrameBytes, maxJsonBytes } = this.opts.limits;
    // Headroom so oversized messages get an error event instead of a 1009 close
    const maxPayload = Math.max(maxFrameBytes, maxJsonBytes) * 2;
    this.wss = new WebSocketServer({ server, path: this.opts.wsPath, maxPayload });
    this.wss.on('connection', (ws, req) => this.handleConnection(ws, req));
    this.wss.on('error', (e: Error) => this.log.error('WebSocket server error:', e.message));
  }

  close(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  handleConnection(ws: WebSocket, req: http.IncomingMessage): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const origin = typeof req.headers.origin === 'string' ? req.headers.origin : '';

    if (origin && this.opts.allowedOrigins.length > 0 && !this.opts.allowedOrigins.includes(origin)) {
      this.log.info('Closing WS: disallowed origin', origin);
      ws.close(1008, 'origin not allowed');
      return;
    }

    const expectedToken = this.opts.authToken;
    if (expectedToken) {
      const auth = req.headers.authorization ?? '';
      const headerToken = auth.startsWith('Bearer ') ? auth.slice('Bearer '.length) : '';
      const provided = headerToken || url.searchParams.get('token') || '';
      if (provided !== expectedToken) {
        this.log.info('Closing WS: invalid/missing token');
        ws.close(1008, 'auth required');
        return;
      }
    }

    const id = this.opts.pool.addConnection(ws, {
      origin,
      userAgent: req.headers['user-agent'] ?? 'unknown',
      ip: req.socket.remoteAddress ?? 'unknown',
    });
    if (!id) {
      ws.close(1013, 'server overloaded');
      return;
    }

    const conn: ClientConnection = {
      id,
      ws,
      outbox: new PartialThrottle((event) => this.write(ws, event), this.opts.limits.partialThrottleMs),
      limiter: new FrameRateLimiter(this.opts.limits.maxAudioFramesPerSec),
      chatSessionId: url.searchParams.get('chatSessionId') ?? undefined,
      rateLimited: 0,
    };
    this.bindSession(conn);
    this.log.info(`Client ${id} connected`);

    ws.on('message', (data: RawData, isBinary: boolean) => {
      try {
        this.handleMessage(conn, rawToBuffer(data), isBinary);
      } catch (e: unknown) {
        this.log.error(`[${id}] message handling failed:`, errorMessage(e));
      }
    });

    ws.on('error', (e: Error) => {
      this.log.warn(`[${id}] socket error:`, e.message);
    });

    ws.on('close', (code: number) => {
      conn.outbox.dispose();
      this.log.info(`Client ${id} disconnected (${code})`);
      this.opts.registry.remove(id, 'disconnect').catch((e: unknown) => {
        this.log.error(`[${id}] session teardown failed:`, errorMessage(e));
      });
    });
  }

  private bindSession(conn: ClientConnection): RecognitionSession {
    const session = this.opts.registry.getOrCreate(conn.id);
    session.attach((event) => conn.outbox.push(event));
    if (conn.chatSessionId && !session.chatSessionId) {
      session.chatSessionId = conn.chatSessionId;
    }
    return session;
  }

  private handleMessage(conn: ClientConnection, raw: Buffer, isBinary: boolean): void {
    if (isBinary) {
      this.handleBinaryFrame(conn, raw);
    } else {
      this.handleTextFrame(conn, raw);
    }
  }

  private handleBinaryFrame(conn: ClientConnection, raw: Buffer): void {
    if (raw.length > this.opts.limits.maxFrameBytes) {
      this.reject(conn, new RecognitionError('MalformedFrame', `frame exceeds ${this.opts.limits.maxFrameBytes} bytes`));
      return;
    }
    let frame: { header: unknown; payload: Buffer };
    try {
      frame = decodeBinaryFrame(raw);
    } catch (e: unknown) {
      this.reject(conn, new RecognitionError('MalformedFrame', `invalid binary frame: ${errorMessage(e)}`));
      return;
    }
    const { header, payload } = frame;
    const parsed = AudioChunkHeaderSchema.safeParse(header);
    if (!parsed.success) {
      this.reject(conn, new RecognitionError('MalformedFrame', 'invalid audio frame header'));
      return;
    }
    const declared = parsed.data;
    this.handleAudio(conn, () => decodeAudio(payload, declared));
  }

  private handleTextFrame(conn: ClientConnection, raw: Buffer): void {
    if (raw.length > this.opts.limits.maxJsonBytes) {
      this.reject(conn, new RecognitionError('MalformedMessage', `message exceeds ${this.opts.limits.maxJsonBytes} bytes`));
      return;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw.toString('utf8'));
    } catch {
      this.reject(conn, new RecognitionError('MalformedMessage', 'invalid JSON'));
      return;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.reject(conn, describeInvalidMessage(json));
      return;
    }

    const msg = parsed.data;
    switch (msg.type) {
      case 'start': {
        const session = this.bindSession(conn);
        session.start(msg.chatSessionId);
        return;
      }
      case 'audio': {
        const { data, ...declared } = msg;
        this.handleAudio(conn, () => decodeBase64Audio(data, declared));
        return;
      }
      case 'stop': {
        const session = this.requireSession(conn);
        session?.stop();
        return;
      }
    }
  }

  private handleAudio(conn: ClientConnection, decode: () => PcmFrame): void {
    const session = this.requireSession(conn);
    if (!session) return;

    let frame: PcmFrame;
    try {
      frame = decode();
    } catch (e: unknown) {
      if (e instanceof RecognitionError) {
        this.reject(conn, e);
        return;
      }
      throw e;
    }

    if (!conn.limiter.tryTake()) {
      conn.rateLimited++;
      if (conn.rateLimited % 100 === 1) {
        this.log.warn(`[${conn.id}] audio rate limit exceeded, dropped ${conn.rateLimited} frame(s)`);
      }
      return;
    }
    session.feed(frame);
  }

  // Sessions evicted while the socket stayed open only come back through `start`
  private requireSession(conn: ClientConnection): RecognitionSession | undefined {
    const session = this.opts.registry.get(conn.id);
    if (!session) {
      this.reject(conn, new RecognitionError('SessionNotFound', 'no active session, send start first'));
    }
    return session;
  }

  private reject(conn: ClientConnection, err: RecognitionError): void {
    this.log.debug(`[${conn.id}] ${err.code}: ${err.message}`);
    conn.outbox.push(errorEvent(err));
  }

  private write(ws: WebSocket, event: RecognitionEvent): void {
    if (ws.readyState !== WebSocket.OPEN) return;
    ws.send(encodeEvent(event));
  }
}

function describeInvalidMessage(json: unknown): RecognitionError {
  if (!isRecord(json) || typeof json.type !== 'string') {
    return new RecognitionError('MalformedMessage', 'message must be an object with a string "type"');
  }
  switch (json.type) {
    case 'audio':
      return new RecognitionError('MalformedFrame', 'audio message requires base64 "data"');
    case 'start':
    case 'stop':
      return new RecognitionError('MalformedMessage', `invalid ${json.type} message`);
    default:
      return new RecognitionError('MalformedMessage', `unsupported message type "${json.type}"`);
  }
}
