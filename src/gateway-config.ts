// ===== GATEWAY SERVER CONFIGURATION =====

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type STTType = 'deepgram' | 'dashscope';

export interface ServerConfig {
  port: number;
  wsPath: string;
  logLevel: LogLevel;
  authToken: string | null;
  allowedOrigins: string[];
}

export interface UpstreamConfig {
  provider: STTType;
  connectTimeoutMs: number;
  finalResultTimeoutMs: number;
}

export interface DeepgramConfig {
  apiKey: string;
  model: string;
  language: string;
  endpointingMs: number;
  baseUrl: string;
}

export interface DashScopeConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export interface SessionConfig {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
}

export interface LimitsConfig {
  maxFrameBytes: number;
  maxJsonBytes: number;
  maxAudioFramesPerSec: number;
  maxConnections: number;
  heartbeatIntervalMs: number;
  partialThrottleMs: number;
}

export interface GatewayConfig {
  server: ServerConfig;
  upstream: UpstreamConfig;
  deepgram: DeepgramConfig | null;
  dashscope: DashScopeConfig | null;
  session: SessionConfig;
  limits: LimitsConfig;
  chatWebhookUrl: string | null;
}

type Env = Record<string, string | undefined>;

// ===== CONFIGURATION LOADING =====

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function str(env: Env, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

function parseLogLevel(raw: string | null): LogLevel {
  switch (raw) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return raw;
    case null:
      return 'info';
    default:
      throw new Error(`Invalid LOG_LEVEL "${raw}". Must be one of debug, info, warn, error.`);
  }
}

function parseProvider(raw: string | null): STTType {
  if (raw === null || raw === 'deepgram') return 'deepgram';
  if (raw === 'dashscope') return 'dashscope';
  throw new Error(`Unsupported STT_PROVIDER "${raw}". Must be deepgram or dashscope.`);
}

function loadServerConfig(env: Env): ServerConfig {
  const wsPath = str(env, 'WS_PATH') ?? '/ws';
  return {
    port: num(env, 'PORT', 5001),
    wsPath: wsPath.startsWith('/') ? wsPath : `/${wsPath}`,
    logLevel: parseLogLevel(str(env, 'LOG_LEVEL')),
    authToken: str(env, 'GATEWAY_TOKEN'),
    allowedOrigins: (str(env, 'ALLOWED_ORIGINS') ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  };
}

function loadUpstreamConfig(env: Env): UpstreamConfig {
  return {
    provider: parseProvider(str(env, 'STT_PROVIDER')),
    connectTimeoutMs: num(env, 'UPSTREAM_CONNECT_TIMEOUT_MS', 5000),
    finalResultTimeoutMs: num(env, 'FINAL_RESULT_TIMEOUT_MS', 5000),
  };
}

function loadDeepgramConfig(env: Env): DeepgramConfig | null {
  const apiKey = str(env, 'DEEPGRAM_API_KEY');
  if (!apiKey) return null;
  return {
    apiKey,
    model: str(env, 'DEEPGRAM_MODEL') ?? 'nova-2',
    language: str(env, 'DEEPGRAM_LANGUAGE') ?? 'en-US',
    endpointingMs: num(env, 'DEEPGRAM_ENDPOINTING_MS', 300),
    baseUrl: str(env, 'DEEPGRAM_URL') ?? 'wss://api.deepgram.com/v1/listen',
  };
}

function loadDashScopeConfig(env: Env): DashScopeConfig | null {
  const apiKey = str(env, 'DASHSCOPE_API_KEY');
  if (!apiKey) return null;
  return {
    apiKey,
    model: str(env, 'DASHSCOPE_MODEL') ?? 'paraformer-realtime-v2',
    baseUrl: str(env, 'DASHSCOPE_URL') ?? 'wss://dashscope.aliyuncs.com/api-ws/v1/inference',
  };
}

function loadSessionConfig(env: Env): SessionConfig {
  return {
    idleTimeoutMs: num(env, 'SESSION_IDLE_TIMEOUT_MS', 300_000),
    sweepIntervalMs: num(env, 'SESSION_SWEEP_INTERVAL_MS', 30_000),
  };
}

function loadLimitsConfig(env: Env): LimitsConfig {
  return {
    maxFrameBytes: num(env, 'MAX_FRAME_BYTES', 262144), // 256KB
    maxJsonBytes: num(env, 'MAX_JSON_BYTES', 524288), // base64 inflates audio by a third
    maxAudioFramesPerSec: num(env, 'MAX_AUDIO_FRAMES_PER_SEC', 100),
    maxConnections: num(env, 'MAX_WS_CONNECTIONS', 100),
    heartbeatIntervalMs: num(env, 'WS_HEARTBEAT_INTERVAL', 30_000),
    partialThrottleMs: num(env, 'PARTIAL_THROTTLE_MS', 0),
  };
}

// ===== CONFIGURATION VALIDATION =====

export function validateConfig(config: GatewayConfig): void {
  if (config.server.port < 0 || config.server.port > 65535) {
    throw new Error(`Invalid server port: ${config.server.port}. Must be between 0 and 65535.`);
  }

  if (config.upstream.provider === 'deepgram' && !config.deepgram) {
    throw new Error('DEEPGRAM_API_KEY environment variable is required when STT_PROVIDER=deepgram');
  }
  if (config.upstream.provider === 'dashscope' && !config.dashscope) {
    throw new Error('DASHSCOPE_API_KEY environment variable is required when STT_PROVIDER=dashscope');
  }

  if (config.upstream.connectTimeoutMs < 100 || config.upstream.connectTimeoutMs > 60_000) {
    throw new Error(`Invalid upstream connect timeout: ${config.upstream.connectTimeoutMs}ms. Must be between 100ms and 60s.`);
  }
  if (config.upstream.finalResultTimeoutMs < 100 || config.upstream.finalResultTimeoutMs > 60_000) {
    throw new Error(`Invalid final result timeout: ${config.upstream.finalResultTimeoutMs}ms. Must be between 100ms and 60s.`);
  }

  if (config.session.sweepIntervalMs < 100) {
    throw new Error(`Invalid session sweep interval: ${config.session.sweepIntervalMs}ms. Must be at least 100ms.`);
  }
  if (config.session.idleTimeoutMs < config.session.sweepIntervalMs) {
    throw new Error('SESSION_IDLE_TIMEOUT_MS must not be shorter than SESSION_SWEEP_INTERVAL_MS');
  }

  if (config.limits.maxFrameBytes < 2 || config.limits.maxJsonBytes < 16) {
    throw new Error('MAX_FRAME_BYTES and MAX_JSON_BYTES must be positive');
  }
  if (config.limits.maxAudioFramesPerSec < 1) {
    throw new Error(`Invalid MAX_AUDIO_FRAMES_PER_SEC: ${config.limits.maxAudioFramesPerSec}. Must be at least 1.`);
  }
  if (config.limits.partialThrottleMs < 0) {
    throw new Error(`Invalid PARTIAL_THROTTLE_MS: ${config.limits.partialThrottleMs}. Must not be negative.`);
  }

  if (config.chatWebhookUrl !== null) {
    try {
      new URL(config.chatWebhookUrl);
    } catch {
      throw new Error(`CHAT_WEBHOOK_URL is not a valid URL: ${config.chatWebhookUrl}`);
    }
  }
}

// ===== MAIN CONFIGURATION LOADER =====

export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const config: GatewayConfig = {
    server: loadServerConfig(env),
    upstream: loadUpstreamConfig(env),
    deepgram: loadDeepgramConfig(env),
    dashscope: loadDashScopeConfig(env),
    session: loadSessionConfig(env),
    limits: loadLimitsConfig(env),
    chatWebhookUrl: str(env, 'CHAT_WEBHOOK_URL'),
  };

  validateConfig(config);
  return config;
}
