// Load environment variables FIRST, before any other imports read them
import { config } from 'dotenv';
import * as path from 'path';

config({ path: path.resolve(__dirname, '..', '.env') });

import { loadGatewayConfig } from './gateway-config';
import { ProviderFactory } from './providers/factory';
import { createGatewayServer } from './server';
import { createTranscriptSink } from './transcript-sink';
import { createLogger, errorMessage, setLogLevel } from './utils/logger';

const log = createLogger('asr-gateway');

async function main(): Promise<void> {
  const gatewayConfig = loadGatewayConfig();
  setLogLevel(gatewayConfig.server.logLevel);

  const provider = ProviderFactory.createSTT(gatewayConfig.upstream.provider, gatewayConfig);
  log.info(`STT provider: ${provider.name}`);
  if (!gatewayConfig.chatWebhookUrl) {
    log.info('CHAT_WEBHOOK_URL not set, final transcripts are not forwarded');
  }

  const server = createGatewayServer({
    config: gatewayConfig,
    provider,
    transcriptSink: createTranscriptSink(gatewayConfig.chatWebhookUrl),
  });
  await server.listen();

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    server.close().then(
      () => process.exit(0),
      (e: unknown) => {
        log.error('Shutdown failed:', errorMessage(e));
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((e: unknown) => {
  log.error('Failed to start:', errorMessage(e));
  process.exit(1);
});
