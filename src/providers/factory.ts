// ProviderFactory
// Constructs the upstream recognizer selected by STT_PROVIDER

import type { GatewayConfig, STTType } from '../gateway-config';
import type { STTProvider } from './stt/base';
import { DeepgramSTT } from './stt/deepgram';
import { DashScopeSTT } from './stt/dashscope';

export class ProviderFactory {
  static createSTT(type: STTType, config: GatewayConfig): STTProvider {
    switch (type) {
      case 'deepgram':
        if (!config.deepgram) {
          throw new Error('DEEPGRAM_API_KEY environment variable is required for Deepgram STT');
        }
        return new DeepgramSTT(config.deepgram);
      case 'dashscope':
        if (!config.dashscope) {
          throw new Error('DASHSCOPE_API_KEY environment variable is required for DashScope STT');
        }
        return new DashScopeSTT(config.dashscope);
      default: {
        const unknownType: never = type;
        throw new Error(`Unsupported STT type: ${String(unknownType)}`);
      }
    }
  }
}
