import { z } from 'zod';
import { RecognitionError, type RecognitionErrorCode } from './errors';

// ===== AUDIO FORMAT =====
// Fixed per session: linear PCM, 16 kHz, 16-bit signed little-endian, mono.

export const AUDIO_FORMAT = {
  encoding: 'pcm16',
  sampleRate: 16000,
  sampleWidth: 2,
  bitDepth: 16,
  channels: 1,
} as const;

const ACCEPTED_ENCODINGS = new Set(['pcm16', 'pcm', 'linear16', 'pcm_s16le']);

// Declared format fields a client may attach to an audio message.
// Any field that is present must match AUDIO_FORMAT.
export const AudioFormatFieldsSchema = z.object({
  encoding: z.string().optional(),
  sampleRate: z.number().int().optional(),
  sampleWidth: z.number().int().optional(),
  bitDepth: z.number().int().optional(),
  channels: z.number().int().optional(),
});
export type AudioFormatFields = z.infer<typeof AudioFormatFieldsSchema>;

/** What an audio message or binary frame header declares about its payload. */
export interface DeclaredAudio extends AudioFormatFields {
  seq?: number;
}

export interface PcmFrame {
  pcm: Buffer;
  samples: number;
  durationMs: number;
  /** Client-assigned sequence number, when the client sends one. */
  seq?: number;
}

// ===== RECOGNITION EVENTS =====
// Produced by the upstream client, one ordered sequence per utterance:
// zero or more partials, then exactly one final or error.

export type RecognitionEvent =
  | { kind: 'partial'; text: string }
  | { kind: 'final'; text: string }
  | { kind: 'error'; code: RecognitionErrorCode; message: string };

// ===== DECODE =====

function malformed(message: string): RecognitionError {
  return new RecognitionError('MalformedFrame', message);
}

function checkDeclaredFormat(declared: AudioFormatFields): void {
  if (declared.encoding !== undefined && !ACCEPTED_ENCODINGS.has(declared.encoding.toLowerCase())) {
    throw malformed(`unsupported encoding "${declared.encoding}", expected ${AUDIO_FORMAT.encoding}`);
  }
  if (declared.sampleRate !== undefined && declared.sampleRate !== AUDIO_FORMAT.sampleRate) {
    throw malformed(`sample rate ${declared.sampleRate} Hz, expected ${AUDIO_FORMAT.sampleRate} Hz`);
  }
  if (declared.sampleWidth !== undefined && declared.sampleWidth !== AUDIO_FORMAT.sampleWidth) {
    throw malformed(`sample width ${declared.sampleWidth} bytes, expected ${AUDIO_FORMAT.sampleWidth} bytes`);
  }
  if (declared.bitDepth !== undefined && declared.bitDepth !== AUDIO_FORMAT.bitDepth) {
    throw malformed(`bit depth ${declared.bitDepth}, expected ${AUDIO_FORMAT.bitDepth}`);
  }
  if (declared.channels !== undefined && declared.channels !== AUDIO_FORMAT.channels) {
    throw malformed(`${declared.channels} channels, expected mono`);
  }
}

/**
 * Validates raw PCM bytes against the fixed 16 kHz / 16-bit / mono profile.
 * Throws a `MalformedFrame` RecognitionError on any mismatch.
 */
export function decodeAudio(raw: Buffer, declared: DeclaredAudio = {}): PcmFrame {
  checkDeclaredFormat(declared);
  if (raw.length === 0) {
    throw malformed('empty audio payload');
  }
  if (raw.length % AUDIO_FORMAT.sampleWidth !== 0) {
    throw malformed(`payload length ${raw.length} is not a multiple of the ${AUDIO_FORMAT.sampleWidth}-byte sample width`);
  }
  const samples = raw.length / AUDIO_FORMAT.sampleWidth / AUDIO_FORMAT.channels;
  return {
    pcm: raw,
    samples,
    durationMs: (samples / AUDIO_FORMAT.sampleRate) * 1000,
    seq: declared.seq,
  };
}

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Buffer.from(..., 'base64') silently skips invalid characters, so the alphabet is checked first
export function decodeBase64Audio(data: string, declared: DeclaredAudio = {}): PcmFrame {
  if (!BASE64_RE.test(data)) {
    throw malformed('audio data is not valid base64');
  }
  return decodeAudio(Buffer.from(data, 'base64'), declared);
}

// ===== ENCODE =====

export function toServerMessage(event: RecognitionEvent):
  | { type: 'partial'; text: string }
  | { type: 'final'; text: string }
  | { type: 'error'; message: string; code: RecognitionErrorCode } {
  switch (event.kind) {
    case 'partial':
      return { type: 'partial', text: event.text };
    case 'final':
      return { type: 'final', text: event.text };
    case 'error':
      return { type: 'error', message: event.message, code: event.code };
  }
}

export function encodeEvent(event: RecognitionEvent): string {
  return JSON.stringify(toServerMessage(event));
}

export function errorEvent(err: RecognitionError): RecognitionEvent {
  return { kind: 'error', code: err.code, message: err.message };
}
