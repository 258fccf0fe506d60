import { z } from 'zod';
import { ERROR_CODES } from './errors';
import { AudioFormatFieldsSchema } from './frame-codec';

// ===== CLIENT -> SERVER (JSON) =====

export const StartMessageSchema = z.object({
  type: z.literal('start'),
  chatSessionId: z.string().min(1).max(200).optional(),
});
export type StartMessage = z.infer<typeof StartMessageSchema>;

export const AudioMessageSchema = AudioFormatFieldsSchema.extend({
  type: z.literal('audio'),
  data: z.string(),
  seq: z.number().int().nonnegative().optional(),
});
export type AudioMessage = z.infer<typeof AudioMessageSchema>;

export const StopMessageSchema = z.object({
  type: z.literal('stop'),
});
export type StopMessage = z.infer<typeof StopMessageSchema>;

export const ClientMessageSchema = z.discriminatedUnion('type', [
  StartMessageSchema,
  AudioMessageSchema,
  StopMessageSchema,
]);
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// Binary frame header (first 4 bytes = header length big-endian, then JSON header, then raw PCM)
export const AudioChunkHeaderSchema = AudioFormatFieldsSchema.extend({
  type: z.literal('audio'),
  seq: z.number().int().nonnegative().optional(),
});
export type AudioChunkHeader = z.infer<typeof AudioChunkHeaderSchema>;

// ===== SERVER -> CLIENT (JSON) =====

export const PartialMessageSchema = z.object({
  type: z.literal('partial'),
  text: z.string(),
});
export type PartialMessage = z.infer<typeof PartialMessageSchema>;

export const FinalMessageSchema = z.object({
  type: z.literal('final'),
  text: z.string(),
});
export type FinalMessage = z.infer<typeof FinalMessageSchema>;

export const ErrorMessageSchema = z.object({
  type: z.literal('error'),
  message: z.string(),
  code: z.enum(ERROR_CODES),
});
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;

export const ServerMessageSchema = z.discriminatedUnion('type', [
  PartialMessageSchema,
  FinalMessageSchema,
  ErrorMessageSchema,
]);
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

// ===== BINARY FRAMES =====

export function encodeBinaryFrame(header: object, payload: Buffer | Uint8Array): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), 'utf8');
  const lenBuf = Buffer.alloc(4);
  lenBuf.writeUInt32BE(headerJson.length, 0);
  const payloadBuf = Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
  return Buffer.concat([lenBuf, headerJson, payloadBuf]);
}

export function decodeBinaryFrame(frame: Buffer): { header: unknown; payload: Buffer } {
  if (frame.length < 4) throw new Error('frame too short');
  const headerLen = frame.readUInt32BE(0);
  if (headerLen < 2 || frame.length < 4 + headerLen) throw new Error('invalid header length');
  const headerJson = frame.subarray(4, 4 + headerLen).toString('utf8');
  const header: unknown = JSON.parse(headerJson);
  const payload = frame.subarray(4 + headerLen);
  return { header, payload };
}

export * from './errors';
export * from './frame-codec';
