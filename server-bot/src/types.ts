import type { ErrorKind } from "./errors.js";
import type { VoicePrefs } from "./bot/voices.js";

export type AudioCodec = "mp3" | "pcm_s16le" | "wav" | "ogg_opus";

export type AudioBuffer = {
  bytes: Buffer;
  sampleRate: number;
  channels: number;
  codec: AudioCodec;
};

export type RequestSource = "text" | "document";

export type InboundRequest = Readonly<{
  conversationId: number;
  rawText: string;
  receivedAt: Date;
  source: RequestSource;
  voice: Readonly<VoicePrefs>;
}>;

export type VoiceNote = {
  payload: Buffer;
  mimeType: string;
  /** Seconds, rounded up; 0 when unknown. */
  durationHint: number;
  codec: string;
  /** Number of synthesized text chunks that were stitched together. */
  parts: number;
};

export type PipelineResult =
  | { ok: true; conversationId: number; note: VoiceNote }
  | { ok: false; conversationId: number; kind: ErrorKind; message: string };

export function makeInboundRequest(input: {
  conversationId: number;
  rawText: string;
  source?: RequestSource;
  voice: VoicePrefs;
  receivedAt?: Date;
}): InboundRequest {
  return Object.freeze({
    conversationId: input.conversationId,
    rawText: input.rawText,
    receivedAt: input.receivedAt ?? new Date(),
    source: input.source ?? "text",
    voice: Object.freeze({ ...input.voice })
  });
}
