import type { AudioCodec } from "../types.js";

export type TtsSynthesisConfig = {
  model: string;
  voice: string;
  /** BCP-47-ish language code, e.g. "en" or "hi". */
  language: string;
};

export type TtsOutputFormat = {
  codec: AudioCodec;
  sampleRate: number;
  channels: number;
};

export type TtsChunkHandler = (chunk: Buffer) => void;

export interface TtsEngine {
  readonly name: string;
  getOutputFormat(cfg: TtsSynthesisConfig): TtsOutputFormat;
  synthesize(
    text: string,
    cfg: TtsSynthesisConfig,
    onChunk: TtsChunkHandler,
    signal?: AbortSignal
  ): Promise<void>;
}

export const DEFAULT_TTS_SAMPLE_RATE = 24_000;
