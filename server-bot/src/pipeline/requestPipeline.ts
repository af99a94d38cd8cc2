import { oggOpusDurationSeconds, pcmDurationSeconds, type CodecSpec } from "../audio/codec.js";
import type { AudioTranscoder } from "../audio/ffmpeg.js";
import { createScratchDir } from "../audio/scratch.js";
import { speedOf, type VoicePrefs } from "../bot/voices.js";
import { PipelineError, errorMessage, toPipelineError, type ErrorKind } from "../errors.js";
import type { AuditSink } from "../logging/audit.js";
import type { SpeechRenderer } from "../tts/speechRenderer.js";
import { isSpeakable, sanitizeMessageText, splitText } from "../tts/textUtils.js";
import type { AudioBuffer, InboundRequest, PipelineResult, VoiceNote } from "../types.js";

export type RequestPipelineOptions = {
  renderer: SpeechRenderer;
  transcoder: AudioTranscoder;
  primaryCodec: CodecSpec;
  fallbackCodec: CodecSpec | null;
  maxTextChars: number;
  maxDocumentChars: number;
  chunkChars: number;
  requestTimeoutMs: number;
  scratchDir: string;
  audit?: AuditSink;
};

type Rendered = { audio: AudioBuffer; parts: number };

export function normalizeRequestText(request: InboundRequest, limits: { maxTextChars: number; maxDocumentChars: number }) {
  const text = sanitizeMessageText(request.rawText);
  const limit = request.source === "document" ? limits.maxDocumentChars : limits.maxTextChars;
  if (!text) {
    throw new PipelineError("ValidationError", "text is empty");
  }
  if (text.length > limit) {
    throw new PipelineError("ValidationError", `text is ${text.length} characters, the limit is ${limit}`);
  }
  if (!isSpeakable(text)) {
    throw new PipelineError("ValidationError", "text has nothing to pronounce");
  }
  return text;
}

/** Joins chunk renders; only raw PCM and MP3 frames survive byte concatenation. */
export function concatAudio(buffers: AudioBuffer[]): AudioBuffer {
  if (!buffers.length) throw new PipelineError("SynthesisError", "no audio was rendered");
  const [first, ...rest] = buffers;
  if (!rest.length) return first;
  for (const b of rest) {
    if (b.codec !== first.codec || b.sampleRate !== first.sampleRate || b.channels !== first.channels) {
      throw new PipelineError("SynthesisError", "rendered chunks have mismatched audio formats");
    }
  }
  if (first.codec !== "mp3" && first.codec !== "pcm_s16le") {
    throw new PipelineError("SynthesisError", `cannot stitch ${first.codec} chunks`);
  }
  return { ...first, bytes: Buffer.concat(buffers.map((b) => b.bytes)) };
}

export class RequestPipeline {
  private readonly opts: RequestPipelineOptions;

  constructor(opts: RequestPipelineOptions) {
    this.opts = opts;
  }

  /** Never throws; `signal` is the caller's own deadline on top of `requestTimeoutMs`. */
  async process(request: InboundRequest, signal?: AbortSignal): Promise<PipelineResult> {
    const startedAt = Date.now();
    const { conversationId } = request;

    let text: string;
    try {
      text = normalizeRequestText(request, this.opts);
    } catch (err) {
      return this.fail(request, toPipelineError(err, "ValidationError"), startedAt);
    }

    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), this.opts.requestTimeoutMs);
    const onOuterAbort = () => controller.abort();
    if (signal?.aborted) onOuterAbort();
    signal?.addEventListener("abort", onOuterAbort, { once: true });
    try {
      const note = await this.run(request, text, controller.signal);
      this.opts.audit?.({
        type: "request_done",
        at: new Date().toISOString(),
        conversationId,
        codec: note.codec,
        payloadBytes: note.payload.length,
        durationSec: note.durationHint,
        parts: note.parts,
        tookMs: Date.now() - startedAt
      });
      return { ok: true, conversationId, note };
    } catch (err) {
      const failure = signal?.aborted
        ? new PipelineError("TimeoutError", "request deadline passed", { cause: err })
        : controller.signal.aborted
          ? new PipelineError("TimeoutError", `request exceeded ${this.opts.requestTimeoutMs}ms`, { cause: err })
          : toPipelineError(err, "SynthesisError");
      return this.fail(request, failure, startedAt);
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener("abort", onOuterAbort);
    }
  }

  private async run(request: InboundRequest, text: string, signal: AbortSignal): Promise<VoiceNote> {
    const scratch = await createScratchDir(this.opts.scratchDir).catch((err: unknown) => {
      throw new PipelineError("TranscodeError", `could not allocate scratch space: ${errorMessage(err)}`, {
        cause: err
      });
    });
    try {
      const { audio, parts } = await this.render(text, request.voice, signal);
      const speed = speedOf(request.voice).multiplier;
      const encoded = await this.encode(request, audio, scratch.path, speed, signal);
      return {
        payload: encoded.audio.bytes,
        mimeType: encoded.codec.mimeType,
        durationHint: this.durationOf(audio, encoded.audio, speed),
        codec: encoded.codec.name,
        parts
      };
    } finally {
      await scratch.release();
    }
  }

  private async render(text: string, voice: VoicePrefs, signal: AbortSignal): Promise<Rendered> {
    const chunks = text.length > this.opts.chunkChars ? splitText(text, this.opts.chunkChars) : [text];
    const buffers: AudioBuffer[] = [];
    for (const [idx, chunk] of chunks.entries()) {
      if (signal.aborted) throw new PipelineError("SynthesisError", "aborted between chunks");
      if (chunks.length > 1) {
        console.log("[pipeline] rendering chunk", { chunk: idx + 1, of: chunks.length, chars: chunk.length });
      }
      try {
        buffers.push(await this.opts.renderer.render(chunk.trim(), voice, signal));
      } catch (err) {
        const failure = toPipelineError(err, "SynthesisError");
        if (chunks.length === 1) throw failure;
        throw new PipelineError("SynthesisError", `part ${idx + 1}/${chunks.length}: ${failure.message}`, {
          cause: err
        });
      }
    }
    return { audio: concatAudio(buffers), parts: chunks.length };
  }

  private async encode(
    request: InboundRequest,
    audio: AudioBuffer,
    workDir: string,
    speed: number,
    signal: AbortSignal
  ): Promise<{ audio: AudioBuffer; codec: CodecSpec }> {
    const { primaryCodec, fallbackCodec, transcoder } = this.opts;
    try {
      const out = await transcoder.transcode(audio, primaryCodec, { workDir, speed, signal });
      return { audio: out, codec: primaryCodec };
    } catch (err) {
      const failure = toPipelineError(err, "TranscodeError");
      if (!fallbackCodec || signal.aborted) throw failure;
      console.warn("[pipeline] transcode failed, trying fallback codec", {
        conversationId: request.conversationId,
        from: primaryCodec.name,
        to: fallbackCodec.name,
        error: failure.message
      });
      this.opts.audit?.({
        type: "transcode_fallback",
        at: new Date().toISOString(),
        conversationId: request.conversationId,
        from: primaryCodec.name,
        to: fallbackCodec.name,
        message: failure.message
      });
      try {
        const out = await transcoder.transcode(audio, fallbackCodec, { workDir, speed, signal });
        return { audio: out, codec: fallbackCodec };
      } catch (fallbackErr) {
        throw toPipelineError(fallbackErr, "TranscodeError");
      }
    }
  }

  private durationOf(source: AudioBuffer, encoded: AudioBuffer, speed: number): number {
    let seconds = 0;
    if (encoded.codec === "ogg_opus") seconds = oggOpusDurationSeconds(encoded.bytes);
    if (!seconds && source.codec === "pcm_s16le") {
      seconds = pcmDurationSeconds(source.bytes.length, source.sampleRate, source.channels) / speed;
    }
    return Math.ceil(seconds);
  }

  private fail(request: InboundRequest, err: PipelineError, startedAt: number): PipelineResult {
    const kind: ErrorKind = err.kind;
    const tookMs = Date.now() - startedAt;
    console.warn("[pipeline] request failed", {
      conversationId: request.conversationId,
      kind,
      error: err.message,
      tookMs
    });
    this.opts.audit?.({
      type: "request_failed",
      at: new Date().toISOString(),
      conversationId: request.conversationId,
      kind,
      message: err.message,
      tookMs
    });
    return { ok: false, conversationId: request.conversationId, kind, message: err.message };
  }
}
