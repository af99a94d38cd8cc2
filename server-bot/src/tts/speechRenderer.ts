import { PipelineError, errorMessage } from "../errors.js";
import type { AudioBuffer } from "../types.js";
import { languageOf, type VoicePrefs } from "../bot/voices.js";
import type { TtsEngine, TtsSynthesisConfig } from "./ttsEngine.js";

/** Turns text into audio. Implementations fail with a SynthesisError, never hang. */
export interface SpeechRenderer {
  render(text: string, voice: VoicePrefs, signal?: AbortSignal): Promise<AudioBuffer>;
}

type AbortReason = "timeout" | "audio_too_large" | "aborted";

export type EngineSpeechRendererOptions = {
  model: string;
  voice: string;
  timeoutMs: number;
  maxAudioBytes: number;
};

export class EngineSpeechRenderer implements SpeechRenderer {
  constructor(
    private readonly engine: TtsEngine,
    private readonly opts: EngineSpeechRendererOptions
  ) {}

  async render(text: string, voice: VoicePrefs, signal?: AbortSignal): Promise<AudioBuffer> {
    const cfg: TtsSynthesisConfig = {
      model: this.opts.model,
      voice: this.opts.voice,
      language: languageOf(voice).code
    };
    const format = this.engine.getOutputFormat(cfg);
    const startedAt = Date.now();

    const controller = new AbortController();
    const state: { why: AbortReason | null } = { why: null };
    let stopRace: (reason: Error) => void = () => undefined;
    // Engines may ignore the signal; racing keeps the caller from waiting on them.
    const aborted = new Promise<never>((_resolve, reject) => {
      stopRace = reject;
    });
    aborted.catch(() => undefined);
    const abortWith = (reason: AbortReason) => {
      if (!state.why) state.why = reason;
      stopRace(new Error(reason));
      controller.abort();
    };
    const timer = setTimeout(() => abortWith("timeout"), this.opts.timeoutMs);
    const onOuterAbort = () => abortWith("aborted");
    if (signal?.aborted) onOuterAbort();
    signal?.addEventListener("abort", onOuterAbort, { once: true });

    const chunks: Buffer[] = [];
    let total = 0;
    try {
      await Promise.race([
        this.engine.synthesize(
          text,
          cfg,
          (chunk) => {
            if (controller.signal.aborted) return;
            chunks.push(chunk);
            total += chunk.length;
            if (total > this.opts.maxAudioBytes) abortWith("audio_too_large");
          },
          controller.signal
        ),
        aborted
      ]);
    } catch (err) {
      throw this.failure(state.why, err, total, startedAt);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onOuterAbort);
    }

    if (state.why) throw this.failure(state.why, null, total, startedAt);
    if (!total) {
      throw new PipelineError("SynthesisError", `${this.engine.name} produced no audio`);
    }

    return {
      bytes: Buffer.concat(chunks, total),
      sampleRate: format.sampleRate,
      channels: format.channels,
      codec: format.codec
    };
  }

  private failure(
    why: AbortReason | null,
    err: unknown,
    audioBytes: number,
    startedAt: number
  ): PipelineError {
    const message =
      why === "timeout"
        ? `speech synthesis timed out after ${this.opts.timeoutMs}ms`
        : why === "audio_too_large"
          ? `speech synthesis exceeded ${this.opts.maxAudioBytes} bytes`
          : why === "aborted"
            ? "speech synthesis aborted"
            : `speech synthesis failed: ${errorMessage(err)}`;
    console.warn("[tts] synthesize failed", {
      engine: this.engine.name,
      why: why ?? "tts_failed",
      audioBytes,
      tookMs: Date.now() - startedAt
    });
    return new PipelineError("SynthesisError", message, { cause: err ?? undefined });
  }
}
