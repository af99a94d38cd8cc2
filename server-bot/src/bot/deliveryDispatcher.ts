import { GrammyError, HttpError, InputFile, type Api } from "grammy";
import { PipelineError, errorMessage, type ErrorKind } from "../errors.js";
import type { AuditSink } from "../logging/audit.js";
import type { InboundRequest, PipelineResult, VoiceNote } from "../types.js";
import { describeVoice } from "./voices.js";

export type VoiceTransport = {
  sendVoice(
    chatId: number,
    note: VoiceNote,
    opts: { caption?: string; filename: string },
    signal?: AbortSignal
  ): Promise<void>;
  sendText(chatId: number, text: string, signal?: AbortSignal): Promise<void>;
};

export function createGrammyTransport(api: Api): VoiceTransport {
  return {
    async sendVoice(chatId, note, opts, signal) {
      await api.sendVoice(
        chatId,
        new InputFile(note.payload, opts.filename),
        {
          caption: opts.caption,
          duration: note.durationHint > 0 ? note.durationHint : undefined
        },
        signal
      );
    },
    async sendText(chatId, text, signal) {
      await api.sendMessage(chatId, text, undefined, signal);
    }
  };
}

export type DeliveryDispatcherOptions = {
  transport: VoiceTransport;
  retries: number;
  backoffMs: number;
  maxTextChars: number;
  audit?: AuditSink;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type DispatchOutcome = { delivered: true; attempts: number } | { delivered: false; attempts: number; error: PipelineError };

const MAX_BACKOFF_MS = 30_000;

/** Resolves after `ms`, or as soon as the signal aborts. */
function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    if (signal?.aborted) done();
    else signal?.addEventListener("abort", done, { once: true });
  });
}

/** Network failures, rate limits and server-side errors are worth another attempt. */
export function retryDelayFor(err: unknown, attempt: number, baseMs: number): number | null {
  const exponential = Math.min(MAX_BACKOFF_MS, baseMs * 2 ** (attempt - 1));
  if (err instanceof HttpError) return exponential;
  if (err instanceof GrammyError) {
    if (err.error_code === 429) {
      const retryAfter = err.parameters.retry_after;
      return retryAfter ? Math.max(exponential, retryAfter * 1000) : exponential;
    }
    if (err.error_code >= 500) return exponential;
    return null;
  }
  return null;
}

export function failureText(kind: ErrorKind, maxTextChars: number): string {
  switch (kind) {
    case "ValidationError":
      return `⚠️ Please send some text to speak (up to ${maxTextChars} characters).`;
    case "SynthesisError":
      return "❌ Sorry, I could not generate the audio. Please try again later.";
    case "TranscodeError":
      return "❌ Sorry, I could not encode the voice note.";
    case "TimeoutError":
      return "⌛ Sorry, that took too long. Please try a shorter text.";
    case "DispatchError":
      return "❌ Sorry, I could not deliver the voice note.";
  }
}

export function voiceCaption(request: InboundRequest, note: VoiceNote): string {
  const base = `🗣️ Spoken in ${describeVoice(request.voice)}`;
  return note.parts > 1 ? `${base} (${note.parts} parts combined)` : base;
}

export class DeliveryDispatcher {
  private readonly opts: DeliveryDispatcherOptions;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(opts: DeliveryDispatcherOptions) {
    this.opts = opts;
    this.sleep = opts.sleep ?? pause;
  }

  /** Sends the note or the failure text. An aborted `signal` ends delivery without further attempts. */
  async dispatch(request: InboundRequest, result: PipelineResult, signal?: AbortSignal): Promise<DispatchOutcome> {
    const chatId = request.conversationId;
    if (result.ok) {
      const { note } = result;
      const suffix = note.parts > 1 ? "_combined" : "";
      const filename = `voice_note_${chatId}${suffix}.${note.codec === "mp3" ? "mp3" : "ogg"}`;
      const caption = voiceCaption(request, note);
      const outcome = await this.withRetry(
        chatId,
        () => this.opts.transport.sendVoice(chatId, note, { caption, filename }, signal),
        signal
      );
      if (!outcome.delivered && outcome.error.kind === "DispatchError") {
        await this.notify(chatId, failureText("DispatchError", this.opts.maxTextChars), signal);
      }
      return outcome;
    }
    return this.withRetry(
      chatId,
      () => this.opts.transport.sendText(chatId, failureText(result.kind, this.opts.maxTextChars), signal),
      signal
    );
  }

  /** One-shot text reply for notices outside the pipeline; failures are logged. */
  async notify(chatId: number, text: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.opts.transport.sendText(chatId, text, signal);
      return true;
    } catch (err) {
      console.warn("[dispatch] notice failed", { chatId, error: errorMessage(err) });
      return false;
    }
  }

  private cancelled(chatId: number, attempts: number): DispatchOutcome {
    console.warn("[dispatch] delivery cancelled", { chatId, attempts });
    return {
      delivered: false,
      attempts,
      error: new PipelineError("TimeoutError", "delivery cancelled by the request deadline")
    };
  }

  private async withRetry(chatId: number, send: () => Promise<void>, signal?: AbortSignal): Promise<DispatchOutcome> {
    const maxAttempts = this.opts.retries + 1;
    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) return this.cancelled(chatId, attempt - 1);
      try {
        await send();
        return { delivered: true, attempts: attempt };
      } catch (err) {
        if (signal?.aborted) return this.cancelled(chatId, attempt);
        const delay = retryDelayFor(err, attempt, this.opts.backoffMs);
        if (delay === null || attempt >= maxAttempts) {
          const error = new PipelineError("DispatchError", `delivery failed after ${attempt} attempt(s): ${errorMessage(err)}`, {
            cause: err
          });
          console.error("[dispatch] delivery failed", { chatId, attempts: attempt, error: error.message });
          this.opts.audit?.({
            type: "dispatch_failed",
            at: new Date().toISOString(),
            conversationId: chatId,
            attempt,
            message: error.message
          });
          return { delivered: false, attempts: attempt, error };
        }
        console.warn("[dispatch] retrying", { chatId, attempt, delayMs: delay, error: errorMessage(err) });
        this.opts.audit?.({
          type: "dispatch_retry",
          at: new Date().toISOString(),
          conversationId: chatId,
          attempt,
          message: errorMessage(err)
        });
        await this.sleep(delay, signal);
      }
    }
  }
}
