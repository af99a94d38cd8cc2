import { GrammyError, HttpError } from "grammy";
import { describe, expect, it, vi } from "vitest";
import type { AuditEvent } from "../../logging/audit.js";
import { makeInboundRequest, type PipelineResult, type VoiceNote } from "../../types.js";
import { DeliveryDispatcher, failureText, retryDelayFor, type VoiceTransport } from "../deliveryDispatcher.js";

const apiError = (code: number, retryAfter?: number) =>
  new GrammyError(
    `Call to 'sendVoice' failed! (${code})`,
    {
      ok: false,
      error_code: code,
      description: code === 429 ? "Too Many Requests" : "Bad Request: chat not found",
      parameters: retryAfter === undefined ? undefined : { retry_after: retryAfter }
    },
    "sendVoice",
    {}
  );

const networkError = () => new HttpError("Network request for 'sendVoice' failed!", new Error("ECONNRESET"));

const request = makeInboundRequest({
  conversationId: 42,
  rawText: "Hello there",
  voice: { languageKey: "en", speedKey: "1.0" }
});

const note = (overrides: Partial<VoiceNote> = {}): VoiceNote => ({
  payload: Buffer.from("OggS"),
  mimeType: "audio/ogg",
  durationHint: 3,
  codec: "ogg_opus",
  parts: 1,
  ...overrides
});

function fakeTransport(voiceFailures: unknown[] = [], textFailures: unknown[] = []) {
  const voices: Array<{ chatId: number; filename: string; caption?: string }> = [];
  const texts: Array<{ chatId: number; text: string }> = [];
  const transport: VoiceTransport = {
    async sendVoice(chatId, _note, opts) {
      const failure = voiceFailures.shift();
      if (failure) throw failure;
      voices.push({ chatId, ...opts });
    },
    async sendText(chatId, text) {
      const failure = textFailures.shift();
      if (failure) throw failure;
      texts.push({ chatId, text });
    }
  };
  return { transport, voices, texts };
}

function dispatcher(transport: VoiceTransport, retries = 3) {
  const sleep = vi.fn(async (_ms: number) => undefined);
  const events: AuditEvent[] = [];
  const d = new DeliveryDispatcher({
    transport,
    retries,
    backoffMs: 100,
    maxTextChars: 4000,
    audit: (e) => events.push(e),
    sleep
  });
  return { d, sleep, events };
}

describe("retryDelayFor", () => {
  it("backs off exponentially on network errors", () => {
    expect(retryDelayFor(networkError(), 1, 500)).toBe(500);
    expect(retryDelayFor(networkError(), 3, 500)).toBe(2000);
    expect(retryDelayFor(networkError(), 10, 500)).toBe(30_000);
  });

  it("honors retry_after on rate limits", () => {
    expect(retryDelayFor(apiError(429, 3), 1, 500)).toBe(3000);
    expect(retryDelayFor(apiError(429), 2, 500)).toBe(1000);
  });

  it("retries server errors only", () => {
    expect(retryDelayFor(apiError(502), 1, 500)).toBe(500);
    expect(retryDelayFor(apiError(400), 1, 500)).toBeNull();
    expect(retryDelayFor(new Error("bug"), 1, 500)).toBeNull();
  });
});

describe("DeliveryDispatcher", () => {
  it("sends the voice note with a caption", async () => {
    const { transport, voices } = fakeTransport();
    const { d } = dispatcher(transport);
    const result: PipelineResult = { ok: true, conversationId: 42, note: note() };

    await expect(d.dispatch(request, result)).resolves.toEqual({ delivered: true, attempts: 1 });
    expect(voices).toEqual([
      { chatId: 42, filename: "voice_note_42.ogg", caption: "🗣️ Spoken in English at 🚶 1x (Normal)" }
    ]);
  });

  it("labels stitched MP3 notes", async () => {
    const { transport, voices } = fakeTransport();
    const { d } = dispatcher(transport);

    await d.dispatch(request, { ok: true, conversationId: 42, note: note({ codec: "mp3", parts: 3 }) });

    expect(voices[0]).toEqual({
      chatId: 42,
      filename: "voice_note_42_combined.mp3",
      caption: "🗣️ Spoken in English at 🚶 1x (Normal) (3 parts combined)"
    });
  });

  it("retries transient failures with backoff", async () => {
    const { transport, voices } = fakeTransport([networkError(), apiError(429, 1)]);
    const { d, sleep, events } = dispatcher(transport);

    const outcome = await d.dispatch(request, { ok: true, conversationId: 42, note: note() });

    expect(outcome).toEqual({ delivered: true, attempts: 3 });
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 1000]);
    expect(voices).toHaveLength(1);
    expect(events.map((e) => e.type)).toEqual(["dispatch_retry", "dispatch_retry"]);
  });

  it("gives up on a permanent error and tells the user", async () => {
    const { transport, texts } = fakeTransport([apiError(400)]);
    const { d, sleep } = dispatcher(transport);

    const outcome = await d.dispatch(request, { ok: true, conversationId: 42, note: note() });

    expect(outcome.delivered).toBe(false);
    expect(outcome.attempts).toBe(1);
    if (!outcome.delivered) expect(outcome.error.kind).toBe("DispatchError");
    expect(sleep).not.toHaveBeenCalled();
    expect(texts).toEqual([{ chatId: 42, text: failureText("DispatchError", 4000) }]);
  });

  it("stops after the retry budget", async () => {
    const { transport } = fakeTransport([apiError(502), apiError(502), apiError(502)]);
    const { d, events } = dispatcher(transport, 1);

    const outcome = await d.dispatch(request, { ok: true, conversationId: 42, note: note() });

    expect(outcome).toMatchObject({ delivered: false, attempts: 2 });
    expect(events.map((e) => e.type)).toEqual(["dispatch_retry", "dispatch_failed"]);
  });

  it("reports pipeline failures as text", async () => {
    const { transport, texts, voices } = fakeTransport();
    const { d } = dispatcher(transport);

    await d.dispatch(request, { ok: false, conversationId: 42, kind: "TimeoutError", message: "request exceeded 10ms" });

    expect(voices).toEqual([]);
    expect(texts).toEqual([{ chatId: 42, text: "⌛ Sorry, that took too long. Please try a shorter text." }]);
  });

  it("sends nothing once the request deadline has passed", async () => {
    const { transport, voices, texts } = fakeTransport();
    const { d } = dispatcher(transport);
    const controller = new AbortController();
    controller.abort();

    const outcome = await d.dispatch(request, { ok: true, conversationId: 42, note: note() }, controller.signal);

    expect(outcome).toMatchObject({ delivered: false, attempts: 0 });
    if (!outcome.delivered) expect(outcome.error.kind).toBe("TimeoutError");
    expect(voices).toEqual([]);
    expect(texts).toEqual([]);
  });

  it("stops retrying when the deadline passes mid-attempt", async () => {
    const controller = new AbortController();
    const transport: VoiceTransport = {
      async sendVoice() {
        controller.abort();
        throw networkError();
      },
      sendText: vi.fn(async () => undefined)
    };
    const { d, sleep } = dispatcher(transport);

    const outcome = await d.dispatch(request, { ok: true, conversationId: 42, note: note() }, controller.signal);

    expect(outcome).toMatchObject({ delivered: false, attempts: 1 });
    if (!outcome.delivered) expect(outcome.error.message).toBe("delivery cancelled by the request deadline");
    expect(sleep).not.toHaveBeenCalled();
    expect(transport.sendText).not.toHaveBeenCalled();
  });

  it("notify swallows delivery errors", async () => {
    const { transport } = fakeTransport([], [new Error("blocked by user")]);
    const { d } = dispatcher(transport);
    await expect(d.notify(42, "hi")).resolves.toBe(false);
    await expect(d.notify(42, "hi")).resolves.toBe(true);
  });
});
