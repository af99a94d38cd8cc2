import { describe, expect, it, vi } from "vitest";
import type { AuditEvent } from "../../logging/audit.js";
import { ConversationQueue } from "../../pipeline/conversationQueue.js";
import { UserPrefsStore } from "../../prefs/userPrefs.js";
import type { InboundRequest, PipelineResult } from "../../types.js";
import { DeliveryDispatcher, failureText, type VoiceTransport } from "../deliveryDispatcher.js";
import { DASHBOARD_TEXT, dashboardKeyboard, welcomeText } from "../menus.js";
import {
  BAD_ENCODING_NOTICE,
  BUSY_NOTICE,
  EMPTY_FILE_NOTICE,
  MessageIngestor,
  NOT_PLAIN_TEXT_NOTICE,
  NOT_TEXT_NOTICE,
  UNKNOWN_COMMAND_NOTICE,
  type ChatReplier,
  type InboundEvent,
  type ReplyOptions
} from "../messageIngestor.js";
import { DEFAULT_VOICE_PREFS } from "../voices.js";

function fakeChat() {
  const replies: Array<{ text: string; opts?: ReplyOptions }> = [];
  const edits: Array<{ text: string; opts?: ReplyOptions }> = [];
  let answered = 0;
  let recordings = 0;
  const chat: ChatReplier = {
    async reply(text, opts) {
      replies.push({ text, opts });
    },
    async edit(text, opts) {
      edits.push({ text, opts });
    },
    async answerCallback() {
      answered += 1;
    },
    async showRecording() {
      recordings += 1;
    }
  };
  return {
    chat,
    replies,
    edits,
    answered: () => answered,
    recordings: () => recordings
  };
}

type SetupOptions = {
  maxDepth?: number;
  maxConcurrency?: number;
  requestTimeoutMs?: number;
  process?: (r: InboundRequest) => Promise<PipelineResult>;
  file?: Buffer;
  download?: (fileId: string) => Promise<Buffer>;
  sendVoice?: (chatId: number) => Promise<void>;
};

function setup(opts: SetupOptions = {}) {
  const events: AuditEvent[] = [];
  const sentVoices: Array<{ chatId: number; filename: string }> = [];
  const sentTexts: Array<{ chatId: number; text: string }> = [];
  const transport: VoiceTransport = {
    async sendVoice(chatId, _note, o) {
      if (opts.sendVoice) await opts.sendVoice(chatId);
      sentVoices.push({ chatId, filename: o.filename });
    },
    async sendText(chatId, text) {
      sentTexts.push({ chatId, text });
    }
  };
  const queue = new ConversationQueue({ maxConcurrency: opts.maxConcurrency ?? 2, maxDepth: opts.maxDepth ?? 5 });
  const prefs = new UserPrefsStore();
  const process = vi.fn(
    opts.process ??
      (async (r: InboundRequest): Promise<PipelineResult> => ({
        ok: true,
        conversationId: r.conversationId,
        note: { payload: Buffer.from("OggS"), mimeType: "audio/ogg", durationHint: 1, codec: "ogg_opus", parts: 1 }
      }))
  );
  const downloadFile = vi.fn(async (fileId: string, _signal?: AbortSignal) =>
    opts.download ? opts.download(fileId) : (opts.file ?? Buffer.from("Hello document text"))
  );
  const ingestor = new MessageIngestor({
    config: { maxTextChars: 10, maxDocumentBytes: 2048, requestTimeoutMs: opts.requestTimeoutMs ?? 5_000 },
    prefs,
    queue,
    pipeline: { process },
    dispatcher: new DeliveryDispatcher({ transport, retries: 0, backoffMs: 1, maxTextChars: 10 }),
    downloadFile,
    audit: (e) => events.push(e)
  });
  return { ingestor, queue, prefs, process, downloadFile, events, sentVoices, sentTexts };
}

describe("MessageIngestor", () => {
  it("greets on /start", async () => {
    const { ingestor } = setup();
    const c = fakeChat();

    await ingestor.handle({ kind: "command", chatId: 5, command: "start" }, c.chat);

    expect(c.replies).toHaveLength(1);
    expect(c.replies[0].text).toBe(welcomeText(DEFAULT_VOICE_PREFS, 10));
    expect(c.replies[0].opts?.html).toBe(true);
    expect(c.replies[0].opts?.keyboard?.inline_keyboard).toEqual([
      [{ text: "⚙️ Open Settings Dashboard", callback_data: "open:dashboard" }]
    ]);
  });

  it("answers unknown commands", async () => {
    const { ingestor } = setup();
    const c = fakeChat();
    await ingestor.handle({ kind: "command", chatId: 5, command: "weather" }, c.chat);
    await ingestor.handle({ kind: "text", chatId: 5, text: "/weather@other_bot" }, c.chat);
    expect(c.replies.map((r) => r.text)).toEqual([UNKNOWN_COMMAND_NOTICE, UNKNOWN_COMMAND_NOTICE]);
  });

  it("queues text and delivers the voice note", async () => {
    const { ingestor, queue, process, events, sentVoices } = setup();
    const c = fakeChat();

    await ingestor.handle({ kind: "text", chatId: 5, text: "Hi there" }, c.chat);
    await queue.drain();

    expect(process).toHaveBeenCalledTimes(1);
    expect(process.mock.calls[0][0]).toMatchObject({
      conversationId: 5,
      rawText: "Hi there",
      source: "text",
      voice: DEFAULT_VOICE_PREFS
    });
    expect(c.recordings()).toBe(1);
    expect(sentVoices).toEqual([{ chatId: 5, filename: "voice_note_5.ogg" }]);
    expect(events[0]).toMatchObject({ type: "request_accepted", conversationId: 5, source: "text", textChars: 8 });
  });

  it("uses the settings in force when the message arrived", async () => {
    const { ingestor, queue, prefs, process } = setup();
    prefs.update(5, { languageKey: "fr", speedKey: "2.0" });

    await ingestor.handle({ kind: "text", chatId: 5, text: "Salut" }, fakeChat().chat);
    prefs.update(5, { languageKey: "es" });
    await queue.drain();

    expect(process.mock.calls[0][0].voice).toEqual({ languageKey: "fr", speedKey: "2.0" });
  });

  it("updates settings from a button press", async () => {
    const { ingestor, prefs, events } = setup();
    const c = fakeChat();

    await ingestor.handle({ kind: "callback", chatId: 5, data: "set:lang:fr" }, c.chat);

    expect(c.answered()).toBe(1);
    expect(prefs.get(5)).toEqual({ languageKey: "fr", speedKey: "1.0" });
    expect(c.edits).toHaveLength(1);
    expect(c.edits[0].text).toBe(DASHBOARD_TEXT);
    expect(c.edits[0].opts?.keyboard?.inline_keyboard).toEqual(
      dashboardKeyboard({ languageKey: "fr", speedKey: "1.0" }).inline_keyboard
    );
    expect(events).toMatchObject([{ type: "prefs_update", conversationId: 5, languageKey: "fr", speedKey: "1.0" }]);
  });

  it("acknowledges and drops unknown buttons", async () => {
    const { ingestor, events } = setup();
    const c = fakeChat();

    await ingestor.handle({ kind: "callback", chatId: 5, data: "set:lang:xx" }, c.chat);

    expect(c.answered()).toBe(1);
    expect(c.edits).toEqual([]);
    expect(events).toMatchObject([{ type: "input_dropped", conversationId: 5 }]);
  });

  it("drops updates without a chat", async () => {
    const { ingestor, events } = setup();
    const c = fakeChat();

    await ingestor.handle(null, c.chat);

    expect(c.answered()).toBe(1);
    expect(c.replies).toEqual([]);
    expect(events).toEqual([
      { type: "input_dropped", at: expect.any(String), conversationId: undefined, reason: "update carries no chat or payload" }
    ]);
  });

  it("explains what it accepts", async () => {
    const { ingestor } = setup();
    const c = fakeChat();
    await ingestor.handle({ kind: "other", chatId: 5 }, c.chat);
    await ingestor.handle({ kind: "document", chatId: 5, fileId: "f", mimeType: "application/pdf" }, c.chat);
    await ingestor.handle({ kind: "document", chatId: 5, fileId: "f", mimeType: "text/plain", fileSize: 4096 }, c.chat);
    expect(c.replies.map((r) => r.text)).toEqual([
      NOT_TEXT_NOTICE,
      NOT_PLAIN_TEXT_NOTICE,
      "❌ That file is too large. The limit is 2 KB."
    ]);
  });

  it("reads text documents inside the queue", async () => {
    const { ingestor, queue, process, downloadFile } = setup();
    const c = fakeChat();

    await ingestor.handle({ kind: "document", chatId: 5, fileId: "file-1", mimeType: "text/plain", fileSize: 19 }, c.chat);
    await queue.drain();

    expect(downloadFile).toHaveBeenCalledWith("file-1", expect.any(AbortSignal));
    expect(c.replies.map((r) => r.text)).toEqual([
      "📝 Large file detected (19 characters). Processing in chunks. This may take a moment..."
    ]);
    expect(process.mock.calls[0][0]).toMatchObject({ rawText: "Hello document text", source: "document" });
  });

  it("refuses documents that are not UTF-8", async () => {
    const { ingestor, queue, process, events } = setup({ file: Buffer.from([0xff, 0xfe, 0xfd]) });
    const c = fakeChat();

    await ingestor.handle({ kind: "document", chatId: 5, fileId: "f", mimeType: "text/plain" }, c.chat);
    await queue.drain();

    expect(c.replies.map((r) => r.text)).toEqual([BAD_ENCODING_NOTICE]);
    expect(process).not.toHaveBeenCalled();
    expect(events).toMatchObject([{ type: "input_dropped", reason: "document is not valid UTF-8" }]);
  });

  it("refuses empty documents", async () => {
    const { ingestor, queue, process } = setup({ file: Buffer.from(" \n ") });
    const c = fakeChat();

    await ingestor.handle({ kind: "document", chatId: 5, fileId: "f", mimeType: "text/plain" }, c.chat);
    await queue.drain();

    expect(c.replies.map((r) => r.text)).toEqual([EMPTY_FILE_NOTICE]);
    expect(process).not.toHaveBeenCalled();
  });

  it("tells the user when their backlog is full", async () => {
    let release: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { ingestor, queue, events, sentTexts } = setup({
      maxDepth: 1,
      process: async (r) => {
        await blocked;
        return { ok: false, conversationId: r.conversationId, kind: "SynthesisError", message: "x" };
      }
    });
    const c = fakeChat();

    await ingestor.handle({ kind: "text", chatId: 5, text: "one" }, c.chat);
    await ingestor.handle({ kind: "text", chatId: 5, text: "two" }, c.chat);

    expect(sentTexts).toEqual([{ chatId: 5, text: BUSY_NOTICE }]);
    expect(events.map((e) => e.type)).toContain("request_busy");

    release();
    await queue.drain();
    expect(sentTexts[1]).toEqual({
      chatId: 5,
      text: "❌ Sorry, I could not generate the audio. Please try again later."
    });
  });

  it("releases the slot when a download never finishes", async () => {
    const { ingestor, queue, process, events, sentTexts } = setup({
      requestTimeoutMs: 50,
      download: () => new Promise<Buffer>(() => undefined)
    });
    const c = fakeChat();
    const document = (chatId: number): InboundEvent => ({
      kind: "document",
      chatId,
      fileId: `file-${chatId}`,
      mimeType: "text/plain",
      fileSize: 12
    });

    await ingestor.handle(document(1), c.chat);
    await ingestor.handle(document(2), c.chat);
    await ingestor.handle({ kind: "text", chatId: 3, text: "hi" }, c.chat);
    await queue.drain();

    expect(process.mock.calls.map((call) => call[0].conversationId)).toEqual([3]);
    const timeout = failureText("TimeoutError", 10);
    expect(sentTexts).toEqual([
      { chatId: 1, text: timeout },
      { chatId: 2, text: timeout }
    ]);
    expect(events.filter((e) => e.type === "request_failed")).toEqual([
      expect.objectContaining({ conversationId: 1, kind: "TimeoutError", message: "request exceeded 50ms" }),
      expect.objectContaining({ conversationId: 2, kind: "TimeoutError", message: "request exceeded 50ms" })
    ]);
  });

  it("releases the slot when delivery never finishes", async () => {
    const { ingestor, queue, process, sentTexts, sentVoices } = setup({
      maxConcurrency: 1,
      requestTimeoutMs: 50,
      sendVoice: () => new Promise<void>(() => undefined)
    });
    const c = fakeChat();

    await ingestor.handle({ kind: "text", chatId: 1, text: "one" }, c.chat);
    await ingestor.handle({ kind: "text", chatId: 2, text: "two" }, c.chat);
    await queue.drain();

    expect(process.mock.calls.map((call) => call[0].conversationId)).toEqual([1, 2]);
    expect(sentVoices).toEqual([]);
    const timeout = failureText("TimeoutError", 10);
    expect(sentTexts).toEqual([
      { chatId: 1, text: timeout },
      { chatId: 2, text: timeout }
    ]);
  });
});
