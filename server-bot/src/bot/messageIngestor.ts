import type { InlineKeyboard } from "grammy";
import type { BotConfig } from "../config.js";
import { PipelineError, errorMessage } from "../errors.js";
import type { AuditSink } from "../logging/audit.js";
import type { ConversationQueue } from "../pipeline/conversationQueue.js";
import type { UserPrefsStore } from "../prefs/userPrefs.js";
import { makeInboundRequest, type InboundRequest, type PipelineResult } from "../types.js";
import { failureText, type DeliveryDispatcher } from "./deliveryDispatcher.js";
import {
  CLOSED_TEXT,
  DASHBOARD_TEXT,
  LANGUAGE_MENU_TEXT,
  SPEED_MENU_TEXT,
  dashboardKeyboard,
  languageKeyboard,
  openDashboardKeyboard,
  parseMenuAction,
  speedKeyboard,
  welcomeText
} from "./menus.js";
import type { VoicePrefs } from "./voices.js";

export type InboundEvent =
  | { kind: "command"; chatId: number; command: string }
  | { kind: "text"; chatId: number; text: string }
  | {
      kind: "document";
      chatId: number;
      fileId: string;
      mimeType?: string;
      fileSize?: number;
      fileName?: string;
    }
  | { kind: "callback"; chatId: number; data: string }
  | { kind: "other"; chatId: number };

export type ReplyOptions = { html?: boolean; keyboard?: InlineKeyboard };

/** What the ingestor needs from the chat an event came from. */
export interface ChatReplier {
  reply(text: string, opts?: ReplyOptions): Promise<void>;
  edit(text: string, opts?: ReplyOptions): Promise<void>;
  answerCallback(): Promise<void>;
  showRecording(signal?: AbortSignal): Promise<void>;
}

export type FileDownloader = (fileId: string, signal?: AbortSignal) => Promise<Buffer>;

export type MessageIngestorOptions = {
  config: Pick<BotConfig, "maxTextChars" | "maxDocumentBytes" | "requestTimeoutMs">;
  prefs: UserPrefsStore;
  queue: ConversationQueue;
  pipeline: { process(request: InboundRequest, signal?: AbortSignal): Promise<PipelineResult> };
  dispatcher: DeliveryDispatcher;
  downloadFile: FileDownloader;
  audit?: AuditSink;
};

export const NOT_TEXT_NOTICE = "❌ I can only process plain text messages or `.txt` files.";
export const NOT_PLAIN_TEXT_NOTICE = "❌ Please send a plain `.txt` file.";
export const EMPTY_FILE_NOTICE = "The text file is empty.";
export const BAD_ENCODING_NOTICE = "❌ Could not read the file. Please ensure it's a UTF-8 encoded text file.";
export const BUSY_NOTICE = "⏳ I'm still working on your earlier messages. Please wait a moment and try again.";
export const UNKNOWN_COMMAND_NOTICE = "Unknown command. Send /help to see what I can do.";

const NOTICE_TIMEOUT_MS = 10_000;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Settles like `work`, unless `signal` aborts first. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new PipelineError("TimeoutError", "request deadline passed"));
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export class MessageIngestor {
  private readonly opts: MessageIngestorOptions;

  constructor(opts: MessageIngestorOptions) {
    this.opts = opts;
  }

  /** Drops events that cannot be turned into a request; never throws for a bad event. */
  async handle(event: InboundEvent | null, chat: ChatReplier): Promise<void> {
    if (!event) {
      await chat.answerCallback().catch((err: unknown) => {
        console.warn("[ingest] callback answer failed", { error: errorMessage(err) });
      });
      this.drop(undefined, new PipelineError("ValidationError", "update carries no chat or payload"));
      return;
    }
    switch (event.kind) {
      case "command":
        return this.handleCommand(event.chatId, event.command, chat);
      case "callback":
        return this.handleCallback(event.chatId, event.data, chat);
      case "text":
        if (event.text.startsWith("/")) {
          await chat.reply(UNKNOWN_COMMAND_NOTICE);
          return;
        }
        await this.submit(event.chatId, "text", chat, async () => event.text);
        return;
      case "document":
        return this.handleDocument(event, chat);
      case "other":
        await chat.reply(NOT_TEXT_NOTICE);
        return;
    }
  }

  private async handleCommand(chatId: number, command: string, chat: ChatReplier) {
    const prefs = this.opts.prefs.get(chatId);
    if (command === "start" || command === "help") {
      await chat.reply(welcomeText(prefs, this.opts.config.maxTextChars), {
        html: true,
        keyboard: openDashboardKeyboard()
      });
      return;
    }
    if (command === "settings") {
      await chat.reply(DASHBOARD_TEXT, { html: true, keyboard: dashboardKeyboard(prefs) });
      return;
    }
    await chat.reply(UNKNOWN_COMMAND_NOTICE);
  }

  private async handleCallback(chatId: number, data: string, chat: ChatReplier) {
    await chat.answerCallback();
    const action = parseMenuAction(data);
    if (!action) {
      this.drop(chatId, new PipelineError("ValidationError", `unknown callback data '${data.slice(0, 64)}'`));
      return;
    }
    const prefs = this.opts.prefs.get(chatId);
    switch (action.type) {
      case "open":
        if (action.menu === "lang") {
          await chat.edit(LANGUAGE_MENU_TEXT, { html: true, keyboard: languageKeyboard(prefs) });
        } else if (action.menu === "speed") {
          await chat.edit(SPEED_MENU_TEXT, { html: true, keyboard: speedKeyboard(prefs) });
        } else {
          await chat.edit(DASHBOARD_TEXT, { html: true, keyboard: dashboardKeyboard(prefs) });
        }
        return;
      case "set_lang":
      case "set_speed": {
        const next = this.opts.prefs.update(
          chatId,
          action.type === "set_lang" ? { languageKey: action.key } : { speedKey: action.key }
        );
        this.opts.audit?.({
          type: "prefs_update",
          at: new Date().toISOString(),
          conversationId: chatId,
          languageKey: next.languageKey,
          speedKey: next.speedKey
        });
        await chat.edit(DASHBOARD_TEXT, { html: true, keyboard: dashboardKeyboard(next) });
        return;
      }
      case "close":
        await chat.edit(CLOSED_TEXT);
        return;
    }
  }

  private async handleDocument(event: Extract<InboundEvent, { kind: "document" }>, chat: ChatReplier) {
    if (event.mimeType !== "text/plain") {
      await chat.reply(NOT_PLAIN_TEXT_NOTICE);
      return;
    }
    if (event.fileSize !== undefined && event.fileSize > this.opts.config.maxDocumentBytes) {
      const limitKb = Math.floor(this.opts.config.maxDocumentBytes / 1024);
      await chat.reply(`❌ That file is too large. The limit is ${limitKb} KB.`);
      return;
    }
    await this.submit(event.chatId, "document", chat, async (signal) => {
      const bytes = await this.opts.downloadFile(event.fileId, signal);
      if (bytes.length > this.opts.config.maxDocumentBytes) {
        throw new PipelineError("ValidationError", `document is ${bytes.length} bytes`);
      }
      let text: string;
      try {
        text = utf8.decode(bytes);
      } catch (err) {
        await chat.reply(BAD_ENCODING_NOTICE);
        throw new PipelineError("ValidationError", "document is not valid UTF-8", { cause: err });
      }
      if (!text.trim()) {
        await chat.reply(EMPTY_FILE_NOTICE);
        throw new PipelineError("ValidationError", "document is empty");
      }
      if (text.length > this.opts.config.maxTextChars) {
        await chat.reply(
          `📝 Large file detected (${text.length} characters). Processing in chunks. This may take a moment...`
        );
      }
      return text;
    });
  }

  /**
   * Queues the conversion for this chat. `loadText` runs inside the queue slot
   * so document downloads count against the concurrency cap too. The slot is
   * released after `requestTimeoutMs` whether or not the work has settled.
   */
  private async submit(
    chatId: number,
    source: "text" | "document",
    chat: ChatReplier,
    loadText: (signal: AbortSignal) => Promise<string>
  ) {
    const voice = this.opts.prefs.get(chatId);
    const accepted = this.opts.queue.enqueue(chatId, async () => {
      const startedAt = Date.now();
      const deadline = new AbortController();
      const timer = setTimeout(() => deadline.abort(), this.opts.config.requestTimeoutMs);
      try {
        await untilAborted(this.convert(chatId, source, voice, chat, loadText, deadline.signal), deadline.signal);
      } catch (err) {
        if (!deadline.signal.aborted) throw err;
        await this.timedOut(chatId, startedAt);
      } finally {
        clearTimeout(timer);
      }
    });

    if (!accepted) {
      console.warn("[ingest] conversation backlog full", { chatId, depth: this.opts.queue.depthOf(chatId) });
      this.opts.audit?.({
        type: "request_busy",
        at: new Date().toISOString(),
        conversationId: chatId,
        source,
        textChars: 0
      });
      await this.opts.dispatcher.notify(chatId, BUSY_NOTICE);
    }
  }

  private async convert(
    chatId: number,
    source: "text" | "document",
    voice: VoicePrefs,
    chat: ChatReplier,
    loadText: (signal: AbortSignal) => Promise<string>,
    signal: AbortSignal
  ) {
    let request: InboundRequest;
    try {
      const rawText = await loadText(signal);
      request = makeInboundRequest({ conversationId: chatId, rawText, source, voice });
    } catch (err) {
      if (!signal.aborted) this.drop(chatId, err);
      return;
    }
    this.opts.audit?.({
      type: "request_accepted",
      at: new Date().toISOString(),
      conversationId: chatId,
      source,
      textChars: request.rawText.length
    });
    await chat.showRecording(signal).catch((err: unknown) => {
      console.warn("[ingest] chat action failed", { chatId, error: errorMessage(err) });
    });
    const result = await this.opts.pipeline.process(request, signal);
    await this.opts.dispatcher.dispatch(request, result, signal);
  }

  private async timedOut(chatId: number, startedAt: number) {
    const limitMs = this.opts.config.requestTimeoutMs;
    console.warn("[ingest] request timed out", { chatId, limitMs });
    this.opts.audit?.({
      type: "request_failed",
      at: new Date().toISOString(),
      conversationId: chatId,
      kind: "TimeoutError",
      message: `request exceeded ${limitMs}ms`,
      tookMs: Date.now() - startedAt
    });
    await this.opts.dispatcher.notify(
      chatId,
      failureText("TimeoutError", this.opts.config.maxTextChars),
      AbortSignal.timeout(NOTICE_TIMEOUT_MS)
    );
  }

  private drop(chatId: number | undefined, err: unknown) {
    const reason = errorMessage(err);
    console.warn("[ingest] dropped input", { chatId, kind: "ValidationError", reason });
    this.opts.audit?.({ type: "input_dropped", at: new Date().toISOString(), conversationId: chatId, reason });
  }
}
