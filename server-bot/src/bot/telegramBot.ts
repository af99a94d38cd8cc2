import { GrammyError, type Api, type Bot, type Context } from "grammy";
import { errorMessage } from "../errors.js";
import type { ChatReplier, FileDownloader, InboundEvent, MessageIngestor, ReplyOptions } from "./messageIngestor.js";

/** A long-running receive loop the supervisor can restart. */
export interface IngestorLoop {
  /** Resolves when the loop stops, rejects when it crashes. */
  run(): Promise<void>;
  stop(): Promise<void>;
}

const TELEGRAM_API_ROOT = "https://api.telegram.org";

function commandOf(text: string, entities: ReadonlyArray<{ type: string; offset: number; length: number }> = []) {
  const first = entities[0];
  if (!first || first.type !== "bot_command" || first.offset !== 0) return null;
  return text.slice(1, first.length).split("@")[0].toLowerCase();
}

/** The parts of a grammy context the event mapping reads. */
export type UpdateView = Pick<Context, "chat" | "callbackQuery" | "message">;

/** Maps an update to the ingestor's event shape; null when it carries nothing usable. */
export function eventFromContext(ctx: UpdateView): InboundEvent | null {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return null;

  const data = ctx.callbackQuery?.data;
  if (ctx.callbackQuery) {
    return data ? { kind: "callback", chatId, data } : null;
  }

  const message = ctx.message;
  if (!message) return null;

  if (message.text !== undefined) {
    const command = commandOf(message.text, message.entities);
    if (command) return { kind: "command", chatId, command };
    return { kind: "text", chatId, text: message.text };
  }

  if (message.document) {
    const doc = message.document;
    return {
      kind: "document",
      chatId,
      fileId: doc.file_id,
      mimeType: doc.mime_type,
      fileSize: doc.file_size,
      fileName: doc.file_name
    };
  }

  return { kind: "other", chatId };
}

const isNotModified = (err: unknown) =>
  err instanceof GrammyError && err.error_code === 400 && /message is not modified/i.test(err.description);

export function replierFor(ctx: Context): ChatReplier {
  const extra = (opts?: ReplyOptions) => ({
    parse_mode: opts?.html ? ("HTML" as const) : undefined,
    reply_markup: opts?.keyboard
  });
  return {
    async reply(text, opts) {
      await ctx.reply(text, extra(opts));
    },
    async edit(text, opts) {
      try {
        await ctx.editMessageText(text, extra(opts));
      } catch (err) {
        // Pressing the already-selected option re-renders identical markup.
        if (!isNotModified(err)) throw err;
      }
    },
    async answerCallback() {
      if (ctx.callbackQuery) await ctx.answerCallbackQuery();
    },
    async showRecording(signal) {
      await ctx.replyWithChatAction("record_voice", undefined, signal);
    }
  };
}

export function createFileDownloader(api: Api, token: string, apiRoot = TELEGRAM_API_ROOT): FileDownloader {
  return async (fileId, signal) => {
    const file = await api.getFile(fileId, signal);
    if (!file.file_path) throw new Error("Telegram returned no file path");
    const response = await fetch(`${apiRoot}/file/bot${token}/${file.file_path}`, { signal });
    if (!response.ok) {
      throw new Error(`file download failed (${response.status})`);
    }
    return Buffer.from(await response.arrayBuffer());
  };
}

export type TelegramLoopOptions = {
  dropPendingUpdates: boolean;
};

export class TelegramLoop implements IngestorLoop {
  private readonly bot: Bot;
  private readonly opts: TelegramLoopOptions;

  constructor(bot: Bot, ingestor: MessageIngestor, opts: TelegramLoopOptions) {
    this.bot = bot;
    this.opts = opts;
    bot.use(async (ctx) => {
      await ingestor.handle(eventFromContext(ctx), replierFor(ctx));
    });
    bot.catch((err) => {
      console.error("[bot] update handler failed", {
        updateId: err.ctx.update.update_id,
        error: errorMessage(err.error)
      });
    });
  }

  async run(): Promise<void> {
    await this.bot.start({
      drop_pending_updates: this.opts.dropPendingUpdates,
      allowed_updates: ["message", "callback_query"],
      onStart: (me) => {
        console.log("[bot] polling started", { username: me.username, pid: process.pid });
      }
    });
  }

  async stop(): Promise<void> {
    if (this.bot.isRunning()) await this.bot.stop();
  }
}
