import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_VOICE_PREFS,
  LANGUAGES,
  SPEEDS,
  isLanguageKey,
  isSpeedKey,
  type VoicePrefs
} from "../bot/voices.js";

const StoredPrefs = z.object({
  languageKey: z.string().refine(isLanguageKey).optional(),
  speedKey: z.string().refine(isSpeedKey).optional(),
  updatedAt: z.string().optional()
});

const StoreData = z.object({
  version: z.literal(1),
  chats: z.record(StoredPrefs)
});

type UserPrefsStoreData = z.infer<typeof StoreData>;

const emptyData = (): UserPrefsStoreData => ({ version: 1, chats: {} });

function safeParse(content: string): UserPrefsStoreData {
  if (!content) return emptyData();
  try {
    const parsed = StoreData.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : emptyData();
  } catch {
    return emptyData();
  }
}

/**
 * Voice settings per chat. Persisted to a JSON file when a path is given,
 * otherwise kept for the life of the process.
 */
export class UserPrefsStore {
  private readonly filePath?: string;
  private data: UserPrefsStoreData;

  constructor(filePath?: string) {
    this.filePath = filePath;
    this.data = this.load();
  }

  /** Returns a copy; callers may hold it across awaits. */
  get(chatId: number): VoicePrefs {
    const entry = this.data.chats[String(chatId)];
    const languageKey = entry?.languageKey;
    const speedKey = entry?.speedKey;
    return {
      languageKey: languageKey && isLanguageKey(languageKey) ? languageKey : DEFAULT_VOICE_PREFS.languageKey,
      speedKey: speedKey && isSpeedKey(speedKey) ? speedKey : DEFAULT_VOICE_PREFS.speedKey
    };
  }

  update(chatId: number, patch: Partial<VoicePrefs>): VoicePrefs {
    const next = { ...this.get(chatId), ...patch };
    if (!(next.languageKey in LANGUAGES) || !(next.speedKey in SPEEDS)) {
      throw new Error("Unknown voice setting");
    }
    this.data.chats[String(chatId)] = { ...next, updatedAt: new Date().toISOString() };
    this.persist();
    return next;
  }

  private load(): UserPrefsStoreData {
    if (!this.filePath) return emptyData();
    try {
      if (!fs.existsSync(this.filePath)) return emptyData();
      return safeParse(fs.readFileSync(this.filePath, "utf8"));
    } catch (err) {
      console.warn("[prefs] could not read prefs file, starting empty", {
        filePath: this.filePath,
        error: err instanceof Error ? err.message : String(err)
      });
      return emptyData();
    }
  }

  private persist() {
    if (!this.filePath) return;
    const dir = path.dirname(this.filePath);
    fs.mkdirSync(dir, { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    const payload = JSON.stringify(this.data, null, 2);
    fs.writeFileSync(tmpPath, payload, "utf8");
    fs.renameSync(tmpPath, this.filePath);
  }
}
