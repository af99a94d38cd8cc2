import os from "node:os";
import { z } from "zod";

const BoolEnv = z.preprocess(
  (v) => {
    if (typeof v !== "string") return v;
    const normalized = v.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on")
      return true;
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off")
      return false;
    return v;
  },
  z.boolean()
);

const UrlEnv = z
  .string()
  .url()
  .transform((v) => v.replace(/\/+$/, ""));

const ConfigSchema = z.object({
  botToken: z.string().trim().min(1, "BOT_TOKEN is required"),
  dropPendingUpdates: BoolEnv.default(true),

  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  healthPath: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, "Health path must start with /")
    .default("/healthz"),

  ttsEngine: z.enum(["google", "openai", "piper"]).default("google"),
  ttsGoogleBaseUrl: UrlEnv.default("https://translate.google.com"),
  ttsModel: z.string().default("gpt-4o-mini-tts"),
  ttsVoice: z.string().default("coral"),
  ttsOpenAiApiKey: z.string().optional(),
  ttsOpenAiBaseUrl: UrlEnv.default("https://api.openai.com"),
  ttsPiperBin: z.string().optional(),
  ttsPiperModel: z.string().optional(),
  ttsPiperConfig: z.string().optional(),

  ffmpegPath: z.string().default("ffmpeg"),
  voiceCodec: z.enum(["ogg_opus", "mp3"]).default("ogg_opus"),
  fallbackCodec: z.enum(["ogg_opus", "mp3", "none"]).default("mp3"),

  maxTextChars: z.coerce.number().int().min(1).max(100_000).default(4000),
  maxDocumentChars: z.coerce.number().int().min(1).max(2_000_000).default(100_000),
  maxDocumentBytes: z.coerce.number().int().min(1_024).default(2 * 1024 * 1024),
  chunkChars: z.coerce.number().int().min(100).max(100_000).default(3500),
  maxAudioBytes: z.coerce.number().int().min(64 * 1024).default(48 * 1024 * 1024),

  synthesisTimeoutMs: z.coerce.number().int().min(100).max(600_000).default(60_000),
  transcodeTimeoutMs: z.coerce.number().int().min(100).max(600_000).default(60_000),
  requestTimeoutMs: z.coerce.number().int().min(100).max(1_800_000).default(180_000),

  maxConcurrency: z.coerce.number().int().min(1).max(64).default(2),
  maxQueuePerConversation: z.coerce.number().int().min(1).max(100).default(5),

  dispatchRetries: z.coerce.number().int().min(0).max(10).default(3),
  dispatchBackoffMs: z.coerce.number().int().min(0).max(60_000).default(500),

  maxRestarts: z.coerce.number().int().min(0).max(100).default(5),
  restartBackoffMs: z.coerce.number().int().min(0).max(60_000).default(1_000),
  restartBackoffMaxMs: z.coerce.number().int().min(0).max(600_000).default(30_000),
  restartResetMs: z.coerce.number().int().min(0).default(5 * 60_000),

  scratchDir: z.string().default(os.tmpdir()),
  auditLogPath: z.string().optional(),
  prefsPath: z.string().optional()
});

export type BotConfig = Readonly<z.infer<typeof ConfigSchema>>;

const blank = (v: string | undefined) => (v && v.trim() ? v : undefined);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const parsed = ConfigSchema.parse({
    botToken: env.BOT_TOKEN ?? "",
    dropPendingUpdates: env.VOICEBOT_DROP_PENDING_UPDATES,

    host: env.HOST,
    port: env.PORT,
    healthPath: env.VOICEBOT_HEALTH_PATH,

    ttsEngine: env.VOICEBOT_TTS_ENGINE,
    ttsGoogleBaseUrl: env.VOICEBOT_TTS_GOOGLE_BASE_URL,
    ttsModel: env.VOICEBOT_TTS_MODEL,
    ttsVoice: env.VOICEBOT_TTS_VOICE,
    ttsOpenAiApiKey: blank(env.VOICEBOT_TTS_OPENAI_API_KEY ?? env.OPENAI_API_KEY),
    ttsOpenAiBaseUrl: env.VOICEBOT_TTS_OPENAI_BASE_URL,
    ttsPiperBin: blank(env.VOICEBOT_TTS_PIPER_BIN),
    ttsPiperModel: blank(env.VOICEBOT_TTS_PIPER_MODEL),
    ttsPiperConfig: blank(env.VOICEBOT_TTS_PIPER_CONFIG),

    ffmpegPath: blank(env.FFMPEG_PATH),
    voiceCodec: env.VOICEBOT_VOICE_CODEC,
    fallbackCodec: env.VOICEBOT_FALLBACK_CODEC,

    maxTextChars: env.VOICEBOT_MAX_TEXT_CHARS,
    maxDocumentChars: env.VOICEBOT_MAX_DOCUMENT_CHARS,
    maxDocumentBytes: env.VOICEBOT_MAX_DOCUMENT_BYTES,
    chunkChars: env.VOICEBOT_CHUNK_CHARS,
    maxAudioBytes: env.VOICEBOT_MAX_AUDIO_BYTES,

    synthesisTimeoutMs: env.VOICEBOT_SYNTHESIS_TIMEOUT_MS,
    transcodeTimeoutMs: env.VOICEBOT_TRANSCODE_TIMEOUT_MS,
    requestTimeoutMs: env.VOICEBOT_REQUEST_TIMEOUT_MS,

    maxConcurrency: env.VOICEBOT_MAX_CONCURRENCY,
    maxQueuePerConversation: env.VOICEBOT_MAX_QUEUE_PER_CHAT,

    dispatchRetries: env.VOICEBOT_DISPATCH_RETRIES,
    dispatchBackoffMs: env.VOICEBOT_DISPATCH_BACKOFF_MS,

    maxRestarts: env.VOICEBOT_MAX_RESTARTS,
    restartBackoffMs: env.VOICEBOT_RESTART_BACKOFF_MS,
    restartBackoffMaxMs: env.VOICEBOT_RESTART_BACKOFF_MAX_MS,
    restartResetMs: env.VOICEBOT_RESTART_RESET_MS,

    scratchDir: blank(env.VOICEBOT_SCRATCH_DIR),
    auditLogPath: blank(env.VOICEBOT_AUDIT_LOG_PATH),
    prefsPath: blank(env.VOICEBOT_PREFS_PATH)
  });

  if (parsed.ttsEngine === "openai" && !parsed.ttsOpenAiApiKey) {
    throw new Error(
      "VOICEBOT_TTS_ENGINE=openai but no OpenAI API key was found. Set VOICEBOT_TTS_OPENAI_API_KEY or OPENAI_API_KEY."
    );
  }

  if (parsed.ttsEngine === "piper" && (!parsed.ttsPiperBin || !parsed.ttsPiperModel)) {
    throw new Error(
      "VOICEBOT_TTS_ENGINE=piper requires VOICEBOT_TTS_PIPER_BIN and VOICEBOT_TTS_PIPER_MODEL."
    );
  }

  if (parsed.chunkChars > parsed.maxDocumentChars) {
    throw new Error("VOICEBOT_CHUNK_CHARS must not exceed VOICEBOT_MAX_DOCUMENT_CHARS.");
  }

  if (parsed.fallbackCodec === parsed.voiceCodec) {
    throw new Error("VOICEBOT_FALLBACK_CODEC must differ from VOICEBOT_VOICE_CODEC (or be 'none').");
  }

  return Object.freeze(parsed);
}
