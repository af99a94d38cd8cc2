import { Bot } from "grammy";
import { codecByName } from "./audio/codec.js";
import { FfmpegTranscoder, type AudioTranscoder } from "./audio/ffmpeg.js";
import { DeliveryDispatcher, createGrammyTransport } from "./bot/deliveryDispatcher.js";
import { MessageIngestor } from "./bot/messageIngestor.js";
import { TelegramLoop, createFileDownloader } from "./bot/telegramBot.js";
import { loadConfig, type BotConfig } from "./config.js";
import { LivenessServer } from "./health/livenessServer.js";
import { createAuditLogger, noopAudit, type AuditSink } from "./logging/audit.js";
import { ConversationQueue } from "./pipeline/conversationQueue.js";
import { RequestPipeline } from "./pipeline/requestPipeline.js";
import { UserPrefsStore } from "./prefs/userPrefs.js";
import { WorkerSupervisor } from "./supervisor/workerSupervisor.js";
import { GoogleTranslateTtsEngine } from "./tts/engines/google.js";
import { OpenAiTtsEngine } from "./tts/engines/openai.js";
import { PiperTtsEngine } from "./tts/engines/piper.js";
import { EngineSpeechRenderer, type SpeechRenderer } from "./tts/speechRenderer.js";
import type { TtsEngine } from "./tts/ttsEngine.js";

export type VoiceBotAppOptions = {
  env?: NodeJS.ProcessEnv;
  config?: BotConfig;
  /** Overrides for the pluggable capabilities. */
  renderer?: SpeechRenderer;
  transcoder?: AudioTranscoder;
  onFatal?: (err: Error) => void;
};

export type VoiceBotApp = {
  config: BotConfig;
  supervisor: WorkerSupervisor;
  pipeline: RequestPipeline;
  queue: ConversationQueue;
  shutdown: () => Promise<void>;
};

export function createTtsEngine(config: BotConfig): TtsEngine {
  switch (config.ttsEngine) {
    case "openai":
      if (!config.ttsOpenAiApiKey) throw new Error("OpenAI TTS engine needs an API key");
      return new OpenAiTtsEngine({ apiKey: config.ttsOpenAiApiKey, baseUrl: config.ttsOpenAiBaseUrl });
    case "piper":
      if (!config.ttsPiperBin || !config.ttsPiperModel) throw new Error("Piper TTS engine needs a binary and a model");
      return new PiperTtsEngine({
        binPath: config.ttsPiperBin,
        modelPath: config.ttsPiperModel,
        configPath: config.ttsPiperConfig
      });
    case "google":
      return new GoogleTranslateTtsEngine({ baseUrl: config.ttsGoogleBaseUrl });
  }
}

export function createVoiceBotApp(opts: VoiceBotAppOptions = {}): VoiceBotApp {
  const config = opts.config ?? loadConfig(opts.env ?? process.env);
  const auditLogger = config.auditLogPath ? createAuditLogger(config.auditLogPath) : null;
  const audit: AuditSink = auditLogger ? (event) => auditLogger.log(event) : noopAudit;

  const renderer =
    opts.renderer ??
    new EngineSpeechRenderer(createTtsEngine(config), {
      model: config.ttsModel,
      voice: config.ttsVoice,
      timeoutMs: config.synthesisTimeoutMs,
      maxAudioBytes: config.maxAudioBytes
    });
  const transcoder =
    opts.transcoder ?? new FfmpegTranscoder({ ffmpegPath: config.ffmpegPath, timeoutMs: config.transcodeTimeoutMs });

  const pipeline = new RequestPipeline({
    renderer,
    transcoder,
    primaryCodec: codecByName(config.voiceCodec),
    fallbackCodec: config.fallbackCodec === "none" ? null : codecByName(config.fallbackCodec),
    maxTextChars: config.maxTextChars,
    maxDocumentChars: config.maxDocumentChars,
    chunkChars: config.chunkChars,
    requestTimeoutMs: config.requestTimeoutMs,
    scratchDir: config.scratchDir,
    audit
  });

  const queue = new ConversationQueue({
    maxConcurrency: config.maxConcurrency,
    maxDepth: config.maxQueuePerConversation,
    onError: (err, key) => console.error("[queue] task failed", { chatId: key, error: err.message })
  });

  const bot = new Bot(config.botToken);
  const dispatcher = new DeliveryDispatcher({
    transport: createGrammyTransport(bot.api),
    retries: config.dispatchRetries,
    backoffMs: config.dispatchBackoffMs,
    maxTextChars: config.maxTextChars,
    audit
  });
  const ingestor = new MessageIngestor({
    config,
    prefs: new UserPrefsStore(config.prefsPath),
    queue,
    pipeline,
    dispatcher,
    downloadFile: createFileDownloader(bot.api, config.botToken),
    audit
  });
  const loop = new TelegramLoop(bot, ingestor, { dropPendingUpdates: config.dropPendingUpdates });

  let supervisor: WorkerSupervisor;
  const liveness = new LivenessServer({
    host: config.host,
    port: config.port,
    healthPath: config.healthPath,
    getState: () => supervisor.state
  });
  supervisor = new WorkerSupervisor({
    loop,
    liveness,
    maxRestarts: config.maxRestarts,
    restartBackoffMs: config.restartBackoffMs,
    restartBackoffMaxMs: config.restartBackoffMaxMs,
    restartResetMs: config.restartResetMs,
    onFatal: opts.onFatal,
    audit
  });

  const shutdown = async () => {
    await supervisor.stop();
    await queue.drain();
    await auditLogger?.close();
  };

  return { config, supervisor, pipeline, queue, shutdown };
}
