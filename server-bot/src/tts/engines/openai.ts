import {
  DEFAULT_TTS_SAMPLE_RATE,
  type TtsEngine,
  type TtsOutputFormat,
  type TtsSynthesisConfig
} from "../ttsEngine.js";

export type OpenAiEngineOptions = {
  apiKey: string;
  baseUrl: string;
};

export class OpenAiTtsEngine implements TtsEngine {
  readonly name = "openai";
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(opts: OpenAiEngineOptions) {
    this.apiKey = opts.apiKey;
    this.baseUrl = opts.baseUrl.replace(/\/+$/g, "");
  }

  getOutputFormat(): TtsOutputFormat {
    return { codec: "mp3", sampleRate: DEFAULT_TTS_SAMPLE_RATE, channels: 1 };
  }

  async synthesize(
    text: string,
    cfg: TtsSynthesisConfig,
    onChunk: (chunk: Buffer) => void,
    signal?: AbortSignal
  ): Promise<void> {
    const response = await fetch(`${this.baseUrl}/v1/audio/speech`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({
        model: cfg.model,
        voice: cfg.voice,
        input: text,
        response_format: "mp3"
      }),
      signal
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => "");
      throw new Error(`OpenAI TTS failed (${response.status}): ${errText || response.statusText}`);
    }

    const body = response.body;
    if (!body) return;

    const reader = body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done || signal?.aborted) break;
        if (value?.length) onChunk(Buffer.from(value));
      }
    } finally {
      reader.releaseLock();
    }
  }
}
