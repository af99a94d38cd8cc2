import type { TtsEngine, TtsOutputFormat, TtsSynthesisConfig } from "../ttsEngine.js";

export type GoogleEngineOptions = {
  baseUrl: string;
  /** Longest piece the translate_tts endpoint accepts in a single request. */
  maxPieceChars?: number;
};

export const GOOGLE_TTS_MAX_PIECE_CHARS = 100;

/**
 * Cuts text into pieces the endpoint accepts, breaking after punctuation when
 * possible, otherwise at the last space, otherwise hard.
 */
export function splitForGoogle(text: string, maxChars = GOOGLE_TTS_MAX_PIECE_CHARS): string[] {
  const pieces: string[] = [];
  let rest = text.replace(/\s+/g, " ").trim();
  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars);
    let cut = -1;
    const punct = /[.!?;:,।](?=\s|$)/g;
    for (let m = punct.exec(window); m; m = punct.exec(window)) cut = m.index + 1;
    if (cut <= 0) cut = window.lastIndexOf(" ");
    if (cut <= 0) cut = maxChars;
    const head = rest.slice(0, cut).trim();
    if (head) pieces.push(head);
    rest = rest.slice(cut).trim();
  }
  if (rest) pieces.push(rest);
  return pieces;
}

export class GoogleTranslateTtsEngine implements TtsEngine {
  readonly name = "google";
  private readonly baseUrl: string;
  private readonly maxPieceChars: number;

  constructor(opts: GoogleEngineOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/g, "");
    this.maxPieceChars = opts.maxPieceChars ?? GOOGLE_TTS_MAX_PIECE_CHARS;
  }

  getOutputFormat(): TtsOutputFormat {
    return { codec: "mp3", sampleRate: 24_000, channels: 1 };
  }

  async synthesize(
    text: string,
    cfg: TtsSynthesisConfig,
    onChunk: (chunk: Buffer) => void,
    signal?: AbortSignal
  ): Promise<void> {
    const pieces = splitForGoogle(text, this.maxPieceChars);
    for (const [idx, piece] of pieces.entries()) {
      if (signal?.aborted) return;
      const url = new URL(`${this.baseUrl}/translate_tts`);
      url.searchParams.set("ie", "UTF-8");
      url.searchParams.set("client", "tw-ob");
      url.searchParams.set("tl", cfg.language);
      url.searchParams.set("q", piece);
      url.searchParams.set("total", String(pieces.length));
      url.searchParams.set("idx", String(idx));
      url.searchParams.set("textlen", String(piece.length));

      const response = await fetch(url, {
        headers: { "User-Agent": "Mozilla/5.0" },
        signal
      });
      if (!response.ok) {
        const errText = await response.text().catch(() => "");
        throw new Error(
          `Google TTS failed (${response.status}) on piece ${idx + 1}/${pieces.length}: ${
            errText.slice(0, 200) || response.statusText
          }`
        );
      }
      const audio = Buffer.from(await response.arrayBuffer());
      if (!audio.length) {
        throw new Error(`Google TTS returned no audio for piece ${idx + 1}/${pieces.length}`);
      }
      onChunk(audio);
    }
  }
}
