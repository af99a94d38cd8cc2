import { spawn } from "node:child_process";
import fs from "node:fs";
import { z } from "zod";
import type { TtsEngine, TtsOutputFormat } from "../ttsEngine.js";

export type PiperEngineOptions = {
  binPath: string;
  modelPath: string;
  configPath?: string;
  sampleRate?: number;
};

const RateField = z.coerce.number().positive().optional();

const PiperModelConfig = z
  .object({
    audio: z.object({ sample_rate: RateField, sampleRate: RateField }).partial().optional(),
    sample_rate: RateField,
    sampleRate: RateField
  })
  .passthrough();

const readModelConfig = (file: string) => {
  try {
    const parsed = PiperModelConfig.safeParse(JSON.parse(fs.readFileSync(file, "utf8")));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
};

const resolveConfigPath = (modelPath: string, configPath?: string) => {
  if (configPath) return configPath;
  const direct = `${modelPath}.json`;
  if (fs.existsSync(direct)) return direct;
  const alt = modelPath.replace(/\.onnx$/i, ".onnx.json");
  if (fs.existsSync(alt)) return alt;
  return undefined;
};

export const resolveSampleRate = (modelPath: string, configPath?: string, fallback = 22_050) => {
  const cfgPath = resolveConfigPath(modelPath, configPath);
  if (!cfgPath) return fallback;
  const cfg = readModelConfig(cfgPath);
  const rate = cfg?.audio?.sample_rate ?? cfg?.audio?.sampleRate ?? cfg?.sample_rate ?? cfg?.sampleRate;
  return rate && Number.isFinite(rate) ? rate : fallback;
};

export class PiperTtsEngine implements TtsEngine {
  readonly name = "piper";
  private readonly binPath: string;
  private readonly modelPath: string;
  private readonly sampleRate: number;

  constructor(opts: PiperEngineOptions) {
    this.binPath = opts.binPath;
    this.modelPath = opts.modelPath;
    this.sampleRate = opts.sampleRate ?? resolveSampleRate(opts.modelPath, opts.configPath);
  }

  getOutputFormat(): TtsOutputFormat {
    return { codec: "pcm_s16le", sampleRate: this.sampleRate, channels: 1 };
  }

  async synthesize(
    text: string,
    _cfg: unknown,
    onChunk: (chunk: Buffer) => void,
    signal?: AbortSignal
  ): Promise<void> {
    if (!text.trim()) return;
    if (!fs.existsSync(this.binPath)) {
      throw new Error(`piper binary not found at ${this.binPath}`);
    }
    if (!fs.existsSync(this.modelPath)) {
      throw new Error(`piper model not found at ${this.modelPath}`);
    }
    const child = spawn(this.binPath, ["--model", this.modelPath, "--output-raw"], {
      stdio: ["pipe", "pipe", "pipe"]
    });

    const killChild = () => {
      if (child.exitCode === null && child.signalCode === null) child.kill("SIGTERM");
    };

    if (signal) {
      if (signal.aborted) killChild();
      signal.addEventListener("abort", killChild, { once: true });
    }

    let stderr = "";
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.stdout.on("data", (chunk: Buffer) => {
      onChunk(Buffer.from(chunk));
    });
    // piper exits before reading stdin when the model fails to load.
    child.stdin.on("error", () => undefined);

    child.stdin.write(text.trim() + "\n");
    child.stdin.end();

    try {
      await new Promise<void>((resolve, reject) => {
        child.on("error", (err) => reject(err));
        child.on("close", (code) => {
          if (signal?.aborted) return reject(new Error("piper aborted"));
          if (code !== 0) {
            return reject(new Error(`piper failed (${code}): ${stderr.trim() || "unknown error"}`));
          }
          resolve();
        });
      });
    } finally {
      signal?.removeEventListener("abort", killChild);
    }
  }
}
