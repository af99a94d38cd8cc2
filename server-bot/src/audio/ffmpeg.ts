import { spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { PipelineError, errorMessage } from "../errors.js";
import type { AudioBuffer } from "../types.js";
import { atempoFilter, inputFormatArgs, matchesContainer, type CodecSpec } from "./codec.js";

export type TranscodeOptions = {
  /** Directory owned by the caller; scratch files are written and removed here. */
  workDir: string;
  speed?: number;
  signal?: AbortSignal;
};

export interface AudioTranscoder {
  transcode(buffer: AudioBuffer, target: CodecSpec, opts: TranscodeOptions): Promise<AudioBuffer>;
}

/** The part of a ChildProcess the transcoder touches. */
export interface SubprocessHandle {
  readonly stderr: NodeJS.ReadableStream | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: string[]) => SubprocessHandle;

export type FfmpegTranscoderOptions = {
  ffmpegPath: string;
  timeoutMs: number;
  spawnProcess?: SpawnFn;
};

const MAX_STDERR_CHARS = 4_000;

const defaultSpawn: SpawnFn = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

export function buildFfmpegArgs(
  input: { path: string; buffer: AudioBuffer },
  output: { path: string; target: CodecSpec },
  speed = 1
): string[] {
  const { args: inputArgs } = inputFormatArgs(input.buffer.codec, input.buffer.sampleRate, input.buffer.channels);
  const { target } = output;
  const args = ["-hide_banner", "-loglevel", "error", "-nostdin", "-y", ...inputArgs, "-i", input.path, "-vn"];
  args.push("-ac", String(target.channels), "-ar", String(target.sampleRate));
  const tempo = atempoFilter(speed);
  if (tempo) args.push("-filter:a", tempo);
  args.push("-c:a", target.encoder, "-b:a", target.bitrate);
  if (target.encoder === "libopus") args.push("-application", "voip");
  args.push("-f", target.container, output.path);
  return args;
}

export class FfmpegTranscoder implements AudioTranscoder {
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly spawnProcess: SpawnFn;

  constructor(opts: FfmpegTranscoderOptions) {
    this.ffmpegPath = opts.ffmpegPath;
    this.timeoutMs = opts.timeoutMs;
    this.spawnProcess = opts.spawnProcess ?? defaultSpawn;
  }

  async transcode(buffer: AudioBuffer, target: CodecSpec, opts: TranscodeOptions): Promise<AudioBuffer> {
    if (!buffer.bytes.length) {
      throw new PipelineError("TranscodeError", "refusing to transcode an empty audio buffer");
    }
    if (opts.signal?.aborted) {
      throw new PipelineError("TranscodeError", "transcode aborted before start");
    }
    const id = randomUUID().slice(0, 8);
    const { ext } = inputFormatArgs(buffer.codec, buffer.sampleRate, buffer.channels);
    const inputPath = path.join(opts.workDir, `in-${id}.${ext}`);
    const outputPath = path.join(opts.workDir, `out-${id}.${target.fileExtension}`);
    const startedAt = Date.now();

    try {
      await fs.writeFile(inputPath, buffer.bytes);
      const args = buildFfmpegArgs({ path: inputPath, buffer }, { path: outputPath, target }, opts.speed);
      await this.run(args, opts.signal);

      const bytes = await fs.readFile(outputPath).catch((err: unknown) => {
        throw new PipelineError("TranscodeError", `ffmpeg produced no output file: ${errorMessage(err)}`, {
          cause: err
        });
      });
      if (!bytes.length) {
        throw new PipelineError("TranscodeError", "ffmpeg produced an empty output file");
      }
      if (!matchesContainer(bytes, target.container)) {
        throw new PipelineError("TranscodeError", `ffmpeg output is not a valid ${target.container} stream`);
      }
      console.log("[ffmpeg] transcode done", {
        codec: target.name,
        inputBytes: buffer.bytes.length,
        outputBytes: bytes.length,
        tookMs: Date.now() - startedAt
      });
      return { bytes, sampleRate: target.sampleRate, channels: target.channels, codec: target.name };
    } finally {
      await Promise.all([
        fs.rm(inputPath, { force: true }),
        fs.rm(outputPath, { force: true })
      ]);
    }
  }

  private run(args: string[], signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let child: SubprocessHandle;
      try {
        child = this.spawnProcess(this.ffmpegPath, args);
      } catch (err) {
        reject(new PipelineError("TranscodeError", `ffmpeg failed to start: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      let stderr = "";
      let killedFor: "timeout" | "aborted" | null = null;
      let settled = false;

      const kill = (reason: "timeout" | "aborted") => {
        if (killedFor) return;
        killedFor = reason;
        if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
      };
      const timer = setTimeout(() => kill("timeout"), this.timeoutMs);
      const onAbort = () => kill("aborted");
      signal?.addEventListener("abort", onAbort, { once: true });
      if (signal?.aborted) onAbort();

      const finish = (err?: PipelineError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        if (err) reject(err);
        else resolve();
      };

      child.stderr?.on("data", (chunk: Buffer) => {
        if (stderr.length < MAX_STDERR_CHARS) stderr += chunk.toString();
      });

      child.once("error", (err) => {
        // A spawn error (e.g. ENOENT) emits no close event; otherwise close follows.
        if (child.exitCode === null && child.signalCode === null && !killedFor) {
          finish(new PipelineError("TranscodeError", `ffmpeg failed to start: ${err.message}`, { cause: err }));
        }
      });

      child.once("close", (code, sig) => {
        if (killedFor === "timeout") {
          return finish(new PipelineError("TranscodeError", `ffmpeg timed out after ${this.timeoutMs}ms`));
        }
        if (killedFor === "aborted") {
          return finish(new PipelineError("TranscodeError", "ffmpeg aborted"));
        }
        if (code !== 0) {
          const detail = stderr.trim().split("\n").slice(-3).join(" | ") || "no stderr";
          return finish(
            new PipelineError("TranscodeError", `ffmpeg exited with ${code ?? sig ?? "unknown status"}: ${detail}`)
          );
        }
        finish();
      });
    });
  }
}
