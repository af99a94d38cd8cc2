import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AudioBuffer } from "../../types.js";
import { MP3_VOICE, OGG_OPUS_VOICE } from "../codec.js";
import { FfmpegTranscoder, buildFfmpegArgs } from "../ffmpeg.js";
import { fakeFfmpeg, OGG_OUTPUT } from "./fakeFfmpeg.js";

const mp3Input: AudioBuffer = {
  bytes: Buffer.from([0xff, 0xfb, 0x90, 0x64, 1, 2, 3]),
  sampleRate: 24_000,
  channels: 1,
  codec: "mp3"
};

describe("buildFfmpegArgs", () => {
  it("builds a mono Opus encode with the tempo filter", () => {
    const args = buildFfmpegArgs(
      { path: "/w/in.mp3", buffer: mp3Input },
      { path: "/w/out.ogg", target: OGG_OPUS_VOICE },
      1.5
    );
    expect(args).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-nostdin",
      "-y",
      "-f",
      "mp3",
      "-i",
      "/w/in.mp3",
      "-vn",
      "-ac",
      "1",
      "-ar",
      "48000",
      "-filter:a",
      "atempo=1.5",
      "-c:a",
      "libopus",
      "-b:a",
      "48k",
      "-application",
      "voip",
      "-f",
      "ogg",
      "/w/out.ogg"
    ]);
  });

  it("omits the filter at normal speed and the voip tuning for MP3", () => {
    const args = buildFfmpegArgs({ path: "in", buffer: mp3Input }, { path: "out", target: MP3_VOICE });
    expect(args).not.toContain("-filter:a");
    expect(args).not.toContain("-application");
    expect(args.slice(-7)).toEqual(["-c:a", "libmp3lame", "-b:a", "64k", "-f", "mp3", "out"]);
  });
});

describe("FfmpegTranscoder", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "ffmpeg-test-"));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("returns the encoded stream and removes its scratch files", async () => {
    const spawnProcess = fakeFfmpeg("ok");
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "/usr/bin/ffmpeg", timeoutMs: 1_000, spawnProcess });

    const out = await transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir, speed: 2 });

    expect(out).toEqual({ bytes: OGG_OUTPUT, sampleRate: 48_000, channels: 1, codec: "ogg_opus" });
    expect(spawnProcess.calls).toHaveLength(1);
    expect(spawnProcess.calls[0].command).toBe("/usr/bin/ffmpeg");
    expect(spawnProcess.calls[0].args).toContain("atempo=2");
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("fails with TranscodeError on a non-zero exit and cleans up", async () => {
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "ffmpeg", timeoutMs: 1_000, spawnProcess: fakeFfmpeg("fail") });

    await expect(transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir })).rejects.toMatchObject({
      kind: "TranscodeError",
      message: expect.stringContaining("ffmpeg exited with 1")
    });
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("kills a hung ffmpeg after the timeout", async () => {
    const spawnProcess = fakeFfmpeg("hang");
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "ffmpeg", timeoutMs: 30, spawnProcess });

    await expect(transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir })).rejects.toMatchObject({
      kind: "TranscodeError",
      message: "ffmpeg timed out after 30ms"
    });
    expect(spawnProcess.procs[0].killedWith).toBe("SIGKILL");
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("kills ffmpeg when the caller aborts", async () => {
    const spawnProcess = fakeFfmpeg("hang");
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "ffmpeg", timeoutMs: 5_000, spawnProcess });
    const controller = new AbortController();

    const pending = transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toMatchObject({ kind: "TranscodeError", message: "ffmpeg aborted" });
    expect(spawnProcess.procs[0].killedWith).toBe("SIGKILL");
  });

  it("rejects empty output", async () => {
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "ffmpeg", timeoutMs: 1_000, spawnProcess: fakeFfmpeg("empty") });
    await expect(transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir })).rejects.toMatchObject({
      kind: "TranscodeError",
      message: "ffmpeg produced an empty output file"
    });
  });

  it("rejects output that is not in the target container", async () => {
    const transcoder = new FfmpegTranscoder({
      ffmpegPath: "ffmpeg",
      timeoutMs: 1_000,
      spawnProcess: fakeFfmpeg("garbage")
    });
    await expect(transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir })).rejects.toMatchObject({
      kind: "TranscodeError",
      message: "ffmpeg output is not a valid ogg stream"
    });
    expect(await fs.readdir(workDir)).toEqual([]);
  });

  it("reports a missing binary", async () => {
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "ffmpeg", timeoutMs: 1_000, spawnProcess: fakeFfmpeg("enoent") });
    await expect(transcoder.transcode(mp3Input, OGG_OPUS_VOICE, { workDir })).rejects.toMatchObject({
      kind: "TranscodeError",
      message: "ffmpeg failed to start: spawn ffmpeg ENOENT"
    });
  });

  it("refuses an empty input buffer without spawning", async () => {
    const spawnProcess = fakeFfmpeg("ok");
    const transcoder = new FfmpegTranscoder({ ffmpegPath: "ffmpeg", timeoutMs: 1_000, spawnProcess });
    await expect(
      transcoder.transcode({ ...mp3Input, bytes: Buffer.alloc(0) }, OGG_OPUS_VOICE, { workDir })
    ).rejects.toMatchObject({ kind: "TranscodeError" });
    expect(spawnProcess.calls).toHaveLength(0);
  });
});
