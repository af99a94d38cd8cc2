import type { AudioCodec } from "../types.js";

export type CodecSpec = {
  name: Extract<AudioCodec, "ogg_opus" | "mp3">;
  /** ffmpeg muxer name. */
  container: "ogg" | "mp3";
  encoder: string;
  mimeType: string;
  sampleRate: number;
  channels: number;
  bitrate: string;
  fileExtension: string;
};

export const OGG_OPUS_VOICE: CodecSpec = {
  name: "ogg_opus",
  container: "ogg",
  encoder: "libopus",
  mimeType: "audio/ogg",
  sampleRate: 48_000,
  channels: 1,
  bitrate: "48k",
  fileExtension: "ogg"
};

export const MP3_VOICE: CodecSpec = {
  name: "mp3",
  container: "mp3",
  encoder: "libmp3lame",
  mimeType: "audio/mpeg",
  sampleRate: 44_100,
  channels: 1,
  bitrate: "64k",
  fileExtension: "mp3"
};

export function codecByName(name: CodecSpec["name"]): CodecSpec {
  return name === "ogg_opus" ? OGG_OPUS_VOICE : MP3_VOICE;
}

/** ffmpeg flags that describe a raw or file-based input, and the scratch file suffix. */
export function inputFormatArgs(codec: AudioCodec, sampleRate: number, channels: number) {
  switch (codec) {
    case "pcm_s16le":
      return { ext: "pcm", args: ["-f", "s16le", "-ar", String(sampleRate), "-ac", String(channels)] };
    case "wav":
      return { ext: "wav", args: ["-f", "wav"] };
    case "mp3":
      return { ext: "mp3", args: ["-f", "mp3"] };
    case "ogg_opus":
      return { ext: "ogg", args: ["-f", "ogg"] };
  }
}

/**
 * atempo only takes factors in [0.5, 2.0] on older ffmpeg builds, so larger
 * speed-ups are expressed as a chain of stages whose product is the factor.
 */
export function atempoFilter(speed: number): string | null {
  if (!Number.isFinite(speed) || speed <= 0) throw new Error(`Invalid speed ${speed}`);
  if (Math.abs(speed - 1) < 1e-9) return null;
  const stages: number[] = [];
  let rest = speed;
  while (rest > 2) {
    stages.push(2);
    rest /= 2;
  }
  while (rest < 0.5) {
    stages.push(0.5);
    rest /= 0.5;
  }
  stages.push(rest);
  return stages.map((s) => `atempo=${Number(s.toFixed(6))}`).join(",");
}

const hasPrefix = (bytes: Buffer, ascii: string) =>
  bytes.length >= ascii.length && bytes.subarray(0, ascii.length).toString("latin1") === ascii;

/** Checks the container magic bytes, not the full stream. */
export function matchesContainer(bytes: Buffer, container: CodecSpec["container"]): boolean {
  if (container === "ogg") return hasPrefix(bytes, "OggS");
  if (hasPrefix(bytes, "ID3")) return true;
  // MPEG audio frame sync: 11 set bits.
  return bytes.length >= 2 && bytes[0] === 0xff && (bytes[1] & 0xe0) === 0xe0;
}

const OPUS_GRANULE_RATE = 48_000;

/** A capture pattern counts as a page only if its header and body fit the buffer exactly to its end. */
function isFinalOggPage(bytes: Buffer, at: number): boolean {
  if (at + 27 > bytes.length || bytes[at + 4] !== 0) return false;
  const segments = bytes[at + 26];
  const headerLength = 27 + segments;
  if (at + headerLength > bytes.length) return false;
  let bodyLength = 0;
  for (let i = 0; i < segments; i += 1) bodyLength += bytes[at + 27 + i];
  return at + headerLength + bodyLength === bytes.length;
}

function opusPreSkip(bytes: Buffer): number {
  const at = bytes.indexOf("OpusHead");
  if (at < 0 || at + 12 > bytes.length) return 0;
  return bytes.readUInt16LE(at + 10);
}

/**
 * Duration of an Ogg Opus stream from the granule position of its last page,
 * less the encoder pre-skip. Opus granules always count 48 kHz samples.
 */
export function oggOpusDurationSeconds(bytes: Buffer): number {
  let at = bytes.lastIndexOf("OggS");
  while (at >= 0 && !isFinalOggPage(bytes, at)) {
    at = at > 0 ? bytes.lastIndexOf("OggS", at - 1) : -1;
  }
  if (at < 0) return 0;
  const samples = Number(bytes.readBigInt64LE(at + 6)) - opusPreSkip(bytes);
  return samples > 0 ? samples / OPUS_GRANULE_RATE : 0;
}

export function pcmDurationSeconds(bytes: number, sampleRate: number, channels: number): number {
  if (sampleRate <= 0 || channels <= 0) return 0;
  return bytes / 2 / channels / sampleRate;
}
