import fs from "node:fs";
import path from "node:path";
import type { ErrorKind } from "../errors.js";

export type AuditEvent =
  | {
      type: "request_accepted" | "request_busy";
      at: string;
      conversationId: number;
      source: "text" | "document";
      textChars: number;
    }
  | {
      type: "request_done";
      at: string;
      conversationId: number;
      codec: string;
      payloadBytes: number;
      durationSec: number;
      parts: number;
      tookMs: number;
    }
  | {
      type: "request_failed";
      at: string;
      conversationId: number;
      kind: ErrorKind;
      message: string;
      tookMs: number;
    }
  | {
      type: "transcode_fallback";
      at: string;
      conversationId: number;
      from: string;
      to: string;
      message: string;
    }
  | {
      type: "dispatch_retry" | "dispatch_failed";
      at: string;
      conversationId: number;
      attempt: number;
      message: string;
    }
  | {
      type: "input_dropped";
      at: string;
      conversationId?: number;
      reason: string;
    }
  | {
      type: "prefs_update";
      at: string;
      conversationId: number;
      languageKey: string;
      speedKey: string;
    }
  | {
      type: "supervisor_state";
      at: string;
      from: string;
      to: string;
      restarts: number;
      message?: string;
    };

export type AuditSink = (event: AuditEvent) => void;

export function createAuditLogger(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: "a" });
  stream.on("error", (err) => {
    console.error("[audit] write failed", { filePath, error: err.message });
  });

  return {
    log(event: AuditEvent) {
      stream.write(`${JSON.stringify(event)}\n`);
    },
    close() {
      return new Promise<void>((resolve) => stream.end(() => resolve()));
    }
  };
}

export const noopAudit: AuditSink = () => undefined;
