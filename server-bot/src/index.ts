import { createVoiceBotApp } from "./app.js";

const rawLog = console.log.bind(console);
const rawWarn = console.warn.bind(console);
const rawError = console.error.bind(console);

const stamp = () => `[${new Date().toISOString()} pid=${process.pid}]`;

// Prefix all worker logs with timestamp + pid.
console.log = (...args: unknown[]) => rawLog(stamp(), ...args);
console.warn = (...args: unknown[]) => rawWarn(stamp(), ...args);
console.error = (...args: unknown[]) => rawError(stamp(), ...args);

function logExit(event: string, detail?: unknown) {
  const payload = {
    ts: new Date().toISOString(),
    event,
    pid: process.pid,
    uptimeSec: Math.round(process.uptime()),
    detail
  };
  console.error("[server-exit]", JSON.stringify(payload));
}

const describe = (value: unknown) =>
  value instanceof Error ? { message: value.message, stack: value.stack } : String(value);

process.on("uncaughtException", (err) => {
  logExit("uncaughtException", describe(err));
});

process.on("unhandledRejection", (reason: unknown) => {
  logExit("unhandledRejection", { reason: describe(reason) });
});

let app: ReturnType<typeof createVoiceBotApp>;
try {
  app = createVoiceBotApp({
    onFatal: (err) => {
      logExit("fatal", describe(err));
      process.exit(1);
    }
  });
} catch (err) {
  logExit("config", describe(err));
  process.exit(1);
}

let shuttingDown = false;
const handleSignal = (signal: "SIGTERM" | "SIGINT") => {
  if (shuttingDown) return;
  shuttingDown = true;
  logExit(signal);
  // Most hosts send SIGKILL 30s after SIGTERM.
  setTimeout(() => process.exit(0), 25_000).unref();
  app
    .shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logExit("shutdownError", describe(err));
      process.exit(1);
    });
};
process.on("SIGTERM", () => handleSignal("SIGTERM"));
process.on("SIGINT", () => handleSignal("SIGINT"));
process.on("exit", (code) => logExit("exit", { code }));

console.log("voicenote-bot starting", {
  pid: process.pid,
  engine: app.config.ttsEngine,
  codec: app.config.voiceCodec,
  maxConcurrency: app.config.maxConcurrency
});

await app.supervisor.start().catch((err: unknown) => {
  logExit("startError", describe(err));
  process.exit(1);
});
