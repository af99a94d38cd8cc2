import http from "node:http";
import type { AddressInfo } from "node:net";
import express from "express";

export type LivenessOptions = {
  host: string;
  port: number;
  healthPath: string;
  /** Read-only view of the worker state; must not block. */
  getState: () => string;
};

export function createLivenessApp(opts: Pick<LivenessOptions, "healthPath" | "getState">): express.Express {
  const app = express();
  app.disable("x-powered-by");
  const startedAt = Date.now();

  app.get(opts.healthPath, (_req, res) => {
    res.setHeader("Cache-Control", "no-store");
    res.status(200).json({
      ok: true,
      state: opts.getState(),
      uptimeSec: Math.round((Date.now() - startedAt) / 1000)
    });
  });

  // Platforms that probe "/" get an answer too.
  if (opts.healthPath !== "/") {
    app.get("/", (_req, res) => res.status(200).type("text/plain").send("ok"));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found" });
  });

  return app;
}

/**
 * HTTP responder for the host's health checks. Errors after listening are
 * reported through onFatal; a failed bind rejects start().
 */
export class LivenessServer {
  private readonly opts: LivenessOptions;
  private server: http.Server | null = null;

  constructor(opts: LivenessOptions) {
    this.opts = opts;
  }

  get address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr === "object" ? addr : null;
  }

  start(onFatal: (err: Error) => void): Promise<AddressInfo> {
    if (this.server) throw new Error("liveness server already started");
    const server = http.createServer(createLivenessApp(this.opts));
    // Keep-alive probes must not hold shutdown open.
    server.keepAliveTimeout = 5_000;
    this.server = server;

    return new Promise<AddressInfo>((resolve, reject) => {
      const onListenError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onListenError);
      server.listen(this.opts.port, this.opts.host, () => {
        server.off("error", onListenError);
        server.on("error", (err) => onFatal(err));
        const addr = server.address();
        if (!addr || typeof addr !== "object") {
          reject(new Error("liveness server has no TCP address"));
          return;
        }
        console.log("[health] listening", {
          pid: process.pid,
          host: addr.address,
          port: addr.port,
          path: this.opts.healthPath
        });
        resolve(addr);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });
  }
}
