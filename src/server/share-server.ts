import http from "node:http";
import type { Config } from "../config/index.js";
import { getLocalIp, serverUrl } from "../net/local-ip.js";
import { LocalStorage } from "../storage/local.js";
import { buildApp } from "./app.js";

export interface ShareServerOptions {
  /** Host advertised in the URL instead of the discovered LAN address. */
  publicHost?: string;
}

export interface ServerInfo {
  /** Canonical storage root. */
  root: string;
  /** Bound port; differs from the config when it asked for port 0. */
  port: number;
  url: string;
}

// ShareServer owns one listener for one Config. Several can run side by side.
export class ShareServer {
  private config: Config;
  private options: ShareServerOptions;
  private server: http.Server | null = null;
  private port = 0;
  private shutdownTimer: ReturnType<typeof setTimeout> | null = null;
  private stopping: Promise<void> | null = null;
  private markClosed: () => void = () => {};

  /** Settles once the listener has stopped, whatever stopped it. */
  readonly closed: Promise<void>;

  constructor(config: Config, options: ShareServerOptions = {}) {
    this.config = config;
    this.options = options;
    this.closed = new Promise((resolve) => {
      this.markClosed = resolve;
    });
  }

  async url(): Promise<string> {
    const host = this.options.publicHost ?? (await getLocalIp());
    return serverUrl(host, this.port);
  }

  async start(): Promise<ServerInfo> {
    if (this.server || this.stopping) {
      throw new Error("ShareServer can only be started once");
    }

    const storage = await LocalStorage.open(this.config.storage.shared_dir);
    const app = buildApp({
      config: this.config,
      storage,
      publicUrl: () => this.url(),
      onShutdown: () => this.requestShutdown(),
    });

    const server = http.createServer(app);
    const { host, port } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    if (!address || typeof address === "string") {
      server.close();
      throw new Error(`Unexpected listen address: ${String(address)}`);
    }

    this.server = server;
    this.port = address.port;
    server.on("close", () => this.markClosed());

    return { root: storage.root, port: this.port, url: await this.url() };
  }

  /** Schedules stop() after the configured delay. Later calls are no-ops. */
  requestShutdown(): void {
    if (this.shutdownTimer || this.stopping) return;

    console.log("Server shutting down per user request.");
    this.shutdownTimer = setTimeout(() => {
      this.stop().catch((err) => {
        console.error("ERROR: stopping server:", err);
      });
    }, this.config.shutdown.delay_ms);
  }

  /**
   * Stops accepting connections and waits for in-flight requests, up to the
   * drain timeout, before cutting the remaining ones.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.drain();
    }
    return this.stopping;
  }

  private async drain(): Promise<void> {
    if (this.shutdownTimer) {
      clearTimeout(this.shutdownTimer);
      this.shutdownTimer = null;
    }

    const server = this.server;
    if (!server) {
      this.markClosed();
      return;
    }

    const closing = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    server.closeIdleConnections();

    const timeout = setTimeout(() => {
      console.warn("WARN: drain timeout reached, closing open connections");
      server.closeAllConnections();
    }, this.config.shutdown.drain_timeout_ms);

    try {
      await closing;
    } finally {
      clearTimeout(timeout);
    }
  }
}
