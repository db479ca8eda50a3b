import { createXclipAdapter, type ClipboardAdapter } from "./clipboard/adapter";
import { createClipboardMonitor, type ClipboardMonitor } from "./clipboard/monitor";
import { DEFAULT_SETTINGS, applyPatch, type Settings, type SettingsPatch, type SettingsStore } from "./config/settings";
import { errorMessage } from "./errors";
import { ClipboardHistory } from "./history/store";
import { createLogger } from "./logger";
import { createBroadcastHub, type BroadcastHub } from "./network/hub";
import { getLocalIp } from "./network/localIp";
import type { StatusResponse } from "./network/protocol";
import { createRouter, type Router } from "./network/router";
import { createClipboardServer, type ClipboardServer } from "./network/server";

const log = createLogger("service");

export interface ServiceOptions {
  settingsStore: SettingsStore;
  adapter?: ClipboardAdapter;
  host?: string;
  getLocalIp?: () => Promise<string>;
}

export type StartResult = { success: true; url: string; message?: string } | { success: false; error: string };

export interface ServerStatus {
  running: boolean;
  ip: string;
  port: number;
  url: string;
  clipboard_available: boolean;
}

/**
 * Owns every piece of runtime state: settings, history, live clients, the
 * poller and the HTTP listener. Nothing lives in module scope.
 */
export class ClipboardBridgeService {
  readonly adapter: ClipboardAdapter;
  readonly history: ClipboardHistory;
  readonly hub: BroadcastHub;
  readonly monitor: ClipboardMonitor;
  readonly router: Router;

  private settings: Settings = { ...DEFAULT_SETTINGS };
  private serverPort = DEFAULT_SETTINGS.port;
  private readonly server: ClipboardServer;
  private readonly store: SettingsStore;
  private readonly host: string;
  private readonly localIp: () => Promise<string>;

  constructor(options: ServiceOptions) {
    this.store = options.settingsStore;
    this.host = options.host ?? "0.0.0.0";
    this.localIp = options.getLocalIp ?? (() => getLocalIp());
    this.adapter = options.adapter ?? createXclipAdapter();
    this.history = new ClipboardHistory({ visibleLimit: this.settings.max_history });

    this.hub = createBroadcastHub({
      adapter: this.adapter,
      history: this.history,
      isHistoryEnabled: () => this.settings.enable_history,
    });
    this.monitor = createClipboardMonitor({
      adapter: this.adapter,
      sink: this.hub,
      history: this.history,
      getSettings: () => ({
        enableHistory: this.settings.enable_history,
        intervalSeconds: this.settings.monitor_interval,
      }),
    });
    this.router = createRouter({
      hub: this.hub,
      history: this.history,
      status: () => this.getWebStatus(),
      settings: {
        get: () => this.getSettings(),
        update: (patch) => this.saveSettings(patch),
      },
    });
    this.server = createClipboardServer({ router: this.router, hub: this.hub });
  }

  getSettings(): Settings {
    return { ...this.settings };
  }

  async loadSettings(): Promise<Settings> {
    this.applySettings(await this.store.load());
    this.serverPort = this.settings.port;
    return this.getSettings();
  }

  /**
   * Merge and persist a settings change. A new port is remembered but only
   * takes effect on restartServer().
   */
  async saveSettings(patch: SettingsPatch): Promise<{ settings: Settings; restartRequired: boolean }> {
    const next = applyPatch(this.settings, patch);
    await this.store.save(next);
    this.applySettings(next);
    if (next.port !== this.serverPort) {
      log.info(`Port changed from ${this.serverPort} to ${next.port}`);
    }
    return { settings: this.getSettings(), restartRequired: this.server.isRunning() && next.port !== this.boundPort() };
  }

  private applySettings(next: Settings): void {
    this.settings = next;
    this.history.setVisibleLimit(next.max_history);
  }

  private boundPort(): number {
    return this.server.port() ?? this.serverPort;
  }

  isServerRunning(): boolean {
    return this.server.isRunning();
  }

  async getWebStatus(): Promise<StatusResponse> {
    return {
      running: this.server.isRunning(),
      ip: await this.localIp(),
      clipboard_available: await this.adapter.isAvailable(),
    };
  }

  async getServerStatus(): Promise<ServerStatus> {
    const ip = await this.localIp();
    const port = this.boundPort();
    return {
      running: this.server.isRunning(),
      ip,
      port,
      url: `http://${ip}:${port}`,
      clipboard_available: await this.adapter.isAvailable(),
    };
  }

  async startServer(): Promise<StartResult> {
    if (this.server.isRunning()) {
      return { success: true, url: await this.url(), message: "Already running" };
    }
    try {
      await this.server.listen(this.settings.port, this.host);
      this.serverPort = this.settings.port;
      return { success: true, url: await this.url() };
    } catch (err) {
      log.error("Failed to start server:", errorMessage(err));
      return { success: false, error: errorMessage(err) };
    }
  }

  async stopServer(): Promise<void> {
    await this.server.close();
  }

  async restartServer(): Promise<StartResult> {
    if (this.server.isRunning()) {
      await this.stopServer();
      log.info("Stopped server for restart");
    }
    await this.loadSettings();
    const result = await this.startServer();
    if (result.success) log.info(`Server restarted on ${result.url}`);
    return result;
  }

  /**
   * Load settings, start the listener when auto_start is set, then the poller.
   */
  async start(): Promise<void> {
    log.info("Clipboard bridge starting...");
    await this.loadSettings();
    if (this.settings.auto_start) {
      const result = await this.startServer();
      if (result.success) log.info(`Web server at ${result.url}`);
      else log.error(`Server failed: ${result.error}`);
    } else {
      log.info("Auto-start disabled, server not started");
    }
    this.monitor.start();
  }

  async stop(): Promise<void> {
    log.info("Clipboard bridge stopping...");
    await this.monitor.stop();
    await this.stopServer();
  }

  private async url(): Promise<string> {
    return `http://${await this.localIp()}:${this.boundPort()}`;
  }
}
