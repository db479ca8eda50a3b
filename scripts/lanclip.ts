#!/usr/bin/env node
import { createXclipAdapter } from "../packages/core/clipboard/adapter";
import { JsonFileSettingsStore } from "../packages/core/config/settings";
import { loadServiceConfig } from "../packages/core/config/env";
import { setLogLevel } from "../packages/core/logger";
import { ClipboardBridgeService } from "../packages/core/service";

const config = loadServiceConfig();
setLogLevel(config.logLevel);

const service = new ClipboardBridgeService({
  settingsStore: new JsonFileSettingsStore(config.settingsPath),
  host: config.host,
  adapter: createXclipAdapter({
    environment: {
      binDir: config.binDir,
      runAsUser: config.runAsUser,
      sessionEnvFile: config.sessionEnvFile,
    },
  }),
});
let stopping = false;

async function shutdown(signal: string, exitCode = 0) {
  if (stopping) return;
  stopping = true;
  console.info(`[lanclip] received ${signal}, shutting down...`);
  const killTimer = setTimeout(() => {
    console.warn("[lanclip] force exiting after timeout");
    process.exit(1);
  }, 5000).unref();
  try {
    await service.stop();
  } catch (err) {
    console.error("[lanclip] error during shutdown", err instanceof Error ? err.message : err);
    exitCode = 1;
  } finally {
    clearTimeout(killTimer);
    process.exit(exitCode);
  }
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
// SIGHUP re-reads settings and rebinds the listener, e.g. after a port change
process.on("SIGHUP", () => {
  if (stopping) return;
  service.restartServer().then(
    (result) => {
      if (result.success) console.info(`[lanclip] restarted, open ${result.url}`);
      else console.error("[lanclip] restart failed:", result.error);
    },
    (err: unknown) => {
      console.error("[lanclip] restart failed", err);
    }
  );
});
process.on("uncaughtException", (err) => {
  console.error("[lanclip] uncaught exception", err);
  void shutdown("uncaughtException", 1);
});
process.on("unhandledRejection", (reason) => {
  console.error("[lanclip] unhandled rejection", reason);
  void shutdown("unhandledRejection", 1);
});

service.start().then(
  async () => {
    const status = await service.getServerStatus();
    console.info("[lanclip] settings file:", config.settingsPath);
    if (status.running) console.info(`[lanclip] open ${status.url} on another device`);
    if (!status.clipboard_available) console.warn("[lanclip] clipboard access unavailable (xclip not found)");
  },
  (err: unknown) => {
    console.error("[lanclip] failed to start", err);
    void shutdown("startup failure", 1);
  }
);
