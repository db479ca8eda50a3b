/**
 * Process-level configuration read from environment variables.
 *
 * LANCLIP_SETTINGS: settings JSON path (default: ~/.config/lanclip/settings.json)
 * LANCLIP_HOST: address to bind (default: 0.0.0.0)
 * LANCLIP_LOG_LEVEL: debug | info | warn | error (default: info)
 * LANCLIP_BIN_DIR: directory with a bundled xclip (default: <repo>/bin)
 * LANCLIP_RUN_AS: user owning the display session (default: deck, empty disables sudo)
 * LANCLIP_SESSION_ENV: file with DISPLAY=… for the session
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { isLogLevel, type LogLevel } from "../logger";
import { DEFAULT_SESSION_ENV_FILE } from "../clipboard/environment";

export interface ServiceConfig {
  settingsPath: string;
  host: string;
  logLevel: LogLevel;
  binDir: string;
  runAsUser?: string;
  sessionEnvFile: string;
}

export const DEFAULT_RUN_AS_USER = "deck";

type Env = Record<string, string | undefined>;

function env(source: Env, name: string): string | undefined {
  const val = source[name];
  return val && val.trim().length > 0 ? val.trim() : undefined;
}

/**
 * Nearest directory at or above `start` holding a package.json. Works from
 * both the sources and the compiled dist/ tree.
 */
export function findPackageRoot(start: string = __dirname): string {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return process.cwd();
    dir = parent;
  }
}

export function loadServiceConfig(source: Env = process.env, rootDir = findPackageRoot()): ServiceConfig {
  const level = env(source, "LANCLIP_LOG_LEVEL")?.toLowerCase();
  // an explicitly empty LANCLIP_RUN_AS turns elevation off
  const runAs = source.LANCLIP_RUN_AS === undefined ? DEFAULT_RUN_AS_USER : env(source, "LANCLIP_RUN_AS");

  return {
    settingsPath:
      env(source, "LANCLIP_SETTINGS") ?? path.join(os.homedir(), ".config", "lanclip", "settings.json"),
    host: env(source, "LANCLIP_HOST") ?? "0.0.0.0",
    logLevel: level && isLogLevel(level) ? level : "info",
    binDir: env(source, "LANCLIP_BIN_DIR") ?? path.join(rootDir, "bin"),
    runAsUser: runAs,
    sessionEnvFile: env(source, "LANCLIP_SESSION_ENV") ?? DEFAULT_SESSION_ENV_FILE,
  };
}
