import { constants as fsConstants, promises as fs } from "node:fs";
import path from "node:path";
import { errorMessage, isMissingFile } from "../errors";
import { createLogger } from "../logger";
import { runCommand, type CommandRunner, type PrivilegeContext } from "./process";

const log = createLogger("clipboard");

export const DEFAULT_DISPLAY = ":0";
export const DEFAULT_SESSION_ENV_FILE = "/run/user/1000/gamescope-environment";
export const DEFAULT_SYSTEM_PATHS = ["/usr/bin/xclip", "/usr/local/bin/xclip", "xclip"];
export const TIMEOUT_WHICH_MS = 2_000;

const EXEC_BITS = 0o111;

/**
 * Everything needed to launch the clipboard utility, resolved once.
 */
export interface ResolvedEnvironment extends PrivilegeContext {
  readonly command: string;
}

export interface EnvironmentOptions {
  /** Directory holding a bundled `xclip`, preferred over system installs */
  binDir?: string;
  systemPaths?: string[];
  sessionEnvFile?: string;
  defaultDisplay?: string;
  runAsUser?: string;
  /** Defaults to /home/<runAsUser>/.Xauthority */
  authorityFile?: string;
  runner?: CommandRunner;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read `DISPLAY=` from the session environment descriptor.
 */
export async function readSessionDisplay(file: string): Promise<string | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    if (!isMissingFile(err)) {
      log.error("Failed to read session environment:", errorMessage(err));
    }
    return undefined;
  }
  for (const line of raw.split(/\r?\n/)) {
    if (line.startsWith("DISPLAY=")) {
      const display = line.slice("DISPLAY=".length).trim();
      if (display) {
        log.info("Session DISPLAY:", display);
        return display;
      }
    }
  }
  return undefined;
}

async function ensureExecutable(file: string): Promise<void> {
  try {
    const stat = await fs.stat(file);
    if ((stat.mode & fsConstants.S_IXUSR) === 0) {
      await fs.chmod(file, stat.mode | EXEC_BITS);
      log.debug("Set executable permission on", file);
    }
  } catch (err) {
    log.error(`Failed to set permissions on ${file}:`, errorMessage(err));
  }
}

/**
 * Find the utility: bundled binary first, then absolute system paths, then a
 * `which` lookup for bare names.
 */
export async function findCommand(
  bundledPath: string | undefined,
  systemPaths: string[],
  runner: CommandRunner
): Promise<string | undefined> {
  if (bundledPath) {
    try {
      const stat = await fs.stat(bundledPath);
      if (stat.isFile()) {
        await ensureExecutable(bundledPath);
        return bundledPath;
      }
    } catch {
      // not bundled
    }
  }

  for (const candidate of systemPaths) {
    if (path.isAbsolute(candidate)) {
      try {
        await fs.access(candidate, fsConstants.X_OK);
        return candidate;
      } catch {
        continue;
      }
    }
    const found = await runner({ command: "which", args: [candidate], timeoutMs: TIMEOUT_WHICH_MS });
    if (found.ok) {
      const resolved = found.value.stdout.toString("utf8").trim();
      if (resolved) return resolved;
    }
  }
  return undefined;
}

/**
 * Resolve the display context and the utility binary. Returns null when no
 * usable binary exists; that state is permanent for the process lifetime.
 */
export async function resolveClipboardEnvironment(
  options: EnvironmentOptions = {}
): Promise<ResolvedEnvironment | null> {
  const runner = options.runner ?? runCommand;
  const display =
    (await readSessionDisplay(options.sessionEnvFile ?? DEFAULT_SESSION_ENV_FILE)) ??
    options.defaultDisplay ??
    DEFAULT_DISPLAY;

  const command = await findCommand(
    options.binDir ? path.join(options.binDir, "xclip") : undefined,
    options.systemPaths ?? DEFAULT_SYSTEM_PATHS,
    runner
  );
  if (!command) {
    log.error("xclip not found! Clipboard will not work.");
    return null;
  }

  const runAsUser = options.runAsUser || undefined;
  const authorityCandidate =
    options.authorityFile ?? (runAsUser ? path.join("/home", runAsUser, ".Xauthority") : undefined);
  const xauthority = authorityCandidate && (await exists(authorityCandidate)) ? authorityCandidate : undefined;

  log.info("Clipboard initialized with xclip:", command);
  return Object.freeze({ command, display, runAsUser, xauthority });
}
