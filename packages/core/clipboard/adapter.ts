import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  describeFailure,
  errorMessage,
  fail,
  ok,
  utilityUnavailable,
  type ClipboardFailure,
  type Result,
} from "../errors";
import { createLogger } from "../logger";
import { MimeType, isImageMime } from "../models/enums";
import { binarySnapshot, emptySnapshot, textSnapshot, type ClipboardSnapshot } from "../models/Snapshot";
import { FILE_URI_PREFIX, readImageFromUri } from "./fileUri";
import { createMutex } from "./mutex";
import { buildDisplayCommand, runCommand, type CommandResult, type CommandRunner } from "./process";
import { hasImageTarget, hasTextTarget, parseTargets, selectTextTarget } from "./targets";
import { resolveClipboardEnvironment, type EnvironmentOptions, type ResolvedEnvironment } from "./environment";

const log = createLogger("clipboard");

export const TIMEOUT_TARGETS_MS = 10_000;
export const TIMEOUT_TEXT_MS = 15_000;
export const TIMEOUT_IMAGE_MS = 45_000;

export type ReadOutcome = Result<ClipboardSnapshot, ClipboardFailure>;
export type WriteOutcome = Result<void, ClipboardFailure>;

export interface ClipboardAdapter {
  isAvailable(): Promise<boolean>;
  /** Current clipboard content; any failure yields the empty snapshot. */
  read(): Promise<ClipboardSnapshot>;
  /**
   * Same protocol as `read`, but an unavailable utility or a timeout is
   * reported instead of being folded into "empty".
   */
  tryRead(): Promise<ReadOutcome>;
  write(content: string, mimeType: string, isAlreadyEncoded: boolean): Promise<WriteOutcome>;
}

export interface XclipAdapterOptions {
  runner?: CommandRunner;
  /** Resolves the environment on first use; defaults to resolveClipboardEnvironment */
  resolve?: () => Promise<ResolvedEnvironment | null>;
  environment?: Omit<EnvironmentOptions, "runner">;
  tmpDir?: string;
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Strict base64 decode; Buffer.from silently skips bad characters.
 */
export function decodeBase64(content: string): Result<Buffer, ClipboardFailure> {
  const compact = content.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_RE.test(compact)) {
    return fail({ kind: "EncodingError", message: "content is not valid base64" });
  }
  return ok(Buffer.from(compact, "base64"));
}

/**
 * Clipboard access through xclip, optionally run as another user.
 */
export function createXclipAdapter(options: XclipAdapterOptions = {}): ClipboardAdapter {
  const runner = options.runner ?? runCommand;
  const resolve = options.resolve ?? (() => resolveClipboardEnvironment({ ...options.environment, runner }));
  const tmpRoot = options.tmpDir ?? os.tmpdir();
  const writeLock = createMutex();

  let envPromise: Promise<ResolvedEnvironment | null> | null = null;

  function environment(): Promise<ResolvedEnvironment | null> {
    if (!envPromise) {
      envPromise = resolve().catch((err: unknown) => {
        log.error("Clipboard initialization failed:", errorMessage(err));
        return null;
      });
    }
    return envPromise;
  }

  function xclip(
    env: ResolvedEnvironment,
    args: string[],
    timeoutMs: number,
    captureOutput = true
  ): Promise<CommandResult> {
    const cmd = buildDisplayCommand(env, env.command, ["-selection", "clipboard", ...args]);
    return runner({ ...cmd, timeoutMs, captureOutput });
  }

  async function queryTargets(env: ResolvedEnvironment): Promise<Result<string[], ClipboardFailure>> {
    const res = await xclip(env, ["-t", "TARGETS", "-o"], TIMEOUT_TARGETS_MS);
    if (!res.ok) {
      log.debug("Failed to query clipboard targets:", describeFailure(res.error));
      return res;
    }
    const targets = parseTargets(res.value.stdout.toString("utf8"));
    log.debug("Clipboard targets:", targets.join(" "));
    return ok(targets);
  }

  /** Null when no image came back; the caller then tries text. */
  async function readImage(env: ResolvedEnvironment): Promise<ClipboardSnapshot | null> {
    const res = await xclip(env, ["-t", MimeType.Png, "-o"], TIMEOUT_IMAGE_MS);
    if (!res.ok) {
      log.debug("Image read failed, trying text:", describeFailure(res.error));
      return null;
    }
    if (res.value.stdout.length === 0) return null;
    log.info(`Read PNG image: ${res.value.stdout.length} bytes`);
    return binarySnapshot(res.value.stdout, MimeType.Png);
  }

  async function readText(env: ResolvedEnvironment, targets: string[]): Promise<ReadOutcome> {
    const target = selectTextTarget(targets);
    const args = target ? ["-t", target, "-o"] : ["-o"];
    const res = await xclip(env, args, TIMEOUT_TEXT_MS);
    if (!res.ok) {
      // xclip exits non-zero when the selection is empty or lacks the target
      return res.error.kind === "Timeout" ? res : ok(emptySnapshot());
    }
    if (res.value.stdout.length === 0) return ok(emptySnapshot());

    const text = res.value.stdout.toString("utf8");
    if (text.startsWith(FILE_URI_PREFIX)) {
      const image = await readImageFromUri(text);
      if (image) return ok(image);
    }
    return ok(textSnapshot(text));
  }

  async function tryRead(): Promise<ReadOutcome> {
    const env = await environment();
    if (!env) return fail(utilityUnavailable());

    try {
      const probed = await queryTargets(env);
      const targets = probed.ok ? probed.value : [];

      if (hasImageTarget(targets)) {
        const image = await readImage(env);
        if (image) return ok(image);
      }

      if (targets.length === 0 || hasTextTarget(targets)) {
        return await readText(env, targets);
      }
      return ok(emptySnapshot());
    } catch (err) {
      log.error("Clipboard read error:", errorMessage(err));
      return ok(emptySnapshot());
    }
  }

  async function read(): Promise<ClipboardSnapshot> {
    const outcome = await tryRead();
    if (outcome.ok) return outcome.value;
    log.warn("Clipboard read failed:", describeFailure(outcome.error));
    return emptySnapshot();
  }

  async function writeFromFile(
    env: ResolvedEnvironment,
    bytes: Buffer,
    mimeType: string
  ): Promise<WriteOutcome> {
    const dir = await fs.mkdtemp(path.join(tmpRoot, "lanclip-"));
    const file = path.join(dir, "payload");
    try {
      await fs.writeFile(file, bytes);
      // xclip may run as another user
      await fs.chmod(dir, 0o755);
      await fs.chmod(file, 0o644);

      const timeout = isImageMime(mimeType) ? TIMEOUT_IMAGE_MS : TIMEOUT_TEXT_MS;
      const res = await xclip(env, ["-t", mimeType, "-i", file], timeout, false);
      if (!res.ok) {
        log.error("Failed to set clipboard:", describeFailure(res.error));
        return res;
      }
      log.debug(`Set clipboard: ${mimeType}, ${bytes.length} bytes`);
      return ok(undefined);
    } finally {
      await fs.rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
        log.warn("Failed to remove temp file:", errorMessage(err));
      });
    }
  }

  async function write(content: string, mimeType: string, isAlreadyEncoded: boolean): Promise<WriteOutcome> {
    const env = await environment();
    if (!env) {
      log.error("xclip not available");
      return fail(utilityUnavailable());
    }

    let bytes: Buffer;
    if (isAlreadyEncoded) {
      const decoded = decodeBase64(content);
      if (!decoded.ok) {
        log.error("Data encoding error:", decoded.error.message);
        return decoded;
      }
      bytes = decoded.value;
    } else {
      bytes = Buffer.from(content, "utf8");
    }

    return writeLock.runExclusive(async () => {
      try {
        return await writeFromFile(env, bytes, mimeType);
      } catch (err) {
        log.error("Clipboard set error:", errorMessage(err));
        return fail<ClipboardFailure>({
          kind: "ExternalProcessError",
          message: "Clipboard set error",
          exitCode: null,
          stderr: errorMessage(err),
        });
      }
    });
  }

  return {
    isAvailable: async () => (await environment()) !== null,
    read,
    tryRead,
    write,
  };
}
