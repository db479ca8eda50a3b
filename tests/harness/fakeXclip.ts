/**
 * In-process stand-in for `sudo -u <user> env DISPLAY=… xclip …`.
 *
 * Holds one clipboard selection (target name -> bytes) and answers the xclip
 * invocations the adapter issues. Every call is recorded, already unwrapped
 * from the sudo/env prefix.
 */
import { promises as fs } from "node:fs";
import type { ClipboardFailure } from "../../packages/core/errors";
import type { CommandRequest, CommandResult, CommandRunner } from "../../packages/core/clipboard/process";
import type { ResolvedEnvironment } from "../../packages/core/clipboard/environment";

export const FAKE_XCLIP = "/opt/lanclip/bin/xclip";

export const FAKE_ENV: ResolvedEnvironment = Object.freeze({
  command: FAKE_XCLIP,
  display: ":1",
  runAsUser: "deck",
  xauthority: "/home/deck/.Xauthority",
});

export interface RecordedCall {
  request: CommandRequest;
  /** xclip arguments without `-selection clipboard` */
  args: string[];
  /** Contents of the `-i` file at the time of the call */
  input?: Buffer;
  inputPath?: string;
}

export type FailureRule = (args: string[]) => ClipboardFailure | undefined;

export interface FakeXclip {
  runner: CommandRunner;
  calls: RecordedCall[];
  selection: Map<string, Buffer>;
  /** Replace the selection as if another application copied something */
  copy(target: string, data: string | Buffer): void;
  /** Fail matching invocations before they touch the selection */
  failWhen(rule: FailureRule): void;
}

function ok(stdout: Buffer | string = ""): CommandResult {
  return { ok: true, value: { stdout: Buffer.isBuffer(stdout) ? stdout : Buffer.from(stdout), stderr: "" } };
}

function exit1(stderr: string): CommandResult {
  return { ok: false, error: { kind: "ExternalProcessError", message: "xclip exited with code 1", exitCode: 1, stderr } };
}

function unwrap(request: CommandRequest): string[] | undefined {
  let argv = [request.command, ...request.args];
  if (argv[0] === "sudo") {
    // sudo -u <user> env K=V ... <cmd> ...
    argv = argv.slice(3);
    if (argv[0] === "env") argv = argv.slice(1);
    while (argv.length > 0 && /^[A-Z_]+=/.test(argv[0])) argv = argv.slice(1);
  }
  if (argv[0] !== FAKE_XCLIP) return undefined;
  const rest = argv.slice(1);
  if (rest[0] === "-selection" && rest[1] === "clipboard") return rest.slice(2);
  return rest;
}

function optionValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i !== -1 ? args[i + 1] : undefined;
}

export function createFakeXclip(): FakeXclip {
  const selection = new Map<string, Buffer>();
  const calls: RecordedCall[] = [];
  const rules: FailureRule[] = [];

  const runner: CommandRunner = async (request) => {
    const args = unwrap(request);
    if (!args) {
      calls.push({ request, args: [] });
      return exit1(`unexpected command ${request.command}`);
    }

    const inputPath = optionValue(args, "-i");
    const call: RecordedCall = { request, args };
    if (inputPath) {
      call.inputPath = inputPath;
      call.input = await fs.readFile(inputPath);
    }
    calls.push(call);

    for (const rule of rules) {
      const failure = rule(args);
      if (failure) return { ok: false, error: failure };
    }

    const target = optionValue(args, "-t");
    if (inputPath && call.input) {
      selection.clear();
      selection.set(target ?? "UTF8_STRING", call.input);
      return ok();
    }

    if (args.includes("-o")) {
      if (target === "TARGETS") {
        if (selection.size === 0) return exit1("Error: target TARGETS not available");
        return ok(["TARGETS", ...selection.keys()].join("\n") + "\n");
      }
      if (target) {
        const data = selection.get(target);
        return data ? ok(data) : exit1(`Error: target ${target} not available`);
      }
      const first = selection.values().next();
      return first.done ? exit1("Error: target STRING not available") : ok(first.value);
    }

    return exit1("unsupported invocation");
  };

  return {
    runner,
    calls,
    selection,
    copy(target, data) {
      selection.clear();
      selection.set(target, Buffer.isBuffer(data) ? data : Buffer.from(data));
    },
    failWhen(rule) {
      rules.push(rule);
    },
  };
}

export function timeoutFailure(timeoutMs: number): ClipboardFailure {
  return { kind: "Timeout", message: "Command timed out: xclip", timeoutMs };
}
