import { spawn } from "node:child_process";
import { errorMessage, fail, ok, type ClipboardFailure, type Result } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("process");

export interface CommandRequest {
  command: string;
  args: string[];
  timeoutMs: number;
  /** Extra variables layered over the current environment */
  env?: Record<string, string>;
  /**
   * When false, stdio is ignored and the call resolves on exit. Needed for
   * xclip -i, which forks a child that keeps inherited pipes open.
   */
  captureOutput?: boolean;
}

export interface CommandOutput {
  stdout: Buffer;
  stderr: string;
}

export type CommandResult = Result<CommandOutput, ClipboardFailure>;

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

/**
 * Spawn a process with a hard timeout. Never rejects: spawn errors, non-zero
 * exits and timeouts come back as failures.
 */
export const runCommand: CommandRunner = (request) => {
  const capture = request.captureOutput ?? true;
  const label = [request.command, ...request.args].join(" ");

  return new Promise<CommandResult>((resolve) => {
    let settled = false;
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const child = spawn(request.command, request.args, {
      env: request.env ? { ...process.env, ...request.env } : process.env,
      stdio: capture ? ["ignore", "pipe", "pipe"] : "ignore",
    });

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      log.error("Command timeout:", label);
      child.kill("SIGKILL");
      finish(fail({ kind: "Timeout", message: `Command timed out: ${label}`, timeoutMs: request.timeoutMs }));
    }, request.timeoutMs);

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      log.error("Command error:", errorMessage(err));
      finish(
        fail({ kind: "ExternalProcessError", message: `Failed to run ${request.command}`, exitCode: null, stderr: errorMessage(err) })
      );
    });

    const onDone = (code: number | null, signal: NodeJS.Signals | null) => {
      const errText = Buffer.concat(stderr).toString("utf8");
      if (code === 0) {
        finish(ok({ stdout: Buffer.concat(stdout), stderr: errText }));
        return;
      }
      finish(
        fail({
          kind: "ExternalProcessError",
          message: signal ? `${request.command} killed by ${signal}` : `${request.command} exited with code ${code}`,
          exitCode: code,
          stderr: errText,
        })
      );
    };
    if (capture) child.on("close", onDone);
    else child.on("exit", onDone);
  });
};

export interface PrivilegeContext {
  /** User to run as through `sudo -u`; undefined runs the command directly */
  runAsUser?: string;
  display: string;
  xauthority?: string;
}

/**
 * Build the request for a command that talks to the display server.
 *
 * Elevation through sudo does not preserve the caller's environment, so the
 * display context is passed as explicit `env` arguments in that case.
 */
export function buildDisplayCommand(
  context: PrivilegeContext,
  command: string,
  args: string[]
): { command: string; args: string[]; env?: Record<string, string> } {
  const displayVars: Record<string, string> = { DISPLAY: context.display };
  if (context.xauthority) displayVars.XAUTHORITY = context.xauthority;

  if (!context.runAsUser) {
    return { command, args, env: displayVars };
  }
  const assignments = Object.entries(displayVars).map(([k, v]) => `${k}=${v}`);
  return {
    command: "sudo",
    args: ["-u", context.runAsUser, "env", ...assignments, command, ...args],
  };
}
