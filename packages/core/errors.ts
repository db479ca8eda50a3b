/**
 * Failure taxonomy for clipboard access and client delivery.
 *
 * None of these are thrown across a component boundary: the adapter returns
 * them inside a `Result`, the hub converts them to `{ success: false }`.
 */
export type ClipboardFailure =
  | { kind: "UtilityUnavailable"; message: string }
  | { kind: "Timeout"; message: string; timeoutMs: number }
  | { kind: "EncodingError"; message: string }
  | {
      kind: "ExternalProcessError";
      message: string;
      exitCode: number | null;
      stderr: string;
    };

export type NetworkSendError = {
  kind: "NetworkSendError";
  message: string;
  clientId: string;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function utilityUnavailable(): ClipboardFailure {
  return { kind: "UtilityUnavailable", message: "Clipboard utility not available" };
}

export function describeFailure(failure: ClipboardFailure | NetworkSendError): string {
  switch (failure.kind) {
    case "UtilityUnavailable":
      return failure.message;
    case "Timeout":
      return `${failure.message} (timed out after ${failure.timeoutMs} ms)`;
    case "EncodingError":
      return `Invalid clipboard data: ${failure.message}`;
    case "ExternalProcessError": {
      const detail = failure.stderr.trim();
      return detail ? `${failure.message}: ${detail}` : failure.message;
    }
    case "NetworkSendError":
      return `Send to ${failure.clientId} failed: ${failure.message}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
