/**
 * Clipboard target (representation) negotiation.
 */
import { MimeType } from "../models/enums";

/** Text targets in order of preference. */
export const TEXT_TARGETS = ["UTF8_STRING", "text/plain", "text/uri-list", "STRING"] as const;

export const IMAGE_TARGETS = [MimeType.Png, MimeType.Jpeg] as const;

/** xclip prints one target per line. */
export function parseTargets(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

export function hasImageTarget(targets: readonly string[]): boolean {
  return IMAGE_TARGETS.some((t) => targets.includes(t));
}

export function hasTextTarget(targets: readonly string[]): boolean {
  return TEXT_TARGETS.some((t) => targets.includes(t));
}

export function selectTextTarget(targets: readonly string[]): string | undefined {
  return TEXT_TARGETS.find((t) => targets.includes(t));
}
