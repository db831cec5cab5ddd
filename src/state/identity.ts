import { createHash } from "node:crypto";
import { resolve } from "node:path";

import type { SourceDescriptor } from "../types";

export const IDENTITY_HEX_LENGTH = 16;

const PROMPT_LABEL_MAX_CHARS = 60;

// `resolve` normalizes `..`, duplicate separators and trailing separators.
export function canonicalizeSourcePath(path: string, cwd = process.cwd()): string {
  return resolve(cwd, path.trim());
}

export function canonicalizeSource(
  source: SourceDescriptor,
  cwd = process.cwd(),
): SourceDescriptor {
  if (source.kind === "path") {
    return { kind: "path", path: canonicalizeSourcePath(source.path, cwd) };
  }
  return { kind: "prompt", text: source.text.trim() };
}

/**
 * Derives the stable project identity for an input source: the first 64 bits
 * of a SHA-256 digest over the canonical path or the trimmed prompt text.
 * The kind is part of the digested payload so a prompt that happens to look
 * like a path never shares an identity with that path.
 */
export function resolveIdentity(
  source: SourceDescriptor,
  cwd = process.cwd(),
): string {
  const canonical = canonicalizeSource(source, cwd);
  const payload =
    canonical.kind === "path" ? `path:${canonical.path}` : `prompt:${canonical.text}`;

  return createHash("sha256")
    .update(payload, "utf8")
    .digest("hex")
    .slice(0, IDENTITY_HEX_LENGTH);
}

export function describeSource(source: SourceDescriptor): string {
  if (source.kind === "path") {
    return source.path;
  }

  const text = source.text.trim().replace(/\s+/g, " ");
  return text.length > PROMPT_LABEL_MAX_CHARS
    ? `prompt: ${text.slice(0, PROMPT_LABEL_MAX_CHARS - 1)}…`
    : `prompt: ${text}`;
}

export function isIdentity(value: string): boolean {
  return /^[0-9a-f]{16}$/.test(value);
}
