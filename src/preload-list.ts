// src/preload-list.ts
//
// Decoder for the Chromium transport_security_state_static.json document.
// The published file is JSON with whole-line "//" comments; only the
// "entries" array matters here and every field other than the four below
// is ignored.
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DecodeError, DuplicateKeyError } from "./errors.js";
import type { PreloadEntry, PreloadList } from "./records.js";

const preloadEntrySchema = z.object({
  name: z.string().min(1),
  mode: z.string().optional(),
  include_subdomains: z.boolean().optional().default(false),
  include_subdomains_for_pinning: z.boolean().optional().default(false),
});

const preloadDocumentSchema = z.object({
  entries: z.array(preloadEntrySchema),
});

const COMMENT_LINE = /^\s*\/\//;

export function stripLineComments(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => (COMMENT_LINE.test(line) ? "" : line))
    .join("\n");
}

function describeIssue(issue: z.ZodIssue): string {
  const where = issue.path.length ? issue.path.join(".") : "document";
  return `${where}: ${issue.message}`;
}

export function decodePreloadList(text: string, file?: string): PreloadList {
  let raw: unknown;
  try {
    raw = JSON.parse(stripLineComments(text));
  } catch (err) {
    throw new DecodeError(
      `malformed preload list: ${err instanceof Error ? err.message : String(err)}`,
      file,
      undefined,
      { cause: err },
    );
  }

  const parsed = preloadDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new DecodeError(
      `invalid preload list: ${first ? describeIssue(first) : parsed.error.message}`,
      file,
      undefined,
      { cause: parsed.error },
    );
  }

  const entries = new Map<string, PreloadEntry>();
  for (const e of parsed.data.entries) {
    if (entries.has(e.name)) {
      throw new DuplicateKeyError(e.name, file);
    }
    entries.set(e.name, {
      name: e.name,
      mode: e.mode,
      includeSubdomains: e.include_subdomains,
      includeSubdomainsForPinning: e.include_subdomains_for_pinning,
    });
  }
  return entries;
}

export async function readPreloadList(file: string): Promise<PreloadList> {
  const text = await readFile(file, "utf8");
  return decodePreloadList(text, file);
}
