// src/known-hosts.ts
//
// Codec for the GNU Wget HSTS database (~/.wget-hsts):
//
//   # comment
//   <hostname>\t<port>\t<incl. subdomains>\t<created>\t<max-age>
//
// Lines that do not have exactly five fields are skipped, matching how
// the file has always been read by this tool.
import { readFile } from "node:fs/promises";
import { KNOWN_HOSTS_HEADER } from "./constants.js";
import { DecodeError, DuplicateKeyError, errorCode } from "./errors.js";
import type { KnownHostEntry, KnownHosts } from "./records.js";

export { KNOWN_HOSTS_HEADER };

const FIELD_SEPARATOR = /\s+/;
const INTEGER = /^[+-]?\d+$/;

function parseInteger(
  raw: string,
  field: string,
  lineNo: number,
  file?: string,
): number {
  const value = INTEGER.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new DecodeError(
      `line ${lineNo}: ${field} is not an integer: "${raw}"`,
      file,
      lineNo,
    );
  }
  return value;
}

export function decodeKnownHosts(text: string, file?: string): KnownHosts {
  const hosts = new Map<string, KnownHostEntry>();
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].trim();
    if (!line || line.startsWith("#")) continue;
    const fields = line.split(FIELD_SEPARATOR);
    if (fields.length !== 5) continue;
    const [hostname, port, includeSubdomains, created, maxAge] = fields;
    if (hosts.has(hostname)) {
      throw new DuplicateKeyError(hostname, file, lineNo);
    }
    hosts.set(hostname, {
      hostname,
      port: parseInteger(port, "port", lineNo, file),
      includeSubdomains: includeSubdomains === "1",
      created: parseInteger(created, "created", lineNo, file),
      maxAge: parseInteger(maxAge, "max-age", lineNo, file),
    });
  }
  return hosts;
}

export function encodeKnownHost(entry: KnownHostEntry): string {
  return [
    entry.hostname,
    entry.port,
    entry.includeSubdomains ? 1 : 0,
    entry.created,
    entry.maxAge,
  ].join("\t");
}

/** Returns null when the database does not exist yet. */
export async function readKnownHosts(file: string): Promise<KnownHosts | null> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
  return decodeKnownHosts(text, file);
}
