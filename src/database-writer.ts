// src/database-writer.ts
//
// Regenerates the known-hosts database.  The new content is written to a
// scratch file first; the destination is only touched by the final
// rename, after a gzip backup of the previous file has been made.
import { createReadStream } from "node:fs";
import {
  copyFile,
  open,
  rename as fsRename,
  rm,
  stat as fsStat,
  writeFile,
  type FileHandle,
} from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { KNOWN_HOSTS_HEADER } from "./constants.js";
import { errorCode } from "./errors.js";
import { encodeKnownHost } from "./known-hosts.js";
import { NullLogger, type Logger } from "./logger.js";
import type { KnownHostEntry } from "./records.js";

export type RenameFn = (from: string, to: string) => Promise<void>;

export type WriteDatabaseOptions = {
  tempDir?: string;
  logger?: Logger;
  rename?: RenameFn;
};

export type WriteDatabaseResult = {
  backupPath?: string;
};

export function renderKnownHosts(rows: readonly KnownHostEntry[]): string {
  return [...KNOWN_HOSTS_HEADER, ...rows.map(encodeKnownHost)]
    .map((line) => `${line}\n`)
    .join("");
}

export async function writeScratchDatabase(
  rows: readonly KnownHostEntry[],
  opts: Pick<WriteDatabaseOptions, "tempDir"> = {},
): Promise<string> {
  const dir = opts.tempDir ?? tmpdir();
  const scratch = path.join(
    dir,
    `known-hosts-${randomBytes(6).toString("hex")}.tmp`,
  );
  try {
    await writeFile(scratch, renderKnownHosts(rows), {
      encoding: "utf8",
      flag: "wx",
    });
  } catch (err) {
    // EEXIST means the name belongs to somebody else
    if (errorCode(err) !== "EEXIST") {
      await rm(scratch, { force: true });
    }
    throw err;
  }
  return scratch;
}

export function backupCandidate(destination: string, n: number): string {
  return n === 0 ? `${destination}.bak.gz` : `${destination}.bak.${n}.gz`;
}

/**
 * Gzip-copy `destination` to the first free name among
 * `<destination>.bak.gz`, `<destination>.bak.1.gz`, ...
 */
export async function backupDatabase(destination: string): Promise<string> {
  for (let n = 0; ; n++) {
    const candidate = backupCandidate(destination, n);
    let handle: FileHandle;
    try {
      handle = await open(candidate, "wx");
    } catch (err) {
      if (errorCode(err) === "EEXIST") continue;
      throw err;
    }
    try {
      await pipeline(
        createReadStream(destination),
        createGzip(),
        handle.createWriteStream(),
      );
      return candidate;
    } catch (err) {
      await rm(candidate, { force: true });
      throw err;
    }
  }
}

/**
 * Move the scratch file over the destination.  Only a cross-device rename
 * (EXDEV) falls back to copy-then-unlink, which is not atomic.
 */
export async function replaceDatabase(
  scratch: string,
  destination: string,
  opts: Pick<WriteDatabaseOptions, "logger" | "rename"> = {},
): Promise<"atomic" | "copy"> {
  const rename = opts.rename ?? fsRename;
  try {
    await rename(scratch, destination);
    return "atomic";
  } catch (err) {
    if (errorCode(err) !== "EXDEV") throw err;
    opts.logger?.debug("atomic rename not possible, copying instead", {
      scratch,
      destination,
      error: err,
    });
  }
  await copyFile(scratch, destination);
  await rm(scratch, { force: true });
  return "copy";
}

async function exists(file: string): Promise<boolean> {
  try {
    await fsStat(file);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

export async function writeKnownHostsDatabase(
  destination: string,
  rows: readonly KnownHostEntry[],
  opts: WriteDatabaseOptions = {},
): Promise<WriteDatabaseResult> {
  const logger = opts.logger ?? new NullLogger();
  const scratch = await writeScratchDatabase(rows, opts);
  logger.debug("scratch database written", { scratch, rows: rows.length });
  try {
    let backupPath: string | undefined;
    if (await exists(destination)) {
      backupPath = await backupDatabase(destination);
      logger.info("backed up existing database", { destination, backupPath });
    }
    const how = await replaceDatabase(scratch, destination, opts);
    logger.info("database updated", { destination, rows: rows.length, how });
    return { backupPath };
  } catch (err) {
    await rm(scratch, { force: true });
    throw err;
  }
}
