// src/source.ts
//
// Resolve a source locator to a local file.  http(s) URLs are downloaded
// into a temp file (gunzipping when the server says so); file: URLs and
// anything that is not a URL are used in place.
import { constants as fsConstants } from "node:fs";
import { access, open, rm, stat, type FileHandle } from "node:fs/promises";
import http, { type IncomingMessage } from "node:http";
import https from "node:https";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { fileURLToPath } from "node:url";
import { createGunzip } from "node:zlib";
import {
  CLI_NAME,
  MAX_REDIRECTS,
  SOURCE_ACCEPT,
  SOURCE_TIMEOUT_MS,
} from "./constants.js";
import { AcquisitionError, toError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export type SourceFile = {
  path: string;
  // true when the file was downloaded and must be removed after use
  temp: boolean;
  bytes?: number;
};

export type AcquireOptions = {
  tempDir?: string;
  // socket inactivity limit for each request
  timeoutMs?: number;
  logger?: Logger;
};

export type SourceLocator =
  | { kind: "remote"; url: URL }
  | { kind: "local"; path: string };

export function parseSourceLocator(locator: string): SourceLocator {
  let url: URL;
  try {
    url = new URL(locator);
  } catch {
    return { kind: "local", path: locator };
  }
  if (url.protocol === "http:" || url.protocol === "https:") {
    return { kind: "remote", url };
  }
  if (url.protocol === "file:") {
    return { kind: "local", path: fileURLToPath(url) };
  }
  // e.g. a Windows drive letter parses as a URL scheme
  return { kind: "local", path: locator };
}

function request(
  url: URL,
  locator: string,
  timeoutMs: number,
): Promise<IncomingMessage> {
  const options = {
    headers: {
      "Accept-Encoding": "gzip",
      Accept: SOURCE_ACCEPT,
      "User-Agent": CLI_NAME,
    },
    timeout: timeoutMs,
  };
  return new Promise((resolve, reject) => {
    const req =
      url.protocol === "https:"
        ? https.get(url, options, resolve)
        : http.get(url, options, resolve);
    req.on("timeout", () => {
      req.destroy(
        new AcquisitionError(
          `timed out after ${timeoutMs} ms fetching ${locator}`,
          locator,
        ),
      );
    });
    req.on("error", reject);
  });
}

async function openResponse(
  url: URL,
  locator: string,
  timeoutMs: number,
  logger: Logger,
): Promise<IncomingMessage> {
  let current = url;
  for (let hops = 0; ; hops++) {
    const res = await request(current, locator, timeoutMs);
    const status = res.statusCode ?? 0;
    const location = res.headers.location;
    if (status >= 300 && status < 400 && location) {
      res.resume();
      if (hops >= MAX_REDIRECTS) {
        throw new AcquisitionError(
          `too many redirects fetching ${locator}`,
          locator,
          status,
        );
      }
      current = new URL(location, current);
      logger.debug("following redirect", { status, location: current.href });
      continue;
    }
    if (status < 200 || status >= 300) {
      res.resume();
      throw new AcquisitionError(
        `HTTP ${status} fetching ${locator}`,
        locator,
        status,
      );
    }
    return res;
  }
}

function isGzipEncoded(res: IncomingMessage): boolean {
  const encoding = res.headers["content-encoding"];
  return typeof encoding === "string" && encoding.trim().toLowerCase() === "gzip";
}

function tempSourcePath(dir: string): string {
  return path.join(dir, `hsts-${randomBytes(6).toString("hex")}.json`);
}

export async function downloadSource(
  url: URL,
  opts: AcquireOptions = {},
): Promise<SourceFile> {
  const logger = opts.logger ?? new NullLogger();
  const locator = url.href;
  const target = tempSourcePath(opts.tempDir ?? tmpdir());
  let created = false;
  try {
    const res = await openResponse(
      url,
      locator,
      opts.timeoutMs ?? SOURCE_TIMEOUT_MS,
      logger,
    );
    let handle: FileHandle;
    try {
      handle = await open(target, "wx");
    } catch (err) {
      res.destroy();
      throw err;
    }
    created = true;
    const out = handle.createWriteStream();
    if (isGzipEncoded(res)) {
      await pipeline(res, createGunzip(), out);
    } else {
      await pipeline(res, out);
    }
    const { size } = await stat(target);
    return { path: target, temp: true, bytes: size };
  } catch (err) {
    if (created) await rm(target, { force: true });
    if (err instanceof AcquisitionError) throw err;
    const cause = toError(err);
    throw new AcquisitionError(
      `failed to fetch ${locator}: ${cause.message}`,
      locator,
      undefined,
      { cause },
    );
  }
}

export async function acquireSource(
  locator: string,
  opts: AcquireOptions = {},
): Promise<SourceFile> {
  const parsed = parseSourceLocator(locator);
  if (parsed.kind === "local") {
    try {
      await access(parsed.path, fsConstants.R_OK);
    } catch (err) {
      const cause = toError(err);
      throw new AcquisitionError(
        `cannot open source ${locator}: ${cause.message}`,
        locator,
        undefined,
        { cause },
      );
    }
    return { path: parsed.path, temp: false };
  }
  return downloadSource(parsed.url, opts);
}

export async function releaseSource(source: SourceFile): Promise<void> {
  if (!source.temp) return;
  await rm(source.path, { force: true });
}
