// src/records.ts
import {
  FORCE_HTTPS_MODE,
  PRELOAD_CREATED_SENTINEL,
  PRELOAD_MAX_AGE,
  PRELOAD_PORT,
} from "./constants.js";

/** One row of the authoritative preload list. */
export type PreloadEntry = {
  readonly name: string;
  readonly mode?: string;
  readonly includeSubdomains: boolean;
  readonly includeSubdomainsForPinning: boolean;
};

/** One row of a Wget HSTS known-hosts database. */
export type KnownHostEntry = {
  readonly hostname: string;
  readonly port: number;
  readonly includeSubdomains: boolean;
  readonly created: number;
  readonly maxAge: number;
};

export type PreloadList = ReadonlyMap<string, PreloadEntry>;
export type KnownHosts = ReadonlyMap<string, KnownHostEntry>;

// The database format has no provenance column; rows written from a preload
// list are recognised by this created/max-age pair only.
export function isPreloadDerived(entry: KnownHostEntry): boolean {
  return (
    entry.created === PRELOAD_CREATED_SENTINEL &&
    entry.maxAge === PRELOAD_MAX_AGE
  );
}

export function effectiveIncludeSubdomains(entry: PreloadEntry): boolean {
  return entry.includeSubdomains || entry.includeSubdomainsForPinning;
}

export function isForceHttps(entry: PreloadEntry): boolean {
  return entry.mode?.toLowerCase() === FORCE_HTTPS_MODE;
}

export function knownHostFromPreload(entry: PreloadEntry): KnownHostEntry {
  return {
    hostname: entry.name,
    port: PRELOAD_PORT,
    includeSubdomains: effectiveIncludeSubdomains(entry),
    created: PRELOAD_CREATED_SENTINEL,
    maxAge: PRELOAD_MAX_AGE,
  };
}
