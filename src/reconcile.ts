// src/reconcile.ts
//
// Three-way comparison between the preload list, the preload-derived rows
// of the known-hosts database and the database as a whole.  Everything
// here is pure; reading and writing files happens in update.ts and
// database-writer.ts.
import {
  effectiveIncludeSubdomains,
  isForceHttps,
  isPreloadDerived,
  knownHostFromPreload,
  type KnownHostEntry,
  type KnownHosts,
  type PreloadEntry,
  type PreloadList,
} from "./records.js";

export type ReconcilePlan = {
  preloaded: KnownHosts;
  hostsToRemove: ReadonlySet<string>;
  hostsToUpdate: ReadonlySet<string>;
  entriesToWrite: readonly PreloadEntry[];
  // entriesToWrite minus the names that are rewritten in place
  entriesToInsert: readonly string[];
  needsWrite: boolean;
};

export function selectPreloadedHosts(knownHosts: KnownHosts): KnownHosts {
  const preloaded = new Map<string, KnownHostEntry>();
  for (const [hostname, entry] of knownHosts) {
    if (isPreloadDerived(entry)) preloaded.set(hostname, entry);
  }
  return preloaded;
}

export function computeHostsToRemove(
  preload: PreloadList,
  preloaded: KnownHosts,
): Set<string> {
  const out = new Set<string>();
  for (const hostname of preloaded.keys()) {
    if (!preload.has(hostname)) out.add(hostname);
  }
  return out;
}

export function computeHostsToUpdate(
  preload: PreloadList,
  preloaded: KnownHosts,
): Set<string> {
  const out = new Set<string>();
  for (const [hostname, entry] of preloaded) {
    const source = preload.get(hostname);
    if (
      source &&
      effectiveIncludeSubdomains(source) !== entry.includeSubdomains
    ) {
      out.add(hostname);
    }
  }
  return out;
}

export function computeEntriesToWrite(
  preload: PreloadList,
  knownHosts: KnownHosts,
  hostsToUpdate: ReadonlySet<string>,
): PreloadEntry[] {
  return Array.from(preload.values()).filter(
    (e) =>
      isForceHttps(e) &&
      (!knownHosts.has(e.name) || hostsToUpdate.has(e.name)),
  );
}

export function planReconciliation(
  preload: PreloadList,
  knownHosts: KnownHosts,
): ReconcilePlan {
  const preloaded = selectPreloadedHosts(knownHosts);
  const hostsToRemove = computeHostsToRemove(preload, preloaded);
  const hostsToUpdate = computeHostsToUpdate(preload, preloaded);
  const entriesToWrite = computeEntriesToWrite(
    preload,
    knownHosts,
    hostsToUpdate,
  );
  const entriesToInsert = entriesToWrite
    .map((e) => e.name)
    .filter((name) => !hostsToUpdate.has(name));
  return {
    preloaded,
    hostsToRemove,
    hostsToUpdate,
    entriesToWrite,
    entriesToInsert,
    needsWrite: entriesToWrite.length > 0 || hostsToRemove.size > 0,
  };
}

function compareHostnames(a: KnownHostEntry, b: KnownHostEntry): number {
  return a.hostname < b.hostname ? -1 : a.hostname > b.hostname ? 1 : 0;
}

/**
 * Rows of the regenerated database: untouched rows in their original
 * order, then one synthesized preload row per entry to write, sorted by
 * hostname.
 */
export function buildKnownHostRows(
  knownHosts: KnownHosts,
  plan: Pick<ReconcilePlan, "hostsToRemove" | "hostsToUpdate" | "entriesToWrite">,
): KnownHostEntry[] {
  const retained = Array.from(knownHosts.values()).filter(
    (e) =>
      !plan.hostsToRemove.has(e.hostname) &&
      !plan.hostsToUpdate.has(e.hostname),
  );
  const synthesized = plan.entriesToWrite
    .map(knownHostFromPreload)
    .sort(compareHostnames);
  return [...retained, ...synthesized];
}
