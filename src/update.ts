// src/update.ts
//
// The update command: fetch the preload list, read the known-hosts
// database, plan the reconciliation and rewrite the database if anything
// changed.
import { tmpdir } from "node:os";
import { Command, InvalidArgumentError, Option } from "commander";
import {
  CLI_NAME,
  ENV_LOG_LEVEL,
  ENV_TIMEOUT_MS,
  ENV_TMPDIR,
  SOURCE_TIMEOUT_MS,
} from "./constants.js";
import { readVersion } from "./cli-util.js";
import {
  writeKnownHostsDatabase,
  type RenameFn,
} from "./database-writer.js";
import { readKnownHosts } from "./known-hosts.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  NullLogger,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { readPreloadList } from "./preload-list.js";
import { buildKnownHostRows, planReconciliation } from "./reconcile.js";
import type { KnownHosts, PreloadList } from "./records.js";
import {
  acquireSource,
  releaseSource,
  type AcquireOptions,
} from "./source.js";
import { formatReportTable } from "./summary.js";

export type UpdateOptions = {
  destination: string;
  source: string;
  tempDir?: string;
  timeoutMs?: number;
  dryRun?: boolean;
  logger?: Logger;
  rename?: RenameFn;
};

export type ReconcileReport = {
  source: string;
  destination: string;
  fetchedBytes?: number;
  preloadEntries: number;
  knownHosts: number;
  preloaded: number;
  removed: number;
  updated: number;
  inserted: number;
  written: boolean;
  backupPath?: string;
};

function countText(n: number): string | number {
  return n === 0 ? "none" : n;
}

async function loadPreloadList(
  locator: string,
  opts: AcquireOptions & { logger: Logger },
): Promise<{ entries: PreloadList; fetchedBytes?: number }> {
  const { logger } = opts;
  const source = await acquireSource(locator, opts);
  if (source.temp) {
    logger.info("downloaded source", {
      url: locator,
      kB: Math.floor((source.bytes ?? 0) / 1024),
    });
  }
  try {
    const entries = await readPreloadList(source.path);
    logger.info("parsed source file", {
      path: source.temp ? locator : source.path,
      entries: entries.size,
    });
    return { entries, fetchedBytes: source.bytes };
  } finally {
    await releaseSource(source);
  }
}

export async function updateKnownHosts(
  opts: UpdateOptions,
): Promise<ReconcileReport> {
  const { destination, source, tempDir, timeoutMs, dryRun = false } = opts;
  const logger = opts.logger ?? new NullLogger();

  const { entries: preload, fetchedBytes } = await loadPreloadList(source, {
    tempDir,
    timeoutMs,
    logger: logger.child("source"),
  });

  const existing = await readKnownHosts(destination);
  const knownHosts: KnownHosts = existing ?? new Map();
  if (existing) {
    logger.info("parsed destination file", {
      path: destination,
      entries: existing.size,
    });
  } else {
    logger.info("destination file does not exist yet", { path: destination });
  }

  const plan = planReconciliation(preload, knownHosts);
  if (existing) {
    logger.info("computed entries to delete", {
      count: countText(plan.hostsToRemove.size),
    });
    logger.info("computed entries to update", {
      count: countText(plan.hostsToUpdate.size),
    });
  }
  logger.info("computed entries to insert", {
    count: countText(plan.entriesToInsert.length),
  });

  const report: ReconcileReport = {
    source,
    destination,
    fetchedBytes,
    preloadEntries: preload.size,
    knownHosts: knownHosts.size,
    preloaded: plan.preloaded.size,
    removed: plan.hostsToRemove.size,
    updated: plan.hostsToUpdate.size,
    inserted: plan.entriesToInsert.length,
    written: false,
  };

  if (!plan.needsWrite) {
    logger.info("database is up to date", { path: destination });
    return report;
  }
  if (dryRun) {
    logger.info("dry run, not writing", { path: destination });
    return report;
  }

  const rows = buildKnownHostRows(knownHosts, plan);
  const { backupPath } = await writeKnownHostsDatabase(destination, rows, {
    tempDir,
    logger: logger.child("writer"),
    rename: opts.rename,
  });
  return { ...report, written: true, backupPath };
}

type UpdateCommandOptions = {
  logLevel: string;
  tempDir?: string;
  timeout: number;
  dryRun: boolean;
  json: boolean;
};

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isSafeInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError("expected a positive number of milliseconds");
  }
  return ms;
}

export type ProgramIO = {
  stdout?: (text: string) => void;
  logger?: Logger;
};

export function configureUpdateCommand(
  command: Command,
  io: ProgramIO = {},
): Command {
  const stdout = io.stdout ?? ((text: string) => process.stdout.write(text));
  return command
    .description(
      "Update a Wget HSTS known-hosts database from the Chromium HSTS preload list",
    )
    .argument("<destination>", "known-hosts database to update (e.g. ~/.wget-hsts)")
    .argument("<source>", "path or http(s) URL of transport_security_state_static.json")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .addOption(
      new Option("--log-level <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .env(ENV_LOG_LEVEL)
        .default("info"),
    )
    .addOption(
      new Option(
        "--temp-dir <dir>",
        "directory for the downloaded list and the scratch database",
      ).env(ENV_TMPDIR),
    )
    .addOption(
      new Option("--timeout <ms>", "give up on a stalled download after this long")
        .argParser(parseTimeout)
        .env(ENV_TIMEOUT_MS)
        .default(SOURCE_TIMEOUT_MS),
    )
    .option("-n, --dry-run", "compute changes without writing", false)
    .option("--json", "print the report as JSON", false)
    .action(
      async (
        destination: string,
        source: string,
        opts: UpdateCommandOptions,
      ) => {
        const logger =
          io.logger ?? new ConsoleLogger(parseLogLevel(opts.logLevel));
        const report = await updateKnownHosts({
          destination,
          source,
          tempDir: opts.tempDir ?? tmpdir(),
          timeoutMs: opts.timeout,
          dryRun: opts.dryRun,
          logger,
        });
        stdout(
          opts.json
            ? `${JSON.stringify(report, null, 2)}\n`
            : `${formatReportTable(report)}\n`,
        );
      },
    );
}

export function buildProgram(io: ProgramIO = {}): Command {
  return configureUpdateCommand(
    new Command().name(CLI_NAME).version(readVersion()),
    io,
  );
}
