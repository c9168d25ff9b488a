import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { gunzipSync } from "node:zlib";
import {
  backupDatabase,
  renderKnownHosts,
  replaceDatabase,
  writeKnownHostsDatabase,
  writeScratchDatabase,
} from "../database-writer.js";
import { PRELOAD_CREATED_SENTINEL } from "../constants.js";
import type { KnownHostEntry } from "../records.js";

const HEADER =
  "# HSTS 1.0 Known Hosts database for GNU Wget.\n" +
  "# Edit at your own risk.\n" +
  "# <hostname>\t<port>\t<incl. subdomains>\t<created>\t<max-age>\n";

const ROWS: KnownHostEntry[] = [
  {
    hostname: "user.example",
    port: 443,
    includeSubdomains: false,
    created: 1700000000,
    maxAge: 86400,
  },
  {
    hostname: "example.com",
    port: 0,
    includeSubdomains: true,
    created: PRELOAD_CREATED_SENTINEL,
    maxAge: 0,
  },
];

const RENDERED =
  HEADER +
  "user.example\t443\t0\t1700000000\t86400\n" +
  "example.com\t0\t1\t2147483647\t0\n";

function exdev(): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error("EXDEV: cross-device link not permitted");
  err.code = "EXDEV";
  return err;
}

describe("database writer", () => {
  let tmp: string;
  let scratchDir: string;
  let destination: string;

  beforeEach(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "hsts-writer-test-"));
    scratchDir = path.join(tmp, "scratch");
    await fsp.mkdir(scratchDir);
    destination = path.join(tmp, "wget-hsts");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  it("renders the header followed by one row per line", () => {
    expect(renderKnownHosts(ROWS)).toBe(RENDERED);
    expect(renderKnownHosts([])).toBe(HEADER);
  });

  it("writes the scratch file into the temp directory", async () => {
    const scratch = await writeScratchDatabase(ROWS, { tempDir: scratchDir });
    expect(path.dirname(scratch)).toBe(scratchDir);
    expect(await fsp.readFile(scratch, "utf8")).toBe(RENDERED);
  });

  it("creates a new database without a backup", async () => {
    const result = await writeKnownHostsDatabase(destination, ROWS, {
      tempDir: scratchDir,
    });
    expect(result.backupPath).toBeUndefined();
    expect(await fsp.readFile(destination, "utf8")).toBe(RENDERED);
    expect((await fsp.readdir(tmp)).sort()).toEqual(["scratch", "wget-hsts"]);
    expect(await fsp.readdir(scratchDir)).toEqual([]);
  });

  it("backs up the previous database before replacing it", async () => {
    await fsp.writeFile(destination, "previous content\n");
    const result = await writeKnownHostsDatabase(destination, ROWS, {
      tempDir: scratchDir,
    });
    expect(result.backupPath).toBe(`${destination}.bak.gz`);
    const backup = gunzipSync(await fsp.readFile(`${destination}.bak.gz`));
    expect(backup.toString("utf8")).toBe("previous content\n");
    expect(await fsp.readFile(destination, "utf8")).toBe(RENDERED);
  });

  it("tries numbered backup names until one is free", async () => {
    await fsp.writeFile(destination, "third\n");
    await fsp.writeFile(`${destination}.bak.gz`, "first");
    await fsp.writeFile(`${destination}.bak.1.gz`, "second");
    const backupPath = await backupDatabase(destination);
    expect(backupPath).toBe(`${destination}.bak.2.gz`);
    expect(await fsp.readFile(`${destination}.bak.gz`, "utf8")).toBe("first");
    expect(await fsp.readFile(`${destination}.bak.1.gz`, "utf8")).toBe("second");
    expect(gunzipSync(await fsp.readFile(backupPath)).toString("utf8")).toBe(
      "third\n",
    );
  });

  it("falls back to copying when rename crosses devices", async () => {
    const scratch = await writeScratchDatabase(ROWS, { tempDir: scratchDir });
    const how = await replaceDatabase(scratch, destination, {
      rename: async () => {
        throw exdev();
      },
    });
    expect(how).toBe("copy");
    expect(await fsp.readFile(destination, "utf8")).toBe(RENDERED);
    expect(await fsp.readdir(scratchDir)).toEqual([]);
  });

  it("does not fall back for other rename errors", async () => {
    await fsp.writeFile(destination, "untouched\n");
    const failure: NodeJS.ErrnoException = new Error("EACCES: permission denied");
    failure.code = "EACCES";
    await expect(
      writeKnownHostsDatabase(destination, ROWS, {
        tempDir: scratchDir,
        rename: async () => {
          throw failure;
        },
      }),
    ).rejects.toBe(failure);
    expect(await fsp.readFile(destination, "utf8")).toBe("untouched\n");
    expect(await fsp.readdir(scratchDir)).toEqual([]);
  });

  it("leaves the destination alone when the backup fails", async () => {
    // a directory cannot be read as a stream, so the gzip copy fails
    await fsp.mkdir(destination);
    await fsp.writeFile(path.join(destination, "inside"), "untouched\n");
    await expect(
      writeKnownHostsDatabase(destination, ROWS, { tempDir: scratchDir }),
    ).rejects.toMatchObject({ code: "EISDIR" });
    expect(await fsp.readdir(destination)).toEqual(["inside"]);
    expect(await fsp.readdir(scratchDir)).toEqual([]);
  });

  it("fails without leftovers when the temp directory is missing", async () => {
    await expect(
      writeKnownHostsDatabase(destination, ROWS, {
        tempDir: path.join(tmp, "missing"),
      }),
    ).rejects.toMatchObject({ code: "ENOENT" });
    await expect(fsp.stat(destination)).rejects.toMatchObject({ code: "ENOENT" });
  });
});
