import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  decodePreloadList,
  readPreloadList,
  stripLineComments,
} from "../preload-list.js";
import { DecodeError, DuplicateKeyError } from "../errors.js";

const CHROMIUM_STYLE = `// Copyright notice
// spanning several lines.
{
  // The pinsets are ignored.
  "pinsets": [
    { "name": "test", "static_spki_hashes": ["TestSPKI"] }
  ],
  "entries": [
    // Entries with comments in between.
    { "name": "pinned.example", "policy": "test", "include_subdomains_for_pinning": true, "pins": "test" },
    { "name": "hsts.example", "policy": "custom", "mode": "force-https", "include_subdomains": true },
    { "name": "UPPER.example", "policy": "custom", "mode": "FORCE-HTTPS" }
  ]
}
`;

describe("preload list decoder", () => {
  it("reads Chromium style JSON with line comments", () => {
    const list = decodePreloadList(CHROMIUM_STYLE);
    expect(Array.from(list.keys())).toEqual([
      "pinned.example",
      "hsts.example",
      "UPPER.example",
    ]);
    expect(list.get("pinned.example")).toEqual({
      name: "pinned.example",
      mode: undefined,
      includeSubdomains: false,
      includeSubdomainsForPinning: true,
    });
    expect(list.get("hsts.example")).toEqual({
      name: "hsts.example",
      mode: "force-https",
      includeSubdomains: true,
      includeSubdomainsForPinning: false,
    });
  });

  it("only removes whole comment lines", () => {
    expect(stripLineComments('  // x\n{"url": "https://a//b"}')).toBe(
      '\n{"url": "https://a//b"}',
    );
  });

  it("fails on malformed JSON", () => {
    expect(() => decodePreloadList('{"entries": [')).toThrow(DecodeError);
  });

  it("fails when an entry has no name", () => {
    expect(() =>
      decodePreloadList('{"entries": [{"mode": "force-https"}]}'),
    ).toThrow("invalid preload list: entries.0.name");
  });

  it("fails when entries are missing", () => {
    expect(() => decodePreloadList('{"pinsets": []}')).toThrow(
      "invalid preload list: entries",
    );
  });

  it("fails when a flag is not a boolean", () => {
    expect(() =>
      decodePreloadList(
        '{"entries": [{"name": "a.example", "include_subdomains": "yes"}]}',
      ),
    ).toThrow("invalid preload list: entries.0.include_subdomains");
  });

  it("rejects duplicate names", () => {
    const text = JSON.stringify({
      entries: [
        { name: "twice.example", mode: "force-https" },
        { name: "twice.example", mode: "force-https" },
      ],
    });
    expect(() => decodePreloadList(text)).toThrow(DuplicateKeyError);
  });

  it("reads the list from a file", async () => {
    const tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "hsts-preload-test-"));
    try {
      const file = path.join(tmp, "list.json");
      await fsp.writeFile(file, CHROMIUM_STYLE);
      const list = await readPreloadList(file);
      expect(list.size).toBe(3);
    } finally {
      await fsp.rm(tmp, { recursive: true, force: true });
    }
  });
});
