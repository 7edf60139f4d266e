import fs from "fs";
import path from "path";
import zlib from "zlib";
import Database from "better-sqlite3";
import { AttributionStore } from "../../../src/services/attribution/attribution-store";
import { AttributionDataset } from "../../../src/services/attribution/attribution-dataset";
import { buildBlob, decodeBlob } from "../../../src/services/attribution/indexed-blob-dataset";
import { sqliteBackend } from "../../../src/services/attribution/sqlite-dataset";
import { DatasetLoadError } from "../../../src/errors";
import { useTempDir } from "../../utils/temp-dir";

const ROWS = [
  { address: "3.5.140.2", org_id: "org-aws-1", platform: "aws" },
  { address: "34.120.0.9", org_id: "org-gcp-7", platform: "gcp" },
  { address: "20.50.1.1", org_id: "", platform: "azure" },
];

function writeBlob(file: string, rows: Record<string, unknown>[], gzip: boolean, field = "address") {
  const json = Buffer.from(JSON.stringify(buildBlob(rows, [field])));
  fs.writeFileSync(file, gzip ? zlib.gzipSync(json) : json);
}

function writeSqlite(file: string, columns: string[], rows: string[][], table = "attribution") {
  const db = new Database(file);
  db.exec(`CREATE TABLE ${table} (${columns.map((c) => `${c} TEXT`).join(", ")})`);
  const insert = db.prepare(
    `INSERT INTO ${table} VALUES (${columns.map(() => "?").join(", ")})`
  );
  for (const row of rows) insert.run(...row);
  db.close();
}

const staticDataset = (
  name: string,
  hits: Record<string, { orgId: string; platform: string }>
): AttributionDataset => ({
  name,
  encoding: "static",
  lookup: async (address) =>
    hits[address] ? { orgManaged: true, ...hits[address] } : null,
  close: jest.fn(async () => undefined),
});

describe("AttributionStore", () => {
  const tempDir = useTempDir();

  test("should report no data for a missing directory", async () => {
    const store = new AttributionStore();

    await expect(store.load(path.join(tempDir(), "nope"))).resolves.toBe(false);
    expect(store.hasData).toBe(false);
    await expect(store.lookup("3.5.140.2")).resolves.toBeNull();
  });

  test("should report no data for a directory without datasets", async () => {
    fs.writeFileSync(path.join(tempDir(), "README.txt"), "not a dataset");
    const store = new AttributionStore();

    await expect(store.load(tempDir())).resolves.toBe(false);
    expect(store.datasetNames).toEqual([]);
  });

  test("should give identical answers for gzip and plain blobs", async () => {
    const gzDir = path.join(tempDir(), "gz");
    const plainDir = path.join(tempDir(), "plain");
    fs.mkdirSync(gzDir);
    fs.mkdirSync(plainDir);
    writeBlob(path.join(gzDir, "cloud.json.gz"), ROWS, true);
    writeBlob(path.join(plainDir, "cloud.json"), ROWS, false);

    const gz = new AttributionStore();
    const plain = new AttributionStore();
    await gz.load(gzDir);
    await plain.load(plainDir);

    expect(gz.datasetNames).toEqual(["cloud"]);
    expect(plain.datasetNames).toEqual(["cloud"]);
    for (const address of ["3.5.140.2", "34.120.0.9", "20.50.1.1", "8.8.8.8"]) {
      expect(await gz.lookup(address)).toEqual(await plain.lookup(address));
    }
    expect(await gz.lookup("3.5.140.2")).toEqual({
      orgManaged: true,
      orgId: "org-aws-1",
      platform: "aws",
    });
  });

  test("should treat empty cells as absent values", async () => {
    writeBlob(path.join(tempDir(), "cloud.json"), ROWS, false);
    const store = new AttributionStore();
    await store.load(tempDir());

    expect(await store.lookup("20.50.1.1")).toEqual({
      orgManaged: true,
      orgId: null,
      platform: "azure",
    });
  });

  test("should read legacy ip and cfa_id columns", async () => {
    writeBlob(
      path.join(tempDir(), "legacy.bin"),
      [{ ip: "52.1.1.1", cfa_id: 4410, platform: "aws" }],
      true,
      "ip"
    );
    const store = new AttributionStore();
    await store.load(tempDir());

    expect(await store.lookup("52.1.1.1")).toEqual({
      orgManaged: true,
      orgId: "4410",
      platform: "aws",
    });
  });

  test("should use the earliest row when an address repeats", async () => {
    writeBlob(
      path.join(tempDir(), "dupes.json"),
      [
        { address: "3.5.140.2", org_id: "first", platform: "aws" },
        { address: "3.5.140.2", org_id: "second", platform: "aws" },
      ],
      false
    );
    const store = new AttributionStore();
    await store.load(tempDir());

    expect((await store.lookup("3.5.140.2"))?.orgId).toBe("first");
  });

  test("should let the first dataset in file-name order win", async () => {
    writeBlob(path.join(tempDir(), "b-second.json"), [{ address: "3.5.140.2", org_id: "from-b", platform: "b" }], false);
    writeBlob(path.join(tempDir(), "a-first.json"), [{ address: "3.5.140.2", org_id: "from-a", platform: "a" }], false);
    const store = new AttributionStore();
    await store.load(tempDir());

    expect(store.datasetNames).toEqual(["a-first", "b-second"]);
    expect((await store.lookup("3.5.140.2"))?.orgId).toBe("from-a");
  });

  test("should skip corrupt files and keep loading the rest", async () => {
    fs.writeFileSync(path.join(tempDir(), "broken.json.gz"), "{not json");
    fs.writeFileSync(path.join(tempDir(), "wrong-shape.json"), JSON.stringify({ rows: 3 }));
    writeBlob(path.join(tempDir(), "good.json"), ROWS, false);
    const store = new AttributionStore();

    await expect(store.load(tempDir())).resolves.toBe(true);
    expect(store.datasetNames).toEqual(["good"]);
    expect(store.hasData).toBe(true);
  });

  test("should read SQLite datasets", async () => {
    writeSqlite(
      path.join(tempDir(), "managed.sqlite3"),
      ["address", "org_id", "platform"],
      [
        ["3.5.140.2", "org-aws-1", "aws"],
        ["3.5.140.2", "org-aws-2", "aws"],
        ["20.50.1.1", "org-az", ""],
      ]
    );
    const store = new AttributionStore();
    await store.load(tempDir());

    expect(store.datasetNames).toEqual(["managed"]);
    expect(await store.lookup("3.5.140.2")).toEqual({
      orgManaged: true,
      orgId: "org-aws-1",
      platform: "aws",
    });
    expect(await store.lookup("20.50.1.1")).toEqual({
      orgManaged: true,
      orgId: "org-az",
      platform: null,
    });
    expect(await store.lookup("8.8.8.8")).toBeNull();
    await store.close();
  });

  test("should read SQLite datasets with legacy columns and no platform", async () => {
    writeSqlite(path.join(tempDir(), "old.db"), ["ip", "cfa_id"], [["52.1.1.1", "77"]], "hosts");
    const store = new AttributionStore();
    await store.load(tempDir());

    expect(await store.lookup("52.1.1.1")).toEqual({
      orgManaged: true,
      orgId: "77",
      platform: null,
    });
    await store.close();
  });

  test("should skip SQLite files without an attribution table", async () => {
    writeSqlite(path.join(tempDir(), "other.sqlite"), ["name"], [["x"]], "things");

    await expect(sqliteBackend.open(path.join(tempDir(), "other.sqlite"), "other")).rejects.toThrow(
      DatasetLoadError
    );
    await expect(new AttributionStore().load(tempDir())).resolves.toBe(false);
  });

  test("should consult added datasets after loaded ones and close them all", async () => {
    writeBlob(path.join(tempDir(), "files.json"), ROWS, false);
    const extra = staticDataset("extra", {
      "3.5.140.2": { orgId: "shadowed", platform: "x" },
      "9.9.9.9": { orgId: "org-quad", platform: "dns" },
    });
    const store = new AttributionStore();
    await store.load(tempDir());
    store.add(extra);

    expect((await store.lookup("3.5.140.2"))?.orgId).toBe("org-aws-1");
    expect((await store.lookup("9.9.9.9"))?.orgId).toBe("org-quad");

    await store.close();
    expect(extra.close).toHaveBeenCalledTimes(1);
    expect(store.hasData).toBe(false);
  });

  test("should keep asking later datasets when one lookup fails", async () => {
    const failing: AttributionDataset = {
      name: "aws",
      encoding: "redis",
      lookup: jest.fn(async () => {
        throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
      }),
      close: jest.fn(async () => undefined),
    };
    const gcp = staticDataset("gcp", {
      "34.120.0.9": { orgId: "org-gcp-7", platform: "gcp" },
    });
    const gcpLookup = jest.spyOn(gcp, "lookup");
    const store = new AttributionStore();
    store.add(failing);
    store.add(gcp);

    await expect(store.lookup("34.120.0.9")).resolves.toEqual({
      orgManaged: true,
      orgId: "org-gcp-7",
      platform: "gcp",
    });
    await expect(store.lookup("8.8.8.8")).resolves.toBeNull();
    expect(failing.lookup).toHaveBeenCalledTimes(2);
    expect(gcpLookup).toHaveBeenCalledTimes(2);
  });
});

describe("decodeBlob", () => {
  test("should store single positions as numbers and repeats as lists", () => {
    const blob = buildBlob([
      { address: "1.1.1.1" },
      { address: "2.2.2.2" },
      { address: "1.1.1.1" },
    ]);

    expect(blob.indexes).toEqual({ address: { "1.1.1.1": [0, 2], "2.2.2.2": 1 } });
    expect(decodeBlob(zlib.gzipSync(JSON.stringify(blob)))).toEqual(blob);
  });

  test("should reject a blob without indexes", () => {
    expect(() => decodeBlob(Buffer.from(JSON.stringify({ rows: [] })))).toThrow();
  });
});
