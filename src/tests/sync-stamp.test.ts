import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { readSyncStamp, writeSyncStamp } from "../sync-stamp";
import { capture } from "./util";

describe("sync stamp file", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "mfs-mirror-stamp-"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("a missing file means a full sync", async () => {
    const c = capture();
    await expect(readSyncStamp(join(tmp, "none"), c.logger)).resolves.toBe(0);
    expect(c.logs.map((e) => [e.level, e.message])).toEqual([
      ["info", "no sync stamp yet, doing a full sync"],
    ]);
  });

  test("writes whole seconds and creates the directory", async () => {
    const file = join(tmp, "state", "nested", "stamp");
    await writeSyncStamp(file, 1_700_000_000.9);
    expect(await fsp.readFile(file, "utf8")).toBe("1700000000\n");
    expect(await fsp.readdir(join(tmp, "state", "nested"))).toEqual(["stamp"]);
    await expect(readSyncStamp(file, capture().logger)).resolves.toBe(
      1_700_000_000,
    );
  });

  test("accepts the @seconds form", async () => {
    const file = join(tmp, "at-form");
    await fsp.writeFile(file, "@1234\n");
    await expect(readSyncStamp(file, capture().logger)).resolves.toBe(1234);
  });

  test("garbage falls back to a full sync with a warning", async () => {
    const file = join(tmp, "garbage");
    await fsp.writeFile(file, "last tuesday\n");
    const c = capture();
    await expect(readSyncStamp(file, c.logger)).resolves.toBe(0);
    expect(c.logs.map((e) => [e.level, e.message])).toEqual([
      ["warn", "invalid sync stamp, doing a full sync"],
    ]);
  });

  test("an unreadable path falls back with a warning", async () => {
    const c = capture();
    await expect(readSyncStamp(tmp, c.logger)).resolves.toBe(0);
    expect(c.logs.map((e) => [e.level, e.message])).toEqual([
      ["warn", "cannot read sync stamp, doing a full sync"],
    ]);
  });
});
