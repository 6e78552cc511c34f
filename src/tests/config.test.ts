import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import {
  autoflushFor,
  cliOptsToMirrorConfig,
  resolveSyncFrom,
} from "../config";
import { NullLogger } from "../logger";

describe("cliOptsToMirrorConfig", () => {
  const base = { src: "/data", dst: "/backup" };

  test("defaults", () => {
    expect(cliOptsToMirrorConfig(base, {})).toEqual({
      src: "/data",
      dst: "/backup",
      apiUrl: "http://127.0.0.1:5001",
      flushIntervalMs: undefined,
      syncFrom: undefined,
      syncStamp: undefined,
      nocopy: false,
      ignoreRules: [],
      verbosity: 0,
      logLevel: "warn",
    });
  });

  test("the API address comes from the environment unless given", () => {
    const env = { MFS_MIRROR_API: "http://ipfs.internal:5001" };
    expect(cliOptsToMirrorConfig(base, env).apiUrl).toBe(
      "http://ipfs.internal:5001",
    );
    expect(
      cliOptsToMirrorConfig({ ...base, apiPort: "5002" }, env).apiUrl,
    ).toBe("http://127.0.0.1:5002");
    expect(
      cliOptsToMirrorConfig({ ...base, apiHost: "::1" }, env).apiUrl,
    ).toBe("http://[::1]:5001");
  });

  test("log level: flag, then environment, then warn", () => {
    const env = { MFS_MIRROR_LOG_LEVEL: "debug" };
    expect(cliOptsToMirrorConfig(base, env).logLevel).toBe("debug");
    expect(
      cliOptsToMirrorConfig({ ...base, logLevel: "ERROR" }, env).logLevel,
    ).toBe("error");
    expect(
      cliOptsToMirrorConfig({ ...base, logLevel: "loud" }, {}).logLevel,
    ).toBe("warn");
  });

  test("parses durations, timestamps and ignore rules", () => {
    const config = cliOptsToMirrorConfig(
      {
        ...base,
        flush: "30s",
        syncFrom: "@1700000000",
        syncStamp: " /var/lib/mirror/stamp ",
        ignore: [" *.tmp ", "*.tmp", "", "cache\\"],
        nocopy: true,
        verbose: 2,
      },
      {},
    );
    expect(config).toMatchObject({
      flushIntervalMs: 30_000,
      syncFrom: 1_700_000_000,
      syncStamp: "/var/lib/mirror/stamp",
      ignoreRules: ["*.tmp", "cache/"],
      nocopy: true,
      verbosity: 2,
    });
  });

  test("bad values throw", () => {
    expect(() => cliOptsToMirrorConfig({ ...base, flush: "soon" }, {})).toThrow(
      "could not parse duration 'soon'",
    );
    expect(() =>
      cliOptsToMirrorConfig({ ...base, syncFrom: "later" }, {}),
    ).toThrow("could not parse timestamp 'later'");
  });
});

describe("autoflushFor", () => {
  test("only a non-positive interval turns it on", () => {
    expect(autoflushFor(undefined)).toBe(false);
    expect(autoflushFor(0)).toBe(true);
    expect(autoflushFor(1_000)).toBe(false);
  });
});

describe("resolveSyncFrom", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "mfs-mirror-config-"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("explicit threshold, then stamp file, then none", async () => {
    const stamp = join(tmp, "stamp");
    await fsp.writeFile(stamp, "1600000000\n");
    const logger = new NullLogger();
    const config = cliOptsToMirrorConfig(
      { src: "/data", dst: "/backup", syncStamp: stamp },
      {},
    );

    await expect(resolveSyncFrom(config, logger)).resolves.toBe(1_600_000_000);
    await expect(
      resolveSyncFrom({ ...config, syncFrom: 5 }, logger),
    ).resolves.toBe(5);
    await expect(
      resolveSyncFrom({ ...config, syncStamp: undefined }, logger),
    ).resolves.toBeUndefined();
  });
});
