import fs from "fs-extra";
import os from "os";
import path from "path";
import {
  FileStateStore,
  STATE_PARSERS,
  parseLegacyState,
  parseStoredState,
  parseStructuredState,
} from "../../src/services/state-store";

const FIXED_NOW = new Date("2024-03-04T09:05:00.000Z");

describe("FileStateStore", () => {
  let dir: string;
  let stateFile: string;
  let markFile: string;
  let store: FileStateStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "wan-sentinel-state-"));
    stateFile = path.join(dir, "nested", "ipinfo.db");
    markFile = path.join(dir, "nested", "last_update_notified.txt");
    store = new FileStateStore({
      stateFile,
      updateMarkFile: markFile,
      now: () => FIXED_NOW,
    });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  test("should report no prior state on first run", async () => {
    expect(await store.load()).toEqual({ ipv4: null, ipv6: null });
    expect(await store.loadState()).toBeNull();
  });

  test("should round-trip a saved pair", async () => {
    const pair = { ipv4: "203.0.113.5", ipv6: "2001:4860:4860::8888" };

    await store.save(pair);

    expect(await store.load()).toEqual(pair);
  });

  test("should write both fields and a timestamp, creating directories", async () => {
    await store.save({ ipv4: "203.0.113.5", ipv6: null });

    const written = await fs.readJson(stateFile);
    expect(written).toEqual({
      ipv4: "203.0.113.5",
      ipv6: null,
      last_updated: "2024-03-04T09:05:00.000Z",
    });
    expect(await store.loadState()).toEqual(written);
  });

  test("should overwrite the whole record rather than merge", async () => {
    await store.save({ ipv4: "203.0.113.5", ipv6: "2001:4860:4860::8888" });
    await store.save({ ipv4: "198.51.100.7", ipv6: null });

    expect(await store.load()).toEqual({ ipv4: "198.51.100.7", ipv6: null });
  });

  test("should leave no temporary files behind", async () => {
    await store.save({ ipv4: "203.0.113.5", ipv6: null });

    expect(await fs.readdir(path.dirname(stateFile))).toEqual(["ipinfo.db"]);
  });

  test("should migrate a legacy bare IPv4 file", async () => {
    await fs.outputFile(stateFile, "203.0.113.5");

    expect(await store.load()).toEqual({ ipv4: "203.0.113.5", ipv6: null });
  });

  test("should rewrite legacy state in the structured format", async () => {
    await fs.outputFile(stateFile, "203.0.113.5\n");

    const previous = await store.load();
    await store.save(previous);

    expect(await fs.readJson(stateFile)).toEqual({
      ipv4: "203.0.113.5",
      ipv6: null,
      last_updated: "2024-03-04T09:05:00.000Z",
    });
  });

  test.each(["", "{not json", "[1,2,3]", '{"ipv4": 42}', "hello"])(
    "should treat corrupt content %p as no prior state",
    async (content) => {
      await fs.outputFile(stateFile, content);

      expect(await store.load()).toEqual({ ipv4: null, ipv6: null });
    }
  );

  test("should surface write failures as E_STATE_WRITE", async () => {
    // A regular file where the state directory should be
    const blocker = path.join(dir, "blocker");
    await fs.outputFile(blocker, "x");
    const broken = new FileStateStore({
      stateFile: path.join(blocker, "ipinfo.db"),
      updateMarkFile: path.join(blocker, "mark.txt"),
    });

    await expect(
      broken.save({ ipv4: "203.0.113.5", ipv6: null })
    ).rejects.toMatchObject({ code: "E_STATE_WRITE" });
    await expect(broken.saveUpdateMark("1.4.1")).rejects.toMatchObject({
      code: "E_STATE_WRITE",
    });
  });

  test("should remove the temp file when the final move fails", async () => {
    const move = jest.spyOn(fs, "move").mockImplementationOnce(async () => {
      throw new Error("EXDEV: cross-device link not permitted");
    });

    try {
      await expect(
        store.save({ ipv4: "203.0.113.5", ipv6: null })
      ).rejects.toMatchObject({ code: "E_STATE_WRITE" });
      expect(await fs.readdir(path.dirname(stateFile))).toEqual([]);
    } finally {
      move.mockRestore();
    }
  });

  test("should store the update mark separately", async () => {
    expect(await store.loadUpdateMark()).toBeNull();

    await store.save({ ipv4: "203.0.113.5", ipv6: null });
    await store.saveUpdateMark("1.4.1");

    expect(await store.loadUpdateMark()).toBe("1.4.1");
    expect(await fs.readFile(markFile, "utf8")).toBe("1.4.1");
    expect(await store.load()).toEqual({ ipv4: "203.0.113.5", ipv6: null });
  });

  test("should clear both records", async () => {
    await store.save({ ipv4: "203.0.113.5", ipv6: null });
    await store.saveUpdateMark("1.4.1");

    await store.clear();

    expect(await fs.pathExists(stateFile)).toBe(false);
    expect(await fs.pathExists(markFile)).toBe(false);
    expect(await store.loadUpdateMark()).toBeNull();
  });
});

describe("state parsers", () => {
  test("should try the structured format before the legacy one", () => {
    expect(STATE_PARSERS).toEqual([parseStructuredState, parseLegacyState]);
  });

  test("should parse the structured format", () => {
    expect(
      parseStoredState(
        '{"ipv4":"203.0.113.5","ipv6":null,"last_updated":"2024-03-04T09:05:00.000Z"}'
      )
    ).toEqual({
      format: "structured",
      state: {
        ipv4: "203.0.113.5",
        ipv6: null,
        last_updated: "2024-03-04T09:05:00.000Z",
      },
    });
  });

  test("should fill in fields missing from older structured records", () => {
    expect(parseStructuredState('{"ipv4":"203.0.113.5"}')).toEqual({
      format: "structured",
      state: { ipv4: "203.0.113.5", ipv6: null, last_updated: "" },
    });
  });

  test("should accept a quoted legacy address", () => {
    expect(parseLegacyState('"203.0.113.5"')).toEqual({
      format: "legacy",
      state: { ipv4: "203.0.113.5", ipv6: null, last_updated: "" },
    });
  });

  test("should reject non-address legacy content", () => {
    expect(parseLegacyState("2001:db8::1")).toBeNull();
    expect(parseStoredState("   ")).toBeNull();
  });
});
