import { ChangeEvent } from "../../src/models/address-data";
import { UpdateInfo } from "../../src/models/notification-data";
import { NotificationDispatcher } from "../../src/services/notification-dispatcher";
import { MonitorError } from "../../src/utils/monitor-error";
import { FakeChannel } from "../fixtures/fake-channel";

const EVENT: ChangeEvent = {
  kind: "ipv4_changed",
  current: { ipv4: "2.2.2.2", ipv6: null },
  previous: { ipv4: "1.1.1.1", ipv6: null },
  geo: null,
};

const UPDATE: UpdateInfo = {
  currentVersion: "1.4.0",
  latestVersion: "1.4.1",
  releaseName: "v1.4.1",
  releaseUrl: "https://example.com/releases/v1.4.1",
  releaseBody: "- Fixes",
  publishedAt: null,
};

describe("NotificationDispatcher", () => {
  let delays: number[];
  let dispatcher: NotificationDispatcher;

  beforeEach(() => {
    delays = [];
    dispatcher = new NotificationDispatcher(
      { maxRetries: 3, baseDelayMs: 2000 },
      async (ms) => {
        delays.push(ms);
      }
    );
  });

  test("should retry a flaky channel until it delivers", async () => {
    const flaky = new FakeChannel("discord", [false, new Error("timeout"), true]);
    dispatcher.register(flaky);

    const results = await dispatcher.dispatch(EVENT, "home-server", "1.4.1");

    expect(results).toEqual({ discord: true });
    expect(flaky.calls).toBe(3);
    expect(delays).toEqual([2000, 4000]);
  });

  test("should report failure after exactly maxRetries attempts", async () => {
    const broken = new FakeChannel("telegram", [false]);
    dispatcher.register(broken);

    const results = await dispatcher.dispatch(EVENT, "home-server", "1.4.1");

    expect(results).toEqual({ telegram: false });
    expect(broken.calls).toBe(3);
    expect(delays).toEqual([2000, 4000]);
  });

  test("should attempt every channel independently", async () => {
    const a = new FakeChannel("A", [false]);
    const b = new FakeChannel("B", [true]);
    dispatcher.register(a);
    dispatcher.register(b);

    const results = await dispatcher.dispatch(EVENT, "home-server", "1.4.1");

    expect(results).toEqual({ A: false, B: true });
    expect(a.calls).toBe(3);
    expect(b.calls).toBe(1);
  });

  test("should keep going after a channel throws", async () => {
    const a = new FakeChannel("A", [new Error("ECONNRESET")]);
    const b = new FakeChannel("B", [true]);
    dispatcher.register(a);
    dispatcher.register(b);

    expect(await dispatcher.dispatch(EVENT, "home-server", "1.4.1")).toEqual({
      A: false,
      B: true,
    });
  });

  test("should pass the event and context through", async () => {
    const channel = new FakeChannel("discord");
    dispatcher.register(channel);

    await dispatcher.dispatch(EVENT, "home-server", "1.4.1");

    expect(channel.changes).toEqual([EVENT]);
    expect(channel.contexts).toEqual([
      { serverName: "home-server", version: "1.4.1" },
    ]);
  });

  test("should fan out update notifications under the same policy", async () => {
    const a = new FakeChannel("A", [false, true]);
    const b = new FakeChannel("B", [false]);
    dispatcher.register(a);
    dispatcher.register(b);

    const results = await dispatcher.dispatchUpdate(UPDATE, "home-server", "1.4.0");

    expect(results).toEqual({ A: true, B: false });
    expect(a.updates).toEqual([UPDATE, UPDATE]);
    expect(b.calls).toBe(3);
  });

  test("should send error notifications once, swallowing failures", async () => {
    const a = new FakeChannel("A", [new Error("down")]);
    const b = new FakeChannel("B", [false]);
    const c = new FakeChannel("C", [true]);
    dispatcher.register(a);
    dispatcher.register(b);
    dispatcher.register(c);

    await expect(
      dispatcher.dispatchError("No address", "home-server")
    ).resolves.toBeUndefined();

    expect([a.calls, b.calls, c.calls]).toEqual([1, 1, 1]);
    expect(c.errors).toEqual(["No address"]);
    expect(delays).toEqual([]);
  });

  test("should return an empty mapping with no channels", async () => {
    expect(await dispatcher.dispatch(EVENT, "home-server", "1.4.1")).toEqual({});
  });

  test("should reject a second channel with the same name", () => {
    dispatcher.register(new FakeChannel("discord"));

    expect(() => dispatcher.register(new FakeChannel("discord"))).toThrow(
      MonitorError
    );
    expect(() => dispatcher.register(new FakeChannel("discord"))).toThrow(
      'Channel "discord" is already registered'
    );
    expect(dispatcher.channelNames).toEqual(["discord"]);
  });
});
