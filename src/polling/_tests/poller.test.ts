import { describe, it, expect, vi, afterEach } from "vitest";
import { StatusPoller, type PollTarget } from "../poller";
import { DeviceError, DeviceUnreachableError, type DeviceFailure } from "../../errors";
import { err, ok, type DeviceState, type Result } from "../../types";
import { flush } from "../../test-utils/fakeMatrix";

type Outcome = Result<DeviceState, DeviceFailure> | null;

const STATE: DeviceState = { power: true, sources: new Map(), updatedAt: 1 };
const OK_STATE: Outcome = ok(STATE);
const UNREACHABLE: Outcome = err(new DeviceUnreachableError("10.0.0.9", "pas de réponse après 3000ms"));
const GARBLED: Outcome = err(new DeviceError("get status illisible"));

function target(outcomes: Outcome[]) {
  const refreshIfIdle = vi.fn(async (): Promise<Outcome> => (outcomes.length > 0 ? (outcomes.shift() ?? null) : OK_STATE));
  const t: PollTarget = { refreshIfIdle };
  return { t, refreshIfIdle };
}

describe("polling/StatusPoller.tick", () => {
  it("marks the matrix unavailable after N consecutive failures and available on the next success", async () => {
    const { t } = target([UNREACHABLE, GARBLED, UNREACHABLE, OK_STATE]);
    const poller = new StatusPoller(t, { unavailableAfter: 3 });
    const changes: boolean[] = [];
    poller.onAvailabilityChange((a) => changes.push(a));
    expect(await poller.tick()).toBe("unreachable");
    expect(await poller.tick()).toBe("error");
    expect(poller.isAvailable).toBe(true);
    expect(await poller.tick()).toBe("unreachable");
    expect(poller.isAvailable).toBe(false);
    expect(await poller.tick()).toBe("ok");
    expect(poller.isAvailable).toBe(true);
    expect(poller.consecutiveFailures).toBe(0);
    expect(changes).toEqual([false, true]);
  });

  it("a command acknowledgement restores availability without waiting for a tick", async () => {
    const acks = new Set<() => void>();
    const t: PollTarget = {
      refreshIfIdle: async () => UNREACHABLE,
      onCommandAck: (listener) => {
        acks.add(listener);
        return () => {
          acks.delete(listener);
        };
      },
    };
    const poller = new StatusPoller(t, { intervalMs: 1000, maxBackoffMs: 8000, unavailableAfter: 2 });
    const changes: boolean[] = [];
    poller.onAvailabilityChange((a) => changes.push(a));
    await poller.tick();
    await poller.tick();
    expect(poller.isAvailable).toBe(false);
    expect(poller.nextDelayMs).toBe(4000);
    for (const listener of acks) listener();
    expect(poller.isAvailable).toBe(true);
    expect(poller.consecutiveFailures).toBe(0);
    expect(poller.nextDelayMs).toBe(1000);
    expect(changes).toEqual([false, true]);
  });

  it("a skipped tick counts neither as success nor as failure", async () => {
    const { t } = target([UNREACHABLE, null, UNREACHABLE]);
    const poller = new StatusPoller(t, { unavailableAfter: 3 });
    expect(await poller.tick()).toBe("unreachable");
    expect(await poller.tick()).toBe("skipped");
    expect(await poller.tick()).toBe("unreachable");
    expect(poller.consecutiveFailures).toBe(2);
    expect(poller.isAvailable).toBe(true);
  });

  it("backs off exponentially on unreachable only, capped at maxBackoffMs", async () => {
    const { t } = target([UNREACHABLE, UNREACHABLE, UNREACHABLE, GARBLED, UNREACHABLE, OK_STATE]);
    const poller = new StatusPoller(t, { intervalMs: 1000, maxBackoffMs: 5000 });
    const delays: number[] = [];
    for (let i = 0; i < 6; i++) {
      await poller.tick();
      delays.push(poller.nextDelayMs);
    }
    expect(delays).toEqual([2000, 4000, 5000, 1000, 2000, 1000]);
  });

  it("a throwing availability listener does not stop the others", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => { /* no-op */ });
    const { t } = target([UNREACHABLE]);
    const poller = new StatusPoller(t, { unavailableAfter: 1 });
    const seen = vi.fn();
    poller.onAvailabilityChange(() => {
      throw new Error("boom");
    });
    poller.onAvailabilityChange(seen);
    await poller.tick();
    expect(seen).toHaveBeenCalledWith(false);
    warn.mockRestore();
  });
});

describe("polling/StatusPoller scheduling", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  async function advance(ms: number): Promise<void> {
    await vi.advanceTimersByTimeAsync(ms);
    await flush();
  }

  it("ticks immediately, then every intervalMs until stopped", async () => {
    vi.useFakeTimers();
    const { t, refreshIfIdle } = target([]);
    const poller = new StatusPoller(t, { intervalMs: 1000 });
    poller.start();
    await advance(0);
    expect(refreshIfIdle).toHaveBeenCalledTimes(1);
    await advance(999);
    expect(refreshIfIdle).toHaveBeenCalledTimes(1);
    await advance(1);
    expect(refreshIfIdle).toHaveBeenCalledTimes(2);
    poller.stop();
    expect(poller.isRunning).toBe(false);
    await advance(10_000);
    expect(refreshIfIdle).toHaveBeenCalledTimes(2);
  });

  it("waits for the backoff delay after an unreachable tick", async () => {
    vi.useFakeTimers();
    const { t, refreshIfIdle } = target([UNREACHABLE]);
    const poller = new StatusPoller(t, { intervalMs: 1000, maxBackoffMs: 60_000 });
    poller.start();
    await advance(0);
    await advance(1999);
    expect(refreshIfIdle).toHaveBeenCalledTimes(1);
    await advance(1);
    expect(refreshIfIdle).toHaveBeenCalledTimes(2);
    poller.stop();
  });

  it("updateOptions changes the cadence from the next scheduling", async () => {
    vi.useFakeTimers();
    const { t, refreshIfIdle } = target([]);
    const poller = new StatusPoller(t, { intervalMs: 1000 });
    poller.updateOptions({ intervalMs: 300 });
    poller.start();
    await advance(0);
    await advance(300);
    expect(refreshIfIdle).toHaveBeenCalledTimes(2);
    poller.stop();
  });
});
