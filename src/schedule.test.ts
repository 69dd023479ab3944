import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "./errors.js";
import { createTick, exitCodeFor, startSchedule } from "./schedule.js";
import type { RunSummary } from "./types.js";

const summary = (stateSaved: boolean): RunSummary => ({ totalNotifications: 2, outcomes: [], stateSaved });

describe("exitCodeFor", () => {
  it("exits 1 only when the state was not saved", () => {
    expect(exitCodeFor(summary(true))).toBe(0);
    expect(exitCodeFor(summary(false))).toBe(1);
  });
});

describe("createTick", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("skips a tick that fires while a run is in progress", async () => {
    let finish: (value: RunSummary) => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<RunSummary>((resolve) => {
          finish = resolve;
        })
    );
    const tick = createTick(run);

    const first = tick();
    await tick();

    expect(run).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith("[BOT] Previous run still in progress, skipping this tick");

    finish(summary(true));
    await first;
    await tick();

    expect(run).toHaveBeenCalledTimes(2);
  });

  it("keeps ticking after a run throws", async () => {
    const run = vi.fn(async (): Promise<RunSummary> => {
      throw new Error("disk full");
    });
    const tick = createTick(run);

    await tick();
    await tick();

    expect(run).toHaveBeenCalledTimes(2);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith("[BOT] Run error:", "disk full");
  });
});

describe("startSchedule", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("registers the tick and runs once right away", async () => {
    const run = vi.fn(async () => summary(true));
    const scheduler = vi.fn((_expression: string, _task: () => Promise<void>) => {});

    await startSchedule("*/15 * * * *", run, scheduler);

    expect(scheduler).toHaveBeenCalledTimes(1);
    expect(scheduler.mock.calls[0][0]).toBe("*/15 * * * *");
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("rejects an invalid expression before scheduling", () => {
    const run = vi.fn(async () => summary(true));
    const scheduler = vi.fn((_expression: string, _task: () => Promise<void>) => {});

    expect(() => startSchedule("every minute", run, scheduler)).toThrow(ConfigurationError);
    expect(scheduler).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
  });
});
