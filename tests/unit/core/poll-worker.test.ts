import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PollWorker } from "../../../src/core/poll-worker.js";
import { getCurrentCycle, type CycleContext } from "../../../src/core/correlation.js";
import { MalformedResponseError, TransportError } from "../../../src/core/errors.js";
import {
  createMockLogger,
  createMockSettings,
  createMockSource,
  createRecordingTarget,
  flushPromises,
} from "../../helpers/mocks.js";
import { createTestBatch } from "../../helpers/fixtures.js";
import type { EmailRecord } from "../../../src/mail/types.js";

const START_MS = 1_700_000_000_000;

function setup(batches: EmailRecord[][] = [], epoch = 0) {
  let now = START_MS;
  const clock = {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
  const source = createMockSource(batches);
  const target = createRecordingTarget(epoch);
  const settings = createMockSettings();
  const logger = createMockLogger();
  const worker = new PollWorker({
    source,
    target,
    settings,
    logger,
    intervalSeconds: 300,
    tickMs: 1000,
    now: clock.now,
  });
  return { clock, source, target, settings, logger, worker };
}

describe("PollWorker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("polls immediately on start and posts the result with the epoch it started at", async () => {
    const batch = createTestBatch(2);
    const { worker, target } = setup([batch], 4);

    worker.start();
    expect(worker.running).toBe(true);
    await worker.pending;

    expect(target.messages).toEqual([{ type: "poll-ok", records: batch, startedEpoch: 4 }]);
    worker.stop();
  });

  it("waits for the interval before polling again", async () => {
    const { worker, source, clock } = setup();

    worker.start();
    await worker.pending;
    expect(source.pollMock).toHaveBeenCalledTimes(1);

    clock.advance(299_000);
    vi.advanceTimersByTime(1000);
    expect(source.pollMock).toHaveBeenCalledTimes(1);

    clock.advance(1000);
    vi.advanceTimersByTime(1000);
    expect(source.pollMock).toHaveBeenCalledTimes(2);

    await worker.pending;
    worker.stop();
  });

  it("polls on the next tick after checkNow", async () => {
    const { worker, source } = setup();

    worker.start();
    await worker.pending;

    worker.checkNow();
    expect(worker.isDue()).toBe(true);
    vi.advanceTimersByTime(1000);
    expect(source.pollMock).toHaveBeenCalledTimes(2);

    await worker.pending;
    worker.stop();
  });

  it("never runs two polls at once", async () => {
    const { worker, source } = setup();
    let release: (records: EmailRecord[]) => void = () => {};
    source.pollMock.mockImplementationOnce(
      () => new Promise<EmailRecord[]>((resolve) => (release = resolve))
    );

    worker.start();
    worker.checkNow();
    vi.advanceTimersByTime(3000);
    expect(source.pollMock).toHaveBeenCalledTimes(1);

    release([]);
    await worker.pending;
    vi.advanceTimersByTime(1000);
    expect(source.pollMock).toHaveBeenCalledTimes(2);

    await worker.pending;
    worker.stop();
  });

  it("stops ticking", async () => {
    const { worker, source } = setup();

    worker.start();
    await worker.pending;
    worker.stop();
    worker.checkNow();
    vi.advanceTimersByTime(5000);

    expect(worker.running).toBe(false);
    expect(source.pollMock).toHaveBeenCalledTimes(1);
  });

  it("posts transport failures as poll errors", async () => {
    const { worker, source, target } = setup();
    source.pollMock.mockRejectedValueOnce(new Error("connect ETIMEDOUT"));

    await worker.pollOnce();

    const message = target.messages[0];
    expect(message?.type).toBe("poll-error");
    if (message?.type !== "poll-error") return;
    expect(message.error).toBeInstanceOf(TransportError);
    expect(message.error.message).toBe("Error checking emails: connect ETIMEDOUT");
  });

  it("drops malformed responses without touching the orchestrator", async () => {
    const { worker, source, target, logger } = setup();
    source.pollMock.mockRejectedValueOnce(new MalformedResponseError("no result set"));

    await worker.pollOnce();

    expect(target.messages).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ error: expect.any(MalformedResponseError) }),
      "Unexpected server response, poll skipped"
    );
  });

  it("persists the time the poll started, in whole seconds", async () => {
    const { worker, settings, clock } = setup();
    clock.advance(1500);

    await worker.pollOnce();

    expect(settings.persistLastCheckTime).toHaveBeenCalledWith(1_700_000_001);
  });

  it("logs a failed persist instead of rejecting", async () => {
    const { worker, settings, logger } = setup();
    settings.persistLastCheckTime.mockRejectedValueOnce(new Error("EACCES"));

    await worker.pollOnce();
    await flushPromises();

    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ error: expect.any(Error) }),
      "Could not persist last check time"
    );
  });

  it("runs each poll inside its own cycle context", async () => {
    const { worker, source } = setup();
    const seen: Array<CycleContext | undefined> = [];
    source.pollMock.mockImplementation(async () => {
      seen.push(getCurrentCycle());
      return [];
    });

    await worker.pollOnce();
    await worker.pollOnce();

    expect(seen[0]?.forced).toBe(true);
    expect(seen[1]?.forced).toBe(false);
    expect(seen[0]?.cycleId).not.toBe(seen[1]?.cycleId);
    expect(getCurrentCycle()).toBeUndefined();
  });
});
