/**
 * ExpirySweeper Tests
 * @see packages/core/src/expiry-sweeper.ts
 */

import { describe, it, expect, jest, afterEach } from "@jest/globals";
import { createSilentLogger } from "@snaplink/logger";
import { ExpirySweeper, type ExpirySweepResult } from "../src/index.js";

const logger = createSilentLogger();

function fakeService(impl: (limit?: number) => Promise<ExpirySweepResult>) {
  return { expireStale: jest.fn(impl) };
}

describe("ExpirySweeper", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("should pass the batch size to the service", async () => {
    const service = fakeService(async () => ({ expired: ["abc123"], failed: [] }));
    const sweeper = new ExpirySweeper({ service, logger, batchSize: 25 });

    expect(await sweeper.sweep()).toEqual({ expired: ["abc123"], failed: [] });
    expect(service.expireStale).toHaveBeenCalledWith(25);
  });

  it("should skip a sweep while one is running", async () => {
    let finish: () => void = () => undefined;
    const service = fakeService(
      () =>
        new Promise<ExpirySweepResult>((resolve) => {
          finish = () => resolve({ expired: [], failed: [] });
        })
    );
    const sweeper = new ExpirySweeper({ service, logger });

    const first = sweeper.sweep();
    expect(await sweeper.sweep()).toBeNull();

    finish();
    expect(await first).toEqual({ expired: [], failed: [] });
    expect(service.expireStale).toHaveBeenCalledTimes(1);
  });

  it("should log and swallow a failed sweep", async () => {
    const service = fakeService(async () => {
      throw new Error("connection refused");
    });
    const sweeper = new ExpirySweeper({ service, logger });

    expect(await sweeper.sweep()).toBeNull();
    expect(await sweeper.sweep()).toBeNull();
    expect(service.expireStale).toHaveBeenCalledTimes(2);
  });

  it("should sweep on every interval until stopped", async () => {
    jest.useFakeTimers();
    const service = fakeService(async () => ({ expired: [], failed: [] }));
    const sweeper = new ExpirySweeper({ service, logger, intervalMs: 1000 });

    sweeper.start();
    await jest.advanceTimersByTimeAsync(3000);
    await sweeper.stop();
    await jest.advanceTimersByTimeAsync(3000);

    expect(service.expireStale).toHaveBeenCalledTimes(3);
  });
});
