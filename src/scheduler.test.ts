import { describe, it, expect, beforeEach, vi } from "vitest";
import type { LanguageModel } from "ai";

vi.mock("node-cron", () => ({
  default: {
    schedule: vi.fn(),
  },
}));
vi.mock("./newsletter/orchestrator", () => ({
  runNewsletterCycle: vi.fn(),
}));

import cron from "node-cron";
import { runNewsletterCycle } from "./newsletter/orchestrator";
import { createNewsletterScheduler } from "./scheduler";
import { createMockLogger, createTestConfig } from "./test-utils/fixtures";

describe("createNewsletterScheduler", () => {
  let capturedCallback: (() => Promise<void>) | null;
  const mockTaskStop = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    capturedCallback = null;

    vi.mocked(cron.schedule).mockImplementation((_expression, callback) => {
      capturedCallback = async () => {
        await callback(new Date());
      };
      return { stop: mockTaskStop } as unknown as ReturnType<typeof cron.schedule>;
    });
  });

  function deps() {
    return {
      config: createTestConfig(),
      model: {} as LanguageModel,
      logger: createMockLogger(),
    };
  }

  it("should register a cron task with the given expression", () => {
    createNewsletterScheduler("0 7 * * *", deps());

    expect(cron.schedule).toHaveBeenCalledWith("0 7 * * *", expect.any(Function));
  });

  it("should run one newsletter cycle per tick", async () => {
    vi.mocked(runNewsletterCycle).mockResolvedValue({
      success: true,
      htmlPath: "output/newsletter_20261018_070000.html",
      jsonPath: null,
      dispatch: null,
    });
    const schedulerDeps = deps();

    createNewsletterScheduler("0 7 * * *", schedulerDeps);
    await capturedCallback?.();

    expect(runNewsletterCycle).toHaveBeenCalledWith(schedulerDeps);
  });

  it("should log a failed run as a warning", async () => {
    vi.mocked(runNewsletterCycle).mockResolvedValue({
      success: false,
      stage: "generate",
      error: "section vocabulary missing",
    });
    const schedulerDeps = deps();

    createNewsletterScheduler("0 7 * * *", schedulerDeps);
    await capturedCallback?.();

    expect(schedulerDeps.logger.warn).toHaveBeenCalledWith(
      { stage: "generate" },
      "scheduled newsletter run produced no newsletter",
    );
  });

  it("should catch an unexpected error instead of rejecting", async () => {
    vi.mocked(runNewsletterCycle).mockRejectedValue(new Error("disk full"));
    const schedulerDeps = deps();

    createNewsletterScheduler("0 7 * * *", schedulerDeps);

    await expect(capturedCallback?.()).resolves.toBeUndefined();
    expect(schedulerDeps.logger.error).toHaveBeenCalledWith(
      { error: "disk full" },
      "newsletter cycle failed unexpectedly",
    );
  });

  it("should stop the cron task", () => {
    const scheduler = createNewsletterScheduler("0 7 * * *", deps());

    scheduler.stop();

    expect(mockTaskStop).toHaveBeenCalledOnce();
  });
});
