import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LanguageModel } from "ai";

vi.mock("../pipeline/poller", () => ({
  collectCandidates: vi.fn(),
}));
vi.mock("../pipeline/extract-articles", () => ({
  extractArticle: vi.fn(),
}));
vi.mock("../pipeline/generator", () => ({
  generateSections: vi.fn(),
}));

import { collectCandidates } from "../pipeline/poller";
import { extractArticle } from "../pipeline/extract-articles";
import { generateSections } from "../pipeline/generator";
import { runNewsletterCycle } from "./orchestrator";
import type { SendResult } from "./sender";
import {
  createCandidate,
  createMockLogger,
  createSectionSet,
  createTestConfig,
} from "../test-utils/fixtures";

const model = {} as LanguageModel;
const now = () => new Date(2026, 9, 18, 7, 0, 0);

const kultur = createCandidate({
  title: "Kultur in Berlin",
  url: "https://a.example.com/kultur",
  baseScore: 2,
  sourceName: "Source A",
});
const angriff = createCandidate({
  title: "Angriff in der Stadt",
  url: "https://b.example.com/angriff",
  baseScore: 1,
  sourceName: "Source B",
});

describe("runNewsletterCycle", () => {
  let tmpDir: string;
  let templatePath: string;
  let outputDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    tmpDir = join(tmpdir(), `tagesbrief-run-${Date.now()}`);
    mkdirSync(tmpDir, { recursive: true });
    templatePath = join(tmpDir, "template.html");
    outputDir = join(tmpDir, "output");
    writeFileSync(
      templatePath,
      "<h1>{{TITRE_ARTICLE}}</h1><p>{{RESUME_FRANCAIS}}</p><span>{{DATE}}</span><a>{{LIEN_ARTICLE}}</a>",
      "utf-8",
    );
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function config(overrides: Record<string, unknown> = {}) {
    return createTestConfig({
      template: { path: templatePath },
      output: { dir: outputDir, writeJson: true },
      dispatch: { recipients: ["leser@example.com"] },
      ...overrides,
    });
  }

  it("should select, extract, generate, render and write the newsletter", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([kultur, angriff]);
    vi.mocked(extractArticle).mockResolvedValue({
      success: true,
      content: { candidate: kultur, text: "Das Museum in Berlin zeigt eine neue Ausstellung." },
    });
    vi.mocked(generateSections).mockResolvedValue({
      success: true,
      sections: createSectionSet({ summary: "Un musée ouvre." }),
    });
    const send = vi.fn(async (): Promise<SendResult> => ({
      success: true,
      messageId: "msg-1",
    }));

    const appConfig = config();
    const result = await runNewsletterCycle({
      config: appConfig,
      model,
      logger: createMockLogger(),
      send,
      now,
    });

    const htmlPath = join(outputDir, "newsletter_20261018_070000.html");
    const jsonPath = join(outputDir, "newsletter_20261018_070000.json");
    expect(result).toEqual({
      success: true,
      htmlPath,
      jsonPath,
      dispatch: { sent: 1, failed: 0, errors: [] },
    });
    expect(readFileSync(htmlPath, "utf-8")).toBe(
      "<h1>Kultur in Berlin</h1><p>Un musée ouvre.</p><span>18/10/2026</span><a>https://a.example.com/kultur</a>",
    );
    expect(JSON.parse(readFileSync(jsonPath, "utf-8"))).toMatchObject({
      original_title: "Kultur in Berlin",
      source_url: "https://a.example.com/kultur",
      model_name: "ollama:phi3",
      status: "success",
    });
    expect(extractArticle).toHaveBeenCalledWith(kultur, appConfig.extraction, expect.anything());
    expect(generateSections).toHaveBeenCalledWith(
      model,
      "Das Museum in Berlin zeigt eine neue Ausstellung.",
      appConfig.generation,
      expect.anything(),
    );
    expect(send).toHaveBeenCalledOnce();
  });

  it("should fail at selection when no candidates were collected", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([]);

    const result = await runNewsletterCycle({
      config: config(),
      model,
      logger: createMockLogger(),
      now,
    });

    expect(result).toEqual({
      success: false,
      stage: "select",
      error: "no candidates collected from any source",
    });
    expect(extractArticle).not.toHaveBeenCalled();
  });

  it("should fail at selection when every candidate is below the threshold", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([angriff]);

    const result = await runNewsletterCycle({
      config: config(),
      model,
      logger: createMockLogger(),
      now,
    });

    expect(result).toEqual({ success: false, stage: "select", error: "no eligible candidate" });
  });

  it("should fail at extraction without generating", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([kultur]);
    vi.mocked(extractArticle).mockResolvedValue({
      success: false,
      error: "HTTP 403: Forbidden",
    });

    const result = await runNewsletterCycle({
      config: config(),
      model,
      logger: createMockLogger(),
      now,
    });

    expect(result).toEqual({ success: false, stage: "extract", error: "HTTP 403: Forbidden" });
    expect(generateSections).not.toHaveBeenCalled();
  });

  it("should write nothing when a section is missing", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([kultur]);
    vi.mocked(extractArticle).mockResolvedValue({
      success: true,
      content: { candidate: kultur, text: "Text." },
    });
    vi.mocked(generateSections).mockResolvedValue({
      success: false,
      failedSection: "grammar",
    });
    const send = vi.fn();

    const result = await runNewsletterCycle({
      config: config(),
      model,
      logger: createMockLogger(),
      send,
      now,
    });

    expect(result).toEqual({
      success: false,
      stage: "generate",
      error: "section grammar missing",
    });
    expect(existsSync(outputDir)).toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  it("should fail at rendering when the template is missing", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([kultur]);
    vi.mocked(extractArticle).mockResolvedValue({
      success: true,
      content: { candidate: kultur, text: "Text." },
    });
    vi.mocked(generateSections).mockResolvedValue({
      success: true,
      sections: createSectionSet(),
    });
    const missing = join(tmpDir, "missing.html");

    const result = await runNewsletterCycle({
      config: config({ template: { path: missing } }),
      model,
      logger: createMockLogger(),
      now,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.stage).toBe("render");
      expect(result.error).toContain(`failed to read template at ${missing}`);
    }
    expect(existsSync(outputDir)).toBe(false);
  });

  it("should skip the JSON record and dispatch when they are not configured", async () => {
    vi.mocked(collectCandidates).mockResolvedValue([kultur]);
    vi.mocked(extractArticle).mockResolvedValue({
      success: true,
      content: { candidate: kultur, text: "Text." },
    });
    vi.mocked(generateSections).mockResolvedValue({
      success: true,
      sections: createSectionSet(),
    });

    const result = await runNewsletterCycle({
      config: config({ output: { dir: outputDir, writeJson: false } }),
      model,
      logger: createMockLogger(),
      send: null,
      now,
    });

    expect(result).toEqual({
      success: true,
      htmlPath: join(outputDir, "newsletter_20261018_070000.html"),
      jsonPath: null,
      dispatch: null,
    });
    expect(readdirSync(outputDir)).toEqual(["newsletter_20261018_070000.html"]);
  });
});
