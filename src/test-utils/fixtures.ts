import { vi } from "vitest";
import type { Logger } from "pino";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import type { Candidate, SectionSet } from "../pipeline/types";

/**
 * Builds a fully defaulted configuration with two sources, the way
 * `loadConfig` would return it for a minimal YAML file.
 */
export function createTestConfig(overrides: Record<string, unknown> = {}): AppConfig {
  return appConfigSchema.parse({
    llm: { provider: "ollama", model: "phi3" },
    sources: [
      { name: "Source A", url: "https://a.example.com/rss", baseScore: 2 },
      { name: "Source B", url: "https://b.example.com/rss", baseScore: 1 },
    ],
    ...overrides,
  });
}

export function createCandidate(overrides: Partial<Candidate> = {}): Candidate {
  return {
    title: "Kultur in Berlin",
    url: "https://a.example.com/kultur",
    description: "",
    sourceName: "Source A",
    baseScore: 2,
    publishedAt: "",
    ...overrides,
  };
}

export function createSectionSet(overrides: Partial<SectionSet> = {}): SectionSet {
  return {
    article: "Das Museum ist neu.\nViele Leute kommen.",
    vocabulary: "1. Haus = maison\n2. gehen = aller",
    grammar: "Le verbe est en deuxième position.",
    summary: "Un nouveau musée ouvre à Berlin.",
    ...overrides,
  };
}

/**
 * Creates a mock Logger instance for testing.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    setLevel: vi.fn(),
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}
