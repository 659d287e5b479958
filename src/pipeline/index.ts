export { pollFeed, collectCandidates } from "./poller";
export { scoreCandidate, rankCandidates, selectCandidate } from "./scorer";
export { fetchArticle } from "./fetcher";
export { extractContent } from "./extractor";
export { extractArticle } from "./extract-articles";
export { buildPrompt, PROMPT_TEXT_LIMITS } from "./prompts";
export {
  generateSection,
  generateSections,
  advance,
  nextSection,
  trimArticle,
} from "./generator";
export { SECTION_KINDS } from "./types";
export type {
  Candidate,
  ScoredCandidate,
  PollResult,
  ArticleContent,
  SectionKind,
  SectionSet,
} from "./types";
export type { FetchResult } from "./fetcher";
export type { ExtractionOutcome } from "./extract-articles";
export type { GenerationState, GenerationOutcome } from "./generator";
