export { parseVocabulary, renderVocabularyItems } from "./vocabulary";
export type { VocabEntry } from "./vocabulary";

export {
  renderNewsletter,
  loadTemplate,
  formatNewsletterDate,
  PLACEHOLDERS,
} from "./renderer";
export type { NewsletterInput } from "./renderer";

export {
  writeNewsletterHtml,
  writeRunRecord,
  buildRunRecord,
  outputTimestamp,
} from "./writer";
export type { RunRecord } from "./writer";

export { createMailgunSender, createMailgunCheck, dispatchNewsletter } from "./sender";
export type {
  SendResult,
  SendNewsletterFn,
  DispatchReport,
  MailCheckResult,
  CheckMailFn,
} from "./sender";

export { runNewsletterCycle } from "./orchestrator";
export type { RunResult, RunStage, NewsletterDeps } from "./orchestrator";
