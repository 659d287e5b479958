export type Candidate = {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly sourceName: string;
  readonly baseScore: number;
  /** Raw feed value, not guaranteed to parse as a date. */
  readonly publishedAt: string;
};

export type ScoredCandidate = {
  readonly candidate: Candidate;
  readonly score: number;
};

export type PollResult = {
  readonly feedName: string;
  readonly items: ReadonlyArray<Candidate>;
  readonly error: string | null;
};

export type ArticleContent = {
  readonly candidate: Candidate;
  readonly text: string;
};

export const SECTION_KINDS = ["article", "vocabulary", "grammar", "summary"] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export type SectionSet = {
  readonly article: string;
  readonly vocabulary: string;
  readonly grammar: string;
  readonly summary: string;
};
