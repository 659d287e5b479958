// pattern: functional-core
import type { Logger } from "pino";
import type { ScoringConfig } from "../config";
import { codePointLength } from "./text";
import type { Candidate, ScoredCandidate } from "./types";

const POSITIVE_BONUS = 3;
const NEGATIVE_PENALTY = 5;
const SHORT_TITLE_BONUS = 1;
const CALM_TITLE_BONUS = 2;

function containsAny(text: string, keywords: ReadonlyArray<string>): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

/**
 * Scores a candidate from its title and its source's prior.
 *
 * Keyword bonuses and penalties apply at most once each, however many
 * keywords of the list the title contains.
 */
export function scoreCandidate(
  candidate: Candidate,
  scoring: ScoringConfig,
): number {
  const title = candidate.title.toLowerCase();
  let score = candidate.baseScore;

  if (containsAny(title, scoring.positiveKeywords)) {
    score += POSITIVE_BONUS;
  }

  if (containsAny(title, scoring.negativeKeywords)) {
    score -= NEGATIVE_PENALTY;
  }

  if (codePointLength(candidate.title) < scoring.shortTitleLength) {
    score += SHORT_TITLE_BONUS;
  }

  if (!containsAny(title, scoring.breakingKeywords)) {
    score += CALM_TITLE_BONUS;
  }

  return score;
}

/**
 * Scores every candidate and returns those at or above the threshold,
 * best first. Equal scores keep their collection order.
 */
export function rankCandidates(
  candidates: ReadonlyArray<Candidate>,
  scoring: ScoringConfig,
): Array<ScoredCandidate> {
  return candidates
    .map((candidate) => ({
      candidate,
      score: scoreCandidate(candidate, scoring),
    }))
    .filter((scored) => scored.score >= scoring.threshold)
    .sort((a, b) => b.score - a.score);
}

/**
 * Picks the best eligible candidate, or null when none reaches the threshold.
 */
export function selectCandidate(
  candidates: ReadonlyArray<Candidate>,
  scoring: ScoringConfig,
  logger: Logger,
): ScoredCandidate | null {
  const ranked = rankCandidates(candidates, scoring);
  const best = ranked[0];

  if (!best) {
    logger.warn(
      { candidateCount: candidates.length, threshold: scoring.threshold },
      "no candidate reached the selection threshold",
    );
    return null;
  }

  logger.info(
    {
      top: ranked.slice(0, 5).map((scored) => ({
        score: scored.score,
        title: scored.candidate.title,
        source: scored.candidate.sourceName,
      })),
    },
    "top ranked candidates",
  );

  logger.info(
    { score: best.score, title: best.candidate.title, url: best.candidate.url },
    "candidate selected",
  );
  return best;
}
