import { takeCodePoints } from "./text";
import type { SectionKind } from "./types";

/** Characters of the extracted article embedded in each prompt. */
export const PROMPT_TEXT_LIMITS: Readonly<Record<SectionKind, number>> = {
  article: 1200,
  vocabulary: 1000,
  grammar: 800,
  summary: 1000,
};

const articlePrompt = (text: string): string => `Simplifie ce texte allemand au niveau A2.

RÈGLES STRICTES:
- Exactement 10-12 phrases
- Chaque phrase: 6-10 mots maximum
- Présent uniquement
- Vocabulaire A2 basique
- PAS de noms propres compliqués

Texte: ${text}

Écris SEULEMENT le texte allemand simplifié (arrête après 12 phrases):`;

const vocabularyPrompt = (text: string): string => `Extrait 5 mots allemands UTILES de ce texte (pas de noms propres).

Texte: ${text}

Format EXACT (une ligne par mot):
1. [mot allemand] = [traduction française]
2. [mot allemand] = [traduction française]
3. [mot allemand] = [traduction française]
4. [mot allemand] = [traduction française]
5. [mot allemand] = [traduction française]

Choisis des VERBES, NOMS ou ADJECTIFS utiles.
Écris UNIQUEMENT les 5 lignes:`;

const grammarPrompt = (text: string): string => `Trouve UNE règle de grammaire allemande simple dans ce texte.

Texte: ${text}

Explique en français en 2-3 phrases courtes et claires.
Donne un exemple simple.
Écris UNIQUEMENT l'explication en français:`;

const summaryPrompt = (text: string): string => `Résume ce texte en français en 3 phrases courtes (40-60 mots total).

Texte: ${text}

Écris UNIQUEMENT le résumé français (3 phrases):`;

const PROMPT_BUILDERS: Readonly<Record<SectionKind, (text: string) => string>> = {
  article: articlePrompt,
  vocabulary: vocabularyPrompt,
  grammar: grammarPrompt,
  summary: summaryPrompt,
};

export function buildPrompt(kind: SectionKind, articleText: string): string {
  return PROMPT_BUILDERS[kind](takeCodePoints(articleText, PROMPT_TEXT_LIMITS[kind]));
}
