import { readFileSync } from "node:fs";
import { z } from "zod";

import type { GeoPoint } from "./types.js";
import type { EntityRole } from "./intent-types.js";

const vocabularySchema = z.object({
  categories: z.array(z.string().min(1)),
  sources: z.array(
    z.object({
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).min(1)
    })
  ),
  places: z.array(
    z.object({
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)).min(1),
      latitude: z.number().min(-90).max(90),
      longitude: z.number().min(-180).max(180)
    })
  ),
  cues: z.object({
    proximity: z.array(z.string().min(1)),
    trending: z.array(z.string().min(1)),
    topScore: z.array(z.string().min(1))
  }),
  stopWords: z.array(z.string())
});

export type Vocabulary = z.infer<typeof vocabularySchema>;

export type VocabularyMention = {
  /** Substring exactly as it appears in the text. */
  text: string;
  start: number;
  end: number;
  role: EntityRole;
  /** Vocabulary name the mention resolved to. */
  canonical: string;
  location: GeoPoint | null;
};

const DEFAULT_VOCABULARY_URL = new URL("./data/vocabulary.json", import.meta.url);

let defaultVocabulary: Vocabulary | null = null;

export function loadVocabulary(source: URL | string = DEFAULT_VOCABULARY_URL): Vocabulary {
  const raw: unknown = JSON.parse(readFileSync(source, "utf8"));
  return vocabularySchema.parse(raw);
}

export function getDefaultVocabulary(): Vocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = loadVocabulary();
  }
  return defaultVocabulary;
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function phrasePattern(phrase: string) {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, "giu");
}

type Candidate = Omit<VocabularyMention, "text" | "start" | "end"> & {
  alias: string;
};

function candidatesFor(vocabulary: Vocabulary): Candidate[] {
  const candidates: Candidate[] = [];
  for (const category of vocabulary.categories) {
    candidates.push({
      alias: category,
      role: "topic",
      canonical: category.toLowerCase(),
      location: null
    });
  }
  for (const source of vocabulary.sources) {
    for (const alias of source.aliases) {
      candidates.push({
        alias,
        role: "organization",
        canonical: source.name,
        location: null
      });
    }
  }
  for (const place of vocabulary.places) {
    for (const alias of place.aliases) {
      candidates.push({
        alias,
        role: "location",
        canonical: place.name,
        location: { latitude: place.latitude, longitude: place.longitude }
      });
    }
  }
  // Longest alias first so "new delhi" claims its span before "delhi".
  return candidates.sort((a, b) => b.alias.length - a.alias.length);
}

/**
 * Whole-word, case-insensitive vocabulary matches ordered by position.
 * Overlapping matches keep the longest alias.
 */
export function findMentions(
  text: string,
  vocabulary: Vocabulary = getDefaultVocabulary()
): VocabularyMention[] {
  const mentions: VocabularyMention[] = [];
  const claimed: Array<[number, number]> = [];

  for (const candidate of candidatesFor(vocabulary)) {
    for (const match of text.matchAll(phrasePattern(candidate.alias))) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (claimed.some(([from, to]) => start < to && end > from)) {
        continue;
      }
      claimed.push([start, end]);
      mentions.push({
        text: match[0],
        start,
        end,
        role: candidate.role,
        canonical: candidate.canonical,
        location: candidate.location
      });
    }
  }

  return mentions.sort((a, b) => a.start - b.start);
}

export function hasCue(text: string, cues: readonly string[]): boolean {
  return cues.some((cue) => phrasePattern(cue).test(text));
}

export function matchCategory(
  text: string,
  vocabulary: Vocabulary = getDefaultVocabulary()
): string | null {
  const normalized = text.trim().toLowerCase();
  for (const category of vocabulary.categories) {
    if (normalized === category.toLowerCase() || phrasePattern(category).test(text)) {
      return category.toLowerCase();
    }
  }
  return null;
}

export function matchSource(
  text: string,
  vocabulary: Vocabulary = getDefaultVocabulary()
): string | null {
  const mention = findMentions(text, vocabulary).find(
    (item) => item.role === "organization"
  );
  return mention?.canonical ?? null;
}

export function matchPlace(
  text: string,
  vocabulary: Vocabulary = getDefaultVocabulary()
): VocabularyMention | null {
  return (
    findMentions(text, vocabulary).find((item) => item.role === "location") ??
    null
  );
}

/**
 * Lower-cased search terms with stop words and single letters removed. When
 * nothing survives the whole trimmed text is used as one term.
 */
export function searchTerms(
  text: string,
  vocabulary: Vocabulary = getDefaultVocabulary()
): string[] {
  const stopWords = new Set(vocabulary.stopWords);
  const terms = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length > 1 && !stopWords.has(term));

  if (terms.length > 0) {
    return [...new Set(terms)];
  }

  const whole = text.trim().toLowerCase();
  return whole.length > 0 ? [whole] : [];
}
