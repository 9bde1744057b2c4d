const MIN_SENTENCE_LENGTH = 20;
const MAX_SENTENCES = 3;
const FALLBACK_LENGTH = 200;

/**
 * Extractive summary: up to three of the leading sentences of
 * `title. description` that carry more than twenty characters. When none
 * qualifies the description is returned, truncated to 200 characters.
 */
export function summarizeArticle(title: string, description: string): string {
  const sentences = `${title}. ${description}`
    .split(".")
    .slice(0, MAX_SENTENCES)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > MIN_SENTENCE_LENGTH);

  if (sentences.length > 0) {
    return `${sentences.join(". ")}.`;
  }

  const trimmed = description.trim();
  if (!trimmed) {
    return title.trim();
  }
  return trimmed.length > FALLBACK_LENGTH
    ? `${trimmed.slice(0, FALLBACK_LENGTH)}...`
    : trimmed;
}
