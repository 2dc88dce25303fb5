// ============================================
// SENTENCE SPLITTING
// ============================================

export interface Sentence {
  text: string; // Trimmed sentence including its terminator
  offset: number; // Character offset of the trimmed text in the source
  isQuestion: boolean;
}

const SENTENCE_PATTERN = /[^.!?\n]+[.!?]*/g;

/**
 * Split text into sentences at `.`, `!`, `?` and line breaks.
 * A sentence is a question when it contains a question mark.
 */
export function splitSentences(text: string): Sentence[] {
  const sentences: Sentence[] = [];

  for (const match of text.matchAll(SENTENCE_PATTERN)) {
    const raw = match[0];
    const trimmed = raw.trim();
    if (trimmed.length === 0 || /^[.!?]+$/.test(trimmed)) continue;

    const leading = raw.length - raw.trimStart().length;
    sentences.push({
      text: trimmed,
      offset: (match.index ?? 0) + leading,
      isQuestion: trimmed.includes("?"),
    });
  }

  return sentences;
}

export interface ClaimCandidate {
  text: string; // Trimmed, without its terminator; questions end in "?"
  isQuestion: boolean;
}

/**
 * Split text at `.`, `!` and line breaks. A part containing `?` is split
 * again at every `?` and each fragment is a question, including the text
 * after the last question mark.
 */
export function splitClaimCandidates(text: string): ClaimCandidate[] {
  const candidates: ClaimCandidate[] = [];

  for (const part of text.split(/[.!\n]/)) {
    const trimmed = part.trim();
    if (trimmed.length === 0) continue;

    if (!trimmed.includes("?")) {
      candidates.push({ text: trimmed, isQuestion: false });
      continue;
    }

    for (const fragment of trimmed.split("?")) {
      const question = fragment.trim();
      if (question.length > 0) {
        candidates.push({ text: `${question}?`, isQuestion: true });
      }
    }
  }

  return candidates;
}

/**
 * Question candidates: every segment that is terminated by `?`, reduced to
 * its last sentence so leading statements do not decide the question type.
 */
export function splitQuestions(text: string): string[] {
  const segments = text.split("?");
  // The segment after the final "?" is not a question
  segments.pop();

  return segments
    .map((segment) => {
      const parts = segment.split(/[.!\n]/);
      return (parts[parts.length - 1] ?? "").trim();
    })
    .filter((question) => question.length > 0);
}
