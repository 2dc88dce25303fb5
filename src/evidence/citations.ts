import type { Citation } from "./types.js";

const AUTHOR_YEAR_PATTERN = /([A-Z][a-zA-Z]+(?:\s+[A-Z][a-zA-Z]+)?(?:\s+et\s+al\.)?)\s*\((\d{4})\)/g;
// The lead is matched in any case; the journal name must stay capitalised
const JOURNAL_LEAD = /\bpublished\s+in\s+/gi;
const JOURNAL_NAME = /([A-Z][A-Za-z]*(?:\s+(?:(?:of|and|&|for|in)\s+)?[A-Z][A-Za-z]*)*)(?:\s+\((\d{4})\))?/y;

interface Span {
  start: number;
  end: number;
}

interface AuthorMatch extends Span {
  author: string;
  year: number;
}

interface JournalMatch extends Span {
  journal: string;
  year: number;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

function contextAround(text: string, span: Span, radius: number): string {
  return text.slice(Math.max(0, span.start - radius), Math.min(text.length, span.end + radius));
}

function findJournals(text: string): JournalMatch[] {
  const journals: JournalMatch[] = [];

  for (const lead of text.matchAll(JOURNAL_LEAD)) {
    const start = lead.index ?? 0;
    JOURNAL_NAME.lastIndex = start + lead[0].length;
    const name = JOURNAL_NAME.exec(text);
    if (!name) continue;

    journals.push({
      start,
      end: JOURNAL_NAME.lastIndex,
      journal: (name[1] ?? "").trim(),
      year: name[2] ? Number.parseInt(name[2], 10) : 0,
    });
  }

  return journals;
}

/**
 * Find "Author (YEAR)", "Author et al. (YEAR)" and "published in Journal (YEAR)"
 * references. A journal reference directly after an author reference is
 * folded into it; an author match inside a journal reference is dropped.
 */
export function extractCitations(text: string, contextRadius = 50): Citation[] {
  const authors: AuthorMatch[] = [...text.matchAll(AUTHOR_YEAR_PATTERN)].map((match) => {
    const start = match.index ?? 0;
    return {
      start,
      end: start + match[0].length,
      author: match[1] ?? "",
      year: Number.parseInt(match[2] ?? "0", 10),
    };
  });

  const journals = findJournals(text);

  const citations: Citation[] = [];
  const consumed = new Set<JournalMatch>();

  for (const author of authors) {
    if (journals.some((journal) => overlaps(author, journal))) continue;

    const follower = journals.find(
      (journal) => !consumed.has(journal) && journal.start >= author.end && /^\s*$/.test(text.slice(author.end, journal.start))
    );
    const span: Span = { start: author.start, end: follower ? follower.end : author.end };
    if (follower) consumed.add(follower);

    citations.push({
      authors: [author.author],
      journal: follower?.journal ?? "",
      year: author.year,
      fullText: text.slice(span.start, span.end),
      context: contextAround(text, span, contextRadius),
      offset: span.start,
    });
  }

  for (const journal of journals) {
    if (consumed.has(journal)) continue;
    citations.push({
      authors: [],
      journal: journal.journal,
      year: journal.year,
      fullText: text.slice(journal.start, journal.end),
      context: contextAround(text, journal, contextRadius),
      offset: journal.start,
    });
  }

  return citations.sort((a, b) => a.offset - b.offset);
}
