// src/services/classifier.ts
// What: Coarse in-domain gate for queries.
// How: Case-insensitive substring match against a fixed keyword list. A heuristic, not a topical
//      relevance guarantee: "classic cars" passes because it contains "class".

export const COURSE_KEYWORDS = ['course', 'learn', 'tutorial', 'class', 'training', 'education'] as const;

export function isInDomain(query: string): boolean {
  const q = query.toLowerCase();
  return COURSE_KEYWORDS.some((keyword) => q.includes(keyword));
}
