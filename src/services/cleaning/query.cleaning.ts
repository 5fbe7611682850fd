/**
 * Conversational padding that costs tokens without narrowing the search.
 */
export const FILLER_PHRASES = [
    "can you",
    "please",
    "could you",
    "would you",
    "i want to know",
    "tell me about",
    "explain to me",
    "i would like to know",
    "what is",
    "how does",
    "could you please",
    "can you please",
] as const;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// Longest first so "could you please" wins over "could you"
const FILLER_PATTERN = new RegExp(
    `\\b(?:${[...FILLER_PHRASES]
        .sort((a, b) => b.length - a.length)
        .map((phrase) => escapeRegExp(phrase).replace(/ /g, "\\s+"))
        .join("|")})\\b`,
    "g"
);

export class QueryCleaningService {
    /**
     * Lower-cases the query and strips filler phrases on word boundaries.
     * Falls back to the trimmed original when nothing would be left.
     */
    public static optimize(query: string): string {
        const optimized = query
            .toLowerCase()
            .replace(FILLER_PATTERN, " ")
            .split(/\s+/)
            .filter(Boolean)
            .join(" ");

        return /[\p{L}\p{N}]/u.test(optimized) ? optimized : query.trim();
    }
}
