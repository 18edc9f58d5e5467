import { Location } from '../entities/location.entity';

// Field order decides the rank: a name match beats a city match beats a state match
export const AUTOCOMPLETE_FIELDS = ['name', 'city', 'state'] as const;

export type AutocompleteField = (typeof AUTOCOMPLETE_FIELDS)[number];

export type AutocompleteCandidate = Pick<Location, 'id' | AutocompleteField>;

/** Index of the first field containing the fragment, or -1 when none does. */
export function matchedFieldRank(candidate: AutocompleteCandidate, fragment: string): number {
  const needle = fragment.toLowerCase();
  return AUTOCOMPLETE_FIELDS.findIndex((field) => candidate[field].toLowerCase().includes(needle));
}

function compareText(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function rankLocationMatches<T extends AutocompleteCandidate>(
  candidates: T[],
  fragment: string,
  limit: number,
): T[] {
  return candidates
    .map((candidate) => ({ candidate, rank: matchedFieldRank(candidate, fragment) }))
    .filter(({ rank }) => rank >= 0)
    .sort(
      (a, b) =>
        a.rank - b.rank ||
        compareText(a.candidate.name, b.candidate.name) ||
        a.candidate.id - b.candidate.id,
    )
    .slice(0, limit)
    .map(({ candidate }) => candidate);
}
