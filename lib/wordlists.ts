import wordlistData from '../data/wordlist.json';
import permutationData from '../data/permutations.json';

export type WordlistCategories = Record<string, readonly string[]>;

export interface PermutationTable {
  prefixes: readonly string[];
  suffixes: readonly string[];
  numbered: { labels: readonly string[]; from: number; to: number };
}

export const WORDLIST: WordlistCategories = wordlistData;
export const PERMUTATIONS: PermutationTable = permutationData;

/** Every category's words in file order, first occurrence kept. */
export function flattenWordlist(categories: WordlistCategories = WORDLIST): string[] {
  const words = new Set<string>();
  for (const list of Object.values(categories)) {
    for (const w of list) words.add(w.trim().toLowerCase());
  }
  words.delete('');
  return [...words];
}

export function categorySizes(categories: WordlistCategories = WORDLIST): Record<string, number> {
  return Object.fromEntries(Object.entries(categories).map(([name, list]) => [name, list.length]));
}
