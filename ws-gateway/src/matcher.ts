import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Card } from "./catalog.js";
import { CatalogError } from "./errors.js";
import { languages, type Language } from "./session.js";
import { weightedRatio } from "./similarity.js";

export type NumberWordTable = Partial<Record<Language, Record<string, string>>>;

export type MatchResult = {
  card: Card;
  score: number;
  exact: boolean;
};

export type ResolvedCards = {
  cards: Card[];
  unrecognized: string[];
};

const defaultNumberWordsPath = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "data",
  "number-words.json"
);

export const loadNumberWords = (filePath: string = defaultNumberWordsPath): NumberWordTable => {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  const table: NumberWordTable = {};
  if (typeof parsed !== "object" || parsed === null) return table;
  for (const language of languages) {
    const entries: unknown = Reflect.get(parsed, language);
    if (typeof entries !== "object" || entries === null) continue;
    const mapping: Record<string, string> = {};
    for (const [variant, canonical] of Object.entries(entries)) {
      if (typeof canonical === "string") mapping[variant] = canonical;
    }
    table[language] = mapping;
  }
  return table;
};

const fillerPrefixes: Record<Language, string[]> = {
  en: ["the", "a", "card"],
  ru: ["карта", "аркан"],
  uk: ["карта", "аркан"],
};

// Shared-script languages only; English ranks are already written as words in the deck.
const canonicalizesNumbers = (language: Language) => language === "ru" || language === "uk";

const apostrophePattern = /[’ʼ`´]/g;

export const createNormalizer = (numberWords: NumberWordTable) => (text: string, language: Language) => {
  let tokens = text
    .normalize("NFKC")
    .toLowerCase()
    .replace(/ё/g, "е")
    .replace(apostrophePattern, "'")
    .replace(/[.,;:!?"«»()]/g, " ")
    .trim()
    .split(/\s+/)
    .filter(Boolean);

  const fillers = fillerPrefixes[language];
  while (tokens.length > 1 && fillers.includes(tokens[0])) {
    tokens = tokens.slice(1);
  }

  const table = numberWords[language];
  if (table && canonicalizesNumbers(language) && tokens.length > 0) {
    const canonical = table[tokens[0]];
    if (canonical) tokens = [canonical, ...tokens.slice(1)];
  }
  return tokens.join(" ");
};

export const createEntityMatcher = (
  cards: readonly Card[],
  {
    threshold = 75,
    topK = 5,
    numberWords = loadNumberWords(),
  }: { threshold?: number; topK?: number; numberWords?: NumberWordTable } = {}
) => {
  if (cards.length === 0) throw new CatalogError("entity matcher needs a non-empty catalog");

  const normalize = createNormalizer(numberWords);

  const byName = new Map<Language, Map<string, Card>>();
  const allNames: Array<{ key: string; card: Card; language: Language }> = [];
  for (const language of languages) {
    const index = new Map<string, Card>();
    for (const card of cards) {
      const key = normalize(card.names[language], language);
      if (!index.has(key)) index.set(key, card);
      allNames.push({ key, card, language });
    }
    byName.set(language, index);
  }

  const exact = (query: string, language: Language): Card | undefined => {
    const own = byName.get(language)?.get(normalize(query, language));
    if (own) return own;
    for (const other of languages) {
      if (other === language) continue;
      const found = byName.get(other)?.get(normalize(query, other));
      if (found) return found;
    }
    return undefined;
  };

  /**
   * Top-k fuzzy candidates at or above the threshold, best first. A card
   * appears once, with its best score over all of its names; ties keep the
   * active language's names ahead of the rest.
   */
  const candidates = (query: string, language: Language): MatchResult[] => {
    const best = new Map<number, MatchResult & { own: boolean }>();
    for (const entry of allNames) {
      const score = weightedRatio(normalize(query, entry.language), entry.key);
      if (score < threshold) continue;
      const own = entry.language === language;
      const current = best.get(entry.card.id);
      if (!current || score > current.score || (score === current.score && own && !current.own)) {
        best.set(entry.card.id, { card: entry.card, score, exact: false, own });
      }
    }
    return [...best.values()]
      .sort((a, b) => b.score - a.score || Number(b.own) - Number(a.own))
      .slice(0, topK)
      .map(({ card, score }) => ({ card, score, exact: false }));
  };

  const match = (query: string, language: Language): MatchResult | null => {
    if (!query.trim()) return null;
    const hit = exact(query, language);
    if (hit) return { card: hit, score: 100, exact: true };
    return candidates(query, language)[0] ?? null;
  };

  const resolveMany = (text: string, language: Language): ResolvedCards => {
    const cardsFound: Card[] = [];
    const unrecognized: string[] = [];
    for (const piece of text.split(",")) {
      const query = piece.trim();
      if (!query) continue;
      const result = match(query, language);
      if (!result) {
        unrecognized.push(query);
        continue;
      }
      if (!cardsFound.some((card) => card.id === result.card.id)) cardsFound.push(result.card);
    }
    return { cards: cardsFound, unrecognized };
  };

  return { match, candidates, resolveMany, normalize };
};

export type EntityMatcher = ReturnType<typeof createEntityMatcher>;
