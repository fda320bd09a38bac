import fs from "node:fs";
import { CatalogError } from "./errors.js";
import type { Language } from "./session.js";

export const suits = ["wands", "cups", "swords", "pentacles"] as const;
export type Suit = (typeof suits)[number];

export type Card = Readonly<{
  id: number;
  names: Readonly<Record<Language, string>>;
  keywords: Readonly<Record<Language, readonly string[]>>;
  arcana: "major" | "minor";
  suit: Suit | null;
  number: number;
}>;

export const DECK_SIZE = 78;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isSuit = (value: unknown): value is Suit =>
  typeof value === "string" && suits.some((suit) => suit === value);

const describe = (value: unknown, index: number) =>
  isObject(value) && typeof value.id === "number" ? `card id=${value.id}` : `card #${index}`;

/**
 * Validates one raw deck entry. Every card needs an id in 0..77 and a
 * non-empty name in each supported language; major arcana carry no suit and a
 * number 0..21, minor arcana a suit and a number 1..14.
 */
export const parseCard = (value: unknown, index: number): Card => {
  const label = describe(value, index);
  if (!isObject(value)) throw new CatalogError(`${label}: not an object`);
  const { id, names, keywords, arcana, suit, number } = value;

  if (typeof id !== "number" || !Number.isInteger(id) || id < 0 || id >= DECK_SIZE) {
    throw new CatalogError(`${label}: id out of range`);
  }
  if (!isObject(names)) throw new CatalogError(`${label}: names missing`);

  const readName = (language: Language) => {
    const name = names[language];
    if (typeof name !== "string" || !name.trim()) {
      throw new CatalogError(`${label}: missing ${language} name`);
    }
    return name.trim();
  };
  const readKeywords = (language: Language): readonly string[] => {
    const terms = isObject(keywords) ? keywords[language] : undefined;
    if (!Array.isArray(terms)) return Object.freeze([]);
    return Object.freeze(terms.filter((term): term is string => typeof term === "string"));
  };
  const parsedNames = { en: readName("en"), ru: readName("ru"), uk: readName("uk") };
  const parsedKeywords = { en: readKeywords("en"), ru: readKeywords("ru"), uk: readKeywords("uk") };

  if (arcana === "major") {
    if (suit != null) throw new CatalogError(`${label}: major arcana cannot have a suit`);
    if (typeof number !== "number" || !Number.isInteger(number) || number < 0 || number > 21) {
      throw new CatalogError(`${label}: major arcana number out of range`);
    }
    return Object.freeze({ id, names: parsedNames, keywords: parsedKeywords, arcana, suit: null, number });
  }
  if (arcana === "minor") {
    if (!isSuit(suit)) throw new CatalogError(`${label}: unknown suit ${String(suit)}`);
    if (typeof number !== "number" || !Number.isInteger(number) || number < 1 || number > 14) {
      throw new CatalogError(`${label}: minor arcana number out of range`);
    }
    return Object.freeze({ id, names: parsedNames, keywords: parsedKeywords, arcana, suit, number });
  }
  throw new CatalogError(`${label}: unknown arcana ${String(arcana)}`);
};

export const parseCatalog = (raw: unknown): Card[] => {
  const list = Array.isArray(raw) ? raw : isObject(raw) && Array.isArray(raw.cards) ? raw.cards : null;
  if (!list) throw new CatalogError("catalog must be an array or { cards: [] }");
  if (list.length === 0) throw new CatalogError("catalog is empty");

  const cards = list.map((entry, index) => parseCard(entry, index));
  const seen = new Set<number>();
  for (const card of cards) {
    if (seen.has(card.id)) throw new CatalogError(`duplicate card id=${card.id}`);
    seen.add(card.id);
  }
  return cards;
};

export const loadCatalog = (catalogPath: string): Card[] => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, "utf8"));
  } catch (err) {
    throw new CatalogError(`failed to read catalog at ${catalogPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCatalog(raw);
};
