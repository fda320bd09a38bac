import type { Card } from "./catalog.js";
import type { Language } from "./session.js";

export type SpreadKind = "three_card" | "single";

const positionLabels: Record<SpreadKind, Record<Language, string[]>> = {
  three_card: {
    en: ["Past", "Present", "Future"],
    ru: ["Прошлое", "Настоящее", "Будущее"],
    uk: ["Минуле", "Теперішнє", "Майбутнє"],
  },
  single: {
    en: ["Guidance"],
    ru: ["Совет"],
    uk: ["Порада"],
  },
};

export type Spread = {
  cards: Card[];
  positions: string[];
};

export const spreadPositions = (kind: SpreadKind, language: Language) => [...positionLabels[kind][language]];

/** Draws without replacement; `random` is injectable so tests get fixed spreads. */
export const drawCards = (deck: readonly Card[], count: number, random: () => number = Math.random) => {
  const pool = [...deck];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i += 1) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
};

export const drawSpread = (
  deck: readonly Card[],
  kind: SpreadKind,
  language: Language,
  random: () => number = Math.random
): Spread => {
  const positions = spreadPositions(kind, language);
  return { cards: drawCards(deck, positions.length, random), positions };
};
