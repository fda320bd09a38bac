import { francAll } from "franc";
import type { Language } from "./session.js";

/** Ranked [iso-639-3 code, score] pairs, best first, as franc reports them. */
export type LanguageClassifier = (text: string) => Array<[string, number]>;

const francClassifier: LanguageClassifier = (text) => francAll(text, { minLength: 3 });

const iso3ToLanguage: Record<string, Language> = {
  eng: "en",
  rus: "ru",
  ukr: "uk",
};

// Minimum lead the top guess needs over the runner-up before an English
// verdict is trusted without further checks. franc scores are normalized to 1.
const CONFIDENT_MARGIN = 0.1;

const cyrillicPattern = /\p{Script=Cyrillic}/u;
const tokenSplitPattern = /[^\p{L}'’ʼ-]+/u;

// Ukrainian is langA, Russian langB: both Cyrillic, so letters and function
// words decide before any frequency heuristic.
const ukrainianMarkers = {
  chars: ["і", "ї", "є", "ґ"],
  words: new Set(["чи", "який", "мені", "тобі", "цей", "той", "ця", "та", "ті", "тих"]),
};

const russianMarkers = {
  chars: ["ы", "э", "ъ", "ё"],
  words: new Set(["или", "который", "мне", "тебе", "этот", "тот", "эта", "эти", "тех"]),
};

const UKRAINIAN_SHARE_THRESHOLD = 0.3;

const homoglyphPattern = /(?<=\p{Script=Cyrillic})i(?=\p{Script=Cyrillic})/gu;

const tokenize = (text: string) => text.split(tokenSplitPattern).filter(Boolean);

const countChar = (text: string, ch: string) => {
  let count = 0;
  for (const current of text) {
    if (current === ch) count += 1;
  }
  return count;
};

export const isSharedScript = (text: string) => cyrillicPattern.test(text);

export const disambiguateCyrillic = (text: string): "uk" | "ru" => {
  const lower = text.toLowerCase();
  if (ukrainianMarkers.chars.some((ch) => lower.includes(ch))) return "uk";
  if (russianMarkers.chars.some((ch) => lower.includes(ch))) return "ru";

  const tokens = tokenize(lower);
  if (tokens.some((token) => ukrainianMarkers.words.has(token))) return "uk";
  if (tokens.some((token) => russianMarkers.words.has(token))) return "ru";

  // Reached only without a Cyrillic і, so this counts a Latin i typed for it
  // inside a Cyrillic word. Latin words such as brand names do not count.
  const ukCount = countChar(lower, "і") + (lower.match(homoglyphPattern)?.length ?? 0);
  const ruCount = countChar(lower, "и");
  if (ukCount > 0 && ukCount / (ukCount + ruCount) > UKRAINIAN_SHARE_THRESHOLD) return "uk";
  return "ru";
};

const isConfidentEnglish = (ranked: Array<[string, number]>) => {
  const [top, runnerUp] = ranked;
  if (!top || top[0] !== "eng") return false;
  if (!runnerUp) return true;
  return top[1] - runnerUp[1] >= CONFIDENT_MARGIN;
};

export const createLanguageResolver = ({
  classify = francClassifier,
}: { classify?: LanguageClassifier } = {}) => {
  const resolve = (text: string, fallback: Language = "en"): Language => {
    const trimmed = text.trim();
    if (trimmed.length < 3) return fallback;

    let ranked: Array<[string, number]>;
    try {
      ranked = classify(trimmed);
    } catch {
      // No verdict: the script alone decides.
      return isSharedScript(trimmed) ? disambiguateCyrillic(trimmed) : fallback;
    }

    if (isConfidentEnglish(ranked)) return "en";
    if (isSharedScript(trimmed)) return disambiguateCyrillic(trimmed);

    const verdict = ranked[0] ? iso3ToLanguage[ranked[0][0]] : undefined;
    return verdict ?? fallback;
  };

  return { resolve };
};

export type LanguageResolver = ReturnType<typeof createLanguageResolver>;
