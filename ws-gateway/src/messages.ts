import fs from "node:fs";
import path from "node:path";
import type { Card } from "./catalog.js";
import { languages, type Language } from "./session.js";

export type Locale = Record<string, string>;
export type LocaleTable = Partial<Record<Language, Locale>>;

export type ActionId = "ask_question" | "explain_combination";

export type SuggestedAction = {
  id: ActionId;
  label: string;
};

export const loadLocales = (localesDir: string): LocaleTable => {
  const table: LocaleTable = {};
  for (const language of languages) {
    const file = path.join(localesDir, `${language}.json`);
    if (!fs.existsSync(file)) continue;
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    if (typeof parsed !== "object" || parsed === null) continue;
    const locale: Locale = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "string") locale[key] = value;
    }
    table[language] = locale;
  }
  return table;
};

const interpolate = (text: string, params: Record<string, string | number>) =>
  text.replace(/\{(\w+)\}/g, (whole, name: string) => (name in params ? String(params[name]) : whole));

export const createTranslator = (locales: LocaleTable) => {
  const text = (key: string, language: Language, params: Record<string, string | number> = {}) => {
    const raw = locales[language]?.[key] ?? locales.en?.[key] ?? key;
    return interpolate(raw, params);
  };

  const mainMenu = (language: Language): SuggestedAction[] => [
    { id: "ask_question", label: text("btn_ask_question", language) },
    { id: "explain_combination", label: text("btn_explain_combination", language) },
  ];

  const renderReading = ({
    question,
    cards,
    positions,
    interpretation,
    language,
  }: {
    question: string;
    cards: readonly Card[];
    positions: readonly string[];
    interpretation: string;
    language: Language;
  }) => {
    const lines = [
      `*${text("msg_reading_title", language)}*\n`,
      `*${text("label_question", language)}:* ${question}\n`,
      `*${text("label_cards_drawn", language)}:*`,
      ...cards.map((card, index) => `${index + 1}. *${positions[index] ?? ""}*: ${card.names[language]}`),
      "",
      `*${text("label_interpretation", language)}:*`,
      interpretation,
      text("msg_disclaimer", language),
    ];
    return lines.join("\n");
  };

  const renderCustomReading = ({
    question,
    cards,
    interpretation,
    language,
  }: {
    question: string;
    cards: readonly Card[];
    interpretation: string;
    language: Language;
  }) => {
    const lines = [
      `*${text("msg_reading_title", language)}*\n`,
      ...(question ? [`*${text("label_question", language)}:* ${question}\n`] : []),
      `*${text("label_your_cards", language)}:*`,
      ...cards.map((card, index) => `${index + 1}. ${card.names[language]}`),
      "",
      `*${text("label_interpretation", language)}:*`,
      interpretation,
      text("msg_disclaimer", language),
    ];
    return lines.join("\n");
  };

  return { text, mainMenu, renderReading, renderCustomReading };
};

export type Translator = ReturnType<typeof createTranslator>;
