import OpenAI from "openai";
import type { Card } from "./catalog.js";
import { UpstreamError } from "./errors.js";
import type { Logger } from "./log.js";
import type { Language } from "./session.js";

export type GenerationRequest = {
  cards: readonly Card[];
  question: string;
  language: Language;
  positionLabels?: readonly string[];
};

export type GenerationClient = {
  generate: (request: GenerationRequest, signal?: AbortSignal) => Promise<string>;
};

const languageNames: Record<Language, string> = {
  en: "English",
  ru: "Russian",
  uk: "Ukrainian",
};

const systemPrompts: Record<Language, string> = {
  en: [
    "You read Tarot cards using their traditional meanings and symbolism.",
    "Relate every card to the user's question, stay supportive and avoid definitive predictions.",
    "Write one short paragraph per card followed by an overall reading, under 3500 characters.",
  ].join(" "),
  ru: [
    "Вы толкуете карты Таро, опираясь на их традиционные значения и символику.",
    "Связывайте каждую карту с вопросом пользователя, поддерживайте и не давайте категоричных предсказаний.",
    "Пишите короткий абзац на каждую карту и общий вывод, не длиннее 3500 символов.",
  ].join(" "),
  uk: [
    "Ви тлумачите карти Таро, спираючись на їхні традиційні значення та символіку.",
    "Пов'язуйте кожну карту з питанням користувача, підтримуйте та уникайте категоричних передбачень.",
    "Пишіть короткий абзац на кожну карту й загальний висновок, не довше 3500 символів.",
  ].join(" "),
};

const describeCard = (card: Card, language: Language, label: string) => {
  const keywords = card.keywords[language].join(", ");
  return keywords ? `${label}: ${card.names[language]}\nKeywords: ${keywords}` : `${label}: ${card.names[language]}`;
};

export const buildPrompt = ({ cards, question, language, positionLabels }: GenerationRequest) => {
  const target = languageNames[language];
  if (positionLabels && positionLabels.length > 0) {
    const details = cards
      .map((card, index) => describeCard(card, language, positionLabels[index] ?? `Card ${index + 1}`))
      .join("\n\n");
    return [
      `Question: ${question}`,
      "",
      "Cards drawn:",
      details,
      "",
      `Interpret this spread in ${target}: explain each card in its position and in light of the question,`,
      "show how the cards relate to each other, and close with guidance that answers the question.",
    ].join("\n");
  }

  const details = cards.map((card, index) => describeCard(card, language, `Card ${index + 1}`)).join("\n\n");
  const subject = question ? "the question" : "the user's situation";
  return [
    ...(question ? [`Question: ${question}`, ""] : []),
    "Cards chosen by the user:",
    details,
    "",
    `Interpret this combination in ${target}: what it suggests about ${subject},`,
    "how the cards influence each other, and which themes stand out.",
  ].join("\n");
};

export const createGenerationClient = ({
  apiKey,
  model,
  logger,
}: {
  apiKey: string;
  model: string;
  logger: Logger;
}): GenerationClient => {
  if (!apiKey) {
    logger.warn("OPENAI_API_KEY is not configured; readings will fail");
    return {
      async generate() {
        throw new UpstreamError("generation", "generation backend is not configured");
      },
    };
  }

  const openai = new OpenAI({ apiKey, maxRetries: 1 });

  return {
    async generate(request, signal) {
      const completion = await openai.chat.completions.create(
        {
          model,
          max_tokens: 2000,
          messages: [
            { role: "system", content: systemPrompts[request.language] },
            { role: "user", content: buildPrompt(request) },
          ],
        },
        { signal }
      );
      const text = completion.choices[0]?.message?.content?.trim() || "";
      if (!text) throw new UpstreamError("generation", "empty completion");
      logger.debug("completion received", { model, chars: text.length });
      return text;
    },
  };
};
