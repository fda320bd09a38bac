import assert from "node:assert/strict";
import { test } from "node:test";
import { createLanguageResolver, disambiguateCyrillic, isSharedScript } from "../src/language.js";

const fixed = (...ranked: Array<[string, number]>) => createLanguageResolver({ classify: () => ranked });

test("very short input keeps the fallback", () => {
  const resolver = fixed(["eng", 1]);
  assert.equal(resolver.resolve("ok", "ru"), "ru");
  assert.equal(resolver.resolve("  hi  ", "uk"), "uk");
});

test("a confident English verdict wins", () => {
  const resolver = fixed(["eng", 1], ["sco", 0.82]);
  assert.equal(resolver.resolve("What does my future hold?", "ru"), "en");
});

test("a narrow English lead on Cyrillic text is not trusted", () => {
  const resolver = fixed(["eng", 1], ["rus", 0.95]);
  assert.equal(resolver.resolve("Что будет дальше?", "en"), "ru");
});

test("Cyrillic text is split by unique letters first", () => {
  const resolver = fixed(["rus", 1], ["ukr", 0.97]);
  assert.equal(resolver.resolve("Що мене чекає цього року?"), "uk");
  assert.equal(resolver.resolve("Что меня ждет в этом году?"), "ru");
});

test("function words decide when no unique letter appears", () => {
  assert.equal(disambiguateCyrillic("Чи варто чекати"), "uk");
  assert.equal(disambiguateCyrillic("Скажи мне правду"), "ru");
});

test("unique letters outrank function words", () => {
  // "мне" is a Russian marker word, but ї is Ukrainian-only.
  assert.equal(disambiguateCyrillic("мне її"), "uk");
});

test("a Latin i typed for і inside a Cyrillic word tips the frequency fallback", () => {
  assert.equal(disambiguateCyrillic("Дякую, вiтаю"), "uk");
  assert.equal(disambiguateCyrillic("Как дела у тебя"), "ru");
});

test("Latin words in Russian text do not count toward Ukrainian", () => {
  assert.equal(fixed(["rus", 1]).resolve("Помогите, сломался Windows", "en"), "ru");
  assert.equal(disambiguateCyrillic("Купил новый iPhone"), "ru");
});

test("demonstrative marker words", () => {
  assert.equal(disambiguateCyrillic("Той день настав"), "uk");
  assert.equal(disambiguateCyrillic("Тот день настал"), "ru");
});

test("a failing classifier falls back to the script check", () => {
  const resolver = createLanguageResolver({
    classify: () => {
      throw new Error("model unavailable");
    },
  });
  assert.equal(resolver.resolve("Що мені робити?", "en"), "uk");
  assert.equal(resolver.resolve("Something in English", "ru"), "ru");
});

test("other scripts map the verdict or keep the fallback", () => {
  assert.equal(fixed(["deu", 1]).resolve("Was bringt die Zukunft?", "uk"), "uk");
  assert.equal(fixed().resolve("Nothing ranked here", "ru"), "ru");
});

test("shared script detection", () => {
  assert.equal(isSharedScript("Привет"), true);
  assert.equal(isSharedScript("Hello"), false);
});

test("plain English resolves to the default with the bundled classifier", () => {
  assert.equal(createLanguageResolver().resolve("Hello there"), "en");
});
