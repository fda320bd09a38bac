import assert from "node:assert/strict";
import { test } from "node:test";
import { fileURLToPath } from "node:url";
import { DECK_SIZE, loadCatalog, parseCatalog } from "../src/catalog.js";
import { loadConfig, parseAllowlist } from "../src/config.js";
import { CatalogError, TimeoutError, UpstreamError, describeError } from "../src/errors.js";
import { isAuthorized, parseFrame } from "../src/frames.js";
import { buildPrompt, createGenerationClient } from "../src/generation.js";
import { createKeyedQueue } from "../src/keyedQueue.js";
import { silentLogger } from "../src/log.js";
import { createTranslator, loadLocales } from "../src/messages.js";
import { createPaymentClient, type InvoiceFrame } from "../src/payment.js";
import { drawCards, drawSpread } from "../src/spreads.js";
import { withTimeout } from "../src/timeout.js";

const catalog = loadCatalog(fileURLToPath(new URL("../data/cards.json", import.meta.url)));
const translator = createTranslator(loadLocales(fileURLToPath(new URL("../locales", import.meta.url))));

const cardById = (id: number) => {
  const card = catalog.find((entry) => entry.id === id);
  assert.ok(card, `card ${id}`);
  return card;
};

test("config defaults and overrides", () => {
  const defaults = loadConfig({});
  assert.equal(defaults.port, 8080);
  assert.equal(defaults.logLevel, "info");
  assert.equal(defaults.generationModel, "gpt-4o-mini");
  assert.equal(defaults.readingPrice, 20);
  assert.equal(defaults.matchThreshold, 75);
  assert.equal(defaults.rateLimitMax, 5);
  assert.equal(defaults.rateLimitWindowMs, 60000);
  assert.equal(defaults.redisUrl, "");

  const custom = loadConfig({ WS_PORT: "9090", LOG_LEVEL: "DEBUG", READING_PRICE: "abc", MATCH_THRESHOLD: "82" });
  assert.equal(custom.port, 9090);
  assert.equal(custom.logLevel, "debug");
  assert.equal(custom.readingPrice, 20);
  assert.equal(custom.matchThreshold, 82);
});

test("allowlist parsing drops blank entries", () => {
  assert.deepEqual(parseAllowlist("123, 456,,  ,789"), ["123", "456", "789"]);
  assert.deepEqual(parseAllowlist(undefined), []);
});

test("the bundled deck is complete", () => {
  assert.equal(catalog.length, DECK_SIZE);
  assert.equal(cardById(0).arcana, "major");
  assert.equal(cardById(37).suit, "cups");
  assert.equal(cardById(37).number, 2);
  assert.equal(cardById(18).names.uk, "Місяць");
});

test("catalog validation rejects inconsistent cards", () => {
  const names = { en: "The Fool", ru: "Шут", uk: "Блазень" };
  assert.throws(() => parseCatalog([]), CatalogError);
  assert.throws(() => parseCatalog([{ id: 78, names, arcana: "major", suit: null, number: 0 }]), /id out of range/);
  assert.throws(
    () => parseCatalog([{ id: 0, names: { en: "The Fool", ru: "Шут" }, arcana: "major", suit: null, number: 0 }]),
    /missing uk name/
  );
  assert.throws(
    () => parseCatalog([{ id: 0, names, arcana: "major", suit: "cups", number: 0 }]),
    /major arcana cannot have a suit/
  );
  assert.throws(
    () => parseCatalog([{ id: 30, names, arcana: "minor", suit: "wands", number: 15 }]),
    /minor arcana number out of range/
  );
  assert.throws(
    () =>
      parseCatalog([
        { id: 0, names, arcana: "major", suit: null, number: 0 },
        { id: 0, names, arcana: "major", suit: null, number: 0 },
      ]),
    /duplicate card id=0/
  );
  assert.equal(parseCatalog({ cards: [{ id: 0, names, arcana: "major", suit: null, number: 0 }] }).length, 1);
});

test("a missing catalog file is a CatalogError", () => {
  assert.throws(() => loadCatalog("/nonexistent/cards.json"), CatalogError);
});

test("keyed queue runs same-key tasks in order", async () => {
  const queue = createKeyedQueue();
  const events: string[] = [];
  const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

  const first = queue.run("a", async () => {
    events.push("a1:start");
    await delay(20);
    events.push("a1:end");
  });
  const second = queue.run("a", async () => {
    events.push("a2");
  });
  const other = queue.run("b", async () => {
    events.push("b1");
  });
  await Promise.all([first, second, other]);

  assert.deepEqual(events, ["a1:start", "b1", "a1:end", "a2"]);
});

test("a failed task does not block the key", async () => {
  const queue = createKeyedQueue();
  await assert.rejects(
    queue.run("a", async () => {
      throw new Error("boom");
    }),
    /boom/
  );
  assert.equal(await queue.run("a", async () => "next"), "next");
  await new Promise((resolve) => setTimeout(resolve, 0));
  assert.equal(queue.pendingKeys(), 0);
});

test("withTimeout rejects and aborts a stuck task", async () => {
  let aborted = false;
  await assert.rejects(
    withTimeout("stuck", 10, (signal) => {
      signal.addEventListener("abort", () => {
        aborted = true;
      });
      return new Promise<string>(() => {});
    }),
    (err: unknown) => err instanceof TimeoutError && err.message === "stuck timed out after 10ms"
  );
  assert.equal(aborted, true);
  assert.equal(await withTimeout("fast", 1000, async () => 42), 42);
});

test("describeError names the error class", () => {
  assert.equal(describeError(new UpstreamError("generation", "empty completion")), "UpstreamError: empty completion");
  assert.equal(describeError("plain"), "plain");
});

test("translator interpolates and falls back to English", () => {
  assert.equal(translator.text("err_rate_limit", "en", { seconds: 12 }), "Too many requests. Please wait 12 seconds and try again.");
  assert.equal(translator.text("no_such_key", "ru"), "no_such_key");

  const partial = createTranslator({ en: { msg_help: "Help" }, ru: {} });
  assert.equal(partial.text("msg_help", "ru"), "Help");
});

test("main menu is localized", () => {
  assert.deepEqual(
    translator.mainMenu("en").map((action) => action.id),
    ["ask_question", "explain_combination"]
  );
  assert.equal(translator.mainMenu("en")[1].label, "Explain my cards");
});

test("draws are without replacement", () => {
  const drawn = drawCards(catalog, 3, () => 0.999);
  assert.equal(new Set(drawn.map((card) => card.id)).size, 3);
  assert.deepEqual(
    drawn.map((card) => card.id),
    [77, 0, 1]
  );

  const spread = drawSpread(catalog, "single", "uk", () => 0);
  assert.deepEqual(spread.positions, ["Порада"]);
  assert.equal(spread.cards[0].id, 0);
});

test("prompts describe each card in its position", () => {
  const prompt = buildPrompt({
    cards: [cardById(18)],
    question: "Where am I headed?",
    language: "en",
    positionLabels: ["Guidance"],
  });
  assert.equal(
    prompt,
    [
      "Question: Where am I headed?",
      "",
      "Cards drawn:",
      `Guidance: The Moon\nKeywords: ${cardById(18).keywords.en.join(", ")}`,
      "",
      "Interpret this spread in English: explain each card in its position and in light of the question,",
      "show how the cards relate to each other, and close with guidance that answers the question.",
    ].join("\n")
  );
});

test("a generation client without a key fails as an upstream error", async () => {
  const client = createGenerationClient({ apiKey: "", model: "gpt-4o-mini", logger: silentLogger });
  await assert.rejects(
    client.generate({ cards: [cardById(0)], question: "Anything?", language: "en" }),
    (err: unknown) => err instanceof UpstreamError && err.source === "generation"
  );
});

test("payment client sends an invoice frame or fails", async () => {
  const sent: InvoiceFrame[] = [];
  const online = createPaymentClient({
    sendInvoice: (frame) => {
      sent.push(frame);
      return true;
    },
    logger: silentLogger,
  });
  await online.requestPayment("u1", 20, "ru", "custom");
  assert.equal(sent.length, 1);
  assert.equal(sent[0].type, "invoice");
  assert.equal(sent[0].amount, 20);
  assert.equal(sent[0].currency, "XTR");
  assert.equal(sent[0].language, "ru");
  assert.match(sent[0].payload, /^reading:custom:u1:\d+$/);

  const offline = createPaymentClient({ sendInvoice: () => false, logger: silentLogger });
  await assert.rejects(
    offline.requestPayment("u1", 20, "en", "automated"),
    (err: unknown) => err instanceof UpstreamError && err.source === "payment"
  );
});

test("inbound frames are validated", () => {
  assert.deepEqual(parseFrame('{"userId":"42","text":"hello"}'), {
    ok: true,
    turn: { userId: "42", kind: "text", text: "hello" },
  });
  assert.deepEqual(parseFrame('{"userId":42,"action":"help"}'), {
    ok: true,
    turn: { userId: "42", kind: "action", action: "help" },
  });
  assert.deepEqual(parseFrame("not json"), { ok: false, message: "frame must be a JSON object" });
  assert.deepEqual(parseFrame('{"text":"hi"}'), { ok: false, message: "userId is required" });
  assert.deepEqual(parseFrame('{"userId":"1","action":"dance"}'), { ok: false, message: "unknown action dance" });
  assert.deepEqual(parseFrame('{"userId":"1"}'), { ok: false, message: "frame needs text or action" });
});

test("connections authenticate with the bot token", () => {
  assert.equal(isAuthorized({ url: "/" }, ""), true);
  assert.equal(isAuthorized({ url: "/?token=test-secret" }, "test-secret"), true);
  assert.equal(isAuthorized({ url: "/", authorization: "Bearer test-secret" }, "test-secret"), true);
  assert.equal(isAuthorized({ url: "/?token=wrong" }, "test-secret"), false);
  assert.equal(isAuthorized({}, "test-secret"), false);
});
