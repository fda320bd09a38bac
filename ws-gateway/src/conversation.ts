import type { Card } from "./catalog.js";
import {
  AdmissionRejected,
  ResolutionError,
  TimeoutError,
  UpstreamError,
  ValidationError,
  describeError,
} from "./errors.js";
import type { GenerationClient } from "./generation.js";
import type { KeyedQueue } from "./keyedQueue.js";
import type { LanguageResolver } from "./language.js";
import type { RateLimiter } from "./limiter.js";
import type { Logger } from "./log.js";
import type { EntityMatcher } from "./matcher.js";
import type { SuggestedAction, Translator } from "./messages.js";
import { PAYMENT_CURRENCY, type PaymentClient } from "./payment.js";
import {
  appendReading,
  assertSessionInvariants,
  createReading,
  touchSession,
  type Flow,
  type Language,
  type Session,
} from "./session.js";
import { drawSpread } from "./spreads.js";
import { loadOrCreate, type SessionStore } from "./store.js";
import { transition, type MachineEvent } from "./transitions.js";
import { withTimeout } from "./timeout.js";

export const turnActions = ["start", "help", "ask_question", "explain_combination", "payment_confirmed"] as const;
export type TurnAction = (typeof turnActions)[number];

export type Turn =
  | { userId: string; kind: "text"; text: string }
  | { userId: string; kind: "action"; action: TurnAction };

export type Reply = {
  userId: string;
  text: string;
  actions: SuggestedAction[];
};

type ReplyHandler = (reply: Reply) => void;

type ConversationConfig = {
  paymentAllowlist: readonly string[];
  readingPrice: number;
  generationTimeoutMs: number;
  paymentTimeoutMs: number;
};

export const QUESTION_MIN_LENGTH = 5;
export const QUESTION_MAX_LENGTH = 500;

const CONTEXT_PENDING_FLOW = "pendingFlow";
const CONTEXT_CUSTOM_QUESTION = "customQuestion";

export const validateQuestion = (text: string) => {
  if (text.trim().length < QUESTION_MIN_LENGTH) throw new ValidationError("question_too_short", text.trim().length);
  if (text.length > QUESTION_MAX_LENGTH) throw new ValidationError("question_too_long", text.length);
  return text.trim();
};

const validationMessageKey = (err: ValidationError) =>
  err.kind === "question_too_short" ? "err_empty_question" : "err_long_question";

const isFlow = (value: unknown): value is Flow => value === "automated" || value === "custom";

const clearTransientContext = (session: Session) => {
  delete session.context[CONTEXT_PENDING_FLOW];
  delete session.context[CONTEXT_CUSTOM_QUESTION];
};

export const createConversationController = ({
  store,
  limiter,
  queue,
  resolver,
  matcher,
  generation,
  payment,
  translator,
  catalog,
  config,
  logger,
  onReply,
  random = Math.random,
  now = () => new Date(),
}: {
  store: SessionStore;
  limiter: RateLimiter;
  queue: KeyedQueue;
  resolver: LanguageResolver;
  matcher: EntityMatcher;
  generation: GenerationClient;
  payment: PaymentClient;
  translator: Translator;
  catalog: readonly Card[];
  config: ConversationConfig;
  logger: Logger;
  onReply: ReplyHandler;
  random?: () => number;
  now?: () => Date;
}) => {
  const t = translator.text;

  const reply = (session: Session, text: string, actions: SuggestedAction[] = []) => {
    onReply({ userId: session.userId, text, actions });
  };

  const replyWithMenu = (session: Session, text: string) => {
    reply(session, text, translator.mainMenu(session.language));
  };

  const move = (session: Session, event: MachineEvent, reason: string) => {
    const next = transition(session.state, event);
    if (next == null) {
      logger.debug("transition.rejected", { userId: session.userId, state: session.state, event: event.type });
      return false;
    }
    logger.info(`[STATE] ${session.state} -> ${next} reason=${reason} user=${session.userId}`);
    session.state = next;
    return true;
  };

  const persist = async (session: Session) => {
    touchSession(session, now());
    assertSessionInvariants(session);
    await store.set(session.userId, session);
  };

  const promptFor = (session: Session) => {
    switch (session.state) {
      case "awaiting_question":
      case "awaiting_custom_question":
        return t("msg_prompt_question", session.language);
      case "awaiting_cards":
        return t("msg_prompt_cards", session.language);
      case "awaiting_payment":
        return t("msg_payment_request", session.language, {
          amount: config.readingPrice,
          currency: PAYMENT_CURRENCY,
        });
      case "processing":
        return t("msg_processing", session.language);
      case "idle":
        return t("err_invalid_state", session.language);
    }
  };

  const paymentWaived = (session: Session) => {
    if (config.paymentAllowlist.includes(session.userId)) return true;
    return session.readingCount === 0;
  };

  const requestFlow = async (session: Session, flow: Flow) => {
    const paymentRequired = !paymentWaived(session);
    if (!move(session, { type: "flow_requested", flow, paymentRequired }, `flow.${flow}`)) {
      reply(session, promptFor(session));
      return;
    }

    if (!paymentRequired) {
      await persist(session);
      reply(session, t("msg_prompt_question", session.language));
      return;
    }

    session.context[CONTEXT_PENDING_FLOW] = flow;
    await persist(session);
    try {
      await withTimeout("payment request", config.paymentTimeoutMs, () =>
        payment.requestPayment(session.userId, config.readingPrice, session.language, flow)
      );
    } catch (err) {
      logger.error("payment.request_failed", { userId: session.userId, err: describeError(err) });
      move(session, { type: "payment_failed" }, "payment.request_failed");
      clearTransientContext(session);
      await persist(session);
      replyWithMenu(session, t("err_payment", session.language));
      return;
    }
    reply(session, promptFor(session));
  };

  const confirmPayment = async (session: Session) => {
    const flow = session.context[CONTEXT_PENDING_FLOW];
    if (!isFlow(flow) || !move(session, { type: "payment_confirmed", flow }, "payment.confirmed")) {
      logger.warn("payment.confirmation_ignored", { userId: session.userId, state: session.state });
      return;
    }
    delete session.context[CONTEXT_PENDING_FLOW];
    await persist(session);
    reply(session, `${t("msg_payment_confirmed", session.language)}\n\n${promptFor(session)}`);
  };

  const runReading = async (
    session: Session,
    reading: {
      kind: Flow;
      cards: Card[];
      positions: string[];
      question: string;
      unrecognized: string[];
    }
  ) => {
    const language = session.language;
    await persist(session);
    reply(session, t("msg_processing", language));

    let interpretation: string;
    try {
      interpretation = await withTimeout("generation", config.generationTimeoutMs, (signal) =>
        generation.generate(
          {
            cards: reading.cards,
            question: reading.question,
            language,
            positionLabels: reading.kind === "automated" ? reading.positions : undefined,
          },
          signal
        )
      );
    } catch (err) {
      const upstream =
        err instanceof UpstreamError
          ? err
          : new UpstreamError("generation", describeError(err), {
              cause: err,
              timedOut: err instanceof TimeoutError,
            });
      logger.error("generation.failed", {
        userId: session.userId,
        timedOut: upstream.timedOut,
        err: upstream.message,
      });
      move(session, { type: "generation_failed" }, "generation.failed");
      clearTransientContext(session);
      await persist(session);
      replyWithMenu(session, t("err_ai_service", language));
      return;
    }

    appendReading(
      session,
      createReading({
        kind: reading.kind,
        entityIds: reading.cards.map((card) => card.id),
        question: reading.question,
        positionLabels: reading.kind === "automated" ? reading.positions : [],
        resultText: interpretation,
        language,
        timestamp: now(),
      })
    );
    move(session, { type: "generation_succeeded" }, "generation.succeeded");
    clearTransientContext(session);
    await persist(session);

    const rendered =
      reading.kind === "automated"
        ? translator.renderReading({
            question: reading.question,
            cards: reading.cards,
            positions: reading.positions,
            interpretation,
            language,
          })
        : translator.renderCustomReading({
            question: reading.question,
            cards: reading.cards,
            interpretation,
            language,
          });
    const notice = reading.unrecognized.length
      ? `${t("msg_partial_cards", language, { names: reading.unrecognized.join(", ") })}\n\n`
      : "";
    replyWithMenu(session, `${notice}${rendered}`);
    logger.info("reading.completed", {
      userId: session.userId,
      kind: reading.kind,
      cards: reading.cards.map((card) => card.id),
      readingCount: session.readingCount,
    });
  };

  const handleQuestion = async (session: Session, text: string) => {
    const question = validateQuestion(text);
    move(session, { type: "question_accepted" }, "question.accepted");
    const spread = drawSpread(catalog, "three_card", session.language, random);
    await runReading(session, {
      kind: "automated",
      cards: spread.cards,
      positions: spread.positions,
      question,
      unrecognized: [],
    });
  };

  const handleCustomQuestion = async (session: Session, text: string) => {
    const question = validateQuestion(text);
    move(session, { type: "question_accepted" }, "custom_question.accepted");
    session.context[CONTEXT_CUSTOM_QUESTION] = question;
    await persist(session);
    reply(session, t("msg_prompt_cards", session.language));
  };

  const handleCards = async (session: Session, text: string) => {
    const resolved = matcher.resolveMany(text, session.language);
    if (resolved.cards.length === 0) throw new ResolutionError(text);
    if (resolved.unrecognized.length) {
      logger.info("cards.partially_recognized", { userId: session.userId, unrecognized: resolved.unrecognized });
    }
    const stashed = session.context[CONTEXT_CUSTOM_QUESTION];
    move(session, { type: "entities_resolved" }, "cards.resolved");
    await runReading(session, {
      kind: "custom",
      cards: resolved.cards,
      positions: [],
      question: typeof stashed === "string" ? stashed : "",
      unrecognized: resolved.unrecognized,
    });
  };

  const handleText = async (session: Session, text: string) => {
    const detected = resolver.resolve(text, session.language);
    const languageChanged = detected !== session.language;
    if (languageChanged) {
      logger.debug("language.changed", { userId: session.userId, from: session.language, to: detected });
      session.language = detected;
    }

    try {
      switch (session.state) {
        case "idle":
          if (languageChanged) await persist(session);
          replyWithMenu(session, t("err_invalid_state", session.language));
          return;
        case "awaiting_payment":
          if (languageChanged) await persist(session);
          reply(session, promptFor(session));
          return;
        case "awaiting_question":
          await handleQuestion(session, text);
          return;
        case "awaiting_custom_question":
          await handleCustomQuestion(session, text);
          return;
        case "awaiting_cards":
          await handleCards(session, text);
          return;
        case "processing":
          // Only reachable when an earlier turn died mid-reading; unwind it.
          logger.warn("stale processing state", { userId: session.userId });
          move(session, { type: "generation_failed" }, "processing.stale");
          clearTransientContext(session);
          await persist(session);
          replyWithMenu(session, t("err_ai_service", session.language));
          return;
      }
    } catch (err) {
      if (err instanceof ValidationError) {
        logger.warn("question.rejected", { userId: session.userId, kind: err.kind });
        if (languageChanged) await persist(session);
        reply(session, t(validationMessageKey(err), session.language));
        return;
      }
      if (err instanceof ResolutionError) {
        logger.warn("cards.unrecognized", { userId: session.userId, input: err.input });
        if (languageChanged) await persist(session);
        reply(session, t("err_no_cards_recognized", session.language));
        return;
      }
      throw err;
    }
  };

  const handleAction = async (session: Session, action: TurnAction) => {
    switch (action) {
      case "start":
        move(session, { type: "reset" }, "command.start");
        clearTransientContext(session);
        await persist(session);
        replyWithMenu(session, t("msg_welcome", session.language));
        return;
      case "help":
        replyWithMenu(session, t("msg_help", session.language));
        return;
      case "ask_question":
        await requestFlow(session, "automated");
        return;
      case "explain_combination":
        await requestFlow(session, "custom");
        return;
      case "payment_confirmed":
        await confirmPayment(session);
        return;
    }
  };

  const processTurn = async (turn: Turn) => {
    let session: Session | undefined;
    try {
      session = await loadOrCreate(store, turn.userId, now());
      if (turn.kind === "text") await handleText(session, turn.text);
      else await handleAction(session, turn.action);
    } catch (err) {
      logger.error("turn.failed", { userId: turn.userId, err: describeError(err) });
      if (session && session.state === "processing") {
        move(session, { type: "generation_failed" }, "turn.failed");
        clearTransientContext(session);
        try {
          await persist(session);
        } catch (persistErr) {
          logger.error("turn.recovery_save_failed", { userId: turn.userId, err: describeError(persistErr) });
        }
      }
      const language = session?.language ?? "en";
      onReply({
        userId: turn.userId,
        text: t("err_ai_service", language),
        actions: translator.mainMenu(language),
      });
    }
  };

  const languageFor = async (userId: string): Promise<Language> => {
    try {
      return (await store.get(userId))?.language ?? "en";
    } catch (err) {
      logger.warn("language lookup failed", { userId, err: describeError(err) });
      return "en";
    }
  };

  const handleTurn = async (turn: Turn) => {
    const admission = limiter.check(turn.userId);
    if (!admission.admitted) {
      const rejection = new AdmissionRejected(turn.userId, admission.retryAfterMs);
      logger.warn(rejection.message, { retryAfterMs: rejection.retryAfterMs });
      const language = await languageFor(turn.userId);
      onReply({
        userId: turn.userId,
        text: t("err_rate_limit", language, { seconds: Math.max(1, Math.ceil(rejection.retryAfterMs / 1000)) }),
        actions: [],
      });
      return;
    }
    await queue.run(turn.userId, () => processTurn(turn));
  };

  return { handleTurn };
};

export type ConversationController = ReturnType<typeof createConversationController>;
