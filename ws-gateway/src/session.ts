export const languages = ["en", "ru", "uk"] as const;
export type Language = (typeof languages)[number];

export const sessionStates = [
  "idle",
  "awaiting_payment",
  "awaiting_question",
  "awaiting_custom_question",
  "awaiting_cards",
  "processing",
] as const;
export type SessionState = (typeof sessionStates)[number];

export type ReadingKind = "automated" | "custom";
export type Flow = ReadingKind;

export type ContextValue = string | number | boolean | null;

export type Reading = Readonly<{
  kind: ReadingKind;
  entityIds: readonly number[];
  question: string;
  positionLabels: readonly string[];
  resultText: string;
  language: Language;
  timestamp: string;
}>;

export type Session = {
  userId: string;
  language: Language;
  state: SessionState;
  context: Record<string, ContextValue>;
  readingCount: number;
  readingHistory: Reading[];
  createdAt: string;
  updatedAt: string;
};

// Wire shape of a persisted session. Arrays are mutable copies so the record
// can be handed to JSON.stringify or a store without aliasing the session.
export type ReadingRecord = {
  kind: ReadingKind;
  entityIds: number[];
  question: string;
  positionLabels: string[];
  resultText: string;
  language: Language;
  timestamp: string;
};

export type SessionRecord = {
  userId: string;
  language: Language;
  state: SessionState;
  context: Record<string, ContextValue>;
  readingCount: number;
  readingHistory: ReadingRecord[];
  createdAt: string;
  updatedAt: string;
};

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;
export const MAX_HISTORY = 50;

export const isLanguage = (value: unknown): value is Language =>
  typeof value === "string" && languages.some((code) => code === value);

export const isSessionState = (value: unknown): value is SessionState =>
  typeof value === "string" && sessionStates.some((state) => state === value);

export const createSession = (userId: string, now: Date = new Date(), language: Language = "en"): Session => {
  const stamp = now.toISOString();
  return {
    userId,
    language,
    state: "idle",
    context: {},
    readingCount: 0,
    readingHistory: [],
    createdAt: stamp,
    updatedAt: stamp,
  };
};

export const createReading = (reading: {
  kind: ReadingKind;
  entityIds: number[];
  question: string;
  positionLabels: string[];
  resultText: string;
  language: Language;
  timestamp?: Date;
}): Reading =>
  Object.freeze({
    kind: reading.kind,
    entityIds: Object.freeze([...reading.entityIds]),
    question: reading.question,
    positionLabels: Object.freeze([...reading.positionLabels]),
    resultText: reading.resultText,
    language: reading.language,
    timestamp: (reading.timestamp ?? new Date()).toISOString(),
  });

export const appendReading = (session: Session, reading: Reading) => {
  session.readingHistory.push(reading);
  if (session.readingHistory.length > MAX_HISTORY) {
    session.readingHistory.splice(0, session.readingHistory.length - MAX_HISTORY);
  }
  session.readingCount = session.readingHistory.length;
};

export const assertSessionInvariants = (session: Session) => {
  if (session.readingCount !== session.readingHistory.length) {
    throw new Error(
      `Session ${session.userId} readingCount=${session.readingCount} but history has ${session.readingHistory.length} entries`
    );
  }
  if (!isSessionState(session.state)) {
    throw new Error(`Session ${session.userId} has unknown state ${String(session.state)}`);
  }
  if (!isLanguage(session.language)) {
    throw new Error(`Session ${session.userId} has unsupported language ${String(session.language)}`);
  }
};

export const touchSession = (session: Session, now: Date = new Date()) => {
  session.updatedAt = now.toISOString();
};

export const toRecord = (session: Session): SessionRecord => ({
  userId: session.userId,
  language: session.language,
  state: session.state,
  context: { ...session.context },
  readingCount: session.readingCount,
  readingHistory: session.readingHistory.map((reading) => ({
    kind: reading.kind,
    entityIds: [...reading.entityIds],
    question: reading.question,
    positionLabels: [...reading.positionLabels],
    resultText: reading.resultText,
    language: reading.language,
    timestamp: reading.timestamp,
  })),
  createdAt: session.createdAt,
  updatedAt: session.updatedAt,
});

const isRecordObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isIntArray = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((item) => Number.isInteger(item));

const isTimestamp = (value: unknown): value is string =>
  typeof value === "string" && Number.isFinite(Date.parse(value));

const isContextValue = (value: unknown): value is ContextValue =>
  value === null || ["string", "number", "boolean"].includes(typeof value);

const parseReading = (value: unknown): Reading | null => {
  if (!isRecordObject(value)) return null;
  const { kind, entityIds, question, positionLabels, resultText, language, timestamp } = value;
  if (kind !== "automated" && kind !== "custom") return null;
  if (!isIntArray(entityIds) || !isStringArray(positionLabels)) return null;
  if (typeof question !== "string" || typeof resultText !== "string") return null;
  if (!isLanguage(language) || !isTimestamp(timestamp)) return null;
  return Object.freeze({
    kind,
    entityIds: Object.freeze([...entityIds]),
    question,
    positionLabels: Object.freeze([...positionLabels]),
    resultText,
    language,
    timestamp,
  });
};

/**
 * Rebuilds a session from its persisted form. Returns null when any field is
 * missing or out of range so callers can treat the record as absent.
 */
export const fromRecord = (value: unknown): Session | null => {
  if (!isRecordObject(value)) return null;
  const { userId, language, state, context, readingCount, readingHistory, createdAt, updatedAt } = value;
  if (typeof userId !== "string" || !isLanguage(language) || !isSessionState(state)) return null;
  if (!isTimestamp(createdAt) || !isTimestamp(updatedAt)) return null;
  if (!Number.isInteger(readingCount) || !Array.isArray(readingHistory)) return null;

  const ctx: Record<string, ContextValue> = {};
  if (context != null) {
    if (!isRecordObject(context)) return null;
    for (const [key, entry] of Object.entries(context)) {
      if (!isContextValue(entry)) return null;
      ctx[key] = entry;
    }
  }

  const history: Reading[] = [];
  for (const entry of readingHistory) {
    const reading = parseReading(entry);
    if (!reading) return null;
    history.push(reading);
  }
  if (readingCount !== history.length) return null;

  return {
    userId,
    language,
    state,
    context: ctx,
    readingCount: history.length,
    readingHistory: history,
    createdAt,
    updatedAt,
  };
};
