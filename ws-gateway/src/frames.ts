import { turnActions, type Reply, type Turn, type TurnAction } from "./conversation.js";
import type { InvoiceFrame } from "./payment.js";

export type ReplyFrame = { type: "reply" } & Reply;
export type ErrorFrame = { type: "error"; message: string };
export type OutboundFrame = ReplyFrame | InvoiceFrame | ErrorFrame;

export type ParsedFrame = { ok: true; turn: Turn } | { ok: false; message: string };

export const safeJson = (data: string): unknown => {
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
};

const isTurnAction = (value: unknown): value is TurnAction =>
  typeof value === "string" && turnActions.some((action) => action === value);

export const parseFrame = (data: string): ParsedFrame => {
  const payload = safeJson(data);
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    return { ok: false, message: "frame must be a JSON object" };
  }
  const userId: unknown = Reflect.get(payload, "userId");
  const text: unknown = Reflect.get(payload, "text");
  const action: unknown = Reflect.get(payload, "action");

  const id = typeof userId === "number" && Number.isFinite(userId) ? String(userId) : userId;
  if (typeof id !== "string" || !id.trim()) return { ok: false, message: "userId is required" };

  if (action !== undefined) {
    if (!isTurnAction(action)) return { ok: false, message: `unknown action ${String(action)}` };
    return { ok: true, turn: { userId: id.trim(), kind: "action", action } };
  }
  if (typeof text === "string") return { ok: true, turn: { userId: id.trim(), kind: "text", text } };
  return { ok: false, message: "frame needs text or action" };
};

/** Token from `?token=` or `Authorization: Bearer`; an empty expected token disables the check. */
export const isAuthorized = (
  request: { url?: string; authorization?: string },
  expectedToken: string
) => {
  if (!expectedToken) return true;
  const query = new URL(request.url ?? "/", "http://localhost").searchParams.get("token");
  if (query === expectedToken) return true;
  const header = request.authorization ?? "";
  const [scheme, value] = header.split(" ");
  return scheme?.toLowerCase() === "bearer" && value === expectedToken;
};
