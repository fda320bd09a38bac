import type { Flow, SessionState } from "./session.js";

export type MachineEvent =
  | { type: "flow_requested"; flow: Flow; paymentRequired: boolean }
  | { type: "payment_confirmed"; flow: Flow }
  | { type: "payment_failed" }
  | { type: "question_accepted" }
  | { type: "entities_resolved" }
  | { type: "generation_succeeded" }
  | { type: "generation_failed" }
  | { type: "reset" };

const assertNever = (value: never): never => {
  throw new Error(`Unhandled state ${String(value)}`);
};

const questionStateFor = (flow: Flow): SessionState =>
  flow === "automated" ? "awaiting_question" : "awaiting_custom_question";

/**
 * Allowed transitions only. Returns the next state, or null when the event is
 * not valid in `state` (the caller then leaves the session untouched).
 */
export const transition = (state: SessionState, event: MachineEvent): SessionState | null => {
  if (event.type === "reset") return "idle";

  switch (state) {
    case "idle":
      if (event.type === "flow_requested") {
        return event.paymentRequired ? "awaiting_payment" : questionStateFor(event.flow);
      }
      return null;

    case "awaiting_payment":
      if (event.type === "payment_confirmed") return questionStateFor(event.flow);
      if (event.type === "payment_failed") return "idle";
      return null;

    case "awaiting_question":
      return event.type === "question_accepted" ? "processing" : null;

    case "awaiting_custom_question":
      return event.type === "question_accepted" ? "awaiting_cards" : null;

    case "awaiting_cards":
      return event.type === "entities_resolved" ? "processing" : null;

    case "processing":
      if (event.type === "generation_succeeded" || event.type === "generation_failed") return "idle";
      return null;

    default:
      return assertNever(state);
  }
};

