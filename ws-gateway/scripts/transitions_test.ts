import assert from "node:assert/strict";
import { test } from "node:test";
import { sessionStates } from "../src/session.js";
import { transition } from "../src/transitions.js";

test("idle starts a flow, with or without payment", () => {
  assert.equal(transition("idle", { type: "flow_requested", flow: "automated", paymentRequired: false }), "awaiting_question");
  assert.equal(
    transition("idle", { type: "flow_requested", flow: "custom", paymentRequired: false }),
    "awaiting_custom_question"
  );
  assert.equal(transition("idle", { type: "flow_requested", flow: "custom", paymentRequired: true }), "awaiting_payment");
});

test("payment resolves into the requested flow or back to idle", () => {
  assert.equal(transition("awaiting_payment", { type: "payment_confirmed", flow: "automated" }), "awaiting_question");
  assert.equal(transition("awaiting_payment", { type: "payment_confirmed", flow: "custom" }), "awaiting_custom_question");
  assert.equal(transition("awaiting_payment", { type: "payment_failed" }), "idle");
});

test("question and card steps lead to processing", () => {
  assert.equal(transition("awaiting_question", { type: "question_accepted" }), "processing");
  assert.equal(transition("awaiting_custom_question", { type: "question_accepted" }), "awaiting_cards");
  assert.equal(transition("awaiting_cards", { type: "entities_resolved" }), "processing");
});

test("processing always ends in idle", () => {
  assert.equal(transition("processing", { type: "generation_succeeded" }), "idle");
  assert.equal(transition("processing", { type: "generation_failed" }), "idle");
});

test("reset reaches idle from every state", () => {
  for (const state of sessionStates) {
    assert.equal(transition(state, { type: "reset" }), "idle");
  }
});

test("events outside the table are rejected", () => {
  assert.equal(transition("idle", { type: "question_accepted" }), null);
  assert.equal(transition("idle", { type: "payment_confirmed", flow: "automated" }), null);
  assert.equal(
    transition("awaiting_question", { type: "flow_requested", flow: "custom", paymentRequired: false }),
    null
  );
  assert.equal(transition("awaiting_cards", { type: "question_accepted" }), null);
  assert.equal(transition("processing", { type: "entities_resolved" }), null);
  assert.equal(transition("awaiting_payment", { type: "generation_succeeded" }), null);
});
