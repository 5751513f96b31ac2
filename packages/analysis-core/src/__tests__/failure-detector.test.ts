import { describe, it, expect } from "vitest";
import type { DialogueTurn, Transcript } from "@callreplay/shared";
import { FailureDetector } from "../failure-detector.js";

function transcript(turns: Array<[DialogueTurn["speaker"], string]>): Transcript {
  return {
    call_id: "call-1",
    dialog: turns.map(([speaker, text]) => ({ speaker, text })),
  };
}

const detector = new FailureDetector();

describe("FailureDetector short calls", () => {
  it("flags calls with fewer than 3 turns without running detectors", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "Thanks, that's perfect"],
        ["bot", "You're welcome, have a great evening."],
      ]),
    );
    expect(verdict).toEqual({
      failed: true,
      confidence: 0.8,
      reasons: ["Call too short - likely incomplete"],
      call_length: 2,
      raw_score: 0.8,
    });
  });

  it("flags an empty dialog the same way", () => {
    const verdict = detector.evaluate(transcript([]));
    expect(verdict.failed).toBe(true);
    expect(verdict.confidence).toBe(0.8);
    expect(verdict.call_length).toBe(0);
  });

  it("runs the heuristics for exactly 3 turns", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "Do you deliver to Bandra?"],
        ["bot", "We are open 11 to 10."],
        ["user", "That's not what I asked!"],
      ]),
    );
    expect(verdict.failed).toBe(true);
    expect(verdict.confidence).toBeGreaterThanOrEqual(0.4);
    expect(verdict.confidence).toBeCloseTo(0.6);
    expect(verdict.reasons).toEqual([
      "User frustration detected: 'that's not what i asked'",
      "Conversation ended very early",
      "Conversation ended with user question/request",
    ]);
    expect(verdict.call_length).toBe(3);
  });
});

describe("FailureDetector weighted sum", () => {
  it("sums frustration and confusion weights to 0.7", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "Hi, I want to book a table for two tonight"],
        ["bot", "Sure, what time would you like to come in?"],
        ["user", "You are useless, I already said tonight at eight"],
        ["bot", "I'm sorry, let me check availability for eight o'clock."],
        ["user", "Okay, go ahead"],
        ["bot", "Your table for two at eight o'clock is confirmed."],
      ]),
    );
    expect(verdict.raw_score).toBeCloseTo(0.7);
    expect(verdict.confidence).toBeCloseTo(0.7);
    expect(verdict.failed).toBe(true);
    expect(verdict.reasons).toEqual([
      "User frustration detected: 'useless'",
      "Bot confusion detected: 'i'm sorry'",
    ]);
  });

  it("clamps the reported confidence when all five detectors fire", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "Hello, can I order a pizza?"],
        ["bot", "Sorry?"],
        ["user", "I want a pizza"],
        ["bot", "Sorry?"],
        ["user", "This is ridiculous"],
        ["bot", "Okay."],
        ["bot", "I'm not sure I can do that right now."],
        ["user", "Can you help me or not?"],
      ]),
    );
    expect(verdict.raw_score).toBeCloseTo(1.4);
    expect(verdict.confidence).toBe(1);
    expect(verdict.failed).toBe(true);
    expect(verdict.reasons).toEqual([
      "User frustration detected: 'this is ridiculous'",
      "Bot repeated responses: 1 unique responses repeated",
      "Multiple very short bot responses: 3",
      "Bot confusion detected: 'i'm not sure'",
      "Conversation ended with user question/request",
    ]);
  });

  it("compares the threshold against the unclamped sum", () => {
    // A threshold above 1.0 can only be met by the raw sum, never by the reported value.
    const strict = new FailureDetector({ failureThreshold: 1.2 });
    const verdict = strict.evaluate(
      transcript([
        ["user", "Hello, can I order a pizza?"],
        ["bot", "Sorry?"],
        ["user", "I want a pizza"],
        ["bot", "Sorry?"],
        ["user", "This is ridiculous"],
        ["bot", "Okay."],
        ["bot", "I'm not sure I can do that right now."],
        ["user", "Can you help me or not?"],
      ]),
    );
    expect(verdict.confidence).toBe(1);
    expect(verdict.failed).toBe(true);
  });

  it("counts a detector once even when several turns match", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "Hello? Anyone?"],
        ["bot", "Welcome to Luigi's, how can I help you today?"],
        ["user", "This is ridiculous, I've been waiting forever"],
        ["bot", "Let me take your order right away."],
        ["bot", "Your order has been placed successfully."],
      ]),
    );
    expect(verdict.reasons).toEqual([
      "User frustration detected: 'hello?'",
      "User frustration detected: 'this is ridiculous'",
    ]);
    expect(verdict.raw_score).toBeCloseTo(0.4);
    expect(verdict.failed).toBe(true);
  });

  it("stops scanning a turn at the first keyword in list order", () => {
    const verdict = detector.evaluate(
      transcript([
        ["bot", "Thanks for calling, how can I help?"],
        ["user", "What? That makes no sense, you idiot"],
        ["bot", "Let me connect you with the manager."],
        ["user", "Fine, thank you"],
        ["bot", "Transferring you to the manager now."],
      ]),
    );
    expect(verdict.reasons).toEqual(["User frustration detected: 'what?'"]);
  });
});

describe("FailureDetector passing calls", () => {
  it("does not flag a clean order", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "Hi, I'd like to order a pizza"],
        ["bot", "Great! What size would you like?"],
        ["user", "Large please"],
        ["bot", "Perfect! Your large pizza will be ready in 25 minutes."],
        ["user", "Thank you!"],
      ]),
    );
    expect(verdict).toEqual({
      failed: false,
      confidence: 0,
      reasons: [],
      call_length: 5,
      raw_score: 0,
    });
  });

  it("keeps a lone flow issue below the threshold", () => {
    const verdict = detector.evaluate(
      transcript([
        ["user", "I'd like to order a large pizza"],
        ["bot", "Sure."],
        ["user", "Pepperoni with extra cheese please"],
        ["bot", "Got it."],
        ["user", "And a garlic bread too"],
        ["bot", "Okay!"],
      ]),
    );
    expect(verdict.failed).toBe(false);
    expect(verdict.confidence).toBeCloseTo(0.2);
    expect(verdict.reasons).toEqual(["Multiple very short bot responses: 3"]);
  });

  it("respects a custom short-response threshold", () => {
    const lenient = new FailureDetector({ shortResponseThreshold: 5 });
    const verdict = lenient.evaluate(
      transcript([
        ["user", "I'd like to order a large pizza"],
        ["bot", "Sure."],
        ["user", "Pepperoni with extra cheese please"],
        ["bot", "Got it."],
        ["user", "And a garlic bread too"],
        ["bot", "Okay!"],
      ]),
    );
    expect(verdict.reasons).toEqual([]);
    expect(verdict.failed).toBe(false);
  });
});

describe("FailureDetector.describe", () => {
  it("reports the configured lists and thresholds", () => {
    expect(detector.describe()).toEqual({
      frustration_keywords_count: 15,
      bot_confusion_patterns_count: 6,
      short_response_threshold: 10,
      failure_threshold: 0.3,
    });
  });
});
