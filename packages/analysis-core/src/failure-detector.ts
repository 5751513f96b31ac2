import type { DialogueTurn, Transcript } from "@callreplay/shared";
import type {
  DetectorHit,
  FailureDetectorConfig,
  FailureDetectorSummary,
  PrefilterVerdict,
} from "./types.js";

// ── Phrase lists ──────────────────────────────────────────────

/** Phrases that indicate the caller is frustrated or lost. */
export const FRUSTRATION_KEYWORDS = [
  "not helpful",
  "hello?",
  "what?",
  "you there?",
  "makes no sense",
  "that's not what i asked",
  "i don't understand",
  "wrong answer",
  "that doesn't help",
  "can you hear me",
  "are you listening",
  "this is ridiculous",
  "useless",
  "stupid",
  "idiot",
] as const;

/** Phrases that suggest the bot is uncertain. */
export const CONFUSION_PHRASES = [
  "i don't understand",
  "could you repeat",
  "i'm not sure",
  "let me try to help",
  "i apologize",
  "i'm sorry",
] as const;

const QUESTION_MARKERS = ["?", "help", "what", "how"] as const;

// ── Weights ───────────────────────────────────────────────────

export const DETECTOR_WEIGHTS = {
  userFrustration: 0.4,
  botRepetition: 0.3,
  flowIssues: 0.2,
  botConfusion: 0.3,
  abruptEnding: 0.2,
} as const;

const SHORT_CALL_TURNS = 3;
const SHORT_CALL_CONFIDENCE = 0.8;
const EARLY_END_TURNS = 5;
const MAX_SHORT_BOT_RESPONSES = 2;

const DEFAULT_CONFIG: Required<FailureDetectorConfig> = {
  frustrationKeywords: FRUSTRATION_KEYWORDS,
  confusionPhrases: CONFUSION_PHRASES,
  shortResponseThreshold: 10,
  failureThreshold: 0.3,
};

function firstMatch(text: string, phrases: readonly string[]): string | undefined {
  const lower = text.toLowerCase();
  return phrases.find((phrase) => lower.includes(phrase));
}

/**
 * Heuristic prefilter deciding whether a transcript is worth a model call.
 * Pure and deterministic: no I/O, never throws.
 */
export class FailureDetector {
  private readonly config: Required<FailureDetectorConfig>;

  constructor(config?: FailureDetectorConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  evaluate(transcript: Transcript): PrefilterVerdict {
    const { dialog } = transcript;

    if (dialog.length < SHORT_CALL_TURNS) {
      return {
        failed: true,
        confidence: SHORT_CALL_CONFIDENCE,
        reasons: ["Call too short - likely incomplete"],
        call_length: dialog.length,
        raw_score: SHORT_CALL_CONFIDENCE,
      };
    }

    const detectors: Array<[DetectorHit, number]> = [
      [this.detectUserFrustration(dialog), DETECTOR_WEIGHTS.userFrustration],
      [this.detectBotRepetition(dialog), DETECTOR_WEIGHTS.botRepetition],
      [this.detectFlowIssues(dialog), DETECTOR_WEIGHTS.flowIssues],
      [this.detectBotConfusion(dialog), DETECTOR_WEIGHTS.botConfusion],
      [this.detectAbruptEnding(dialog), DETECTOR_WEIGHTS.abruptEnding],
    ];

    const reasons: string[] = [];
    let rawScore = 0;
    for (const [hit, weight] of detectors) {
      if (!hit.detected) continue;
      reasons.push(...hit.reasons);
      rawScore += weight;
    }

    // Threshold is checked against the unclamped sum; only the reported value is clamped.
    return {
      failed: rawScore >= this.config.failureThreshold,
      confidence: Math.min(rawScore, 1),
      reasons,
      call_length: dialog.length,
      raw_score: rawScore,
    };
  }

  describe(): FailureDetectorSummary {
    return {
      frustration_keywords_count: this.config.frustrationKeywords.length,
      bot_confusion_patterns_count: this.config.confusionPhrases.length,
      short_response_threshold: this.config.shortResponseThreshold,
      failure_threshold: this.config.failureThreshold,
    };
  }

  private detectUserFrustration(dialog: readonly DialogueTurn[]): DetectorHit {
    const reasons: string[] = [];
    for (const turn of dialog) {
      if (turn.speaker !== "user") continue;
      const keyword = firstMatch(turn.text, this.config.frustrationKeywords);
      if (keyword) {
        reasons.push(`User frustration detected: '${keyword}'`);
      }
    }
    return { detected: reasons.length > 0, reasons };
  }

  private detectBotRepetition(dialog: readonly DialogueTurn[]): DetectorHit {
    const counts = new Map<string, number>();
    for (const turn of dialog) {
      if (turn.speaker !== "bot") continue;
      const text = turn.text.trim();
      counts.set(text, (counts.get(text) ?? 0) + 1);
    }

    const repeated = [...counts.values()].filter((count) => count >= 2).length;
    if (repeated === 0) return { detected: false, reasons: [] };
    return {
      detected: true,
      reasons: [`Bot repeated responses: ${repeated} unique responses repeated`],
    };
  }

  private detectFlowIssues(dialog: readonly DialogueTurn[]): DetectorHit {
    const shortResponses = dialog.filter(
      (turn) =>
        turn.speaker === "bot" &&
        turn.text.trim().length < this.config.shortResponseThreshold,
    ).length;

    if (shortResponses <= MAX_SHORT_BOT_RESPONSES) return { detected: false, reasons: [] };
    return {
      detected: true,
      reasons: [`Multiple very short bot responses: ${shortResponses}`],
    };
  }

  private detectBotConfusion(dialog: readonly DialogueTurn[]): DetectorHit {
    const reasons: string[] = [];
    for (const turn of dialog) {
      if (turn.speaker !== "bot") continue;
      const phrase = firstMatch(turn.text, this.config.confusionPhrases);
      if (phrase) {
        reasons.push(`Bot confusion detected: '${phrase}'`);
      }
    }
    return { detected: reasons.length > 0, reasons };
  }

  private detectAbruptEnding(dialog: readonly DialogueTurn[]): DetectorHit {
    const reasons: string[] = [];

    if (dialog.length < EARLY_END_TURNS) {
      reasons.push("Conversation ended very early");
    }

    const last = dialog[dialog.length - 1];
    if (last?.speaker === "user" && firstMatch(last.text, QUESTION_MARKERS)) {
      reasons.push("Conversation ended with user question/request");
    }

    return { detected: reasons.length > 0, reasons };
  }
}
