/**
 * Summarization client: transcript correction, summary and classification
 * via the Anthropic Messages API.
 *
 * The model is asked for a JSON object. Anything that does not parse into
 * the expected shape is kept as a Degraded result with neutral defaults,
 * so a bad response never blocks the notification.
 */

import type Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import { log } from "./logger.ts";
import type { SummaryResult } from "./types.ts";

const logger = log.child("summarize");

const SUMMARIZE_TIMEOUT_MS = 90_000;
const FALLBACK_SUMMARY_LENGTH = 500;

export class SummarizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SummarizationError";
  }
}

/** One system+user exchange with the model; returns the reply text. */
export type CompletionFn = (system: string, user: string) => Promise<string>;

export interface Summarizer {
  readonly model: string;
  summarize(transcript: string, language: string | null): Promise<SummaryResult>;
}

// ── Response parsing ────────────────────────────────────────

const summarySchema = z.object({
  corrected_text: z.string().nullish(),
  summary: z.string().trim().min(1),
  summary_en: z.string().nullish().catch(null),
  sentiment: z.enum(["positive", "neutral", "negative"]).catch("neutral"),
  emotion: z.string().trim().min(1).catch("neutral"),
  category: z.enum(["sales_inquiry", "existing_order", "new_inquiry", "complaint", "general"]).catch("general"),
  priority: z.enum(["high", "normal", "low"]).catch("normal"),
  email_subject: z.string().nullish().catch(null),
});

export type ParsedSummary =
  | { kind: "parsed"; result: SummaryResult }
  | { kind: "degraded"; result: SummaryResult; reason: string };

function degraded(content: string, transcript: string, reason: string): ParsedSummary {
  return {
    kind: "degraded",
    reason,
    result: {
      corrected_text: transcript,
      summary: content.trim().substring(0, FALLBACK_SUMMARY_LENGTH) || "Processing failed",
      summary_en: null,
      sentiment: "neutral",
      emotion: "neutral",
      category: "general",
      priority: "normal",
      email_subject: null,
    },
  };
}

export function parseSummaryResponse(content: string, transcript: string): ParsedSummary {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return degraded(content, transcript, "no JSON object in response");

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch {
    return degraded(content, transcript, "invalid JSON");
  }

  const parsed = summarySchema.safeParse(raw);
  if (!parsed.success) return degraded(content, transcript, "missing summary");

  const data = parsed.data;
  return {
    kind: "parsed",
    result: {
      corrected_text: data.corrected_text?.trim() || transcript,
      summary: data.summary,
      summary_en: data.summary_en?.trim() || null,
      sentiment: data.sentiment,
      emotion: data.emotion.toLowerCase(),
      category: data.category,
      priority: data.priority,
      email_subject: data.email_subject?.trim() || null,
    },
  };
}

// ── Prompt ──────────────────────────────────────────────────

const SYSTEM_PROMPT = `You process voicemail transcriptions for a customer support team.

1. CORRECT the transcript: fix obvious speech-to-text errors and punctuation. Keep the meaning and the original language. Make minimal changes if it already reads well.
2. SUMMARIZE for support in 2-3 sentences in the transcript's language: who is calling, what they need, any callback number or deadline.
3. TRANSLATE the summary to English (summary_en). If the transcript is already English, repeat the summary.
4. CLASSIFY the call.
5. Write a short email subject (max 60 characters) naming the caller's topic.

Return ONLY a JSON object:
{
  "corrected_text": "...",
  "summary": "...",
  "summary_en": "...",
  "sentiment": "positive" | "neutral" | "negative",
  "emotion": "one word, e.g. calm, frustrated, urgent, friendly",
  "category": "sales_inquiry" | "existing_order" | "new_inquiry" | "complaint" | "general",
  "priority": "high" | "normal" | "low",
  "email_subject": "..."
}`;

export function buildUserPrompt(transcript: string, language: string | null): string {
  return `Process this voicemail transcript (language: ${language || "unknown"}):

TRANSCRIPT:
${transcript}`;
}

// ── Client ──────────────────────────────────────────────────

export function anthropicCompletion(anthropic: Anthropic, model: string): CompletionFn {
  return async (system, user) => {
    const response = await anthropic.messages.create(
      {
        model,
        max_tokens: 2048,
        temperature: 0.3,
        system,
        messages: [{ role: "user", content: user }],
      },
      { timeout: SUMMARIZE_TIMEOUT_MS },
    );

    return response.content
      .filter((b): b is Anthropic.TextBlock => b.type === "text")
      .map(b => b.text)
      .join("");
  };
}

export class LlmSummarizer implements Summarizer {
  constructor(
    private complete: CompletionFn,
    public readonly model: string,
  ) {}

  async summarize(transcript: string, language: string | null): Promise<SummaryResult> {
    const content = await this.complete(SYSTEM_PROMPT, buildUserPrompt(transcript, language));
    if (!content.trim()) throw new SummarizationError("Empty response from model");

    const parsed = parseSummaryResponse(content, transcript);
    if (parsed.kind === "degraded") {
      logger.warn("Summary response degraded", { reason: parsed.reason, length: content.length });
    }
    return parsed.result;
  }
}
