import { z } from "zod";
import type { ComparisonVerdict, Decision } from "../types/decision.js";
import { errorMessage } from "../utils/errors.js";

export const RISK_LEVELS = ["low", "medium", "high", "critical"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const MAX_INSIGHTS = 5;
export const MAX_ADVISORY_QUESTIONS = 3;
export const MAX_ITEM_LENGTH = 300;
export const MAX_TEXT_LENGTH = 500;

const AdvisoryRecordSchema = z
  .object({
    riskLevel: z.enum(RISK_LEVELS),
    summary: z.string().max(MAX_TEXT_LENGTH).optional(),
    insights: z.array(z.string().trim().min(1).max(MAX_ITEM_LENGTH)).max(MAX_INSIGHTS).default([]),
    questions: z
      .array(z.string().trim().min(1).max(MAX_ITEM_LENGTH))
      .max(MAX_ADVISORY_QUESTIONS)
      .default([]),
    explanation: z.string().max(MAX_TEXT_LENGTH).optional(),
  })
  .strict();

export type AdvisoryRecord = z.infer<typeof AdvisoryRecordSchema>;

export type AttachedAdvisory = Readonly<
  Omit<AdvisoryRecord, "insights" | "questions"> & {
    insights: readonly string[];
    questions: readonly string[];
  }
>;

export type AdvisedDecision = Readonly<{
  decision: Decision;
  advisory: AttachedAdvisory;
}>;

export type AttachResult =
  | { ok: true; advised: AdvisedDecision }
  | { ok: false; issues: string[] };

/**
 * Validates an untrusted advisory payload against the decision it comments
 * on. Anything out of schema is rejected whole, never trimmed into shape.
 * A FLAGGED decision cannot carry a "low" risk level.
 */
export function attachAdvisory(decision: Decision, raw: unknown): AttachResult {
  const schema = AdvisoryRecordSchema.superRefine((rec, ctx) => {
    if (decision.status === "FLAGGED" && rec.riskLevel === "low") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["riskLevel"],
        message: "risk level cannot be low for a FLAGGED decision",
      });
    }
  });

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    };
  }

  const advisory: AttachedAdvisory = Object.freeze({
    ...parsed.data,
    insights: Object.freeze([...parsed.data.insights]),
    questions: Object.freeze([...parsed.data.questions]),
  });

  return { ok: true, advised: Object.freeze({ decision, advisory }) };
}

export type AdvisoryInput = Readonly<{
  invoiceId: string;
  vendorId: string;
  verdicts: readonly ComparisonVerdict[];
  decision: Decision;
}>;

export type AdvisoryProvider = (input: AdvisoryInput, signal: AbortSignal) => Promise<unknown>;

export type AdvisoryOutcome =
  | { status: "attached"; advised: AdvisedDecision; latencyMs: number }
  | { status: "rejected"; issues: string[]; latencyMs: number }
  | { status: "unavailable"; reason: string; latencyMs: number }
  | { status: "timeout"; latencyMs: number };

const TIMED_OUT = Symbol("advisory-timeout");

/**
 * Asks the advisory provider about an already final decision. Never throws:
 * a missing, failing or slow provider yields an outcome the caller can log
 * and move past.
 */
export async function requestAdvisory(
  provider: AdvisoryProvider | null,
  input: AdvisoryInput,
  opts: { timeoutMs: number }
): Promise<AdvisoryOutcome> {
  if (!provider) {
    return { status: "unavailable", reason: "No advisory provider configured.", latencyMs: 0 };
  }

  const started = Date.now();
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(TIMED_OUT);
    }, opts.timeoutMs);
  });

  try {
    const raw = await Promise.race([provider(input, controller.signal), timeout]);
    const latencyMs = Date.now() - started;

    if (raw === TIMED_OUT) {
      console.warn(`[advisory] ${input.invoiceId}: provider timed out after ${opts.timeoutMs}ms`);
      return { status: "timeout", latencyMs };
    }

    const attached = attachAdvisory(input.decision, raw);
    if (!attached.ok) {
      console.warn(`[advisory] ${input.invoiceId}: rejected record (${attached.issues.join("; ")})`);
      return { status: "rejected", issues: attached.issues, latencyMs };
    }

    return { status: "attached", advised: attached.advised, latencyMs };
  } catch (err) {
    const reason = errorMessage(err);
    console.warn(`[advisory] ${input.invoiceId}: provider failed (${reason})`);
    return { status: "unavailable", reason, latencyMs: Date.now() - started };
  } finally {
    clearTimeout(timer);
  }
}
