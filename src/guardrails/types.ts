import type { ConversationTurn } from "../memory/types.js";

export const INPUT_VIOLATIONS = [
  "prompt_injection",
  "out_of_scope",
  "safety_violation",
  "pii_detected",
  "malicious_intent",
] as const;
export type InputViolation = (typeof INPUT_VIOLATIONS)[number];

export const OUTPUT_VIOLATIONS = [
  "competitor_mention",
  "system_leakage",
  "price_violation",
  "policy_violation",
  "brand_voice_issue",
  "inappropriate_content",
] as const;
export type OutputViolation = (typeof OUTPUT_VIOLATIONS)[number];

export type ViolationKind = InputViolation | OutputViolation;

export function isInputViolation(kind: string): kind is InputViolation {
  return INPUT_VIOLATIONS.some((v) => v === kind);
}

export function isOutputViolation(kind: string): kind is OutputViolation {
  return OUTPUT_VIOLATIONS.some((v) => v === kind);
}

export interface GuardrailVerdict<K extends ViolationKind = ViolationKind> {
  readonly isAcceptable: boolean;
  readonly violationKind: K | null;
  /** Redirect text shown to the user when input is rejected. */
  readonly userMessage: string | null;
  /** Content after redaction; for input stages the original message. */
  readonly sanitizedContent: string;
}

export type InputVerdict = GuardrailVerdict<InputViolation>;
export type OutputVerdict = GuardrailVerdict<OutputViolation>;

export interface InputCheck {
  userMessage: string;
  history: readonly ConversationTurn[];
  pageContext: string;
}

export interface OutputCheck {
  answer: string;
  userMessage: string;
  pageContext: string;
}

export interface GuardrailStage<C, K extends ViolationKind> {
  validate(check: C, options?: { signal?: AbortSignal }): Promise<GuardrailVerdict<K>>;
}

export function verdict<K extends ViolationKind>(fields: GuardrailVerdict<K>): GuardrailVerdict<K> {
  return Object.freeze({ ...fields });
}
