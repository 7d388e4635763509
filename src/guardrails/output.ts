import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { validateOutputContract } from "../reasoning/contracts.js";
import type { ReasoningProvider } from "../reasoning/types.js";
import {
  COMPETITORS,
  DATABASE_QUERY,
  EXTERNAL_PLATFORM,
  INTERNAL_REFERENCE,
  QUERY_DETAILS,
  REDACTED,
  escapeRegExp,
  mergePhrases,
} from "./patterns.js";
import {
  type GuardrailStage,
  type OutputCheck,
  type OutputVerdict,
  type OutputViolation,
  isOutputViolation,
  verdict,
} from "./types.js";

const SQL_FENCE = /```sql[\s\S]*?```/gi;
// Upper-case keywords only, so prose like "select a seat from the map" survives.
const INLINE_SELECT = /\bSELECT\b.*?\bFROM\b.*?(?=[.;\n]|$)/g;
const LABELLED_SECRET = /\b(api[_ -]?key|token|password|secret)(\s*[:=]\s*)[^\s,;]+/gi;
const BARE_SECRET = /\bsk-[A-Za-z0-9_-]{16,}/g;
const INTERNAL_NAMES = /\b(booking_enquiries|enquiry_replies|event_occurrences|sqlite_master)\b/gi;
const LEAKAGE_PHRASES = /\b(system prompt|database schema|connection string|instructions:)/i;

export interface PatternScan {
  readonly text: string;
  readonly flags: readonly OutputViolation[];
}

export interface OutputGuardrailOptions {
  semantic: boolean;
  competitors?: readonly string[];
}

/**
 * Sanitizes an answer before delivery. Redactions always apply; the semantic
 * layer may rewrite the answer. Violations are logged, never surfaced.
 */
export class OutputGuardrail implements GuardrailStage<OutputCheck, OutputViolation> {
  private readonly competitorPattern: RegExp;

  constructor(
    private readonly reasoning: ReasoningProvider,
    private readonly logger: Logger,
    private readonly options: OutputGuardrailOptions,
  ) {
    const names = mergePhrases(COMPETITORS, options.competitors).map(escapeRegExp);
    this.competitorPattern = new RegExp(names.join("|"), "gi");
  }

  /** Pattern layer: redactions plus the kinds they indicate. */
  scan(answer: string): PatternScan {
    const flags = new Set<OutputViolation>();
    let text = answer;

    const replace = (pattern: RegExp, replacement: string, kind: OutputViolation): void => {
      const next = text.replace(pattern, replacement);
      if (next !== text) flags.add(kind);
      text = next;
    };

    replace(this.competitorPattern, EXTERNAL_PLATFORM, "competitor_mention");
    replace(SQL_FENCE, QUERY_DETAILS, "system_leakage");
    replace(INLINE_SELECT, DATABASE_QUERY, "system_leakage");
    replace(LABELLED_SECRET, `$1$2${REDACTED}`, "system_leakage");
    replace(BARE_SECRET, REDACTED, "system_leakage");
    replace(INTERNAL_NAMES, INTERNAL_REFERENCE, "system_leakage");
    if (LEAKAGE_PHRASES.test(text)) flags.add("system_leakage");

    return { text, flags: [...flags] };
  }

  async validate(check: OutputCheck, opts: { signal?: AbortSignal } = {}): Promise<OutputVerdict> {
    const layer1 = this.scan(check.answer);
    if (layer1.flags.length > 0) {
      this.logger.warn({ flags: layer1.flags }, "Answer redacted by pattern check");
    }
    const patternVerdict = verdict<OutputViolation>({
      isAcceptable: layer1.flags.length === 0,
      violationKind: layer1.flags[0] ?? null,
      userMessage: null,
      sanitizedContent: layer1.text,
    });
    if (!this.options.semantic) return patternVerdict;

    try {
      const out = await this.reasoning.invoke(
        validateOutputContract,
        { answer: layer1.text, userMessage: check.userMessage, pageContext: check.pageContext },
        { signal: opts.signal },
      );
      if (out.acceptable) return patternVerdict;

      const reported = out.violationKind;
      const kind =
        (reported && isOutputViolation(reported) ? reported : undefined) ?? layer1.flags[0] ?? "policy_violation";
      this.logger.warn({ violationKind: kind, reported, note: out.note }, "Answer rewritten by semantic check");
      const rewritten = out.sanitized.trim();
      return verdict<OutputViolation>({
        isAcceptable: false,
        violationKind: kind,
        userMessage: null,
        sanitizedContent: rewritten.length > 0 ? this.scan(rewritten).text : layer1.text,
      });
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Semantic output check failed, using pattern result");
      return patternVerdict;
    }
  }
}
