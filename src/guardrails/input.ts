import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { validateInputContract } from "../reasoning/contracts.js";
import type { ReasoningProvider } from "../reasoning/types.js";
import {
  COMPETITORS,
  COMPETITOR_REDIRECT,
  DEFAULT_REDIRECT,
  INJECTION_PHRASES,
  INJECTION_REDIRECT,
  findPhrase,
  mergePhrases,
} from "./patterns.js";
import {
  type GuardrailStage,
  type InputCheck,
  type InputVerdict,
  type InputViolation,
  isInputViolation,
  verdict,
} from "./types.js";

export interface InputGuardrailOptions {
  /** Run the semantic layer after the pattern layer passes. */
  semantic: boolean;
  injectionPhrases?: readonly string[];
  competitors?: readonly string[];
}

/**
 * Screens a user message before any reasoning happens. Pattern matches
 * reject immediately; otherwise the semantic layer decides. A failing
 * semantic layer lets the message through.
 */
export class InputGuardrail implements GuardrailStage<InputCheck, InputViolation> {
  private readonly injectionPhrases: string[];
  private readonly competitors: string[];

  constructor(
    private readonly reasoning: ReasoningProvider,
    private readonly logger: Logger,
    private readonly options: InputGuardrailOptions,
  ) {
    this.injectionPhrases = mergePhrases(INJECTION_PHRASES, options.injectionPhrases);
    this.competitors = mergePhrases(COMPETITORS, options.competitors);
  }

  /** Pattern layer only. */
  checkPatterns(message: string): InputVerdict | null {
    const phrase = findPhrase(message, this.injectionPhrases);
    if (phrase) {
      this.logger.warn({ phrase }, "Prompt injection pattern detected");
      return reject("prompt_injection", INJECTION_REDIRECT, message);
    }
    const competitor = findPhrase(message, this.competitors);
    if (competitor) {
      this.logger.info({ competitor }, "Competitor mentioned in input");
      return reject("out_of_scope", COMPETITOR_REDIRECT, message);
    }
    return null;
  }

  async validate(check: InputCheck, opts: { signal?: AbortSignal } = {}): Promise<InputVerdict> {
    const blocked = this.checkPatterns(check.userMessage);
    if (blocked) return blocked;

    const passed = verdict<InputViolation>({
      isAcceptable: true,
      violationKind: null,
      userMessage: null,
      sanitizedContent: check.userMessage,
    });
    if (!this.options.semantic) return passed;

    try {
      const out = await this.reasoning.invoke(
        validateInputContract,
        {
          userMessage: check.userMessage,
          history: [...check.history],
          pageContext: check.pageContext,
        },
        { signal: opts.signal },
      );
      if (out.acceptable) return passed;

      const kind = out.violationKind && isInputViolation(out.violationKind) ? out.violationKind : "out_of_scope";
      this.logger.warn({ violationKind: kind, reported: out.violationKind }, "Input rejected by semantic check");
      return reject(kind, out.userMessage.trim() || DEFAULT_REDIRECT, check.userMessage);
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Semantic input check failed, continuing");
      return passed;
    }
  }
}

function reject(kind: InputViolation, message: string, original: string): InputVerdict {
  return verdict<InputViolation>({
    isAcceptable: false,
    violationKind: kind,
    userMessage: message,
    sanitizedContent: original,
  });
}
