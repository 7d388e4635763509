import type { ExperimentModule, Variant } from "../experiment/types.js";

export interface TicketDeskConfig {
  readonly gateway: GatewayConfig;
  readonly logging?: LoggingConfig;
  readonly reasoning: ReasoningConfig;
  readonly catalog: CatalogConfig;
  readonly agent: AgentConfig;
  readonly guardrails: GuardrailsConfig;
  readonly experiment: ExperimentSettings;
  readonly notifications: NotificationsConfig;
  readonly memory: MemoryConfig;
  readonly documents?: DocumentsConfig;
}

export interface GatewayConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface ReasoningConfig {
  readonly provider: "openai";
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly temperature: number;
  readonly timeoutMs: number;
}

export interface CatalogConfig {
  /** SQLite file, relative paths resolve against the state directory. */
  readonly database: string;
  /** Public site used to build event links. */
  readonly baseUrl: string;
}

export interface AgentConfig {
  readonly maxIterations: number;
}

export interface GuardrailLayerConfig {
  readonly semantic: boolean;
}

export interface GuardrailsConfig {
  readonly input: GuardrailLayerConfig;
  readonly output: GuardrailLayerConfig;
  /** Extra competitor names appended to the built-in list. */
  readonly competitors: string[];
  /** Extra injection phrases appended to the built-in list. */
  readonly injectionPhrases: string[];
}

export interface VariantProfiles {
  /** Iteration ceiling per variant; never raises `agent.maxIterations`. */
  readonly agentIterations: Record<Variant, number>;
  /** Whether the semantic guardrail layer runs for a variant. */
  readonly semanticGuardrail: Record<Variant, boolean>;
}

export interface ExperimentSettings {
  readonly enabled: boolean;
  readonly moduleToTest: ExperimentModule;
  readonly ratioA: number;
  readonly ratioB: number;
  readonly profiles: VariantProfiles;
}

export interface NotificationsConfig {
  readonly channel: "log";
  /** JSON-lines file for the log channel; omitted means the application logger. */
  readonly logPath?: string;
  /** Base URL merchants use to answer an enquiry. */
  readonly replyBaseUrl: string;
}

export interface MemoryConfig {
  readonly backend: "memory" | "file";
  readonly rounds: number;
}

export interface DocumentsConfig {
  readonly dir: string;
}
