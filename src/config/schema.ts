import { z } from "zod";
import { EXPERIMENT_MODULES } from "../experiment/types.js";
import type { TicketDeskConfig } from "./types.js";

const gatewaySchema = z.object({
  port: z.number().int().positive().default(8787),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const reasoningSchema = z.object({
  provider: z.literal("openai").default("openai"),
  model: z.string().min(1).default("gpt-4o-mini"),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.2),
  timeoutMs: z.number().int().positive().default(30_000),
});

const catalogSchema = z.object({
  database: z.string().min(1).default("catalog.db"),
  baseUrl: z.string().url().default("https://tickets.example.com"),
});

const agentSchema = z.object({
  maxIterations: z.number().int().min(1).max(50).default(10),
});

const layerSchema = z.object({
  semantic: z.boolean().default(true),
});

const guardrailsSchema = z.object({
  input: layerSchema.default({}),
  output: layerSchema.default({}),
  competitors: z.array(z.string().min(1)).default([]),
  injectionPhrases: z.array(z.string().min(1)).default([]),
});

const ratioSchema = z.number().int().min(0).max(100);

const experimentSchema = z
  .object({
    enabled: z.boolean().default(false),
    moduleToTest: z.enum(EXPERIMENT_MODULES).default("pre_guardrail"),
    ratioA: ratioSchema.default(0),
    ratioB: ratioSchema.default(0),
    profiles: z
      .object({
        agentIterations: z
          .object({
            control: z.number().int().min(1).default(10),
            variant_a: z.number().int().min(1).default(5),
            variant_b: z.number().int().min(1).default(8),
          })
          .default({}),
        semanticGuardrail: z
          .object({
            control: z.boolean().default(true),
            variant_a: z.boolean().default(false),
            variant_b: z.boolean().default(true),
          })
          .default({}),
      })
      .default({}),
  })
  .refine((e) => e.ratioA + e.ratioB <= 100, {
    message: "experiment.ratioA + experiment.ratioB must not exceed 100",
    path: ["ratioB"],
  });

const notificationsSchema = z.object({
  channel: z.literal("log").default("log"),
  logPath: z.string().optional(),
  replyBaseUrl: z.string().url().default("https://tickets.example.com/merchant/enquiries"),
});

const memorySchema = z.object({
  backend: z.enum(["memory", "file"]).default("memory"),
  rounds: z.number().int().min(1).max(100).default(10),
});

export const ticketDeskConfigSchema = z.object({
  gateway: gatewaySchema.default({}),
  logging: loggingSchema.default({}),
  reasoning: reasoningSchema.default({}),
  catalog: catalogSchema.default({}),
  agent: agentSchema.default({}),
  guardrails: guardrailsSchema.default({}),
  experiment: experimentSchema.default({}),
  notifications: notificationsSchema.default({}),
  memory: memorySchema.default({}),
  documents: z.object({ dir: z.string().min(1) }).optional(),
});

export function parseConfig(raw: unknown): TicketDeskConfig {
  return ticketDeskConfigSchema.parse(raw);
}
