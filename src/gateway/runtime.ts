import { dirname } from "node:path";
import { CatalogDB, CatalogQueryExecutor } from "../catalog/db.js";
import { InsightCache } from "../catalog/insight-cache.js";
import { CatalogInsights } from "../catalog/insights.js";
import { ensureDir, resolveStatePath } from "../config/paths.js";
import type { TicketDeskConfig } from "../config/types.js";
import { DocumentLibrary } from "../documents/library.js";
import { EnquiryStore } from "../enquiry/store.js";
import type { Logger } from "../logging/logger.js";
import { FileSessionMemory } from "../memory/file-store.js";
import { InMemorySessionMemory } from "../memory/in-memory.js";
import type { SessionMemory } from "../memory/types.js";
import { LogNotificationChannel } from "../notifications/log-channel.js";
import { NotificationService } from "../notifications/service.js";
import { ConversationPipeline } from "../pipeline/conversation.js";
import { ConversationService } from "../pipeline/service.js";
import { createOpenAICompletion } from "../reasoning/openai-client.js";
import { JsonReasoningProvider } from "../reasoning/provider.js";
import type { ReasoningProvider } from "../reasoning/types.js";
import { QuerySynthesizer } from "../search/synthesizer.js";
import { createDefaultTools } from "../tools/index.js";
import type { ToolRegistry } from "../tools/registry.js";

export interface Runtime {
  readonly catalog: CatalogDB;
  readonly enquiries: EnquiryStore;
  readonly notifications: NotificationService;
  readonly tools: ToolRegistry;
  readonly pipeline: ConversationPipeline;
  readonly conversations: ConversationService;
  close(): void;
}

export interface RuntimeOptions {
  /** Replaces the OpenAI-backed provider. */
  reasoning?: ReasoningProvider;
  memory?: SessionMemory;
}

/** Wires every component of the service from a loaded config. */
export function createRuntime(
  config: TicketDeskConfig,
  logger: Logger,
  stateDir: string,
  options: RuntimeOptions = {},
): Runtime {
  const reasoning =
    options.reasoning ??
    new JsonReasoningProvider(createOpenAICompletion(config.reasoning), logger.child({ component: "reasoning" }));

  const databasePath =
    config.catalog.database === ":memory:"
      ? config.catalog.database
      : resolveStatePath(stateDir, config.catalog.database);
  if (databasePath !== ":memory:") ensureDir(dirname(databasePath));
  const catalog = new CatalogDB(databasePath);

  const insights = new CatalogInsights(catalog, new InsightCache(), logger.child({ component: "insights" }));
  const synthesizer = new QuerySynthesizer(
    reasoning,
    new CatalogQueryExecutor(catalog),
    logger.child({ component: "search" }),
    { baseUrl: config.catalog.baseUrl },
  );

  const notifications = new NotificationService(
    new LogNotificationChannel(
      logger,
      config.notifications.logPath ? resolveStatePath(stateDir, config.notifications.logPath) : undefined,
    ),
    config.notifications.replyBaseUrl,
    logger.child({ component: "notifications" }),
  );
  const enquiries = new EnquiryStore(catalog);
  const documents = new DocumentLibrary(config.documents?.dir);

  const tools = createDefaultTools({ synthesizer, insights, documents, enquiries, notifications });
  const pipeline = new ConversationPipeline(reasoning, tools, logger.child({ component: "pipeline" }), {
    guardrails: config.guardrails,
    agent: config.agent,
    experiment: config.experiment,
  });

  const memory =
    options.memory ??
    (config.memory.backend === "file"
      ? new FileSessionMemory(stateDir, logger.child({ component: "memory" }), config.memory.rounds)
      : new InMemorySessionMemory(config.memory.rounds));
  const conversations = new ConversationService(pipeline, memory, logger, config.memory.rounds);

  return {
    catalog,
    enquiries,
    notifications,
    tools,
    pipeline,
    conversations,
    close: () => catalog.close(),
  };
}
