import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { CatalogDB } from "../catalog/db.js";
import { recordMerchantReply } from "../enquiry/replies.js";
import type { EnquiryStore } from "../enquiry/store.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { NotificationService } from "../notifications/service.js";
import type { ConversationService } from "../pipeline/service.js";

export const VERSION = "0.1.0";

const chatSchema = z.object({
  message: z.string().trim().min(1).max(4000),
  userId: z.string().min(1),
  sessionId: z.string().min(1),
  pageContext: z.string().optional(),
  personalization: z.string().optional(),
});

const messagesSchema = z.object({
  sessionId: z.string().min(1),
});

const replySchema = z.object({
  replyMessage: z.string().trim().min(1).max(10_000),
  replyChannel: z.enum(["email", "whatsapp", "api"]).default("api"),
});

export interface GatewayServerDeps {
  conversations: ConversationService;
  enquiries: EnquiryStore;
  notifications: NotificationService;
  catalog: CatalogDB;
  logger: Logger;
}

export class GatewayServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(
    private readonly deps: GatewayServerDeps,
    private readonly port: number,
    private readonly hostname: string,
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const { conversations, enquiries, notifications, catalog, logger } = this.deps;

    this.app.get("/health", (c) => {
      const mem = process.memoryUsage();
      const catalogOpen = catalog.isOpen();
      return c.json({
        status: catalogOpen ? "ok" : "degraded",
        version: VERSION,
        uptime: Date.now() - this.startedAt,
        uptimeHuman: formatUptime(Date.now() - this.startedAt),
        catalog: { open: catalogOpen },
        notifications: { channel: notifications.channelName },
        system: {
          memoryMB: {
            rss: Math.round(mem.rss / 1024 / 1024),
            heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
          },
          nodeVersion: process.version,
          pid: process.pid,
        },
      });
    });

    this.app.post("/chat", async (c) => {
      const parsed = chatSchema.safeParse(await readJson(c.req.raw));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const body = parsed.data;
      try {
        const result = await conversations.chat(body, undefined, { signal: c.req.raw.signal });
        return c.json({
          message: result.answer,
          sessionId: body.sessionId,
          stage: result.stage,
        });
      } catch (err) {
        logger.error({ err, sessionId: body.sessionId }, "Chat request failed");
        return c.json({ error: errorMessage(err) }, 500);
      }
    });

    this.app.post("/chat/messages", async (c) => {
      const parsed = messagesSchema.safeParse(await readJson(c.req.raw));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const history = await conversations.history(parsed.data.sessionId);
      return c.json({
        messages: history.map((turn) => ({ id: randomUUID(), role: turn.role, content: turn.content })),
      });
    });

    this.app.post("/enquiries/:id/reply", async (c) => {
      const id = Number(c.req.param("id"));
      if (!Number.isInteger(id) || id <= 0) {
        return c.json({ error: "Invalid enquiry id" }, 400);
      }
      const parsed = replySchema.safeParse(await readJson(c.req.raw));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const outcome = await recordMerchantReply(
        enquiries,
        notifications,
        logger,
        id,
        parsed.data.replyMessage,
        parsed.data.replyChannel,
      );
      if (!outcome) {
        return c.json({ error: `Enquiry not found: ${id}` }, 404);
      }
      return c.json({
        replyId: outcome.reply.id,
        status: "replied",
        notified: outcome.notification.success,
      });
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

/** Request body as JSON, or null when it is missing or malformed. */
async function readJson(req: Request): Promise<unknown> {
  const text = await req.text();
  if (text.trim().length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
