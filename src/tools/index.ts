import type { CatalogInsights } from "../catalog/insights.js";
import type { DocumentLibrary } from "../documents/library.js";
import type { EnquiryStore } from "../enquiry/store.js";
import type { NotificationService } from "../notifications/service.js";
import type { QuerySynthesizer } from "../search/synthesizer.js";
import { createBookingEnquiryTool } from "./booking.js";
import { createDocumentDetailTool, createDocumentSummaryTool } from "./documents.js";
import { ToolRegistry } from "./registry.js";
import { createSearchTool } from "./search.js";
import { createThinkingTool } from "./thinking.js";

export interface ToolDependencies {
  readonly synthesizer: QuerySynthesizer;
  readonly insights: CatalogInsights;
  readonly documents: DocumentLibrary;
  readonly enquiries: EnquiryStore;
  readonly notifications: NotificationService;
}

export function createDefaultTools(deps: ToolDependencies): ToolRegistry {
  return new ToolRegistry([
    createThinkingTool(),
    createSearchTool(deps.synthesizer, deps.insights),
    createDocumentSummaryTool(deps.documents),
    createDocumentDetailTool(deps.documents),
    createBookingEnquiryTool(deps.enquiries, deps.notifications),
  ]);
}
