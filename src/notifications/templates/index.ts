export {
  NotificationTemplate,
  CatalogTemplate,
  interpolate,
  type RenderInput,
  type EmailAttachment,
  type EmailAttachments,
} from './base.js';
export {
  TemplateCatalog,
  TemplateCatalogEntrySchema,
  loadTemplateCatalog,
  parseTemplateCatalog,
  type TemplateCatalogEntry,
} from './catalog.js';
export { DATE_FIELDS, enrichContext, formatDateTime, formatShortDate, type RecipientSummary } from './enrichment.js';
export { escapeHtml, markdownToHtml, renderEmailLayout, type Escaper } from './html.js';
export { TemplateRegistry, createDefaultTemplateRegistry } from './registry.js';
export { TemplateRenderer, type PreparedRender, type TemplateRendererOptions } from './renderer.js';
export { markdownToTelegramHtml, sanitizeTelegramHtml } from './telegram.js';
export { TicketCreatedTemplate, buildEventIcs } from './tickets.js';
export { EventUpdatedTemplate, EventReminderTemplate } from './events.js';
export { PotluckTemplate } from './potluck.js';
export { MalwareDetectedTemplate } from './security.js';
