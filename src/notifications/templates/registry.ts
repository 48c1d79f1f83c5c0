// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE REGISTRY — NotificationType → Template Strategy
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../logging/index.js';
import { TemplateLookupError } from '../errors.js';
import { NOTIFICATION_TYPES, isNotificationType, type NotificationType } from '../types.js';
import { CatalogTemplate, type NotificationTemplate } from './base.js';
import { loadTemplateCatalog, type TemplateCatalog, type TemplateCatalogEntry } from './catalog.js';
import { EventReminderTemplate, EventUpdatedTemplate } from './events.js';
import { PotluckTemplate } from './potluck.js';
import { MalwareDetectedTemplate } from './security.js';
import { TicketCreatedTemplate } from './tickets.js';

const logger = getLogger({ component: 'template-registry' });

/**
 * Built once at startup and injected into whatever renders. Registering a type
 * twice replaces the earlier template.
 */
export class TemplateRegistry {
  private readonly templates = new Map<NotificationType, NotificationTemplate>();

  register(type: NotificationType, template: NotificationTemplate): void {
    if (this.templates.has(type)) {
      logger.warn('Overwriting registered notification template', { type });
    }
    this.templates.set(type, template);
  }

  /**
   * @throws TemplateLookupError for unknown or unregistered types
   */
  getTemplate(type: string): NotificationTemplate {
    const template = isNotificationType(type) ? this.templates.get(type) : undefined;
    if (!template) {
      throw new TemplateLookupError(type);
    }
    return template;
  }

  has(type: string): boolean {
    return isNotificationType(type) && this.templates.has(type);
  }

  registeredTypes(): NotificationType[] {
    return [...this.templates.keys()];
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

type TemplateClass = new (type: NotificationType, entry: TemplateCatalogEntry) => NotificationTemplate;

const TEMPLATE_CLASSES: Partial<Record<NotificationType, TemplateClass>> = {
  ticket_created: TicketCreatedTemplate,
  event_updated: EventUpdatedTemplate,
  event_reminder: EventReminderTemplate,
  potluck_item_created: PotluckTemplate,
  potluck_item_updated: PotluckTemplate,
  potluck_item_claimed: PotluckTemplate,
  potluck_item_unclaimed: PotluckTemplate,
  potluck_item_deleted: PotluckTemplate,
  potluck_update: PotluckTemplate,
  malware_detected: MalwareDetectedTemplate,
};

export function createDefaultTemplateRegistry(catalog: TemplateCatalog = loadTemplateCatalog()): TemplateRegistry {
  const registry = new TemplateRegistry();
  for (const type of NOTIFICATION_TYPES) {
    const Template = TEMPLATE_CLASSES[type] ?? CatalogTemplate;
    registry.register(type, new Template(type, catalog.entry(type)));
  }
  return registry;
}
