// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE CATALOGUE — Per-Type Titles, Subjects and Markdown Bodies
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { NOTIFICATION_TYPES, type NotificationType } from '../types.js';

export const TemplateCatalogEntrySchema = z.object({
  /** Human-readable name, shown in preference screens and digest headings */
  label: z.string().min(1),
  title: z.string().min(1),
  subject: z.string().min(1),
  body: z.string(),
});

export type TemplateCatalogEntry = z.infer<typeof TemplateCatalogEntrySchema>;

const CatalogFileSchema = z.record(z.string(), TemplateCatalogEntrySchema);

const CATALOG_URL = new URL('../../../resources/templates.json', import.meta.url);

export class TemplateCatalog {
  constructor(private readonly entries: ReadonlyMap<NotificationType, TemplateCatalogEntry>) {}

  entry(type: NotificationType): TemplateCatalogEntry {
    const entry = this.entries.get(type);
    if (!entry) {
      throw new Error(`Template catalogue has no entry for ${type}`);
    }
    return entry;
  }

  label(type: NotificationType): string {
    return this.entry(type).label;
  }
}

/**
 * Validates a raw catalogue document. Every notification type must have an entry;
 * keys that are not notification types are ignored.
 */
export function parseTemplateCatalog(raw: unknown): TemplateCatalog {
  const document = CatalogFileSchema.parse(raw);

  const missing = NOTIFICATION_TYPES.filter(type => document[type] === undefined);
  if (missing.length > 0) {
    throw new Error(`Template catalogue is missing entries for: ${missing.join(', ')}`);
  }

  const entries = new Map<NotificationType, TemplateCatalogEntry>();
  for (const type of NOTIFICATION_TYPES) {
    const entry = document[type];
    if (entry) entries.set(type, entry);
  }
  return new TemplateCatalog(entries);
}

let cachedCatalog: TemplateCatalog | null = null;

export function loadTemplateCatalog(): TemplateCatalog {
  if (!cachedCatalog) {
    cachedCatalog = parseTemplateCatalog(JSON.parse(readFileSync(CATALOG_URL, 'utf8')));
  }
  return cachedCatalog;
}
