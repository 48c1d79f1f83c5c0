// ═══════════════════════════════════════════════════════════════════════════════
// EVENT TEMPLATES — Change Lists, Reminder Countdown
// ═══════════════════════════════════════════════════════════════════════════════

import { CatalogTemplate, interpolate, type RenderInput } from './base.js';
import type { Escaper } from './html.js';

function stringRecord(value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null) return {};
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
}

export class EventUpdatedTemplate extends CatalogTemplate {
  getInAppBody(input: RenderInput, escape?: Escaper): string {
    const { context } = input;
    const fields = Array.isArray(context.changedFields)
      ? context.changedFields.filter((field): field is string => typeof field === 'string')
      : [];
    const oldValues = stringRecord(context.oldValues);
    const newValues = stringRecord(context.newValues);
    const e = escape ?? ((value: string) => value);

    const lines = [super.getInAppBody(input, escape)];
    if (fields.length > 0) {
      lines.push('');
      lines.push('What changed:');
      lines.push('');
      for (const field of fields) {
        const before = oldValues[field];
        const after = newValues[field];
        lines.push(
          before !== undefined && after !== undefined
            ? `- **${e(field)}**: ${e(before)} → ${e(after)}`
            : `- **${e(field)}**`
        );
      }
    }
    return lines.join('\n');
  }
}

export class EventReminderTemplate extends CatalogTemplate {
  getInAppTitle(input: RenderInput, escape?: Escaper): string {
    const days = input.context.daysUntil;
    if (days === 0) return interpolate('Today: {{eventName}}', input.context, escape);
    if (days === 1) return interpolate('Reminder: {{eventName}} is tomorrow', input.context, escape);
    if (typeof days === 'number') {
      return interpolate(`Reminder: {{eventName}} in ${days} days`, input.context, escape);
    }
    return super.getInAppTitle(input, escape);
  }

  getEmailSubject(input: RenderInput): string {
    return input.context.daysUntil === 1
      ? interpolate('Tomorrow: {{eventName}}', input.context)
      : super.getEmailSubject(input);
  }
}
