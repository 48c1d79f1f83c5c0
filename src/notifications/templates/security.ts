// ═══════════════════════════════════════════════════════════════════════════════
// SECURITY TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════════

import { CatalogTemplate, type RenderInput } from './base.js';
import type { Escaper } from './html.js';

function describe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value) ?? '';
}

/**
 * Lists each scanner finding under the catalogue body.
 */
export class MalwareDetectedTemplate extends CatalogTemplate {
  getInAppBody(input: RenderInput, escape?: Escaper): string {
    const findings = input.context.findings;
    const body = super.getInAppBody(input, escape);
    if (typeof findings !== 'object' || findings === null) return body;

    const entries = Object.entries(findings);
    if (entries.length === 0) return body;

    const e = escape ?? ((value: string) => value);
    const lines = [body, '', 'Findings:', ''];
    for (const [key, value] of entries) {
      lines.push(`- ${e(key)}: ${e(describe(value))}`);
    }
    return lines.join('\n');
  }
}
