// ═══════════════════════════════════════════════════════════════════════════════
// POTLUCK TEMPLATES
// ═══════════════════════════════════════════════════════════════════════════════

import { CatalogTemplate, interpolate, type RenderInput } from './base.js';
import type { Escaper } from './html.js';

const ACTION_VERBS: Record<string, string> = {
  created: 'added',
  updated: 'updated',
  claimed: 'claimed',
  unclaimed: 'released',
  deleted: 'removed',
};

/**
 * Shared by every potluck type. The generic `potluck_update` type takes its
 * title from the `action` the trigger reports.
 */
export class PotluckTemplate extends CatalogTemplate {
  getInAppTitle(input: RenderInput, escape?: Escaper): string {
    const action = input.context.action;
    const verb = typeof action === 'string' ? ACTION_VERBS[action] : undefined;

    if (this.type === 'potluck_update' && verb) {
      return interpolate(`Potluck item ${verb}: {{itemName}}`, input.context, escape);
    }
    return super.getInAppTitle(input, escape);
  }

  getInAppBody(input: RenderInput, escape?: Escaper): string {
    const body = super.getInAppBody(input, escape);
    const actor = input.context.changedByUsername;
    if (typeof actor !== 'string' || actor.length === 0) return body;

    return `${body}\n\n${interpolate('Changed by {{changedByUsername}}.', input.context, escape)}`;
  }
}
