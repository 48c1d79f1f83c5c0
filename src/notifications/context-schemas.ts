// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT SCHEMAS — Required Context Shape per Notification Type
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every notification type declares the keys its templates rely on. Context is
// validated once, before anything is written; extra keys pass through so that
// triggers can pre-format values (`eventStartFormatted`) or add deep links.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ok, err, type Result } from '../types/result.js';
import {
  isNotificationType,
  type NotificationContext,
  type NotificationType,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIELD HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

const id = z.string().min(1);
const text = z.string();
const isoTimestamp = z.string().refine(value => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO-8601 timestamp',
});
const money = z.union([z.string(), z.number()]);
const count = z.number().int().nonnegative();

function context<T extends z.ZodRawShape>(shape: T) {
  return z
    .object({
      /** Deep link supplied by the trigger */
      frontendUrl: z.string().optional(),
    })
    .extend(shape)
    .passthrough();
}

// ─────────────────────────────────────────────────────────────────────────────────
// TICKETS
// ─────────────────────────────────────────────────────────────────────────────────

export const TicketCreatedContext = context({
  ticketId: id,
  ticketReference: text,
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  eventLocation: text,
  organizationId: id,
  organizationName: text,
  tierName: text,
  tierPrice: money,
  quantity: count,
  totalPrice: money,
  qrCodeUrl: z.string().optional(),
});

export const TicketUpdatedContext = context({
  ticketId: id,
  ticketReference: text,
  eventId: id,
  eventName: text,
  oldStatus: text,
  newStatus: text,
  changedBy: text.optional(),
  reason: text.optional(),
});

export const TicketCancelledContext = context({
  ticketId: id,
  ticketReference: text,
  eventId: id,
  eventName: text,
  cancelledBy: text.optional(),
  reason: text.optional(),
});

export const TicketCheckedInContext = context({
  ticketId: id,
  ticketReference: text,
  eventId: id,
  eventName: text,
  checkedInAt: isoTimestamp,
});

export const TicketRefundedContext = context({
  ticketId: id,
  ticketReference: text,
  eventId: id,
  eventName: text,
  refundAmount: money,
  refundReason: text.optional(),
});

export const PaymentConfirmationContext = context({
  ticketId: id,
  ticketReference: text,
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  paymentAmount: money,
  paymentMethod: text,
  receiptUrl: z.string().optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

export const EventOpenContext = context({
  eventId: id,
  eventName: text,
  eventDescription: text,
  eventStart: isoTimestamp,
  eventEnd: isoTimestamp,
  eventLocation: text,
  eventImageUrl: z.string().optional(),
  organizationId: id,
  organizationName: text,
  rsvpRequired: z.boolean(),
  ticketsAvailable: z.boolean(),
  questionnaireRequired: z.boolean(),
});

export const EventCreatedContext = context({
  eventId: id,
  eventName: text,
  eventDescription: text,
  eventStart: isoTimestamp,
  eventEnd: isoTimestamp,
  eventLocation: text,
  organizationId: id,
  organizationName: text,
});

export const EventUpdatedContext = context({
  eventId: id,
  eventName: text,
  changedFields: z.array(z.string()),
  oldValues: z.record(z.string()),
  newValues: z.record(z.string()),
});

export const EventReminderContext = context({
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  eventLocation: text,
  daysUntil: count,
  rsvpStatus: text.optional(),
  ticketReference: text.optional(),
});

export const EventCancelledContext = context({
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  cancellationReason: text.optional(),
  refundAvailable: z.boolean(),
});

export const EventSeriesFollowedContext = context({
  eventSeriesId: id,
  eventSeriesName: text,
  organizationId: id,
  organizationName: text,
  followerName: text,
});

// ─────────────────────────────────────────────────────────────────────────────────
// RSVPS
// ─────────────────────────────────────────────────────────────────────────────────

export const RsvpConfirmationContext = context({
  rsvpId: id,
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  eventLocation: text,
  response: text,
  plusOnes: count,
});

export const RsvpUpdatedContext = context({
  rsvpId: id,
  eventId: id,
  eventName: text,
  oldResponse: text,
  newResponse: text,
});

export const RsvpCancelledContext = context({
  rsvpId: id,
  eventId: id,
  eventName: text,
  cancelledBy: text.optional(),
});

export const WaitlistSpotAvailableContext = context({
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  spotsAvailable: count.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// POTLUCK
// ─────────────────────────────────────────────────────────────────────────────────

export const PotluckItemContext = context({
  potluckItemId: id,
  itemName: text,
  eventId: id,
  eventName: text,
  action: text,
  changedByUsername: text.optional(),
  assignedToUsername: text.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// QUESTIONNAIRES
// ─────────────────────────────────────────────────────────────────────────────────

export const QuestionnaireSubmittedContext = context({
  submissionId: id,
  questionnaireName: text,
  submitterEmail: text,
  submitterName: text,
  organizationId: id,
  organizationName: text,
  eventId: id.optional(),
  eventName: text.optional(),
});

export const QuestionnaireEvaluationContext = context({
  submissionId: id,
  questionnaireName: text,
  evaluationStatus: text,
  eventId: id.optional(),
  eventName: text.optional(),
  feedback: text.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// INVITATIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const InvitationReceivedContext = context({
  invitationId: id,
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  invitedByName: text,
  personalMessage: text.optional(),
  invitationExpiresAt: isoTimestamp.optional(),
});

export const InvitationClaimedContext = context({
  invitationId: id,
  eventId: id,
  eventName: text,
  claimedByEmail: text,
  claimedByName: text,
});

export const InvitationRevokedContext = context({
  invitationId: id,
  eventId: id,
  eventName: text,
  revokedByName: text.optional(),
});

export const InvitationRequestCreatedContext = context({
  requestId: id,
  eventId: id,
  eventName: text,
  requesterName: text,
  requesterEmail: text,
  message: text.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// MEMBERSHIP & WHITELIST
// ─────────────────────────────────────────────────────────────────────────────────

export const MembershipContext = context({
  organizationId: id,
  organizationName: text,
  role: text,
  actionedByName: text.optional(),
});

export const MembershipRequestCreatedContext = context({
  requestId: id,
  organizationId: id,
  organizationName: text,
  requesterName: text,
  requesterEmail: text,
  message: text.optional(),
});

export const WhitelistRequestContext = context({
  requestId: id,
  organizationId: id,
  organizationName: text,
  requesterName: text.optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// FOLLOWS
// ─────────────────────────────────────────────────────────────────────────────────

export const OrganizationFollowedContext = context({
  organizationId: id,
  organizationName: text,
  followerName: text,
});

export const NewEventFromFollowedOrgContext = context({
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  organizationId: id,
  organizationName: text,
});

export const NewEventFromFollowedSeriesContext = context({
  eventId: id,
  eventName: text,
  eventStart: isoTimestamp,
  eventSeriesId: id,
  eventSeriesName: text,
});

// ─────────────────────────────────────────────────────────────────────────────────
// SYSTEM
// ─────────────────────────────────────────────────────────────────────────────────

export const MalwareDetectedContext = context({
  fileName: text,
  findings: z.record(z.unknown()),
  quarantineId: id.optional(),
});

export const OrgAnnouncementContext = context({
  organizationId: id,
  organizationName: text,
  announcementTitle: text,
  announcementBody: text,
  postedByName: text,
});

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

export const CONTEXT_SCHEMAS: Record<NotificationType, z.ZodType<NotificationContext, z.ZodTypeDef, unknown>> = {
  ticket_created: TicketCreatedContext,
  ticket_updated: TicketUpdatedContext,
  ticket_cancelled: TicketCancelledContext,
  ticket_checked_in: TicketCheckedInContext,
  ticket_refunded: TicketRefundedContext,
  payment_confirmation: PaymentConfirmationContext,

  event_open: EventOpenContext,
  event_created: EventCreatedContext,
  event_updated: EventUpdatedContext,
  event_reminder: EventReminderContext,
  event_cancelled: EventCancelledContext,
  event_series_followed: EventSeriesFollowedContext,

  rsvp_confirmation: RsvpConfirmationContext,
  rsvp_updated: RsvpUpdatedContext,
  rsvp_cancelled: RsvpCancelledContext,
  waitlist_spot_available: WaitlistSpotAvailableContext,

  potluck_item_created: PotluckItemContext,
  potluck_item_updated: PotluckItemContext,
  potluck_item_claimed: PotluckItemContext,
  potluck_item_unclaimed: PotluckItemContext,
  potluck_item_deleted: PotluckItemContext,
  potluck_update: PotluckItemContext,

  questionnaire_submitted: QuestionnaireSubmittedContext,
  questionnaire_evaluation_result: QuestionnaireEvaluationContext,

  invitation_received: InvitationReceivedContext,
  invitation_claimed: InvitationClaimedContext,
  invitation_revoked: InvitationRevokedContext,
  invitation_request_created: InvitationRequestCreatedContext,

  membership_granted: MembershipContext,
  membership_promoted: MembershipContext,
  membership_removed: MembershipContext,
  membership_request_approved: MembershipContext,
  membership_request_rejected: MembershipContext,
  membership_request_created: MembershipRequestCreatedContext,

  whitelist_request_created: WhitelistRequestContext,
  whitelist_request_approved: WhitelistRequestContext,
  whitelist_request_rejected: WhitelistRequestContext,

  organization_followed: OrganizationFollowedContext,
  new_event_from_followed_org: NewEventFromFollowedOrgContext,
  new_event_from_followed_series: NewEventFromFollowedSeriesContext,

  malware_detected: MalwareDetectedContext,
  org_announcement: OrgAnnouncementContext,
};

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export type ContextSchemaErrorCode = 'unknown_type' | 'missing_key' | 'invalid_value';

export interface ContextSchemaError {
  readonly code: ContextSchemaErrorCode;
  readonly type: string;
  readonly message: string;
  /** Offending keys, dotted for nested values */
  readonly keys: string[];
}

function toSchemaError(type: NotificationType, error: z.ZodError): ContextSchemaError {
  const missing: string[] = [];
  const invalidKeys: string[] = [];
  const invalid: string[] = [];

  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '(context)';
    if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
      missing.push(key);
    } else {
      invalidKeys.push(key);
      invalid.push(`${key}: ${issue.message}`);
    }
  }

  if (missing.length > 0) {
    return {
      code: 'missing_key',
      type,
      message: `Missing required context keys for ${type}: ${missing.join(', ')}`,
      keys: missing,
    };
  }

  return {
    code: 'invalid_value',
    type,
    message: `Invalid context for ${type}: ${invalid.join('; ')}`,
    keys: invalidKeys,
  };
}

export interface ValidatedContext {
  type: NotificationType;
  context: NotificationContext;
}

/**
 * Checks a context map against the schema for its type. Pure; never throws.
 */
export function validateContext(
  type: string,
  context: unknown
): Result<ValidatedContext, ContextSchemaError> {
  if (!isNotificationType(type)) {
    return err({
      code: 'unknown_type',
      type,
      message: `No schema defined for notification type: ${type}`,
      keys: [],
    });
  }

  const parsed = CONTEXT_SCHEMAS[type].safeParse(context);
  if (parsed.success) {
    return ok({ type, context: parsed.data });
  }

  return err(toSchemaError(type, parsed.error));
}
