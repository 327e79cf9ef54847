/**
 * Core domain types for inbound project-management webhooks.
 *
 * The payload is untrusted and loosely typed: every key may be absent or
 * hold the wrong kind of value. These types carry no framework dependencies.
 */

/** A decoded JSON object whose values have not been checked. */
export type PayloadRecord = Record<string, unknown>;

/**
 * Parsed request body.
 *
 * Only the shape is asserted here; reads go through the value extractor,
 * which supplies a default for every key.
 */
export type InboundEvent = PayloadRecord;

/** Event types the bridge knows how to render. */
export const ISSUE_EVENT = 'issue';
export const ISSUE_COMMENT_EVENT = 'issue_comment';

/** Actions recognised on the issue event. */
export type IssueAction = 'created' | 'updated' | 'deleted';

export const ISSUE_ACTIONS: readonly IssueAction[] = ['created', 'updated', 'deleted'];

/**
 * Classification of an inbound event.
 *
 * `unhandled` covers every event/action pair outside the known set.
 */
export type EventKind =
  | { readonly type: 'issue'; readonly action: IssueAction }
  | { readonly type: 'comment' }
  | { readonly type: 'unhandled'; readonly event: string; readonly action: string };

/** Rendered text for the value of absent or null fields. */
export const NONE_TEXT = 'None';
