import type { Logger } from 'pino';
import {
  ISSUE_ACTIONS,
  ISSUE_COMMENT_EVENT,
  ISSUE_EVENT,
  isEmptyDocument,
} from '../domain/index.js';
import type { EventKind, InboundEvent, IssueAction, NotificationDocument } from '../domain/index.js';
import { verifySignature } from './signature.js';
import { getRecord, getString, getText, parsePayload } from './value-extractor.js';
import { normalizeChange } from './field-normalizer.js';
import { isNotifiableField } from './suppressor.js';
import type { UpdateDebouncer } from './suppressor.js';
import { renderNotification } from './renderer.js';
import type { RenderRequest, RenderSettings } from './renderer.js';

export interface EngineSettings extends RenderSettings {
  /** Shared HMAC secret. Empty disables verification. */
  readonly webhookSecret: string;
}

/**
 * Everything a webhook invocation needs.
 *
 * `deliver` is fire-and-forget: it must not throw and its outcome
 * never changes the acknowledgment given to the caller.
 */
export interface EngineContext {
  readonly settings: EngineSettings;
  readonly debouncer: UpdateDebouncer;
  readonly deliver: (document: NotificationDocument) => void;
  readonly log: Logger;
}

export type SuppressionReason = 'field' | 'debounce';

/**
 * Terminal state of one invocation. Only `rejected` changes the
 * acknowledgment; every other state is a normal success for the caller.
 */
export type WebhookOutcome =
  | { readonly status: 'rejected' }
  | { readonly status: 'unhandled'; readonly event: string; readonly action: string }
  | { readonly status: 'suppressed'; readonly reason: SuppressionReason }
  | { readonly status: 'discarded' }
  | { readonly status: 'emitted'; readonly document: NotificationDocument };

function isIssueAction(action: string): action is IssueAction {
  return ISSUE_ACTIONS.some((known) => known === action);
}

/** Maps the event/action pair onto a known kind, or `unhandled`. */
export function classifyEvent(event: InboundEvent): EventKind {
  const name = getString(event, 'event');
  const action = getString(event, 'action');

  if (name === ISSUE_EVENT && isIssueAction(action)) {
    return { type: 'issue', action };
  }
  if (name === ISSUE_COMMENT_EVENT) {
    return { type: 'comment' };
  }
  return { type: 'unhandled', event: name, action };
}

/**
 * Builds the render request, applying suppression to issue updates.
 * Returns a suppression reason when the update must be dropped.
 */
function prepare(
  kind: Exclude<EventKind, { type: 'unhandled' }>,
  event: InboundEvent,
  context: EngineContext,
): RenderRequest | SuppressionReason {
  const data = getRecord(event, 'data');
  const activity = getRecord(event, 'activity');

  if (kind.type === 'comment') {
    return { type: 'comment', data, activity };
  }
  if (kind.action !== 'updated') {
    return { type: 'issue', action: kind.action, data, activity };
  }

  const field = getText(activity, 'field');
  if (!isNotifiableField(field)) return 'field';

  // Whitelist before debounce so noise fields never consume an entity's window.
  if (!context.debouncer.tryAccept(getText(data, 'id'))) return 'debounce';

  const change = normalizeChange(
    field,
    getText(activity, 'old_value'),
    getText(activity, 'new_value'),
    { data, activity, appUrl: context.settings.appUrl },
  );

  return { type: 'issue', action: 'updated', data, activity, change };
}

/**
 * Runs one webhook invocation end to end:
 * verify → parse → classify → suppress → normalize → render → emit or discard.
 *
 * Synchronous; delivery is handed off without awaiting it.
 */
export function processWebhook(
  rawBody: Buffer | string,
  signature: string,
  context: EngineContext,
): WebhookOutcome {
  const { log, settings } = context;

  if (!verifySignature(rawBody, signature, settings.webhookSecret)) {
    log.warn('Invalid webhook signature');
    return { status: 'rejected' };
  }

  const event = parsePayload(rawBody);
  const kind = classifyEvent(event);

  if (kind.type === 'unhandled') {
    log.debug({ event: kind.event, action: kind.action }, 'Unhandled webhook event');
    return { status: 'unhandled', event: kind.event, action: kind.action };
  }

  const prepared = prepare(kind, event, context);
  if (typeof prepared === 'string') {
    log.debug(
      { reason: prepared, issue_id: getText(getRecord(event, 'data'), 'id') },
      'Update notification suppressed',
    );
    return { status: 'suppressed', reason: prepared };
  }

  const document = renderNotification(prepared, settings);
  if (isEmptyDocument(document)) {
    log.debug({ type: kind.type }, 'Empty notification discarded');
    return { status: 'discarded' };
  }

  log.info(
    {
      type: kind.type,
      action: kind.type === 'issue' ? kind.action : 'commented',
      title: document.title,
    },
    'Forwarding notification',
  );
  context.deliver(document);

  return { status: 'emitted', document };
}
