export type { PayloadRecord, InboundEvent, IssueAction, EventKind } from './webhook-event.js';
export { ISSUE_EVENT, ISSUE_COMMENT_EVENT, ISSUE_ACTIONS, NONE_TEXT } from './webhook-event.js';
export type {
  NotificationAuthor,
  NotificationFooter,
  NotificationField,
  NotificationDocument,
} from './notification.js';
export { NotificationColor, isEmptyDocument } from './notification.js';
