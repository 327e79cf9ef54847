/**
 * Platform-agnostic notification card.
 *
 * The delivery layer maps this onto the chat platform's embed format.
 */

/** Accent colors, one per event/action family. */
export const NotificationColor = {
  Created: 8184715,
  Deleted: 16415088,
  Updated: 4093438,
} as const;

export type NotificationColor = (typeof NotificationColor)[keyof typeof NotificationColor];

export interface NotificationAuthor {
  readonly name: string;
  readonly iconUrl: string;
}

export interface NotificationFooter {
  readonly text: string;
  readonly iconUrl?: string;
}

export interface NotificationField {
  readonly name: string;
  readonly value: string;
  /** Render side by side with neighbouring inline fields. */
  readonly inline: boolean;
}

/**
 * Rendered notification.
 *
 * A document whose title and description are both empty is never emitted.
 */
export interface NotificationDocument {
  readonly title?: string;
  readonly description?: string;
  readonly color: NotificationColor;
  readonly author: NotificationAuthor;
  readonly thumbnailUrl?: string;
  readonly footer?: NotificationFooter;
  readonly fields: readonly NotificationField[];
}

/** True when the document carries neither title nor description text. */
export function isEmptyDocument(document: NotificationDocument): boolean {
  return !document.title && !document.description;
}
