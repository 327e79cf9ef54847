import { NotificationColor } from '../domain/index.js';
import type {
  IssueAction,
  NotificationAuthor,
  NotificationDocument,
  PayloadRecord,
} from '../domain/index.js';
import { getRecord, getString, getText } from './value-extractor.js';
import { priorityLabel } from './field-normalizer.js';
import type { NormalizedChange } from './field-normalizer.js';
import { absoluteUrl, avatarOf } from './avatar.js';

/** Workspace identity used for the default author block. */
export interface RenderSettings {
  readonly workspaceName: string;
  readonly appUrl: string;
}

/** A classified event ready to render. Updates carry their normalized change. */
export type RenderRequest =
  | {
      readonly type: 'issue';
      readonly action: Exclude<IssueAction, 'updated'>;
      readonly data: PayloadRecord;
      readonly activity: PayloadRecord;
    }
  | {
      readonly type: 'issue';
      readonly action: 'updated';
      readonly data: PayloadRecord;
      readonly activity: PayloadRecord;
      readonly change: NormalizedChange;
    }
  | {
      readonly type: 'comment';
      readonly data: PayloadRecord;
      readonly activity: PayloadRecord;
    };

type Verb = IssueAction | 'commented';

const ACTOR_PHRASES: Record<Verb, string> = {
  created: 'created an issue',
  updated: 'updated an issue',
  deleted: 'deleted an issue',
  commented: 'commented',
};

/** Icon shown for the workspace and for the sender. */
export function workspaceIconUrl(appUrl: string): string {
  return absoluteUrl('/plane-icon.png', appUrl);
}

function defaultAuthorName(verb: Verb, workspaceName: string): string {
  switch (verb) {
    case 'deleted':   return 'Work item deleted';
    case 'commented': return 'New Comment';
    default:          return `Update in ${workspaceName}`;
  }
}

/**
 * Author block: the acting user when the payload names one,
 * otherwise the workspace.
 */
function resolveAuthor(
  verb: Verb,
  activity: PayloadRecord,
  settings: RenderSettings,
): NotificationAuthor {
  const workspaceIcon = workspaceIconUrl(settings.appUrl);
  const actor = getRecord(activity, 'actor');
  const actorName = getString(actor, 'display_name');

  if (actorName === '') {
    return { name: defaultAuthorName(verb, settings.workspaceName), iconUrl: workspaceIcon };
  }

  return {
    name: `${actorName} ${ACTOR_PHRASES[verb]}`,
    iconUrl: avatarOf(actor, settings.appUrl) || workspaceIcon,
  };
}

/**
 * Renders a classified event into a notification document.
 *
 * Pure: no I/O, no clock. Whether the result is worth sending is the
 * caller's decision (see isEmptyDocument).
 */
export function renderNotification(
  request: RenderRequest,
  settings: RenderSettings,
): NotificationDocument {
  const { data, activity } = request;

  if (request.type === 'comment') {
    return {
      title: getString(getRecord(data, 'issue_detail'), 'name'),
      description: getString(data, 'comment_stripped'),
      color: NotificationColor.Updated,
      author: resolveAuthor('commented', activity, settings),
      fields: [{ name: 'Issue ID', value: getText(data, 'issue'), inline: true }],
    };
  }

  switch (request.action) {
    case 'created':
      return {
        title: getString(data, 'name'),
        description: getString(data, 'description_stripped'),
        color: NotificationColor.Created,
        author: resolveAuthor('created', activity, settings),
        fields: [{ name: 'Priority', value: priorityLabel(getString(data, 'priority')), inline: true }],
      };

    case 'deleted':
      return {
        description: `ID: \`${getText(data, 'id')}\``,
        color: NotificationColor.Deleted,
        author: resolveAuthor('deleted', activity, settings),
        fields: [],
      };

    case 'updated': {
      const { change } = request;
      return {
        title: getString(data, 'name'),
        description: `Field **${change.label}** changed.`,
        color: NotificationColor.Updated,
        author: resolveAuthor('updated', activity, settings),
        ...(change.thumbnailUrl ? { thumbnailUrl: change.thumbnailUrl } : {}),
        fields: [
          {
            name: 'Change',
            value: `\`${change.oldValue}\` → \`${change.newValue}\``,
            inline: false,
          },
        ],
      };
    }
  }
}
