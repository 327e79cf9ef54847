import { NONE_TEXT } from '../domain/index.js';
import type { PayloadRecord } from '../domain/index.js';
import { getRecord, getRecordArray, getString } from './value-extractor.js';
import { avatarOf } from './avatar.js';

/** Display labels for issue priority codes. */
export const PRIORITY_LABELS: ReadonlyMap<string, string> = new Map([
  ['urgent', '🔴 Urgent!'],
  ['high', '🟠 High'],
  ['medium', '🟡 Medium'],
  ['low', '🔵 Low'],
  ['none', '⚫ None'],
]);

/** Unknown codes render as ''. */
export function priorityLabel(code: string): string {
  return PRIORITY_LABELS.get(code) ?? '';
}

/** Entity state and activity record the field rules may read. */
export interface NormalizeContext {
  readonly data: PayloadRecord;
  readonly activity: PayloadRecord;
  readonly appUrl: string;
}

/** Display form of a single field change. */
export interface NormalizedChange {
  readonly field: string;
  readonly label: string;
  readonly oldValue: string;
  readonly newValue: string;
  /** Set when the change supplies an image for the card. */
  readonly thumbnailUrl?: string;
}

export type ValueMapper = (raw: string, context: NormalizeContext) => string;

/**
 * Per-field display rule. Anything left undefined passes through.
 */
export interface FieldRule {
  readonly label?: string;
  readonly oldValue?: ValueMapper;
  readonly newValue?: ValueMapper;
  readonly thumbnail?: (context: NormalizeContext) => string;
}

function isUnset(raw: string): boolean {
  return raw === '' || raw === NONE_TEXT || raw === '[]';
}

function currentStateName(context: NormalizeContext): string {
  const name =
    getString(getRecord(context.data, 'state'), 'name') ||
    getString(getRecord(context.data, 'state_detail'), 'name');
  return name || NONE_TEXT;
}

function currentAssignees(context: NormalizeContext): PayloadRecord[] {
  return getRecordArray(context.data, 'assignees');
}

/** A null priority keeps the None sentinel rather than an empty label. */
function priorityDisplay(raw: string): string {
  return raw === NONE_TEXT ? NONE_TEXT : priorityLabel(raw);
}

const priorityRule: FieldRule = {
  oldValue: priorityDisplay,
  newValue: priorityDisplay,
};

/** Prior state ids mean nothing to a reader; only say whether one existed. */
const stateRule: FieldRule = {
  label: 'State',
  oldValue: (raw) => (isUnset(raw) ? NONE_TEXT : 'Changed'),
  newValue: (_raw, context) => currentStateName(context),
};

const assigneesRule: FieldRule = {
  label: 'Assignees',
  oldValue: (raw) => (isUnset(raw) ? NONE_TEXT : 'Previously set'),
  newValue: (_raw, context) => {
    const names = currentAssignees(context)
      .map((user) => getString(user, 'display_name'))
      .filter((name) => name !== '');
    return names.length > 0 ? names.join(', ') : NONE_TEXT;
  },
  thumbnail: (context) => {
    const [first] = currentAssignees(context);
    return first ? avatarOf(first, context.appUrl) : '';
  },
};

/** Fields with special display handling, keyed by raw activity field name. */
export const FIELD_RULES: ReadonlyMap<string, FieldRule> = new Map([
  ['priority', priorityRule],
  ['state', stateRule],
  ['state_id', stateRule],
  ['assignee_ids', assigneesRule],
]);

/**
 * Maps a raw field change onto display strings.
 *
 * Pure: the same inputs always give the same output.
 */
export function normalizeChange(
  field: string,
  rawOld: string,
  rawNew: string,
  context: NormalizeContext,
): NormalizedChange {
  const rule = FIELD_RULES.get(field);
  if (rule === undefined) {
    return { field, label: field, oldValue: rawOld, newValue: rawNew };
  }

  const thumbnailUrl = rule.thumbnail?.(context) ?? '';

  return {
    field,
    label: rule.label ?? field,
    oldValue: rule.oldValue ? rule.oldValue(rawOld, context) : rawOld,
    newValue: rule.newValue ? rule.newValue(rawNew, context) : rawNew,
    ...(thumbnailUrl ? { thumbnailUrl } : {}),
  };
}
