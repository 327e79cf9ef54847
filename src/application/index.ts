export { computeSignature, verifySignature } from './signature.js';
export {
  toText,
  getString,
  getText,
  getRecord,
  getArray,
  getRecordArray,
  parsePayload,
} from './value-extractor.js';
export { absoluteUrl, avatarOf } from './avatar.js';
export { PRIORITY_LABELS, FIELD_RULES, priorityLabel, normalizeChange } from './field-normalizer.js';
export type { NormalizeContext, NormalizedChange, FieldRule, ValueMapper } from './field-normalizer.js';
export { NOTIFIABLE_FIELDS, isNotifiableField, UpdateDebouncer } from './suppressor.js';
export type { UpdateDebouncerOptions } from './suppressor.js';
export { renderNotification, workspaceIconUrl } from './renderer.js';
export type { RenderRequest, RenderSettings } from './renderer.js';
export { classifyEvent, processWebhook } from './transform-engine.js';
export type {
  EngineContext,
  EngineSettings,
  SuppressionReason,
  WebhookOutcome,
} from './transform-engine.js';
