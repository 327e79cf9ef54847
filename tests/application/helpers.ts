import { vi } from 'vitest';
import type { Logger } from 'pino';
import { UpdateDebouncer } from '../../src/application/index.js';
import type { EngineContext, EngineSettings } from '../../src/application/index.js';
import type { NotificationDocument, PayloadRecord } from '../../src/domain/index.js';

export const TEST_SECRET = 'test-secret';

export const SETTINGS: EngineSettings = {
  workspaceName: 'Acme',
  appUrl: 'https://pm.example.com',
  webhookSecret: '',
};

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/**
 * Factory for webhook bodies with sensible defaults.
 * Override any top-level key via the partial parameter.
 */
export function makePayload(overrides: PayloadRecord = {}): PayloadRecord {
  return {
    event: 'issue',
    action: 'created',
    data: { id: 'issue-1', name: 'Fix bug' },
    ...overrides,
  };
}

/** An "updated" body for `issueId` changing `field`. */
export function makeUpdate(
  field: string,
  issueId = 'issue-1',
  extra: { data?: PayloadRecord; activity?: PayloadRecord } = {},
): PayloadRecord {
  return makePayload({
    action: 'updated',
    data: { id: issueId, name: 'Fix bug', ...extra.data },
    activity: { field, old_value: 'low', new_value: 'high', ...extra.activity },
  });
}

/** Engine context with a manual clock and a recording delivery callback. */
export function makeContext(overrides: {
  settings?: Partial<EngineSettings>;
  nowMs?: { value: number };
} = {}) {
  const clock = overrides.nowMs ?? { value: Date.UTC(2026, 1, 18, 12, 0, 0) };
  const delivered: NotificationDocument[] = [];
  const context: EngineContext = {
    settings: { ...SETTINGS, ...overrides.settings },
    debouncer: new UpdateDebouncer({ nowFn: () => clock.value }),
    deliver: (document) => {
      delivered.push(document);
    },
    log: fakeLogger(),
  };
  return { context, delivered, clock };
}
