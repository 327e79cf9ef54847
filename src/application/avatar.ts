import { getString } from './value-extractor.js';
import type { PayloadRecord } from '../domain/index.js';

/**
 * Resolves a root-relative path ("/uploads/a.png") against the app base URL.
 * Absolute and protocol-relative URLs are returned unchanged.
 */
export function absoluteUrl(url: string, appUrl: string): string {
  if (url.startsWith('/') && !url.startsWith('//')) {
    return `${appUrl.replace(/\/+$/, '')}${url}`;
  }
  return url;
}

/**
 * Avatar reference of a user record, absolutised.
 * Payloads carry it as either `avatar` or `avatar_url`; '' when neither is set.
 */
export function avatarOf(user: PayloadRecord, appUrl: string): string {
  const raw = getString(user, 'avatar') || getString(user, 'avatar_url');
  return raw ? absoluteUrl(raw, appUrl) : '';
}
