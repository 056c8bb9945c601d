import { PONG_STATUS } from '../constants/pidbox.constants';
import { JsonValue, ResponseDocument } from '../types/control-message.types';

export const IDENTITY_FIELDS = ['hostname', 'worker', 'nodename', 'node', 'name'] as const;
export type IdentityField = (typeof IDENTITY_FIELDS)[number];

export const NESTED_SCOPES = ['data', 'worker'] as const;
export type NestedScope = (typeof NESTED_SCOPES)[number];

export type IdentityMatch =
  | { kind: 'worker-keyed'; identity: string; status: string }
  | {
      kind: 'identity-field';
      identity: string;
      field: IdentityField;
      scope: 'top' | NestedScope;
    }
  | { kind: 'scan'; identity: string; key: string };

export interface IdentityMatcher {
  readonly kind: IdentityMatch['kind'];
  match(document: ResponseDocument): IdentityMatch | null;
}

export function isJsonObject(value: JsonValue | undefined): value is ResponseDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function statusOf(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * `{"celery@host": {"ok": "pong"}}`. A pong entry wins over an earlier entry
 * carrying some other `ok` value.
 */
export const workerKeyedMatcher: IdentityMatcher = {
  kind: 'worker-keyed',
  match(document) {
    let fallback: IdentityMatch | null = null;
    for (const [key, value] of Object.entries(document)) {
      if (!key.includes('@') || !isJsonObject(value) || !('ok' in value)) continue;
      const status = statusOf(value.ok);
      if (status === PONG_STATUS) {
        return { kind: 'worker-keyed', identity: key, status };
      }
      fallback ??= { kind: 'worker-keyed', identity: key, status };
    }
    return fallback;
  },
};

function findIdentityField(
  source: ResponseDocument,
): { field: IdentityField; identity: string } | null {
  for (const field of IDENTITY_FIELDS) {
    const value = source[field];
    if (typeof value === 'string' && value !== '') {
      return { field, identity: value };
    }
  }
  return null;
}

/** Top-level identity fields first, then the same fields under `data` / `worker`. */
export const identityFieldMatcher: IdentityMatcher = {
  kind: 'identity-field',
  match(document) {
    const top = findIdentityField(document);
    if (top) {
      return { kind: 'identity-field', scope: 'top', ...top };
    }
    for (const scope of NESTED_SCOPES) {
      const nested = document[scope];
      if (!isJsonObject(nested)) continue;
      const found = findIdentityField(nested);
      if (found) {
        return { kind: 'identity-field', scope, ...found };
      }
    }
    return null;
  },
};

/** Last resort: any string that looks like `name@host`, or sits under a `*host*` key. */
export const scanMatcher: IdentityMatcher = {
  kind: 'scan',
  match(document) {
    for (const [key, value] of Object.entries(document)) {
      if (typeof value !== 'string' || value === '') continue;
      if (value.includes('@') || key.includes('host')) {
        return { kind: 'scan', identity: value, key };
      }
    }
    return null;
  },
};

export const EVIDENCE_MATCHERS: readonly IdentityMatcher[] = [
  workerKeyedMatcher,
  identityFieldMatcher,
];

export const IDENTITY_MATCHERS: readonly IdentityMatcher[] = [
  ...EVIDENCE_MATCHERS,
  scanMatcher,
];

/** Whether a match is enough on its own to count the document as a worker reply. */
export function isWorkerEvidence(match: IdentityMatch): boolean {
  switch (match.kind) {
    case 'worker-keyed':
      return match.status === PONG_STATUS;
    case 'identity-field':
      return true;
    case 'scan':
      return false;
  }
}

export function firstMatch(
  document: ResponseDocument,
  matchers: readonly IdentityMatcher[] = IDENTITY_MATCHERS,
): IdentityMatch | null {
  for (const matcher of matchers) {
    const match = matcher.match(document);
    if (match) return match;
  }
  return null;
}
