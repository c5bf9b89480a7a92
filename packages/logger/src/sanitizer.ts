/**
 * @opsdeck/logger - Sensitive Data Sanitizer
 * Masks sensitive fields in log output
 */

export const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'authorization',
  'database_url',
  'databaseurl',
  'private_key',
  'privatekey',
  'pgpassword',
] as const;

const TEXT_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  // user:password@ in connection strings and URLs
  [/(\b[a-z][a-z0-9+.-]*:\/\/[^\s:/@]+:)[^\s@/]+@/gi, '$1****@'],
  // signed-URL query parameters
  [/([?&](?:sig|signature|token|x-amz-signature|x-amz-security-token|x-amz-credential)=)[^&\s'"]+/gi, '$1****'],
];

/** Mask credentials embedded in free text such as commands and URLs. */
export function maskSensitiveText(text: string): string {
  return TEXT_PATTERNS.reduce((masked, [pattern, replacement]) => masked.replace(pattern, replacement), text);
}

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some(k => lowerKey.includes(k));
}

function maskValue(value: unknown): unknown {
  if (typeof value === 'string') return maskSensitiveText(value);
  if (Array.isArray(value)) return value.map(maskValue);
  if (typeof value === 'object' && value !== null) return maskSensitiveFields(Object.fromEntries(Object.entries(value)));
  return value;
}

/**
 * Mask every field of a record. Values under sensitive keys are replaced,
 * partially revealing long ones (first 4 and last 4 chars); other strings
 * have embedded credentials masked.
 */
export function maskSensitiveFields(record: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (isSensitiveKey(key)) {
      masked[key] = typeof value === 'string' && value.length > 8
        ? `${value.slice(0, 4)}****${value.slice(-4)}`
        : '****';
    } else {
      masked[key] = maskValue(value);
    }
  }
  return masked;
}

/** Recursively mask sensitive data in objects. Primitives pass through. */
export function maskSensitiveData(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') return obj;
  return maskValue(obj);
}
