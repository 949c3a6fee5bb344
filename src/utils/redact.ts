const SENSITIVE_PATTERNS = [
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apikey',
  'private_key',
  'key',
  'credential',
];

export const REDACTED = '******';

export function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_PATTERNS.some((p) => lower.includes(p));
}

export function redactValue(key: string, value: string): string {
  return isSensitiveKey(key) ? REDACTED : value;
}
