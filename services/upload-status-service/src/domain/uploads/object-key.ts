const MAX_OBJECT_KEY_LENGTH = 1024;

export type DesiredObjectKeyResult =
  | { ok: true; objectKey: string }
  | { ok: false; reason: string };

export function buildObjectKey(prefix: string, recordId: string, fileName?: string): string {
  const normalizedPrefix = normalizePrefix(prefix);
  const safeName = sanitizeFileName(fileName ?? '');
  return `${normalizedPrefix}/${recordId}/${safeName}`;
}

export function sanitizeFileName(fileName: string): string {
  const normalized = fileName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');

  if (!normalized || normalized === '.' || normalized === '..') {
    return 'file.bin';
  }

  return normalized;
}

export function normalizePrefix(prefix: string): string {
  return prefix.trim().replace(/^\/+|\/+$/g, '');
}

export function isUnderPrefix(objectKey: string, prefix: string): boolean {
  const normalizedPrefix = normalizePrefix(prefix);
  if (!normalizedPrefix) {
    return true;
  }

  return objectKey.startsWith(`${normalizedPrefix}/`);
}

export function normalizeDesiredObjectKey(desired: string, prefix: string): DesiredObjectKeyResult {
  const objectKey = desired.trim().replace(/^\/+/, '');

  if (!objectKey) {
    return { ok: false, reason: 'objectKey must not be empty.' };
  }

  if (objectKey.length > MAX_OBJECT_KEY_LENGTH) {
    return { ok: false, reason: `objectKey must be at most ${MAX_OBJECT_KEY_LENGTH} characters.` };
  }

  const segments = objectKey.split('/');
  if (segments.some((segment) => segment === '' || segment === '.' || segment === '..')) {
    return { ok: false, reason: 'objectKey must not contain empty, "." or ".." segments.' };
  }

  if (!isUnderPrefix(objectKey, prefix)) {
    return { ok: false, reason: `objectKey must start with "${normalizePrefix(prefix)}/".` };
  }

  return { ok: true, objectKey };
}
