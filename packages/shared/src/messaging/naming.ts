export function normalizeRoutingKeySegment(value: string): string {
  const normalized = value
    .trim()
    .toLowerCase()
    .replace(/['"]/g, '')
    .replace(/[_\s/]+/g, '-')
    .replace(/[^a-z0-9-]/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');

  if (!normalized) {
    throw new Error(`Invalid routing key segment: "${value}"`);
  }

  return normalized;
}

export function buildRoutingKey(...segments: Array<string | number>): string {
  if (segments.length === 0) {
    throw new Error('Routing key requires at least one segment.');
  }

  return segments.map((segment) => normalizeRoutingKeySegment(String(segment))).join('.');
}

export function formatVersionTag(version: number): `v${number}` {
  if (!Number.isInteger(version) || version < 1) {
    throw new Error(`Invalid version number: ${version}`);
  }

  return `v${version}`;
}

export function buildDlqExchangeName(queue: string): string {
  return `dlq.${queue}`;
}
