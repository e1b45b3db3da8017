export type EntityType = 'domain' | 'sender' | 'file_hash' | 'caller_id' | 'ip' | 'domain_in_text';

export interface EntityRef {
  type: EntityType;
  value: string;
}

/**
 * Loose key/value payload a signal is ingested with (sender, url, text, hash, ...)
 */
export type SignalData = Readonly<Record<string, unknown>>;

export const DEFAULT_TEXT_DOMAIN_TLDS: readonly string[] = [
  'com',
  'net',
  'org',
  'xyz',
  'io',
  'co',
  'uk',
  'info',
  'biz',
];

const DOMAIN_FIELDS = ['domain', 'url', 'sender', 'email'] as const;
const HASH_FIELDS = ['hash', 'md5', 'sha256'] as const;

export function entityId(entity: EntityRef): string {
  return `${entity.type}:${entity.value}`;
}

/**
 * Domain of an email address or URL, lowercased. Null when there is none.
 */
export function extractDomain(value: string): string | null {
  const trimmed = value.trim();
  if (!trimmed) return null;

  if (trimmed.includes('@') && !trimmed.includes('://')) {
    const domain = trimmed.slice(trimmed.lastIndexOf('@') + 1).trim().toLowerCase();
    return domain || null;
  }

  const candidate = trimmed.includes('://') ? trimmed : `http://${trimmed}`;
  if (!URL.canParse(candidate)) return null;
  const hostname = new URL(candidate).hostname.toLowerCase();
  return hostname || null;
}

/**
 * Build the free-text domain matcher for a TLD allow-list
 */
export function buildTextDomainPattern(tlds: readonly string[]): RegExp | null {
  if (tlds.length === 0) return null;
  const alternatives = tlds.map((tld) => tld.toLowerCase().replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`\\b(?:[a-z0-9-]+\\.)+(?:${alternatives.join('|')})\\b`, 'g');
}

/**
 * Extract (type, value) entities from signal data, deduplicated, in first-seen order.
 *
 * - domain: from domain/url/sender/email fields
 * - sender: the sender itself when it is an address
 * - file_hash: hash/md5/sha256
 * - caller_id: caller_id or phone
 * - ip: ip or ip_address
 * - domain_in_text: bare domains in text/email_text matching `textPattern`
 */
export function extractEntities(data: SignalData, textPattern: RegExp | null): EntityRef[] {
  const found: EntityRef[] = [];

  for (const field of DOMAIN_FIELDS) {
    const value = readString(data[field]);
    if (!value) continue;
    const domain = field === 'domain' ? value.trim().toLowerCase() : extractDomain(value);
    if (domain) found.push({ type: 'domain', value: domain });
  }

  const sender = readString(data.sender);
  if (sender && sender.includes('@')) {
    found.push({ type: 'sender', value: sender.trim().toLowerCase() });
  }

  for (const field of HASH_FIELDS) {
    const value = readString(data[field]);
    if (value) found.push({ type: 'file_hash', value: value.trim().toLowerCase() });
  }

  const caller = readString(data.caller_id) ?? readString(data.phone);
  if (caller) found.push({ type: 'caller_id', value: caller.trim() });

  const ip = readString(data.ip) ?? readString(data.ip_address);
  if (ip) found.push({ type: 'ip', value: ip.trim() });

  const text = readString(data.text) ?? readString(data.email_text);
  if (text && textPattern) {
    for (const match of text.toLowerCase().matchAll(textPattern)) {
      found.push({ type: 'domain_in_text', value: match[0] });
    }
  }

  return dedupeEntities(found.filter((entity) => entity.value.length > 0));
}

function readString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function dedupeEntities(entities: EntityRef[]): EntityRef[] {
  const seen = new Set<string>();
  const result: EntityRef[] = [];
  for (const entity of entities) {
    const id = entityId(entity);
    if (!seen.has(id)) {
      seen.add(id);
      result.push(entity);
    }
  }
  return result;
}
