/**
 * Address normalization. Every storage key (history rows, profiles, sink
 * files, envelope chat_id) goes through canonicalChatId so that one contact
 * always maps to one key, whichever address form an event carried.
 */

export const CONTACT_SERVER = 's.whatsapp.net';
export const GROUP_SERVER = 'g.us';
export const BROADCAST_SERVER = 'broadcast';
export const STATUS_BROADCAST = 'status@broadcast';

/** Servers the protocol uses as aliases of the primary contact address. */
const CONTACT_ALIAS_SERVERS: ReadonlySet<string> = new Set(['lid', 'c.us', CONTACT_SERVER]);

export type ChatKind = 'group' | 'status' | 'broadcast' | 'private';

export function canonicalChatId(raw: string | undefined | null): string {
  const s = (raw ?? '').trim();
  if (!s) return '';

  const at = s.lastIndexOf('@');
  if (at < 0) {
    const user = stripUser(s);
    return user ? `${user}@${CONTACT_SERVER}` : '';
  }

  const server = s.slice(at + 1).trim().toLowerCase();
  const user = s.slice(0, at).trim();
  if (server === GROUP_SERVER) return `${user}@${GROUP_SERVER}`;
  if (server === BROADCAST_SERVER) return `${user.toLowerCase()}@${BROADCAST_SERVER}`;
  if (CONTACT_ALIAS_SERVERS.has(server)) {
    const contact = stripUser(user);
    return contact ? `${contact}@${CONTACT_SERVER}` : '';
  }
  return `${user}@${server}`;
}

// user[:device][.agent] → user, without a leading '+'
function stripUser(user: string): string {
  let u = user.trim();
  const colon = u.indexOf(':');
  if (colon >= 0) u = u.slice(0, colon);
  const dot = u.indexOf('.');
  if (dot >= 0 && /^\d+$/.test(u.slice(dot + 1))) u = u.slice(0, dot);
  return u.replace(/^\+/, '');
}

export function kindOfChat(chatId: string): ChatKind {
  if (chatId.endsWith(`@${GROUP_SERVER}`)) return 'group';
  if (chatId === STATUS_BROADCAST) return 'status';
  if (chatId.endsWith(`@${BROADCAST_SERVER}`)) return 'broadcast';
  return 'private';
}

export function isGroupChat(chatId: string | undefined): boolean {
  return Boolean(chatId && chatId.endsWith(`@${GROUP_SERVER}`));
}

/** The part before '@' (the phone number for contacts). */
export function userOf(address: string | undefined): string {
  if (!address) return '';
  const at = address.indexOf('@');
  return at < 0 ? address : address.slice(0, at);
}

/** Keeps [A-Za-z0-9._-], replaces everything else with '_'. */
export function sanitizePathPart(s: string): string {
  const out = s.trim().replace(/[^A-Za-z0-9._-]/gu, '_');
  return out.length === 0 ? 'unknown' : out;
}
