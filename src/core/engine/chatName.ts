import { isGroupChat, userOf } from '../envelope/chatId.js';

/**
 * Chat display-name resolution: an ordered list of named strategies, each
 * free of side effects. The last strategy of each list always answers.
 */

export interface ChatNameInput {
  /** Canonical chat id. */
  chatId: string;
  conversation?: { display_name?: string; name?: string };
  pushName?: string;
  /** User part of the sender address. */
  senderUser?: string;
}

export interface ChatDirectoryView {
  contactName(chatId: string): string | undefined;
  groupName(chatId: string): string | undefined;
}

export interface ChatNameStrategy {
  readonly name: string;
  resolve(input: ChatNameInput, directory: ChatDirectoryView): string | undefined;
}

const nonEmpty = (s: string | undefined): string | undefined => (s && s.trim() ? s.trim() : undefined);

export const GROUP_NAME_STRATEGIES: readonly ChatNameStrategy[] = [
  { name: 'conversation-display-name', resolve: (i) => nonEmpty(i.conversation?.display_name) },
  { name: 'conversation-name', resolve: (i) => nonEmpty(i.conversation?.name) },
  { name: 'directory-group', resolve: (i, dir) => nonEmpty(dir.groupName(i.chatId)) },
  { name: 'group-fallback', resolve: (i) => `Group ${userOf(i.chatId)}` },
];

export const CONTACT_NAME_STRATEGIES: readonly ChatNameStrategy[] = [
  { name: 'directory-contact', resolve: (i, dir) => nonEmpty(dir.contactName(i.chatId)) },
  { name: 'push-name', resolve: (i) => nonEmpty(i.pushName) },
  { name: 'sender-user', resolve: (i) => nonEmpty(i.senderUser) },
  { name: 'chat-user', resolve: (i) => userOf(i.chatId) },
];

export function resolveChatName(input: ChatNameInput, directory: ChatDirectoryView): string {
  const strategies = isGroupChat(input.chatId) ? GROUP_NAME_STRATEGIES : CONTACT_NAME_STRATEGIES;
  for (const strategy of strategies) {
    const name = strategy.resolve(input, directory);
    if (name !== undefined) return name;
  }
  return userOf(input.chatId);
}

/** Names learned from observed events (push names, group info, joins). */
export class ChatDirectory implements ChatDirectoryView {
  private readonly contacts = new Map<string, string>();
  private readonly groups = new Map<string, string>();

  rememberContact(chatId: string, name: string | undefined): void {
    const n = nonEmpty(name);
    if (chatId && n) this.contacts.set(chatId, n);
  }

  rememberGroup(chatId: string, name: string | undefined): void {
    const n = nonEmpty(name);
    if (chatId && n) this.groups.set(chatId, n);
  }

  contactName(chatId: string): string | undefined {
    return this.contacts.get(chatId);
  }

  groupName(chatId: string): string | undefined {
    return this.groups.get(chatId);
  }
}
