import { describe, it, expect } from 'vitest';
import {
  canonicalChatId,
  isGroupChat,
  kindOfChat,
  sanitizePathPart,
  userOf,
} from '../../../../src/core/envelope/chatId.js';

describe('canonicalChatId', () => {
  it('maps every alias of a contact to one key', () => {
    const expected = '5215512345678@s.whatsapp.net';
    expect(canonicalChatId('5215512345678@s.whatsapp.net')).toBe(expected);
    expect(canonicalChatId('5215512345678:12@s.whatsapp.net')).toBe(expected);
    expect(canonicalChatId('5215512345678.0:3@s.whatsapp.net')).toBe(expected);
    expect(canonicalChatId('5215512345678@c.us')).toBe(expected);
    expect(canonicalChatId('5215512345678@lid')).toBe(expected);
    expect(canonicalChatId('+5215512345678')).toBe(expected);
    expect(canonicalChatId('  5215512345678@S.WHATSAPP.NET ')).toBe(expected);
  });

  it('keeps groups and broadcasts on their own servers', () => {
    expect(canonicalChatId('120363025@G.US')).toBe('120363025@g.us');
    expect(canonicalChatId('STATUS@broadcast')).toBe('status@broadcast');
    expect(canonicalChatId('abc@newsletter')).toBe('abc@newsletter');
  });

  it('returns an empty string for blank input', () => {
    expect(canonicalChatId(undefined)).toBe('');
    expect(canonicalChatId('   ')).toBe('');
    expect(canonicalChatId('@lid')).toBe('');
  });
});

describe('chat helpers', () => {
  it('classifies chats', () => {
    expect(kindOfChat('1@g.us')).toBe('group');
    expect(kindOfChat('status@broadcast')).toBe('status');
    expect(kindOfChat('list@broadcast')).toBe('broadcast');
    expect(kindOfChat('1@s.whatsapp.net')).toBe('private');
    expect(isGroupChat('1@g.us')).toBe(true);
    expect(isGroupChat(undefined)).toBe(false);
  });

  it('extracts the user part', () => {
    expect(userOf('5215512345678@s.whatsapp.net')).toBe('5215512345678');
    expect(userOf('plain')).toBe('plain');
    expect(userOf(undefined)).toBe('');
  });

  it('sanitizes path parts', () => {
    expect(sanitizePathPart('+52 1/x@s.whatsapp.net')).toBe('_52_1_x_s.whatsapp.net');
    expect(sanitizePathPart('  ')).toBe('unknown');
  });
});
