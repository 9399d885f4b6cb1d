/**
 * Chat transport over the Telegram Bot API.
 * Every primitive reports failure as false/null and logs why.
 */

import { z } from 'zod';
import { scopedLogger } from '../logger.js';
import type { ChatTransport, ChatUpdate, ChatUser, ChoiceOption } from '../types/index.js';

const userSchema = z.object({
  id: z.number(),
  is_bot: z.boolean().default(false),
  first_name: z.string().default(''),
  last_name: z.string().default(''),
  username: z.string().default(''),
});

const updateSchema = z.object({
  update_id: z.number().int(),
  message: z.object({
    message_id: z.number(),
    chat: z.object({ id: z.number() }),
    message_thread_id: z.number().optional(),
    from: userSchema.optional(),
    date: z.number(),
    text: z.string().default(''),
  }).optional(),
  callback_query: z.object({
    id: z.string(),
    from: userSchema,
    data: z.string().default(''),
    message: z.object({
      message_id: z.number(),
      chat: z.object({ id: z.number() }),
    }).optional(),
  }).optional(),
});

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

type TelegramUser = z.infer<typeof userSchema>;
type TelegramUpdate = z.infer<typeof updateSchema>;

function toChatUser(user: TelegramUser): ChatUser {
  return {
    id: String(user.id),
    firstName: user.first_name,
    lastName: user.last_name,
    username: user.username,
    isBot: user.is_bot,
  };
}

/** Normalise a Bot API update; only the parts the engine reads survive. */
export function toChatUpdate(update: TelegramUpdate): ChatUpdate {
  const result: ChatUpdate = { updateId: update.update_id };
  const { message, callback_query: callback } = update;

  if (message?.from) {
    result.message = {
      chatId: message.chat.id,
      threadId: message.message_thread_id ?? null,
      from: toChatUser(message.from),
      text: message.text.trim(),
      sentAt: message.date * 1000,
    };
  }
  if (callback) {
    result.callback = {
      id: callback.id,
      data: callback.data,
      from: toChatUser(callback.from),
      chatId: callback.message?.chat.id ?? null,
      messageId: callback.message?.message_id ?? null,
    };
  }
  return result;
}

const updateIdSchema = z.object({ update_id: z.number().int() });

/**
 * Parse a `getUpdates` result array. An update that does not fit keeps
 * only its id, so the fetch offset still moves past it.
 */
export function parseUpdates(result: unknown): ChatUpdate[] {
  if (!Array.isArray(result)) return [];
  const updates: ChatUpdate[] = [];
  for (const raw of result) {
    const parsed = updateSchema.safeParse(raw);
    if (parsed.success) {
      updates.push(toChatUpdate(parsed.data));
      continue;
    }
    const id = updateIdSchema.safeParse(raw);
    if (id.success) updates.push({ updateId: id.data.update_id });
  }
  return updates;
}

export const sentMessageSchema = z.object({ message_id: z.number() });

export interface TelegramTransportOptions {
  apiBase?: string;
  timeoutMs?: number;
}

export class TelegramTransport implements ChatTransport {
  private readonly log = scopedLogger('Telegram');
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(token: string, options: TelegramTransportOptions = {}) {
    this.baseUrl = `${options.apiBase ?? 'https://api.telegram.org'}/bot${token}`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /** POST a Bot API method; the `result` on success, undefined on any failure. */
  private async call(method: string, payload: Record<string, unknown>): Promise<unknown> {
    try {
      const response = await fetch(`${this.baseUrl}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const envelope = envelopeSchema.safeParse(await response.json());
      if (!response.ok || !envelope.success || !envelope.data.ok) {
        const reason = envelope.success ? envelope.data.description ?? '' : 'malformed response';
        this.log.warn(`${method} failed: HTTP ${response.status} ${reason}`);
        return undefined;
      }
      return envelope.data.result;
    } catch (err) {
      this.log.warn(`${method} failed:`, err);
      return undefined;
    }
  }

  async fetchUpdates(offset: number): Promise<ChatUpdate[]> {
    const result = await this.call('getUpdates', {
      offset,
      limit: 100,
      timeout: 5,
      allowed_updates: ['message', 'callback_query'],
    });
    return parseUpdates(result);
  }

  async send(chatId: number, threadId: number, text: string): Promise<boolean> {
    const result = await this.call('sendMessage', {
      chat_id: chatId,
      message_thread_id: threadId,
      text,
    });
    return result !== undefined;
  }

  async sendWithChoices(chatId: number, threadId: number, text: string, options: ChoiceOption[]): Promise<number | null> {
    const result = await this.call('sendMessage', {
      chat_id: chatId,
      message_thread_id: threadId,
      text,
      reply_markup: {
        inline_keyboard: [options.map(o => ({ text: o.label, callback_data: o.data }))],
      },
    });
    const sent = sentMessageSchema.safeParse(result);
    return sent.success ? sent.data.message_id : null;
  }

  /** Replace a message's text (HTML parse mode) and drop its buttons. */
  async edit(chatId: number, messageId: number, text: string): Promise<boolean> {
    const result = await this.call('editMessageText', {
      chat_id: chatId,
      message_id: messageId,
      text,
      parse_mode: 'HTML',
    });
    return result !== undefined;
  }

  async acknowledge(callbackId: string, text: string): Promise<boolean> {
    const result = await this.call('answerCallbackQuery', { callback_query_id: callbackId, text });
    return result !== undefined;
  }

  async close(): Promise<void> {
    // Stateless HTTP; nothing to release
  }
}
