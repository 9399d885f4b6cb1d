/**
 * Chat transport backed by a chat MCP server. The same primitives as the
 * Bot API transport, issued as tool calls; tool results carry Bot API
 * shaped JSON in their text content.
 */

import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { scopedLogger } from '../logger.js';
import { parseUpdates, sentMessageSchema } from '../output/telegram.js';
import type { ChatTransport, ChatUpdate, ChoiceOption } from '../types/index.js';

export type McpTransportKind = 'sse' | 'streamable-http';

export interface McpChatTransportOptions {
  url: string;
  token: string;
  transport?: McpTransportKind;
  connectTimeoutMs?: number;
}

/** Tool names exposed by the chat MCP server. */
export const CHAT_TOOLS = {
  getUpdates: 'get_updates',
  send: 'send_message',
  sendWithButtons: 'send_message_with_buttons',
  edit: 'edit_message',
  answerCallback: 'answer_callback',
} as const;

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
});

/** JSON carried by the first text block of a tool result, or the raw text. */
export function toolResultPayload(result: unknown): { ok: boolean; payload: unknown } {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success || parsed.data.isError) return { ok: false, payload: undefined };

  const text = parsed.data.content.find(block => block.type === 'text')?.text;
  if (text === undefined) return { ok: true, payload: undefined };
  try {
    return { ok: true, payload: JSON.parse(text) };
  } catch {
    // Plain-text acknowledgements are fine
    return { ok: true, payload: text };
  }
}

export class McpChatTransport implements ChatTransport {
  private readonly log = scopedLogger('McpChatTransport');
  private client: Client | null = null;
  private transport: SSEClientTransport | StreamableHTTPClientTransport | null = null;

  constructor(private readonly options: McpChatTransportOptions) {}

  private async connect(): Promise<Client> {
    if (this.client) return this.client;

    const { url, token } = this.options;
    const authHeaders: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};

    let transport: SSEClientTransport | StreamableHTTPClientTransport;
    if ((this.options.transport ?? 'streamable-http') === 'streamable-http') {
      transport = new StreamableHTTPClientTransport(new URL('/mcp', url), {
        requestInit: { headers: authHeaders },
      });
    } else {
      transport = new SSEClientTransport(new URL('/sse', url), {
        requestInit: { headers: authHeaders },
      });
    }
    const client = new Client({ name: 'pbp-steward', version: '0.1.0' }, { capabilities: {} });

    const timeoutMs = this.options.connectTimeoutMs ?? 10_000;
    let connectTimer: ReturnType<typeof setTimeout> | null = null;
    try {
      await Promise.race([
        client.connect(transport),
        new Promise<never>((_, reject) => {
          connectTimer = setTimeout(() => {
            transport.close().catch((err: unknown) => this.log.debug('close after timeout failed:', err));
            reject(new Error(`MCP connect timed out after ${timeoutMs}ms`));
          }, timeoutMs);
        }),
      ]);
    } finally {
      if (connectTimer) clearTimeout(connectTimer);
    }

    transport.onerror = (err) => {
      this.log.warn('transport error:', err);
    };

    this.client = client;
    this.transport = transport;
    this.log.info(`connected to ${url}`);
    return client;
  }

  /** Call a chat tool; `ok: false` on any failure, never throws. */
  private async call(name: string, args: Record<string, unknown>): Promise<{ ok: boolean; payload: unknown }> {
    try {
      const client = await this.connect();
      const outcome = toolResultPayload(await client.callTool({ name, arguments: args }));
      if (!outcome.ok) this.log.warn(`${name} returned an error result`);
      return outcome;
    } catch (err) {
      this.log.warn(`${name} failed:`, err);
      return { ok: false, payload: undefined };
    }
  }

  async fetchUpdates(offset: number): Promise<ChatUpdate[]> {
    const { ok, payload } = await this.call(CHAT_TOOLS.getUpdates, { offset, limit: 100 });
    return ok ? parseUpdates(payload) : [];
  }

  async send(chatId: number, threadId: number, text: string): Promise<boolean> {
    const { ok } = await this.call(CHAT_TOOLS.send, { chat_id: chatId, thread_id: threadId, text });
    return ok;
  }

  async sendWithChoices(chatId: number, threadId: number, text: string, options: ChoiceOption[]): Promise<number | null> {
    const { ok, payload } = await this.call(CHAT_TOOLS.sendWithButtons, {
      chat_id: chatId,
      thread_id: threadId,
      text,
      buttons: options.map(o => ({ text: o.label, callback_data: o.data })),
    });
    if (!ok) return null;
    const sent = sentMessageSchema.safeParse(payload);
    return sent.success ? sent.data.message_id : null;
  }

  async edit(chatId: number, messageId: number, text: string): Promise<boolean> {
    const { ok } = await this.call(CHAT_TOOLS.edit, {
      chat_id: chatId,
      message_id: messageId,
      text,
      parse_mode: 'HTML',
    });
    return ok;
  }

  async acknowledge(callbackId: string, text: string): Promise<boolean> {
    const { ok } = await this.call(CHAT_TOOLS.answerCallback, { callback_query_id: callbackId, text });
    return ok;
  }

  async close(): Promise<void> {
    if (!this.transport) return;
    try {
      await this.transport.close();
      this.log.info('disconnected');
    } catch (err) {
      this.log.warn('error disconnecting:', err);
    } finally {
      this.client = null;
      this.transport = null;
    }
  }
}
