import { config } from '../../config';
import { ChatwootError } from '../../shared/errors';
import { logger } from '../../infra/logging/logger';

/** Outbound text channel to a phone number. */
export interface Messaging {
  sendText(phone: string, text: string): Promise<void>;
}

interface SendMessageOptions {
  isPrivate?: boolean;
}

export interface ChatwootClientOptions {
  baseUrl: string;
  apiKey: string;
  accountId: number;
}

export class ChatwootClient implements Messaging {
  private baseUrl: string;
  private apiKey: string;
  private accountId: number;

  constructor(options: ChatwootClientOptions = {
    baseUrl: config.chatwootUrl,
    apiKey: config.chatwootApiKey,
    accountId: config.chatwootAccountId,
  }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.accountId = options.accountId;
  }

  /**
   * Send text to the most recent conversation of a phone number
   */
  async sendText(phone: string, text: string): Promise<void> {
    const conversationId = await this.findConversationByPhone(phone);
    if (conversationId === null) {
      throw new ChatwootError(`No conversation found for ${maskPhone(phone)}`);
    }
    await this.sendMessage(conversationId, text);
  }

  /**
   * Send a message to a conversation
   */
  async sendMessage(
    conversationId: number,
    content: string,
    options: SendMessageOptions = {}
  ): Promise<void> {
    const url = `${this.baseUrl}/api/v1/accounts/${this.accountId}/conversations/${conversationId}/messages`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'api_access_token': this.apiKey,
        },
        body: JSON.stringify({
          content,
          message_type: 'outgoing',
          private: options.isPrivate ?? false,
        }),
      });

      if (!response.ok) {
        const error = await response.text();
        throw new ChatwootError(`Failed to send message: ${response.status} ${error}`);
      }

      logger.debug({ conversationId, contentLength: content.length }, 'Message sent via Chatwoot');
    } catch (error) {
      throw asChatwootError(error);
    }
  }

  /**
   * Find the most recent conversation for a phone number
   * 1. Search contacts by phone → 2. Get contact's conversations
   */
  async findConversationByPhone(phone: string): Promise<number | null> {
    try {
      // Step 1: Search for contact by phone
      const searchUrl = `${this.baseUrl}/api/v1/accounts/${this.accountId}/contacts/search?q=${encodeURIComponent(phone)}`;
      const searchResponse = await fetch(searchUrl, {
        headers: { 'api_access_token': this.apiKey },
      });

      if (!searchResponse.ok) {
        throw new ChatwootError(`Failed to search contacts: ${searchResponse.status}`);
      }

      const contact = firstPayloadId(await searchResponse.json());
      if (contact === null) return null;

      // Step 2: Get conversations for this contact
      const convUrl = `${this.baseUrl}/api/v1/accounts/${this.accountId}/contacts/${contact}/conversations`;
      const convResponse = await fetch(convUrl, {
        headers: { 'api_access_token': this.apiKey },
      });

      if (!convResponse.ok) {
        throw new ChatwootError(`Failed to get contact conversations: ${convResponse.status}`);
      }

      return firstPayloadId(await convResponse.json());
    } catch (error) {
      throw asChatwootError(error);
    }
  }
}

function firstPayloadId(body: unknown): number | null {
  if (typeof body !== 'object' || body === null || !('payload' in body)) return null;
  const { payload } = body;
  if (!Array.isArray(payload)) return null;

  const first: unknown = payload[0];
  if (typeof first !== 'object' || first === null || !('id' in first)) return null;
  return typeof first.id === 'number' ? first.id : null;
}

function asChatwootError(error: unknown): ChatwootError {
  if (error instanceof ChatwootError) return error;
  const err = error instanceof Error ? error : new Error(String(error));
  return new ChatwootError(`Network error: ${err.message}`, err);
}

function maskPhone(phone: string): string {
  return phone.length > 4 ? `***${phone.slice(-4)}` : '***';
}
