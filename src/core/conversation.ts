import { logger } from '../ui/logger.js';
import type { AssistantClient, ConversationTurn } from './assistant-client.js';

export interface ConversationSessionOptions {
  /**
   * Upper bound on retained turns. When exceeded, the oldest user/assistant
   * pairs are dropped so the history still opens with a user turn.
   * Unbounded when omitted.
   */
  maxRetainedTurns?: number;
}

export class ConversationSession {
  private readonly turns: ConversationTurn[] = [];
  private readonly maxRetainedTurns?: number;

  constructor(options: ConversationSessionOptions = {}) {
    this.maxRetainedTurns = options.maxRetainedTurns;
  }

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }

  get length(): number {
    return this.turns.length;
  }

  appendExchange(userMessage: string, assistantReply: string): void {
    this.turns.push({ role: 'user', content: userMessage });
    this.turns.push({ role: 'assistant', content: assistantReply });

    if (this.maxRetainedTurns !== undefined) {
      while (this.turns.length > this.maxRetainedTurns) {
        this.turns.splice(0, 2);
      }
    }
  }
}

export class AssistantConversation {
  private readonly client: AssistantClient;
  private readonly session: ConversationSession;
  private readonly buildSystemPrompt: () => string;

  constructor(client: AssistantClient, session: ConversationSession, buildSystemPrompt: () => string) {
    this.client = client;
    this.session = session;
    this.buildSystemPrompt = buildSystemPrompt;
  }

  get history(): readonly ConversationTurn[] {
    return this.session.history;
  }

  /**
   * Send `message` with the full history. The history only grows once the
   * oracle has answered, so a failed call leaves it untouched.
   */
  async send(message: string, systemPrompt?: string): Promise<string> {
    const messages: ConversationTurn[] = [...this.session.history, { role: 'user', content: message }];

    let reply: string;
    try {
      reply = await this.client.complete({
        system: systemPrompt ?? this.buildSystemPrompt(),
        messages,
      });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.error(`API call failed: ${msg}`);
      throw error;
    }

    this.session.appendExchange(message, reply);
    return reply;
  }
}
