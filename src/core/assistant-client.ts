export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface AssistantRequest {
  system: string;
  messages: readonly ConversationTurn[];
}

/**
 * A conversational model treated as an opaque request/response oracle.
 */
export interface AssistantClient {
  readonly model: string;
  complete(request: AssistantRequest): Promise<string>;
}
