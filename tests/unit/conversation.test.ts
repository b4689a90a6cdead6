vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    header: vi.fn(),
    dim: vi.fn(),
  },
}));

import { AssistantConversation, ConversationSession } from '../../src/core/conversation.js';
import { logger } from '../../src/ui/logger.js';
import { ScriptedAssistant } from './helpers/fakes.js';

describe('AssistantConversation', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should send the full history plus the new user turn', async () => {
    const assistant = new ScriptedAssistant((_req, i) => `reply ${i + 1}`);
    const conversation = new AssistantConversation(assistant, new ConversationSession(), () => 'system');

    await conversation.send('first');
    const reply = await conversation.send('second');

    expect(reply).toBe('reply 2');
    expect(assistant.requests[1].messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'reply 1' },
      { role: 'user', content: 'second' },
    ]);
    expect(conversation.history).toHaveLength(4);
  });

  it('should rebuild the system prompt on every call', async () => {
    let builds = 0;
    const assistant = new ScriptedAssistant(() => 'ok');
    const conversation = new AssistantConversation(assistant, new ConversationSession(), () => {
      builds++;
      return `system ${builds}`;
    });

    await conversation.send('a');
    await conversation.send('b');

    expect(assistant.requests.map((r) => r.system)).toEqual(['system 1', 'system 2']);
  });

  it('should use an explicit system prompt override without building the default', async () => {
    const build = vi.fn(() => 'default');
    const assistant = new ScriptedAssistant(() => 'ok');
    const conversation = new AssistantConversation(assistant, new ConversationSession(), build);

    await conversation.send('a', 'override');

    expect(assistant.requests[0].system).toBe('override');
    expect(build).not.toHaveBeenCalled();
  });

  it('should log and rethrow oracle failures without touching the history', async () => {
    const assistant = new ScriptedAssistant(() => {
      throw new Error('rate limited');
    });
    const conversation = new AssistantConversation(assistant, new ConversationSession(), () => 'system');

    await expect(conversation.send('hello')).rejects.toThrow('rate limited');
    expect(logger.error).toHaveBeenCalledWith('API call failed: rate limited');
    expect(conversation.history).toEqual([]);
  });
});

describe('ConversationSession', () => {
  it('should grow without bound by default', () => {
    const session = new ConversationSession();
    for (let i = 0; i < 30; i++) {
      session.appendExchange(`q${i}`, `a${i}`);
    }
    expect(session.length).toBe(60);
  });

  it('should drop the oldest exchanges beyond maxRetainedTurns', () => {
    const session = new ConversationSession({ maxRetainedTurns: 4 });
    session.appendExchange('q1', 'a1');
    session.appendExchange('q2', 'a2');
    session.appendExchange('q3', 'a3');

    expect(session.history).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
      { role: 'user', content: 'q3' },
      { role: 'assistant', content: 'a3' },
    ]);
  });
});
