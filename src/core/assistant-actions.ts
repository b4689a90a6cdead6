export const COMPLETION_MARKER = 'IMPLEMENTATION_COMPLETE';

export type AssistantAction =
  | { kind: 'complete' }
  | { kind: 'suggested-commands'; hints: string[] }
  | { kind: 'continue' };

/**
 * Classify a free-text reply from the implementation loop. Only the completion
 * marker ends the loop; suggested commands are reported, never executed.
 */
export function interpretReply(reply: string, commandHints: readonly string[]): AssistantAction {
  if (reply.toUpperCase().includes(COMPLETION_MARKER)) {
    return { kind: 'complete' };
  }

  const lower = reply.toLowerCase();
  const hints = commandHints.filter((hint) => hint && lower.includes(hint.toLowerCase()));
  if (hints.length > 0) {
    return { kind: 'suggested-commands', hints };
  }

  return { kind: 'continue' };
}
