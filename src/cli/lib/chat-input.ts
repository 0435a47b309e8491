/**
 * Chat input routing
 *
 * A line is a command only when its first word is a known command and every
 * other word is a flag that command takes. Anything else is a message.
 */

export const CHAT_COMMANDS = ['coping', 'mood', 'resources', 'history', 'clear', 'help', 'quit', 'exit'] as const;

export type ChatCommand = (typeof CHAT_COMMANDS)[number];

const COMMAND_FLAGS: Record<ChatCommand, readonly string[]> = {
  coping: [],
  mood: [],
  resources: [],
  history: [],
  clear: ['--all'],
  help: [],
  quit: [],
  exit: [],
};

export type ChatInput =
  | { kind: 'empty' }
  | { kind: 'message'; text: string }
  | { kind: 'command'; command: ChatCommand; flags: string[] };

function toChatCommand(word: string): ChatCommand | undefined {
  if (!word.startsWith('/')) {
    return undefined;
  }
  const name = word.slice(1).toLowerCase();
  return CHAT_COMMANDS.find((command) => command === name);
}

export function parseChatInput(line: string): ChatInput {
  const text = line.trim();
  if (!text) {
    return { kind: 'empty' };
  }

  const [first, ...rest] = text.split(/\s+/);
  const command = toChatCommand(first);
  if (!command) {
    return { kind: 'message', text };
  }

  const flags = rest.map((word) => word.toLowerCase());
  if (!flags.every((flag) => COMMAND_FLAGS[command].includes(flag))) {
    return { kind: 'message', text };
  }

  return { kind: 'command', command, flags };
}
