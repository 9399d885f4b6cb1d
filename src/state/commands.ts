/**
 * Chat commands parsed from campaign thread messages.
 * Format: /command[@botname] [args...]
 */

export type CommandName =
  | 'help'
  | 'status'
  | 'whosturn'
  | 'combatlog'
  | 'round'
  | 'combat'
  | 'next'
  | 'enemies'
  | 'clog'
  | 'endcombat'
  | 'pause'
  | 'resume';

export interface ChatCommand {
  name: CommandName;
  /** Whitespace-split arguments. */
  args: string[];
  /** Everything after the command word, trimmed. */
  rest: string;
}

const COMMAND_PATTERN = /^\/(\w+)(?:@\w+)?(?:\s+([\s\S]*))?$/;

const COMMAND_NAMES: readonly CommandName[] = [
  'help', 'status', 'whosturn', 'combatlog',
  'round', 'combat', 'next', 'enemies', 'clog', 'endcombat',
  'pause', 'resume',
];

/** Commands only a campaign's GM may issue. */
export const GM_COMMANDS: ReadonlySet<CommandName> = new Set<CommandName>([
  'round', 'combat', 'next', 'enemies', 'clog', 'endcombat', 'pause', 'resume',
]);

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some(name => name === value);
}

/**
 * Parse a chat message for a command.
 * Returns null if the message isn't a known command.
 */
export function parseCommand(text: string): ChatCommand | null {
  const match = text.trim().match(COMMAND_PATTERN);
  if (!match) return null;

  const name = match[1].toLowerCase();
  if (!isCommandName(name)) return null;

  const rest = (match[2] ?? '').trim();
  return {
    name,
    args: rest ? rest.split(/\s+/) : [],
    rest,
  };
}

/** Split a comma-separated enemy roster, dropping blanks. */
export function parseEnemyList(text: string): string[] {
  return text.split(',').map(e => e.trim()).filter(e => e.length > 0);
}
