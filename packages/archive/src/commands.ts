/**
 * Command links in the archive comment: `[command: NAME](#HREF)`.
 */

import type { Command } from './types';

// NAME runs to the first `]`, HREF to the first `)`; a link never spans lines.
const COMMAND_LINK_RE = /\[command:([^\]\n]*)\]\s*\(#([^)\n]*)\)/g;

/**
 * Parse a single link. Surrounding whitespace is allowed, nothing else.
 */
export function parseCommand(input: string): Command | null {
  const trimmed = input.trim();
  const commands = extractCommands(trimmed);
  if (commands.length !== 1 || !trimmed.startsWith('[command:') || !trimmed.endsWith(')')) {
    return null;
  }
  return commands[0];
}

/**
 * Every well-formed command link in `text`, in order of appearance.
 */
export function extractCommands(text: string): Command[] {
  const commands: Command[] = [];
  for (const match of text.matchAll(COMMAND_LINK_RE)) {
    const name = match[1].trim();
    const href = match[2];
    if (name === '' || href === '') continue;
    commands.push({ name, href });
  }
  return commands;
}
