// pipeline/command-parser.ts — Raw input (JSON object or text line) → Command
//
// JSON form:  { "command": "move-robot", "robotId": 1, "destination": "foo mine" }
// Text form:  move 1 foo mine | mine 1 bar | assemble 1 | sell 1 | buy 1 | wait 5

import type { Command, CommandType } from '../types/index.js';
import * as commands from './commands.js';

const COMMAND_ALIASES: ReadonlyMap<string, CommandType> = new Map<string, CommandType>([
  ['move-robot', 'move-robot'],
  ['move', 'move-robot'],
  ['mine', 'mine'],
  ['assemble', 'assemble'],
  ['sell-foobars', 'sell-foobars'],
  ['sell', 'sell-foobars'],
  ['buy-robot', 'buy-robot'],
  ['buy', 'buy-robot'],
  ['wait', 'wait'],
]);

export const COMMAND_HELP: readonly string[] = [
  'move <robot> <location>   e.g. move 1 foo mine',
  'mine <robot> <foo|bar>',
  'assemble <robot>',
  'sell <robot>',
  'buy <robot>',
  'wait <seconds>',
];

/**
 * Parses a JSON object into a Command. Returns null when the shape is wrong;
 * names of locations and materials are checked later by the factory.
 */
export function parseCommand(raw: unknown): Command | null {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return null;
  const obj = raw as Record<string, unknown>;
  if (typeof obj.command !== 'string') return null;

  const type = COMMAND_ALIASES.get(obj.command.trim().toLowerCase());
  if (!type) return null;

  if (type === 'wait') {
    const seconds = parseCount(obj.seconds);
    return seconds === null ? null : commands.wait(seconds);
  }

  const robotId = parseCount(obj.robotId);
  if (robotId === null) return null;

  switch (type) {
    case 'move-robot':
      if (typeof obj.destination !== 'string' || obj.destination.trim() === '') return null;
      return commands.moveRobot(robotId, obj.destination);
    case 'mine':
      if (typeof obj.material !== 'string' || obj.material.trim() === '') return null;
      return commands.mine(robotId, obj.material);
    case 'assemble':
      return commands.assemble(robotId);
    case 'sell-foobars':
      return commands.sellFoobars(robotId);
    case 'buy-robot':
      return commands.buyRobot(robotId);
  }
}

/** Accepts either a JSON object or the space-separated text form. */
export function parseCommandLine(line: string): Command | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  if (trimmed.startsWith('{')) {
    try {
      return parseCommand(JSON.parse(trimmed));
    } catch {
      return null;
    }
  }

  const [name, first, ...rest] = trimmed.split(/\s+/);
  if (name === undefined) return null;
  const type = COMMAND_ALIASES.get(name.toLowerCase());
  if (!type) return null;

  if (type === 'wait') {
    return parseCommand({ command: type, seconds: first === undefined ? undefined : Number(first) });
  }

  const robotId = first === undefined ? undefined : Number(first);
  switch (type) {
    case 'move-robot':
      return parseCommand({ command: type, robotId, destination: rest.join(' ') });
    case 'mine':
      return parseCommand({ command: type, robotId, material: rest.join(' ') });
    default:
      return rest.length > 0 ? null : parseCommand({ command: type, robotId });
  }
}

function parseCount(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) return null;
  return value;
}
