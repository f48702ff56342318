// tests/command-parser.test.ts — JSON and text command parsing

import { describe, it, expect } from 'vitest';
import { parseCommand, parseCommandLine } from '../src/pipeline/command-parser.js';
import * as commands from '../src/pipeline/commands.js';

describe('parseCommand', () => {
  it('should build each command from its JSON shape', () => {
    expect(parseCommand({ command: 'move-robot', robotId: 1, destination: 'foo mine' }))
      .toEqual(commands.moveRobot(1, 'foo mine'));
    expect(parseCommand({ command: 'mine', robotId: 2, material: 'bar' })).toEqual(commands.mineBar(2));
    expect(parseCommand({ command: 'assemble', robotId: 3 })).toEqual(commands.assemble(3));
    expect(parseCommand({ command: 'sell-foobars', robotId: 4 })).toEqual(commands.sellFoobars(4));
    expect(parseCommand({ command: 'buy-robot', robotId: 5 })).toEqual(commands.buyRobot(5));
    expect(parseCommand({ command: 'wait', seconds: 10 })).toEqual(commands.wait(10));
  });

  it('should accept short names in any case', () => {
    expect(parseCommand({ command: 'SELL', robotId: 1 })).toEqual(commands.sellFoobars(1));
    expect(parseCommand({ command: ' Buy ', robotId: 1 })).toEqual(commands.buyRobot(1));
  });

  it('should leave place and material names for the factory to check', () => {
    expect(parseCommand({ command: 'move', robotId: 1, destination: 'moon' }))
      .toEqual(commands.moveRobot(1, 'moon'));
  });

  it('should return null for an array', () => {
    expect(parseCommand([{ command: 'wait', seconds: 1 }])).toBeNull();
  });

  it.each([
    null,
    'wait 1',
    {},
    { command: 'dance', robotId: 1 },
    { command: 'assemble' },
    { command: 'assemble', robotId: '1' },
    { command: 'assemble', robotId: -1 },
    { command: 'move-robot', robotId: 1 },
    { command: 'move-robot', robotId: 1, destination: '  ' },
    { command: 'mine', robotId: 1 },
    { command: 'wait', seconds: 1.5 },
  ])('should return null for %j', (raw) => {
    expect(parseCommand(raw)).toBeNull();
  });
});

describe('parseCommandLine', () => {
  it('should parse the text form', () => {
    expect(parseCommandLine('move 1 foo mine')).toEqual(commands.moveRobot(1, 'foo mine'));
    expect(parseCommandLine('  mine 2   bar ')).toEqual(commands.mineBar(2));
    expect(parseCommandLine('assemble 3')).toEqual(commands.assemble(3));
    expect(parseCommandLine('sell 4')).toEqual(commands.sellFoobars(4));
    expect(parseCommandLine('buy 5')).toEqual(commands.buyRobot(5));
    expect(parseCommandLine('wait 5')).toEqual(commands.wait(5));
  });

  it('should parse a JSON line', () => {
    expect(parseCommandLine('{"command":"wait","seconds":3}')).toEqual(commands.wait(3));
  });

  it.each(['', '   ', 'wait', 'wait soon', 'assemble', 'assemble 1 now', 'fly 1', '{"command":', 'move x foo mine'])(
    'should return null for %j',
    (line) => {
      expect(parseCommandLine(line)).toBeNull();
    },
  );
});
