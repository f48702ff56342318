// tests/screen.test.ts — Text rendering of factory snapshots

import { describe, it, expect } from 'vitest';
import { renderLocations, renderResources, renderScreen } from '../cli/screen.js';
import * as commands from '../src/pipeline/commands.js';
import { buildFactory, robotAt } from './helpers.js';

describe('screen', () => {
  it('should summarize resources on one line', () => {
    const { factory } = buildFactory({
      robots: [robotAt(1), robotAt(2)],
      stock: { foos: 3, bars: 1, foobars: 2, money: 1250 },
    });
    factory.execute(commands.wait(65));

    expect(renderResources(factory.snapshot())).toBe(
      'FOOS: 3 | BARS: 1 | FOOBARS: 2 | MONEY: $12.50 | ROBOTS: 2 | TIME: 00:01:05',
    );
  });

  it('should group robots by location', () => {
    const { factory } = buildFactory({ robots: [robotAt(1, 'foo-mine'), robotAt(2), robotAt(3, 'foo-mine')] });
    factory.execute(commands.mineFoo(3));
    factory.execute(commands.moveRobot(2, 'Bar Mine'));

    expect(renderLocations(factory.snapshot())).toEqual([
      'CAFETERIA',
      '  (nobody)',
      'FOO MINE',
      '  #1 Idle',
      '  #3 Mining foo at Foo Mine',
      'BAR MINE',
      '  (nobody)',
      'ASSEMBLY LINE',
      '  (nobody)',
      'MATERIAL STORE',
      '  (nobody)',
      'ROBOTS STORE',
      '  (nobody)',
      'ON MY WAY',
      '  #2 Moving',
    ]);
  });

  it('should show only the latest log lines and the instructions', () => {
    const { factory } = buildFactory({ robots: [] });

    const screen = renderScreen(factory.snapshot(), {
      logs: ['one', 'two', 'three'],
      logLines: 2,
      instructions: 'Type a command',
    });

    expect(screen.split('\n').slice(-8)).toEqual([
      'ON MY WAY',
      '  (nobody)',
      '',
      'LOGS',
      '  two',
      '  three',
      '',
      'Type a command',
    ]);
  });

  it('should leave out empty sections', () => {
    const { factory } = buildFactory({ robots: [] });
    const screen = renderScreen(factory.snapshot());
    expect(screen.split('\n')).toHaveLength(2 + 14);
  });
});
