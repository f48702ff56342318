// cli/play.ts — Line-driven play: one command per stdin line, one JSON reply per stdout line

import { createInterface, type Interface } from 'node:readline';
import type { CommandOutcome, FactorySnapshot } from '../src/types/index.js';
import type { RoboticFactory } from '../src/factory/robotic-factory.js';
import { parseCommandLine, COMMAND_HELP } from '../src/pipeline/command-parser.js';
import { GameOver } from '../src/shared/errors.js';

export type PlayReply =
  | { type: 'outcome'; outcome: CommandOutcome; snapshot: FactorySnapshot }
  | { type: 'error'; message: string; help: readonly string[] }
  | { type: 'game-over'; robotsNb: number; elapsedSeconds: number; snapshot: FactorySnapshot };

/** Empty lines get no reply. */
export function handleLine(factory: RoboticFactory, line: string): PlayReply | null {
  if (line.trim() === '') return null;

  const command = parseCommandLine(line);
  if (!command) {
    return { type: 'error', message: `Cannot parse command: ${line.trim()}`, help: COMMAND_HELP };
  }

  try {
    const outcome = factory.execute(command);
    return { type: 'outcome', outcome, snapshot: factory.snapshot() };
  } catch (err) {
    if (err instanceof GameOver) {
      return {
        type: 'game-over',
        robotsNb: err.robotsNb,
        elapsedSeconds: err.elapsedSeconds,
        snapshot: factory.snapshot(),
      };
    }
    throw err;
  }
}

export function writeReply(reply: PlayReply): void {
  process.stdout.write(JSON.stringify(reply) + '\n');
}

/** Resolves when stdin closes or the game ends. */
export function startPlay(factory: RoboticFactory, input: NodeJS.ReadableStream = process.stdin): Promise<void> {
  const rl: Interface = createInterface({ input, terminal: false });

  let closed = false;

  return new Promise<void>((resolve, reject) => {
    rl.on('line', (line: string) => {
      // lines already buffered in the same chunk still arrive after close()
      if (closed) return;
      try {
        const reply = handleLine(factory, line);
        if (!reply) return;
        writeReply(reply);
        if (reply.type === 'game-over') rl.close();
      } catch (err) {
        rl.close();
        reject(err);
      }
    });
    rl.on('close', () => {
      closed = true;
      resolve();
    });
  });
}
