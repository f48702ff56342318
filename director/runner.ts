// director/runner.ts — Feeds a director's commands to a factory until the game ends

import type { Command, CommandOutcome } from '../src/types/index.js';
import type { RoboticFactory } from '../src/factory/robotic-factory.js';
import { GameOver } from '../src/shared/errors.js';

/** Commands allowed between two waits before a director counts as stuck. */
export const MAX_COMMANDS_PER_ROUND = 10_000;

export interface RunOptions {
  /** stop (without GameOver) once this many simulated seconds have passed */
  maxSeconds?: number;
  onCommand?: (outcome: CommandOutcome) => void;
  /** called after every executed wait, e.g. to redraw a screen */
  onWait?: (factory: RoboticFactory) => void | Promise<void>;
}

export type StopReason = 'game-over' | 'time-limit' | 'director-exhausted';

export interface RunResult {
  reason: StopReason;
  elapsedSeconds: number;
  robotsNb: number;
  commands: number;
}

export async function runDirector(
  factory: RoboticFactory,
  director: Iterable<Command>,
  options: RunOptions = {},
): Promise<RunResult> {
  const maxSeconds = options.maxSeconds ?? Number.POSITIVE_INFINITY;
  let executed = 0;
  let sinceWait = 0;

  const result = (reason: StopReason): RunResult => ({
    reason,
    elapsedSeconds: factory.elapsedSeconds,
    robotsNb: factory.stock.robotsNb,
    commands: executed,
  });

  for (const command of director) {
    if (command.type === 'wait' && factory.elapsedSeconds + command.seconds > maxSeconds) {
      return result('time-limit');
    }

    let outcome: CommandOutcome;
    try {
      outcome = factory.execute(command);
    } catch (err) {
      if (err instanceof GameOver) {
        executed++;
        await options.onWait?.(factory);
        return result('game-over');
      }
      throw err;
    }
    executed++;
    options.onCommand?.(outcome);

    if (command.type === 'wait') {
      sinceWait = 0;
      await options.onWait?.(factory);
    } else if (++sinceWait > MAX_COMMANDS_PER_ROUND) {
      throw new Error(`Director issued ${MAX_COMMANDS_PER_ROUND} commands without waiting`);
    }
  }

  return result('director-exhausted');
}
