// factory/robotic-factory.ts — Command dispatcher + tick driver
// Domain errors raised while routing a command are logged and the command
// is dropped. GameOver is the only error that leaves execute()/wait().

import type {
  Command,
  CommandOutcome,
  Completion,
  FactorySnapshot,
  Robot,
  RobotCommand,
  RobotId,
  RobotState,
  Settings,
  TickResult,
} from '../types/index.js';
import { Stock } from './stock.js';
import { SeededRng, type RandomSource } from './rng.js';
import { DEFAULT_SETTINGS } from './settings.js';
import * as robotState from '../pipeline/robot-state.js';
import { locationFromName, locationName, SPAWN_LOCATION } from '../data/locations.js';
import { extractionTime, materialFromName } from '../data/materials.js';
import { GameOver, InvalidCommand, isDomainError } from '../shared/errors.js';
import { DEFAULT_SEED, LOG_PREFIX } from '../shared/constants.js';
import { formatMoney } from '../shared/utils.js';
import type { Logger } from '../shared/logger.js';

export interface FactoryOptions {
  rng?: RandomSource;
  logger?: Logger;
}

export type FactoryPhase = 'running' | 'over';

export class RoboticFactory {
  readonly stock: Stock;
  readonly settings: Readonly<Settings>;
  private readonly rng: RandomSource;
  private readonly logger: Logger;

  private tickCount = 0;
  private phase: FactoryPhase = 'running';

  constructor(stock: Stock, settings: Readonly<Settings> = DEFAULT_SETTINGS, options: FactoryOptions = {}) {
    this.stock = stock;
    this.settings = settings;
    this.rng = options.rng ?? new SeededRng(DEFAULT_SEED);
    this.logger = options.logger ?? console;
  }

  /** A fresh factory: empty stock, `initialRobotsNb` idle robots at the cafeteria. */
  static fromSettings(settings: Readonly<Settings> = DEFAULT_SETTINGS, options: FactoryOptions = {}): RoboticFactory {
    const stock = new Stock();
    for (let i = 0; i < settings.initialRobotsNb; i++) {
      stock.createRobot(SPAWN_LOCATION);
    }
    return new RoboticFactory(stock, settings, options);
  }

  get elapsedSeconds(): number {
    return this.tickCount;
  }

  get isOver(): boolean {
    return this.phase === 'over';
  }

  get robots(): readonly Robot[] {
    return this.stock.robots;
  }

  getRobot(id: RobotId): Robot | undefined {
    return this.stock.getRobot(id);
  }

  // --- Commands ---

  /** @throws GameOver (only from a `wait` command) */
  execute(command: Command): CommandOutcome {
    if (command.type === 'wait') {
      return this.runWait(command);
    }
    if (this.phase === 'over') {
      return this.reject(command, 'Game is over');
    }

    const robot = this.stock.getRobot(command.robotId);
    if (!robot) {
      this.logger.warn(`${LOG_PREFIX} Robot ${command.robotId} not found, ${command.type} ignored`);
      return { status: 'ignored', command, reason: 'Robot not found' };
    }

    // Re-issuing a move to a moving robot is a no-op, not an error.
    if (command.type === 'move-robot' && robot.state.kind === 'moving') {
      return { status: 'ignored', command, reason: 'Robot is already moving' };
    }

    try {
      this.route(command, robot);
    } catch (err) {
      return this.handleError(command, err);
    }
    return { status: 'executed', command };
  }

  private route(command: RobotCommand, robot: Robot): void {
    switch (command.type) {
      case 'move-robot': {
        const destination = locationFromName(command.destination);
        this.update(robot, robotState.move(robot.state, destination));
        this.logger.log(`${LOG_PREFIX} Robot ${robot.id} moving to ${locationName(destination)}`);
        return;
      }
      case 'mine': {
        const material = materialFromName(command.material);
        const next = robotState.mine(robot.state, material, () => extractionTime(material, this.settings, this.rng));
        this.update(robot, next);
        this.logger.log(`${LOG_PREFIX} Robot ${robot.id} mining ${material.name} for ${next.countdown}s`);
        return;
      }
      case 'assemble':
        this.update(robot, robotState.assemble(robot.state, this.stock, this.settings.assemblySuccessRate));
        this.logger.log(`${LOG_PREFIX} Robot ${robot.id} assembling a foobar`);
        return;
      case 'sell-foobars': {
        const next = robotState.sell(robot.state, this.stock, this.settings.foobarsSellingRange);
        this.update(robot, next);
        this.logger.log(`${LOG_PREFIX} Robot ${robot.id} selling ${next.batch.length} foobar(s)`);
        return;
      }
      case 'buy-robot': {
        const bought = robotState.buy(robot.state, this.stock, this.settings.robotCost);
        this.logger.log(
          `${LOG_PREFIX} Robot ${robot.id} bought robot ${bought.id} ` +
          `(${this.stock.robotsNb} robots, ${formatMoney(this.stock.money)} left)`,
        );
        return;
      }
      default:
        assertNever(command);
    }
  }

  private runWait(command: Extract<Command, { type: 'wait' }>): CommandOutcome {
    try {
      assertSeconds(command.seconds);
    } catch (err) {
      return this.handleError(command, err);
    }
    this.assertRunning();
    // Rounds only: nobody reads the tick results of a command.
    for (let i = 0; i < command.seconds; i++) {
      this.tick();
    }
    return { status: 'executed', command };
  }

  // --- Time ---

  /**
   * Runs `seconds` full rounds in roster order.
   * @throws InvalidCommand when `seconds` is not a non-negative integer
   * @throws GameOver the first round after which the roster reaches the limit
   */
  wait(seconds: number): TickResult[] {
    assertSeconds(seconds);
    this.assertRunning();
    const results: TickResult[] = [];
    for (let i = 0; i < seconds; i++) {
      results.push(this.tick());
    }
    return results;
  }

  /**
   * One simulated second for every robot.
   * @throws GameOver once the game is over, or when this round reaches the limit
   */
  tick(): TickResult {
    this.assertRunning();
    const tick = ++this.tickCount;
    const completions: Completion[] = [];
    const ctx = { stock: this.stock, rng: this.rng };

    // Snapshot the roster: robots bought during this round start next round.
    for (const robot of [...this.stock.robots]) {
      const { state, effect } = robotState.runRound(robot.state, ctx);
      if (state !== robot.state) this.update(robot, state);
      if (effect) {
        const completion: Completion = { ...effect, robotId: robot.id };
        completions.push(completion);
        this.logCompletion(completion);
      }
    }

    if (this.stock.robotsNb >= this.settings.limitOfRobotsForGameOver) {
      this.phase = 'over';
      this.logger.log(`${LOG_PREFIX} Game over after ${this.tickCount}s with ${this.stock.robotsNb} robots`);
      throw new GameOver(this.stock.robotsNb, this.tickCount);
    }
    return { tick, completions };
  }

  // --- Status surface ---

  snapshot(): FactorySnapshot {
    return {
      elapsedSeconds: this.tickCount,
      foos: this.stock.foos,
      bars: this.stock.bars,
      foobars: this.stock.foobars,
      money: this.stock.money,
      robots: this.stock.robots.map((robot) => ({
        id: robot.id,
        status: robotState.describeState(robot.state),
        location: robotState.robotLocation(robot),
        countdown: robot.state.countdown,
      })),
    };
  }

  // --- Internals ---

  private assertRunning(): void {
    if (this.phase === 'over') {
      throw new GameOver(this.stock.robotsNb, this.tickCount);
    }
  }

  private update(robot: Robot, state: RobotState): void {
    this.stock.replaceRobot({ ...robot, state });
  }

  private handleError(command: Command, err: unknown): CommandOutcome {
    if (isDomainError(err)) {
      return this.reject(command, err.message);
    }
    throw err;
  }

  private reject(command: Command, reason: string): CommandOutcome {
    this.logger.warn(`${LOG_PREFIX} ${describeCommand(command)} rejected: ${reason}`);
    return { status: 'rejected', command, reason };
  }

  private logCompletion(completion: Completion): void {
    const who = `Robot ${completion.robotId}`;
    switch (completion.type) {
      case 'moved':
        this.logger.log(`${LOG_PREFIX} ${who} arrived at ${locationName(completion.location)}`);
        break;
      case 'mined':
        this.logger.log(`${LOG_PREFIX} ${who} mined a ${completion.material}`);
        break;
      case 'assembled':
        this.logger.log(
          completion.success
            ? `${LOG_PREFIX} ${who} assembled a foobar`
            : `${LOG_PREFIX} ${who} failed to assemble a foobar, the foo is lost`,
        );
        break;
      case 'sold':
        this.logger.log(
          `${LOG_PREFIX} ${who} sold ${completion.count} foobar(s) for ${formatMoney(completion.earned)}`,
        );
        break;
    }
  }
}

export function describeCommand(command: Command): string {
  switch (command.type) {
    case 'move-robot':
      return `Move robot ${command.robotId} to ${command.destination}`;
    case 'mine':
      return `Robot ${command.robotId} mine ${command.material}`;
    case 'assemble':
      return `Robot ${command.robotId} assemble`;
    case 'sell-foobars':
      return `Robot ${command.robotId} sell foobars`;
    case 'buy-robot':
      return `Robot ${command.robotId} buy a robot`;
    case 'wait':
      return `Wait ${command.seconds}s`;
    default:
      return assertNever(command);
  }
}

function assertSeconds(seconds: number): void {
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidCommand(`Cannot wait ${seconds} seconds, expected a non-negative integer`);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}
