// pipeline/robot-state.ts — Robot task state machine
// Capability functions return the next state instead of mutating the
// robot; the factory swaps the roster entry. Only Idle accepts work.

import type {
  AssemblingState,
  Cents,
  HauntingState,
  IdleState,
  Location,
  Material,
  MiningState,
  MovingState,
  Range,
  Robot,
  RobotState,
  RoundEffect,
  SellingState,
} from '../types/index.js';
import type { Stock } from '../factory/stock.js';
import type { RandomSource } from '../factory/rng.js';
import { InvalidTransition, NotEnoughMaterial } from '../shared/errors.js';
import { ASSEMBLY_TICKS, MOVE_TICKS, SELLING_TICKS } from '../shared/constants.js';
import { isReachable, locationName } from '../data/locations.js';

export interface RoundContext {
  stock: Stock;
  rng: RandomSource;
}

export interface RoundOutcome {
  state: RobotState;
  effect: RoundEffect | null;
}

type BusyState = MovingState | MiningState | AssemblingState | SellingState;

export function idleAt(location: Location): IdleState {
  return { kind: 'idle', location, countdown: 0 };
}

export const HAUNTING: HauntingState = { kind: 'haunting', countdown: Number.POSITIVE_INFINITY };

// --- Status surface ---

export function describeState(state: RobotState): string {
  switch (state.kind) {
    case 'idle':
      return 'Idle';
    case 'moving':
      return 'Moving';
    case 'mining':
      return `Mining ${state.material.name} at ${locationName(state.material.source)}`;
    case 'assembling':
      return 'Assembling a foobar...';
    case 'selling':
      return `Selling ${state.batch.length} foobar(s)...`;
    case 'haunting':
      return 'Haunting';
    default:
      return assertNever(state);
  }
}

export function stateLocation(state: RobotState): Location {
  switch (state.kind) {
    case 'idle':
      return state.location;
    case 'moving':
    case 'haunting':
      return 'on-my-way';
    case 'mining':
      return state.material.source;
    case 'assembling':
      return 'assembly-line';
    case 'selling':
      return 'material-store';
    default:
      return assertNever(state);
  }
}

export function robotLocation(robot: Robot): Location {
  return stateLocation(robot.state);
}

export function isIdle(robot: Robot): boolean {
  return robot.state.kind === 'idle';
}

// --- Capabilities ---

function requireIdle(state: RobotState, action: string): IdleState {
  if (state.kind !== 'idle') {
    throw new InvalidTransition(`Cannot ${action} while ${describeState(state).toLowerCase()}`);
  }
  return state;
}

function requireIdleAt(state: RobotState, location: Location, action: string): IdleState {
  const idle = requireIdle(state, action);
  if (idle.location !== location) {
    throw new InvalidTransition(
      `Cannot ${action} at ${locationName(idle.location)}, go to ${locationName(location)} first`,
    );
  }
  return idle;
}

/** @throws InvalidTransition */
export function move(state: RobotState, destination: Location): MovingState {
  requireIdle(state, 'move');
  if (!isReachable(destination)) {
    throw new InvalidTransition(`Cannot move to ${locationName(destination)}`);
  }
  return { kind: 'moving', destination, countdown: MOVE_TICKS };
}

/**
 * @param duration resolves the extraction time; only called once the robot
 *   is known to be able to start, so ranged materials are sampled per run
 * @throws InvalidTransition
 */
export function mine(state: RobotState, material: Material, duration: () => number): MiningState {
  requireIdleAt(state, material.source, `mine ${material.name}`);
  return { kind: 'mining', material, countdown: duration() };
}

/** @throws InvalidTransition */
export function assemble(state: RobotState, stock: Stock, successRate: number): AssemblingState {
  requireIdleAt(state, 'assembly-line', 'assemble');
  const pair = reserve(() => stock.startAssembling());
  return { kind: 'assembling', pair, successRate, countdown: ASSEMBLY_TICKS };
}

/** @throws InvalidTransition */
export function sell(state: RobotState, stock: Stock, range: Range): SellingState {
  requireIdleAt(state, 'material-store', 'sell');
  const batch = reserve(() => stock.startSelling(range.min, range.max));
  return { kind: 'selling', batch, countdown: SELLING_TICKS };
}

/**
 * The buyer stays Idle where it is; the purchased robot joins the roster.
 * @throws InvalidTransition | NotEnoughMaterial
 */
export function buy(state: RobotState, stock: Stock, cost: { money: Cents; foos: number }): Robot {
  requireIdleAt(state, 'robots-store', 'buy a robot');
  return stock.buyRobot(cost.money, cost.foos);
}

function reserve<T>(take: () => T): T {
  try {
    return take();
  } catch (err) {
    if (err instanceof NotEnoughMaterial) {
      throw new InvalidTransition(err.message);
    }
    throw err;
  }
}

// --- Time ---

/** Advances a state by one second. Idle and Haunting never change. */
export function runRound(state: RobotState, ctx: RoundContext): RoundOutcome {
  if (state.kind === 'idle' || state.kind === 'haunting') {
    return { state, effect: null };
  }
  const countdown = state.countdown - 1;
  if (countdown > 0) {
    return { state: { ...state, countdown }, effect: null };
  }
  return complete(state, ctx);
}

function complete(state: BusyState, ctx: RoundContext): RoundOutcome {
  switch (state.kind) {
    case 'moving':
      return {
        state: idleAt(state.destination),
        effect: { type: 'moved', location: state.destination },
      };
    case 'mining':
      ctx.stock.newMaterial(state.material.name);
      return {
        state: idleAt(state.material.source),
        effect: { type: 'mined', material: state.material.name },
      };
    case 'assembling': {
      const success = ctx.rng.next() < state.successRate;
      if (success) {
        ctx.stock.endAssemblingSuccess(state.pair);
      } else {
        ctx.stock.endAssemblingFailure(state.pair);
      }
      return { state: idleAt('assembly-line'), effect: { type: 'assembled', success } };
    }
    case 'selling': {
      const earned = ctx.stock.sold(state.batch);
      return {
        state: idleAt('material-store'),
        effect: { type: 'sold', count: state.batch.length, earned },
      };
    }
    default:
      return assertNever(state);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled robot state: ${JSON.stringify(value)}`);
}
