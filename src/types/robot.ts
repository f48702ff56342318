// types/robot.ts — Robot record and its task states

import type { RobotId } from './core.js';
import type { Location } from './location.js';
import type { AssemblyPair, Foobar, Material } from './material.js';

export type RobotStateKind =
  | 'idle'
  | 'moving'
  | 'mining'
  | 'assembling'
  | 'selling'
  | 'haunting';

export interface IdleState {
  kind: 'idle';
  location: Location;
  countdown: 0;
}

export interface MovingState {
  kind: 'moving';
  destination: Location;
  countdown: number;
}

export interface MiningState {
  kind: 'mining';
  material: Material;
  countdown: number;
}

export interface AssemblingState {
  kind: 'assembling';
  pair: AssemblyPair;
  successRate: number;
  countdown: number;
}

export interface SellingState {
  kind: 'selling';
  batch: readonly Foobar[];
  countdown: number;
}

/** Inert placeholder state; never completes. */
export interface HauntingState {
  kind: 'haunting';
  countdown: number;
}

export type RobotState =
  | IdleState
  | MovingState
  | MiningState
  | AssemblingState
  | SellingState
  | HauntingState;

export interface Robot {
  readonly id: RobotId;
  readonly state: RobotState;
}
