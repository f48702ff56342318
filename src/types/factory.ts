// types/factory.ts — Tick results, command outcomes, read-only snapshots

import type { Cents, RobotId, Tick } from './core.js';
import type { Command } from './command.js';
import type { Location } from './location.js';
import type { MaterialName } from './material.js';

/** What a robot's state did when its countdown reached zero. */
export type RoundEffect =
  | { type: 'moved'; location: Location }
  | { type: 'mined'; material: MaterialName }
  | { type: 'assembled'; success: boolean }
  | { type: 'sold'; count: number; earned: Cents };

export type Completion = RoundEffect & { robotId: RobotId };

export interface TickResult {
  tick: Tick;
  completions: Completion[];
}

export type CommandOutcome =
  | { status: 'executed'; command: Command }
  | { status: 'rejected'; command: Command; reason: string }
  | { status: 'ignored'; command: Command; reason: string };

export interface RobotView {
  id: RobotId;
  status: string;
  location: Location;
  countdown: number;
}

export interface FactorySnapshot {
  elapsedSeconds: number;
  foos: number;
  bars: number;
  foobars: number;
  money: Cents;
  robots: RobotView[];
}
