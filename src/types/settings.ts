// types/settings.ts — Construction-time configuration of a factory

import type { Cents, Range } from './core.js';

export interface RobotCost {
  money: Cents;
  foos: number;
}

export interface Settings {
  initialRobotsNb: number;
  /** probability in [0, 1] that an assembly produces a foobar */
  assemblySuccessRate: number;
  miningBarRangeTime: Range;
  foobarsSellingRange: Range;
  robotCost: RobotCost;
  limitOfRobotsForGameOver: number;
}
