// types/index.ts — Barrel export

export type { RobotId, Tick, UnitId, Cents, Range } from './core.js';

export type { Location, LocationInfo } from './location.js';

export type {
  MaterialName,
  ExtractionPolicy,
  Material,
  MaterialUnit,
  FooUnit,
  BarUnit,
  AssemblyPair,
  Foobar,
} from './material.js';

export type {
  RobotStateKind,
  IdleState,
  MovingState,
  MiningState,
  AssemblingState,
  SellingState,
  HauntingState,
  RobotState,
  Robot,
} from './robot.js';

export type { CommandType, Command, RobotCommand } from './command.js';

export type { RobotCost, Settings } from './settings.js';

export type {
  RoundEffect,
  Completion,
  TickResult,
  CommandOutcome,
  RobotView,
  FactorySnapshot,
} from './factory.js';
