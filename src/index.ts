// index.ts — Public API of the simulation engine

export type * from './types/index.js';

export { RoboticFactory, describeCommand } from './factory/robotic-factory.js';
export type { FactoryOptions, FactoryPhase } from './factory/robotic-factory.js';
export { Stock, robotIdGenerator, createFoo, createBar, createFoobar } from './factory/stock.js';
export type { StockInit } from './factory/stock.js';
export { SeededRng } from './factory/rng.js';
export type { RandomSource } from './factory/rng.js';
export {
  DEFAULT_SETTINGS,
  createSettings,
  loadSettings,
  parseSettings,
  resolveSeed,
  validateSettings,
} from './factory/settings.js';
export type { LoadSettingsOptions } from './factory/settings.js';

export * as commands from './pipeline/commands.js';
export { parseCommand, parseCommandLine, COMMAND_HELP } from './pipeline/command-parser.js';
export {
  describeState,
  stateLocation,
  robotLocation,
  isIdle,
  runRound,
} from './pipeline/robot-state.js';

export { LOCATIONS, locationFromName, locationName } from './data/locations.js';
export { MATERIALS, materialFromName, extractionTime } from './data/materials.js';

export {
  DomainError,
  InvalidTransition,
  NotEnoughMaterial,
  UnknownLocation,
  UnknownMaterial,
  InvalidCommand,
  InvalidSettingsError,
  GameOver,
} from './shared/errors.js';
export type { Logger } from './shared/logger.js';
