// tests/helpers.ts — Shared builders for factory tests

import { vi } from 'vitest';
import type { Location, Robot, RobotId, RobotView, Settings } from '../src/types/index.js';
import { RoboticFactory } from '../src/factory/robotic-factory.js';
import { Stock, type StockInit } from '../src/factory/stock.js';
import { createSettings } from '../src/factory/settings.js';
import type { RandomSource } from '../src/factory/rng.js';
import { idleAt } from '../src/pipeline/robot-state.js';

export function robotAt(id: RobotId, location: Location = 'cafeteria'): Robot {
  return { id, state: idleAt(location) };
}

export function quietLogger(): { log: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> } {
  return { log: vi.fn(), warn: vi.fn() };
}

/** next() always returns `value`; nextInt() replays `ints`, then falls back to min. */
export function fixedRng(value = 0.5, ints: number[] = []): RandomSource {
  const queue = [...ints];
  return {
    next: () => value,
    nextInt: (min: number) => queue.shift() ?? min,
  };
}

export interface BuildOptions {
  robots?: Robot[];
  stock?: Omit<StockInit, 'robots'>;
  settings?: Partial<Settings>;
  rng?: RandomSource;
}

export function buildFactory(options: BuildOptions = {}) {
  const logger = quietLogger();
  const stock = new Stock({ ...options.stock, robots: options.robots ?? [] });
  const factory = new RoboticFactory(stock, createSettings(options.settings), {
    rng: options.rng ?? fixedRng(),
    logger,
  });
  return { factory, stock, logger };
}

export function viewOf(factory: RoboticFactory, id: RobotId): RobotView | undefined {
  return factory.snapshot().robots.find((robot) => robot.id === id);
}
