// shared/constants.ts — All simulation constants

import type { Cents } from '../types/index.js';

export const MOVE_TICKS = 5;
export const FOO_MINING_TICKS = 1;
export const ASSEMBLY_TICKS = 2;
export const SELLING_TICKS = 10;

export const FOOBAR_PRICE: Cents = 100;

export const DEFAULT_SEED = 42;
export const LOG_PREFIX = '[factory]';
