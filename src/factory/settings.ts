// factory/settings.ts — Settings defaults + JSON file / env var loading + validation

import { readFileSync } from 'node:fs';
import type { Range, RobotCost, Settings } from '../types/index.js';
import { InvalidSettingsError, type InvalidSettingsIssue } from '../shared/errors.js';
import { DEFAULT_SEED } from '../shared/constants.js';

export const DEFAULT_SETTINGS: Readonly<Settings> = freezeSettings({
  initialRobotsNb: 2,
  assemblySuccessRate: 0.6,
  miningBarRangeTime: { min: 1, max: 2 },
  foobarsSellingRange: { min: 1, max: 5 },
  robotCost: { money: 300, foos: 6 },
  limitOfRobotsForGameOver: 30,
});

export interface LoadSettingsOptions {
  /** path of a JSON file holding a partial Settings object */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Settings>;
}

/**
 * defaults ← JSON file ← environment ← overrides, then validated and frozen.
 * @throws InvalidSettingsError
 */
export function loadSettings(options: LoadSettingsOptions = {}): Readonly<Settings> {
  const fromFile = options.file ? readSettingsFile(options.file) : {};
  const fromEnv = settingsFromEnv(options.env ?? {});

  return createSettings({ ...fromFile, ...fromEnv, ...options.overrides });
}

/** @throws InvalidSettingsError */
export function createSettings(partial: Partial<Settings> = {}): Readonly<Settings> {
  const settings: Settings = { ...DEFAULT_SETTINGS, ...partial };
  const issues = validateSettings(settings);
  if (issues.length > 0) throw new InvalidSettingsError(issues);
  return freezeSettings(settings);
}

export function validateSettings(settings: Settings): InvalidSettingsIssue[] {
  const issues: InvalidSettingsIssue[] = [];
  const check = (ok: boolean, field: string, message: string): void => {
    if (!ok) issues.push({ field, message });
  };

  check(isNonNegativeInt(settings.initialRobotsNb), 'initialRobotsNb', 'must be a non-negative integer');
  check(
    Number.isFinite(settings.assemblySuccessRate)
      && settings.assemblySuccessRate >= 0
      && settings.assemblySuccessRate <= 1,
    'assemblySuccessRate',
    'must be between 0 and 1',
  );
  check(isRange(settings.miningBarRangeTime), 'miningBarRangeTime', 'must be integers with 1 <= min <= max');
  check(isRange(settings.foobarsSellingRange), 'foobarsSellingRange', 'must be integers with 1 <= min <= max');
  check(isNonNegativeInt(settings.robotCost.money), 'robotCost.money', 'must be a non-negative integer (cents)');
  check(isNonNegativeInt(settings.robotCost.foos), 'robotCost.foos', 'must be a non-negative integer');
  check(
    Number.isInteger(settings.limitOfRobotsForGameOver) && settings.limitOfRobotsForGameOver >= 1,
    'limitOfRobotsForGameOver',
    'must be a positive integer',
  );

  return issues;
}

export function resolveSeed(option: string | undefined, env: NodeJS.ProcessEnv = {}): number {
  const raw = option ?? env.FACTORY_SEED;
  if (raw === undefined || raw === '') return DEFAULT_SEED;
  const seed = Number(raw);
  if (!Number.isInteger(seed)) {
    throw new InvalidSettingsError([{ field: 'seed', message: `must be an integer (got ${raw})` }]);
  }
  return seed;
}

// --- Sources ---

function readSettingsFile(path: string): Partial<Settings> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InvalidSettingsError([{ field: 'file', message: `cannot read ${path}: ${msg}` }]);
  }
  return parseSettings(raw);
}

/** Picks the recognized options out of a parsed JSON value. */
export function parseSettings(raw: unknown): Partial<Settings> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidSettingsError([{ field: 'file', message: 'must hold a JSON object' }]);
  }
  const obj = raw as Record<string, unknown>;
  const issues: InvalidSettingsIssue[] = [];
  const result: Partial<Settings> = {};

  const num = (field: keyof Settings): number | undefined => {
    const value = obj[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'number') {
      issues.push({ field, message: 'must be a number' });
      return undefined;
    }
    return value;
  };
  const range = (field: 'miningBarRangeTime' | 'foobarsSellingRange'): Range | undefined => {
    const value = obj[field];
    if (value === undefined) return undefined;
    const parsed = parseRange(value);
    if (!parsed) issues.push({ field, message: 'must be [min, max] or { "min": n, "max": n }' });
    return parsed ?? undefined;
  };

  const initialRobotsNb = num('initialRobotsNb');
  if (initialRobotsNb !== undefined) result.initialRobotsNb = initialRobotsNb;
  const assemblySuccessRate = num('assemblySuccessRate');
  if (assemblySuccessRate !== undefined) result.assemblySuccessRate = assemblySuccessRate;
  const limit = num('limitOfRobotsForGameOver');
  if (limit !== undefined) result.limitOfRobotsForGameOver = limit;
  const miningBarRangeTime = range('miningBarRangeTime');
  if (miningBarRangeTime) result.miningBarRangeTime = miningBarRangeTime;
  const foobarsSellingRange = range('foobarsSellingRange');
  if (foobarsSellingRange) result.foobarsSellingRange = foobarsSellingRange;

  if (obj.robotCost !== undefined) {
    const cost = parseRobotCost(obj.robotCost);
    if (cost) result.robotCost = cost;
    else issues.push({ field: 'robotCost', message: 'must be { "money": cents, "foos": n }' });
  }

  if (issues.length > 0) throw new InvalidSettingsError(issues);
  return result;
}

function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<Settings> {
  const result: Partial<Settings> = {};
  const read = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new InvalidSettingsError([{ field: name, message: `must be a number (got ${raw})` }]);
    }
    return value;
  };

  const initialRobotsNb = read('FACTORY_INITIAL_ROBOTS');
  if (initialRobotsNb !== undefined) result.initialRobotsNb = initialRobotsNb;
  const successRate = read('FACTORY_ASSEMBLY_SUCCESS_RATE');
  if (successRate !== undefined) result.assemblySuccessRate = successRate;
  const limit = read('FACTORY_ROBOT_LIMIT');
  if (limit !== undefined) result.limitOfRobotsForGameOver = limit;
  return result;
}

// --- Helpers ---

function parseRange(value: unknown): Range | null {
  if (Array.isArray(value)) {
    const [min, max] = value;
    if (value.length !== 2 || typeof min !== 'number' || typeof max !== 'number') return null;
    return { min, max };
  }
  if (value && typeof value === 'object') {
    const { min, max } = value as Record<string, unknown>;
    if (typeof min !== 'number' || typeof max !== 'number') return null;
    return { min, max };
  }
  return null;
}

function parseRobotCost(value: unknown): RobotCost | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
  const { money, foos } = value as Record<string, unknown>;
  if (typeof money !== 'number' || typeof foos !== 'number') return null;
  return { money, foos };
}

function isNonNegativeInt(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isRange(range: Range): boolean {
  return Number.isInteger(range.min)
    && Number.isInteger(range.max)
    && range.min >= 1
    && range.min <= range.max;
}

function freezeSettings(settings: Settings): Readonly<Settings> {
  return Object.freeze({
    ...settings,
    miningBarRangeTime: Object.freeze({ ...settings.miningBarRangeTime }),
    foobarsSellingRange: Object.freeze({ ...settings.foobarsSellingRange }),
    robotCost: Object.freeze({ ...settings.robotCost }),
  });
}
