// types/core.ts — Fundamental types

export type RobotId = number;
export type Tick = number;
export type UnitId = string;

/** Money is kept in integer cents so balances never drift. */
export type Cents = number;

export interface Range {
  min: number;
  max: number;
}
