// types/material.ts — Raw materials, mined units, foobars

import type { Cents, UnitId } from './core.js';
import type { Location } from './location.js';

export type MaterialName = 'foo' | 'bar';

export type ExtractionPolicy =
  | { kind: 'fixed'; seconds: number }
  | { kind: 'ranged' };

export interface Material {
  name: MaterialName;
  source: Location;
  extraction: ExtractionPolicy;
}

export interface MaterialUnit<M extends MaterialName = MaterialName> {
  id: UnitId;
  material: M;
}

export type FooUnit = MaterialUnit<'foo'>;
export type BarUnit = MaterialUnit<'bar'>;

export interface AssemblyPair {
  foo: FooUnit;
  bar: BarUnit;
}

export interface Foobar {
  id: UnitId;
  foo: FooUnit;
  bar: BarUnit;
  price: Cents;
}
