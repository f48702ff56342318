// factory/stock.ts — The resource ledger: materials, foobars, money, robot roster
// Every read-then-mutate operation checks all of its preconditions before
// touching anything, so a failure leaves the ledger exactly as it was.

import type {
  AssemblyPair,
  BarUnit,
  Cents,
  Foobar,
  FooUnit,
  Location,
  MaterialName,
  Robot,
  RobotId,
} from '../types/index.js';
import { NotEnoughMaterial } from '../shared/errors.js';
import { FOOBAR_PRICE } from '../shared/constants.js';
import { formatMoney, generateUnitId } from '../shared/utils.js';
import { SPAWN_LOCATION } from '../data/locations.js';
import { idleAt } from '../pipeline/robot-state.js';

export interface StockInit {
  robots?: Robot[];
  foos?: number;
  bars?: number;
  foobars?: number | Foobar[];
  money?: Cents;
}

export function* robotIdGenerator(start = 1): Generator<RobotId, never> {
  let id = start;
  while (true) {
    yield id++;
  }
}

export function createFoo(): FooUnit {
  return { id: generateUnitId(), material: 'foo' };
}

export function createBar(): BarUnit {
  return { id: generateUnitId(), material: 'bar' };
}

export function createFoobar(pair: AssemblyPair = { foo: createFoo(), bar: createBar() }): Foobar {
  return { id: generateUnitId(), foo: pair.foo, bar: pair.bar, price: FOOBAR_PRICE };
}

export class Stock {
  private fooUnits: FooUnit[];
  private barUnits: BarUnit[];
  private foobarUnits: Foobar[];
  private balance: Cents;
  private roster: Robot[];
  private readonly robotIds: Generator<RobotId, never>;

  constructor(init: StockInit = {}) {
    if ((init.money ?? 0) < 0) {
      throw new RangeError(`Stock money cannot be negative (got ${init.money})`);
    }
    this.roster = [...(init.robots ?? [])];
    const ids = new Set(this.roster.map((r) => r.id));
    if (ids.size !== this.roster.length) {
      throw new RangeError('Robot ids must be unique');
    }
    this.robotIds = robotIdGenerator(Math.max(0, ...ids) + 1);

    this.fooUnits = Array.from({ length: init.foos ?? 0 }, createFoo);
    this.barUnits = Array.from({ length: init.bars ?? 0 }, createBar);
    const foobars = init.foobars ?? [];
    this.foobarUnits = typeof foobars === 'number'
      ? Array.from({ length: foobars }, () => createFoobar())
      : [...foobars];
    this.balance = init.money ?? 0;
  }

  // --- Status surface ---

  get foos(): number {
    return this.fooUnits.length;
  }

  get bars(): number {
    return this.barUnits.length;
  }

  get foobars(): number {
    return this.foobarUnits.length;
  }

  get money(): Cents {
    return this.balance;
  }

  get robots(): readonly Robot[] {
    return this.roster;
  }

  get robotsNb(): number {
    return this.roster.length;
  }

  // --- Roster ---

  getRobot(id: RobotId): Robot | undefined {
    return this.roster.find((r) => r.id === id);
  }

  createRobot(location: Location = SPAWN_LOCATION): Robot {
    const robot: Robot = { id: this.robotIds.next().value, state: idleAt(location) };
    this.roster.push(robot);
    return robot;
  }

  /** Swaps a roster entry for its next value. Unknown ids are ignored. */
  replaceRobot(robot: Robot): void {
    const index = this.roster.findIndex((r) => r.id === robot.id);
    if (index === -1) return;
    this.roster[index] = robot;
  }

  // --- Materials ---

  hasEnoughMaterial(): boolean {
    return this.fooUnits.length >= 1 && this.barUnits.length >= 1;
  }

  newMaterial(material: MaterialName): void {
    if (material === 'foo') {
      this.fooUnits.push(createFoo());
    } else {
      this.barUnits.push(createBar());
    }
  }

  // --- Assembly ---

  /** @throws NotEnoughMaterial */
  startAssembling(): AssemblyPair {
    const foo = this.fooUnits[0];
    const bar = this.barUnits[0];
    if (!foo || !bar) {
      throw new NotEnoughMaterial(
        `Assembling needs a foo and a bar (have ${this.foos} foo, ${this.bars} bar)`,
      );
    }
    this.fooUnits.shift();
    this.barUnits.shift();
    return { foo, bar };
  }

  endAssemblingSuccess(pair: AssemblyPair): Foobar {
    const foobar = createFoobar(pair);
    this.foobarUnits.push(foobar);
    return foobar;
  }

  /** The bar goes back on the shelf; the foo is lost. */
  endAssemblingFailure(pair: AssemblyPair): void {
    this.barUnits.push(pair.bar);
  }

  // --- Selling ---

  /** @throws NotEnoughMaterial */
  startSelling(minNb: number, maxNb: number): Foobar[] {
    const count = Math.min(maxNb, this.foobarUnits.length);
    if (count < minNb) {
      throw new NotEnoughMaterial(
        `Selling needs at least ${minNb} foobar(s) (have ${this.foobarUnits.length})`,
      );
    }
    return this.foobarUnits.splice(0, count);
  }

  sold(batch: readonly Foobar[]): Cents {
    const earned = batch.reduce((sum, foobar) => sum + foobar.price, 0);
    this.balance += earned;
    return earned;
  }

  // --- Robot purchase ---

  canBuyRobot(requiredMoney: Cents, requiredFoos: number): boolean {
    return this.balance >= requiredMoney && this.fooUnits.length >= requiredFoos;
  }

  /** @throws NotEnoughMaterial */
  buyRobot(requiredMoney: Cents, requiredFoos: number): Robot {
    if (!this.canBuyRobot(requiredMoney, requiredFoos)) {
      throw new NotEnoughMaterial(
        `A robot costs ${formatMoney(requiredMoney)} and ${requiredFoos} foo(s) ` +
        `(have ${formatMoney(this.balance)} and ${this.foos} foo(s))`,
      );
    }
    this.balance -= requiredMoney;
    this.fooUnits.splice(0, requiredFoos);
    return this.createRobot('robots-store');
  }
}
