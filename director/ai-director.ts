// director/ai-director.ts — Scripted strategy that plays the factory
//
// With few robots, buying robots comes first and every other idle robot
// mines. With more, robot #1 camps at the robots store and the others are
// spread over the mines, the assembly line and the material store.
//
// The generator reads the factory lazily: each yielded command must be
// executed before the next one is pulled.

import type { Command, Location, MaterialName, Robot, RobotId } from '../src/types/index.js';
import type { RoboticFactory } from '../src/factory/robotic-factory.js';
import { isIdle, robotLocation } from '../src/pipeline/robot-state.js';
import { locationName } from '../src/data/locations.js';
import { materialFromName } from '../src/data/materials.js';
import * as commands from '../src/pipeline/commands.js';

export const FEW_ROBOTS = 5;

interface Workstation {
  location: Location;
  work: (robotId: RobotId) => Command;
  ready: (factory: RoboticFactory) => boolean;
}

const WORKSTATIONS: readonly Workstation[] = [
  { location: 'foo-mine', work: commands.mineFoo, ready: () => true },
  { location: 'bar-mine', work: commands.mineBar, ready: () => true },
  { location: 'assembly-line', work: commands.assemble, ready: (f) => f.stock.hasEnoughMaterial() },
  { location: 'material-store', work: commands.sellFoobars, ready: canSell },
];

export function* aiDirector(factory: RoboticFactory): Generator<Command, never> {
  while (true) {
    if (factory.stock.robotsNb < FEW_ROBOTS) {
      yield* fewRobotsStrategy(factory);
    } else {
      yield* manyRobotsStrategy(factory);
    }
    yield commands.wait(1);
  }
}

function* fewRobotsStrategy(factory: RoboticFactory): Generator<Command> {
  yield* purchaseRobot(factory);
  while (idleRobots(factory).length > 0) {
    yield* extract(factory, 'foo');
    yield* extract(factory, 'bar');
  }
}

function* manyRobotsStrategy(factory: RoboticFactory): Generator<Command> {
  const [buyer, ...workers] = factory.robots;
  if (!buyer) return;

  const { money, foos } = factory.settings.robotCost;
  if (robotLocation(buyer) !== 'robots-store') {
    yield commands.moveRobot(buyer.id, locationName('robots-store'));
  } else if (isIdle(buyer) && factory.stock.canBuyRobot(money, foos)) {
    yield commands.buyRobot(buyer.id);
  }

  for (const [index, worker] of workers.entries()) {
    const post = WORKSTATIONS[index % WORKSTATIONS.length];
    if (post && isIdle(worker) && robotLocation(worker) !== post.location) {
      yield commands.moveRobot(worker.id, locationName(post.location));
    }
  }

  for (const robot of idleRobots(factory)) {
    const station = WORKSTATIONS.find((w) => w.location === robotLocation(robot));
    if (station?.ready(factory)) {
      yield station.work(robot.id);
    }
  }
}

// --- Goals ---

function* purchaseRobot(factory: RoboticFactory): Generator<Command> {
  const { money, foos } = factory.settings.robotCost;
  if (factory.stock.canBuyRobot(money, foos)) {
    yield* workAt(factory, 'robots-store', commands.buyRobot);
    return;
  }
  if (money > factory.stock.money) yield* sellFoobars(factory);
  if (foos > factory.stock.foos) yield* extract(factory, 'foo');
}

function* sellFoobars(factory: RoboticFactory): Generator<Command> {
  if (canSell(factory)) {
    yield* workAt(factory, 'material-store', commands.sellFoobars);
  } else {
    yield* assembleFoobars(factory);
  }
}

function* assembleFoobars(factory: RoboticFactory): Generator<Command> {
  if (factory.stock.hasEnoughMaterial()) {
    yield* workAt(factory, 'assembly-line', commands.assemble);
    return;
  }
  if (factory.stock.foos === 0) yield* extract(factory, 'foo');
  if (factory.stock.bars === 0) yield* extract(factory, 'bar');
}

function* extract(factory: RoboticFactory, material: MaterialName): Generator<Command> {
  const source = materialFromName(material).source;
  yield* workAt(factory, source, (robotId) => commands.mine(robotId, material));
}

/** An idle robot already there does the work; otherwise one is sent there. */
function* workAt(
  factory: RoboticFactory,
  location: Location,
  work: (robotId: RobotId) => Command,
): Generator<Command> {
  const worker = idleRobots(factory).find((robot) => robotLocation(robot) === location);
  if (worker) {
    yield work(worker.id);
    return;
  }
  const [available] = idleRobots(factory);
  if (available) {
    yield commands.moveRobot(available.id, locationName(location));
  }
}

// --- Helpers ---

function idleRobots(factory: RoboticFactory): Robot[] {
  return factory.robots.filter(isIdle);
}

function canSell(factory: RoboticFactory): boolean {
  return factory.stock.foobars >= factory.settings.foobarsSellingRange.min;
}
