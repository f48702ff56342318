// tests/stock.test.ts — Tests for the resource ledger

import { describe, it, expect } from 'vitest';
import { Stock, createFoobar } from '../src/factory/stock.js';
import { NotEnoughMaterial } from '../src/shared/errors.js';
import { robotAt } from './helpers.js';

describe('Stock — assembly', () => {
  it('should take exactly one foo and one bar when assembling starts', () => {
    const stock = new Stock({ foos: 3, bars: 2 });

    const pair = stock.startAssembling();

    expect(pair.foo.material).toBe('foo');
    expect(pair.bar.material).toBe('bar');
    expect(stock.foos).toBe(2);
    expect(stock.bars).toBe(1);
  });

  it('should hand out the oldest units first', () => {
    const stock = new Stock();
    stock.newMaterial('foo');
    stock.newMaterial('bar');
    const first = stock.startAssembling();
    stock.endAssemblingFailure(first);
    stock.newMaterial('foo');

    const second = stock.startAssembling();

    expect(second.bar.id).toBe(first.bar.id);
    expect(second.foo.id).not.toBe(first.foo.id);
  });

  it('should refuse to assemble without both materials and change nothing', () => {
    const stock = new Stock({ foos: 1 });

    expect(() => stock.startAssembling()).toThrow(NotEnoughMaterial);
    expect(stock.foos).toBe(1);
    expect(stock.bars).toBe(0);
  });

  it('should report whether there is enough material', () => {
    expect(new Stock({ foos: 1, bars: 1 }).hasEnoughMaterial()).toBe(true);
    expect(new Stock({ foos: 1 }).hasEnoughMaterial()).toBe(false);
    expect(new Stock({ bars: 1 }).hasEnoughMaterial()).toBe(false);
  });

  it('should turn a successful pair into a foobar', () => {
    const stock = new Stock({ foos: 1, bars: 1 });
    const pair = stock.startAssembling();

    const foobar = stock.endAssemblingSuccess(pair);

    expect(stock.foobars).toBe(1);
    expect(foobar.foo).toBe(pair.foo);
    expect(foobar.bar).toBe(pair.bar);
    expect(foobar.price).toBe(100);
  });

  it('should give back the bar but not the foo on failure', () => {
    const stock = new Stock({ foos: 1, bars: 1 });
    const pair = stock.startAssembling();

    stock.endAssemblingFailure(pair);

    expect(stock.foos).toBe(0);
    expect(stock.bars).toBe(1);
    expect(stock.foobars).toBe(0);
  });
});

describe('Stock — selling', () => {
  it('should take at most max foobars from the front', () => {
    const stock = new Stock({ foobars: 10 });

    const batch = stock.startSelling(1, 5);

    expect(batch).toHaveLength(5);
    expect(stock.foobars).toBe(5);
  });

  it('should take everything when fewer than max are available', () => {
    const stock = new Stock({ foobars: 3 });

    expect(stock.startSelling(1, 5)).toHaveLength(3);
    expect(stock.foobars).toBe(0);
  });

  it('should fail and leave stock unchanged below min', () => {
    const empty = new Stock();
    expect(() => empty.startSelling(1, 5)).toThrow(NotEnoughMaterial);
    expect(empty.foobars).toBe(0);

    const two = new Stock({ foobars: 2 });
    expect(() => two.startSelling(3, 5)).toThrow('Selling needs at least 3 foobar(s) (have 2)');
    expect(two.foobars).toBe(2);
  });

  it('should credit the price of each sold foobar', () => {
    const stock = new Stock({ money: 50 });

    const earned = stock.sold([createFoobar(), createFoobar(), createFoobar()]);

    expect(earned).toBe(300);
    expect(stock.money).toBe(350);
  });

  it('should give every foobar its own identity', () => {
    const stock = new Stock({ foobars: 2 });
    const [a, b] = stock.startSelling(2, 2);
    expect(a?.id).not.toBe(b?.id);
  });
});

describe('Stock — buying robots', () => {
  it.each([
    [0, 0],
    [1000, 2], // not enough foos
    [200, 10], // not enough money
  ])('should refuse with money=%i cents and foos=%i and change nothing', (money, foos) => {
    const stock = new Stock({ robots: [robotAt(1, 'robots-store')], money, foos });

    expect(() => stock.buyRobot(300, 6)).toThrow(NotEnoughMaterial);
    expect(stock.money).toBe(money);
    expect(stock.foos).toBe(foos);
    expect(stock.robotsNb).toBe(1);
  });

  it('should deduct money and foos and add an idle robot at the robots store', () => {
    const stock = new Stock({ robots: [robotAt(1, 'robots-store')], money: 1000, foos: 6 });

    const robot = stock.buyRobot(300, 6);

    expect(stock.money).toBe(700);
    expect(stock.foos).toBe(0);
    expect(stock.robotsNb).toBe(2);
    expect(robot).toEqual({ id: 2, state: { kind: 'idle', location: 'robots-store', countdown: 0 } });
  });

  it('should explain what is missing', () => {
    const stock = new Stock({ money: 200, foos: 10 });
    expect(() => stock.buyRobot(300, 6)).toThrow(
      'A robot costs 3.00 and 6 foo(s) (have 2.00 and 10 foo(s))',
    );
  });

  it('canBuyRobot should match the thresholds exactly', () => {
    expect(new Stock({ money: 300, foos: 6 }).canBuyRobot(300, 6)).toBe(true);
    expect(new Stock({ money: 299, foos: 6 }).canBuyRobot(300, 6)).toBe(false);
    expect(new Stock({ money: 300, foos: 5 }).canBuyRobot(300, 6)).toBe(false);
  });
});

describe('Stock — roster', () => {
  it('should number new robots from 1', () => {
    const stock = new Stock();
    const ids = [stock.createRobot(), stock.createRobot(), stock.createRobot()].map((r) => r.id);
    expect(ids).toEqual([1, 2, 3]);
  });

  it('should continue after the highest pre-seeded id', () => {
    const stock = new Stock({ robots: [robotAt(5), robotAt(2)] });
    expect(stock.createRobot().id).toBe(6);
  });

  it('should place new robots idle at the cafeteria by default', () => {
    const robot = new Stock().createRobot();
    expect(robot.state).toEqual({ kind: 'idle', location: 'cafeteria', countdown: 0 });
  });

  it('should return undefined for unknown ids', () => {
    const stock = new Stock({ robots: [robotAt(1)] });
    expect(stock.getRobot(1)?.id).toBe(1);
    expect(stock.getRobot(2)).toBeUndefined();
  });

  it('should replace a robot in place, keeping roster order', () => {
    const stock = new Stock({ robots: [robotAt(1), robotAt(2)] });

    stock.replaceRobot(robotAt(1, 'foo-mine'));

    expect(stock.robots.map((r) => r.id)).toEqual([1, 2]);
    expect(stock.getRobot(1)?.state).toEqual({ kind: 'idle', location: 'foo-mine', countdown: 0 });
  });

  it('should reject duplicate ids and negative money', () => {
    expect(() => new Stock({ robots: [robotAt(1), robotAt(1)] })).toThrow(RangeError);
    expect(() => new Stock({ money: -1 })).toThrow(RangeError);
  });
});
