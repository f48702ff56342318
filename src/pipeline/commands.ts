// pipeline/commands.ts — Command constructors (frozen value records)

import type { Command, RobotId } from '../types/index.js';

export function moveRobot(robotId: RobotId, destination: string): Command {
  return frozen({ type: 'move-robot', robotId, destination });
}

export function mine(robotId: RobotId, material: string): Command {
  return frozen({ type: 'mine', robotId, material });
}

export function mineFoo(robotId: RobotId): Command {
  return mine(robotId, 'foo');
}

export function mineBar(robotId: RobotId): Command {
  return mine(robotId, 'bar');
}

export function assemble(robotId: RobotId): Command {
  return frozen({ type: 'assemble', robotId });
}

export function sellFoobars(robotId: RobotId): Command {
  return frozen({ type: 'sell-foobars', robotId });
}

export function buyRobot(robotId: RobotId): Command {
  return frozen({ type: 'buy-robot', robotId });
}

export function wait(seconds: number): Command {
  return frozen({ type: 'wait', seconds });
}

function frozen(command: Command): Command {
  return Object.freeze(command);
}
