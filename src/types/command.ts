// types/command.ts — The whole input vocabulary of the factory

import type { RobotId } from './core.js';

export type CommandType =
  | 'move-robot'
  | 'mine'
  | 'assemble'
  | 'sell-foobars'
  | 'buy-robot'
  | 'wait';

export type Command =
  | { readonly type: 'move-robot'; readonly robotId: RobotId; readonly destination: string }
  | { readonly type: 'mine'; readonly robotId: RobotId; readonly material: string }
  | { readonly type: 'assemble'; readonly robotId: RobotId }
  | { readonly type: 'sell-foobars'; readonly robotId: RobotId }
  | { readonly type: 'buy-robot'; readonly robotId: RobotId }
  | { readonly type: 'wait'; readonly seconds: number };

export type RobotCommand = Exclude<Command, { type: 'wait' }>;
