// cli/screen.ts — Plain-text frame of the factory state

import type { FactorySnapshot, RobotView } from '../src/types/index.js';
import { LOCATIONS } from '../src/data/locations.js';
import { formatDuration, formatMoney } from '../src/shared/utils.js';

export interface ScreenOptions {
  logs?: readonly string[];
  /** how many of the latest log lines to show */
  logLines?: number;
  instructions?: string;
}

export function renderResources(snapshot: FactorySnapshot): string {
  return [
    `FOOS: ${snapshot.foos}`,
    `BARS: ${snapshot.bars}`,
    `FOOBARS: ${snapshot.foobars}`,
    `MONEY: $${formatMoney(snapshot.money)}`,
    `ROBOTS: ${snapshot.robots.length}`,
    `TIME: ${formatDuration(snapshot.elapsedSeconds)}`,
  ].join(' | ');
}

function renderRobot(robot: RobotView): string {
  return `  #${robot.id} ${robot.status}`;
}

export function renderLocations(snapshot: FactorySnapshot): string[] {
  const lines: string[] = [];
  for (const location of LOCATIONS) {
    const here = snapshot.robots.filter((robot) => robot.location === location.key);
    lines.push(location.name.toUpperCase());
    if (here.length === 0) {
      lines.push('  (nobody)');
    } else {
      lines.push(...here.map(renderRobot));
    }
  }
  return lines;
}

export function renderScreen(snapshot: FactorySnapshot, options: ScreenOptions = {}): string {
  const lines = [renderResources(snapshot), '', ...renderLocations(snapshot)];

  const logs = options.logs ?? [];
  if (logs.length > 0) {
    lines.push('', 'LOGS', ...logs.slice(-(options.logLines ?? 6)).map((line) => `  ${line}`));
  }
  if (options.instructions) {
    lines.push('', options.instructions);
  }
  return lines.join('\n');
}
