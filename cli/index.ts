#!/usr/bin/env node
// cli/index.ts — CLI entry point

import { Command } from 'commander';
import { RoboticFactory } from '../src/factory/robotic-factory.js';
import { SeededRng } from '../src/factory/rng.js';
import { loadSettings, resolveSeed } from '../src/factory/settings.js';
import { createMemoryLogger, createStderrLogger } from '../src/shared/logger.js';
import { formatDuration } from '../src/shared/utils.js';
import { aiDirector } from '../director/ai-director.js';
import { runDirector } from '../director/runner.js';
import { renderScreen } from './screen.js';
import { startPlay } from './play.js';

interface CommonOptions {
  seed?: string;
  settings?: string;
}

interface RunCommandOptions extends CommonOptions {
  maxSeconds?: string;
  delay: string;
  quiet?: boolean;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function fail(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${msg}\n`);
  process.exit(1);
}

function parseNumberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--${name} must be a non-negative integer (got ${raw})`);
  }
  return value;
}

const program = new Command();

program
  .name('foobar-factory')
  .description('Robots mine foo and bar, assemble foobars, sell them and buy more robots')
  .version('0.1.0');

program
  .command('run')
  .description('Let the scripted director play until the game is over')
  .option('--seed <n>', 'Random seed (default: $FACTORY_SEED or 42)')
  .option('--settings <file>', 'JSON file with settings overrides')
  .option('--max-seconds <n>', 'Stop after this many simulated seconds')
  .option('--delay <ms>', 'Pause between frames', '0')
  .option('--quiet', 'Only print the final result')
  .action(async (opts: RunCommandOptions) => {
    try {
      const settings = loadSettings({ file: opts.settings, env: process.env });
      const seed = resolveSeed(opts.seed, process.env);
      const maxSeconds = parseNumberOption('max-seconds', opts.maxSeconds);
      const pause = parseNumberOption('delay', opts.delay) ?? 0;

      const logger = createMemoryLogger();
      const factory = RoboticFactory.fromSettings(settings, { rng: new SeededRng(seed), logger });

      const result = await runDirector(factory, aiDirector(factory), {
        maxSeconds,
        onWait: async (f) => {
          if (opts.quiet) return;
          process.stdout.write(renderScreen(f.snapshot(), { logs: logger.lines() }) + '\n\n');
          if (pause > 0) await delay(pause);
        },
      });

      const elapsed = formatDuration(result.elapsedSeconds);
      if (result.reason === 'game-over') {
        process.stdout.write(`End of game! ${result.robotsNb} robots in ${elapsed}\n`);
      } else {
        process.stdout.write(`Stopped (${result.reason}) with ${result.robotsNb} robots after ${elapsed}\n`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('play')
  .description('Read commands from stdin (text or JSON lines), reply with JSON lines')
  .option('--seed <n>', 'Random seed (default: $FACTORY_SEED or 42)')
  .option('--settings <file>', 'JSON file with settings overrides')
  .action(async (opts: CommonOptions) => {
    try {
      const settings = loadSettings({ file: opts.settings, env: process.env });
      const seed = resolveSeed(opts.seed, process.env);
      const factory = RoboticFactory.fromSettings(settings, {
        rng: new SeededRng(seed),
        logger: createStderrLogger(),
      });
      await startPlay(factory);
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
