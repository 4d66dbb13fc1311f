#!/usr/bin/env tsx
import { resolve } from 'node:path';
import process from 'node:process';
import { config as loadDotenv } from 'dotenv';
import meow from 'meow';
import chalk from 'chalk';
import { formatError, type LogLevel } from '@reelsmith/core';
import { runCompose } from './commands/compose.js';
import { createCliLogger, resolveLogLevel } from './lib/logger.js';
import { formatComposeSummary, formatCompositionPlan } from './lib/plan-display.js';

loadDotenv({ path: resolve(process.cwd(), '.env') });

const cli = meow(
  `
Usage
  $ reelsmith <command> [options]

Commands
  compose             Render, stitch and export a project
  plan                Show timelines, avatar slot and transitions without rendering

Options
  --project, -p       Project YAML file (required)
  --output, -o        Output path, overrides the project's "output"
  --seed              Seed for the avatar slot and transition draws
  --concurrency       Scene workers (default 3)
  --dry-run           Same as the plan command
  --clean             Remove the work directory after export
  --log-level         info | debug
  --ffmpeg            FFmpeg binary (env REELSMITH_FFMPEG_PATH)
  --ffprobe           FFprobe binary (env REELSMITH_FFPROBE_PATH)

Examples
  $ reelsmith compose --project=./ocean-facts/project.yaml
  $ reelsmith compose -p project.yaml --seed=42 --concurrency=4
  $ reelsmith plan --project=project.yaml --seed=42
`,
  {
    importMeta: import.meta,
    flags: {
      project: { type: 'string', shortFlag: 'p' },
      output: { type: 'string', shortFlag: 'o' },
      seed: { type: 'number' },
      concurrency: { type: 'number' },
      dryRun: { type: 'boolean', default: false },
      clean: { type: 'boolean' },
      logLevel: { type: 'string' },
      ffmpeg: { type: 'string' },
      ffprobe: { type: 'string' },
    },
  }
);

async function main(): Promise<void> {
  const [command] = cli.input;
  const { flags } = cli;

  if (command !== 'compose' && command !== 'plan') {
    cli.showHelp(command === undefined ? 0 : 1);
    return;
  }

  let logLevel: LogLevel;
  try {
    logLevel = resolveLogLevel(flags.logLevel);
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
    return;
  }

  if (!flags.project) {
    console.error(chalk.red('Error: --project is required.'));
    console.error('Example: reelsmith compose --project=project.yaml');
    process.exitCode = 1;
    return;
  }

  const logger = createCliLogger({ level: logLevel });
  try {
    const outcome = await runCompose({
      projectPath: flags.project,
      outputPath: flags.output,
      seed: flags.seed,
      concurrency: flags.concurrency,
      dryRun: command === 'plan' || flags.dryRun,
      clean: flags.clean,
      ffmpegPath: flags.ffmpeg,
      ffprobePath: flags.ffprobe,
      logger,
      onProgress: (event) => {
        if (event.type === 'stage-start' || event.type === 'warning') {
          logger.info(event.message, { stage: event.stage });
        }
      },
    });

    const lines =
      outcome.kind === 'plan'
        ? formatCompositionPlan(outcome.plan)
        : formatComposeSummary(outcome.result);
    for (const line of lines) {
      console.log(line);
    }
  } catch (error) {
    console.error(chalk.red(formatError(error)));
    process.exitCode = 1;
  }
}

await main();
