#!/usr/bin/env node
/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */
/**
 * hanabi-bench CLI
 *
 * Benchmarks full-information Hanabi agents over seeded batches of games.
 *
 * Usage:
 *   hanabi-bench <command> [options]
 *
 * Commands:
 *   simulate   Play a batch of games and summarise the scores
 *   replay     Export one game as a replay log, or re-run a stored log
 *
 * Examples:
 *   hanabi-bench simulate --agent smart --games 10000
 *   hanabi-bench replay --seed 7 --out game7.json
 */

import chalk from 'chalk';
import { runReplay } from './commands/replay.js';
import { runSimulate } from './commands/simulate.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log(`
hanabi-bench v${VERSION}

USAGE:
  hanabi-bench <command> [options]

COMMANDS:
  simulate  Play a batch of seeded games and print score statistics
  replay    Write one game's replay log, or re-run a stored log

OPTIONS:
  -h, --help      Show this help message
  -V, --version   Show version number

EXAMPLES:
  hanabi-bench simulate                          # 1000 five-player games, cheater agent
  hanabi-bench simulate -a pace -p 3 -n 5000     # Pace-aware agent, three players
  hanabi-bench simulate -w 8 --json              # Eight worker threads, JSON report

  hanabi-bench replay -s 42 -o seed42.json       # Record the game dealt from seed 42
  hanabi-bench replay seed42.json                # Re-run it

For command-specific help:
  hanabi-bench <command> --help
`);
}

function showVersion(): void {
  console.log(`hanabi-bench v${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    process.exit(0);
  }

  if (args[0] === '--version' || args[0] === '-V') {
    showVersion();
    process.exit(0);
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case 'simulate':
    case 'sim':
      await runSimulate(commandArgs);
      break;

    case 'replay':
      await runReplay(commandArgs);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run "hanabi-bench --help" for usage information.');
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
