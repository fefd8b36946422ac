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
 * Replay Command
 *
 * Plays one seeded game and writes its replay log, or re-runs a stored log
 * and reports how the game ended.
 */

import { readFile, writeFile } from 'fs/promises';
import chalk from 'chalk';
import { AGENTS, AgentName, getAgent, isAgentName } from '../../agents/index.js';
import { runGame } from '../../engine/GameLoop.js';
import { GameState } from '../../engine/GameState.js';
import { Recorder } from '../../engine/Recorder.js';
import { intOf, valueOf } from './simulate.js';

interface ReplayCommandOptions {
  file: string | null;
  agent: AgentName;
  numPlayers: number;
  seed: number;
  out: string | null;
  verbose: boolean;
}

function parseArgs(args: string[]): ReplayCommandOptions | null {
  const options: ReplayCommandOptions = {
    file: null,
    agent: 'cheater',
    numPlayers: 5,
    seed: 0,
    out: null,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        showHelp();
        return null;

      case '--agent':
      case '-a': {
        const name = valueOf(args, ++i, arg);
        if (!isAgentName(name)) {
          throw new Error(`Unknown agent "${name}" (expected one of: ${Object.keys(AGENTS).join(', ')})`);
        }
        options.agent = name;
        break;
      }

      case '--players':
      case '-p':
        options.numPlayers = intOf(args, ++i, arg);
        break;

      case '--seed':
      case '-s':
        options.seed = intOf(args, ++i, arg);
        break;

      case '--out':
      case '-o':
        options.out = valueOf(args, ++i, arg);
        break;

      case '--verbose':
      case '-v':
        options.verbose = true;
        break;

      default:
        if (arg.startsWith('-')) {
          console.error(`Unknown option: ${arg}`);
          showHelp();
          process.exit(1);
        }
        // Positional argument: log to re-run
        options.file = arg;
    }
  }

  return options;
}

function showHelp(): void {
  console.log(`
Record or re-run a single game

USAGE:
  hanabi-bench replay [options]          Play one game and export its log
  hanabi-bench replay <log.json>         Re-run a stored log

OPTIONS:
  -a, --agent <name>     Agent in every seat (default: cheater)
  -p, --players <n>      Players, 2-5 (default: 5)
  -s, --seed <n>         Deal seed (default: 0)
  -o, --out <file>       Write the log to a file instead of stdout
  -v, --verbose          Log every move
  -h, --help             Show this help message
`);
}

function printResult(game: GameState): void {
  const reason = game.endReason ?? 'unfinished';
  const colour = reason === 'perfect' ? chalk.green : reason === 'strikeout' ? chalk.red : chalk.yellow;
  console.error(`${chalk.bold('score')} ${game.score}/${game.maxScore()}  ${chalk.bold('turns')} ${game.turn}  ${colour(reason)}`);
}

export async function runReplay(args: string[]): Promise<void> {
  const options = parseArgs(args);
  if (!options) return;

  if (options.file) {
    const log = Recorder.parse(await readFile(options.file, 'utf8'));
    const game = Recorder.replay(log, { debug: options.verbose });
    console.error(chalk.cyan(`Replayed ${log.actions.length} moves from ${options.file}`));
    printResult(game);
    return;
  }

  const game = new GameState({ numPlayers: options.numPlayers, seed: options.seed, debug: options.verbose });
  runGame(game, getAgent(options.agent));

  const json = new Recorder(game).exportJSON();
  if (options.out) {
    await writeFile(options.out, json + '\n', 'utf8');
    console.error(chalk.green(`Wrote ${options.out}`));
  } else {
    console.log(json);
  }
  printResult(game);
}
