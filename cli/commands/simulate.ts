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
 * Simulate Command
 *
 * Plays a batch of seeded games with one agent in every seat and prints
 * score and timing statistics.
 */

import boxen from 'boxen';
import chalk from 'chalk';
import ora from 'ora';
import { AGENTS, AgentName, isAgentName } from '../../agents/index.js';
import { describeAction } from '../../engine/actions.js';
import type { MoveRecord } from '../../engine/GameState.js';
import { SimulationReport, simulate, simulateParallel } from '../../sim/Simulator.js';
import { Summary, histogram } from '../../sim/statistics.js';

export interface SimulateOptions {
  agent: AgentName;
  numPlayers: number;
  games: number;
  seed: number;
  workers: number;
  forcedDiscardGrantsHint: boolean;
  verbose: boolean;
  json: boolean;
}

export function parseArgs(args: string[]): SimulateOptions | null {
  const options: SimulateOptions = {
    agent: 'cheater',
    numPlayers: 5,
    games: 1000,
    seed: 0,
    workers: 0,
    forcedDiscardGrantsHint: false,
    verbose: false,
    json: false,
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

      case '--games':
      case '-n':
        options.games = intOf(args, ++i, arg);
        break;

      case '--seed':
      case '-s':
        options.seed = intOf(args, ++i, arg);
        break;

      case '--workers':
      case '-w':
        options.workers = intOf(args, ++i, arg);
        break;

      case '--forced-discard-hint':
        options.forcedDiscardGrantsHint = true;
        break;

      case '--verbose':
      case '-v':
        options.verbose = true;
        break;

      case '--json':
        options.json = true;
        break;

      default:
        console.error(`Unknown option: ${arg}`);
        showHelp();
        process.exit(1);
    }
  }

  return options;
}

export function valueOf(args: string[], i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`${flag} needs a value`);
  }
  return value;
}

export function intOf(args: string[], i: number, flag: string): number {
  const raw = valueOf(args, i, flag);
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

function showHelp(): void {
  console.log(`
Simulate a batch of games

USAGE:
  hanabi-bench simulate [options]

OPTIONS:
  -a, --agent <name>       Agent in every seat: ${Object.keys(AGENTS).join(', ')} (default: cheater)
  -p, --players <n>        Players per game, 2-5 (default: 5)
  -n, --games <n>          Number of games (default: 1000)
  -s, --seed <n>           Seed of the first game; game i uses seed + i (default: 0)
  -w, --workers <n>        Spread games over n worker threads (default: run in-process)
  --forced-discard-hint    A failed play returns a hint token like a discard
  -v, --verbose            Print every move (in-process only)
  --json                   Print the full report as JSON
  -h, --help               Show this help message

EXAMPLES:
  hanabi-bench simulate -n 10000 -a smart
  hanabi-bench simulate -p 3 -w 8 --json > report.json
`);
}

function formatSummary(label: string, s: Summary, digits: number): string {
  const f = (n: number) => n.toFixed(digits).padStart(9);
  return `${chalk.bold(label.padEnd(8))}${f(s.mean)}${f(s.std)}${f(s.min)}${f(s.p25)}${f(s.median)}${f(s.p75)}${f(s.max)}`;
}

function formatReport(report: SimulationReport): string {
  const header = ['', 'mean', 'std', 'min', '25%', '50%', '75%', 'max']
    .map((h, i) => (i === 0 ? h.padEnd(8) : h.padStart(9)))
    .join('');

  const { strikeout, perfect } = report.endings;
  const distribution = [...histogram(report.results.map((r) => r.score))]
    .map(([score, count]) => `${chalk.bold(String(score))}${chalk.gray('x' + count)}`)
    .join(' ');

  return [
    `${chalk.bold.cyan('Hanabi')} ${chalk.gray(`${report.agent} x ${report.numPlayers}, ${report.games} games from seed ${report.seed}`)}`,
    '',
    chalk.gray(header),
    formatSummary('score', report.scores, 2),
    formatSummary('ms', report.times, 3),
    '',
    distribution,
    '',
    `${chalk.green('perfect')} ${perfect}   ${chalk.yellow('deck out')} ${report.endings['deck-exhausted']}   ${chalk.red('strikeout')} ${strikeout}`,
  ].join('\n');
}

function printMove(record: MoveRecord): void {
  const card = record.card ? ` ${chalk.bold(record.card.toString())}` : '';
  console.log(chalk.gray(`  #${String(record.turn).padStart(3)} P${record.player}`) + ` ${describeAction(record.action)}${card} ${chalk.gray(record.outcome)}`);
}

/**
 * How progress is shown. The in-process run never yields to the event loop,
 * so only a worker run can animate a spinner.
 */
export function progressStyle(options: Pick<SimulateOptions, 'workers' | 'verbose' | 'json'>): 'spinner' | 'lines' | 'none' {
  if (options.json || options.verbose) return 'none';
  return options.workers > 0 ? 'spinner' : 'lines';
}

export async function runSimulate(args: string[]): Promise<void> {
  const options = parseArgs(args);
  if (!options) return;

  const { workers, verbose, json, ...simulation } = options;
  const style = progressStyle(options);
  const spinner = style === 'spinner' ? ora(`Playing ${options.games} games on ${workers} workers...`).start() : null;
  if (style === 'lines') console.log(chalk.gray(`Playing ${options.games} games...`));

  let report: SimulationReport;
  try {
    if (workers > 0) {
      report = await simulateParallel({ ...simulation, workers });
    } else {
      report = simulate({
        ...simulation,
        onGame: verbose
          ? (result, index) => console.log(`${chalk.cyan(`game ${index}`)} seed ${result.seed}: score ${result.score} (${result.endReason})`)
          : undefined,
        onMove: verbose ? printMove : undefined,
      });
    }
  } catch (err) {
    spinner?.fail('Simulation failed');
    throw err;
  }
  spinner?.succeed(`Played ${report.games} games`);
  if (style === 'lines') console.log(`${chalk.green('✔')} Played ${report.games} games`);

  if (json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(boxen(formatReport(report), {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
  }));
}
