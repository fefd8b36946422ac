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
/*
 * sim/Simulator.ts
 * Batch runs of many seeded games, in process or across worker threads
 */
import { cpus } from "os";
import { AgentName, getAgent } from "../agents/index.js";
import { WorkerPool } from "../core/WorkerPool.js";
import { GameLoop, GameResult } from "../engine/GameLoop.js";
import { EndReason, GameState, MoveRecord } from "../engine/GameState.js";
import { Summary, describe } from "./statistics.js";

export interface SimulationOptions {
  /** Agent seated at every position (default: "cheater") */
  agent?: AgentName;
  /** Number of players (default: 5) */
  numPlayers?: number;
  /** Number of games (default: 1000) */
  games?: number;
  /** Seed of the first game; game i uses seed + i (default: 0) */
  seed?: number;
  forcedDiscardGrantsHint?: boolean;
  /** Called after every finished game */
  onGame?: (result: GameResult, index: number) => void;
  /** Called for every resolved move */
  onMove?: (record: MoveRecord) => void;
}

export interface ParallelSimulationOptions extends Omit<SimulationOptions, "onGame" | "onMove"> {
  /** Worker threads (default: CPU count) */
  workers?: number;
  debug?: boolean;
}

export interface SimulationReport {
  agent: AgentName;
  numPlayers: number;
  games: number;
  seed: number;
  results: GameResult[];
  scores: Summary;
  times: Summary;
  endings: Record<EndReason, number>;
}

/** A contiguous run of trials; the unit of work handed to one worker */
export interface TrialChunk {
  agent: AgentName;
  numPlayers: number;
  seed: number;
  start: number;
  count: number;
  forcedDiscardGrantsHint: boolean;
}

export type ResolvedOptions = Required<Omit<SimulationOptions, "onGame" | "onMove">>;

function resolveOptions(options: SimulationOptions): ResolvedOptions {
  const resolved = {
    agent: options.agent ?? "cheater",
    numPlayers: options.numPlayers ?? 5,
    games: options.games ?? 1000,
    seed: options.seed ?? 0,
    forcedDiscardGrantsHint: options.forcedDiscardGrantsHint ?? false,
  };
  if (!Number.isInteger(resolved.games) || resolved.games < 1) {
    throw new RangeError(`games must be a positive integer, got ${resolved.games}`);
  }
  return resolved;
}

/**
 * Play `count` games starting at trial `start` on a single GameState,
 * resetting it with seed + trial before each one.
 */
export function runTrials(
  chunk: TrialChunk,
  onGame?: (result: GameResult, index: number) => void,
  onMove?: (record: MoveRecord) => void,
): GameResult[] {
  const game = new GameState({
    numPlayers: chunk.numPlayers,
    seed: chunk.seed + chunk.start,
    forcedDiscardGrantsHint: chunk.forcedDiscardGrantsHint,
  });
  const loop = new GameLoop(game, getAgent(chunk.agent));
  if (onMove) game.on("move", onMove);

  const results: GameResult[] = [];
  for (let i = chunk.start; i < chunk.start + chunk.count; i++) {
    game.reset(chunk.seed + i);
    const result = loop.run();
    results.push(result);
    onGame?.(result, i);
  }
  return results;
}

/** Split `games` trials into at most `parts` contiguous chunks of near-equal size */
export function partitionTrials(games: number, parts: number): { start: number; count: number }[] {
  const n = Math.max(1, Math.min(parts, games));
  const base = Math.floor(games / n);
  const extra = games % n;
  const chunks: { start: number; count: number }[] = [];
  let start = 0;
  for (let i = 0; i < n; i++) {
    const count = base + (i < extra ? 1 : 0);
    chunks.push({ start, count });
    start += count;
  }
  return chunks;
}

export function summarise(options: ResolvedOptions, results: GameResult[]): SimulationReport {
  const endings: Record<EndReason, number> = { strikeout: 0, perfect: 0, "deck-exhausted": 0 };
  for (const r of results) endings[r.endReason]++;

  return {
    agent: options.agent,
    numPlayers: options.numPlayers,
    games: options.games,
    seed: options.seed,
    results,
    scores: describe(results.map((r) => r.score)),
    times: describe(results.map((r) => r.elapsedMs)),
    endings,
  };
}

/** Run every trial in this thread */
export function simulate(options: SimulationOptions = {}): SimulationReport {
  const resolved = resolveOptions(options);
  const results = runTrials({ ...resolved, start: 0, count: resolved.games }, options.onGame, options.onMove);
  return summarise(resolved, results);
}

/**
 * Run the trials across worker threads, one chunk per worker. Results come
 * back in trial order and match simulate() for the same options.
 */
export async function simulateParallel(options: ParallelSimulationOptions = {}): Promise<SimulationReport> {
  const resolved = resolveOptions(options);
  const pool = new WorkerPool({
    numWorkers: Math.min(options.workers ?? cpus().length, resolved.games),
    workerScript: workerScriptUrl(),
    debug: options.debug ?? false,
  });

  try {
    const chunks: TrialChunk[] = partitionTrials(resolved.games, pool.size).map(({ start, count }) => ({
      ...resolved,
      start,
      count,
    }));
    const outputs = await pool.executeParallel("simulate", chunks);
    return summarise(resolved, outputs.flatMap(parseResults));
  } finally {
    await pool.shutdown();
  }
}

/** The worker entry beside this module, as .ts under a TypeScript loader or .js once built */
function workerScriptUrl(): URL {
  const extension = import.meta.url.endsWith(".ts") ? ".ts" : ".js";
  return new URL(`../core/worker/sim-worker${extension}`, import.meta.url);
}

const END_REASONS: readonly string[] = ["strikeout", "perfect", "deck-exhausted"];

function isEndReason(value: unknown): value is EndReason {
  return typeof value === "string" && END_REASONS.includes(value);
}

function isGameResult(value: unknown): value is GameResult {
  return typeof value === "object" && value !== null &&
    "seed" in value && typeof value.seed === "number" &&
    "score" in value && typeof value.score === "number" &&
    "turns" in value && typeof value.turns === "number" &&
    "strikes" in value && typeof value.strikes === "number" &&
    "elapsedMs" in value && typeof value.elapsedMs === "number" &&
    "endReason" in value && isEndReason(value.endReason);
}

/** Narrow a worker's reply to its game results */
export function parseResults(value: unknown): GameResult[] {
  if (!Array.isArray(value) || !value.every(isGameResult)) {
    throw new Error("Worker returned a malformed result batch");
  }
  return value;
}
