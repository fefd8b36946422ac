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
 * engine/GameLoop.ts
 * Drives one game from setup to its end
 */
import { EventEmitter } from "events";
import { performance } from "perf_hooks";
import type { Agent, AgentFactory } from "../agents/types.js";
import { EndReason, GameState } from "./GameState.js";

export interface GameResult {
  seed: number;
  score: number;
  turns: number;
  strikes: number;
  endReason: EndReason;
  elapsedMs: number;
}

export class GameLoop extends EventEmitter {
  readonly game: GameState;
  private factory: AgentFactory;

  constructor(game: GameState, factory: AgentFactory) {
    super();
    this.game = game;
    this.factory = factory;
  }

  /**
   * Play a full game. The game is set up first if needed; agents are built
   * fresh for every run so no policy state leaks between games.
   */
  run(): GameResult {
    const game = this.game;
    if (game.status === "not-started") game.setup();

    const agents: Agent[] = Array.from({ length: game.numPlayers }, (_, seat) => this.factory(seat, game));
    this.emit("loop:start", { payload: { seed: game.seed, agents: agents.map((a) => a.name) } });

    const start = performance.now();
    while (!game.gameOver) {
      const seat = game.currentPlayer;
      game.resolveMove(seat, agents[seat].findMove());
    }
    const elapsedMs = performance.now() - start;

    const endReason = game.endReason;
    if (endReason === null) {
      throw new Error("Game ended without an end reason");
    }

    const result: GameResult = {
      seed: game.seed,
      score: game.score,
      turns: game.turn,
      strikes: game.strikes,
      endReason,
      elapsedMs,
    };
    this.emit("loop:stop", { payload: result });
    return result;
  }
}

/** Run one game with a fresh loop */
export function runGame(game: GameState, factory: AgentFactory): GameResult {
  return new GameLoop(game, factory).run();
}
