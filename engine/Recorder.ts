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
 * engine/Recorder.ts
 * Replay log export and replay
 */

import { Card } from "../core/Card.js";
import { InvalidActionError } from "../core/errors.js";
import { HAND_SIZES, colourAt, isRank } from "../core/types.js";
import { GameAction, discard, hintColour, hintRank, play } from "./actions.js";
import { GameState } from "./GameState.js";

/** Action codes used in the log */
export const REPLAY_PLAY = 0;
export const REPLAY_DISCARD = 1;
export const REPLAY_COLOUR_HINT = 2;
export const REPLAY_RANK_HINT = 3;

export type ReplayActionType = typeof REPLAY_PLAY | typeof REPLAY_DISCARD | typeof REPLAY_COLOUR_HINT | typeof REPLAY_RANK_HINT;

export interface ReplayCard {
  colourIndex: number;
  rank: number;
}

/**
 * One logged move. For plays and discards `target` is the card's deck
 * position; for hints it is the hinted seat. `value` is the firework colour
 * index for plays, 0 for discards, and the hinted colour index or rank.
 */
export interface ReplayAction {
  type: ReplayActionType;
  target: number;
  value: number;
}

export interface ReplayOptions {
  variant: string;
  numPlayers: number;
  handSize: number;
  seed: number;
  forcedDiscardGrantsHint: boolean;
}

export interface ReplayLog {
  players: string[];
  deck: ReplayCard[];
  actions: ReplayAction[];
  options: ReplayOptions;
}

/**
 * Recorder for exporting a game's deal and moves as a portable log
 *
 * Useful for debugging, testing, and viewing games in external tools.
 * Logs are plain JSON; replaying one rebuilds the game move by move.
 */
export class Recorder {
  readonly game: GameState;
  readonly players: string[];

  constructor(game: GameState, players?: string[]) {
    if (players && players.length !== game.numPlayers) {
      throw new RangeError(`Expected ${game.numPlayers} player names, got ${players.length}`);
    }
    this.game = game;
    this.players = players ?? Array.from({ length: game.numPlayers }, (_, i) => `Player ${i + 1}`);
  }

  /** Snapshot the deck and move history of the game so far */
  export(): ReplayLog {
    const game = this.game;
    const actions: ReplayAction[] = [];

    for (const entry of game.history) {
      if (entry.kind !== "move") continue;
      actions.push(Recorder.encode(entry.action, entry.position));
    }

    return {
      players: [...this.players],
      deck: game.deck.cards.map((card) => ({ colourIndex: card.colourIndex, rank: card.rank })),
      actions,
      options: {
        variant: "No Variant",
        numPlayers: game.numPlayers,
        handSize: game.handSize,
        seed: game.seed,
        forcedDiscardGrantsHint: game.forcedDiscardGrantsHint,
      },
    };
  }

  exportJSON(): string {
    return JSON.stringify(this.export(), null, 2);
  }

  private static encode(action: GameAction, position: number | null): ReplayAction {
    switch (action.type) {
      case "play":
        return { type: REPLAY_PLAY, target: position ?? -1, value: colourIndexOf(action.colour) };
      case "discard":
        return { type: REPLAY_DISCARD, target: position ?? -1, value: 0 };
      case "hint:colour":
        return { type: REPLAY_COLOUR_HINT, target: action.target, value: colourIndexOf(action.colour) };
      case "hint:rank":
        return { type: REPLAY_RANK_HINT, target: action.target, value: action.rank };
    }
  }

  /**
   * Validate a log read from JSON text or an already-parsed value.
   * @throws InvalidActionError when the log is malformed
   */
  static parse(json: string | unknown): ReplayLog {
    let value: unknown = json;
    if (typeof json === "string") {
      try {
        value = JSON.parse(json);
      } catch (err) {
        throw new InvalidActionError(`Replay log is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    if (typeof value !== "object" || value === null) {
      throw new InvalidActionError("Replay log must be an object");
    }
    if (!("players" in value) || !Array.isArray(value.players) || !value.players.every((p): p is string => typeof p === "string")) {
      throw new InvalidActionError("Replay log needs a list of player names");
    }
    if (!("deck" in value) || !Array.isArray(value.deck) || !value.deck.every(isReplayCard)) {
      throw new InvalidActionError("Replay log deck is malformed");
    }
    if (!("actions" in value) || !Array.isArray(value.actions) || !value.actions.every(isReplayAction)) {
      throw new InvalidActionError("Replay log actions are malformed");
    }

    const players: string[] = value.players;
    const options = "options" in value ? value.options : undefined;
    return {
      players,
      deck: value.deck,
      actions: value.actions,
      options: parseOptions(options, players.length),
    };
  }

  /**
   * Rebuild a game from a log: deal the logged deck, then resolve every
   * logged move for the seat whose turn it was.
   * @throws InvalidActionError when a logged card is not in the acting hand
   */
  static replay(log: ReplayLog, { debug = false } = {}): GameState {
    const game = new GameState({
      numPlayers: log.options.numPlayers,
      handSize: log.options.handSize,
      seed: log.options.seed,
      deck: log.deck.map(toCard),
      forcedDiscardGrantsHint: log.options.forcedDiscardGrantsHint,
      debug,
    });
    game.setup();

    log.actions.forEach((entry, i) => {
      const player = game.currentPlayer;
      game.resolveMove(player, Recorder.decode(game, player, entry, i));
    });

    return game;
  }

  private static decode(game: GameState, player: number, entry: ReplayAction, i: number): GameAction {
    switch (entry.type) {
      case REPLAY_PLAY:
      case REPLAY_DISCARD: {
        const index = game.handPositions(player).indexOf(entry.target);
        if (index === -1) {
          throw new InvalidActionError(`Action ${i}: card ${entry.target} is not in player ${player}'s hand`);
        }
        return entry.type === REPLAY_PLAY ? play(index, colourAt(entry.value)) : discard(index);
      }
      case REPLAY_COLOUR_HINT:
        return hintColour(entry.target, colourAt(entry.value));
      case REPLAY_RANK_HINT:
        if (!isRank(entry.value)) {
          throw new InvalidActionError(`Action ${i}: ${entry.value} is not a rank`);
        }
        return hintRank(entry.target, entry.value);
    }
  }
}

function colourIndexOf(colour: Card["colour"]): number {
  return Card.of(colour, 1).colourIndex;
}

function toCard({ colourIndex, rank }: ReplayCard): Card {
  if (!isRank(rank)) throw new InvalidActionError(`Replay deck holds rank ${rank}`);
  return Card.of(colourAt(colourIndex), rank);
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isReplayCard(value: unknown): value is ReplayCard {
  return typeof value === "object" && value !== null &&
    "colourIndex" in value && isInteger(value.colourIndex) && value.colourIndex >= 0 && value.colourIndex < 5 &&
    "rank" in value && isRank(value.rank);
}

function isReplayAction(value: unknown): value is ReplayAction {
  return typeof value === "object" && value !== null &&
    "type" in value && isInteger(value.type) && value.type >= REPLAY_PLAY && value.type <= REPLAY_RANK_HINT &&
    "target" in value && isInteger(value.target) &&
    "value" in value && isInteger(value.value);
}

/** Missing options fall back to the defaults for the logged player count */
function parseOptions(value: unknown, numPlayers: number): ReplayOptions {
  const options: ReplayOptions = {
    variant: "No Variant",
    numPlayers,
    handSize: HAND_SIZES[numPlayers] ?? 0,
    seed: 0,
    forcedDiscardGrantsHint: false,
  };
  if (typeof value !== "object" || value === null) return options;

  if ("variant" in value && typeof value.variant === "string") options.variant = value.variant;
  if ("handSize" in value && isInteger(value.handSize)) options.handSize = value.handSize;
  if ("seed" in value && isInteger(value.seed)) options.seed = value.seed;
  if ("forcedDiscardGrantsHint" in value && typeof value.forcedDiscardGrantsHint === "boolean") {
    options.forcedDiscardGrantsHint = value.forcedDiscardGrantsHint;
  }
  if ("numPlayers" in value && value.numPlayers !== numPlayers) {
    throw new InvalidActionError(`Replay lists ${numPlayers} players but options say ${String(value.numPlayers)}`);
  }
  return options;
}
