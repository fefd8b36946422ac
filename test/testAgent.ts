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
 * Test suite for the scripted agents
 * Tests: move choice in set-up positions, the registry, full games
 */

import { AGENTS, CheaterAgent, PaceAgent, SmartCheaterAgent, getAgent, isAgentName } from '../agents/index.js';
import { nextSeat } from '../agents/helpers.js';
import { runGame } from '../engine/GameLoop.js';
import { GameState } from '../engine/GameState.js';
import { ranksAscending, ranksDescending } from './decks.js';
import { assert, assertDeepEquals, assertEquals, assertThrows, finish, header, section, test } from './harness.js';

/**
 * Two players over the rank-descending deck; nothing is playable yet:
 *   seat 0: R5 B5 P5 R4 G4
 *   seat 1: G5 Y5 R4 G4 B4
 */
function stuckGame(): GameState {
  const game = new GameState({ numPlayers: 2, deck: ranksDescending() });
  game.setup();
  return game;
}

/**
 * Five players over the rank-ascending deck with red at 1:
 *   seat 0: R1 G1 Y1 R2
 */
function redStartedGame(): GameState {
  const game = new GameState({ numPlayers: 5, deck: ranksAscending() });
  game.setup();
  game.fireworks.advance('red');
  return game;
}

/**
 * Two players over the rank-ascending deck with red, green and blue at 1:
 *   seat 0: R1 R1 G1 B1 B1, none playable, all already played
 */
function playedOutGame(): GameState {
  const game = new GameState({ numPlayers: 2, deck: ranksAscending() });
  game.setup();
  game.fireworks.advance('red');
  game.fireworks.advance('green');
  game.fireworks.advance('blue');
  return game;
}

header('Testing Agents');

// ============================================================================
// CHEATER
// ============================================================================

section('🃏 cheater');

test('cheater plays by colour order', () => {
  const game = redStartedGame();

  assertDeepEquals(new CheaterAgent(0, game).findMove(), { type: 'play', index: 3, colour: 'red' });
});

test('cheater discards its first card when nothing plays', () => {
  const game = stuckGame();

  assertDeepEquals(new CheaterAgent(0, game).findMove(), { type: 'discard', index: 0 });
});

// ============================================================================
// SMART
// ============================================================================

section('🧠 smart');

test('smart plays its lowest playable card', () => {
  const game = redStartedGame();

  assertDeepEquals(new SmartCheaterAgent(0, game).findMove(), { type: 'play', index: 1, colour: 'green' });
});

test('smart hints at full tokens', () => {
  const game = stuckGame();

  assertDeepEquals(new SmartCheaterAgent(0, game).findMove(), { type: 'hint:colour', target: 1, colour: 'green' });
});

test('smart clears a played card early in the game', () => {
  const game = playedOutGame();
  game.numHints = 7;

  assertDeepEquals(new SmartCheaterAgent(0, game).findMove(), { type: 'discard', index: 0 });
});

test('smart hints while tokens remain and nothing is useless', () => {
  const game = stuckGame();
  game.numHints = 3;

  assertDeepEquals(new SmartCheaterAgent(0, game).findMove(), { type: 'hint:colour', target: 1, colour: 'green' });
});

test('smart discards a card another seat holds when out of tokens', () => {
  const game = stuckGame();
  game.numHints = 0;

  assertDeepEquals(new SmartCheaterAgent(0, game).findMove(), { type: 'discard', index: 3 });
});

test('smart ranks discards by the max score they leave', () => {
  const game = stuckGame();

  assertEquals(new SmartCheaterAgent(0, game).cheapestDiscard(), 3);
  assertEquals(game.numDiscarded, 0);
});

// ============================================================================
// PACE
// ============================================================================

section('⏱️  pace');

test('pace budgets discards by player count', () => {
  assertEquals(new PaceAgent(0, new GameState({ numPlayers: 5 })).discardBudget, 5);
  assertEquals(new PaceAgent(0, new GameState({ numPlayers: 2 })).discardBudget, 15);
});

test('pace plays the first playable card', () => {
  const game = redStartedGame();

  assertDeepEquals(new PaceAgent(0, game).findMove(), { type: 'play', index: 1, colour: 'green' });
});

test('pace discards a useless card under budget', () => {
  const game = playedOutGame();
  game.numHints = 7;

  assertDeepEquals(new PaceAgent(0, game).findMove(), { type: 'discard', index: 0 });
});

test('pace discards a duplicate when out of tokens', () => {
  const game = stuckGame();
  game.numHints = 0;

  assertDeepEquals(new PaceAgent(0, game).findMove(), { type: 'discard', index: 3 });
});

// ============================================================================
// REGISTRY AND FULL GAMES
// ============================================================================

section('📋 Registry');

test('Agents are looked up by name', () => {
  const game = stuckGame();

  assert(isAgentName('smart'), 'smart should be registered');
  assert(!isAgentName('toString'), 'Prototype keys are not agents');
  assertEquals(getAgent('pace')(1, game).name, 'pace');
  assertEquals(AGENTS.cheater(0, game).seat, 0);
  assertThrows(() => getAgent('oracle'), RangeError);
});

test('nextSeat wraps around the table', () => {
  const game = new GameState({ numPlayers: 3 });

  assertEquals(nextSeat(game, 0), 1);
  assertEquals(nextSeat(game, 2), 0);
});

section('🎮 Full games');

for (const name of ['cheater', 'smart', 'pace'] as const) {
  test(`${name} finishes games for 2 to 5 players`, () => {
    for (let numPlayers = 2; numPlayers <= 5; numPlayers++) {
      for (let seed = 0; seed < 3; seed++) {
        const game = new GameState({ numPlayers, seed });
        const result = runGame(game, AGENTS[name]);

        assert(game.gameOver, `${numPlayers}p seed ${seed} should finish`);
        assert(result.score >= 0 && result.score <= 25, `Score out of range: ${result.score}`);
        assertEquals(result.score, game.fireworks.total);
        assert(result.strikes <= 3, `Too many strikes: ${result.strikes}`);
        assertEquals(result.turns, game.turn);
      }
    }
  });
}

test('cheater never hints', () => {
  const game = new GameState({ numPlayers: 4, seed: 8 });
  runGame(game, AGENTS.cheater);

  for (const entry of game.history) {
    if (entry.kind === 'move') assertEquals(entry.outcome === 'hinted', false, `Turn ${entry.turn} was a hint`);
  }
});

test('Agents are rebuilt per game and stay deterministic', () => {
  const a = runGame(new GameState({ numPlayers: 3, seed: 21 }), AGENTS.smart);
  const b = runGame(new GameState({ numPlayers: 3, seed: 21 }), AGENTS.smart);

  assertEquals(a.score, b.score);
  assertEquals(a.turns, b.turns);
  assertEquals(a.endReason, b.endReason);
});

finish('agent');
