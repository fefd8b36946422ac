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
 * Test suite for the discard pile
 * Tests: counts, critical and dead tracking, what-if removal, max score
 */

import { Card } from '../core/Card.js';
import { DiscardPile } from '../core/DiscardPile.js';
import { keys } from './decks.js';
import { assert, assertDeepEquals, assertEquals, assertThrows, finish, header, section, test } from './harness.js';

const R1 = Card.of('red', 1);
const R2 = Card.of('red', 2);
const R3 = Card.of('red', 3);
const R4 = Card.of('red', 4);
const R5 = Card.of('red', 5);
const G3 = Card.of('green', 3);

function assertDisjoint(pile: DiscardPile): void {
  for (const card of pile.criticalCards()) {
    assert(!pile.isDead(card), `${card} is both critical and dead`);
  }
}

header('Testing DiscardPile');

section('🗑️  Counting');

test('A fresh pile is empty with only the 5s critical', () => {
  const pile = new DiscardPile();

  assertEquals(pile.total, 0);
  assertDeepEquals(keys([...pile.criticalCards()]), ['R5', 'G5', 'B5', 'Y5', 'P5']);
  assertEquals(pile.deadCards().size, 0);
  assertEquals(pile.maxScore(), 25);
});

test('discard() counts copies and remaining', () => {
  const pile = new DiscardPile();
  pile.discard(R1);

  assertEquals(pile.count(R1), 1);
  assertEquals(pile.remaining(R1), 2);
  assertEquals(pile.total, 1);
  assertDeepEquals(pile.snapshot(), { R1: 1 });
});

test('discard() past the last copy throws', () => {
  const pile = new DiscardPile();
  pile.discard(R5);

  assertThrows(() => pile.discard(R5), RangeError);
});

test('remove() of an absent card throws', () => {
  assertThrows(() => new DiscardPile().remove(R1), RangeError);
});

section('⚠️  Critical and dead');

test('The second-to-last copy going makes a card critical', () => {
  const pile = new DiscardPile();
  pile.discard(R2);

  assert(pile.isCritical(R2), 'R2 should be critical');
  assert(!pile.isDead(R2), 'R2 should not be dead');
  assertDisjoint(pile);
});

test('The last copy going kills the card and every higher rank', () => {
  const pile = new DiscardPile();
  pile.discard(R2);
  pile.discard(R2);

  for (const card of [R2, R3, R4, R5]) {
    assert(pile.isDead(card), `${card} should be dead`);
    assert(!pile.isCritical(card), `${card} should not be critical`);
  }
  assert(!pile.isDead(R1), 'R1 is still playable');
  assertEquals(pile.maxScore(), 21);
  assertDisjoint(pile);
});

test('A single copy of a dead card never becomes critical', () => {
  const pile = new DiscardPile();
  pile.discard(R2);
  pile.discard(R2);
  pile.discard(R3);

  assert(!pile.isCritical(R3), 'R3 is dead, not critical');
  assertDisjoint(pile);
});

test('A played card never becomes critical', () => {
  const pile = new DiscardPile();
  pile.discard(R1);
  pile.markPlayed(R1);
  pile.discard(R1);

  assertEquals(pile.remaining(R1), 1);
  assert(!pile.isCritical(R1), 'R1 is already on its firework');
});

test('markPlayed() removes a card from the critical set', () => {
  const pile = new DiscardPile();
  pile.markPlayed(R5);

  assert(!pile.isCritical(R5), 'R5 is played');
});

section('↩️  What-if removal');

test('remove() undoes a discard that made a card critical', () => {
  const pile = new DiscardPile();
  pile.discard(G3);
  pile.remove(G3);

  assert(!pile.isCritical(G3), 'G3 has both copies again');
  assertEquals(pile.total, 0);
  assertEquals(pile.maxScore(), 25);
});

test('remove() revives the cards the last copy killed', () => {
  const pile = new DiscardPile();
  pile.discard(R2);
  pile.discard(R2);
  pile.remove(R2);

  assert(pile.isCritical(R2), 'R2 is down to one copy');
  assert(!pile.isDead(R3), 'R3 is reachable again');
  assert(!pile.isCritical(R3), 'R3 still has two copies');
  assert(pile.isCritical(R5), 'R5 is critical again');
  assertEquals(pile.deadCards().size, 0);
  assertEquals(pile.maxScore(), 25);
  assertDisjoint(pile);
});

test('remove() keeps cards dead behind another missing rank', () => {
  const pile = new DiscardPile();
  pile.discard(R2);
  pile.discard(R2);
  pile.discard(R4);
  pile.discard(R4);
  pile.remove(R2);

  assert(!pile.isDead(R3), 'R3 is reachable again');
  assert(pile.isDead(R4), 'Both R4s are gone');
  assert(pile.isDead(R5), 'R5 sits behind R4');
  assertEquals(pile.maxScore(), 23);
  assertDisjoint(pile);
});

test('reset() restores the fresh state', () => {
  const pile = new DiscardPile();
  pile.discard(R2);
  pile.discard(R2);
  pile.markPlayed(R1);
  pile.reset();

  assertEquals(pile.total, 0);
  assertEquals(pile.deadCards().size, 0);
  assertEquals(pile.criticalCards().size, 5);
});

finish('discard pile');
