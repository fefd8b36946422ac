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
 * agents/helpers.ts
 * Card-picking rules shared by the scripted agents
 */
import { Card } from "../core/Card.js";
import { GameAction, hintColour, hintRank } from "../engine/actions.js";
import { GameView } from "../engine/GameState.js";

export function nextSeat(view: GameView, seat: number): number {
  return (seat + 1) % view.numPlayers;
}

/**
 * A hint that is always legal while tokens remain: the colour of the next
 * seat's first card, or 1s if that hand is empty.
 */
export function hintNextSeat(view: GameView, seat: number): GameAction {
  const target = nextSeat(view, seat);
  const [first] = view.hand(target);
  return first ? hintColour(target, first.colour) : hintRank(target, 1);
}

/** Already played, or never playable again */
export function isUseless(view: GameView, card: Card): boolean {
  return view.playedCards.has(card) || view.deadCards.has(card);
}

/** Cards other seats hold, so losing one copy here costs nothing */
export function cardsHeldByOthers(view: GameView, seat: number): Set<Card> {
  const held = new Set<Card>();
  for (let other = 0; other < view.numPlayers; other++) {
    if (other === seat) continue;
    for (const card of view.hand(other)) held.add(card);
  }
  return held;
}
