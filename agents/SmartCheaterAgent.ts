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
 * agents/SmartCheaterAgent.ts
 */
import { GameAction, discard, play } from "../engine/actions.js";
import { GameView } from "../engine/GameState.js";
import { MAX_HINTS } from "../core/types.js";
import { cardsHeldByOthers, hintNextSeat, isUseless } from "./helpers.js";
import { Agent } from "./types.js";

/** Below this many discards, useless cards go before hints */
const EARLY_DISCARDS = 5;

/**
 * Cheating agent with a fixed priority list:
 *   1. play the lowest playable card
 *   2. hint when tokens are full
 *   3. discard a played or dead card, early in the game
 *   4. hint while tokens remain
 *   5. discard a played or dead card
 *   6. discard a card another seat also holds
 *   7. discard the first non-critical card
 *   8. discard whichever card costs the least max score
 */
export class SmartCheaterAgent implements Agent {
  readonly name = "smart";
  readonly seat: number;
  private view: GameView;

  constructor(seat: number, view: GameView) {
    this.seat = seat;
    this.view = view;
  }

  findMove(): GameAction {
    const view = this.view;
    const hand = view.hand(this.seat);

    let best = -1;
    const playable = new Set(view.playableCards);
    hand.forEach((card, index) => {
      if (playable.has(card) && (best === -1 || card.rank < hand[best].rank)) best = index;
    });
    if (best !== -1) return play(best, hand[best].colour);

    if (view.numHints === MAX_HINTS) return hintNextSeat(view, this.seat);

    const useless = hand.findIndex((card) => isUseless(view, card));
    if (useless !== -1 && view.numDiscarded < EARLY_DISCARDS) return discard(useless);

    if (view.numHints > 0) return hintNextSeat(view, this.seat);

    if (useless !== -1) return discard(useless);

    const held = cardsHeldByOthers(view, this.seat);
    const duplicate = hand.findIndex((card) => held.has(card));
    if (duplicate !== -1) return discard(duplicate);

    const dispensable = hand.findIndex((card) => !view.criticalCards.has(card));
    if (dispensable !== -1) return discard(dispensable);

    return discard(this.cheapestDiscard());
  }

  /** Hand index whose discard leaves the highest reachable score */
  cheapestDiscard(): number {
    const scores = this.view.hand(this.seat).map((card) => this.view.maxScoreAfterDiscard(card));
    return scores.indexOf(Math.max(...scores));
  }
}
