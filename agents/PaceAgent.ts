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
 * agents/PaceAgent.ts
 */
import { DECK_SIZE, MAX_HINTS, MAX_SCORE } from "../core/types.js";
import { GameAction, discard, play } from "../engine/actions.js";
import { GameView } from "../engine/GameState.js";
import { cardsHeldByOthers, hintNextSeat, isUseless } from "./helpers.js";
import { Agent } from "./types.js";

/**
 * Cheating agent that budgets its discards against the cards the team can
 * afford to lose. Priorities:
 *   1. play a card
 *   2. hint when tokens are full
 *   3. discard a useless card while discards are under budget, or when out of tokens
 *   4. hint
 *   5. discard a card another seat also holds
 *   6. discard a non-critical card
 *   7. discard the first card
 */
export class PaceAgent implements Agent {
  readonly name = "pace";
  readonly seat: number;
  private view: GameView;

  constructor(seat: number, view: GameView) {
    this.seat = seat;
    this.view = view;
  }

  /** Cards that can go without starving the fireworks */
  get discardBudget(): number {
    return DECK_SIZE - MAX_SCORE - this.view.numPlayers * this.view.handSize;
  }

  findMove(): GameAction {
    const view = this.view;
    const hand = view.hand(this.seat);

    const playable = new Set(view.playableCards);
    const playIndex = hand.findIndex((card) => playable.has(card));
    if (playIndex !== -1) return play(playIndex, hand[playIndex].colour);

    if (view.numHints === MAX_HINTS) return hintNextSeat(view, this.seat);

    if (view.numDiscarded < this.discardBudget || view.numHints === 0) {
      const useless = hand.findIndex((card) => isUseless(view, card));
      if (useless !== -1) return discard(useless);
    }

    if (view.numHints > 0) return hintNextSeat(view, this.seat);

    const held = cardsHeldByOthers(view, this.seat);
    const duplicate = hand.findIndex((card) => held.has(card));
    if (duplicate !== -1) return discard(duplicate);

    const dispensable = hand.findIndex((card) => !view.criticalCards.has(card));
    if (dispensable !== -1) return discard(dispensable);

    return discard(0);
  }
}
