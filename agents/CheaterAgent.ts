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
 * agents/CheaterAgent.ts
 */
import { COLOURS } from "../core/types.js";
import { GameAction, discard, play } from "../engine/actions.js";
import { GameView } from "../engine/GameState.js";
import { Agent } from "./types.js";

/**
 * Looks at its own hand and plays the first card any firework needs,
 * checking colours in order. Otherwise discards its first card. Never hints.
 */
export class CheaterAgent implements Agent {
  readonly name = "cheater";
  readonly seat: number;
  private view: GameView;

  constructor(seat: number, view: GameView) {
    this.seat = seat;
    this.view = view;
  }

  findMove(): GameAction {
    const hand = this.view.hand(this.seat);

    for (const colour of COLOURS) {
      const rank = this.view.firework(colour) + 1;
      const index = hand.findIndex((card) => card.colour === colour && card.rank === rank);
      if (index !== -1) return play(index, colour);
    }

    return discard(0);
  }
}
