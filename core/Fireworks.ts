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
 * core/Fireworks.ts
 */
import { Card } from "./Card.js";
import { COLOURS, Colour, Rank, RANKS, isRank } from "./types.js";

const TOP_RANK: Rank = RANKS[RANKS.length - 1];

/**
 * Fireworks: top rank played per colour (0 when nothing is played yet).
 * A stack only ever advances by one, and only through a legal play.
 */
export class Fireworks {
  private _top: Record<Colour, number>;

  constructor() {
    this._top = Fireworks.empty();
  }

  private static empty(): Record<Colour, number> {
    return { red: 0, green: 0, blue: 0, yellow: 0, purple: 0 };
  }

  get(colour: Colour): number {
    return this._top[colour];
  }

  isLegalPlay(colour: Colour, card: Card): boolean {
    return card.colour === colour && card.rank === this._top[colour] + 1;
  }

  /** Push the next rank onto a stack; only valid after a legal play */
  advance(colour: Colour): number {
    if (this._top[colour] >= TOP_RANK) {
      throw new RangeError(`Firework ${colour} is already complete`);
    }
    return ++this._top[colour];
  }

  isComplete(colour: Colour): boolean {
    return this._top[colour] === TOP_RANK;
  }

  /** The card each stack needs next, omitting complete stacks */
  next(colour: Colour): Card | null {
    const rank = this._top[colour] + 1;
    return isRank(rank) ? Card.of(colour, rank) : null;
  }

  playable(): Card[] {
    const cards: Card[] = [];
    for (const colour of COLOURS) {
      const card = this.next(colour);
      if (card) cards.push(card);
    }
    return cards;
  }

  /** Every card already on a stack */
  played(): Set<Card> {
    const cards = new Set<Card>();
    for (const colour of COLOURS) {
      for (const rank of RANKS) {
        if (rank > this._top[colour]) break;
        cards.add(Card.of(colour, rank));
      }
    }
    return cards;
  }

  get total(): number {
    return COLOURS.reduce((sum, colour) => sum + this._top[colour], 0);
  }

  snapshot(): Record<Colour, number> {
    return { ...this._top };
  }

  reset(): void {
    this._top = Fireworks.empty();
  }
}
