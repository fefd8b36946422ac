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
 * core/Card.ts
 */
import { COLOURS, CARD_COUNTS, Colour, Rank, RANKS } from "./types.js";

/**
 * Card: immutable (colour, rank) value.
 *
 * Cards are interned, so `Card.of("red", 3)` always returns the same
 * instance. Value equality is therefore reference equality and a Card can be
 * used directly as a Map key or Set member.
 */
export class Card {
  private static readonly _pool: Map<string, Card> = new Map();

  readonly colour: Colour;
  readonly rank: Rank;
  readonly key: string;

  private constructor(colour: Colour, rank: Rank) {
    this.colour = colour;
    this.rank = rank;
    this.key = `${colour[0].toUpperCase()}${rank}`;
    Object.freeze(this);
  }

  static of(colour: Colour, rank: Rank): Card {
    const id = `${colour}:${rank}`;
    let card = Card._pool.get(id);
    if (!card) {
      card = new Card(colour, rank);
      Card._pool.set(id, card);
    }
    return card;
  }

  /** Every distinct card, colours in order then ranks ascending */
  static all(): Card[] {
    return COLOURS.flatMap((colour) => RANKS.map((rank) => Card.of(colour, rank)));
  }

  get colourIndex(): number {
    return COLOURS.indexOf(this.colour);
  }

  /** Number of copies of this card in a full deck */
  get copies(): number {
    return CARD_COUNTS[this.rank];
  }

  equals(other: Card): boolean {
    return this.colour === other.colour && this.rank === other.rank;
  }

  toString(): string {
    return this.key;
  }

  toJSON(): { colour: Colour; rank: Rank } {
    return { colour: this.colour, rank: this.rank };
  }
}
