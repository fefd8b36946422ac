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
 * core/Deck.ts
 */
import { Card } from "./Card.js";
import { Random } from "./random.js";
import { COLOURS, RANKS, CARD_COUNTS } from "./types.js";

/**
 * Deck: ordered card sequence consumed from the front through a draw pointer.
 *
 * The card order is fixed once the deck exists; drawing only moves the
 * pointer, so the full deal order stays available for replay export.
 */
export class Deck {
  private readonly _cards: readonly Card[];
  private _position = 0;

  constructor(cards: readonly Card[]) {
    this._cards = Object.freeze([...cards]);
  }

  /** The canonical 50-card multiset, sorted by colour then rank */
  static standard(): Card[] {
    const cards: Card[] = [];
    for (const colour of COLOURS) {
      for (const rank of RANKS) {
        for (let i = 0; i < CARD_COUNTS[rank]; i++) {
          cards.push(Card.of(colour, rank));
        }
      }
    }
    return cards;
  }

  /** True when `cards` is some ordering of the standard multiset */
  static isStandard(cards: readonly Card[]): boolean {
    const standard = Deck.standard();
    if (cards.length !== standard.length) return false;
    const counts = new Map<Card, number>();
    for (const card of cards) counts.set(card, (counts.get(card) ?? 0) + 1);
    return Card.all().every((card) => counts.get(card) === card.copies);
  }

  /** Build and shuffle a standard deck with the given generator */
  static generate(rng: Random): Deck {
    return new Deck(rng.shuffle(Deck.standard()));
  }

  get cards(): readonly Card[] {
    return this._cards;
  }

  get length(): number {
    return this._cards.length;
  }

  /** Index of the next card to be drawn */
  get position(): number {
    return this._position;
  }

  get remaining(): number {
    return this._cards.length - this._position;
  }

  get isEmpty(): boolean {
    return this._position >= this._cards.length;
  }

  at(position: number): Card {
    const card = this._cards[position];
    if (card === undefined) {
      throw new RangeError(`Deck position ${position} out of range 0..${this._cards.length - 1}`);
    }
    return card;
  }

  /** Draw the next card, or undefined once the deck is exhausted */
  draw(): Card | undefined {
    if (this.isEmpty) return undefined;
    return this._cards[this._position++];
  }

  /** Move the draw pointer, e.g. to fast-forward to the end of the deck */
  seek(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this._cards.length) {
      throw new RangeError(`Cannot seek to ${position} in a deck of ${this._cards.length}`);
    }
    this._position = position;
  }

  rewind(): void {
    this._position = 0;
  }
}
