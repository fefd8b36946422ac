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
 * core/DiscardPile.ts
 */
import { Card } from "./Card.js";
import { COLOURS, Colour, RANKS, Rank } from "./types.js";

/**
 * DiscardPile: multiset of discarded cards.
 *
 * Besides the counts it keeps two derived sets, updated locally on every
 * change instead of rescanning the pile:
 *
 * - critical: cards with exactly one copy left that are not yet played
 * - dead: cards that can never be played, because every copy of that card,
 *   or of a lower rank of the same colour, is gone
 *
 * A card is never in both sets.
 */
export class DiscardPile {
  private _counts: Map<Card, number> = new Map();
  private _critical: Set<Card> = new Set();
  private _dead: Set<Card> = new Set();
  private _played: Set<Card> = new Set();
  private _total = 0;

  constructor() {
    this.reset();
  }

  /** Empty the pile; every single-copy card starts out critical */
  reset(): void {
    this._counts = new Map(Card.all().map((card) => [card, 0]));
    this._critical = new Set(Card.all().filter((card) => card.copies === 1));
    this._dead = new Set();
    this._played = new Set();
    this._total = 0;
  }

  count(card: Card): number {
    return this._counts.get(card) ?? 0;
  }

  /** Copies of a card not yet discarded (in the deck, in hands, or played) */
  remaining(card: Card): number {
    return card.copies - this.count(card);
  }

  get total(): number {
    return this._total;
  }

  discard(card: Card): void {
    const count = this.count(card);
    if (count >= card.copies) {
      throw new RangeError(`All ${card.copies} copies of ${card} are already discarded`);
    }
    this._counts.set(card, count + 1);
    this._total++;

    const remaining = this.remaining(card);
    if (remaining === 1 && !this._dead.has(card) && !this._played.has(card)) {
      this._critical.add(card);
    } else if (remaining === 0) {
      for (const rank of RANKS) {
        if (rank < card.rank) continue;
        const higher = Card.of(card.colour, rank);
        this._critical.delete(higher);
        this._dead.add(higher);
      }
    }
  }

  /**
   * Take one copy back out of the pile. Meant for what-if probing: discard,
   * measure, remove. Callers must only remove what they discarded.
   */
  remove(card: Card): void {
    const count = this.count(card);
    if (count === 0) {
      throw new RangeError(`No copy of ${card} in the discard pile`);
    }
    this._counts.set(card, count - 1);
    this._total--;

    if (this.remaining(card) === 1) {
      this.restoreColourFrom(card.colour, card.rank);
    } else {
      this._critical.delete(card);
    }
  }

  /** A played card no longer needs protecting, now or after later discards */
  markPlayed(card: Card): void {
    this._played.add(card);
    this._critical.delete(card);
  }

  /** Recompute dead/critical membership for ranks >= `from` of one colour */
  private restoreColourFrom(colour: Colour, from: Rank): void {
    let blocked = RANKS.some((rank) => rank < from && this.remaining(Card.of(colour, rank)) === 0);
    for (const rank of RANKS) {
      if (rank < from) continue;
      const card = Card.of(colour, rank);
      const remaining = this.remaining(card);
      if (remaining === 0) blocked = true;
      if (blocked) {
        this._critical.delete(card);
        this._dead.add(card);
        continue;
      }
      this._dead.delete(card);
      if (remaining === 1 && !this._played.has(card)) this._critical.add(card);
    }
  }

  isCritical(card: Card): boolean {
    return this._critical.has(card);
  }

  isDead(card: Card): boolean {
    return this._dead.has(card);
  }

  criticalCards(): ReadonlySet<Card> {
    return this._critical;
  }

  deadCards(): ReadonlySet<Card> {
    return this._dead;
  }

  /**
   * Best score still reachable: for each colour, the run of ranks from 1
   * upwards that still have a live copy.
   */
  maxScore(): number {
    let score = 0;
    for (const colour of COLOURS) {
      for (const rank of RANKS) {
        if (this.remaining(Card.of(colour, rank)) === 0) break;
        score++;
      }
    }
    return score;
  }

  /** Discarded counts keyed by card label, omitting zeroes */
  snapshot(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [card, count] of this._counts) {
      if (count > 0) out[card.key] = count;
    }
    return out;
  }
}
