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
 * core/Hand.ts
 */
import { Card } from "./Card.js";
import { Colour, Rank } from "./types.js";

/**
 * What a player has been told about one card in their hand. A hint marks
 * the cards it touches and rules its value out for every other card.
 */
export interface CardHint {
  colour: Colour | null;
  rank: Rank | null;
  notColours: Colour[];
  notRanks: Rank[];
}

export function emptyHint(): CardHint {
  return { colour: null, rank: null, notColours: [], notRanks: [] };
}

export function markColour(hints: readonly CardHint[], colour: Colour, touched: readonly number[]): void {
  hints.forEach((hint, i) => {
    if (touched.includes(i)) hint.colour = colour;
    else if (!hint.notColours.includes(colour)) hint.notColours.push(colour);
  });
}

export function markRank(hints: readonly CardHint[], rank: Rank, touched: readonly number[]): void {
  hints.forEach((hint, i) => {
    if (touched.includes(i)) hint.rank = rank;
    else if (!hint.notRanks.includes(rank)) hint.notRanks.push(rank);
  });
}

/**
 * Player collaborator contract.
 *
 * The engine calls these as cards move in and out of a seat. `remove`
 * receives an index the engine has already bounds-checked; `touched` lists
 * the hand indices a hint applied to.
 */
export interface Player {
  draw(card: Card): void;
  remove(index: number): Card;
  receiveColourHint(colour: Colour, touched: readonly number[]): void;
  receiveRankHint(rank: Rank, touched: readonly number[]): void;
  clear(): void;
}

/**
 * Hand: card-value hand with per-card hint annotations.
 * Removal keeps the relative order of the remaining cards.
 */
export class Hand implements Player {
  private _cards: Card[] = [];
  private _hints: CardHint[] = [];

  get cards(): readonly Card[] {
    return this._cards;
  }

  get hints(): readonly Readonly<CardHint>[] {
    return this._hints;
  }

  get size(): number {
    return this._cards.length;
  }

  draw(card: Card): void {
    this._cards.push(card);
    this._hints.push(emptyHint());
  }

  remove(index: number): Card {
    if (!Number.isInteger(index) || index < 0 || index >= this._cards.length) {
      throw new RangeError(`Hand index ${index} out of range 0..${this._cards.length - 1}`);
    }
    this._hints.splice(index, 1);
    return this._cards.splice(index, 1)[0];
  }

  receiveColourHint(colour: Colour, touched: readonly number[]): void {
    markColour(this._hints, colour, touched);
  }

  receiveRankHint(rank: Rank, touched: readonly number[]): void {
    markRank(this._hints, rank, touched);
  }

  indexOf(card: Card): number {
    return this._cards.indexOf(card);
  }

  clear(): void {
    this._cards = [];
    this._hints = [];
  }
}
