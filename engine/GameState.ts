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
 * engine/GameState.ts
 * The board: owns every piece of game state and resolves one move at a time
 */
import { EventEmitter } from "events";
import { Card } from "../core/Card.js";
import { Deck } from "../core/Deck.js";
import { DiscardPile } from "../core/DiscardPile.js";
import { Fireworks } from "../core/Fireworks.js";
import { CardHint, Player, emptyHint, markColour, markRank } from "../core/Hand.js";
import { HanabiError, IllegalMoveError, InvalidActionError } from "../core/errors.js";
import { Random } from "../core/random.js";
import {
  Colour,
  HAND_SIZES,
  MAX_HAND_SIZE,
  MAX_HINTS,
  MAX_PLAYERS,
  MAX_SCORE,
  MAX_STRIKES,
  MIN_HAND_SIZE,
  MIN_PLAYERS,
} from "../core/types.js";
import { DiscardAction, GameAction, HintAction, PlayAction, describeAction, isHint } from "./actions.js";

export type GameStatus = "not-started" | "in-progress" | "ended";
export type EndReason = "strikeout" | "perfect" | "deck-exhausted";
export type MoveOutcome = "played" | "misplayed" | "discarded" | "hinted";

export interface MoveRecord {
  kind: "move";
  turn: number;
  player: number;
  action: GameAction;
  outcome: MoveOutcome;
  /** Card that left the hand (play/discard), null for hints */
  card: Card | null;
  /** Deck position of that card, null for hints */
  position: number | null;
  /** Hand indices a hint touched */
  touched: number[];
}

export interface EndRecord {
  kind: "end";
  turn: number;
  reason: EndReason;
  score: number;
}

export type HistoryEntry = MoveRecord | EndRecord;

export interface GameConfig {
  /** Number of players (2-5, default: 2) */
  numPlayers?: number;
  /** Cards per hand (4-5, default: by player count) */
  handSize?: number;
  /** Shuffle seed (default: 0) */
  seed?: number;
  /** Fixed deal order; used as given, never shuffled */
  deck?: readonly Card[] | null;
  /** Whether the discard caused by a failed play refunds a hint (default: false) */
  forcedDiscardGrantsHint?: boolean;
  /** Log every state change to the console */
  debug?: boolean;
}

/**
 * Read-only window onto a running game. Agents receive this at
 * construction and see the true state, their own hand included.
 */
export interface GameView {
  readonly numPlayers: number;
  readonly handSize: number;
  readonly numHints: number;
  readonly strikes: number;
  readonly score: number;
  readonly turn: number;
  readonly currentPlayer: number;
  readonly bonusTurns: number;
  readonly deckSize: number;
  readonly numDiscarded: number;
  readonly pace: number;
  readonly gameOver: boolean;
  readonly playableCards: readonly Card[];
  readonly playedCards: ReadonlySet<Card>;
  readonly criticalCards: ReadonlySet<Card>;
  readonly deadCards: ReadonlySet<Card>;
  firework(colour: Colour): number;
  hand(player: number): readonly Card[];
  maxScore(): number;
  maxScoreAfterDiscard(card: Card): number;
}

export class GameState extends EventEmitter implements GameView {
  readonly numPlayers: number;
  readonly handSize: number;

  readonly fireworks: Fireworks = new Fireworks();
  readonly discardPile: DiscardPile = new DiscardPile();

  strikes = 0;
  score = 0;
  turn = 0;
  bonusTurns: number;

  private config: Required<Omit<GameConfig, "numPlayers" | "handSize">>;
  private rng: Random;
  private _deck: Deck | null = null;
  private _numHints = MAX_HINTS;
  private _status: GameStatus = "not-started";
  private _endReason: EndReason | null = null;
  private _history: HistoryEntry[] = [];
  private _hands: number[][];
  private _handHints: CardHint[][];
  private _players: (Player | null)[];
  private _resolving = false;

  constructor(config: GameConfig = {}) {
    super();

    const numPlayers = config.numPlayers ?? 2;
    if (!Number.isInteger(numPlayers) || numPlayers < MIN_PLAYERS || numPlayers > MAX_PLAYERS) {
      throw new RangeError(`Hanabi requires ${MIN_PLAYERS}-${MAX_PLAYERS} players, got ${numPlayers}`);
    }

    const handSize = config.handSize ?? HAND_SIZES[numPlayers];
    if (!Number.isInteger(handSize) || handSize < MIN_HAND_SIZE || handSize > MAX_HAND_SIZE) {
      throw new RangeError(`Hand size must be ${MIN_HAND_SIZE}-${MAX_HAND_SIZE}, got ${handSize}`);
    }

    if (config.deck && !Deck.isStandard(config.deck)) {
      throw new RangeError("A supplied deck must hold exactly the 50 standard cards");
    }

    this.numPlayers = numPlayers;
    this.handSize = handSize;
    this.bonusTurns = numPlayers;
    this.config = {
      seed: config.seed ?? 0,
      deck: config.deck ?? null,
      forcedDiscardGrantsHint: config.forcedDiscardGrantsHint ?? false,
      debug: config.debug ?? false,
    };

    this.rng = new Random(this.config.seed);
    this._hands = this.emptyHands<number>();
    this._handHints = this.emptyHands<CardHint>();
    this._players = Array.from({ length: numPlayers }, () => null);
  }

  // --- LIFECYCLE ---

  /**
   * Return to a fresh, unplayed state. Without a seed the configured seed is
   * used again, so the next setup() deals exactly what a new instance would.
   */
  reset(seed?: number): void {
    this.rng.reseed(seed ?? this.config.seed);

    this._deck = null;
    this._numHints = MAX_HINTS;
    this.strikes = 0;
    this.score = 0;
    this.turn = 0;
    this.bonusTurns = this.numPlayers;
    this._status = "not-started";
    this._endReason = null;
    this._history = [];
    this._hands = this.emptyHands<number>();
    this._handHints = this.emptyHands<CardHint>();
    this.fireworks.reset();
    this.discardPile.reset();
    for (const player of this._players) player?.clear();

    this.log(`Reset (seed ${this.rng.seed})`);
  }

  /** Build the deck, deal the hands, and start play */
  setup(): void {
    if (this._status !== "not-started") this.reset(this.rng.seed);

    this._deck = this.config.deck ? new Deck(this.config.deck) : this.generateDeck();
    this.deal();
    this._status = "in-progress";

    this.log(`Setup: ${this.numPlayers} players, ${this.handSize} cards each, ${this.deckSize} in deck`);
  }

  /** Shuffle a standard deck with this game's generator */
  generateDeck(): Deck {
    return Deck.generate(this.rng);
  }

  /** Deal hands round-robin, one card per seat per round */
  deal(): void {
    for (let round = 0; round < this.handSize; round++) {
      for (let player = 0; player < this.numPlayers; player++) {
        this.draw(player);
      }
    }
  }

  /**
   * Attach a player collaborator to a seat. It is told about every card
   * entering or leaving that seat's hand and every hint the seat receives.
   */
  attach(seat: number, player: Player): void {
    this.assertSeat(seat);
    if (this._status !== "not-started") {
      throw new IllegalMoveError("Players can only be attached before setup()");
    }
    this._players[seat] = player;
  }

  // --- STATE GETTERS ---

  get status(): GameStatus {
    return this._status;
  }

  get gameOver(): boolean {
    return this._status === "ended";
  }

  get endReason(): EndReason | null {
    return this._endReason;
  }

  get seed(): number {
    return this.rng.seed;
  }

  get forcedDiscardGrantsHint(): boolean {
    return this.config.forcedDiscardGrantsHint;
  }

  get numHints(): number {
    return this._numHints;
  }

  set numHints(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > MAX_HINTS) {
      throw new RangeError(`Hint tokens must be 0-${MAX_HINTS}, got ${value}`);
    }
    this._numHints = value;
  }

  get currentPlayer(): number {
    return this.turn % this.numPlayers;
  }

  get deck(): Deck {
    if (!this._deck) throw new IllegalMoveError("The game has not been set up");
    return this._deck;
  }

  get deckSize(): number {
    return this._deck?.remaining ?? 0;
  }

  get history(): readonly HistoryEntry[] {
    return this._history;
  }

  get numDiscarded(): number {
    return this.discardPile.total;
  }

  get playableCards(): readonly Card[] {
    return this.fireworks.playable();
  }

  get playedCards(): ReadonlySet<Card> {
    return this.fireworks.played();
  }

  get criticalCards(): ReadonlySet<Card> {
    return this.discardPile.criticalCards();
  }

  get deadCards(): ReadonlySet<Card> {
    return this.discardPile.deadCards();
  }

  /** Turns to spare: how many more discards the team can afford */
  get pace(): number {
    return this.score + this.deckSize + this.numPlayers - this.maxScore();
  }

  firework(colour: Colour): number {
    return this.fireworks.get(colour);
  }

  hand(player: number): readonly Card[] {
    this.assertSeat(player);
    return this._hands[player].map((position) => this.deck.at(position));
  }

  /** Deck positions of the cards in a hand, in hand order */
  handPositions(player: number): readonly number[] {
    this.assertSeat(player);
    return [...this._hands[player]];
  }

  hintsFor(player: number): readonly Readonly<CardHint>[] {
    this.assertSeat(player);
    return this._handHints[player];
  }

  maxScore(): number {
    return this.discardPile.maxScore();
  }

  /** Max score if `card` were discarded now; the pile is left untouched */
  maxScoreAfterDiscard(card: Card): number {
    this.discardPile.discard(card);
    const score = this.discardPile.maxScore();
    this.discardPile.remove(card);
    return score;
  }

  // --- DRAWING ---

  /**
   * Give `player` the next card. Once the deck is exhausted each call
   * counts down one bonus turn instead; the game ends when none are left.
   */
  draw(player: number): Card | null {
    this.assertSeat(player);
    const deck = this.deck;

    if (deck.isEmpty) {
      this.countDownBonusTurn();
      return null;
    }

    if (this._hands[player].length >= this.handSize) {
      throw new IllegalMoveError(`Player ${player} already holds ${this.handSize} cards`);
    }

    const position = deck.position;
    const card = deck.at(position);
    deck.draw();
    this._hands[player].push(position);
    this._handHints[player].push(emptyHint());
    this._players[player]?.draw(card);

    this.log(`Player ${player} draws ${card}`);
    return card;
  }

  private countDownBonusTurn(): void {
    if (this.bonusTurns === 0) return;
    this.bonusTurns--;
    this.log(`Deck empty, ${this.bonusTurns} bonus turns left`);
    if (!this._resolving) this.checkEnd();
  }

  // --- MOVES ---

  /**
   * Resolve one move for the seat whose turn it is.
   * @throws IllegalMoveError when a rule precondition is broken
   * @throws InvalidActionError for an unknown action kind
   */
  resolveMove(player: number, action: GameAction): MoveRecord {
    if (this._status !== "in-progress") {
      throw new IllegalMoveError(`Cannot move: game is ${this._status}`);
    }
    if (player !== this.currentPlayer) {
      throw new IllegalMoveError(`It is player ${this.currentPlayer}'s turn, not player ${player}'s`);
    }

    let record: MoveRecord;
    this._resolving = true;
    try {
      switch (action.type) {
        case "play":
          record = this.resolvePlay(player, action);
          break;
        case "discard":
          record = this.resolveDiscard(player, action);
          break;
        case "hint:colour":
        case "hint:rank":
          record = this.resolveHint(player, action);
          break;
        default: {
          const unknown: never = action;
          throw new InvalidActionError(`Unknown action: ${JSON.stringify(unknown)}`);
        }
      }
    } finally {
      this._resolving = false;
    }

    const drewNothing = isHint(action) && this.deck.isEmpty;
    this._history.push(record);
    this.turn++;
    this.emit("move", record);

    // Hints draw nothing, so they count down the final round here
    if (drewNothing) this.countDownBonusTurn();
    this.checkEnd();

    return record;
  }

  private resolvePlay(player: number, action: PlayAction): MoveRecord {
    const { colour } = action;
    const { card, position } = this.takeCard(player, action.index);

    if (this.fireworks.isLegalPlay(colour, card)) {
      this.fireworks.advance(colour);
      this.score++;
      this.discardPile.markPlayed(card);
      this.draw(player);
      if (card.rank === 5) this.addHint();
      this.log(`Player ${player} successfully plays ${card}`);
      return this.moveRecord(player, action, "played", card, position);
    }

    this.discardPile.discard(card);
    this.strikes++;
    this.draw(player);
    if (this.config.forcedDiscardGrantsHint) this.addHint();
    this.log(`Player ${player} fails to play ${card} on ${colour}. ${this.strikes} strikes`);
    return this.moveRecord(player, action, "misplayed", card, position);
  }

  private resolveDiscard(player: number, action: DiscardAction): MoveRecord {
    const { card, position } = this.takeCard(player, action.index);
    this.discardPile.discard(card);
    this.draw(player);
    this.addHint();
    this.log(`Player ${player} discards ${card}`);
    return this.moveRecord(player, action, "discarded", card, position);
  }

  private resolveHint(player: number, action: HintAction): MoveRecord {
    const { target } = action;
    if (this._numHints === 0) {
      throw new IllegalMoveError("No hint tokens left");
    }
    if (target === player) {
      throw new IllegalMoveError(`Player ${player} cannot hint themselves`);
    }
    this.assertSeat(target);

    const hand = this.hand(target);
    const hints = this._handHints[target];
    const touched: number[] = [];
    for (let i = 0; i < hand.length; i++) {
      if (action.type === "hint:colour" ? hand[i].colour === action.colour : hand[i].rank === action.rank) {
        touched.push(i);
      }
    }

    this._numHints--;
    if (action.type === "hint:colour") {
      markColour(hints, action.colour, touched);
      this._players[target]?.receiveColourHint(action.colour, touched);
    } else {
      markRank(hints, action.rank, touched);
      this._players[target]?.receiveRankHint(action.rank, touched);
    }

    this.log(`Player ${player} ${describeAction(action)}, touching ${touched.length} card(s)`);
    const record = this.moveRecord(player, action, "hinted", null, null);
    record.touched = touched;
    return record;
  }

  /** Remove a card from a hand, through the seat's collaborator when one is attached */
  private takeCard(player: number, index: number): { card: Card; position: number } {
    const positions = this._hands[player];
    if (!Number.isInteger(index) || index < 0 || index >= positions.length) {
      throw new IllegalMoveError(`Hand index ${index} out of range 0..${positions.length - 1}`);
    }

    const position = positions[index];
    const card = this.deck.at(position);

    const collaborator = this._players[player];
    if (collaborator) {
      const removed = collaborator.remove(index);
      if (removed !== card) {
        throw new HanabiError(`Player ${player} removed ${removed} but the engine holds ${card} at index ${index}`);
      }
    }

    positions.splice(index, 1);
    this._handHints[player].splice(index, 1);

    return { card, position };
  }

  private addHint(): void {
    if (this._numHints < MAX_HINTS) this._numHints++;
  }

  private moveRecord(
    player: number,
    action: GameAction,
    outcome: MoveOutcome,
    card: Card | null,
    position: number | null
  ): MoveRecord {
    return { kind: "move", turn: this.turn, player, action, outcome, card, position, touched: [] };
  }

  // --- ENDING ---

  /** Strike-out wins over a perfect score, which wins over running out of turns */
  private checkEnd(): void {
    if (this._status !== "in-progress") return;

    if (this.strikes >= MAX_STRIKES) {
      this.finish("strikeout");
    } else if (this.score === MAX_SCORE) {
      this.finish("perfect");
    } else if (this.deck.isEmpty && this.bonusTurns === 0) {
      this.finish("deck-exhausted");
    }
  }

  private finish(reason: EndReason): void {
    this._status = "ended";
    this._endReason = reason;
    const record: EndRecord = { kind: "end", turn: this.turn, reason, score: this.score };
    this._history.push(record);
    this.emit("end", record);
    this.log(`Game over (${reason}) with score ${this.score}`);
  }

  // --- HELPERS ---

  private emptyHands<T>(): T[][] {
    return Array.from({ length: this.numPlayers }, () => []);
  }

  private assertSeat(seat: number): void {
    if (!Number.isInteger(seat) || seat < 0 || seat >= this.numPlayers) {
      throw new IllegalMoveError(`No seat ${seat} in a ${this.numPlayers}-player game`);
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[GameState] ${message}`);
    }
  }
}

