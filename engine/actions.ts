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
 * engine/actions.ts
 * Move kinds a seat can submit on its turn
 */
import { InvalidActionError } from "../core/errors.js";
import { Colour, Rank, isColour, isRank } from "../core/types.js";

export interface PlayAction {
  type: "play";
  /** Hand index of the card to play */
  index: number;
  /** Firework the card is played onto */
  colour: Colour;
}

export interface DiscardAction {
  type: "discard";
  index: number;
}

export interface ColourHintAction {
  type: "hint:colour";
  target: number;
  colour: Colour;
}

export interface RankHintAction {
  type: "hint:rank";
  target: number;
  rank: Rank;
}

export type HintAction = ColourHintAction | RankHintAction;
export type GameAction = PlayAction | DiscardAction | HintAction;

/*━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
  BUILDERS
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━*/

export const play = (index: number, colour: Colour): PlayAction => ({ type: "play", index, colour });
export const discard = (index: number): DiscardAction => ({ type: "discard", index });
export const hintColour = (target: number, colour: Colour): ColourHintAction => ({ type: "hint:colour", target, colour });
export const hintRank = (target: number, rank: Rank): RankHintAction => ({ type: "hint:rank", target, rank });

export function isHint(action: GameAction): action is HintAction {
  return action.type === "hint:colour" || action.type === "hint:rank";
}

export function describeAction(action: GameAction): string {
  switch (action.type) {
    case "play":
      return `play #${action.index} on ${action.colour}`;
    case "discard":
      return `discard #${action.index}`;
    case "hint:colour":
      return `hint ${action.colour} to seat ${action.target}`;
    case "hint:rank":
      return `hint ${action.rank}s to seat ${action.target}`;
  }
}

/*━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
  VALIDATION
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━*/

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Narrow an untyped value to a GameAction.
 * @throws InvalidActionError when the value is not a well-formed action
 */
export function toAction(value: unknown): GameAction {
  if (!isRecord(value)) {
    throw new InvalidActionError(`Action must be an object, got ${String(value)}`);
  }

  switch (value.type) {
    case "play":
      if (isIndex(value.index) && isColour(value.colour)) return play(value.index, value.colour);
      break;
    case "discard":
      if (isIndex(value.index)) return discard(value.index);
      break;
    case "hint:colour":
      if (isIndex(value.target) && isColour(value.colour)) return hintColour(value.target, value.colour);
      break;
    case "hint:rank":
      if (isIndex(value.target) && isRank(value.rank)) return hintRank(value.target, value.rank);
      break;
    default:
      throw new InvalidActionError(`Unknown action type: ${String(value.type)}`);
  }

  throw new InvalidActionError(`Malformed ${String(value.type)} action: ${JSON.stringify(value)}`);
}
