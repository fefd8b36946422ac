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
 * agents/types.ts
 */
import { GameAction } from "../engine/actions.js";
import { GameView } from "../engine/GameState.js";

/**
 * A seat's decision policy. Agents read the true game state through the
 * view they were built with and return one action per call.
 */
export interface Agent {
  readonly seat: number;
  readonly name: string;
  findMove(): GameAction;
}

export type AgentFactory = (seat: number, view: GameView) => Agent;
