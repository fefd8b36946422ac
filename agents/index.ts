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
 * agents/index.ts
 */
import { CheaterAgent } from "./CheaterAgent.js";
import { PaceAgent } from "./PaceAgent.js";
import { SmartCheaterAgent } from "./SmartCheaterAgent.js";
import { AgentFactory } from "./types.js";

export { CheaterAgent, PaceAgent, SmartCheaterAgent };
export type { Agent, AgentFactory } from "./types.js";

export const AGENTS = {
  cheater: (seat, view) => new CheaterAgent(seat, view),
  smart: (seat, view) => new SmartCheaterAgent(seat, view),
  pace: (seat, view) => new PaceAgent(seat, view),
} satisfies Record<string, AgentFactory>;

export type AgentName = keyof typeof AGENTS;

export function isAgentName(name: string): name is AgentName {
  return Object.prototype.hasOwnProperty.call(AGENTS, name);
}

export function getAgent(name: string): AgentFactory {
  if (!isAgentName(name)) {
    throw new RangeError(`Unknown agent "${name}". Available: ${Object.keys(AGENTS).join(", ")}`);
  }
  return AGENTS[name];
}
