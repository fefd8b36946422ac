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
/**
 * Simulation Worker - runs a chunk of seeded games off the main thread
 *
 * Receives { type: "simulate", taskId, data: TrialChunk } and replies with
 * { type: "result", taskId, data: GameResult[] } or { type: "error", ... }.
 */

import { parentPort } from 'worker_threads';
import { isAgentName } from '../../agents/index.js';
import { runTrials, TrialChunk } from '../../sim/Simulator.js';

export interface TaskMessage {
  type: string;
  taskId: string;
  data: unknown;
}

function isTrialChunk(value: unknown): value is TrialChunk {
  return typeof value === 'object' && value !== null &&
    'agent' in value && typeof value.agent === 'string' && isAgentName(value.agent) &&
    'numPlayers' in value && typeof value.numPlayers === 'number' &&
    'seed' in value && typeof value.seed === 'number' &&
    'start' in value && typeof value.start === 'number' &&
    'count' in value && typeof value.count === 'number' &&
    'forcedDiscardGrantsHint' in value && typeof value.forcedDiscardGrantsHint === 'boolean';
}

/**
 * Handle one task message; exported so the protocol can be exercised
 * without spawning a thread
 */
export function handleTask(message: TaskMessage): { type: 'result' | 'error'; taskId: string; data?: unknown; error?: string } {
  try {
    switch (message.type) {
      case 'simulate':
        if (!isTrialChunk(message.data)) {
          throw new Error('Malformed simulate task');
        }
        return { type: 'result', taskId: message.taskId, data: runTrials(message.data) };
      default:
        throw new Error(`Unknown task type: ${message.type}`);
    }
  } catch (error) {
    return {
      type: 'error',
      taskId: message.taskId,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

const port = parentPort;
if (port) {
  port.on('message', (message: TaskMessage) => {
    port.postMessage(handleTask(message));
  });
}
