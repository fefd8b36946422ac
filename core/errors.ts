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
 * core/errors.ts
 */

/** Base class for every error the engine raises on purpose */
export class HanabiError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A move that breaks a rule precondition: wrong seat, index out of range,
 * hinting without tokens, hinting oneself, or acting outside a running game.
 * These are bugs in the calling agent or driver, never game outcomes.
 */
export class IllegalMoveError extends HanabiError {}

/** An action value that is not one of the known kinds, or a malformed replay entry */
export class InvalidActionError extends HanabiError {}
