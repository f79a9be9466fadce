/**
 *  Copyright Amazon.com, Inc. or its affiliates. All Rights Reserved.
 *
 *  Licensed under the Apache License, Version 2.0 (the "License"). You may not use this file except in compliance
 *  with the License. A copy of the License is located at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 *  or in the 'license' file accompanying this file. This file is distributed on an 'AS IS' BASIS, WITHOUT WARRANTIES
 *  OR CONDITIONS OF ANY KIND, express or implied. See the License for the specific language governing permissions
 *  and limitations under the License.
 */
import { ActionState } from './interfaces';

/**
 * Remediation action state machine
 *
 * ```
 * PLANNED ──► STAGING ──► VALIDATING ──► COMMITTED
 *    │           │             │
 *    │           │             └──► ROLLING_BACK ──► ROLLED_BACK | ROLLBACK_FAILED
 *    │           └──► ROLLED_BACK | INVALIDATED
 *    └──► INVALIDATED
 * ```
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<ActionState, readonly ActionState[]>> = {
  [ActionState.PLANNED]: [ActionState.STAGING, ActionState.INVALIDATED],
  [ActionState.STAGING]: [ActionState.VALIDATING, ActionState.ROLLED_BACK, ActionState.INVALIDATED],
  [ActionState.VALIDATING]: [ActionState.COMMITTED, ActionState.ROLLING_BACK],
  [ActionState.ROLLING_BACK]: [ActionState.ROLLED_BACK, ActionState.ROLLBACK_FAILED],
  [ActionState.COMMITTED]: [],
  [ActionState.ROLLED_BACK]: [],
  [ActionState.ROLLBACK_FAILED]: [],
  [ActionState.INVALIDATED]: [],
};

export function canTransition(from: ActionState, to: ActionState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: ActionState): boolean {
  return ALLOWED_TRANSITIONS[state].length === 0;
}
