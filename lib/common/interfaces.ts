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

/**
 * @fileoverview Common Interface Definitions - shared module response envelope
 */

import { MODULE_STATE_CODE } from './types';

/**
 * Standard module response interface with generic result type
 * @template T - Type of the response data
 */
export interface IModuleResponse<T = unknown> {
  /** Operation status code */
  status: MODULE_STATE_CODE;
  /** Human-readable operation summary */
  summary: string;
  /** Operation timestamp */
  timestamp: string;
  /** Name of the module that generated the response */
  moduleName: string;
  /** Operation that generated the response */
  operation: string;
  /** Whether this was a dry run operation */
  dryRun: boolean;
  /** Optional response data */
  response?: T;
}
