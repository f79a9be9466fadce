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
 * Enumeration of module operation state codes
 */
export enum MODULE_STATE_CODE {
  /** Operation completed successfully */
  SUCCESS = 'success',
  /** Operation completed but at least one rollback failed */
  DEGRADED = 'degraded',
  /** Operation failed */
  FAILED = 'failed',
}
