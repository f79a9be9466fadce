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
 * Supported module names
 */
export enum ModuleName {
  /**
   * Security group audit and remediation module
   */
  SECURITY_GROUP_REMEDIATION = 'security-group-remediation',
}

/**
 * Assume role credential used to reach the target account
 */
export interface IAssumeRoleCredential {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration?: Date;
}

/**
 * Module common parameter
 *
 * @description
 * Each module handler requires these parameters
 */
export interface IModuleCommonParameter {
  /**
   * Operation to be performed by the module
   */
  operation: string;
  /**
   * Name of the module.
   *
   * @see {@link ModuleName}
   */
  moduleName?: string;
  /**
   * Region used for SDK clients when no region list is given
   */
  region: string;
  /**
   * Solution Id, sent as the SDK custom user agent
   */
  readonly solutionId?: string;
  /**
   * Target account credentials
   *
   * @description
   * When the target account is the invoking account this property is undefined and the default credential
   * chain is used.
   *
   * @default
   * undefined
   */
  credentials?: IAssumeRoleCredential;
  /**
   *  Flag indicating if the module should perform a dry run
   *
   * @default
   * false
   */
  dryRun?: boolean;
}

/**
 * Module default parameter
 */
export interface IModuleDefaultParameter {
  /**
   * Name of the module.
   */
  readonly moduleName: string;
  /**
   * Flag indicating if the module should perform a dry run
   */
  readonly dryRun: boolean;
}
