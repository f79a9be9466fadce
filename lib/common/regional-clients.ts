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
import { IAssumeRoleCredential } from '../../common/resources';

/**
 * SDK client settings shared by every AWS provider
 */
export interface IAwsProviderProps {
  /**
   * Sent as the SDK custom user agent
   */
  readonly solutionId?: string;
  /**
   * Default credential chain when undefined
   */
  readonly credentials?: IAssumeRoleCredential;
}

/**
 * Lazily created SDK clients, one per region
 */
export class RegionalClients<T> {
  private readonly clients = new Map<string, T>();

  constructor(private readonly factory: (region: string) => T) {}

  public get(region: string): T {
    let client = this.clients.get(region);
    if (!client) {
      client = this.factory(region);
      this.clients.set(region, client);
    }
    return client;
  }
}
