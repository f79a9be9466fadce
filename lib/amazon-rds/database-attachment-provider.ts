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
import { paginateDescribeDBClusters, paginateDescribeDBInstances, RDSClient } from '@aws-sdk/client-rds';
import { setRetryStrategy } from '../../common/functions';
import { toProviderError } from '../common/aws-errors';
import { IAwsProviderProps, RegionalClients } from '../common/regional-clients';
import { AttachmentKind, IAttachmentProvider, IAttachmentRef } from '../security-group-remediation/interfaces';

/**
 * RDS DB instances and Aurora clusters using a security group
 */
export class DatabaseAttachmentProvider implements IAttachmentProvider {
  public readonly kind: AttachmentKind = 'database';
  private readonly clients: RegionalClients<RDSClient>;

  constructor(props: IAwsProviderProps = {}) {
    this.clients = new RegionalClients(
      region =>
        new RDSClient({
          region,
          customUserAgent: props.solutionId,
          retryStrategy: setRetryStrategy(),
          credentials: props.credentials,
        }),
    );
  }

  public async listAttachments(region: string, ruleSetId: string): Promise<IAttachmentRef[]> {
    const client = this.clients.get(region);
    const attachments: IAttachmentRef[] = [];

    try {
      for await (const page of paginateDescribeDBInstances({ client }, {})) {
        for (const instance of page.DBInstances ?? []) {
          const usesGroup = (instance.VpcSecurityGroups ?? []).some(group => group.VpcSecurityGroupId === ruleSetId);
          if (instance.DBInstanceIdentifier && usesGroup) {
            attachments.push({ kind: this.kind, resourceId: instance.DBInstanceIdentifier });
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeDBInstances', e);
    }

    try {
      for await (const page of paginateDescribeDBClusters({ client }, {})) {
        for (const cluster of page.DBClusters ?? []) {
          const usesGroup = (cluster.VpcSecurityGroups ?? []).some(group => group.VpcSecurityGroupId === ruleSetId);
          if (cluster.DBClusterIdentifier && usesGroup) {
            attachments.push({ kind: this.kind, resourceId: cluster.DBClusterIdentifier });
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeDBClusters', e);
    }

    return attachments;
  }
}
