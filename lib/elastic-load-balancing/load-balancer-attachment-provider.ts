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
import {
  ElasticLoadBalancingV2Client,
  paginateDescribeLoadBalancers,
} from '@aws-sdk/client-elastic-load-balancing-v2';
import { setRetryStrategy } from '../../common/functions';
import { toProviderError } from '../common/aws-errors';
import { IAwsProviderProps, RegionalClients } from '../common/regional-clients';
import { AttachmentKind, IAttachmentProvider, IAttachmentRef } from '../security-group-remediation/interfaces';

/**
 * Application and network load balancers using a security group. The API has no security group filter,
 * so every load balancer of the region is listed.
 */
export class LoadBalancerAttachmentProvider implements IAttachmentProvider {
  public readonly kind: AttachmentKind = 'load-balancer';
  private readonly clients: RegionalClients<ElasticLoadBalancingV2Client>;

  constructor(props: IAwsProviderProps = {}) {
    this.clients = new RegionalClients(
      region =>
        new ElasticLoadBalancingV2Client({
          region,
          customUserAgent: props.solutionId,
          retryStrategy: setRetryStrategy(),
          credentials: props.credentials,
        }),
    );
  }

  public async listAttachments(region: string, ruleSetId: string): Promise<IAttachmentRef[]> {
    const attachments: IAttachmentRef[] = [];
    try {
      const paginator = paginateDescribeLoadBalancers({ client: this.clients.get(region) }, {});
      for await (const page of paginator) {
        for (const loadBalancer of page.LoadBalancers ?? []) {
          if (loadBalancer.LoadBalancerArn && (loadBalancer.SecurityGroups ?? []).includes(ruleSetId)) {
            attachments.push({ kind: this.kind, resourceId: loadBalancer.LoadBalancerArn });
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeLoadBalancers', e);
    }
    return attachments;
  }
}
