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
  EC2Client,
  paginateDescribeInstances,
  paginateDescribeNetworkInterfaces,
} from '@aws-sdk/client-ec2';
import { setRetryStrategy } from '../../common/functions';
import { toProviderError } from '../common/aws-errors';
import { IAwsProviderProps, RegionalClients } from '../common/regional-clients';
import { AttachmentKind, IAttachmentProvider, IAttachmentRef } from '../security-group-remediation/interfaces';

/**
 * Instance states that still hold their security groups
 */
const ACTIVE_INSTANCE_STATES = ['pending', 'running', 'shutting-down', 'stopping', 'stopped'];

function createEc2Clients(props: IAwsProviderProps): RegionalClients<EC2Client> {
  return new RegionalClients(
    region =>
      new EC2Client({
        region,
        customUserAgent: props.solutionId,
        retryStrategy: setRetryStrategy(),
        credentials: props.credentials,
      }),
  );
}

/**
 * EC2 instances using a security group
 */
export class InstanceAttachmentProvider implements IAttachmentProvider {
  public readonly kind: AttachmentKind = 'instance';
  private readonly clients: RegionalClients<EC2Client>;

  constructor(props: IAwsProviderProps = {}) {
    this.clients = createEc2Clients(props);
  }

  public async listAttachments(region: string, ruleSetId: string): Promise<IAttachmentRef[]> {
    const attachments: IAttachmentRef[] = [];
    try {
      const paginator = paginateDescribeInstances(
        { client: this.clients.get(region) },
        {
          Filters: [
            { Name: 'instance.group-id', Values: [ruleSetId] },
            { Name: 'instance-state-name', Values: ACTIVE_INSTANCE_STATES },
          ],
        },
      );
      for await (const page of paginator) {
        for (const reservation of page.Reservations ?? []) {
          for (const instance of reservation.Instances ?? []) {
            if (instance.InstanceId) {
              attachments.push({ kind: this.kind, resourceId: instance.InstanceId });
            }
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeInstances', e);
    }
    return attachments;
  }
}

/**
 * Network interfaces using a security group that are not attached to an EC2 instance
 * (endpoints, Lambda functions, NAT gateways and other managed interfaces)
 */
export class NetworkInterfaceAttachmentProvider implements IAttachmentProvider {
  public readonly kind: AttachmentKind = 'network-interface';
  private readonly clients: RegionalClients<EC2Client>;

  constructor(props: IAwsProviderProps = {}) {
    this.clients = createEc2Clients(props);
  }

  public async listAttachments(region: string, ruleSetId: string): Promise<IAttachmentRef[]> {
    const attachments: IAttachmentRef[] = [];
    try {
      const paginator = paginateDescribeNetworkInterfaces(
        { client: this.clients.get(region) },
        { Filters: [{ Name: 'group-id', Values: [ruleSetId] }] },
      );
      for await (const page of paginator) {
        for (const networkInterface of page.NetworkInterfaces ?? []) {
          // Instance interfaces are reported by the instance provider
          if (networkInterface.NetworkInterfaceId && !networkInterface.Attachment?.InstanceId) {
            attachments.push({ kind: this.kind, resourceId: networkInterface.NetworkInterfaceId });
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeNetworkInterfaces', e);
    }
    return attachments;
  }
}
