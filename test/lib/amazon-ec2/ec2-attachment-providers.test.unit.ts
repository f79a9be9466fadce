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
import { describe, beforeEach, expect, test } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  DescribeInstancesCommand,
  DescribeNetworkInterfacesCommand,
  EC2Client,
  EC2ServiceException,
} from '@aws-sdk/client-ec2';

import {
  InstanceAttachmentProvider,
  NetworkInterfaceAttachmentProvider,
} from '../../../lib/amazon-ec2/ec2-attachment-providers';
import { ProviderErrorKind } from '../../../lib/common/errors';
import { MOCK_CONSTANTS } from '../../mocked-resources';

const ec2Mock = mockClient(EC2Client);

describe('EC2 attachment providers', () => {
  beforeEach(() => {
    ec2Mock.reset();
  });

  describe('InstanceAttachmentProvider', () => {
    test('should list active instances using the security group', async () => {
      ec2Mock
        .on(DescribeInstancesCommand)
        .resolvesOnce({
          Reservations: [{ Instances: [{ InstanceId: 'i-0001' }, {}] }],
          NextToken: 'next',
        })
        .resolvesOnce({ Reservations: [{ Instances: [{ InstanceId: 'i-0002' }] }, {}] });

      const attachments = await new InstanceAttachmentProvider().listAttachments(MOCK_CONSTANTS.region, 'sg-web');

      expect(attachments).toEqual([
        { kind: 'instance', resourceId: 'i-0001' },
        { kind: 'instance', resourceId: 'i-0002' },
      ]);
      expect(ec2Mock.commandCalls(DescribeInstancesCommand)[0].args[0].input.Filters).toEqual([
        { Name: 'instance.group-id', Values: ['sg-web'] },
        { Name: 'instance-state-name', Values: ['pending', 'running', 'shutting-down', 'stopping', 'stopped'] },
      ]);
    });

    test('should map lookup errors', async () => {
      ec2Mock
        .on(DescribeInstancesCommand)
        .rejects(new EC2ServiceException({ name: 'AuthFailure', message: 'denied', $fault: 'client', $metadata: {} }));

      await expect(
        new InstanceAttachmentProvider().listAttachments(MOCK_CONSTANTS.region, 'sg-web'),
      ).rejects.toMatchObject({ kind: ProviderErrorKind.DENIED, operation: 'DescribeInstances' });
    });
  });

  describe('NetworkInterfaceAttachmentProvider', () => {
    test('should list interfaces not attached to an instance', async () => {
      ec2Mock.on(DescribeNetworkInterfacesCommand).resolves({
        NetworkInterfaces: [
          { NetworkInterfaceId: 'eni-instance', Attachment: { InstanceId: 'i-0001' } },
          { NetworkInterfaceId: 'eni-endpoint', Attachment: {} },
          { NetworkInterfaceId: 'eni-lambda' },
        ],
      });

      const attachments = await new NetworkInterfaceAttachmentProvider().listAttachments(
        MOCK_CONSTANTS.region,
        'sg-web',
      );

      expect(attachments).toEqual([
        { kind: 'network-interface', resourceId: 'eni-endpoint' },
        { kind: 'network-interface', resourceId: 'eni-lambda' },
      ]);
      expect(ec2Mock.commandCalls(DescribeNetworkInterfacesCommand)[0].args[0].input.Filters).toEqual([
        { Name: 'group-id', Values: ['sg-web'] },
      ]);
    });

    test('should map lookup errors', async () => {
      ec2Mock.on(DescribeNetworkInterfacesCommand).rejects(new Error('socket hang up'));

      await expect(
        new NetworkInterfaceAttachmentProvider().listAttachments(MOCK_CONSTANTS.region, 'sg-web'),
      ).rejects.toMatchObject({
        kind: ProviderErrorKind.UNKNOWN,
        message: 'DescribeNetworkInterfaces failed with Error: socket hang up',
      });
    });
  });
});
