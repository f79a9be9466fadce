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
import { DescribeDBClustersCommand, DescribeDBInstancesCommand, RDSClient } from '@aws-sdk/client-rds';

import { DatabaseAttachmentProvider } from '../../../lib/amazon-rds/database-attachment-provider';
import { ProviderErrorKind } from '../../../lib/common/errors';
import { MOCK_CONSTANTS } from '../../mocked-resources';

const rdsMock = mockClient(RDSClient);

describe('DatabaseAttachmentProvider', () => {
  beforeEach(() => {
    rdsMock.reset();
  });

  test('should list instances and clusters using the security group', async () => {
    rdsMock
      .on(DescribeDBInstancesCommand)
      .resolvesOnce({
        DBInstances: [
          { DBInstanceIdentifier: 'orders-db', VpcSecurityGroups: [{ VpcSecurityGroupId: 'sg-db' }] },
          { DBInstanceIdentifier: 'billing-db', VpcSecurityGroups: [{ VpcSecurityGroupId: 'sg-other' }] },
        ],
        Marker: 'next',
      })
      .resolvesOnce({ DBInstances: [{ DBInstanceIdentifier: 'reports-db' }] });
    rdsMock.on(DescribeDBClustersCommand).resolves({
      DBClusters: [{ DBClusterIdentifier: 'aurora-main', VpcSecurityGroups: [{ VpcSecurityGroupId: 'sg-db' }] }],
    });

    const attachments = await new DatabaseAttachmentProvider().listAttachments(MOCK_CONSTANTS.region, 'sg-db');

    expect(attachments).toEqual([
      { kind: 'database', resourceId: 'orders-db' },
      { kind: 'database', resourceId: 'aurora-main' },
    ]);
    expect(rdsMock.commandCalls(DescribeDBInstancesCommand)).toHaveLength(2);
  });

  test('should name the failing lookup', async () => {
    rdsMock.on(DescribeDBInstancesCommand).resolves({ DBInstances: [] });
    rdsMock.on(DescribeDBClustersCommand).rejects(new Error('timeout'));

    await expect(
      new DatabaseAttachmentProvider().listAttachments(MOCK_CONSTANTS.region, 'sg-db'),
    ).rejects.toMatchObject({ kind: ProviderErrorKind.UNKNOWN, operation: 'DescribeDBClusters' });
  });
});
