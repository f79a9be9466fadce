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
  AuthorizeSecurityGroupEgressCommand,
  AuthorizeSecurityGroupIngressCommand,
  DeleteSecurityGroupCommand,
  DescribeSecurityGroupsCommand,
  EC2Client,
  EC2ServiceException,
  RevokeSecurityGroupEgressCommand,
  RevokeSecurityGroupIngressCommand,
  SecurityGroup,
} from '@aws-sdk/client-ec2';

import {
  Ec2RuleProvider,
  flattenPermission,
  toIpPermission,
  toRuleSetState,
} from '../../../lib/amazon-ec2/ec2-rule-provider';
import { ProviderErrorKind } from '../../../lib/common/errors';
import { MOCK_CONSTANTS } from '../../mocked-resources';

const ec2Mock = mockClient(EC2Client);

function serviceException(name: string) {
  return new EC2ServiceException({ name, message: 'Service message', $fault: 'client', $metadata: {} });
}

const webGroup: SecurityGroup = {
  GroupId: 'sg-web',
  GroupName: 'web',
  VpcId: MOCK_CONSTANTS.vpcId,
  OwnerId: MOCK_CONSTANTS.accountId,
  IpPermissions: [
    {
      IpProtocol: 'tcp',
      FromPort: 22,
      ToPort: 22,
      IpRanges: [{ CidrIp: '0.0.0.0/0', Description: 'ssh' }],
      Ipv6Ranges: [{ CidrIpv6: '::/0' }],
    },
  ],
  IpPermissionsEgress: [{ IpProtocol: '-1', IpRanges: [{ CidrIp: '0.0.0.0/0' }] }],
};

describe('Ec2RuleProvider', () => {
  let provider: Ec2RuleProvider;

  beforeEach(() => {
    ec2Mock.reset();
    provider = new Ec2RuleProvider({ solutionId: MOCK_CONSTANTS.runnerParameters.solutionId });
  });

  describe('listRuleSets', () => {
    test('should read every page and flatten the permissions', async () => {
      ec2Mock
        .on(DescribeSecurityGroupsCommand)
        .resolvesOnce({ SecurityGroups: [webGroup], NextToken: 'next' })
        .resolvesOnce({ SecurityGroups: [{ GroupId: 'sg-empty', GroupName: 'empty' }, { GroupName: 'no-id' }] });

      const ruleSets = await provider.listRuleSets(MOCK_CONSTANTS.region);

      expect(ruleSets).toEqual([
        {
          id: 'sg-web',
          name: 'web',
          region: MOCK_CONSTANTS.region,
          vpcId: MOCK_CONSTANTS.vpcId,
          rules: [
            {
              direction: 'ingress',
              protocol: 'tcp',
              portRange: { fromPort: 22, toPort: 22 },
              source: { type: 'cidr-ipv4', cidr: '0.0.0.0/0' },
              description: 'ssh',
            },
            {
              direction: 'ingress',
              protocol: 'tcp',
              portRange: { fromPort: 22, toPort: 22 },
              source: { type: 'cidr-ipv6', cidr: '::/0' },
            },
            MOCK_CONSTANTS.rules.allEgress,
          ],
        },
        { id: 'sg-empty', name: 'empty', region: MOCK_CONSTANTS.region, rules: [] },
      ]);
      expect(ec2Mock.commandCalls(DescribeSecurityGroupsCommand)).toHaveLength(2);
    });

    test('should map access errors', async () => {
      ec2Mock.on(DescribeSecurityGroupsCommand).rejects(serviceException('UnauthorizedOperation'));

      await expect(provider.listRuleSets(MOCK_CONSTANTS.region)).rejects.toMatchObject({
        kind: ProviderErrorKind.DENIED,
        operation: 'DescribeSecurityGroups',
      });
    });
  });

  describe('describeRuleSet', () => {
    test('should return the security group as a rule set', async () => {
      ec2Mock.on(DescribeSecurityGroupsCommand, { GroupIds: ['sg-web'] }).resolves({ SecurityGroups: [webGroup] });

      const ruleSet = await provider.describeRuleSet(MOCK_CONSTANTS.region, 'sg-web');

      expect(ruleSet.rules).toHaveLength(3);
    });

    test('should report a missing security group as not found', async () => {
      ec2Mock.on(DescribeSecurityGroupsCommand).resolves({ SecurityGroups: [] });

      await expect(provider.describeRuleSet(MOCK_CONSTANTS.region, 'sg-gone')).rejects.toMatchObject({
        kind: ProviderErrorKind.NOT_FOUND,
        message: 'Security group sg-gone not found in us-east-1',
      });
    });

    test('should leave retries of a throttled read to the caller', async () => {
      ec2Mock.on(DescribeSecurityGroupsCommand).rejects(serviceException('RequestLimitExceeded'));

      await expect(provider.describeRuleSet(MOCK_CONSTANTS.region, 'sg-web')).rejects.toMatchObject({
        kind: ProviderErrorKind.THROTTLED,
      });
      expect(ec2Mock.commandCalls(DescribeSecurityGroupsCommand)).toHaveLength(1);
    });

    test('should map an unknown group id to not found', async () => {
      ec2Mock.on(DescribeSecurityGroupsCommand).rejects(serviceException('InvalidGroup.NotFound'));

      await expect(provider.describeRuleSet(MOCK_CONSTANTS.region, 'sg-gone')).rejects.toMatchObject({
        kind: ProviderErrorKind.NOT_FOUND,
      });
    });
  });

  describe('rule changes', () => {
    const replacement = {
      ...MOCK_CONSTANTS.rules.sshFromAnywhere,
      source: { type: 'cidr-ipv4' as const, cidr: MOCK_CONSTANTS.approvedCidr },
      description: 'admin',
    };

    test('should authorize an ingress rule with its description', async () => {
      ec2Mock.on(AuthorizeSecurityGroupIngressCommand).resolves({ Return: true });

      await provider.addRule(MOCK_CONSTANTS.region, 'sg-web', replacement);

      expect(ec2Mock.commandCalls(AuthorizeSecurityGroupIngressCommand)[0].args[0].input).toEqual({
        GroupId: 'sg-web',
        IpPermissions: [
          {
            IpProtocol: 'tcp',
            FromPort: 22,
            ToPort: 22,
            IpRanges: [{ CidrIp: MOCK_CONSTANTS.approvedCidr, Description: 'admin' }],
          },
        ],
      });
    });

    test('should authorize an egress rule', async () => {
      ec2Mock.on(AuthorizeSecurityGroupEgressCommand).resolves({ Return: true });

      await provider.addRule(MOCK_CONSTANTS.region, 'sg-web', MOCK_CONSTANTS.rules.allEgress);

      expect(ec2Mock.commandCalls(AuthorizeSecurityGroupEgressCommand)).toHaveLength(1);
      expect(ec2Mock.commandCalls(AuthorizeSecurityGroupIngressCommand)).toHaveLength(0);
    });

    test('should map a duplicate rule to a conflict', async () => {
      ec2Mock.on(AuthorizeSecurityGroupIngressCommand).rejects(serviceException('InvalidPermission.Duplicate'));

      await expect(provider.addRule(MOCK_CONSTANTS.region, 'sg-web', replacement)).rejects.toMatchObject({
        kind: ProviderErrorKind.CONFLICT,
        operation: 'AuthorizeSecurityGroupIngress',
      });
    });

    test('should revoke an ingress rule without its description', async () => {
      ec2Mock.on(RevokeSecurityGroupIngressCommand).resolves({ Return: true });

      await provider.removeRule(MOCK_CONSTANTS.region, 'sg-web', replacement);

      const input = ec2Mock.commandCalls(RevokeSecurityGroupIngressCommand)[0].args[0].input;
      expect(input.IpPermissions?.[0].IpRanges).toEqual([{ CidrIp: MOCK_CONSTANTS.approvedCidr }]);
    });

    test('should map a missing rule to not found on egress revocation', async () => {
      ec2Mock.on(RevokeSecurityGroupEgressCommand).rejects(serviceException('InvalidPermission.NotFound'));

      await expect(
        provider.removeRule(MOCK_CONSTANTS.region, 'sg-web', MOCK_CONSTANTS.rules.allEgress),
      ).rejects.toMatchObject({ kind: ProviderErrorKind.NOT_FOUND, operation: 'RevokeSecurityGroupEgress' });
    });

    test('should map a group in use to a conflict on deletion', async () => {
      ec2Mock.on(DeleteSecurityGroupCommand).rejects(serviceException('DependencyViolation'));

      await expect(provider.deleteRuleSet(MOCK_CONSTANTS.region, 'sg-web')).rejects.toMatchObject({
        kind: ProviderErrorKind.CONFLICT,
        operation: 'DeleteSecurityGroup',
      });
    });

    test('should delete a security group', async () => {
      ec2Mock.on(DeleteSecurityGroupCommand).resolves({});

      await provider.deleteRuleSet(MOCK_CONSTANTS.region, 'sg-web');

      expect(ec2Mock.commandCalls(DeleteSecurityGroupCommand)[0].args[0].input).toEqual({ GroupId: 'sg-web' });
    });

    test('should revoke an ICMP rule with the code EC2 reported', async () => {
      ec2Mock.on(RevokeSecurityGroupIngressCommand).resolves({});
      const [ping] = flattenPermission(
        { IpProtocol: 'icmp', FromPort: 8, ToPort: -1, IpRanges: [{ CidrIp: '0.0.0.0/0' }] },
        'ingress',
      );

      await provider.removeRule(MOCK_CONSTANTS.region, 'sg-web', ping);

      expect(ec2Mock.commandCalls(RevokeSecurityGroupIngressCommand)[0].args[0].input.IpPermissions).toEqual([
        { IpProtocol: 'icmp', FromPort: 8, ToPort: -1, IpRanges: [{ CidrIp: '0.0.0.0/0', Description: undefined }] },
      ]);
    });
  });
});

describe('security group projection', () => {
  test('should record group references with the owner only across accounts', () => {
    const rules = flattenPermission(
      {
        IpProtocol: 'TCP',
        FromPort: 5432,
        ToPort: 5432,
        UserIdGroupPairs: [
          { GroupId: 'sg-app', UserId: MOCK_CONSTANTS.accountId },
          { GroupId: 'sg-peer', UserId: MOCK_CONSTANTS.otherAccountId },
          { UserId: MOCK_CONSTANTS.otherAccountId },
        ],
        PrefixListIds: [{ PrefixListId: 'pl-0a1b' }],
      },
      'ingress',
      MOCK_CONSTANTS.accountId,
    );

    expect(rules.map(rule => rule.source)).toEqual([
      { type: 'rule-set', ruleSetId: 'sg-app' },
      { type: 'rule-set', ruleSetId: 'sg-peer', ownerId: MOCK_CONSTANTS.otherAccountId },
      { type: 'prefix-list', prefixListId: 'pl-0a1b' },
    ]);
    expect(rules[0].protocol).toBe('tcp');
  });

  test('should keep ports for numeric protocols and drop the wildcard range', () => {
    const [icmp] = flattenPermission(
      { IpProtocol: 'icmp', FromPort: -1, ToPort: -1, IpRanges: [{ CidrIp: '10.0.0.0/8' }] },
      'ingress',
    );
    const [openEnded] = flattenPermission(
      { IpProtocol: 'udp', FromPort: 53, ToPort: -1, IpRanges: [{ CidrIp: '10.0.0.0/8' }] },
      'ingress',
    );

    expect(icmp).not.toHaveProperty('portRange');
    expect(openEnded.portRange).toEqual({ fromPort: 53, toPort: 53 });
  });

  test('should keep the ICMP type and code through a revoke', () => {
    const [ping] = flattenPermission(
      { IpProtocol: 'icmp', FromPort: 8, ToPort: -1, IpRanges: [{ CidrIp: '0.0.0.0/0' }] },
      'ingress',
    );
    const [unreachable] = flattenPermission(
      { IpProtocol: 'icmpv6', FromPort: 1, ToPort: 4, Ipv6Ranges: [{ CidrIpv6: '::/0' }] },
      'ingress',
    );

    expect(ping.portRange).toEqual({ fromPort: 8, toPort: -1 });
    expect(toIpPermission(ping, false)).toEqual({
      IpProtocol: 'icmp',
      FromPort: 8,
      ToPort: -1,
      IpRanges: [{ CidrIp: '0.0.0.0/0', Description: undefined }],
    });
    expect(toIpPermission(unreachable, false)).toMatchObject({ IpProtocol: 'icmpv6', FromPort: 1, ToPort: 4 });
  });

  test('should ignore a group without an id', () => {
    expect(toRuleSetState(MOCK_CONSTANTS.region, { GroupName: 'orphan' })).toBeUndefined();
  });

  test('should name a group without a name after its id', () => {
    expect(toRuleSetState(MOCK_CONSTANTS.region, { GroupId: 'sg-1' })?.name).toBe('sg-1');
  });

  describe('toIpPermission', () => {
    test('should use the full ICMP range when no ports are given', () => {
      const permission = toIpPermission(
        { direction: 'ingress', protocol: 'icmp', source: { type: 'cidr-ipv4', cidr: '0.0.0.0/0' } },
        false,
      );

      expect(permission).toMatchObject({ IpProtocol: 'icmp', FromPort: -1, ToPort: -1 });
    });

    test('should use every port for TCP without a range', () => {
      const permission = toIpPermission(
        { direction: 'ingress', protocol: 'tcp', source: { type: 'cidr-ipv6', cidr: '::/0' } },
        false,
      );

      expect(permission).toEqual({
        IpProtocol: 'tcp',
        FromPort: 0,
        ToPort: 65535,
        Ipv6Ranges: [{ CidrIpv6: '::/0', Description: undefined }],
      });
    });

    test('should address group and prefix list sources', () => {
      const groupPermission = toIpPermission(
        {
          direction: 'ingress',
          protocol: '-1',
          source: { type: 'rule-set', ruleSetId: 'sg-peer', ownerId: MOCK_CONSTANTS.otherAccountId },
          description: 'peer',
        },
        true,
      );
      const prefixPermission = toIpPermission(
        { direction: 'egress', protocol: '-1', source: { type: 'prefix-list', prefixListId: 'pl-0a1b' } },
        true,
      );

      expect(groupPermission).toEqual({
        IpProtocol: '-1',
        UserIdGroupPairs: [{ GroupId: 'sg-peer', UserId: MOCK_CONSTANTS.otherAccountId, Description: 'peer' }],
      });
      expect(prefixPermission.PrefixListIds).toEqual([{ PrefixListId: 'pl-0a1b', Description: undefined }]);
    });
  });
});
