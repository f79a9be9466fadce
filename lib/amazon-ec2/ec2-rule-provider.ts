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
 * @fileoverview EC2 security group rule provider
 *
 * Security groups are projected onto rule sets. Each `IpPermission` is flattened into one rule per source
 * (IPv4 range, IPv6 range, referenced group or prefix list), so every rule can be revoked on its own.
 * A referenced group owned by the same account as the security group is recorded without its owner.
 */

import path from 'path';
import {
  AuthorizeSecurityGroupEgressCommand,
  AuthorizeSecurityGroupIngressCommand,
  DeleteSecurityGroupCommand,
  DescribeSecurityGroupsCommand,
  EC2Client,
  IpPermission,
  paginateDescribeSecurityGroups,
  RevokeSecurityGroupEgressCommand,
  RevokeSecurityGroupIngressCommand,
  SecurityGroup,
} from '@aws-sdk/client-ec2';
import { setRetryStrategy } from '../../common/functions';
import { createLogger } from '../../common/logger';
import { toProviderError } from '../common/aws-errors';
import { ProviderError, ProviderErrorKind } from '../common/errors';
import { IAwsProviderProps, RegionalClients } from '../common/regional-clients';
import {
  IPortRange,
  IRule,
  IRuleProvider,
  IRuleSetState,
  RuleDirection,
  RuleSource,
} from '../security-group-remediation/interfaces';
import { isIcmpProtocol } from '../security-group-remediation/rules';

const PORT_PROTOCOLS = new Set<string>(['tcp', 'udp', '6', '17']);

export class Ec2RuleProvider implements IRuleProvider {
  private readonly logger = createLogger([path.parse(path.basename(__filename)).name]);
  private readonly clients: RegionalClients<EC2Client>;

  constructor(props: IAwsProviderProps = {}) {
    this.clients = new RegionalClients(
      region =>
        new EC2Client({
          region,
          customUserAgent: props.solutionId,
          retryStrategy: setRetryStrategy(),
          credentials: props.credentials,
        }),
    );
  }

  public async listRuleSets(region: string): Promise<IRuleSetState[]> {
    const ruleSets: IRuleSetState[] = [];
    try {
      const paginator = paginateDescribeSecurityGroups({ client: this.clients.get(region) }, {});
      for await (const page of paginator) {
        for (const group of page.SecurityGroups ?? []) {
          const ruleSet = toRuleSetState(region, group);
          if (ruleSet) {
            ruleSets.push(ruleSet);
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeSecurityGroups', e);
    }
    this.logger.info(`Found ${ruleSets.length} security group(s)`, region);
    return ruleSets;
  }

  public async describeRuleSet(region: string, ruleSetId: string): Promise<IRuleSetState> {
    const client = this.clients.get(region);
    let groups: SecurityGroup[];
    try {
      const response = await client.send(new DescribeSecurityGroupsCommand({ GroupIds: [ruleSetId] }));
      groups = response.SecurityGroups ?? [];
    } catch (e: unknown) {
      throw toProviderError('DescribeSecurityGroups', e);
    }

    const ruleSet = groups.map(group => toRuleSetState(region, group)).find(item => item?.id === ruleSetId);
    if (!ruleSet) {
      throw new ProviderError(
        ProviderErrorKind.NOT_FOUND,
        'DescribeSecurityGroups',
        `Security group ${ruleSetId} not found in ${region}`,
      );
    }
    return ruleSet;
  }

  public async addRule(region: string, ruleSetId: string, rule: IRule): Promise<void> {
    const client = this.clients.get(region);
    const input = { GroupId: ruleSetId, IpPermissions: [toIpPermission(rule, true)] };
    try {
      if (rule.direction === 'ingress') {
        await client.send(new AuthorizeSecurityGroupIngressCommand(input));
      } else {
        await client.send(new AuthorizeSecurityGroupEgressCommand(input));
      }
    } catch (e: unknown) {
      throw toProviderError(
        rule.direction === 'ingress' ? 'AuthorizeSecurityGroupIngress' : 'AuthorizeSecurityGroupEgress',
        e,
      );
    }
  }

  public async removeRule(region: string, ruleSetId: string, rule: IRule): Promise<void> {
    const client = this.clients.get(region);
    const input = { GroupId: ruleSetId, IpPermissions: [toIpPermission(rule, false)] };
    try {
      if (rule.direction === 'ingress') {
        await client.send(new RevokeSecurityGroupIngressCommand(input));
      } else {
        await client.send(new RevokeSecurityGroupEgressCommand(input));
      }
    } catch (e: unknown) {
      throw toProviderError(rule.direction === 'ingress' ? 'RevokeSecurityGroupIngress' : 'RevokeSecurityGroupEgress', e);
    }
  }

  public async deleteRuleSet(region: string, ruleSetId: string): Promise<void> {
    try {
      await this.clients.get(region).send(new DeleteSecurityGroupCommand({ GroupId: ruleSetId }));
    } catch (e: unknown) {
      throw toProviderError('DeleteSecurityGroup', e);
    }
  }
}

/**
 * Projects a security group onto a rule set. Groups without an id are ignored.
 */
export function toRuleSetState(region: string, group: SecurityGroup): IRuleSetState | undefined {
  if (!group.GroupId) {
    return undefined;
  }
  return {
    id: group.GroupId,
    name: group.GroupName ?? group.GroupId,
    region,
    ...(group.VpcId !== undefined && { vpcId: group.VpcId }),
    rules: [
      ...(group.IpPermissions ?? []).flatMap(permission => flattenPermission(permission, 'ingress', group.OwnerId)),
      ...(group.IpPermissionsEgress ?? []).flatMap(permission => flattenPermission(permission, 'egress', group.OwnerId)),
    ],
  };
}

export function flattenPermission(permission: IpPermission, direction: RuleDirection, ownerId?: string): IRule[] {
  const protocol = (permission.IpProtocol ?? '-1').toLowerCase();
  const portRange = toPortRange(protocol, permission.FromPort, permission.ToPort);
  const rule = (source: RuleSource, description?: string): IRule => ({
    direction,
    protocol,
    ...(portRange && { portRange }),
    source,
    ...(description ? { description } : {}),
  });

  const rules: IRule[] = [];
  for (const range of permission.IpRanges ?? []) {
    if (range.CidrIp) {
      rules.push(rule({ type: 'cidr-ipv4', cidr: range.CidrIp }, range.Description));
    }
  }
  for (const range of permission.Ipv6Ranges ?? []) {
    if (range.CidrIpv6) {
      rules.push(rule({ type: 'cidr-ipv6', cidr: range.CidrIpv6 }, range.Description));
    }
  }
  for (const pair of permission.UserIdGroupPairs ?? []) {
    if (pair.GroupId) {
      const crossAccount = pair.UserId !== undefined && pair.UserId !== ownerId;
      rules.push(
        rule(
          { type: 'rule-set', ruleSetId: pair.GroupId, ...(crossAccount && { ownerId: pair.UserId }) },
          pair.Description,
        ),
      );
    }
  }
  for (const prefixList of permission.PrefixListIds ?? []) {
    if (prefixList.PrefixListId) {
      rules.push(rule({ type: 'prefix-list', prefixListId: prefixList.PrefixListId }, prefixList.Description));
    }
  }
  return rules;
}

/**
 * ICMP type and code are kept as EC2 reports them, a code of -1 meaning every code of the type
 */
function toPortRange(protocol: string, fromPort?: number, toPort?: number): IPortRange | undefined {
  if (protocol === '-1' || fromPort === undefined || fromPort === -1) {
    return undefined;
  }
  if (isIcmpProtocol(protocol)) {
    return { fromPort, toPort: toPort ?? -1 };
  }
  return { fromPort, toPort: toPort === undefined || toPort === -1 ? fromPort : toPort };
}

/**
 * Single-source permission for one rule. Revocations match without the description.
 */
export function toIpPermission(rule: IRule, withDescription: boolean): IpPermission {
  const description = withDescription ? rule.description : undefined;
  const permission: IpPermission = { IpProtocol: rule.protocol };

  if (rule.portRange) {
    permission.FromPort = rule.portRange.fromPort;
    permission.ToPort = rule.portRange.toPort;
  } else if (isIcmpProtocol(rule.protocol)) {
    permission.FromPort = -1;
    permission.ToPort = -1;
  } else if (PORT_PROTOCOLS.has(rule.protocol)) {
    permission.FromPort = 0;
    permission.ToPort = 65535;
  }

  switch (rule.source.type) {
    case 'cidr-ipv4':
      permission.IpRanges = [{ CidrIp: rule.source.cidr, Description: description }];
      break;
    case 'cidr-ipv6':
      permission.Ipv6Ranges = [{ CidrIpv6: rule.source.cidr, Description: description }];
      break;
    case 'rule-set':
      permission.UserIdGroupPairs = [
        { GroupId: rule.source.ruleSetId, UserId: rule.source.ownerId, Description: description },
      ];
      break;
    case 'prefix-list':
      permission.PrefixListIds = [{ PrefixListId: rule.source.prefixListId, Description: description }];
      break;
  }
  return permission;
}
