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
import { createHash } from 'crypto';
import { IRemediationAction, IRule, RemediationActionKind, RuleSource } from './interfaces';

/**
 * Source rendered as the provider shows it: a CIDR, a rule set id or a prefix list id
 */
export function formatSource(source: RuleSource): string {
  switch (source.type) {
    case 'cidr-ipv4':
    case 'cidr-ipv6':
      return source.cidr;
    case 'rule-set':
      return source.ownerId ? `${source.ownerId}/${source.ruleSetId}` : source.ruleSetId;
    case 'prefix-list':
      return source.prefixListId;
  }
}

export const ICMP_PROTOCOLS: readonly string[] = ['icmp', 'icmpv6', '1', '58'];

export function isIcmpProtocol(protocol: string): boolean {
  return ICMP_PROTOCOLS.includes(protocol.toLowerCase());
}

/**
 * Ports as `22` or `8000-8080`; ICMP as `type 8` or `type 3 code 4`
 */
export function formatPorts(rule: IRule): string {
  if (!rule.portRange) {
    return 'all';
  }
  const { fromPort, toPort } = rule.portRange;
  if (isIcmpProtocol(rule.protocol)) {
    return toPort === -1 ? `type ${fromPort}` : `type ${fromPort} code ${toPort}`;
  }
  return fromPort === toPort ? `${fromPort}` : `${fromPort}-${toPort}`;
}

/**
 * Human readable rule, e.g. `ingress tcp 22 from 0.0.0.0/0`
 */
export function describeRule(rule: IRule): string {
  const preposition = rule.direction === 'ingress' ? 'from' : 'to';
  return `${rule.direction} ${rule.protocol} ${formatPorts(rule)} ${preposition} ${formatSource(rule.source)}`;
}

/**
 * Identity of a rule as the provider matches it. Descriptions are not part of the identity.
 */
export function ruleKey(rule: IRule): string {
  return `${rule.direction}|${rule.protocol}|${formatPorts(rule)}|${rule.source.type}:${formatSource(rule.source)}`;
}

function ruleContentKey(rule: IRule): string {
  return `${ruleKey(rule)}|${rule.description ?? ''}`;
}

/**
 * SHA-256 over the sorted rule contents
 */
export function computeFingerprint(rules: readonly IRule[]): string {
  const keys = rules.map(ruleContentKey).sort();
  return createHash('sha256').update(keys.join('\n')).digest('hex');
}

export function hasRule(rules: readonly IRule[], rule: IRule): boolean {
  const key = ruleKey(rule);
  return rules.some(item => ruleKey(item) === key);
}

/**
 * Expected rule set content after a committed action
 */
export function applyAction(rules: readonly IRule[], action: IRemediationAction): IRule[] {
  if (!action.rule) {
    return [...rules];
  }
  switch (action.kind) {
    case RemediationActionKind.ADD_RESTRICTIVE_RULE:
      return [...rules, action.rule];
    case RemediationActionKind.REMOVE_OPEN_RULE: {
      const key = ruleKey(action.rule);
      const index = rules.findIndex(item => ruleKey(item) === key);
      return index === -1 ? [...rules] : [...rules.slice(0, index), ...rules.slice(index + 1)];
    }
    case RemediationActionKind.DELETE_UNUSED_RULE_SET:
      return [...rules];
  }
}
