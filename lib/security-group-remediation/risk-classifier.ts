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
 * @fileoverview Risk Classifier - scores rules from port sensitivity and source breadth
 *
 * | Source breadth | Sensitive port | Other ports |
 * |----------------|----------------|-------------|
 * | universal      | CRITICAL       | HIGH        |
 * | broad          | HIGH           | MEDIUM      |
 * | narrow         | MEDIUM         | LOW         |
 * | reference      | LOW            | LOW         |
 *
 * Universal means `0.0.0.0/0` or `::/0`. Broad means a prefix at or below the configured threshold.
 * Rule set references and prefix lists are references. Classification is a pure function of the rule and
 * the classifier configuration.
 */

import { IPv4CidrRange, IPv6CidrRange } from 'ip-num';
import { MODULE_EXCEPTIONS } from '../../common/enums';
import {
  DEFAULT_BROAD_IPV4_PREFIX_THRESHOLD_BITS,
  DEFAULT_BROAD_IPV6_PREFIX_THRESHOLD_BITS,
  DEFAULT_SENSITIVE_PORTS,
  DEFAULT_SENSITIVE_PROTOCOLS,
} from '../common/constants';
import { RemediationError, RemediationErrorKind } from '../common/errors';
import {
  IRiskClassifierConfiguration,
  IRule,
  IRuleAssessment,
  IRuleSetClassification,
  IRuleSetState,
  RISK_LEVELS,
  RiskCounts,
  RiskLevel,
  SourceBreadth,
} from './interfaces';
import { formatPorts, formatSource, isIcmpProtocol } from './rules';

/**
 * IANA protocol numbers accepted in place of protocol names
 */
const PROTOCOL_NUMBERS: Readonly<Record<string, string>> = {
  '6': 'tcp',
  '17': 'udp',
  '1': 'icmp',
  '58': 'icmpv6',
};

const UNIVERSAL_CIDRS: readonly string[] = ['0.0.0.0/0', '::/0'];

const RISK_MATRIX: Readonly<Record<SourceBreadth, { sensitive: RiskLevel; other: RiskLevel }>> = {
  universal: { sensitive: RiskLevel.CRITICAL, other: RiskLevel.HIGH },
  broad: { sensitive: RiskLevel.HIGH, other: RiskLevel.MEDIUM },
  narrow: { sensitive: RiskLevel.MEDIUM, other: RiskLevel.LOW },
  reference: { sensitive: RiskLevel.LOW, other: RiskLevel.LOW },
};

/**
 * Negative when a is lower than b, 0 when equal, positive when higher
 */
export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVELS.indexOf(a) - RISK_LEVELS.indexOf(b);
}

export function isAtOrAbove(level: RiskLevel, threshold: RiskLevel): boolean {
  return compareRiskLevels(level, threshold) >= 0;
}

/**
 * Highest level of the list, LOW for an empty list
 */
export function maxRiskLevel(levels: readonly RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>(
    (highest, level) => (compareRiskLevels(level, highest) > 0 ? level : highest),
    RiskLevel.LOW,
  );
}

export function emptyRiskCounts(): RiskCounts {
  return { [RiskLevel.LOW]: 0, [RiskLevel.MEDIUM]: 0, [RiskLevel.HIGH]: 0, [RiskLevel.CRITICAL]: 0 };
}

export function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === 'string' && RISK_LEVELS.some(level => level === value);
}

function invalidConfiguration(message: string): RemediationError {
  return new RemediationError(
    RemediationErrorKind.INVALID_CONFIGURATION,
    `${MODULE_EXCEPTIONS.INVALID_INPUT}: ${message}`,
  );
}

function prefixLength(cidr: string): number {
  return Number(cidr.slice(cidr.indexOf('/') + 1));
}

export function isValidIpv4Cidr(cidr: string): boolean {
  if (!cidr.includes('/')) {
    return false;
  }
  try {
    IPv4CidrRange.fromCidr(cidr);
    return true;
  } catch {
    return false;
  }
}

export function isValidIpv6Cidr(cidr: string): boolean {
  if (!cidr.includes('/')) {
    return false;
  }
  try {
    IPv6CidrRange.fromCidr(cidr);
    return true;
  } catch {
    return false;
  }
}

/**
 * Risk classifier over a fixed configuration
 */
export class RiskClassifier {
  public readonly configuration: IRiskClassifierConfiguration;

  /**
   * @throws {@link RemediationError} InvalidConfiguration for out of range ports or thresholds
   */
  constructor(configuration: Partial<IRiskClassifierConfiguration> = {}) {
    this.configuration = {
      sensitivePorts: configuration.sensitivePorts ?? DEFAULT_SENSITIVE_PORTS,
      sensitiveProtocols: (configuration.sensitiveProtocols ?? DEFAULT_SENSITIVE_PROTOCOLS).map(item =>
        item.toLowerCase(),
      ),
      broadPrefixThresholdBits: configuration.broadPrefixThresholdBits ?? DEFAULT_BROAD_IPV4_PREFIX_THRESHOLD_BITS,
      broadIpv6PrefixThresholdBits:
        configuration.broadIpv6PrefixThresholdBits ?? DEFAULT_BROAD_IPV6_PREFIX_THRESHOLD_BITS,
      evaluateEgress: configuration.evaluateEgress ?? false,
    };
    this.validate();
  }

  /**
   * Risk level of a single rule
   */
  public classifyRule(rule: IRule): RiskLevel {
    return this.assessRule(rule, 0).riskLevel;
  }

  /**
   * Risk level of a rule with the breadth and port exposure that produced it
   */
  public assessRule(rule: IRule, ruleIndex: number): IRuleAssessment {
    const breadth = this.sourceBreadth(rule);
    const sensitivePortExposed = this.exposesSensitivePort(rule);
    const exposure = sensitivePortExposed ? 'sensitive' : 'non-sensitive';
    const target = `${exposure} ${rule.protocol}/${formatPorts(rule)} open to ${breadth} source ${formatSource(rule.source)}`;

    if (rule.direction === 'egress' && !this.configuration.evaluateEgress) {
      return {
        ruleIndex,
        rule,
        riskLevel: RiskLevel.LOW,
        breadth,
        sensitivePortExposed,
        reason: `egress rule not evaluated (${target})`,
      };
    }

    const levels = RISK_MATRIX[breadth];
    return {
      ruleIndex,
      rule,
      riskLevel: sensitivePortExposed ? levels.sensitive : levels.other,
      breadth,
      sensitivePortExposed,
      reason: target,
    };
  }

  /**
   * Per level counts and the overall (maximum) level of a rule set
   */
  public classifyRuleSet(ruleSet: Pick<IRuleSetState, 'rules'>): IRuleSetClassification {
    const assessments = ruleSet.rules.map((rule, index) => this.assessRule(rule, index));
    const riskCounts = emptyRiskCounts();
    for (const assessment of assessments) {
      riskCounts[assessment.riskLevel] += 1;
    }
    return {
      riskCounts,
      overallRisk: maxRiskLevel(assessments.map(item => item.riskLevel)),
      assessments,
    };
  }

  private sourceBreadth(rule: IRule): SourceBreadth {
    const source = rule.source;
    switch (source.type) {
      case 'cidr-ipv4':
        return this.cidrBreadth(source.cidr, isValidIpv4Cidr(source.cidr), this.configuration.broadPrefixThresholdBits);
      case 'cidr-ipv6':
        return this.cidrBreadth(
          source.cidr,
          isValidIpv6Cidr(source.cidr),
          this.configuration.broadIpv6PrefixThresholdBits,
        );
      case 'rule-set':
      case 'prefix-list':
        return 'reference';
    }
  }

  private cidrBreadth(cidr: string, valid: boolean, thresholdBits: number): SourceBreadth {
    if (UNIVERSAL_CIDRS.includes(cidr)) {
      return 'universal';
    }
    // Unparseable sources are scored as broad
    if (!valid) {
      return 'broad';
    }
    const bits = prefixLength(cidr);
    if (bits === 0) {
      return 'universal';
    }
    return bits <= thresholdBits ? 'broad' : 'narrow';
  }

  private exposesSensitivePort(rule: IRule): boolean {
    const protocol = PROTOCOL_NUMBERS[rule.protocol] ?? rule.protocol.toLowerCase();
    if (!this.configuration.sensitiveProtocols.includes(protocol)) {
      return false;
    }
    // ICMP type and code are not ports: a sensitive ICMP protocol is sensitive as a whole
    if (isIcmpProtocol(protocol)) {
      return true;
    }
    if (protocol === '-1' || !rule.portRange) {
      return this.configuration.sensitivePorts.length > 0;
    }
    const { fromPort, toPort } = rule.portRange;
    return this.configuration.sensitivePorts.some(port => port >= fromPort && port <= toPort);
  }

  private validate(): void {
    const { sensitivePorts, sensitiveProtocols, broadPrefixThresholdBits, broadIpv6PrefixThresholdBits } =
      this.configuration;

    const invalidPorts = sensitivePorts.filter(port => !Number.isInteger(port) || port < 0 || port > 65535);
    if (invalidPorts.length > 0) {
      throw invalidConfiguration(`Invalid sensitive port(s): ${invalidPorts.join(', ')}`);
    }
    if (sensitiveProtocols.some(protocol => protocol.length === 0)) {
      throw invalidConfiguration('Sensitive protocols must be non-empty strings');
    }
    if (!Number.isInteger(broadPrefixThresholdBits) || broadPrefixThresholdBits < 0 || broadPrefixThresholdBits > 32) {
      throw invalidConfiguration(`broadPrefixThresholdBits must be an integer between 0 and 32`);
    }
    if (
      !Number.isInteger(broadIpv6PrefixThresholdBits) ||
      broadIpv6PrefixThresholdBits < 0 ||
      broadIpv6PrefixThresholdBits > 128
    ) {
      throw invalidConfiguration(`broadIpv6PrefixThresholdBits must be an integer between 0 and 128`);
    }
  }
}
