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
import { describe, expect, test } from 'vitest';

import { MODULE_EXCEPTIONS } from '../../../common/enums';
import { RemediationError, RemediationErrorKind } from '../../../lib/common/errors';
import { IRule, RiskLevel } from '../../../lib/security-group-remediation/interfaces';
import {
  compareRiskLevels,
  emptyRiskCounts,
  isAtOrAbove,
  isRiskLevel,
  isValidIpv4Cidr,
  isValidIpv6Cidr,
  maxRiskLevel,
  RiskClassifier,
} from '../../../lib/security-group-remediation/risk-classifier';
import { MOCK_CONSTANTS } from '../../mocked-resources';

const { sshFromAnywhere, httpsFromAnywhere, postgresFromVpc, allEgress } = MOCK_CONSTANTS.rules;

function tcp(port: number, cidr: string): IRule {
  const source: IRule['source'] = cidr.includes(':') ? { type: 'cidr-ipv6', cidr } : { type: 'cidr-ipv4', cidr };
  return { direction: 'ingress', protocol: 'tcp', portRange: { fromPort: port, toPort: port }, source };
}

describe('risk-classifier', () => {
  describe('RiskClassifier.classifyRule', () => {
    const classifier = new RiskClassifier();

    test.each([
      ['sensitive port open to the world', sshFromAnywhere, RiskLevel.CRITICAL],
      ['other port open to the world', httpsFromAnywhere, RiskLevel.HIGH],
      ['sensitive port open to a broad range', tcp(22, '10.0.0.0/8'), RiskLevel.HIGH],
      ['other port open to a broad range at the threshold', tcp(443, '172.16.0.0/16'), RiskLevel.MEDIUM],
      ['sensitive port open to a narrow range', postgresFromVpc, RiskLevel.MEDIUM],
      ['other port open to a narrow range', tcp(443, '192.168.1.0/24'), RiskLevel.LOW],
      ['sensitive port open to every IPv6 address', tcp(3389, '::/0'), RiskLevel.CRITICAL],
      ['other port open to a broad IPv6 range', tcp(80, '2001:db8::/32'), RiskLevel.MEDIUM],
      ['sensitive port open to a narrow IPv6 range', tcp(22, '2001:db8:1234:5600::/56'), RiskLevel.MEDIUM],
    ])('should classify %s', (_name, rule, expected) => {
      expect(classifier.classifyRule(rule)).toBe(expected);
    });

    test('should score references as LOW', () => {
      const fromRuleSet: IRule = { ...sshFromAnywhere, source: { type: 'rule-set', ruleSetId: 'sg-admin' } };
      const fromPrefixList: IRule = { ...sshFromAnywhere, source: { type: 'prefix-list', prefixListId: 'pl-1' } };

      expect(classifier.classifyRule(fromRuleSet)).toBe(RiskLevel.LOW);
      expect(classifier.classifyRule(fromPrefixList)).toBe(RiskLevel.LOW);
    });

    test('should treat port ranges covering a sensitive port as sensitive', () => {
      const range: IRule = { ...httpsFromAnywhere, portRange: { fromPort: 20, toPort: 30 } };

      expect(classifier.classifyRule(range)).toBe(RiskLevel.CRITICAL);
    });

    test('should treat all-port and all-protocol rules as sensitive', () => {
      const allTcp: IRule = { direction: 'ingress', protocol: 'tcp', source: { type: 'cidr-ipv4', cidr: '0.0.0.0/0' } };
      const allTraffic: IRule = { ...allTcp, protocol: '-1' };

      expect(classifier.classifyRule(allTcp)).toBe(RiskLevel.CRITICAL);
      expect(classifier.classifyRule(allTraffic)).toBe(RiskLevel.CRITICAL);
    });

    test('should accept protocol numbers', () => {
      expect(classifier.classifyRule({ ...sshFromAnywhere, protocol: '6' })).toBe(RiskLevel.CRITICAL);
    });

    test('should not treat protocols without ports as sensitive', () => {
      const icmp: IRule = { direction: 'ingress', protocol: 'icmp', source: { type: 'cidr-ipv4', cidr: '0.0.0.0/0' } };

      expect(classifier.classifyRule(icmp)).toBe(RiskLevel.HIGH);
    });

    test('should score ICMP by protocol when ICMP is configured as sensitive', () => {
      const ping: IRule = {
        direction: 'ingress',
        protocol: 'icmp',
        portRange: { fromPort: 8, toPort: -1 },
        source: { type: 'cidr-ipv4', cidr: '0.0.0.0/0' },
      };

      expect(classifier.classifyRule(ping)).toBe(RiskLevel.HIGH);
      expect(new RiskClassifier({ sensitiveProtocols: ['icmp'] }).classifyRule(ping)).toBe(RiskLevel.CRITICAL);
    });

    test('should score unparseable sources as broad', () => {
      expect(classifier.classifyRule(tcp(22, 'not-a-cidr'))).toBe(RiskLevel.HIGH);
    });

    test('should score egress as LOW unless egress evaluation is enabled', () => {
      expect(classifier.classifyRule(allEgress)).toBe(RiskLevel.LOW);
      expect(new RiskClassifier({ evaluateEgress: true }).classifyRule(allEgress)).toBe(RiskLevel.CRITICAL);
    });
  });

  describe('RiskClassifier.assessRule', () => {
    test('should explain the classification', () => {
      const assessment = new RiskClassifier().assessRule(sshFromAnywhere, 3);

      expect(assessment).toEqual({
        ruleIndex: 3,
        rule: sshFromAnywhere,
        riskLevel: RiskLevel.CRITICAL,
        breadth: 'universal',
        sensitivePortExposed: true,
        reason: 'sensitive tcp/22 open to universal source 0.0.0.0/0',
      });
    });

    test('should explain skipped egress rules', () => {
      const assessment = new RiskClassifier().assessRule(allEgress, 0);

      expect(assessment.reason).toBe('egress rule not evaluated (sensitive -1/all open to universal source 0.0.0.0/0)');
    });
  });

  describe('RiskClassifier configuration', () => {
    test('should honour custom sensitive ports and prefix threshold', () => {
      const classifier = new RiskClassifier({ sensitivePorts: [443], broadPrefixThresholdBits: 24 });

      expect(classifier.classifyRule(httpsFromAnywhere)).toBe(RiskLevel.CRITICAL);
      expect(classifier.classifyRule(sshFromAnywhere)).toBe(RiskLevel.HIGH);
      expect(classifier.classifyRule(tcp(443, '192.168.1.0/24'))).toBe(RiskLevel.HIGH);
    });

    test('should lowercase sensitive protocols', () => {
      expect(new RiskClassifier({ sensitiveProtocols: ['TCP'] }).configuration.sensitiveProtocols).toEqual(['tcp']);
    });

    test('should reject invalid sensitive ports', () => {
      expect(() => new RiskClassifier({ sensitivePorts: [22, 70000, -1] })).toThrow(
        `${MODULE_EXCEPTIONS.INVALID_INPUT}: Invalid sensitive port(s): 70000, -1`,
      );
    });

    test('should reject out of range prefix thresholds', () => {
      expect(() => new RiskClassifier({ broadPrefixThresholdBits: 33 })).toThrow(
        'broadPrefixThresholdBits must be an integer between 0 and 32',
      );
      expect(() => new RiskClassifier({ broadIpv6PrefixThresholdBits: 129 })).toThrow(
        'broadIpv6PrefixThresholdBits must be an integer between 0 and 128',
      );
    });

    test('should reject empty protocols with an invalid configuration error', () => {
      let thrown: unknown;
      try {
        new RiskClassifier({ sensitiveProtocols: [''] });
      } catch (e: unknown) {
        thrown = e;
      }

      expect(thrown).toBeInstanceOf(RemediationError);
      expect(thrown).toMatchObject({ kind: RemediationErrorKind.INVALID_CONFIGURATION });
    });
  });

  describe('RiskClassifier.classifyRuleSet', () => {
    test('should count levels and report the highest', () => {
      const classification = new RiskClassifier().classifyRuleSet({
        rules: [sshFromAnywhere, httpsFromAnywhere, postgresFromVpc, allEgress],
      });

      expect(classification.riskCounts).toEqual({
        [RiskLevel.LOW]: 1,
        [RiskLevel.MEDIUM]: 1,
        [RiskLevel.HIGH]: 1,
        [RiskLevel.CRITICAL]: 1,
      });
      expect(classification.overallRisk).toBe(RiskLevel.CRITICAL);
      expect(classification.assessments.map(item => item.ruleIndex)).toEqual([0, 1, 2, 3]);
    });

    test('should report LOW for an empty rule set', () => {
      const classification = new RiskClassifier().classifyRuleSet({ rules: [] });

      expect(classification.overallRisk).toBe(RiskLevel.LOW);
      expect(classification.riskCounts).toEqual(emptyRiskCounts());
    });
  });

  describe('risk level helpers', () => {
    test('should order levels', () => {
      expect(compareRiskLevels(RiskLevel.LOW, RiskLevel.CRITICAL)).toBeLessThan(0);
      expect(compareRiskLevels(RiskLevel.HIGH, RiskLevel.HIGH)).toBe(0);
      expect(isAtOrAbove(RiskLevel.CRITICAL, RiskLevel.HIGH)).toBe(true);
      expect(isAtOrAbove(RiskLevel.MEDIUM, RiskLevel.HIGH)).toBe(false);
      expect(maxRiskLevel([RiskLevel.MEDIUM, RiskLevel.HIGH, RiskLevel.LOW])).toBe(RiskLevel.HIGH);
      expect(maxRiskLevel([])).toBe(RiskLevel.LOW);
    });

    test('should recognise risk level names', () => {
      expect(isRiskLevel('CRITICAL')).toBe(true);
      expect(isRiskLevel('critical')).toBe(false);
      expect(isRiskLevel(3)).toBe(false);
    });

    test('should validate CIDRs per address family', () => {
      expect(isValidIpv4Cidr('10.0.0.0/8')).toBe(true);
      expect(isValidIpv4Cidr('10.0.0.0')).toBe(false);
      expect(isValidIpv4Cidr('300.0.0.0/8')).toBe(false);
      expect(isValidIpv4Cidr('2001:db8::/32')).toBe(false);
      expect(isValidIpv6Cidr('2001:db8::/32')).toBe(true);
      expect(isValidIpv6Cidr('10.0.0.0/8')).toBe(false);
    });
  });
});
