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

import { findMatchingExclusion } from '../../../lib/security-group-remediation/exclusions';

const ruleSet = { id: 'sg-0123456789abcdef0', name: 'prod-web.public' };

describe('exclusions', () => {
  test('should match exact ids and names', () => {
    expect(findMatchingExclusion(ruleSet, ['sg-0123456789abcdef0'])).toBe('sg-0123456789abcdef0');
    expect(findMatchingExclusion(ruleSet, ['prod-web.public'])).toBe('prod-web.public');
  });

  test('should support star and question mark wildcards', () => {
    expect(findMatchingExclusion(ruleSet, ['prod-*'])).toBe('prod-*');
    expect(findMatchingExclusion(ruleSet, ['sg-0123456789abcdef?'])).toBe('sg-0123456789abcdef?');
  });

  test('should return the first matching pattern', () => {
    expect(findMatchingExclusion(ruleSet, ['dev-*', '*.public', 'prod-*'])).toBe('*.public');
  });

  test('should treat regular expression characters literally', () => {
    expect(findMatchingExclusion(ruleSet, ['prod-web_public'])).toBeUndefined();
    expect(findMatchingExclusion({ id: 'sg-1', name: 'prod-webXpublic' }, ['prod-web.public'])).toBeUndefined();
  });

  test('should require the whole value to match', () => {
    expect(findMatchingExclusion(ruleSet, ['prod'])).toBeUndefined();
    expect(findMatchingExclusion(ruleSet, [])).toBeUndefined();
  });
});
