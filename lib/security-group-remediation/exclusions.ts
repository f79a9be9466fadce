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

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

/**
 * Returns the first exclusion pattern matching the rule set id or name, `*` and `?` being wildcards
 */
export function findMatchingExclusion(
  ruleSet: { readonly id: string; readonly name: string },
  exclusions: readonly string[],
): string | undefined {
  return exclusions.find(pattern => {
    const matcher = globToRegExp(pattern);
    return matcher.test(ruleSet.id) || matcher.test(ruleSet.name);
  });
}
