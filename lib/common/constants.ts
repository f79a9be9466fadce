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
 * @fileoverview Default values for classification, planning and staged execution.
 *
 * Every value here can be overridden through the engine options or the CLI configuration file.
 */

import { RiskLevel } from '../security-group-remediation/interfaces';

/**
 * Lowest risk level reported and remediated when none is configured
 */
export const DEFAULT_RISK_THRESHOLD = RiskLevel.HIGH;

/**
 * Ports treated as sensitive when exposed: SSH, SMTP, MSSQL, MySQL, RDP, PostgreSQL, CouchDB, Redis,
 * Elasticsearch, Memcached and MongoDB.
 */
export const DEFAULT_SENSITIVE_PORTS: readonly number[] = [
  22, 25, 1433, 3306, 3389, 5432, 5984, 6379, 9200, 11211, 27017,
];

/**
 * Protocols whose port ranges are checked against the sensitive port list. `-1` means all protocols.
 */
export const DEFAULT_SENSITIVE_PROTOCOLS: readonly string[] = ['tcp', 'udp', '-1'];

/**
 * IPv4 sources with a prefix length at or below this value are broad.
 *
 * @remarks
 * A /16 covers 65,536 addresses.
 */
export const DEFAULT_BROAD_IPV4_PREFIX_THRESHOLD_BITS = 16;

/**
 * IPv6 sources with a prefix length at or below this value are broad.
 */
export const DEFAULT_BROAD_IPV6_PREFIX_THRESHOLD_BITS = 48;

/**
 * Wait between staging a change and checking health
 */
export const DEFAULT_SETTLE_INTERVAL_MS = 300_000;

/**
 * Upper bound for a single health check
 */
export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 60_000;

/**
 * Staging attempts per action, including the first one
 */
export const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * First backoff delay between staging attempts
 */
export const DEFAULT_RETRY_STARTING_DELAY_MS = 200;

/**
 * Rule sets processed concurrently by the executor
 */
export const DEFAULT_MAX_CONCURRENT_RULE_SETS = 4;

/**
 * Regions collected concurrently
 */
export const DEFAULT_MAX_CONCURRENT_REGIONS = 4;

/**
 * Attachment lookups run concurrently within one region
 */
export const DEFAULT_MAX_CONCURRENT_ATTACHMENT_LOOKUPS = 10;

/**
 * Default SDK client retry attempts, overridden by `SG_REMEDIATION_SDK_MAX_ATTEMPTS`
 */
export const DEFAULT_SDK_MAX_ATTEMPTS = 3;

/**
 * Rule set name that providers never allow to be deleted
 */
export const DEFAULT_RULE_SET_NAME = 'default';
