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
 * @fileoverview Security Groups CLI Command Handler - builds module parameters from CLI arguments
 *
 * Configuration comes from `--configuration` and is validated field by field; `--regions` and `--ports`
 * override the matching configuration values. `execute` stops after the actions already staged on SIGINT.
 */

import path from 'path';
import { createLogger } from '../../../common/logger';
import { ModuleName } from '../../../common/resources';
import {
  auditSecurityGroups,
  executeSecurityGroupRemediation,
  planSecurityGroupRemediation,
} from '../../../executors/security-group-remediation';
import {
  ISecurityGroupRemediationConfiguration,
  ISecurityGroupRemediationHandlerParameter,
} from '../../../interfaces/security-group-remediation/configuration';
import {
  ISecurityGroupRemediationExecution,
} from '../../../interfaces/security-group-remediation/execute-security-group-remediation';
import { IModuleResponse } from '../../common/interfaces';
import { IAuditReport, IRemediationSession } from '../../security-group-remediation/interfaces';
import { isRiskLevel } from '../../security-group-remediation/risk-classifier';
import {
  CliExecutionParameterType,
  ConfigurationObjectType,
  getConfig,
  getRegionFromArgs,
  isRecord,
  logError,
  logErrorAndExit,
  splitList,
} from './root';

const logger = createLogger([path.parse(path.basename(__filename)).name]);

type ValidConfiguration = ConfigurationObjectType & ISecurityGroupRemediationConfiguration;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}

/**
 * Abstract command handler class for security group CLI operations
 */
export abstract class SecurityGroupsCommand {
  public static async audit(param: CliExecutionParameterType): Promise<IModuleResponse<IAuditReport>> {
    return auditSecurityGroups(SecurityGroupsCommand.getParams(param));
  }

  public static async plan(param: CliExecutionParameterType): Promise<IModuleResponse<IRemediationSession>> {
    return planSecurityGroupRemediation(SecurityGroupsCommand.getParams(param));
  }

  public static async execute(
    param: CliExecutionParameterType,
  ): Promise<IModuleResponse<ISecurityGroupRemediationExecution>> {
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('Interrupted, finishing actions already staged');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);
    try {
      return await executeSecurityGroupRemediation({
        ...SecurityGroupsCommand.getParams(param),
        signal: controller.signal,
      });
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  }

  /**
   * Parses and validates CLI parameters to create the module handler parameter
   * @param param - CLI execution parameters
   */
  public static getParams(param: CliExecutionParameterType): ISecurityGroupRemediationHandlerParameter {
    const configArg = param.args['configuration'];
    if (configArg !== undefined && typeof configArg !== 'string') {
      logErrorAndExit('An error occurred (InvalidParameter): The configuration parameter must be a string');
    }

    const config: ConfigurationObjectType = configArg === undefined ? {} : getConfig(configArg);
    if (!SecurityGroupsCommand.validConfig(config)) {
      process.exit(1);
    }

    return {
      moduleName: ModuleName.SECURITY_GROUP_REMEDIATION,
      operation: param.commandName,
      region: getRegionFromArgs(param),
      dryRun: param.args['dry-run'] === true,
      configuration: SecurityGroupsCommand.applyOverrides(config, param),
    };
  }

  /**
   * Applies `--regions` and `--ports`
   */
  private static applyOverrides(
    config: ISecurityGroupRemediationConfiguration,
    param: CliExecutionParameterType,
  ): ISecurityGroupRemediationConfiguration {
    const regionsArg = param.args['regions'];
    const portsArg = param.args['ports'];

    let ports: number[] | undefined;
    if (typeof portsArg === 'string') {
      const items = splitList(portsArg);
      ports = items.map(Number);
      if (ports.some(port => !Number.isInteger(port))) {
        logErrorAndExit(`An error occurred (InvalidParameter): --ports must be a comma separated list of port numbers`);
      }
    }

    return {
      ...config,
      ...(typeof regionsArg === 'string' && { regions: splitList(regionsArg) }),
      ...(ports && { classifier: { ...config.classifier, sensitivePorts: ports } }),
    };
  }

  /**
   * Validates the configuration object
   * @param config - Configuration object to validate
   * @returns Type guard indicating if config is a valid ISecurityGroupRemediationConfiguration
   */
  public static validConfig(config: ConfigurationObjectType): config is ValidConfiguration {
    for (const key of ['regions', 'exclusions', 'approvedCidrs']) {
      if (config[key] !== undefined && !isStringArray(config[key])) {
        logError(`(ConfigValidation): config.${key} must be an array of strings`);
        return false;
      }
    }
    if (config['riskThreshold'] !== undefined && !isRiskLevel(config['riskThreshold'])) {
      logError('(ConfigValidation): config.riskThreshold must be one of LOW, MEDIUM, HIGH, CRITICAL');
      return false;
    }
    if (config['deleteUnusedRuleSets'] !== undefined && typeof config['deleteUnusedRuleSets'] !== 'boolean') {
      logError('(ConfigValidation): config.deleteUnusedRuleSets must be a boolean');
      return false;
    }
    for (const key of ['settleIntervalSeconds', 'healthCheckTimeoutSeconds', 'maxAttempts']) {
      if (config[key] !== undefined && typeof config[key] !== 'number') {
        logError(`(ConfigValidation): config.${key} must be a number`);
        return false;
      }
    }
    return (
      SecurityGroupsCommand.validateAdminRuleSets(config) &&
      SecurityGroupsCommand.validateClassifierConfig(config) &&
      SecurityGroupsCommand.validateHealthCheckConfig(config) &&
      SecurityGroupsCommand.validateConcurrencyConfig(config)
    );
  }

  private static validateAdminRuleSets(config: ConfigurationObjectType): boolean {
    const adminRuleSets = config['adminRuleSets'];
    if (adminRuleSets === undefined) {
      return true;
    }
    if (!isRecord(adminRuleSets) || !Object.values(adminRuleSets).every(value => typeof value === 'string')) {
      logError('(ConfigValidation): config.adminRuleSets must map region names to security group ids');
      return false;
    }
    return true;
  }

  private static validateClassifierConfig(config: ConfigurationObjectType): boolean {
    const classifier = config['classifier'];
    if (classifier === undefined) {
      return true;
    }
    if (!isRecord(classifier)) {
      logError('(ConfigValidation): config.classifier must be an object');
      return false;
    }
    if (classifier['sensitivePorts'] !== undefined && !isNumberArray(classifier['sensitivePorts'])) {
      logError('(ConfigValidation): config.classifier.sensitivePorts must be an array of numbers');
      return false;
    }
    if (classifier['sensitiveProtocols'] !== undefined && !isStringArray(classifier['sensitiveProtocols'])) {
      logError('(ConfigValidation): config.classifier.sensitiveProtocols must be an array of strings');
      return false;
    }
    for (const key of ['broadPrefixThresholdBits', 'broadIpv6PrefixThresholdBits']) {
      if (classifier[key] !== undefined && typeof classifier[key] !== 'number') {
        logError(`(ConfigValidation): config.classifier.${key} must be a number`);
        return false;
      }
    }
    if (classifier['evaluateEgress'] !== undefined && typeof classifier['evaluateEgress'] !== 'boolean') {
      logError('(ConfigValidation): config.classifier.evaluateEgress must be a boolean');
      return false;
    }
    return true;
  }

  private static validateHealthCheckConfig(config: ConfigurationObjectType): boolean {
    const healthCheck = config['healthCheck'];
    if (healthCheck === undefined) {
      return true;
    }
    if (!isRecord(healthCheck)) {
      logError('(ConfigValidation): config.healthCheck must be an object');
      return false;
    }
    if (healthCheck['alarmNames'] !== undefined && !isStringArray(healthCheck['alarmNames'])) {
      logError('(ConfigValidation): config.healthCheck.alarmNames must be an array of strings');
      return false;
    }
    return true;
  }

  private static validateConcurrencyConfig(config: ConfigurationObjectType): boolean {
    const concurrency = config['concurrency'];
    if (concurrency === undefined) {
      return true;
    }
    if (!isRecord(concurrency)) {
      logError('(ConfigValidation): config.concurrency must be an object');
      return false;
    }
    for (const key of ['maxConcurrentRuleSets', 'maxConcurrentRegions']) {
      if (concurrency[key] !== undefined && typeof concurrency[key] !== 'number') {
        logError(`(ConfigValidation): config.concurrency.${key} must be a number`);
        return false;
      }
    }
    return true;
  }
}
