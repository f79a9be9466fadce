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
import path from 'path';
import { AlarmType, CloudWatchClient, paginateDescribeAlarms, StateValue } from '@aws-sdk/client-cloudwatch';
import { setRetryStrategy } from '../../common/functions';
import { createLogger } from '../../common/logger';
import { toProviderError } from '../common/aws-errors';
import { IAwsProviderProps, RegionalClients } from '../common/regional-clients';
import { IHealthCheckContext, IHealthCheckProvider } from '../security-group-remediation/interfaces';

/**
 * DescribeAlarms accepts at most 100 alarm names per call
 */
const ALARM_NAMES_PER_CALL = 100;

export interface ICloudWatchAlarmHealthCheckProps extends IAwsProviderProps {
  /**
   * Alarms looked up in the region of the action
   */
  readonly alarmNames: readonly string[];
}

/**
 * Reports unhealthy while any of the configured CloudWatch alarms is in `ALARM` state.
 * Without configured alarms every check passes.
 */
export class CloudWatchAlarmHealthCheckProvider implements IHealthCheckProvider {
  private readonly logger = createLogger([path.parse(path.basename(__filename)).name]);
  private readonly alarmNames: readonly string[];
  private readonly clients: RegionalClients<CloudWatchClient>;

  constructor(props: ICloudWatchAlarmHealthCheckProps) {
    this.alarmNames = props.alarmNames;
    this.clients = new RegionalClients(
      region =>
        new CloudWatchClient({
          region,
          customUserAgent: props.solutionId,
          retryStrategy: setRetryStrategy(),
          credentials: props.credentials,
        }),
    );
  }

  public async isHealthy(context: IHealthCheckContext): Promise<boolean> {
    const prefix = `${context.region}:${context.ruleSetId}`;
    if (this.alarmNames.length === 0) {
      this.logger.warn(`No health check alarms configured, treating ${context.actionId} as healthy`, prefix);
      return true;
    }

    const client = this.clients.get(context.region);
    const alarming: string[] = [];
    try {
      for (let index = 0; index < this.alarmNames.length; index += ALARM_NAMES_PER_CALL) {
        const paginator = paginateDescribeAlarms(
          { client },
          {
            AlarmNames: this.alarmNames.slice(index, index + ALARM_NAMES_PER_CALL),
            AlarmTypes: [AlarmType.MetricAlarm, AlarmType.CompositeAlarm],
          },
        );
        for await (const page of paginator) {
          for (const alarm of [...(page.MetricAlarms ?? []), ...(page.CompositeAlarms ?? [])]) {
            if (alarm.StateValue === StateValue.ALARM && alarm.AlarmName) {
              alarming.push(alarm.AlarmName);
            }
          }
        }
      }
    } catch (e: unknown) {
      throw toProviderError('DescribeAlarms', e);
    }

    if (alarming.length > 0) {
      this.logger.warn(`Alarm(s) in ALARM state after ${context.actionId}: ${alarming.join(', ')}`, prefix);
      return false;
    }
    this.logger.info(`${this.alarmNames.length} alarm(s) healthy after ${context.actionId}`, prefix);
    return true;
  }
}
