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
 * @fileoverview CLI output formatting - json, text, table and csv renderings of module responses
 */

import { IModuleResponse } from '../common/interfaces';
import { IAuditReport, IRemediationSession } from '../security-group-remediation/interfaces';
import { describeRule } from '../security-group-remediation/rules';
import {
  ISecurityGroupRemediationExecution,
} from '../../interfaces/security-group-remediation/execute-security-group-remediation';
import { isRecord, OutputFormat } from './handlers/root';

type Table = {
  headers: string[];
  rows: string[][];
};

function isExecution(value: unknown): value is ISecurityGroupRemediationExecution {
  return isRecord(value) && isRecord(value['session']) && isRecord(value['report']);
}

function isAuditReport(value: unknown): value is IAuditReport {
  return isRecord(value) && isRecord(value['totals']) && Array.isArray(value['ruleSets']);
}

function isSession(value: unknown): value is IRemediationSession {
  return isRecord(value) && typeof value['sessionId'] === 'string' && Array.isArray(value['actions']);
}

/**
 * One row per finding, planned action or executed action
 */
export function toTable(response: unknown): Table | undefined {
  if (isExecution(response)) {
    return {
      headers: ['ACTION', 'KIND', 'RISK', 'STATE', 'ATTEMPTS', 'DETAIL'],
      rows: response.report.actions.map(action => [
        action.actionId,
        action.kind,
        action.riskLevel,
        action.finalState,
        `${action.attempts}`,
        action.failure ? `${action.failure.kind}: ${action.failure.message}` : (action.reason ?? ''),
      ]),
    };
  }
  if (isAuditReport(response)) {
    return {
      headers: ['REGION', 'SECURITY_GROUP', 'NAME', 'RISK', 'RULE', 'REASON'],
      rows: response.ruleSets.flatMap(entry =>
        entry.findings.map(finding => [
          entry.region,
          entry.id,
          entry.name,
          finding.riskLevel,
          describeRule(finding.rule),
          finding.reason,
        ]),
      ),
    };
  }
  if (isSession(response)) {
    return {
      headers: ['ACTION', 'KIND', 'RISK', 'MANUAL', 'JUSTIFICATION'],
      rows: response.actions.map(action => [
        action.id,
        action.kind,
        action.riskLevel,
        action.manualFollowUpRequired ? 'yes' : 'no',
        action.justification,
      ]),
    };
  }
  return undefined;
}

function renderTable(table: Table): string {
  const widths = table.headers.map((header, column) =>
    Math.max(header.length, ...table.rows.map(row => row[column].length)),
  );
  const render = (cells: string[]) =>
    cells.map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column]))).join('  ');
  return [render(table.headers), render(widths.map(width => '-'.repeat(width))), ...table.rows.map(render)].join(
    '\n',
  );
}

function csvCell(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function renderCsv(table: Table): string {
  return [table.headers, ...table.rows].map(row => row.map(csvCell).join(',')).join('\n');
}

/**
 * Renders a handler result. Strings (usage and validation messages) are returned unchanged.
 */
export function formatOutput(data: string | IModuleResponse<unknown>, format: OutputFormat = 'json'): string {
  if (typeof data === 'string') {
    return data;
  }

  const table = toTable(data.response);

  switch (format) {
    case 'text':
      return [
        `${data.moduleName}\t${data.operation}\t${data.status}\t${data.summary}`,
        ...(table?.rows ?? []).map(row => row.join('\t')),
      ].join('\n');

    case 'table':
      return [
        `${data.moduleName} ${data.operation}: ${data.status}`,
        data.summary,
        ...(table ? ['', renderTable(table)] : []),
      ].join('\n');

    case 'csv':
      return renderCsv(
        table ?? {
          headers: ['MODULE', 'OPERATION', 'STATUS', 'SUMMARY'],
          rows: [[data.moduleName, data.operation, data.status, data.summary]],
        },
      );

    default:
      return JSON.stringify(data, null, 2);
  }
}
