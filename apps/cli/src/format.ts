/**
 * Plain-text rendering for CLI output
 */

import { formatDistanceToNowStrict } from 'date-fns';
import type { RollbackPlan, RollbackPoint, RollbackReport } from '@rewind/shared';

const MAX_DESCRIPTION_WIDTH = 40;

function truncate(value: string, width: number): string {
  return value.length <= width ? value : `${value.slice(0, width - 3)}...`;
}

/**
 * `2024-05-01T12:00:00.000Z` -> `2024-05-01 12:00:00`
 */
export function formatUtc(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 19).replace('T', ' ');
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const render = (cells: string[]) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd();

  return [render(headers), render(widths.map((width) => '-'.repeat(width))), ...rows.map(render)];
}

export function formatPointTable(points: RollbackPoint[]): string[] {
  const rows = points.map((point) => [
    point.id,
    truncate(point.description, MAX_DESCRIPTION_WIDTH),
    formatUtc(point.timestamp),
    formatDistanceToNowStrict(new Date(point.timestamp), { addSuffix: true }),
    String(point.services.length),
  ]);
  return formatTable(['ID', 'DESCRIPTION', 'CREATED (UTC)', 'AGE', 'SERVICES'], rows);
}

export function formatPointDetails(point: RollbackPoint): string[] {
  const output = [
    `Rollback point ${point.id}`,
    `  Description: ${point.description}`,
    `  Created:     ${formatUtc(point.timestamp)} UTC`,
    `  Created by:  ${point.createdBy}`,
    '',
    `Services (${point.services.length}):`,
    ...point.services.map((service) => `  ${service}: ${point.imageReferences[service] ?? '(no image)'}`),
    '',
    `Config files (${Object.keys(point.configHashes).length}):`,
    ...Object.entries(point.configHashes).map(([path, hash]) => `  ${path}  sha256:${hash.slice(0, 12)}`),
    '',
    `Volumes (${point.volumes.length}):`,
    ...point.volumes.map((volume) => `  ${volume}`),
  ];

  const metadata = Object.entries(point.metadata);
  if (metadata.length > 0) {
    output.push('', 'Metadata:', ...metadata.map(([key, value]) => `  ${key}: ${String(value)}`));
  }
  return output;
}

export function formatPlan(plan: RollbackPlan): string[] {
  const changed = plan.configs.filter((entry) => entry.status !== 'unchanged').length;
  const output = [
    `Rollback plan for ${plan.rollbackId} (${plan.description}, ${formatUtc(plan.timestamp)} UTC):`,
    `  1. Stop services: ${plan.services.map((entry) => entry.service).join(', ')}`,
    `  2. Restore ${plan.configs.length} configuration files (${changed} differ from current)`,
    ...plan.configs.map((entry) => `     - ${entry.path} [${entry.status}]`),
    '  3. Restore images:',
    ...plan.services.map(
      (entry) => `     - ${entry.service}: ${entry.targetImage ?? '(unchanged)'} [${entry.strategy}]`
    ),
  ];

  let step = 4;
  if (plan.volumes.length > 0) {
    output.push(`  ${step}. Restore ${plan.volumes.length} volumes: ${plan.volumes.join(', ')}`);
    step++;
  }
  output.push(`  ${step}. Start services`, `  ${step + 1}. Verify health`);
  return output;
}

export function formatReport(report: RollbackReport): string[] {
  const output: string[] = [];
  for (const result of report.services) {
    const status = result.succeeded ? 'ok' : 'FAILED';
    output.push(`  ${result.service}: ${status}${result.reason ? ` (${result.reason})` : ''}`);
  }
  for (const failure of report.configResult?.failed ?? []) {
    output.push(`  config ${failure.path}: FAILED (${failure.reason})`);
  }
  for (const result of report.volumeResults) {
    if (!result.succeeded) {
      output.push(`  volume ${result.volume}: FAILED (${result.reason ?? 'unknown'})`);
    }
  }
  output.push(
    report.success
      ? `Rollback to ${report.rollbackId} completed in ${report.durationMs}ms`
      : `Rollback to ${report.rollbackId} finished with failures`
  );
  return output;
}
