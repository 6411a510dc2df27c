import { ReportRow } from '../uptime/contracts';
import { reportingConfig } from '../config/reporting';
import { writeFileAtomic } from '../storage/jsonStore';

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatReportRow(row: ReportRow): string {
  return [
    escapeCsvField(row.storeId),
    row.uptimeLastHour,
    row.uptimeLastDay,
    row.uptimeLastWeek,
    row.downtimeLastHour,
    row.downtimeLastDay,
    row.downtimeLastWeek,
  ].join(',');
}

export function formatReportCsv(rows: ReportRow[]): string {
  const lines = [reportingConfig.csvColumns.join(','), ...rows.map(formatReportRow)];
  return lines.join('\n') + '\n';
}

/**
 * Publishes the report in one step; readers never see a partial file.
 */
export async function writeReportCsv(filePath: string, rows: ReportRow[]): Promise<void> {
  await writeFileAtomic(filePath, formatReportCsv(rows));
}
