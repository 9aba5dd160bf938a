/**
 * CSV Sample Sink
 *
 * Writes one row per sample as it is recorded. Each row is appended and flushed
 * immediately so an aborted run still leaves every sample recorded so far on disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { wallUsToIso } from '@latlab/shared';
import type { Sample, SampleSink } from '../types';

type CsvValue = string | number | boolean | null;

interface CsvColumn {
  header: string;
  value: (sample: Sample) => CsvValue;
}

export const CSV_COLUMNS: readonly CsvColumn[] = [
  { header: 'sequence', value: (s) => s.sequence },
  { header: 'iteration', value: (s) => s.iteration },
  { header: 'op_type', value: (s) => s.operation },
  { header: 'rpc_method', value: (s) => s.rpcMethod },
  { header: 'instrument_name', value: (s) => s.instrumentName },
  { header: 'order_id', value: (s) => s.orderId },
  { header: 'tick_ts_mono_ns', value: (s) => s.tickMonoNs },
  { header: 'send_ts_mono_ns', value: (s) => s.sendMonoNs },
  { header: 'recv_ts_mono_ns', value: (s) => s.ackMonoNs },
  { header: 'send_ts_wall_iso', value: (s) => wallUsToIso(s.sendWallUs) },
  { header: 'recv_ts_wall_iso', value: (s) => wallUsToIso(s.ackWallUs) },
  { header: 'rtt_mono_us', value: (s) => s.rttUs },
  { header: 'rtt_wall_us', value: (s) => s.rttWallUs },
  { header: 'tick_to_send_us', value: (s) => s.tickToSendUs },
  { header: 'tick_to_ack_us', value: (s) => s.tickToAckUs },
  { header: 'engine_us_in', value: (s) => s.usIn },
  { header: 'engine_us_out', value: (s) => s.usOut },
  { header: 'engine_us_diff', value: (s) => s.usDiff },
  { header: 'ack_delta_prev_us', value: (s) => s.ackDeltaPrevUs },
  { header: 'error_kind', value: (s) => s.errorKind },
  { header: 'error_code', value: (s) => s.errorCode },
  { header: 'error_msg', value: (s) => s.errorMessage },
  { header: 'clock_anomaly', value: (s) => s.clockAnomaly },
];

export function escapeCsvField(value: CsvValue): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsvRow(sample: Sample): string {
  return CSV_COLUMNS.map((column) => escapeCsvField(column.value(sample))).join(',');
}

export const CSV_HEADER = CSV_COLUMNS.map((column) => column.header).join(',');

export class CsvSampleSink implements SampleSink {
  private rowsWritten = 0;

  /**
   * Creates the parent directory and truncates the file to a fresh header.
   */
  constructor(private readonly filePath: string) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, CSV_HEADER + '\n');
  }

  write(sample: Sample): void {
    fs.appendFileSync(this.filePath, formatCsvRow(sample) + '\n');
    this.rowsWritten++;
  }

  getPath(): string {
    return this.filePath;
  }

  getRowCount(): number {
    return this.rowsWritten;
  }
}
