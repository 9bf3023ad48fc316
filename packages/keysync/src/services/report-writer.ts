/**
 * Report Writer
 *
 * Renders a completed reconciliation run into CSV files plus a JSON detail
 * dump. Reports are derived output only; nothing here feeds back into a run.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { formatCsv, formatJson, formatters, type TableColumn } from '../cli/lib/output.js';
import type { AuditEvent, ErrorLogEntry, MasterKeyRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { RunStateStore } from '../persistence/run-state-store.js';
import type { ReconciliationResult } from './reconciliation-orchestrator.types.js';

const log = createLogger({ module: 'reports' });

export const REPORT_FILES = {
  summary: 'reconciliation_summary.csv',
  missingInAuthority: 'missing_in_a.csv',
  missingFromSystems: 'missing_from_systems.csv',
  duplicates: 'duplicate_keys.csv',
  registry: 'master_key_registry.csv',
  auditLog: 'audit_log.csv',
  errors: 'error_report.csv',
} as const;

export function detailsFileName(runId: number): string {
  return `reconciliation_run_${runId}_details.json`;
}

// ============================================================================
// Row Types
// ============================================================================

interface SummaryRow {
  readonly metric: string;
  readonly value: string | number;
  readonly timestamp: string;
}

interface MissingInAuthorityRow {
  readonly normalizedKey: string;
  readonly system: string;
  readonly rawKey: string;
  readonly masterKey: string;
  readonly strategy: string;
  readonly status: string;
  readonly timestamp: string;
}

interface PropagationGapRow {
  readonly system: string;
  readonly normalizedKey: string;
  readonly presentInAuthority: string;
  readonly action: string;
  readonly timestamp: string;
}

interface DuplicateRow {
  readonly system: string;
  readonly normalizedKey: string;
  readonly rawKeys: string;
  readonly count: number;
}

// ============================================================================
// Columns
// ============================================================================

const SUMMARY_COLUMNS: readonly TableColumn<SummaryRow>[] = [
  { key: 'metric', header: 'Metric' },
  { key: 'value', header: 'Value' },
  { key: 'timestamp', header: 'Timestamp' },
];

const MISSING_IN_AUTHORITY_COLUMNS: readonly TableColumn<MissingInAuthorityRow>[] = [
  { key: 'normalizedKey', header: 'Normalized Key' },
  { key: 'system', header: 'Source System' },
  { key: 'rawKey', header: 'Original Key' },
  { key: 'masterKey', header: 'Proposed Master Key' },
  { key: 'strategy', header: 'Provisioning Strategy' },
  { key: 'status', header: 'Status' },
  { key: 'timestamp', header: 'Timestamp' },
];

const PROPAGATION_GAP_COLUMNS: readonly TableColumn<PropagationGapRow>[] = [
  { key: 'system', header: 'System' },
  { key: 'normalizedKey', header: 'Normalized Key' },
  { key: 'presentInAuthority', header: 'Present in Authority' },
  { key: 'action', header: 'Action Required' },
  { key: 'timestamp', header: 'Timestamp' },
];

const DUPLICATE_COLUMNS: readonly TableColumn<DuplicateRow>[] = [
  { key: 'system', header: 'System' },
  { key: 'normalizedKey', header: 'Normalized Key' },
  { key: 'rawKeys', header: 'Original Keys' },
  { key: 'count', header: 'Count' },
];

export const MASTER_KEY_COLUMNS: readonly TableColumn<MasterKeyRecord>[] = [
  { key: 'id', header: 'Master Key ID' },
  { key: 'masterKey', header: 'Master Key' },
  { key: 'sourceSystem', header: 'Source System' },
  { key: 'sourceKey', header: 'Source Key' },
  { key: 'status', header: 'Status' },
  { key: 'strategy', header: 'Provisioning Strategy' },
  { key: 'createdAt', header: 'Created At' },
  { key: 'activatedAt', header: 'Activated At' },
  { key: 'runId', header: 'Run ID' },
];

const AUDIT_COLUMNS: readonly TableColumn<AuditEvent>[] = [
  { key: 'id', header: 'Audit ID' },
  { key: 'timestamp', header: 'Timestamp' },
  { key: 'eventType', header: 'Event Type' },
  { key: 'details', header: 'Event Details' },
  { key: 'system', header: 'System' },
  { key: 'key', header: 'Key' },
  { key: 'action', header: 'Action Taken' },
  { key: 'result', header: 'Result' },
];

const ERROR_COLUMNS: readonly TableColumn<ErrorLogEntry>[] = [
  { key: 'timestamp', header: 'Timestamp' },
  { key: 'type', header: 'Type' },
  { key: 'system', header: 'System' },
  { key: 'filePath', header: 'File' },
  { key: 'rowNumber', header: 'Row' },
  { key: 'message', header: 'Error' },
  { key: 'action', header: 'Action' },
];

// ============================================================================
// Report Writer
// ============================================================================

export class ReportWriter {
  constructor(
    private readonly store: RunStateStore,
    private readonly outputDir: string
  ) {}

  /**
   * Write every report for a completed run
   *
   * @returns Paths of the files written
   */
  async writeAll(result: ReconciliationResult): Promise<string[]> {
    await mkdir(this.outputDir, { recursive: true });

    const written = [
      await this.write(REPORT_FILES.summary, formatCsv(buildSummaryRows(result), SUMMARY_COLUMNS)),
      await this.write(
        REPORT_FILES.missingInAuthority,
        formatCsv(await this.buildMissingInAuthorityRows(result), MISSING_IN_AUTHORITY_COLUMNS)
      ),
      await this.write(
        REPORT_FILES.missingFromSystems,
        formatCsv(buildPropagationGapRows(result), PROPAGATION_GAP_COLUMNS)
      ),
      await this.write(REPORT_FILES.duplicates, formatCsv(buildDuplicateRows(result), DUPLICATE_COLUMNS)),
      await this.write(
        REPORT_FILES.registry,
        formatCsv(await this.store.getMasterKeys(), MASTER_KEY_COLUMNS)
      ),
      await this.write(
        REPORT_FILES.auditLog,
        formatCsv(await this.store.getAuditEvents(result.runId), AUDIT_COLUMNS)
      ),
    ];

    if (result.comparison.processingErrors.length > 0) {
      written.push(
        await this.write(REPORT_FILES.errors, formatCsv(result.comparison.processingErrors, ERROR_COLUMNS))
      );
    }

    written.push(await this.write(detailsFileName(result.runId), formatJson(toSerializable(result))));

    log.info(`Generated ${written.length} reports for run ${result.runId}`, { outputDir: this.outputDir });
    return written;
  }

  private async write(fileName: string, content: string): Promise<string> {
    const filePath = join(this.outputDir, fileName);
    await writeFile(filePath, `${content}\n`, 'utf-8');
    log.debug(`Wrote ${filePath}`);
    return filePath;
  }

  /**
   * One row per (system, raw key) an out-of-authority key was seen under,
   * joined to the live registry record for its normalized key
   */
  private async buildMissingInAuthorityRows(
    result: ReconciliationResult
  ): Promise<MissingInAuthorityRow[]> {
    const liveByNormalizedKey = new Map<string, MasterKeyRecord>();
    for (const record of await this.store.getMasterKeys()) {
      if (record.status === 'deprecated' || record.normalizedKey === null) continue;
      if (!liveByNormalizedKey.has(record.normalizedKey)) {
        liveByNormalizedKey.set(record.normalizedKey, record);
      }
    }

    const rows: MissingInAuthorityRow[] = [];
    for (const [normalizedKey, sources] of result.discrepancies.outOfAuthority) {
      const record = liveByNormalizedKey.get(normalizedKey);
      for (const source of sources) {
        rows.push({
          normalizedKey,
          system: source.system,
          rawKey: source.rawKey,
          masterKey: record?.masterKey ?? '-',
          strategy: record?.strategy ?? '-',
          status: record?.status ?? 'not_proposed',
          timestamp: result.timestamp,
        });
      }
    }
    return rows;
  }
}

function buildSummaryRows(result: ReconciliationResult): SummaryRow[] {
  const stats = result.stats.comparison;
  const summary = result.stats.discrepancies;
  const authority = result.comparison.authoritySystem;

  const metrics: Array<[string, string | number]> = [
    ['Run ID', result.runId],
    ['Total Unique Keys', stats.totalUniqueKeys],
    [`Keys in System ${authority}`, stats.keysInAuthority],
    [`Keys Only in ${authority} (Propagation Gaps)`, stats.keysOnlyInAuthority],
    [`Keys Missing in ${authority} (Out of Authority)`, stats.keysMissingInAuthority],
    ['Keys in All Systems', stats.keysInAllSystems],
    ['Overall Match Rate', formatters.percent(stats.matchPercentage)],
    ['Total Out of Authority Keys', summary.totalOutOfAuthority],
    ['Total Propagation Gaps', summary.totalPropagationGaps],
    ['Total Duplicate Groups', summary.totalDuplicateGroups],
  ];

  for (const system of Object.keys(stats.systemCounts).sort()) {
    if (system === authority) continue;
    metrics.push([`Keys in System ${system}`, stats.systemCounts[system] ?? 0]);
  }

  return metrics.map(([metric, value]) => ({ metric, value, timestamp: result.timestamp }));
}

function buildPropagationGapRows(result: ReconciliationResult): PropagationGapRow[] {
  const rows: PropagationGapRow[] = [];
  for (const [system, keys] of result.discrepancies.propagationGaps) {
    for (const normalizedKey of keys) {
      rows.push({
        system,
        normalizedKey,
        presentInAuthority: 'Yes',
        action: `Propagate from ${result.comparison.authoritySystem}`,
        timestamp: result.timestamp,
      });
    }
  }
  return rows;
}

function buildDuplicateRows(result: ReconciliationResult): DuplicateRow[] {
  const rows: DuplicateRow[] = [];
  for (const [system, groups] of result.discrepancies.duplicateGroups) {
    for (const [normalizedKey, rawKeys] of groups) {
      rows.push({
        system,
        normalizedKey,
        rawKeys: [...rawKeys].join('; '),
        count: rawKeys.size,
      });
    }
  }
  return rows;
}

/**
 * Deep copy with Sets as arrays and Maps as plain objects
 */
export function toSerializable(value: unknown): unknown {
  if (value instanceof Set) {
    return [...value].map(toSerializable);
  }
  if (value instanceof Map) {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      out[String(key)] = toSerializable(entry);
    }
    return out;
  }
  if (Array.isArray(value)) {
    return value.map(toSerializable);
  }
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      out[key] = toSerializable(entry);
    }
    return out;
  }
  return value;
}
