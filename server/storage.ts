import {
  type CloseRecordInput,
  type Evidence,
  type EvidencePhase,
  type EvidenceUpload,
  type InspectionRecord,
  type NewInspectionRecord,
  type RecordFilter,
  type RecordStatus,
  type ReopenRecordInput,
} from "@shared/schema";
import { openDatabase, type DatabaseHandle } from "./db";
import { EvidenceStore } from "./services/evidenceStore";
import { RecordRepository, type RecordRepositoryOptions } from "./services/recordRepository";
import { ensureSchema, type SchemaReport } from "./services/schemaManager";

export interface RecordSummary {
  total: number;
  byStatus: Record<RecordStatus, number>;
}

/**
 * Core API consumed by the HTTP shell. Every call is synchronous and either
 * completes or throws one of the errors in lib/errors.
 */
export interface IStorage {
  ensureSchema(): SchemaReport;

  createRecord(fields: NewInspectionRecord, evidence?: readonly EvidenceUpload[]): number;
  closeRecord(id: number, closure: CloseRecordInput, evidence?: readonly EvidenceUpload[]): InspectionRecord;
  reopenRecord(id: number, reopening: ReopenRecordInput, evidence?: readonly EvidenceUpload[]): InspectionRecord;
  listRecords(filter?: RecordFilter): InspectionRecord[];
  getRecord(id: number): InspectionRecord | undefined;
  getSummary(): RecordSummary;

  addEvidence(recordId: number, evidence: readonly EvidenceUpload[], phase: EvidencePhase): number[];
  listEvidence(recordId: number, phase: EvidencePhase): Evidence[];
  getEvidence(recordId: number, evidenceId: number): Evidence | undefined;
  countEvidence(recordId: number): Record<EvidencePhase, number>;

  close(): void;
}

export class SqliteStorage implements IStorage {
  private readonly evidence: EvidenceStore;
  private readonly records: RecordRepository;

  constructor(private readonly handle: DatabaseHandle, options: RecordRepositoryOptions = {}) {
    this.evidence = new EvidenceStore(handle);
    this.records = new RecordRepository(handle, this.evidence, options);
  }

  /** Open (or create) the database file and bring its schema up to date. */
  static open(path: string, options: RecordRepositoryOptions = {}): SqliteStorage {
    const storage = new SqliteStorage(openDatabase(path), options);
    try {
      storage.ensureSchema();
    } catch (error) {
      storage.close();
      throw error;
    }
    return storage;
  }

  ensureSchema(): SchemaReport {
    return ensureSchema(this.handle);
  }

  createRecord(fields: NewInspectionRecord, evidence: readonly EvidenceUpload[] = []): number {
    return this.records.create(fields, evidence);
  }

  closeRecord(id: number, closure: CloseRecordInput, evidence: readonly EvidenceUpload[] = []): InspectionRecord {
    return this.records.close(id, closure, evidence);
  }

  reopenRecord(id: number, reopening: ReopenRecordInput, evidence: readonly EvidenceUpload[] = []): InspectionRecord {
    return this.records.reopen(id, reopening, evidence);
  }

  listRecords(filter: RecordFilter = {}): InspectionRecord[] {
    return this.records.list(filter);
  }

  getRecord(id: number): InspectionRecord | undefined {
    return this.records.getById(id);
  }

  getSummary(): RecordSummary {
    const byStatus = this.records.countByStatus();
    const total = Object.values(byStatus).reduce((sum, count) => sum + count, 0);
    return { total, byStatus };
  }

  addEvidence(recordId: number, evidence: readonly EvidenceUpload[], phase: EvidencePhase): number[] {
    return this.evidence.add(recordId, evidence, phase);
  }

  listEvidence(recordId: number, phase: EvidencePhase): Evidence[] {
    return this.evidence.list(recordId, phase);
  }

  getEvidence(recordId: number, evidenceId: number): Evidence | undefined {
    return this.evidence.get(recordId, evidenceId);
  }

  countEvidence(recordId: number): Record<EvidencePhase, number> {
    return this.evidence.countByPhase(recordId);
  }

  close(): void {
    this.handle.close();
  }
}
