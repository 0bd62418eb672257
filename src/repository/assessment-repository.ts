/**
 * Assessment Repository for the Control Coverage Engine
 * Stores assessment records with optimistic versioning, per-assessment
 * mutual exclusion and the history of replaced coverage snapshots
 */

import { AssessmentRecord, CoverageSnapshot } from '../types/index.js';
import { ConcurrencyConflictError, NotFoundError, ValidationError } from '../types/index.js';

/**
 * Interface for the Assessment Repository
 */
export interface IAssessmentRepository {
  // Records
  create(record: AssessmentRecord): AssessmentRecord;
  get(assessmentId: string): AssessmentRecord | undefined;
  list(): AssessmentRecord[];
  save(record: AssessmentRecord, expectedVersion: number): AssessmentRecord;
  delete(assessmentId: string): boolean;

  // Serialization of read-modify-write cycles
  withLock<T>(assessmentId: string, fn: () => Promise<T>): Promise<T>;

  // Run history
  appendHistory(assessmentId: string, snapshot: CoverageSnapshot): void;
  getHistory(assessmentId: string): CoverageSnapshot[];
}

/**
 * In-memory implementation of the Assessment Repository.
 * Records are copied on the way in and out so callers never share state
 * with the store.
 */
export class InMemoryAssessmentRepository implements IAssessmentRepository {
  private records: Map<string, AssessmentRecord> = new Map();
  private history: Map<string, CoverageSnapshot[]> = new Map();
  private locks: Map<string, Promise<void>> = new Map();

  // ==================== Records ====================

  create(record: AssessmentRecord): AssessmentRecord {
    if (this.records.has(record.assessmentId)) {
      throw new ValidationError(`Assessment ${record.assessmentId} already exists`, 'INVALID_INPUT', {
        assessmentId: record.assessmentId,
      });
    }
    const stored = structuredClone(record);
    this.records.set(stored.assessmentId, stored);
    return structuredClone(stored);
  }

  get(assessmentId: string): AssessmentRecord | undefined {
    const record = this.records.get(assessmentId);
    return record ? structuredClone(record) : undefined;
  }

  list(): AssessmentRecord[] {
    return [...this.records.values()].map(record => structuredClone(record));
  }

  /**
   * Writes the record if the stored version still equals expectedVersion.
   * The returned copy carries the bumped version.
   */
  save(record: AssessmentRecord, expectedVersion: number): AssessmentRecord {
    const current = this.records.get(record.assessmentId);
    if (!current) {
      throw new NotFoundError(`Assessment not found: ${record.assessmentId}`, { assessmentId: record.assessmentId });
    }
    if (current.version !== expectedVersion) {
      throw new ConcurrencyConflictError(record.assessmentId, expectedVersion, current.version);
    }

    const stored: AssessmentRecord = {
      ...structuredClone(record),
      version: current.version + 1,
      updatedAt: new Date(),
    };
    this.records.set(stored.assessmentId, stored);
    return structuredClone(stored);
  }

  delete(assessmentId: string): boolean {
    this.history.delete(assessmentId);
    return this.records.delete(assessmentId);
  }

  // ==================== Locking ====================

  /**
   * Runs fn after every earlier holder of the same assessment's lock has
   * finished. Different assessments never wait on each other.
   */
  async withLock<T>(assessmentId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(assessmentId) ?? Promise.resolve();
    const run = previous.then(fn);
    // The chain only tracks completion; the caller receives run's outcome
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(assessmentId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(assessmentId) === tail) {
        this.locks.delete(assessmentId);
      }
    }
  }

  // ==================== History ====================

  appendHistory(assessmentId: string, snapshot: CoverageSnapshot): void {
    if (!this.records.has(assessmentId)) {
      throw new NotFoundError(`Assessment not found: ${assessmentId}`, { assessmentId });
    }
    const entries = this.history.get(assessmentId) ?? [];
    entries.push(structuredClone(snapshot));
    this.history.set(assessmentId, entries);
  }

  getHistory(assessmentId: string): CoverageSnapshot[] {
    return (this.history.get(assessmentId) ?? []).map(snapshot => structuredClone(snapshot));
  }
}
