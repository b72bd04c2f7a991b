import { randomUUID } from 'crypto';

import type { Sentiment, WorkflowStatus } from '../../types/index.js';
import type { WorkflowState } from '../../core/pipeline/state.js';

/**
 * A persisted analysis. Fields a run never reached are null.
 */
export interface AnalysisRecord {
  id: string;
  videoUrl: string;
  createdAt: string;
  updatedAt: string;
  title: string | null;
  durationSeconds: number | null;
  languageCode: string | null;
  transcript: string | null;
  sentiment: Sentiment | null;
  sentimentScore: number | null;
  tone: string | null;
  keyPoints: string[] | null;
  errors: string[];
  status: WorkflowStatus;
}

export interface AnalysisPage {
  count: number;
  page: number;
  totalPages: number;
  results: AnalysisRecord[];
}

/**
 * Storage for terminal workflow states
 */
export interface AnalysisRepository {
  /** Persist a finished run */
  save(state: WorkflowState): Promise<AnalysisRecord>;
  /** Persist a request that never produced a workflow state */
  saveFailure(videoUrl: string, errors: string[]): Promise<AnalysisRecord>;
  get(id: string): Promise<AnalysisRecord | undefined>;
  /** Newest first; `page` starts at 1 */
  list(page: number, pageSize: number): Promise<AnalysisPage>;
  count(): Promise<number>;
}

/**
 * In-memory analysis store, newest record first.
 */
export class InMemoryAnalysisStore implements AnalysisRepository {
  private records: Map<string, AnalysisRecord> = new Map();
  private order: string[] = [];

  async save(state: WorkflowState): Promise<AnalysisRecord> {
    return this.insert({
      videoUrl: state.videoUrl,
      title: state.title ?? null,
      durationSeconds: state.durationSeconds ?? null,
      languageCode: state.languageCode ?? null,
      transcript: state.transcript ?? null,
      sentiment: state.sentiment ?? null,
      sentimentScore: state.sentimentScore ?? null,
      tone: state.tone ?? null,
      keyPoints: state.keyPoints ? [...state.keyPoints] : null,
      errors: [...state.errors],
      status: state.status,
    });
  }

  async saveFailure(videoUrl: string, errors: string[]): Promise<AnalysisRecord> {
    return this.insert({
      videoUrl,
      title: null,
      durationSeconds: null,
      languageCode: null,
      transcript: null,
      sentiment: null,
      sentimentScore: null,
      tone: null,
      keyPoints: null,
      errors: [...errors],
      status: 'failed',
    });
  }

  async get(id: string): Promise<AnalysisRecord | undefined> {
    const record = this.records.get(id);
    return record ? copyRecord(record) : undefined;
  }

  async list(page: number, pageSize: number): Promise<AnalysisPage> {
    const count = this.order.length;
    const totalPages = Math.max(1, Math.ceil(count / pageSize));
    const start = (page - 1) * pageSize;
    const results = this.order
      .slice(start, start + pageSize)
      .map((id) => this.records.get(id))
      .filter((record): record is AnalysisRecord => record !== undefined)
      .map(copyRecord);

    return { count, page, totalPages, results };
  }

  async count(): Promise<number> {
    return this.order.length;
  }

  clear(): void {
    this.records.clear();
    this.order = [];
  }

  private insert(fields: Omit<AnalysisRecord, 'id' | 'createdAt' | 'updatedAt'>): AnalysisRecord {
    const now = new Date().toISOString();
    const record: AnalysisRecord = { id: randomUUID(), createdAt: now, updatedAt: now, ...fields };
    this.records.set(record.id, record);
    this.order.unshift(record.id);
    return copyRecord(record);
  }
}

function copyRecord(record: AnalysisRecord): AnalysisRecord {
  return {
    ...record,
    keyPoints: record.keyPoints ? [...record.keyPoints] : null,
    errors: [...record.errors],
  };
}

// Singleton instance
let store: InMemoryAnalysisStore | null = null;

export function getAnalysisStore(): InMemoryAnalysisStore {
  if (!store) {
    store = new InMemoryAnalysisStore();
  }
  return store;
}

/**
 * Reset singleton (for testing)
 */
export function resetAnalysisStore(): void {
  store = null;
}
