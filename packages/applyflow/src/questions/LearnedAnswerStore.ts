/**
 * LearnedAnswerStore — SQLite-backed bank of answers the engine has
 * produced before, keyed by normalized question text.
 *
 * Lookups reuse an entry when the question matches exactly after
 * normalization, or when Jaccard similarity against a stored question
 * reaches the reuse threshold. Upserting a question that is already
 * present (exactly or near-duplicate) replaces its answer and job context
 * and bumps its usage stats.
 *
 * The database runs in-process on sql.js. A file-backed bank is read once
 * on open and written back after every change; queries are synchronous
 * once the store is open.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import sqlJs from 'sql.js';
import type { Database } from 'sql.js';
import { z } from 'zod';
import { getEnv } from '../config/env.js';
import { MATCHING_THRESHOLDS } from '../config/matching.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import { fingerprint, jaccard, normalizeText } from './similarity.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface LearnedEntry {
  id: number;
  question: string;
  questionNormalized: string;
  answer: string;
  jobTitle: string | null;
  company: string | null;
  jobContext: string | null;
  createdAt: Date;
  lastUsed: Date;
  timesUsed: number;
  successCount: number;
  similarityHash: string;
}

export interface LearnedMatch {
  entry: LearnedEntry;
  /** 1.0 for an exact normalized match, Jaccard similarity otherwise */
  score: number;
}

export interface UpsertContext {
  jobTitle?: string;
  company?: string;
  /** Free-text context the answer was produced for */
  jobContext?: string;
}

export interface LearnedAnswerStoreOptions {
  /** File path, or ':memory:'. Defaults to APPLYFLOW_QUESTION_DB. */
  dbPath?: string;
  /** Similarity at or above which an upsert merges into an existing entry */
  mergeThreshold?: number;
  now?: () => Date;
  logger?: Logger;
}

type SqlParam = string | number | null;

const MEMORY = ':memory:';

const QuestionRowSchema = z.object({
  id: z.number(),
  question: z.string(),
  question_normalized: z.string(),
  answer: z.string(),
  job_title: z.string().nullable(),
  company: z.string().nullable(),
  job_context: z.string().nullable(),
  created_at: z.string(),
  last_used: z.string(),
  times_used: z.number(),
  success_count: z.number(),
  similarity_hash: z.string(),
});

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS question_bank (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    question TEXT NOT NULL,
    question_normalized TEXT NOT NULL UNIQUE,
    answer TEXT NOT NULL,
    job_title TEXT,
    company TEXT,
    job_context TEXT,
    created_at TEXT NOT NULL,
    last_used TEXT NOT NULL,
    times_used INTEGER NOT NULL DEFAULT 1,
    success_count INTEGER NOT NULL DEFAULT 0,
    similarity_hash TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_question_bank_similarity_hash ON question_bank (similarity_hash);
`;

function toEntry(raw: unknown): LearnedEntry {
  const row = QuestionRowSchema.parse(raw);
  return {
    id: row.id,
    question: row.question,
    questionNormalized: row.question_normalized,
    answer: row.answer,
    jobTitle: row.job_title,
    company: row.company,
    jobContext: row.job_context,
    createdAt: new Date(row.created_at),
    lastUsed: new Date(row.last_used),
    timesUsed: row.times_used,
    successCount: row.success_count,
    similarityHash: row.similarity_hash,
  };
}

// ── LearnedAnswerStore ───────────────────────────────────────────────────

export class LearnedAnswerStore {
  readonly dbPath: string;
  private db: Database;
  private mergeThreshold: number;
  private now: () => Date;
  private logger: Logger;
  private closed = false;

  /** Load (or create) the question bank and its schema. */
  static async open(opts: LearnedAnswerStoreOptions = {}): Promise<LearnedAnswerStore> {
    const dbPath = opts.dbPath ?? getEnv().APPLYFLOW_QUESTION_DB;
    // sql.js is CommonJS and exposes its loader on `default` as well
    const SQL = await sqlJs.default();

    let db: Database;
    if (dbPath === MEMORY) {
      db = new SQL.Database();
    } else {
      mkdirSync(dirname(dbPath), { recursive: true });
      db = existsSync(dbPath) ? new SQL.Database(readFileSync(dbPath)) : new SQL.Database();
    }
    return new LearnedAnswerStore(db, dbPath, opts);
  }

  private constructor(db: Database, dbPath: string, opts: LearnedAnswerStoreOptions) {
    this.db = db;
    this.dbPath = dbPath;
    this.mergeThreshold = opts.mergeThreshold ?? MATCHING_THRESHOLDS.learnedMerge;
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? getLogger().child({ component: 'LearnedAnswerStore' });

    this.db.exec(SCHEMA);
    this.persist();
    this.logger.debug('Question bank opened', { dbPath: this.dbPath, entries: this.count() });
  }

  /**
   * Best stored entry for a question regardless of threshold, or null when
   * the bank is empty or nothing shares a token with the question.
   * Among equal scores the most used, then most recently used, entry wins.
   */
  findBestMatch(question: string): LearnedMatch | null {
    const normalized = normalizeText(question);
    if (!normalized) return null;

    const [exact] = this.select('SELECT * FROM question_bank WHERE question_normalized = ?', [normalized]);
    if (exact) return { entry: exact, score: 1.0 };

    const entries = this.select('SELECT * FROM question_bank ORDER BY times_used DESC, last_used DESC');

    let best: LearnedMatch | null = null;
    for (const entry of entries) {
      const score = jaccard(normalized, entry.questionNormalized);
      if (score > 0 && (!best || score > best.score)) {
        best = { entry, score };
      }
    }
    return best;
  }

  /** Reusable entry for the question, or null below `minScore`. */
  lookup(question: string, minScore: number = MATCHING_THRESHOLDS.learnedReuse): LearnedEntry | null {
    const match = this.findBestMatch(question);
    if (!match || match.score < minScore) return null;
    return match.entry;
  }

  /**
   * Record an answer. A question already in the bank (exact, or at or
   * above the merge threshold) takes the new answer and context in place
   * and has its usage bumped; its original wording is kept.
   */
  upsert(question: string, answer: string, context: UpsertContext = {}): LearnedEntry {
    const normalized = normalizeText(question);
    if (!normalized) throw new Error('Cannot store an answer for an empty question');
    if (answer.trim() === '') throw new Error('Cannot store an empty answer');

    const jobTitle = context.jobTitle ?? null;
    const company = context.company ?? null;
    const jobContext = context.jobContext ?? null;
    const timestamp = this.now().toISOString();

    const existing = this.findBestMatch(question);
    if (existing && existing.score >= this.mergeThreshold) {
      const { id } = existing.entry;
      this.db.run(
        `UPDATE question_bank
            SET answer = ?, job_title = ?, company = ?, job_context = ?,
                last_used = ?, times_used = times_used + 1
          WHERE id = ?`,
        [answer, jobTitle, company, jobContext, timestamp, id],
      );
      this.persist();
      this.logger.debug('Updated existing learned answer', { id, score: existing.score });
      return this.getOrThrow(id);
    }

    this.db.run(
      `INSERT INTO question_bank
         (question, question_normalized, answer, job_title, company, job_context,
          created_at, last_used, times_used, success_count, similarity_hash)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1, 0, ?)`,
      [question, normalized, answer, jobTitle, company, jobContext, timestamp, timestamp, fingerprint(normalized)],
    );
    const id = this.scalar('SELECT last_insert_rowid()');
    this.persist();

    this.logger.info('Stored new learned answer', { id, question });
    return this.getOrThrow(id);
  }

  /** Increment times_used and refresh last_used. No-op for unknown ids. */
  recordUsage(id: number): void {
    this.db.run('UPDATE question_bank SET times_used = times_used + 1, last_used = ? WHERE id = ?', [
      this.now().toISOString(),
      id,
    ]);
    this.persist();
  }

  /** Count an application that went through with this answer. */
  recordSuccess(id: number): void {
    this.db.run('UPDATE question_bank SET success_count = success_count + 1 WHERE id = ?', [id]);
    this.persist();
  }

  get(id: number): LearnedEntry | null {
    const [entry] = this.select('SELECT * FROM question_bank WHERE id = ?', [id]);
    return entry ?? null;
  }

  /** Most used entries first. */
  list(limit = 100): LearnedEntry[] {
    return this.select('SELECT * FROM question_bank ORDER BY times_used DESC, last_used DESC, id ASC LIMIT ?', [
      limit,
    ]);
  }

  count(): number {
    return this.scalar('SELECT COUNT(*) FROM question_bank');
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private select(sql: string, params: SqlParam[] = []): LearnedEntry[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const entries: LearnedEntry[] = [];
      while (stmt.step()) {
        entries.push(toEntry(stmt.getAsObject()));
      }
      return entries;
    } finally {
      stmt.free();
    }
  }

  private scalar(sql: string): number {
    const stmt = this.db.prepare(sql);
    try {
      const [value] = stmt.step() ? stmt.get() : [];
      return typeof value === 'number' ? value : 0;
    } finally {
      stmt.free();
    }
  }

  private persist(): void {
    if (this.dbPath === MEMORY) return;
    writeFileSync(this.dbPath, this.db.export());
  }

  private getOrThrow(id: number): LearnedEntry {
    const entry = this.get(id);
    if (!entry) throw new Error(`Learned answer ${id} disappeared after write`);
    return entry;
  }
}
