/**
 * SQLite session management
 *
 * A session is one better-sqlite3 connection scoped to a single ingestion
 * batch. It is opened by the ingestion driver and closed on every exit path.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { config } from '../config/index.js';
import { ErrorCode, StorageError, describeError } from '../errors.js';

export type Session = Database.Database;

export interface SessionConfig {
    path?: string;
    busyTimeoutMs?: number;
    readonly?: boolean;
    /** Create the tables when missing (default true). */
    initialize?: boolean;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS patients (
    name VARCHAR(100) PRIMARY KEY
);

CREATE TABLE IF NOT EXISTS genes (
    gene_symbol VARCHAR(30) PRIMARY KEY,
    gene_url VARCHAR(500)
);

CREATE TABLE IF NOT EXISTS variants (
    vcf_form VARCHAR(100) PRIMARY KEY,
    hgvs VARCHAR(100),
    clinvar_id VARCHAR(20),
    gene_symbol VARCHAR(30) REFERENCES genes(gene_symbol),
    classification VARCHAR(100),
    cdna_change VARCHAR(100),
    clinvar_accession VARCHAR(30),
    num_records VARCHAR(10),
    review_status VARCHAR(100),
    associated_condition VARCHAR(200),
    clinvar_url VARCHAR(500)
);

CREATE TABLE IF NOT EXISTS patient_variant (
    patient_name VARCHAR(100) NOT NULL REFERENCES patients(name),
    variant_vcf_form VARCHAR(100) NOT NULL REFERENCES variants(vcf_form),
    PRIMARY KEY (patient_name, variant_vcf_form)
);

CREATE INDEX IF NOT EXISTS idx_variants_gene_symbol ON variants(gene_symbol);
CREATE INDEX IF NOT EXISTS idx_patient_variant_variant ON patient_variant(variant_vcf_form);
`;

/**
 * Open a connection with foreign keys enforced.
 */
export function openSession(sessionConfig: SessionConfig = {}): Session {
    const dbPath = sessionConfig.path ?? config.database.path;

    if (dbPath !== ':memory:' && !sessionConfig.readonly) {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    let session: Session;
    try {
        session = new Database(dbPath, {
            readonly: sessionConfig.readonly ?? false,
            timeout: sessionConfig.busyTimeoutMs ?? config.database.busyTimeoutMs,
        });
    } catch (error) {
        throw new StorageError(`Unable to open database at ${dbPath}: ${describeError(error)}`, ErrorCode.STORAGE_FAILED, {
            path: dbPath,
        });
    }

    if (dbPath !== ':memory:' && !sessionConfig.readonly) {
        session.pragma('journal_mode = WAL');
    }
    session.pragma('foreign_keys = ON');
    assertForeignKeys(session);

    if (sessionConfig.initialize ?? true) {
        if (!sessionConfig.readonly) {
            initializeSchema(session);
        }
    }

    return session;
}

export function initializeSchema(session: Session): void {
    session.exec(SCHEMA);
}

/**
 * Foreign-key enforcement is per connection; check it before a session is trusted with a batch.
 */
export function assertForeignKeys(session: Session): void {
    const enabled = session.pragma('foreign_keys', { simple: true });
    if (enabled !== 1) {
        throw new StorageError('Foreign key enforcement is not active on this session', ErrorCode.FOREIGN_KEYS_DISABLED);
    }
}

export function closeSession(session: Session): void {
    if (session.open) {
        session.close();
    }
}

/**
 * Open a session, run `fn`, and always close it.
 */
export async function withSession<T>(
    sessionConfig: SessionConfig,
    fn: (session: Session) => Promise<T> | T
): Promise<T> {
    const session = openSession(sessionConfig);
    try {
        return await fn(session);
    } finally {
        closeSession(session);
    }
}
