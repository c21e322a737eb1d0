import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import * as path from 'path';
import { config } from '../config/index.js';
import {
    EnrichmentOrchestrator,
    EnrichmentProgress,
    EnrichmentSummary,
} from '../annotation/enrichment-orchestrator.js';
import { writePatientBatch, WriteSummary } from '../db/batch-writer.js';
import { closeSession, openSession } from '../db/client.js';
import { compareWithStored, findVariant } from '../db/variant-store.js';
import { describeError } from '../errors.js';
import { isSupportedVariantFile, readVariantFile } from '../parser/variant-file-reader.js';
import { createLogger, Logger } from '../utils/logger.js';
import { normalizeRows } from '../variant/normalizer.js';

export type IngestionStatus = 'ingested' | 'skipped' | 'failed';

export interface IngestionReport {
    patientName: string;
    filePath: string;
    status: IngestionStatus;
    rowCount: number;
    enrichment?: EnrichmentSummary;
    write?: WriteSummary;
    error?: string;
}

export interface IngestionDriverOptions {
    databasePath?: string;
    busyTimeoutMs?: number;
    orchestrator?: EnrichmentOrchestrator;
    logger?: Logger;
}

/**
 * One file is one batch is one patient. Each batch gets its own session,
 * released on every exit path.
 *
 * Events: `start` (filePath), `rows` ({ patientName, total }), `progress`
 * (EnrichmentProgress), `skipped` (report), `complete` (report).
 */
export class IngestionDriver extends EventEmitter {
    private readonly databasePath: string;
    private readonly busyTimeoutMs: number;
    private readonly orchestrator: EnrichmentOrchestrator;
    private readonly logger: Logger;

    constructor(options: IngestionDriverOptions = {}) {
        super();
        this.databasePath = options.databasePath ?? config.database.path;
        this.busyTimeoutMs = options.busyTimeoutMs ?? config.database.busyTimeoutMs;
        this.orchestrator = options.orchestrator ?? new EnrichmentOrchestrator();
        this.logger = options.logger ?? createLogger('ingest');

        this.orchestrator.on('progress', (progress: EnrichmentProgress) => {
            this.emit('progress', progress);
        });
    }

    /**
     * Read, normalize, enrich and store one patient file. Storage failures
     * roll the batch back and are rethrown.
     */
    async ingestFile(filePath: string): Promise<IngestionReport> {
        this.emit('start', filePath);

        const batch = await readVariantFile(filePath);
        const rows = normalizeRows(batch.rows);
        this.logger.info(`Loaded ${path.basename(filePath)}: ${rows.length} variants for patient '${batch.patientName}'`);
        this.emit('rows', { patientName: batch.patientName, total: rows.length });

        const session = openSession({ path: this.databasePath, busyTimeoutMs: this.busyTimeoutMs });
        try {
            const keys = rows.map(row => row.id ?? '');
            const comparison = compareWithStored(session, batch.patientName, keys);

            if (comparison.exists && comparison.identical) {
                const report: IngestionReport = {
                    patientName: batch.patientName,
                    filePath,
                    status: 'skipped',
                    rowCount: rows.length,
                };
                this.logger.info(`Upload for '${batch.patientName}' skipped: identical variants already stored`);
                this.emit('skipped', report);
                return report;
            }

            if (comparison.exists) {
                this.logger.info(
                    `Patient '${batch.patientName}' already stored: ${comparison.added.length} new variants, ` +
                        `${comparison.removed.length} stored variants absent from this file`
                );
            }

            const enrichment = await this.orchestrator.enrichBatch(rows, vcfForm => findVariant(session, vcfForm));
            const write = writePatientBatch(session, batch.patientName, enrichment.rows);

            this.logger.info(
                `Inserted ${write.rowsWritten} variants for patient '${batch.patientName}' ` +
                    `(${write.variantsCreated} new, ${write.variantsFilled} filled, ${write.linksCreated} links)`
            );

            const report: IngestionReport = {
                patientName: batch.patientName,
                filePath,
                status: 'ingested',
                rowCount: rows.length,
                enrichment: enrichment.summary,
                write,
            };
            this.emit('complete', report);
            return report;
        } finally {
            closeSession(session);
        }
    }

    /**
     * Ingest every supported file in a directory. Each file commits or rolls
     * back on its own; a failed file is reported and the rest continue.
     */
    async ingestDirectory(directory: string = config.uploads.folder): Promise<IngestionReport[]> {
        this.logger.info(`Loading data from: ${directory}`);

        const entries = await fs.readdir(directory, { withFileTypes: true });
        const files = entries
            .filter(entry => entry.isFile() && isSupportedVariantFile(entry.name))
            .map(entry => path.join(directory, entry.name))
            .sort();

        const reports: IngestionReport[] = [];
        for (const file of files) {
            try {
                reports.push(await this.ingestFile(file));
            } catch (error) {
                this.logger.error(`Data extraction failed for ${path.basename(file)}: ${describeError(error)}`);
                reports.push({
                    patientName: path.basename(file, path.extname(file)),
                    filePath: file,
                    status: 'failed',
                    rowCount: 0,
                    error: describeError(error),
                });
            }
        }
        return reports;
    }
}
