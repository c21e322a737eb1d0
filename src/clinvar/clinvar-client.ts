import { z } from 'zod';
import { config } from '../config/index.js';
import {
    ClinVarIdFormatError,
    ClinVarIdNotFoundError,
    HgvsFormatError,
    ServiceConnectionError,
} from '../errors.js';
import {
    extractField,
    FieldResult,
    isRecord,
    mapField,
    nonEmptyString,
    valueOrNotAvailable,
} from '../annotation/field-extraction.js';
import { FetchLike, getJson } from '../utils/http.js';
import { createLogger, Logger } from '../utils/logger.js';
import { RequestThrottle } from '../utils/throttle.js';

const SERVICE_NAME = 'NCBI ClinVar';
const EXAMPLE_HGVS = 'NM_001377265.1:c.841G>T';
export const CLINVAR_VARIATION_URL = 'https://www.ncbi.nlm.nih.gov/clinvar/variation';

/**
 * Clinical annotation bundle; keys match the `variants` columns.
 */
export interface ClinVarAnnotation {
    gene_symbol: string;
    cdna_change: string;
    clinvar_id: string;
    clinvar_accession: string;
    classification: string;
    num_records: string;
    review_status: string;
    associated_condition: string;
    clinvar_url: string;
}

/**
 * One ESummary document, left untyped until field extraction.
 */
export type ClinVarDocument = Record<string, unknown>;

export interface ClinVarClientOptions {
    baseUrl?: string;
    email?: string;
    apiKey?: string;
    tool?: string;
    timeoutMs?: number;
    throttleMs?: number;
    throttle?: RequestThrottle;
    fetchImpl?: FetchLike;
    logger?: Logger;
}

const esearchResponseSchema = z.object({
    esearchresult: z.object({
        idlist: z.array(z.string()),
    }),
});

export function assertTranscriptHgvs(hgvs: string): void {
    if (!(hgvs.startsWith('NM_') && hgvs.includes(':') && hgvs.includes('c.'))) {
        throw new HgvsFormatError(
            `Invalid HGVS format: '${hgvs}'. Expected transcript HGVS e.g. '${EXAMPLE_HGVS}'.`,
            { hgvs }
        );
    }
}

export function clinVarRecordUrl(clinvarId: string): string {
    return `${CLINVAR_VARIATION_URL}/${clinvarId}`;
}

/**
 * NCBI E-utilities client for ClinVar: ESearch resolves an HGVS string to a
 * variation id, ESummary returns the record document.
 */
export class ClinVarClient {
    private readonly baseUrl: string;
    private readonly email?: string;
    private readonly apiKey?: string;
    private readonly tool: string;
    private readonly timeoutMs: number;
    private readonly throttle: RequestThrottle;
    private readonly fetchImpl: FetchLike;
    private readonly logger: Logger;

    constructor(options: ClinVarClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? config.services.eutilsUrl).replace(/\/+$/, '');
        this.email = options.email ?? config.services.entrezEmail;
        this.apiKey = options.apiKey ?? config.services.ncbiApiKey;
        this.tool = options.tool ?? 'variant-annotator';
        this.timeoutMs = options.timeoutMs ?? config.services.requestTimeoutMs;
        this.throttle = options.throttle ?? new RequestThrottle(options.throttleMs ?? config.services.throttleMs);
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.logger = options.logger ?? createLogger('clinvar');
    }

    /**
     * Step one: HGVS transcript string to ClinVar variation id.
     */
    async searchClinVarId(hgvs: string): Promise<string> {
        assertTranscriptHgvs(hgvs);

        this.logger.debug(`Fetching ClinVar ID for ${hgvs}`);
        const response = await this.request('esearch.fcgi', { term: hgvs });

        const parsed = esearchResponseSchema.safeParse(response);
        if (!parsed.success) {
            throw new ServiceConnectionError(SERVICE_NAME, 'ClinVar ESearch response did not contain an id list', { hgvs });
        }

        const [clinvarId] = parsed.data.esearchresult.idlist;
        if (!clinvarId) {
            this.logger.warn(`No ClinVar ID found for variant '${hgvs}'`);
            throw new ClinVarIdNotFoundError(hgvs);
        }
        return clinvarId;
    }

    /**
     * Step two: the ESummary document for a variation id.
     */
    async fetchSummary(clinvarId: string): Promise<ClinVarDocument> {
        if (!/^\d+$/.test(clinvarId)) {
            throw new ClinVarIdFormatError(`Invalid ClinVar ID '${clinvarId}': expected a numeric variation id`, {
                clinvarId,
            });
        }

        this.logger.debug(`Fetching ClinVar ESummary for ${clinvarId}`);
        const response = await this.request('esummary.fcgi', { id: clinvarId });

        const result = isRecord(response) ? response.result : undefined;
        const document = isRecord(result) ? result[clinvarId] : undefined;
        if (!isRecord(document)) {
            throw new ServiceConnectionError(
                SERVICE_NAME,
                `ClinVar ESummary response did not contain a document for ${clinvarId}`,
                { clinvarId }
            );
        }
        return document;
    }

    /**
     * Pull the annotation fields out of a summary document. Each field is
     * independent: one missing or malformed field becomes N/A on its own.
     */
    extractAnnotation(clinvarId: string, document: ClinVarDocument): ClinVarAnnotation {
        const fields: Record<string, FieldResult<string>> = {
            gene_symbol: extractField(document, ['genes', 0, 'symbol'], nonEmptyString),
            cdna_change: extractField(document, ['variation_set', 0, 'cdna_change'], nonEmptyString),
            clinvar_accession: extractField(document, ['accession'], nonEmptyString),
            classification: extractField(document, ['germline_classification', 'description'], nonEmptyString),
            num_records: mapField(
                extractField(document, ['supporting_submissions', 'scv'], z.array(z.unknown())),
                submissions => String(submissions.length)
            ),
            review_status: extractField(document, ['germline_classification', 'review_status'], nonEmptyString),
            associated_condition: extractField(
                document,
                ['germline_classification', 'trait_set', 0, 'trait_name'],
                nonEmptyString
            ),
        };

        for (const [field, result] of Object.entries(fields)) {
            if (result.status === 'absent') {
                this.logger.warn(`${field} not found in ClinVar ESummary for ${clinvarId}`);
            } else if (result.status === 'malformed') {
                this.logger.warn(`${field} malformed in ClinVar ESummary for ${clinvarId}: ${result.reason}`);
            }
        }

        return {
            gene_symbol: valueOrNotAvailable(fields.gene_symbol),
            cdna_change: valueOrNotAvailable(fields.cdna_change),
            clinvar_id: clinvarId,
            clinvar_accession: valueOrNotAvailable(fields.clinvar_accession),
            classification: valueOrNotAvailable(fields.classification),
            num_records: valueOrNotAvailable(fields.num_records),
            review_status: valueOrNotAvailable(fields.review_status),
            associated_condition: valueOrNotAvailable(fields.associated_condition),
            clinvar_url: clinVarRecordUrl(clinvarId),
        };
    }

    /**
     * Summary and extraction for an id that is already known.
     */
    async fetchAnnotationForId(clinvarId: string): Promise<ClinVarAnnotation> {
        const document = await this.fetchSummary(clinvarId);
        return this.extractAnnotation(clinvarId, document);
    }

    /**
     * Both steps in sequence for an HGVS transcript string.
     */
    async fetchAnnotation(hgvs: string): Promise<ClinVarAnnotation> {
        assertTranscriptHgvs(hgvs);
        this.logger.info(`Fetching ClinVar annotation for ${hgvs}`);
        const clinvarId = await this.searchClinVarId(hgvs);
        return this.fetchAnnotationForId(clinvarId);
    }

    getRequestCount(): number {
        return this.throttle.getRequestCount();
    }

    private async request(endpoint: string, params: Record<string, string>): Promise<unknown> {
        const query = new URLSearchParams({ db: 'clinvar', retmode: 'json', ...params, tool: this.tool });
        if (this.email) query.set('email', this.email);
        if (this.apiKey) query.set('api_key', this.apiKey);

        return getJson(`${this.baseUrl}/${endpoint}?${query.toString()}`, {
            service: SERVICE_NAME,
            timeoutMs: this.timeoutMs,
            throttle: this.throttle,
            fetchImpl: this.fetchImpl,
        });
    }
}
