import { z } from 'zod';
import { config } from '../config/index.js';
import { TranscriptNotFoundError } from '../errors.js';
import { FetchLike, getJson } from '../utils/http.js';
import { createLogger, Logger } from '../utils/logger.js';
import { RequestThrottle } from '../utils/throttle.js';
import { validateVcfForm } from '../variant/normalizer.js';
import { extractField, FieldResult, isRecord, mapField, nonEmptyString, valueOrNotAvailable } from './field-extraction.js';

const SERVICE_NAME = 'VariantValidator';
const CDNA_MARKER = ':c.';
const RESPONSE_METADATA_KEYS: ReadonlySet<string> = new Set(['flag', 'metadata']);

export interface HgvsResolution {
    vcf_form: string;
    /** Transcript-level HGVS, e.g. NM_001377265.1:c.841G>T */
    hgvs: string;
    hgnc_id: string;
    omim_id: string;
    gene_symbol: string;
}

export interface HgvsResolverOptions {
    baseUrl?: string;
    genomeBuild?: string;
    transcriptSelection?: string;
    timeoutMs?: number;
    throttleMs?: number;
    throttle?: RequestThrottle;
    fetchImpl?: FetchLike;
    logger?: Logger;
}

/**
 * Maps genomic coordinates to MANE Select transcript nomenclature via the
 * VariantValidator REST API.
 */
export class HgvsResolver {
    private readonly baseUrl: string;
    private readonly genomeBuild: string;
    private readonly transcriptSelection: string;
    private readonly timeoutMs: number;
    private readonly throttle: RequestThrottle;
    private readonly fetchImpl: FetchLike;
    private readonly logger: Logger;

    constructor(options: HgvsResolverOptions = {}) {
        this.baseUrl = (options.baseUrl ?? config.services.variantValidatorUrl).replace(/\/+$/, '');
        this.genomeBuild = options.genomeBuild ?? 'GRCh38';
        this.transcriptSelection = options.transcriptSelection ?? 'mane_select';
        this.timeoutMs = options.timeoutMs ?? config.services.requestTimeoutMs;
        this.throttle = options.throttle ?? new RequestThrottle(options.throttleMs ?? config.services.throttleMs);
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.logger = options.logger ?? createLogger('variant-validator');
    }

    /**
     * Resolve a `CHROM:POS:REF:ALT` key. Invalid keys are rejected before any request is made.
     */
    async resolve(vcfForm: string): Promise<HgvsResolution> {
        validateVcfForm(vcfForm);

        this.logger.debug(`Resolving HGVS for ${vcfForm}`);
        const response = await getJson(this.buildUrl(vcfForm), {
            service: SERVICE_NAME,
            timeoutMs: this.timeoutMs,
            throttle: this.throttle,
            fetchImpl: this.fetchImpl,
        });

        const transcriptKey = this.findTranscriptKey(response);
        if (!transcriptKey || !isRecord(response)) {
            throw new TranscriptNotFoundError(vcfForm);
        }

        const record = response[transcriptKey];
        const hgncId = extractField(record, ['gene_ids', 'hgnc_id'], nonEmptyString);
        const omimId = this.firstOmimId(record);
        const geneSymbol = extractField(record, ['gene_symbol'], nonEmptyString);

        this.warnIfMissing(vcfForm, { 'HGNC ID': hgncId, 'OMIM ID': omimId, 'gene symbol': geneSymbol });

        return {
            vcf_form: vcfForm,
            hgvs: transcriptKey,
            hgnc_id: valueOrNotAvailable(hgncId),
            omim_id: valueOrNotAvailable(omimId),
            gene_symbol: valueOrNotAvailable(geneSymbol),
        };
    }

    getRequestCount(): number {
        return this.throttle.getRequestCount();
    }

    private buildUrl(vcfForm: string): string {
        return `${this.baseUrl}/VariantValidator/variantvalidator/${this.genomeBuild}/${vcfForm}/${this.transcriptSelection}`;
    }

    private findTranscriptKey(response: unknown): string | null {
        if (!isRecord(response)) return null;
        for (const key of Object.keys(response)) {
            if (RESPONSE_METADATA_KEYS.has(key)) continue;
            if (key.includes(CDNA_MARKER)) return key;
        }
        return null;
    }

    private firstOmimId(record: unknown): FieldResult<string> {
        const ids = extractField(record, ['gene_ids', 'omim_id'], z.array(z.union([z.string(), z.number()])));
        if (ids.status === 'present' && ids.value.length === 0) {
            return { status: 'absent', path: 'gene_ids.omim_id[0]' };
        }
        return mapField(ids, values => String(values[0]));
    }

    private warnIfMissing(vcfForm: string, fields: Record<string, FieldResult<unknown>>): void {
        for (const [label, result] of Object.entries(fields)) {
            if (result.status === 'absent') {
                this.logger.warn(`${label} not found in ${SERVICE_NAME} response for ${vcfForm}`);
            } else if (result.status === 'malformed') {
                this.logger.warn(`${label} malformed in ${SERVICE_NAME} response for ${vcfForm}: ${result.reason}`);
            }
        }
    }
}
