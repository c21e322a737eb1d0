import { EventEmitter } from 'events';
import { ClinVarAnnotation, ClinVarClient } from '../clinvar/clinvar-client.js';
import { describeError, isAnnotationFailure } from '../errors.js';
import { createLogger, Logger } from '../utils/logger.js';
import { toVcfForm } from '../variant/normalizer.js';
import {
    CLINICAL_COLUMNS,
    LookupResult,
    StoredVariant,
    toStoredValue,
    VariantColumn,
    VariantRow,
} from '../variant/types.js';
import { HgvsResolution, HgvsResolver } from './hgvs-resolver.js';

/**
 * Where an annotation class stands for one row before enrichment.
 */
export type EnrichmentState = 'satisfied' | 'known-to-store' | 'must-fetch' | 'skipped';

export type VariantLookup = (vcfForm: string) => LookupResult;

export interface ClassSummary {
    satisfied: number;
    cached: number;
    fetched: number;
    failed: number;
    skipped: number;
}

export interface EnrichmentSummary {
    rows: number;
    hgvs: ClassSummary;
    clinical: ClassSummary;
    outboundCalls: number;
}

export interface EnrichmentResult {
    rows: VariantRow[];
    summary: EnrichmentSummary;
}

export interface EnrichmentProgress {
    processed: number;
    total: number;
    vcfForm: string;
}

export interface EnrichmentOrchestratorOptions {
    hgvsResolver?: HgvsResolver;
    clinvarClient?: ClinVarClient;
    logger?: Logger;
}

const REUSED_COLUMNS = [
    'hgvs',
    'gene_symbol',
    'hgnc_id',
    'omim_id',
    ...CLINICAL_COLUMNS,
] as const satisfies readonly VariantColumn[];

function emptyClassSummary(): ClassSummary {
    return { satisfied: 0, cached: 0, fetched: 0, failed: 0, skipped: 0 };
}

function hasValue(value: string | null | undefined): boolean {
    return toStoredValue(value) !== null;
}

/**
 * Decides per row whether HGVS and clinical annotation are already present,
 * already known to the store, or must be fetched, and fills the row.
 * A failed fetch only empties that row's fields; the batch carries on.
 *
 * Emits `progress` after each row.
 */
export class EnrichmentOrchestrator extends EventEmitter {
    private readonly hgvsResolver: HgvsResolver;
    private readonly clinvarClient: ClinVarClient;
    private readonly logger: Logger;

    constructor(options: EnrichmentOrchestratorOptions = {}) {
        super();
        this.hgvsResolver = options.hgvsResolver ?? new HgvsResolver();
        this.clinvarClient = options.clinvarClient ?? new ClinVarClient();
        this.logger = options.logger ?? createLogger('enrichment');
    }

    async enrichBatch(rows: VariantRow[], lookup: VariantLookup): Promise<EnrichmentResult> {
        const callsBefore = this.outboundCallCount();
        const summary: EnrichmentSummary = {
            rows: rows.length,
            hgvs: emptyClassSummary(),
            clinical: emptyClassSummary(),
            outboundCalls: 0,
        };

        const enriched: VariantRow[] = [];
        const enrichedByKey = new Map<string, VariantRow>();
        for (const row of rows) {
            const vcfForm = row.id ?? toVcfForm(row);
            const earlier = enrichedByKey.get(vcfForm);
            const result = earlier
                ? this.reuseEnrichment(row, vcfForm, earlier, summary)
                : await this.enrichRow(row, lookup, summary);
            enrichedByKey.set(vcfForm, result);
            enriched.push(result);
            const progress: EnrichmentProgress = {
                processed: enriched.length,
                total: rows.length,
                vcfForm: result.id ?? '',
            };
            this.emit('progress', progress);
        }

        summary.outboundCalls = this.outboundCallCount() - callsBefore;
        this.logger.info(
            `Enriched ${rows.length} rows: HGVS fetched ${summary.hgvs.fetched}, cached ${summary.hgvs.cached}, failed ${summary.hgvs.failed}; ` +
                `ClinVar fetched ${summary.clinical.fetched}, cached ${summary.clinical.cached}, failed ${summary.clinical.failed}, skipped ${summary.clinical.skipped}`
        );
        return { rows: enriched, summary };
    }

    hgvsState(row: VariantRow, stored: StoredVariant | null): EnrichmentState {
        if (hasValue(row.hgvs)) return 'satisfied';
        if (stored && hasValue(stored.hgvs)) return 'known-to-store';
        return 'must-fetch';
    }

    clinicalState(row: VariantRow, stored: StoredVariant | null): EnrichmentState {
        if (!hasValue(row.hgvs)) return 'skipped';
        if (hasValue(row.clinvar_id) && hasValue(row.classification)) return 'satisfied';
        if (stored && hasValue(stored.clinvar_id) && (hasValue(stored.classification) || hasValue(stored.clinvar_url))) {
            return 'known-to-store';
        }
        return 'must-fetch';
    }

    /**
     * A key repeated within the batch takes the first row's annotation into
     * its empty fields without a lookup or request.
     */
    private reuseEnrichment(row: VariantRow, vcfForm: string, earlier: VariantRow, summary: EnrichmentSummary): VariantRow {
        const enriched: VariantRow = { ...row, id: vcfForm };
        const hgvsSatisfied = hasValue(row.hgvs);
        const clinicalSatisfied = hasValue(row.clinvar_id) && hasValue(row.classification);

        for (const column of REUSED_COLUMNS) {
            if (!hasValue(enriched[column])) enriched[column] = toStoredValue(earlier[column]);
        }

        if (hgvsSatisfied) summary.hgvs.satisfied++;
        else if (hasValue(enriched.hgvs)) summary.hgvs.cached++;
        else summary.hgvs.failed++;

        if (!hasValue(enriched.hgvs)) summary.clinical.skipped++;
        else if (clinicalSatisfied) summary.clinical.satisfied++;
        else summary.clinical.cached++;

        return enriched;
    }

    private async enrichRow(row: VariantRow, lookup: VariantLookup, summary: EnrichmentSummary): Promise<VariantRow> {
        const vcfForm = row.id ?? toVcfForm(row);
        const enriched: VariantRow = { ...row, id: vcfForm };

        let stored: StoredVariant | null | undefined;
        const storedVariant = (): StoredVariant | null => {
            if (stored === undefined) {
                const result = lookup(vcfForm);
                stored = result.found ? result.variant : null;
            }
            return stored;
        };

        const needsStore = !hasValue(row.hgvs) || !(hasValue(row.clinvar_id) && hasValue(row.classification));
        const fallbackGeneSymbol = await this.enrichHgvs(enriched, needsStore ? storedVariant() : null, summary);
        await this.enrichClinical(enriched, needsStore ? storedVariant() : null, summary);

        if (!hasValue(enriched.gene_symbol) && fallbackGeneSymbol) {
            enriched.gene_symbol = fallbackGeneSymbol;
        }
        return enriched;
    }

    /**
     * Returns the resolver's gene symbol, used only if ClinVar provides none.
     */
    private async enrichHgvs(row: VariantRow, stored: StoredVariant | null, summary: EnrichmentSummary): Promise<string | null> {
        const vcfForm = row.id ?? toVcfForm(row);

        switch (this.hgvsState(row, stored)) {
            case 'satisfied':
                summary.hgvs.satisfied++;
                return null;
            case 'known-to-store':
                row.hgvs = stored?.hgvs ?? null;
                summary.hgvs.cached++;
                return null;
            default:
                break;
        }

        let resolution: HgvsResolution;
        try {
            resolution = await this.hgvsResolver.resolve(vcfForm);
        } catch (error) {
            if (!isAnnotationFailure(error)) throw error;
            this.logger.error(`Error retrieving HGVS for variant ${vcfForm}: ${describeError(error)}`, {
                code: error.code,
            });
            row.hgvs = null;
            summary.hgvs.failed++;
            return null;
        }

        row.hgvs = toStoredValue(resolution.hgvs);
        row.hgnc_id = toStoredValue(resolution.hgnc_id);
        row.omim_id = toStoredValue(resolution.omim_id);
        summary.hgvs.fetched++;
        return toStoredValue(resolution.gene_symbol);
    }

    private async enrichClinical(row: VariantRow, stored: StoredVariant | null, summary: EnrichmentSummary): Promise<void> {
        const state = this.clinicalState(row, stored);
        const hgvs = toStoredValue(row.hgvs);

        if (state === 'skipped' || hgvs === null) {
            summary.clinical.skipped++;
            return;
        }
        if (state === 'satisfied') {
            summary.clinical.satisfied++;
            return;
        }
        if (state === 'known-to-store' && stored) {
            for (const column of CLINICAL_COLUMNS) {
                if (!hasValue(row[column])) row[column] = stored[column];
            }
            if (!hasValue(row.gene_symbol)) row.gene_symbol = stored.gene_symbol;
            summary.clinical.cached++;
            return;
        }

        // A known id lets the search step be skipped
        const knownId = toStoredValue(row.clinvar_id) ?? toStoredValue(stored?.clinvar_id);

        let annotation: ClinVarAnnotation;
        try {
            annotation = knownId
                ? await this.clinvarClient.fetchAnnotationForId(knownId)
                : await this.clinvarClient.fetchAnnotation(hgvs);
        } catch (error) {
            if (!isAnnotationFailure(error)) throw error;
            this.logger.error(`Error fetching ClinVar for ${hgvs}: ${describeError(error)}`, { code: error.code });
            for (const column of CLINICAL_COLUMNS) {
                row[column] = toStoredValue(row[column]);
            }
            summary.clinical.failed++;
            return;
        }

        for (const column of CLINICAL_COLUMNS) {
            if (!hasValue(row[column])) row[column] = toStoredValue(annotation[column]);
        }
        if (!hasValue(row.gene_symbol)) row.gene_symbol = toStoredValue(annotation.gene_symbol);
        summary.clinical.fetched++;
    }

    private outboundCallCount(): number {
        return this.hgvsResolver.getRequestCount() + this.clinvarClient.getRequestCount();
    }
}
