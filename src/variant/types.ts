/**
 * Sentinel for an annotation sub-field the service did not provide.
 */
export const NOT_AVAILABLE = 'N/A';

/**
 * Gene symbol used when enrichment resolves none, so every variant has a gene row.
 */
export const UNKNOWN_GENE = 'UNKNOWN';

/**
 * One variant row of a patient file. Column names follow the `variants` table;
 * every field is null until the file or enrichment provides it.
 */
export interface VariantRow {
    chromosome: string | null;
    position: string | null;
    id: string | null;
    ref: string | null;
    alt: string | null;
    hgvs: string | null;
    gene_symbol: string | null;
    cdna_change: string | null;
    clinvar_id: string | null;
    clinvar_accession: string | null;
    classification: string | null;
    num_records: string | null;
    review_status: string | null;
    associated_condition: string | null;
    clinvar_url: string | null;
    // Carried from HGVS resolution, not stored on the variant
    hgnc_id: string | null;
    omim_id: string | null;
}

export type VariantColumn = keyof VariantRow;

/**
 * The fixed column set a patient file maps onto, in file order.
 */
export const FILE_COLUMNS = [
    'chromosome',
    'position',
    'id',
    'ref',
    'alt',
    'hgvs',
    'gene_symbol',
    'cdna_change',
    'clinvar_id',
    'clinvar_accession',
    'classification',
    'num_records',
    'review_status',
    'associated_condition',
    'clinvar_url',
] as const satisfies readonly VariantColumn[];

export type FileColumn = (typeof FILE_COLUMNS)[number];

/**
 * Clinical annotation columns filled as a unit from ClinVar.
 */
export const CLINICAL_COLUMNS = [
    'clinvar_id',
    'classification',
    'cdna_change',
    'clinvar_accession',
    'num_records',
    'review_status',
    'associated_condition',
    'clinvar_url',
] as const satisfies readonly VariantColumn[];

export type ClinicalColumn = (typeof CLINICAL_COLUMNS)[number];

/**
 * A variant as persisted in the store.
 */
export interface StoredVariant {
    vcf_form: string;
    hgvs: string | null;
    clinvar_id: string | null;
    gene_symbol: string | null;
    classification: string | null;
    cdna_change: string | null;
    clinvar_accession: string | null;
    num_records: string | null;
    review_status: string | null;
    associated_condition: string | null;
    clinvar_url: string | null;
}

export type LookupResult =
    | { found: true; variant: StoredVariant }
    | { found: false };

export function createEmptyRow(overrides: Partial<VariantRow> = {}): VariantRow {
    return {
        chromosome: null,
        position: null,
        id: null,
        ref: null,
        alt: null,
        hgvs: null,
        gene_symbol: null,
        cdna_change: null,
        clinvar_id: null,
        clinvar_accession: null,
        classification: null,
        num_records: null,
        review_status: null,
        associated_condition: null,
        clinvar_url: null,
        hgnc_id: null,
        omim_id: null,
        ...overrides,
    };
}

/**
 * Blank strings and the N/A sentinel both mean "no value" for storage.
 */
export function toStoredValue(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed === '' || trimmed === NOT_AVAILABLE ? null : trimmed;
}
