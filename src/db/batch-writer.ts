import { assertForeignKeys, Session } from './client.js';
import { AnnotatorError, ErrorCode, StorageError, describeError } from '../errors.js';
import { toVcfForm } from '../variant/normalizer.js';
import { StoredVariant, toStoredValue, UNKNOWN_GENE, VariantRow } from '../variant/types.js';

const HGNC_REPORT_URL = 'https://www.genenames.org/data/gene-symbol-report/#!/hgnc_id';

const FILLABLE_COLUMNS = [
    'hgvs',
    'clinvar_id',
    'gene_symbol',
    'classification',
    'cdna_change',
    'clinvar_accession',
    'num_records',
    'review_status',
    'associated_condition',
    'clinvar_url',
] as const satisfies ReadonlyArray<keyof StoredVariant>;

type FillableColumn = (typeof FILLABLE_COLUMNS)[number];

export interface WriteSummary {
    patientName: string;
    patientCreated: boolean;
    genesCreated: number;
    variantsCreated: number;
    variantsFilled: number;
    linksCreated: number;
    rowsWritten: number;
}

export function geneUrlFor(hgncId: string | null): string | null {
    const id = toStoredValue(hgncId);
    return id ? `${HGNC_REPORT_URL}/${id}` : null;
}

function isEmptyStoredValue(column: FillableColumn, value: string | null): boolean {
    // The placeholder gene stands in for "no symbol" and may be replaced by a resolved one
    return value === null || (column === 'gene_symbol' && value === UNKNOWN_GENE);
}

/**
 * Commit one patient's rows in a single transaction: patient, genes, variants
 * and links are each created only when absent. Existing variants only have
 * their empty columns filled. Any failure rolls the whole batch back.
 */
export function writePatientBatch(session: Session, patientName: string, rows: VariantRow[]): WriteSummary {
    assertForeignKeys(session);

    const selectPatient = session.prepare<[string], { name: string }>('SELECT name FROM patients WHERE name = ?');
    const insertPatient = session.prepare<[string]>('INSERT INTO patients (name) VALUES (?)');
    const selectGene = session.prepare<[string], { gene_symbol: string; gene_url: string | null }>(
        'SELECT gene_symbol, gene_url FROM genes WHERE gene_symbol = ?'
    );
    const insertGene = session.prepare<[string, string | null]>('INSERT INTO genes (gene_symbol, gene_url) VALUES (?, ?)');
    const fillGeneUrl = session.prepare<[string, string]>(
        'UPDATE genes SET gene_url = ? WHERE gene_symbol = ? AND gene_url IS NULL'
    );
    const selectVariant = session.prepare<[string], StoredVariant>(
        `SELECT vcf_form, ${FILLABLE_COLUMNS.join(', ')} FROM variants WHERE vcf_form = ?`
    );
    const insertVariant = session.prepare<[StoredVariant]>(
        `INSERT INTO variants (vcf_form, ${FILLABLE_COLUMNS.join(', ')})
         VALUES (@vcf_form, ${FILLABLE_COLUMNS.map(column => `@${column}`).join(', ')})`
    );
    const selectLink = session.prepare<[string, string], { patient_name: string }>(
        'SELECT patient_name FROM patient_variant WHERE patient_name = ? AND variant_vcf_form = ?'
    );
    const insertLink = session.prepare<[string, string]>(
        'INSERT INTO patient_variant (patient_name, variant_vcf_form) VALUES (?, ?)'
    );

    const ensureGene = (symbol: string, hgncId: string | null, summary: WriteSummary): void => {
        const geneUrl = symbol === UNKNOWN_GENE ? null : geneUrlFor(hgncId);
        const existing = selectGene.get(symbol);
        if (!existing) {
            insertGene.run(symbol, geneUrl);
            summary.genesCreated++;
        } else if (existing.gene_url === null && geneUrl !== null) {
            fillGeneUrl.run(geneUrl, symbol);
        }
    };

    const fillVariant = (existing: StoredVariant, incoming: StoredVariant): boolean => {
        const updates = FILLABLE_COLUMNS.filter(
            column =>
                isEmptyStoredValue(column, existing[column]) &&
                incoming[column] !== null &&
                incoming[column] !== existing[column]
        );
        if (updates.length === 0) return false;

        const assignments = updates.map(column => `${column} = @${column}`).join(', ');
        const params: Record<string, string | null> = { vcf_form: existing.vcf_form };
        for (const column of updates) {
            params[column] = incoming[column];
        }
        session.prepare(`UPDATE variants SET ${assignments} WHERE vcf_form = @vcf_form`).run(params);
        return true;
    };

    const commit = session.transaction((batch: VariantRow[]): WriteSummary => {
        const summary: WriteSummary = {
            patientName,
            patientCreated: false,
            genesCreated: 0,
            variantsCreated: 0,
            variantsFilled: 0,
            linksCreated: 0,
            rowsWritten: 0,
        };

        if (!selectPatient.get(patientName)) {
            insertPatient.run(patientName);
            summary.patientCreated = true;
        }

        for (const row of batch) {
            const vcfForm = row.id ?? toVcfForm(row);
            const geneSymbol = toStoredValue(row.gene_symbol) ?? UNKNOWN_GENE;
            ensureGene(geneSymbol, row.hgnc_id, summary);

            const incoming: StoredVariant = {
                vcf_form: vcfForm,
                hgvs: toStoredValue(row.hgvs),
                clinvar_id: toStoredValue(row.clinvar_id),
                gene_symbol: geneSymbol,
                classification: toStoredValue(row.classification),
                cdna_change: toStoredValue(row.cdna_change),
                clinvar_accession: toStoredValue(row.clinvar_accession),
                num_records: toStoredValue(row.num_records),
                review_status: toStoredValue(row.review_status),
                associated_condition: toStoredValue(row.associated_condition),
                clinvar_url: toStoredValue(row.clinvar_url),
            };

            const existing = selectVariant.get(vcfForm);
            if (!existing) {
                insertVariant.run(incoming);
                summary.variantsCreated++;
            } else if (fillVariant(existing, incoming)) {
                summary.variantsFilled++;
            }

            if (!selectLink.get(patientName, vcfForm)) {
                insertLink.run(patientName, vcfForm);
                summary.linksCreated++;
            }
            summary.rowsWritten++;
        }

        return summary;
    });

    try {
        // Takes the write lock before the first read
        return commit.immediate(rows);
    } catch (error) {
        if (error instanceof AnnotatorError) throw error;
        throw new StorageError(
            `Failed to write batch for patient '${patientName}': ${describeError(error)}`,
            ErrorCode.STORAGE_FAILED,
            { patientName, rows: rows.length }
        );
    }
}
