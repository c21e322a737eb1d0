import { Session } from './client.js';
import { LookupResult, StoredVariant } from '../variant/types.js';

const VARIANT_COLUMNS_SQL = `vcf_form, hgvs, clinvar_id, gene_symbol, classification, cdna_change,
    clinvar_accession, num_records, review_status, associated_condition, clinvar_url`;

/**
 * Current stored state of a variant, or an explicit not-found result.
 */
export function findVariant(session: Session, vcfForm: string): LookupResult {
    const variant = session
        .prepare<[string], StoredVariant>(`SELECT ${VARIANT_COLUMNS_SQL} FROM variants WHERE vcf_form = ?`)
        .get(vcfForm);

    return variant ? { found: true, variant } : { found: false };
}

export function patientExists(session: Session, patientName: string): boolean {
    const row = session
        .prepare<[string], { name: string }>('SELECT name FROM patients WHERE name = ?')
        .get(patientName);
    return row !== undefined;
}

export function listPatientVariantKeys(session: Session, patientName: string): string[] {
    return session
        .prepare<[string], { variant_vcf_form: string }>(
            'SELECT variant_vcf_form FROM patient_variant WHERE patient_name = ? ORDER BY variant_vcf_form'
        )
        .all(patientName)
        .map(row => row.variant_vcf_form);
}

export interface UploadComparison {
    exists: boolean;
    identical: boolean;
    added: string[];
    removed: string[];
}

/**
 * Compare an uploaded key set with the keys already linked to the patient.
 */
export function compareWithStored(session: Session, patientName: string, uploadedKeys: string[]): UploadComparison {
    if (!patientExists(session, patientName)) {
        return { exists: false, identical: false, added: [...new Set(uploadedKeys)], removed: [] };
    }

    const stored = new Set(listPatientVariantKeys(session, patientName));
    const uploaded = new Set(uploadedKeys);

    const added = [...uploaded].filter(key => !stored.has(key));
    const removed = [...stored].filter(key => !uploaded.has(key));

    return {
        exists: true,
        identical: added.length === 0 && removed.length === 0,
        added,
        removed,
    };
}
