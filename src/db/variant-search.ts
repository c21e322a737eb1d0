import { Session } from './client.js';
import { isValidVcfForm } from '../variant/normalizer.js';
import { StoredVariant } from '../variant/types.js';

export type SearchCategory = 'patient' | 'gene' | 'classification' | 'variant';

export const SEARCH_CATEGORIES: readonly SearchCategory[] = ['patient', 'gene', 'classification', 'variant'];

export interface VariantWithPatient extends StoredVariant {
    patient_name: string;
}

export interface VariantPatients {
    variant: StoredVariant;
    patients: string[];
}

export interface StoreStatistics {
    patients: number;
    genes: number;
    variants: number;
    links: number;
    fullyPopulated: boolean;
}

const V = `v.vcf_form, v.hgvs, v.clinvar_id, v.gene_symbol, v.classification, v.cdna_change,
    v.clinvar_accession, v.num_records, v.review_status, v.associated_condition, v.clinvar_url`;

export function isSearchCategory(value: string): value is SearchCategory {
    return SEARCH_CATEGORIES.some(category => category === value);
}

export function variantsForPatient(session: Session, patientName: string): StoredVariant[] {
    return session
        .prepare<[string], StoredVariant>(
            `SELECT ${V} FROM variants v
             JOIN patient_variant pv ON pv.variant_vcf_form = v.vcf_form
             WHERE pv.patient_name = ?
             ORDER BY v.vcf_form`
        )
        .all(patientName);
}

export function variantsForGene(session: Session, geneSymbol: string): VariantWithPatient[] {
    return session
        .prepare<[string], VariantWithPatient>(
            `SELECT ${V}, pv.patient_name FROM variants v
             JOIN patient_variant pv ON pv.variant_vcf_form = v.vcf_form
             WHERE v.gene_symbol = ? COLLATE NOCASE
             ORDER BY v.vcf_form, pv.patient_name`
        )
        .all(geneSymbol);
}

export function variantsByClassification(session: Session, classification: string): StoredVariant[] {
    return session
        .prepare<[string], StoredVariant>(
            `SELECT ${V} FROM variants v
             WHERE v.classification = ? COLLATE NOCASE
             ORDER BY v.vcf_form`
        )
        .all(classification);
}

/**
 * A variant and the patients carrying it, by canonical key or by HGVS (case-insensitive).
 */
export function patientsForVariant(session: Session, query: string): VariantPatients | null {
    const trimmed = query.trim();
    const byKey = isValidVcfForm(trimmed.toUpperCase());
    const variant = byKey
        ? session
              .prepare<[string], StoredVariant>(`SELECT ${V} FROM variants v WHERE v.vcf_form = ?`)
              .get(trimmed.toUpperCase())
        : session
              .prepare<[string], StoredVariant>(`SELECT ${V} FROM variants v WHERE v.hgvs = ? COLLATE NOCASE`)
              .get(trimmed);

    if (!variant) return null;

    const patients = session
        .prepare<[string], { patient_name: string }>(
            'SELECT patient_name FROM patient_variant WHERE variant_vcf_form = ? ORDER BY patient_name'
        )
        .all(variant.vcf_form)
        .map(row => row.patient_name);

    return { variant, patients };
}

export function storeStatistics(session: Session): StoreStatistics {
    const count = (table: string): number =>
        session.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get()?.total ?? 0;

    const stats = {
        patients: count('patients'),
        genes: count('genes'),
        variants: count('variants'),
        links: count('patient_variant'),
    };

    return {
        ...stats,
        fullyPopulated: stats.patients > 0 && stats.variants > 0 && stats.links > 0,
    };
}
