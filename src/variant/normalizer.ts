import { MissingFieldError, VariantDescriptionError } from '../errors.js';
import { VariantRow } from './types.js';

const EXAMPLE_VCF_FORM = '17:45983420:G:T';

const CHROMOSOMES: ReadonlySet<string> = new Set([
    ...Array.from({ length: 22 }, (_, i) => String(i + 1)),
    'X',
    'Y',
]);

const BASES: ReadonlySet<string> = new Set(['A', 'C', 'G', 'T']);

export interface GenomicCoordinates {
    chromosome: string;
    position: number;
    ref: string;
    alt: string;
}

type IdentityField = 'chromosome' | 'position' | 'ref' | 'alt';

function requireField(row: VariantRow, field: IdentityField): string {
    const value = row[field]?.trim();
    if (!value) {
        throw new MissingFieldError(field, { row: { ...row } });
    }
    return value;
}

/**
 * Canonical key ("vcf form") of a row: `chromosome:position:ref:alt`.
 */
export function toVcfForm(row: VariantRow): string {
    const chromosome = requireField(row, 'chromosome');
    const position = requireField(row, 'position');
    const ref = requireField(row, 'ref');
    const alt = requireField(row, 'alt');
    return `${chromosome}:${position}:${ref}:${alt}`;
}

/**
 * Sets every row's `id` to its canonical key so downstream lookups compare one representation.
 */
export function normalizeRows(rows: VariantRow[]): VariantRow[] {
    return rows.map(row => ({ ...row, id: toVcfForm(row) }));
}

/**
 * Parse and validate a `CHROM:POS:REF:ALT` key for single-nucleotide lookups.
 */
export function parseVcfForm(vcfForm: string): GenomicCoordinates {
    const fields = vcfForm.split(':');
    if (fields.length !== 4) {
        throw new VariantDescriptionError(
            `Invalid VCF-style format: '${vcfForm}'. Expected 4 colon-separated fields, e.g. '${EXAMPLE_VCF_FORM}'.`,
            { vcfForm }
        );
    }

    const [chromosome, position, ref, alt] = fields;

    if (!CHROMOSOMES.has(chromosome)) {
        throw new VariantDescriptionError(
            `Invalid chromosome '${chromosome}' in '${vcfForm}'. Expected 1-22, X or Y.`,
            { vcfForm, field: 'chromosome' }
        );
    }

    if (!/^\d+$/.test(position)) {
        throw new VariantDescriptionError(
            `Invalid position '${position}' in '${vcfForm}'. Expected a non-negative integer.`,
            { vcfForm, field: 'position' }
        );
    }

    for (const [field, base] of [['ref', ref], ['alt', alt]] as const) {
        if (!BASES.has(base)) {
            throw new VariantDescriptionError(
                `Invalid ${field} base '${base}' in '${vcfForm}'. Expected one of A, C, G or T.`,
                { vcfForm, field }
            );
        }
    }

    return { chromosome, position: parseInt(position, 10), ref, alt };
}

export function validateVcfForm(vcfForm: string): void {
    parseVcfForm(vcfForm);
}

export function isValidVcfForm(vcfForm: string): boolean {
    try {
        parseVcfForm(vcfForm);
        return true;
    } catch (error) {
        if (error instanceof VariantDescriptionError) return false;
        throw error;
    }
}
