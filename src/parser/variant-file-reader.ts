import { parse } from 'csv-parse/sync';
import { promises as fs } from 'fs';
import * as path from 'path';
import { UnsupportedFileError } from '../errors.js';
import { createEmptyRow, FILE_COLUMNS, FileColumn, VariantRow } from '../variant/types.js';

export type VariantFileKind = 'csv' | 'vcf';

export interface VariantFileBatch {
    /** Patient the file is attributed to: its base name without extension. */
    patientName: string;
    filePath: string;
    kind: VariantFileKind;
    rows: VariantRow[];
}

const EXTENSION_KINDS: Record<string, VariantFileKind> = {
    '.csv': 'csv',
    '.vcf': 'vcf',
    '.tsv': 'vcf',
};

// Standard VCF columns that carry variant identity; QUAL/FILTER/INFO are ignored
const VCF_STANDARD_COLUMNS: readonly FileColumn[] = ['chromosome', 'position', 'id', 'ref', 'alt'];

const HEADER_ALIASES: Record<string, FileColumn> = {
    chrom: 'chromosome',
    chr: 'chromosome',
    pos: 'position',
    reference: 'ref',
    alternate: 'alt',
    gene: 'gene_symbol',
    condition: 'associated_condition',
    num_submissions: 'num_records',
};

function isFileColumn(name: string): name is FileColumn {
    return FILE_COLUMNS.some(column => column === name);
}

function columnForHeader(header: string): FileColumn | null {
    const name = header.trim().replace(/^#/, '').toLowerCase().replace(/\s+/g, '_');
    if (isFileColumn(name)) return name;
    return HEADER_ALIASES[name] ?? null;
}

export function fileKindFor(filePath: string): VariantFileKind | null {
    return EXTENSION_KINDS[path.extname(filePath).toLowerCase()] ?? null;
}

export function isSupportedVariantFile(filePath: string): boolean {
    return fileKindFor(filePath) !== null;
}

export function patientNameFor(filePath: string): string {
    return path.basename(filePath, path.extname(filePath));
}

function toRow(values: string[], columns: ReadonlyArray<FileColumn | null>): VariantRow {
    const row = createEmptyRow();
    columns.forEach((column, index) => {
        if (!column) return;
        const value = values[index]?.trim();
        row[column] = value && value !== '.' ? value : null;
    });
    return row;
}

/**
 * Comma-separated with a header row. Header names select columns; a header
 * with no recognised names falls back to the fixed column order.
 */
export function parseCsvContent(content: string): VariantRow[] {
    const records: string[][] = parse(content, {
        delimiter: ',',
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
    });
    if (records.length === 0) return [];

    const [header, ...data] = records;
    const named = header.map(columnForHeader);
    const columns = named.some(column => column !== null) ? named : FILE_COLUMNS;

    return data.map(values => toRow(values, columns));
}

/**
 * Tab-separated with `#` comment lines. A `#CHROM` header marks a standard VCF,
 * of which only the identity columns are read; otherwise columns follow the
 * fixed order.
 */
export function parseVcfContent(content: string): VariantRow[] {
    const isStandardVcf = content.split(/\r?\n/).some(line => line.startsWith('#CHROM'));
    const records: string[][] = parse(content, {
        delimiter: '\t',
        comment: '#',
        comment_no_infix: true,
        skip_empty_lines: true,
        relax_column_count: true,
        quote: false,
    });

    const columns = isStandardVcf ? VCF_STANDARD_COLUMNS : FILE_COLUMNS;
    return records.map(values => toRow(values, columns));
}

export async function readVariantFile(filePath: string): Promise<VariantFileBatch> {
    const kind = fileKindFor(filePath);
    if (!kind) {
        throw new UnsupportedFileError(filePath);
    }

    const content = await fs.readFile(filePath, 'utf-8');
    const rows = kind === 'csv' ? parseCsvContent(content) : parseVcfContent(content);

    return {
        patientName: patientNameFor(filePath),
        filePath,
        kind,
        rows,
    };
}
