/**
 * Unit tests for per-row enrichment decisions
 */

import { describe, it, expect, jest } from '@jest/globals';
import { EnrichmentOrchestrator, EnrichmentProgress, VariantLookup } from '../../src/annotation/enrichment-orchestrator';
import { StorageError } from '../../src/errors';
import { FetchLike } from '../../src/utils/http';
import { normalizeRows } from '../../src/variant/normalizer';
import { LookupResult, StoredVariant } from '../../src/variant/types';
import { createClients, createFakeFetch, createRow, EXAMPLE_SERVICES, FakeServiceData, requestedUrls } from '../helpers';

const notStored: VariantLookup = () => ({ found: false });

const storedExample: StoredVariant = {
  vcf_form: '17:45983420:G:T',
  hgvs: 'NM_001377265.1:c.841G>T',
  clinvar_id: '578075',
  gene_symbol: 'MAPT',
  classification: 'Pathogenic',
  cdna_change: 'c.841G>T',
  clinvar_accession: 'VCV000578075',
  num_records: '2',
  review_status: 'criteria provided, single submitter',
  associated_condition: 'Frontotemporal dementia',
  clinvar_url: 'https://www.ncbi.nlm.nih.gov/clinvar/variation/578075',
};

const createOrchestrator = (fetchImpl: FetchLike) => new EnrichmentOrchestrator(createClients(fetchImpl));

const withServices = (extra: FakeServiceData): FakeServiceData => ({
  transcripts: { ...EXAMPLE_SERVICES.transcripts, ...extra.transcripts },
  clinvarIds: { ...EXAMPLE_SERVICES.clinvarIds, ...extra.clinvarIds },
  summaries: { ...EXAMPLE_SERVICES.summaries, ...extra.summaries },
});

describe('EnrichmentOrchestrator', () => {
  it('fetches HGVS and ClinVar annotation for an unknown variant', async () => {
    const fetchImpl = createFakeFetch();
    const rows = normalizeRows([createRow('17', '45983420', 'G', 'T')]);

    const { rows: [row], summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, notStored);

    expect(row).toMatchObject({
      id: '17:45983420:G:T',
      hgvs: 'NM_001377265.1:c.841G>T',
      hgnc_id: 'HGNC:6893',
      omim_id: '157140',
      gene_symbol: 'MAPT',
      clinvar_id: '578075',
      clinvar_accession: 'VCV000578075',
      classification: 'Pathogenic',
      cdna_change: 'c.841G>T',
      num_records: '2',
      review_status: 'criteria provided, single submitter',
      associated_condition: 'Frontotemporal dementia',
      clinvar_url: 'https://www.ncbi.nlm.nih.gov/clinvar/variation/578075',
    });
    expect(summary.hgvs).toEqual({ satisfied: 0, cached: 0, fetched: 1, failed: 0, skipped: 0 });
    expect(summary.clinical).toEqual({ satisfied: 0, cached: 0, fetched: 1, failed: 0, skipped: 0 });
    expect(summary.outboundCalls).toBe(3);
  });

  it('makes no lookup or request when the row is already annotated', async () => {
    const fetchImpl = createFakeFetch();
    const lookup = jest.fn<VariantLookup>(notStored);
    const rows = normalizeRows([
      createRow('17', '45983420', 'G', 'T', {
        hgvs: 'NM_001377265.1:c.841G>T',
        clinvar_id: '578075',
        classification: 'Pathogenic',
      }),
    ]);

    const { summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, lookup);

    expect(lookup).not.toHaveBeenCalled();
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(summary.hgvs.satisfied).toBe(1);
    expect(summary.clinical.satisfied).toBe(1);
    expect(summary.outboundCalls).toBe(0);
  });

  it('copies stored annotation instead of fetching', async () => {
    const fetchImpl = createFakeFetch();
    const lookup = jest.fn<VariantLookup>((): LookupResult => ({ found: true, variant: storedExample }));
    const rows = normalizeRows([createRow('17', '45983420', 'G', 'T')]);

    const { rows: [row], summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, lookup);

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(lookup).toHaveBeenCalledTimes(1);
    expect(lookup).toHaveBeenCalledWith('17:45983420:G:T');
    expect(row).toMatchObject({
      hgvs: storedExample.hgvs,
      clinvar_id: '578075',
      classification: 'Pathogenic',
      gene_symbol: 'MAPT',
    });
    expect(summary.hgvs.cached).toBe(1);
    expect(summary.clinical.cached).toBe(1);
  });

  it('treats a stored ClinVar id with a record URL as known', async () => {
    const fetchImpl = createFakeFetch();
    const stored: StoredVariant = { ...storedExample, classification: null };
    const rows = normalizeRows([createRow('17', '45983420', 'G', 'T')]);

    const { rows: [row], summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, () => ({ found: true, variant: stored }));

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(summary.clinical.cached).toBe(1);
    expect(summary.outboundCalls).toBe(0);
    expect(row.clinvar_id).toBe('578075');
    expect(row.classification).toBeNull();
  });

  it('enriches a key repeated within a batch only once', async () => {
    const fetchImpl = createFakeFetch();
    const lookup = jest.fn<VariantLookup>(notStored);
    const rows = normalizeRows([createRow('17', '45983420', 'G', 'T'), createRow('17', '45983420', 'G', 'T')]);

    const { rows: [, repeated], summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, lookup);

    expect(lookup).toHaveBeenCalledTimes(1);
    expect(summary.outboundCalls).toBe(3);
    expect(summary.hgvs).toEqual({ satisfied: 0, cached: 1, fetched: 1, failed: 0, skipped: 0 });
    expect(summary.clinical).toEqual({ satisfied: 0, cached: 1, fetched: 1, failed: 0, skipped: 0 });
    expect(repeated).toMatchObject({
      id: '17:45983420:G:T',
      hgvs: 'NM_001377265.1:c.841G>T',
      hgnc_id: 'HGNC:6893',
      gene_symbol: 'MAPT',
      classification: 'Pathogenic',
    });
  });

  it('treats N/A values in the file as empty', async () => {
    const fetchImpl = createFakeFetch();
    const rows = normalizeRows([createRow('17', '45983420', 'G', 'T', { hgvs: 'N/A', classification: 'N/A' })]);

    const { rows: [row] } = await createOrchestrator(fetchImpl).enrichBatch(rows, notStored);

    expect(row.hgvs).toBe('NM_001377265.1:c.841G>T');
    expect(row.classification).toBe('Pathogenic');
  });

  it('isolates an HGVS failure to its row', async () => {
    const fetchImpl = createFakeFetch();
    const rows = normalizeRows([createRow('1', '12345', 'A', 'G'), createRow('17', '45983420', 'G', 'T')]);

    const { rows: [failed, succeeded], summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, notStored);

    expect(failed.hgvs).toBeNull();
    expect(failed.clinvar_id).toBeNull();
    expect(succeeded.clinvar_id).toBe('578075');
    expect(summary.hgvs).toEqual({ satisfied: 0, cached: 0, fetched: 1, failed: 1, skipped: 0 });
    expect(summary.clinical).toEqual({ satisfied: 0, cached: 0, fetched: 1, failed: 0, skipped: 1 });
    expect(summary.outboundCalls).toBe(4);
  });

  it('keeps HGVS when ClinVar has no record and falls back to the resolver gene symbol', async () => {
    const fetchImpl = createFakeFetch(
      withServices({ transcripts: { '2:200:C:T': { hgvs: 'NM_000002.1:c.5C>T', gene_symbol: 'GENE2', hgnc_id: 'HGNC:2' } } })
    );
    const rows = normalizeRows([createRow('2', '200', 'C', 'T', { review_status: 'N/A' })]);

    const { rows: [row], summary } = await createOrchestrator(fetchImpl).enrichBatch(rows, notStored);

    expect(row.hgvs).toBe('NM_000002.1:c.5C>T');
    expect(row.clinvar_id).toBeNull();
    expect(row.review_status).toBeNull();
    expect(row.gene_symbol).toBe('GENE2');
    expect(summary.clinical.failed).toBe(1);
    expect(summary.outboundCalls).toBe(2);
  });

  it('fetches the summary directly when the ClinVar id is known', async () => {
    const fetchImpl = createFakeFetch();
    const rows = normalizeRows([
      createRow('17', '45983420', 'G', 'T', { hgvs: 'NM_001377265.1:c.841G>T', clinvar_id: '578075' }),
    ]);

    const { rows: [row] } = await createOrchestrator(fetchImpl).enrichBatch(rows, notStored);

    expect(requestedUrls(fetchImpl).map(url => new URL(url).pathname)).toEqual(['/entrez/eutils/esummary.fcgi']);
    expect(row.classification).toBe('Pathogenic');
  });

  it('never overwrites values the file provides', async () => {
    const fetchImpl = createFakeFetch();
    const rows = normalizeRows([
      createRow('17', '45983420', 'G', 'T', {
        hgvs: 'NM_001377265.1:c.841G>T',
        classification: 'Likely pathogenic',
        gene_symbol: 'MAPT-AS',
      }),
    ]);

    const { rows: [row] } = await createOrchestrator(fetchImpl).enrichBatch(rows, notStored);

    expect(row.classification).toBe('Likely pathogenic');
    expect(row.gene_symbol).toBe('MAPT-AS');
    expect(row.clinvar_id).toBe('578075');
  });

  it('propagates store failures', async () => {
    const lookup: VariantLookup = () => {
      throw new StorageError('database is locked');
    };
    const rows = normalizeRows([createRow('17', '45983420', 'G', 'T')]);

    await expect(createOrchestrator(createFakeFetch()).enrichBatch(rows, lookup)).rejects.toThrow(StorageError);
  });

  it('emits progress after each row', async () => {
    const orchestrator = createOrchestrator(createFakeFetch());
    const events: EnrichmentProgress[] = [];
    orchestrator.on('progress', (progress: EnrichmentProgress) => events.push(progress));
    const rows = normalizeRows([
      createRow('17', '45983420', 'G', 'T', { hgvs: 'NM_001377265.1:c.841G>T', clinvar_id: '578075', classification: 'Pathogenic' }),
      createRow('X', '100', 'A', 'C', { hgvs: 'NM_000003.1:c.1A>C', clinvar_id: '1', classification: 'Benign' }),
    ]);

    await orchestrator.enrichBatch(rows, notStored);

    expect(events).toEqual([
      { processed: 1, total: 2, vcfForm: '17:45983420:G:T' },
      { processed: 2, total: 2, vcfForm: 'X:100:A:C' },
    ]);
  });
});
