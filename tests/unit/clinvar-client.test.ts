/**
 * Unit tests for the ClinVar E-utilities client
 */

import { describe, it, expect, jest } from '@jest/globals';
import { ClinVarClient, clinVarRecordUrl } from '../../src/clinvar/clinvar-client';
import {
  ClinVarIdFormatError,
  ClinVarIdNotFoundError,
  HgvsFormatError,
  ServiceConnectionError,
} from '../../src/errors';
import { FetchLike } from '../../src/utils/http';
import { clinvarSummary, createFakeFetch, EUTILS_BASE_URL, jsonResponse, requestedUrls } from '../helpers';

const createClient = (fetchImpl: FetchLike, options: { email?: string; apiKey?: string } = {}) =>
  new ClinVarClient({ baseUrl: EUTILS_BASE_URL, throttleMs: 0, fetchImpl, ...options });

describe('ClinVarClient', () => {
  describe('searchClinVarId', () => {
    it('returns the first variation id for an HGVS term', async () => {
      const fetchImpl = createFakeFetch();
      const client = createClient(fetchImpl, { email: 'test@example.org', apiKey: 'test-secret' });

      await expect(client.searchClinVarId('NM_001377265.1:c.841G>T')).resolves.toBe('578075');

      const url = new URL(requestedUrls(fetchImpl)[0]);
      expect(url.pathname).toBe('/entrez/eutils/esearch.fcgi');
      expect(Object.fromEntries(url.searchParams)).toEqual({
        db: 'clinvar',
        retmode: 'json',
        term: 'NM_001377265.1:c.841G>T',
        tool: 'variant-annotator',
        email: 'test@example.org',
        api_key: 'test-secret',
      });
    });

    it('raises ClinVarIdNotFoundError for an empty id list', async () => {
      const client = createClient(createFakeFetch({ clinvarIds: {} }));

      await expect(client.searchClinVarId('NM_000001.1:c.10A>G')).rejects.toThrow(
        new ClinVarIdNotFoundError('NM_000001.1:c.10A>G')
      );
    });

    it('rejects genomic HGVS without a request', async () => {
      const fetchImpl = createFakeFetch();

      await expect(createClient(fetchImpl).searchClinVarId('NC_000017.11:g.45983420G>T')).rejects.toThrow(HgvsFormatError);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('treats a response without an id list as a service failure', async () => {
      const fetchImpl = jest.fn<FetchLike>(async () => jsonResponse({ error: 'API rate limit exceeded' }));

      await expect(createClient(fetchImpl).searchClinVarId('NM_000001.1:c.10A>G')).rejects.toThrow(ServiceConnectionError);
    });
  });

  describe('fetchSummary', () => {
    it('rejects a non-numeric id without a request', async () => {
      const fetchImpl = createFakeFetch();

      await expect(createClient(fetchImpl).fetchSummary('VCV000578075')).rejects.toThrow(ClinVarIdFormatError);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('fails when the document for the id is missing', async () => {
      await expect(createClient(createFakeFetch({ summaries: {} })).fetchSummary('42')).rejects.toThrow(
        'ClinVar ESummary response did not contain a document for 42'
      );
    });
  });

  describe('extractAnnotation', () => {
    it('extracts every clinical field', () => {
      const client = createClient(createFakeFetch());

      expect(client.extractAnnotation('578075', clinvarSummary())).toEqual({
        gene_symbol: 'MAPT',
        cdna_change: 'c.841G>T',
        clinvar_id: '578075',
        clinvar_accession: 'VCV000578075',
        classification: 'Pathogenic',
        num_records: '2',
        review_status: 'criteria provided, single submitter',
        associated_condition: 'Frontotemporal dementia',
        clinvar_url: 'https://www.ncbi.nlm.nih.gov/clinvar/variation/578075',
      });
    });

    it('marks each missing field N/A independently', () => {
      const client = createClient(createFakeFetch());
      const document = clinvarSummary({
        genes: [],
        germline_classification: { description: 'Likely benign' },
        supporting_submissions: { scv: 'SCV000000001' },
      });

      expect(client.extractAnnotation('99', document)).toEqual({
        gene_symbol: 'N/A',
        cdna_change: 'c.841G>T',
        clinvar_id: '99',
        clinvar_accession: 'VCV000578075',
        classification: 'Likely benign',
        num_records: 'N/A',
        review_status: 'N/A',
        associated_condition: 'N/A',
        clinvar_url: 'https://www.ncbi.nlm.nih.gov/clinvar/variation/99',
      });
    });
  });

  describe('fetchAnnotation', () => {
    it('runs search then summary', async () => {
      const fetchImpl = createFakeFetch();
      const client = createClient(fetchImpl);

      const annotation = await client.fetchAnnotation('NM_001377265.1:c.841G>T');

      expect(annotation.clinvar_id).toBe('578075');
      expect(annotation.classification).toBe('Pathogenic');
      expect(requestedUrls(fetchImpl).map(url => new URL(url).pathname)).toEqual([
        '/entrez/eutils/esearch.fcgi',
        '/entrez/eutils/esummary.fcgi',
      ]);
      expect(client.getRequestCount()).toBe(2);
    });

    it('skips the search for a known id', async () => {
      const fetchImpl = createFakeFetch();

      await createClient(fetchImpl).fetchAnnotationForId('578075');

      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });

  it('builds record URLs from the variation id', () => {
    expect(clinVarRecordUrl('578075')).toBe('https://www.ncbi.nlm.nih.gov/clinvar/variation/578075');
  });
});
