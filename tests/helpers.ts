/**
 * Shared fixtures: variant rows and an in-process stand-in for the
 * VariantValidator and E-utilities endpoints.
 */

import { jest } from '@jest/globals';
import { HgvsResolver } from '../src/annotation/hgvs-resolver';
import { ClinVarClient } from '../src/clinvar/clinvar-client';
import { FetchLike, HttpResponse } from '../src/utils/http';
import { ThrottleClock } from '../src/utils/throttle';
import { createEmptyRow, VariantRow } from '../src/variant/types';

export const VV_BASE_URL = 'https://vv.test';
export const EUTILS_BASE_URL = 'https://eutils.test/entrez/eutils';

export interface FakeTranscript {
  hgvs: string;
  gene_symbol?: string;
  hgnc_id?: string;
  omim_id?: Array<string | number>;
}

export interface FakeServiceData {
  /** VariantValidator answers, keyed by CHROM:POS:REF:ALT */
  transcripts?: Record<string, FakeTranscript>;
  /** ESearch answers, keyed by HGVS term */
  clinvarIds?: Record<string, string>;
  /** ESummary documents, keyed by variation id */
  summaries?: Record<string, Record<string, unknown>>;
}

export const createRow = (
  chromosome: string,
  position: string,
  ref: string,
  alt: string,
  overrides: Partial<VariantRow> = {}
): VariantRow => createEmptyRow({ chromosome, position, ref, alt, ...overrides });

export const jsonResponse = (body: unknown, status = 200, statusText = 'OK'): HttpResponse => ({
  ok: status >= 200 && status < 300,
  status,
  statusText,
  json: async () => body,
});

export const clinvarSummary = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  accession: 'VCV000578075',
  genes: [{ symbol: 'MAPT', geneid: '4137' }],
  variation_set: [{ cdna_change: 'c.841G>T' }],
  germline_classification: {
    description: 'Pathogenic',
    review_status: 'criteria provided, single submitter',
    trait_set: [{ trait_name: 'Frontotemporal dementia' }],
  },
  supporting_submissions: { scv: ['SCV000000001', 'SCV000000002'], rcv: ['RCV000000001'] },
  ...overrides,
});

export const EXAMPLE_SERVICES: FakeServiceData = {
  transcripts: {
    '17:45983420:G:T': {
      hgvs: 'NM_001377265.1:c.841G>T',
      gene_symbol: 'MAPT',
      hgnc_id: 'HGNC:6893',
      omim_id: ['157140'],
    },
  },
  clinvarIds: { 'NM_001377265.1:c.841G>T': '578075' },
  summaries: { '578075': clinvarSummary() },
};

function routeRequest(url: string, data: FakeServiceData): HttpResponse {
  const parsed = new URL(url);

  const marker = '/VariantValidator/variantvalidator/';
  if (parsed.pathname.includes(marker)) {
    const [, vcfForm] = parsed.pathname.split(marker)[1].split('/');
    const transcript = data.transcripts?.[decodeURIComponent(vcfForm)];
    if (!transcript) {
      return jsonResponse({ flag: 'warning', validation_warning_1: { validation_warnings: ['No transcript'] } });
    }
    return jsonResponse({
      flag: 'gene_variant',
      [transcript.hgvs]: {
        gene_symbol: transcript.gene_symbol,
        gene_ids: { hgnc_id: transcript.hgnc_id, omim_id: transcript.omim_id ?? [] },
      },
      metadata: { variantvalidator_version: 'test' },
    });
  }

  if (parsed.pathname.endsWith('/esearch.fcgi')) {
    const id = data.clinvarIds?.[parsed.searchParams.get('term') ?? ''];
    return jsonResponse({ esearchresult: { count: id ? '1' : '0', idlist: id ? [id] : [] } });
  }

  if (parsed.pathname.endsWith('/esummary.fcgi')) {
    const id = parsed.searchParams.get('id') ?? '';
    const summary = data.summaries?.[id];
    return jsonResponse({ result: summary ? { uids: [id], [id]: summary } : { uids: [] } });
  }

  return jsonResponse({ error: 'not found' }, 404, 'Not Found');
}

export const createFakeFetch = (data: FakeServiceData = EXAMPLE_SERVICES) =>
  jest.fn<FetchLike>(async url => routeRequest(url, data));

export const createClients = (fetchImpl: FetchLike) => ({
  hgvsResolver: new HgvsResolver({ baseUrl: VV_BASE_URL, throttleMs: 0, fetchImpl }),
  clinvarClient: new ClinVarClient({ baseUrl: EUTILS_BASE_URL, throttleMs: 0, fetchImpl }),
});

export const requestedUrls = (fetchImpl: jest.Mock<FetchLike>): string[] =>
  fetchImpl.mock.calls.map(([url]) => url);

/**
 * Clock whose sleeps advance time instantly and are recorded.
 */
export class FakeClock implements ThrottleClock {
  current = 1000;
  sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}
