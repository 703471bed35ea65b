import { describe, it, expect } from 'vitest';
import { dedupeByCik, runPipeline, sortInvestors, type EdgarSource } from '../src/core/pipeline.js';
import { NetworkError, NotFoundError } from '../src/core/errors.js';
import { renderInvestorCsv } from '../src/output/csv-renderer.js';
import { classify } from '../src/processing/investor-classifier.js';
import type { DocumentRef, IndexQuery } from '../src/core/types.js';
import {
  TICKERS_URL,
  feedUrl,
  makeCoverPage,
  makeFeed,
  makeRecord,
  makeSubmissions,
  makeTickers,
  routeFetch,
  testClient,
} from './fixtures.js';

const SEQUOIA_URL = 'https://data.sec.gov/submissions/CIK0001111111.json';
const GRANITE_URL = 'https://data.sec.gov/submissions/CIK0004444444.json';
const NORTHWIND_URL = 'https://www.sec.gov/Archives/edgar/data/1234567/000123456724000007/primary_doc.xml';

const tickers = makeTickers([
  { cik: 1111111, ticker: 'SRVX', title: 'Sequoia Ridge Ventures LP' },
  { cik: 2222222, ticker: 'ACMW', title: 'Acme Widgets Corp' },
  { cik: 4444444, ticker: 'GPCA', title: 'Granite Peak Capital Advisors' },
]);
const feed = makeFeed([{ name: 'Northwind Holdings Inc', cik: '1234567', accession: '0001234567-24-000007' }]);

function edgarRoutes() {
  return {
    [TICKERS_URL]: { body: tickers },
    [feedUrl(10)]: { body: feed },
    [SEQUOIA_URL]: { body: makeSubmissions({ name: 'Sequoia Ridge Ventures LP' }) },
    // Malformed: no name, no filings list
    [GRANITE_URL]: { body: '{"cik": "4444444", "filings": {}}' },
    [NORTHWIND_URL]: { body: makeCoverPage({ name: 'Northwind Holdings Inc', valueTotal: '350000000', entryTotal: '120' }) },
  };
}

function ref(cik: string, name: string, filingType: DocumentRef['filing_type'] = 'ADV'): DocumentRef {
  return {
    cik,
    entity_name: name,
    filing_type: filingType,
    url: `https://example.test/${cik}`,
    accession_number: null,
    filing_date: '2024-03-28',
  };
}

/** EdgarSource over fixed refs; every document parses */
function stubSource(refs: DocumentRef[], onFetch: (ref: DocumentRef) => void = () => {}): EdgarSource & { fetched: string[] } {
  const fetched: string[] = [];
  return {
    fetched,
    fetchIndex: async (query: IndexQuery) => refs.filter(r => r.filing_type === query.form).slice(0, query.limit),
    fetchDocument: async (r: DocumentRef) => {
      fetched.push(r.cik);
      onFetch(r);
      return r.filing_type === '13F'
        ? makeCoverPage({ cik: r.cik, name: r.entity_name })
        : makeSubmissions({ cik: r.cik, name: r.entity_name });
    },
  };
}

describe('runPipeline end to end', () => {
  it('classifies good filings and skips the malformed one', async () => {
    const { fetch } = routeFetch(edgarRoutes());
    const { client } = testClient(fetch);

    const result = await runPipeline({ client, limit: 10 });

    expect(result.investors.map(i => [i.entity_name, i.category])).toEqual([
      ['Northwind Holdings Inc', 'Other'],
      ['Sequoia Ridge Ventures LP', 'VC'],
    ]);
    expect(result.skipped).toEqual([
      {
        source: GRANITE_URL,
        entity_name: 'Granite Peak Capital Advisors',
        filing_type: 'ADV',
        reason: 'Missing or malformed required fields: name, filings.recent',
        missing_fields: ['name', 'filings.recent'],
      },
    ]);
    expect(result.failures).toEqual([]);
    expect(result.cancelled).toBe(0);
    expect(result.summary).toEqual({ VC: 1, PE: 0, FamilyOffice: 0, HedgeFund: 0, Other: 1 });
    expect(renderInvestorCsv(result.investors)).toBe(
      'entity_name,category,aum,filing_type,filing_date\n' +
      'Northwind Holdings Inc,Other,350000000,13F,2024-05-15\n' +
      'Sequoia Ridge Ventures LP,VC,,ADV,2024-03-28\n'
    );
  });

  it('survives transient server errors', async () => {
    const routes = {
      ...edgarRoutes(),
      [SEQUOIA_URL]: [{ status: 503 }, { status: 503 }, { body: makeSubmissions({ name: 'Sequoia Ridge Ventures LP' }) }],
    };
    const { fetch } = routeFetch(routes);
    const { client, delays } = testClient(fetch);

    const result = await runPipeline({ client, forms: ['ADV'], limit: 10 });

    expect(result.investors.map(i => i.entity_name)).toEqual(['Sequoia Ridge Ventures LP']);
    expect(result.failures).toEqual([]);
    expect(delays).toEqual([1000, 2000]);
  });

  it('records a failed document and keeps going', async () => {
    const routes = { ...edgarRoutes(), [SEQUOIA_URL]: { status: 404 } };
    const { fetch } = routeFetch(routes);
    const { client } = testClient(fetch);

    const result = await runPipeline({ client, limit: 10 });

    expect(result.investors.map(i => i.entity_name)).toEqual(['Northwind Holdings Inc']);
    expect(result.failures).toEqual([
      {
        stage: 'document',
        filing_type: 'ADV',
        url: SEQUOIA_URL,
        status_code: 404,
        message: `Not found: ${SEQUOIA_URL}`,
      },
    ]);
  });

  it('records a failed index and still fetches the other form', async () => {
    const routes = { ...edgarRoutes(), [TICKERS_URL]: { status: 500 } };
    const { fetch } = routeFetch(routes);
    const { client } = testClient(fetch);

    const result = await runPipeline({ client, limit: 10 });

    expect(result.investors.map(i => i.entity_name)).toEqual(['Northwind Holdings Inc']);
    expect(result.failures).toEqual([
      { stage: 'index', filing_type: 'ADV', url: TICKERS_URL, status_code: 500, message: 'SEC server error: 500' },
    ]);
  });

  it('splits the limit between forms', async () => {
    const { fetch, calls } = routeFetch(edgarRoutes());
    const { client } = testClient(fetch);

    const result = await runPipeline({ client, limit: 2 });

    // One ADV candidate and one 13F filer
    expect(calls).not.toContain(GRANITE_URL);
    expect(result.investors.map(i => i.entity_name)).toEqual(['Northwind Holdings Inc', 'Sequoia Ridge Ventures LP']);
  });
});

describe('runPipeline with a stub source', () => {
  it('fetches nothing for a zero limit or no forms', async () => {
    const source = stubSource([ref('1', 'Alpha Ventures')]);

    const none = await runPipeline({ client: source, limit: 0 });
    const noForms = await runPipeline({ client: source, forms: [] });

    expect(none.investors).toEqual([]);
    expect(noForms.investors).toEqual([]);
    expect(source.fetched).toEqual([]);
  });

  it('fetches each CIK once', async () => {
    const source = stubSource([
      ref('1', 'Alpha Ventures'),
      ref('1', 'Alpha Ventures', '13F'),
      ref('2', 'Beta Capital', '13F'),
    ]);

    const result = await runPipeline({ client: source, limit: 10 });

    expect(source.fetched).toEqual(['1', '2']);
    expect(result.investors).toHaveLength(2);
  });

  it('stops issuing fetches once aborted', async () => {
    const controller = new AbortController();
    const refs = ['1', '2', '3', '4', '5'].map(cik => ref(cik, `Fund ${cik} Ventures`));
    const source = stubSource(refs, () => controller.abort());

    const result = await runPipeline({ client: source, forms: ['ADV'], concurrency: 1, signal: controller.signal });

    expect(source.fetched).toEqual(['1']);
    expect(result.investors.map(i => i.entity_name)).toEqual(['Fund 1 Ventures']);
    expect(result.cancelled).toBe(4);
  });

  it('skips the remaining indexes once aborted', async () => {
    const controller = new AbortController();
    const indexCalls: string[] = [];
    const source: EdgarSource = {
      fetchIndex: async query => {
        indexCalls.push(query.form);
        controller.abort();
        return [ref('1', 'Alpha Ventures')];
      },
      fetchDocument: async () => {
        throw new TypeError('document fetched after abort');
      },
    };

    const result = await runPipeline({ client: source, signal: controller.signal });

    expect(indexCalls).toEqual(['ADV']);
    expect(result.investors).toEqual([]);
    expect(result.cancelled).toBe(1);
  });

  it('does nothing when aborted before starting', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = stubSource([ref('1', 'Alpha Ventures')]);

    const result = await runPipeline({ client: source, signal: controller.signal });

    expect(source.fetched).toEqual([]);
    expect(result.cancelled).toBe(0);
    expect(result.investors).toEqual([]);
  });

  it('never runs more fetches at once than the concurrency', async () => {
    let active = 0;
    let peak = 0;
    const refs = Array.from({ length: 12 }, (_, i) => ref(String(i + 1), `Fund ${i + 1}`));
    const source: EdgarSource = {
      fetchIndex: async () => refs,
      fetchDocument: async r => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise(resolve => setTimeout(resolve, 2));
        active -= 1;
        return makeSubmissions({ cik: r.cik, name: r.entity_name });
      },
    };

    const result = await runPipeline({ client: source, forms: ['ADV'], concurrency: 3 });

    expect(peak).toBe(3);
    expect(result.investors).toHaveLength(12);
  });

  it('orders results the same way whatever order fetches finish in', async () => {
    const refs = [ref('3', 'charlie Capital'), ref('1', 'Alpha Ventures'), ref('2', 'Bravo Family Office')];
    const source: EdgarSource = {
      fetchIndex: async () => refs,
      fetchDocument: async r => {
        await new Promise(resolve => setTimeout(resolve, Number(r.cik)));
        return makeSubmissions({ cik: r.cik, name: r.entity_name });
      },
    };

    const result = await runPipeline({ client: source, forms: ['ADV'], concurrency: 3 });

    expect(result.investors.map(i => i.entity_name)).toEqual(['Alpha Ventures', 'Bravo Family Office', 'charlie Capital']);
  });

  it('lets unexpected errors propagate', async () => {
    const source: EdgarSource = {
      fetchIndex: async () => [ref('1', 'Alpha Ventures')],
      fetchDocument: async () => {
        throw new TypeError('bug');
      },
    };

    await expect(runPipeline({ client: source, forms: ['ADV'] })).rejects.toThrow('bug');
  });

  it('treats any NetworkError from a document as a failure', async () => {
    const source: EdgarSource = {
      fetchIndex: async () => [ref('1', 'Alpha Ventures'), ref('2', 'Beta Ventures')],
      fetchDocument: async r => {
        if (r.cik === '1') throw new NotFoundError(r.url);
        throw new NetworkError('connection reset', 0, r.url, true);
      },
    };

    const result = await runPipeline({ client: source, forms: ['ADV'] });

    expect(result.failures.map(f => [f.status_code, f.message])).toEqual([
      [404, 'Not found: https://example.test/1'],
      [0, 'connection reset'],
    ]);
  });
});

describe('ordering helpers', () => {
  it('sortInvestors orders by name, case-insensitively, then by source', () => {
    const a = classify({ ...makeRecord('beta'), source: 'https://example.test/2' });
    const b = classify({ ...makeRecord('Beta'), source: 'https://example.test/1' });
    const c = classify(makeRecord('alpha'));

    expect(sortInvestors([a, b, c])).toEqual([c, b, a]);
  });

  it('dedupeByCik keeps the first occurrence', () => {
    const refs = [ref('1', 'First'), ref('2', 'Second'), ref('1', 'Duplicate')];

    expect(dedupeByCik(refs).map(r => r.entity_name)).toEqual(['First', 'Second']);
  });
});
