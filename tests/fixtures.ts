/**
 * Synthetic EDGAR documents and an in-process fetch stand-in.
 * Every name, CIK and accession number here is made up.
 */

import { EdgarClient, type EdgarClientOptions, type FetchLike } from '../src/core/edgar-client.js';
import { RateLimiter } from '../src/core/rate-limiter.js';
import type { FilingRecord, FilingType } from '../src/core/types.js';

export const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';
export const feedUrl = (count: number) =>
  `https://www.sec.gov/cgi-bin/browse-edgar?action=getcurrent&type=13F-HR&company=&dateb=&owner=include&count=${count}&output=atom`;

export interface SubmissionsFixture {
  cik?: string;
  name: string;
  sicDescription?: string;
  filingDates?: string[];
  street1?: string;
  city?: string;
  state?: string;
  zip?: string;
}

export function makeSubmissions(f: SubmissionsFixture): string {
  return JSON.stringify({
    cik: f.cik ?? '0001111111',
    entityType: 'other',
    sic: '6282',
    sicDescription: f.sicDescription ?? 'Investment Advice',
    name: f.name,
    tickers: [],
    phone: '212-555-0100',
    stateOfIncorporation: 'DE',
    addresses: {
      business: {
        street1: f.street1 ?? '1 Main St',
        street2: null,
        city: f.city ?? 'New York',
        stateOrCountry: f.state ?? 'NY',
        zipCode: f.zip ?? '10001',
      },
    },
    filings: {
      recent: {
        accessionNumber: ['0001111111-24-000002', '0001111111-23-000001'],
        filingDate: f.filingDates ?? ['2024-03-28', '2023-03-30'],
        form: ['D', 'D'],
      },
    },
  });
}

export interface CoverPageFixture {
  name: string;
  cik?: string;
  period?: string;
  signatureDate?: string;
  valueTotal?: string;
  entryTotal?: string;
  city?: string;
  state?: string;
}

export function makeCoverPage(f: CoverPageFixture): string {
  const summary = [
    f.entryTotal !== undefined ? `<tableEntryTotal>${f.entryTotal}</tableEntryTotal>` : '',
    f.valueTotal !== undefined ? `<tableValueTotal>${f.valueTotal}</tableValueTotal>` : '',
  ].join('');

  return `<?xml version="1.0" encoding="UTF-8"?>
<edgarSubmission xmlns="http://www.sec.gov/edgar/thirteenffiler" xmlns:com="http://www.sec.gov/edgar/common">
  <headerData>
    <submissionType>13F-HR</submissionType>
    <filerInfo>
      <filer><credentials><cik>${f.cik ?? '0001234567'}</cik></credentials></filer>
      <periodOfReport>${f.period ?? '03-31-2024'}</periodOfReport>
    </filerInfo>
  </headerData>
  <formData>
    <coverPage>
      <reportCalendarOrQuarter>${f.period ?? '03-31-2024'}</reportCalendarOrQuarter>
      <filingManager>
        <name>${f.name}</name>
        <address>
          <com:street1>200 Harbor Rd</com:street1>
          <com:city>${f.city ?? 'Stamford'}</com:city>
          <com:stateOrCountry>${f.state ?? 'CT'}</com:stateOrCountry>
          <com:zipCode>06901</com:zipCode>
        </address>
      </filingManager>
    </coverPage>
    <signatureBlock>
      <name>Jane Roe</name>
      <title>Chief Compliance Officer</title>
      <signatureDate>${f.signatureDate ?? '05-10-2024'}</signatureDate>
    </signatureBlock>
    <summaryPage>${summary}</summaryPage>
  </formData>
</edgarSubmission>`;
}

export interface FeedEntryFixture {
  name: string;
  cik: string;
  accession: string;
  updated?: string;
  form?: string;
}

export function makeFeed(entries: FeedEntryFixture[]): string {
  const body = entries.map(e => {
    const cikNum = e.cik.replace(/^0+/, '');
    const accNoDash = e.accession.replace(/-/g, '');
    return `<entry>
<title>${e.form ?? '13F-HR'} - ${e.name} (${e.cik.padStart(10, '0')}) (Filer)</title>
<link rel="alternate" type="text/html" href="https://www.sec.gov/Archives/edgar/data/${cikNum}/${accNoDash}/${e.accession}-index.htm"/>
<summary type="html"> &lt;b&gt;Filed:&lt;/b&gt; ${(e.updated ?? '2024-05-15').slice(0, 10)} &lt;b&gt;AccNo:&lt;/b&gt; ${e.accession}</summary>
<updated>${e.updated ?? '2024-05-15T16:05:12-04:00'}</updated>
<category scheme="https://www.sec.gov/" label="form type" term="${e.form ?? '13F-HR'}"/>
<id>urn:tag:sec.gov,2008:accession-number=${e.accession}</id>
</entry>`;
  }).join('\n');

  return `<?xml version="1.0" encoding="ISO-8859-1" ?>
<feed xmlns="http://www.w3.org/2005/Atom">
<title>Latest Filings</title>
<updated>2024-05-15T17:00:00-04:00</updated>
${body}
</feed>`;
}

export function makeTickers(entries: Array<{ cik: number; ticker: string; title: string }>): string {
  return JSON.stringify(
    Object.fromEntries(entries.map((e, i) => [String(i), { cik_str: e.cik, ticker: e.ticker, title: e.title }]))
  );
}

// ── Fetch stand-in ────────────────────────────────────────────────────

export interface FakeResponse {
  status?: number;
  body?: string;
}

/**
 * Serves canned responses by exact URL. A list is consumed in order, its
 * last element repeating; unknown URLs get a 404.
 */
export function routeFetch(routes: Record<string, FakeResponse | FakeResponse[]>) {
  const calls: string[] = [];
  const userAgents: string[] = [];
  const queues = new Map(
    Object.entries(routes).map(([url, r]) => [url, Array.isArray(r) ? [...r] : [r]])
  );

  const fetch: FetchLike = async (url, init) => {
    calls.push(url);
    userAgents.push(init.headers['User-Agent']);
    const queue = queues.get(url) ?? [];
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (!next) return new Response('Not Found', { status: 404 });
    return new Response(next.body ?? '', { status: next.status ?? 200 });
  };

  return { fetch, calls, userAgents };
}

/** Client whose limiter and backoff never actually wait; delays are recorded */
export function testClient(fetch: FetchLike, extra: Partial<EdgarClientOptions> = {}) {
  const delays: number[] = [];
  const client = new EdgarClient({
    rateLimiter: new RateLimiter({ requestsPerSecond: 10, sleep: async () => {} }),
    userAgent: 'edgar-investors-test test@example.com',
    fetch,
    sleep: async ms => {
      delays.push(ms);
    },
    random: () => 0,
    ...extra,
  });
  return { client, delays };
}

export function makeRecord(
  entityName: string,
  rawFields: Record<string, string> = {},
  filingType: FilingType = 'ADV'
): FilingRecord {
  return {
    entity_name: entityName,
    filing_type: filingType,
    filing_date: '2024-03-28',
    raw_fields: rawFields,
    source: `https://example.test/${encodeURIComponent(entityName)}`,
  };
}
