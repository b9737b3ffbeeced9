import fs from 'fs';
import os from 'os';
import path from 'path';
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AddressValidationClient, VerificationQuery, VerificationResult } from '../src/modules/verifier/smarty_client';
import { AddressCsvWriter, BASIC_HEADERS, basicRow } from '../src/modules/writer';
import { AddressRecord, EnrichedAddressRecord } from '../src/types';
import { FetchResult, PageFetcher } from '../src/utils/http_client';

type StubReply = string | Error | { data: string; finalUrl: string };

/**
 * In-process PageFetcher. The handler gets the URL and how many times that
 * URL has been requested before (0 on the first call).
 */
export class StubFetcher implements PageFetcher {
  calls: string[] = [];

  constructor(private handler: (url: string, previousCalls: number) => StubReply) {}

  async fetch(url: string): Promise<FetchResult> {
    const previousCalls = this.calls.filter((u) => u === url).length;
    this.calls.push(url);

    const reply = this.handler(url, previousCalls);
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'string') return { url, status: 200, data: reply, finalUrl: url };
    return { url, status: 200, data: reply.data, finalUrl: reply.finalUrl };
  }

  callsTo(url: string): number {
    return this.calls.filter((u) => u === url).length;
  }
}

/** Same idea for the validation API: one handler call per query. */
export class StubValidationClient implements AddressValidationClient {
  queries: VerificationQuery[] = [];

  constructor(private handler: (query: VerificationQuery, previousCalls: number) => VerificationResult | Error) {}

  async verify(query: VerificationQuery): Promise<VerificationResult> {
    const previousCalls = this.queries.filter((q) => q.street === query.street).length;
    this.queries.push(query);

    const reply = this.handler(query, previousCalls);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export interface StubResponse {
  status: number;
  data?: unknown;
  finalUrl?: string;
  networkCode?: string; // no response at all, e.g. ECONNRESET
}

/**
 * axios instance whose adapter answers in process. A custom adapter skips
 * validateStatus, so non-2xx replies are thrown here the way axios would.
 */
export function stubAxios(reply: (config: InternalAxiosRequestConfig) => StubResponse): {
  instance: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const stub = reply(config);
      if (stub.networkCode) {
        throw new AxiosError('socket hang up', stub.networkCode, config, null);
      }

      const response: AxiosResponse = {
        data: stub.data,
        status: stub.status,
        statusText: String(stub.status),
        headers: {},
        config,
        request: { res: { responseUrl: stub.finalUrl ?? config.url } },
      };
      if (stub.status < 200 || stub.status >= 300) {
        throw new AxiosError(`Request failed with status code ${stub.status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
  return { instance, requests };
}

export interface ListingFixture {
  street: string;
  cityLine: string;
  href?: string;
}

export function listingHtml(items: ListingFixture[]): string {
  const blocks = items.map((item) => `
   <div class="theme-location-item">
    <div class="t-title">${item.cityLine.split(',')[0]}</div>
    <div class="t-addr">${item.street}<br>${item.cityLine}</div>
    ${item.href ? `<a class="theme-button" href="${item.href}">Select Plan</a>` : ''}
   </div>`);
  return `<html><body><div class="locations">${blocks.join('')}</div></body></html>`;
}

export function detailHtml(lines: string[]): string {
  return `<html><body>
   <div class="t-addr">${lines.join('<br>')}</div>
   <footer><div class="t-foot">1 Corporate Plaza Suite 244</div></footer>
  </body></html>`;
}

export const EMPTY_HTML = '<html><body><div class="locations"></div></body></html>';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'harvester-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, 'utf8').split('\n').filter((line) => line.length > 0);
}

export const DETAILED_HEADERS = ['Street Address', 'Suite/Apartment', 'City', 'State Abbreviation', 'Zip Code', 'Detail Url', 'Source Id'];

/** A sheet in the layout the Lister writes. */
export function writeBasicSheet(filePath: string, records: AddressRecord[]): void {
  new AddressCsvWriter(filePath, BASIC_HEADERS).append(records.map(basicRow));
}

/** A sheet in the layout the Detail Enricher writes for Lister output. */
export function writeDetailedSheet(filePath: string, records: EnrichedAddressRecord[]): void {
  new AddressCsvWriter(filePath, DETAILED_HEADERS).append(records.map((r) => [
    r.street, r.suite ?? '', r.city, r.state, r.zip, r.detailUrl ?? '', r.sourceId,
  ]));
}

/** First `count` lines of a file, as an interrupted run would have left it. */
export function truncateLines(source: string, target: string, count: number): void {
  fs.writeFileSync(target, readLines(source).slice(0, count).map((line) => `${line}\n`).join(''));
}
