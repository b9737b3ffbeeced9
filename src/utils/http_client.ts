import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { toHttpError } from './errors';

export interface FetchResult {
    url: string;
    status: number;
    data: string; // HTML content
    finalUrl: string; // differs from url after redirects
}

/** Seam used by the Lister and the Detail Enricher; tests pass a stub. */
export interface PageFetcher {
    fetch(url: string): Promise<FetchResult>;
}

export interface HttpClientOptions {
    timeoutMs: number;
    userAgent: string;
}

// Keep-alive: every stage hits the same host sequentially
const httpAgent = new http.Agent({ keepAlive: true, maxSockets: 4 });
const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 4 });

export class HttpClient implements PageFetcher {
    private client: AxiosInstance;

    constructor(options: HttpClientOptions, client?: AxiosInstance) {
        this.client = client ?? axios.create({
            timeout: options.timeoutMs,
            headers: {
                'User-Agent': options.userAgent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            },
            maxRedirects: 5,
            responseType: 'text',
            httpAgent,
            httpsAgent,
        });
    }

    /**
     * GETs a page. Throws TransientNetworkError for retryable failures and
     * HttpStatusError for any other non-2xx status.
     */
    async fetch(url: string): Promise<FetchResult> {
        try {
            const response = await this.client.get<unknown>(url, {
                validateStatus: (s) => s >= 200 && s < 300,
            });

            const responseUrl: unknown = response.request?.res?.responseUrl;
            return {
                url,
                status: response.status,
                data: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
                finalUrl: typeof responseUrl === 'string' ? responseUrl : url,
            };
        } catch (error) {
            throw toHttpError(error, url);
        }
    }
}
