import type { InternalAxiosRequestConfig } from 'axios';
import { createHttpClient, type HttpClientFactory } from '../../libs/http/httpClient.js';

export interface RecordedRequest {
    readonly method: string;
    readonly url: string;
    readonly data: unknown;
    readonly params: unknown;
    readonly authorization: string;
    readonly timeout: number | undefined;
}

export interface FakeReply {
    readonly status: number;
    readonly data?: unknown;
    readonly headers?: Record<string, string>;
}

export type Responder = (request: RecordedRequest) => FakeReply;

function decodeBody(data: unknown): unknown {
    if (typeof data !== 'string') {
        return data;
    }
    try {
        return JSON.parse(data);
    } catch {
        return data;
    }
}

/**
 * HttpClientFactory whose clients answer from `responder` in process,
 * through an axios adapter, and record every request they were sent.
 */
export function fakeHttp(responder: Responder): { factory: HttpClientFactory; requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = [];

    const factory: HttpClientFactory = (config) => createHttpClient({
        ...config,
        adapter: async (requestConfig: InternalAxiosRequestConfig) => {
            const request: RecordedRequest = {
                method: (requestConfig.method ?? 'get').toUpperCase(),
                url: requestConfig.url ?? '',
                data: decodeBody(requestConfig.data),
                params: requestConfig.params,
                authorization: String(requestConfig.headers.get('Authorization') ?? ''),
                timeout: requestConfig.timeout
            };
            requests.push(request);

            const reply = responder(request);
            return {
                data: reply.data,
                status: reply.status,
                statusText: String(reply.status),
                headers: reply.headers ?? {},
                config: requestConfig
            };
        }
    });

    return { factory, requests };
}

export function notFound(): FakeReply {
    return { status: 404, data: { detail: 'not found' } };
}
