/**
 * eLabFTW API v2 client.
 *
 * Covers the calls the export destination needs: create an experiment,
 * list experiments (used as an authentication check) and attach a file.
 * eLabFTW answers creations with `201` and a Location header naming the new
 * resource; the id is parsed from there.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { pino } from 'pino';
import { z } from 'zod';
import { extractErrorMessage } from '../errors/sanitizer.js';
import { createHttpClient, HTTP_TIMEOUTS, type HttpClientFactory } from '../http/httpClient.js';
import { parseResponse, responseText } from '../http/responses.js';

const logger = pino({ name: 'ElabftwClient' });

export class ElabftwError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ElabftwError';
    }
}

export class ElabftwAuthenticationError extends ElabftwError {
    constructor(message = 'Authentication failed - check API key') {
        super(message);
        this.name = 'ElabftwAuthenticationError';
    }
}

export class ElabftwNotFoundError extends ElabftwError {
    constructor(message: string) {
        super(message);
        this.name = 'ElabftwNotFoundError';
    }
}

export interface CreatedResource {
    readonly id: number;
    readonly location?: string;
}

export interface CreateExperimentInput {
    readonly title: string;
    readonly body?: string;
    readonly tags?: readonly string[];
    readonly metadata?: Record<string, unknown>;
    readonly category?: number;
    readonly status?: number;
}

const CreatedResourceSchema = z.object({ id: z.coerce.number().int() }).passthrough();
const ExperimentListSchema = z.array(z.record(z.unknown()));

export class ElabftwClient {
    readonly baseUrl: string;
    readonly experimentsEndpoint: string;
    private readonly http: AxiosInstance;

    constructor(
        baseUrl: string,
        apiKey: string,
        options: { timeout?: number; httpClientFactory?: HttpClientFactory } = {}
    ) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.experimentsEndpoint = `${this.baseUrl}/api/v2/experiments`;
        const factory = options.httpClientFactory ?? createHttpClient;
        this.http = factory({
            timeout: options.timeout ?? HTTP_TIMEOUTS.STANDARD,
            headers: { Authorization: apiKey }
        });
    }

    /**
     * URL of the experiment's page in the eLabFTW web interface.
     */
    experimentUrl(experimentId: number): string {
        return `${this.baseUrl}/experiments.php?mode=view&id=${experimentId}`;
    }

    async createExperiment(input: CreateExperimentInput): Promise<CreatedResource> {
        const payload: Record<string, unknown> = { title: input.title };
        if (input.body !== undefined) payload.body = input.body;
        if (input.tags && input.tags.length > 0) payload.tags = [...input.tags];
        if (input.metadata && Object.keys(input.metadata).length > 0) payload.metadata = input.metadata;
        if (input.category !== undefined) payload.category = input.category;
        if (input.status !== undefined) payload.status = input.status;

        const url = this.experimentsEndpoint;
        const response = await this.send(() => this.http.post(url, payload));
        const created = this.expectCreated(response, url, 'experiment');

        logger.info({ experimentId: created.id, title: input.title }, 'Created eLabFTW experiment');
        return created;
    }

    async listExperiments(limit = 15): Promise<Record<string, unknown>[]> {
        const url = this.experimentsEndpoint;
        const response = await this.send(() => this.http.get(url, { params: { limit } }));
        this.throwForStatus(response, url);
        return parseResponse(ExperimentListSchema, response, url);
    }

    async uploadFileToExperiment(experimentId: number, filePath: string, comment?: string): Promise<CreatedResource> {
        let content: Buffer;
        try {
            content = await readFile(filePath);
        } catch (error) {
            throw new ElabftwError(`File not found: ${filePath}`, { cause: error });
        }

        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(content)], { type: 'application/octet-stream' }), path.basename(filePath));
        if (comment) {
            form.append('comment', comment);
        }

        const url = `${this.experimentsEndpoint}/${experimentId}/uploads`;
        const response = await this.send(() => this.http.post(url, form));

        if (response.status === 404) {
            throw new ElabftwNotFoundError(`Experiment ${experimentId} not found`);
        }
        const created = this.expectCreated(response, url, 'upload');

        logger.info({ experimentId, file: path.basename(filePath) }, 'Uploaded file to eLabFTW experiment');
        return created;
    }

    private async send(request: () => Promise<AxiosResponse>): Promise<AxiosResponse> {
        try {
            return await request();
        } catch (error) {
            throw new ElabftwError(`Request to eLabFTW API failed: ${extractErrorMessage(error)}`, { cause: error });
        }
    }

    private throwForStatus(response: AxiosResponse, url: string): void {
        if (response.status >= 200 && response.status < 300) {
            return;
        }
        if (response.status === 401) {
            throw new ElabftwAuthenticationError();
        }
        if (response.status === 404) {
            throw new ElabftwNotFoundError(`Resource not found: ${url}`);
        }
        throw new ElabftwError(`API request failed with status ${response.status}: ${responseText(response)}`);
    }

    private expectCreated(response: AxiosResponse, url: string, kind: string): CreatedResource {
        this.throwForStatus(response, url);
        if (response.status !== 201) {
            throw new ElabftwError(`Expected 201 Created for ${kind}, got ${response.status}`);
        }

        const location: unknown = response.headers['location'];
        if (typeof location === 'string' && location !== '') {
            return { id: parseLocationId(location, kind), location };
        }

        const parsed = CreatedResourceSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new ElabftwError('201 Created response missing Location header and JSON body');
        }
        return { id: parsed.data.id };
    }
}

/**
 * "http://host/api/v2/experiments/123" -> 123
 */
export function parseLocationId(location: string, kind = 'resource'): number {
    const segment = location.replace(/\/+$/, '').split('/').pop() ?? '';
    if (!/^\d+$/.test(segment)) {
        throw new ElabftwError(`Failed to parse ${kind} ID from Location header: ${location}`);
    }
    return Number.parseInt(segment, 10);
}
