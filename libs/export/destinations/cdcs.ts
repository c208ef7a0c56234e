/**
 * CDCS export destination.
 *
 * Uploads the record file to a CDCS (Configurable Data Curation System)
 * instance through its REST API and assigns it to the first workspace the
 * token can read. Runs first (priority 100) so lower-priority destinations
 * can link to the CDCS record.
 */

import { readFile } from 'fs/promises';
import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { z } from 'zod';
import { getCdcsSettings, getCoreSettings, type CdcsSettings } from '../../config/exportSettings.js';
import { extractErrorMessage } from '../../errors/sanitizer.js';
import { createHttpClient, HTTP_TIMEOUTS, joinUrl, type HttpClientFactory } from '../../http/httpClient.js';
import { parseResponse, responseText } from '../../http/responses.js';
import type { ExportContext } from '../context.js';
import { BaseDestination, invalidConfig, VALID_CONFIG, type ConfigValidation } from '../destination.js';
import { createSuccessResult, type ExportResult } from '../result.js';

export class CdcsAuthenticationError extends Error {
    constructor(message = 'Could not authenticate to CDCS') {
        super(message);
        this.name = 'CdcsAuthenticationError';
    }
}

const IdentifierSchema = z.union([z.string().min(1), z.number()]).transform(String);

const TemplateListSchema = z.array(z.object({ current: IdentifierSchema })).nonempty();
const WorkspaceListSchema = z.array(z.object({ id: IdentifierSchema })).nonempty();
const CreatedRecordSchema = z.object({ id: IdentifierSchema });

type ConfiguredCdcs = Required<CdcsSettings>;

export interface CdcsDestinationOptions {
    readonly settings?: () => CdcsSettings;
    readonly httpClientFactory?: HttpClientFactory;
    /** Per-request timeout for uploads; defaults to EXPORT_HTTP_TIMEOUT_MS */
    readonly requestTimeoutMs?: number;
    readonly logger?: Logger;
}

export class CdcsDestination extends BaseDestination {
    readonly name = 'cdcs';
    readonly priority = 100;

    private readonly settings: () => CdcsSettings;
    private readonly httpClientFactory: HttpClientFactory;
    private readonly requestTimeoutMs?: number;

    constructor(options: CdcsDestinationOptions = {}) {
        super(options.logger);
        this.settings = options.settings ?? getCdcsSettings;
        this.httpClientFactory = options.httpClientFactory ?? createHttpClient;
        this.requestTimeoutMs = options.requestTimeoutMs;
    }

    get enabled(): boolean {
        const settings = this.readSettings(this.settings);
        return Boolean(settings?.url) && Boolean(settings?.token);
    }

    async validateConfig(): Promise<ConfigValidation> {
        const { url, token } = this.settings();
        if (!token) {
            return invalidConfig('CDCS_TOKEN not configured');
        }
        if (!url) {
            return invalidConfig('CDCS_URL not configured');
        }

        try {
            await this.getWorkspaceId(this.client({ url, token }, HTTP_TIMEOUTS.SHORT), url);
        } catch (error) {
            if (error instanceof CdcsAuthenticationError) {
                return invalidConfig(`CDCS authentication failed: ${error.message}`);
            }
            return invalidConfig(`CDCS configuration error: ${extractErrorMessage(error)}`);
        }

        return VALID_CONFIG;
    }

    protected async performExport(context: ExportContext): Promise<ExportResult> {
        const config = this.requireConfig();
        const http = this.client(config, this.requestTimeoutMs ?? getCoreSettings().httpTimeoutMs);

        const xmlContent = await readFile(context.filePath, 'utf-8');
        const title = context.recordTitle;

        const templateId = await this.getTemplateId(http, config.url);

        const endpoint = joinUrl(config.url, 'rest/data/');
        const created = await http.post(endpoint, {
            template: templateId,
            title,
            xml_content: xmlContent
        });
        if (created.status !== 201) {
            throw new Error(`CDCS upload failed: ${responseText(created)}`);
        }
        const recordId = parseResponse(CreatedRecordSchema, created, endpoint).id;

        const workspaceId = await this.getWorkspaceId(http, config.url);
        const assigned = await http.patch(joinUrl(config.url, `rest/data/${recordId}/assign/${workspaceId}`));
        if (assigned.status >= 400) {
            throw new Error(`CDCS workspace assignment failed: ${responseText(assigned)}`);
        }

        const recordUrl = joinUrl(config.url, `data?id=${recordId}`);
        this.log.info({ destination: this.name, title, recordUrl }, `Record "${title}" available in CDCS`);

        return createSuccessResult(this.name, { recordId, recordUrl });
    }

    private requireConfig(): ConfiguredCdcs {
        const { url, token } = this.settings();
        if (!url || !token) {
            throw new Error('CDCS is not configured (CDCS_URL and CDCS_TOKEN are required)');
        }
        return { url, token };
    }

    private client(config: ConfiguredCdcs, timeout: number): AxiosInstance {
        return this.httpClientFactory({
            timeout,
            headers: { Authorization: `Token ${config.token}` }
        });
    }

    private async getTemplateId(http: AxiosInstance, baseUrl: string): Promise<string> {
        const endpoint = joinUrl(baseUrl, 'rest/template-version-manager/global');
        const response = await http.get(endpoint);
        if (response.status === 401 || response.status === 403) {
            throw new CdcsAuthenticationError();
        }
        const templates = parseResponse(TemplateListSchema, response, endpoint);
        return templates[0].current;
    }

    private async getWorkspaceId(http: AxiosInstance, baseUrl: string): Promise<string> {
        const endpoint = joinUrl(baseUrl, 'rest/workspace/read_access');
        const response = await http.get(endpoint);
        if (response.status === 401 || response.status === 403) {
            throw new CdcsAuthenticationError();
        }
        const workspaces = parseResponse(WorkspaceListSchema, response, endpoint);
        return workspaces[0].id;
    }
}
