/**
 * eLabFTW export destination.
 *
 * Creates one eLabFTW experiment per session with a markdown summary and
 * the record file attached. When CDCS already exported the record during
 * this run, the experiment links to it.
 */

import type { Logger } from 'pino';
import { ElabftwAuthenticationError, ElabftwClient } from '../../clients/elabftwClient.js';
import { getCoreSettings, getElabftwSettings, type ElabftwSettings } from '../../config/exportSettings.js';
import { extractErrorMessage } from '../../errors/sanitizer.js';
import { HTTP_TIMEOUTS, type HttpClientFactory } from '../../http/httpClient.js';
import type { ExportContext } from '../context.js';
import { BaseDestination, invalidConfig, VALID_CONFIG, type ConfigValidation } from '../destination.js';
import { createSuccessResult, type ExportResult } from '../result.js';

export interface ElabftwDestinationOptions {
    readonly settings?: () => ElabftwSettings;
    readonly httpClientFactory?: HttpClientFactory;
    /** Per-request timeout for uploads; defaults to EXPORT_HTTP_TIMEOUT_MS */
    readonly requestTimeoutMs?: number;
    readonly logger?: Logger;
}

export class ElabftwDestination extends BaseDestination {
    readonly name = 'elabftw';
    readonly priority = 85;

    private readonly settings: () => ElabftwSettings;
    private readonly httpClientFactory?: HttpClientFactory;
    private readonly requestTimeoutMs?: number;

    constructor(options: ElabftwDestinationOptions = {}) {
        super(options.logger);
        this.settings = options.settings ?? getElabftwSettings;
        this.httpClientFactory = options.httpClientFactory;
        this.requestTimeoutMs = options.requestTimeoutMs;
    }

    get enabled(): boolean {
        const settings = this.readSettings(this.settings);
        return Boolean(settings?.url) && Boolean(settings?.apiKey);
    }

    async validateConfig(): Promise<ConfigValidation> {
        const { url, apiKey } = this.settings();
        if (!apiKey) {
            return invalidConfig('ELABFTW_API_KEY not configured');
        }
        if (!url) {
            return invalidConfig('ELABFTW_URL not configured');
        }

        try {
            await this.client(url, apiKey, HTTP_TIMEOUTS.SHORT).listExperiments(1);
        } catch (error) {
            if (error instanceof ElabftwAuthenticationError) {
                return invalidConfig(`eLabFTW authentication failed: ${error.message}`);
            }
            return invalidConfig(`eLabFTW configuration error: ${extractErrorMessage(error)}`);
        }

        return VALID_CONFIG;
    }

    protected async performExport(context: ExportContext): Promise<ExportResult> {
        const settings = this.settings();
        if (!settings.url || !settings.apiKey) {
            throw new Error('eLabFTW is not configured (ELABFTW_URL and ELABFTW_API_KEY are required)');
        }
        const client = this.client(settings.url, settings.apiKey, this.requestTimeoutMs ?? getCoreSettings().httpTimeoutMs);

        const cdcsUrl = context.successfulRecordUrl('cdcs');
        const title = buildTitle(context);

        const experiment = await client.createExperiment({
            title,
            body: buildMarkdownBody(context, cdcsUrl),
            tags: buildTags(context),
            metadata: buildMetadata(context, cdcsUrl),
            category: settings.experimentCategory,
            status: settings.experimentStatus
        });

        await client.uploadFileToExperiment(experiment.id, context.filePath, 'Exported record file');

        return createSuccessResult(this.name, {
            recordId: String(experiment.id),
            recordUrl: client.experimentUrl(experiment.id),
            metadata: {
                experimentId: experiment.id,
                ...(cdcsUrl ? { cdcsUrl } : {})
            }
        });
    }

    private client(url: string, apiKey: string, timeout: number): ElabftwClient {
        return new ElabftwClient(url, apiKey, { timeout, httpClientFactory: this.httpClientFactory });
    }
}

export function buildTitle(context: ExportContext): string {
    return `${context.instrumentPid} - ${context.sessionIdentifier}`;
}

export function buildMarkdownBody(context: ExportContext, cdcsUrl: string | undefined): string {
    const lines = [
        '# Instrument Session Record',
        '',
        '## Session Details',
        `- **Session ID**: ${context.sessionIdentifier}`,
        `- **Instrument**: ${context.instrumentPid}`
    ];

    if (context.user) {
        lines.push(`- **User**: ${context.user}`);
    }

    lines.push(
        `- **Start**: ${context.timeRangeStart.toISOString()}`,
        `- **End**: ${context.timeRangeEnd.toISOString()}`,
        ''
    );

    if (cdcsUrl) {
        lines.push('## Related Records', `- [View in CDCS](${cdcsUrl})`, '');
    }

    lines.push('## Files', 'The complete record file is attached to this experiment.');

    return lines.join('\n');
}

export function buildTags(context: ExportContext): string[] {
    const tags = ['record-export', context.instrumentPid];
    if (context.user) {
        tags.push(context.user);
    }
    return tags;
}

export function buildMetadata(context: ExportContext, cdcsUrl: string | undefined): Record<string, string> {
    const metadata: Record<string, string> = {
        session_id: context.sessionIdentifier,
        instrument: context.instrumentPid,
        start_time: context.timeRangeStart.toISOString(),
        end_time: context.timeRangeEnd.toISOString()
    };
    if (context.user) {
        metadata.user = context.user;
    }
    if (cdcsUrl) {
        metadata.cdcs_url = cdcsUrl;
    }
    return metadata;
}
