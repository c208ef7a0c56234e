/**
 * LabArchives export destination.
 *
 * Runs after CDCS (priority 90) so the notebook entry can link to the CDCS
 * record. The entry is assembled here, but submission is not available
 * until the LabArchives API integration is written; until then every
 * export reports a failure.
 */

import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import { getLabArchivesSettings, type LabArchivesSettings } from '../../config/exportSettings.js';
import type { ExportContext } from '../context.js';
import { BaseDestination, invalidConfig, VALID_CONFIG, type ConfigValidation } from '../destination.js';
import { createFailureResult, type ExportResult } from '../result.js';

export const LABARCHIVES_NOT_IMPLEMENTED =
    'LabArchives API integration not yet implemented';

export interface LabArchivesEntry {
    readonly notebook: string;
    readonly title: string;
    readonly body: string;
    readonly attachmentSize: number;
}

export interface LabArchivesDestinationOptions {
    readonly settings?: () => LabArchivesSettings;
    readonly logger?: Logger;
}

export class LabArchivesDestination extends BaseDestination {
    readonly name = 'labarchives';
    readonly priority = 90;

    private readonly settings: () => LabArchivesSettings;

    constructor(options: LabArchivesDestinationOptions = {}) {
        super(options.logger);
        this.settings = options.settings ?? getLabArchivesSettings;
    }

    get enabled(): boolean {
        const settings = this.readSettings(this.settings);
        return Boolean(settings?.url) && Boolean(settings?.apiKey);
    }

    async validateConfig(): Promise<ConfigValidation> {
        const { url, apiKey } = this.settings();
        if (!apiKey) {
            return invalidConfig('LABARCHIVES_API_KEY not configured');
        }
        if (!url) {
            return invalidConfig('LABARCHIVES_URL not configured');
        }

        this.log.warn({ destination: this.name }, 'LabArchives connectivity check not implemented; only presence of settings was verified');
        return VALID_CONFIG;
    }

    protected async performExport(context: ExportContext): Promise<ExportResult> {
        const content = await readFile(context.filePath);
        const cdcsUrl = context.successfulRecordUrl('cdcs');
        const entry = buildEntry(context, cdcsUrl, content.byteLength);

        this.log.debug({ destination: this.name, notebook: entry.notebook, title: entry.title }, 'Prepared LabArchives entry');

        return createFailureResult(this.name, LABARCHIVES_NOT_IMPLEMENTED, {
            metadata: { cdcsLinked: cdcsUrl !== undefined }
        });
    }
}

export function buildEntry(context: ExportContext, cdcsUrl: string | undefined, attachmentSize: number): LabArchivesEntry {
    const lines = [
        `Session ${context.sessionIdentifier} on ${context.instrumentPid}`,
        `${context.timeRangeStart.toISOString()} - ${context.timeRangeEnd.toISOString()}`
    ];
    if (context.user) {
        lines.push(`User: ${context.user}`);
    }
    if (cdcsUrl) {
        lines.push(`CDCS record: ${cdcsUrl}`);
    }

    return {
        notebook: `Instrument ${context.instrumentPid}`,
        title: context.recordTitle,
        body: lines.join('\n'),
        attachmentSize
    };
}
