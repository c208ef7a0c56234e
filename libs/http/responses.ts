import type { AxiosResponse } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Response body as text, for error messages.
 */
export function responseText(response: AxiosResponse): string {
    const { data } = response;
    if (typeof data === 'string') {
        return data;
    }
    if (data === undefined || data === null) {
        return '';
    }
    return JSON.stringify(data);
}

/**
 * Parses a response body against `schema`, naming the endpoint on failure.
 */
export function parseResponse<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    response: AxiosResponse,
    endpoint: string
): T {
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
        throw new Error(`Malformed response from ${endpoint}: ${issues.join('; ')}`);
    }
    return parsed.data;
}
