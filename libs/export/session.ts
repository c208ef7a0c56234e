import { z } from 'zod';

/** Operator name; an empty string means no user was recorded. */
export const SessionUserSchema = z.preprocess(
    value => (value === '' ? null : value),
    z.string().min(1).nullable().optional()
);

/**
 * Session descriptor handed over by the record-building pipeline, one per
 * exported file.
 */
export const SessionDescriptorSchema = z.object({
    sessionIdentifier: z.string().min(1).max(36),
    instrumentPid: z.string().min(1),
    timeRangeStart: z.date(),
    timeRangeEnd: z.date(),
    user: SessionUserSchema,
    metadata: z.record(z.unknown()).optional()
}).refine(
    session => session.timeRangeEnd.getTime() >= session.timeRangeStart.getTime(),
    { message: 'timeRangeEnd must not precede timeRangeStart', path: ['timeRangeEnd'] }
);

export type SessionDescriptor = z.infer<typeof SessionDescriptorSchema>;
