import { z } from 'zod';

const targetIdField = z.string()
    .trim()
    .min(1, 'targetId must not be empty')
    .max(256, 'targetId too long');

/**
 * Token Request Validation Schema
 * `project_id` is accepted as an alias of `targetId`.
 */
export const TokenRequestSchema = z.object({
    targetId: targetIdField.optional(),
    project_id: targetIdField.optional(),
    timeoutMs: z.number().int().min(1000).max(300000).optional()
})
    .refine(body => body.targetId !== undefined || body.project_id !== undefined, {
        message: 'targetId is required',
        path: ['targetId']
    })
    .transform(body => ({
        targetId: body.targetId ?? body.project_id ?? '',
        timeoutMs: body.timeoutMs
    }));

export type TokenRequestBody = z.infer<typeof TokenRequestSchema>;
