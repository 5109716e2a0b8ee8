/**
 * Zod validation schemas for MediaWiki Action API responses
 *
 * Only the fields the client reads are declared; everything else passes
 * through untouched.
 *
 * @see https://www.mediawiki.org/wiki/API:Main_page
 */

import { z } from 'zod';
import { EntityOrMissingSchema } from './wikibaseSchemas.js';

/**
 * Envelope shared by every response: optional error and per-module warnings
 */
export const ApiEnvelopeSchema = z
    .object({
        error: z
            .object({
                code: z.string(),
                info: z.string().default(''),
            })
            .passthrough()
            .optional(),
        warnings: z.record(z.string(), z.record(z.string(), z.unknown())).optional(),
    })
    .passthrough();

export const TokensResponseSchema = z.object({
    query: z.object({
        tokens: z.object({
            logintoken: z.string().optional(),
            csrftoken: z.string().optional(),
        }),
    }),
});

export const LoginResponseSchema = z.object({
    login: z.object({
        result: z.string(),
        reason: z.string().optional(),
        lgusername: z.string().optional(),
    }),
});

export const WbGetEntitiesResponseSchema = z.object({
    success: z.number().int(),
    entities: z.record(z.string(), EntityOrMissingSchema),
});

export const WbEditEntityResponseSchema = z.object({
    success: z.number().int().optional(),
});

export const ExtractsResponseSchema = z.object({
    query: z.object({
        pages: z.record(
            z.string(),
            z.object({
                title: z.string().optional(),
                extract: z.string().optional(),
            })
        ),
    }),
});

export type ApiEnvelope = z.infer<typeof ApiEnvelopeSchema>;
export type LoginResponse = z.infer<typeof LoginResponseSchema>;
export type WbGetEntitiesResponse = z.infer<typeof WbGetEntitiesResponseSchema>;
