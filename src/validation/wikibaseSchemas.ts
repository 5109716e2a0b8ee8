/**
 * Zod validation schemas for Wikibase entity JSON
 *
 * Validates `wbgetentities` payloads before they reach the patch engine, so
 * the engine can rely on the shapes declared in types/wikibase.ts.
 *
 * Wikibase serializes empty maps as `[]` (PHP arrays); those are normalised
 * to `{}` here.
 *
 * @see https://www.mediawiki.org/wiki/Wikibase/DataModel/JSON
 */

import { z } from 'zod';
import type {
    DataValue,
    Entity,
    Item,
    MissingEntity,
    Property,
    Reference,
    Snak,
    Statement,
} from '../types/wikibase.js';

/**
 * Record that also accepts the empty-array form, and a missing key
 */
function emptyArrayAsRecord<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(
        (value) => (value === undefined || (Array.isArray(value) && value.length === 0) ? {} : value),
        z.record(z.string(), schema)
    );
}

export const DataValueSchema: z.ZodType<DataValue, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
    z.object({ type: z.literal('string'), value: z.string() }),
    z.object({
        type: z.literal('wikibase-entityid'),
        value: z.object({
            'entity-type': z.enum(['item', 'property', 'lexeme', 'form', 'sense']),
            'numeric-id': z.number().int().optional(),
            id: z.string().optional(),
        }),
    }),
    z.object({
        type: z.literal('quantity'),
        value: z.object({
            amount: z.string(),
            upperBound: z.string().optional(),
            lowerBound: z.string().optional(),
            unit: z.string(),
        }),
    }),
    z.object({
        type: z.literal('time'),
        value: z.object({
            time: z.string(),
            timezone: z.number().int(),
            before: z.number().int(),
            after: z.number().int(),
            precision: z.number().int().min(0).max(14),
            calendarmodel: z.string(),
        }),
    }),
    z.object({
        type: z.literal('monolingualtext'),
        value: z.object({ language: z.string(), text: z.string() }),
    }),
    z.object({
        type: z.literal('globecoordinate'),
        value: z.object({
            latitude: z.number(),
            longitude: z.number(),
            altitude: z.number().nullable().optional(),
            precision: z.number().nullable(),
            globe: z.string(),
        }),
    }),
]);

export const SnakSchema: z.ZodType<Snak, z.ZodTypeDef, unknown> = z.discriminatedUnion('snaktype', [
    z.object({
        snaktype: z.literal('value'),
        property: z.string(),
        hash: z.string().optional(),
        datavalue: DataValueSchema,
        datatype: z.string(),
    }),
    z.object({
        snaktype: z.literal('somevalue'),
        property: z.string(),
        hash: z.string().optional(),
        datatype: z.string().optional(),
    }),
    z.object({
        snaktype: z.literal('novalue'),
        property: z.string(),
        hash: z.string().optional(),
        datatype: z.string().optional(),
    }),
]);

export const ReferenceSchema: z.ZodType<Reference, z.ZodTypeDef, unknown> = z.object({
    hash: z.string().optional(),
    snaks: emptyArrayAsRecord(z.array(SnakSchema)),
    'snaks-order': z.array(z.string()),
});

export const StatementSchema: z.ZodType<Statement, z.ZodTypeDef, unknown> = z.object({
    id: z.string(),
    type: z.literal('statement'),
    rank: z.enum(['preferred', 'normal', 'deprecated']),
    mainsnak: SnakSchema,
    qualifiers: z.record(z.string(), z.array(SnakSchema)).optional(),
    'qualifiers-order': z.array(z.string()).optional(),
    references: z.array(ReferenceSchema).optional(),
});

export const ItemSchema: z.ZodType<Item, z.ZodTypeDef, unknown> = z.object({
    type: z.literal('item'),
    id: z.string().regex(/^Q\d+$/),
    lastrevid: z.number().int(),
    claims: emptyArrayAsRecord(z.array(StatementSchema)),
});

export const PropertySchema: z.ZodType<Property, z.ZodTypeDef, unknown> = z.object({
    type: z.literal('property'),
    id: z.string().regex(/^P\d+$/),
    lastrevid: z.number().int(),
    datatype: z.string(),
    claims: emptyArrayAsRecord(z.array(StatementSchema)),
});

/**
 * Missing or deleted ids come back as `{ "id": "Q0", "missing": "" }`
 */
export const MissingEntitySchema: z.ZodType<MissingEntity, z.ZodTypeDef, unknown> = z
    .object({
        id: z.string(),
        missing: z.literal(''),
    })
    .transform(({ id }) => ({ id, missing: true as const }));

export const EntityOrMissingSchema: z.ZodType<Entity | MissingEntity, z.ZodTypeDef, unknown> = z.union([
    ItemSchema,
    PropertySchema,
    MissingEntitySchema,
]);

export type EntityOrMissing = z.infer<typeof EntityOrMissingSchema>;
