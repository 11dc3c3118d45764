/**
 * Zod schemas for Geosite Probe data structures.
 *
 * The catalog shapes here are the decoded, in-memory form. Binary and text
 * catalog files are mapped onto them at the load boundary (CLI package).
 */

import { z } from 'zod';
import { SELECTOR } from './constants.js';

// ============================================================================
// Catalog Schemas
// ============================================================================

/**
 * Closed tagged variant for a rule's match type.
 * Codes outside the known set are kept as `unknown` with the raw code so
 * they fall back to exact matching instead of being silently dropped.
 */
export const MatchTypeSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('plain') }),
    z.object({ kind: z.literal('domain') }),
    z.object({ kind: z.literal('full') }),
    z.object({ kind: z.literal('regex') }),
    z.object({ kind: z.literal('unknown'), code: z.number().int() }),
]);

export type MatchType = z.infer<typeof MatchTypeSchema>;

/**
 * Strategy names reported for diagnostics.
 * Same vocabulary as MatchType kinds.
 */
export const StrategySchema = z.enum(['plain', 'domain', 'full', 'regex', 'unknown']);

export type Strategy = z.infer<typeof StrategySchema>;

/**
 * A single domain-matching rule.
 * Attribute keys may repeat within a rule.
 */
export const CatalogRuleSchema = z.object({
    type: MatchTypeSchema,
    value: z.string(),
    attributes: z.array(z.string()),
});

export type CatalogRule = z.infer<typeof CatalogRuleSchema>;

/**
 * A named group of rules (geosite "country code").
 */
export const CategorySchema = z.object({
    tag: z.string(),
    rules: z.array(CatalogRuleSchema),
});

export type Category = z.infer<typeof CategorySchema>;

export const CatalogSchema = z.object({
    categories: z.array(CategorySchema),
});

export type Catalog = z.infer<typeof CatalogSchema>;

// ============================================================================
// Match Schemas
// ============================================================================

/**
 * One selector hit for one host.
 * `attribute` is '' for base selectors.
 */
export const MatchRecordSchema = z.object({
    selector: z.string().min(1),
    tag: z.string(),
    attribute: z.string(),
    groupSize: z.number().int().min(0),
    strategy: StrategySchema,
    ruleValue: z.string(),
});

export type MatchRecord = z.infer<typeof MatchRecordSchema>;

// ============================================================================
// File Schemas
// ============================================================================

/**
 * Text catalog rule: `type` is a kind name or the integer code used by
 * geosite.dat. Mapping to MatchType happens in the loader.
 */
export const TextCatalogRuleSchema = z.object({
    type: z.union([z.enum(['plain', 'domain', 'full', 'regex']), z.number().int().min(0)]),
    value: z.string(),
    attributes: z.array(z.string()).default([]),
});

export type TextCatalogRule = z.infer<typeof TextCatalogRuleSchema>;

export const TextCatalogSchema = z.object({
    categories: z.array(
        z.object({
            tag: z.string().min(1),
            rules: z.array(TextCatalogRuleSchema).default([]),
        })
    ),
});

export type TextCatalog = z.infer<typeof TextCatalogSchema>;

/**
 * geoprobe.yaml. Every key is optional; CLI flags win over the file.
 */
export const ProbeConfigSchema = z
    .object({
        catalog: z.string().min(1).optional(),
        domains: z.string().min(1).optional(),
        why: z.boolean().optional(),
        selectorPrefix: z
            .string()
            .min(1)
            .refine(
                (p) => !p.includes(SELECTOR.PREFIX_SEPARATOR) && !p.includes(SELECTOR.ATTRIBUTE_SEPARATOR),
                'Selector prefix cannot contain ":" or "@"'
            )
            .optional(),
    })
    .strict();

export type ProbeConfig = z.infer<typeof ProbeConfigSchema>;

// ============================================================================
// Route Schemas
// ============================================================================

export const RouteRuleSchema = z.object({
    id: z.string().min(1),
    type: z.string(),
    domain: z.array(z.string().min(1)).min(1),
    outboundTag: z.string(),
    __name__: z.string(),
});

export type RouteRule = z.infer<typeof RouteRuleSchema>;

/**
 * Routing document packaged into an import token.
 * Key order matters: it is the serialized order.
 */
export const RouteDocumentSchema = z.object({
    name: z.string(),
    domainStrategy: z.string(),
    id: z.string().min(1),
    domainMatcher: z.string(),
    rules: z.array(RouteRuleSchema),
    balancers: z.array(z.unknown()),
});

export type RouteDocument = z.infer<typeof RouteDocumentSchema>;
