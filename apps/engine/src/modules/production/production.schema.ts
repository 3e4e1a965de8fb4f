import { z } from 'zod';

// The part of a strategy document this module reads
export const StrategyViewSchema = z.object({
    payload: z.object({
        positioning: z.string(),
        tone: z.string(),
    }),
    items: z.array(z.object({
        title: z.string(),
        description: z.string(),
        channel: z.string(),
    })).min(1),
});

export type StrategyView = z.infer<typeof StrategyViewSchema>;

export const DraftAssetSchema = z.object({
    kind: z.enum(['post', 'caption', 'email', 'script']),
    channel: z.string().min(1),
    content: z.string().min(1),
});

export type DraftAsset = z.infer<typeof DraftAssetSchema>;

export const WrittenDraftSchema = z.object({
    title: z.string().min(1),
    body: z.string().min(1),
    assets: z.array(DraftAssetSchema),
});

export type WrittenDraft = z.infer<typeof WrittenDraftSchema>;

export const ProductionDraftSchema = z.object({
    strategyRef: z.string().min(1),
    title: z.string().min(1),
    body: z.string().min(1),
    wordCount: z.number().int().nonnegative(),
});

export type ProductionDraft = z.infer<typeof ProductionDraftSchema>;
