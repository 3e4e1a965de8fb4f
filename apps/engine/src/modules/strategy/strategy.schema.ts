import { z } from 'zod';

// The part of an intake Brief this module reads
export const BriefViewSchema = z.object({
    payload: z.object({
        clientName: z.string(),
        industry: z.string(),
        objective: z.string(),
        audience: z.string(),
        channels: z.array(z.string()).min(1),
    }),
    items: z.array(z.object({ question: z.string(), answer: z.string() })),
});

export type BriefView = z.infer<typeof BriefViewSchema>;

export const StrategyPillarSchema = z.object({
    title: z.string().min(1),
    description: z.string().min(1),
    channel: z.string().min(1),
});

export type StrategyPillar = z.infer<typeof StrategyPillarSchema>;

export const GeneratedStrategySchema = z.object({
    positioning: z.string().min(1),
    tone: z.string().min(1),
    pillars: z.array(StrategyPillarSchema).min(1, 'a strategy needs at least one pillar'),
});

export type GeneratedStrategy = z.infer<typeof GeneratedStrategySchema>;

export const StrategyDocumentSchema = z.object({
    briefRef: z.string().min(1),
    positioning: z.string().min(1),
    tone: z.string().min(1),
});

export type StrategyDocument = z.infer<typeof StrategyDocumentSchema>;
