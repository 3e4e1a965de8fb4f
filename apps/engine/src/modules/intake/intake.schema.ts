import { z } from 'zod';

/** Initial workflow input: what the client submitted. */
export const ClientRequestSchema = z.object({
    clientName: z.string().min(1, 'clientName is required'),
    industry: z.string().min(1, 'industry is required'),
    goals: z.array(z.string().min(1)).min(1, 'at least one goal is required'),
    audience: z.string().min(1, 'audience is required'),
    channels: z.array(z.string().min(1)).min(1, 'at least one channel is required'),
    answers: z.record(z.string()).default({}),
});

export type ClientRequest = z.infer<typeof ClientRequestSchema>;

export const NormalizedBriefSchema = z.object({
    clientName: z.string().min(1),
    industry: z.string().min(1),
    objective: z.string().min(1),
    audience: z.string().min(1),
    channels: z.array(z.string().min(1)).min(1),
    answers: z.array(z.object({ question: z.string().min(1), answer: z.string() })),
});

export type NormalizedBrief = z.infer<typeof NormalizedBriefSchema>;

// Brief artifact: root row
export const BriefSchema = z.object({
    clientName: z.string().min(1),
    industry: z.string().min(1),
    objective: z.string().min(1),
    audience: z.string().min(1),
    channels: z.array(z.string()).min(1),
});

export type Brief = z.infer<typeof BriefSchema>;

// Brief artifact: one row per intake answer
export const BriefAnswerSchema = z.object({
    question: z.string().min(1),
    answer: z.string(),
});

export type BriefAnswer = z.infer<typeof BriefAnswerSchema>;
