import { z } from 'zod';

// The part of a production draft this module reads
export const DraftViewSchema = z.object({
    payload: z.object({
        title: z.string(),
        body: z.string(),
        wordCount: z.number(),
    }),
    items: z.array(z.object({
        kind: z.string(),
        channel: z.string(),
        content: z.string(),
    })),
});

export type DraftView = z.infer<typeof DraftViewSchema>;

export const QcIssueSchema = z.object({
    severity: z.enum(['minor', 'major', 'blocker']),
    message: z.string().min(1),
});

export type QcIssue = z.infer<typeof QcIssueSchema>;

export const EvaluationSchema = z.object({
    passed: z.boolean(),
    score: z.number().min(0).max(100),
    issues: z.array(QcIssueSchema),
});

export type Evaluation = z.infer<typeof EvaluationSchema>;

export const QcResultSchema = z.object({
    // Logical foreign key into the production namespace; delivery follows it
    draftRef: z.string().min(1),
    passed: z.boolean(),
    score: z.number().min(0).max(100),
});

export type QcResult = z.infer<typeof QcResultSchema>;
