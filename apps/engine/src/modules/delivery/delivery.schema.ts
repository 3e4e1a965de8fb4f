import { z } from 'zod';

// The part of a QC result this module reads
export const QcViewSchema = z.object({
    payload: z.object({
        draftRef: z.string().min(1),
        passed: z.boolean(),
        score: z.number(),
    }),
    items: z.array(z.unknown()),
});

// The part of a production draft this module packages
export const DeliverableDraftViewSchema = z.object({
    payload: z.object({
        title: z.string(),
        body: z.string(),
    }),
    items: z.array(z.object({
        kind: z.string(),
        channel: z.string(),
        content: z.string(),
    })),
});

export type DeliverableDraftView = z.infer<typeof DeliverableDraftViewSchema>;

export const DeliveryFileSchema = z.object({
    name: z.string().min(1),
    mediaType: z.string().min(1),
    content: z.string(),
});

export type DeliveryFile = z.infer<typeof DeliveryFileSchema>;

export const PackagedDeliverySchema = z.object({
    files: z.array(DeliveryFileSchema).min(1, 'a delivery needs at least one file'),
});

export type PackagedDelivery = z.infer<typeof PackagedDeliverySchema>;

export const DeliveryPackageSchema = z.object({
    qcRef: z.string().min(1),
    draftRef: z.string().min(1),
    qcScore: z.number(),
    fileCount: z.number().int().positive(),
    deliveredAt: z.date(),
});

export type DeliveryPackage = z.infer<typeof DeliveryPackageSchema>;
