import { StepContext, StepInput, TerminalStepError, formatArtifactRef, parseArtifactRef } from '@pipewright/sdk';
import { PersistenceGateway } from '../../persistence/gateway';
import { CollaboratorResult } from '../collaborator';
import { ArtifactBody, ModuleAdapter, readUpstream } from '../module-adapter';
import { NAMESPACES } from '../namespaces';
import {
    DeliverableDraftView,
    DeliverableDraftViewSchema,
    DeliveryFile,
    DeliveryPackage,
    PackagedDelivery,
    PackagedDeliverySchema,
    QcViewSchema,
} from './delivery.schema';

export interface DeliveryPackager {
    package(draft: DeliverableDraftView, signal: AbortSignal): Promise<CollaboratorResult<PackagedDelivery>>;
}

interface DeliverySource {
    qcRef: string;
    draftRef: string;
    qcScore: number;
    draft: DeliverableDraftView;
}

export class DeliveryAdapter extends ModuleAdapter<DeliverySource, PackagedDelivery, DeliveryPackage, DeliveryFile> {
    protected readonly outputSchema = PackagedDeliverySchema;

    constructor(gateway: PersistenceGateway<DeliveryPackage, DeliveryFile>, private readonly packager: DeliveryPackager) {
        super(gateway);
    }

    protected async resolveSource(ctx: StepContext, input: StepInput): Promise<DeliverySource> {
        const qc = await readUpstream(ctx, input, NAMESPACES.qc, QcViewSchema);
        if (!qc.view.payload.passed) {
            throw new TerminalStepError(`QC result ${formatArtifactRef(qc.ref)} did not pass; refusing to deliver`, {
                stepName: ctx.stepName,
            });
        }

        // QC → draft is a logical foreign key: follow it by ref
        const draft = await readUpstream(ctx, parseArtifactRef(qc.view.payload.draftRef), NAMESPACES.production, DeliverableDraftViewSchema);
        return {
            qcRef: formatArtifactRef(qc.ref),
            draftRef: formatArtifactRef(draft.ref),
            qcScore: qc.view.payload.score,
            draft: draft.view,
        };
    }

    protected invoke(source: DeliverySource, ctx: StepContext): Promise<CollaboratorResult<PackagedDelivery>> {
        return this.packager.package(source.draft, ctx.signal);
    }

    protected toArtifact(delivery: PackagedDelivery, source: DeliverySource): ArtifactBody<DeliveryPackage, DeliveryFile> {
        return {
            payload: {
                qcRef: source.qcRef,
                draftRef: source.draftRef,
                qcScore: source.qcScore,
                fileCount: delivery.files.length,
                deliveredAt: new Date(),
            },
            items: delivery.files,
        };
    }
}
