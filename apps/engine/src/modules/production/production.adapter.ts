import { StepContext, StepInput, formatArtifactRef } from '@pipewright/sdk';
import { PersistenceGateway } from '../../persistence/gateway';
import { CollaboratorResult } from '../collaborator';
import { ArtifactBody, ModuleAdapter, readUpstream } from '../module-adapter';
import { NAMESPACES } from '../namespaces';
import {
    DraftAsset,
    ProductionDraft,
    StrategyView,
    StrategyViewSchema,
    WrittenDraft,
    WrittenDraftSchema,
} from './production.schema';

export interface DraftWriter {
    write(strategy: StrategyView, signal: AbortSignal): Promise<CollaboratorResult<WrittenDraft>>;
}

interface ProductionSource {
    strategyRef: string;
    strategy: StrategyView;
}

export function countWords(text: string): number {
    const words = text.trim().split(/\s+/);
    return words[0] === '' ? 0 : words.length;
}

export class ProductionAdapter extends ModuleAdapter<ProductionSource, WrittenDraft, ProductionDraft, DraftAsset> {
    protected readonly outputSchema = WrittenDraftSchema;

    constructor(gateway: PersistenceGateway<ProductionDraft, DraftAsset>, private readonly writer: DraftWriter) {
        super(gateway);
    }

    protected async resolveSource(ctx: StepContext, input: StepInput): Promise<ProductionSource> {
        const upstream = await readUpstream(ctx, input, NAMESPACES.strategy, StrategyViewSchema);
        return { strategyRef: formatArtifactRef(upstream.ref), strategy: upstream.view };
    }

    protected invoke(source: ProductionSource, ctx: StepContext): Promise<CollaboratorResult<WrittenDraft>> {
        return this.writer.write(source.strategy, ctx.signal);
    }

    protected toArtifact(draft: WrittenDraft, source: ProductionSource): ArtifactBody<ProductionDraft, DraftAsset> {
        return {
            payload: {
                strategyRef: source.strategyRef,
                title: draft.title,
                body: draft.body,
                wordCount: countWords(draft.body),
            },
            items: draft.assets,
        };
    }
}
