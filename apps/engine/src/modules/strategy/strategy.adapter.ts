import { StepContext, StepInput, formatArtifactRef } from '@pipewright/sdk';
import { PersistenceGateway } from '../../persistence/gateway';
import { CollaboratorResult } from '../collaborator';
import { ArtifactBody, ModuleAdapter, readUpstream } from '../module-adapter';
import { NAMESPACES } from '../namespaces';
import {
    BriefView,
    BriefViewSchema,
    GeneratedStrategy,
    GeneratedStrategySchema,
    StrategyDocument,
    StrategyPillar,
} from './strategy.schema';

export interface StrategyGenerator {
    generate(brief: BriefView, signal: AbortSignal): Promise<CollaboratorResult<GeneratedStrategy>>;
}

interface StrategySource {
    briefRef: string;
    brief: BriefView;
}

export class StrategyAdapter extends ModuleAdapter<StrategySource, GeneratedStrategy, StrategyDocument, StrategyPillar> {
    protected readonly outputSchema = GeneratedStrategySchema;

    constructor(gateway: PersistenceGateway<StrategyDocument, StrategyPillar>, private readonly generator: StrategyGenerator) {
        super(gateway);
    }

    protected async resolveSource(ctx: StepContext, input: StepInput): Promise<StrategySource> {
        const upstream = await readUpstream(ctx, input, NAMESPACES.intake, BriefViewSchema);
        return { briefRef: formatArtifactRef(upstream.ref), brief: upstream.view };
    }

    protected invoke(source: StrategySource, ctx: StepContext): Promise<CollaboratorResult<GeneratedStrategy>> {
        return this.generator.generate(source.brief, ctx.signal);
    }

    protected toArtifact(strategy: GeneratedStrategy, source: StrategySource): ArtifactBody<StrategyDocument, StrategyPillar> {
        return {
            payload: { briefRef: source.briefRef, positioning: strategy.positioning, tone: strategy.tone },
            items: strategy.pillars,
        };
    }
}
