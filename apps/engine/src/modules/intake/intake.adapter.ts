import { StepContext, TerminalStepError } from '@pipewright/sdk';
import { PersistenceGateway } from '../../persistence/gateway';
import { CollaboratorResult } from '../collaborator';
import { ArtifactBody, ModuleAdapter } from '../module-adapter';
import {
    Brief,
    BriefAnswer,
    ClientRequest,
    ClientRequestSchema,
    NormalizedBrief,
    NormalizedBriefSchema,
} from './intake.schema';

export interface BriefNormalizer {
    normalize(request: ClientRequest, signal: AbortSignal): Promise<CollaboratorResult<NormalizedBrief>>;
}

/** First step: validates the client's request and stores it as a Brief. */
export class IntakeAdapter extends ModuleAdapter<ClientRequest, NormalizedBrief, Brief, BriefAnswer> {
    protected readonly outputSchema = NormalizedBriefSchema;

    constructor(gateway: PersistenceGateway<Brief, BriefAnswer>, private readonly normalizer: BriefNormalizer) {
        super(gateway);
    }

    protected async resolveSource(ctx: StepContext): Promise<ClientRequest> {
        const parsed = ClientRequestSchema.safeParse(ctx.initialInput);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new TerminalStepError(`Invalid client request: ${issue ? issue.message : 'malformed input'}`, {
                stepName: ctx.stepName,
            });
        }
        return parsed.data;
    }

    protected invoke(request: ClientRequest, ctx: StepContext): Promise<CollaboratorResult<NormalizedBrief>> {
        return this.normalizer.normalize(request, ctx.signal);
    }

    protected toArtifact(brief: NormalizedBrief): ArtifactBody<Brief, BriefAnswer> {
        const { answers, ...payload } = brief;
        return { payload, items: answers };
    }
}
