import { ArtifactRef, StepContext, StepInput, StepOutcome, completed, formatArtifactRef, rejected } from '@pipewright/sdk';
import { PersistenceGateway } from '../../persistence/gateway';
import { CollaboratorResult } from '../collaborator';
import { ArtifactBody, ModuleAdapter, readUpstream } from '../module-adapter';
import { NAMESPACES } from '../namespaces';
import { DraftView, DraftViewSchema, Evaluation, EvaluationSchema, QcIssue, QcResult } from './qc.schema';

export interface QualityEvaluator {
    evaluate(draft: DraftView, signal: AbortSignal): Promise<CollaboratorResult<Evaluation>>;
}

interface QcSource {
    draftRef: string;
    draft: DraftView;
}

/**
 * The pipeline's branch point. A failing verdict is persisted like a passing
 * one, then reported as REJECTED so the coordinator compensates.
 */
export class QcAdapter extends ModuleAdapter<QcSource, Evaluation, QcResult, QcIssue> {
    protected readonly outputSchema = EvaluationSchema;

    constructor(gateway: PersistenceGateway<QcResult, QcIssue>, private readonly evaluator: QualityEvaluator) {
        super(gateway);
    }

    protected async resolveSource(ctx: StepContext, input: StepInput): Promise<QcSource> {
        const upstream = await readUpstream(ctx, input, NAMESPACES.production, DraftViewSchema);
        return { draftRef: formatArtifactRef(upstream.ref), draft: upstream.view };
    }

    protected invoke(source: QcSource, ctx: StepContext): Promise<CollaboratorResult<Evaluation>> {
        return this.evaluator.evaluate(source.draft, ctx.signal);
    }

    protected toArtifact(evaluation: Evaluation, source: QcSource): ArtifactBody<QcResult, QcIssue> {
        return {
            payload: { draftRef: source.draftRef, passed: evaluation.passed, score: evaluation.score },
            items: evaluation.issues,
        };
    }

    protected classify(artifact: ArtifactBody<QcResult, QcIssue>, ref: ArtifactRef, rowsWritten: number): StepOutcome {
        const { passed, score } = artifact.payload;
        if (passed) {
            return completed(ref, rowsWritten, { verdict: 'pass', score });
        }
        const blocking = artifact.items.filter(issue => issue.severity !== 'minor');
        const reason = blocking.length > 0
            ? `QC verdict: fail (score ${score}): ${blocking.map(issue => issue.message).join('; ')}`
            : `QC verdict: fail (score ${score})`;
        return rejected(reason, ref, rowsWritten, { verdict: 'fail', score });
    }
}
