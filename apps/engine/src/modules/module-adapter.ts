import {
    ArtifactRef,
    CompensationOutcome,
    StepContext,
    StepInput,
    StepOutcome,
    StepPort,
    TerminalStepError,
    classifyError,
    completed,
    errored,
    formatArtifactRef,
} from '@pipewright/sdk';
import { PersistenceGateway, Schema } from '../persistence/gateway';
import { CollaboratorResult, unwrap } from './collaborator';

export interface ArtifactBody<P, I> {
    payload: P;
    items: I[];
}

/**
 * Shared Step Port implementation for the pipeline modules.
 *
 * execute(): reuse the artifact already saved for (runId, stepName), else
 * read the upstream artifact through a view schema, call the collaborator,
 * validate what it returned and save it through this module's gateway.
 * Once ctx.signal has fired nothing is left saved.
 * Nothing escapes as an exception: failures become ERRORED outcomes.
 *
 * compensate(): delete through the same gateway, so only this module's
 * namespace can ever be touched.
 */
export abstract class ModuleAdapter<TSource, TOutput, P, I> implements StepPort {
    protected abstract readonly outputSchema: Schema<TOutput>;

    constructor(protected readonly gateway: PersistenceGateway<P, I>) { }

    protected abstract resolveSource(ctx: StepContext, input: StepInput): Promise<TSource>;
    protected abstract invoke(source: TSource, ctx: StepContext): Promise<CollaboratorResult<TOutput>>;
    protected abstract toArtifact(output: TOutput, source: TSource, ctx: StepContext): ArtifactBody<P, I>;

    /** Maps a saved artifact to the step outcome. QC overrides this to reject. */
    protected classify(_artifact: ArtifactBody<P, I>, ref: ArtifactRef, rowsWritten: number): StepOutcome {
        return completed(ref, rowsWritten);
    }

    async execute(ctx: StepContext, input: StepInput): Promise<StepOutcome> {
        try {
            const cached = await this.gateway.findByStep(ctx.runId, ctx.stepName);
            if (cached) {
                return this.classify(cached, cached.ref, 1 + cached.items.length);
            }

            const source = await this.resolveSource(ctx, input);
            const raw = unwrap(await this.invoke(source, ctx), ctx.stepName);
            const parsed = this.outputSchema.safeParse(raw);
            if (!parsed.success) {
                throw new TerminalStepError(`Collaborator returned malformed output: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
                    stepName: ctx.stepName,
                });
            }

            const body = this.toArtifact(parsed.data, source, ctx);
            // A timed-out attempt must not write after the coordinator gave up on it
            ctx.signal.throwIfAborted();
            const saved = await this.gateway.save({ runId: ctx.runId, stepName: ctx.stepName, ...body });
            if (ctx.signal.aborted && saved.created) {
                await this.gateway.delete(saved.ref);
                ctx.signal.throwIfAborted();
            }
            return this.classify(body, saved.ref, saved.rowsWritten);
        } catch (err) {
            return errored(classifyError(err, ctx.stepName));
        }
    }

    async compensate(_ctx: StepContext, outputRef: ArtifactRef): Promise<CompensationOutcome> {
        const { rowsRemoved } = await this.gateway.delete(outputRef);
        return { rowsRemoved };
    }
}

export interface Upstream<T> {
    ref: ArtifactRef;
    view: T;
}

/**
 * Reads an upstream artifact through `view`, the subset of its shape this
 * module depends on. The producing module's own types are never imported.
 */
export async function readUpstream<T>(
    ctx: StepContext,
    ref: ArtifactRef | null,
    namespace: string,
    view: Schema<T>,
): Promise<Upstream<T>> {
    if (!ref) {
        throw new TerminalStepError(`Step "${ctx.stepName}" needs a ${namespace} artifact as input`, { stepName: ctx.stepName });
    }
    if (ref.namespace !== namespace) {
        throw new TerminalStepError(
            `Step "${ctx.stepName}" expected a ${namespace} artifact, got ${formatArtifactRef(ref)}`,
            { stepName: ctx.stepName },
        );
    }

    const envelope = await ctx.fetch(ref);
    const parsed = view.safeParse({ payload: envelope.payload, items: envelope.items });
    if (!parsed.success) {
        throw new TerminalStepError(
            `Artifact ${formatArtifactRef(ref)} does not provide what "${ctx.stepName}" reads: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
            { stepName: ctx.stepName },
        );
    }
    return { ref, view: parsed.data };
}
