import { StepOptions, WorkflowDefinition, defineWorkflow } from '@pipewright/sdk';
import { PipelinePorts } from './modules';

export const CONTENT_PIPELINE = 'client-to-delivery';

export type PipelineStepOptions = Partial<Record<keyof PipelinePorts, StepOptions>>;

/**
 * Intake → Strategy → Production → QC → Delivery. Each step consumes the
 * previous step's artifact, so the order is fixed.
 */
export function contentPipeline(ports: PipelinePorts, options: PipelineStepOptions = {}): WorkflowDefinition {
    return defineWorkflow(CONTENT_PIPELINE, [
        { name: 'intake', port: ports.intake, ...options.intake },
        { name: 'strategy', port: ports.strategy, ...options.strategy },
        { name: 'production', port: ports.production, ...options.production },
        { name: 'qc', port: ports.qc, ...options.qc },
        { name: 'delivery', port: ports.delivery, ...options.delivery },
    ]);
}
