// public api for @pipewright/sdk
// usage:
//   import { defineWorkflow, completed, TerminalStepError } from '@pipewright/sdk';
//   const pipeline = defineWorkflow('client-to-delivery', [{ name: 'intake', port }]);

export type {
    ArtifactRef,
    ArtifactEnvelope,
    StepContext,
    StepInput,
    StepMetadata,
    StepOutcome,
    CompensationOutcome,
    StepPort,
    StepOptions,
    StepDefinition,
    WorkflowDefinition,
    WorkflowResult,
} from './types';
export {
    StepError,
    RecoverableStepError,
    TerminalStepError,
    StepTimeoutError,
    CompensationError,
    ConsistencyViolation,
    WorkflowDefinitionError,
    classifyError,
    describeError,
} from './errors';
export type { StepErrorOptions, ConsistencyViolationKind } from './errors';
export { completed, rejected, errored } from './outcome';
export {
    createArtifactRef,
    formatArtifactRef,
    parseArtifactRef,
    sameRef,
    isValidNamespace,
    InvalidArtifactRefError,
} from './refs';
export { defineWorkflow, WorkflowRegistry } from './workflow';
export { serialize, deserialize, SerializationError, MAX_PAYLOAD_SIZE } from './utils/serialization';
