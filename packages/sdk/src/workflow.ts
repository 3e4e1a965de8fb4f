import { StepDefinition, WorkflowDefinition } from './types';
import { WorkflowDefinitionError } from './errors';

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;
const MAX_NAME_LENGTH = 100;

function assertName(kind: string, name: string): void {
    if (!name || name.length === 0) {
        throw new WorkflowDefinitionError(`${kind} name cannot be empty`);
    }
    if (name.length > MAX_NAME_LENGTH) {
        throw new WorkflowDefinitionError(`${kind} name exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
    }
    if (!NAME_PATTERN.test(name)) {
        throw new WorkflowDefinitionError(`${kind} name must contain only alphanumeric characters, dashes, and underscores`);
    }
}

/**
 * Declares an ordered step list. Steps run in array order and are
 * compensated in reverse; each step's port supplies its own compensation.
 *
 * @example
 * const pipeline = defineWorkflow('client-to-delivery', [
 *   { name: 'intake', port: intake },
 *   { name: 'strategy', port: strategy, timeoutMs: 60_000 },
 * ]);
 */
export function defineWorkflow(name: string, steps: StepDefinition[]): WorkflowDefinition {
    assertName('Workflow', name);
    if (steps.length === 0) {
        throw new WorkflowDefinitionError(`Workflow "${name}" must declare at least one step`);
    }

    const seen = new Set<string>();
    for (const step of steps) {
        assertName('Step', step.name);
        if (seen.has(step.name)) {
            throw new WorkflowDefinitionError(`Workflow "${name}" declares step "${step.name}" twice`);
        }
        seen.add(step.name);
        if (step.timeoutMs !== undefined && step.timeoutMs <= 0) {
            throw new WorkflowDefinitionError(`Step "${step.name}" timeoutMs must be positive`);
        }
        if (step.maxAttempts !== undefined && (!Number.isInteger(step.maxAttempts) || step.maxAttempts < 1)) {
            throw new WorkflowDefinitionError(`Step "${step.name}" maxAttempts must be a positive integer`);
        }
    }

    return Object.freeze({
        name,
        steps: Object.freeze(steps.map(step => Object.freeze({ ...step }))),
    });
}

/** Name → definition lookup. Construct one per runtime; there is no global instance. */
export class WorkflowRegistry {
    private workflows = new Map<string, WorkflowDefinition>();

    register(definition: WorkflowDefinition): WorkflowDefinition {
        if (this.workflows.has(definition.name)) {
            throw new WorkflowDefinitionError(`Workflow "${definition.name}" is already registered.`);
        }
        this.workflows.set(definition.name, definition);
        return definition;
    }

    get(name: string): WorkflowDefinition | undefined {
        return this.workflows.get(name);
    }

    list(): string[] {
        return Array.from(this.workflows.keys());
    }
}
