import { runStatus } from '../db/workflow_run.entity';

const TAG = '[events]';

export interface StepEvent {
    runId: string;
    workflowName: string;
    stepName: string;
    sequenceIndex: number;
}

export interface SagaEvents {
    'step.started': StepEvent & { attempt: number };
    'step.completed': StepEvent & { outputRef: string; rowsWritten: number; metadata: Record<string, unknown>; reused: boolean };
    'step.retrying': StepEvent & { attempt: number; delayMs: number; error: string };
    'step.failed': StepEvent & { kind: 'rejected' | 'errored'; reason: string };
    'step.compensated': StepEvent & { rowsRemoved: number };
    'step.compensation_failed': StepEvent & { error: string };
    'run.terminal': {
        runId: string;
        workflowName: string;
        status: runStatus;
        completedSteps: string[];
        compensatedSteps: string[];
    };
}

export type SagaEventName = keyof SagaEvents;
export type SagaEventHandler<K extends SagaEventName> = (payload: SagaEvents[K]) => void;
export type AnySagaEventHandler = (channel: SagaEventName, payload: SagaEvents[SagaEventName]) => void;

type HandlerTable = { [K in SagaEventName]: Array<SagaEventHandler<K>> };

/**
 * In-process, synchronous pub/sub for run lifecycle events.
 *
 * publish() returns only after every subscriber has run, in the order they
 * subscribed, so the coordinator never advances past an event whose side
 * effects are still pending. Nothing is persisted.
 */
export class EventBus {
    private handlers: HandlerTable = {
        'step.started': [],
        'step.completed': [],
        'step.retrying': [],
        'step.failed': [],
        'step.compensated': [],
        'step.compensation_failed': [],
        'run.terminal': [],
    };
    private wildcard: AnySagaEventHandler[] = [];

    subscribe<K extends SagaEventName>(channel: K, handler: SagaEventHandler<K>): () => void {
        const list: Array<SagaEventHandler<K>> = this.handlers[channel];
        list.push(handler);
        return () => {
            const index = list.indexOf(handler);
            if (index >= 0) list.splice(index, 1);
        };
    }

    /** Receives every channel, after that channel's own subscribers. */
    subscribeAll(handler: AnySagaEventHandler): () => void {
        this.wildcard.push(handler);
        return () => {
            const index = this.wildcard.indexOf(handler);
            if (index >= 0) this.wildcard.splice(index, 1);
        };
    }

    publish<K extends SagaEventName>(channel: K, payload: SagaEvents[K]): void {
        const list: Array<SagaEventHandler<K>> = this.handlers[channel];
        // Copy so a handler that unsubscribes mid-dispatch does not skip its neighbour
        for (const handler of [...list]) {
            try {
                handler(payload);
            } catch (err) {
                console.error(`${TAG} subscriber for ${channel} threw:`, err);
            }
        }
        for (const handler of [...this.wildcard]) {
            try {
                handler(channel, payload);
            } catch (err) {
                console.error(`${TAG} wildcard subscriber for ${channel} threw:`, err);
            }
        }
    }

    listenerCount(channel: SagaEventName): number {
        return this.handlers[channel].length;
    }
}
