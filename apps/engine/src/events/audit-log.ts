import { EventBus, SagaEventName, SagaEvents } from './event-bus';

const TAG = '[audit]';

export interface RecordedEvent {
    channel: SagaEventName;
    payload: SagaEvents[SagaEventName];
}

export function formatEvent(channel: SagaEventName, payload: SagaEvents[SagaEventName]): string {
    const step = 'stepName' in payload ? ` step=${payload.stepName}` : '';
    const status = 'status' in payload ? ` status=${payload.status}` : '';
    return `${channel} run=${payload.runId}${step}${status}`;
}

/** Writes one log line per lifecycle event. */
export function attachAuditLog(bus: EventBus, write: (line: string) => void = line => console.log(`${TAG} ${line}`)): () => void {
    return bus.subscribeAll((channel, payload) => write(formatEvent(channel, payload)));
}

/** Keeps every event in memory, for inspection after a run. */
export class EventRecorder {
    readonly events: RecordedEvent[] = [];
    private detach: (() => void) | null = null;

    constructor(bus: EventBus) {
        this.detach = bus.subscribeAll((channel, payload) => {
            this.events.push({ channel, payload });
        });
    }

    channels(): SagaEventName[] {
        return this.events.map(event => event.channel);
    }

    forRun(runId: string): RecordedEvent[] {
        return this.events.filter(event => event.payload.runId === runId);
    }

    stop(): void {
        this.detach?.();
        this.detach = null;
    }
}
