import { TerminalStepError } from '@pipewright/sdk';
import {
    ClientRequest,
    CollaboratorResult,
    Collaborators,
    DeliveryPackager,
    QualityEvaluator,
    createLocalCollaborators,
    fail,
    succeed,
} from '../../src/modules';

// Two answers, two channels: intake, strategy and production each write 3
// rows, a passing QC writes 1, delivery writes 4 (root + draft.md + 2 assets)
export const sampleRequest: ClientRequest = {
    clientName: 'Acme Bakery',
    industry: 'Food',
    goals: ['grow foot traffic', 'launch catering'],
    audience: 'local families',
    channels: ['instagram', 'email'],
    answers: { 'Budget?': 'modest', 'Launch date?': 'spring' },
};

export const EXPECTED_ROWS: Record<string, number> = {
    intake: 3,
    strategy: 3,
    production: 3,
    qc: 1,
    delivery: 4,
};

export function collaborators(overrides: Partial<Collaborators> = {}): Collaborators {
    return { ...createLocalCollaborators(), ...overrides };
}

/** Fails the draft with one blocker issue: QC persists 2 rows, then rejects. */
export const rejectingEvaluator: QualityEvaluator = {
    async evaluate() {
        return succeed({
            passed: false,
            score: 40,
            issues: [{ severity: 'blocker' as const, message: 'Off-brand tone' }],
        });
    },
};

export const throwingPackager: DeliveryPackager = {
    async package() {
        throw new TerminalStepError('Export target rejected the package');
    },
};

/** Returns a recoverable failure `failures` times, then delegates. */
export function flaky<A extends unknown[], T>(
    failures: number,
    inner: (...args: A) => Promise<CollaboratorResult<T>>,
): { calls: () => number; fn: (...args: A) => Promise<CollaboratorResult<T>> } {
    let calls = 0;
    return {
        calls: () => calls,
        fn: async (...args: A) => {
            calls++;
            if (calls <= failures) return fail('recoverable', `transient failure ${calls}`);
            return inner(...args);
        },
    };
}
