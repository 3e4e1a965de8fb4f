import {
    CompensationError,
    ConsistencyViolation,
    RecoverableStepError,
    StepTimeoutError,
    TerminalStepError,
    classifyError,
    describeError,
    errored,
    rejected,
} from '../src';

describe('step errors', () => {
    test('should mark recoverable and terminal errors', () => {
        expect(new RecoverableStepError('rate limited').recoverable).toBe(true);
        expect(new TerminalStepError('bad brief').recoverable).toBe(false);
        expect(new StepTimeoutError(500, { stepName: 'qc' })).toMatchObject({
            name: 'StepTimeoutError',
            message: 'Step timed out after 500ms',
            stepName: 'qc',
            recoverable: true,
        });
    });

    test('should pass step errors through classification', () => {
        const error = new RecoverableStepError('try later');
        expect(classifyError(error)).toBe(error);
    });

    test('should classify anything else as terminal', () => {
        const cause = new TypeError('undefined is not a function');
        const classified = classifyError(cause, 'production');

        expect(classified).toBeInstanceOf(TerminalStepError);
        expect(classified).toMatchObject({ message: 'undefined is not a function', stepName: 'production', cause });
        expect(classifyError('plain string').message).toBe('plain string');
    });

    test('should describe errors by name and message', () => {
        expect(describeError(new TerminalStepError('nope'))).toBe('TerminalStepError: nope');
        expect(describeError(42)).toBe('42');
        expect(new CompensationError('strategy', new Error('disk full')).message)
            .toBe('Compensation of "strategy" failed: Error: disk full');
    });

    test('should format consistency findings', () => {
        const violation = new ConsistencyViolation('orphaned-artifact', 'run-1', 'qc', 'artifact qc:9 still exists');
        expect(violation.message).toBe('[orphaned-artifact] run run-1 step qc: artifact qc:9 still exists');
        expect(violation.kind).toBe('orphaned-artifact');
    });
});

describe('step outcomes', () => {
    test('should default a rejection to no artifact', () => {
        expect(rejected('score too low')).toEqual({ status: 'REJECTED', outputRef: null, rowsWritten: 0, reason: 'score too low', metadata: {} });
    });

    test('should carry the error of an errored step', () => {
        const error = new TerminalStepError('boom');
        expect(errored(error)).toEqual({ status: 'ERRORED', error });
    });
});
