import { RecoverableStepError, TerminalStepError } from '@pipewright/sdk';
import { fail, succeed, unwrap } from '../../src/modules/collaborator';

describe('collaborator results', () => {
    it('unwraps a success', () => {
        expect(unwrap(succeed({ score: 90 }), 'qc')).toEqual({ score: 90 });
    });

    it('raises a recoverable failure as RecoverableStepError', () => {
        const error = (() => {
            try {
                unwrap(fail('recoverable', 'rate limited'), 'strategy');
            } catch (err) {
                return err;
            }
            return null;
        })();

        expect(error).toBeInstanceOf(RecoverableStepError);
        expect(error).toMatchObject({ message: 'rate limited', stepName: 'strategy', recoverable: true });
    });

    it('raises a terminal failure as TerminalStepError', () => {
        expect(() => unwrap(fail('terminal', 'brief is empty'), 'intake')).toThrow(TerminalStepError);
    });
});
