import { ConsistencyViolation, formatArtifactRef } from '@pipewright/sdk';
import { stepStatus } from '../db/step_record.entity';
import { ArtifactStorage } from '../persistence/artifact-storage';
import { RunStore } from '../persistence/run-store';

/**
 * Cross-checks a run's ledger against the artifacts that actually exist.
 * Findings are returned, never thrown; an empty list means the run is
 * consistent.
 */
export class IntegrityChecker {
    constructor(
        private readonly runs: RunStore,
        private readonly artifacts: ArtifactStorage,
    ) { }

    async check(runId: string): Promise<ConsistencyViolation[]> {
        const records = await this.runs.listSteps(runId);
        const logs = await this.runs.listCompensationLogs(runId);
        const live = await this.artifacts.listLive(runId);
        const violations: ConsistencyViolation[] = [];

        const liveByRef = new Map(live.map(artifact => [formatArtifactRef(artifact.ref), artifact]));

        for (const record of records) {
            if (record.status === stepStatus.COMPLETED) {
                if (!record.output_ref || !liveByRef.has(record.output_ref)) {
                    violations.push(new ConsistencyViolation('missing-artifact', runId, record.step_name,
                        `step is COMPLETED but artifact ${record.output_ref ?? '(none)'} does not exist`));
                }
            }
        }

        for (const artifact of live) {
            const ref = formatArtifactRef(artifact.ref);
            const record = records.find(r => r.step_name === artifact.stepName);
            if (!record || record.output_ref !== ref) {
                violations.push(new ConsistencyViolation('untracked-artifact', runId, artifact.stepName,
                    `artifact ${ref} has no step record pointing at it`));
            } else if (record.status !== stepStatus.COMPLETED) {
                violations.push(new ConsistencyViolation('orphaned-artifact', runId, artifact.stepName,
                    `artifact ${ref} still exists but step is ${record.status}`));
            }
        }

        for (const log of logs) {
            const record = records.find(r => r.step_name === log.step_name);
            const expected = record ? record.rows_written : 0;
            if (log.rows_affected !== expected) {
                violations.push(new ConsistencyViolation('compensation-mismatch', runId, log.step_name,
                    `compensation removed ${log.rows_affected} rows, execute wrote ${expected}`));
            }
        }

        return violations;
    }
}
