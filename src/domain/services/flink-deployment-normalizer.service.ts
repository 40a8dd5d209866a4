import {
  FlinkJob,
  FlinkJobResources,
  FlinkJobType,
  UNKNOWN_JOB_STATUS,
} from '../entities/flink-job.entity';
import {
  getInteger,
  getRecord,
  getScalar,
  getStringMap,
  getText,
  isPresent,
  RawDocument,
} from '../value-objects/raw-document';

export const TM_NUMBER_OF_TASK_SLOTS = 'taskmanager.numberOfTaskSlots';

/**
 * Turns a raw `FlinkDeployment` custom resource into a {@link FlinkJob}.
 *
 * Operator releases rename and drop fields freely, so every read falls back to a
 * default instead of failing. Pure: no I/O, no shared state.
 */
export class FlinkDeploymentNormalizer {
  normalize(document: unknown): FlinkJob {
    const spec = getRecord(document, ['spec']);
    const status = getRecord(document, ['status']);
    const metadata = getRecord(document, ['metadata']);

    const type = this.getJobType(spec);

    return FlinkJob.create({
      id: getText(metadata, ['uid']),
      name: getText(metadata, ['name']),
      status: this.getStatus(status),
      type,
      startTime: getInteger(status, ['jobStatus', 'startTime']),
      shortImage: this.getShortImage(spec),
      flinkVersion: this.getFlinkVersion(spec),
      parallelism: this.getParallelism(spec),
      resources: {
        jm: this.getResources(spec, 'jobManager'),
        tm: this.getTaskManagerResources(spec, status, type),
      },
      metadata: getStringMap(metadata, ['labels']),
    });
  }

  getJobType(spec: RawDocument): FlinkJobType {
    return isPresent(spec, ['job']) ? FlinkJobType.APPLICATION : FlinkJobType.SESSION;
  }

  getStatus(status: RawDocument): string {
    // older operators report status.state instead of status.jobStatus.state
    return (
      getScalar(status, ['jobStatus', 'state']) ??
      getScalar(status, ['state']) ??
      UNKNOWN_JOB_STATUS
    );
  }

  getShortImage(spec: RawDocument): string {
    const image = getText(spec, ['image']);
    const slash = image.indexOf('/');
    return slash === -1 ? image : image.slice(slash + 1);
  }

  getFlinkVersion(spec: RawDocument): string {
    return getText(spec, ['flinkVersion']).replace(/_/g, '.').replace(/v/g, '');
  }

  getParallelism(spec: RawDocument): number {
    const jobParallelism = getInteger(spec, ['job', 'parallelism']);
    if (jobParallelism !== undefined && jobParallelism > 0) {
      return jobParallelism;
    }

    const taskSlots = getInteger(spec, ['flinkConfiguration', TM_NUMBER_OF_TASK_SLOTS]);
    const replicas = getInteger(spec, ['taskManager', 'replicas']);
    if (taskSlots === undefined || replicas === undefined) {
      return 0;
    }
    return Math.max(0, taskSlots * replicas);
  }

  private getResources(
    spec: RawDocument,
    role: 'jobManager' | 'taskManager',
    replicas = getInteger(spec, [role, 'replicas']) ?? 0,
  ): FlinkJobResources {
    return FlinkJobResources.of(
      replicas,
      getText(spec, [role, 'resource', 'cpu']),
      getText(spec, [role, 'resource', 'memory']),
    );
  }

  private getTaskManagerResources(
    spec: RawDocument,
    status: RawDocument,
    type: FlinkJobType,
  ): FlinkJobResources {
    let replicas = getInteger(spec, ['taskManager', 'replicas']) ?? 0;
    if (replicas === 0 && type === FlinkJobType.APPLICATION) {
      replicas = getInteger(status, ['taskManager', 'replicas']) ?? 0;
    }
    return this.getResources(spec, 'taskManager', replicas);
  }
}
