export enum FlinkJobType {
  APPLICATION = 'APPLICATION',
  SESSION = 'SESSION',
}

export const UNKNOWN_JOB_STATUS = 'UNKNOWN';

export type FlinkJobResourceRole = 'jm' | 'tm';

export class FlinkJobResources {
  private constructor(
    readonly replicas: number,
    readonly cpu: string,
    readonly mem: string,
  ) {
    Object.freeze(this);
  }

  static of(replicas: number, cpu: string, mem: string): FlinkJobResources {
    const safeReplicas = Number.isFinite(replicas) ? Math.max(0, Math.trunc(replicas)) : 0;
    return new FlinkJobResources(safeReplicas, cpu, mem);
  }

  static empty(): FlinkJobResources {
    return new FlinkJobResources(0, '', '');
  }
}

export interface FlinkJobProps {
  id: string;
  name: string;
  status: string;
  type: FlinkJobType;
  startTime?: number;
  shortImage: string;
  flinkVersion: string;
  parallelism: number;
  resources: Partial<Record<FlinkJobResourceRole, FlinkJobResources>>;
  metadata?: Record<string, string>;
}

/**
 * Read-only snapshot of one Flink deployment, rebuilt on every listing.
 */
export class FlinkJob {
  readonly id: string;
  readonly name: string;
  readonly status: string;
  readonly type: FlinkJobType;
  readonly startTime?: number;
  readonly shortImage: string;
  readonly flinkVersion: string;
  readonly parallelism: number;
  readonly resources: Readonly<Record<FlinkJobResourceRole, FlinkJobResources>>;
  readonly metadata: Readonly<Record<string, string>>;

  private constructor(props: FlinkJobProps) {
    this.id = props.id;
    this.name = props.name;
    this.status = props.status;
    this.type = props.type;
    if (props.startTime !== undefined) {
      this.startTime = props.startTime;
    }
    this.shortImage = props.shortImage;
    this.flinkVersion = props.flinkVersion;
    this.parallelism = Number.isFinite(props.parallelism)
      ? Math.max(0, Math.trunc(props.parallelism))
      : 0;
    // both roles are always present, even for fully empty documents
    this.resources = Object.freeze({
      jm: props.resources.jm ?? FlinkJobResources.empty(),
      tm: props.resources.tm ?? FlinkJobResources.empty(),
    });
    this.metadata = Object.freeze({ ...(props.metadata ?? {}) });
    Object.freeze(this);
  }

  static create(props: FlinkJobProps): FlinkJob {
    return new FlinkJob(props);
  }
}
