/**
 * Every candidate API version answered 400 or 404: the FlinkDeployment CRD is not
 * installed, or serves none of the versions this service knows.
 */
export class NoServedVersionError extends Error {
  constructor(
    readonly group: string,
    readonly plural: string,
    readonly triedVersions: readonly string[],
    options?: { cause?: unknown },
  ) {
    super(
      `Unable to query ${plural}.${group}: no served versions available (tried ${triedVersions.join(', ')})`,
      options,
    );
    this.name = 'NoServedVersionError';
  }
}
