/**
 * The proxied request never produced a backend response: DNS failure, refused
 * connection, timeout or an aborted client.
 */
export class ProxyDispatchError extends Error {
  constructor(
    readonly appName: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to reach '${appName}' at ${url}`, options);
    this.name = 'ProxyDispatchError';
  }
}
