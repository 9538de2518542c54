/** Thrown when credentials, kubeconfig, or local host files cannot be used. */
export class ConfigurationError extends Error {
  readonly name = "ConfigurationError" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Thrown when the backend reports that a host's object does not exist. */
export class HostNotFoundError extends Error {
  readonly name = "HostNotFoundError" as const;
  constructor(
    public readonly kind: string,
    public readonly namespace: string,
    public readonly hostName: string,
  ) {
    super(`${kind} not found: ${namespace}/${hostName}`);
  }
}

/** Thrown when no address was observed for a host before the wait deadline. */
export class AddressTimeoutError extends Error {
  readonly name = "AddressTimeoutError" as const;
  constructor(
    public readonly namespace: string,
    public readonly hostName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Failed to get IP of ${namespace}/${hostName} within ${timeoutMs}ms`);
  }
}
