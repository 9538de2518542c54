import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { AddressTimeoutError } from "../host/errors.js";
import type { ClusterClient, PodWatchEvent, WatchSubscription } from "./cluster-client.js";

export interface AwaitAddressOptions {
  /** Hard deadline for the whole wait. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Wait for a Pod to be assigned an address.
 *
 * A missing Pod fails at once with HostNotFoundError. Otherwise a single watch
 * session on the Pod runs until the first ADDED/MODIFIED event carrying a
 * non-empty podIP, which is returned. If the stream ends or the deadline
 * passes first, this rejects with AddressTimeoutError. The session is closed
 * on every exit.
 */
export async function awaitAddress(
  client: ClusterClient,
  namespace: string,
  name: string,
  options: AwaitAddressOptions = {},
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? config.operationTimeoutMs;
  const { signal } = options;

  signal?.throwIfAborted();
  await client.pods.read(namespace, name);
  signal?.throwIfAborted();

  return new Promise<string>((resolve, reject) => {
    let settled = false;
    let subscription: WatchSubscription | null = null;

    const onAbort = () => finish(() => reject(signal?.reason));
    const timer = setTimeout(() => finish(() => reject(new AddressTimeoutError(namespace, name, timeoutMs))), timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    function finish(settle: () => void): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      subscription?.close();
      settle();
    }

    const onEvent = (event: PodWatchEvent) => {
      if (event.type === "DELETED") return;
      const address = event.pod.status?.podIP;
      if (!address) return;
      logger.debug(`Observed address for ${namespace}/${name}`, { address, event: event.type });
      finish(() => resolve(address));
    };

    const onDone = (err?: unknown) => {
      finish(() => reject(err ?? new AddressTimeoutError(namespace, name, timeoutMs)));
    };

    client
      .watchPod(namespace, name, { timeoutSeconds: Math.ceil(timeoutMs / 1000) }, onEvent, onDone)
      .then(
        (sub) => {
          subscription = sub;
          // Settled while the watch was still opening.
          if (settled) sub.close();
        },
        (err: unknown) => finish(() => reject(err)),
      );
  });
}
