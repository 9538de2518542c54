import type { KubernetesObject, V1Pod, V1Secret } from "@kubernetes/client-node";

/** Namespaced CRUD for one object kind. Lookups of missing objects throw HostNotFoundError. */
export interface ResourceApi<T extends KubernetesObject> {
  readonly kind: string;
  read(namespace: string, name: string): Promise<T>;
  create(namespace: string, body: T): Promise<T>;
  replace(namespace: string, name: string, body: T): Promise<T>;
  /** Delete in the background; dependents are removed by the backend's garbage collector. */
  delete(namespace: string, name: string): Promise<void>;
  list(namespace: string, labelSelector: string): Promise<T[]>;
}

export type PodWatchEventType = "ADDED" | "MODIFIED" | "DELETED";

export interface PodWatchEvent {
  type: PodWatchEventType;
  pod: V1Pod;
}

export interface PodWatchOptions {
  /** Server-side lifetime of the stream. */
  timeoutSeconds: number;
}

/** An open watch stream. close() is idempotent. */
export interface WatchSubscription {
  close(): void;
}

/**
 * The backend seam. Every lifecycle component talks to the cluster through
 * this interface; KubeClusterClient is the production implementation.
 */
export interface ClusterClient {
  readonly pods: ResourceApi<V1Pod>;
  readonly secrets: ResourceApi<V1Secret>;

  /**
   * Watch a single Pod by name. onEvent receives every status event; onDone
   * fires once when the stream ends, with the error if it failed.
   */
  watchPod(
    namespace: string,
    name: string,
    options: PodWatchOptions,
    onEvent: (event: PodWatchEvent) => void,
    onDone: (err?: unknown) => void,
  ): Promise<WatchSubscription>;
}

/** A resolved cluster target: the working namespace plus an authenticated client. */
export interface ClusterConnection {
  namespace: string;
  client: ClusterClient;
}
