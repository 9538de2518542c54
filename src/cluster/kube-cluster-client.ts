import { CoreV1Api, type KubeConfig, type V1Pod, type V1Secret, Watch } from "@kubernetes/client-node";
import { HostNotFoundError } from "../host/errors.js";
import type {
  ClusterClient,
  PodWatchEvent,
  PodWatchEventType,
  PodWatchOptions,
  ResourceApi,
  WatchSubscription,
} from "./cluster-client.js";

type CoreApi = Pick<
  CoreV1Api,
  | "readNamespacedPod"
  | "createNamespacedPod"
  | "replaceNamespacedPod"
  | "deleteNamespacedPod"
  | "listNamespacedPod"
  | "readNamespacedSecret"
  | "createNamespacedSecret"
  | "replaceNamespacedSecret"
  | "deleteNamespacedSecret"
  | "listNamespacedSecret"
>;

type WatchApi = Pick<Watch, "watch">;

const WATCH_EVENT_TYPES: readonly PodWatchEventType[] = ["ADDED", "MODIFIED", "DELETED"];

/** True for API errors carrying HTTP 404, across client error shapes. */
export function isNotFound(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("code" in err && err.code === 404) return true;
  return "statusCode" in err && err.statusCode === 404;
}

function isPod(obj: unknown): obj is V1Pod {
  return typeof obj === "object" && obj !== null && "metadata" in obj && typeof obj.metadata === "object";
}

function isWatchEventType(phase: string): phase is PodWatchEventType {
  return WATCH_EVENT_TYPES.some((t) => t === phase);
}

async function translateNotFound<T>(kind: string, namespace: string, name: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (isNotFound(err)) throw new HostNotFoundError(kind, namespace, name);
    throw err;
  }
}

class PodApi implements ResourceApi<V1Pod> {
  readonly kind = "Pod";
  constructor(private readonly core: CoreApi) {}

  read(namespace: string, name: string): Promise<V1Pod> {
    return translateNotFound(this.kind, namespace, name, () => this.core.readNamespacedPod({ name, namespace }));
  }

  create(namespace: string, body: V1Pod): Promise<V1Pod> {
    return this.core.createNamespacedPod({ namespace, body });
  }

  replace(namespace: string, name: string, body: V1Pod): Promise<V1Pod> {
    return translateNotFound(this.kind, namespace, name, () =>
      this.core.replaceNamespacedPod({ name, namespace, body }),
    );
  }

  async delete(namespace: string, name: string): Promise<void> {
    await translateNotFound(this.kind, namespace, name, () =>
      this.core.deleteNamespacedPod({ name, namespace, gracePeriodSeconds: 0, propagationPolicy: "Background" }),
    );
  }

  async list(namespace: string, labelSelector: string): Promise<V1Pod[]> {
    const res = await this.core.listNamespacedPod({ namespace, labelSelector });
    return res.items;
  }
}

class SecretApi implements ResourceApi<V1Secret> {
  readonly kind = "Secret";
  constructor(private readonly core: CoreApi) {}

  read(namespace: string, name: string): Promise<V1Secret> {
    return translateNotFound(this.kind, namespace, name, () => this.core.readNamespacedSecret({ name, namespace }));
  }

  create(namespace: string, body: V1Secret): Promise<V1Secret> {
    return this.core.createNamespacedSecret({ namespace, body });
  }

  replace(namespace: string, name: string, body: V1Secret): Promise<V1Secret> {
    return translateNotFound(this.kind, namespace, name, () =>
      this.core.replaceNamespacedSecret({ name, namespace, body }),
    );
  }

  async delete(namespace: string, name: string): Promise<void> {
    await translateNotFound(this.kind, namespace, name, () =>
      this.core.deleteNamespacedSecret({ name, namespace, propagationPolicy: "Background" }),
    );
  }

  async list(namespace: string, labelSelector: string): Promise<V1Secret[]> {
    const res = await this.core.listNamespacedSecret({ namespace, labelSelector });
    return res.items;
  }
}

/**
 * ClusterClient backed by the Kubernetes API.
 * API 404s surface as HostNotFoundError; every other error passes through untouched.
 */
export class KubeClusterClient implements ClusterClient {
  readonly pods: ResourceApi<V1Pod>;
  readonly secrets: ResourceApi<V1Secret>;
  private readonly watcher: WatchApi;

  constructor(core: CoreApi, watcher: WatchApi) {
    this.pods = new PodApi(core);
    this.secrets = new SecretApi(core);
    this.watcher = watcher;
  }

  static fromKubeConfig(kc: KubeConfig): KubeClusterClient {
    return new KubeClusterClient(kc.makeApiClient(CoreV1Api), new Watch(kc));
  }

  async watchPod(
    namespace: string,
    name: string,
    options: PodWatchOptions,
    onEvent: (event: PodWatchEvent) => void,
    onDone: (err?: unknown) => void,
  ): Promise<WatchSubscription> {
    let closed = false;
    const controller = await this.watcher.watch(
      `/api/v1/namespaces/${encodeURIComponent(namespace)}/pods`,
      { fieldSelector: `metadata.name=${name}`, timeoutSeconds: options.timeoutSeconds },
      (phase: string, apiObj: unknown) => {
        if (closed || !isWatchEventType(phase) || !isPod(apiObj)) return;
        onEvent({ type: phase, pod: apiObj });
      },
      (err: unknown) => {
        if (closed) return;
        closed = true;
        onDone(err ?? undefined);
      },
    );

    return {
      close() {
        if (closed) return;
        closed = true;
        controller.abort();
      },
    };
  }
}
