import { KubeConfig } from "@kubernetes/client-node";
import { logger } from "../config/logger.js";
import { ConfigurationError } from "../host/errors.js";
import type { ClusterConnection } from "./cluster-client.js";
import { KubeClusterClient } from "./kube-cluster-client.js";

const DEFAULT_NAMESPACE = "default";

// What KubeConfig.loadFromDefault() synthesizes when it finds no kubeconfig and no in-cluster account.
const FALLBACK_CLUSTER_NAME = "cluster";
const FALLBACK_CLUSTER_SERVER = "http://localhost:8080";

export interface ResolveClusterOptions {
  /** Base64-encoded kubeconfig. Loaded in memory; falls back to the default lookup when unset. */
  kubeconfigToken?: string;
}

/** Produces a fresh connection; called at construction and on every reload. */
export type ClusterResolver = () => Promise<ClusterConnection>;

export function loadKubeConfig(options: ResolveClusterOptions = {}): KubeConfig {
  const kc = new KubeConfig();
  try {
    if (options.kubeconfigToken) {
      kc.loadFromString(Buffer.from(options.kubeconfigToken, "base64").toString("utf-8"));
    } else {
      kc.loadFromDefault();
    }
  } catch (err) {
    throw new ConfigurationError("Error loading kubernetes configuration", { cause: err });
  }

  const cluster = kc.getCurrentCluster();
  const synthesized =
    !options.kubeconfigToken && cluster?.name === FALLBACK_CLUSTER_NAME && cluster.server === FALLBACK_CLUSTER_SERVER;
  if (!cluster || synthesized) {
    throw new ConfigurationError("No reachable cluster context found in kubernetes configuration");
  }
  return kc;
}

/** Namespace of the current context, or "default". */
export function contextNamespace(kc: KubeConfig): string {
  return kc.getContextObject(kc.getCurrentContext())?.namespace || DEFAULT_NAMESPACE;
}

export async function resolveCluster(options: ResolveClusterOptions = {}): Promise<ClusterConnection> {
  const kc = loadKubeConfig(options);
  const namespace = contextNamespace(kc);
  logger.debug("Resolved cluster connection", {
    context: kc.getCurrentContext(),
    namespace,
    fromToken: Boolean(options.kubeconfigToken),
  });
  return { namespace, client: KubeClusterClient.fromKubeConfig(kc) };
}
