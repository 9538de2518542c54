import type { V1Pod, V1Secret } from "@kubernetes/client-node";

export const CONTAINER_NAME = "machine";
export const CACHE_VOLUME = "cache-volume";
export const CACHE_CLAIM = "k8-core";
export const CACHE_MOUNT_PATH = "/var/lib/rancher";
export const CONFIG_VOLUME = "data";
export const USER_DATA_KEY = "user-data";
export const META_DATA_KEY = "meta-data";
export const NOCLOUD_SEED_DIR = "/var/lib/cloud/seed/nocloud";
export const MEMORY_LIMIT = "2Gi";

/** Ports every host exposes, in container order. */
export const HOST_PORTS = [
  { name: "ssh", containerPort: 22 },
  { name: "kube-api", containerPort: 6443 },
  { name: "endpoint", containerPort: 9435 },
  { name: "https", containerPort: 443 },
  { name: "http", containerPort: 80 },
] as const;

/** The workload and config object that make up one host. */
export interface HostObjects {
  workload: V1Pod;
  config: V1Secret;
}

/**
 * Build the desired objects for a host.
 *
 * Pass an empty image and no payloads to describe the deleted state: the
 * objects keep their identity (kind, namespace, name) with an empty data map.
 */
export function buildHostObjects(
  namespace: string,
  name: string,
  image: string,
  userData?: Uint8Array,
  metaData?: Uint8Array,
): HostObjects {
  const workload: V1Pod = {
    apiVersion: "v1",
    kind: "Pod",
    metadata: { name, namespace },
    spec: {
      volumes: [
        { name: CACHE_VOLUME, persistentVolumeClaim: { claimName: CACHE_CLAIM } },
        { name: CONFIG_VOLUME, secret: { secretName: name } },
      ],
      containers: [
        {
          name: CONTAINER_NAME,
          image,
          ports: HOST_PORTS.map((p) => ({ name: p.name, containerPort: p.containerPort })),
          volumeMounts: [
            { name: CACHE_VOLUME, mountPath: CACHE_MOUNT_PATH },
            { name: CONFIG_VOLUME, mountPath: `${NOCLOUD_SEED_DIR}/${META_DATA_KEY}`, subPath: META_DATA_KEY },
            { name: CONFIG_VOLUME, mountPath: `${NOCLOUD_SEED_DIR}/${USER_DATA_KEY}`, subPath: USER_DATA_KEY },
          ],
          resources: { limits: { memory: MEMORY_LIMIT } },
          securityContext: { privileged: true },
          stdin: true,
          stdinOnce: true,
          tty: true,
        },
      ],
      restartPolicy: "Never",
      automountServiceAccountToken: false,
      hostname: name,
      terminationGracePeriodSeconds: 0,
    },
  };

  const data: Record<string, string> = {};
  if (userData) data[USER_DATA_KEY] = Buffer.from(userData).toString("base64");
  if (metaData) data[META_DATA_KEY] = Buffer.from(metaData).toString("base64");

  const config: V1Secret = {
    apiVersion: "v1",
    kind: "Secret",
    metadata: { name, namespace },
    data,
  };

  return { workload, config };
}

/** Cloud-init NoCloud meta-data authorising the given public key. */
export function buildMetaData(publicKey: string): Uint8Array {
  return Buffer.from(JSON.stringify({ "public-keys": [publicKey] }));
}
