import { type ClusterResolver, resolveCluster } from "../cluster/kube-config.js";
import {
  type DriverOptionFlag,
  type DriverProfile,
  driverProfileSchema,
  getCreateFlags,
  resolveDriverOptions,
} from "../config/driver-options.js";
import { logger } from "../config/logger.js";
import { HostController } from "../host/host-controller.js";
import type { SshKeyStore } from "../ssh/key-store.js";

export const DEFAULT_SSH_PORT = 22;

export interface OpenHostDriverParams {
  machineName: string;
  /** Directory for the host's local files (SSH keys). */
  storePath: string;
  /** Option values keyed by flag name, e.g. "kubernetes-image". */
  flags?: Partial<Record<string, string>>;
  env?: Partial<Record<string, string>>;
  profile?: Partial<DriverProfile>;
  keys?: SshKeyStore;
  /** Overrides the kubeconfig-based resolver. */
  resolver?: ClusterResolver;
  addressTimeoutMs?: number;
}

/** Flags a caller can register for host creation under the given profile. */
export function createFlagsFor(profile: Partial<DriverProfile> = {}): DriverOptionFlag[] {
  return getCreateFlags(driverProfileSchema.parse(profile));
}

/**
 * Resolve options and credentials for one host and return its controller.
 * Configuration errors surface here, before any lifecycle call.
 */
export async function openHostDriver(params: OpenHostDriverParams): Promise<HostController> {
  const profile = driverProfileSchema.parse(params.profile ?? {});
  const options = resolveDriverOptions(profile, params.flags ?? {}, params.env ?? process.env);
  const resolver = params.resolver ?? (() => resolveCluster({ kubeconfigToken: options.kubeconfigToken }));

  const controller = await HostController.open(
    {
      name: params.machineName,
      image: options.image,
      storePath: params.storePath,
      userDataPath: options.userDataPath,
      sshUser: profile.sshUser,
      sshPort: DEFAULT_SSH_PORT,
    },
    resolver,
    { keys: params.keys, driverName: profile.driverName, addressTimeoutMs: params.addressTimeoutMs },
  );

  logger.info(`Opened ${profile.driverName} driver for host ${params.machineName}`, {
    namespace: controller.namespace,
    image: options.image,
  });
  return controller;
}
