export { type ConvergeIntent, type DesiredObject, type OwnerRef, Applier } from "./cluster/applier.js";
export { type AwaitAddressOptions, awaitAddress } from "./cluster/await-address.js";
export type {
  ClusterClient,
  ClusterConnection,
  PodWatchEvent,
  ResourceApi,
  WatchSubscription,
} from "./cluster/cluster-client.js";
export { KubeClusterClient } from "./cluster/kube-cluster-client.js";
export { type ClusterResolver, loadKubeConfig, resolveCluster } from "./cluster/kube-config.js";
export {
  DEFAULT_IMAGE,
  type DriverOptionFlag,
  type DriverOptions,
  type DriverProfile,
  resolveDriverOptions,
} from "./config/driver-options.js";
export { createFlagsFor, type OpenHostDriverParams, openHostDriver } from "./driver/host-driver.js";
export { AddressTimeoutError, ConfigurationError, HostNotFoundError } from "./host/errors.js";
export { DOCKER_PORT, HostController, type HostIdentity } from "./host/host-controller.js";
export { HOST_PHASES, type HostPhase, mapPhase } from "./host/host-phase.js";
export { buildHostObjects, buildMetaData, type HostObjects } from "./host/object-builder.js";
export { FileSshKeyStore, type SshKeyStore } from "./ssh/key-store.js";
