import { readFile } from "node:fs/promises";
import { type DesiredObject, Applier, type OwnerRef } from "../cluster/applier.js";
import { awaitAddress } from "../cluster/await-address.js";
import type { ClusterConnection } from "../cluster/cluster-client.js";
import type { ClusterResolver } from "../cluster/kube-config.js";
import { config } from "../config/index.js";
import { DEFAULT_DRIVER_NAME } from "../config/driver-options.js";
import { logger } from "../config/logger.js";
import { FileSshKeyStore, type SshKeyStore } from "../ssh/key-store.js";
import { ConfigurationError, HostNotFoundError } from "./errors.js";
import { type HostPhase, mapPhase } from "./host-phase.js";
import { buildHostObjects, buildMetaData, type HostObjects } from "./object-builder.js";

/** Port of the remote docker daemon on every host. */
export const DOCKER_PORT = 2376;

/** Immutable identity of a logical host. */
export interface HostIdentity {
  readonly name: string;
  readonly image: string;
  /** Directory holding the host's SSH keypair. */
  readonly storePath: string;
  readonly userDataPath?: string;
  readonly sshUser: string;
  readonly sshPort: number;
}

/**
 * The only mutable state of a host: the address observed by the last
 * successful start. Cleared by every stop.
 */
export class HostRuntimeStatus {
  private current: string | null = null;

  get address(): string | null {
    return this.current;
  }

  assign(address: string): void {
    if (!address) throw new Error("Cannot assign an empty address");
    this.current = address;
  }

  clear(): void {
    this.current = null;
  }
}

export interface HostControllerOptions {
  /** Re-resolves the cluster connection on reload(). */
  resolver?: ClusterResolver;
  keys?: SshKeyStore;
  driverName?: string;
  /** Bound on every address wait. */
  addressTimeoutMs?: number;
}

/** host:port, with IPv6 literals bracketed. */
export function joinHostPort(host: string, port: number): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

function desiredSet(objects: HostObjects): DesiredObject[] {
  return [
    { kind: "Pod", object: objects.workload },
    { kind: "Secret", object: objects.config },
  ];
}

/**
 * Drives one logical host through its lifecycle: a Pod running the host image
 * plus a Secret carrying its cloud-init seed.
 *
 * Calls for the same host must not overlap; callers serialize them. Calls for
 * different hosts are independent.
 */
export class HostController {
  readonly identity: HostIdentity;
  readonly driverName: string;
  readonly runtime = new HostRuntimeStatus();
  private connection: ClusterConnection;
  private applier: Applier;
  private readonly resolver: ClusterResolver | undefined;
  private readonly keys: SshKeyStore;
  private readonly addressTimeoutMs: number;

  constructor(identity: HostIdentity, connection: ClusterConnection, options: HostControllerOptions = {}) {
    this.identity = identity;
    this.connection = connection;
    this.applier = new Applier(connection.client);
    this.resolver = options.resolver;
    this.keys = options.keys ?? new FileSshKeyStore();
    this.driverName = options.driverName ?? DEFAULT_DRIVER_NAME;
    this.addressTimeoutMs = options.addressTimeoutMs ?? config.operationTimeoutMs;
  }

  /** Resolve the cluster once and build a controller bound to it. */
  static async open(
    identity: HostIdentity,
    resolver: ClusterResolver,
    options: Omit<HostControllerOptions, "resolver"> = {},
  ): Promise<HostController> {
    const connection = await resolver();
    return new HostController(identity, connection, { ...options, resolver });
  }

  get namespace(): string {
    return this.connection.namespace;
  }

  /** Re-resolve credentials and target cluster; later calls use the new connection. */
  async reload(): Promise<void> {
    if (!this.resolver) throw new ConfigurationError(`No cluster resolver configured for host ${this.identity.name}`);
    const connection = await this.resolver();
    this.connection = connection;
    this.applier = new Applier(connection.client);
    logger.info(`Reloaded cluster connection for host ${this.identity.name}`, { namespace: connection.namespace });
  }

  /** Fail early when the configured user-data file cannot be read. */
  async preCreateCheck(): Promise<void> {
    await this.readUserData();
  }

  /** Generate the host's SSH keypair. Touches nothing in the cluster. */
  async create(): Promise<void> {
    logger.info(`Generating SSH key for host ${this.identity.name}`);
    await this.keys.generate(this.identity.storePath, this.identity.name);
  }

  /**
   * Tear down whatever exists, apply the host's objects, and wait for an
   * address. On failure after the apply began, the host is stopped again
   * before the original error is rethrown.
   */
  async start(signal?: AbortSignal): Promise<string> {
    const { name, image, storePath } = this.identity;
    await this.stop(signal);

    const publicKey = await this.keys.readPublicKey(storePath);
    const userData = await this.readUserData();
    const metaData = buildMetaData(publicKey.trim());

    const { namespace, client } = this.connection;
    const objects = buildHostObjects(namespace, name, image, userData, metaData);

    try {
      await this.applier.converge(desiredSet(objects), this.owner(), { intent: "apply", signal });
      const address = await awaitAddress(client, namespace, name, { timeoutMs: this.addressTimeoutMs, signal });
      this.runtime.assign(address);
      logger.info(`Started host ${name}`, { namespace, address });
      return address;
    } catch (err) {
      logger.error(`Failed to start host ${name}, rolling back`, { namespace, err });
      try {
        await this.stop();
      } catch (rollbackErr) {
        logger.error(`Rollback of host ${name} failed`, { namespace, err: rollbackErr });
      }
      throw err;
    }
  }

  /** Delete the host's objects. Safe on an absent host. The address is cleared even on failure. */
  async stop(signal?: AbortSignal): Promise<void> {
    const { name } = this.identity;
    const { namespace } = this.connection;
    try {
      const sentinel = buildHostObjects(namespace, name, "");
      await this.applier.converge(desiredSet(sentinel), this.owner(), { intent: "prune", signal });
    } finally {
      this.runtime.clear();
    }
    logger.info(`Stopped host ${name}`, { namespace });
  }

  async restart(signal?: AbortSignal): Promise<string> {
    await this.stop(signal);
    return this.start(signal);
  }

  async kill(signal?: AbortSignal): Promise<void> {
    await this.stop(signal);
  }

  async remove(signal?: AbortSignal): Promise<void> {
    await this.stop(signal);
  }

  async getState(): Promise<HostPhase> {
    const { namespace, client } = this.connection;
    try {
      const pod = await client.pods.read(namespace, this.identity.name);
      return mapPhase(pod.status?.phase);
    } catch (err) {
      if (err instanceof HostNotFoundError) return "absent";
      throw err;
    }
  }

  /** The address from the last start, otherwise the first one observed within the deadline. */
  async getAddress(signal?: AbortSignal): Promise<string> {
    const cached = this.runtime.address;
    if (cached) return cached;
    const { namespace, client } = this.connection;
    return awaitAddress(client, namespace, this.identity.name, { timeoutMs: this.addressTimeoutMs, signal });
  }

  async getURL(signal?: AbortSignal): Promise<string> {
    const address = await this.getAddress(signal);
    return `tcp://${joinHostPort(address, DOCKER_PORT)}`;
  }

  getSSHHostname(signal?: AbortSignal): Promise<string> {
    return this.getAddress(signal);
  }

  getSSHUsername(): string {
    return this.identity.sshUser;
  }

  getSSHPort(): number {
    return this.identity.sshPort;
  }

  private owner(): OwnerRef {
    return { kind: "Pod", namespace: this.connection.namespace, name: this.identity.name };
  }

  private async readUserData(): Promise<Uint8Array> {
    const path = this.identity.userDataPath;
    if (!path) return new Uint8Array();
    try {
      return await readFile(path);
    } catch (err) {
      throw new ConfigurationError(`Cannot read userdata file ${path}`, { cause: err });
    }
  }
}
