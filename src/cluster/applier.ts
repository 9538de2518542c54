import { createHash } from "node:crypto";
import type { KubernetesObject, V1OwnerReference, V1Pod, V1Secret } from "@kubernetes/client-node";
import { logger } from "../config/logger.js";
import { HostNotFoundError } from "../host/errors.js";
import type { ClusterClient, ResourceApi } from "./cluster-client.js";

export const APPLY_SET_LABEL = "kube-machine-driver/apply-set";
export const MANAGED_LABEL = "kube-machine-driver/managed";
export const APPLIED_HASH_ANNOTATION = "kube-machine-driver/applied-hash";

/** One object in a desired set, tagged with its kind. */
export type DesiredObject = { kind: "Pod"; object: V1Pod } | { kind: "Secret"; object: V1Secret };

export type ObjectKind = DesiredObject["kind"];

/** Identifies the object that owns a set; every other object in the set is owned by it. */
export interface OwnerRef {
  kind: ObjectKind;
  namespace: string;
  name: string;
}

export type ConvergeIntent = "apply" | "prune";

export interface ConvergeOptions {
  intent: ConvergeIntent;
  signal?: AbortSignal;
}

interface PruneCandidate {
  kind: ObjectKind;
  name: string;
  uid: string | undefined;
  ownerUids: string[];
}

/** Owner references match when they point at the same objects, in order. */
function sameOwnerRefs(a: readonly V1OwnerReference[] = [], b: readonly V1OwnerReference[] = []): boolean {
  return (
    a.length === b.length &&
    a.every((ref, i) => ref.uid === b[i]?.uid && ref.kind === b[i]?.kind && ref.name === b[i]?.name)
  );
}

function objectName(obj: KubernetesObject): string {
  return obj.metadata?.name ?? "";
}

/** Stable digest of the fields this applier owns; server-populated fields are excluded. */
export function desiredHash(obj: KubernetesObject): string {
  const { metadata, ...rest } = obj;
  const ownedMeta = { name: metadata?.name, namespace: metadata?.namespace, labels: metadata?.labels };
  return createHash("sha256")
    .update(JSON.stringify({ ...rest, metadata: ownedMeta }))
    .digest("hex")
    .slice(0, 16);
}

/**
 * Converges the objects of one apply set (all objects sharing an owner name)
 * to a desired set, in the owner's namespace.
 *
 * Objects carry the apply-set label so prune can find exactly the objects a
 * previous converge created. Dependents get an ownerReference to the owner,
 * and prune leaves them to the backend's garbage collector.
 */
export class Applier {
  constructor(private readonly client: ClusterClient) {}

  async converge(set: readonly DesiredObject[], owner: OwnerRef, options: ConvergeOptions): Promise<void> {
    const desired = options.intent === "apply" ? set : [];
    const keep = new Set<string>();

    const ownerEntry = desired.find((d) => d.kind === owner.kind && objectName(d.object) === owner.name);
    if (desired.length > 0 && !ownerEntry) {
      throw new Error(`Desired set for ${owner.namespace}/${owner.name} does not contain its owner ${owner.kind}`);
    }

    if (ownerEntry) {
      options.signal?.throwIfAborted();
      const applied = await this.applyOne(ownerEntry, owner, undefined);
      keep.add(`${owner.kind}/${owner.name}`);

      const ownerRef: V1OwnerReference = {
        apiVersion: "v1",
        kind: owner.kind,
        name: owner.name,
        uid: applied.metadata?.uid ?? "",
        controller: true,
        blockOwnerDeletion: true,
      };
      for (const entry of desired) {
        if (entry === ownerEntry) continue;
        options.signal?.throwIfAborted();
        await this.applyOne(entry, owner, ownerRef);
        keep.add(`${entry.kind}/${objectName(entry.object)}`);
      }
    }

    options.signal?.throwIfAborted();
    await this.prune(owner, keep);
  }

  private async applyOne(
    entry: DesiredObject,
    owner: OwnerRef,
    ownerRef: V1OwnerReference | undefined,
  ): Promise<KubernetesObject> {
    switch (entry.kind) {
      case "Pod":
        return this.upsert(this.client.pods, this.stamp(entry.object, owner, ownerRef), true);
      case "Secret":
        return this.upsert(this.client.secrets, this.stamp(entry.object, owner, ownerRef), false);
    }
  }

  /** Copy of obj with the apply-set labels, content hash and owner reference. */
  private stamp<T extends KubernetesObject>(obj: T, owner: OwnerRef, ownerRef: V1OwnerReference | undefined): T {
    const labelled: T = {
      ...obj,
      metadata: {
        ...obj.metadata,
        namespace: owner.namespace,
        labels: { ...obj.metadata?.labels, [APPLY_SET_LABEL]: owner.name, [MANAGED_LABEL]: "true" },
      },
    };
    return {
      ...labelled,
      metadata: {
        ...labelled.metadata,
        annotations: { ...obj.metadata?.annotations, [APPLIED_HASH_ANNOTATION]: desiredHash(labelled) },
        ownerReferences: ownerRef ? [ownerRef] : undefined,
      },
    };
  }

  /**
   * Create the object, or bring an existing one up to date. Unchanged objects
   * are left alone; immutable kinds are deleted and recreated.
   */
  private async upsert<T extends KubernetesObject>(api: ResourceApi<T>, obj: T, immutable: boolean): Promise<T> {
    const namespace = obj.metadata?.namespace ?? "";
    const name = objectName(obj);
    const wantHash = obj.metadata?.annotations?.[APPLIED_HASH_ANNOTATION];

    let existing: T | null;
    try {
      existing = await api.read(namespace, name);
    } catch (err) {
      if (!(err instanceof HostNotFoundError)) throw err;
      existing = null;
    }

    if (!existing) {
      logger.debug(`Creating ${api.kind} ${namespace}/${name}`);
      return api.create(namespace, obj);
    }

    const sameOwners = sameOwnerRefs(existing.metadata?.ownerReferences, obj.metadata?.ownerReferences);
    if (existing.metadata?.annotations?.[APPLIED_HASH_ANNOTATION] === wantHash && sameOwners) {
      return existing;
    }

    if (immutable) {
      logger.info(`Recreating ${api.kind} ${namespace}/${name} with changed spec`);
      await api.delete(namespace, name);
      return api.create(namespace, obj);
    }

    logger.debug(`Replacing ${api.kind} ${namespace}/${name}`);
    return api.replace(namespace, name, {
      ...obj,
      metadata: { ...obj.metadata, resourceVersion: existing.metadata?.resourceVersion },
    });
  }

  private async prune(owner: OwnerRef, keep: Set<string>): Promise<void> {
    const selector = `${APPLY_SET_LABEL}=${owner.name},${MANAGED_LABEL}=true`;
    const [pods, secrets] = await Promise.all([
      this.client.pods.list(owner.namespace, selector),
      this.client.secrets.list(owner.namespace, selector),
    ]);

    const toCandidate = (kind: ObjectKind, obj: KubernetesObject): PruneCandidate => ({
      kind,
      name: objectName(obj),
      uid: obj.metadata?.uid,
      ownerUids: (obj.metadata?.ownerReferences ?? []).map((r) => r.uid),
    });
    const candidates = [
      ...pods.map((p) => toCandidate("Pod", p)),
      ...secrets.map((s) => toCandidate("Secret", s)),
    ].filter((c) => !keep.has(`${c.kind}/${c.name}`));

    // Dependents of a pruned owner go with it through garbage collection.
    const prunedUids = new Set(candidates.map((c) => c.uid).filter((uid): uid is string => Boolean(uid)));
    for (const candidate of candidates) {
      if (candidate.ownerUids.some((uid) => prunedUids.has(uid))) continue;
      logger.info(`Deleting ${candidate.kind} ${owner.namespace}/${candidate.name}`);
      try {
        await this.apiFor(candidate.kind).delete(owner.namespace, candidate.name);
      } catch (err) {
        // Already gone is the goal state.
        if (!(err instanceof HostNotFoundError)) throw err;
      }
    }
  }

  private apiFor(kind: ObjectKind): ResourceApi<KubernetesObject> {
    return kind === "Pod" ? this.client.pods : this.client.secrets;
  }
}
