import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SshKeyStore } from "../ssh/key-store.js";
import { FakeCluster } from "../test/fake-cluster.js";
import { AddressTimeoutError, ConfigurationError, HostNotFoundError } from "./errors.js";
import { HostController, type HostIdentity, HostRuntimeStatus, joinHostPort } from "./host-controller.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const PUBLIC_KEY = "ssh-rsa AAAAtest demo";

const IDENTITY: HostIdentity = {
  name: "demo",
  image: "img:v1",
  storePath: "/tmp/hosts/demo",
  sshUser: "sles",
  sshPort: 22,
};

function mockKeys() {
  return {
    generate: vi.fn().mockResolvedValue(undefined),
    readPublicKey: vi.fn().mockResolvedValue(`${PUBLIC_KEY}\n`),
  } satisfies SshKeyStore;
}

async function waitForTimer(): Promise<void> {
  for (let i = 0; i < 1_000 && vi.getTimerCount() === 0; i++) await Promise.resolve();
}

describe("HostController", () => {
  let cluster: FakeCluster;
  let keys: ReturnType<typeof mockKeys>;
  let controller: HostController;

  beforeEach(() => {
    cluster = new FakeCluster({ assignAddress: "10.0.0.5" });
    keys = mockKeys();
    controller = new HostController(IDENTITY, { namespace: "hosts", client: cluster }, { keys, addressTimeoutMs: 5_000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("create", () => {
    it("generates the SSH keypair without touching the cluster", async () => {
      await controller.create();

      expect(keys.generate).toHaveBeenCalledWith("/tmp/hosts/demo", "demo");
      expect(cluster.calls).toEqual([]);
      expect(await controller.getState()).toBe("absent");
    });
  });

  describe("start", () => {
    it("applies the host and returns its address", async () => {
      const address = await controller.start();

      expect(address).toBe("10.0.0.5");
      expect(controller.runtime.address).toBe("10.0.0.5");
      expect(await controller.getState()).toBe("running");
      expect(cluster.pods.get("hosts", "demo")?.spec?.containers[0]?.image).toBe("img:v1");
    });

    it("seeds cloud-init with the public key and an empty user-data payload", async () => {
      await controller.start();

      expect(keys.readPublicKey).toHaveBeenCalledWith("/tmp/hosts/demo");
      expect(cluster.secrets.get("hosts", "demo")?.data).toEqual({
        "user-data": "",
        "meta-data": Buffer.from(`{"public-keys":["${PUBLIC_KEY}"]}`).toString("base64"),
      });
    });

    it("is idempotent: a second start converges to the same address", async () => {
      const first = await controller.start();
      const second = await controller.start();

      expect(second).toBe(first);
      expect(cluster.callsOf("Pod", "create")).toHaveLength(2);
      expect(cluster.callsOf("Pod", "delete")).toHaveLength(1);
      expect(cluster.callsOf("Secret", "delete")).toHaveLength(0);
      expect(cluster.secrets.get("hosts", "demo")?.metadata?.ownerReferences?.[0]?.uid).toBe(
        cluster.pods.get("hosts", "demo")?.metadata?.uid,
      );
    });

    it("times out, rolls back, and never reports running when no address appears", async () => {
      cluster.setAssignAddress(undefined);
      vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });

      const pending = controller.start();
      const assertion = expect(pending).rejects.toBeInstanceOf(AddressTimeoutError);
      await waitForTimer();
      await vi.advanceTimersByTimeAsync(5_000);
      await assertion;

      expect(controller.runtime.address).toBeNull();
      expect(await controller.getState()).toBe("absent");
      expect(cluster.openWatches).toBe(0);
    });

    it("rolls back a partial apply and rethrows the backend error", async () => {
      const err = Object.assign(new Error("secrets is forbidden"), { code: 403 });
      cluster.secrets.failNext("create", err);

      await expect(controller.start()).rejects.toBe(err);

      expect(cluster.pods.get("hosts", "demo")).toBeUndefined();
      expect(await controller.getState()).toBe("absent");
    });

    it("rethrows the original error when the rollback fails too", async () => {
      const err = Object.assign(new Error("secrets is forbidden"), { code: 403 });
      const rollbackErr = new Error("connection refused during rollback");
      vi.spyOn(cluster.secrets, "create").mockImplementation(async () => {
        cluster.pods.failNext("list", rollbackErr);
        throw err;
      });

      await expect(controller.start()).rejects.toBe(err);
      expect(controller.runtime.address).toBeNull();
    });

    it("fails with a configuration error when the public key is unreadable", async () => {
      keys.readPublicKey.mockRejectedValueOnce(new ConfigurationError("Cannot read public key"));

      await expect(controller.start()).rejects.toBeInstanceOf(ConfigurationError);
      expect(cluster.callsOf("Pod", "create")).toEqual([]);
    });
  });

  describe("user-data", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "host-controller-test-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("passes the user-data file through the config object", async () => {
      const path = join(dir, "user-data");
      await writeFile(path, "#cloud-config\nhostname: demo\n");
      const withUserData = new HostController(
        { ...IDENTITY, userDataPath: path },
        { namespace: "hosts", client: cluster },
        { keys, addressTimeoutMs: 5_000 },
      );

      await withUserData.preCreateCheck();
      await withUserData.start();

      expect(cluster.secrets.get("hosts", "demo")?.data?.["user-data"]).toBe(
        Buffer.from("#cloud-config\nhostname: demo\n").toString("base64"),
      );
    });

    it("rejects an unreadable user-data file before creation", async () => {
      const missing = new HostController(
        { ...IDENTITY, userDataPath: join(dir, "absent") },
        { namespace: "hosts", client: cluster },
        { keys },
      );

      await expect(missing.preCreateCheck()).rejects.toThrow(`Cannot read userdata file ${join(dir, "absent")}`);
      await expect(missing.start()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe("stop", () => {
    it("leaves the host absent and clears the address", async () => {
      await controller.start();

      await controller.stop();

      expect(controller.runtime.address).toBeNull();
      expect(await controller.getState()).toBe("absent");
      expect(cluster.secrets.get("hosts", "demo")).toBeUndefined();
      expect(cluster.callsOf("Secret", "delete")).toEqual([]);
    });

    it("succeeds on a host that was never started", async () => {
      await expect(controller.stop()).resolves.toBeUndefined();
      expect(await controller.getState()).toBe("absent");
    });

    it("clears the address even when the backend call fails", async () => {
      await controller.start();
      const err = new Error("connection refused");
      cluster.pods.failNext("list", err);

      await expect(controller.stop()).rejects.toBe(err);
      expect(controller.runtime.address).toBeNull();
    });

    it("is what kill and remove do", async () => {
      await controller.start();
      await controller.kill();
      expect(await controller.getState()).toBe("absent");

      await controller.start();
      await controller.remove();
      expect(await controller.getState()).toBe("absent");
    });
  });

  describe("restart", () => {
    it("stops then starts", async () => {
      await controller.start();

      await expect(controller.restart()).resolves.toBe("10.0.0.5");
      expect(await controller.getState()).toBe("running");
    });
  });

  describe("getState", () => {
    beforeEach(() => {
      cluster.setAssignAddress(undefined);
    });

    it("reports starting while the Pod is pending", async () => {
      await cluster.pods.create("hosts", { apiVersion: "v1", kind: "Pod", metadata: { name: "demo" } });
      expect(await controller.getState()).toBe("starting");
    });

    it("reports stopped for a finished Pod", async () => {
      await cluster.pods.create("hosts", { apiVersion: "v1", kind: "Pod", metadata: { name: "demo" } });
      cluster.setPodStatus("hosts", "demo", { phase: "Failed" });
      expect(await controller.getState()).toBe("stopped");
    });

    it("propagates errors other than not-found", async () => {
      const err = new Error("Unauthorized");
      cluster.pods.failNext("read", err);
      await expect(controller.getState()).rejects.toBe(err);
    });
  });

  describe("getAddress / getURL", () => {
    it("formats the docker endpoint from the started address", async () => {
      await controller.start();
      await expect(controller.getURL()).resolves.toBe("tcp://10.0.0.5:2376");
      await expect(controller.getSSHHostname()).resolves.toBe("10.0.0.5");
    });

    it("looks the address up without caching it when this controller did not start the host", async () => {
      await controller.start();
      const observer = new HostController(IDENTITY, { namespace: "hosts", client: cluster }, { keys });

      await expect(observer.getAddress()).resolves.toBe("10.0.0.5");
      expect(observer.runtime.address).toBeNull();
    });

    it("fails with not-found for an absent host", async () => {
      await expect(controller.getAddress()).rejects.toBeInstanceOf(HostNotFoundError);
    });
  });

  describe("reload", () => {
    it("switches to the freshly resolved connection", async () => {
      const next = new FakeCluster({ assignAddress: "10.1.0.9" });
      const resolver = vi
        .fn()
        .mockResolvedValueOnce({ namespace: "hosts", client: cluster })
        .mockResolvedValueOnce({ namespace: "other", client: next });
      const opened = await HostController.open(IDENTITY, resolver, { keys });
      expect(opened.namespace).toBe("hosts");

      await opened.reload();

      expect(opened.namespace).toBe("other");
      await expect(opened.start()).resolves.toBe("10.1.0.9");
      expect(next.pods.get("other", "demo")).toBeDefined();
      expect(cluster.pods.get("hosts", "demo")).toBeUndefined();
    });

    it("requires a resolver", async () => {
      await expect(controller.reload()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  it("reports the ssh user and driver name", () => {
    expect(controller.getSSHUsername()).toBe("sles");
    expect(controller.getSSHPort()).toBe(22);
    expect(controller.driverName).toBe("kubernetes");
  });
});

describe("HostRuntimeStatus", () => {
  it("refuses an empty address", () => {
    const status = new HostRuntimeStatus();
    expect(() => status.assign("")).toThrow("Cannot assign an empty address");
    expect(status.address).toBeNull();
  });
});

describe("joinHostPort", () => {
  it("brackets IPv6 literals", () => {
    expect(joinHostPort("10.0.0.5", 2376)).toBe("10.0.0.5:2376");
    expect(joinHostPort("fd00::5", 2376)).toBe("[fd00::5]:2376");
  });
});
