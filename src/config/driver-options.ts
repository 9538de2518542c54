import { z } from "zod";

export const DEFAULT_IMAGE = "ghcr.io/william86370/rke2ink:systemd";
export const DEFAULT_SSH_USER = "sles";
export const DEFAULT_DRIVER_NAME = "kubernetes";

/**
 * Per-driver defaults. One controller covers every flavour of the driver;
 * flavours differ only in these values.
 */
export const driverProfileSchema = z.object({
  /** Reported driver name, also the prefix of every option flag. */
  driverName: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, "Driver name must be lowercase alphanumeric with hyphens")
    .default(DEFAULT_DRIVER_NAME),
  sshUser: z.string().min(1).default(DEFAULT_SSH_USER),
  defaultImage: z.string().min(1).default(DEFAULT_IMAGE),
});

export type DriverProfile = z.infer<typeof driverProfileSchema>;

/** Describes one option a host-creation caller may set. */
export interface DriverOptionFlag {
  name: string;
  usage: string;
  envVar: string;
  value: string;
}

/** Option keys, independent of the driver-name prefix. */
export const DRIVER_OPTION_KEYS = ["k8token", "userdata", "image"] as const;

export type DriverOptionKey = (typeof DRIVER_OPTION_KEYS)[number];

const OPTION_SPECS: Record<DriverOptionKey, { usage: string; envVar: string }> = {
  k8token: { usage: "The kubeconfig, base64 encoded", envVar: "KUBERNETES_K8TOKEN" },
  userdata: { usage: "A user-data file to be passed to cloud-init", envVar: "KUBERNETES_USERDATA" },
  image: { usage: "Container image to run as the host", envVar: "KUBERNETES_IMAGE" },
};

export function optionFlagName(profile: DriverProfile, key: DriverOptionKey): string {
  return `${profile.driverName}-${key}`;
}

/** Flags registered for host creation, in a stable order. */
export function getCreateFlags(profile: DriverProfile): DriverOptionFlag[] {
  return DRIVER_OPTION_KEYS.map((key) => ({
    name: optionFlagName(profile, key),
    usage: OPTION_SPECS[key].usage,
    envVar: OPTION_SPECS[key].envVar,
    value: "",
  }));
}

export const driverOptionsSchema = z.object({
  image: z.string().min(1),
  /** Path of a cloud-init user-data file; unset means an empty payload. */
  userDataPath: z.string().min(1).optional(),
  /** Base64-encoded kubeconfig; unset means the default kubeconfig lookup. */
  kubeconfigToken: z.string().min(1).optional(),
});

export type DriverOptions = z.infer<typeof driverOptionsSchema>;

/**
 * Resolve driver options. An explicit flag value wins over its environment
 * variable, which wins over the profile default. Empty strings count as unset.
 */
export function resolveDriverOptions(
  profile: DriverProfile,
  flags: Partial<Record<string, string>>,
  env: Partial<Record<string, string>> = process.env,
): DriverOptions {
  const pick = (key: DriverOptionKey): string | undefined => {
    const fromFlag = flags[optionFlagName(profile, key)];
    if (fromFlag) return fromFlag;
    const fromEnv = env[OPTION_SPECS[key].envVar];
    return fromEnv ? fromEnv : undefined;
  };

  return driverOptionsSchema.parse({
    image: pick("image") ?? profile.defaultImage,
    userDataPath: pick("userdata"),
    kubeconfigToken: pick("k8token"),
  });
}
