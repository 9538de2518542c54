/**
 * Host lifecycle phases as seen by callers of the driver.
 *
 * The mapping from Pod phases is lossy: every phase other than Pending and
 * Running collapses to "stopped". "absent" is never derived from a phase; it
 * means the Pod lookup failed with not-found.
 */
export const HOST_PHASES = ["absent", "starting", "running", "stopped"] as const;

export type HostPhase = (typeof HOST_PHASES)[number];

export function mapPhase(podPhase: string | undefined): HostPhase {
  switch (podPhase) {
    case "Pending":
      return "starting";
    case "Running":
      return "running";
    default:
      return "stopped";
  }
}
