export const IQN_PREFIX = "iqn.2005-10.org.freenas.ctl";
export const ISCSI_PORT = 3260;
export const DEFAULT_LUN = 0;

export interface ResourceNames {
  server_id: string;
  version: string;
  volume: string;
  extent: string;
  iqn: string;
}

/** "4.18" → "4_18". Names must not contain dots. */
export function normalizeVersion(version: string): string {
  return version.replaceAll(".", "_");
}

/**
 * Deterministic appliance resource names for (server, version).
 * Same inputs always yield the same names, which is what makes provisioning idempotent.
 */
export function resourceNames(
  serverId: string,
  version: string,
  pool: string,
): ResourceNames {
  const ver = normalizeVersion(version);
  return {
    server_id: serverId,
    version: ver,
    volume: `${pool}/openshift_installations/r630_${serverId}_${ver}`,
    extent: `openshift_r630_${serverId}_${ver}_extent`,
    iqn: `${IQN_PREFIX}:iscsi.r630-${serverId}.openshift${ver}`,
  };
}
