import type { AccountDatabase } from "@hostform/convergence";
import type { HostInfo } from "./run-context.js";

export interface HostProbe {
  platform: NodeJS.Platform;
  /** `os.type()`, e.g. "Linux". */
  osType: string;
  user: {
    username: string;
    uid: number;
    gid: number;
    homedir: string;
  };
  accounts: AccountDatabase;
}

/** The invoking user and platform, as recorded in the run context. */
export async function detectHost(probe: HostProbe): Promise<HostInfo> {
  const { username, uid, gid, homedir } = probe.user;
  if (probe.platform !== "linux") {
    return {
      os: probe.osType,
      platform: probe.platform,
      user: { username, groupname: username, homeDir: homedir }
    };
  }
  return {
    os: probe.osType,
    platform: probe.platform,
    user: {
      username,
      groupname: await probe.accounts.groupName(gid),
      uid,
      gid,
      homeDir: homedir
    }
  };
}
