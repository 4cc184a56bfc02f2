/**
 * NetworkManager connectivity probe
 * Uses `nmcli` terse output (`--get-values`), where fields are separated
 * by ":" and literal colons inside values are escaped as "\:".
 */

import { execFile } from "child_process";
import { promisify } from "util";
import type { ConnectivityProbe } from "../watchdog";

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { encoding: "utf8", timeout: 30_000 });
  return stdout;
};

/**
 * Split a terse nmcli line into fields, unescaping "\:"
 */
export function splitTerseLine(line: string): string[] {
  return line.split(/(?<!\\):/).map((field) => field.replace(/\\:/g, ":"));
}

/**
 * Name of the active wireless connection in `nmcli -g name,device,type con show --active`
 */
export function parseWifiConnectionName(output: string): string | null {
  for (const line of output.split("\n")) {
    const [name, device, type] = splitTerseLine(line.trim());
    if (name && device?.startsWith("wlan") && type?.includes("wireless")) {
      return name;
    }
  }
  return null;
}

/**
 * Whether `nmcli -g connection,state device` lists the connection as connected
 */
export function isConnectionUp(output: string, connectionName: string): boolean {
  return output.split("\n").some((line) => {
    const [name, state] = splitTerseLine(line.trim());
    return name === connectionName && state === "connected";
  });
}

export class NmcliConnectivity implements ConnectivityProbe {
  private connectionName: string | null;

  /**
   * @param connectionName - Connection to watch; looked up from the active
   *   connections when omitted
   */
  constructor(
    private readonly run: CommandRunner = runCommand,
    connectionName?: string
  ) {
    this.connectionName = connectionName ?? null;
  }

  /**
   * Look up (once) the wireless connection this machine is using.
   * Only an active connection is listed, so this has to happen while the
   * link is still up.
   */
  async resolveConnectionName(): Promise<string> {
    if (this.connectionName) return this.connectionName;

    const output = await this.run("nmcli", [
      "--get-values",
      "name,device,type",
      "con",
      "show",
      "--active",
    ]);
    const name = parseWifiConnectionName(output);
    if (!name) {
      throw new Error("No active wifi connection found using nmcli");
    }
    this.connectionName = name;
    return name;
  }

  async prepare(): Promise<void> {
    const name = await this.resolveConnectionName();
    console.log(`[network] Watching wifi connection "${name}"`);
  }

  async isConnected(): Promise<boolean> {
    const name = await this.resolveConnectionName();
    const output = await this.run("nmcli", ["--get-values", "connection,state", "device"]);
    const connected = isConnectionUp(output, name);
    if (!connected) {
      console.warn(`[network] Wifi connection "${name}" is down`);
    }
    return connected;
  }

  async reconnect(): Promise<void> {
    const name = await this.resolveConnectionName();
    await this.run("sudo", ["nmcli", "connection", "up", name]);
    console.log(`[network] Restarted wifi connection "${name}"`);
  }
}
