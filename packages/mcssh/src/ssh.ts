import { execFileSync } from "child_process";

export type SshConfigRunner = (target: string) => string;

const runSshG: SshConfigRunner = (target) =>
  execFileSync("ssh", ["-G", target], { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"], timeout: 10_000 });

export function parseSshConfigHostname(output: string): string | undefined {
  for (const line of output.split("\n")) {
    const [key, ...rest] = line.trim().split(/\s+/);
    if (key?.toLowerCase() === "hostname" && rest.length > 0) {
      return rest.join(" ");
    }
  }
  return undefined;
}

function stripUser(target: string): string {
  const at = target.lastIndexOf("@");
  return at === -1 ? target : target.slice(at + 1);
}

/**
 * The host ssh would actually connect to for `target`, following aliases in
 * the user's ssh config. Falls back to the target itself.
 */
export function sshHostname(target: string, run: SshConfigRunner = runSshG): string {
  try {
    return parseSshConfigHostname(run(target)) ?? stripUser(target);
  } catch {
    return stripUser(target);
  }
}
