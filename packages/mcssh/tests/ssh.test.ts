import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseSshConfigHostname, sshHostname } from "../src/ssh.js";

describe("parseSshConfigHostname", () => {
  it("reads the hostname line of ssh -G output", () => {
    const output = ["user alice", "hostname login.example.org", "port 22"].join("\n");
    assert.equal(parseSshConfigHostname(output), "login.example.org");
  });

  it("returns undefined without a hostname line", () => {
    assert.equal(parseSshConfigHostname("user alice\nport 22\n"), undefined);
  });
});

describe("sshHostname", () => {
  it("follows aliases through the ssh config", () => {
    const calls: string[] = [];
    const hostname = sshHostname("alice@cluster", (target) => {
      calls.push(target);
      return "hostname login.cluster.example.org\n";
    });

    assert.equal(hostname, "login.cluster.example.org");
    assert.deepEqual(calls, ["alice@cluster"]);
  });

  it("strips the user when ssh cannot be run", () => {
    const hostname = sshHostname("alice@example.org", () => {
      throw new Error("spawnSync ssh ENOENT");
    });

    assert.equal(hostname, "example.org");
  });
});
