import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { identityHostResolver } from "../src/discovery.js";
import { augmentScpCommand, resolveCredential } from "../src/engine.js";
import { splitScpArguments } from "../src/scp.js";
import {
  FakeAgent,
  FixtureTransport,
  NOW_MS,
  SIGNATURE_BODY,
  createRecordingLogger,
  makeJwt
} from "./helpers.js";

function deployedHost(transport: FixtureTransport, base: string, user: string): void {
  transport
    .on(base, { status: 200, body: SIGNATURE_BODY })
    .on(`${base}/user/get_status`, { status: 200, body: { state: "deployed", message: `deployed ${user}` } })
    .on(`${base}/user/deploy`, { status: 200, body: { state: "deployed", credentials: { ssh_user: user } } });
}

function setup(
  transport: FixtureTransport,
  agent = new FakeAgent(),
  aliases: Record<string, string> = {}
) {
  const recording = createRecordingLogger();
  return {
    recording,
    deps: {
      transport,
      agent,
      hostResolver: identityHostResolver,
      sshHostname: (target: string) => aliases[target] ?? target,
      logger: recording.logger,
      now: () => NOW_MS
    }
  };
}

describe("resolveCredential", () => {
  it("discovers the service on the host, picks its issuer and deploys the account", async () => {
    const transport = new FixtureTransport({
      "https://login.example.org:8443": { status: 200, body: SIGNATURE_BODY },
      "https://login.example.org:8443/info": { status: 200, body: { "supported OPs": ["https://op.example.org"] } },
      "https://login.example.org:8443/user/get_status": {
        status: 200,
        body: { state: "not_deployed", message: "not_deployed" }
      },
      "https://login.example.org:8443/user/deploy": {
        status: 200,
        body: { state: "deployed", credentials: { ssh_user: "alice01" } }
      }
    });
    const agent = new FakeAgent({}, { "https://op.example.org": "service-token" });
    const { deps } = setup(transport, agent);

    const credential = await resolveCredential("login.example.org", { verify: true }, deps);

    assert.deepEqual(credential, {
      endpoint: "https://login.example.org:8443",
      username: "alice01",
      token: "service-token",
      provenance: "`oidc-token https://op.example.org`"
    });
    assert.deepEqual(transport.urls(), [
      "https://login.example.org",
      "https://login.example.org:8443",
      "https://login.example.org:8443/info",
      "https://login.example.org:8443/user/get_status",
      "https://login.example.org:8443/user/deploy"
    ]);
  });

  it("uses the given endpoint instead of probing the host", async () => {
    const transport = new FixtureTransport();
    deployedHost(transport, "https://mc.example.org", "bob");
    const token = makeJwt(600);
    const { deps } = setup(transport);

    const credential = await resolveCredential(
      "login.example.org",
      { mcEndpoint: "https://mc.example.org", token, verify: true },
      deps
    );

    assert.equal(credential.endpoint, "https://mc.example.org");
    assert.equal(credential.username, "bob");
    assert.equal(credential.provenance, `'${token}'`);
    assert.equal(transport.urls()[0], "https://mc.example.org");
  });
});

describe("augmentScpCommand", () => {
  it("fills in usernames for remote operands without one, sources before target", async () => {
    const transport = new FixtureTransport();
    deployedHost(transport, "https://b.example.org", "alice");
    deployedHost(transport, "https://c.example.org", "carol");
    const token = makeJwt(600);
    const { deps, recording } = setup(transport);
    const command = splitScpArguments([
      "-P",
      "2222",
      "local.txt",
      "bob@a.example.org:x",
      "b.example.org:in",
      "scp://c.example.org/out"
    ]);

    const augmented = await augmentScpCommand(command, { token, verify: true }, deps);

    assert.deepEqual(augmented.args, [
      "-P",
      "2222",
      "local.txt",
      "bob@a.example.org:x",
      "alice@b.example.org:in",
      "scp://carol@c.example.org/out"
    ]);
    assert.deepEqual(augmented.tokens, [token, token]);
    assert.deepEqual(augmented.provenances, [`'${token}'`, `'${token}'`]);
    assert.deepEqual(
      transport.urls().filter((url) => url.endsWith("/user/get_status")),
      ["https://b.example.org/user/get_status", "https://c.example.org/user/get_status"]
    );
    assert.deepEqual(
      recording.messages("debug").filter((m) => m.startsWith("Trying to get username")),
      [
        "Trying to get username from motley_cue service on b.example.org.",
        "Trying to get username from motley_cue service on c.example.org."
      ]
    );
  });

  it("looks for the service on the host an ssh alias points to", async () => {
    const transport = new FixtureTransport();
    deployedHost(transport, "https://login.example.org", "alice");
    const { deps } = setup(transport, new FakeAgent(), { myalias: "login.example.org" });
    const command = splitScpArguments(["myalias:f", "."]);

    const augmented = await augmentScpCommand(command, { token: makeJwt(600), verify: true }, deps);

    assert.deepEqual(augmented.args, ["alice@myalias:f", "."]);
    assert.equal(transport.urls()[0], "https://login.example.org");
    assert.ok(transport.urls().every((url) => !url.includes("myalias")));
  });

  it("resolves IPv6 operands through a bracketed endpoint", async () => {
    const transport = new FixtureTransport();
    deployedHost(transport, "https://[::1]", "alice");
    const { deps } = setup(transport);
    const command = splitScpArguments(["[::1]:f", "."]);

    const augmented = await augmentScpCommand(command, { token: makeJwt(600), verify: true }, deps);

    assert.deepEqual(augmented.args, ["alice@[::1]:f", "."]);
    assert.equal(transport.urls()[0], "https://[::1]");
  });

  it("passes commands without bare remote operands through untouched", async () => {
    const transport = new FixtureTransport();
    const { deps } = setup(transport);
    const command = splitScpArguments(["-r", "dir", "alice@example.org:backup/"]);

    const augmented = await augmentScpCommand(command, { verify: true }, deps);

    assert.deepEqual(augmented, { args: ["-r", "dir", "alice@example.org:backup/"], tokens: [], provenances: [] });
    assert.deepEqual(transport.requests, []);
  });

  it("stops at the first operand that cannot be resolved", async () => {
    const transport = new FixtureTransport();
    const { deps } = setup(transport);
    const command = splitScpArguments(["nowhere.example.org:file", "."]);

    await assert.rejects(() => augmentScpCommand(command, { token: makeJwt(600), verify: true }, deps), {
      code: "ENDPOINT_NOT_FOUND"
    });
  });
});
