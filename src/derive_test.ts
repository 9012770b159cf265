import assert from "node:assert";
import test from "node:test";
import { interfaceEndpoint, safeToInterface, toInterface, toPeer } from "./derive.js";
import { DerivationError } from "./errors.js";
import { PrivateKey } from "./key.js";
import { InterfaceBuilder, PeerBuilder } from "./wginterface.js";

const serverKey = PrivateKey.random(), clientKey = PrivateKey.random();
const clientPeer = new PeerBuilder().addAllowedIP("10.0.0.2/32").privateKey(clientKey).build();
const serverBuilder = () => new InterfaceBuilder()
  .addAddress("10.0.0.1/24")
  .listenPort(51820)
  .privateKey(serverKey)
  .dns(["1.1.1.1", "1.0.0.1"])
  .endpoint("vpn.example.com")
  .addPeer(clientPeer);

test("Server endpoint", async t => {
  await t.test("Host and port", () => assert.strictEqual(interfaceEndpoint(serverBuilder().build()), "vpn.example.com:51820"));
  await t.test("Bare IPv6 is bracketed", () => assert.strictEqual(interfaceEndpoint(serverBuilder().endpoint("fd00::1").build()), "[fd00::1]:51820"));
  await t.test("No port keeps endpoint", () => assert.strictEqual(interfaceEndpoint(new InterfaceBuilder().endpoint("vpn.example.com").build()), "vpn.example.com"));
  await t.test("No endpoint", () => assert.strictEqual(interfaceEndpoint(new InterfaceBuilder().listenPort(51820).build()), undefined));
});

test("Client interface from peer", async t => {
  const server = serverBuilder().build();

  await t.test("Routes only the server networks by default", () => {
    const client = toInterface(clientPeer, server, { dualStack: false });
    assert.deepStrictEqual(client.address.map(String), ["10.0.0.2/32"]);
    assert.strictEqual(client.privateKey, clientKey);
    assert.deepStrictEqual(client.dns, ["1.1.1.1", "1.0.0.1"]);
    assert.strictEqual(client.listenPort, undefined);
    assert.strictEqual(client.endpoint, undefined);
    assert.strictEqual(client.peers.length, 1);

    const [serverPeer] = client.peers;
    assert.deepStrictEqual(serverPeer.key, { type: "public", publicKey: serverKey.publicKey() });
    assert.deepStrictEqual(serverPeer.allowedIPs.map(String), ["10.0.0.1/24"]);
    assert.strictEqual(serverPeer.endpoint, "vpn.example.com:51820");
    assert.strictEqual(serverPeer.persistentKeepalive, undefined);
  });

  await t.test("Default gateway", () => {
    const client = toInterface(clientPeer, server, { defaultGateway: true, persistentKeepalive: 25, dualStack: false });
    assert.deepStrictEqual(client.peers[0].allowedIPs.map(String), ["0.0.0.0/0"]);
    assert.strictEqual(client.peers[0].persistentKeepalive, 25);
  });

  await t.test("Default gateway with IPv6", () => {
    const client = toInterface(clientPeer, server, { defaultGateway: true, dualStack: true });
    assert.deepStrictEqual(client.peers[0].allowedIPs.map(String), ["0.0.0.0/0", "::/0"]);
  });

  await t.test("Zero keepalive is unset", () => {
    assert.ok(!("persistentKeepalive" in toInterface(clientPeer, server, { persistentKeepalive: 0 }).peers[0]));
  });

  await t.test("Same input, same output", () => {
    assert.deepStrictEqual(toInterface(clientPeer, server, { defaultGateway: true }), toInterface(clientPeer, server, { defaultGateway: true }));
  });

  await t.test("Obfuscation values follow the server", () => {
    const amnezia = { jc: 4, jmin: 40, jmax: 70, s1: 15, s2: 20, h1: 1, h2: 2, h3: 3, h4: 4 };
    assert.deepStrictEqual(toInterface(clientPeer, serverBuilder().amnezia(amnezia).build()).amnezia, amnezia);
    assert.strictEqual(toInterface(clientPeer, server).amnezia, undefined);
  });

  await t.test("Peer obfuscation values win over the server's", () => {
    const peer = PeerBuilder.from(clientPeer).amnezia({ jc: 8, jmin: 50, jmax: 100 }).build();
    const withServerValues = serverBuilder().amnezia({ jc: 4, jmin: 40, jmax: 70, s1: 15, s2: 20 }).build();
    assert.deepStrictEqual(toInterface(peer, withServerValues).amnezia, { jc: 8, jmin: 50, jmax: 100 });
    assert.deepStrictEqual(toInterface(peer, server).amnezia, { jc: 8, jmin: 50, jmax: 100 });
  });

  await t.test("Peer without allowed IPs gives no address", () => {
    const peer = new PeerBuilder().privateKey(clientKey).build();
    assert.deepStrictEqual(toInterface(peer, server).address, []);
  });

  await t.test("Server without endpoint", () => {
    const client = toInterface(clientPeer, new InterfaceBuilder().privateKey(serverKey).addAddress("10.0.0.1/24").build());
    assert.strictEqual(client.peers[0].endpoint, undefined);
  });

  await t.test("Peer with only public key", () => {
    const peer = new PeerBuilder().publicKey(clientKey.publicKey()).build();
    assert.throws(() => toInterface(peer, server), { name: "DerivationError", reason: "MissingPrivateKey" });
    const result = safeToInterface(peer, server);
    assert.ok(!result.ok);
    assert.ok(result.error instanceof DerivationError);
  });

  await t.test("Server without private key", () => {
    const keyless = new InterfaceBuilder().addAddress("10.0.0.1/24").endpoint("vpn.example.com").build();
    assert.throws(() => toInterface(clientPeer, keyless), { reason: "ServerKeyUnavailable" });
    const publicOnly = new PeerBuilder().publicKey(clientKey.publicKey()).build();
    assert.throws(() => toInterface(publicOnly, keyless), { reason: "MissingPrivateKey" });
  });

  await t.test("safeToInterface value", () => {
    const result = safeToInterface(clientPeer, server);
    assert.ok(result.ok);
    assert.strictEqual(result.value.privateKey, clientKey);
  });
});

test("Interface as peer", async t => {
  await t.test("Keeps key, addresses and endpoint", () => {
    const peer = toPeer(serverBuilder().build());
    assert.deepStrictEqual(peer.key, { type: "private", privateKey: serverKey });
    assert.deepStrictEqual(peer.allowedIPs.map(String), ["10.0.0.1/24"]);
    assert.strictEqual(peer.endpoint, "vpn.example.com:51820");
    assert.strictEqual(peer.amnezia, undefined);
  });

  await t.test("Keeps obfuscation values", () => {
    assert.deepStrictEqual(toPeer(serverBuilder().amnezia({ jc: 4, s1: 15 }).build()).amnezia, { jc: 4, s1: 15 });
  });

  await t.test("Needs a private key", () => {
    assert.throws(() => toPeer(new InterfaceBuilder().build()), { reason: "ServerKeyUnavailable" });
  });
});
