import debug from "debug";
import { format } from "node:util";
import { amneziaLines } from "./amnezia.js";
import { features } from "./features.js";
import type { Interface, Peer } from "./wginterface.js";

const log = debug("wg-conf:quick");

export interface StringifyOptions {
  /** Render AmneziaWG values, defaults to the `amneziawg` feature switch */
  amneziawg?: boolean;
}

function peerLines(peer: Peer): string[] {
  const configStr: string[] = ["[Peer]"];
  if (peer.endpoint) configStr.push(format("Endpoint = %s", peer.endpoint));
  if (peer.allowedIPs.length > 0) configStr.push(format("AllowedIPs = %s", peer.allowedIPs.join(",")));
  // never expose the private key, only its public half
  configStr.push(format("PublicKey = %s", (peer.key.type === "public" ? peer.key.publicKey : peer.key.privateKey.publicKey()).toString()));
  if (peer.presharedKey) configStr.push(format("PresharedKey = %s", peer.presharedKey.toString()));
  if (peer.persistentKeepalive) configStr.push(format("PersistentKeepalive = %d", peer.persistentKeepalive));
  return configStr;
}

/**
 * Convert a single peer to its `[Peer]` section
 * @param peer - Peer
 */
export function stringifyPeer(peer: Peer): string {
  return peerLines(peer).join("\n").concat("\n");
}

/**
 * Convert interface to wg-quick config String
 *
 * Lists are written two ways: `Address`, `DNS` and `AllowedIPs` are joined with commas, while
 * `PreUp`, `PreDown`, `PostUp` and `PostDown` get one line per command.
 *
 * @param wgConfig - Interface to write
 */
export function stringify(wgConfig: Interface, options: StringifyOptions = {}): string {
  const { amneziawg = features.amneziawg } = options;
  const configStr: string[] = ["[Interface]"];

  if (wgConfig.endpoint) configStr.push(format("# Name = %s", wgConfig.endpoint));
  if (wgConfig.address.length > 0) configStr.push(format("Address = %s", wgConfig.address.map(net => net.hostString()).join(",")));
  if (wgConfig.listenPort !== undefined) configStr.push(format("ListenPort = %d", wgConfig.listenPort));
  if (wgConfig.privateKey) configStr.push(format("PrivateKey = %s", wgConfig.privateKey.toString()));
  if (wgConfig.dns.length > 0) configStr.push(format("DNS = %s", wgConfig.dns.join(",")));
  if (wgConfig.mtu !== undefined) configStr.push(format("MTU = %d", wgConfig.mtu));
  if (wgConfig.table !== undefined) configStr.push(format("Table = %s", wgConfig.table));
  if (amneziawg && wgConfig.amnezia) configStr.push(...amneziaLines(wgConfig.amnezia));

  for (const [keyName, commands] of ([["PreUp", wgConfig.preUp], ["PreDown", wgConfig.preDown], ["PostUp", wgConfig.postUp], ["PostDown", wgConfig.postDown]] as const)) {
    if (commands.length === 0) continue;
    configStr.push("", ...commands.map(command => format("%s = %s", keyName, command)));
  }

  for (const peer of wgConfig.peers) configStr.push("", ...peerLines(peer));

  log("rendered %d line(s), %d peer(s)", configStr.length, wgConfig.peers.length);
  return configStr.join("\n").concat("\n");
}
