import debug from "debug";
import { isIP } from "node:net";
import { capture, DerivationError, WgError, type Result } from "./errors.js";
import { features } from "./features.js";
import { IpNet } from "./ipnet.js";
import { InterfaceBuilder, PeerBuilder, type Interface, type Peer } from "./wginterface.js";

const log = debug("wg-conf:derive");

export interface ToInterfaceOptions {
  /** Route all client traffic through the server (`AllowedIPs = 0.0.0.0/0,::/0`), default `false` */
  defaultGateway?: boolean;

  /** `PersistentKeepalive` of the client's server peer, unset by default */
  persistentKeepalive?: number;

  /** Add `::/0` to the default gateway routes, defaults to the `ipv6` feature switch */
  dualStack?: boolean;
}

/**
 * Endpoint peers use to reach `wgInterface`: `endpoint:listenPort` when both are set, `endpoint` alone otherwise.
 */
export function interfaceEndpoint({ endpoint, listenPort }: Interface): string | undefined {
  if (endpoint === undefined) return undefined;
  if (listenPort === undefined) return endpoint;
  return (isIP(endpoint) === 6 ? "[".concat(endpoint, "]") : endpoint).concat(":", String(listenPort));
}

/**
 * Describe `wgInterface` as a peer of some other interface.
 *
 * The peer keeps the interface's private key and obfuscation values, its addresses become the allowed IPs.
 *
 * @throws DerivationError `ServerKeyUnavailable` when the interface has no private key
 */
export function toPeer(wgInterface: Interface): Peer {
  if (!wgInterface.privateKey) throw new DerivationError("ServerKeyUnavailable");
  const builder = new PeerBuilder().privateKey(wgInterface.privateKey).allowedIPs(wgInterface.address);
  const endpoint = interfaceEndpoint(wgInterface);
  if (endpoint !== undefined) builder.endpoint(endpoint);
  if (wgInterface.amnezia) builder.amnezia(wgInterface.amnezia);
  return builder.build();
}

/**
 * Generate client `Interface` from client's `Peer` (as listed on the server) and the server's `Interface`.
 *
 * - client addresses are the peer's allowed IPs;
 * - client DNS is copied from the server;
 * - obfuscation values are the peer's own, or the server's when the peer has none;
 * - the single `[Peer]` is the server, reached at its endpoint.
 *
 * @example
 * ```ts
 * const client = toInterface(peer, server, { defaultGateway: true, persistentKeepalive: 25 });
 * console.log(stringify(client));
 * ```
 *
 * @throws DerivationError `MissingPrivateKey` when `peer` holds only a public key, `ServerKeyUnavailable` when `server` has no private key
 */
export function toInterface(peer: Peer, server: Interface, options: ToInterfaceOptions = {}): Interface {
  const { key } = peer, serverKey = server.privateKey;
  if (key.type !== "private") throw new DerivationError("MissingPrivateKey");
  if (!serverKey) throw new DerivationError("ServerKeyUnavailable");
  const { defaultGateway = false, persistentKeepalive, dualStack = features.ipv6 } = options;

  const serverPeer = new PeerBuilder()
    .publicKey(serverKey.publicKey())
    .allowedIPs(defaultGateway ? (dualStack ? [IpNet.ANY_V4, IpNet.ANY_V6] : [IpNet.ANY_V4]) : server.address);
  const endpoint = interfaceEndpoint(server);
  if (endpoint !== undefined) serverPeer.endpoint(endpoint);
  if (persistentKeepalive !== undefined) serverPeer.persistentKeepalive(persistentKeepalive);

  const client = new InterfaceBuilder()
    .address(peer.allowedIPs)
    .privateKey(key.privateKey)
    .dns(server.dns)
    .addPeer(serverPeer.build());
  const amnezia = peer.amnezia ?? server.amnezia;
  if (amnezia) client.amnezia(amnezia);

  log("client interface derived, default gateway: %s, dual stack: %s", defaultGateway, dualStack);
  return client.build();
}

/** Like `toInterface`, returning the error instead of throwing it */
export function safeToInterface(peer: Peer, server: Interface, options?: ToInterfaceOptions): Result<Interface, WgError> {
  return capture(WgError, () => toInterface(peer, server, options));
}
