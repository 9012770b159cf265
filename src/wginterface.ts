import debug from "debug";
import { normalizeAmnezia, validateAmnezia, type AmneziaSettings } from "./amnezia.js";
import { capture, ValidationError, WgError, type Result } from "./errors.js";
import { IpNet } from "./ipnet.js";
import { PrivateKey, PublicKey, type PresharedKey } from "./key.js";

const log = debug("wg-conf:build");

/** Peer key: public only for a remote description, private when the peer may become an `Interface` itself */
export type KeyRef = { type: "public", publicKey: PublicKey } | { type: "private", privateKey: PrivateKey };

/** Routing table: table number, `off` disables routes, `auto` is wg-quick's default handling */
export type Table = number | "off" | "auto";

export interface Peer {
  /** Peer key, public key is derived for display when a private key is held */
  readonly key: KeyRef;

  /** AllowedIPs specifies a list of allowed IP addresses in CIDR notation (`0.0.0.0/0`, `::/0`) */
  readonly allowedIPs: readonly IpNet[];

  /** Remote address or hostname with port (`vpn.example.com:51820`) */
  readonly endpoint?: string;

  /** Persistent keepalive interval in seconds */
  readonly persistentKeepalive?: number;

  /** Preshared key to peer */
  readonly presharedKey?: PresharedKey;

  /** AmneziaWG values of this peer, used for the client interface derived from it */
  readonly amnezia?: Readonly<AmneziaSettings>;
};

export interface Interface {
  /** Interface IP address'es */
  readonly address: readonly IpNet[];

  /** UDP port to listen */
  readonly listenPort?: number;

  /** Absent for interfaces known only by their public side */
  readonly privateKey?: PrivateKey;

  /** DNS servers announced to clients */
  readonly dns: readonly string[];

  readonly mtu?: number;

  readonly table?: Table;

  readonly preUp: readonly string[];
  readonly postUp: readonly string[];
  readonly preDown: readonly string[];
  readonly postDown: readonly string[];

  /**
   * Public host (optionally with port) peers use to reach this interface.
   *
   * Rendered as the `# Name = ` comment, and used as `Endpoint` when this interface becomes a peer.
   */
  readonly endpoint?: string;

  /** Interface Peers, rendered in this order */
  readonly peers: readonly Peer[];

  /** AmneziaWG obfuscation values */
  readonly amnezia?: Readonly<AmneziaSettings>;
};

function parseNets(field: string, nets: readonly (IpNet | string)[]): IpNet[] {
  return nets.map(net => {
    try {
      return IpNet.from(net);
    } catch (err) {
      if (err instanceof WgError) throw new ValidationError("InvalidValue", field, { cause: err });
      throw err;
    }
  });
}

// -0 passes the range checks but renders as "-0"
function unsigned(value: number) {
  return value + 0;
}

function isPort(value: number) {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}

function checkTable(table: Table) {
  if (table === "off" || table === "auto") return;
  if (!(Number.isInteger(table) && table >= 0)) throw new ValidationError("InvalidValue", "table");
}

/**
 * Deep copy of a peer, sharing no arrays with `peer`.
 */
export function clonePeer(peer: Peer): Peer {
  return Object.freeze({
    ...peer,
    key: Object.freeze({ ...peer.key }),
    allowedIPs: Object.freeze(Array.from(peer.allowedIPs)),
    ...(peer.amnezia ? { amnezia: Object.freeze({ ...peer.amnezia }) } : {}),
  });
}

/**
 * Deep copy of an interface and its peers.
 */
export function cloneInterface(wgInterface: Interface): Interface {
  return Object.freeze({
    ...wgInterface,
    address: Object.freeze(Array.from(wgInterface.address)),
    dns: Object.freeze(Array.from(wgInterface.dns)),
    preUp: Object.freeze(Array.from(wgInterface.preUp)),
    postUp: Object.freeze(Array.from(wgInterface.postUp)),
    preDown: Object.freeze(Array.from(wgInterface.preDown)),
    postDown: Object.freeze(Array.from(wgInterface.postDown)),
    peers: Object.freeze(wgInterface.peers.map(clonePeer)),
    ...(wgInterface.amnezia ? { amnezia: Object.freeze({ ...wgInterface.amnezia }) } : {}),
  });
}

/**
 * Builder for `[Peer]` sections.
 *
 * @example
 * ```ts
 * const peer = new PeerBuilder()
 *   .addAllowedIP("10.0.0.2/32")
 *   .privateKey(PrivateKey.random())
 *   .build();
 * ```
 */
export class PeerBuilder {
  #key?: KeyRef;
  #allowedIPs: (IpNet | string)[] = [];
  #endpoint?: string;
  #persistentKeepalive?: number;
  #presharedKey?: PresharedKey;
  #amnezia?: AmneziaSettings;

  /** Start from an existing peer */
  static from(peer: Peer): PeerBuilder {
    const builder = new PeerBuilder().key(peer.key).allowedIPs(peer.allowedIPs);
    if (peer.endpoint !== undefined) builder.endpoint(peer.endpoint);
    if (peer.persistentKeepalive !== undefined) builder.persistentKeepalive(peer.persistentKeepalive);
    if (peer.presharedKey !== undefined) builder.presharedKey(peer.presharedKey);
    if (peer.amnezia !== undefined) builder.amnezia(peer.amnezia);
    return builder;
  }

  key(value: KeyRef) {
    this.#key = value;
    return this;
  }

  /** Set private key, an `Interface` can then be derived from this peer */
  privateKey(value: PrivateKey) {
    return this.key({ type: "private", privateKey: value });
  }

  publicKey(value: PublicKey) {
    return this.key({ type: "public", publicKey: value });
  }

  allowedIPs(nets: readonly (IpNet | string)[]) {
    this.#allowedIPs = Array.from(nets);
    return this;
  }

  addAllowedIP(net: IpNet | string) {
    this.#allowedIPs.push(net);
    return this;
  }

  endpoint(value: string) {
    this.#endpoint = value;
    return this;
  }

  /** Keepalive interval in seconds, `0` disables it */
  persistentKeepalive(seconds: number) {
    this.#persistentKeepalive = seconds;
    return this;
  }

  presharedKey(value: PresharedKey) {
    this.#presharedKey = value;
    return this;
  }

  /** Obfuscation values handed to the client interface derived from this peer */
  amnezia(settings: Readonly<AmneziaSettings>) {
    this.#amnezia = { ...settings };
    return this;
  }

  /**
   * Validate and create the peer.
   *
   * @throws ValidationError `MissingRequiredField("key")` when no key was set, `InvalidValue` or `InvalidAmneziaSetting` on out of range values
   */
  build(): Peer {
    const key = this.#key;
    if (!key || (key.type === "private" ? !(key.privateKey instanceof PrivateKey) : !(key.publicKey instanceof PublicKey))) {
      log("peer rejected, no key");
      throw new ValidationError("MissingRequiredField", "key");
    }
    const keepalive = this.#persistentKeepalive;
    if (keepalive !== undefined && !isPort(keepalive)) throw new ValidationError("InvalidValue", "persistentKeepalive");
    if (this.#amnezia !== undefined) validateAmnezia(this.#amnezia);

    const peer: Peer = {
      key: Object.freeze(key.type === "private" ? { type: "private", privateKey: key.privateKey } : { type: "public", publicKey: key.publicKey }),
      allowedIPs: Object.freeze(parseNets("allowedIPs", this.#allowedIPs)),
      ...(this.#endpoint !== undefined ? { endpoint: this.#endpoint } : {}),
      ...(keepalive ? { persistentKeepalive: keepalive } : {}),
      ...(this.#presharedKey !== undefined ? { presharedKey: this.#presharedKey } : {}),
      ...(this.#amnezia !== undefined ? { amnezia: Object.freeze(normalizeAmnezia(this.#amnezia)) } : {}),
    };
    return Object.freeze(peer);
  }

  /** Like `build`, returning the validation error instead of throwing it */
  safeBuild(): Result<Peer, ValidationError> {
    return capture(ValidationError, () => this.build());
  }
}

/**
 * Builder for complete configs, `[Interface]` with its `[Peer]`'s.
 *
 * No field is required: `new InterfaceBuilder().build()` is a valid, empty interface.
 *
 * @example
 * ```ts
 * const server = new InterfaceBuilder()
 *   .addAddress("10.0.0.1/24")
 *   .listenPort(51820)
 *   .privateKey(PrivateKey.random())
 *   .dns(["1.1.1.1", "1.0.0.1"])
 *   .endpoint("vpn.example.com")
 *   .addPeer(peer)
 *   .build();
 * ```
 */
export class InterfaceBuilder {
  #address: (IpNet | string)[] = [];
  #listenPort?: number;
  #privateKey?: PrivateKey;
  #dns: string[] = [];
  #mtu?: number;
  #table?: Table;
  #preUp: string[] = [];
  #postUp: string[] = [];
  #preDown: string[] = [];
  #postDown: string[] = [];
  #endpoint?: string;
  #peers: Peer[] = [];
  #amnezia?: AmneziaSettings;

  /** Start from an existing interface */
  static from(wgInterface: Interface): InterfaceBuilder {
    const builder = new InterfaceBuilder()
      .address(wgInterface.address)
      .dns(wgInterface.dns)
      .preUp(wgInterface.preUp)
      .postUp(wgInterface.postUp)
      .preDown(wgInterface.preDown)
      .postDown(wgInterface.postDown)
      .peers(wgInterface.peers);
    if (wgInterface.listenPort !== undefined) builder.listenPort(wgInterface.listenPort);
    if (wgInterface.privateKey !== undefined) builder.privateKey(wgInterface.privateKey);
    if (wgInterface.mtu !== undefined) builder.mtu(wgInterface.mtu);
    if (wgInterface.table !== undefined) builder.table(wgInterface.table);
    if (wgInterface.endpoint !== undefined) builder.endpoint(wgInterface.endpoint);
    if (wgInterface.amnezia !== undefined) builder.amnezia(wgInterface.amnezia);
    return builder;
  }

  address(nets: readonly (IpNet | string)[]) {
    this.#address = Array.from(nets);
    return this;
  }

  /** Add a network (`10.0.0.1/24`) or a single address (`10.0.0.1` is stored as `10.0.0.1/32`) */
  addAddress(net: IpNet | string) {
    this.#address.push(net);
    return this;
  }

  listenPort(port: number) {
    this.#listenPort = port;
    return this;
  }

  privateKey(value: PrivateKey) {
    this.#privateKey = value;
    return this;
  }

  dns(servers: readonly string[]) {
    this.#dns = Array.from(servers);
    return this;
  }

  addDns(server: string) {
    this.#dns.push(server);
    return this;
  }

  mtu(value: number) {
    this.#mtu = value;
    return this;
  }

  table(value: Table) {
    this.#table = value;
    return this;
  }

  /** Commands run before the interface is brought up, one `PreUp` line each */
  preUp(commands: readonly string[]) {
    this.#preUp = Array.from(commands);
    return this;
  }

  addPreUp(command: string) {
    this.#preUp.push(command);
    return this;
  }

  postUp(commands: readonly string[]) {
    this.#postUp = Array.from(commands);
    return this;
  }

  addPostUp(command: string) {
    this.#postUp.push(command);
    return this;
  }

  preDown(commands: readonly string[]) {
    this.#preDown = Array.from(commands);
    return this;
  }

  addPreDown(command: string) {
    this.#preDown.push(command);
    return this;
  }

  postDown(commands: readonly string[]) {
    this.#postDown = Array.from(commands);
    return this;
  }

  addPostDown(command: string) {
    this.#postDown.push(command);
    return this;
  }

  endpoint(value: string) {
    this.#endpoint = value;
    return this;
  }

  peers(peers: readonly Peer[]) {
    this.#peers = Array.from(peers);
    return this;
  }

  addPeer(peer: Peer) {
    this.#peers.push(peer);
    return this;
  }

  amnezia(settings: Readonly<AmneziaSettings>) {
    this.#amnezia = { ...settings };
    return this;
  }

  /**
   * Validate and create the interface, peers are deep copied.
   *
   * @throws ValidationError on out of range `listenPort`, `mtu` or `table`, malformed addresses or invalid obfuscation values
   */
  build(): Interface {
    if (this.#listenPort !== undefined && !isPort(this.#listenPort)) throw new ValidationError("InvalidValue", "listenPort");
    if (this.#mtu !== undefined && !(Number.isInteger(this.#mtu) && this.#mtu > 0)) throw new ValidationError("InvalidValue", "mtu");
    if (this.#table !== undefined) checkTable(this.#table);
    if (this.#amnezia !== undefined) validateAmnezia(this.#amnezia);
    const address = parseNets("address", this.#address);

    const wgInterface: Interface = {
      address: Object.freeze(address),
      dns: Object.freeze(Array.from(this.#dns)),
      preUp: Object.freeze(Array.from(this.#preUp)),
      postUp: Object.freeze(Array.from(this.#postUp)),
      preDown: Object.freeze(Array.from(this.#preDown)),
      postDown: Object.freeze(Array.from(this.#postDown)),
      peers: Object.freeze(this.#peers.map(clonePeer)),
      ...(this.#listenPort !== undefined ? { listenPort: unsigned(this.#listenPort) } : {}),
      ...(this.#privateKey !== undefined ? { privateKey: this.#privateKey } : {}),
      ...(this.#mtu !== undefined ? { mtu: this.#mtu } : {}),
      ...(this.#table !== undefined ? { table: typeof this.#table === "number" ? unsigned(this.#table) : this.#table } : {}),
      ...(this.#endpoint !== undefined ? { endpoint: this.#endpoint } : {}),
      ...(this.#amnezia !== undefined ? { amnezia: Object.freeze(normalizeAmnezia(this.#amnezia)) } : {}),
    };
    log("interface built, %d address(es), %d peer(s)", address.length, wgInterface.peers.length);
    return Object.freeze(wgInterface);
  }

  /** Like `build`, returning the validation error instead of throwing it */
  safeBuild(): Result<Interface, ValidationError> {
    return capture(ValidationError, () => this.build());
  }
}
