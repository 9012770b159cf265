import debug from "debug";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { PresharedKey, PrivateKey, PublicKey } from "./key.js";
import { InterfaceBuilder, PeerBuilder, type Interface, type Peer, type KeyRef } from "./wginterface.js";

const log = debug("wg-conf:schema");

const key = z.string().length(44);
const integer = z.number().int().nonnegative();

export const amneziaSchema = z.object({
  jc: integer.optional(),
  jmin: integer.optional(),
  jmax: integer.optional(),
  s1: integer.optional(),
  s2: integer.optional(),
  h1: integer.optional(),
  h2: integer.optional(),
  h3: integer.optional(),
  h4: integer.optional(),
}).strict();

export const peerSchema = z.object({
  publicKey: key.optional(),
  privateKey: key.optional(),
  allowedIPs: z.array(z.string()).default([]),
  endpoint: z.string().optional(),
  persistentKeepalive: integer.max(0xffff).optional(),
  presharedKey: key.optional(),
  amnezia: amneziaSchema.optional(),
}).strict();

export const interfaceSchema = z.object({
  address: z.array(z.string()).default([]),
  listenPort: integer.max(0xffff).optional(),
  privateKey: key.optional(),
  dns: z.array(z.string()).default([]),
  mtu: z.number().int().positive().optional(),
  table: z.union([integer, z.literal("off"), z.literal("auto")]).optional(),
  preUp: z.array(z.string()).default([]),
  postUp: z.array(z.string()).default([]),
  preDown: z.array(z.string()).default([]),
  postDown: z.array(z.string()).default([]),
  endpoint: z.string().optional(),
  peers: z.array(peerSchema).default([]),
  amnezia: amneziaSchema.optional(),
}).strict();

/** JSON form of a `Peer`, holding either `publicKey` or `privateKey` */
export type PeerJSON = z.input<typeof peerSchema>;
/** JSON form of an `Interface` */
export type InterfaceJSON = z.input<typeof interfaceSchema>;

function parseWith<T extends z.ZodTypeAny>(schema: T, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (result.success) return result.data;
  const [issue] = result.error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  log("schema rejected %s: %s", field, issue ? issue.message : "unknown");
  throw new ValidationError("InvalidValue", field, { cause: result.error });
}

function keyToJSON(keyRef: KeyRef): Pick<PeerJSON, "publicKey" | "privateKey"> {
  return keyRef.type === "public" ? { publicKey: keyRef.publicKey.toString() } : { privateKey: keyRef.privateKey.toString() };
}

export function peerToJSON(peer: Peer): PeerJSON {
  return {
    ...keyToJSON(peer.key),
    allowedIPs: peer.allowedIPs.map(String),
    ...(peer.endpoint !== undefined ? { endpoint: peer.endpoint } : {}),
    ...(peer.persistentKeepalive !== undefined ? { persistentKeepalive: peer.persistentKeepalive } : {}),
    ...(peer.presharedKey !== undefined ? { presharedKey: peer.presharedKey.toString() } : {}),
    ...(peer.amnezia !== undefined ? { amnezia: { ...peer.amnezia } } : {}),
  };
}

/**
 * Plain JSON object of an interface, keys as base64 and networks in CIDR notation.
 */
export function interfaceToJSON(wgInterface: Interface): InterfaceJSON {
  return {
    address: wgInterface.address.map(String),
    ...(wgInterface.listenPort !== undefined ? { listenPort: wgInterface.listenPort } : {}),
    ...(wgInterface.privateKey !== undefined ? { privateKey: wgInterface.privateKey.toString() } : {}),
    dns: Array.from(wgInterface.dns),
    ...(wgInterface.mtu !== undefined ? { mtu: wgInterface.mtu } : {}),
    ...(wgInterface.table !== undefined ? { table: wgInterface.table } : {}),
    preUp: Array.from(wgInterface.preUp),
    postUp: Array.from(wgInterface.postUp),
    preDown: Array.from(wgInterface.preDown),
    postDown: Array.from(wgInterface.postDown),
    ...(wgInterface.endpoint !== undefined ? { endpoint: wgInterface.endpoint } : {}),
    peers: wgInterface.peers.map(peerToJSON),
    ...(wgInterface.amnezia !== undefined ? { amnezia: { ...wgInterface.amnezia } } : {}),
  };
}

function buildPeer(data: z.output<typeof peerSchema>): Peer {
  const builder = new PeerBuilder().allowedIPs(data.allowedIPs);
  // a private key wins, the public key is derived from it anyway
  if (data.privateKey !== undefined) builder.privateKey(PrivateKey.fromBase64(data.privateKey));
  else if (data.publicKey !== undefined) builder.publicKey(PublicKey.fromBase64(data.publicKey));
  if (data.endpoint !== undefined) builder.endpoint(data.endpoint);
  if (data.persistentKeepalive !== undefined) builder.persistentKeepalive(data.persistentKeepalive);
  if (data.presharedKey !== undefined) builder.presharedKey(PresharedKey.fromBase64(data.presharedKey));
  if (data.amnezia !== undefined) builder.amnezia(data.amnezia);
  return builder.build();
}

/**
 * Validate JSON data and build the peer.
 *
 * @throws ValidationError when the data does not match the peer schema or misses a key
 * @throws KeyError on keys that are not valid base64
 */
export function peerFromJSON(data: unknown): Peer {
  return buildPeer(parseWith(peerSchema, data));
}

/**
 * Validate JSON data and build the interface with its peers.
 *
 * @throws ValidationError when the data does not match the interface schema
 * @throws KeyError on keys that are not valid base64
 */
export function interfaceFromJSON(data: unknown): Interface {
  const parsed = parseWith(interfaceSchema, data);
  const builder = new InterfaceBuilder()
    .address(parsed.address)
    .dns(parsed.dns)
    .preUp(parsed.preUp)
    .postUp(parsed.postUp)
    .preDown(parsed.preDown)
    .postDown(parsed.postDown)
    .peers(parsed.peers.map(buildPeer));
  if (parsed.listenPort !== undefined) builder.listenPort(parsed.listenPort);
  if (parsed.privateKey !== undefined) builder.privateKey(PrivateKey.fromBase64(parsed.privateKey));
  if (parsed.mtu !== undefined) builder.mtu(parsed.mtu);
  if (parsed.table !== undefined) builder.table(parsed.table);
  if (parsed.endpoint !== undefined) builder.endpoint(parsed.endpoint);
  if (parsed.amnezia !== undefined) builder.amnezia(parsed.amnezia);
  return builder.build();
}
