export { amneziaLines, normalizeAmnezia, randomAmnezia, validateAmnezia, type AmneziaSettings } from "./amnezia.js";
export { interfaceEndpoint, safeToInterface, toInterface, toPeer, type ToInterfaceOptions } from "./derive.js";
export { DerivationError, KeyError, ValidationError, WgError, type DerivationReason, type KeyReason, type Result, type ValidationReason } from "./errors.js";
export { features, type Features } from "./features.js";
export { IpNet } from "./ipnet.js";
export { constants, Key, keyToBase64, PresharedKey, PrivateKey, PublicKey } from "./key.js";
export { stringify, stringifyPeer, type StringifyOptions } from "./quick.js";
export { interfaceFromJSON, interfaceSchema, interfaceToJSON, peerFromJSON, peerSchema, peerToJSON, type InterfaceJSON, type PeerJSON } from "./schema.js";
export { cloneInterface, clonePeer, InterfaceBuilder, PeerBuilder, type Interface, type KeyRef, type Peer, type Table } from "./wginterface.js";
