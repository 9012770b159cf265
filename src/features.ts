export interface Features {
  /** Render AmneziaWG obfuscation values (`Jc`, `Jmin`, ..., `H4`) in `[Interface]` */
  amneziawg: boolean;
  /** Include `::/0` next to `0.0.0.0/0` when a derived client routes everything through the server */
  ipv6: boolean;
}

/** Environment switch, enabled unless set to `0`, `false`, `off` or `no` */
export function envSwitch(name: string): boolean {
  const value = (process.env[name] || "").trim().toLowerCase();
  return !(["0", "false", "off", "no"]).includes(value);
}

/**
 * Process wide defaults, read once from `WG_CONF_AMNEZIAWG` and `WG_CONF_IPV6`.
 *
 * Both default to enabled, per call options take precedence.
 */
export const features: Readonly<Features> = Object.freeze({
  amneziawg: envSwitch("WG_CONF_AMNEZIAWG"),
  ipv6: envSwitch("WG_CONF_IPV6"),
});
