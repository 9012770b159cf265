import crypto from "node:crypto";
import { format } from "node:util";
import { ValidationError } from "./errors.js";

/**
 * AmneziaWG obfuscation values, every field is optional and unset fields are not rendered.
 *
 * - `jc`, `jmin`, `jmax`: count and size range of junk packets sent before the handshake.
 * - `s1`, `s2`: junk prepended to handshake initiation and response packets.
 * - `h1`..`h4`: replacement message type headers.
 *
 * Client and server must agree on `s1`, `s2` and `h1`..`h4`.
 */
export interface AmneziaSettings {
  jc?: number;
  jmin?: number;
  jmax?: number;
  s1?: number;
  s2?: number;
  h1?: number;
  h2?: number;
  h3?: number;
  h4?: number;
}

/** Config key and settings field, in rendering order */
export const amneziaFields = Object.freeze([
  ["Jc", "jc"],
  ["Jmin", "jmin"],
  ["Jmax", "jmax"],
  ["S1", "s1"],
  ["S2", "s2"],
  ["H1", "h1"],
  ["H2", "h2"],
  ["H3", "h3"],
  ["H4", "h4"],
] as const);

const MAX_HEADER = (2 ** 32) - 1;

/**
 * Check AmneziaWG limits on the fields that are set.
 *
 * @throws ValidationError `InvalidAmneziaSetting` naming the first offending field (`Jc`, `Jmin`, ..., or `H1/H2/H3/H4`)
 */
export function validateAmnezia(settings: AmneziaSettings): void {
  for (const [name, field] of amneziaFields) {
    const value = settings[field];
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value < 0 || (name[0] === "H" && value > MAX_HEADER)) throw new ValidationError("InvalidAmneziaSetting", name);
  }

  const { jc, jmin, jmax, s1, s2 } = settings;
  if (jc !== undefined && (jc < 1 || jc > 128)) throw new ValidationError("InvalidAmneziaSetting", "Jc");
  if (jmin !== undefined && jmax !== undefined && jmin >= jmax) throw new ValidationError("InvalidAmneziaSetting", "Jmin");
  if (jmax !== undefined && jmax > 1280) throw new ValidationError("InvalidAmneziaSetting", "Jmax");
  if (s1 !== undefined && (s1 > 1132 || (s2 !== undefined && s1 + 56 === s2))) throw new ValidationError("InvalidAmneziaSetting", "S1");
  if (s2 !== undefined && s2 > 1188) throw new ValidationError("InvalidAmneziaSetting", "S2");

  const headers = ([settings.h1, settings.h2, settings.h3, settings.h4]).filter((value): value is number => value !== undefined);
  if (new Set(headers).size !== headers.length) throw new ValidationError("InvalidAmneziaSetting", "H1/H2/H3/H4");
}

/**
 * Generate a complete and valid set of obfuscation values.
 */
export function randomAmnezia(): AmneziaSettings {
  const jmin = crypto.randomInt(40, 90), s1 = crypto.randomInt(15, 150);
  let s2 = crypto.randomInt(15, 150);
  if (s1 + 56 === s2) s2++;

  const headers = new Set<number>();
  while (headers.size < 4) headers.add(crypto.randomInt(5, 2 ** 31));
  const [h1, h2, h3, h4] = Array.from(headers);

  return {
    jc: crypto.randomInt(4, 13),
    jmin,
    jmax: crypto.randomInt(jmin + 1, 1001),
    s1, s2,
    h1, h2, h3, h4,
  };
}

/**
 * `Key = Value` lines of the values that are set.
 */
export function amneziaLines(settings: AmneziaSettings): string[] {
  return amneziaFields.filter(([, field]) => settings[field] !== undefined).map(([name, field]) => format("%s = %d", name, settings[field]));
}

/**
 * Copy holding only the set values, `-0` stored as `0`.
 */
export function normalizeAmnezia(settings: Readonly<AmneziaSettings>): AmneziaSettings {
  const normalized: AmneziaSettings = {};
  for (const [, field] of amneziaFields) {
    const value = settings[field];
    if (value !== undefined) normalized[field] = value + 0;
  }
  return normalized;
}
