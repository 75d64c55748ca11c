import { DEFAULT_WITNESS_FORMAT, WitnessFormat } from "../config/format.js";
import { ERR, SDKError } from "../errors/index.js";
import type { Field } from "../types/core.js";
import { leBytes, u64le } from "../utils/big.js";
import { concatBytes, u32le } from "../utils/serde.js";

export interface SerializeWitnessOptions {
  format?: WitnessFormat;
  version?: number;
  /** Modulus written into the header; defaults to the format's field */
  modulus?: bigint;
}

/** Encode field elements in the two-section `.wtns` layout parseWitness reads. */
export function serializeWitness(values: readonly Field[], opts: SerializeWitnessOptions = {}): Uint8Array {
  const fmt = opts.format ?? DEFAULT_WITNESS_FORMAT;
  const n8 = fmt.fieldByteSize;
  for (const v of values) {
    if (v < 0n || v >= fmt.fieldModulus) throw new SDKError(ERR.INVALID_FIELD_ELEMENT, `value ${v} is not a canonical field element`);
  }

  const header = concatBytes(
    fmt.magic,
    u32le(opts.version ?? fmt.maxVersion),
    u32le(fmt.sectionCount),
    u32le(fmt.headerSectionType),
    u64le(4 + n8 + 4),
    u32le(n8),
    leBytes(opts.modulus ?? fmt.fieldModulus, n8),
    u32le(values.length),
    u32le(fmt.dataSectionType),
    u64le(BigInt(values.length) * BigInt(n8)),
  );

  const out = new Uint8Array(header.length + values.length * n8);
  out.set(header, 0);
  values.forEach((v, i) => out.set(leBytes(v, n8), header.length + i * n8));
  return out;
}
