import { z } from "zod";
import { ERR, SDKError } from "../errors/index.js";

/** secq256k1 scalar field (= secp256k1 base field): 2^256 - 2^32 - 977 */
export const SECQ256K1_SCALAR_MODULUS =
  0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2fn;

export interface WitnessFormat {
  /** 4-byte file tag */
  magic: Uint8Array;
  maxVersion: number;
  sectionCount: number;
  headerSectionType: number;
  dataSectionType: number;
  fieldByteSize: number;
  /** Field the decoded elements must be canonical in */
  fieldModulus: bigint;
  /** When set, the modulus stored in the file must equal it */
  expectedModulus?: bigint;
}

export const DEFAULT_WITNESS_FORMAT: Readonly<WitnessFormat> = Object.freeze({
  magic: new TextEncoder().encode("wtns"),
  maxVersion: 2,
  sectionCount: 2,
  headerSectionType: 1,
  dataSectionType: 2,
  fieldByteSize: 32,
  fieldModulus: SECQ256K1_SCALAR_MODULUS,
});

export const DEFAULT_TRANSCRIPT_LABEL = "nizk_example";

const u32 = z.number().int().nonnegative().max(0xffffffff);

export const WitnessFormatZ = z
  .object({
    magic: z.union([z.string(), z.instanceof(Uint8Array)])
      .transform((m) => (typeof m === "string" ? new TextEncoder().encode(m) : m))
      .refine((m) => m.length === 4, { message: "magic must be exactly 4 bytes" }),
    maxVersion: u32,
    sectionCount: u32,
    headerSectionType: u32,
    dataSectionType: u32,
    fieldByteSize: u32.min(1),
    fieldModulus: z.bigint().positive(),
    expectedModulus: z.bigint().positive().optional(),
  })
  .partial()
  .strict();

export type WitnessFormatOverrides = z.input<typeof WitnessFormatZ>;

/** Merge overrides onto the default format, rejecting malformed values. */
export function resolveWitnessFormat(overrides: WitnessFormatOverrides = {}): WitnessFormat {
  const parsed = WitnessFormatZ.safeParse(overrides);
  if (!parsed.success) {
    throw new SDKError(ERR.INVALID_CONFIG, `invalid witness format: ${parsed.error.issues.map(i => i.message).join(", ")}`, parsed.error);
  }
  const d = parsed.data;
  const fmt: WitnessFormat = {
    magic: Uint8Array.from(d.magic ?? DEFAULT_WITNESS_FORMAT.magic),
    maxVersion: d.maxVersion ?? DEFAULT_WITNESS_FORMAT.maxVersion,
    sectionCount: d.sectionCount ?? DEFAULT_WITNESS_FORMAT.sectionCount,
    headerSectionType: d.headerSectionType ?? DEFAULT_WITNESS_FORMAT.headerSectionType,
    dataSectionType: d.dataSectionType ?? DEFAULT_WITNESS_FORMAT.dataSectionType,
    fieldByteSize: d.fieldByteSize ?? DEFAULT_WITNESS_FORMAT.fieldByteSize,
    fieldModulus: d.fieldModulus ?? DEFAULT_WITNESS_FORMAT.fieldModulus,
    expectedModulus: d.expectedModulus,
  };
  if (fmt.fieldModulus >= 1n << BigInt(8 * fmt.fieldByteSize)) {
    throw new SDKError(ERR.INVALID_CONFIG, `field modulus does not fit in ${fmt.fieldByteSize} bytes`);
  }
  return fmt;
}
