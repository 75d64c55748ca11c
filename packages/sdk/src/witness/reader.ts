import { DEFAULT_WITNESS_FORMAT, WitnessFormat } from "../config/format.js";
import { attempt, ERR, Result, SDKError } from "../errors/index.js";
import type { Field, WitnessHeader } from "../types/core.js";
import { fromLeBytes } from "../utils/big.js";
import { debug } from "../utils/log.js";
import { bytesEqual, hexFromU8a } from "../utils/serde.js";

/** Forward-only cursor over a byte buffer. Every read is bounds-checked. */
export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readBytes(n: number, what: string): Uint8Array {
    this.need(n, what);
    const out = this.bytes.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  readU32(what: string): number {
    this.need(4, what);
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  readU64(what: string): bigint {
    this.need(8, what);
    const v = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return v;
  }

  private need(n: number, what: string) {
    if (this.remaining < n) {
      throw new SDKError(ERR.UNEXPECTED_EOF, `unexpected end of witness reading ${what} at offset ${this.offset}: need ${n} bytes, have ${this.remaining}`);
    }
  }
}

// Reads magic through the header section and the data section's own header,
// leaving the cursor on the first witness element.
function readPreamble(r: BinaryReader, fmt: WitnessFormat): WitnessHeader {
  const magic = r.readBytes(fmt.magic.length, "magic");
  if (!bytesEqual(magic, fmt.magic)) {
    throw new SDKError(ERR.MALFORMED_HEADER, `invalid file header ${hexFromU8a(magic)}`);
  }

  const version = r.readU32("version");
  if (version > fmt.maxVersion) {
    throw new SDKError(ERR.UNSUPPORTED_VERSION, `unsupported file version ${version} (max ${fmt.maxVersion})`);
  }

  const numSections = r.readU32("section count");
  if (numSections !== fmt.sectionCount) {
    throw new SDKError(ERR.INVALID_SECTION_COUNT, `invalid num sections ${numSections}, expected ${fmt.sectionCount}`);
  }

  const headerType = r.readU32("header section type");
  if (headerType !== fmt.headerSectionType) {
    throw new SDKError(ERR.INVALID_SECTION_TYPE, `invalid section type ${headerType}, expected ${fmt.headerSectionType}`);
  }
  const headerSize = r.readU64("header section size");
  const expectedHeaderSize = BigInt(4 + fmt.fieldByteSize + 4);
  if (headerSize !== expectedHeaderSize) {
    throw new SDKError(ERR.INVALID_SECTION_SIZE, `invalid header section size ${headerSize}, expected ${expectedHeaderSize}`);
  }

  const fieldByteSize = r.readU32("field byte size");
  if (fieldByteSize !== fmt.fieldByteSize) {
    throw new SDKError(ERR.INVALID_FIELD_SIZE, `invalid field byte size ${fieldByteSize}, expected ${fmt.fieldByteSize}`);
  }

  const modulus = fromLeBytes(r.readBytes(fieldByteSize, "field modulus"));
  if (fmt.expectedModulus !== undefined && modulus !== fmt.expectedModulus) {
    throw new SDKError(ERR.INVALID_MODULUS, `witness modulus 0x${modulus.toString(16)} does not match field 0x${fmt.expectedModulus.toString(16)}`);
  }

  const witnessCount = r.readU32("witness length");

  const dataType = r.readU32("data section type");
  if (dataType !== fmt.dataSectionType) {
    throw new SDKError(ERR.INVALID_SECTION_TYPE, `invalid section type ${dataType}, expected ${fmt.dataSectionType}`);
  }
  const dataSize = r.readU64("data section size");
  const expectedDataSize = BigInt(witnessCount) * BigInt(fieldByteSize);
  if (dataSize !== expectedDataSize) {
    throw new SDKError(ERR.INVALID_SECTION_SIZE, `invalid witness section size ${dataSize}, expected ${expectedDataSize}`);
  }

  return { version, fieldByteSize, modulus, witnessCount };
}

/** Decode one little-endian element, rejecting non-canonical values. */
export function readField(r: BinaryReader, fmt: WitnessFormat): Field {
  const fe = fromLeBytes(r.readBytes(fmt.fieldByteSize, "field element"));
  if (fe >= fmt.fieldModulus) {
    throw new SDKError(ERR.INVALID_FIELD_ELEMENT, `non-canonical field element at offset ${r.position - fmt.fieldByteSize}`);
  }
  return fe;
}

/** Validate the header and section layout without decoding any element. */
export function readWitnessHeader(bytes: Uint8Array, fmt: WitnessFormat = DEFAULT_WITNESS_FORMAT): WitnessHeader {
  return readPreamble(new BinaryReader(bytes), fmt);
}

/** Parse a `.wtns` buffer into its field elements, in file order. */
export function parseWitness(bytes: Uint8Array, fmt: WitnessFormat = DEFAULT_WITNESS_FORMAT): Field[] {
  const r = new BinaryReader(bytes);
  const header = readPreamble(r, fmt);
  debug("wtns", "header", { version: header.version, witnessCount: header.witnessCount });

  const out: Field[] = [];
  for (let i = 0; i < header.witnessCount; i++) out.push(readField(r, fmt));
  return out;
}

export function safeParseWitness(bytes: Uint8Array, fmt: WitnessFormat = DEFAULT_WITNESS_FORMAT): Result<Field[]> {
  return attempt(() => parseWitness(bytes, fmt));
}
