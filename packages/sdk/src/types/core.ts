export type Field = bigint;

/** The three sizes every proving call reads off a circuit instance. */
export interface CircuitDimensions {
  numCons: number;
  numVars: number;
  numInputs: number;
}

export interface WitnessHeader {
  version: number;
  fieldByteSize: number;
  /** Modulus bytes as stored in the file, decoded little-endian */
  modulus: bigint;
  witnessCount: number;
}
