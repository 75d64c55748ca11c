import {
  createDigestBackend,
  createProver,
  encodePublicInputs,
  readWitnessHeader,
  serializeWitness,
} from "../src/index.js";

function main() {
  const backend = createDigestBackend();
  const prover = createProver({ backend });

  // x * x = y, x private, y public
  const circuit = backend.encodeInstance({
    numCons: 1,
    numVars: 1,
    numInputs: 1,
    A: [{ row: 0, col: 0, value: 1n }],
    B: [{ row: 0, col: 0, value: 1n }],
    C: [{ row: 0, col: 2, value: 1n }],
  });
  const witness = serializeWitness([12n]);
  const publicInputs = encodePublicInputs([144n]);

  console.log("Witness header:", readWitnessHeader(witness));
  const proof = prover.prove(circuit, witness, publicInputs);
  console.log("Proof bytes:", proof.length);
  console.log("Verified:", prover.verify(circuit, proof, publicInputs));
  console.log("Verified with y = 145:", prover.verify(circuit, proof, encodePublicInputs([145n])));
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
