import { bench, group, run } from "mitata";
import { dft } from "../src/core/dft.js";
import { createNormalSource, createRng } from "../src/core/random.js";
import { LENGTH_PRESETS } from "../src/effect/config.js";
import { encodeFixture } from "../src/public/fixture.js";
import { buildTestVector, generateSequence } from "../src/xform/vectors.js";

const normal = createNormalSource(createRng(1234));
const sizes = [16, 64, 243, 256];

const checksums = new Map<number, number>();

for (const n of sizes) {
  const input = generateSequence(n, normal);

  group(`dft n=${n}`, () => {
    bench("reference", () => {
      const result = dft(input);
      let checksum = 0;
      for (let i = 0; i < n; i += 1) {
        checksum += (result.real[i] ?? 0) * 0.001;
        checksum += (result.imag[i] ?? 0) * 0.002;
      }
      checksums.set(n, checksum);
    });
  });
}

group("fixture set", () => {
  bench("factorizations", () => {
    const source = createNormalSource(createRng(1234));
    for (const length of LENGTH_PRESETS.factorizations) {
      encodeFixture(buildTestVector(length, source));
    }
  });
});

await run();

for (const [n, checksum] of checksums) {
  // Guardrail output to ensure deterministic work per run.
  console.log(`checksum n=${n}: ${checksum.toFixed(6)}`);
}
