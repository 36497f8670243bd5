import { Curve2d } from "@/curves/Curve2d";
import { maxChordDeviation, randomCurves, seededRandom } from "@test/helpers/curveHelpers";
import { describe, expect, it } from "vitest";

describe("approximation bound over generated curves", () => {
  const rounds = 300;

  it("should keep every chord within the tolerance", () => {
    const random = seededRandom(20240611);
    const failures: string[] = [];
    let checked = 0;

    for (let round = 0; round < rounds; round++) {
      const maxError = 10 ** (-3 + 4.5 * random());
      for (const curve of randomCurves(random)) {
        const result = Curve2d.approximate(curve, { value: maxError });
        if (!result.ok) {
          failures.push(`${curve.type} #${round}: ${result.error.type}`);
          continue;
        }
        const deviation = maxChordDeviation(curve, result.value);
        if (deviation > maxError + 1e-9) {
          failures.push(`${curve.type} #${round}: ${deviation} > ${maxError}`);
        }
        checked++;
      }
    }

    expect(failures).toEqual([]);
    expect(checked).toBe(rounds * 6);
  });

  it("should not use more segments than a tighter tolerance needs", () => {
    const random = seededRandom(7);
    for (let round = 0; round < 50; round++) {
      const maxError = 10 ** (-2 + 3 * random());
      for (const curve of randomCurves(random)) {
        const loose = Curve2d.numApproximationSegments(curve, { value: 2 * maxError });
        const tight = Curve2d.numApproximationSegments(curve, { value: maxError });
        expect(loose.ok && tight.ok).toBe(true);
        if (!loose.ok || !tight.ok) return;
        expect(loose.value).toBeLessThanOrEqual(tight.value);
      }
    }
  });
});
