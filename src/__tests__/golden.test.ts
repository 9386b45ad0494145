import { describe, it, expect } from "vitest";
import { checkGolden, GOLDEN_DIR } from "../test/golden.js";

describe("golden dataset", () => {
  it(`matches ${GOLDEN_DIR}/expected_occlusions.csv`, async () => {
    expect(await checkGolden()).toBe(8);
  });
});
