import { normalizeGrid, normalizeVector } from "./normalize";
import { JointGrid } from "./grid";
import { DegenerateNormalizationError } from "./errors";
import { NORMALIZATION_TOLERANCE } from "../constants";

describe("normalizeGrid", () => {
  it("divides every cell by the total mass", () => {
    const { normalized, mass } = normalizeGrid(JointGrid.fromRows([[1, 3], [2, 4]]));
    expect(mass).toBe(10);
    expect(normalized.toRows()).toEqual([[0.1, 0.3], [0.2, 0.4]]);
    expect(Math.abs(normalized.sum() - 1)).toBeLessThan(NORMALIZATION_TOLERANCE);
  });

  it("leaves its input untouched", () => {
    const grid = JointGrid.fromRows([[2, 2]]);
    normalizeGrid(grid);
    expect(grid.toRows()).toEqual([[2, 2]]);
  });

  it("turns any positive single cell into [[1]]", () => {
    const { normalized, mass } = normalizeGrid(JointGrid.fromRows([[7.3]]));
    expect(normalized.toRows()).toEqual([[1]]);
    expect(mass).toBe(7.3);
  });

  it("never sees a grid with a negative cell", () => {
    expect(() => normalizeGrid(JointGrid.fromRows([[-1, 2]]))).toThrow(RangeError);
  });

  it("rejects a grid with zero mass", () => {
    expect(() => normalizeGrid(JointGrid.filled(3, 3, 0))).toThrow(DegenerateNormalizationError);
  });

  it("rejects a grid whose mass overflows", () => {
    // 4 × 1e308 exceeds Number.MAX_VALUE
    expect(() => normalizeGrid(JointGrid.filled(2, 2, 1e308))).toThrow(DegenerateNormalizationError);
  });

  it("rejects a grid containing NaN", () => {
    expect(() => normalizeGrid(JointGrid.fromRows([[1, NaN]]))).toThrow(DegenerateNormalizationError);
  });
});

describe("normalizeVector", () => {
  it("divides every entry by the sum", () => {
    const { normalized, mass } = normalizeVector([2, 6]);
    expect(mass).toBe(8);
    expect(normalized).toEqual([0.25, 0.75]);
    expect(Object.isFrozen(normalized)).toBe(true);
  });

  it("rejects a vector with a negative entry even when its sum is positive", () => {
    expect(() => normalizeVector([-1, 2])).toThrow(RangeError);
  });

  it("rejects an all-zero vector", () => {
    expect(() => normalizeVector([0, 0, 0])).toThrow(DegenerateNormalizationError);
  });
});
