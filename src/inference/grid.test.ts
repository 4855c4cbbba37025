import { makeAxis, JointGrid } from "./grid";
import { InvalidGridResolutionError, ShapeMismatchError } from "./errors";
import { cellCenter, indexAtValue } from "../utils/grid-utils";

describe("makeAxis", () => {
  it("places 4 cells at their centers", () => {
    expect(makeAxis(4)).toEqual([0.125, 0.375, 0.625, 0.875]);
  });

  it.each([1, 2, 7, 100])("returns %i strictly increasing values in (0, 1)", (n) => {
    const axis = makeAxis(n);
    expect(axis).toHaveLength(n);
    expect(axis[0]).toBe(1 / (2 * n));
    expect(axis[n - 1]).toBeCloseTo(1 - 1 / (2 * n), 12);
    for (let i = 0; i < n; i++) {
      expect(axis[i]).toBeGreaterThan(0);
      expect(axis[i]).toBeLessThan(1);
      if (i > 0) expect(axis[i]).toBeGreaterThan(axis[i - 1]);
    }
  });

  it("is symmetric about 0.5", () => {
    const axis = makeAxis(9);
    for (let i = 0; i < 9; i++) {
      expect(axis[i] + axis[8 - i]).toBeCloseTo(1, 12);
    }
    expect(axis[4]).toBe(0.5);
  });

  it("returns a frozen array", () => {
    expect(Object.isFrozen(makeAxis(3))).toBe(true);
  });

  it.each([0, -3, 2.5, NaN])("rejects resolution %p", (n) => {
    expect(() => makeAxis(n)).toThrow(InvalidGridResolutionError);
  });
});

describe("cellCenter / indexAtValue", () => {
  it("indexAtValue inverts cellCenter", () => {
    for (let i = 0; i < 10; i++) {
      expect(indexAtValue(cellCenter(i, 10), 10)).toBe(i);
    }
  });

  it("clamps the closed endpoints into the first and last cells", () => {
    expect(indexAtValue(0, 10)).toBe(0);
    expect(indexAtValue(1, 10)).toBe(9);
  });
});

describe("JointGrid", () => {
  const grid = JointGrid.fromRows([
    [1, 2],
    [3, 4],
  ]);

  it("indexes (row, col) row-major", () => {
    expect(grid.get(0, 1)).toBe(2);
    expect(grid.get(1, 0)).toBe(3);
    expect(grid.idx(1, 1)).toBe(3);
    expect(grid.shape).toEqual([2, 2]);
  });

  it("sums all cells", () => {
    expect(grid.sum()).toBe(10);
  });

  it("scale returns a new grid and leaves the original untouched", () => {
    const doubled = grid.scale(2);
    expect(doubled.toRows()).toEqual([[2, 4], [6, 8]]);
    expect(grid.toRows()).toEqual([[1, 2], [3, 4]]);
  });

  it("hadamard multiplies cell by cell", () => {
    const other = JointGrid.fromRows([[0.5, 1], [2, 0]]);
    expect(grid.hadamard(other).toRows()).toEqual([[0.5, 2], [6, 0]]);
  });

  it("hadamard rejects grids of different shape", () => {
    const wide = JointGrid.filled(2, 3, 1);
    expect(() => grid.hadamard(wide)).toThrow(ShapeMismatchError);
  });

  it("toRows hands out a copy", () => {
    const rows = grid.toRows();
    rows[0][0] = 99;
    expect(grid.get(0, 0)).toBe(1);
  });

  it("fromRows copies its input", () => {
    const source = [[5, 6]];
    const copy = JointGrid.fromRows(source);
    source[0][0] = 0;
    expect(copy.get(0, 0)).toBe(5);
  });

  it("fromValues copies its input", () => {
    const data = new Float64Array([1, 2]);
    const copy = JointGrid.fromValues(1, 2, data);
    data[0] = 50;
    expect(copy.get(0, 0)).toBe(1);
    expect(copy.toRows()).toEqual([[1, 2]]);
  });

  it("generate lays cells out row-major", () => {
    expect(JointGrid.generate(2, 3, (i, j) => 10 * i + j).toRows()).toEqual([
      [0, 1, 2],
      [10, 11, 12],
    ]);
  });

  it("rejects ragged rows and mismatched data length", () => {
    expect(() => JointGrid.fromRows([[1, 2], [3]])).toThrow(RangeError);
    expect(() => JointGrid.fromValues(2, 2, [1, 2, 3])).toThrow(RangeError);
  });

  it("rejects negative cells however the grid is built", () => {
    expect(() => JointGrid.fromRows([[-1, 2]])).toThrow(RangeError);
    expect(() => JointGrid.fromValues(1, 2, [2, -0.5])).toThrow(RangeError);
    expect(() => JointGrid.filled(2, 2, -3)).toThrow(RangeError);
    expect(() => grid.scale(-1)).toThrow(RangeError);
  });
});
