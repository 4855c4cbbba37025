import type { Axis, IJointGrid } from "../types/grid-types";
import { cellCenter, sumValues } from "../utils/grid-utils";
import { InvalidGridResolutionError, ShapeMismatchError } from "./errors";

/**
 * Cell-centered discretization of [0, 1] into `n` cells of width 1/n.
 * The endpoints are never reached: first value is 1/(2n), last is 1 - 1/(2n).
 */
export function makeAxis(n: number): Axis {
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidGridResolutionError(n);
  }
  return Object.freeze(Array.from({ length: n }, (_, i) => cellCenter(i, n)));
}

function checkNonNegative(data: Float64Array): void {
  for (let k = 0; k < data.length; k++) {
    if (data[k] < 0) {
      throw new RangeError(`Grid cells must be non-negative, got ${data[k]} at index ${k}`);
    }
  }
}

/**
 * Immutable joint grid over (theta, mu), stored row-major.
 *
 * cell(i, j) = value at (thetaAxis[i], muAxis[j])
 *
 * Cells are non-negative. Every operation that changes values returns a new
 * grid; the backing array is created here and never handed out.
 */
export class JointGrid implements IJointGrid {
  private constructor(
    readonly rows: number,
    readonly cols: number,
    private readonly data: Float64Array,
  ) {}

  /** Grid whose cell (i, j) is `cell(i, j)`. */
  static generate(rows: number, cols: number, cell: (i: number, j: number) => number): JointGrid {
    const data = new Float64Array(rows * cols);
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) {
        data[i * cols + j] = cell(i, j);
      }
    }
    checkNonNegative(data);
    return new JointGrid(rows, cols, data);
  }

  /** Build from row-major values. Copies the input. */
  static fromValues(rows: number, cols: number, values: ArrayLike<number>): JointGrid {
    if (values.length !== rows * cols) {
      throw new RangeError(`Expected ${rows * cols} values for a ${rows}x${cols} grid, got ${values.length}`);
    }
    const data = Float64Array.from(values);
    checkNonNegative(data);
    return new JointGrid(rows, cols, data);
  }

  /** Build from nested rows. Copies the input. */
  static fromRows(values: readonly (readonly number[])[]): JointGrid {
    const rows = values.length;
    const cols = rows > 0 ? values[0].length : 0;
    for (let i = 0; i < rows; i++) {
      if (values[i].length !== cols) {
        throw new RangeError(`Row ${i} has ${values[i].length} values, expected ${cols}`);
      }
    }
    return JointGrid.generate(rows, cols, (i, j) => values[i][j]);
  }

  /** Grid of the given shape with every cell set to `value`. */
  static filled(rows: number, cols: number, value: number): JointGrid {
    return JointGrid.generate(rows, cols, () => value);
  }

  get shape(): readonly [number, number] {
    return [this.rows, this.cols];
  }

  idx(i: number, j: number): number {
    return i * this.cols + j;
  }

  get(i: number, j: number): number {
    return this.data[this.idx(i, j)];
  }

  sameShape(other: IJointGrid): boolean {
    return this.rows === other.rows && this.cols === other.cols;
  }

  /** Total mass of the grid. */
  sum(): number {
    return sumValues(this.data);
  }

  /** New grid with `fn` applied to every cell. */
  map(fn: (value: number) => number): JointGrid {
    const out = new Float64Array(this.data.length);
    for (let k = 0; k < out.length; k++) {
      out[k] = fn(this.data[k]);
    }
    checkNonNegative(out);
    return new JointGrid(this.rows, this.cols, out);
  }

  scale(factor: number): JointGrid {
    return this.map((v) => v * factor);
  }

  /** Elementwise product. Throws ShapeMismatchError before touching any cell. */
  hadamard(other: JointGrid): JointGrid {
    if (!this.sameShape(other)) {
      throw new ShapeMismatchError(this.shape, other.shape);
    }
    const out = new Float64Array(this.data.length);
    for (let k = 0; k < out.length; k++) {
      out[k] = this.data[k] * other.data[k];
    }
    return new JointGrid(this.rows, this.cols, out);
  }

  /** Copy as nested rows, for plotting and serialization. */
  toRows(): number[][] {
    const out: number[][] = [];
    for (let i = 0; i < this.rows; i++) {
      out.push(Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols)));
    }
    return out;
  }
}
