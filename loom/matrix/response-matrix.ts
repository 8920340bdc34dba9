import { LoomError, ERR } from "../core/errors.js";
import type { StepAddress } from "../chains/refs.js";
import type { MatrixShape } from "./prompt-matrix.js";

export type ResponseCell = string | null;

export class ResponseMatrix {
  private readonly cells: ResponseCell[][];

  constructor(shape: MatrixShape) {
    const [rows, columns] = shape;
    this.cells = Array.from({ length: rows }, () => Array.from({ length: columns }, (): ResponseCell => null));
  }

  /** Rebuild from persisted rows; they must be rectangular and match `shape`. */
  static fromRows(shape: MatrixShape, rows: ReadonlyArray<readonly ResponseCell[]>): ResponseMatrix {
    const [rowCount, columns] = shape;
    if (rows.length !== rowCount || rows.some((row) => row.length !== columns)) {
      throw new LoomError(ERR.MATRIX_SHAPE, "response rows do not match the matrix shape", { shape });
    }
    const matrix = new ResponseMatrix(shape);
    rows.forEach((row, agentIndex) => {
      row.forEach((cell, stepIndex) => matrix.set({ agentIndex, stepIndex }, cell));
    });
    return matrix;
  }

  get shape(): MatrixShape {
    return [this.cells.length, this.cells[0]?.length ?? 0];
  }

  get(address: StepAddress): ResponseCell {
    return this.rowFor(address)[address.stepIndex] ?? null;
  }

  set(address: StepAddress, value: ResponseCell): void {
    const row = this.rowFor(address);
    if (!Number.isInteger(address.stepIndex) || address.stepIndex < 0 || address.stepIndex >= row.length) {
      throw new LoomError(ERR.MATRIX_INDEX, `step ${address.stepIndex} out of range`, { address, shape: this.shape });
    }
    row[address.stepIndex] = value;
  }

  isSet(address: StepAddress): boolean {
    return this.get(address) !== null;
  }

  rows(): ResponseCell[][] {
    return this.cells.map((row) => [...row]);
  }

  clear(): void {
    for (const row of this.cells) row.fill(null);
  }

  private rowFor(address: StepAddress): ResponseCell[] {
    const row = Number.isInteger(address.agentIndex) ? this.cells[address.agentIndex] : undefined;
    if (!row) throw new LoomError(ERR.MATRIX_INDEX, `agent ${address.agentIndex} out of range`, { address, shape: this.shape });
    return row;
  }
}
