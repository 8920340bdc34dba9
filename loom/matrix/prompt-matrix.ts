import { LoomError, ERR } from "../core/errors.js";

export type PromptCell = string | null;
export type PromptRow = readonly PromptCell[];
export type MatrixShape = readonly [rows: number, columns: number];

/** Empty and absent cells schedule no step. */
export function isEmptyCell(cell: PromptCell | undefined): cell is null | undefined | "" {
  return cell === null || cell === undefined || cell === "";
}

/**
 * Prompt templates laid out one row per agent and one column per sequence position.
 * Every row has the same width; the first row added to an empty matrix sets it.
 */
export class PromptMatrix {
  private readonly matrix: PromptCell[][] = [];

  constructor(rows: ReadonlyArray<PromptRow> = []) {
    for (const row of rows) this.addRow(row);
  }

  get shape(): MatrixShape {
    return [this.rowCount, this.columnCount];
  }

  get rowCount(): number {
    return this.matrix.length;
  }

  get columnCount(): number {
    return this.matrix[0]?.length ?? 0;
  }

  getRow(index: number): PromptRow {
    return [...this.rowAt(index)];
  }

  getColumn(index: number): PromptCell[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.columnCount) {
      throw new LoomError(ERR.MATRIX_INDEX, `column ${index} out of range`, { index, shape: this.shape });
    }
    return this.matrix.map((row) => row[index] ?? null);
  }

  getCell(agentIndex: number, stepIndex: number): PromptCell {
    return this.getColumn(stepIndex)[agentIndex] ?? null;
  }

  addRow(row: PromptRow): void {
    if (this.matrix.length > 0 && row.length !== this.columnCount) {
      throw new LoomError(
        ERR.MATRIX_SHAPE,
        `row has ${row.length} prompts, matrix expects ${this.columnCount}`,
        { width: row.length, shape: this.shape },
      );
    }
    this.matrix.push([...row]);
  }

  removeRow(index: number): PromptRow {
    this.rowAt(index);
    const [removed] = this.matrix.splice(index, 1);
    return removed ?? [];
  }

  rows(): PromptCell[][] {
    return this.matrix.map((row) => [...row]);
  }

  toString(): string {
    return this.matrix
      .map((row, agentIndex) => `${agentIndex}: ${row.map((cell) => (isEmptyCell(cell) ? "-" : JSON.stringify(cell))).join(" | ")}`)
      .join("\n");
  }

  private rowAt(index: number): PromptCell[] {
    const row = Number.isInteger(index) ? this.matrix[index] : undefined;
    if (!row) throw new LoomError(ERR.MATRIX_INDEX, `row ${index} out of range`, { index, shape: this.shape });
    return row;
  }
}
