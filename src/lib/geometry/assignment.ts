/**
 * Minimum-cost bipartite assignment (Hungarian / Kuhn-Munkres, O(n^2 m)).
 */

/**
 * Solve a rectangular assignment problem.
 *
 * @param cost - rows x columns matrix of non-negative costs
 * @returns for each row, the assigned column, or -1 when there are more rows than columns
 */
export function solveAssignment(cost: readonly (readonly number[])[]): number[] {
  const rows = cost.length;
  const cols = rows === 0 ? 0 : cost[0]!.length;
  if (rows === 0 || cols === 0) return Array.from({ length: rows }, () => -1);

  // The potential method needs rows <= columns; solve the transpose otherwise
  if (rows > cols) {
    const transposed = Array.from({ length: cols }, (_, c) => cost.map((row) => row[c]!));
    const colToRow = solveAssignment(transposed);
    const rowToCol = Array.from({ length: rows }, () => -1);
    colToRow.forEach((row, col) => {
      if (row >= 0) rowToCol[row] = col;
    });
    return rowToCol;
  }

  // 1-indexed potentials; column 0 is a virtual start
  const u = new Array<number>(rows + 1).fill(0);
  const v = new Array<number>(cols + 1).fill(0);
  const match = new Array<number>(cols + 1).fill(0);
  const way = new Array<number>(cols + 1).fill(0);

  for (let i = 1; i <= rows; i++) {
    match[0] = i;
    let j0 = 0;
    const minv = new Array<number>(cols + 1).fill(Infinity);
    const used = new Array<boolean>(cols + 1).fill(false);

    do {
      used[j0] = true;
      const i0 = match[j0]!;
      let delta = Infinity;
      let j1 = 0;
      for (let j = 1; j <= cols; j++) {
        if (used[j]) continue;
        const reduced = cost[i0 - 1]![j - 1]! - u[i0]! - v[j]!;
        if (reduced < minv[j]!) {
          minv[j] = reduced;
          way[j] = j0;
        }
        if (minv[j]! < delta) {
          delta = minv[j]!;
          j1 = j;
        }
      }
      for (let j = 0; j <= cols; j++) {
        if (used[j]) {
          const row = match[j]!;
          u[row] = u[row]! + delta;
          v[j] = v[j]! - delta;
        } else {
          minv[j] = minv[j]! - delta;
        }
      }
      j0 = j1;
    } while (match[j0] !== 0);

    do {
      const j1 = way[j0]!;
      match[j0] = match[j1]!;
      j0 = j1;
    } while (j0 !== 0);
  }

  const result = Array.from({ length: rows }, () => -1);
  for (let j = 1; j <= cols; j++) {
    if (match[j]! > 0) result[match[j]! - 1] = j - 1;
  }
  return result;
}
