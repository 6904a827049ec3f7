import type { Board, GridTile } from "../types";

const VALIDATE = process.env.TILEWALK_VALIDATE_BOARD !== "0";

const GRID_TILES: ReadonlySet<string> = new Set<GridTile>(["open", "wall", "pit", "ice", "teleport"]);

/**
 * validateBoard (shape-only)
 *
 * Catches structural drift in Board values that did not come through makeBoard
 * (hand-built fixtures, deserialized data). Input errors a user can make are
 * reported by the parser and makeBoard as BoardError; a failure here is a bug.
 */
export function validateBoard(board: Board, where = "unknown"): void {
  if (!VALIDATE) return;

  assert(board, "board missing", where);
  assert(Array.isArray(board.tiles), "tiles not array", where);

  // ---------------------------
  // Dimensions
  // ---------------------------

  assert(Number.isInteger(board.rows) && board.rows > 0, "rows invalid", where);
  assert(Number.isInteger(board.cols) && board.cols > 0, "cols invalid", where);
  assert(board.tiles.length === board.rows, `tiles has ${board.tiles.length} rows, expected ${board.rows}`, where);

  for (let y = 0; y < board.rows; y++) {
    const row = board.tiles[y];
    assert(Array.isArray(row), `row ${y} not array`, where);
    assert(row.length === board.cols, `row ${y} has ${row.length} cells, expected ${board.cols}`, where);
    for (let x = 0; x < row.length; x++) {
      assert(GRID_TILES.has(row[x]), `unknown tile at (${x},${y}): ${String(row[x])}`, where);
    }
  }

  // ---------------------------
  // Exit + teleporters
  // ---------------------------

  assert(Number.isInteger(board.exitColumn), "exitColumn not integer", where);
  assert(board.exitColumn >= 0 && board.exitColumn < board.cols, "exitColumn out of range", where);

  const found: string[] = [];
  for (let y = 0; y < board.rows; y++) {
    for (let x = 0; x < board.cols; x++) {
      if (board.tiles[y][x] === "teleport") found.push(`${x},${y}`);
    }
  }
  const cached = board.teleporters.map((p) => `${p.x},${p.y}`);
  assert(found.join(";") === cached.join(";"), "teleporter cache does not match grid", where);
  assert(found.length === 0 || found.length === 2, `teleporter count ${found.length}`, where);
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateBoard @ ${where}] ${message}`);
}
