/**
 * Board representation and pure board operations
 */

import {
  Coord,
  Direction,
  Piece,
  PieceInput,
  PieceKind,
  ValidationResult,
  coordKey,
  coordsEqual,
  offsetCoord,
} from '../domain/types.js';
import {
  ROWS,
  COLS,
  GOAL_ANCHOR,
  PIECE_COUNT,
  EMPTY_CELL_COUNT,
  PIECE_SIZE,
  PIECE_MULTISET,
} from '../domain/constants.js';
import { IllegalMoveError, InvalidBoardError } from '../domain/errors.js';

// Each cell holds the id of the piece covering it, or null when empty
export type CellGrid = readonly (readonly (number | null)[])[];

export interface Board {
  readonly pieces: readonly Piece[];
  readonly cells: CellGrid;
}

const PIECE_KINDS: readonly PieceKind[] = ['SQUARE', 'HORIZONTAL', 'VERTICAL', 'SINGLE'];

/**
 * Cells covered by a piece of the given kind anchored at `anchor`
 */
export function footprint(kind: PieceKind, anchor: Coord): Coord[] {
  const { height, width } = PIECE_SIZE[kind];
  const cells: Coord[] = [];

  for (let dr = 0; dr < height; dr++) {
    for (let dc = 0; dc < width; dc++) {
      cells.push({ row: anchor.row + dr, col: anchor.col + dc });
    }
  }

  return cells;
}

export function isInBounds(coord: Coord): boolean {
  return coord.row >= 0 && coord.row < ROWS && coord.col >= 0 && coord.col < COLS;
}

export function isDomino(kind: PieceKind): boolean {
  return kind === 'HORIZONTAL' || kind === 'VERTICAL';
}

/**
 * Check the piece list against every board invariant
 */
export function validatePieces(pieces: readonly PieceInput[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (pieces.length !== PIECE_COUNT) {
    errors.push(`expected ${PIECE_COUNT} pieces, found ${pieces.length}`);
  }

  const squares = pieces.filter(p => p.kind === 'SQUARE').length;
  const dominoes = pieces.filter(p => isDomino(p.kind)).length;
  const singles = pieces.filter(p => p.kind === 'SINGLE').length;

  if (squares !== PIECE_MULTISET.SQUARE) {
    errors.push(`expected ${PIECE_MULTISET.SQUARE} 2x2 piece, found ${squares}`);
  }
  if (dominoes !== PIECE_MULTISET.DOMINO) {
    errors.push(`expected ${PIECE_MULTISET.DOMINO} 1x2 pieces, found ${dominoes}`);
  }
  if (singles !== PIECE_MULTISET.SINGLE) {
    errors.push(`expected ${PIECE_MULTISET.SINGLE} 1x1 pieces, found ${singles}`);
  }

  const owners = new Map<string, number>();
  let covered = 0;

  pieces.forEach((piece, id) => {
    if (!PIECE_KINDS.includes(piece.kind)) {
      errors.push(`piece ${id} has unknown kind ${String(piece.kind)}`);
      return;
    }
    if (!Number.isInteger(piece.anchor.row) || !Number.isInteger(piece.anchor.col)) {
      errors.push(`piece ${id} has a non-integer anchor`);
      return;
    }

    for (const cell of footprint(piece.kind, piece.anchor)) {
      if (!isInBounds(cell)) {
        errors.push(`piece ${id} (${piece.kind}) leaves the grid at (${cell.row}, ${cell.col})`);
        continue;
      }

      const key = coordKey(cell);
      const owner = owners.get(key);
      if (owner !== undefined) {
        errors.push(`pieces ${owner} and ${id} overlap at (${cell.row}, ${cell.col})`);
        continue;
      }

      owners.set(key, id);
      covered++;
    }
  });

  const empty = ROWS * COLS - covered;
  if (errors.length === 0 && empty !== EMPTY_CELL_COUNT) {
    errors.push(`expected ${EMPTY_CELL_COUNT} empty cells, found ${empty}`);
  }

  const square = pieces.find(p => p.kind === 'SQUARE');
  if (errors.length === 0 && square && coordsEqual(square.anchor, GOAL_ANCHOR)) {
    warnings.push('the 2x2 piece is already at the goal');
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Build a board from piece descriptions; ids are the array indices
 */
export function createBoard(pieces: readonly PieceInput[]): Board {
  const validation = validatePieces(pieces);
  if (!validation.valid) {
    throw new InvalidBoardError(validation.errors);
  }

  const placed: Piece[] = pieces.map((p, id) => ({
    id,
    kind: p.kind,
    anchor: { row: p.anchor.row, col: p.anchor.col },
  }));

  return { pieces: placed, cells: buildCells(placed) };
}

/**
 * Re-check a board value handed in from outside before searching it
 */
export function assertValidBoard(board: Board): void {
  const validation = validatePieces(board.pieces);
  const errors = [...validation.errors];

  board.pieces.forEach((piece, index) => {
    if (piece.id !== index) {
      errors.push(`piece at index ${index} has id ${piece.id}`);
    }
  });

  if (errors.length === 0) {
    const expected = buildCells(board.pieces);
    const consistent = board.cells.length === ROWS &&
      board.cells.every((row, r) => row.length === COLS && row.every((id, c) => id === expected[r][c]));
    if (!consistent) {
      errors.push('cell grid does not match piece placement');
    }
  }

  if (errors.length > 0) {
    throw new InvalidBoardError(errors);
  }
}

function buildCells(pieces: readonly Piece[]): (number | null)[][] {
  const cells: (number | null)[][] = [];

  for (let row = 0; row < ROWS; row++) {
    cells.push(new Array<number | null>(COLS).fill(null));
  }

  for (const piece of pieces) {
    for (const cell of footprint(piece.kind, piece.anchor)) {
      cells[cell.row][cell.col] = piece.id;
    }
  }

  return cells;
}

/**
 * Id of the piece covering a cell; null for empty or out-of-bounds cells
 */
export function pieceAt(board: Board, coord: Coord): number | null {
  if (!isInBounds(coord)) return null;
  return board.cells[coord.row][coord.col];
}

export function getPiece(board: Board, pieceId: number): Piece | undefined {
  return board.pieces[pieceId];
}

export function getSquare(board: Board): Piece {
  const square = board.pieces.find(p => p.kind === 'SQUARE');
  if (!square) {
    throw new InvalidBoardError(['board has no 2x2 piece']);
  }
  return square;
}

/**
 * Empty cells in row-major order
 */
export function getEmptyCells(board: Board): Coord[] {
  const empty: Coord[] = [];

  for (let row = 0; row < ROWS; row++) {
    for (let col = 0; col < COLS; col++) {
      if (board.cells[row][col] === null) {
        empty.push({ row, col });
      }
    }
  }

  return empty;
}

export function countPieceKind(board: Board, kind: PieceKind): number {
  return board.pieces.filter(p => p.kind === kind).length;
}

export function isGoal(board: Board): boolean {
  return coordsEqual(getSquare(board).anchor, GOAL_ANCHOR);
}

/**
 * Why a piece cannot slide one cell in a direction, or null when it can
 */
export function moveBlocker(board: Board, pieceId: number, direction: Direction): string | null {
  const piece = getPiece(board, pieceId);
  if (!piece) {
    return 'no such piece';
  }

  for (const cell of footprint(piece.kind, offsetCoord(piece.anchor, direction))) {
    if (!isInBounds(cell)) {
      return `target cell (${cell.row}, ${cell.col}) is outside the grid`;
    }
    const occupant = board.cells[cell.row][cell.col];
    if (occupant !== null && occupant !== pieceId) {
      return `target cell (${cell.row}, ${cell.col}) is occupied by piece ${occupant}`;
    }
  }

  return null;
}

export function canMove(board: Board, pieceId: number, direction: Direction): boolean {
  return moveBlocker(board, pieceId, direction) === null;
}

/**
 * Slide one piece one cell; returns a new board and leaves the input untouched
 */
export function applyMove(board: Board, pieceId: number, direction: Direction): Board {
  const blocker = moveBlocker(board, pieceId, direction);
  if (blocker !== null) {
    throw new IllegalMoveError(pieceId, direction, blocker);
  }

  const piece = board.pieces[pieceId];
  const moved: Piece = { ...piece, anchor: offsetCoord(piece.anchor, direction) };

  const pieces = board.pieces.slice();
  pieces[pieceId] = moved;

  const cells = board.cells.map(row => row.slice());
  for (const cell of footprint(piece.kind, piece.anchor)) {
    cells[cell.row][cell.col] = null;
  }
  for (const cell of footprint(moved.kind, moved.anchor)) {
    cells[cell.row][cell.col] = pieceId;
  }

  return { pieces, cells };
}
