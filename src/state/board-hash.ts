/**
 * Board keys for duplicate detection during search
 */

import { Piece } from '../domain/types.js';
import { ROWS, COLS } from '../domain/constants.js';
import { Board } from './board.js';

// Per-cell symbols: the kind of the covering piece and which part of it
const EMPTY_SYMBOL = '.';
const SQUARE_SYMBOL = '#';
const SINGLE_SYMBOL = 'o';
const VERTICAL_TOP = '^';
const VERTICAL_BOTTOM = 'v';
const HORIZONTAL_LEFT = '<';
const HORIZONTAL_RIGHT = '>';

function cellSymbol(piece: Piece | undefined, row: number, col: number): string {
  if (!piece) return EMPTY_SYMBOL;

  switch (piece.kind) {
    case 'SQUARE':
      return SQUARE_SYMBOL;
    case 'SINGLE':
      return SINGLE_SYMBOL;
    case 'VERTICAL':
      return row === piece.anchor.row ? VERTICAL_TOP : VERTICAL_BOTTOM;
    case 'HORIZONTAL':
      return col === piece.anchor.col ? HORIZONTAL_LEFT : HORIZONTAL_RIGHT;
  }
}

function symbolAt(board: Board, row: number, col: number): string {
  const id = board.cells[row][col];
  return cellSymbol(id === null ? undefined : board.pieces[id], row, col);
}

/**
 * Create a key for a board
 * Two boards share a key exactly when they have the same layout of piece
 * kinds, whatever their piece ids
 */
export function boardKey(board: Board): string {
  const cells: string[] = [];

  for (let row = 0; row < ROWS; row++) {
    for (let col = 0; col < COLS; col++) {
      cells.push(symbolAt(board, row, col));
    }
  }

  return cells.join('');
}

/**
 * Key of the left-right mirror image of a board
 */
export function mirroredBoardKey(board: Board): string {
  const cells: string[] = [];

  for (let row = 0; row < ROWS; row++) {
    for (let col = COLS - 1; col >= 0; col--) {
      const symbol = symbolAt(board, row, col);
      // A horizontal piece's left half becomes its right half
      if (symbol === HORIZONTAL_LEFT) cells.push(HORIZONTAL_RIGHT);
      else if (symbol === HORIZONTAL_RIGHT) cells.push(HORIZONTAL_LEFT);
      else cells.push(symbol);
    }
  }

  return cells.join('');
}

/**
 * Shared key for a board and its mirror image
 */
export function symmetricBoardKey(board: Board): string {
  const key = boardKey(board);
  const mirrored = mirroredBoardKey(board);
  return mirrored < key ? mirrored : key;
}

export function boardsEqual(a: Board, b: Board): boolean {
  return boardKey(a) === boardKey(b);
}
