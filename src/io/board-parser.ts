/**
 * Parse boards from the grid text format and from JSON
 */

import { z } from 'zod';
import { Coord, PieceInput, PieceKind } from '../domain/types.js';
import { ROWS, COLS, GRID_LABELS } from '../domain/constants.js';
import { InvalidBoardError } from '../domain/errors.js';
import { Board, createBoard, footprint } from '../state/board.js';

/**
 * JSON input format for a board
 */
export const boardInputSchema = z.object({
  pieces: z.array(
    z.object({
      kind: z.enum(['SQUARE', 'HORIZONTAL', 'VERTICAL', 'SINGLE']),
      row: z.number().int(),
      col: z.number().int(),
    })
  ),
});

export type BoardInput = z.infer<typeof boardInputSchema>;

/**
 * Parse JSON input into a board
 */
export function parseBoardFromJSON(json: string): Board {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new InvalidBoardError([`malformed JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }

  const parsed = boardInputSchema.safeParse(data);
  if (!parsed.success) {
    throw new InvalidBoardError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`)
    );
  }

  return createBoardFromInput(parsed.data);
}

/**
 * Create a board from structured input; ids follow the array order
 */
export function createBoardFromInput(input: BoardInput): Board {
  return createBoard(
    input.pieces.map(p => ({ kind: p.kind, anchor: { row: p.row, col: p.col } }))
  );
}

export function boardToInput(board: Board): BoardInput {
  return {
    pieces: board.pieces.map(p => ({ kind: p.kind, row: p.anchor.row, col: p.anchor.col })),
  };
}

export function exportBoardToJSON(board: Board): string {
  return JSON.stringify(boardToInput(board), null, 2);
}

const KNOWN_LABELS = new Set<string>([
  GRID_LABELS.EMPTY,
  GRID_LABELS.SQUARE,
  ...GRID_LABELS.DOMINOES,
  GRID_LABELS.SINGLE,
]);

/**
 * The kind among `kinds` whose footprint covers exactly `cells`
 * `cells` must be in row-major order, so the first one is the anchor
 */
function matchKind(cells: Coord[], kinds: PieceKind[]): PieceKind | null {
  if (cells.length === 0) return null;

  for (const kind of kinds) {
    const expected = footprint(kind, cells[0]);
    if (expected.length === cells.length &&
        expected.every((c, i) => c.row === cells[i].row && c.col === cells[i].col)) {
      return kind;
    }
  }

  return null;
}

/**
 * Parse the grid text format
 * Format:
 * ```
 * 2113
 * 2113
 * 4665
 * 4775
 * 7007
 * ```
 * Where:
 * - 0 = Empty
 * - 1 = the 2x2 piece
 * - 2..6 = one 1x2 piece each, horizontal or vertical
 * - 7 = a 1x1 piece (each cell is its own piece)
 *
 * Piece ids: the 2x2 piece is 0, the 1x2 pieces follow in label order, the
 * 1x1 pieces come last in row-major order.
 */
export function parseBoardText(text: string): Board {
  const lines = text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);

  const issues: string[] = [];

  if (lines.length !== ROWS) {
    issues.push(`expected ${ROWS} rows, found ${lines.length}`);
  }
  lines.forEach((line, row) => {
    if (line.length !== COLS) {
      issues.push(`row ${row} has ${line.length} cells, expected ${COLS}`);
    }
  });
  if (issues.length > 0) {
    throw new InvalidBoardError(issues);
  }

  const cellsByLabel = new Map<string, Coord[]>();
  lines.forEach((line, row) => {
    for (let col = 0; col < COLS; col++) {
      const label = line[col];
      if (!KNOWN_LABELS.has(label)) {
        issues.push(`unknown label '${label}' at (${row}, ${col})`);
        continue;
      }
      const cells = cellsByLabel.get(label) ?? [];
      cells.push({ row, col });
      cellsByLabel.set(label, cells);
    }
  });
  if (issues.length > 0) {
    throw new InvalidBoardError(issues);
  }

  const pieces: PieceInput[] = [];

  const squareCells = cellsByLabel.get(GRID_LABELS.SQUARE) ?? [];
  if (matchKind(squareCells, ['SQUARE']) === null) {
    issues.push(`label ${GRID_LABELS.SQUARE} must cover one 2x2 block`);
  } else {
    pieces.push({ kind: 'SQUARE', anchor: squareCells[0] });
  }

  for (const label of GRID_LABELS.DOMINOES) {
    const cells = cellsByLabel.get(label) ?? [];
    const kind = matchKind(cells, ['HORIZONTAL', 'VERTICAL']);
    if (kind === null) {
      issues.push(`label ${label} must cover two adjacent cells`);
    } else {
      pieces.push({ kind, anchor: cells[0] });
    }
  }

  for (const cell of cellsByLabel.get(GRID_LABELS.SINGLE) ?? []) {
    pieces.push({ kind: 'SINGLE', anchor: cell });
  }

  if (issues.length > 0) {
    throw new InvalidBoardError(issues);
  }

  return createBoard(pieces);
}

/**
 * Parse either format; JSON when the content starts with '{'
 */
export function parseBoard(content: string): Board {
  return content.trimStart().startsWith('{') ? parseBoardFromJSON(content) : parseBoardText(content);
}
