/**
 * Format boards and solutions for human-readable output
 */

import { Move, Piece, PieceKind } from '../domain/types.js';
import { ROWS, COLS, GRID_LABELS } from '../domain/constants.js';
import { Board, isDomino } from '../state/board.js';
import { Solution, BoardAnalysis } from '../solver/solver.js';

const KIND_NAMES: Record<PieceKind, string> = {
  SQUARE: '2x2',
  HORIZONTAL: '1x2 horizontal',
  VERTICAL: '1x2 vertical',
  SINGLE: '1x1',
};

/**
 * Grid text label of every piece; 1x2 pieces are numbered by ascending id
 */
function pieceLabels(pieces: readonly Piece[]): Map<number, string> {
  const labels = new Map<number, string>();
  let domino = 0;

  for (const piece of [...pieces].sort((a, b) => a.id - b.id)) {
    if (piece.kind === 'SQUARE') {
      labels.set(piece.id, GRID_LABELS.SQUARE);
    } else if (isDomino(piece.kind)) {
      labels.set(piece.id, GRID_LABELS.DOMINOES[domino] ?? '?');
      domino++;
    } else {
      labels.set(piece.id, GRID_LABELS.SINGLE);
    }
  }

  return labels;
}

/**
 * Format a board in the grid text format
 */
export function formatBoard(board: Board): string {
  const labels = pieceLabels(board.pieces);
  const lines: string[] = [];

  for (let row = 0; row < ROWS; row++) {
    let line = '';
    for (let col = 0; col < COLS; col++) {
      const id = board.cells[row][col];
      line += id === null ? GRID_LABELS.EMPTY : labels.get(id) ?? '?';
    }
    lines.push(line);
  }

  return lines.join('\n');
}

/**
 * Boards separated by a blank line, start first
 */
export function formatPath(path: readonly Board[]): string {
  return path.map(formatBoard).join('\n\n');
}

export function formatMove(move: Move, board: Board): string {
  const piece = board.pieces[move.pieceId];
  const kind = piece ? KIND_NAMES[piece.kind] : 'unknown';
  return `piece ${move.pieceId} (${kind}) ${move.direction}`;
}

/**
 * Format a complete solution for console output
 */
export function formatSolution(solution: Solution): string {
  const lines: string[] = [];
  const algorithm = solution.algorithm === 'ASTAR' ? 'A*' : 'DFS';

  lines.push(`=== ${algorithm} SOLUTION ===`);
  lines.push('');
  lines.push(`Moves: ${solution.moves.length}`);
  lines.push('');

  solution.moves.forEach((move, i) => {
    lines.push(`Step ${i + 1}: ${formatMove(move, solution.path[i])}`);
  });
  if (solution.moves.length > 0) {
    lines.push('');
  }

  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Nodes Expanded: ${solution.stats.nodesExpanded}`);
  lines.push(`Nodes Generated: ${solution.stats.nodesGenerated}`);
  lines.push(`Max Frontier Size: ${solution.stats.maxFrontierSize}`);
  lines.push(`Time Taken: ${solution.stats.timeTaken}ms`);

  return lines.join('\n');
}

/**
 * Format a compact solution summary
 */
export function formatCompactSummary(solution: Solution): string {
  const algorithm = solution.algorithm === 'ASTAR' ? 'A*' : 'DFS';
  return `${algorithm} | ${solution.moves.length} moves | ${solution.stats.nodesExpanded} expanded | ${solution.stats.timeTaken}ms`;
}

/**
 * Format solution as JSON
 */
export function formatSolutionJSON(solution: Solution): string {
  return JSON.stringify({
    algorithm: solution.algorithm,
    movesCount: solution.moves.length,
    stats: solution.stats,
    moves: solution.moves,
    path: solution.path.map(board => formatBoard(board).split('\n')),
  }, null, 2);
}

export function formatAnalysis(board: Board, analysis: BoardAnalysis): string {
  const lines: string[] = [];

  lines.push('=== BOARD ANALYSIS ===');
  lines.push('');
  lines.push(formatBoard(board));
  lines.push('');
  lines.push(`2x2 anchor: (${analysis.squareAnchor.row}, ${analysis.squareAnchor.col})`);
  lines.push(`Solved: ${analysis.solved ? 'yes' : 'no'}`);
  lines.push(`Heuristic: ${analysis.heuristic}`);
  lines.push(`Empty cells: ${analysis.emptyCells.map(c => `(${c.row}, ${c.col})`).join(', ')}`);
  lines.push(
    `Pieces: ${analysis.pieceCounts.SQUARE} 2x2, ` +
    `${analysis.pieceCounts.HORIZONTAL} horizontal, ` +
    `${analysis.pieceCounts.VERTICAL} vertical, ` +
    `${analysis.pieceCounts.SINGLE} 1x1`
  );
  lines.push('');
  lines.push(`Legal moves: ${analysis.legalMoves.length}`);
  for (const move of analysis.legalMoves) {
    lines.push(`  - ${formatMove(move, board)}`);
  }

  return lines.join('\n');
}
