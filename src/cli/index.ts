#!/usr/bin/env node
/**
 * Hua Rong Dao Solver - CLI Interface
 */

import * as fs from 'fs';

import { Algorithm, SolverOptions } from '../domain/types.js';
import { HuaRongDaoError } from '../domain/errors.js';
import { Board, validatePieces } from '../state/board.js';
import { HuaRongDaoSolver, Solution, analyzeBoard } from '../solver/solver.js';
import { parseBoard, boardToInput } from '../io/board-parser.js';
import {
  formatBoard,
  formatPath,
  formatSolution,
  formatSolutionJSON,
  formatCompactSummary,
  formatAnalysis,
} from '../io/solution-formatter.js';
import { CLIOptions, UsageError, parseArgs } from './args.js';

function printHelp(): void {
  console.log(`
Hua Rong Dao Solver
===================

Solves the 4x5 Hua Rong Dao sliding-block puzzle with depth-first search or A*.

USAGE:
  hrd-solver <command> [options] [input-file]

COMMANDS:
  solve       Solve a board and print the move sequence
  analyze     Show piece counts, empty cells and legal moves for a board
  help        Show this help message

OPTIONS:
  -i, --input <file>          Input board (grid text or JSON)
  -a, --algorithm <name>      dfs, astar (default) or both
  --dfs-out <file>            Write the DFS solution path to a file (selects dfs)
  --astar-out <file>          Write the A* solution path to a file
  -f, --format <type>         Output format: text (default) or json
  -m, --max-expansions <n>    Abort after n node expansions (default: 1000000)
  -t, --time <seconds>        Abort after this many seconds (default: 60)
  -s, --symmetry              Merge mirror-image states during search
  -o, --optimal-dfs           Make DFS keep searching for a shortest path
  -h, --help                  Show help

EXAMPLES:
  hrd-solver solve puzzle.txt
  hrd-solver solve -i puzzle.txt -a both --dfs-out dfs.txt --astar-out astar.txt
  hrd-solver analyze puzzle.json -f json

INPUT FILE FORMAT (grid text):
  2113
  2113
  4665
  4775
  7007

  0 = empty, 1 = 2x2 piece, 2-6 = one 1x2 piece each, 7 = 1x1 piece

INPUT FILE FORMAT (JSON):
  { "pieces": [ { "kind": "SQUARE", "row": 0, "col": 1 }, ... ] }
`);
}

function loadBoard(options: CLIOptions): Board {
  if (!options.inputFile) {
    throw new UsageError('an input file is required (use -i <file>)');
  }
  const content = fs.readFileSync(options.inputFile, 'utf-8');
  const board = parseBoard(content);

  for (const warning of validatePieces(board.pieces).warnings) {
    console.warn(`Warning: ${warning}`);
  }

  return board;
}

function selectedAlgorithms(options: CLIOptions): Algorithm[] {
  switch (options.algorithm) {
    case 'dfs':
      return ['DFS'];
    case 'astar':
      return ['ASTAR'];
    case 'both':
      return ['DFS', 'ASTAR'];
  }
}

function solverOptions(options: CLIOptions): Partial<SolverOptions> {
  const opts: Partial<SolverOptions> = {
    pruneSymmetric: options.pruneSymmetric,
    optimalDfs: options.optimalDfs,
  };
  if (options.maxExpansions !== undefined) opts.maxExpansions = options.maxExpansions;
  if (options.maxTime !== undefined) opts.maxTime = options.maxTime;
  return opts;
}

function writePath(file: string, solution: Solution): void {
  fs.writeFileSync(file, formatPath(solution.path) + '\n', 'utf-8');
  console.log(`Wrote ${solution.path.length} boards to ${file}`);
}

function runSolve(options: CLIOptions): void {
  const board = loadBoard(options);
  const solver = new HuaRongDaoSolver(solverOptions(options));
  const algorithms = selectedAlgorithms(options);

  if (options.outputFormat === 'text') {
    console.log('Initial board:');
    console.log(formatBoard(board));
    console.log('');
  }

  const solutions: Solution[] = [];

  for (const algorithm of algorithms) {
    const solution = solver.solve(board, algorithm);
    solutions.push(solution);

    if (options.outputFormat === 'json') {
      console.log(formatSolutionJSON(solution));
    } else {
      console.log(formatSolution(solution));
      console.log('');
    }

    const outFile = algorithm === 'DFS' ? options.dfsOut : options.astarOut;
    if (outFile) {
      writePath(outFile, solution);
    }
  }

  if (options.outputFormat === 'text' && solutions.length > 1) {
    console.log('=== SUMMARY ===');
    for (const solution of solutions) {
      console.log(formatCompactSummary(solution));
    }
  }
}

function runAnalyze(options: CLIOptions): void {
  const board = loadBoard(options);
  const analysis = analyzeBoard(board);

  if (options.outputFormat === 'json') {
    console.log(JSON.stringify({ board: boardToInput(board), analysis }, null, 2));
  } else {
    console.log(formatAnalysis(board, analysis));
  }
}

// Main entry point
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  switch (options.command) {
    case 'solve':
      runSolve(options);
      break;

    case 'analyze':
      runAnalyze(options);
      break;

    case 'help':
    default:
      printHelp();
      break;
  }
}

main().catch(err => {
  if (err instanceof UsageError || err instanceof HuaRongDaoError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Error:', err);
  }
  process.exit(1);
});
