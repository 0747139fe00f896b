/**
 * Tests for error types
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  HuaRongDaoError,
  InvalidBoardError,
  IllegalMoveError,
  NoSolutionError,
  SearchAbortedError,
} from '../../src/domain/errors.js';

describe('Error types', () => {
  it('should name errors after their class', () => {
    assert.strictEqual(new InvalidBoardError(['x']).name, 'InvalidBoardError');
    assert.strictEqual(new IllegalMoveError(1, 'UP', 'x').name, 'IllegalMoveError');
    assert.strictEqual(new NoSolutionError(3).name, 'NoSolutionError');
    assert.strictEqual(new SearchAbortedError('TIME_LIMIT', 3).name, 'SearchAbortedError');
  });

  it('should share a common base class', () => {
    const err = new NoSolutionError(7);

    assert.ok(err instanceof HuaRongDaoError);
    assert.ok(err instanceof Error);
  });

  it('should list every issue of an invalid board', () => {
    const err = new InvalidBoardError(['expected 10 pieces, found 9', 'expected 4 1x1 pieces, found 3']);

    assert.deepStrictEqual(err.issues, ['expected 10 pieces, found 9', 'expected 4 1x1 pieces, found 3']);
    assert.strictEqual(err.message, 'Invalid board: expected 10 pieces, found 9; expected 4 1x1 pieces, found 3');
  });

  it('should describe illegal moves', () => {
    const err = new IllegalMoveError(4, 'LEFT', 'no such piece');

    assert.strictEqual(err.pieceId, 4);
    assert.strictEqual(err.direction, 'LEFT');
    assert.strictEqual(err.message, 'Illegal move: piece 4 LEFT: no such piece');
  });

  it('should report the abort reason', () => {
    const err = new SearchAbortedError('EXPANSION_LIMIT', 100);

    assert.strictEqual(err.reason, 'EXPANSION_LIMIT');
    assert.strictEqual(err.nodesExpanded, 100);
    assert.strictEqual(err.message, 'Search aborted: expansion limit reached after 100 expansions');
  });
});
