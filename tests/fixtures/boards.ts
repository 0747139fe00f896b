/**
 * Boards shared by the tests, in the grid text format
 */

// Classic opening layout
export const CLASSIC = [
  '2113',
  '2113',
  '4665',
  '4775',
  '7007',
].join('\n');

// 2x2 piece one row above the goal, both empty cells below it
export const ONE_MOVE = [
  '2663',
  '2773',
  '4115',
  '4115',
  '7007',
].join('\n');

export const SOLVED = [
  '2663',
  '2773',
  '4005',
  '4115',
  '7117',
].join('\n');
