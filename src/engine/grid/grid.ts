// 3x3 그리드 좌표: 행 우선, row 0 이 전열
//
//   1 2 3   (front)
//   4 5 6
//   7 8 9   (back)
//
// line(열): 1-4-7, 2-5-8, 3-6-9. 양 팀 동일 번호.

import { InvalidSlotError } from '../../common/errors/game-errors.js';
import type { SlotId } from '../../types/index.js';

export const GRID_SIZE = 3;
export const ALL_SLOTS: readonly SlotId[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export type GridPos = { row: number; col: number };

export function isValidSlot(slot: number): slot is SlotId {
  return Number.isInteger(slot) && slot >= 1 && slot <= 9;
}

export function requireSlot(slot: number): SlotId {
  if (!isValidSlot(slot)) {
    throw new InvalidSlotError(`Invalid slot: ${slot}`, { slot });
  }
  return slot;
}

export function slotToPos(slot: number): GridPos {
  const s = requireSlot(slot) - 1;
  return { row: Math.floor(s / GRID_SIZE), col: s % GRID_SIZE };
}

export function posToSlot(row: number, col: number): SlotId {
  if (
    !Number.isInteger(row) ||
    !Number.isInteger(col) ||
    row < 0 ||
    row >= GRID_SIZE ||
    col < 0 ||
    col >= GRID_SIZE
  ) {
    throw new InvalidSlotError(`Invalid position: (${row}, ${col})`, {
      row,
      col,
    });
  }
  return row * GRID_SIZE + col + 1;
}

export function rowOf(slot: number): number {
  return slotToPos(slot).row;
}

/** 0..2 (1-4-7 = 0) */
export function lineOf(slot: number): number {
  return slotToPos(slot).col;
}

export function slotsInRow(row: number): SlotId[] {
  return [0, 1, 2].map((col) => posToSlot(row, col));
}

/** 전열 → 후열 순 */
export function slotsInLine(line: number): SlotId[] {
  return [0, 1, 2].map((row) => posToSlot(row, line));
}

function offset(slot: number, dRow: number, dCol: number): SlotId | null {
  const { row, col } = slotToPos(slot);
  const r = row + dRow;
  const c = col + dCol;
  if (r < 0 || r >= GRID_SIZE || c < 0 || c >= GRID_SIZE) return null;
  return r * GRID_SIZE + c + 1;
}

export function leftOf(slot: number): SlotId | null {
  return offset(slot, 0, -1);
}

export function rightOf(slot: number): SlotId | null {
  return offset(slot, 0, 1);
}

/** 한 칸 앞(전열 방향) */
export function upOf(slot: number): SlotId | null {
  return offset(slot, -1, 0);
}

/** 한 칸 뒤(후열 방향) */
export function downOf(slot: number): SlotId | null {
  return offset(slot, 1, 0);
}

/** 같은 행 좌/우 */
export function rowNeighbors(slot: number): SlotId[] {
  return [leftOf(slot), rightOf(slot)].filter(
    (s): s is SlotId => s !== null,
  );
}

/** 좌, 우, 앞, 뒤 순 */
export function crossNeighbors(slot: number): SlotId[] {
  return [leftOf(slot), rightOf(slot), upOf(slot), downOf(slot)].filter(
    (s): s is SlotId => s !== null,
  );
}

export function behindInLine(slot: number, steps: number): SlotId | null {
  return offset(slot, steps, 0);
}
