export interface ListCursor {
  index: number | null;
  offset: number;
}

export function maxOffset(length: number, capacity: number): number {
  return Math.max(0, length - Math.max(1, capacity));
}

export function clampOffset(offset: number, length: number, capacity: number): number {
  return Math.min(Math.max(0, offset), maxOffset(length, capacity));
}

/** Moves `offset` by the least amount that puts `index` inside the viewport. */
export function scrollIntoView(index: number, offset: number, length: number, capacity: number): number {
  const rows = Math.max(1, capacity);
  let next = offset;

  if (index < next) {
    next = index;
  } else if (index >= next + rows) {
    next = index - rows + 1;
  }

  return clampOffset(next, length, capacity);
}

export function moveDown(cursor: ListCursor, length: number, capacity: number): ListCursor {
  if (length === 0) {
    return { index: null, offset: 0 };
  }

  if (cursor.index === null || cursor.index >= length - 1) {
    return { index: 0, offset: 0 };
  }

  const index = cursor.index + 1;
  return { index, offset: scrollIntoView(index, cursor.offset, length, capacity) };
}

export function moveUp(cursor: ListCursor, length: number, capacity: number): ListCursor {
  if (length === 0) {
    return { index: null, offset: 0 };
  }

  if (cursor.index === null || cursor.index <= 0) {
    return { index: length - 1, offset: maxOffset(length, capacity) };
  }

  const index = cursor.index - 1;
  return { index, offset: scrollIntoView(index, cursor.offset, length, capacity) };
}
