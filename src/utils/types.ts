export interface Position {
  line: number;
  column: number;
  offset: number;
}

export interface Location {
  start: Position;
  end: Position;
}

/**
 * Build a single-line location spanning `length` characters from a start point.
 */
export function spanLocation(line: number, column: number, offset: number, length: number): Location {
  const width = Math.max(0, length);
  return {
    start: { line, column, offset },
    end: { line, column: column + width, offset: offset + width },
  };
}
