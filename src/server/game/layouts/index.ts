import { z } from 'zod';
import type { BoardBounds, Cell } from '../../../shared/types/command';
import { CellSchema } from '../../../shared/validation/commandSchemas';
import type { BoardLayoutName } from '../../config/env';
import chessLayout from './chess.json';
import checkersLayout from './checkers.json';

/**
 * Starting arrangement of pieces for a new session.
 */
export interface BoardLayout {
  name: string;
  bounds: BoardBounds;
  pieces: Record<string, Cell>;
}

const LayoutFileSchema = z.object({
  name: z.string().min(1),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  pieces: z.record(z.string().min(1), CellSchema),
});

function parseLayoutFile(raw: unknown): BoardLayout {
  const file = LayoutFileSchema.parse(raw);
  return {
    name: file.name,
    bounds: { width: file.width, height: file.height },
    pieces: file.pieces,
  };
}

/**
 * Resolve a named layout. `empty` takes its bounds from the caller; the
 * bundled layouts carry their own.
 */
export function loadLayout(name: BoardLayoutName, emptyBounds: BoardBounds): BoardLayout {
  switch (name) {
    case 'empty':
      return { name: 'empty', bounds: { ...emptyBounds }, pieces: {} };
    case 'chess':
      return parseLayoutFile(chessLayout);
    case 'checkers':
      return parseLayoutFile(checkersLayout);
  }
}
