/**
 * Character grid parsing and rendering
 *
 * A secret message is published as a table whose rows give an
 * x-coordinate, a character and a y-coordinate. Placing every character
 * on a grid with y growing upwards reveals the message.
 */

import * as cheerio from 'cheerio';

export interface GridCell {
  x: number;
  y: number;
  character: string;
}

const INTEGER = /^\d+$/;
const PACKED_ROW = /^(\d+)(.)(\d+)$/u;

function toCell(x: string, character: string, y: string): GridCell | null {
  if (!INTEGER.test(x) || !INTEGER.test(y)) {
    return null;
  }
  return { x: Number(x), y: Number(y), character: Array.from(character)[0] ?? ' ' };
}

/**
 * Cells from the first table of an HTML document, skipping its header row.
 * Returns null when the document has no table.
 */
export function parseCharacterTable(html: string): GridCell[] | null {
  const $ = cheerio.load(html);
  const table = $('table').first();
  if (table.length === 0) {
    return null;
  }

  const cells: GridCell[] = [];
  table.find('tr').slice(1).each((_, row) => {
    const columns = $(row).find('td, th').map((_, column) => $(column).text().trim()).get();
    let cell: GridCell | null = null;
    if (columns.length >= 3) {
      cell = toCell(columns[0], columns[1], columns[2]);
    } else {
      // Some exports collapse a row into one "{x}{character}{y}" string
      const match = PACKED_ROW.exec(columns.join(''));
      if (match) {
        cell = toCell(match[1], match[2], match[3]);
      }
    }
    if (cell) {
      cells.push(cell);
    }
  });
  return cells;
}

/**
 * Lay cells out top to bottom: row 0 holds the highest y, column 0 the
 * lowest x. Unset positions are spaces.
 */
export function renderGrid(cells: GridCell[]): string[] {
  if (cells.length === 0) {
    return [];
  }

  const xs = cells.map(cell => cell.x);
  const ys = cells.map(cell => cell.y);
  const minX = Math.min(...xs);
  const maxX = Math.max(...xs);
  const minY = Math.min(...ys);
  const maxY = Math.max(...ys);

  const grid: string[][] = Array.from({ length: maxY - minY + 1 }, () =>
    Array.from({ length: maxX - minX + 1 }, () => ' ')
  );
  for (const { x, y, character } of cells) {
    grid[maxY - y][x - minX] = character;
  }
  return grid.map(row => row.join(''));
}
