import { readFileSync } from "fs";
import { createGrid, type Grid } from "./grid.js";
import { ConfigurationError } from "../sim/errors.js";

/**
 * Parse a map text: one row per line, cells separated by whitespace.
 * 0 = free cell, 1 = obstacle. Blank lines are ignored.
 */
export function parseMap(text: string): Grid {
  const matrix: number[][] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") continue;
    const row = line.split(/\s+/).map((token, col) => {
      if (!/^-?\d+$/.test(token)) {
        throw new ConfigurationError(
          `Invalid map token "${token}" at line ${i + 1}, column ${col + 1}`,
          { line: i + 1, col: col + 1, token },
        );
      }
      return Number(token);
    });
    matrix.push(row);
  }
  return createGrid(matrix);
}

export function loadMapFile(path: string): Grid {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read map file ${path}`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return parseMap(text);
}
