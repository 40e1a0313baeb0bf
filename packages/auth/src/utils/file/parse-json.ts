import { readFileSync } from 'fs';
import { ParseError } from '../../errors/credential-errors.js';

/**
 * JSON.parse that reports malformed input as a ParseError.
 * @param text - JSON text
 * @param source - What the text is, for the error message
 */
export function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(
      `${source} is not valid JSON`,
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Reads and parses a JSON file. File system errors propagate unchanged.
 */
export function readJsonFile(filePath: string): unknown {
  const content = readFileSync(filePath, 'utf8');
  return parseJson(content, `File ${filePath}`);
}
