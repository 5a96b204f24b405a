import { JsonResponseParser } from './json-parser.js';
import { TextResponseParser } from './text-parser.js';
import type { ResponseParser } from './types.js';

export function createResponseParser(richParsing: boolean): ResponseParser {
  return richParsing ? new JsonResponseParser() : new TextResponseParser();
}
