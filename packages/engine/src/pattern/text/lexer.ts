import { ILexingResult, Lexer } from 'chevrotain';
import { allTokens } from './tokens.js';

let instance: Lexer | null = null;

export function lex(text: string): ILexingResult {
  if (!instance) instance = new Lexer(allTokens);
  return instance.tokenize(text);
}
