import { createToken, Lexer, TokenType } from 'chevrotain';

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED });
export const Comment = createToken({ name: 'Comment', pattern: /#[^\n]*/, group: Lexer.SKIPPED });

export const StringLiteral = createToken({ name: 'StringLiteral', pattern: /"(?:[^"\\\n]|\\.)*"/ });
export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/ });
export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_][A-Za-z0-9_\-]*/ });

// directives
export const Name = createToken({ name: 'Name', pattern: /name/, longer_alt: Identifier });
export const Source = createToken({ name: 'Source', pattern: /source/, longer_alt: Identifier });
export const Duration = createToken({ name: 'Duration', pattern: /duration/, longer_alt: Identifier });
export const Created = createToken({ name: 'Created', pattern: /created/, longer_alt: Identifier });
export const Tolerance = createToken({ name: 'Tolerance', pattern: /tolerance/, longer_alt: Identifier });

// actions
export const Press = createToken({ name: 'Press', pattern: /press/, longer_alt: Identifier });
export const Release = createToken({ name: 'Release', pattern: /release/, longer_alt: Identifier });
export const Hold = createToken({ name: 'Hold', pattern: /hold/, longer_alt: Identifier });

// punctuation
export const Tilde = createToken({ name: 'Tilde', pattern: /~/ });

export const KEYWORDS: readonly string[] = ['name', 'source', 'duration', 'created', 'tolerance', 'press', 'release', 'hold'];

// Keywords must come before Identifier.
export const allTokens: TokenType[] = [
  WhiteSpace,
  Comment,
  StringLiteral,
  NumberLiteral,
  Name,
  Source,
  Duration,
  Created,
  Tolerance,
  Press,
  Release,
  Hold,
  Identifier,
  Tilde,
];
