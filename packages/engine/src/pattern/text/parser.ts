import { CstNode, CstParser, IRecognitionException, IToken } from 'chevrotain';
import {
  allTokens,
  Created,
  Duration,
  Hold,
  Identifier,
  Name,
  NumberLiteral,
  Press,
  Release,
  Source,
  StringLiteral,
  Tilde,
  Tolerance,
} from './tokens.js';

class PatternTextParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  public patternFile = this.RULE('patternFile', () => {
    this.MANY(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.headerStmt) },
      { ALT: () => this.SUBRULE(this.actionStmt) },
      { ALT: () => this.SUBRULE(this.holdStmt) },
    ]);
  });

  private headerStmt = this.RULE('headerStmt', () => {
    this.OR([
      { ALT: () => { this.CONSUME(Name, { LABEL: 'directive' }); this.CONSUME1(StringLiteral, { LABEL: 'text' }); } },
      { ALT: () => { this.CONSUME(Source, { LABEL: 'directive' }); this.CONSUME2(StringLiteral, { LABEL: 'text' }); } },
      { ALT: () => { this.CONSUME(Created, { LABEL: 'directive' }); this.CONSUME3(StringLiteral, { LABEL: 'text' }); } },
      { ALT: () => { this.CONSUME(Duration, { LABEL: 'directive' }); this.CONSUME1(NumberLiteral, { LABEL: 'number' }); } },
      { ALT: () => { this.CONSUME(Tolerance, { LABEL: 'directive' }); this.CONSUME2(NumberLiteral, { LABEL: 'number' }); } },
    ]);
  });

  // 1.250 release q ~50
  private actionStmt = this.RULE('actionStmt', () => {
    this.CONSUME1(NumberLiteral, { LABEL: 'time' });
    this.OR([
      { ALT: () => this.CONSUME(Press, { LABEL: 'action' }) },
      { ALT: () => this.CONSUME(Release, { LABEL: 'action' }) },
    ]);
    this.SUBRULE(this.keyRef);
    this.OPTION(() => this.SUBRULE(this.toleranceOverride));
  });

  // hold q 2.0 2.4 ~50
  private holdStmt = this.RULE('holdStmt', () => {
    this.CONSUME(Hold);
    this.SUBRULE(this.keyRef);
    this.CONSUME1(NumberLiteral, { LABEL: 'start' });
    this.CONSUME2(NumberLiteral, { LABEL: 'end' });
    this.OPTION(() => this.SUBRULE(this.toleranceOverride));
  });

  private keyRef = this.RULE('keyRef', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier, { LABEL: 'key' }) },
      { ALT: () => this.CONSUME(NumberLiteral, { LABEL: 'key' }) },
      { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'key' }) },
    ]);
  });

  private toleranceOverride = this.RULE('toleranceOverride', () => {
    this.CONSUME(Tilde);
    this.CONSUME(NumberLiteral, { LABEL: 'ms' });
  });
}

let parserInstance: PatternTextParser | null = null;

export interface CstResult {
  cst: CstNode;
  errors: IRecognitionException[];
}

export function parseCst(tokens: IToken[]): CstResult {
  if (!parserInstance) parserInstance = new PatternTextParser();
  parserInstance.input = tokens;
  const cst = parserInstance.patternFile();
  return { cst, errors: parserInstance.errors };
}
