import { Lexer } from '../lexer/lexer.js';
import type { LexerMode, Token } from '../lexer/tokens.js';

/**
 * Buffered lookahead over the lexer.
 * Backtracking and mode switches drop the buffer and move the lexer cursor;
 * the lexer itself is never rebuilt.
 */
export class TokenStream {
  private readonly lexer: Lexer;
  private buffer: Token[] = [];

  constructor(source: string) {
    this.lexer = new Lexer(source);
  }

  get source(): string {
    return this.lexer.source;
  }

  get mode(): LexerMode {
    return this.lexer.mode;
  }

  /** Look `offset` tokens ahead without consuming; repeats `eof` past the end. */
  peek(offset = 0): Token {
    let token = this.buffer[offset];
    while (token === undefined) {
      const last = this.buffer[this.buffer.length - 1];
      if (last !== undefined && last.kind === 'eof') {
        return last;
      }
      this.buffer.push(this.lexer.next());
      token = this.buffer[offset];
    }
    return token;
  }

  /** Consume and return the current token. */
  next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') {
      this.buffer.shift();
    }
    return token;
  }

  /** Drop buffered lookahead and resume lexing at `offset`. */
  reset(offset: number, mode: LexerMode = this.lexer.mode): void {
    this.buffer = [];
    this.lexer.seek(offset, mode);
  }
}
