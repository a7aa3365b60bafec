/**
 * Scanner
 * Cursor over conf source text with the character classes the tokenizer needs.
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from './tokens.js';

// ============================================================
// CHARACTER CLASSES
// ============================================================

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isNameStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

export function isNameChar(ch: string): boolean {
  return isNameStart(ch) || isDigit(ch);
}

/** Horizontal whitespace; a lone `\r` counts, a `\r\n` pair is a line break */
export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

// ============================================================
// SCANNER
// ============================================================

/**
 * Position in conf source.
 *
 * A `\r\n` pair is consumed as one step, so line and column always match the
 * LineIndex of the same text: only `\n` starts a new line.
 */
export class Scanner {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(readonly source: string) {}

  get atEnd(): boolean {
    return this.offset >= this.source.length;
  }

  /** Character `ahead` positions past the cursor, or '' past the end */
  peek(ahead = 0): string {
    return this.source[this.offset + ahead] ?? '';
  }

  /** Length of the line break at the cursor: 1 for `\n`, 2 for `\r\n`, else 0 */
  lineBreakAt(): number {
    const ch = this.peek();
    if (ch === '\n') return 1;
    if (ch === '\r' && this.peek(1) === '\n') return 2;
    return 0;
  }

  location(): SourceLocation {
    return { line: this.line, column: this.column, offset: this.offset };
  }

  /** Consume one character, or a whole line break */
  step(): void {
    const breakLength = this.lineBreakAt();
    if (breakLength > 0) {
      this.offset += breakLength;
      this.line++;
      this.column = 1;
      return;
    }
    if (!this.atEnd) {
      this.offset++;
      this.column++;
    }
  }

  /** Consume characters while `test` holds, stopping before any line break */
  skipWhile(test: (ch: string) => boolean): void {
    while (!this.atEnd && this.lineBreakAt() === 0 && test(this.peek())) {
      this.step();
    }
  }

  /** Token of `type` covering the text from `start` to the cursor */
  tokenFrom(type: TokenType, start: SourceLocation): Token {
    const end = this.location();
    return {
      type,
      value: this.source.slice(start.offset, end.offset),
      span: { start, end },
    };
  }
}
