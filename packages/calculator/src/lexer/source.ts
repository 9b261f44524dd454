import type { SourcePosition } from './token';

/**
 * Synchronous character stream the lexer pulls from
 */
export interface CharacterSource {
  /** Next character, or null once the input is exhausted */
  read(): string | null;
  /** Return the character most recently read */
  unread(char: string): void;
  exhausted(): boolean;
  /** Position of the next character to be read */
  position(): SourcePosition;
}

/**
 * Character source over text that can be extended as input arrives
 *
 * The driver appends one input line at a time; consumed text is dropped on
 * each append.
 */
export class BufferedSource implements CharacterSource {
  private text: string;
  private index: number = 0;
  private consumed: number = 0;
  private line: number = 1;
  private column: number = 0;

  constructor(text: string = '') {
    this.text = text;
  }

  append(text: string): void {
    this.consumed += this.index;
    this.text = this.text.slice(this.index) + text;
    this.index = 0;
  }

  read(): string | null {
    if (this.exhausted()) return null;
    const char = this.text[this.index];
    this.index++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  unread(char: string): void {
    if (this.index === 0 || this.text[this.index - 1] !== char) {
      throw new Error(`Cannot unread '${char}': it was not the last character read`);
    }
    this.index--;
    if (char === '\n') {
      this.line--;
      const lineStart = this.text.lastIndexOf('\n', this.index - 1) + 1;
      this.column = this.index - lineStart;
    } else {
      this.column--;
    }
  }

  exhausted(): boolean {
    return this.index >= this.text.length;
  }

  position(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.consumed + this.index,
    };
  }
}
