// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * A point in source text.
 * `line` and `column` are 1-based; `offset` is the 0-based string index.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Half-open range `[start.offset, end.offset)` of source text */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// LINE INDEX
// ============================================================

/**
 * Offset to line/column conversion for one source text.
 * Line starts are computed once; lookups are a binary search.
 */
export class LineIndex {
  private readonly lineStarts: readonly number[];

  constructor(readonly source: string) {
    const starts = [0];
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        starts.push(i + 1);
      }
    }
    this.lineStarts = starts;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * Location of a string offset.
   * @throws RangeError if offset is outside `[0, source.length]`
   */
  locationAt(offset: number): SourceLocation {
    if (
      !Number.isInteger(offset) ||
      offset < 0 ||
      offset > this.source.length
    ) {
      throw new RangeError(
        `Offset ${offset} is outside source of length ${this.source.length}`
      );
    }

    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const lineStart = this.lineStarts[low] ?? 0;
    return { line: low + 1, column: offset - lineStart + 1, offset };
  }

  /**
   * Span covering `[start, end)`.
   * @throws RangeError if either offset is out of range or start > end
   */
  spanAt(start: number, end: number): SourceSpan {
    if (start > end) {
      throw new RangeError(`Span start ${start} is after end ${end}`);
    }
    return { start: this.locationAt(start), end: this.locationAt(end) };
  }

  /** Offset where a 1-based line begins */
  lineStart(line: number): number {
    const start = this.lineStarts[line - 1];
    if (start === undefined) {
      throw new RangeError(`Line ${line} is outside source`);
    }
    return start;
  }

  /** Text of a 1-based line, without its line terminator */
  lineText(line: number): string {
    const start = this.lineStarts[line - 1];
    if (start === undefined) return '';
    const next = this.lineStarts[line];
    const end = next === undefined ? this.source.length : next - 1;
    const text = this.source.slice(start, end);
    return text.endsWith('\r') ? text.slice(0, -1) : text;
  }

  /** Trimmed source line for diagnostic context display */
  contextLine(line: number): string {
    return this.lineText(line).trim();
  }
}

// ============================================================
// SPAN HELPERS
// ============================================================

/** Text covered by a span */
export function spanText(span: SourceSpan, source: string): string {
  return source.slice(span.start.offset, span.end.offset);
}

/** Whether `inner` lies within `outer` (boundaries inclusive) */
export function spanContains(outer: SourceSpan, inner: SourceSpan): boolean {
  return (
    outer.start.offset <= inner.start.offset &&
    inner.end.offset <= outer.end.offset
  );
}

/** Whether a span is inside a text of the given length and not inverted */
export function isSpanInRange(span: SourceSpan, length: number): boolean {
  return (
    span.start.offset >= 0 &&
    span.start.offset <= span.end.offset &&
    span.end.offset <= length
  );
}

/** Format a location as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
