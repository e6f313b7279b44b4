// Path through a shape, for locating errors.

export class TraversalPath {
  private segments: string[] = [];

  /** Enter a field (`name`), element (`[3]`) or arm (`Ok`). */
  push(segment: string): void {
    this.segments.push(segment);
  }

  pop(): void {
    this.segments.pop();
  }

  get depth(): number {
    return this.segments.length;
  }

  toString(): string {
    if (this.segments.length === 0) return "<root>";
    let out = "";
    for (const segment of this.segments) {
      if (out === "" || segment.startsWith("[")) {
        out += segment;
      } else {
        out += `.${segment}`;
      }
    }
    return out;
  }
}
