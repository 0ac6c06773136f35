/** Small seeded PRNG so generated inputs are the same on every run. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export class TextGenerator {
  constructor(private readonly random: () => number) {}

  int(max: number): number {
    return Math.floor(this.random() * max);
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.int(items.length)];
    if (item === undefined) throw new Error("pick from an empty list");
    return item;
  }

  repeat(min: number, max: number, make: () => string): string {
    let out = "";
    const count = min + this.int(max - min + 1);
    for (let i = 0; i < count; i++) out += make();
    return out;
  }

  chars(alphabet: string, min: number, max: number): string {
    return this.repeat(min, max, () => this.pick([...alphabet]));
  }

  /** Any string at all, weighted towards characters the grammar cares about. */
  anyText(maxLength: number): string {
    return this.repeat(0, maxLength, () =>
      this.random() < 0.6
        ? this.pick([..."\\=#\"'\n \t\r$_{}aZ9"])
        : String.fromCodePoint(this.int(0x2fff)),
    );
  }

  /** A line that follows the grammar, joined to others with newlines. */
  expression(): string {
    switch (this.int(3)) {
      case 0:
        return this.assignment();
      case 1:
        return this.comment();
      default:
        return this.ws(0, 3);
    }
  }

  assignment(): string {
    const comment =
      this.int(2) === 0 ? `${this.ws(1, 2)}${this.comment()}` : "";
    return [
      this.ws(0, 2),
      this.name(),
      this.ws(0, 2),
      "=",
      this.ws(0, 2),
      this.value(),
      comment,
    ].join("");
  }

  name(): string {
    return this.chars("abcXYZ_", 1, 1) + this.chars("abcXYZ_019", 0, 6);
  }

  value(): string {
    // Quoted parts are kept apart by unquoted ones so quotes never merge
    // into a triple quote.
    const parts: string[] = [];
    const count = this.int(4);
    for (let i = 0; i < count; i++) {
      if (i % 2 === 1) {
        parts.push(this.unquoted());
        continue;
      }
      const kind = this.int(3);
      parts.push(
        kind === 0
          ? this.unquoted()
          : kind === 1
            ? this.singleQuoted()
            : this.doubleQuoted(),
      );
    }
    return parts.join("");
  }

  unquoted(): string {
    return this.repeat(1, 4, () =>
      this.int(4) === 0
        ? `\\${this.pick([..."abc=#'\"$ \\"])}`
        : this.chars("abc=$/{}.:- ", 1, 3),
    );
  }

  singleQuoted(): string {
    const quote = this.pick(["'", "'''"]);
    return `${quote}${this.chars("ab $#=\"\n", 1, 6)}${quote}`;
  }

  doubleQuoted(): string {
    const quote = this.pick(['"', '"""']);
    const body = this.repeat(1, 4, () =>
      this.int(3) === 0
        ? `\\${this.pick([..."\"\\$n\n"])}`
        : this.chars("ab $#='\n", 1, 3),
    );
    return `${quote}${body}${quote}`;
  }

  comment(): string {
    return `#${this.chars("ab #='\"$ ", 0, 8)}`;
  }

  ws(min: number, max: number): string {
    return this.chars(" \t\f\v", min, max);
  }
}
