/**
 * Response header storage.
 *
 * Header names keep the spelling they arrived with; lookups compare names
 * case-insensitively. Repeated names are kept as separate entries in the
 * order they were added.
 *
 * @module http/headers
 */

/**
 * A single header as received.
 */
export interface HeaderEntry {
  readonly name: string;
  readonly value: string;
}

/**
 * Read-only view of a response's headers.
 */
export interface ReadonlyHeaders extends Iterable<HeaderEntry> {
  /** Number of entries, duplicates included */
  readonly size: number;

  /** All entries in insertion order */
  entries(): readonly HeaderEntry[];

  /** First value stored under `name` (case-insensitive) */
  get(name: string): string | undefined;

  /** Every value stored under `name` (case-insensitive), in insertion order */
  getAll(name: string): readonly string[];

  has(name: string): boolean;

  /**
   * Flatten to a plain record keyed by lower-cased name. Repeated values are
   * joined with `", "`.
   */
  toRecord(): Record<string, string>;
}

/**
 * Split a raw `Name: Value` line.
 *
 * Returns `undefined` when the line has no `:`; such lines (blank lines, the
 * end-of-headers marker, garbage) are not headers. Only spaces and tabs after
 * the colon are skipped, and the value stops at the first `\r`.
 *
 * @example
 * ```typescript
 * parseHeaderLine('Content-Length: 42\r'); // { name: 'Content-Length', value: '42' }
 * parseHeaderLine('X-Empty:');             // { name: 'X-Empty', value: '' }
 * parseHeaderLine('garbage');              // undefined
 * ```
 */
export function parseHeaderLine(line: string): HeaderEntry | undefined {
  const delimiter = line.indexOf(':');
  if (delimiter === -1) {
    return undefined;
  }

  const name = line.slice(0, delimiter);

  let start = delimiter + 1;
  while (start < line.length && (line[start] === ' ' || line[start] === '\t')) {
    start++;
  }

  const cr = line.indexOf('\r', start);
  const value = cr === -1 ? line.slice(start) : line.slice(start, cr);

  return { name, value };
}

/**
 * Multi-entry header store filled while a response head is parsed.
 */
export class HeaderStore implements ReadonlyHeaders {
  private readonly list: HeaderEntry[] = [];
  private readonly byName = new Map<string, string[]>();

  get size(): number {
    return this.list.length;
  }

  /**
   * Parse a raw header line and store it. Lines without `:` are ignored.
   */
  addLine(line: string): void {
    const entry = parseHeaderLine(line);
    if (entry) {
      this.add(entry.name, entry.value);
    }
  }

  /**
   * Store a header. An existing entry with the same name is kept.
   */
  add(name: string, value: string): void {
    this.list.push({ name, value });

    const key = name.toLowerCase();
    const values = this.byName.get(key);
    if (values) {
      values.push(value);
    } else {
      this.byName.set(key, [value]);
    }
  }

  entries(): readonly HeaderEntry[] {
    return this.list;
  }

  get(name: string): string | undefined {
    return this.byName.get(name.toLowerCase())?.[0];
  }

  getAll(name: string): readonly string[] {
    return this.byName.get(name.toLowerCase()) ?? [];
  }

  has(name: string): boolean {
    return this.byName.has(name.toLowerCase());
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(Array.from(this.byName, ([name, values]): [string, string] => [name, values.join(', ')]));
  }

  [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.list[Symbol.iterator]();
  }
}
