/**
 * External Names
 *
 * Dotted, dashed identifiers naming modules, types, calls, parameters and
 * response variants. The string form is canonical: lower-case words,
 * components separated by '.', words separated by '-' or '/'.
 */

const WORD = /^[A-Za-z][A-Za-z0-9]*$/;

const SEPARATOR = /[-/]/g;

interface NamePart {
  /** Lower-cased words of the component */
  readonly words: readonly string[];
  /** Whether the separator after each word (but the last) is a slash */
  readonly slashes: readonly boolean[];
}

type WordCase = 'lower' | 'upper' | 'lowerCamel' | 'upperCamel';

function capitalize(word: string): string {
  return word.substring(0, 1).toUpperCase() + word.substring(1);
}

function renderPart(part: NamePart, wordCase: WordCase, dash: string, slash: string): string {
  let out = '';
  let afterSlash = false;
  part.words.forEach((word, i) => {
    switch (wordCase) {
      case 'lower':
        out += word;
        break;
      case 'upper':
        out += word.toUpperCase();
        break;
      case 'lowerCamel':
        out += i === 0 || afterSlash ? word : capitalize(word);
        break;
      case 'upperCamel':
        out += afterSlash ? word : capitalize(word);
        break;
    }
    if (i < part.words.length - 1) {
      afterSlash = part.slashes[i];
      out += afterSlash ? slash : dash;
    }
  });
  return out;
}

function parsePart(component: string, source: string): NamePart {
  if (component.length === 0) {
    throw new SyntaxError(`Empty component in [${source}]`);
  }

  const words: string[] = [];
  const slashes: boolean[] = [];
  let start = 0;
  for (const match of component.matchAll(SEPARATOR)) {
    const index = match.index ?? 0;
    words.push(component.substring(start, index));
    slashes.push(match[0] === '/');
    start = index + 1;
  }
  words.push(component.substring(start));

  for (const word of words) {
    if (!WORD.test(word)) {
      throw new SyntaxError(`Illegal word in [${source}]: [${word}]`);
    }
  }

  return {
    words: words.map(w => w.toLowerCase()),
    slashes,
  };
}

/**
 * An immutable qualified identifier.
 *
 * Equality is structural; use {@link ExternalName.equals} or compare
 * {@link ExternalName.toString} results (which are cached) as map keys.
 */
export class ExternalName {
  private readonly parts: readonly NamePart[];
  private readonly text: string;

  private constructor(parts: readonly NamePart[]) {
    this.parts = parts;
    this.text = parts.map(p => renderPart(p, 'lower', '-', '/')).join('.');
  }

  /**
   * Parse a name from its string form.
   *
   * @throws SyntaxError if a component is empty or contains a malformed word
   */
  static parse(source: string): ExternalName {
    if (source.length === 0) {
      throw new SyntaxError('Empty name');
    }
    return new ExternalName(source.split('.').map(c => parsePart(c, source)));
  }

  /** Parse a name, passing absent input through */
  static parseOptional(source: string | undefined): ExternalName | undefined {
    return source === undefined ? undefined : ExternalName.parse(source);
  }

  /** Whether the name has a single component */
  isLeaf(): boolean {
    return this.parts.length === 1;
  }

  /** The name without its last component, or undefined for a leaf */
  get parent(): ExternalName | undefined {
    if (this.parts.length === 1) return undefined;
    return new ExternalName(this.parts.slice(0, -1));
  }

  /** The last component as a name of its own */
  get leaf(): ExternalName {
    if (this.parts.length === 1) return this;
    return new ExternalName(this.parts.slice(-1));
  }

  /** Append the components of another name to this one */
  resolve(sub: ExternalName | string): ExternalName {
    const other = typeof sub === 'string' ? ExternalName.parse(sub) : sub;
    return new ExternalName([...this.parts, ...other.parts]);
  }

  /** Prefix the leaf with extra text, keeping the parent */
  prefix(text: string): ExternalName {
    const leaf = ExternalName.parse(text + this.leaf.toString());
    const parent = this.parent;
    return parent ? parent.resolve(leaf) : leaf;
  }

  equals(other: unknown): boolean {
    return other instanceof ExternalName && other.text === this.text;
  }

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }

  /** Leaf as an UpperCamel identifier, e.g. `echo-service` → `EchoService` */
  asClassName(): string {
    return this.leafPart().words.map(capitalize).join('');
  }

  /** Leaf as a lowerCamel identifier, e.g. `get-status` → `getStatus` */
  asMethodName(): string {
    return renderPart(this.leafPart(), 'lowerCamel', '', '');
  }

  /** Leaf as an upper-case constant, e.g. `max-size` → `MAX_SIZE` */
  asConstantName(): string {
    return renderPart(this.leafPart(), 'upper', '_', '');
  }

  /** Components as path segments, e.g. `org.example-org` → `org/example-org` */
  asPathElements(): string {
    return this.parts.map(p => renderPart(p, 'lower', '-', '')).join('/');
  }

  private leafPart(): NamePart {
    return this.parts[this.parts.length - 1];
  }
}
