/**
 * Type references as the frontend reports them: a raw qualified name plus
 * generic arguments and array depth.
 */
import { SystemError, ErrorCodes } from '../../utils/errors.js';

export interface TypeRef {
  /** Raw (erased) qualified name, e.g. 'java.util.List' */
  name: string;
  /** Generic type arguments, in declaration order */
  arguments: TypeRef[];
  /** Array nesting depth, 0 for non-array types */
  arrayDimensions: number;
}

export const PRIMITIVE_TYPES: ReadonlySet<string> = new Set([
  'boolean',
  'byte',
  'char',
  'short',
  'int',
  'long',
  'float',
  'double',
]);

export const VOID_TYPE = 'void';

export function typeRef(name: string, args: TypeRef[] = [], arrayDimensions = 0): TypeRef {
  return { name, arguments: args, arrayDimensions };
}

export function isPrimitive(ref: TypeRef): boolean {
  return ref.arrayDimensions === 0 && PRIMITIVE_TYPES.has(ref.name);
}

export function isVoid(ref: TypeRef): boolean {
  return ref.name === VOID_TYPE;
}

export function simpleNameOf(qualifiedName: string): string {
  const lastDot = qualifiedName.lastIndexOf('.');
  return lastDot >= 0 ? qualifiedName.slice(lastDot + 1) : qualifiedName;
}

export function packageNameOf(qualifiedName: string): string {
  const lastDot = qualifiedName.lastIndexOf('.');
  return lastDot >= 0 ? qualifiedName.slice(0, lastDot) : '';
}

/**
 * The raw name followed by every nested argument name, depth first.
 * Wildcards ('?') are dropped.
 */
export function referencedNames(ref: TypeRef): string[] {
  const names: string[] = [];
  const visit = (current: TypeRef): void => {
    if (current.name !== '?') {
      names.push(current.name);
    }
    for (const arg of current.arguments) {
      visit(arg);
    }
  };
  visit(ref);
  return names;
}

/**
 * Every nested argument reference, depth first, excluding the outer type.
 */
export function nestedArguments(ref: TypeRef): TypeRef[] {
  const result: TypeRef[] = [];
  const visit = (current: TypeRef): void => {
    for (const arg of current.arguments) {
      result.push(arg);
      visit(arg);
    }
  };
  visit(ref);
  return result;
}

export function formatTypeRef(ref: TypeRef): string {
  const args = ref.arguments.length > 0
    ? `<${ref.arguments.map(formatTypeRef).join(', ')}>`
    : '';
  return `${ref.name}${args}${'[]'.repeat(ref.arrayDimensions)}`;
}

// ---------------------------------------------------------------------------
// Parsing of the textual form: java.util.Map<java.lang.String, java.util.List<com.acme.Order>>[]
// ---------------------------------------------------------------------------

/**
 * Parse a textual type reference.
 * Bounded wildcards keep only their bound ('? extends Foo' becomes 'Foo').
 */
export function parseTypeRef(text: string): TypeRef {
  const parser = new TypeRefParser(text);
  const ref = parser.parseType();
  parser.expectEnd();
  return ref;
}

class TypeRefParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parseType(): TypeRef {
    this.skipSpaces();
    if (this.peek() === '?') {
      this.pos++;
      this.skipSpaces();
      const bound = this.readIdentifier(true);
      if (bound === 'extends' || bound === 'super') {
        return this.parseType();
      }
      if (bound.length > 0) {
        throw this.error(`unexpected '${bound}' after wildcard`);
      }
      return typeRef('?');
    }

    const name = this.readIdentifier(false);
    const args: TypeRef[] = [];
    this.skipSpaces();
    if (this.peek() === '<') {
      this.pos++;
      args.push(this.parseType());
      this.skipSpaces();
      while (this.peek() === ',') {
        this.pos++;
        args.push(this.parseType());
        this.skipSpaces();
      }
      if (this.peek() !== '>') {
        throw this.error("expected '>'");
      }
      this.pos++;
    }

    let dims = 0;
    this.skipSpaces();
    while (this.text.startsWith('[]', this.pos)) {
      dims++;
      this.pos += 2;
      this.skipSpaces();
    }
    return typeRef(name, args, dims);
  }

  expectEnd(): void {
    this.skipSpaces();
    if (this.pos < this.text.length) {
      throw this.error(`unexpected '${this.text.slice(this.pos)}'`);
    }
  }

  private readIdentifier(optional: boolean): string {
    const start = this.pos;
    while (this.pos < this.text.length && /[\w.$]/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    const identifier = this.text.slice(start, this.pos);
    if (!optional && identifier.length === 0) {
      throw this.error('expected a type name');
    }
    return identifier;
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private skipSpaces(): void {
    while (this.peek() === ' ') {
      this.pos++;
    }
  }

  private error(reason: string): SystemError {
    return new SystemError(
      ErrorCodes.INVALID_TYPE_REF,
      `Invalid type reference '${this.text}' at ${this.pos}: ${reason}`,
      { text: this.text, position: this.pos }
    );
  }
}
