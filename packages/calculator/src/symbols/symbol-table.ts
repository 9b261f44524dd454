import { CalculatorReferenceError } from '../errors';

/**
 * A named value
 */
export interface Variable {
  readonly name: string;
  value: number;
  /** Constants are never reassigned */
  readonly constant: boolean;
}

/**
 * Read-only view of a binding, as listed by the symbols command
 */
export interface SymbolEntry {
  readonly name: string;
  readonly value: number;
  readonly constant: boolean;
}

/**
 * Names bound before any input is read
 */
export const PREDEFINED_SYMBOLS: readonly SymbolEntry[] = [
  { name: 'pi', value: 3.1415926535, constant: true },
  { name: 'e', value: 2.7182818284, constant: true },
  { name: 'k', value: 1000, constant: false },
];

/**
 * Variables and constants in declaration order
 *
 * Bindings are never removed. A name can be declared once.
 */
export class SymbolTable {
  private readonly variables: Variable[] = [];

  /**
   * Create a table holding the predefined names
   */
  static withDefaults(): SymbolTable {
    const table = new SymbolTable();
    for (const { name, value, constant } of PREDEFINED_SYMBOLS) {
      table.define(name, value, constant);
    }
    return table;
  }

  get size(): number {
    return this.variables.length;
  }

  getValue(name: string): number {
    return this.lookup(name, 'read').value;
  }

  setValue(name: string, value: number): void {
    const variable = this.lookup(name, 'write');
    if (variable.constant) {
      throw new CalculatorReferenceError('CONSTANT_WRITE', `Cannot assign to constant ${name}`);
    }
    variable.value = value;
  }

  isDeclared(name: string): boolean {
    return this.variables.some((v) => v.name === name);
  }

  /**
   * Bind a new name
   * @returns the bound value
   */
  define(name: string, value: number, constant: boolean): number {
    if (this.isDeclared(name)) {
      throw new CalculatorReferenceError('DUPLICATE_DECLARATION', `${name} declared twice`);
    }
    this.variables.push({ name, value, constant });
    return value;
  }

  *list(): Generator<SymbolEntry, void, undefined> {
    for (const { name, value, constant } of this.variables) {
      yield { name, value, constant };
    }
  }

  private lookup(name: string, access: 'read' | 'write'): Variable {
    const variable = this.variables.find((v) => v.name === name);
    if (!variable) {
      throw new CalculatorReferenceError(
        'UNDEFINED_VARIABLE',
        `Cannot ${access} undefined variable ${name}`,
      );
    }
    return variable;
  }
}
