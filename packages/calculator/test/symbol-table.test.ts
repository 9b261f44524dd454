import { describe, expect, it } from 'vitest';
import { CalculatorReferenceError } from '../src/errors';
import { PREDEFINED_SYMBOLS, SymbolTable } from '../src/symbols';
import { thrownBy } from './helpers';

describe('SymbolTable', () => {
  describe('withDefaults', () => {
    it('binds pi, e and k', () => {
      const table = SymbolTable.withDefaults();
      expect([...table.list()]).toEqual([
        { name: 'pi', value: 3.1415926535, constant: true },
        { name: 'e', value: 2.7182818284, constant: true },
        { name: 'k', value: 1000, constant: false },
      ]);
      expect(table.size).toBe(PREDEFINED_SYMBOLS.length);
    });

    it('gives each table its own bindings', () => {
      const first = SymbolTable.withDefaults();
      const second = SymbolTable.withDefaults();
      first.setValue('k', 1);
      expect(second.getValue('k')).toBe(1000);
    });
  });

  describe('define', () => {
    it('appends a binding and returns its value', () => {
      const table = new SymbolTable();
      expect(table.define('x', 4, false)).toBe(4);
      expect(table.isDeclared('x')).toBe(true);
      expect(table.getValue('x')).toBe(4);
    });

    it('rejects a name that is already declared', () => {
      const table = new SymbolTable();
      table.define('x', 4, false);

      const error = thrownBy(() => table.define('x', 5, true));
      expect(error).toBeInstanceOf(CalculatorReferenceError);
      expect(error).toMatchObject({ code: 'DUPLICATE_DECLARATION', message: 'x declared twice' });
      expect([...table.list()]).toEqual([{ name: 'x', value: 4, constant: false }]);
    });
  });

  describe('getValue', () => {
    it('fails for unknown names', () => {
      const error = thrownBy(() => new SymbolTable().getValue('ghost'));
      expect(error).toMatchObject({
        code: 'UNDEFINED_VARIABLE',
        message: 'Cannot read undefined variable ghost',
      });
    });
  });

  describe('setValue', () => {
    it('overwrites variables in place', () => {
      const table = new SymbolTable();
      table.define('a', 1, false);
      table.define('b', 2, false);
      table.setValue('a', 10);
      expect([...table.list()].map((s) => [s.name, s.value])).toEqual([
        ['a', 10],
        ['b', 2],
      ]);
    });

    it('refuses to write constants', () => {
      const table = SymbolTable.withDefaults();
      const error = thrownBy(() => table.setValue('e', 3));
      expect(error).toMatchObject({
        code: 'CONSTANT_WRITE',
        message: 'Cannot assign to constant e',
      });
      expect(table.getValue('e')).toBe(2.7182818284);
    });

    it('never declares implicitly', () => {
      const table = new SymbolTable();
      const error = thrownBy(() => table.setValue('fresh', 1));
      expect(error).toMatchObject({
        code: 'UNDEFINED_VARIABLE',
        message: 'Cannot write undefined variable fresh',
      });
      expect(table.isDeclared('fresh')).toBe(false);
    });
  });

  describe('list', () => {
    it('yields lazily in declaration order', () => {
      const table = new SymbolTable();
      table.define('z', 1, false);
      table.define('a', 2, true);

      const entries = table.list();
      expect(entries.next()).toEqual({ done: false, value: { name: 'z', value: 1, constant: false } });
      expect(entries.next()).toEqual({ done: false, value: { name: 'a', value: 2, constant: true } });
      expect(entries.next().done).toBe(true);
    });
  });
});
