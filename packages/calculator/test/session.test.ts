import { describe, expect, it } from 'vitest';
import { CalculatorArithmeticError, CalculatorSyntaxError } from '../src/errors';
import { evaluate, Session, type SessionEvent } from '../src/session';
import { SymbolTable } from '../src/symbols';

describe('Session', () => {
  /** Events with errors reduced to their codes */
  function summarize(events: SessionEvent[]): unknown[] {
    return events.map((event) => {
      switch (event.type) {
        case 'result':
          return event.value;
        case 'error':
          return event.error.code;
        case 'symbols':
          return event.entries.map((entry) => entry.name);
        default:
          return event.type;
      }
    });
  }

  it('evaluates a statement per line', () => {
    const session = new Session();
    expect(session.feed('2+3*4\n')).toEqual([{ type: 'result', value: 14 }]);
    expect(session.feed('(2+3)*4\n')).toEqual([{ type: 'result', value: 20 }]);
  });

  it('evaluates every statement on a line', () => {
    const session = new Session();
    expect(summarize(session.feed('let x = 3; x = x * 2; x\n'))).toEqual([3, 6, 6]);
  });

  it('produces nothing for empty statements', () => {
    expect(new Session().feed('\n\n;;  \n')).toEqual([]);
  });

  it('keeps declarations across feeds', () => {
    const session = new Session();
    session.feed('let x = 10\n');
    session.feed('x = x + 5\n');
    expect(session.feed('x\n')).toEqual([{ type: 'result', value: 15 }]);
    expect(session.symbols.getValue('x')).toBe(15);
  });

  describe('partial input', () => {
    it('waits for the terminator before evaluating', () => {
      const session = new Session();
      expect(session.feed('2+')).toEqual([]);
      expect(session.statements).toBe(0);
      expect(session.feed('3\n')).toEqual([{ type: 'result', value: 5 }]);
    });

    it('evaluates complete statements and holds back the rest', () => {
      const session = new Session();
      expect(summarize(session.feed('let x = 1; x'))).toEqual([1]);
      expect(summarize(session.feed(' + 1\n'))).toEqual([2]);
    });

    it('joins a statement fed in several pieces', () => {
      const session = new Session();
      expect(session.feed('po')).toEqual([]);
      expect(session.feed('w(2, ')).toEqual([]);
      expect(summarize(session.feed('10);7'))).toEqual([1024]);
      expect(summarize(session.feed(';'))).toEqual([7]);
    });

    it('waits for a command to be terminated', () => {
      const session = new Session();
      expect(session.feed('q')).toEqual([]);
      expect(session.closed).toBe(false);
      expect(summarize(session.feed('uit\n'))).toEqual(['quit']);
      expect(session.closed).toBe(true);
    });
  });

  describe('recovery', () => {
    it('resumes after the terminator of a failed statement', () => {
      const events = new Session().feed('1/0; 2+2\n');
      expect(events).toHaveLength(2);
      expect(events[0]).toMatchObject({ type: 'error' });
      expect(events[0].type === 'error' && events[0].error).toBeInstanceOf(CalculatorArithmeticError);
      expect(events[1]).toEqual({ type: 'result', value: 4 });
    });

    it('does not swallow the next line when the error hit the newline', () => {
      const session = new Session();
      expect(summarize(session.feed('1+\n3\n'))).toEqual(['PRIMARY_EXPECTED', 3]);
    });

    it('skips the rest of a line with a bad character', () => {
      const session = new Session();
      expect(summarize(session.feed('1 $ 2\n7\n'))).toEqual(['BAD_TOKEN', 7]);
      expect(summarize(session.feed('$ 5\n6\n'))).toEqual(['BAD_TOKEN', 6]);
    });

    it('recovers across feeds', () => {
      const session = new Session();
      const [event] = session.feed('(1+2\n');
      expect(event.type === 'error' && event.error).toBeInstanceOf(CalculatorSyntaxError);
      expect(session.feed('4\n')).toEqual([{ type: 'result', value: 4 }]);
    });

    it('counts statements and errors', () => {
      const session = new Session();
      expect(summarize(session.feed('1;1/0;x\n'))).toEqual([1, 'DIVIDE_BY_ZERO', 'UNDEFINED_VARIABLE']);
      expect(session.statements).toBe(3);
      expect(session.errors).toBe(2);
    });
  });

  describe('commands', () => {
    it('reports help and symbols requests', () => {
      const session = new Session();
      session.feed('const g = 9.81\n');
      expect(summarize(session.feed('help\nsymbols\n'))).toEqual(['help', ['pi', 'e', 'k', 'g']]);
    });

    it('lists current values', () => {
      const session = new Session();
      session.feed('k = 2\n');
      const [event] = session.feed('symbols\n');
      expect(event).toEqual({
        type: 'symbols',
        entries: [
          { name: 'pi', value: 3.1415926535, constant: true },
          { name: 'e', value: 2.7182818284, constant: true },
          { name: 'k', value: 2, constant: false },
        ],
      });
    });

    it('stops at quit and ignores later input', () => {
      const session = new Session();
      expect(summarize(session.feed('1\nq\n2\n'))).toEqual([1, 'quit']);
      expect(session.closed).toBe(true);
      expect(session.feed('3\n')).toEqual([]);
    });

    it('accepts quit spelled out', () => {
      const session = new Session();
      expect(summarize(session.feed('quit\n'))).toEqual(['quit']);
    });
  });

  it('uses the symbol table it is given', () => {
    const session = new Session(new SymbolTable());
    expect(summarize(session.feed('pi\n'))).toEqual(['UNDEFINED_VARIABLE']);
  });
});

describe('evaluate', () => {
  it('evaluates a single statement', () => {
    expect(evaluate('2 + 3 * 4')).toBe(14);
    expect(evaluate('pow(2, 10)')).toBe(1024);
    expect(evaluate('5!;')).toBe(120);
  });

  it('shares the table it is given', () => {
    const symbols = SymbolTable.withDefaults();
    evaluate('let x = 2', symbols);
    expect(evaluate('x * 21', symbols)).toBe(42);
  });

  it('throws the statement error', () => {
    expect(() => evaluate('1/0')).toThrow(CalculatorArithmeticError);
    expect(() => evaluate('sqrt(-1)')).toThrow(/square root of negative/);
  });
});
