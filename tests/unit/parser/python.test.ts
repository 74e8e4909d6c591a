import { describe, it, expect, beforeAll } from 'vitest';
import { PythonParser } from '../../../src/parser/python.js';
import { PythonSyntaxError } from '../../../src/parser/errors.js';
import { childNodes, calleeName, type PyNode } from '../../../src/parser/nodes.js';
import { readFixture } from '../../helpers/fixtures.js';

function first(parser: PythonParser, source: string): PyNode {
  const statement = parser.parse(source).body[0];
  if (!statement) throw new Error('no statement parsed');
  return statement;
}

describe('PythonParser', () => {
  let parser: PythonParser;

  beforeAll(() => {
    parser = new PythonParser();
  });

  describe('annotated assignments', () => {
    it('should convert a bare annotation', () => {
      const node = first(parser, 'count: int\n');

      expect(node.kind).toBe('AnnAssign');
      if (node.kind !== 'AnnAssign') return;
      expect(node.target).toMatchObject({ kind: 'Name', id: 'count' });
      expect(node.annotation).toMatchObject({ kind: 'Name', id: 'int' });
      expect(node.value).toBeNull();
    });

    it('should keep the assigned value', () => {
      const node = first(parser, 'count: int = 3\n');

      if (node.kind !== 'AnnAssign') throw new Error(`unexpected ${node.kind}`);
      expect(node.value).toMatchObject({ kind: 'Constant', value: 3 });
    });

    it('should convert a generic annotation to a subscript', () => {
      const node = first(parser, 'items: list[Item]\n');

      if (node.kind !== 'AnnAssign') throw new Error(`unexpected ${node.kind}`);
      expect(node.annotation).toMatchObject({
        kind: 'Subscript',
        value: { kind: 'Name', id: 'list' },
        slice: { kind: 'Name', id: 'Item' },
      });
    });

    it('should convert several type arguments to a tuple slice', () => {
      const node = first(parser, 'lookup: dict[str, Item]\n');

      if (node.kind !== 'AnnAssign') throw new Error(`unexpected ${node.kind}`);
      const annotation = node.annotation;
      if (annotation.kind !== 'Subscript') throw new Error(`unexpected ${annotation.kind}`);
      expect(annotation.slice.kind).toBe('Tuple');
      if (annotation.slice.kind !== 'Tuple') return;
      expect(annotation.slice.elts).toMatchObject([
        { kind: 'Name', id: 'str' },
        { kind: 'Name', id: 'Item' },
      ]);
    });
  });

  describe('expressions', () => {
    it('should convert string literals to constants', () => {
      const node = first(parser, '"hello"\n');

      expect(node.kind).toBe('Other');
      expect(childNodes(node)).toMatchObject([{ kind: 'Constant', value: 'hello' }]);
    });

    it('should join concatenated strings', () => {
      const node = first(parser, '"first" "second"\n');

      expect(childNodes(node)).toMatchObject([{ kind: 'Constant', value: 'firstsecond' }]);
    });

    it('should keep f-strings as uninterpreted nodes', () => {
      const node = first(parser, 'f"{name}"\n');

      expect(childNodes(node)[0]?.kind).toBe('Other');
    });

    it('should convert None and booleans', () => {
      const node = first(parser, 'x = (None, True)\n');

      const value = childNodes(node)[1];
      expect(value).toMatchObject({
        kind: 'Tuple',
        elts: [
          { kind: 'Constant', value: null },
          { kind: 'Constant', value: true },
        ],
      });
    });

    it('should separate positional and keyword arguments of calls', () => {
      const node = first(parser, 'Button("Go", target, style="wide")\n');
      const call = childNodes(node)[0];

      if (call?.kind !== 'Call') throw new Error('expected a call');
      expect(calleeName(call)).toBe('Button');
      expect(call.args).toMatchObject([
        { kind: 'Constant', value: 'Go' },
        { kind: 'Name', id: 'target' },
      ]);
      expect(call.keywords).toMatchObject([
        { kind: 'Other', type: 'keyword_argument', children: [{ kind: 'Constant', value: 'wide' }] },
      ]);
    });

    it('should resolve qualified callees to the attribute name', () => {
      const node = first(parser, 'state.items.append(1)\n');
      const call = childNodes(node)[0];

      if (call?.kind !== 'Call') throw new Error('expected a call');
      expect(calleeName(call)).toBe('append');
    });

    it('should mark assignment targets as stores', () => {
      const node = first(parser, 'state.count = 1\n');

      expect(node).toMatchObject({ kind: 'Other', type: 'assignment' });
      expect(childNodes(node)[0]).toMatchObject({ kind: 'Attribute', attr: 'count', ctx: 'store' });
    });

    it('should mark deleted attributes', () => {
      const node = first(parser, 'del state.draft\n');

      expect(childNodes(node)[0]).toMatchObject({ kind: 'Attribute', attr: 'draft', ctx: 'del' });
    });

    it('should unwrap parenthesized expressions', () => {
      const node = first(parser, '(state.count)\n');

      expect(childNodes(node)[0]).toMatchObject({ kind: 'Attribute', attr: 'count', ctx: 'load' });
    });
  });

  describe('definitions', () => {
    it('should collect class decorators, bases and body', () => {
      const node = first(parser, '@dataclass\nclass Item(Base):\n    name: str\n');

      if (node.kind !== 'ClassDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.name).toBe('Item');
      expect(node.decorators).toMatchObject([{ kind: 'Name', id: 'dataclass' }]);
      expect(node.bases).toMatchObject([{ kind: 'Name', id: 'Base' }]);
      expect(node.body).toHaveLength(1);
      expect(node.startLine).toBe(2);
      expect(node.endLine).toBe(3);
    });

    it('should keep call-style decorators as calls', () => {
      const node = first(parser, '@route("/about")\ndef about(state):\n    pass\n');

      if (node.kind !== 'FunctionDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.decorators).toHaveLength(1);
      expect(node.decorators[0]).toMatchObject({ kind: 'Call', func: { kind: 'Name', id: 'route' } });
    });

    it('should collect typed and defaulted parameter names', () => {
      const node = first(parser, 'def page(state: State, name="x", count: int = 0) -> Page:\n    pass\n');

      if (node.kind !== 'FunctionDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.params).toEqual(['state', 'name', 'count']);
      expect(node.returns).toMatchObject({ kind: 'Name', id: 'Page' });
    });

    it('should stop collecting parameters at a star', () => {
      const node = first(parser, 'def page(state, *args, extra):\n    pass\n');

      if (node.kind !== 'FunctionDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.params).toEqual(['state']);
    });

    it('should stop collecting parameters at a bare star', () => {
      const node = first(parser, 'def page(state, *, flag=False):\n    pass\n');

      if (node.kind !== 'FunctionDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.params).toEqual(['state']);
    });

    it('should drop positional-only parameters', () => {
      const node = first(parser, 'def page(first, /, state):\n    pass\n');

      if (node.kind !== 'FunctionDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.params).toEqual(['state']);
    });

    it('should detect async functions', () => {
      const node = first(parser, 'async def load(state):\n    pass\n');

      if (node.kind !== 'FunctionDef') throw new Error(`unexpected ${node.kind}`);
      expect(node.isAsync).toBe(true);
      expect(node.name).toBe('load');
    });

    it('should skip comments between statements', () => {
      const module = parser.parse('# heading\nx = 1\n# trailing\n');

      expect(module.body).toHaveLength(1);
    });
  });

  describe('syntax errors', () => {
    it('should throw PythonSyntaxError for an unclosed bracket', async () => {
      const source = await readFixture('python', 'invalid.py');

      expect(() => parser.parse(source)).toThrow(PythonSyntaxError);
    });

    it('should report a 1-based position', () => {
      let caught: unknown;
      try {
        parser.parse('def broken(:\n    pass\n');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PythonSyntaxError);
      if (!(caught instanceof PythonSyntaxError)) return;
      expect(caught.line).toBe(1);
      expect(caught.column).toBeGreaterThanOrEqual(1);
      expect(caught.message).toContain(`(line 1, column ${caught.column})`);
    });

    it('should parse an empty file', () => {
      expect(parser.parse('').body).toEqual([]);
    });
  });

  describe('constructs the grammar tolerates', () => {
    it('should reject Python 2 print statements', () => {
      expect(() => parser.parse('print "hello"\n')).toThrow(
        "Missing parentheses in call to 'print' (line 1, column 1)"
      );
    });

    it('should reject Python 2 exec statements', () => {
      expect(() => parser.parse('exec "x = 1"\n')).toThrow(
        "Missing parentheses in call to 'exec' (line 1, column 1)"
      );
    });

    it('should accept print and exec calls', () => {
      expect(() => parser.parse('print("hello")\nprint ("a", "b")\nexec("x = 1")\n')).not.toThrow();
    });

    it('should reject a positional argument after a keyword argument', () => {
      expect(() => parser.parse('f(a=1, 2)\n')).toThrow(
        'positional argument follows keyword argument (line 1, column 8)'
      );
    });

    it('should reject a positional argument after keyword unpacking', () => {
      expect(() => parser.parse('f(**extra, 2)\n')).toThrow(
        'positional argument follows keyword argument unpacking (line 1, column 12)'
      );
    });

    it('should reject repeated keyword arguments', () => {
      expect(() => parser.parse('f(a=1, a=2)\n')).toThrow(
        'keyword argument repeated: a (line 1, column 8)'
      );
    });

    it('should accept keywords mixed with unpacking', () => {
      expect(() => parser.parse('f(1, *rest, a=2, *more, **extra, b=3)\n')).not.toThrow();
    });

    it('should reject a bare star without named parameters', () => {
      expect(() => parser.parse('def f(*):\n    pass\n')).toThrow(
        'named arguments must follow bare * (line 1, column 7)'
      );
    });

    it('should reject a bare star followed only by keyword unpacking', () => {
      expect(() => parser.parse('def f(a, *, **extra):\n    pass\n')).toThrow(
        'named arguments must follow bare * (line 1, column 10)'
      );
    });

    it('should accept keyword-only parameters', () => {
      expect(() => parser.parse('def f(a=1, *, b, c=2):\n    pass\n')).not.toThrow();
    });

    it('should reject a plain parameter after a defaulted one', () => {
      expect(() => parser.parse('def f(a=1, b):\n    pass\n')).toThrow(PythonSyntaxError);
    });
  });

  describe('indentation', () => {
    it('should reject a dedent that matches no enclosing block', () => {
      expect(() => parser.parse('if x:\n    a = 1\n  b = 2\n')).toThrow(
        'unindent does not match any outer indentation level (line 3, column 3)'
      );
    });

    it('should reject a misaligned statement inside a nested block', () => {
      const source = ['def f():', '    if x:', '        a = 1', '      b = 2', ''].join('\n');

      expect(() => parser.parse(source)).toThrow(
        'unindent does not match any outer indentation level (line 4, column 7)'
      );
    });

    it('should reject tabs and spaces that only agree at tab width 8', () => {
      expect(() => parser.parse('if x:\n\ta = 1\n        b = 2\n')).toThrow(
        'inconsistent use of tabs and spaces in indentation (line 3, column 9)'
      );
    });

    it('should accept consistent tab indentation', () => {
      expect(() => parser.parse('if x:\n\ta = 1\n\tb = 2\nc = 3\n')).not.toThrow();
    });

    it('should accept clauses aligned with their statement', () => {
      const source = [
        'def f(x):',
        '    try:',
        '        if x:',
        '            return 1',
        '        elif x is None:',
        '            return 2',
        '        else:',
        '            return 3',
        '    except ValueError:',
        '        pass',
        '    finally:',
        '        pass',
        '',
      ].join('\n');

      expect(() => parser.parse(source)).not.toThrow();
    });

    it('should accept inline bodies and semicolons', () => {
      expect(() => parser.parse('if x: a = 1; b = 2\nelse: c = 3\n')).not.toThrow();
    });
  });
});
