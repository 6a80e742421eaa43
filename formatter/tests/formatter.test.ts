/**
 * Tests for the Sentience formatter.
 */

import { format, isFormatted } from '../src/formatter';

const ONE_LINE =
  'agent Echo { mem short goal: "Store" on input(msg) { embed msg -> mem.short ' +
  'reflect { mem.short["msg"] } } train { if loss > 0.1 { print "Training" } } evolve { } }';

const FORMATTED = [
  'agent Echo {',
  '  mem short',
  '  goal: "Store"',
  '  on input(msg) {',
  '    embed msg -> mem.short',
  '    reflect {',
  '      mem.short["msg"]',
  '    }',
  '  }',
  '  train {',
  '    if loss>0.1 {',
  '      print "Training"',
  '    }',
  '  }',
  '  evolve {}',
  '}',
  '',
].join('\n');

describe('format', () => {
  test('lays out nested blocks', () => {
    expect(format(ONE_LINE)).toBe(FORMATTED);
  });

  test('is idempotent', () => {
    expect(format(FORMATTED)).toBe(FORMATTED);
  });

  test('honours indentSize', () => {
    expect(format('train { print "x" }', { indentSize: 4 })).toBe('train {\n    print "x"\n}\n');
  });

  test('separates agents from their neighbours', () => {
    expect(format('print "a" print "b" agent A { } link x <-> y enter z')).toBe(
      'print "a"\nprint "b"\n\nagent A {}\n\nlink x <-> y\nenter z\n',
    );
  });

  test('blankLinesBetweenDeclarations', () => {
    expect(format('agent A { } agent B { }', { blankLinesBetweenDeclarations: 2 })).toBe(
      'agent A {}\n\n\nagent B {}\n',
    );
    expect(format('agent A { } agent B { }', { blankLinesBetweenDeclarations: 0 })).toBe(
      'agent A {}\nagent B {}\n',
    );
  });

  test('empty input formats to nothing', () => {
    expect(format('')).toBe('');
    expect(format('\n\n  ')).toBe('');
  });

  test('drops what the parser skips', () => {
    expect(format('@ print "x" goal "y"')).toBe('print "x"\n');
  });

  test('keeps condition and reflect text', () => {
    expect(format('if context includes "joy" { mem.long["k"] }')).toBe(
      'if context includes "joy" {\n  mem.long["k"]\n}\n',
    );
  });

  test('an if with an empty condition keeps a single space', () => {
    expect(format('if { }')).toBe('if {}\n');
    expect(format('if { print "x" }')).toBe('if {\n  print "x"\n}\n');
    expect(isFormatted('if {}\n')).toBe(true);
  });

  test('isFormatted', () => {
    expect(isFormatted(FORMATTED)).toBe(true);
    expect(isFormatted(ONE_LINE)).toBe(false);
    expect(isFormatted('print "x"')).toBe(false);
    expect(isFormatted(FORMATTED, { indentSize: 4 })).toBe(false);
  });
});
