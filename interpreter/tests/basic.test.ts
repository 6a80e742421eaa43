/**
 * End-to-end tests for the Sentience interpreter.
 *
 * These run whole programs through a session the way the CLI and REPL do,
 * collecting narration in a buffer instead of standard output.
 */

import { Session } from '../src/session';
import { BufferSink } from '../src/output';
import { parseWithDiagnostics } from '../src/parser';

// ==================================================================
// Program flow
// ==================================================================

describe('Echo agent', () => {
  const source = [
    'agent Echo {',
    '  mem short',
    '  goal: "Store and reflect"',
    '  on input(msg) {',
    '    embed msg -> mem.short',
    '    reflect { mem.short["msg"] }',
    '  }',
    '  train {',
    '    if loss > 0.1 {',
    '      reflect { mem.short["msg"] }',
    '    }',
    '  }',
    '}',
  ].join('\n');

  test('definition narrates every block once', () => {
    const sink = new BufferSink();
    new Session({ sink }).submit(source);
    expect(sink.text()).toBe(
      [
        'Agent: Echo',
        '  Init mem: short',
        '  Goal: "Store and reflect"',
        '  On Input: (msg)',
        '    Embed: msg -> mem.short',
        '    Reflect block:',
        '      mem.short["msg"] = ""',
        '  Train block:',
        '    If: loss>0.1',
        '      Reflect block:',
        '        mem.short["msg"] = ""',
        'Agent: Echo [registered]',
        '',
      ].join('\n'),
    );
  });

  test('input then training sees the stored message', () => {
    const sink = new BufferSink();
    const session = new Session({ sink });
    session.submit(source);
    sink.clear();

    session.dispatchInput('hello');
    session.dispatchTrain('hello');

    expect(sink.lines).toEqual([
      '  Embed: msg -> mem.short',
      '  Reflect block:',
      '    mem.short["msg"] = "hello"',
      '  If: loss>0.1',
      '    Reflect block:',
      '      mem.short["msg"] = "hello"',
    ]);
  });

  test('state persists across submissions', () => {
    const sink = new BufferSink();
    const session = new Session({ sink });
    session.submit(source);
    session.submit('link msg <-> reply');
    session.dispatchInput('hello');
    sink.clear();

    session.submit('mem.short["msg"]');
    expect(sink.lines).toEqual(['mem.short["msg"] = "hello"']);
    expect(session.ctx.links.get('msg')).toBe('reply');
    expect(session.ctx.currentAgent?.name).toBe('Echo');
  });
});

// ==================================================================
// Robustness
// ==================================================================

describe('Malformed programs', () => {
  test('partial programs still run what parsed', () => {
    const sink = new BufferSink();
    new Session({ sink }).submit('print "before" agent { print "inside" } link x print "after"');
    expect(sink.lines).toEqual(['before', 'inside', 'after']);
  });

  test('no input aborts parsing or evaluation', () => {
    const inputs = [
      '',
      '}',
      '{{{',
      'agent A { on input( }',
      'embed',
      'mem.',
      'mem.short["',
      'if if if {',
      'goal: goal: "x"',
      '<-> -> < > - @ # $',
      'agent A { train { if loss { reflect { mem.long["k"] } } }',
      '"',
      'reflect { '.repeat(20000),
      'agent A { ' + 'if loss { '.repeat(20000) + '}'.repeat(20000) + ' }',
    ];
    for (const input of inputs) {
      const session = new Session({ sink: new BufferSink() });
      expect(() => session.submit(input)).not.toThrow();
      expect(() => session.dispatchInput('x')).not.toThrow();
      expect(parseWithDiagnostics(input).program.kind).toBe('program');
    }
  });
});
