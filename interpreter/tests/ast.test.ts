/**
 * Tests for AST helpers.
 */

import { parse } from '../src/parser';
import {
  walk,
  keywordOf,
  renderNode,
  statementsOfKind,
  isBlockStatement,
  Statement,
} from '../src/ast';

const SOURCE = [
  'agent Echo {',
  '  mem short',
  '  on input(msg) {',
  '    embed msg -> mem.short',
  '    reflect { mem.short["msg"] }',
  '  }',
  '  train { if loss > 0.1 { print "Training" } }',
  '}',
  'link a <-> b',
].join('\n');

describe('walk', () => {
  test('visits parents before children with their depth', () => {
    const visited: string[] = [];
    walk(parse(SOURCE), (stmt, depth) => visited.push(`${depth}:${keywordOf(stmt)}`));
    expect(visited).toEqual([
      '0:agent',
      '1:mem',
      '1:on',
      '2:embed',
      '2:reflect',
      '3:reflect-access',
      '1:train',
      '2:if',
      '3:print',
      '0:link',
    ]);
  });
});

describe('keywordOf', () => {
  test('tags the program node', () => {
    expect(keywordOf(parse(''))).toBe('program');
  });
});

describe('renderNode', () => {
  test('renders every statement on one line', () => {
    const rendered: string[] = [];
    walk(parse(SOURCE), stmt => rendered.push(renderNode(stmt)));
    expect(rendered).toEqual([
      'agent Echo',
      'mem short',
      'on input(msg)',
      'embed msg -> mem.short',
      'reflect { ... }',
      'mem.short["msg"]',
      'train { ... }',
      'if loss>0.1 { ... }',
      'print "Training"',
      'link a <-> b',
    ]);
  });

  test('renders the remaining forms', () => {
    const program = parse('goal: "be kind" enter dream evolve { }');
    expect(program.statements.map(renderNode)).toEqual(['goal: be kind', 'enter dream', 'evolve { ... }']);
    expect(renderNode(program)).toBe('[program]');
  });

  test('an if with an empty condition renders a single space', () => {
    const [stmt] = parse('if { }').statements;
    expect(renderNode(stmt)).toBe('if { ... }');
  });
});

describe('statementsOfKind', () => {
  test('selects direct children only', () => {
    const [agent] = parse(SOURCE).statements;
    const body: Statement[] = agent.kind === 'agent' ? agent.body : [];
    const handlers = statementsOfKind(body, 'on_input');
    expect(handlers.map(h => h.param)).toEqual(['msg']);
    expect(statementsOfKind(body, 'print')).toEqual([]);
  });
});

describe('isBlockStatement', () => {
  test('distinguishes statements with bodies', () => {
    const kinds = parse(SOURCE).statements.map(s => [s.kind, isBlockStatement(s)]);
    expect(kinds).toEqual([['agent', true], ['link', false]]);
  });
});
