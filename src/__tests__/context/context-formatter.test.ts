/**
 * Unit tests for prompt context rendering
 */

import {
  CONTEXT_HEADER,
  NO_CONTEXT_SENTINEL,
  entityHeading,
  formatContext
} from '../../context/context-formatter.js';
import { ValidationError } from '../../core/errors.js';
import { TestHelpers } from '../setup.js';

const { node, edge } = TestHelpers;

describe('formatContext', () => {
  const alice = node('p1', 'Alice', 'Person', { age: 30 });
  const bob = node('p2', 'Bob', 'Person');
  const edges = [
    edge('e1', 'p1', 'p2', 'knows'),
    edge('e2', 'p3', 'p1', 'mentors')
  ];
  const resolveName = (id: string): string | undefined => (id === 'p3' ? 'Carol' : undefined);

  const aliceOnly = [
    CONTEXT_HEADER,
    '',
    '## Entity: Alice (Person)',
    'Properties:',
    '  - age: 30',
    'Relations:',
    '  - knows -> Bob',
    '  - Carol mentors -> Alice'
  ].join('\n');

  const bobBlock = ['## Entity: Bob (Person)', 'Relations:', '  - Alice knows -> Bob'].join('\n');

  test('should return the sentinel when nothing matched', () => {
    expect(formatContext([], [], 100)).toBe(NO_CONTEXT_SENTINEL);
  });

  test('should return the whole sentinel for empty input regardless of the budget', () => {
    expect(formatContext([], [], 5)).toBe(NO_CONTEXT_SENTINEL);
    expect(formatContext([], [], 0)).toBe(NO_CONTEXT_SENTINEL);
  });

  test('should render every entity in rank order when the budget allows', () => {
    const context = formatContext([alice, bob], edges, 10_000, resolveName);

    expect(context).toBe(`${aliceOnly}\n\n${bobBlock}`);
  });

  test('should fall back to the raw id for unknown endpoints', () => {
    const context = formatContext([alice], [edge('e2', 'p3', 'p1', 'mentors')], 10_000);

    expect(context.split('\n').pop()).toBe('  - p3 mentors -> Alice');
  });

  test('should render untyped nodes, non-string values and self-loops', () => {
    const solo = node('x', 'X', null, { tags: ['a'], active: true });
    const context = formatContext([solo], [edge('loop', 'x', 'x', null)], 10_000);

    expect(context).toBe(
      [CONTEXT_HEADER, '', '## Entity: X', 'Properties:', '  - tags: ["a"]', '  - active: true', 'Relations:', '  - related -> X'].join('\n')
    );
  });

  test('should keep only the heading of the first block that does not fit', () => {
    const limit = `${aliceOnly}\n\n## Entity: Bob (Person)`.length;

    const context = formatContext([alice, bob], edges, limit, resolveName);

    expect(context).toBe(`${aliceOnly}\n\n## Entity: Bob (Person)`);
  });

  test('should stop after the first block when even the next heading does not fit', () => {
    const context = formatContext([alice, bob], edges, aliceOnly.length + 3, resolveName);

    expect(context).toBe(aliceOnly);
  });

  test('should fall back to a heading when the first block is too long', () => {
    const context = formatContext([alice, bob], edges, 60, resolveName);

    expect(context).toBe(`${CONTEXT_HEADER}\n\n## Entity: Alice (Person)`);
  });

  test('should truncate the first heading when nothing else fits', () => {
    const context = formatContext([alice], edges, 10, resolveName);

    expect(context).toBe('## Entity:');
    expect(context.length).toBeLessThanOrEqual(10);
  });

  test('should reject a non-positive budget', () => {
    expect(() => formatContext([alice], edges, 0)).toThrow(ValidationError);
  });

  test('should format headings with and without a type', () => {
    expect(entityHeading(bob)).toBe('## Entity: Bob (Person)');
    expect(entityHeading(node('x', 'X'))).toBe('## Entity: X');
  });
});
