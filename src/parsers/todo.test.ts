import { describe, expect, it } from 'vitest';
import { TodoParser } from './todo.js';

describe('TodoParser', () => {
  const parser = new TodoParser();

  it('renders a todo list with a completion count', () => {
    const [block] = parser.parse(
      JSON.stringify([
        { content: 'Write tests', status: 'completed' },
        { content: 'Ship', status: 'in_progress', activeForm: 'Shipping' },
        { content: 'Rest', status: 'pending' },
      ]),
    );
    expect(block?.name).toBe('todos 1/3');
    expect(block?.content).toBe('todos (1/3 completed)\n\n✓ Write tests\n→ Ship\n○ Rest\n');
  });

  it('tolerates items with missing fields', () => {
    const [block] = parser.parse('[{"status": "completed"}, {"content": "Next"}]');
    expect(block?.content).toBe('todos (1/2 completed)\n\n✓ \n○ Next\n');
  });

  it('rejects anything that is not a non-empty array of objects', () => {
    expect(parser.parse('[]')).toEqual([]);
    expect(parser.parse('{"content": "x"}')).toEqual([]);
    expect(parser.parse('not json')).toEqual([]);
    expect(parser.parse('["a"]')).toEqual([]);
  });
});
